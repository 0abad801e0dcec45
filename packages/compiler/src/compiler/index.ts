/**
 * Compiler Module
 *
 * Lowers backend-agnostic IR into a form a backend code generator can emit.
 */

// Backend interface
export type { BackendCodeGenerator } from './provider'

// Pipeline
export { LoweringPipeline, lowerIr, tryLowerIr, compileWithBackend } from './pipeline'

// Cypher lowering passes
export {
  createCypherLoweringPasses,
  insertExplicitTypeBounds,
  InsertExplicitTypeBoundsPass,
  removeMarkLocationAfterOptionalBacktrack,
  RemoveMarkLocationAfterOptionalBacktrackPass,
  replaceLocalFieldsWithContextFields,
  resolveLocalField,
  LocalFieldResolver,
  ReplaceLocalFieldsWithContextFieldsPass,
  moveFiltersInOptionalLocationsToGlobalOperations,
  OptionalFilterHoister,
  MoveFiltersInOptionalLocationsToGlobalOperationsPass,
} from './cypher'

// Location renaming
export {
  makeRevisitLocationTranslations,
  makeLocationRewriterFn,
  translateLocation,
  translateFoldScopeLocation,
  translateBlockLocations,
} from './common/location-renaming'
export type { LocationTranslations } from './common/location-renaming'

// Types
export type { LoweringPass, LoweringOptions, LoweringOutcome, PassTraceEvent } from './types'
