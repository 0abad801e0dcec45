/**
 * Cypher Lowering Module
 *
 * Passes that prepare IR for a Cypher code generator.
 */

import type { LoweringPass } from '../types'
import { InsertExplicitTypeBoundsPass } from './type-bounds'
import { RemoveMarkLocationAfterOptionalBacktrackPass } from './revisits'
import { ReplaceLocalFieldsWithContextFieldsPass } from './local-fields'
import { MoveFiltersInOptionalLocationsToGlobalOperationsPass } from './optional-filters'

export { insertExplicitTypeBounds, InsertExplicitTypeBoundsPass } from './type-bounds'
export { removeMarkLocationAfterOptionalBacktrack, RemoveMarkLocationAfterOptionalBacktrackPass } from './revisits'
export {
  replaceLocalFieldsWithContextFields,
  resolveLocalField,
  LocalFieldResolver,
  ReplaceLocalFieldsWithContextFieldsPass,
} from './local-fields'
export {
  moveFiltersInOptionalLocationsToGlobalOperations,
  OptionalFilterHoister,
  MoveFiltersInOptionalLocationsToGlobalOperationsPass,
} from './optional-filters'

/**
 * The Cypher lowering passes, in the only order that is correct: type bounds
 * and revisit removal make locations concrete, local fields are then bound
 * to them, and only then may filters move.
 */
export function createCypherLoweringPasses(): LoweringPass[] {
  return [
    new InsertExplicitTypeBoundsPass(),
    new RemoveMarkLocationAfterOptionalBacktrackPass(),
    new ReplaceLocalFieldsWithContextFieldsPass(),
    new MoveFiltersInOptionalLocationsToGlobalOperationsPass(),
  ]
}
