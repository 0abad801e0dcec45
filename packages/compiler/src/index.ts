/**
 * Traversal IR Lowering - backend lowering for a graph traversal query compiler
 *
 * Rewrites the backend-agnostic IR of a compiled query so that a backend code
 * generator can emit it while keeping `@optional` and `@fold` semantics.
 *
 * @example
 * ```typescript
 * import {
 *   Location, QueryMetadataTable, lowerIr,
 *   queryRoot, markLocation, traverse, backtrack, filter, globalOperationsStart,
 *   binaryComposition, localField, variable,
 * } from '@traverse-ir/compiler';
 *
 * const animal = new Location(['Animal']);
 * const parent = animal.navigateToSubpath('out_Animal_ParentOf');
 *
 * const table = new QueryMetadataTable(animal, { type: 'Animal', optionalScopesDepth: 0 });
 * table.registerLocation(parent, { type: 'Animal', optionalScopesDepth: 1, parentLocation: animal });
 *
 * const lowered = lowerIr(
 *   [
 *     queryRoot(['Animal']),
 *     markLocation(animal),
 *     traverse('out', 'Animal_ParentOf', true),
 *     filter(binaryComposition('=', localField('name', 'String'), variable('wanted', 'String'))),
 *     markLocation(parent),
 *     backtrack(animal, true),
 *     globalOperationsStart(),
 *   ],
 *   table,
 * );
 * // The filter now reads `Animal__out_Animal_ParentOf___1.name` and sits after GlobalOperationsStart.
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// IR
// =============================================================================

export {
  Location,
  FoldScopeLocation,
  isFoldScopeLocation,
  queryRoot,
  traverse,
  recurse,
  fold,
  unfold,
  backtrack,
  markLocation,
  coerceType,
  filter,
  endOptional,
  outputSource,
  globalOperationsStart,
  constructResult,
  isTraversalBlock,
  literal,
  variable,
  localField,
  contextField,
  foldedContextField,
  outputContextField,
  contextFieldExistence,
  unaryTransformation,
  binaryComposition,
  ternaryConditional,
  visitAndUpdate,
  someSubexpression,
  rewriteBlockExpressions,
  atLocation,
  blockExpressions,
  blockHasExpression,
  formatBlock,
  formatBlocks,
  formatExpression,
  sanityCheckBlocks,
  parseBlocks,
  serializeBlocks,
  serializeBlock,
  serializeExpression,
  serializeLocation,
} from './ir'
export type {
  AnyLocation,
  EdgeDirection,
  FoldPathStep,
  Block,
  BlockType,
  TraversalBlock,
  QueryRoot,
  Traverse,
  Recurse,
  Fold,
  Unfold,
  Backtrack,
  MarkLocation,
  CoerceType,
  Filter,
  EndOptional,
  OutputSource,
  GlobalOperationsStart,
  ConstructResult,
  Expression,
  ExpressionType,
  ExpressionRewriteFn,
  LocationRewriteFn,
  BinaryOperator,
  UnaryOperator,
  LiteralValue,
  Literal,
  Variable,
  LocalField,
  ContextField,
  FoldedContextField,
  OutputContextField,
  ContextFieldExistence,
  UnaryTransformation,
  BinaryComposition,
  TernaryConditional,
  SerializedBlock,
  SerializedExpression,
  SerializedLocation,
  SerializedVertexLocation,
  SerializedFoldScopeLocation,
} from './ir'

// =============================================================================
// METADATA
// =============================================================================

export { QueryMetadataTable, parseMetadataTable, serializeMetadataTable } from './metadata'
export type { LocationInfo, LocationInfoInput, SerializedMetadataTable } from './metadata'

// =============================================================================
// COMPILER
// =============================================================================

export {
  LoweringPipeline,
  lowerIr,
  tryLowerIr,
  compileWithBackend,
  createCypherLoweringPasses,
  insertExplicitTypeBounds,
  InsertExplicitTypeBoundsPass,
  removeMarkLocationAfterOptionalBacktrack,
  RemoveMarkLocationAfterOptionalBacktrackPass,
  replaceLocalFieldsWithContextFields,
  ReplaceLocalFieldsWithContextFieldsPass,
  resolveLocalField,
  moveFiltersInOptionalLocationsToGlobalOperations,
  MoveFiltersInOptionalLocationsToGlobalOperationsPass,
  LocalFieldResolver,
  OptionalFilterHoister,
  makeRevisitLocationTranslations,
  makeLocationRewriterFn,
} from './compiler'
export type {
  BackendCodeGenerator,
  LoweringPass,
  LoweringOptions,
  LoweringOutcome,
  PassTraceEvent,
  LocationTranslations,
} from './compiler'

// =============================================================================
// ERRORS
// =============================================================================

export { LoweringError, MalformedIrError, InvariantViolationError, isInternalFault } from './errors'
export type { InternalFault, InternalFaultKind } from './errors'
