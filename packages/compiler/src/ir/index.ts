/**
 * IR Module
 *
 * Block, expression and location model of a compiled query.
 */

export { Location, FoldScopeLocation, isFoldScopeLocation } from './location'
export type { AnyLocation, EdgeDirection, FoldPathStep } from './location'

export {
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
} from './blocks'
export type {
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
} from './blocks'

export {
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
} from './expressions'
export type {
  Expression,
  ExpressionType,
  ExpressionRewriteFn,
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
} from './expressions'

export { rewriteBlockExpressions, atLocation, blockExpressions, blockHasExpression } from './visitor'
export type { LocationRewriteFn } from './visitor'

export { formatBlock, formatBlocks, formatExpression } from './format'
export { sanityCheckBlocks } from './validation'
export { parseBlocks, serializeBlocks, serializeBlock, serializeExpression, serializeLocation } from './serialization'
export type {
  SerializedBlock,
  SerializedExpression,
  SerializedLocation,
  SerializedVertexLocation,
  SerializedFoldScopeLocation,
} from './serialization'
