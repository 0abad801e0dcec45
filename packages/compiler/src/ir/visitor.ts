/**
 * Block Expression Visitor
 *
 * Applies an expression rewrite to every expression embedded in a block.
 * Used by the lowering passes that rename or resolve location references.
 */

import type { Block, ConstructResult } from './blocks'
import { visitAndUpdate, someSubexpression } from './expressions'
import type { Expression, ExpressionRewriteFn } from './expressions'
import type { AnyLocation } from './location'

/**
 * Rewrite function that also receives the location the block is bound to.
 */
export type LocationRewriteFn<L extends AnyLocation = AnyLocation> = (location: L, expression: Expression) => Expression

/**
 * Bind a location-aware rewrite to a specific location.
 */
export function atLocation<L extends AnyLocation>(location: L, fn: LocationRewriteFn<L>): ExpressionRewriteFn {
  return (expression) => fn(location, expression)
}

/**
 * Return a block with every embedded expression passed through `fn`.
 *
 * Blocks without expressions, and blocks whose expressions `fn` leaves
 * unchanged, are returned as-is.
 */
export function rewriteBlockExpressions<B extends Block>(block: B, fn: ExpressionRewriteFn): B
export function rewriteBlockExpressions(block: Block, fn: ExpressionRewriteFn): Block {
  switch (block.type) {
    case 'filter': {
      const predicate = visitAndUpdate(block.predicate, fn)
      return predicate === block.predicate ? block : { ...block, predicate }
    }
    case 'constructResult':
      return rewriteConstructResult(block, fn)
    case 'queryRoot':
    case 'traverse':
    case 'recurse':
    case 'fold':
    case 'unfold':
    case 'backtrack':
    case 'markLocation':
    case 'coerceType':
    case 'endOptional':
    case 'outputSource':
    case 'globalOperationsStart':
      return block
  }
}

function rewriteConstructResult(block: ConstructResult, fn: ExpressionRewriteFn): ConstructResult {
  let changed = false
  const fields: Record<string, Expression> = {}
  for (const [name, expression] of Object.entries(block.fields)) {
    const updated = visitAndUpdate(expression, fn)
    if (updated !== expression) changed = true
    fields[name] = updated
  }
  return changed ? { ...block, fields } : block
}

/**
 * Top-level expressions embedded in a block, in declaration order.
 */
export function blockExpressions(block: Block): Expression[] {
  switch (block.type) {
    case 'filter':
      return [block.predicate]
    case 'constructResult':
      return Object.values(block.fields)
    default:
      return []
  }
}

/**
 * Whether any expression node anywhere in the block satisfies the predicate.
 */
export function blockHasExpression(block: Block, predicate: (expression: Expression) => boolean): boolean {
  return blockExpressions(block).some((expression) => someSubexpression(expression, predicate))
}
