/**
 * Local Field Resolution
 *
 * A LocalField means "this property of whatever vertex is currently open".
 * That only holds while blocks stay where the front end put them, so before
 * any block is moved, every LocalField is rewritten to name its location.
 */

import { InvariantViolationError } from '../../errors'
import { atLocation, contextField, foldedContextField, rewriteBlockExpressions } from '../../ir'
import type { AnyLocation, Block, Expression } from '../../ir'
import type { QueryMetadataTable } from '../../metadata'
import type { LoweringPass } from '../types'

const PASS_NAME = 'replaceLocalFieldsWithContextFields'

/**
 * Rewrite a LocalField into a field read at `location`; all other
 * expressions pass through.
 */
export function resolveLocalField(location: AnyLocation, expression: Expression): Expression {
  if (expression.type !== 'localField') return expression

  if (location.kind === 'fold') {
    return foldedContextField(location.navigateToField(expression.fieldName), expression.fieldType)
  }
  return contextField(location.navigateToField(expression.fieldName), expression.fieldType)
}

/**
 * Buffers blocks until the MarkLocation that binds them, then releases them
 * rewritten against that location.
 */
export class LocalFieldResolver {
  private pending: Block[] = []

  /** Blocks seen since the last MarkLocation */
  get pendingCount(): number {
    return this.pending.length
  }

  /**
   * Advance by one block. Returns the blocks that are ready to be emitted,
   * in order.
   */
  step(block: Block): Block[] {
    if (block.type !== 'markLocation') {
      this.pending.push(block)
      return []
    }

    const rewrite = atLocation(block.location, resolveLocalField)
    const ready = this.pending.map((pendingBlock) => rewriteBlockExpressions(pendingBlock, rewrite))
    this.pending = []
    return [...ready, block]
  }

  /**
   * Release whatever follows the last MarkLocation, unchanged.
   */
  finish(): Block[] {
    const rest = this.pending
    this.pending = []
    return rest
  }
}

export function replaceLocalFieldsWithContextFields(blocks: readonly Block[]): Block[] {
  const resolver = new LocalFieldResolver()
  const result: Block[] = []
  for (const block of blocks) {
    result.push(...resolver.step(block))
  }
  result.push(...resolver.finish())

  if (result.length !== blocks.length) {
    throw new InvariantViolationError(
      `The number of IR blocks unexpectedly changed: ${blocks.length} vs ${result.length}`,
      PASS_NAME,
      blocks.length,
      result.length,
    )
  }

  return result
}

export class ReplaceLocalFieldsWithContextFieldsPass implements LoweringPass {
  readonly name = PASS_NAME

  transform(blocks: readonly Block[], _table: QueryMetadataTable): Block[] {
    return replaceLocalFieldsWithContextFields(blocks)
  }
}
