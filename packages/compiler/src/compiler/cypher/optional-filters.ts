/**
 * Optional Filter Hoisting
 *
 * A filter on or inside an `@optional` traversal must only drop a result row
 * when the optional edge exists and the filter fails. The backend's native
 * optional match drops the row as soon as the filter fails, edge or no edge.
 * Such filters are therefore moved after GlobalOperationsStart: the optional
 * edges are resolved and the rows materialized first, and the filters apply
 * to the materialized rows.
 *
 * Requires every LocalField to have been resolved, since a moved filter no
 * longer sits at the location its LocalFields referred to.
 */

import { MalformedIrError } from '../../errors'
import { blockHasExpression, formatBlock, formatBlocks } from '../../ir'
import type { Block, Filter } from '../../ir'
import type { QueryMetadataTable } from '../../metadata'
import type { LoweringPass } from '../types'

const PASS_NAME = 'moveFiltersInOptionalLocationsToGlobalOperations'

/**
 * Tracks whether the scan is inside an optional scope and holds the filters
 * lifted out of it until GlobalOperationsStart is reached.
 */
export class OptionalFilterHoister {
  private withinOptionalScope = false
  private reachedGlobalOperations = false
  private hoisted: Filter[] = []

  constructor(private readonly table: QueryMetadataTable) {}

  get inOptionalScope(): boolean {
    return this.withinOptionalScope
  }

  /** Filters lifted out so far and not yet released */
  get pendingFilters(): readonly Filter[] {
    return this.hoisted
  }

  /**
   * Advance by one block. Returns the blocks to emit in its place, in order.
   */
  step(block: Block): Block[] {
    switch (block.type) {
      case 'filter':
        if (!this.withinOptionalScope || this.reachedGlobalOperations) return [block]
        if (blockHasExpression(block, (expression) => expression.type === 'localField')) {
          throw new MalformedIrError(
            `Cannot move ${formatBlock(block)} out of its optional scope: it still contains a LocalField. ` +
              'Local fields must be resolved before filters are moved.',
            PASS_NAME,
          )
        }
        this.hoisted.push(block)
        return []
      case 'traverse':
        if (block.optional) this.withinOptionalScope = true
        return [block]
      case 'backtrack':
        // Leaving a nested optional scope may still leave the scan inside an outer one.
        this.withinOptionalScope = this.table.getLocationInfo(block.location).optionalScopesDepth > 0
        return [block]
      case 'globalOperationsStart': {
        const released = this.hoisted
        this.hoisted = []
        this.reachedGlobalOperations = true
        return [block, ...released]
      }
      default:
        return [block]
    }
  }

  /**
   * @throws MalformedIrError if filters were lifted but never released
   */
  finish(blocks: readonly Block[]): void {
    if (this.hoisted.length > 0) {
      throw new MalformedIrError(
        `${this.hoisted.length} filter(s) from optional scopes were not followed by GlobalOperationsStart.\n` +
          `IR blocks:\n${formatBlocks(blocks)}`,
        PASS_NAME,
        undefined,
        blocks,
      )
    }
  }
}

export function moveFiltersInOptionalLocationsToGlobalOperations(
  blocks: readonly Block[],
  table: QueryMetadataTable,
): Block[] {
  const hoister = new OptionalFilterHoister(table)
  const result: Block[] = []
  for (const block of blocks) {
    result.push(...hoister.step(block))
  }
  hoister.finish(blocks)
  return result
}

export class MoveFiltersInOptionalLocationsToGlobalOperationsPass implements LoweringPass {
  readonly name = PASS_NAME

  transform(blocks: readonly Block[], table: QueryMetadataTable): Block[] {
    return moveFiltersInOptionalLocationsToGlobalOperations(blocks, table)
  }
}
