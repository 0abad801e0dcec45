/**
 * Explicit Type Bounds
 *
 * The backend does not know that edge endpoints are strictly typed, so the
 * destination type of every Traverse, Fold and Recurse is stated with a
 * CoerceType block right after it.
 *
 * Before: Traverse(out_Animal_ParentOf) Filter(...) MarkLocation(Animal__out_Animal_ParentOf___1)
 * After:  Traverse(out_Animal_ParentOf) CoerceType(Animal) Filter(...) MarkLocation(...)
 */

import { MalformedIrError } from '../../errors'
import { coerceType, formatBlock, formatBlocks, isTraversalBlock } from '../../ir'
import type { Block, CoerceType, MarkLocation } from '../../ir'
import type { QueryMetadataTable } from '../../metadata'
import type { LoweringPass } from '../types'

const PASS_NAME = 'insertExplicitTypeBounds'

/**
 * Find the block that settles the destination type of the traversal at
 * `index`: either an existing CoerceType or the MarkLocation of its
 * destination. Filters in between are stepped over.
 */
function findTypeBound(blocks: readonly Block[], trigger: Block, index: number): CoerceType | MarkLocation {
  for (let lookup = index + 1; lookup < blocks.length; lookup++) {
    const candidate = blocks[lookup]
    switch (candidate.type) {
      case 'coerceType':
      case 'markLocation':
        return candidate
      case 'filter':
        continue
      default:
        throw new MalformedIrError(
          `Expected only CoerceType and Filter blocks between ${formatBlock(trigger)} ` +
            `and its MarkLocation, but found ${formatBlock(candidate)} at index ${lookup}.\n` +
            `IR blocks:\n${formatBlocks(blocks)}`,
          PASS_NAME,
          lookup,
          blocks,
        )
    }
  }
  throw new MalformedIrError(
    `Block ${formatBlock(trigger)} at index ${index} has no MarkLocation or CoerceType after it.\n` +
      `IR blocks:\n${formatBlocks(blocks)}`,
    PASS_NAME,
    index,
    blocks,
  )
}

/**
 * Add a CoerceType after every Traverse/Fold/Recurse that lacks one.
 */
export function insertExplicitTypeBounds(blocks: readonly Block[], table: QueryMetadataTable): Block[] {
  const result: Block[] = []

  blocks.forEach((block, index) => {
    result.push(block)
    if (!isTraversalBlock(block)) return

    const bound = findTypeBound(blocks, block, index)
    if (bound.type === 'markLocation') {
      const info = table.getLocationInfo(bound.location)
      // Directly after the traversal, ahead of any filters.
      result.push(coerceType([info.type]))
    }
  })

  return result
}

export class InsertExplicitTypeBoundsPass implements LoweringPass {
  readonly name = PASS_NAME

  transform(blocks: readonly Block[], table: QueryMetadataTable): Block[] {
    return insertExplicitTypeBounds(blocks, table)
  }
}
