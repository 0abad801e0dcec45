/**
 * IR Sanity Checks
 *
 * Structural checks on a block sequence as produced by the front end.
 * Lowering passes assume these hold; running the checks first turns a
 * confusing fault deep inside a pass into one that names the broken rule.
 */

import { MalformedIrError } from '../errors'
import type { Block } from './blocks'
import { isTraversalBlock } from './blocks'
import { formatBlock, formatBlocks } from './format'

const PASS_NAME = 'sanityCheck'

function fail(message: string, blocks: readonly Block[], blockIndex?: number): never {
  throw new MalformedIrError(`${message}\nIR blocks:\n${formatBlocks(blocks)}`, PASS_NAME, blockIndex, blocks)
}

/**
 * @throws MalformedIrError describing the first violated rule
 */
export function sanityCheckBlocks(blocks: readonly Block[]): void {
  checkQueryRoot(blocks)
  checkGlobalOperations(blocks)
  checkTraversalsAreMarked(blocks)
  checkMarkedLocations(blocks)
}

function checkQueryRoot(blocks: readonly Block[]): void {
  if (blocks.length === 0 || blocks[0]?.type !== 'queryRoot') {
    fail('The first IR block must be a QueryRoot', blocks, 0)
  }
  blocks.forEach((block, index) => {
    if (index > 0 && block.type === 'queryRoot') {
      fail(`Found more than one QueryRoot block, at index ${index}`, blocks, index)
    }
  })
}

function checkGlobalOperations(blocks: readonly Block[]): void {
  const starts = blocks.flatMap((block, index) => (block.type === 'globalOperationsStart' ? [index] : []))
  if (starts.length !== 1) {
    fail(`Expected exactly one GlobalOperationsStart block, found ${starts.length}`, blocks)
  }
  const [start = 0] = starts
  blocks.forEach((block, index) => {
    if (index > start && block.type !== 'filter' && block.type !== 'constructResult') {
      fail(`Only Filter and ConstructResult blocks may follow GlobalOperationsStart, found ${formatBlock(block)}`, blocks, index)
    }
  })
}

function checkTraversalsAreMarked(blocks: readonly Block[]): void {
  blocks.forEach((block, index) => {
    if (!isTraversalBlock(block)) return
    for (let lookup = index + 1; lookup < blocks.length; lookup++) {
      const next = blocks[lookup]
      if (next?.type === 'markLocation') return
      if (next?.type !== 'filter' && next?.type !== 'coerceType') {
        fail(
          `${formatBlock(block)} at index ${index} must be followed by a MarkLocation, ` +
            `found ${next ? formatBlock(next) : 'nothing'} at index ${lookup}`,
          blocks,
          index,
        )
      }
    }
    fail(`${formatBlock(block)} at index ${index} is never followed by a MarkLocation`, blocks, index)
  })
}

function checkMarkedLocations(blocks: readonly Block[]): void {
  blocks.forEach((block, index) => {
    if (block.type === 'markLocation' && block.location.field !== undefined) {
      fail(`MarkLocation must mark a vertex, not a field: ${block.location.key}`, blocks, index)
    }
  })
}
