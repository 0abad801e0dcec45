/**
 * Location Revisit Elimination
 *
 * The front end re-marks a vertex under a fresh location when the traversal
 * returns to it after an optional branch. The backend has no notion of a
 * revisit, so those MarkLocation blocks are dropped and every reference to a
 * revisit location is pointed at its origin instead.
 */

import { rewriteBlockExpressions } from '../../ir'
import type { Block } from '../../ir'
import type { QueryMetadataTable } from '../../metadata'
import {
  makeLocationRewriterFn,
  makeRevisitLocationTranslations,
  translateBlockLocations,
} from '../common/location-renaming'
import type { LoweringPass } from '../types'

const PASS_NAME = 'removeMarkLocationAfterOptionalBacktrack'

export function removeMarkLocationAfterOptionalBacktrack(
  blocks: readonly Block[],
  table: QueryMetadataTable,
): Block[] {
  const translations = makeRevisitLocationTranslations(table)
  const rewriteLocations = makeLocationRewriterFn(translations)

  const result: Block[] = []
  for (const block of blocks) {
    if (block.type === 'markLocation' && translations.has(block.location.key)) {
      // Replaced by its origin, which is already marked.
      continue
    }
    result.push(rewriteBlockExpressions(translateBlockLocations(block, translations), rewriteLocations))
  }
  return result
}

export class RemoveMarkLocationAfterOptionalBacktrackPass implements LoweringPass {
  readonly name = PASS_NAME

  transform(blocks: readonly Block[], table: QueryMetadataTable): Block[] {
    return removeMarkLocationAfterOptionalBacktrack(blocks, table)
  }
}
