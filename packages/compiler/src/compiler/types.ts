/**
 * Compiler Type Definitions
 */

import type { InternalFault } from '../errors'
import type { Block } from '../ir'
import type { QueryMetadataTable } from '../metadata'

/**
 * A single lowering pass: a pure function of the block sequence and the
 * metadata table.
 */
export interface LoweringPass {
  readonly name: string
  transform(blocks: readonly Block[], table: QueryMetadataTable): Block[]
}

/**
 * Emitted after each pass completes.
 */
export interface PassTraceEvent {
  pass: string
  /** Position of the pass in the pipeline */
  index: number
  inputBlockCount: number
  outputBlockCount: number
}

/**
 * Options for lowering.
 */
export interface LoweringOptions {
  /** Run the front-end sanity checks on the input before the first pass */
  checkInput?: boolean
  /** Called after every pass with its block counts */
  onPass?: (event: PassTraceEvent) => void
}

export type LoweringOutcome = { ok: true; blocks: Block[] } | { ok: false; fault: InternalFault }
