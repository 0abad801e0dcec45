/**
 * Lowering Pipeline
 *
 * Applies the lowering passes to the IR, in order, before code generation.
 */

import { isInternalFault } from '../errors'
import { sanityCheckBlocks } from '../ir'
import type { Block } from '../ir'
import type { QueryMetadataTable } from '../metadata'
import { createCypherLoweringPasses } from './cypher'
import type { BackendCodeGenerator } from './provider'
import type { LoweringOptions, LoweringOutcome, LoweringPass } from './types'

/**
 * Runs a fixed sequence of passes. Faults raised by a pass propagate to the
 * caller untouched.
 */
export class LoweringPipeline {
  private readonly passes: readonly LoweringPass[]
  private readonly options: LoweringOptions

  constructor(passes?: LoweringPass[], options: LoweringOptions = {}) {
    this.passes = passes ?? createCypherLoweringPasses()
    this.options = {
      checkInput: false,
      ...options,
    }
  }

  get passNames(): string[] {
    return this.passes.map((pass) => pass.name)
  }

  lower(blocks: readonly Block[], table: QueryMetadataTable, options?: LoweringOptions): Block[] {
    // Allow options override per call
    const { checkInput, onPass } = options ? { ...this.options, ...options } : this.options

    if (checkInput) {
      sanityCheckBlocks(blocks)
    }

    let result: readonly Block[] = blocks
    this.passes.forEach((pass, index) => {
      const output = pass.transform(result, table)
      onPass?.({
        pass: pass.name,
        index,
        inputBlockCount: result.length,
        outputBlockCount: output.length,
      })
      result = output
    })
    return [...result]
  }
}

/**
 * Lower IR for a Cypher backend: type bounds, revisit removal, local field
 * resolution, optional filter hoisting.
 */
export function lowerIr(blocks: readonly Block[], table: QueryMetadataTable, options?: LoweringOptions): Block[] {
  return new LoweringPipeline(undefined, options).lower(blocks, table)
}

/**
 * Like `lowerIr`, but reports internal faults as a value. Errors that are
 * not lowering faults are rethrown.
 */
export function tryLowerIr(
  blocks: readonly Block[],
  table: QueryMetadataTable,
  options?: LoweringOptions,
): LoweringOutcome {
  try {
    return { ok: true, blocks: lowerIr(blocks, table, options) }
  } catch (error) {
    if (isInternalFault(error)) {
      return { ok: false, fault: error }
    }
    throw error
  }
}

/**
 * Lower IR and hand the result to a backend code generator.
 */
export function compileWithBackend<TOutput>(
  blocks: readonly Block[],
  table: QueryMetadataTable,
  generator: BackendCodeGenerator<TOutput>,
  options?: LoweringOptions,
): TOutput {
  return generator.generate(lowerIr(blocks, table, options), table)
}
