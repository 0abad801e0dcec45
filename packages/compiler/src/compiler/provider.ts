/**
 * Backend Code Generator Interface
 *
 * Abstraction over the code generator that consumes lowered IR.
 * Allows plugging different backend query languages.
 */

import type { Block } from '../ir'
import type { QueryMetadataTable } from '../metadata'

/**
 * Turns a lowered block sequence into backend output.
 * Implement this to emit a specific query language.
 */
export interface BackendCodeGenerator<TOutput> {
  /** Unique name for this backend (e.g., 'cypher') */
  readonly name: string

  /**
   * Generate backend output from lowered IR.
   *
   * @param blocks - Blocks that have been through the full lowering pipeline
   * @param table - The metadata table the blocks were lowered against
   */
  generate(blocks: readonly Block[], table: QueryMetadataTable): TOutput
}
