/**
 * IR Block Definitions
 *
 * A compiled query is a linear sequence of blocks, one per traversal step,
 * in the order the front end emits them. This enables:
 * - Backend-specific lowering passes over a shared representation
 * - Multiple backend targets from the same front end
 * - Inspection of the query plan when diagnosing faults
 */

import type { Expression } from './expressions'
import type { AnyLocation, EdgeDirection, FoldScopeLocation, Location } from './location'

// =============================================================================
// BLOCKS
// =============================================================================

/**
 * Root of the traversal: start at vertices of the given class.
 */
export interface QueryRoot {
  type: 'queryRoot'
  startClass: readonly string[]
}

/**
 * Follow an edge to adjacent vertices.
 */
export interface Traverse {
  type: 'traverse'
  direction: EdgeDirection
  edgeName: string
  /** Whether the edge is marked `@optional` */
  optional: boolean
}

/**
 * Bounded repeated traversal of an edge (`@recurse`).
 */
export interface Recurse {
  type: 'recurse'
  direction: EdgeDirection
  edgeName: string
  /** Maximum number of hops */
  depth: number
}

/**
 * Enter a `@fold` scope.
 */
export interface Fold {
  type: 'fold'
  foldScopeLocation: FoldScopeLocation
}

/**
 * Leave the innermost `@fold` scope.
 */
export interface Unfold {
  type: 'unfold'
}

/**
 * Return to a previously visited location after a branch completes.
 */
export interface Backtrack {
  type: 'backtrack'
  location: Location
  /** Whether the branch being closed was optional */
  optional: boolean
}

/**
 * Bind the current point of the traversal to a location.
 */
export interface MarkLocation {
  type: 'markLocation'
  location: AnyLocation
}

/**
 * Narrow the type of the current vertex to one of the given classes.
 */
export interface CoerceType {
  type: 'coerceType'
  targetClass: readonly string[]
}

/**
 * Predicate the current result must satisfy.
 */
export interface Filter {
  type: 'filter'
  predicate: Expression
}

/**
 * Close an optional traversal.
 */
export interface EndOptional {
  type: 'endOptional'
}

/**
 * Every vertex at the current point must appear in at least one result row.
 */
export interface OutputSource {
  type: 'outputSource'
}

/**
 * End of per-path traversal; the start of query-wide operations.
 */
export interface GlobalOperationsStart {
  type: 'globalOperationsStart'
}

/**
 * Shape of each result row: output name to the expression producing it.
 */
export interface ConstructResult {
  type: 'constructResult'
  fields: Readonly<Record<string, Expression>>
}

export type Block =
  | QueryRoot
  | Traverse
  | Recurse
  | Fold
  | Unfold
  | Backtrack
  | MarkLocation
  | CoerceType
  | Filter
  | EndOptional
  | OutputSource
  | GlobalOperationsStart
  | ConstructResult

export type BlockType = Block['type']

/**
 * Blocks that move to a new vertex and must be followed by a MarkLocation.
 */
export type TraversalBlock = Traverse | Recurse | Fold

export function isTraversalBlock(block: Block): block is TraversalBlock {
  return block.type === 'traverse' || block.type === 'recurse' || block.type === 'fold'
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function queryRoot(startClass: readonly string[]): QueryRoot {
  return { type: 'queryRoot', startClass: [...startClass] }
}

export function traverse(direction: EdgeDirection, edgeName: string, optional = false): Traverse {
  return { type: 'traverse', direction, edgeName, optional }
}

export function recurse(direction: EdgeDirection, edgeName: string, depth: number): Recurse {
  return { type: 'recurse', direction, edgeName, depth }
}

export function fold(foldScopeLocation: FoldScopeLocation): Fold {
  return { type: 'fold', foldScopeLocation }
}

export function unfold(): Unfold {
  return { type: 'unfold' }
}

export function backtrack(location: Location, optional = false): Backtrack {
  return { type: 'backtrack', location, optional }
}

export function markLocation(location: AnyLocation): MarkLocation {
  return { type: 'markLocation', location }
}

export function coerceType(targetClass: readonly string[]): CoerceType {
  return { type: 'coerceType', targetClass: [...targetClass] }
}

export function filter(predicate: Expression): Filter {
  return { type: 'filter', predicate }
}

export function endOptional(): EndOptional {
  return { type: 'endOptional' }
}

export function outputSource(): OutputSource {
  return { type: 'outputSource' }
}

export function globalOperationsStart(): GlobalOperationsStart {
  return { type: 'globalOperationsStart' }
}

export function constructResult(fields: Record<string, Expression>): ConstructResult {
  return { type: 'constructResult', fields: { ...fields } }
}
