/**
 * Query Locations
 *
 * A location names a position reached by the traversal so far. Locations are
 * minted by the front end and never mutated; navigation methods return new
 * instances.
 */

import { MalformedIrError } from '../errors'

export type EdgeDirection = 'in' | 'out'

/**
 * One step of a fold path: the direction and name of the folded edge.
 */
export type FoldPathStep = readonly [direction: EdgeDirection, edgeName: string]

/**
 * A vertex (or a property of a vertex) outside of any fold scope.
 */
export class Location {
  readonly kind = 'vertex' as const
  readonly queryPath: readonly string[]

  constructor(
    queryPath: readonly string[],
    readonly field?: string,
    readonly visitCounter: number = 1,
  ) {
    if (queryPath.length === 0) {
      throw new MalformedIrError('Location query path must not be empty')
    }
    if (!Number.isInteger(visitCounter) || visitCounter < 1) {
      throw new MalformedIrError(`Location visit counter must be a positive integer, got ${visitCounter}`)
    }
    this.queryPath = Object.freeze([...queryPath])
  }

  /** Stable identity used for map lookups */
  get key(): string {
    const vertexKey = `${this.queryPath.join('__')}___${this.visitCounter}`
    return this.field === undefined ? vertexKey : `${vertexKey}.${this.field}`
  }

  navigateToField(field: string): Location {
    if (this.field !== undefined) {
      throw new MalformedIrError(`Already at a field, cannot navigate to field "${field}": ${this.key}`)
    }
    return new Location(this.queryPath, field, this.visitCounter)
  }

  navigateToSubpath(child: string): Location {
    if (this.field !== undefined) {
      throw new MalformedIrError(`Cannot navigate to subpath "${child}" from a field: ${this.key}`)
    }
    return new Location([...this.queryPath, child])
  }

  /**
   * The location minted when the traversal returns to this vertex after
   * completing a branch.
   */
  revisit(): Location {
    if (this.field !== undefined) {
      throw new MalformedIrError(`Cannot revisit a field location: ${this.key}`)
    }
    return new Location(this.queryPath, undefined, this.visitCounter + 1)
  }

  atVertex(): Location {
    return this.field === undefined ? this : new Location(this.queryPath, undefined, this.visitCounter)
  }

  equals(other: AnyLocation): boolean {
    return other.kind === this.kind && other.key === this.key
  }

  toString(): string {
    return `Location(${this.key})`
  }
}

/**
 * A vertex (or a property of a vertex) inside a `@fold` scope. Reads at such
 * a location produce a list of values rather than a single value.
 */
export class FoldScopeLocation {
  readonly kind = 'fold' as const
  readonly foldPath: readonly FoldPathStep[]

  constructor(
    readonly baseLocation: Location,
    foldPath: readonly FoldPathStep[],
    readonly field?: string,
  ) {
    if (baseLocation.field !== undefined) {
      throw new MalformedIrError(`Fold scope base location must be a vertex: ${baseLocation.key}`)
    }
    if (foldPath.length === 0) {
      throw new MalformedIrError(`Fold path must not be empty: ${baseLocation.key}`)
    }
    this.foldPath = Object.freeze(foldPath.map(([direction, edgeName]) => Object.freeze([direction, edgeName] as const)))
  }

  get key(): string {
    const path = this.foldPath.map(([direction, edgeName]) => `${direction}_${edgeName}`).join('__')
    const vertexKey = `${this.baseLocation.key}__fold__${path}`
    return this.field === undefined ? vertexKey : `${vertexKey}.${this.field}`
  }

  navigateToField(field: string): FoldScopeLocation {
    if (this.field !== undefined) {
      throw new MalformedIrError(`Already at a field, cannot navigate to field "${field}": ${this.key}`)
    }
    return new FoldScopeLocation(this.baseLocation, this.foldPath, field)
  }

  navigateToSubpath(direction: EdgeDirection, edgeName: string): FoldScopeLocation {
    if (this.field !== undefined) {
      throw new MalformedIrError(`Cannot navigate to subpath "${direction}_${edgeName}" from a field: ${this.key}`)
    }
    return new FoldScopeLocation(this.baseLocation, [...this.foldPath, [direction, edgeName]])
  }

  atVertex(): FoldScopeLocation {
    return this.field === undefined ? this : new FoldScopeLocation(this.baseLocation, this.foldPath)
  }

  /** Same fold path and field, anchored at a different base vertex */
  withBaseLocation(baseLocation: Location): FoldScopeLocation {
    return new FoldScopeLocation(baseLocation, this.foldPath, this.field)
  }

  equals(other: AnyLocation): boolean {
    return other.kind === this.kind && other.key === this.key
  }

  toString(): string {
    return `FoldScopeLocation(${this.key})`
  }
}

export type AnyLocation = Location | FoldScopeLocation

export function isFoldScopeLocation(location: AnyLocation): location is FoldScopeLocation {
  return location.kind === 'fold'
}
