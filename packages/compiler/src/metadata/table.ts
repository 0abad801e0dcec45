/**
 * Query Metadata Table
 *
 * Per-location facts computed by the front end: declared type, optional and
 * recursive scope nesting, fold membership, and where each revisit location
 * came from. Lowering passes only read from it.
 */

import { z } from 'zod'
import { MalformedIrError } from '../errors'
import { FoldScopeLocation, Location } from '../ir/location'
import type { AnyLocation } from '../ir/location'

// =============================================================================
// LOCATION INFO
// =============================================================================

export const locationInfoSchema = z.object({
  /** Declared type of the vertex at this location */
  type: z.string().min(1),
  /** Type the vertex had before a type coercion narrowed it */
  coercedFromType: z.string().min(1).optional(),
  parentLocation: z.union([z.instanceof(Location), z.instanceof(FoldScopeLocation)]).optional(),
  /** Number of enclosing `@optional` scopes */
  optionalScopesDepth: z.number().int().nonnegative(),
  /** Number of enclosing `@recurse` scopes */
  recursiveScopesDepth: z.number().int().nonnegative().default(0),
  isWithinFold: z.boolean().default(false),
})

export type LocationInfoInput = z.input<typeof locationInfoSchema>
export type LocationInfo = Readonly<z.output<typeof locationInfoSchema>>

function parseLocationInfo(location: AnyLocation, info: LocationInfoInput): LocationInfo {
  const result = locationInfoSchema.safeParse(info)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new MalformedIrError(`Invalid location info for ${location.key}: ${issues.join('; ')}`)
  }
  return Object.freeze(result.data)
}

// =============================================================================
// TABLE
// =============================================================================

interface LocationEntry {
  location: AnyLocation
  info: LocationInfo
}

export class QueryMetadataTable {
  private readonly entries = new Map<string, LocationEntry>()
  /** Revisit location key -> the location it was minted from */
  private readonly revisitOrigins = new Map<string, Location>()

  constructor(
    readonly rootLocation: Location,
    rootInfo: LocationInfoInput,
  ) {
    this.registerLocation(rootLocation, rootInfo)
  }

  registerLocation(location: AnyLocation, info: LocationInfoInput): void {
    if (location.field !== undefined) {
      throw new MalformedIrError(`Only vertex locations can be registered, got ${location.key}`)
    }
    if (this.entries.has(location.key)) {
      throw new MalformedIrError(`Location registered twice: ${location.key}`)
    }
    this.entries.set(location.key, { location, info: parseLocationInfo(location, info) })
  }

  /**
   * Mint and register the location for returning to `location` after a
   * branch. The new location shares the info of the location it revisits.
   */
  revisitLocation(location: Location): Location {
    const info = this.getLocationInfo(location)
    const revisited = location.revisit()
    this.registerLocation(revisited, info)
    this.revisitOrigins.set(revisited.key, location)
    return revisited
  }

  getLocationInfo(location: AnyLocation): LocationInfo {
    const entry = this.entries.get(location.atVertex().key)
    if (!entry) {
      throw new MalformedIrError(`Location not found in the query metadata table: ${location.key}`)
    }
    return entry.info
  }

  hasLocation(location: AnyLocation): boolean {
    return this.entries.has(location.atVertex().key)
  }

  /**
   * The location a revisit was originally minted from, following chains of
   * revisits. Returns `location` itself when it is not a revisit.
   */
  getRevisitOrigin(location: Location): Location {
    let current = location.atVertex()
    let origin = this.revisitOrigins.get(current.key)
    while (origin) {
      current = origin
      origin = this.revisitOrigins.get(current.key)
    }
    return current
  }

  /**
   * All registered locations, in registration order.
   */
  *registeredLocations(): IterableIterator<[AnyLocation, LocationInfo]> {
    for (const { location, info } of this.entries.values()) {
      yield [location, info]
    }
  }

  /**
   * Revisit locations paired with their direct origin, in registration order.
   */
  *revisits(): IterableIterator<[Location, Location]> {
    for (const [key, origin] of this.revisitOrigins) {
      const entry = this.entries.get(key)
      if (entry && entry.location.kind === 'vertex') {
        yield [entry.location, origin]
      }
    }
  }
}
