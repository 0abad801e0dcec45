/**
 * Metadata Table Serialization
 *
 * Revisit locations are not listed as plain locations: they are re-minted
 * from their origin, in order, when the table is rebuilt.
 */

import { z } from 'zod'
import { MalformedIrError } from '../errors'
import {
  describeIssues,
  locationSchema,
  serializeLocation,
  serializeVertexLocation,
  toLocation,
  toVertexLocation,
  vertexLocationSchema,
} from '../ir/serialization'
import type { SerializedLocation, SerializedVertexLocation } from '../ir/serialization'
import { QueryMetadataTable } from './table'
import type { LocationInfo, LocationInfoInput } from './table'

const serializedLocationInfoSchema = z.object({
  type: z.string().min(1),
  coercedFromType: z.string().min(1).optional(),
  parentLocation: locationSchema.optional(),
  optionalScopesDepth: z.number().int().nonnegative(),
  recursiveScopesDepth: z.number().int().nonnegative().default(0),
  isWithinFold: z.boolean().default(false),
})

export const metadataTableSchema = z.object({
  rootLocation: vertexLocationSchema,
  /** Every registered location except revisits; the root comes first */
  locations: z
    .array(z.object({ location: locationSchema, info: serializedLocationInfoSchema }))
    .min(1),
  revisits: z.array(z.object({ origin: vertexLocationSchema, revisit: vertexLocationSchema })).default([]),
})

export type SerializedMetadataTable = z.input<typeof metadataTableSchema>

function toLocationInfo(info: z.output<typeof serializedLocationInfoSchema>): LocationInfoInput {
  const { parentLocation, ...rest } = info
  return parentLocation === undefined ? rest : { ...rest, parentLocation: toLocation(parentLocation) }
}

/**
 * Validate and rebuild a metadata table.
 * @throws MalformedIrError if the input is not a valid table
 */
export function parseMetadataTable(input: unknown): QueryMetadataTable {
  const result = metadataTableSchema.safeParse(input)
  if (!result.success) {
    throw new MalformedIrError(`Invalid serialized metadata table: ${describeIssues(result.error)}`, 'parse')
  }

  const { rootLocation, locations, revisits } = result.data
  const root = toVertexLocation(rootLocation)
  const [first, ...rest] = locations
  if (!first || !toLocation(first.location).equals(root)) {
    throw new MalformedIrError(`The first registered location must be the root location ${root.key}`, 'parse')
  }

  const table = new QueryMetadataTable(root, toLocationInfo(first.info))
  for (const entry of rest) {
    table.registerLocation(toLocation(entry.location), toLocationInfo(entry.info))
  }
  for (const { origin, revisit } of revisits) {
    const minted = table.revisitLocation(toVertexLocation(origin))
    const expected = toVertexLocation(revisit)
    if (!minted.equals(expected)) {
      throw new MalformedIrError(
        `Revisit of ${minted.key} does not match the recorded revisit location ${expected.key}`,
        'parse',
      )
    }
  }
  return table
}

function serializeLocationInfo(info: LocationInfo): z.input<typeof serializedLocationInfoSchema> {
  const { parentLocation, ...rest } = info
  return parentLocation === undefined ? { ...rest } : { ...rest, parentLocation: serializeLocation(parentLocation) }
}

export function serializeMetadataTable(table: QueryMetadataTable): SerializedMetadataTable {
  const revisits: Array<{ origin: SerializedVertexLocation; revisit: SerializedVertexLocation }> = []
  const revisitKeys = new Set<string>()
  for (const [revisit, origin] of table.revisits()) {
    revisitKeys.add(revisit.key)
    revisits.push({ origin: serializeVertexLocation(origin), revisit: serializeVertexLocation(revisit) })
  }

  const locations: Array<{ location: SerializedLocation; info: z.input<typeof serializedLocationInfoSchema> }> = []
  for (const [location, info] of table.registeredLocations()) {
    if (revisitKeys.has(location.key)) continue
    locations.push({ location: serializeLocation(location), info: serializeLocationInfo(info) })
  }

  return {
    rootLocation: serializeVertexLocation(table.rootLocation),
    locations,
    revisits,
  }
}
