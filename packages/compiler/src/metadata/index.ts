/**
 * Metadata Module
 *
 * Read-only per-location facts consulted by the lowering passes.
 */

export { QueryMetadataTable, locationInfoSchema } from './table'
export type { LocationInfo, LocationInfoInput } from './table'
export { parseMetadataTable, serializeMetadataTable, metadataTableSchema } from './serialization'
export type { SerializedMetadataTable } from './serialization'
