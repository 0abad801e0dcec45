/**
 * IR Serialization Specification Tests
 */

import { describe, it, expect } from "vitest"
import {
  MalformedIrError,
  parseBlocks,
  parseMetadataTable,
  serializeBlocks,
  serializeMetadataTable,
  traverse,
} from "../../src"
import { createFoldBlocks, createNestedOptionalQuery, offspring } from "./fixtures/animal-queries"

describe("IR Serialization", () => {
  // ===========================================================================
  // BLOCKS
  // ===========================================================================

  describe("Blocks", () => {
    it("serializes locations as plain data", () => {
      expect(serializeBlocks([traverse("out", "Animal_ParentOf", true)])).toEqual([
        { type: "traverse", direction: "out", edgeName: "Animal_ParentOf", optional: true },
      ])
      expect(serializeBlocks(createFoldBlocks())[2]).toEqual({
        type: "fold",
        foldScopeLocation: {
          kind: "fold",
          baseLocation: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 },
          foldPath: [["in", "Animal_ParentOf"]],
        },
      })
    })

    it("decodes serialized blocks back into locations", () => {
      const { blocks } = createNestedOptionalQuery()
      const decoded = parseBlocks(JSON.parse(JSON.stringify(serializeBlocks(blocks))))

      const mark = decoded[1]

      expect(decoded).toEqual(blocks)
      expect(mark?.type === "markLocation" && mark.location.key).toBe("Animal___1")
    })

    it("decodes fold scope locations", () => {
      const decoded = parseBlocks(serializeBlocks(createFoldBlocks()))
      const fold = decoded[2]

      expect(fold?.type).toBe("fold")
      expect(fold?.type === "fold" && fold.foldScopeLocation.equals(offspring)).toBe(true)
    })

    it("reports every invalid field with its path", () => {
      const input = [
        { type: "queryRoot", startClass: [] },
        { type: "traverse", direction: "sideways", edgeName: "Animal_ParentOf", optional: true },
      ]

      expect(() => parseBlocks(input)).toThrow(MalformedIrError)
      expect(() => parseBlocks(input)).toThrow(/0\.startClass: .*1\.direction: /)
    })

    it("rejects a context field without a field", () => {
      const input = [
        {
          type: "filter",
          predicate: { type: "contextField", location: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 } },
        },
      ]

      expect(() => parseBlocks(input)).toThrow("contextField requires a location with a field, got Animal___1")
    })

    it("rejects unknown block types", () => {
      expect(() => parseBlocks([{ type: "teleport" }])).toThrow(MalformedIrError)
    })
  })

  // ===========================================================================
  // METADATA TABLE
  // ===========================================================================

  describe("Metadata table", () => {
    it("lists revisits separately from registered locations", () => {
      const { table } = createNestedOptionalQuery()
      const serialized = serializeMetadataTable(table)

      expect(serialized.locations.map((entry) => entry.info.type)).toEqual(["Animal", "Animal", "Species", "Location"])
      expect(serialized.revisits).toEqual([
        {
          origin: { kind: "vertex", queryPath: ["Animal", "out_Animal_ParentOf"], visitCounter: 1 },
          revisit: { kind: "vertex", queryPath: ["Animal", "out_Animal_ParentOf"], visitCounter: 2 },
        },
        {
          origin: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 },
          revisit: { kind: "vertex", queryPath: ["Animal"], visitCounter: 2 },
        },
      ])
    })

    it("rebuilds an equivalent table", () => {
      const { table, parentRevisit, animalRevisit } = createNestedOptionalQuery()
      const rebuilt = parseMetadataTable(JSON.parse(JSON.stringify(serializeMetadataTable(table))))

      expect(rebuilt.rootLocation.key).toBe("Animal___1")
      expect(rebuilt.getRevisitOrigin(parentRevisit).key).toBe("Animal__out_Animal_ParentOf___1")
      expect(rebuilt.getRevisitOrigin(animalRevisit).key).toBe("Animal___1")
      expect(rebuilt.getLocationInfo(parentRevisit).optionalScopesDepth).toBe(1)
      expect(rebuilt.getLocationInfo(parentRevisit).parentLocation?.key).toBe("Animal___1")
    })

    it("requires the root location to be registered first", () => {
      const input = {
        rootLocation: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 },
        locations: [
          {
            location: { kind: "vertex", queryPath: ["Species"], visitCounter: 1 },
            info: { type: "Species", optionalScopesDepth: 0 },
          },
        ],
      }

      expect(() => parseMetadataTable(input)).toThrow("The first registered location must be the root location Animal___1")
    })

    it("rejects a revisit that does not match its origin", () => {
      const input = {
        rootLocation: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 },
        locations: [
          {
            location: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 },
            info: { type: "Animal", optionalScopesDepth: 0 },
          },
        ],
        revisits: [
          {
            origin: { kind: "vertex", queryPath: ["Animal"], visitCounter: 1 },
            revisit: { kind: "vertex", queryPath: ["Animal"], visitCounter: 5 },
          },
        ],
      }

      expect(() => parseMetadataTable(input)).toThrow(MalformedIrError)
    })
  })
})
