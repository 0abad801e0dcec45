/**
 * Optional Filter Hoisting Specification Tests
 */

import { describe, it, expect } from "vitest"
import {
  MalformedIrError,
  MoveFiltersInOptionalLocationsToGlobalOperationsPass,
  OptionalFilterHoister,
  QueryMetadataTable,
  backtrack,
  filter,
  globalOperationsStart,
  markLocation,
  moveFiltersInOptionalLocationsToGlobalOperations,
  queryRoot,
  removeMarkLocationAfterOptionalBacktrack,
  replaceLocalFieldsWithContextFields,
  traverse,
} from "../../src"
import type { Block } from "../../src"
import {
  animal,
  createNestedOptionalQuery,
  createSingleOptionalBlocks,
  createSingleOptionalTable,
  habitat,
  nameAtEquals,
  parent,
  species,
} from "./fixtures/animal-queries"

describe("Optional Filter Hoisting", () => {
  // ===========================================================================
  // PASS
  // ===========================================================================

  describe("moveFiltersInOptionalLocationsToGlobalOperations", () => {
    it("moves a filter inside an optional scope after GlobalOperationsStart", () => {
      const blocks = replaceLocalFieldsWithContextFields(createSingleOptionalBlocks())

      expect(moveFiltersInOptionalLocationsToGlobalOperations(blocks, createSingleOptionalTable())).toEqual([
        queryRoot(["Animal"]),
        markLocation(animal),
        traverse("out", "Animal_ParentOf", true),
        markLocation(parent),
        backtrack(animal, true),
        globalOperationsStart(),
        filter(nameAtEquals(parent, "wanted")),
      ])
    })

    it("stays within the outer optional scope after leaving a nested one", () => {
      const { table, blocks } = createNestedOptionalQuery()
      const resolved = replaceLocalFieldsWithContextFields(removeMarkLocationAfterOptionalBacktrack(blocks, table))
      const output = moveFiltersInOptionalLocationsToGlobalOperations(resolved, table)

      expect(output).toHaveLength(resolved.length)
      expect(output.slice(11, 15)).toEqual([
        globalOperationsStart(),
        filter(nameAtEquals(parent, "parent_name")),
        filter(nameAtEquals(species, "species_name")),
        filter(nameAtEquals(habitat, "habitat_name")),
      ])
    })

    it("leaves filters outside optional scopes in place", () => {
      const table = createSingleOptionalTable()
      const blocks: Block[] = [
        queryRoot(["Animal"]),
        filter(nameAtEquals(animal, "animal_name")),
        markLocation(animal),
        traverse("out", "Animal_ParentOf", true),
        markLocation(parent),
        backtrack(animal, true),
        filter(nameAtEquals(animal, "again")),
        globalOperationsStart(),
      ]

      expect(moveFiltersInOptionalLocationsToGlobalOperations(blocks, table)).toEqual(blocks)
    })

    it("leaves filters that already follow GlobalOperationsStart in place", () => {
      const blocks: Block[] = [
        queryRoot(["Animal"]),
        markLocation(animal),
        traverse("out", "Animal_ParentOf", true),
        markLocation(parent),
        globalOperationsStart(),
        filter(nameAtEquals(parent, "wanted")),
      ]

      expect(moveFiltersInOptionalLocationsToGlobalOperations(blocks, createSingleOptionalTable())).toEqual(blocks)
    })

    it("refuses to move a filter that still holds a LocalField", () => {
      const run = () =>
        moveFiltersInOptionalLocationsToGlobalOperations(createSingleOptionalBlocks(), createSingleOptionalTable())

      expect(run).toThrow(MalformedIrError)
      expect(run).toThrow("Cannot move Filter((LocalField(name) = $wanted)) out of its optional scope")
    })

    it("faults when hoisted filters are never released", () => {
      const blocks: Block[] = [
        queryRoot(["Animal"]),
        markLocation(animal),
        traverse("out", "Animal_ParentOf", true),
        filter(nameAtEquals(parent, "wanted")),
        markLocation(parent),
      ]

      expect(() => moveFiltersInOptionalLocationsToGlobalOperations(blocks, createSingleOptionalTable())).toThrow(
        "1 filter(s) from optional scopes were not followed by GlobalOperationsStart.",
      )
    })

    it("faults on a backtrack to an unknown location", () => {
      const table = new QueryMetadataTable(animal, { type: "Animal", optionalScopesDepth: 0 })
      const blocks: Block[] = [queryRoot(["Animal"]), backtrack(parent), globalOperationsStart()]

      expect(() => moveFiltersInOptionalLocationsToGlobalOperations(blocks, table)).toThrow(
        "Location not found in the query metadata table: Animal__out_Animal_ParentOf___1",
      )
    })

    it("exposes itself as a named pass", () => {
      expect(new MoveFiltersInOptionalLocationsToGlobalOperationsPass().name).toBe(
        "moveFiltersInOptionalLocationsToGlobalOperations",
      )
    })
  })

  // ===========================================================================
  // STATE MACHINE
  // ===========================================================================

  describe("OptionalFilterHoister", () => {
    it("enters a scope on an optional traversal only", () => {
      const hoister = new OptionalFilterHoister(createSingleOptionalTable())

      hoister.step(traverse("out", "Animal_ParentOf"))
      expect(hoister.inOptionalScope).toBe(false)

      hoister.step(traverse("out", "Animal_ParentOf", true))
      expect(hoister.inOptionalScope).toBe(true)
    })

    it("recomputes the scope from the backtrack destination", () => {
      const { table } = createNestedOptionalQuery()
      const hoister = new OptionalFilterHoister(table)
      hoister.step(traverse("out", "Animal_ParentOf", true))

      hoister.step(backtrack(parent, true))
      expect(hoister.inOptionalScope).toBe(true)

      hoister.step(backtrack(animal, true))
      expect(hoister.inOptionalScope).toBe(false)
    })

    it("buffers filters and releases them after GlobalOperationsStart", () => {
      const hoister = new OptionalFilterHoister(createSingleOptionalTable())
      const hoisted = filter(nameAtEquals(parent, "wanted"))
      hoister.step(traverse("out", "Animal_ParentOf", true))

      expect(hoister.step(hoisted)).toEqual([])
      expect(hoister.pendingFilters).toEqual([hoisted])
      expect(hoister.step(globalOperationsStart())).toEqual([globalOperationsStart(), hoisted])
      expect(hoister.pendingFilters).toEqual([])
      expect(() => hoister.finish([])).not.toThrow()
    })
  })
})
