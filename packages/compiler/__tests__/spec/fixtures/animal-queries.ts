/**
 * Animal Query Fixtures
 *
 * Hand-built IR and metadata tables shared across the test suites.
 * Block sequences follow the front end's emission order: property filters
 * sit between a traversal and the MarkLocation of its destination.
 */

import {
  Location,
  FoldScopeLocation,
  QueryMetadataTable,
  backtrack,
  binaryComposition,
  coerceType,
  constructResult,
  contextField,
  filter,
  fold,
  globalOperationsStart,
  localField,
  markLocation,
  outputContextField,
  queryRoot,
  traverse,
  unfold,
  variable,
} from "../../../src"
import type { Block, Expression, Filter } from "../../../src"

// =============================================================================
// LOCATIONS
// =============================================================================

export const animal = new Location(["Animal"])
export const parent = animal.navigateToSubpath("out_Animal_ParentOf")
export const species = parent.navigateToSubpath("out_Animal_OfSpecies")
export const habitat = parent.navigateToSubpath("out_Animal_LivesIn")
export const offspring = new FoldScopeLocation(animal, [["in", "Animal_ParentOf"]])

// =============================================================================
// EXPRESSIONS
// =============================================================================

/** `name = $param`, reading the name of the currently open vertex */
export function localNameEquals(param: string): Expression {
  return binaryComposition("=", localField("name", "String"), variable(param, "String"))
}

/** `name = $param`, reading the name at an explicit location */
export function nameAtEquals(location: Location, param: string): Expression {
  return binaryComposition("=", contextField(location.navigateToField("name"), "String"), variable(param, "String"))
}

export function localNameFilter(param: string): Filter {
  return filter(localNameEquals(param))
}

// =============================================================================
// SINGLE OPTIONAL SCOPE
// =============================================================================

export function createSingleOptionalTable(): QueryMetadataTable {
  const table = new QueryMetadataTable(animal, { type: "Animal", optionalScopesDepth: 0 })
  table.registerLocation(parent, { type: "Animal", optionalScopesDepth: 1, parentLocation: animal })
  return table
}

/**
 * { Animal { out_Animal_ParentOf @optional { name @filter(op_name: "=", value: ["$wanted"]) } } }
 */
export function createSingleOptionalBlocks(): Block[] {
  return [
    queryRoot(["Animal"]),
    markLocation(animal),
    traverse("out", "Animal_ParentOf", true),
    localNameFilter("wanted"),
    markLocation(parent),
    backtrack(animal, true),
    globalOperationsStart(),
  ]
}

// =============================================================================
// NESTED OPTIONAL SCOPES
// =============================================================================

export interface NestedOptionalQuery {
  table: QueryMetadataTable
  blocks: Block[]
  parentRevisit: Location
  animalRevisit: Location
}

/**
 * Optional parent, optional species under the parent, and a mandatory
 * habitat under the parent reached after returning from the species branch.
 */
export function createNestedOptionalQuery(): NestedOptionalQuery {
  const table = new QueryMetadataTable(animal, { type: "Animal", optionalScopesDepth: 0 })
  table.registerLocation(parent, { type: "Animal", optionalScopesDepth: 1, parentLocation: animal })
  table.registerLocation(species, { type: "Species", optionalScopesDepth: 2, parentLocation: parent })
  const parentRevisit = table.revisitLocation(parent)
  table.registerLocation(habitat, { type: "Location", optionalScopesDepth: 1, parentLocation: parentRevisit })
  const animalRevisit = table.revisitLocation(animal)

  const blocks: Block[] = [
    queryRoot(["Animal"]),
    markLocation(animal),
    traverse("out", "Animal_ParentOf", true),
    localNameFilter("parent_name"),
    markLocation(parent),
    traverse("out", "Animal_OfSpecies", true),
    localNameFilter("species_name"),
    markLocation(species),
    backtrack(parent, true),
    markLocation(parentRevisit),
    traverse("out", "Animal_LivesIn"),
    localNameFilter("habitat_name"),
    markLocation(habitat),
    backtrack(parentRevisit),
    backtrack(animal, true),
    markLocation(animalRevisit),
    globalOperationsStart(),
    constructResult({
      animal_name: outputContextField(animalRevisit.navigateToField("name"), "String"),
      species_name: outputContextField(species.navigateToField("name"), "String"),
    }),
  ]

  return { table, blocks, parentRevisit, animalRevisit }
}

// =============================================================================
// FOLD SCOPE
// =============================================================================

export function createFoldTable(): QueryMetadataTable {
  const table = new QueryMetadataTable(animal, { type: "Animal", optionalScopesDepth: 0 })
  table.registerLocation(offspring, {
    type: "Animal",
    optionalScopesDepth: 0,
    parentLocation: animal,
    isWithinFold: true,
  })
  return table
}

/**
 * { Animal { in_Animal_ParentOf @fold { name @filter(...) @output(out_name: "child_names") } } }
 */
export function createFoldBlocks(): Block[] {
  return [
    queryRoot(["Animal"]),
    markLocation(animal),
    fold(offspring),
    coerceType(["Animal"]),
    localNameFilter("child_name"),
    markLocation(offspring),
    unfold(),
    globalOperationsStart(),
  ]
}
