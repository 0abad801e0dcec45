/**
 * Location Renaming
 *
 * Rewrites references to revisit locations so that they point at the
 * location the revisit was minted from.
 */

import type { Block, ExpressionRewriteFn, FoldScopeLocation, Location } from '../../ir'
import type { QueryMetadataTable } from '../../metadata'

/**
 * Vertex location key -> location to use instead.
 */
export type LocationTranslations = ReadonlyMap<string, Location>

/**
 * Map every registered revisit location to its origin.
 */
export function makeRevisitLocationTranslations(table: QueryMetadataTable): Map<string, Location> {
  const translations = new Map<string, Location>()
  for (const [location] of table.registeredLocations()) {
    if (location.kind !== 'vertex') continue
    const origin = table.getRevisitOrigin(location)
    if (!origin.equals(location)) {
      translations.set(location.key, origin)
    }
  }
  return translations
}

/**
 * Translate a vertex location, keeping its field. Returns the input itself
 * when no translation applies.
 */
export function translateLocation(location: Location, translations: LocationTranslations): Location {
  const target = translations.get(location.atVertex().key)
  if (!target) return location
  return location.field === undefined ? target : target.navigateToField(location.field)
}

export function translateFoldScopeLocation(
  location: FoldScopeLocation,
  translations: LocationTranslations,
): FoldScopeLocation {
  const baseLocation = translateLocation(location.baseLocation, translations)
  return baseLocation === location.baseLocation ? location : location.withBaseLocation(baseLocation)
}

/**
 * Expression rewriter that applies the translations to every location
 * reference.
 */
export function makeLocationRewriterFn(translations: LocationTranslations): ExpressionRewriteFn {
  return (expression) => {
    switch (expression.type) {
      case 'contextField':
      case 'outputContextField':
      case 'contextFieldExistence': {
        const location = translateLocation(expression.location, translations)
        return location === expression.location ? expression : { ...expression, location }
      }
      case 'foldedContextField': {
        const location = translateFoldScopeLocation(expression.location, translations)
        return location === expression.location ? expression : { ...expression, location }
      }
      case 'literal':
      case 'variable':
      case 'localField':
      case 'unaryTransformation':
      case 'binaryComposition':
      case 'ternaryConditional':
        return expression
    }
  }
}

/**
 * Apply the translations to the locations a block itself carries.
 */
export function translateBlockLocations<B extends Block>(block: B, translations: LocationTranslations): B
export function translateBlockLocations(block: Block, translations: LocationTranslations): Block {
  switch (block.type) {
    case 'backtrack': {
      const location = translateLocation(block.location, translations)
      return location === block.location ? block : { ...block, location }
    }
    case 'fold': {
      const foldScopeLocation = translateFoldScopeLocation(block.foldScopeLocation, translations)
      return foldScopeLocation === block.foldScopeLocation ? block : { ...block, foldScopeLocation }
    }
    case 'markLocation': {
      if (block.location.kind !== 'fold') return block
      const location = translateFoldScopeLocation(block.location, translations)
      return location === block.location ? block : { ...block, location }
    }
    default:
      return block
  }
}
