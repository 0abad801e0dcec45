/**
 * IR Serialization
 *
 * JSON form of blocks, expressions and locations, for IR produced by a front
 * end running out of process. Input is validated with Zod before any location
 * or block is constructed.
 */

import { z } from 'zod'
import { MalformedIrError } from '../errors'
import type { Block } from './blocks'
import type { BinaryOperator, Expression, LiteralValue } from './expressions'
import { FoldScopeLocation, Location } from './location'
import type { AnyLocation, EdgeDirection } from './location'

// =============================================================================
// SERIALIZED SHAPES
// =============================================================================

export interface SerializedVertexLocation {
  kind: 'vertex'
  queryPath: string[]
  field?: string
  visitCounter: number
}

export interface SerializedFoldScopeLocation {
  kind: 'fold'
  baseLocation: SerializedVertexLocation
  foldPath: Array<[EdgeDirection, string]>
  field?: string
}

export type SerializedLocation = SerializedVertexLocation | SerializedFoldScopeLocation

export type SerializedExpression =
  | { type: 'literal'; value: LiteralValue }
  | { type: 'variable'; name: string; inferredType: string }
  | { type: 'localField'; fieldName: string; fieldType?: string }
  | { type: 'contextField'; location: SerializedVertexLocation; fieldType?: string }
  | { type: 'foldedContextField'; location: SerializedFoldScopeLocation; fieldType?: string }
  | { type: 'outputContextField'; location: SerializedVertexLocation; fieldType?: string }
  | { type: 'contextFieldExistence'; location: SerializedVertexLocation }
  | { type: 'unaryTransformation'; operator: 'size'; inner: SerializedExpression }
  | { type: 'binaryComposition'; operator: BinaryOperator; left: SerializedExpression; right: SerializedExpression }
  | {
      type: 'ternaryConditional'
      predicate: SerializedExpression
      ifTrue: SerializedExpression
      ifFalse: SerializedExpression
    }

// =============================================================================
// SCHEMAS
// =============================================================================

const edgeDirectionSchema = z.enum(['in', 'out'])

export const vertexLocationSchema = z.object({
  kind: z.literal('vertex'),
  queryPath: z.array(z.string().min(1)).min(1),
  field: z.string().min(1).optional(),
  visitCounter: z.number().int().positive(),
})

export const foldScopeLocationSchema = z.object({
  kind: z.literal('fold'),
  baseLocation: vertexLocationSchema,
  foldPath: z.array(z.tuple([edgeDirectionSchema, z.string().min(1)])).min(1),
  field: z.string().min(1).optional(),
})

export const locationSchema = z.discriminatedUnion('kind', [vertexLocationSchema, foldScopeLocationSchema])

const literalValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.union([z.string(), z.number(), z.boolean()])),
])

const binaryOperatorSchema = z.enum([
  '=',
  '!=',
  '>',
  '>=',
  '<',
  '<=',
  'contains',
  'not_contains',
  'intersects',
  'has_substring',
  'starts_with',
  'ends_with',
  'LIKE',
  '&&',
  '||',
])

export const expressionSchema: z.ZodType<SerializedExpression> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('literal'), value: literalValueSchema }),
    z.object({ type: z.literal('variable'), name: z.string().min(1), inferredType: z.string().min(1) }),
    z.object({ type: z.literal('localField'), fieldName: z.string().min(1), fieldType: z.string().optional() }),
    z.object({ type: z.literal('contextField'), location: vertexLocationSchema, fieldType: z.string().optional() }),
    z.object({
      type: z.literal('foldedContextField'),
      location: foldScopeLocationSchema,
      fieldType: z.string().optional(),
    }),
    z.object({
      type: z.literal('outputContextField'),
      location: vertexLocationSchema,
      fieldType: z.string().optional(),
    }),
    z.object({ type: z.literal('contextFieldExistence'), location: vertexLocationSchema }),
    z.object({ type: z.literal('unaryTransformation'), operator: z.literal('size'), inner: expressionSchema }),
    z.object({
      type: z.literal('binaryComposition'),
      operator: binaryOperatorSchema,
      left: expressionSchema,
      right: expressionSchema,
    }),
    z.object({
      type: z.literal('ternaryConditional'),
      predicate: expressionSchema,
      ifTrue: expressionSchema,
      ifFalse: expressionSchema,
    }),
  ]),
)

export const blockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('queryRoot'), startClass: z.array(z.string().min(1)).min(1) }),
  z.object({
    type: z.literal('traverse'),
    direction: edgeDirectionSchema,
    edgeName: z.string().min(1),
    optional: z.boolean(),
  }),
  z.object({
    type: z.literal('recurse'),
    direction: edgeDirectionSchema,
    edgeName: z.string().min(1),
    depth: z.number().int().positive(),
  }),
  z.object({ type: z.literal('fold'), foldScopeLocation: foldScopeLocationSchema }),
  z.object({ type: z.literal('unfold') }),
  z.object({ type: z.literal('backtrack'), location: vertexLocationSchema, optional: z.boolean() }),
  z.object({ type: z.literal('markLocation'), location: locationSchema }),
  z.object({ type: z.literal('coerceType'), targetClass: z.array(z.string().min(1)).min(1) }),
  z.object({ type: z.literal('filter'), predicate: expressionSchema }),
  z.object({ type: z.literal('endOptional') }),
  z.object({ type: z.literal('outputSource') }),
  z.object({ type: z.literal('globalOperationsStart') }),
  z.object({ type: z.literal('constructResult'), fields: z.record(expressionSchema) }),
])

export type SerializedBlock = z.infer<typeof blockSchema>

// =============================================================================
// DESERIALIZATION
// =============================================================================

export function toVertexLocation(serialized: SerializedVertexLocation): Location {
  return new Location(serialized.queryPath, serialized.field, serialized.visitCounter)
}

export function toFoldScopeLocation(serialized: SerializedFoldScopeLocation): FoldScopeLocation {
  return new FoldScopeLocation(toVertexLocation(serialized.baseLocation), serialized.foldPath, serialized.field)
}

export function toLocation(serialized: SerializedLocation): AnyLocation {
  return serialized.kind === 'vertex' ? toVertexLocation(serialized) : toFoldScopeLocation(serialized)
}

function toExpression(serialized: SerializedExpression): Expression {
  switch (serialized.type) {
    case 'literal':
    case 'variable':
    case 'localField':
      return { ...serialized }
    case 'contextField':
    case 'outputContextField':
      return { ...serialized, location: requireFieldLocation(toVertexLocation(serialized.location), serialized.type) }
    case 'foldedContextField':
      return {
        ...serialized,
        location: requireFieldLocation(toFoldScopeLocation(serialized.location), serialized.type),
      }
    case 'contextFieldExistence':
      return { type: 'contextFieldExistence', location: toVertexLocation(serialized.location).atVertex() }
    case 'unaryTransformation':
      return { ...serialized, inner: toExpression(serialized.inner) }
    case 'binaryComposition':
      return { ...serialized, left: toExpression(serialized.left), right: toExpression(serialized.right) }
    case 'ternaryConditional':
      return {
        type: 'ternaryConditional',
        predicate: toExpression(serialized.predicate),
        ifTrue: toExpression(serialized.ifTrue),
        ifFalse: toExpression(serialized.ifFalse),
      }
  }
}

function requireFieldLocation<L extends AnyLocation>(location: L, variant: string): L {
  if (location.field === undefined) {
    throw new MalformedIrError(`${variant} requires a location with a field, got ${location.key}`)
  }
  return location
}

function toBlock(serialized: SerializedBlock): Block {
  switch (serialized.type) {
    case 'fold':
      return { type: 'fold', foldScopeLocation: toFoldScopeLocation(serialized.foldScopeLocation) }
    case 'backtrack':
      return { ...serialized, location: toVertexLocation(serialized.location) }
    case 'markLocation':
      return { type: 'markLocation', location: toLocation(serialized.location) }
    case 'filter':
      return { type: 'filter', predicate: toExpression(serialized.predicate) }
    case 'constructResult': {
      const fields: Record<string, Expression> = {}
      for (const [name, expression] of Object.entries(serialized.fields)) {
        fields[name] = toExpression(expression)
      }
      return { type: 'constructResult', fields }
    }
    case 'queryRoot':
    case 'traverse':
    case 'recurse':
    case 'unfold':
    case 'coerceType':
    case 'endOptional':
    case 'outputSource':
    case 'globalOperationsStart':
      return { ...serialized }
  }
}

/**
 * Format Zod issues as `path: message` pairs.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * Validate and decode a serialized block sequence.
 * @throws MalformedIrError if the input is not a valid block sequence
 */
export function parseBlocks(input: unknown): Block[] {
  const result = z.array(blockSchema).safeParse(input)
  if (!result.success) {
    throw new MalformedIrError(`Invalid serialized IR: ${describeIssues(result.error)}`, 'parse')
  }
  return result.data.map(toBlock)
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export function serializeVertexLocation(location: Location): SerializedVertexLocation {
  const serialized: SerializedVertexLocation = {
    kind: 'vertex',
    queryPath: [...location.queryPath],
    visitCounter: location.visitCounter,
  }
  if (location.field !== undefined) serialized.field = location.field
  return serialized
}

export function serializeFoldScopeLocation(location: FoldScopeLocation): SerializedFoldScopeLocation {
  const serialized: SerializedFoldScopeLocation = {
    kind: 'fold',
    baseLocation: serializeVertexLocation(location.baseLocation),
    foldPath: location.foldPath.map(([direction, edgeName]): [EdgeDirection, string] => [direction, edgeName]),
  }
  if (location.field !== undefined) serialized.field = location.field
  return serialized
}

export function serializeLocation(location: AnyLocation): SerializedLocation {
  return location.kind === 'vertex' ? serializeVertexLocation(location) : serializeFoldScopeLocation(location)
}

export function serializeExpression(expression: Expression): SerializedExpression {
  switch (expression.type) {
    case 'literal':
    case 'variable':
    case 'localField':
      return { ...expression }
    case 'contextField':
    case 'outputContextField':
      return { ...expression, location: serializeVertexLocation(expression.location) }
    case 'foldedContextField':
      return { ...expression, location: serializeFoldScopeLocation(expression.location) }
    case 'contextFieldExistence':
      return { type: 'contextFieldExistence', location: serializeVertexLocation(expression.location) }
    case 'unaryTransformation':
      return { ...expression, inner: serializeExpression(expression.inner) }
    case 'binaryComposition':
      return { ...expression, left: serializeExpression(expression.left), right: serializeExpression(expression.right) }
    case 'ternaryConditional':
      return {
        type: 'ternaryConditional',
        predicate: serializeExpression(expression.predicate),
        ifTrue: serializeExpression(expression.ifTrue),
        ifFalse: serializeExpression(expression.ifFalse),
      }
  }
}

export function serializeBlock(block: Block): SerializedBlock {
  switch (block.type) {
    case 'queryRoot':
      return { type: 'queryRoot', startClass: [...block.startClass] }
    case 'coerceType':
      return { type: 'coerceType', targetClass: [...block.targetClass] }
    case 'fold':
      return { type: 'fold', foldScopeLocation: serializeFoldScopeLocation(block.foldScopeLocation) }
    case 'backtrack':
      return { ...block, location: serializeVertexLocation(block.location) }
    case 'markLocation':
      return { type: 'markLocation', location: serializeLocation(block.location) }
    case 'filter':
      return { type: 'filter', predicate: serializeExpression(block.predicate) }
    case 'constructResult': {
      const fields: Record<string, SerializedExpression> = {}
      for (const [name, expression] of Object.entries(block.fields)) {
        fields[name] = serializeExpression(expression)
      }
      return { type: 'constructResult', fields }
    }
    case 'traverse':
    case 'recurse':
    case 'unfold':
    case 'endOptional':
    case 'outputSource':
    case 'globalOperationsStart':
      return { ...block }
  }
}

export function serializeBlocks(blocks: readonly Block[]): SerializedBlock[] {
  return blocks.map(serializeBlock)
}
