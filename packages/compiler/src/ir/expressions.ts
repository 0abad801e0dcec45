/**
 * IR Expression Definitions
 *
 * Expressions compute the values used by Filter and ConstructResult blocks.
 * The set of variants is closed: every switch over `type` is exhaustive.
 */

import { MalformedIrError } from '../errors'
import type { FoldScopeLocation, Location } from './location'

// =============================================================================
// OPERATORS
// =============================================================================

export type BinaryOperator =
  | '='
  | '!='
  | '>'
  | '>='
  | '<'
  | '<='
  | 'contains'
  | 'not_contains'
  | 'intersects'
  | 'has_substring'
  | 'starts_with'
  | 'ends_with'
  | 'LIKE'
  | '&&'
  | '||'

export type UnaryOperator = 'size'

export type LiteralValue = string | number | boolean | null | ReadonlyArray<string | number | boolean>

// =============================================================================
// EXPRESSIONS
// =============================================================================

/**
 * A constant value.
 */
export interface Literal {
  type: 'literal'
  value: LiteralValue
}

/**
 * A runtime parameter, e.g. `$min_age`.
 */
export interface Variable {
  type: 'variable'
  name: string
  /** Declared type of the parameter */
  inferredType: string
}

/**
 * A property of whichever location is currently open. Only meaningful until
 * the block is bound to a location by local-field resolution.
 */
export interface LocalField {
  type: 'localField'
  fieldName: string
  fieldType?: string
}

/**
 * A property read at an explicit location.
 */
export interface ContextField {
  type: 'contextField'
  /** Location including the field */
  location: Location
  fieldType?: string
}

/**
 * A property read inside a fold scope; yields a list of values.
 */
export interface FoldedContextField {
  type: 'foldedContextField'
  /** Fold scope location including the field */
  location: FoldScopeLocation
  fieldType?: string
}

/**
 * A property read for output in the final result.
 */
export interface OutputContextField {
  type: 'outputContextField'
  location: Location
  fieldType?: string
}

/**
 * Whether the vertex at an optional location exists.
 */
export interface ContextFieldExistence {
  type: 'contextFieldExistence'
  location: Location
}

export interface UnaryTransformation {
  type: 'unaryTransformation'
  operator: UnaryOperator
  inner: Expression
}

export interface BinaryComposition {
  type: 'binaryComposition'
  operator: BinaryOperator
  left: Expression
  right: Expression
}

export interface TernaryConditional {
  type: 'ternaryConditional'
  predicate: Expression
  ifTrue: Expression
  ifFalse: Expression
}

export type Expression =
  | Literal
  | Variable
  | LocalField
  | ContextField
  | FoldedContextField
  | OutputContextField
  | ContextFieldExistence
  | UnaryTransformation
  | BinaryComposition
  | TernaryConditional

export type ExpressionType = Expression['type']

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function literal(value: LiteralValue): Literal {
  return { type: 'literal', value }
}

export function variable(name: string, inferredType: string): Variable {
  return { type: 'variable', name, inferredType }
}

export function localField(fieldName: string, fieldType?: string): LocalField {
  return fieldType === undefined ? { type: 'localField', fieldName } : { type: 'localField', fieldName, fieldType }
}

export function contextField(location: Location, fieldType?: string): ContextField {
  requireField(location.field, location.key, 'contextField')
  return fieldType === undefined ? { type: 'contextField', location } : { type: 'contextField', location, fieldType }
}

export function foldedContextField(location: FoldScopeLocation, fieldType?: string): FoldedContextField {
  requireField(location.field, location.key, 'foldedContextField')
  return fieldType === undefined
    ? { type: 'foldedContextField', location }
    : { type: 'foldedContextField', location, fieldType }
}

export function outputContextField(location: Location, fieldType?: string): OutputContextField {
  requireField(location.field, location.key, 'outputContextField')
  return fieldType === undefined
    ? { type: 'outputContextField', location }
    : { type: 'outputContextField', location, fieldType }
}

export function contextFieldExistence(location: Location): ContextFieldExistence {
  return { type: 'contextFieldExistence', location: location.atVertex() }
}

export function unaryTransformation(operator: UnaryOperator, inner: Expression): UnaryTransformation {
  return { type: 'unaryTransformation', operator, inner }
}

export function binaryComposition(operator: BinaryOperator, left: Expression, right: Expression): BinaryComposition {
  return { type: 'binaryComposition', operator, left, right }
}

export function ternaryConditional(predicate: Expression, ifTrue: Expression, ifFalse: Expression): TernaryConditional {
  return { type: 'ternaryConditional', predicate, ifTrue, ifFalse }
}

function requireField(field: string | undefined, key: string, variant: string): void {
  if (field === undefined) {
    throw new MalformedIrError(`${variant} requires a location with a field, got ${key}`)
  }
}

// =============================================================================
// TRAVERSAL
// =============================================================================

/**
 * Rewrites a single expression node. Must handle every expression variant,
 * returning the input unchanged where no rewrite applies.
 */
export type ExpressionRewriteFn = (expression: Expression) => Expression

/**
 * Rebuild an expression tree bottom-up: children are rewritten first, then
 * `fn` is applied to the (possibly rebuilt) node itself. Subtrees that `fn`
 * leaves unchanged keep their identity.
 */
export function visitAndUpdate(expression: Expression, fn: ExpressionRewriteFn): Expression {
  switch (expression.type) {
    case 'literal':
    case 'variable':
    case 'localField':
    case 'contextField':
    case 'foldedContextField':
    case 'outputContextField':
    case 'contextFieldExistence':
      return fn(expression)
    case 'unaryTransformation': {
      const inner = visitAndUpdate(expression.inner, fn)
      return fn(inner === expression.inner ? expression : { ...expression, inner })
    }
    case 'binaryComposition': {
      const left = visitAndUpdate(expression.left, fn)
      const right = visitAndUpdate(expression.right, fn)
      const unchanged = left === expression.left && right === expression.right
      return fn(unchanged ? expression : { ...expression, left, right })
    }
    case 'ternaryConditional': {
      const predicate = visitAndUpdate(expression.predicate, fn)
      const ifTrue = visitAndUpdate(expression.ifTrue, fn)
      const ifFalse = visitAndUpdate(expression.ifFalse, fn)
      const unchanged =
        predicate === expression.predicate && ifTrue === expression.ifTrue && ifFalse === expression.ifFalse
      return fn(unchanged ? expression : { ...expression, predicate, ifTrue, ifFalse })
    }
  }
}

/**
 * Whether any node of the expression tree satisfies the predicate.
 */
export function someSubexpression(expression: Expression, predicate: (node: Expression) => boolean): boolean {
  if (predicate(expression)) return true
  switch (expression.type) {
    case 'unaryTransformation':
      return someSubexpression(expression.inner, predicate)
    case 'binaryComposition':
      return someSubexpression(expression.left, predicate) || someSubexpression(expression.right, predicate)
    case 'ternaryConditional':
      return (
        someSubexpression(expression.predicate, predicate) ||
        someSubexpression(expression.ifTrue, predicate) ||
        someSubexpression(expression.ifFalse, predicate)
      )
    default:
      return false
  }
}
