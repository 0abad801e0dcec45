/**
 * IR formatting for diagnostics and fault messages.
 */

import type { Block } from './blocks'
import type { Expression } from './expressions'

export function formatExpression(expression: Expression): string {
  switch (expression.type) {
    case 'literal':
      return JSON.stringify(expression.value)
    case 'variable':
      return `$${expression.name}`
    case 'localField':
      return `LocalField(${expression.fieldName})`
    case 'contextField':
      return `ContextField(${expression.location.key})`
    case 'foldedContextField':
      return `FoldedContextField(${expression.location.key})`
    case 'outputContextField':
      return `OutputContextField(${expression.location.key})`
    case 'contextFieldExistence':
      return `Exists(${expression.location.key})`
    case 'unaryTransformation':
      return `${expression.operator}(${formatExpression(expression.inner)})`
    case 'binaryComposition':
      return `(${formatExpression(expression.left)} ${expression.operator} ${formatExpression(expression.right)})`
    case 'ternaryConditional':
      return (
        `(${formatExpression(expression.predicate)} ? ${formatExpression(expression.ifTrue)}` +
        ` : ${formatExpression(expression.ifFalse)})`
      )
  }
}

export function formatBlock(block: Block): string {
  switch (block.type) {
    case 'queryRoot':
      return `QueryRoot(${block.startClass.join('|')})`
    case 'traverse':
      return `Traverse(${block.direction}_${block.edgeName}${block.optional ? ', optional' : ''})`
    case 'recurse':
      return `Recurse(${block.direction}_${block.edgeName}, depth=${block.depth})`
    case 'fold':
      return `Fold(${block.foldScopeLocation.key})`
    case 'unfold':
      return 'Unfold()'
    case 'backtrack':
      return `Backtrack(${block.location.key}${block.optional ? ', optional' : ''})`
    case 'markLocation':
      return `MarkLocation(${block.location.key})`
    case 'coerceType':
      return `CoerceType(${block.targetClass.join('|')})`
    case 'filter':
      return `Filter(${formatExpression(block.predicate)})`
    case 'endOptional':
      return 'EndOptional()'
    case 'outputSource':
      return 'OutputSource()'
    case 'globalOperationsStart':
      return 'GlobalOperationsStart()'
    case 'constructResult': {
      const fields = Object.entries(block.fields).map(([name, expression]) => `${name}: ${formatExpression(expression)}`)
      return `ConstructResult({${fields.join(', ')}})`
    }
  }
}

/**
 * One block per line, prefixed with its index.
 */
export function formatBlocks(blocks: readonly Block[]): string {
  return blocks.map((block, index) => `${index}: ${formatBlock(block)}`).join('\n')
}
