/**
 * Custom Error Classes
 *
 * Every error raised while lowering IR is an internal compiler fault: it means
 * the front end, the metadata table or a lowering pass is defective. None of
 * them describe a problem with the user's query.
 */

import type { Block } from '../ir/blocks'

export type InternalFaultKind = 'malformed-ir' | 'invariant-violation'

/**
 * Base error for all lowering faults.
 */
export abstract class LoweringError extends Error {
  public override readonly cause?: Error
  abstract readonly kind: InternalFaultKind

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'LoweringError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Malformed IR.
 * Thrown when the input violates a structural assumption of a pass, or a
 * location is missing from the metadata table.
 */
export class MalformedIrError extends LoweringError {
  readonly kind = 'malformed-ir'

  constructor(
    message: string,
    public readonly pass?: string,
    public readonly blockIndex?: number,
    public readonly blocks?: readonly Block[],
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'MalformedIrError'
  }
}

/**
 * Invariant violation.
 * Thrown when a pass's own output breaks the invariant it promises.
 */
export class InvariantViolationError extends LoweringError {
  readonly kind = 'invariant-violation'

  constructor(
    message: string,
    public readonly pass: string,
    public readonly expected?: number,
    public readonly actual?: number,
  ) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}

export type InternalFault = MalformedIrError | InvariantViolationError

/**
 * Whether a thrown value is a lowering fault, as opposed to any other error.
 */
export function isInternalFault(value: unknown): value is InternalFault {
  return value instanceof MalformedIrError || value instanceof InvariantViolationError
}
