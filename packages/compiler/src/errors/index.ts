/**
 * Errors Module
 */

export {
  LoweringError,
  MalformedIrError,
  InvariantViolationError,
  isInternalFault,
} from './errors'
export type { InternalFault, InternalFaultKind } from './errors'
