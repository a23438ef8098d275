export { REASONS } from './registry'
export { reason } from './factory'
export type { ReasonOverrides, ReasonContextValue } from './factory'
export {
  ReasonedRejection,
  AuthorizationError,
  PolicyError,
  ExecutionError,
  FatalInvariantError,
  isReasonedRejection,
} from './errors'
export type { TerminalState, AuthorizationCode, PolicyCode, ExecutionCode, FatalCode } from './errors'
