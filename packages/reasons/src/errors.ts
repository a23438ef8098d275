/**
 * Error taxonomy
 * Every failure the engine surfaces wraps a ReasonDetail so callers can branch on a stable code.
 * The terminal state tells the caller how far the execution got:
 *  - REJECTED: refused before any fund movement
 *  - ROLLED_BACK: funds moved and were restored
 *  - FAILED: an invariant broke; operator attention required
 */
import { ExecutionState, ReasonCode, ReasonDetail } from '@permit-relay/dto'
import { reason, ReasonOverrides } from './factory'

export type TerminalState = ExecutionState.REJECTED | ExecutionState.ROLLED_BACK | ExecutionState.FAILED

export type AuthorizationCode = Extract<ReasonCode, `AUTH_${string}`>
export type PolicyCode = Extract<ReasonCode, `POLICY_${string}`>
export type ExecutionCode = Extract<ReasonCode, `EXECUTION_${string}`>
export type FatalCode = Extract<ReasonCode, `FATAL_${string}`>

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail
  public readonly terminalState: TerminalState

  constructor(reason: ReasonDetail, human?: string, terminalState: TerminalState = ExecutionState.REJECTED) {
    super(human || reason.message)
    this.name = 'ReasonedRejection'
    this.reason = reason
    this.terminalState = terminalState
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

/** Expired, forged or ledger-refused grant. Raised before any fund movement. */
export class AuthorizationError extends ReasonedRejection {
  constructor(code: AuthorizationCode, overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'AuthorizationError'
  }
}

/** Spend policy refusal. Raised before any fund movement. */
export class PolicyError extends ReasonedRejection {
  constructor(code: PolicyCode, overrides?: ReasonOverrides) {
    super(reason(code, overrides))
    this.name = 'PolicyError'
  }
}

/** Transfer or forward failed; the engine restored any pulled funds. */
export class ExecutionError extends ReasonedRejection {
  constructor(code: ExecutionCode, cause?: unknown, overrides?: ReasonOverrides) {
    super(reason(code, overrides), undefined, ExecutionState.ROLLED_BACK)
    this.name = 'ExecutionError'
    this.cause = cause
  }
}

export class FatalInvariantError extends ReasonedRejection {
  constructor(code: FatalCode, overrides?: ReasonOverrides) {
    super(reason(code, overrides), undefined, ExecutionState.FAILED)
    this.name = 'FatalInvariantError'
  }
}

export function isReasonedRejection(e: unknown): e is ReasonedRejection {
  return e instanceof ReasonedRejection
}
