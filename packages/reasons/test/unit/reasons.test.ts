import { ExecutionState, ReasonCategory } from '@permit-relay/dto'
import { REASONS } from '../../src/registry'
import { reason } from '../../src/factory'
import {
  ReasonedRejection,
  AuthorizationError,
  PolicyError,
  ExecutionError,
  FatalInvariantError,
  isReasonedRejection,
} from '../../src/errors'

describe('reasons factory', () => {
  test('factory-defaults: exact match for canonical codes', () => {
    const r = reason('CLIENT_BAD_REQUEST')
    expect(r).toEqual(REASONS.CLIENT_BAD_REQUEST)
  })

  test('override-context: merges new message and context', () => {
    const r = reason('POLICY_ACTION_CAP_EXCEEDED', { message: 'custom', context: { cap: '60', kind: 'like' } })
    expect(r.message).toBe('custom')
    expect(r.context).toEqual({ cap: '60', kind: 'like' })
    expect(r.http_status).toBe(REASONS.POLICY_ACTION_CAP_EXCEEDED.http_status)
  })

  test('bigint context values become decimal strings', () => {
    const r = reason('POLICY_DAILY_CAP_EXCEEDED', { context: { amount: 2n ** 200n, day: 19675 } })
    expect(r.context).toEqual({ amount: '1606938044258990275541962092341162602522202993782792835301376', day: 19675 })
    expect(JSON.parse(JSON.stringify(r)).context.amount).toBe('1606938044258990275541962092341162602522202993782792835301376')
  })

  test('every registry entry is keyed by its own code', () => {
    for (const [key, detail] of Object.entries(REASONS)) {
      expect(detail.code).toBe(key)
    }
  })
})

describe('error taxonomy', () => {
  test('authorization errors reject before fund movement', () => {
    const err = new AuthorizationError('AUTH_EXPIRED', { context: { deadline: '10' } })
    expect(err).toBeInstanceOf(Error)
    expect(err).toBeInstanceOf(ReasonedRejection)
    expect(err.name).toBe('AuthorizationError')
    expect(err.code).toBe('AUTH_EXPIRED')
    expect(err.reason.category).toBe(ReasonCategory.AUTHORIZATION)
    expect(err.terminalState).toBe(ExecutionState.REJECTED)
    expect(err.reason.context).toEqual({ deadline: '10' })
  })

  test('policy errors carry the POLICY category', () => {
    const err = new PolicyError('POLICY_DAILY_CAP_EXCEEDED')
    expect(err.reason.category).toBe(ReasonCategory.POLICY)
    expect(err.terminalState).toBe(ExecutionState.REJECTED)
    expect(err.message).toBe(REASONS.POLICY_DAILY_CAP_EXCEEDED.message)
  })

  test('execution errors are rolled back and keep their cause', () => {
    const cause = new Error('venue reverted')
    const err = new ExecutionError('EXECUTION_FORWARD_FAILED', cause)
    expect(err.terminalState).toBe(ExecutionState.ROLLED_BACK)
    expect(err.cause).toBe(cause)
    expect(err.reason.http_status).toBe(502)
  })

  test('fatal errors end in FAILED', () => {
    const err = new FatalInvariantError('FATAL_LEDGER_OVERFLOW')
    expect(err.terminalState).toBe(ExecutionState.FAILED)
    expect(err.reason.category).toBe(ReasonCategory.FATAL)
  })

  test('isReasonedRejection narrows only taxonomy errors', () => {
    expect(isReasonedRejection(new PolicyError('POLICY_UNKNOWN_ACTION_KIND'))).toBe(true)
    expect(isReasonedRejection(new Error('plain'))).toBe(false)
    expect(isReasonedRejection('POLICY_UNKNOWN_ACTION_KIND')).toBe(false)
  })
})
