import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CLIENT
  CLIENT_BAD_REQUEST: { code: 'CLIENT_BAD_REQUEST', category: ReasonCategory.CLIENT, http_status: 400, message: 'Bad request' },
  CLIENT_UNAUTHORIZED: { code: 'CLIENT_UNAUTHORIZED', category: ReasonCategory.CLIENT, http_status: 401, message: 'Missing or invalid credentials' },
  CLIENT_NOT_FOUND: { code: 'CLIENT_NOT_FOUND', category: ReasonCategory.CLIENT, http_status: 404, message: 'Not found' },

  // AUTHORIZATION: the principal's grant is unusable
  AUTH_EXPIRED: { code: 'AUTH_EXPIRED', category: ReasonCategory.AUTHORIZATION, http_status: 400, message: 'Authorization deadline has passed' },
  AUTH_INVALID_SIGNATURE: { code: 'AUTH_INVALID_SIGNATURE', category: ReasonCategory.AUTHORIZATION, http_status: 401, message: 'Authorization signature is not valid for this principal and amount' },
  AUTH_INSUFFICIENT_GRANT: { code: 'AUTH_INSUFFICIENT_GRANT', category: ReasonCategory.AUTHORIZATION, http_status: 409, message: 'Asset ledger refused the authorization' },

  // POLICY: the principal's spend limits forbid the action
  POLICY_UNKNOWN_ACTION_KIND: { code: 'POLICY_UNKNOWN_ACTION_KIND', category: ReasonCategory.POLICY, http_status: 400, message: 'Unknown action kind' },
  POLICY_ACTION_NOT_CONFIGURED: { code: 'POLICY_ACTION_NOT_CONFIGURED', category: ReasonCategory.POLICY, http_status: 403, message: 'No cap configured for this action kind' },
  POLICY_ACTION_CAP_EXCEEDED: { code: 'POLICY_ACTION_CAP_EXCEEDED', category: ReasonCategory.POLICY, http_status: 403, message: 'Amount exceeds the per-action cap' },
  POLICY_DAILY_NOT_CONFIGURED: { code: 'POLICY_DAILY_NOT_CONFIGURED', category: ReasonCategory.POLICY, http_status: 403, message: 'No daily limit configured' },
  POLICY_DAILY_CAP_EXCEEDED: { code: 'POLICY_DAILY_CAP_EXCEEDED', category: ReasonCategory.POLICY, http_status: 403, message: 'Amount exceeds the remaining daily limit' },

  // VALIDATION
  VALIDATION_RECIPIENT_MISMATCH: { code: 'VALIDATION_RECIPIENT_MISMATCH', category: ReasonCategory.VALIDATION, http_status: 400, message: 'Forwarding payload does not pay the principal' },

  // EXECUTION: funds may have moved and were rolled back
  EXECUTION_TRANSFER_FAILED: { code: 'EXECUTION_TRANSFER_FAILED', category: ReasonCategory.EXECUTION, http_status: 502, message: 'Asset transfer failed' },
  EXECUTION_FORWARD_FAILED: { code: 'EXECUTION_FORWARD_FAILED', category: ReasonCategory.EXECUTION, http_status: 502, message: 'Forwarding venue failed' },

  // ENGINE
  ENGINE_PAUSED: { code: 'ENGINE_PAUSED', category: ReasonCategory.ENGINE, http_status: 503, message: 'Executions are paused' },
  ENGINE_REENTRANT_CALL: { code: 'ENGINE_REENTRANT_CALL', category: ReasonCategory.ENGINE, http_status: 409, message: 'Re-entrant execution refused' },

  // ADMIN
  ADMIN_UNAUTHORIZED: { code: 'ADMIN_UNAUTHORIZED', category: ReasonCategory.ADMIN, http_status: 403, message: 'Caller is not the administrator' },

  // FATAL: invariant violations, never retried
  FATAL_LEDGER_OVERFLOW: { code: 'FATAL_LEDGER_OVERFLOW', category: ReasonCategory.FATAL, http_status: 500, message: 'Spend ledger overflow' },
  FATAL_POSTCONDITION: { code: 'FATAL_POSTCONDITION', category: ReasonCategory.FATAL, http_status: 500, message: 'Spend ledger postcondition violated' },
  FATAL_ROLLBACK_FAILED: { code: 'FATAL_ROLLBACK_FAILED', category: ReasonCategory.FATAL, http_status: 500, message: 'Rollback of pulled funds failed' },
  FATAL_FORWARD_UNCONFIRMED: { code: 'FATAL_FORWARD_UNCONFIRMED', category: ReasonCategory.FATAL, http_status: 500, message: 'Forwarding transaction was sent but its outcome is unknown' },

  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}

export function isReasonCode(value: string): value is ReasonCode {
  return Object.prototype.hasOwnProperty.call(REASONS, value)
}
