/**
 * Retry Policy (SDK)
 * Encodes a conservative, deterministic retry policy that operator clients can adopt by default.
 * The executor itself never retries; this is the layer that decides whether to try again.
 */
import type { ReasonCode } from '@permit-relay/dto'

/**
 * Server reason codes plus two client-side codes:
 * - NETWORK_ERROR: the request never reached the executor (refused, unresolvable, unreachable)
 * - OUTCOME_UNKNOWN: the request may have been delivered but no usable answer came back
 *   (timeout, reset connection, a body that is not an ErrorEnvelope)
 */
export type ClientErrorCode = ReasonCode | 'NETWORK_ERROR' | 'OUTCOME_UNKNOWN'

/**
 * shouldRetry
 * - Retry: EXECUTION_FORWARD_FAILED (funds were restored), ENGINE_PAUSED, NETWORK_ERROR.
 * - Never: AUTH_*, POLICY_*, CLIENT_*, VALIDATION_* (the request must change), FATAL_* and
 *   INTERNAL_ERROR (an operator has to look first), OUTCOME_UNKNOWN (the first execution may
 *   still be running or may have completed; check spentToday before submitting again).
 * A forward failure consumed the permit: the retry needs a freshly signed grant.
 */
export function shouldRetry(code: ClientErrorCode): boolean {
  switch (code) {
    case 'EXECUTION_FORWARD_FAILED':
    case 'ENGINE_PAUSED':
    case 'NETWORK_ERROR':
      return true
    default:
      return false
  }
}

export function retryDelay(code: ClientErrorCode, attempt: number, base = 100, cap = 2000): number {
  // a pause is an operator action; back off harder than for transient venue or network trouble
  const start = code === 'ENGINE_PAUSED' ? base * 10 : base
  const exp = Math.min(start * Math.pow(2, Math.max(0, attempt)), cap)
  const jitter = Math.floor(Math.random() * 50)
  return Math.min(exp + jitter, cap)
}

export interface AuditWriter {
  write(line: string): Promise<void>
}

export type ExecuteOutcomeInfo = {
  ts: string
  execution_id?: string
  attempt: number
  outcome: 'ok' | 'error'
  reason_code?: ClientErrorCode
  next_retry_ms?: number
}

/**
 * Logs a one-liner for failed executions and, when a writer is given, a client-side JSONL record
 * of every attempt.
 */
export async function logExecuteOutcome(opts: {
  ok: boolean
  code?: ClientErrorCode
  execution_id?: string
  attempt: number
  auditWriter?: AuditWriter
  nextRetryMs?: number
}): Promise<void> {
  const willRetry = !opts.ok && opts.code !== undefined && shouldRetry(opts.code)
  if (!opts.ok) {
    const delayPart = willRetry ? ` (retry in ${opts.nextRetryMs ?? 0}ms)` : ' (no retry)'
    console.info(`execute failed: ${opts.code ?? 'UNKNOWN'}${delayPart}`)
  }
  if (!opts.auditWriter) return

  const rec: ExecuteOutcomeInfo = {
    ts: new Date().toISOString(),
    execution_id: opts.execution_id,
    attempt: opts.attempt,
    outcome: opts.ok ? 'ok' : 'error',
    reason_code: opts.code,
    next_retry_ms: willRetry ? (opts.nextRetryMs ?? 0) : undefined
  }
  await opts.auditWriter.write(JSON.stringify(rec) + '\n')
}
