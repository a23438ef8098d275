/**
 * reason() factory
 * Builds the ReasonDetail an error carries from its registry entry plus per-failure overrides.
 * Context values may be bigints (amounts, deadlines); they leave here as decimal strings so every
 * ReasonDetail stays JSON-safe for envelopes, logs and the rejection audit.
 * New codes go in the dto registry; published codes never change meaning.
 */
import { ReasonDetail, ReasonCode } from '@permit-relay/dto'
import { REASONS } from './registry'

export type ReasonContextValue = string | number | boolean | bigint

export type ReasonOverrides = {
  message?: string
  http_status?: number
  context?: Record<string, ReasonContextValue>
}

type JsonContext = NonNullable<ReasonDetail['context']>

function jsonContext(values: Record<string, ReasonContextValue>): JsonContext {
  const out: JsonContext = {}
  for (const [key, value] of Object.entries(values)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value
  }
  return out
}

export function reason(code: ReasonCode, overrides: ReasonOverrides = {}): ReasonDetail {
  const base = REASONS[code]
  const context = { ...base.context, ...jsonContext(overrides.context ?? {}) }
  return {
    ...base,
    message: overrides.message ?? base.message,
    http_status: overrides.http_status ?? base.http_status,
    context: Object.keys(context).length ? context : undefined
  }
}
