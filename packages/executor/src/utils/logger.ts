import pino, { Logger } from 'pino'

type TransitionPayload = {
  executionId: string
  from: string
  to: string
  corr_id?: string
  principal?: string
  reason_code?: string
  ts?: string
}

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

const TERMINAL_FAILURES = new Set(['REJECTED', 'ROLLED_BACK', 'FAILED'])

// create default logger; tests can replace via setLogger
let logger: Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: Logger) {
  logger = l
}

export function getLogger(): Logger {
  return logger
}

export function logTransition(payload: TransitionPayload): void {
  const ts = payload.ts ?? new Date().toISOString()
  const base = {
    event: 'execution.transition',
    executionId: payload.executionId,
    from: payload.from,
    to: payload.to,
    corr_id: payload.corr_id,
    principal: payload.principal,
    reason_code: payload.reason_code,
    ts
  }

  if (TERMINAL_FAILURES.has(payload.to)) logger.warn(base)
  else logger.info(base)
}

export function logHttp(payload: HttpPayload): void {
  const base = {
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms
  }
  if (payload.status >= 500) logger.error(base)
  else logger.info(base)
}
