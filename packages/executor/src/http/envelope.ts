import { Request, Response } from 'express'
import { ErrorEnvelope, ExecutionState } from '@permit-relay/dto'
import { ReasonedRejection, isReasonedRejection, reason } from '@permit-relay/reasons'
import { errorMessage } from '../utils/errors'

export function toEnvelope(corr_id: string, err: ReasonedRejection, execution_id?: string): ErrorEnvelope {
  return { corr_id, execution_id, state: err.terminalState, reason: err.reason, ts: new Date().toISOString() }
}

/** Write any thrown value as an ErrorEnvelope; unknown errors become INTERNAL_ERROR. */
export function sendRejection(req: Request, res: Response, e: unknown): void {
  let err: ReasonedRejection
  if (isReasonedRejection(e)) {
    err = e
  } else {
    req.log?.error({ event: 'http.unhandled_error', path: req.path, err: errorMessage(e) })
    err = new ReasonedRejection(reason('INTERNAL_ERROR'), undefined, ExecutionState.REJECTED)
  }
  res.status(err.reason.http_status).json(toEnvelope(req.corr_id ?? '-', err))
}

export function badRequest(req: Request, res: Response, message: string): void {
  sendRejection(req, res, new ReasonedRejection(reason('CLIENT_BAD_REQUEST', { message })))
}
