/**
 * POST /execute
 *
 * Runs one execution synchronously and answers with its terminal outcome: 200 with the
 * completion record, or the rejection's HTTP status with an ErrorEnvelope whose `state`
 * says whether funds moved (REJECTED), were restored (ROLLED_BACK) or need attention (FAILED).
 */
import { Request, Response } from 'express'
import { ExecuteResponse } from '@permit-relay/dto'
import type { ExecutionEngine } from '../engine/ExecutionEngine'
import { validateExecuteRequest } from '../validators/executeValidator'
import { badRequest, sendRejection } from './envelope'

export function postExecute(engine: ExecutionEngine) {
  return async (req: Request, res: Response) => {
    const parsed = validateExecuteRequest(req.body)
    if (!parsed.valid) return badRequest(req, res, parsed.error)

    try {
      const result = await engine.execute(parsed.value, { corr_id: req.corr_id })
      const { record } = result
      const body: ExecuteResponse = {
        execution_id: result.executionId,
        state: result.state,
        principal: record.principal,
        kind: record.kind,
        amount: record.amount.toString(),
        day: record.day,
        received: record.received.reported ? { reported: true, amount: record.received.amount.toString() } : { reported: false }
      }
      res.status(200).json(body)
    } catch (e) {
      sendRejection(req, res, e)
    }
  }
}
