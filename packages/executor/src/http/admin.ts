/**
 * Admin routes. requireAdminSignature has already recovered `req.adminCaller`; the engine
 * decides whether that address is the admin, so an unknown signer gets ADMIN_UNAUTHORIZED.
 */
import { Request, Response } from 'express'
import type { ExecutionEngine } from '../engine/ExecutionEngine'
import { stringifyBigInt } from '../utils/json'
import { validatePolicyUpdate, validateRecover } from '../validators/executeValidator'
import { badRequest, sendRejection } from './envelope'

function caller(req: Request): string {
  return req.adminCaller ?? ''
}

function sendRecord(res: Response, record: unknown): void {
  res.type('application/json').send(stringifyBigInt(record))
}

export function putPolicy(engine: ExecutionEngine) {
  return async (req: Request, res: Response) => {
    const parsed = validatePolicyUpdate(req.body)
    if (!parsed.valid) return badRequest(req, res, parsed.error)
    const { daily_limit, action_caps } = parsed.value
    try {
      const record = await engine.setPolicy(caller(req), req.params.principal, daily_limit, action_caps.like, action_caps.recast)
      sendRecord(res, record)
    } catch (e) {
      sendRejection(req, res, e)
    }
  }
}

export function postPause(engine: ExecutionEngine, paused: boolean) {
  return async (req: Request, res: Response) => {
    try {
      const record = paused ? await engine.pause(caller(req)) : await engine.unpause(caller(req))
      sendRecord(res, record)
    } catch (e) {
      sendRejection(req, res, e)
    }
  }
}

export function postRecover(engine: ExecutionEngine) {
  return async (req: Request, res: Response) => {
    const parsed = validateRecover(req.body)
    if (!parsed.valid) return badRequest(req, res, parsed.error)
    try {
      const record = await engine.recoverAssets(caller(req), parsed.value.to, parsed.value.amount)
      sendRecord(res, record)
    } catch (e) {
      sendRejection(req, res, e)
    }
  }
}
