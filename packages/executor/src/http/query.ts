import { Request, Response } from 'express'
import { ActionKind, PolicyResponse, SpendResponse } from '@permit-relay/dto'
import type { ExecutionEngine } from '../engine/ExecutionEngine'
import { getRegistry } from '../utils/metrics'
import { sendRejection } from './envelope'

export function getSpend(engine: ExecutionEngine) {
  return (req: Request, res: Response) => {
    try {
      const { day, spent } = engine.spentToday(req.params.principal)
      const policy = engine.getPolicy(req.params.principal)
      const body: SpendResponse = {
        principal: req.params.principal,
        day,
        spent: spent.toString(),
        daily_limit: policy.dailyLimit.toString()
      }
      res.json(body)
    } catch (e) {
      sendRejection(req, res, e)
    }
  }
}

export function getPolicy(engine: ExecutionEngine) {
  return (req: Request, res: Response) => {
    try {
      const policy = engine.getPolicy(req.params.principal)
      const body: PolicyResponse = {
        principal: req.params.principal,
        daily_limit: policy.dailyLimit.toString(),
        action_caps: {
          like: policy.actionCaps[ActionKind.LIKE].toString(),
          recast: policy.actionCaps[ActionKind.RECAST].toString()
        }
      }
      res.json(body)
    } catch (e) {
      sendRejection(req, res, e)
    }
  }
}

export function getHealth(engine: ExecutionEngine) {
  return (_req: Request, res: Response) => {
    res.json({ ok: true, paused: engine.isPaused() })
  }
}

export async function getMetrics(req: Request, res: Response) {
  try {
    const registry = getRegistry()
    res.set('Content-Type', registry.contentType)
    res.send(await registry.metrics())
  } catch (e) {
    sendRejection(req, res, e)
  }
}
