/**
 * corr middleware
 *
 * Enforces a stable correlation id for every request. If the incoming
 * request provides `x-corr-id` that value is used; otherwise a ULID-based
 * correlation id is generated. The id is attached as `req.corr_id`, echoed
 * back in the `x-corr-id` response header, and a request-scoped child
 * logger is attached as `req.log`.
 */
import { Request, Response, NextFunction } from 'express'
import type { Logger } from 'pino'
import { ulid } from 'ulid'
import { getLogger } from '../../utils/logger'

declare global {
  namespace Express {
    interface Request {
      corr_id?: string
      log?: Logger
      /** Recovered admin address once the admin signature has been checked. */
      adminCaller?: string
    }
  }
}

declare module 'http' {
  interface IncomingMessage {
    /** Exact request body as received, kept for admin signature checks. */
    rawBody?: string
  }
}

export default function corr(req: Request, res: Response, next: NextFunction) {
  const header = req.header('x-corr-id')
  const corr_id = header && header.length ? header : `corr_${ulid()}`
  req.corr_id = corr_id
  req.log = getLogger().child({ corr_id })
  res.setHeader('x-corr-id', corr_id)
  next()
}
