/**
 * HTTP surface for the executor
 * Exposes `createApp()` so tests can mount the app without starting a server.
 */
import express from 'express'
import type { ExecutionEngine } from '../engine/ExecutionEngine'
import { Clock, systemClock } from '../utils/clock'
import { logHttp } from '../utils/logger'
import corr from './middleware/corr'
import { requireAdminSignature, requireOperator } from './middleware/auth'
import { postExecute } from './execute'
import { getHealth, getMetrics, getPolicy, getSpend } from './query'
import { postPause, postRecover, putPolicy } from './admin'
import { badRequest } from './envelope'

export type AppDeps = {
  engine: ExecutionEngine
  operatorApiKey: string
  adminSignatureTtlS: number
  clock?: Clock
}

export function createApp(deps: AppDeps) {
  const { engine } = deps
  const app = express()
  app.disable('x-powered-by')
  app.use(corr)
  app.use((req, res, next) => {
    const start = Date.now()
    res.on('finish', () => {
      logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: req.corr_id, latency_ms: Date.now() - start })
    })
    next()
  })
  app.use(
    express.json({
      limit: '64kb',
      verify: (req, _res, buf) => {
        req.rawBody = buf.toString('utf8')
      }
    })
  )

  const operator = requireOperator(deps.operatorApiKey)
  const admin = requireAdminSignature(deps.adminSignatureTtlS, deps.clock ?? systemClock)

  app.post('/execute', operator, postExecute(engine))
  app.get('/spend/:principal', operator, getSpend(engine))
  app.get('/policy/:principal', operator, getPolicy(engine))
  app.get('/health', getHealth(engine))
  app.get('/metrics', getMetrics)

  app.put('/admin/policy/:principal', admin, putPolicy(engine))
  app.post('/admin/pause', admin, postPause(engine, true))
  app.post('/admin/unpause', admin, postPause(engine, false))
  app.post('/admin/recover', admin, postRecover(engine))

  // malformed JSON bodies land here
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err)
    badRequest(req, res, 'Request body is not valid JSON')
  })

  return app
}

export default createApp
