/*
 * Application entry point for the permit relay executor
 *
 * Responsibilities:
 *  1. Load and validate configuration (.env.permit-relay + process env)
 *  2. Connect the executor wallet and build the token ledger and forwarding adapters
 *  3. Start the HTTP API server (Express app)
 *  4. Provide graceful shutdown on SIGINT/SIGTERM
 */
import http from 'http'
import path from 'path'
import pino from 'pino'
import { JsonRpcProvider, Wallet } from 'ethers'
import { loadConfig, loadEnvFile, ConfigError } from './config'
import { createApp } from './http'
import { ExecutionEngine } from './engine/ExecutionEngine'
import { Erc20PermitLedger } from './ledger/Erc20PermitLedger'
import { ContractForwarder } from './forwarding/ForwardingIntegration'
import { createRecipientExtractor } from './forwarding/recipientGuard'
import { CompositeAuditSink, JsonlAuditSink, PinoAuditSink } from './audit/AuditSink'
import { getLogger, setLogger } from './utils/logger'
import { setRejectionDir } from './utils/rejectionAudit'
import { errorMessage } from './utils/errors'

let server: http.Server | null = null
let provider: JsonRpcProvider | null = null
let shuttingDown = false

async function start() {
  const envFile = loadEnvFile()
  const cfg = loadConfig()
  setLogger(pino({ level: cfg.LOG_LEVEL }))
  const log = getLogger()
  log.info({ event: 'startup', env_file: envFile ?? null, node_env: cfg.NODE_ENV })

  // 1. Chain connection; staticNetwork skips the chain-id probe on every reconnect
  provider = new JsonRpcProvider(cfg.RPC_URL, cfg.CHAIN_ID, { staticNetwork: true })
  const network = await provider.getNetwork()
  if (network.chainId !== BigInt(cfg.CHAIN_ID)) {
    throw new Error(`RPC chain id ${network.chainId} does not match CHAIN_ID ${cfg.CHAIN_ID}`)
  }
  const wallet = new Wallet(cfg.EXECUTOR_PRIVATE_KEY, provider)

  // 2. Adapters, sinks and engine
  const auditDir = path.resolve(cfg.AUDIT_LOG_DIR)
  setRejectionDir(auditDir)
  const ledger = new Erc20PermitLedger({ token: cfg.TOKEN_ADDRESS, chainId: cfg.CHAIN_ID, version: cfg.TOKEN_PERMIT_VERSION, runner: wallet })
  const forwarder = new ContractForwarder(wallet, cfg.FORWARD_TARGET)
  const recipientOf = cfg.FORWARD_RECIPIENT_FUNCTION
    ? createRecipientExtractor(cfg.FORWARD_RECIPIENT_FUNCTION, cfg.FORWARD_RECIPIENT_ARG)
    : undefined

  const engine = new ExecutionEngine({
    ledger,
    forwarder,
    executor: wallet.address,
    admin: cfg.ADMIN_ADDRESS,
    auditSink: new CompositeAuditSink([new PinoAuditSink(), new JsonlAuditSink(auditDir)]),
    recipientOf
  })

  // 3. HTTP server
  const app = createApp({ engine, operatorApiKey: cfg.OPERATOR_API_KEY, adminSignatureTtlS: cfg.ADMIN_SIGNATURE_TTL_S })
  await new Promise<void>((resolve) => {
    server = app.listen(cfg.PORT, () => resolve())
  })
  log.info({
    event: 'startup.complete',
    port: cfg.PORT,
    executor: wallet.address,
    token: cfg.TOKEN_ADDRESS,
    forward_target: cfg.FORWARD_TARGET,
    recipient_guard: Boolean(recipientOf)
  })

  // 4. Graceful shutdown handling
  process.once('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

async function shutdown(signal: string) {
  if (shuttingDown) return
  shuttingDown = true
  const log = getLogger()
  log.info({ event: 'shutdown', signal })

  // in-flight requests finish; new connections are refused
  if (server) {
    await new Promise<void>((resolve) => {
      server?.close((err) => {
        if (err) log.error({ event: 'shutdown.http_close_failed', err: errorMessage(err) })
        resolve()
      })
    })
  }
  provider?.destroy()

  log.info({ event: 'shutdown.complete' })
  process.exit(0)
}

if (require.main === module) {
  start().catch((err) => {
    if (err instanceof ConfigError) getLogger().fatal({ event: 'startup.config_invalid', issues: err.issues })
    else getLogger().fatal({ event: 'startup.failed', err: errorMessage(err) })
    process.exit(1)
  })
}

export { start }
