/**
 * Executor package public surface.
 * The engine and its collaborators are usable without the HTTP layer; `createApp` mounts them behind express.
 */
export { ExecutionEngine } from './engine/ExecutionEngine'
export type { AuthorizationGrant, ExecutionRequest, ExecutionResult, ExecutionMeta, ExecutionEngineOptions } from './engine/ExecutionEngine'
export { ExecutionGuard } from './engine/ExecutionGuard'
export { StateMachine } from './engine/stateMachine'
export { PolicyStore, parseActionKind, dayIndex, SECONDS_PER_DAY } from './policy/PolicyStore'
export type { Policy, Reservation } from './policy/PolicyStore'
export { AuthorizationValidator } from './auth/AuthorizationValidator'
export type { AssetLedger } from './ledger/AssetLedger'
export { LedgerError } from './ledger/AssetLedger'
export { Erc20PermitLedger, ERC20_PERMIT_ABI } from './ledger/Erc20PermitLedger'
export type { ForwardingIntegration, ForwardOutcome, ForwardingRunner } from './forwarding/ForwardingIntegration'
export { ContractForwarder } from './forwarding/ForwardingIntegration'
export { createRecipientExtractor } from './forwarding/recipientGuard'
export type { RecipientExtractor } from './forwarding/recipientGuard'
export { PinoAuditSink, JsonlAuditSink, CompositeAuditSink, noopAuditSink } from './audit/AuditSink'
export type { AuditSink } from './audit/AuditSink'
export { createApp } from './http'
export type { AppDeps } from './http'
export { loadConfig, loadEnvFile, ConfigError } from './config'
export type { AppConfig } from './config'
export { setLogger, getLogger } from './utils/logger'
export { setRegistry, getRegistry } from './utils/metrics'
export { setRejectionDir } from './utils/rejectionAudit'
