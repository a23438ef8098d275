/**
 * ExecutionEngine
 * Gates and runs one delegated transfer-then-forward action:
 *
 *   VALIDATING → LIMIT_CHECKING → TRANSFERRING → FORWARDING → COMMITTING → COMPLETED
 *
 * - REJECTED from VALIDATING/LIMIT_CHECKING: no funds have moved
 * - ROLLED_BACK from TRANSFERRING/FORWARDING: forwarding approval reset, pulled funds returned
 * - FAILED: an invariant broke (ledger overflow, commit postcondition, failed compensation), or the
 *   forward transaction went out and its receipt was lost; funds stay put for an operator to reconcile
 *
 * The whole sequence, and every administrative write, runs under one ExecutionGuard. Calls that
 * arrive from inside a running execution (e.g. from the forwarding venue) are refused outright.
 */
import { AsyncLocalStorage } from 'async_hooks'
import { getAddress, isAddress, MaxUint256 } from 'ethers'
import { ulid } from 'ulid'
import {
  ActionKind,
  AuditRecord,
  ExecutionRecord,
  ExecutionState,
  PauseRecord,
  PolicyChangeRecord,
  RecoveryRecord
} from '@permit-relay/dto'
import {
  ExecutionError,
  FatalInvariantError,
  ReasonedRejection,
  isReasonedRejection,
  reason
} from '@permit-relay/reasons'
import type { AssetLedger } from '../ledger/AssetLedger'
import type { ForwardingIntegration, ForwardOutcome } from '../forwarding/ForwardingIntegration'
import type { RecipientExtractor } from '../forwarding/recipientGuard'
import { AuthorizationValidator } from '../auth/AuthorizationValidator'
import { PolicyStore, Policy, Reservation, dayIndex } from '../policy/PolicyStore'
import { AuditSink, noopAuditSink } from '../audit/AuditSink'
import { ExecutionGuard } from './ExecutionGuard'
import { StateMachine } from './stateMachine'
import { Clock, isoTime, systemClock } from '../utils/clock'
import { errorMessage } from '../utils/errors'
import { getLogger, logTransition } from '../utils/logger'
import { countAuditFailure, countRejection, countTransition, observeExecution } from '../utils/metrics'
import { appendRejection } from '../utils/rejectionAudit'

export interface AuthorizationGrant {
  /** Amount the permit was signed for; defaults to the request amount. */
  value?: bigint
  deadline: bigint
  signature: string
}

export interface ExecutionRequest {
  principal: string
  amount: bigint
  kind: ActionKind | string
  grant: AuthorizationGrant
  /** Opaque calldata for the configured forwarding target. */
  payload: string
}

export interface ExecutionResult {
  executionId: string
  state: ExecutionState.COMPLETED
  record: ExecutionRecord
  forwardOutput: string
}

export type ExecutionMeta = { corr_id?: string }

export type ExecutionEngineOptions = {
  ledger: AssetLedger
  forwarder: ForwardingIntegration
  /** Address that receives permits and holds funds between pull and forward. */
  executor: string
  admin: string
  policyStore?: PolicyStore
  validator?: AuthorizationValidator
  auditSink?: AuditSink
  clock?: Clock
  recipientOf?: RecipientExtractor
  idFactory?: () => string
}

const sm = new StateMachine()

/** Mutable bookkeeping for one execution; never leaves the engine. */
class ExecutionRun {
  state: ExecutionState = ExecutionState.VALIDATING
  /** Last non-terminal state, used to label rejections by stage. */
  stage: ExecutionState = ExecutionState.VALIDATING
  pulled = false
  approved = false

  constructor(
    readonly id: string,
    readonly principal: string,
    readonly corrId?: string
  ) {}

  advance(to: ExecutionState, reasonCode?: string): void {
    if (!sm.can(this.state, to)) {
      throw new FatalInvariantError('FATAL_POSTCONDITION', { message: `illegal transition ${this.state} -> ${to}` })
    }
    logTransition({ executionId: this.id, from: this.state, to, corr_id: this.corrId, principal: this.principal, reason_code: reasonCode })
    countTransition(this.state, to)
    if (!sm.isTerminal(to)) this.stage = to
    this.state = to
  }
}

export class ExecutionEngine {
  private readonly ledger: AssetLedger
  private readonly forwarder: ForwardingIntegration
  private readonly executor: string
  private readonly admin: string
  private readonly policy: PolicyStore
  private readonly validator: AuthorizationValidator
  private readonly auditSink: AuditSink
  private readonly clock: Clock
  private readonly recipientOf?: RecipientExtractor
  private readonly idFactory: () => string

  private readonly guard = new ExecutionGuard()
  // set for the duration of an execution; its presence marks a re-entrant call
  private readonly scope = new AsyncLocalStorage<{ executionId: string }>()
  private paused = false

  constructor(opts: ExecutionEngineOptions) {
    this.ledger = opts.ledger
    this.forwarder = opts.forwarder
    this.executor = getAddress(opts.executor)
    this.admin = getAddress(opts.admin)
    this.clock = opts.clock ?? systemClock
    this.policy = opts.policyStore ?? new PolicyStore()
    this.validator = opts.validator ?? new AuthorizationValidator(opts.ledger, this.executor, this.clock)
    this.auditSink = opts.auditSink ?? noopAuditSink
    this.recipientOf = opts.recipientOf
    this.idFactory = opts.idFactory ?? (() => `exec_${ulid()}`)
  }

  async execute(request: ExecutionRequest, meta: ExecutionMeta = {}): Promise<ExecutionResult> {
    const active = this.scope.getStore()
    if (active) {
      getLogger().warn({ event: 'execution.reentrant_refused', active_execution: active.executionId, corr_id: meta.corr_id })
      countRejection('guard', 'ENGINE_REENTRANT_CALL')
      throw new ReasonedRejection(reason('ENGINE_REENTRANT_CALL'))
    }

    const started = Date.now()
    const run = new ExecutionRun(this.idFactory(), request.principal, meta.corr_id)
    const release = await this.guard.acquire()
    try {
      return await this.scope.run({ executionId: run.id }, () => this.runPipeline(run, request))
    } catch (e) {
      throw await this.terminate(run, e)
    } finally {
      release()
      observeExecution(run.state, Date.now() - started)
    }
  }

  private async runPipeline(run: ExecutionRun, request: ExecutionRequest): Promise<ExecutionResult> {
    // VALIDATING
    if (this.paused) {
      throw new ReasonedRejection(reason('ENGINE_PAUSED'))
    }
    const principal = normalizePrincipal(request.principal)
    const amount = request.amount
    if (amount < 0n || amount > MaxUint256) {
      throw new ReasonedRejection(reason('CLIENT_BAD_REQUEST', { message: 'amount is outside the uint256 range' }))
    }
    if (this.recipientOf) {
      const recipient = this.recipientOf(request.payload)
      if (recipient !== principal) {
        throw new ReasonedRejection(reason('VALIDATION_RECIPIENT_MISMATCH'))
      }
    }
    const { grant } = request
    await this.validator.verify(principal, amount, grant.deadline, grant.signature, grant.value ?? amount)

    // LIMIT_CHECKING: the clock is read once here; commit reuses the same day
    run.advance(ExecutionState.LIMIT_CHECKING)
    const now = this.clock()
    const reservation = this.policy.checkAndReserve(principal, request.kind, amount, now)

    // TRANSFERRING
    run.advance(ExecutionState.TRANSFERRING)
    try {
      await this.ledger.pull(principal, this.executor, amount)
      run.pulled = true
    } catch (e) {
      await this.rollback(run, principal, amount)
      throw new ExecutionError('EXECUTION_TRANSFER_FAILED', e)
    }

    // FORWARDING
    run.advance(ExecutionState.FORWARDING)
    const outcome = await this.forward(run, amount, request.payload)
    if (!outcome.ok && outcome.pendingTx !== undefined) {
      throw this.unconfirmed(run, reservation, outcome.pendingTx, outcome.error)
    }
    if (!outcome.ok) {
      await this.rollback(run, principal, amount)
      throw new ExecutionError('EXECUTION_FORWARD_FAILED', outcome.error)
    }

    // COMMITTING
    run.advance(ExecutionState.COMMITTING)
    this.policy.commit(reservation)

    run.advance(ExecutionState.COMPLETED)
    const record = this.completionRecord(run, reservation, now)
    this.emit(record)
    return { executionId: run.id, state: ExecutionState.COMPLETED, record, forwardOutput: outcome.output }
  }

  private async forward(run: ExecutionRun, amount: bigint, payload: string): Promise<ForwardOutcome> {
    try {
      await this.ledger.approve(this.forwarder.target, amount)
      run.approved = true
      return await this.forwarder.invoke(payload)
    } catch (e) {
      return { ok: false, error: errorMessage(e) }
    }
  }

  /**
   * The venue may already hold the funds, so nothing is returned to the principal. The spend is
   * committed so the daily limit still covers it.
   */
  private unconfirmed(run: ExecutionRun, res: Reservation, txHash: string, error: string): FatalInvariantError {
    this.policy.commit(res)
    getLogger().error({
      event: 'execution.forward_unconfirmed',
      executionId: run.id,
      principal: res.principal,
      amount: res.amount.toString(),
      tx_hash: txHash,
      err: error
    })
    return new FatalInvariantError('FATAL_FORWARD_UNCONFIRMED', { context: { execution_id: run.id, tx_hash: txHash } })
  }

  /** Undo fund movement: reset the venue approval, then hand pulled funds back. */
  private async rollback(run: ExecutionRun, principal: string, amount: bigint): Promise<void> {
    try {
      if (run.approved) {
        await this.ledger.approve(this.forwarder.target, 0n)
        run.approved = false
      }
      if (run.pulled) {
        await this.ledger.transfer(principal, amount)
        run.pulled = false
      }
    } catch (e) {
      getLogger().error({ event: 'execution.rollback_failed', executionId: run.id, principal, amount: amount.toString(), err: errorMessage(e) })
      throw new FatalInvariantError('FATAL_ROLLBACK_FAILED', { context: { execution_id: run.id } })
    }
  }

  private completionRecord(run: ExecutionRun, res: Reservation, now: number): ExecutionRecord {
    return {
      type: 'execution.completed',
      execution_id: run.id,
      principal: res.principal,
      kind: res.kind,
      amount: res.amount,
      day: res.day,
      forward_status: 'SUCCEEDED',
      received: { reported: false },
      ts: isoTime(now)
    }
  }

  /** Move the run to its terminal state and record why. Returns the error to rethrow. */
  private async terminate(run: ExecutionRun, e: unknown): Promise<ReasonedRejection> {
    const err = isReasonedRejection(e) ? e : this.internalError(run, e)
    const stage = run.stage
    if (!sm.isTerminal(run.state)) run.advance(terminalFor(run.state, err.terminalState), err.reason.code)

    countRejection(stage.toLowerCase(), err.reason.code)
    await appendRejection({
      ts: isoTime(this.clock()),
      corr_id: run.corrId,
      execution_id: run.id,
      stage: stage.toLowerCase(),
      terminal: run.state,
      reason: { code: err.reason.code, category: err.reason.category, http_status: err.reason.http_status, message: err.reason.message },
      context: err.reason.context
    })
    return err
  }

  private internalError(run: ExecutionRun, e: unknown): ReasonedRejection {
    getLogger().error({ event: 'execution.unexpected_error', executionId: run.id, stage: run.state, err: errorMessage(e) })
    // nothing outside the guarded transfer/forward steps moves funds, so an unexpected error is a refusal
    return new ReasonedRejection(reason('INTERNAL_ERROR'))
  }

  private emit(record: AuditRecord): void {
    const onFailure = (e: unknown) => {
      countAuditFailure(record.type)
      getLogger().warn({ event: 'audit.emit_failed', type: record.type, err: errorMessage(e) })
    }
    try {
      void Promise.resolve(this.auditSink.emit(record)).catch(onFailure)
    } catch (e) {
      onFailure(e)
    }
  }

  // --- administration -------------------------------------------------------------------------

  private assertAdmin(caller: string): string {
    if (!isAddress(caller) || getAddress(caller) !== this.admin) {
      getLogger().warn({ event: 'admin.unauthorized', caller })
      throw new ReasonedRejection(reason('ADMIN_UNAUTHORIZED'))
    }
    return this.admin
  }

  /** Admin writes share the execution guard; from inside an execution they would deadlock, so refuse. */
  private async exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.scope.getStore()) {
      throw new ReasonedRejection(reason('ENGINE_REENTRANT_CALL'))
    }
    return this.guard.runExclusive(fn)
  }

  async setPolicy(caller: string, principal: string, dailyLimit: bigint, capLike: bigint, capRecast: bigint): Promise<PolicyChangeRecord> {
    const by = this.assertAdmin(caller)
    const who = normalizePrincipal(principal)
    return this.exclusive(() => {
      const record = this.policy.setPolicy(who, dailyLimit, capLike, capRecast, by, this.clock())
      getLogger().info({ event: 'policy.changed', principal: who, daily_limit: dailyLimit.toString(), like: capLike.toString(), recast: capRecast.toString() })
      this.emit(record)
      return record
    })
  }

  /** Waits for the in-flight execution, then blocks every later one. */
  async pause(caller: string): Promise<PauseRecord> {
    const by = this.assertAdmin(caller)
    return this.exclusive(() => this.setPaused(true, by))
  }

  async unpause(caller: string): Promise<PauseRecord> {
    const by = this.assertAdmin(caller)
    return this.exclusive(() => this.setPaused(false, by))
  }

  private setPaused(paused: boolean, by: string): PauseRecord {
    this.paused = paused
    const record: PauseRecord = { type: paused ? 'engine.paused' : 'engine.unpaused', by, ts: isoTime(this.clock()) }
    getLogger().warn({ event: record.type, by })
    this.emit(record)
    return record
  }

  /** Send stray asset held by the executor (e.g. venue leftovers) to `to`. */
  async recoverAssets(caller: string, to: string, amount: bigint): Promise<RecoveryRecord> {
    const by = this.assertAdmin(caller)
    const dest = normalizePrincipal(to)
    if (amount <= 0n || amount > MaxUint256) {
      throw new ReasonedRejection(reason('CLIENT_BAD_REQUEST', { message: 'amount must be a positive uint256' }))
    }
    return this.exclusive(async () => {
      const held = await this.ledger.balanceOf(this.executor)
      if (amount > held) {
        throw new ReasonedRejection(reason('CLIENT_BAD_REQUEST', { message: 'amount exceeds the executor balance' }))
      }
      try {
        await this.ledger.transfer(dest, amount)
      } catch (e) {
        throw new ExecutionError('EXECUTION_TRANSFER_FAILED', e)
      }
      const record: RecoveryRecord = { type: 'assets.recovered', to: dest, amount, by, ts: isoTime(this.clock()) }
      getLogger().warn({ event: record.type, to: dest, amount: amount.toString(), by })
      this.emit(record)
      return record
    })
  }

  // --- queries --------------------------------------------------------------------------------

  spentToday(principal: string): { day: number; spent: bigint } {
    const day = dayIndex(this.clock())
    return { day, spent: this.policy.spentOn(normalizePrincipal(principal), day) }
  }

  getPolicy(principal: string): Policy {
    return this.policy.getPolicy(normalizePrincipal(principal))
  }

  isPaused(): boolean {
    return this.paused
  }
}

/** The error's own terminal state when reachable from here, else the nearest legal one. */
function terminalFor(from: ExecutionState, wanted: ExecutionState): ExecutionState {
  if (sm.can(from, wanted)) return wanted
  return sm.can(from, ExecutionState.FAILED) ? ExecutionState.FAILED : ExecutionState.REJECTED
}

function normalizePrincipal(value: string): string {
  if (!isAddress(value)) {
    throw new ReasonedRejection(reason('CLIENT_BAD_REQUEST', { message: 'not an EVM address' }))
  }
  return getAddress(value)
}
