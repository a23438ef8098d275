import fs from 'fs'
import os from 'os'
import path from 'path'
import { Interface } from 'ethers'
import { Registry } from 'prom-client'
import { ExecutionState } from '@permit-relay/dto'
import { ReasonedRejection } from '@permit-relay/reasons'
import { ExecutionEngine } from '../../src/engine/ExecutionEngine'
import { ContractForwarder, ForwardingRunner } from '../../src/forwarding/ForwardingIntegration'
import { createRecipientExtractor } from '../../src/forwarding/recipientGuard'
import { setRejectionDir } from '../../src/utils/rejectionAudit'
import * as metrics from '../../src/utils/metrics'
import { ADMIN, ALICE, BOB, DAY0, EXECUTOR, Harness, VENUE, buildHarness, requestFor, signGrant } from '../support/fixtures'

async function settle(predicate: () => boolean) {
  for (let i = 0; i < 100 && !predicate(); i++) {
    await new Promise((r) => setImmediate(r))
  }
}

function ops(h: Harness): string[] {
  return h.token.calls.map((c) => c.op)
}

describe('ExecutionEngine', () => {
  let h: Harness
  let reg: Registry

  beforeAll(() => {
    setRejectionDir(fs.mkdtempSync(path.join(os.tmpdir(), 'engine-rejections-')))
  })

  beforeEach(async () => {
    reg = new Registry()
    metrics.setRegistry(reg)
    h = buildHarness()
    h.token.mint(ALICE.address, 1000n)
    h.token.mint(BOB.address, 1000n)
    await h.engine.setPolicy(ADMIN.address, ALICE.address, 100n, 60n, 60n)
  })

  test('limit 100 / cap 60: 50 ok, 61 over cap, 50 ok, 1 over daily limit', async () => {
    const first = await h.engine.execute(await requestFor(h, ALICE, 50n))
    expect(first.state).toBe(ExecutionState.COMPLETED)
    expect(h.engine.spentToday(ALICE.address)).toEqual({ day: DAY0, spent: 50n })

    await expect(h.engine.execute(await requestFor(h, ALICE, 61n))).rejects.toMatchObject({
      reason: { code: 'POLICY_ACTION_CAP_EXCEEDED' },
      terminalState: ExecutionState.REJECTED
    })

    await h.engine.execute(await requestFor(h, ALICE, 50n))
    expect(h.engine.spentToday(ALICE.address).spent).toBe(100n)

    await expect(h.engine.execute(await requestFor(h, ALICE, 1n))).rejects.toMatchObject({
      reason: { code: 'POLICY_DAILY_CAP_EXCEEDED' }
    })
    expect(h.engine.spentToday(ALICE.address).spent).toBe(100n)
    expect(h.token.balance(ALICE.address)).toBe(900n)
    expect(h.token.balance(VENUE)).toBe(100n)
  })

  test('completion record carries an unreported received amount', async () => {
    const res = await h.engine.execute(await requestFor(h, ALICE, 40n, 'recast'))
    expect(res.executionId).toBe('exec_1')
    expect(res.record).toEqual({
      type: 'execution.completed',
      execution_id: 'exec_1',
      principal: ALICE.address,
      kind: 'recast',
      amount: 40n,
      day: DAY0,
      forward_status: 'SUCCEEDED',
      received: { reported: false },
      ts: '2023-11-14T22:13:20.000Z'
    })
    expect(h.sink.records.map((r) => r.type)).toEqual(['policy.changed', 'execution.completed'])
    expect(h.forwarder.payloads).toEqual(['0xabcdef'])
  })

  test('forward failure restores funds, resets approval and leaves the ledger untouched', async () => {
    h.forwarder.enqueue({ ok: false, error: 'venue reverted' })
    await expect(h.engine.execute(await requestFor(h, ALICE, 30n))).rejects.toMatchObject({
      reason: { code: 'EXECUTION_FORWARD_FAILED' },
      terminalState: ExecutionState.ROLLED_BACK
    })
    expect(h.token.balance(ALICE.address)).toBe(1000n)
    expect(h.token.balance(EXECUTOR.address)).toBe(0n)
    expect(h.token.allowance(EXECUTOR.address, VENUE)).toBe(0n)
    expect(h.engine.spentToday(ALICE.address).spent).toBe(0n)
    expect(h.token.calls).toEqual([
      { op: 'registerAuthorization', args: [ALICE.address, EXECUTOR.address, '30'] },
      { op: 'pull', args: [ALICE.address, EXECUTOR.address, '30'] },
      { op: 'approve', args: [VENUE, '30'] },
      { op: 'approve', args: [VENUE, '0'] },
      { op: 'transfer', args: [ALICE.address, '30'] }
    ])
  })

  test('a throwing venue is treated as a forward failure', async () => {
    h.forwarder.enqueue(new Error('socket hang up'))
    await expect(h.engine.execute(await requestFor(h, ALICE, 30n))).rejects.toMatchObject({
      reason: { code: 'EXECUTION_FORWARD_FAILED' }
    })
    expect(h.token.balance(ALICE.address)).toBe(1000n)
  })

  test('a forward sent but never confirmed is not compensated and still counts', async () => {
    h.token.mint(EXECUTOR.address, 500n)
    h.forwarder.enqueue(async () => {
      h.token.spendAllowance(EXECUTOR.address, VENUE)
      return { ok: false, error: 'forward tx 0xf0 unconfirmed: timeout', pendingTx: '0xf0' }
    })
    await expect(h.engine.execute(await requestFor(h, ALICE, 50n))).rejects.toMatchObject({
      reason: { code: 'FATAL_FORWARD_UNCONFIRMED', context: { execution_id: 'exec_1', tx_hash: '0xf0' } },
      terminalState: ExecutionState.FAILED
    })
    expect(h.token.balance(ALICE.address)).toBe(950n)
    expect(h.token.balance(VENUE)).toBe(50n)
    expect(h.token.balance(EXECUTOR.address)).toBe(500n)
    expect(h.engine.spentToday(ALICE.address).spent).toBe(50n)
    expect(ops(h)).toEqual(['registerAuthorization', 'pull', 'approve'])
  })

  test('a contract forward whose receipt is lost leaves the funds where they are', async () => {
    const runner: ForwardingRunner = {
      call: async () => '0x',
      sendTransaction: async () => {
        h.token.spendAllowance(EXECUTOR.address, VENUE)
        return { hash: '0xf0', wait: async () => { throw new Error('request timeout') } }
      }
    }
    let seq = 0
    const engine = new ExecutionEngine({
      ledger: h.token,
      forwarder: new ContractForwarder(runner, VENUE),
      executor: EXECUTOR.address,
      admin: ADMIN.address,
      clock: () => h.clock.now,
      idFactory: () => `exec_c${++seq}`
    })
    await engine.setPolicy(ADMIN.address, ALICE.address, 100n, 60n, 60n)
    h.token.mint(EXECUTOR.address, 500n)

    await expect(engine.execute(await requestFor(h, ALICE, 50n))).rejects.toMatchObject({
      reason: { code: 'FATAL_FORWARD_UNCONFIRMED' },
      terminalState: ExecutionState.FAILED
    })
    expect(h.token.balance(ALICE.address)).toBe(950n)
    expect(h.token.balance(VENUE)).toBe(50n)
    expect(h.token.balance(EXECUTOR.address)).toBe(500n)
    expect(engine.spentToday(ALICE.address)).toEqual({ day: DAY0, spent: 50n })
  })

  test('failed pull moves nothing and rolls back', async () => {
    h.token.failNext.set('pull', new Error('rpc unavailable'))
    await expect(h.engine.execute(await requestFor(h, ALICE, 30n))).rejects.toMatchObject({
      reason: { code: 'EXECUTION_TRANSFER_FAILED' },
      terminalState: ExecutionState.ROLLED_BACK
    })
    expect(ops(h)).toEqual(['registerAuthorization', 'pull'])
    expect(h.token.balance(ALICE.address)).toBe(1000n)
  })

  test('failed compensation ends FAILED', async () => {
    h.forwarder.enqueue({ ok: false, error: 'venue reverted' })
    h.token.failNext.set('transfer', new Error('nonce too low'))
    await expect(h.engine.execute(await requestFor(h, ALICE, 30n))).rejects.toMatchObject({
      reason: { code: 'FATAL_ROLLBACK_FAILED', context: { execution_id: 'exec_1' } },
      terminalState: ExecutionState.FAILED
    })
    expect(h.token.balance(EXECUTOR.address)).toBe(30n)
  })

  test('a grant cannot be used twice', async () => {
    const req = await requestFor(h, ALICE, 10n)
    await h.engine.execute(req)
    await expect(h.engine.execute(req)).rejects.toMatchObject({ reason: { code: 'AUTH_INVALID_SIGNATURE' } })
    expect(h.engine.spentToday(ALICE.address).spent).toBe(10n)
  })

  test('expired grant is refused before the policy store is consulted', async () => {
    const req = await requestFor(h, ALICE, 10n)
    h.clock.now += 3601
    await expect(h.engine.execute(req)).rejects.toMatchObject({
      reason: { code: 'AUTH_EXPIRED', context: { deadline: String(req.grant.deadline) } }
    })
    expect(h.token.calls).toEqual([])
    expect(h.engine.spentToday(ALICE.address).spent).toBe(0n)
  })

  test('deadline equal to now is still valid', async () => {
    const req = await requestFor(h, ALICE, 10n)
    h.clock.now += 3600
    const res = await h.engine.execute(req)
    expect(res.state).toBe(ExecutionState.COMPLETED)
  })

  test('grant signed for a different spender is invalid', async () => {
    const grant = await signGrant(h.token, ALICE, 10n, BigInt(h.clock.now + 60), BOB.address)
    await expect(
      h.engine.execute({ principal: ALICE.address, amount: 10n, kind: 'like', grant, payload: '0x' })
    ).rejects.toMatchObject({ reason: { code: 'AUTH_INVALID_SIGNATURE' } })
  })

  test('grant smaller than the amount is invalid', async () => {
    const grant = await signGrant(h.token, ALICE, 5n, BigInt(h.clock.now + 60))
    await expect(
      h.engine.execute({ principal: ALICE.address, amount: 10n, kind: 'like', grant, payload: '0x' })
    ).rejects.toMatchObject({ reason: { code: 'AUTH_INVALID_SIGNATURE' } })
    expect(h.token.calls).toEqual([])
  })

  test('ledger refusing the permit is an insufficient grant', async () => {
    h.token.failNext.set('registerAuthorization', new Error('permit reverted'))
    await expect(h.engine.execute(await requestFor(h, ALICE, 10n))).rejects.toMatchObject({
      reason: { code: 'AUTH_INSUFFICIENT_GRANT' },
      terminalState: ExecutionState.REJECTED
    })
  })

  test('unconfigured principal is rejected before any fund movement', async () => {
    await expect(h.engine.execute(await requestFor(h, BOB, 10n))).rejects.toMatchObject({
      reason: { code: 'POLICY_ACTION_NOT_CONFIGURED' }
    })
    await h.engine.setPolicy(ADMIN.address, BOB.address, 0n, 50n, 50n)
    await expect(h.engine.execute(await requestFor(h, BOB, 10n))).rejects.toMatchObject({
      reason: { code: 'POLICY_DAILY_NOT_CONFIGURED' }
    })
    expect(ops(h)).toEqual(['registerAuthorization', 'registerAuthorization'])
    expect(h.token.balance(BOB.address)).toBe(1000n)
  })

  test('unknown action kind is rejected', async () => {
    await expect(h.engine.execute(await requestFor(h, ALICE, 10n, 'boost'))).rejects.toMatchObject({
      reason: { code: 'POLICY_UNKNOWN_ACTION_KIND', context: { kind: 'boost' } }
    })
  })

  test('malformed principal is a bad request', async () => {
    const req = await requestFor(h, ALICE, 10n)
    await expect(h.engine.execute({ ...req, principal: 'alice' })).rejects.toMatchObject({
      reason: { code: 'CLIENT_BAD_REQUEST' }
    })
  })

  test('one day index per execution even when the clock crosses midnight mid-flight', async () => {
    h.forwarder.enqueue(async () => {
      h.clock.now += 86400
      return { ok: true, output: '0x01' }
    })
    const res = await h.engine.execute(await requestFor(h, ALICE, 20n))
    expect(res.record.day).toBe(DAY0)
    expect(res.record.ts).toBe('2023-11-14T22:13:20.000Z')
    expect(res.forwardOutput).toBe('0x01')
    expect(h.engine.spentToday(ALICE.address)).toEqual({ day: DAY0 + 1, spent: 0n })
  })

  test('pause waits for the in-flight execution and blocks later ones', async () => {
    let openVenue: () => void = () => undefined
    const gate = new Promise<void>((r) => {
      openVenue = r
    })
    h.forwarder.enqueue(async () => {
      await gate
      return { ok: true, output: '0x' }
    })

    const inflight = h.engine.execute(await requestFor(h, ALICE, 10n))
    await settle(() => h.forwarder.payloads.length === 1)
    const pausing = h.engine.pause(ADMIN.address)
    await settle(() => false)
    expect(h.engine.isPaused()).toBe(false)

    openVenue()
    const [done, record] = await Promise.all([inflight, pausing])
    expect(done.state).toBe(ExecutionState.COMPLETED)
    expect(record).toMatchObject({ type: 'engine.paused', by: ADMIN.address })
    expect(h.engine.isPaused()).toBe(true)

    await expect(h.engine.execute(await requestFor(h, ALICE, 10n))).rejects.toMatchObject({
      reason: { code: 'ENGINE_PAUSED' }
    })

    await h.engine.unpause(ADMIN.address)
    const after = await h.engine.execute(await requestFor(h, ALICE, 10n))
    expect(after.state).toBe(ExecutionState.COMPLETED)
  })

  test('concurrent executions run one at a time', async () => {
    await h.engine.setPolicy(ADMIN.address, BOB.address, 100n, 60n, 60n)
    const [a, b] = await Promise.all([requestFor(h, ALICE, 10n), requestFor(h, BOB, 20n)])
    await Promise.all([h.engine.execute(a), h.engine.execute(b)])
    expect(ops(h)).toEqual(['registerAuthorization', 'pull', 'approve', 'registerAuthorization', 'pull', 'approve'])
  })

  test('calls from inside an execution are refused', async () => {
    const inner = await requestFor(h, BOB, 5n)
    const seen: unknown[] = []
    h.forwarder.enqueue(async () => {
      seen.push(await h.engine.execute(inner).catch((e: unknown) => e))
      seen.push(await h.engine.pause(ADMIN.address).catch((e: unknown) => e))
      return { ok: true, output: '0x' }
    })
    const res = await h.engine.execute(await requestFor(h, ALICE, 10n))
    expect(res.state).toBe(ExecutionState.COMPLETED)
    expect(seen).toHaveLength(2)
    for (const e of seen) {
      expect(e).toBeInstanceOf(ReasonedRejection)
      expect(e).toMatchObject({ reason: { code: 'ENGINE_REENTRANT_CALL' } })
    }
    expect(h.engine.isPaused()).toBe(false)
  })

  test('audit sink failure does not fail the execution', async () => {
    h.sink.failWith = new Error('sink offline')
    const res = await h.engine.execute(await requestFor(h, ALICE, 10n))
    expect(res.state).toBe(ExecutionState.COMPLETED)
    const json = await reg.getMetricsAsJSON()
    const failures = json.find((m) => m.name === 'audit_emit_failures')
    expect(failures?.values.map((v) => [v.labels, v.value])).toEqual([[{ type: 'execution.completed' }, 1]])
  })

  test('transitions and rejections are counted', async () => {
    await h.engine.execute(await requestFor(h, ALICE, 10n))
    await expect(h.engine.execute(await requestFor(h, ALICE, 70n))).rejects.toBeInstanceOf(ReasonedRejection)
    const json = await reg.getMetricsAsJSON()
    const transitions = json.find((m) => m.name === 'transition_counter')
    const done = transitions?.values.find((v) => v.labels.from === 'COMMITTING' && v.labels.to === 'COMPLETED')
    expect(done?.value).toBe(1)
    const rejections = json.find((m) => m.name === 'rejection_counter')
    expect(rejections?.values.map((v) => [v.labels, v.value])).toEqual([
      [{ stage: 'limit_checking', reason: 'POLICY_ACTION_CAP_EXCEEDED' }, 1]
    ])
  })

  describe('recipient guard', () => {
    const swap = new Interface(['function swap(address recipient, bytes route)'])

    beforeEach(async () => {
      h = buildHarness({ recipientOf: createRecipientExtractor('function swap(address recipient, bytes route)', 0) })
      h.token.mint(ALICE.address, 1000n)
      await h.engine.setPolicy(ADMIN.address, ALICE.address, 100n, 60n, 60n)
    })

    test('payload paying the principal passes', async () => {
      const payload = swap.encodeFunctionData('swap', [ALICE.address, '0x'])
      const res = await h.engine.execute(await requestFor(h, ALICE, 10n, 'like', payload))
      expect(res.state).toBe(ExecutionState.COMPLETED)
    })

    test('payload paying someone else is refused before the permit is used', async () => {
      const payload = swap.encodeFunctionData('swap', [BOB.address, '0x'])
      await expect(h.engine.execute(await requestFor(h, ALICE, 10n, 'like', payload))).rejects.toMatchObject({
        reason: { code: 'VALIDATION_RECIPIENT_MISMATCH' }
      })
      expect(h.token.calls).toEqual([])
    })
  })

  describe('administration', () => {
    test('only the admin may change policy', async () => {
      await expect(h.engine.setPolicy(BOB.address, BOB.address, 1n, 1n, 1n)).rejects.toMatchObject({
        reason: { code: 'ADMIN_UNAUTHORIZED' }
      })
      await expect(h.engine.pause('not-an-address')).rejects.toMatchObject({ reason: { code: 'ADMIN_UNAUTHORIZED' } })
    })

    test('setPolicy overwrites all limits and is audited', async () => {
      const record = await h.engine.setPolicy(ADMIN.address.toLowerCase(), ALICE.address.toLowerCase(), 500n, 0n, 250n)
      expect(record).toEqual({
        type: 'policy.changed',
        principal: ALICE.address,
        daily_limit: 500n,
        action_caps: { like: 0n, recast: 250n },
        by: ADMIN.address,
        ts: '2023-11-14T22:13:20.000Z'
      })
      expect(h.engine.getPolicy(ALICE.address)).toEqual({ dailyLimit: 500n, actionCaps: { like: 0n, recast: 250n } })
      expect(h.sink.records).toHaveLength(2)
    })

    test('recoverAssets sends stray executor funds', async () => {
      h.token.mint(EXECUTOR.address, 30n)
      const record = await h.engine.recoverAssets(ADMIN.address, BOB.address, 20n)
      expect(record).toMatchObject({ type: 'assets.recovered', to: BOB.address, amount: 20n, by: ADMIN.address })
      expect(h.token.balance(BOB.address)).toBe(1020n)
      expect(h.token.balance(EXECUTOR.address)).toBe(10n)
    })

    test('recoverAssets refuses more than the executor holds', async () => {
      h.token.mint(EXECUTOR.address, 30n)
      await expect(h.engine.recoverAssets(ADMIN.address, BOB.address, 31n)).rejects.toMatchObject({
        reason: { code: 'CLIENT_BAD_REQUEST', message: 'amount exceeds the executor balance' }
      })
      await expect(h.engine.recoverAssets(ADMIN.address, BOB.address, 0n)).rejects.toMatchObject({
        reason: { code: 'CLIENT_BAD_REQUEST' }
      })
    })
  })
})
