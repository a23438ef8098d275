import { Wallet, getAddress } from 'ethers'
import { PERMIT_TYPES } from '@permit-relay/dto'
import { ExecutionEngine, AuthorizationGrant, ExecutionRequest } from '../../src/engine/ExecutionEngine'
import type { RecipientExtractor } from '../../src/forwarding/recipientGuard'
import { InMemoryPermitToken } from './InMemoryPermitToken'
import { ScriptedForwarder } from './ScriptedForwarder'
import { MemoryAuditSink } from './MemoryAuditSink'

// Placeholder keys; never funded anywhere.
export const ADMIN = new Wallet('0x' + 'aa'.repeat(32))
export const EXECUTOR = new Wallet('0x' + 'ee'.repeat(32))
export const ALICE = new Wallet('0x' + 'a1'.repeat(32))
export const BOB = new Wallet('0x' + 'b0'.repeat(32))
export const VENUE = getAddress('0x' + '77'.repeat(20))

/** 2023-11-14T22:13:20Z, day index 19675 */
export const T0 = 1_700_000_000
export const DAY0 = 19675

export type Harness = {
  engine: ExecutionEngine
  token: InMemoryPermitToken
  forwarder: ScriptedForwarder
  sink: MemoryAuditSink
  clock: { now: number }
}

export function buildHarness(opts: { recipientOf?: RecipientExtractor } = {}): Harness {
  const clock = { now: T0 }
  const token = new InMemoryPermitToken(EXECUTOR.address)
  const forwarder = new ScriptedForwarder(VENUE, token)
  const sink = new MemoryAuditSink()
  let seq = 0
  const engine = new ExecutionEngine({
    ledger: token,
    forwarder,
    executor: EXECUTOR.address,
    admin: ADMIN.address,
    auditSink: sink,
    clock: () => clock.now,
    recipientOf: opts.recipientOf,
    idFactory: () => `exec_${++seq}`
  })
  return { engine, token, forwarder, sink, clock }
}

/** Sign an EIP-2612 permit over the token's current nonce for `owner`. */
export async function signGrant(
  token: InMemoryPermitToken,
  owner: Wallet,
  value: bigint,
  deadline: bigint,
  spender: string = EXECUTOR.address
): Promise<AuthorizationGrant> {
  const nonce = await token.permitNonce(owner.address)
  const signature = await owner.signTypedData(await token.permitDomain(), PERMIT_TYPES, {
    owner: owner.address,
    spender,
    value,
    nonce,
    deadline
  })
  return { value, deadline, signature }
}

export async function requestFor(
  h: Harness,
  owner: Wallet,
  amount: bigint,
  kind = 'like',
  payload = '0xabcdef'
): Promise<ExecutionRequest> {
  const grant = await signGrant(h.token, owner, amount, BigInt(h.clock.now + 3600))
  return { principal: owner.address, amount, kind, grant, payload }
}
