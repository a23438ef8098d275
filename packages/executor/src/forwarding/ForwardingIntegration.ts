/**
 * ForwardingIntegration (external collaborator seam)
 * Purpose: the fixed, pre-agreed venue that receives the pulled funds (e.g. a swap router).
 * The engine treats the payload as opaque calldata and only distinguishes success, failure and
 * a sent call whose result never came back.
 */
import { getLogger } from '../utils/logger'
import { errorMessage } from '../utils/errors'

export type ForwardOutcome =
  | { ok: true; output: string }
  /** `pendingTx` is set when the call was broadcast but its result is unknown; such a failure must not be compensated. */
  | { ok: false; error: string; pendingTx?: string }

export interface ForwardingIntegration {
  /** Address the executor approves before invoking. Fixed by configuration. */
  readonly target: string
  invoke(payload: string): Promise<ForwardOutcome>
}

type CallRequest = { to: string; data: string }
type ForwardReceipt = { status: number | null }
type SentForward = { hash: string; wait(): Promise<ForwardReceipt | null> }

/** The slice of an ethers Signer the forwarder needs. A connected Wallet satisfies it. */
export interface ForwardingRunner {
  call(tx: CallRequest): Promise<string>
  sendTransaction(tx: CallRequest): Promise<SentForward>
}

/**
 * ContractForwarder
 * Dry-runs the payload with eth_call to capture the return bytes and surface reverts
 * without spending gas, then sends it and waits for the receipt.
 * Once the transaction is out, only a mined receipt decides the outcome: a lost receipt is
 * reported with `pendingTx`, never as a plain failure.
 */
export class ContractForwarder implements ForwardingIntegration {
  constructor(private readonly runner: ForwardingRunner, public readonly target: string) {}

  async invoke(payload: string): Promise<ForwardOutcome> {
    const req = { to: this.target, data: payload }
    let output: string
    try {
      output = await this.runner.call(req)
    } catch (e) {
      return { ok: false, error: `dry-run reverted: ${errorMessage(e)}` }
    }

    let tx: SentForward
    try {
      tx = await this.runner.sendTransaction(req)
    } catch (e) {
      return { ok: false, error: errorMessage(e) }
    }

    let receipt: ForwardReceipt | null
    try {
      receipt = await tx.wait()
    } catch (e) {
      getLogger().error({ event: 'forward.unconfirmed', target: this.target, tx_hash: tx.hash, err: errorMessage(e) })
      return { ok: false, error: `forward tx ${tx.hash} unconfirmed: ${errorMessage(e)}`, pendingTx: tx.hash }
    }
    if (!receipt) {
      getLogger().error({ event: 'forward.unconfirmed', target: this.target, tx_hash: tx.hash })
      return { ok: false, error: `forward tx ${tx.hash} has no receipt`, pendingTx: tx.hash }
    }
    if (receipt.status !== 1) {
      return { ok: false, error: `forward tx ${tx.hash} reverted` }
    }
    getLogger().info({ event: 'forward.sent', target: this.target, tx_hash: tx.hash })
    return { ok: true, output }
  }
}
