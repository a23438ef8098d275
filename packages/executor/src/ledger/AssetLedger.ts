/**
 * AssetLedger (external collaborator seam)
 * Purpose: the token contract that holds principals' funds and enforces one-time permits.
 * Authority: sole source of truth for custody and for authorization replay prevention; the engine never
 * second-guesses it. Every method resolves on success and throws on any ledger-level failure.
 */
import type { PermitDomain } from '@permit-relay/dto'

export interface AssetLedger {
  /** EIP-712 domain the ledger verifies permits against. */
  permitDomain(): Promise<PermitDomain>
  /** Next unused permit nonce for `owner`. */
  permitNonce(owner: string): Promise<bigint>
  /** Consume a signed permit, granting `spender` an allowance of `value` over `owner`'s funds. */
  registerAuthorization(owner: string, spender: string, value: bigint, deadline: bigint, signature: string): Promise<void>
  /** Move `amount` from `owner` to `to` using the executor's allowance. */
  pull(owner: string, to: string, amount: bigint): Promise<void>
  /** Set the executor's allowance for `spender` to exactly `amount`. */
  approve(spender: string, amount: bigint): Promise<void>
  /** Move `amount` of the executor's own balance to `to`. */
  transfer(to: string, amount: bigint): Promise<void>
  balanceOf(account: string): Promise<bigint>
}

export class LedgerError extends Error {
  constructor(message: string, public readonly txHash?: string) {
    super(message)
    this.name = 'LedgerError'
  }
}
