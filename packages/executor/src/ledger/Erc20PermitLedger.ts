import { Contract, Signature, type ContractRunner } from 'ethers'
import type { PermitDomain } from '@permit-relay/dto'
import { AssetLedger, LedgerError } from './AssetLedger'
import { getLogger } from '../utils/logger'

export const ERC20_PERMIT_ABI = [
  'function name() view returns (string)',
  'function nonces(address owner) view returns (uint256)',
  'function balanceOf(address account) view returns (uint256)',
  'function permit(address owner, address spender, uint256 value, uint256 deadline, uint8 v, bytes32 r, bytes32 s)',
  'function transferFrom(address from, address to, uint256 value) returns (bool)',
  'function approve(address spender, uint256 value) returns (bool)',
  'function transfer(address to, uint256 value) returns (bool)'
]

/** The slice of an ethers Contract this adapter calls; lets tests substitute a scripted token. */
export interface TokenContract {
  getFunction(name: string): (...args: unknown[]) => Promise<unknown>
}

type SentTx = { hash: string; wait: (confirms?: number) => Promise<{ status: number | null } | null> }

function isSentTx(v: unknown): v is SentTx {
  if (typeof v !== 'object' || v === null) return false
  return typeof Reflect.get(v, 'hash') === 'string' && typeof Reflect.get(v, 'wait') === 'function'
}

function asBigInt(v: unknown, what: string): bigint {
  if (typeof v === 'bigint') return v
  throw new LedgerError(`unexpected ${what} result from token`)
}

function bindContract(c: Contract): TokenContract {
  return {
    getFunction: (name: string) => {
      const fn = c.getFunction(name)
      return (...args: unknown[]) => fn(...args)
    }
  }
}

export type Erc20PermitLedgerOptions = {
  token: string
  chainId: number
  version: string
  runner?: ContractRunner
  contract?: TokenContract
  confirmations?: number
}

/**
 * Erc20PermitLedger
 * - EIP-2612 token adapter on ethers v6
 * - transactions are sent from the connected runner (the executor wallet)
 * - every write waits for its receipt; a missing or reverted receipt is a LedgerError
 */
export class Erc20PermitLedger implements AssetLedger {
  private readonly contract: TokenContract
  private readonly token: string
  private readonly chainId: number
  private readonly version: string
  private readonly confirmations: number
  private cachedName?: string

  constructor(opts: Erc20PermitLedgerOptions) {
    this.token = opts.token
    this.chainId = opts.chainId
    this.version = opts.version
    this.confirmations = opts.confirmations ?? 1
    this.contract = opts.contract ?? bindContract(new Contract(opts.token, ERC20_PERMIT_ABI, opts.runner ?? null))
  }

  async permitDomain(): Promise<PermitDomain> {
    if (this.cachedName === undefined) {
      const name = await this.contract.getFunction('name')()
      if (typeof name !== 'string') throw new LedgerError('unexpected name result from token')
      this.cachedName = name
    }
    return { name: this.cachedName, version: this.version, chainId: BigInt(this.chainId), verifyingContract: this.token }
  }

  async permitNonce(owner: string): Promise<bigint> {
    return asBigInt(await this.contract.getFunction('nonces')(owner), 'nonces')
  }

  async balanceOf(account: string): Promise<bigint> {
    return asBigInt(await this.contract.getFunction('balanceOf')(account), 'balanceOf')
  }

  async registerAuthorization(owner: string, spender: string, value: bigint, deadline: bigint, signature: string): Promise<void> {
    const sig = Signature.from(signature)
    await this.send('permit', [owner, spender, value, deadline, sig.v, sig.r, sig.s])
  }

  async pull(owner: string, to: string, amount: bigint): Promise<void> {
    await this.send('transferFrom', [owner, to, amount])
  }

  async approve(spender: string, amount: bigint): Promise<void> {
    await this.send('approve', [spender, amount])
  }

  async transfer(to: string, amount: bigint): Promise<void> {
    await this.send('transfer', [to, amount])
  }

  private async send(method: string, args: unknown[]): Promise<void> {
    const tx = await this.contract.getFunction(method)(...args)
    if (!isSentTx(tx)) throw new LedgerError(`${method}: token did not return a transaction`)
    const receipt = await tx.wait(this.confirmations)
    if (!receipt || receipt.status !== 1) {
      throw new LedgerError(`${method} reverted`, tx.hash)
    }
    getLogger().debug({ event: 'ledger.tx', method, tx_hash: tx.hash })
  }
}
