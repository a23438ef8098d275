/**
 * AuthorizationValidator
 * Checks that a signed EIP-2612 permit lets the executor move `amount` of the principal's funds,
 * then hands it to the asset ledger, which consumes the permit nonce.
 * Order (fail-closed): deadline → grant value → signature → ledger registration.
 * Holds no state: replay protection belongs to the ledger.
 */
import { getAddress, verifyTypedData } from 'ethers'
import { PERMIT_TYPES } from '@permit-relay/dto'
import { AuthorizationError } from '@permit-relay/reasons'
import type { AssetLedger } from '../ledger/AssetLedger'
import { errorMessage } from '../utils/errors'
import { getLogger } from '../utils/logger'
import { Clock, systemClock } from '../utils/clock'

export class AuthorizationValidator {
  private readonly executor: string

  constructor(private readonly ledger: AssetLedger, executor: string, private readonly clock: Clock = systemClock) {
    this.executor = getAddress(executor)
  }

  /**
   * @param value - amount the permit was signed for; defaults to `amount`
   * @returns the allowance registered on the ledger
   */
  async verify(principal: string, amount: bigint, deadline: bigint, signature: string, value: bigint = amount): Promise<bigint> {
    const now = BigInt(this.clock())
    if (now > deadline) {
      throw new AuthorizationError('AUTH_EXPIRED', { context: { deadline } })
    }

    if (value < amount) {
      throw new AuthorizationError('AUTH_INVALID_SIGNATURE', { message: 'Authorization covers less than the requested amount' })
    }

    const owner = getAddress(principal)
    const [domain, nonce] = await Promise.all([this.ledger.permitDomain(), this.ledger.permitNonce(owner)])

    let recovered: string
    try {
      recovered = verifyTypedData(domain, PERMIT_TYPES, { owner, spender: this.executor, value, nonce, deadline }, signature)
    } catch (e) {
      getLogger().debug({ event: 'auth.signature_malformed', principal: owner, err: errorMessage(e) })
      throw new AuthorizationError('AUTH_INVALID_SIGNATURE')
    }
    if (getAddress(recovered) !== owner) {
      throw new AuthorizationError('AUTH_INVALID_SIGNATURE')
    }

    try {
      await this.ledger.registerAuthorization(owner, this.executor, value, deadline, signature)
    } catch (e) {
      getLogger().warn({ event: 'auth.ledger_refused', principal: owner, err: errorMessage(e) })
      throw new AuthorizationError('AUTH_INSUFFICIENT_GRANT')
    }
    return value
  }
}
