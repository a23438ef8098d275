/**
 * Request authentication.
 * Operators present a shared API key. Admin writes are signed by the admin key (EIP-191) over
 * `adminMessage(timestamp, method, path, keccak256(body))`; the recovered address is handed to
 * the engine, which decides whether it is the admin. Each signed request is accepted once.
 */
import { timingSafeEqual } from 'crypto'
import { Request, Response, NextFunction } from 'express'
import { hashMessage, keccak256, toUtf8Bytes, verifyMessage } from 'ethers'
import { ADMIN_SIGNATURE_HEADER, ADMIN_TIMESTAMP_HEADER, OPERATOR_KEY_HEADER, adminMessage } from '@permit-relay/dto'
import { ReasonedRejection, reason } from '@permit-relay/reasons'
import { Clock, systemClock } from '../../utils/clock'
import { sendRejection } from '../envelope'

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given)
  const b = Buffer.from(expected)
  return a.length === b.length && timingSafeEqual(a, b)
}

export function requireOperator(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const given = req.header(OPERATOR_KEY_HEADER)
    if (!given || !sameKey(given, apiKey)) {
      req.log?.warn({ event: 'http.operator_unauthorized', path: req.path })
      return sendRejection(req, res, new ReasonedRejection(reason('CLIENT_UNAUTHORIZED')))
    }
    next()
  }
}

/**
 * Admin messages already accepted, keyed by their EIP-191 digest. An entry lives until its
 * timestamp leaves the validity window; after that the freshness check refuses it anyway.
 */
export class UsedAdminMessages {
  // digest -> unix seconds after which the entry can go
  private seen: Map<string, number> = new Map()

  /** False when `digest` was already claimed and has not expired. */
  claim(digest: string, expiresAt: number, now: number): boolean {
    for (const [key, exp] of this.seen) {
      if (exp < now) this.seen.delete(key)
    }
    if (this.seen.has(digest)) return false
    this.seen.set(digest, expiresAt)
    return true
  }

  get size(): number {
    return this.seen.size
  }
}

export function requireAdminSignature(ttlSeconds: number, clock: Clock = systemClock, used = new UsedAdminMessages()) {
  return (req: Request, res: Response, next: NextFunction) => {
    const unauthorized = (message: string) =>
      sendRejection(req, res, new ReasonedRejection(reason('CLIENT_UNAUTHORIZED', { message })))

    const ts = req.header(ADMIN_TIMESTAMP_HEADER)
    const signature = req.header(ADMIN_SIGNATURE_HEADER)
    if (!ts || !signature || !/^\d+$/.test(ts)) return unauthorized('Missing admin signature headers')

    const now = clock()
    if (Math.abs(now - Number(ts)) > ttlSeconds) return unauthorized('Admin signature is outside its validity window')

    const message = adminMessage(ts, req.method, req.path, keccak256(toUtf8Bytes(req.rawBody ?? '')))
    let caller: string
    try {
      caller = verifyMessage(message, signature)
    } catch {
      return unauthorized('Malformed admin signature')
    }
    if (!used.claim(hashMessage(message), Number(ts) + ttlSeconds, now)) {
      req.log?.warn({ event: 'http.admin_replay_refused', path: req.path, caller })
      return unauthorized('Admin signature has already been used')
    }
    req.adminCaller = caller
    next()
  }
}
