/**
 * PolicyStore
 * Purpose: per-principal spend limits and the rolling daily-spend ledger.
 * Precedence (fail-closed): kind → action configured → action cap → daily configured → daily cap.
 * checkAndReserve() is read-only; only commit() and setPolicy() mutate, and the engine calls both
 * under its execution guard.
 */
import { MaxUint256 } from 'ethers'
import { ActionKind, ACTION_KINDS, PolicyChangeRecord } from '@permit-relay/dto'
import { PolicyError, FatalInvariantError, ReasonedRejection, reason } from '@permit-relay/reasons'
import { isoTime } from '../utils/clock'

export const SECONDS_PER_DAY = 86400

/** UTC day index: whole days since the Unix epoch. */
export function dayIndex(unixSeconds: number): number {
  return Math.floor(unixSeconds / SECONDS_PER_DAY)
}

export interface Policy {
  dailyLimit: bigint
  actionCaps: Record<ActionKind, bigint>
}

/** Result of a successful limit check, committed verbatim once the forward succeeds. */
export interface Reservation {
  principal: string
  kind: ActionKind
  amount: bigint
  day: number
  newTotal: bigint
}

const UNSET: Policy = { dailyLimit: 0n, actionCaps: { [ActionKind.LIKE]: 0n, [ActionKind.RECAST]: 0n } }

export function parseActionKind(tag: string): ActionKind {
  const kind = ACTION_KINDS.find((k) => k === tag)
  if (kind === undefined) {
    throw new PolicyError('POLICY_UNKNOWN_ACTION_KIND', { context: { kind: tag } })
  }
  return kind
}

function assertUint256(value: bigint, field: string): void {
  if (value < 0n || value > MaxUint256) {
    throw new ReasonedRejection(reason('CLIENT_BAD_REQUEST', { message: `${field} is outside the uint256 range` }))
  }
}

export class PolicyStore {
  private policies = new Map<string, Policy>()
  // `${principal}:${day}` -> cumulative spend
  private ledger = new Map<string, bigint>()

  private key(principal: string): string {
    return principal.toLowerCase()
  }

  private ledgerKey(principal: string, day: number): string {
    return `${this.key(principal)}:${day}`
  }

  getPolicy(principal: string): Policy {
    const p = this.policies.get(this.key(principal)) ?? UNSET
    return { dailyLimit: p.dailyLimit, actionCaps: { ...p.actionCaps } }
  }

  spentOn(principal: string, day: number): bigint {
    return this.ledger.get(this.ledgerKey(principal, day)) ?? 0n
  }

  checkAndReserve(principal: string, kindTag: ActionKind | string, amount: bigint, now: number): Reservation {
    const kind = parseActionKind(kindTag)
    assertUint256(amount, 'amount')
    const policy = this.getPolicy(principal)

    const cap = policy.actionCaps[kind]
    if (cap === 0n) {
      throw new PolicyError('POLICY_ACTION_NOT_CONFIGURED', { context: { kind } })
    }
    if (amount > cap) {
      throw new PolicyError('POLICY_ACTION_CAP_EXCEEDED', { context: { kind, amount } })
    }

    if (policy.dailyLimit === 0n) {
      throw new PolicyError('POLICY_DAILY_NOT_CONFIGURED')
    }
    const day = dayIndex(now)
    const newTotal = this.spentOn(principal, day) + amount
    if (newTotal > MaxUint256 || newTotal > policy.dailyLimit) {
      throw new PolicyError('POLICY_DAILY_CAP_EXCEEDED', { context: { amount, day } })
    }

    return { principal, kind, amount, day, newTotal }
  }

  /**
   * Record a completed execution. Must run exactly once per success, after the forward call.
   * Any disagreement with the reservation means the ledger moved underneath the engine.
   */
  commit(res: Reservation): bigint {
    const k = this.ledgerKey(res.principal, res.day)
    const next = (this.ledger.get(k) ?? 0n) + res.amount
    if (next > MaxUint256) {
      throw new FatalInvariantError('FATAL_LEDGER_OVERFLOW', { context: { day: res.day } })
    }
    if (next !== res.newTotal || next > this.getPolicy(res.principal).dailyLimit) {
      throw new FatalInvariantError('FATAL_POSTCONDITION', { context: { day: res.day } })
    }
    this.ledger.set(k, next)
    return next
  }

  /** Overwrite all three limits at once. Zero leaves a limit unconfigured. */
  setPolicy(principal: string, dailyLimit: bigint, capLike: bigint, capRecast: bigint, by: string, now: number): PolicyChangeRecord {
    assertUint256(dailyLimit, 'daily_limit')
    assertUint256(capLike, 'action_caps.like')
    assertUint256(capRecast, 'action_caps.recast')
    const actionCaps = { [ActionKind.LIKE]: capLike, [ActionKind.RECAST]: capRecast }
    this.policies.set(this.key(principal), { dailyLimit, actionCaps })
    return {
      type: 'policy.changed',
      principal,
      daily_limit: dailyLimit,
      action_caps: { ...actionCaps },
      by,
      ts: isoTime(now)
    }
  }
}
