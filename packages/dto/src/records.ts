import { ActionKind } from './enums'

/**
 * What the executor knows about the destination-side amount of a forwarded call.
 * The forwarding venue pays the principal directly, so the engine never observes it;
 * consumers must reconcile settlement amounts from chain data, not from this record.
 */
export type ReceivedAmount = { reported: false } | { reported: true; amount: bigint }

export interface ExecutionRecord {
  type: 'execution.completed'
  execution_id: string
  principal: string
  kind: ActionKind
  amount: bigint
  day: number
  forward_status: 'SUCCEEDED'
  received: ReceivedAmount
  ts: string
}

export interface PolicyChangeRecord {
  type: 'policy.changed'
  principal: string
  daily_limit: bigint
  action_caps: Record<ActionKind, bigint>
  by: string
  ts: string
}

export interface PauseRecord {
  type: 'engine.paused' | 'engine.unpaused'
  by: string
  ts: string
}

export interface RecoveryRecord {
  type: 'assets.recovered'
  to: string
  amount: bigint
  by: string
  ts: string
}

export type AuditRecord = ExecutionRecord | PolicyChangeRecord | PauseRecord | RecoveryRecord
