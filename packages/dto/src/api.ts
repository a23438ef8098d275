import { ExecutionState } from './enums'

// JSON shapes on the HTTP surface. Integers travel as decimal strings.

export interface ExecuteRequestBody {
  principal: string
  amount: string
  kind: string
  grant: {
    value?: string
    deadline: string
    signature: string
  }
  payload: string
}

export interface ExecuteResponse {
  execution_id: string
  state: ExecutionState
  principal: string
  kind: string
  amount: string
  day: number
  received: { reported: false } | { reported: true; amount: string }
}

export interface SpendResponse {
  principal: string
  day: number
  spent: string
  daily_limit: string
}

export interface PolicyResponse {
  principal: string
  daily_limit: string
  action_caps: { like: string; recast: string }
}

export interface PolicyUpdateBody {
  daily_limit: string
  action_caps: { like: string; recast: string }
}

export interface RecoverBody {
  to: string
  amount: string
}
