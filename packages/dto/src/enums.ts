export enum ExecutionState {
  VALIDATING = "VALIDATING",
  LIMIT_CHECKING = "LIMIT_CHECKING",
  TRANSFERRING = "TRANSFERRING",
  FORWARDING = "FORWARDING",
  COMMITTING = "COMMITTING",
  COMPLETED = "COMPLETED",
  REJECTED = "REJECTED",
  ROLLED_BACK = "ROLLED_BACK",
  FAILED = "FAILED",
}

export enum ActionKind {
  LIKE = "like",
  RECAST = "recast",
}

export const ACTION_KINDS: readonly ActionKind[] = [ActionKind.LIKE, ActionKind.RECAST];

export enum ReasonCategory {
  CLIENT = "CLIENT",
  AUTHORIZATION = "AUTHORIZATION",
  POLICY = "POLICY",
  VALIDATION = "VALIDATION",
  EXECUTION = "EXECUTION",
  ENGINE = "ENGINE",
  ADMIN = "ADMIN",
  FATAL = "FATAL",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "CLIENT_BAD_REQUEST"
  | "CLIENT_UNAUTHORIZED"
  | "CLIENT_NOT_FOUND"
  | "AUTH_EXPIRED"
  | "AUTH_INVALID_SIGNATURE"
  | "AUTH_INSUFFICIENT_GRANT"
  | "POLICY_UNKNOWN_ACTION_KIND"
  | "POLICY_ACTION_NOT_CONFIGURED"
  | "POLICY_ACTION_CAP_EXCEEDED"
  | "POLICY_DAILY_NOT_CONFIGURED"
  | "POLICY_DAILY_CAP_EXCEEDED"
  | "VALIDATION_RECIPIENT_MISMATCH"
  | "EXECUTION_TRANSFER_FAILED"
  | "EXECUTION_FORWARD_FAILED"
  | "ENGINE_PAUSED"
  | "ENGINE_REENTRANT_CALL"
  | "ADMIN_UNAUTHORIZED"
  | "FATAL_LEDGER_OVERFLOW"
  | "FATAL_POSTCONDITION"
  | "FATAL_ROLLBACK_FAILED"
  | "FATAL_FORWARD_UNCONFIRMED"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  http_status: number;
  message: string;
  context?: Record<string, string | number | boolean>;
}

export interface ErrorEnvelope {
  corr_id: string;
  execution_id?: string;
  state: ExecutionState;
  reason: ReasonDetail;
  ts: string; // RFC3339 UTC
}
