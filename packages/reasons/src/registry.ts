/**
 * Reasons Registry
 * Centralizes all machine-parsable rejection codes for the executor.
 * Each entry is stable and consumed by operators and dashboards to interpret failures deterministically.
 */
import { ReasonCode, ReasonDetail, REASONS as DTO_REASONS } from '@permit-relay/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export type { ReasonDetail }
