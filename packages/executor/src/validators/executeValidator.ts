/* Validates HTTP bodies for the executor surface.
   Integers arrive as decimal strings and leave as bigint; action kinds stay strings so the
   policy store can refuse unknown ones with its own reason code. */

import { z } from 'zod'
import type { ExecutionRequest } from '../engine/ExecutionEngine'

const uint = z
  .string()
  .regex(/^\d{1,78}$/, 'expected a non-negative decimal integer')
  .transform((v) => BigInt(v))

const hexBytes = z.string().regex(/^0x([0-9a-fA-F]{2})*$/, 'expected 0x-prefixed hex bytes')

export const ExecuteRequestSchema = z.object({
  principal: z.string().min(1),
  amount: uint,
  kind: z.string().min(1),
  grant: z.object({
    value: uint.optional(),
    deadline: uint,
    signature: hexBytes
  }),
  payload: hexBytes
})

export const PolicyUpdateSchema = z.object({
  daily_limit: uint,
  action_caps: z.object({ like: uint, recast: uint })
})

export const RecoverSchema = z.object({
  to: z.string().min(1),
  amount: uint
})

export type PolicyUpdate = z.infer<typeof PolicyUpdateSchema>
export type Recover = z.infer<typeof RecoverSchema>

type Validation<T> = { valid: true; value: T } | { valid: false; error: string }

function validate<S extends z.ZodTypeAny>(schema: S, body: unknown): Validation<z.output<S>> {
  const res = schema.safeParse(body)
  if (!res.success) return { valid: false, error: res.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ') }
  return { valid: true, value: res.data }
}

export function validateExecuteRequest(body: unknown): Validation<ExecutionRequest> {
  return validate(ExecuteRequestSchema, body)
}

export function validatePolicyUpdate(body: unknown): Validation<PolicyUpdate> {
  return validate(PolicyUpdateSchema, body)
}

export function validateRecover(body: unknown): Validation<Recover> {
  return validate(RecoverSchema, body)
}
