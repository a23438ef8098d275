// src/config.ts

/**
 * Centralized configuration: environment file loading plus a validated, typed view of the settings.
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { getAddress, isAddress } from 'ethers'

// Resolve package root for both ts-jest (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

export const ENV_FILE = '.env.permit-relay'

/** Load `.env.permit-relay` from the package root, falling back to cwd. Existing variables win. */
export function loadEnvFile(): string | undefined {
  const candidateEnvPaths = [
    path.join(packageRoot, ENV_FILE),
    path.join(process.cwd(), ENV_FILE)
  ]
  for (const p of candidateEnvPaths) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p })
      return p
    }
  }
  return undefined
}

const address = z
  .string()
  .refine((v) => isAddress(v), { message: 'not an EVM address' })
  .transform((v) => getAddress(v))

const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.string().default('info'),

  RPC_URL: z.string().url(),
  CHAIN_ID: z.coerce.number().int().positive(),
  // signing key of the executor account that receives permits and holds funds mid-execution
  EXECUTOR_PRIVATE_KEY: z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'expected 0x-prefixed 32-byte hex'),

  TOKEN_ADDRESS: address,
  TOKEN_PERMIT_VERSION: z.string().default('1'),
  FORWARD_TARGET: address,

  ADMIN_ADDRESS: address,
  ADMIN_SIGNATURE_TTL_S: z.coerce.number().int().positive().default(300),
  OPERATOR_API_KEY: z.string().min(8),

  AUDIT_LOG_DIR: z.string().default('logs'),

  // Optional payload recipient guard, e.g. "function swap(address recipient, bytes route)"
  FORWARD_RECIPIENT_FUNCTION: z.string().optional(),
  FORWARD_RECIPIENT_ARG: z.coerce.number().int().min(0).default(0)
})

export type AppConfig = z.infer<typeof ConfigSchema>

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const res = ConfigSchema.safeParse(env)
  if (!res.success) {
    throw new ConfigError(res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`))
  }
  return res.data
}
