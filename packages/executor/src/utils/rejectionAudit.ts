import { promises as fs } from 'fs'
import path from 'path'
import { getLogger } from './logger'

export type RejectionEntry = {
  ts: string
  corr_id?: string
  execution_id: string
  stage: string
  terminal: string
  reason: { code: string; category: string; http_status: number; message: string }
  context?: Record<string, unknown>
}

let baseDir = path.join(process.cwd(), 'logs')

export function setRejectionDir(dir: string) {
  baseDir = dir
}

/**
 * rejectionAudit
 * Appends a single JSONL record for every execution that ended REJECTED, ROLLED_BACK or FAILED.
 * File: <dir>/rejections.jsonl. Write failures are logged, never thrown.
 */
export async function appendRejection(entry: RejectionEntry): Promise<void> {
  try {
    await fs.mkdir(baseDir, { recursive: true })
    const file = path.join(baseDir, 'rejections.jsonl')
    await fs.appendFile(file, JSON.stringify(entry) + '\n')
  } catch (e) {
    getLogger().error({ event: 'rejection_audit.write_failed', err: e instanceof Error ? e.message : String(e) })
  }
}
