/**
 * AuditSink
 * Pure output channel for completion, policy, pause and recovery records.
 * Sinks may throw or reject; the engine contains those failures so an unreachable sink never fails an
 * execution. Redelivery belongs to the downstream pipeline.
 */
import { promises as fs } from 'fs'
import path from 'path'
import type { AuditRecord } from '@permit-relay/dto'
import { getLogger } from '../utils/logger'
import { stringifyBigInt, toJsonSafe } from '../utils/json'

export interface AuditSink {
  emit(record: AuditRecord): void | Promise<void>
}

/** Writes each record as a structured log line. */
export class PinoAuditSink implements AuditSink {
  emit(record: AuditRecord): void {
    getLogger().info({ event: 'audit', record: toJsonSafe(record) })
  }
}

/** Appends each record to <dir>/<file> as one JSON line. */
export class JsonlAuditSink implements AuditSink {
  private readonly file: string

  constructor(private readonly dir: string, file = 'audit.jsonl') {
    this.file = path.join(dir, file)
  }

  async emit(record: AuditRecord): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true })
    await fs.appendFile(this.file, stringifyBigInt(record) + '\n')
  }
}

/** Fans a record out to every sink; rejects once all have settled if any of them failed. */
export class CompositeAuditSink implements AuditSink {
  constructor(private readonly sinks: AuditSink[]) {}

  async emit(record: AuditRecord): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async (s) => s.emit(record)))
    const failures = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []))
    if (failures.length) {
      throw new AggregateError(failures, `${failures.length} of ${this.sinks.length} audit sinks failed`)
    }
  }
}

export const noopAuditSink: AuditSink = { emit: () => undefined }
