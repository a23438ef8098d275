import { Registry, Counter, Histogram } from 'prom-client'

let registry: Registry
let transitionCounter: Counter<string>
let rejectionCounter: Counter<string>
let executionHistogram: Histogram<string>
let auditFailureCounter: Counter<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  transitionCounter = new Counter({
    name: 'transition_counter',
    help: 'Counts execution state transitions',
    labelNames: ['from', 'to'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'rejection_counter',
    help: 'Counts refused or rolled back executions by stage and reason',
    labelNames: ['stage', 'reason'],
    registers: [registry]
  })

  executionHistogram = new Histogram({
    name: 'execution_histogram',
    help: 'End-to-end execution latency by terminal state (ms)',
    labelNames: ['terminal'],
    buckets: [10, 50, 100, 200, 500, 1000, 5000, 15000],
    registers: [registry]
  })

  auditFailureCounter = new Counter({
    name: 'audit_emit_failures',
    help: 'Audit records a sink failed to accept',
    labelNames: ['type'],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function getRegistry(): Registry {
  return registry
}

export function countTransition(from: string, to: string) {
  transitionCounter.labels({ from, to }).inc()
}

export function countRejection(stage: string, reason: string) {
  rejectionCounter.labels({ stage, reason }).inc()
}

export function observeExecution(terminal: string, ms: number) {
  executionHistogram.labels({ terminal }).observe(ms)
}

export function countAuditFailure(type: string) {
  auditFailureCounter.labels({ type }).inc()
}
