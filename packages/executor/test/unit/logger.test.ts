import { PassThrough } from 'stream'
import pino from 'pino'
import * as loggerModule from '../../src/utils/logger'

function makeCapture() {
  const stream = new PassThrough()
  const chunks: string[] = []
  stream.on('data', (c: Buffer) => chunks.push(c.toString()))
  return { stream, chunks }
}

function firstLine(chunks: string[]): Record<string, unknown> {
  const lines = chunks.join('').split(/\n/).filter(Boolean)
  expect(lines.length).toBeGreaterThan(0)
  return JSON.parse(lines[0])
}

describe('logger utilities', () => {
  let capture: ReturnType<typeof makeCapture>
  const original = loggerModule.getLogger()

  beforeEach(() => {
    capture = makeCapture()
    loggerModule.setLogger(pino({ level: 'info' }, capture.stream))
  })

  afterEach(() => {
    loggerModule.setLogger(original)
  })

  test('logTransition logs info for a forward step', () => {
    loggerModule.logTransition({ executionId: 'e1', from: 'VALIDATING', to: 'LIMIT_CHECKING', corr_id: 'c1', ts: '2024-01-01T00:00:00Z' })
    const parsed = firstLine(capture.chunks)
    expect(parsed.event).toBe('execution.transition')
    expect(parsed.executionId).toBe('e1')
    expect(parsed.to).toBe('LIMIT_CHECKING')
    expect(parsed.ts).toBe('2024-01-01T00:00:00Z')
    expect(parsed.level).toBe(30)
  })

  test.each(['REJECTED', 'ROLLED_BACK', 'FAILED'])('logTransition logs warn for %s', (to) => {
    loggerModule.logTransition({ executionId: 'e2', from: 'FORWARDING', to, reason_code: 'EXECUTION_FORWARD_FAILED' })
    const parsed = firstLine(capture.chunks)
    expect(parsed.reason_code).toBe('EXECUTION_FORWARD_FAILED')
    expect(parsed.level).toBe(40)
  })

  test('logHttp logs http.request, error level for 5xx', () => {
    loggerModule.logHttp({ path: '/execute', method: 'POST', status: 502, corr_id: 'c3', latency_ms: 12 })
    const parsed = firstLine(capture.chunks)
    expect(parsed.event).toBe('http.request')
    expect(parsed.path).toBe('/execute')
    expect(parsed.status).toBe(502)
    expect(parsed.level).toBe(50)
  })
})
