import axios, { AxiosInstance, AxiosRequestConfig } from 'axios'
import { keccak256, toUtf8Bytes } from 'ethers'
import {
  ADMIN_SIGNATURE_HEADER,
  ADMIN_TIMESTAMP_HEADER,
  ErrorEnvelope,
  ExecuteRequestBody,
  ExecuteResponse,
  OPERATOR_KEY_HEADER,
  PolicyResponse,
  PolicyUpdateBody,
  RecoverBody,
  SpendResponse,
  adminMessage,
  isReasonCode
} from '@permit-relay/dto'
import { ClientErrorCode, logExecuteOutcome, retryDelay, shouldRetry, AuditWriter } from './retry'

export type Success<T> = { ok: true; status: number; data: T }

/** The executor answered with an ErrorEnvelope, or never answered usefully. */
export type Failure =
  | { ok: false; kind: 'rejected'; status: number; error: ErrorEnvelope }
  | { ok: false; kind: 'network'; error: { code: 'NETWORK_ERROR' | 'OUTCOME_UNKNOWN'; message: string } }

export type Result<T> = Success<T> | Failure

export function failureCode(f: Failure): ClientErrorCode {
  return f.kind === 'rejected' ? f.error.reason.code : f.error.code
}

function isErrorEnvelope(v: unknown): v is ErrorEnvelope {
  if (typeof v !== 'object' || v === null) return false
  const reason: unknown = Reflect.get(v, 'reason')
  if (typeof reason !== 'object' || reason === null) return false
  const code: unknown = Reflect.get(reason, 'code')
  return typeof code === 'string' && isReasonCode(code)
}

// connection-level failures that happen before any byte of the request is sent
const NOT_DELIVERED = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ENETUNREACH', 'EHOSTUNREACH'])

function transportFailure(e: unknown): Failure {
  const message = e instanceof Error ? e.message : String(e)
  const code = axios.isAxiosError(e) && e.code !== undefined && NOT_DELIVERED.has(e.code) ? 'NETWORK_ERROR' : 'OUTCOME_UNKNOWN'
  return { ok: false, kind: 'network', error: { code, message } }
}

export type ClientOptions = { timeoutMs?: number }

abstract class BaseClient {
  protected readonly http: AxiosInstance

  constructor(baseUrl: string, opts: ClientOptions = {}) {
    this.http = axios.create({
      baseURL: baseUrl.replace(/\/$/, ''),
      timeout: opts.timeoutMs ?? 15000,
      // every status is an answer; failures are mapped below rather than thrown
      validateStatus: () => true
    })
  }

  protected async send<T>(config: AxiosRequestConfig): Promise<Result<T>> {
    try {
      const res = await this.http.request<T>(config)
      if (res.status >= 200 && res.status < 300) return { ok: true, status: res.status, data: res.data }
      const body: unknown = res.data
      if (isErrorEnvelope(body)) return { ok: false, kind: 'rejected', status: res.status, error: body }
      return { ok: false, kind: 'network', error: { code: 'OUTCOME_UNKNOWN', message: `unexpected ${res.status} response` } }
    } catch (e) {
      return transportFailure(e)
    }
  }
}

export type RetryOptions = {
  maxAttempts?: number
  auditWriter?: AuditWriter
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** Operator-side client: submits executions and reads spend state. */
export class OperatorClient extends BaseClient {
  constructor(baseUrl: string, private readonly apiKey: string, opts?: ClientOptions) {
    super(baseUrl, opts)
  }

  execute(body: ExecuteRequestBody, corrId?: string): Promise<Result<ExecuteResponse>> {
    const headers: Record<string, string> = { [OPERATOR_KEY_HEADER]: this.apiKey }
    if (corrId) headers['x-corr-id'] = corrId
    return this.send<ExecuteResponse>({ method: 'POST', url: '/execute', data: body, headers })
  }

  /**
   * Execute with the default retry policy. `build` is called once per attempt because a permit is
   * consumed even when the forward fails: each attempt must carry a freshly signed grant.
   * A timeout or dropped connection ends the loop with OUTCOME_UNKNOWN: resubmitting could run the
   * same action twice.
   */
  async executeWithRetry(build: (attempt: number) => Promise<ExecuteRequestBody>, opts: RetryOptions = {}): Promise<Result<ExecuteResponse>> {
    const maxAttempts = opts.maxAttempts ?? 3
    const sleep = opts.sleep ?? defaultSleep
    for (let attempt = 0; ; attempt++) {
      const res = await this.execute(await build(attempt))
      if (res.ok) {
        await logExecuteOutcome({ ok: true, execution_id: res.data.execution_id, attempt, auditWriter: opts.auditWriter })
        return res
      }
      const code = failureCode(res)
      const last = attempt + 1 >= maxAttempts || !shouldRetry(code)
      const delay = last ? undefined : retryDelay(code, attempt)
      await logExecuteOutcome({ ok: false, code, attempt, auditWriter: opts.auditWriter, nextRetryMs: delay })
      if (delay === undefined) return res
      await sleep(delay)
    }
  }

  spentToday(principal: string): Promise<Result<SpendResponse>> {
    return this.send<SpendResponse>({ method: 'GET', url: `/spend/${principal}`, headers: { [OPERATOR_KEY_HEADER]: this.apiKey } })
  }

  getPolicy(principal: string): Promise<Result<PolicyResponse>> {
    return this.send<PolicyResponse>({ method: 'GET', url: `/policy/${principal}`, headers: { [OPERATOR_KEY_HEADER]: this.apiKey } })
  }
}

/** The slice of an ethers Signer the admin client needs; a Wallet satisfies it. */
export interface MessageSigner {
  signMessage(message: string): Promise<string>
}

/** Admin audit records as the executor returns them: integers are decimal strings. */
export type AdminRecord = { type: string; by: string; ts: string } & Record<string, unknown>

export type AdminClientOptions = ClientOptions & {
  /** Unix seconds; defaults to the system clock. */
  clock?: () => number
}

/** Signs each admin request over its timestamp, method, path and exact body bytes. */
export class AdminClient extends BaseClient {
  private readonly clock: () => number

  constructor(baseUrl: string, private readonly signer: MessageSigner, opts: AdminClientOptions = {}) {
    super(baseUrl, opts)
    this.clock = opts.clock ?? (() => Math.floor(Date.now() / 1000))
  }

  setPolicy(principal: string, body: PolicyUpdateBody): Promise<Result<AdminRecord>> {
    return this.signed('PUT', `/admin/policy/${principal}`, JSON.stringify(body))
  }

  pause(): Promise<Result<AdminRecord>> {
    return this.signed('POST', '/admin/pause')
  }

  unpause(): Promise<Result<AdminRecord>> {
    return this.signed('POST', '/admin/unpause')
  }

  recover(body: RecoverBody): Promise<Result<AdminRecord>> {
    return this.signed('POST', '/admin/recover', JSON.stringify(body))
  }

  private async signed(method: 'PUT' | 'POST', path: string, body?: string): Promise<Result<AdminRecord>> {
    const ts = this.clock()
    const signature = await this.signer.signMessage(adminMessage(ts, method, path, keccak256(toUtf8Bytes(body ?? ''))))
    const headers: Record<string, string> = {
      [ADMIN_TIMESTAMP_HEADER]: String(ts),
      [ADMIN_SIGNATURE_HEADER]: signature
    }
    if (body !== undefined) headers['Content-Type'] = 'application/json'
    return this.send<AdminRecord>({ method, url: path, data: body, headers })
  }
}
