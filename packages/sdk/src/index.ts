export { OperatorClient, AdminClient, failureCode } from './client'
export type { Result, Success, Failure, ClientOptions, AdminClientOptions, AdminRecord, MessageSigner, RetryOptions } from './client'
export { shouldRetry, retryDelay, logExecuteOutcome } from './retry'
export type { ClientErrorCode, AuditWriter, ExecuteOutcomeInfo } from './retry'
