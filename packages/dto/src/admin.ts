/**
 * Admin request authentication.
 * The admin key signs (EIP-191) a line binding the request to a time, method, path and body hash;
 * both the executor and the SDK build it here so the two sides never drift.
 */
export const ADMIN_TIMESTAMP_HEADER = 'x-admin-timestamp'
export const ADMIN_SIGNATURE_HEADER = 'x-admin-signature'
export const OPERATOR_KEY_HEADER = 'x-api-key'

export function adminMessage(timestamp: number | string, method: string, path: string, bodyHash: string): string {
  return `permit-relay-admin:${timestamp}:${method.toUpperCase()}:${path}:${bodyHash}`
}
