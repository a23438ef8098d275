/**
 * EIP-2612 Permit typed-data definition.
 * Principals sign this struct for the executor's address; the asset ledger consumes the nonce.
 */
export type TypedField = { name: string; type: string }

export const PERMIT_TYPES: Record<string, TypedField[]> = {
  Permit: [
    { name: 'owner', type: 'address' },
    { name: 'spender', type: 'address' },
    { name: 'value', type: 'uint256' },
    { name: 'nonce', type: 'uint256' },
    { name: 'deadline', type: 'uint256' },
  ],
}

export interface PermitDomain {
  name: string
  version: string
  chainId: bigint
  verifyingContract: string
}

export interface PermitMessage {
  owner: string
  spender: string
  value: bigint
  nonce: bigint
  deadline: bigint
}
