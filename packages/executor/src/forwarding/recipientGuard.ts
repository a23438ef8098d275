import { Interface, getAddress, isAddress } from 'ethers'

/** Returns the address a forwarding payload pays out to, or undefined when it cannot tell. */
export type RecipientExtractor = (payload: string) => string | undefined

/**
 * Builds an extractor from a human-readable ABI fragment, e.g.
 * `function swap(address recipient, bytes route)` with argIndex 0.
 */
export function createRecipientExtractor(fragment: string, argIndex: number): RecipientExtractor {
  const iface = new Interface([fragment])
  return (payload: string) => {
    try {
      const parsed = iface.parseTransaction({ data: payload })
      if (!parsed || argIndex >= parsed.args.length) return undefined
      const arg: unknown = parsed.args[argIndex]
      return typeof arg === 'string' && isAddress(arg) ? getAddress(arg) : undefined
    } catch {
      // undecodable payload: caller treats as mismatch
      return undefined
    }
  }
}
