/** JSON.stringify that writes bigint as a decimal string. */
export function stringifyBigInt(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
}

/** Plain-JSON copy of a value with every bigint turned into a decimal string. */
export function toJsonSafe(value: unknown): unknown {
  return JSON.parse(stringifyBigInt(value))
}
