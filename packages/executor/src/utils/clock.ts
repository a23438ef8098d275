/** Unix time in whole seconds. Injected so tests can pin day boundaries and deadlines. */
export type Clock = () => number

export const systemClock: Clock = () => Math.floor(Date.now() / 1000)

/** RFC3339 UTC timestamp for a clock reading. */
export function isoTime(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString()
}
