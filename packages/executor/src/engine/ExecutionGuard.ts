/**
 * ExecutionGuard
 * - single process-wide FIFO mutex
 * - serializes the whole execution sequence and every administrative write
 * - not re-entrant: the engine refuses nested calls before they reach acquire()
 */
export class ExecutionGuard {
  private queue: Array<() => void> = []

  /** Resolves with a release function once the lock is held. Releasing twice is a no-op. */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      let released = false
      const grant = () =>
        resolve(() => {
          if (released) return
          released = true
          this.release()
        })
      this.queue.push(grant)
      // If we're the only waiter, acquire immediately
      if (this.queue.length === 1) grant()
    })
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  get locked(): boolean {
    return this.queue.length > 0
  }

  /** Callers waiting behind the current holder. */
  get waiting(): number {
    return Math.max(0, this.queue.length - 1)
  }

  private release() {
    // Remove current holder and wake the next waiter
    this.queue.shift()
    const next = this.queue[0]
    if (next) next()
  }
}
