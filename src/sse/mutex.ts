// src/sse/mutex.ts — Promise-chain async mutex

/**
 * Serializes async critical sections. Callers run in arrival order; the lock
 * is released when fn settles, whether it resolved or threw.
 */
export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve()

  /** Acquire the lock, execute fn, then release. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })

    // Enqueue behind current chain
    const prev = this.chain
    this.chain = gate

    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
