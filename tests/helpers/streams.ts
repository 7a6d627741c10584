// tests/helpers/streams.ts — Byte source doubles for parser and session tests

const encoder = new TextEncoder()

/** Convert a string to an AsyncIterable<Uint8Array> (single chunk) */
export function toStream(text: string): AsyncIterable<Uint8Array> {
  return toChunkedStream(text, Math.max(1, encoder.encode(text).length))
}

/** Split text into chunks of given size to simulate TCP fragmentation */
export function toChunkedStream(text: string, chunkSize: number): AsyncIterable<Uint8Array> {
  const bytes = encoder.encode(text)
  const chunks: Uint8Array[] = []
  for (let i = 0; i < bytes.length; i += chunkSize) {
    chunks.push(bytes.slice(i, i + chunkSize))
  }
  return {
    [Symbol.asyncIterator]() {
      let idx = 0
      return {
        async next() {
          if (idx >= chunks.length) return { done: true, value: undefined }
          return { done: false, value: chunks[idx++] }
        },
      }
    },
  }
}

type Pending = {
  resolve: (result: IteratorResult<Uint8Array>) => void
  reject: (err: Error) => void
}

/**
 * Hand-driven byte source: the test pushes text, ends it, or breaks it
 * with an error, and reads block until one of those happens.
 */
export class ByteChannel implements AsyncIterable<Uint8Array> {
  private readonly queue: Array<IteratorResult<Uint8Array> | Error> = []
  private readonly waiters: Pending[] = []
  cancelled = false

  push(text: string): this {
    return this.deliver({ done: false, value: encoder.encode(text) })
  }

  end(): this {
    return this.deliver({ done: true, value: undefined })
  }

  fail(err: Error): this {
    return this.deliver(err)
  }

  private deliver(item: IteratorResult<Uint8Array> | Error): this {
    const waiter = this.waiters.shift()
    if (!waiter) {
      this.queue.push(item)
    } else if (item instanceof Error) {
      waiter.reject(item)
    } else {
      waiter.resolve(item)
    }
    return this
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return {
      next: () => {
        const item = this.queue.shift()
        if (item instanceof Error) return Promise.reject(item)
        if (item) return Promise.resolve(item)
        return new Promise<IteratorResult<Uint8Array>>((resolve, reject) => {
          this.waiters.push({ resolve, reject })
        })
      },
      return: async () => {
        this.cancelled = true
        return { done: true, value: undefined }
      },
    }
  }
}
