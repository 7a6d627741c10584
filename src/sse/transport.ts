// src/sse/transport.ts — Transport seam for the event source
//
// The session never touches the network itself: it hands a request descriptor
// to an EventStreamTransport and reads the body it gets back. FetchTransport is
// the default, built on the runtime's fetch.

import { StreamClosedError } from "./errors.js"

// --- Request / response shapes ---

/** Outbound request, produced fresh by the caller's factory for every attempt. */
export interface EventSourceRequest {
  url: string
  method?: "GET" | "POST"
  headers?: Record<string, string>
  body?: string
}

export interface TransportResponse {
  status: number
  statusText: string
  headers: Record<string, string>
  body: AsyncIterable<Uint8Array>
  /** Release the body. A read pending on `body` must settle promptly. */
  close(): Promise<void>
}

export interface SendOptions {
  /** Aborted when the session closes while the request is still in flight. */
  signal?: AbortSignal
}

export interface EventStreamTransport {
  /** Must reject promptly once `options.signal` aborts before the response arrives. */
  send(request: EventSourceRequest, options?: SendOptions): Promise<TransportResponse>
}

// --- Status classification ---

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504])

export function isSuccessStatus(status: number): boolean {
  return status === 200
}

/** Server errors that trigger a transparent reconnect instead of failing. */
export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status)
}

// --- Header helpers ---

/** Set a header, replacing any existing spelling of the same name. */
export function setHeader(headers: Record<string, string>, name: string, value: string): void {
  const lower = name.toLowerCase()
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) {
      delete headers[key]
    }
  }
  headers[name] = value
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase()
  return Object.keys(headers).some((key) => key.toLowerCase() === lower)
}

// --- Closable body ---

/**
 * Wraps a byte source so that close() rejects a pending read with
 * StreamClosedError immediately, whatever the underlying source does with
 * the cancellation.
 */
export class ClosableBody implements AsyncIterable<Uint8Array> {
  private readonly iterator: AsyncIterator<Uint8Array>
  private readonly closedSignal: Promise<never>
  private rejectClosed: (err: Error) => void = () => {}
  private closed = false

  constructor(source: AsyncIterable<Uint8Array>) {
    this.iterator = source[Symbol.asyncIterator]()
    this.closedSignal = new Promise<never>((_, reject) => {
      this.rejectClosed = reject
    })
    // keeps an unobserved rejection from surfacing when nobody is reading
    this.closedSignal.catch(() => undefined)
  }

  get isClosed(): boolean {
    return this.closed
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.rejectClosed(new StreamClosedError())
    if (this.iterator.return) {
      // the underlying iterator may hold the read that was just interrupted;
      // cancellation completes in the background
      this.iterator.return().catch(() => undefined)
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return {
      next: () => {
        if (this.closed) {
          return Promise.reject(new StreamClosedError())
        }
        return Promise.race([this.iterator.next(), this.closedSignal])
      },
      return: async () => {
        await this.close()
        return { done: true, value: undefined }
      },
    }
  }
}

// --- FetchTransport ---

export interface FetchTransportConfig {
  /** Custom fetch implementation (tests, in-process servers). Default: global fetch */
  fetch?: typeof globalThis.fetch
}

const EMPTY_BODY: AsyncIterable<Uint8Array> = {
  [Symbol.asyncIterator]() {
    return {
      async next() {
        return { done: true, value: undefined }
      },
    }
  },
}

/**
 * Default transport over fetch. Each response gets its own AbortController;
 * close() aborts it and interrupts any pending body read. The caller's signal
 * is linked to the same controller, so a request still waiting for response
 * headers is abandoned when the session closes.
 */
export class FetchTransport implements EventStreamTransport {
  private readonly _fetch: typeof globalThis.fetch

  constructor(config: FetchTransportConfig = {}) {
    this._fetch = config.fetch ?? globalThis.fetch
  }

  async send(request: EventSourceRequest, options: SendOptions = {}): Promise<TransportResponse> {
    const headers: Record<string, string> = { ...request.headers }
    if (!hasHeader(headers, "Accept")) {
      headers["Accept"] = "text/event-stream"
    }
    if (!hasHeader(headers, "Cache-Control")) {
      headers["Cache-Control"] = "no-cache"
    }

    const abortController = new AbortController()
    const onAbort = (): void => abortController.abort()
    if (options.signal?.aborted) {
      abortController.abort()
    }
    options.signal?.addEventListener("abort", onAbort, { once: true })

    let res: Response
    try {
      res = await this._fetch(request.url, {
        method: request.method ?? "GET",
        headers,
        body: request.body,
        signal: abortController.signal,
      })
    } finally {
      options.signal?.removeEventListener("abort", onAbort)
    }

    const responseHeaders: Record<string, string> = {}
    res.headers.forEach((v, k) => { responseHeaders[k] = v })

    const body = new ClosableBody(res.body ?? EMPTY_BODY)

    return {
      status: res.status,
      statusText: res.statusText,
      headers: responseHeaders,
      body,
      close: async () => {
        await body.close()
        abortController.abort()
      },
    }
  }
}
