// src/sse/event-source.ts — Reconnecting event source session
//
// Owns at most one (response, parser) pair. next() reconnects through
// transport failures and retryable statuses, resuming with Last-Event-ID.
// close() may be called from another task while next() is blocked reading.

import type { SSEEvent } from "./event.js"
import { EventParser } from "./parser.js"
import { AsyncMutex } from "./mutex.js"
import { BadResponseError, ClosedSourceError, EventStreamEndedError } from "./errors.js"
import {
  FetchTransport,
  isRetryableStatus,
  isSuccessStatus,
  setHeader,
  type EventSourceRequest,
  type EventStreamTransport,
  type TransportResponse,
} from "./transport.js"
import { createEventSourceLogger, type EventSourceLogger } from "../logger.js"

export const LAST_EVENT_ID_HEADER = "Last-Event-ID"

/** Used when neither the stream nor the options supply a retry interval. */
export const FALLBACK_RETRY_INTERVAL_MS = 1000

/** Largest delay setTimeout honors; longer intervals are capped to it. */
export const MAX_RETRY_INTERVAL_MS = 2_147_483_647

export interface EventSourceOptions {
  /** Called for every connection attempt, including retries. */
  createRequest: () => EventSourceRequest
  /** Default: FetchTransport over the global fetch */
  transport?: EventStreamTransport
  /** Delay between attempts until the stream sends a retry directive. */
  defaultRetryIntervalMs?: number
  /** Resumption token for the first connect. Default: "" */
  lastEventId?: string
  logger?: EventSourceLogger
  sleep?: (ms: number) => Promise<void>
}

interface ActiveStream {
  response: TransportResponse
  parser: EventParser
}

/**
 * Client side of a server-sent event stream.
 *
 * Call connect() up front or let the first next() do it. Once next() reports
 * the end of the stream, or close() is called, further next() calls fail with
 * ClosedSourceError until connect() is called again.
 *
 * Backoff is a constant interval: the last positive `retry` directive seen on
 * the stream, else `defaultRetryIntervalMs`, else one second. Either is
 * capped at MAX_RETRY_INTERVAL_MS.
 */
export class EventSource implements AsyncIterable<SSEEvent> {
  private readonly createRequest: () => EventSourceRequest
  private readonly transport: EventStreamTransport
  private readonly defaultRetryIntervalMs: number | undefined
  private readonly logger: EventSourceLogger
  private readonly sleep: (ms: number) => Promise<void>
  private readonly mutex = new AsyncMutex()

  // guarded by mutex
  private current: ActiveStream | null = null
  private lastEventId: string
  private retryIntervalMs: number | undefined
  private closed = false
  private closeEpoch = 0

  // set while transport.send is in flight; close() aborts it without the mutex
  private inFlight: AbortController | null = null

  constructor(options: EventSourceOptions) {
    this.createRequest = options.createRequest
    this.transport = options.transport ?? new FetchTransport()
    this.defaultRetryIntervalMs = options.defaultRetryIntervalMs
    this.lastEventId = options.lastEventId ?? ""
    this.logger = options.logger ?? createEventSourceLogger()
    this.sleep = options.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)))
  }

  /**
   * Open the stream unless one is already open. Retries transport failures
   * and retryable statuses forever; rejects with BadResponseError on any
   * other status, or ClosedSourceError if close() is called meanwhile.
   */
  async connect(): Promise<void> {
    await this.open(true)
  }

  /** Read the next event, reconnecting as needed. */
  async next(): Promise<SSEEvent> {
    if (this.closed) {
      throw new ClosedSourceError()
    }

    while (true) {
      const stream = await this.open(false)

      let event: SSEEvent
      try {
        event = await stream.parser.next()
      } catch (err) {
        if (err instanceof EventStreamEndedError) {
          await this.mutex.runExclusive(async () => {
            if (this.current !== stream) {
              // close() won the race; the transport may have reported it as a clean end
              if (this.closed) throw new ClosedSourceError()
              return
            }
            this.logger.log("stream_ended", { last_event_id: this.lastEventId })
            await this.shutdown(false)
          })
          throw err
        }

        const interrupted = await this.mutex.runExclusive(async () => {
          if (this.closed) return true
          if (this.current === stream) {
            this.current = null
            await this.release(stream.response)
          }
          return false
        })
        if (interrupted) {
          throw new ClosedSourceError()
        }

        const delayMs = this.currentRetryInterval()
        this.logger.logError("stream_error", err, { last_event_id: this.lastEventId, delay_ms: delayMs })
        await this.sleep(delayMs)
        continue
      }

      await this.mutex.runExclusive(() => {
        this.lastEventId = event.id
        if (event.retryIntervalMs !== undefined && event.retryIntervalMs > 0) {
          this.retryIntervalMs = event.retryIntervalMs
        }
      })
      return event
    }
  }

  /**
   * Close the source and release the open stream, if any. Idempotent. A
   * next() blocked on a read, or a connection attempt still waiting for its
   * response, rejects with ClosedSourceError.
   */
  async close(): Promise<void> {
    this.inFlight?.abort()
    await this.mutex.runExclusive(() => this.shutdown(true))
    this.logger.log("closed", { last_event_id: this.lastEventId })
  }

  /** Yields events until the stream ends or the source is closed. */
  async *[Symbol.asyncIterator](): AsyncGenerator<SSEEvent> {
    while (true) {
      try {
        yield await this.next()
      } catch (err) {
        if (err instanceof EventStreamEndedError || err instanceof ClosedSourceError) return
        throw err
      }
    }
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  /**
   * Connect loop shared by connect() and next(). An explicit connect may
   * reopen a closed source but gives up if close() is called after it
   * started; next() gives up as soon as the source is closed.
   */
  private async open(explicit: boolean): Promise<ActiveStream> {
    const epoch = this.closeEpoch
    let attempt = 0

    while (true) {
      const stream = await this.mutex.runExclusive(async () => {
        if (explicit ? this.closeEpoch !== epoch : this.closed) {
          throw new ClosedSourceError()
        }
        if (this.current) return this.current

        attempt++
        return this.attempt(attempt)
      })
      if (stream) return stream

      await this.sleep(this.currentRetryInterval())
    }
  }

  /** One connection attempt; null means wait and retry. Caller holds the mutex. */
  private async attempt(attempt: number): Promise<ActiveStream | null> {
    const request = this.createRequest()
    const headers: Record<string, string> = { ...request.headers }
    setHeader(headers, LAST_EVENT_ID_HEADER, this.lastEventId)

    this.logger.log("connect", { url: request.url, attempt, last_event_id: this.lastEventId })

    const inFlight = new AbortController()
    this.inFlight = inFlight
    let response: TransportResponse
    try {
      response = await this.transport.send({ ...request, headers }, { signal: inFlight.signal })
    } catch (err) {
      if (inFlight.signal.aborted) throw new ClosedSourceError()
      this.logger.logError("retry_scheduled", err, { attempt, delay_ms: this.currentRetryInterval() })
      return null
    } finally {
      this.inFlight = null
    }

    if (inFlight.signal.aborted) {
      // close() arrived as the response did
      await this.release(response)
      throw new ClosedSourceError()
    }

    if (isSuccessStatus(response.status)) {
      const stream: ActiveStream = { response, parser: new EventParser(response.body) }
      this.current = stream
      this.closed = false
      this.logger.log("connected", { url: request.url, attempt })
      return stream
    }

    await this.release(response)

    if (isRetryableStatus(response.status)) {
      this.logger.log("retry_scheduled", {
        attempt,
        status: response.status,
        delay_ms: this.currentRetryInterval(),
      })
      return null
    }

    this.logger.log("bad_response", { attempt, status: response.status })
    throw new BadResponseError(response)
  }

  /** Mark closed and drop the current stream. Caller holds the mutex. */
  private async shutdown(propagateCloseError: boolean): Promise<void> {
    this.closed = true
    this.closeEpoch++

    const stream = this.current
    this.current = null
    if (!stream) return

    if (propagateCloseError) {
      await stream.response.close()
    } else {
      await this.release(stream.response)
    }
  }

  /** Close a response we are discarding; failures are logged only. */
  private async release(response: TransportResponse): Promise<void> {
    try {
      await response.close()
    } catch (err) {
      this.logger.logError("release_failed", err, { status: response.status })
    }
  }

  private currentRetryInterval(): number {
    let interval = FALLBACK_RETRY_INTERVAL_MS
    if (this.retryIntervalMs !== undefined) {
      interval = this.retryIntervalMs
    } else if (this.defaultRetryIntervalMs !== undefined && this.defaultRetryIntervalMs > 0) {
      interval = this.defaultRetryIntervalMs
    }
    return Math.min(interval, MAX_RETRY_INTERVAL_MS)
  }
}
