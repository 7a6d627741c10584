// src/sse/errors.ts — Typed errors for the event stream client

import type { TransportResponse } from "./transport.js"

/** Error codes surfaced by the parser, transport and session */
export type EventSourceErrorCode =
  | "BAD_RESPONSE"
  | "SOURCE_CLOSED"
  | "STREAM_ENDED"
  | "STREAM_CLOSED"

/** Base class for every error this package raises on purpose */
export class EventSourceError extends Error {
  readonly code: EventSourceErrorCode
  readonly context: Record<string, unknown>

  constructor(code: EventSourceErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message)
    this.name = "EventSourceError"
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

/**
 * The server answered with a status that is neither success nor retryable.
 * Terminal: the session does not retry it.
 */
export class BadResponseError extends EventSourceError {
  readonly response: TransportResponse

  constructor(response: TransportResponse) {
    super(
      "BAD_RESPONSE",
      `bad response from event source: ${response.status} ${response.statusText}`.trimEnd(),
      { status: response.status },
    )
    this.name = "BadResponseError"
    this.response = response
  }
}

/** next() on a closed source, or a close() that interrupted a pending read. */
export class ClosedSourceError extends EventSourceError {
  constructor() {
    super("SOURCE_CLOSED", "read from closed event source")
    this.name = "ClosedSourceError"
  }
}

/** The byte stream finished cleanly; any partial event was discarded. */
export class EventStreamEndedError extends EventSourceError {
  constructor() {
    super("STREAM_ENDED", "event stream ended")
    this.name = "EventStreamEndedError"
  }
}

/** A transport body was closed while a read was pending on it. */
export class StreamClosedError extends EventSourceError {
  constructor() {
    super("STREAM_CLOSED", "response body closed")
    this.name = "StreamClosedError"
  }
}
