// src/index.ts — Barrel export

export {
  EventSource,
  LAST_EVENT_ID_HEADER,
  FALLBACK_RETRY_INTERVAL_MS,
  MAX_RETRY_INTERVAL_MS,
} from "./sse/event-source.js"
export type { EventSourceOptions } from "./sse/event-source.js"
export { EventParser } from "./sse/parser.js"
export { encodeEvent, writeEvent } from "./sse/event.js"
export type { SSEEvent, EventSink } from "./sse/event.js"
export {
  FetchTransport,
  ClosableBody,
  isSuccessStatus,
  isRetryableStatus,
  setHeader,
} from "./sse/transport.js"
export type {
  EventSourceRequest,
  EventStreamTransport,
  TransportResponse,
  SendOptions,
  FetchTransportConfig,
} from "./sse/transport.js"
export {
  EventSourceError,
  BadResponseError,
  ClosedSourceError,
  EventStreamEndedError,
  StreamClosedError,
} from "./sse/errors.js"
export type { EventSourceErrorCode } from "./sse/errors.js"
export { createEventSourceLogger, silentLogger, isLogLevel, LOG_LEVELS } from "./logger.js"
export type { EventSourceLogger, EventSourceOperation, LogLevel, EventSourceLogEntry } from "./logger.js"
export { loadConfig, EventSourceConfigSchema } from "./config.js"
export type { EventSourceConfig } from "./config.js"
