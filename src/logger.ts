// src/logger.ts — Structured event source logger
//
// JSON lines on the console, one object per entry, filtered by level.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Session lifecycle operations that get logged */
export type EventSourceOperation =
  | "connect"
  | "connected"
  | "retry_scheduled"
  | "bad_response"
  | "stream_ended"
  | "stream_error"
  | "closed"
  | "release_failed"

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

/** Level each operation is logged at */
const OPERATION_LEVEL: Record<EventSourceOperation, Exclude<LogLevel, "silent">> = {
  connect: "debug",
  connected: "info",
  retry_scheduled: "warn",
  bad_response: "error",
  stream_ended: "info",
  stream_error: "warn",
  closed: "info",
  release_failed: "warn",
}

/** Structured log entry shape */
export interface EventSourceLogEntry {
  timestamp: string
  level: Exclude<LogLevel, "silent">
  operation: EventSourceOperation
  [key: string]: unknown
}

export interface EventSourceLogger {
  log(operation: EventSourceOperation, metadata?: Record<string, unknown>): void
  logError(operation: EventSourceOperation, error: unknown, metadata?: Record<string, unknown>): void
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

class ConsoleEventSourceLogger implements EventSourceLogger {
  constructor(private readonly minLevel: LogLevel) {}

  log(operation: EventSourceOperation, metadata?: Record<string, unknown>): void {
    this.emit({
      timestamp: new Date().toISOString(),
      level: OPERATION_LEVEL[operation],
      operation,
      ...(metadata ?? {}),
    })
  }

  logError(operation: EventSourceOperation, error: unknown, metadata?: Record<string, unknown>): void {
    this.emit({
      timestamp: new Date().toISOString(),
      level: OPERATION_LEVEL[operation],
      operation,
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error ? { error_name: error.name } : {}),
      ...(metadata ?? {}),
    })
  }

  private emit(entry: EventSourceLogEntry): void {
    if (LEVEL_RANK[entry.level] < LEVEL_RANK[this.minLevel]) return
    const line = JSON.stringify(entry)
    if (entry.level === "error") console.error(line)
    else if (entry.level === "warn") console.warn(line)
    else console.log(line)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create an EventSourceLogger that writes JSON lines to the console,
 * dropping entries below `level`.
 */
export function createEventSourceLogger(level: LogLevel = "info"): EventSourceLogger {
  return new ConsoleEventSourceLogger(level)
}

export const silentLogger: EventSourceLogger = {
  log() {},
  logError() {},
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}
