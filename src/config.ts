// src/config.ts — Configuration loader from environment variables

import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { LOG_LEVELS } from "./logger.js"
import { FALLBACK_RETRY_INTERVAL_MS } from "./sse/event-source.js"

export const EventSourceConfigSchema = Type.Object({
  url: Type.String({ minLength: 1 }),
  method: Type.Union([Type.Literal("GET"), Type.Literal("POST")]),
  headers: Type.Record(Type.String(), Type.String()),
  defaultRetryIntervalMs: Type.Integer({ minimum: 0 }),
  logLevel: Type.Union(LOG_LEVELS.map((level) => Type.Literal(level))),
  lastEventId: Type.String(),
})

export type EventSourceConfig = Static<typeof EventSourceConfigSchema>

type Env = Record<string, string | undefined>

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: Env, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parseHeadersEnv(env: Env): unknown {
  const raw = env.SSE_HEADERS
  if (!raw) return {}
  try {
    return JSON.parse(raw)
  } catch {
    throw new Error(`SSE_HEADERS must be a JSON object of string values (got "${raw}")`)
  }
}

/**
 * Build the client configuration from the environment.
 *
 * SSE_URL is required; everything else has a default. The result is
 * checked against EventSourceConfigSchema and the first violation is thrown.
 */
export function loadConfig(env: Env = process.env): EventSourceConfig {
  const url = env.SSE_URL
  if (!url) {
    throw new Error("SSE_URL is required")
  }

  const candidate = {
    url,
    method: (env.SSE_METHOD ?? "GET").trim().toUpperCase(),
    headers: parseHeadersEnv(env),
    defaultRetryIntervalMs: parseIntEnv(env, "SSE_DEFAULT_RETRY_MS", String(FALLBACK_RETRY_INTERVAL_MS)),
    logLevel: (env.SSE_LOG_LEVEL ?? "info").trim().toLowerCase(),
    lastEventId: env.SSE_LAST_EVENT_ID ?? "",
  }

  if (!Value.Check(EventSourceConfigSchema, candidate)) {
    const [first] = [...Value.Errors(EventSourceConfigSchema, candidate)]
    const where = first ? `${first.path}: ${first.message}` : "unknown violation"
    throw new Error(`Invalid event source configuration (${where})`)
  }

  return candidate
}
