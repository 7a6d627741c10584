// tests/config.test.ts — Environment configuration loader

import { describe, it, expect } from "vitest"
import { loadConfig } from "../src/config.js"

describe("loadConfig", () => {
  it("applies defaults when only SSE_URL is set", () => {
    expect(loadConfig({ SSE_URL: "http://127.0.0.1:8080/events" })).toEqual({
      url: "http://127.0.0.1:8080/events",
      method: "GET",
      headers: {},
      defaultRetryIntervalMs: 1000,
      logLevel: "info",
      lastEventId: "",
    })
  })

  it("reads every variable", () => {
    const config = loadConfig({
      SSE_URL: "http://127.0.0.1:8080/events",
      SSE_METHOD: "post",
      SSE_HEADERS: "{\"Authorization\":\"Bearer test-token\"}",
      SSE_DEFAULT_RETRY_MS: "250",
      SSE_LOG_LEVEL: "DEBUG",
      SSE_LAST_EVENT_ID: "42",
    })

    expect(config).toEqual({
      url: "http://127.0.0.1:8080/events",
      method: "POST",
      headers: { Authorization: "Bearer test-token" },
      defaultRetryIntervalMs: 250,
      logLevel: "debug",
      lastEventId: "42",
    })
  })

  it("requires SSE_URL", () => {
    expect(() => loadConfig({})).toThrow("SSE_URL is required")
  })

  it("fails fast on a non-integer retry interval", () => {
    expect(() => loadConfig({ SSE_URL: "http://x", SSE_DEFAULT_RETRY_MS: "soon" }))
      .toThrow("SSE_DEFAULT_RETRY_MS must be a valid integer (got \"soon\")")
  })

  it("rejects a negative retry interval", () => {
    expect(() => loadConfig({ SSE_URL: "http://x", SSE_DEFAULT_RETRY_MS: "-5" }))
      .toThrow(/Invalid event source configuration \(\/defaultRetryIntervalMs/)
  })

  it("rejects an unsupported method", () => {
    expect(() => loadConfig({ SSE_URL: "http://x", SSE_METHOD: "PUT" }))
      .toThrow(/Invalid event source configuration \(\/method/)
  })

  it("rejects headers that are not a JSON object of strings", () => {
    expect(() => loadConfig({ SSE_URL: "http://x", SSE_HEADERS: "not json" }))
      .toThrow("SSE_HEADERS must be a JSON object of string values (got \"not json\")")
    expect(() => loadConfig({ SSE_URL: "http://x", SSE_HEADERS: "{\"X-Retries\":3}" }))
      .toThrow(/Invalid event source configuration \(\/headers/)
  })

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ SSE_URL: "http://x", SSE_LOG_LEVEL: "verbose" }))
      .toThrow(/Invalid event source configuration \(\/logLevel/)
  })
})
