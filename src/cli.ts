#!/usr/bin/env node
// src/cli.ts — sse-tail CLI entry point
// Usage: sse-tail [url] [--last-event-id id] [--json]

import { pathToFileURL } from "node:url"
import { loadConfig, type EventSourceConfig } from "./config.js"
import { createEventSourceLogger } from "./logger.js"
import { EventSource } from "./sse/event-source.js"
import { BadResponseError } from "./sse/errors.js"
import { encodeEvent, type SSEEvent } from "./sse/event.js"

export interface CliArgs {
  url?: string
  lastEventId?: string
  json: boolean
}

export function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2) // Strip node and script path
  const parsed: CliArgs = { json: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === "--json") {
      parsed.json = true
    } else if (arg === "--last-event-id") {
      if (i + 1 >= args.length) {
        throw new Error("--last-event-id requires a value")
      }
      parsed.lastEventId = args[++i]
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`)
    } else if (parsed.url === undefined) {
      parsed.url = arg
    } else {
      throw new Error(`Unexpected argument: ${arg}`)
    }
  }

  return parsed
}

/** One printable record per event: wire format, or a JSON line with --json. */
export function formatEvent(event: SSEEvent, json: boolean): string {
  if (!json) return encodeEvent(event)
  return JSON.stringify(event) + "\n"
}

function printUsage(): void {
  console.error("Usage: sse-tail [url] [--last-event-id id] [--json]")
  console.error("")
  console.error("Arguments:")
  console.error("  url  Event stream URL (default: $SSE_URL)")
  console.error("")
  console.error("Options:")
  console.error("  --last-event-id id  Resume after this event id")
  console.error("  --json              Print one JSON object per event")
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs
  let config: EventSourceConfig
  try {
    args = parseArgs(argv)
    config = loadConfig({
      ...process.env,
      ...(args.url !== undefined ? { SSE_URL: args.url } : {}),
      ...(args.lastEventId !== undefined ? { SSE_LAST_EVENT_ID: args.lastEventId } : {}),
    })
  } catch (err) {
    console.error(`[sse-tail] ${err instanceof Error ? err.message : String(err)}`)
    printUsage()
    return 1
  }

  const source = new EventSource({
    createRequest: () => ({
      url: config.url,
      method: config.method,
      headers: { ...config.headers },
    }),
    defaultRetryIntervalMs: config.defaultRetryIntervalMs,
    lastEventId: config.lastEventId,
    logger: createEventSourceLogger(config.logLevel),
  })

  const stop = (): void => {
    source.close().catch((err: unknown) => {
      console.error(`[sse-tail] close failed: ${err instanceof Error ? err.message : String(err)}`)
    })
  }
  process.once("SIGINT", stop)
  process.once("SIGTERM", stop)

  try {
    for await (const event of source) {
      process.stdout.write(formatEvent(event, args.json))
    }
    return 0
  } catch (err) {
    if (err instanceof BadResponseError) {
      console.error(`[sse-tail] ${err.message}`)
      return 1
    }
    throw err
  } finally {
    process.off("SIGINT", stop)
    process.off("SIGTERM", stop)
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv).then(
    (code) => { process.exitCode = code },
    (err: unknown) => {
      console.error("[sse-tail] Fatal:", err)
      process.exitCode = 1
    },
  )
}
