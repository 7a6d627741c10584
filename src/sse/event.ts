// src/sse/event.ts — Event model and wire encoder

/**
 * One dispatched event.
 *
 * `id` is always defined: when the wire block carried no `id` field it holds
 * the last id the parser saw. `retryIntervalMs` is present only when the block
 * carried a valid `retry` field.
 *
 * Fields are text. The stream is decoded as UTF-8, and byte sequences that
 * are not valid UTF-8 arrive as U+FFFD, so binary payloads do not survive the
 * trip and should be sent base64 or similar.
 */
export interface SSEEvent {
  id: string
  name: string
  data: string
  retryIntervalMs?: number
}

/** Anything an encoded event can be written to (WHATWG writer, hono stream). */
export interface EventSink {
  write(chunk: Uint8Array): Promise<unknown> | unknown
}

const encoder = new TextEncoder()

/**
 * Serialize an event: `id`, `event`, optional `retry`, one `data` line per
 * line of the payload, then a blank line. Empty payload lines are written as
 * a bare `data` token.
 */
export function encodeEvent(event: SSEEvent): string {
  let enc = `id: ${event.id}\nevent: ${event.name}\n`

  if (event.retryIntervalMs !== undefined) {
    enc += `retry: ${event.retryIntervalMs}\n`
  }

  for (const line of event.data.split("\n")) {
    enc += line.length === 0 ? "data\n" : `data: ${line}\n`
  }

  return enc + "\n"
}

/** Encode and write one event; the sink's write error propagates. */
export async function writeEvent(event: SSEEvent, sink: EventSink): Promise<void> {
  await sink.write(encoder.encode(encodeEvent(event)))
}
