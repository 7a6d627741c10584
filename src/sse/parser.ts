// src/sse/parser.ts — Incremental event stream decoder
//
// Pull-based: each next() reads lines from the byte source until a blank line
// dispatches an event. Holds only the in-progress event and the last seen id.

import type { SSEEvent } from "./event.js"
import { EventStreamEndedError } from "./errors.js"

// --- Line reader ---

/**
 * Splits a byte source into LF-terminated lines. A CR directly before the LF
 * belongs to the terminator and is dropped; any other CR is kept.
 */
class LineReader {
  private readonly iterator: AsyncIterator<Uint8Array>
  private readonly decoder = new TextDecoder("utf-8")
  private buffer = ""
  private exhausted = false

  constructor(source: AsyncIterable<Uint8Array>) {
    this.iterator = source[Symbol.asyncIterator]()
  }

  /** Next complete line, or null once the source ends (a trailing partial line is dropped). */
  async readLine(): Promise<string | null> {
    while (true) {
      const idx = this.buffer.indexOf("\n")
      if (idx !== -1) {
        let line = this.buffer.slice(0, idx)
        this.buffer = this.buffer.slice(idx + 1)
        if (line.endsWith("\r")) {
          line = line.slice(0, -1)
        }
        return line
      }

      if (this.exhausted) return null

      const { done, value } = await this.iterator.next()
      if (done) {
        this.exhausted = true
        this.buffer += this.decoder.decode()
        continue
      }
      this.buffer += this.decoder.decode(value, { stream: true })
    }
  }

  async close(): Promise<void> {
    this.exhausted = true
    this.buffer = ""
    if (this.iterator.return) {
      await this.iterator.return()
    }
  }
}

// --- Parser ---

const DIGITS = /^[0-9]+$/

/**
 * Decodes an event stream into events.
 *
 * Not safe for concurrent next() calls on the same instance: the session owns
 * exactly one reader per parser.
 */
export class EventParser implements AsyncIterable<SSEEvent> {
  private readonly lines: LineReader
  private lastId = ""

  constructor(source: AsyncIterable<Uint8Array>) {
    this.lines = new LineReader(source)
  }

  /**
   * Read the next event. Rejects with EventStreamEndedError when the source
   * ends before a blank line completes an event; other read errors propagate.
   */
  async next(): Promise<SSEEvent> {
    let id = this.lastId
    // "id" with an empty value resets the id, so presence is tracked apart from the value
    let idPresent = false
    let name = ""
    let data = ""
    let retryIntervalMs: number | undefined

    while (true) {
      const line = await this.lines.readLine()
      if (line === null) {
        throw new EventStreamEndedError()
      }

      if (line === "") {
        if (data === "") {
          // no data: drop the block and start over
          id = this.lastId
          idPresent = false
          name = ""
          retryIntervalMs = undefined
          continue
        }

        if (idPresent) {
          this.lastId = id
        }

        const event: SSEEvent = { id, name, data: data.slice(0, -1) }
        if (retryIntervalMs !== undefined) {
          event.retryIntervalMs = retryIntervalMs
        }
        return event
      }

      if (line.startsWith(":")) continue

      let field: string
      let value: string
      const colonIdx = line.indexOf(":")
      if (colonIdx === -1) {
        field = line
        value = ""
      } else {
        field = line.slice(0, colonIdx)
        value = line.slice(colonIdx + 1)
        if (value.startsWith(" ")) {
          value = value.slice(1)
        }
      }

      switch (field) {
        case "id":
          if (!value.includes("\0")) {
            id = value
            idPresent = true
          }
          break
        case "event":
          name = value
          break
        case "data":
          data += value + "\n"
          break
        case "retry":
          if (DIGITS.test(value)) {
            retryIntervalMs = parseInt(value, 10)
          }
          break
        // unknown fields are ignored
      }
    }
  }

  /** Release the underlying byte source. */
  close(): Promise<void> {
    return this.lines.close()
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<SSEEvent> {
    while (true) {
      try {
        yield await this.next()
      } catch (err) {
        if (err instanceof EventStreamEndedError) return
        throw err
      }
    }
  }
}
