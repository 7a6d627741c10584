// tests/sse/event.test.ts — Event encoder tests

import { describe, it, expect, vi } from "vitest"
import * as fc from "fast-check"
import { WritableStream } from "node:stream/web"
import { encodeEvent, writeEvent, type SSEEvent } from "../../src/sse/event.js"
import { EventParser } from "../../src/sse/parser.js"
import { toStream } from "../helpers/streams.js"

describe("encodeEvent", () => {
  it("encodes to a dispatchable event", () => {
    expect(encodeEvent({ id: "some-id", name: "some-name", data: "some-data" }))
      .toBe("id: some-id\nevent: some-name\ndata: some-data\n\n")
  })

  it("splits lines across multiple data segments", () => {
    expect(encodeEvent({ id: "some-id", name: "some-name", data: "some-data\nsome-more-data\n" }))
      .toBe("id: some-id\nevent: some-name\ndata: some-data\ndata: some-more-data\ndata\n\n")
  })

  it("writes a retry line only when a retry interval is set", () => {
    expect(encodeEvent({ id: "1", name: "", data: "x", retryIntervalMs: 200 }))
      .toBe("id: 1\nevent: \nretry: 200\ndata: x\n\n")
  })

  it("encodes empty data as a bare data token", () => {
    expect(encodeEvent({ id: "", name: "", data: "" })).toBe("id: \nevent: \ndata\n\n")
  })
})

describe("writeEvent", () => {
  it("writes the encoded event to the sink", async () => {
    const event: SSEEvent = { id: "some-id", name: "some-name", data: "some-data\nsome-more-data\n" }
    const chunks: Uint8Array[] = []
    await writeEvent(event, { write: (chunk: Uint8Array) => { chunks.push(chunk) } })

    expect(chunks).toHaveLength(1)
    expect(new TextDecoder().decode(chunks[0])).toBe(encodeEvent(event))
  })

  it("writes through a WHATWG stream writer", async () => {
    const received: Uint8Array[] = []
    const stream = new WritableStream<Uint8Array>({ write(chunk) { received.push(chunk) } })
    const writer = stream.getWriter()

    await writeEvent({ id: "1", name: "ping", data: "hi" }, writer)
    await writer.close()

    expect(new TextDecoder().decode(received[0])).toBe("id: 1\nevent: ping\ndata: hi\n\n")
  })

  it("propagates a sink write error", async () => {
    const write = vi.fn().mockRejectedValue(new Error("broken pipe"))
    await expect(writeEvent({ id: "1", name: "", data: "x" }, { write })).rejects.toThrow("broken pipe")
  })
})

// ---------------------------------------------------------------------------
// Encode -> parse round trip
// ---------------------------------------------------------------------------

// Single-line field text: no line terminators, no NUL (ignored in ids)
const arbLine = fc.string({ maxLength: 20 }).filter((s) => !/[\r\n\0]/.test(s))
const arbData = fc.array(arbLine, { minLength: 1, maxLength: 5 }).map((lines) => lines.join("\n"))

const arbEvent: fc.Arbitrary<SSEEvent> = fc.record({
  id: arbLine,
  name: arbLine,
  data: arbData,
})

describe("encode/parse round trip", () => {
  it("parses an encoded event back to the same event", async () => {
    await fc.assert(
      fc.asyncProperty(arbEvent, async (event) => {
        const parsed = await new EventParser(toStream(encodeEvent(event))).next()
        expect(parsed).toEqual(event)
      }),
    )
  })

  it("emits one data line per payload line and rejoins them", async () => {
    await fc.assert(
      fc.asyncProperty(arbData, async (data) => {
        const wire = encodeEvent({ id: "1", name: "", data })
        const dataLines = wire.split("\n").filter((line) => line === "data" || line.startsWith("data: "))
        expect(dataLines).toHaveLength(data.split("\n").length)

        const parsed = await new EventParser(toStream(wire)).next()
        expect(parsed.data).toBe(data)
      }),
    )
  })

  it("round-trips a sequence of events with their retry directives", async () => {
    const events: SSEEvent[] = [
      { id: "1", name: "open", data: "hello", retryIntervalMs: 200 },
      { id: "2", name: "", data: "a\n\nb" },
      { id: "", name: "close", data: "" },
    ]
    const parser = new EventParser(toStream(events.map(encodeEvent).join("")))
    for (const event of events) {
      expect(await parser.next()).toEqual(event)
    }
  })
})
