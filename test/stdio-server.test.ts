import { PassThrough } from "node:stream"
import { text } from "node:stream/consumers"
import { describe, expect, test } from "vitest"
import { errorResponse, type ProtocolRequest } from "../src/lib/protocol"
import { AdapterError } from "../src/services/provider-errors"
import type { ProviderSearchResponse } from "../src/services/search-provider"
import { StdioServer, defaultHandlers, type MethodHandler } from "../src/transport/stdio-server"
import { MockProvider, testContext } from "./helpers"

async function exchange(server: StdioServer, lines: string[]): Promise<unknown[]> {
  const input = new PassThrough()
  const output = new PassThrough()
  const collected = text(output)

  const serving = server.serve(input, output)
  input.end(`${lines.join("\n")}\n`)
  await serving
  output.end()

  return (await collected)
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line): unknown => JSON.parse(line))
}

function cancellableProvider(): MockProvider {
  return new MockProvider(
    "searxng",
    (_query, signal) =>
      new Promise<ProviderSearchResponse>((_resolve, reject) => {
        signal?.addEventListener(
          "abort",
          () => reject(new AdapterError("searxng", { kind: "cancelled" })),
          { once: true },
        )
      }),
  )
}

function emptyContext() {
  return testContext({
    searxng: new MockProvider("searxng", async () => ({ results: [] })),
    tavily: new MockProvider("tavily", async () => ({ results: [] })),
  })
}

describe("stdio server", () => {
  test("answers health and rejects unknown methods and malformed lines", async () => {
    const server = new StdioServer(emptyContext())

    const responses = await exchange(server, [
      '{"id":1,"method":"health"}',
      "",
      '{"id":2,"method":"crawl"}',
      "{oops",
    ])

    expect(responses).toHaveLength(3)
    expect(responses).toContainEqual({
      id: 2,
      error: { code: "method_not_found", message: "Unknown method 'crawl'" },
    })
    expect(responses).toContainEqual({
      id: null,
      error: { code: "invalid_request", message: "Request line is not valid JSON" },
    })
    expect(responses).toContainEqual({
      id: 1,
      result: expect.objectContaining({ status: "ok" }),
    })
  })

  test("routes describe to the discovery handler", async () => {
    const server = new StdioServer(emptyContext())

    const responses = await exchange(server, ['{"id":"d","method":"describe"}'])

    expect(responses).toHaveLength(1)
    expect(responses[0]).toHaveProperty("result.tools.0.name", "search")
  })

  test("cancels an in-flight search", async () => {
    const searxng = cancellableProvider()
    const server = new StdioServer(
      testContext({ searxng, tavily: new MockProvider("tavily", async () => ({ results: [] })) }),
    )

    const responses = await exchange(server, [
      '{"id":"s1","method":"search","params":{"query":"slow duck"}}',
      '{"id":"c1","method":"cancel","params":{"id":"s1"}}',
      '{"id":"c2","method":"cancel","params":{"id":"missing"}}',
    ])

    expect(responses).toHaveLength(3)
    expect(responses[0]).toEqual({ id: "c1", result: { id: "s1", cancelled: true } })
    expect(responses).toContainEqual({ id: "c2", result: { id: "missing", cancelled: false } })
    expect(responses).toContainEqual({
      id: "s1",
      error: { code: "cancelled", message: "Search request was cancelled" },
    })
    expect(searxng.calls.length).toBe(1)
    expect(server.inFlightCount).toBe(0)
  })

  test("rejects a request id that is already in flight", async () => {
    const searxng = cancellableProvider()
    const server = new StdioServer(
      testContext({ searxng, tavily: new MockProvider("tavily", async () => ({ results: [] })) }),
    )

    const responses = await exchange(server, [
      '{"id":"dup","method":"search","params":{"query":"first"}}',
      '{"id":"dup","method":"search","params":{"query":"second"}}',
      '{"id":"c","method":"cancel","params":{"id":"dup"}}',
    ])

    expect(responses).toEqual([
      { id: "dup", error: { code: "invalid_request", message: 'Request id "dup" is already in flight' } },
      { id: "c", result: { id: "dup", cancelled: true } },
      { id: "dup", error: { code: "cancelled", message: "Search request was cancelled" } },
    ])
    expect(searxng.calls.map((query) => query.text)).toEqual(["first"])
  })

  test("turns a throwing handler into internal_error", async () => {
    const handlers = new Map<string, MethodHandler>(defaultHandlers)
    handlers.set("boom", () => {
      throw new Error("kaboom")
    })
    handlers.set("echo", (request: ProtocolRequest) =>
      errorResponse(request.id, "invalid_request", "echoed"),
    )
    const server = new StdioServer(emptyContext(), handlers)

    const responses = await exchange(server, ['{"id":9,"method":"boom"}', '{"id":10,"method":"echo"}'])

    expect(responses).toContainEqual({
      id: 9,
      error: { code: "internal_error", message: "Internal error while handling request" },
    })
    expect(responses).toContainEqual({ id: 10, error: { code: "invalid_request", message: "echoed" } })
  })

  test("close aborts in-flight requests and ends serve without the input ending", async () => {
    const searxng = cancellableProvider()
    const server = new StdioServer(
      testContext({ searxng, tavily: new MockProvider("tavily", async () => ({ results: [] })) }),
    )
    const input = new PassThrough()
    const output = new PassThrough()
    const collected = text(output)

    const serving = server.serve(input, output)
    input.write('{"id":"a","method":"search","params":{"query":"one"}}\n')
    input.write('{"id":"b","method":"search","params":{"query":"two"}}\n')

    await expect.poll(() => server.inFlightCount).toBe(2)
    server.close()
    await serving
    output.end()

    const responses = (await collected).trim().split("\n").map((line): unknown => JSON.parse(line))
    expect(responses).toHaveLength(2)
    expect(responses).toContainEqual({
      id: "a",
      error: { code: "cancelled", message: "Search request was cancelled" },
    })
    expect(responses).toContainEqual({
      id: "b",
      error: { code: "cancelled", message: "Search request was cancelled" },
    })
    expect(input.readableEnded).toBe(false)
  })

  test("stops serving when the input is destroyed", async () => {
    const server = new StdioServer(emptyContext())
    const input = new PassThrough()
    const output = new PassThrough()
    const collected = text(output)

    const serving = server.serve(input, output)
    input.destroy()
    await serving
    output.end()

    expect(await collected).toBe("")
  })
})
