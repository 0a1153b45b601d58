import { createInterface, type Interface } from "node:readline"
import type { Readable, Writable } from "node:stream"
import { z } from "zod"
import {
  RequestIdSchema,
  encodeResponse,
  errorResponse,
  parseRequestLine,
  resultResponse,
  type ProtocolRequest,
  type ProtocolResponse,
  type RequestId,
} from "../lib/protocol"
import { handleDescribe } from "../routes/describe"
import { handleHealth } from "../routes/health"
import { handleSearch } from "../routes/search"
import type { ServerContext } from "../server-context"

export type MethodHandler = (
  request: ProtocolRequest,
  ctx: ServerContext,
  signal: AbortSignal,
) => ProtocolResponse | Promise<ProtocolResponse>

export const defaultHandlers: ReadonlyMap<string, MethodHandler> = new Map<string, MethodHandler>([
  ["search", handleSearch],
  ["health", (request, ctx) => handleHealth(request, ctx)],
  ["describe", (request, ctx) => handleDescribe(request, ctx)],
])

const CancelParamsSchema = z.object({
  id: RequestIdSchema,
})

/**
 * Newline-delimited JSON request/response loop.
 *
 * Requests are handled concurrently and answered as they finish, so responses
 * can arrive out of order; each carries the id of its request. `cancel` is
 * handled inline and aborts the matching in-flight request.
 */
export class StdioServer {
  private readonly inFlight = new Map<RequestId, AbortController>()
  private readonly pending = new Set<Promise<void>>()
  private lines: Interface | undefined

  constructor(
    private readonly ctx: ServerContext,
    private readonly handlers: ReadonlyMap<string, MethodHandler> = defaultHandlers,
  ) {}

  get inFlightCount(): number {
    return this.inFlight.size
  }

  /**
   * Resolves once the input ends, is destroyed or {@link close} is called, and
   * every accepted request has been answered.
   */
  async serve(input: Readable, output: Writable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
    this.lines = lines
    lines.once("close", () => {
      if (this.lines === lines) {
        this.lines = undefined
      }
    })
    // readline only closes itself on "end"; a destroyed stream emits just "close".
    const onInputClose = () => this.stopReading()
    input.once("close", onInputClose)

    try {
      for await (const line of lines) {
        this.accept(line, output)
      }
    } finally {
      input.off("close", onInputClose)
      this.stopReading()
    }

    await Promise.all(this.pending)
  }

  abortAll(): void {
    for (const controller of this.inFlight.values()) {
      controller.abort()
    }
  }

  /** Aborts in-flight requests and stops reading; `serve` resolves once they are answered. */
  close(): void {
    this.abortAll()
    this.stopReading()
  }

  private stopReading(): void {
    const lines = this.lines
    this.lines = undefined
    lines?.close()
  }

  private accept(line: string, output: Writable): void {
    const trimmed = line.trim()
    if (!trimmed) {
      return
    }

    const parsed = parseRequestLine(trimmed)
    if (!parsed.ok) {
      this.ctx.loggers.app.warn({ error: parsed.response.error }, "rejected request line")
      this.write(output, parsed.response)
      return
    }

    const { request } = parsed

    if (request.method === "cancel") {
      this.write(output, this.cancel(request))
      return
    }

    const handler = this.handlers.get(request.method)
    if (!handler) {
      this.write(
        output,
        errorResponse(request.id, "method_not_found", `Unknown method '${request.method}'`),
      )
      return
    }

    if (this.inFlight.has(request.id)) {
      this.write(
        output,
        errorResponse(request.id, "invalid_request", `Request id ${JSON.stringify(request.id)} is already in flight`),
      )
      return
    }

    const controller = new AbortController()
    this.inFlight.set(request.id, controller)

    const task: Promise<void> = this.run(handler, request, controller.signal)
      .then((response) => this.write(output, response))
      .finally(() => {
        this.inFlight.delete(request.id)
        this.pending.delete(task)
      })
    this.pending.add(task)
  }

  private async run(
    handler: MethodHandler,
    request: ProtocolRequest,
    signal: AbortSignal,
  ): Promise<ProtocolResponse> {
    try {
      return await handler(request, this.ctx, signal)
    } catch (error) {
      this.ctx.loggers.app.error(
        { error, requestId: request.id, method: request.method },
        "request handler failed",
      )
      return errorResponse(request.id, "internal_error", "Internal error while handling request")
    }
  }

  private cancel(request: ProtocolRequest): ProtocolResponse {
    const parsed = CancelParamsSchema.safeParse(request.params ?? {})
    if (!parsed.success) {
      return errorResponse(request.id, "invalid_request", "Invalid cancel params", parsed.error.flatten())
    }

    const controller = this.inFlight.get(parsed.data.id)
    controller?.abort()
    this.ctx.loggers.app.info(
      { requestId: parsed.data.id, found: Boolean(controller) },
      "cancel requested",
    )

    return resultResponse(request.id, {
      id: parsed.data.id,
      cancelled: Boolean(controller),
    })
  }

  private write(output: Writable, response: ProtocolResponse): void {
    output.write(encodeResponse(response))
  }
}
