import { z } from "zod"
import { renderSearchText } from "../lib/format"
import { errorResponse, resultResponse, type ProtocolRequest, type ProtocolResponse } from "../lib/protocol"
import type { ServerContext } from "../server-context"
import type { GatewayError } from "../services/search-gateway"
import { createSearchQuery } from "../types"

const SearchParamsSchema = z.object({
  query: z.string().trim().min(1).max(500),
  limit: z.number().int().min(1).max(50).optional(),
  categories: z.array(z.string().trim().min(1).max(64)).max(16).optional(),
  format: z.enum(["json", "text"]).default("json"),
  search_depth: z.enum(["basic", "advanced"]).optional(),
})

export async function handleSearch(
  request: ProtocolRequest,
  ctx: ServerContext,
  signal: AbortSignal,
): Promise<ProtocolResponse> {
  const start = Date.now()
  const parsed = SearchParamsSchema.safeParse(request.params ?? {})

  if (!parsed.success) {
    return errorResponse(request.id, "invalid_request", "Invalid search params", parsed.error.flatten())
  }

  const params = parsed.data
  const query = createSearchQuery({
    text: params.query,
    limit: params.limit,
    categories: params.categories,
    depth: params.search_depth,
  })

  const outcome = await ctx.gateway.search(query, { signal })

  if (!outcome.ok) {
    const cancelled = signal.aborted
    ctx.loggers.search.warn(
      {
        requestId: request.id,
        query: query.text,
        mode: ctx.gateway.mode,
        kind: outcome.error.kind,
        cancelled,
        durationMs: Date.now() - start,
      },
      "search request failed",
    )

    if (cancelled) {
      return errorResponse(request.id, "cancelled", "Search request was cancelled")
    }

    return errorResponse(request.id, "search_failed", describeFailure(outcome.error), {
      kind: outcome.error.kind,
      failures: outcome.error.failures,
    })
  }

  ctx.loggers.search.info(
    {
      requestId: request.id,
      query: query.text,
      mode: ctx.gateway.mode,
      providers: outcome.providers,
      count: outcome.results.length,
      warnings: outcome.warnings.length,
      durationMs: Date.now() - start,
    },
    "search request completed",
  )

  const meta = {
    mode: ctx.gateway.mode,
    providers: outcome.providers,
    total_returned: outcome.results.length,
  }

  if (params.format === "text") {
    return resultResponse(request.id, {
      text: renderSearchText(outcome),
      meta,
    })
  }

  return resultResponse(request.id, {
    results: outcome.results,
    warnings: outcome.warnings,
    ...(outcome.answer ? { answer: outcome.answer } : {}),
    meta,
  })
}

export const AUTH_FAILURE_TEXT = "Authentication error occurred. Please check the API key configuration."
export const RATE_LIMIT_TEXT = "Rate limit exceeded. Please wait a moment before trying again."

/** Auth and rate-limit rejections get fixed wording; anything else keeps the gateway message. */
function describeFailure(error: GatewayError): string {
  const statuses = error.failures.map((failure) => failure.status)

  if (statuses.some((status) => status === 401 || status === 403)) {
    return AUTH_FAILURE_TEXT
  }

  if (statuses.includes(429)) {
    return RATE_LIMIT_TEXT
  }

  return error.message
}
