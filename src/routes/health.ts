import { resultResponse, type ProtocolRequest, type ProtocolResponse } from "../lib/protocol"
import type { ServerContext } from "../server-context"

export function handleHealth(request: ProtocolRequest, ctx: ServerContext): ProtocolResponse {
  const [primary, secondary] = ctx.config.gateway.priority

  return resultResponse(request.id, {
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      process_running: true,
      mode: ctx.gateway.mode,
      primary,
      secondary,
      targets: ctx.gateway.targets,
      timeout_ms: ctx.config.request.timeoutMs,
      retry_max: ctx.config.request.retryMax,
      tavily_search_depth: ctx.config.tavily.searchDepth,
      tavily_include_answer: ctx.config.tavily.includeAnswer,
    },
  })
}
