import { resultResponse, type ProtocolRequest, type ProtocolResponse } from "../lib/protocol"
import type { ServerContext } from "../server-context"
import { PROVIDER_LABELS } from "../types"

/** JSON Schema for `search` params, kept in step with `SearchParamsSchema`. */
export const SEARCH_PARAMS_JSON_SCHEMA = {
  type: "object",
  properties: {
    query: { type: "string", description: "Search query", minLength: 1, maxLength: 500 },
    limit: { type: "integer", description: "Maximum number of results", minimum: 1, maximum: 50 },
    categories: {
      type: "array",
      description: "SearXNG categories; general, news or finance also pick the Tavily topic",
      items: { type: "string", minLength: 1, maxLength: 64 },
      maxItems: 16,
    },
    format: { type: "string", description: "Response shape", enum: ["json", "text"], default: "json" },
    search_depth: {
      type: "string",
      description: "Tavily search depth (basic or advanced)",
      enum: ["basic", "advanced"],
    },
  },
  required: ["query"],
} as const

export function handleDescribe(request: ProtocolRequest, ctx: ServerContext): ProtocolResponse {
  const providers = ctx.gateway.targets.map((provider) => PROVIDER_LABELS[provider]).join(" and ")

  return resultResponse(request.id, {
    name: "metasearch-gateway",
    methods: ["search", "health", "describe", "cancel"],
    tools: [
      {
        name: "search",
        description: `Search the web using ${providers}`,
        input_schema: SEARCH_PARAMS_JSON_SCHEMA,
      },
    ],
    resources: [
      {
        uri: "websearch://query=`largest moons of Saturn`,search_depth=`basic`",
        name: "Web search about `largest moons of Saturn`",
        mime_type: "application/json",
        description: "General web search. search_depth is basic or advanced; advanced searches deeper.",
      },
    ],
  })
}
