import type { Logger } from "pino"
import type { AppConfig, TavilyTopic } from "../config"
import { defaultSleep, type Sleep } from "../lib/retry"
import type { SearchDepth, SearchQuery } from "../types"
import { AdapterError } from "./provider-errors"
import { getArray, getNumber, getString, requestJsonWithRetry, type FetchLike } from "./provider-http"
import { collectResults, type CandidateResult } from "./result-normalizer"
import type { ProviderSearchResponse, SearchProviderClient } from "./search-provider"

interface TavilyClientDependencies {
  fetchImpl?: FetchLike
  sleep?: Sleep
}

interface TavilySearchPayload {
  query: string
  search_depth: SearchDepth
  topic: TavilyTopic
  include_answer: boolean
  max_results?: number
}

const TAVILY_TOPICS: readonly TavilyTopic[] = ["general", "news", "finance"]
const TAVILY_MAX_RESULTS = 20

export class TavilyClient implements SearchProviderClient {
  readonly name = "tavily" as const

  private readonly fetchImpl: FetchLike
  private readonly sleep: Sleep

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    dependencies: TavilyClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.sleep = dependencies.sleep ?? defaultSleep
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<ProviderSearchResponse> {
    const payload = this.buildPayload(query)

    const body = await requestJsonWithRetry(
      this.fetchImpl,
      {
        provider: this.name,
        url: `${this.config.tavily.baseUrl}/search`,
        init: {
          method: "POST",
          headers: {
            Accept: "application/json",
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.config.tavily.apiKey}`,
          },
          body: JSON.stringify(payload),
        },
        signal,
      },
      { settings: this.config.request, logger: this.logger, sleep: this.sleep },
    )

    const entries = getArray(body, "results")
    if (!entries) {
      throw new AdapterError(this.name, {
        kind: "parse_failure",
        reason: "response has no results array",
      })
    }

    const results = collectResults(this.name, entries, mapTavilyEntry, this.logger)
    const answer = getString(body, "answer")?.trim()

    return {
      results,
      ...(answer ? { answer } : {}),
    }
  }

  private buildPayload(query: SearchQuery): TavilySearchPayload {
    const payload: TavilySearchPayload = {
      query: query.text,
      search_depth: query.depth ?? this.config.tavily.searchDepth,
      topic: pickTopic(query.categories) ?? this.config.tavily.topic,
      include_answer: this.config.tavily.includeAnswer,
    }

    if (query.limit) {
      payload.max_results = Math.min(Math.max(query.limit, 1), TAVILY_MAX_RESULTS)
    }

    return payload
  }
}

function pickTopic(categories: readonly string[]): TavilyTopic | undefined {
  for (const category of categories) {
    const topic = TAVILY_TOPICS.find((candidate) => candidate === category)
    if (topic) {
      return topic
    }
  }

  return undefined
}

/**
 * Tavily shape: `{ answer?, results: [{ url, title, content, score, published_date }] }`
 */
function mapTavilyEntry(entry: unknown): CandidateResult | null {
  if (entry === null || typeof entry !== "object") {
    return null
  }

  return {
    url: getString(entry, "url"),
    title: getString(entry, "title"),
    snippet: getString(entry, "content"),
    published: getString(entry, "published_date"),
    score: getNumber(entry, "score"),
  }
}
