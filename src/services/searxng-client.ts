import type { Logger } from "pino"
import type { AppConfig, SearxngSafesearch } from "../config"
import { defaultSleep, type Sleep } from "../lib/retry"
import type { SearchQuery } from "../types"
import { AdapterError } from "./provider-errors"
import { getArray, getNumber, getString, requestJsonWithRetry, type FetchLike } from "./provider-http"
import { collectResults, type CandidateResult } from "./result-normalizer"
import type { ProviderSearchResponse, SearchProviderClient } from "./search-provider"

interface SearxngClientDependencies {
  fetchImpl?: FetchLike
  sleep?: Sleep
}

export class SearxngClient implements SearchProviderClient {
  readonly name = "searxng" as const

  private readonly fetchImpl: FetchLike
  private readonly sleep: Sleep

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    dependencies: SearxngClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.sleep = dependencies.sleep ?? defaultSleep
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<ProviderSearchResponse> {
    const endpoint = this.buildEndpoint(query)

    const body = await requestJsonWithRetry(
      this.fetchImpl,
      {
        provider: this.name,
        url: endpoint,
        init: {
          method: "GET",
          headers: {
            Accept: "application/json",
          },
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

    const results = collectResults(this.name, entries, mapSearxngEntry, this.logger)

    return {
      results: query.limit ? results.slice(0, query.limit) : results,
    }
  }

  private buildEndpoint(query: SearchQuery): string {
    const params = new URLSearchParams({
      q: query.text,
      format: "json",
    })

    if (query.categories.length > 0) {
      params.set("categories", query.categories.join(","))
    }

    if (this.config.searxng.language) {
      params.set("language", this.config.searxng.language)
    }

    if (this.config.searxng.safesearch) {
      params.set("safesearch", toSearxngSafesearch(this.config.searxng.safesearch))
    }

    return `${this.config.searxng.baseUrl}/search?${params.toString()}`
  }
}

/**
 * SearXNG shape: `{ results: [{ url, title, content, publishedDate, score }] }`
 */
function mapSearxngEntry(entry: unknown): CandidateResult | null {
  if (entry === null || typeof entry !== "object") {
    return null
  }

  return {
    url: getString(entry, "url"),
    title: getString(entry, "title"),
    snippet: getString(entry, "content") ?? getString(entry, "description"),
    published: getString(entry, "publishedDate"),
    score: getNumber(entry, "score"),
  }
}

function toSearxngSafesearch(value: SearxngSafesearch): string {
  if (value === "off") {
    return "0"
  }

  if (value === "strict") {
    return "2"
  }

  return "1"
}
