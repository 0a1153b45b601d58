import pino from "pino"
import { loadConfig, type AppConfig } from "../src/config"
import type { Loggers } from "../src/logger"
import type { ServerContext } from "../src/server-context"
import { SearchGateway } from "../src/services/search-gateway"
import type { ProviderSearchResponse, SearchProviderClient } from "../src/services/search-provider"
import type { ProviderName, SearchQuery } from "../src/types"

export function silentLoggers(): Loggers {
  const logger = pino({ level: "silent" })
  return {
    app: logger,
    search: logger,
    close: async () => {},
  }
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    SEARXNG_URL: "https://search.example",
    TAVILY_API_KEY: "test-key",
    ...overrides,
  })
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  })
}

/** A fetch that never settles on its own and rejects once its signal aborts. */
export function hangUntilAborted(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal
    if (!signal) {
      return
    }

    if (signal.aborted) {
      reject(new Error("aborted"))
      return
    }

    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true })
  })
}

export function recordingSleep(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = []
  return {
    sleeps,
    sleep: async (ms) => {
      sleeps.push(ms)
    },
  }
}

export class MockProvider implements SearchProviderClient {
  calls: SearchQuery[] = []
  signals: Array<AbortSignal | undefined> = []

  constructor(
    readonly name: ProviderName,
    private readonly handler: (query: SearchQuery, signal?: AbortSignal) => Promise<ProviderSearchResponse>,
  ) {}

  async search(query: SearchQuery, signal?: AbortSignal): Promise<ProviderSearchResponse> {
    this.calls.push(query)
    this.signals.push(signal)
    return this.handler(query, signal)
  }
}

export function testContext(
  clients: { searxng: MockProvider; tavily: MockProvider },
  overrides: Record<string, string> = {},
): ServerContext {
  const config = testConfig(overrides)
  const loggers = silentLoggers()
  return {
    config,
    loggers,
    gateway: new SearchGateway(config.gateway, clients, loggers.app),
  }
}
