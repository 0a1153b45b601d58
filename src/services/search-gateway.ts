import type { Logger } from "pino"
import type { GatewaySettings } from "../config"
import {
  PROVIDER_LABELS,
  assertNever,
  type ProviderName,
  type SearchQuery,
  type SearchResult,
  type SelectionMode,
} from "../types"
import { AdapterError, type AdapterFailureKind } from "./provider-errors"
import { dedupeByUrl } from "./result-normalizer"
import type { ProviderSearchResponse, SearchProviderClient } from "./search-provider"

export type GatewayErrorKind = "single_backend_failed" | "all_backends_failed"

export interface ProviderFailure {
  provider: ProviderName
  kind: AdapterFailureKind | "unexpected"
  message: string
  status?: number
}

export class GatewayError extends Error {
  constructor(
    readonly kind: GatewayErrorKind,
    readonly failures: readonly ProviderFailure[],
  ) {
    super(
      kind === "single_backend_failed"
        ? `Search failed for provider '${failures[0]?.provider ?? "unknown"}'`
        : `Search failed for all providers (${failures.map((failure) => failure.provider).join(", ")})`,
    )
    this.name = "GatewayError"
  }
}

export interface SearchWarning {
  provider: ProviderName
  kind: ProviderFailure["kind"]
  message: string
}

export type GatewayOutcome =
  | {
      ok: true
      results: SearchResult[]
      warnings: SearchWarning[]
      providers: ProviderName[]
      answer?: string
    }
  | {
      ok: false
      error: GatewayError
    }

export interface GatewaySearchOptions {
  signal?: AbortSignal
}

export type SearchProviderClients = Readonly<Record<ProviderName, SearchProviderClient>>

/**
 * Routes a search to one or both providers according to the configured
 * selection mode. Provider failures come back as `{ ok: false }` outcomes; this
 * class does not throw for them and keeps no state between calls.
 */
export class SearchGateway {
  constructor(
    private readonly settings: GatewaySettings,
    private readonly clients: SearchProviderClients,
    private readonly logger: Logger,
  ) {}

  get mode(): SelectionMode {
    return this.settings.mode
  }

  /** Providers a search will contact, in priority order. */
  get targets(): ProviderName[] {
    const [primary, secondary] = this.settings.priority

    switch (this.settings.mode) {
      case "prefer_primary":
        return [primary]
      case "prefer_secondary":
        return [secondary]
      case "merge":
        return [primary, secondary]
      default:
        return assertNever(this.settings.mode)
    }
  }

  async search(query: SearchQuery, options: GatewaySearchOptions = {}): Promise<GatewayOutcome> {
    const mode = this.settings.mode
    const [primary, secondary] = this.settings.priority

    let outcome: GatewayOutcome
    switch (mode) {
      case "prefer_primary":
        outcome = await this.searchSingle(primary, query, options.signal)
        break
      case "prefer_secondary":
        outcome = await this.searchSingle(secondary, query, options.signal)
        break
      case "merge":
        outcome = await this.searchMerged([primary, secondary], query, options.signal)
        break
      default:
        return assertNever(mode)
    }

    if (outcome.ok) {
      this.logger.info(
        {
          mode,
          providers: outcome.providers,
          count: outcome.results.length,
          warnings: outcome.warnings.length,
        },
        "search completed",
      )
    } else {
      this.logger.warn(
        { mode, kind: outcome.error.kind, failures: outcome.error.failures },
        "search failed",
      )
    }

    return outcome
  }

  private async searchSingle(
    provider: ProviderName,
    query: SearchQuery,
    signal: AbortSignal | undefined,
  ): Promise<GatewayOutcome> {
    try {
      const response = await this.clients[provider].search(query, signal)
      return {
        ok: true,
        results: response.results,
        warnings: [],
        providers: [provider],
        ...(response.answer ? { answer: response.answer } : {}),
      }
    } catch (error) {
      return {
        ok: false,
        error: new GatewayError("single_backend_failed", [toProviderFailure(provider, error)]),
      }
    }
  }

  private async searchMerged(
    order: readonly ProviderName[],
    query: SearchQuery,
    signal: AbortSignal | undefined,
  ): Promise<GatewayOutcome> {
    const settled = await Promise.allSettled(
      order.map((provider) => this.clients[provider].search(query, signal)),
    )

    const successes: Array<{ provider: ProviderName; response: ProviderSearchResponse }> = []
    const failures: ProviderFailure[] = []

    settled.forEach((result, index) => {
      const provider = order[index]
      if (provider === undefined) {
        return
      }

      if (result.status === "fulfilled") {
        successes.push({ provider, response: result.value })
      } else {
        failures.push(toProviderFailure(provider, result.reason))
      }
    })

    if (successes.length === 0) {
      return { ok: false, error: new GatewayError("all_backends_failed", failures) }
    }

    const merged = dedupeByUrl(successes.flatMap((success) => success.response.results))
    const answer = successes.find((success) => success.response.answer)?.response.answer

    return {
      ok: true,
      results: query.limit ? merged.slice(0, query.limit) : merged,
      warnings: failures.map((failure) => ({
        provider: failure.provider,
        kind: failure.kind,
        message: failure.message,
      })),
      providers: successes.map((success) => success.provider),
      ...(answer ? { answer } : {}),
    }
  }
}

function toProviderFailure(provider: ProviderName, error: unknown): ProviderFailure {
  if (error instanceof AdapterError) {
    return {
      provider,
      kind: error.failure.kind,
      message: error.message,
      ...(error.failure.kind === "backend_failure" ? { status: error.failure.status } : {}),
    }
  }

  return {
    provider,
    kind: "unexpected",
    message: `${PROVIDER_LABELS[provider]} search failed: ${error instanceof Error ? error.message : String(error)}`,
  }
}
