export const PROVIDER_NAMES = ["searxng", "tavily"] as const

export type ProviderName = (typeof PROVIDER_NAMES)[number]

export const PROVIDER_LABELS: Record<ProviderName, string> = {
  searxng: "SearXNG",
  tavily: "Tavily",
}

export const SELECTION_MODES = ["prefer_primary", "prefer_secondary", "merge"] as const

export type SelectionMode = (typeof SELECTION_MODES)[number]

/** Providers in priority order; the first entry is the primary. */
export type ProviderPriority = readonly [primary: ProviderName, secondary: ProviderName]

export type SearchDepth = "basic" | "advanced"

export interface SearchQuery {
  readonly text: string
  readonly limit?: number
  readonly categories: readonly string[]
  readonly depth?: SearchDepth
}

export interface SearchResult {
  readonly title: string
  readonly url: string
  readonly snippet: string
  readonly provider: ProviderName
  readonly published?: string
  readonly score?: number
}

export interface SearchQueryInput {
  text: string
  limit?: number
  categories?: readonly string[]
  depth?: SearchDepth
}

export function createSearchQuery(input: SearchQueryInput): SearchQuery {
  const text = input.text.trim()
  if (!text) {
    throw new RangeError("Search query text must not be empty")
  }

  if (input.limit !== undefined && (!Number.isInteger(input.limit) || input.limit < 1)) {
    throw new RangeError(`Search limit must be a positive integer, got ${input.limit}`)
  }

  const categories = [
    ...new Set(
      (input.categories ?? []).map((item) => item.trim().toLowerCase()).filter((item) => item.length > 0),
    ),
  ]

  return Object.freeze({
    text,
    limit: input.limit,
    categories: Object.freeze(categories),
    depth: input.depth,
  })
}

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value)
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`)
}
