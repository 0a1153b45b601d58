import type { ProviderName, SearchQuery, SearchResult } from "../types"

export interface ProviderSearchResponse {
  results: SearchResult[]
  /** Direct answer text, for providers that generate one. */
  answer?: string
}

export interface SearchProviderClient {
  readonly name: ProviderName
  search(query: SearchQuery, signal?: AbortSignal): Promise<ProviderSearchResponse>
}
