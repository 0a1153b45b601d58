import type { Logger } from "pino"
import type { ProviderName, SearchResult } from "../types"
import { AdapterError } from "./provider-errors"

/** Fields an adapter managed to read from one provider entry. */
export interface CandidateResult {
  title?: string
  url?: string
  snippet?: string
  published?: string
  score?: number
}

export type CandidateValidation =
  | { valid: true; result: SearchResult }
  | { valid: false; reason: string }

export function isValidHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}

export function validateCandidate(
  provider: ProviderName,
  candidate: CandidateResult | null,
): CandidateValidation {
  if (!candidate) {
    return { valid: false, reason: "entry is not an object" }
  }

  const url = candidate.url?.trim() ?? ""
  if (!url) {
    return { valid: false, reason: "missing url" }
  }

  if (!isValidHttpUrl(url)) {
    return { valid: false, reason: "url is not an absolute http(s) URL" }
  }

  const title = candidate.title?.trim()
  const result: SearchResult = {
    title: title ? title : "Untitled",
    url,
    snippet: candidate.snippet?.trim() ?? "",
    provider,
    ...(candidate.published ? { published: candidate.published } : {}),
    ...(candidate.score !== undefined ? { score: candidate.score } : {}),
  }

  return { valid: true, result: Object.freeze(result) }
}

/**
 * Maps raw provider entries into validated results, skipping malformed ones.
 *
 * A non-empty entry list where nothing survives validation is reported as a
 * parse failure rather than an empty success.
 */
export function collectResults(
  provider: ProviderName,
  entries: readonly unknown[],
  mapEntry: (entry: unknown) => CandidateResult | null,
  logger: Logger,
): SearchResult[] {
  const results: SearchResult[] = []

  entries.forEach((entry, index) => {
    const validation = validateCandidate(provider, mapEntry(entry))
    if (validation.valid) {
      results.push(validation.result)
      return
    }

    logger.warn({ provider, index, reason: validation.reason }, "skipping malformed search result")
  })

  if (entries.length > 0 && results.length === 0) {
    throw new AdapterError(provider, {
      kind: "parse_failure",
      reason: `all ${entries.length} result entries were malformed`,
    })
  }

  return results
}

/**
 * Key used to detect the same page returned by different providers: scheme and
 * fragment are ignored, the host loses a leading `www.`, and the path loses its
 * trailing slash.
 */
export function normalizeUrlKey(url: string): string {
  try {
    const parsed = new URL(url)
    const host = parsed.hostname.toLowerCase().replace(/^www\./, "")
    const port = parsed.port ? `:${parsed.port}` : ""
    const path = parsed.pathname.replace(/\/+$/, "")
    return `${host}${port}${path}${parsed.search}`
  } catch {
    return url.trim().toLowerCase()
  }
}

export function dedupeByUrl(results: readonly SearchResult[]): SearchResult[] {
  const seen = new Set<string>()
  const unique: SearchResult[] = []

  for (const result of results) {
    const key = normalizeUrlKey(result.url)
    if (seen.has(key)) {
      continue
    }

    seen.add(key)
    unique.push(result)
  }

  return unique
}
