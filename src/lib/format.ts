import type { SearchWarning } from "../services/search-gateway"
import type { SearchResult } from "../types"

export interface RenderableSearch {
  results: readonly SearchResult[]
  warnings: readonly SearchWarning[]
  answer?: string
}

export const NO_RESULTS_TEXT = "No results were found for your query. Please try a different search term."

/**
 * Plain-text rendering for clients that show search output directly to a
 * person or paste it into a prompt.
 */
export function renderSearchText(search: RenderableSearch): string {
  const sections: string[] = []

  if (search.answer) {
    sections.push(`AI Answer:\n${search.answer}`)
  }

  if (search.results.length > 0) {
    const entries = search.results.map((result, index) =>
      [
        `${index + 1}. ${result.title}`,
        `URL: ${result.url}`,
        `Summary: ${result.snippet || "(no summary)"}`,
      ].join("\n"),
    )
    sections.push(["Search Results:", ...entries].join("\n\n"))
  }

  if (sections.length === 0) {
    sections.push(NO_RESULTS_TEXT)
  }

  if (search.warnings.length > 0) {
    sections.push(["Warnings:", ...search.warnings.map((warning) => `- ${warning.message}`)].join("\n"))
  }

  return sections.join("\n\n")
}
