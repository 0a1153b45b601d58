import { z } from "zod"
import { MAX_TIMER_DELAY_MS } from "./lib/retry"
import {
  PROVIDER_NAMES,
  SELECTION_MODES,
  isProviderName,
  type ProviderName,
  type ProviderPriority,
  type SearchDepth,
  type SelectionMode,
} from "./types"

export type SearxngSafesearch = "off" | "moderate" | "strict"
export type TavilyTopic = "general" | "news" | "finance"
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface SearxngSettings {
  baseUrl: string
  language?: string
  safesearch?: SearxngSafesearch
}

export interface TavilySettings {
  baseUrl: string
  apiKey: string
  searchDepth: SearchDepth
  topic: TavilyTopic
  includeAnswer: boolean
}

export interface RequestSettings {
  timeoutMs: number
  retryMax: number
  retryBaseDelayMs: number
}

export interface GatewaySettings {
  mode: SelectionMode
  priority: ProviderPriority
}

export interface AppConfig {
  readonly searxng: Readonly<SearxngSettings>
  readonly tavily: Readonly<TavilySettings>
  readonly request: Readonly<RequestSettings>
  readonly gateway: Readonly<GatewaySettings>
  readonly logDir: string
  readonly logLevel: LogLevel
}

export type ConfigErrorReason = "missing_field" | "invalid_value"

export class ConfigError extends Error {
  constructor(
    readonly field: string,
    readonly reason: ConfigErrorReason,
    detail?: string,
  ) {
    super(
      reason === "missing_field"
        ? `${field} is required but was not set`
        : `${field} is invalid${detail ? `: ${detail}` : ""}`,
    )
    this.name = "ConfigError"
  }
}

function normalizedEnum<const T extends [string, ...string[]]>(values: T) {
  return z.preprocess((value) => {
    if (typeof value !== "string") {
      return value
    }

    const normalized = value.trim().toLowerCase()
    return normalized.length > 0 ? normalized : undefined
  }, z.enum(values).optional())
}

const EnvSchema = z.object({
  SEARXNG_URL: z.string().optional(),
  TAVILY_API_KEY: z.string().optional(),
  TAVILY_BASE_URL: z.string().optional(),
  METASEARCH_MODE: normalizedEnum([...SELECTION_MODES]),
  METASEARCH_PRIORITY: z.string().optional(),
  METASEARCH_TIMEOUT_MS: z.string().optional(),
  METASEARCH_RETRY_MAX: z.string().optional(),
  METASEARCH_RETRY_BASE_DELAY_MS: z.string().optional(),
  METASEARCH_SEARXNG_LANGUAGE: z.string().optional(),
  METASEARCH_SEARXNG_SAFESEARCH: normalizedEnum(["off", "moderate", "strict"]),
  METASEARCH_TAVILY_SEARCH_DEPTH: normalizedEnum(["basic", "advanced"]),
  METASEARCH_TAVILY_TOPIC: normalizedEnum(["general", "news", "finance"]),
  METASEARCH_TAVILY_INCLUDE_ANSWER: z.string().optional(),
  METASEARCH_LOG_DIR: z.string().optional(),
  METASEARCH_LOG_LEVEL: normalizedEnum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
})

type ParsedEnv = z.infer<typeof EnvSchema>

function requireValue(field: keyof ParsedEnv, input: string | undefined): string {
  const trimmed = input?.trim() ?? ""
  if (!trimmed) {
    throw new ConfigError(field, "missing_field")
  }

  return trimmed
}

function toBaseUrl(field: keyof ParsedEnv, input: string): string {
  let parsed: URL
  try {
    parsed = new URL(input)
  } catch {
    throw new ConfigError(field, "invalid_value", "expected an absolute http(s) URL")
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(field, "invalid_value", "expected an absolute http(s) URL")
  }

  return input.replace(/\/+$/, "")
}

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toMinInteger(
  field: keyof ParsedEnv,
  input: string | undefined,
  defaultValue: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const trimmed = input?.trim()
  if (!trimmed) {
    return defaultValue
  }

  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigError(field, "invalid_value", `expected an integer, got "${trimmed}"`)
  }

  const parsed = Number.parseInt(trimmed, 10)
  if (parsed > max) {
    throw new ConfigError(field, "invalid_value", `expected at most ${max}, got ${trimmed}`)
  }

  return parsed < min ? min : parsed
}

function parsePriority(input: string | undefined): ProviderPriority {
  if (!input?.trim()) {
    return ["searxng", "tavily"]
  }

  const names = input
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0)

  const known: ProviderName[] = []
  for (const name of names) {
    if (!isProviderName(name)) {
      throw new ConfigError(
        "METASEARCH_PRIORITY",
        "invalid_value",
        `unknown provider "${name}", expected one of ${PROVIDER_NAMES.join(", ")}`,
      )
    }
    known.push(name)
  }

  const [primary, secondary] = known
  if (!primary || known.length > 2) {
    throw new ConfigError("METASEARCH_PRIORITY", "invalid_value", "expected one or two providers")
  }

  if (secondary === undefined) {
    return [primary, otherProvider(primary)]
  }

  if (secondary === primary) {
    throw new ConfigError("METASEARCH_PRIORITY", "invalid_value", "providers must be distinct")
  }

  return [primary, secondary]
}

function otherProvider(name: ProviderName): ProviderName {
  return name === "searxng" ? "tavily" : "searxng"
}

function parseEnv(env: Record<string, string | undefined>): ParsedEnv {
  const parsed = EnvSchema.safeParse(env)
  if (parsed.success) {
    return parsed.data
  }

  const [issue] = parsed.error.issues
  const field = issue ? String(issue.path[0] ?? "environment") : "environment"
  throw new ConfigError(field, "invalid_value", issue?.message)
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child)
    }
  }

  return Object.freeze(value)
}

/**
 * Resolves process configuration from an environment map.
 *
 * Throws {@link ConfigError} when `SEARXNG_URL` or `TAVILY_API_KEY` is missing,
 * or when any optional setting cannot be parsed.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = parseEnv(env)

  const searxngUrl = toBaseUrl("SEARXNG_URL", requireValue("SEARXNG_URL", parsed.SEARXNG_URL))
  const tavilyApiKey = requireValue("TAVILY_API_KEY", parsed.TAVILY_API_KEY)
  const tavilyBaseUrl = toBaseUrl(
    "TAVILY_BASE_URL",
    parsed.TAVILY_BASE_URL?.trim() || "https://api.tavily.com",
  )
  const language = parsed.METASEARCH_SEARXNG_LANGUAGE?.trim()

  const config: AppConfig = {
    searxng: {
      baseUrl: searxngUrl,
      language: language ? language : undefined,
      safesearch: parsed.METASEARCH_SEARXNG_SAFESEARCH,
    },
    tavily: {
      baseUrl: tavilyBaseUrl,
      apiKey: tavilyApiKey,
      searchDepth: parsed.METASEARCH_TAVILY_SEARCH_DEPTH ?? "basic",
      topic: parsed.METASEARCH_TAVILY_TOPIC ?? "general",
      includeAnswer: toBoolean(parsed.METASEARCH_TAVILY_INCLUDE_ANSWER, true),
    },
    request: {
      timeoutMs: toMinInteger(
        "METASEARCH_TIMEOUT_MS",
        parsed.METASEARCH_TIMEOUT_MS,
        10_000,
        1,
        MAX_TIMER_DELAY_MS,
      ),
      retryMax: toMinInteger("METASEARCH_RETRY_MAX", parsed.METASEARCH_RETRY_MAX, 2, 0),
      retryBaseDelayMs: toMinInteger(
        "METASEARCH_RETRY_BASE_DELAY_MS",
        parsed.METASEARCH_RETRY_BASE_DELAY_MS,
        200,
        0,
        MAX_TIMER_DELAY_MS,
      ),
    },
    gateway: {
      mode: parsed.METASEARCH_MODE ?? "prefer_primary",
      priority: parsePriority(parsed.METASEARCH_PRIORITY),
    },
    logDir: parsed.METASEARCH_LOG_DIR?.trim() || "./data/logs",
    logLevel: parsed.METASEARCH_LOG_LEVEL ?? "info",
  }

  return deepFreeze(config)
}
