import type { Logger } from "pino"
import type { RequestSettings } from "../config"
import { retryWithBackoff, type Sleep } from "../lib/retry"
import type { ProviderName } from "../types"
import { AdapterError, isRetryableError } from "./provider-errors"

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export interface ProviderRequest {
  provider: ProviderName
  url: string
  init: Omit<RequestInit, "signal">
  timeoutMs: number
  signal?: AbortSignal
}

const MAX_ERROR_BODY_CHARS = 500

/**
 * Performs one HTTP exchange and returns the decoded JSON body.
 *
 * The timeout covers both the response headers and the body. Every failure is
 * raised as an {@link AdapterError} tagged with the provider.
 */
export async function requestJson(fetchImpl: FetchLike, request: ProviderRequest): Promise<unknown> {
  const { provider, signal, timeoutMs } = request

  if (signal?.aborted) {
    throw new AdapterError(provider, { kind: "cancelled" })
  }

  const controller = new AbortController()
  let timedOut = false
  const timeoutHandle = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onCallerAbort = () => controller.abort()
  signal?.addEventListener("abort", onCallerAbort, { once: true })

  let status: number
  let ok: boolean
  let bodyText: string
  try {
    const response = await fetchImpl(request.url, {
      ...request.init,
      signal: controller.signal,
    })
    status = response.status
    ok = response.ok
    bodyText = await response.text()
  } catch (error) {
    if (timedOut) {
      throw new AdapterError(provider, { kind: "timeout", timeoutMs }, { cause: error })
    }

    if (signal?.aborted) {
      throw new AdapterError(provider, { kind: "cancelled" }, { cause: error })
    }

    throw new AdapterError(
      provider,
      { kind: "network", reason: error instanceof Error ? error.message : String(error) },
      { cause: error },
    )
  } finally {
    clearTimeout(timeoutHandle)
    signal?.removeEventListener("abort", onCallerAbort)
  }

  if (!ok) {
    throw new AdapterError(provider, {
      kind: "backend_failure",
      status,
      body: bodyText.slice(0, MAX_ERROR_BODY_CHARS),
    })
  }

  try {
    return JSON.parse(bodyText)
  } catch (error) {
    throw new AdapterError(
      provider,
      { kind: "parse_failure", reason: "response body is not valid JSON" },
      { cause: error },
    )
  }
}

export interface RetryingRequestOptions {
  settings: RequestSettings
  logger: Logger
  sleep: Sleep
}

/**
 * {@link requestJson} wrapped in the configured retry policy. Backoff sleeps end
 * early when the caller's signal aborts.
 */
export function requestJsonWithRetry(
  fetchImpl: FetchLike,
  request: Omit<ProviderRequest, "timeoutMs">,
  options: RetryingRequestOptions,
): Promise<unknown> {
  const { settings, logger } = options

  return retryWithBackoff(() => requestJson(fetchImpl, { ...request, timeoutMs: settings.timeoutMs }), {
    maxRetries: settings.retryMax,
    baseDelayMs: settings.retryBaseDelayMs,
    shouldRetry: isRetryableError,
    sleep: options.sleep,
    signal: request.signal,
    onRetry: (error, retryNumber, delayMs) => {
      logger.warn(
        { provider: request.provider, retryNumber, delayMs, error: String(error) },
        "retrying search provider request",
      )
    },
  })
}

export function getArray(obj: unknown, key: string): unknown[] | null {
  if (obj === null || typeof obj !== "object") {
    return null
  }

  const value: unknown = Reflect.get(obj, key)
  return Array.isArray(value) ? value : null
}

export function getString(obj: unknown, key: string): string | undefined {
  if (obj === null || typeof obj !== "object") {
    return undefined
  }

  const value: unknown = Reflect.get(obj, key)
  return typeof value === "string" ? value : undefined
}

export function getNumber(obj: unknown, key: string): number | undefined {
  if (obj === null || typeof obj !== "object") {
    return undefined
  }

  const value: unknown = Reflect.get(obj, key)
  return typeof value === "number" && Number.isFinite(value) ? value : undefined
}
