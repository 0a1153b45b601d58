import { PROVIDER_LABELS, type ProviderName } from "../types"

export type AdapterFailure =
  | { kind: "timeout"; timeoutMs: number }
  | { kind: "backend_failure"; status: number; body: string }
  | { kind: "parse_failure"; reason: string }
  | { kind: "network"; reason: string }
  | { kind: "cancelled" }

export type AdapterFailureKind = AdapterFailure["kind"]

export class AdapterError extends Error {
  constructor(
    readonly provider: ProviderName,
    readonly failure: AdapterFailure,
    options?: { cause?: unknown },
  ) {
    super(describeFailure(provider, failure), options)
    this.name = "AdapterError"
  }

  get retryable(): boolean {
    return isRetryableFailure(this.failure)
  }
}

/** Only timeouts, connection failures and 5xx responses are retried. */
export function isRetryableFailure(failure: AdapterFailure): boolean {
  switch (failure.kind) {
    case "timeout":
    case "network":
      return true
    case "backend_failure":
      return failure.status >= 500
    case "parse_failure":
    case "cancelled":
      return false
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof AdapterError && error.retryable
}

function describeFailure(provider: ProviderName, failure: AdapterFailure): string {
  const label = PROVIDER_LABELS[provider]

  switch (failure.kind) {
    case "timeout":
      return `${label} request timed out after ${failure.timeoutMs}ms`
    case "backend_failure":
      return `${label} API returned ${failure.status}: ${failure.body}`
    case "parse_failure":
      return `${label} response could not be parsed: ${failure.reason}`
    case "network":
      return `${label} request failed: ${failure.reason}`
    case "cancelled":
      return `${label} request was cancelled`
  }
}
