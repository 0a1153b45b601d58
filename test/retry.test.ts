import { describe, expect, test } from "vitest"
import { MAX_TIMER_DELAY_MS, backoffDelayMs, retryWithBackoff } from "../src/lib/retry"
import { AdapterError, isRetryableError } from "../src/services/provider-errors"
import { recordingSleep } from "./helpers"

describe("retryWithBackoff", () => {
  test("doubles the delay from the base for each retry", () => {
    expect(backoffDelayMs(200, 1)).toBe(200)
    expect(backoffDelayMs(200, 2)).toBe(400)
    expect(backoffDelayMs(200, 3)).toBe(800)
  })

  test("caps the delay at the largest timer value", () => {
    expect(backoffDelayMs(2_000_000_000, 2)).toBe(MAX_TIMER_DELAY_MS)
  })

  test("gives up after the configured retries and rethrows the last error", async () => {
    const { sleeps, sleep } = recordingSleep()
    let attempts = 0
    const timeout = new AdapterError("searxng", { kind: "timeout", timeoutMs: 10 })

    const run = retryWithBackoff(
      async () => {
        attempts += 1
        throw timeout
      },
      { maxRetries: 2, baseDelayMs: 200, shouldRetry: isRetryableError, sleep },
    )

    await expect(run).rejects.toBe(timeout)
    expect(attempts).toBe(3)
    expect(sleeps).toEqual([200, 400])
  })

  test("does not retry client errors", async () => {
    const { sleeps, sleep } = recordingSleep()
    let attempts = 0

    const run = retryWithBackoff(
      async () => {
        attempts += 1
        throw new AdapterError("tavily", { kind: "backend_failure", status: 404, body: "not found" })
      },
      { maxRetries: 2, baseDelayMs: 200, shouldRetry: isRetryableError, sleep },
    )

    await expect(run).rejects.toBeInstanceOf(AdapterError)
    expect(attempts).toBe(1)
    expect(sleeps).toEqual([])
  })

  test("returns the first successful attempt and reports each retry", async () => {
    const { sleeps, sleep } = recordingSleep()
    const retries: Array<[number, number]> = []

    const value = await retryWithBackoff(
      async (attempt) => {
        if (attempt === 1) {
          throw new AdapterError("searxng", { kind: "backend_failure", status: 503, body: "busy" })
        }
        return `attempt-${attempt}`
      },
      {
        maxRetries: 2,
        baseDelayMs: 200,
        shouldRetry: isRetryableError,
        sleep,
        onRetry: (_error, retryNumber, delayMs) => retries.push([retryNumber, delayMs]),
      },
    )

    expect(value).toBe("attempt-2")
    expect(sleeps).toEqual([200])
    expect(retries).toEqual([[1, 200]])
  })

  test("runs a single attempt when retries are disabled", async () => {
    let attempts = 0

    const run = retryWithBackoff(
      async () => {
        attempts += 1
        throw new AdapterError("searxng", { kind: "network", reason: "fetch failed" })
      },
      { maxRetries: 0, baseDelayMs: 200, shouldRetry: isRetryableError },
    )

    await expect(run).rejects.toBeInstanceOf(AdapterError)
    expect(attempts).toBe(1)
  })

  test("moves on to the next attempt when the signal aborts during backoff", async () => {
    const controller = new AbortController()
    const seenAborted: boolean[] = []

    const value = await retryWithBackoff(
      async (attempt) => {
        seenAborted.push(controller.signal.aborted)
        if (attempt === 1) {
          setTimeout(() => controller.abort(), 10)
          throw new AdapterError("searxng", { kind: "network", reason: "fetch failed" })
        }
        return "aborted-attempt"
      },
      { maxRetries: 2, baseDelayMs: 60_000, shouldRetry: isRetryableError, signal: controller.signal },
    )

    expect(value).toBe("aborted-attempt")
    expect(seenAborted).toEqual([false, true])
  })

  test("propagates sleep failures unrelated to the signal", async () => {
    const broken = new Error("clock unavailable")

    const run = retryWithBackoff(
      async () => {
        throw new AdapterError("searxng", { kind: "timeout", timeoutMs: 10 })
      },
      {
        maxRetries: 1,
        baseDelayMs: 200,
        shouldRetry: isRetryableError,
        sleep: async () => {
          throw broken
        },
      },
    )

    await expect(run).rejects.toBe(broken)
  })
})
