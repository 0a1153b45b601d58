import { setTimeout as delay } from "node:timers/promises"

/** Largest delay `setTimeout` honours; longer values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export interface RetryOptions {
  maxRetries: number
  baseDelayMs: number
  shouldRetry: (error: unknown) => boolean
  sleep?: Sleep
  signal?: AbortSignal
  onRetry?: (error: unknown, retryNumber: number, delayMs: number) => void
}

export function backoffDelayMs(baseDelayMs: number, retryNumber: number): number {
  return Math.min(baseDelayMs * 2 ** (retryNumber - 1), MAX_TIMER_DELAY_MS)
}

export const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal })

export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep
  const maxAttempts = Math.max(0, options.maxRetries) + 1

  let lastError: unknown
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await task(attempt)
    } catch (error) {
      lastError = error
      if (attempt === maxAttempts || !options.shouldRetry(error)) {
        throw error
      }

      const delayMs = backoffDelayMs(options.baseDelayMs, attempt)
      options.onRetry?.(error, attempt, delayMs)
      try {
        await sleep(delayMs, options.signal)
      } catch (sleepError) {
        // An abort cuts the backoff short; the next attempt sees the signal and reports it.
        if (!options.signal?.aborted) {
          throw sleepError
        }
      }
    }
  }

  throw lastError
}
