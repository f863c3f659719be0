import { setTimeout as sleep } from 'node:timers/promises'
import { isTransientError } from '@berth/core'

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number

  /** @default 2 */
  factor?: number
}

export interface RetryOptions extends RetryPolicy {
  /** No further attempt is made once aborted. */
  signal?: AbortSignal
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

/**
 * Delay before the retry that follows `attempt` (1-based).
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const factor = policy.factor ?? 2
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * factor ** (attempt - 1))
}

/**
 * Run `fn`, retrying transient gateway errors with bounded exponential
 * backoff. Permanent errors are thrown after the first attempt; when the
 * attempts run out the last error is thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (err) {
      if (!isTransientError(err) || attempt >= options.maxAttempts || options.signal?.aborted) {
        throw err
      }
      const delayMs = backoffDelay(attempt, options)
      options.onRetry?.(err, attempt, delayMs)
      await sleep(delayMs)
    }
  }
}
