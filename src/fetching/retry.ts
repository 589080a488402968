import type { FetchError } from '../exceptions'
import type { Sleep } from '../utils'
import { sleep as defaultSleep } from '../utils'
import { createLogger } from '../utils/logger'

const log = createLogger('retry')

/**
 * Delay in milliseconds before the retry that follows failed attempt `attempt` (1-based).
 */
export type BackoffStrategy = (attempt: number) => number

export function fixedBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs
}

export function exponentialBackoff(
  baseMs: number,
  factor: number = 2,
  maxMs: number = Number.POSITIVE_INFINITY,
): BackoffStrategy {
  return (attempt) => Math.min(baseMs * factor ** (attempt - 1), maxMs)
}

export interface RetryPolicy {
  /** Retries allowed after the first attempt. */
  maxRetries: number
  backoff: BackoffStrategy
  /** Wait applied to rate-limited attempts when the server gives no hint. */
  rateLimitDelayMs: number
}

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: FetchError; retryAfterMs?: number }

export type RetryState<T> =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'retrying'; attempt: number; delayMs: number; error: FetchError }
  | { phase: 'succeeded'; attempt: number; value: T }
  | { phase: 'failed'; attempt: number; error: FetchError }

export function initialRetryState<T>(): RetryState<T> {
  return { phase: 'attempting', attempt: 1 }
}

/**
 * Pure transition out of `attempting`. `attempt` counts from 1, so a policy
 * with maxRetries = 3 allows attempts 1 through 4.
 */
export function nextRetryState<T>(
  attempt: number,
  outcome: AttemptOutcome<T>,
  policy: RetryPolicy,
): RetryState<T> {
  if (outcome.ok) {
    return { phase: 'succeeded', attempt, value: outcome.value }
  }

  const { error } = outcome
  if (!error.isRetryable || attempt > policy.maxRetries) {
    return { phase: 'failed', attempt, error }
  }

  const delayMs =
    error.kind === 'rate_limited'
      ? (outcome.retryAfterMs ?? policy.rateLimitDelayMs)
      : policy.backoff(attempt)

  return { phase: 'retrying', attempt, delayMs, error }
}

export interface RunWithRetryOptions {
  sleep?: Sleep
  /** Once aborted, no further attempt starts; the last error is returned. */
  signal?: AbortSignal
  /** Label used in log lines, usually the URL. */
  label?: string
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: FetchError; attempts: number }

/**
 * Drives `operation` through the retry state machine until it succeeds or fails.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy,
  options: RunWithRetryOptions = {},
): Promise<RetryResult<T>> {
  const wait = options.sleep ?? defaultSleep
  const label = options.label ?? 'operation'
  let state: RetryState<T> = initialRetryState()

  for (;;) {
    switch (state.phase) {
      case 'attempting': {
        const outcome = await operation(state.attempt)
        state = nextRetryState(state.attempt, outcome, policy)
        break
      }
      case 'retrying': {
        if (!options.signal?.aborted) {
          log.warning(
            `Attempt ${state.attempt}/${policy.maxRetries + 1} for ${label} failed ` +
              `(${state.error.kind}): ${state.error.message}. Retrying in ${state.delayMs}ms...`,
          )
          await wait(state.delayMs, options.signal)
        }
        if (options.signal?.aborted) {
          log.info(`Stopped retrying ${label} after ${state.attempt} attempt(s): aborted`)
          state = { phase: 'failed', attempt: state.attempt, error: state.error }
        } else {
          state = { phase: 'attempting', attempt: state.attempt + 1 }
        }
        break
      }
      case 'succeeded':
        return { ok: true, value: state.value, attempts: state.attempt }
      case 'failed':
        state.error.attempts = state.attempt
        return { ok: false, error: state.error, attempts: state.attempt }
    }
  }
}
