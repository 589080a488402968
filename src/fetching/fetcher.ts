import type { CheerioAPI } from 'cheerio'
import * as cheerio from 'cheerio'
import type { FetcherOptions, ResolvedFetcherOptions } from '../config/settings'
import { FetcherOptionsSchema } from '../config/settings'
import { FetchError, NetworkError, RateLimitError } from '../exceptions'
import type { Sleep } from '../utils'
import { createLogger } from '../utils/logger'
import type { AttemptOutcome, BackoffStrategy, RetryPolicy } from './retry'
import { fixedBackoff, runWithRetry } from './retry'

const log = createLogger('fetcher')

export interface FetchedPage {
  /** Final URL after redirects. */
  url: string
  status: number
  document: CheerioAPI
  attempts: number
}

export type FetchOutcome =
  | { ok: true; page: FetchedPage }
  | { ok: false; error: FetchError }

export type FetchImplementation = (
  input: string,
  init: RequestInit,
) => Promise<Response>

export interface FetchOptions {
  /** Stops further retries once aborted. A request already sent is not cancelled. */
  signal?: AbortSignal
}

export interface PageFetcherOptions extends FetcherOptions {
  /** Defaults to a fixed delay of `retryDelay` seconds. */
  backoff?: BackoffStrategy
  fetchImpl?: FetchImplementation
  sleep?: Sleep
}

/**
 * Fetches pages and parses them into cheerio documents. Failures are returned,
 * never thrown, as a FetchError classified transient, permanent or rate_limited.
 */
export class PageFetcher {
  private readonly options: ResolvedFetcherOptions
  private readonly policy: RetryPolicy
  private readonly fetchImpl: FetchImplementation
  private readonly sleep?: Sleep

  constructor(options: PageFetcherOptions = {}) {
    const { backoff, fetchImpl, sleep, ...rest } = options
    this.options = FetcherOptionsSchema.parse(rest)
    this.policy = {
      maxRetries: this.options.maxRetries,
      backoff: backoff ?? fixedBackoff(this.options.retryDelay * 1000),
      rateLimitDelayMs: this.options.rateLimitDelay * 1000,
    }
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init))
    this.sleep = sleep
  }

  get maxAttempts(): number {
    return this.policy.maxRetries + 1
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchOutcome> {
    const result = await runWithRetry(
      (attempt) => this.attempt(url, attempt),
      this.policy,
      { sleep: this.sleep, label: url, signal: options.signal },
    )

    if (!result.ok) {
      log.error(
        `Giving up on ${url} after ${result.attempts} attempt(s): ${result.error.message}`,
      )
      return { ok: false, error: result.error }
    }

    log.debug(`Fetched ${url} in ${result.attempts} attempt(s)`)
    return { ok: true, page: result.value }
  }

  private async attempt(
    url: string,
    attempt: number,
  ): Promise<AttemptOutcome<FetchedPage>> {
    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.options.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.options.timeout * 1000),
      })
    } catch (e) {
      return { ok: false, error: this.classifyRequestFailure(e, url) }
    }

    if (response.status === 429) {
      await discardBody(response)
      const retryAfterMs = clampWait(
        parseRetryAfter(response.headers.get('retry-after')),
        this.options.maxRateLimitDelay * 1000,
      )
      return {
        ok: false,
        error: new RateLimitError(
          `Rate limited by ${new URL(url).host} (HTTP 429)`,
          url,
          (retryAfterMs ?? this.policy.rateLimitDelayMs) / 1000,
        ),
        retryAfterMs,
      }
    }

    if (response.status >= 500) {
      await discardBody(response)
      return {
        ok: false,
        error: new FetchError(
          `Server error ${response.status} for ${url}`,
          'transient',
          url,
          response.status,
        ),
      }
    }

    if (!response.ok) {
      await discardBody(response)
      return {
        ok: false,
        error: new FetchError(
          `HTTP ${response.status} for ${url}`,
          'permanent',
          url,
          response.status,
        ),
      }
    }

    let html: string
    try {
      html = await response.text()
    } catch (e) {
      return {
        ok: false,
        error: new FetchError(
          `Body of ${url} could not be read completely: ${describe(e)}`,
          'transient',
          url,
          response.status,
        ),
      }
    }

    return {
      ok: true,
      value: {
        url: response.url || url,
        status: response.status,
        document: cheerio.load(html),
        attempts: attempt,
      },
    }
  }

  private classifyRequestFailure(error: unknown, url: string): FetchError {
    const cause = new NetworkError(describe(error), { cause: error })
    if (
      error instanceof Error &&
      (error.name === 'TimeoutError' || error.name === 'AbortError')
    ) {
      return new FetchError(
        `Request to ${url} timed out after ${this.options.timeout}s`,
        'transient',
        url,
        null,
        1,
        { cause },
      )
    }

    return new FetchError(
      `Request to ${url} failed: ${describe(error)}`,
      'transient',
      url,
      null,
      1,
      { cause },
    )
  }
}

/**
 * Releases the underlying connection when the body is not going to be read.
 */
async function discardBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) return
  try {
    await response.body.cancel()
  } catch (e) {
    log.debug(`Could not cancel response body: ${describe(e)}`)
  }
}

function clampWait(ms: number | undefined, maxMs: number): number | undefined {
  return ms === undefined ? undefined : Math.min(ms, maxMs)
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined
  const seconds = Number(header.trim())
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000

  const date = Date.parse(header)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - Date.now())
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : ''
    return `${error.message}${cause}`
  }
  return String(error)
}
