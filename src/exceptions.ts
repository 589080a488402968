function createErrorClass<T extends Record<string, unknown>>(
  name: string,
  extraProps?: (instance: OnetScraperError & T) => void,
) {
  return class extends OnetScraperError {
    constructor(message: string, options?: ErrorOptions) {
      super(message, options)
      this.name = name
      Object.setPrototypeOf(this, new.target.prototype)
      if (extraProps) {
        extraProps(this as OnetScraperError & T)
      }
    }
  } as new (
    message: string,
    options?: ErrorOptions,
  ) => OnetScraperError & T
}

export class OnetScraperError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'OnetScraperError'
    Object.setPrototypeOf(this, OnetScraperError.prototype)
  }
}

export class ScrapingError extends createErrorClass('ScrapingError') {}
export class ConfigurationError extends createErrorClass('ConfigurationError') {}

export type FetchErrorKind = 'transient' | 'permanent' | 'rate_limited'

/**
 * Connection-level failure. Carried as the `cause` of a transient FetchError.
 */
export class NetworkError extends createErrorClass('NetworkError') {}

/**
 * Terminal failure of a fetch after the retry policy has run its course.
 * `attempts` counts every request that was sent, including the first.
 */
export class FetchError extends OnetScraperError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly url: string,
    public readonly status: number | null = null,
    public attempts: number = 1,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'FetchError'
    Object.setPrototypeOf(this, FetchError.prototype)
  }

  get isRetryable(): boolean {
    return this.kind !== 'permanent'
  }
}

export class RateLimitError extends FetchError {
  constructor(
    message: string,
    url: string,
    public suggestedWaitTime: number = 60,
  ) {
    super(message, 'rate_limited', url, 429)
    this.name = 'RateLimitError'
    Object.setPrototypeOf(this, RateLimitError.prototype)
  }
}
