export * from './analysis'
export type { ProgressCallback } from './callbacks'
export {
  createConsoleCallback,
  createJSONLogCallback,
  createMultiCallback,
  createSilentCallback,
} from './callbacks'
export * from './config/constants'
export type {
  CorpusOptions,
  FetcherOptions,
  ResolvedCorpusOptions,
  ResolvedFetcherOptions,
  ResolvedScraperConfig,
  ScraperConfig,
} from './config/settings'
export {
  CorpusOptionsSchema,
  FetcherOptionsSchema,
  loadConfigFromEnv,
  parseScraperConfig,
  ScraperConfigSchema,
} from './config/settings'
export type { FetchErrorKind } from './exceptions'
export {
  ConfigurationError,
  FetchError,
  NetworkError,
  OnetScraperError,
  RateLimitError,
  ScrapingError,
} from './exceptions'
export * from './extraction'
export type {
  FetchedPage,
  FetchImplementation,
  FetchOutcome,
  PageFetcherOptions,
} from './fetching/fetcher'
export { PageFetcher, parseRetryAfter } from './fetching/fetcher'
export type {
  AttemptOutcome,
  BackoffStrategy,
  RetryPolicy,
  RetryResult,
  RetryState,
} from './fetching/retry'
export {
  exponentialBackoff,
  fixedBackoff,
  initialRetryState,
  nextRetryState,
  runWithRetry,
} from './fetching/retry'
export * from './models'
export * from './scrapers'
export type { ValidationOptions, ValidationResult } from './validation/validator'
export { DEFAULT_COMPLETENESS_THRESHOLD, validateOccupation } from './validation/validator'
export type { Limiter, Sleep } from './utils'
export { cleanText, createLimiter, extractOccupationCode, sleep } from './utils'
export type { Logger } from './utils/logger'
export { createLogger, log } from './utils/logger'
