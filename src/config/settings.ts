import { z } from 'zod'
import { ConfigurationError } from '../exceptions'
import { DEFAULT_HEADERS, ONET_BASE_URL } from './constants'

/**
 * Durations are in seconds, matching the rest of the scraping constants.
 */
export const FetcherOptionsSchema = z.object({
  timeout: z.number().positive().optional().default(10),
  maxRetries: z.number().int().min(0).optional().default(3),
  retryDelay: z.number().min(0).optional().default(2),
  rateLimitDelay: z.number().min(0).optional().default(60),
  /** Upper bound on a server-supplied Retry-After wait. */
  maxRateLimitDelay: z.number().min(0).optional().default(300),
  headers: z
    .record(z.string(), z.string())
    .optional()
    .default({ ...DEFAULT_HEADERS }),
})

export type FetcherOptions = z.input<typeof FetcherOptionsSchema>
export type ResolvedFetcherOptions = z.infer<typeof FetcherOptionsSchema>

export const CorpusOptionsSchema = z.object({
  requestDelay: z.number().min(0).optional().default(1),
  concurrency: z.number().int().min(1).optional().default(1),
  completenessThreshold: z.number().min(0).max(1).optional().default(0.5),
  excludeFlagged: z.boolean().optional().default(false),
  preserveOrder: z.boolean().optional().default(true),
})

export type CorpusOptions = z.input<typeof CorpusOptionsSchema>
export type ResolvedCorpusOptions = z.infer<typeof CorpusOptionsSchema>

export const ScraperConfigSchema = z.object({
  baseUrl: z.string().url().optional().default(ONET_BASE_URL),
  fetcher: FetcherOptionsSchema.optional().default({}),
  corpus: CorpusOptionsSchema.optional().default({}),
})

export type ScraperConfig = z.input<typeof ScraperConfigSchema>
export type ResolvedScraperConfig = z.infer<typeof ScraperConfigSchema>

export function parseScraperConfig(input: ScraperConfig = {}): ResolvedScraperConfig {
  const result = ScraperConfigSchema.safeParse(input)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid scraper configuration: ${details}`)
  }
  return result.data
}

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
): number | undefined {
  const raw = env[key]?.trim()
  if (!raw) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got '${raw}'`)
  }
  return value
}

function readBoolean(
  env: NodeJS.ProcessEnv,
  key: string,
): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase()
  if (!raw) return undefined
  if (['1', 'true', 'yes'].includes(raw)) return true
  if (['0', 'false', 'no'].includes(raw)) return false
  throw new ConfigurationError(`${key} must be a boolean, got '${raw}'`)
}

/**
 * Builds a config from ONET_* environment variables. Unset variables fall back
 * to the schema defaults.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ResolvedScraperConfig {
  return parseScraperConfig({
    baseUrl: env.ONET_BASE_URL?.trim() || undefined,
    fetcher: {
      timeout: readNumber(env, 'ONET_TIMEOUT'),
      maxRetries: readNumber(env, 'ONET_MAX_RETRIES'),
      retryDelay: readNumber(env, 'ONET_RETRY_DELAY'),
      rateLimitDelay: readNumber(env, 'ONET_RATE_LIMIT_DELAY'),
      maxRateLimitDelay: readNumber(env, 'ONET_MAX_RATE_LIMIT_DELAY'),
    },
    corpus: {
      requestDelay: readNumber(env, 'ONET_REQUEST_DELAY'),
      concurrency: readNumber(env, 'ONET_CONCURRENCY'),
      completenessThreshold: readNumber(env, 'ONET_COMPLETENESS_THRESHOLD'),
      excludeFlagged: readBoolean(env, 'ONET_EXCLUDE_FLAGGED'),
    },
  })
}
