/**
 * Standardized Logging Utilities
 *
 * Leveled console output with the same Unicode markers everywhere.
 * Components take a scoped logger so a long corpus run can be filtered by stage.
 */

type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error' | 'skip'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  skip: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS
}

function resolveLevelPriority(): number {
  const raw = process.env.LOG_LEVEL?.toLowerCase() ?? 'info'
  if (raw === 'silent') return Number.POSITIVE_INFINITY
  return isLogLevel(raw) ? LOG_LEVELS[raw] : LOG_LEVELS.info
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= resolveLevelPriority()
}

export interface Logger {
  info(message: string): void
  debug(message: string): void
  success(message: string): void
  warning(message: string): void
  error(message: string): void
  skip(message: string): void
}

export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : ''

  return {
    info: (message) => {
      if (shouldLog('info')) console.info(`${prefix}${message}`)
    },

    debug: (message) => {
      if (shouldLog('debug')) console.debug(`${prefix}${message}`)
    },

    /**
     * Successful operation (✓)
     */
    success: (message) => {
      if (shouldLog('success')) console.info(`✓ ${prefix}${message}`)
    },

    /**
     * Warning message (⚠)
     */
    warning: (message) => {
      if (shouldLog('warn')) console.warn(`⚠ ${prefix}${message}`)
    },

    /**
     * Error message (✗)
     */
    error: (message) => {
      if (shouldLog('error')) console.error(`✗ ${prefix}${message}`)
    },

    /**
     * Skipped operation (⊳)
     */
    skip: (message) => {
      if (shouldLog('skip')) console.debug(`⊳ ${prefix}${message}`)
    },
  }
}

export const log = createLogger()
