import fs from 'node:fs/promises'
import type { CodeOutcome, CorpusSummary } from './scrapers/corpus'

export interface ProgressCallback {
  onStart(total: number): Promise<void> | void
  onProgress(code: string, outcome: CodeOutcome, corpusSize: number): Promise<void> | void
  onComplete(summary: CorpusSummary): Promise<void> | void
  onInfo(message: string): Promise<void> | void
  onWarning(message: string): Promise<void> | void
  onError(message: string, error?: Error): Promise<void> | void
}

/**
 * Factory function to create a silent callback that does nothing
 * @returns ProgressCallback that ignores all events
 */
export function createSilentCallback(): ProgressCallback {
  return {
    onStart: () => {},
    onProgress: () => {},
    onComplete: () => {},
    onInfo: () => {},
    onWarning: () => {},
    onError: () => {},
  }
}

/**
 * Factory function to create a console callback that logs to stdout/stderr
 * @param verbose - Whether to show every code or only every tenth one
 */
export function createConsoleCallback(verbose: boolean = true): ProgressCallback {
  let total = 0
  let done = 0

  const clearLine = () => {
    if (process.stdout.isTTY) {
      process.stdout.write('\r\x1b[K')
    }
  }

  return {
    onStart: (count) => {
      total = count
      done = 0
      console.info(`Starting corpus build: ${count} occupation code(s)`)
    },
    onProgress: (code, outcome, corpusSize) => {
      done++
      if (!verbose && done % 10 !== 0 && done !== total) return

      const percent = total > 0 ? Math.floor((done * 100) / total) : 100
      const barLength = 30
      const filled = Math.floor((barLength * percent) / 100)
      const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled)
      const output = `\r[${bar}] ${percent}% - ${code} ${outcome} (corpus: ${corpusSize})`

      if (process.stdout.isTTY) {
        process.stdout.write(output)
      } else {
        console.log(output.trim())
      }
    },
    onComplete: (summary) => {
      clearLine()
      console.info(
        `Completed corpus build: ${summary.corpusSize} record(s), ` +
          `${summary.ledgerSize} failure(s), ${summary.cancelled} cancelled`,
      )
    },
    onInfo: (message) => {
      clearLine()
      console.info(`[Info] ${message}`)
    },
    onWarning: (message) => {
      clearLine()
      console.warn(`[Warning] ${message}`)
    },
    onError: (message, error) => {
      clearLine()
      console.error(`Error: ${message}`, error?.message ?? '')
    },
  }
}

/**
 * Factory function to create a JSON log callback that appends one event per line
 * @param logFile - Path to the log file
 */
export function createJSONLogCallback(logFile: string): ProgressCallback {
  async function log(eventType: string, data: Record<string, unknown>): Promise<void> {
    const entry = {
      timestamp: new Date().toISOString(),
      event_type: eventType,
      ...data,
    }

    try {
      await fs.appendFile(logFile, `${JSON.stringify(entry)}\n`)
    } catch (e) {
      console.error(`Failed to write to log file: ${e}`)
    }
  }

  return {
    onStart: async (total) => {
      await log('start', { total })
    },
    onProgress: async (code, outcome, corpusSize) => {
      await log('progress', { code, outcome, corpus_size: corpusSize })
    },
    onComplete: async (summary) => {
      await log('complete', { ...summary })
    },
    onInfo: async (message) => {
      await log('info', { message })
    },
    onWarning: async (message) => {
      await log('warning', { message })
    },
    onError: async (message, error) => {
      await log('error', {
        error: message,
        error_type: error?.name ?? 'Error',
        details: error?.message,
      })
    },
  }
}

/**
 * Factory function to create a multi callback that forwards events to multiple callbacks
 */
export function createMultiCallback(...callbacks: ProgressCallback[]): ProgressCallback {
  return {
    onStart: async (total) => {
      await Promise.all(callbacks.map((c) => c.onStart(total)))
    },
    onProgress: async (code, outcome, corpusSize) => {
      await Promise.all(callbacks.map((c) => c.onProgress(code, outcome, corpusSize)))
    },
    onComplete: async (summary) => {
      await Promise.all(callbacks.map((c) => c.onComplete(summary)))
    },
    onInfo: async (message) => {
      await Promise.all(callbacks.map((c) => c.onInfo(message)))
    },
    onWarning: async (message) => {
      await Promise.all(callbacks.map((c) => c.onWarning(message)))
    },
    onError: async (message, error) => {
      await Promise.all(callbacks.map((c) => c.onError(message, error)))
    },
  }
}
