export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Waits `ms` milliseconds. Resolves early, without throwing, when `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve()
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })

/**
 * Collapses runs of whitespace and trims separator punctuation left over
 * from removed labels ("— Python" becomes "Python").
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[\s\-–—:;,•·]+/, '')
    .replace(/[\s\-–—:;,•·]+$/, '')
    .trim()
}

export function toAbsoluteUrl(href: string, baseUrl: string): string {
  return new URL(href, baseUrl).toString()
}

/**
 * Extracts an occupation code from a detail-page URL such as
 * `/link/summary/15-1252.00`.
 */
export function extractOccupationCode(url: string): string | null {
  const match = url.match(/\/summary\/(\d{2}-\d{4}\.\d{2})/)
  return match?.[1] ?? null
}

export interface Limiter {
  run<T>(fn: () => Promise<T>): Promise<T>
  readonly activeCount: number
  readonly pendingCount: number
}

/**
 * Runs at most `concurrency` tasks at once; the rest wait in FIFO order.
 */
export function createLimiter(concurrency: number): Limiter {
  const queue: Array<() => void> = []
  let activeCount = 0

  const next = () => {
    if (activeCount >= concurrency) return
    const start = queue.shift()
    if (!start) return
    activeCount++
    start()
  }

  return {
    run: <T>(fn: () => Promise<T>): Promise<T> =>
      new Promise<T>((resolve, reject) => {
        queue.push(() => {
          void fn()
            .then(resolve, reject)
            .finally(() => {
              activeCount--
              next()
            })
        })
        next()
      }),
    get activeCount() {
      return activeCount
    },
    get pendingCount() {
      return queue.length
    },
  }
}
