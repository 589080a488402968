import type { ProgressCallback } from '../callbacks'
import { createSilentCallback } from '../callbacks'
import type { CorpusOptions, ResolvedCorpusOptions } from '../config/settings'
import { CorpusOptionsSchema } from '../config/settings'
import { ONET_BASE_URL } from '../config/constants'
import type { FetchErrorKind } from '../exceptions'
import { ScrapingError } from '../exceptions'
import type { HealthReport } from '../extraction/health'
import { buildFieldHealthReport } from '../extraction/health'
import type { FieldDiagnostic } from '../extraction/types'
import { PageFetcher } from '../fetching/fetcher'
import type { OccupationRecord } from '../models/occupation'
import type { Sleep } from '../utils'
import { sleep as defaultSleep } from '../utils'
import { createLogger } from '../utils/logger'
import type { ValidationResult } from '../validation/validator'
import { validateOccupation } from '../validation/validator'
import type { OccupationTarget } from './occupation-index'
import { OccupationAssembler, occupationUrl } from './occupation'

const log = createLogger('corpus')

export type CodeState =
  | 'pending'
  | 'fetching'
  | 'extracting'
  | 'validated'
  | 'stored'
  | 'failed'

export const CODE_TRANSITIONS: Readonly<Record<CodeState, readonly CodeState[]>> = {
  pending: ['fetching'],
  fetching: ['extracting', 'failed'],
  extracting: ['validated', 'failed'],
  validated: ['stored', 'failed'],
  stored: [],
  failed: [],
}

export function canTransition(from: CodeState, to: CodeState): boolean {
  return CODE_TRANSITIONS[from].includes(to)
}

/**
 * Lifecycle of one occupation code within a run.
 */
export class CodeTracker {
  private current: CodeState = 'pending'

  constructor(readonly code: string) {}

  get state(): CodeState {
    return this.current
  }

  get isTerminal(): boolean {
    return CODE_TRANSITIONS[this.current].length === 0
  }

  transition(to: CodeState): void {
    if (!canTransition(this.current, to)) {
      throw new ScrapingError(`Illegal transition for ${this.code}: ${this.current} -> ${to}`)
    }
    this.current = to
  }
}

export type FailureStage = 'input' | 'fetch' | 'extract' | 'validate'

export interface FailureEntry {
  code: string
  reason: string
  /** Requests sent for this code; 0 when it never reached the network. */
  attempts: number
  stage: FailureStage
  errorKind?: FetchErrorKind
}

export type CodeOutcome =
  | 'accepted'
  | 'flagged'
  | 'rejected'
  | 'failed'
  | 'excluded'
  | 'duplicate'

export interface CorpusSummary {
  total: number
  accepted: number
  flagged: number
  rejected: number
  failed: number
  excluded: number
  duplicates: number
  cancelled: number
  corpusSize: number
  ledgerSize: number
}

export interface CorpusResult {
  records: OccupationRecord[]
  ledger: FailureEntry[]
  /** Codes never taken off the queue because the run was aborted. */
  cancelled: string[]
  summary: CorpusSummary
  health: HealthReport
  states: ReadonlyMap<string, CodeState>
}

export interface CorpusBuilderOptions extends CorpusOptions {
  fetcher?: PageFetcher
  assembler?: OccupationAssembler
  callback?: ProgressCallback
  baseUrl?: string
  sleep?: Sleep
}

export interface BuildOptions {
  signal?: AbortSignal
}

interface QueuedTarget {
  index: number
  target: OccupationTarget
  tracker: CodeTracker
}

interface RunState {
  records: Array<{ index: number; record: OccupationRecord }>
  ledger: Array<{ index: number; entry: FailureEntry }>
  diagnostics: FieldDiagnostic[][]
  counts: Record<CodeOutcome, number>
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function toTarget(input: string | OccupationTarget): OccupationTarget {
  return typeof input === 'string' ? { code: input.trim() } : { ...input, code: input.code.trim() }
}

/**
 * Drives each occupation code through fetch, extraction and validation, and
 * collects accepted records into a corpus and everything else into a failure
 * ledger. A failure for one code never stops the run.
 */
export class CorpusBuilder {
  private readonly options: ResolvedCorpusOptions
  private readonly fetcher: PageFetcher
  private readonly assembler: OccupationAssembler
  private readonly callback: ProgressCallback
  private readonly baseUrl: string
  private readonly sleep: Sleep

  constructor(options: CorpusBuilderOptions = {}) {
    const { fetcher, assembler, callback, baseUrl, sleep, ...rest } = options
    this.options = CorpusOptionsSchema.parse(rest)
    this.fetcher = fetcher ?? new PageFetcher()
    this.assembler = assembler ?? new OccupationAssembler()
    this.callback = callback ?? createSilentCallback()
    this.baseUrl = baseUrl ?? ONET_BASE_URL
    this.sleep = sleep ?? defaultSleep
  }

  async build(
    inputs: ReadonlyArray<string | OccupationTarget>,
    buildOptions: BuildOptions = {},
  ): Promise<CorpusResult> {
    const { signal } = buildOptions
    const run: RunState = {
      records: [],
      ledger: [],
      diagnostics: [],
      counts: { accepted: 0, flagged: 0, rejected: 0, failed: 0, excluded: 0, duplicate: 0 },
    }
    const states = new Map<string, CodeState>()
    const queue: QueuedTarget[] = []
    const seen = new Set<string>()

    await this.notify('onStart', (callback) => callback.onStart(inputs.length))

    for (const [index, input] of inputs.entries()) {
      const target = toTarget(input)
      if (seen.has(target.code)) {
        run.ledger.push({
          index,
          entry: { code: target.code, reason: 'duplicate code in input', attempts: 0, stage: 'input' },
        })
        await this.report(run, target.code, 'duplicate')
        continue
      }
      seen.add(target.code)
      const tracker = new CodeTracker(target.code)
      states.set(target.code, tracker.state)
      queue.push({ index, target, tracker })
    }

    log.info(
      `Building corpus from ${queue.length} code(s) with ${this.options.concurrency} worker(s)`,
    )

    let next = 0
    const take = (): QueuedTarget | undefined => (signal?.aborted ? undefined : queue[next++])

    const worker = async (): Promise<void> => {
      let fetched = false
      for (;;) {
        if (fetched && next < queue.length) {
          await this.sleep(this.options.requestDelay * 1000, signal)
        }
        const item = take()
        if (!item) return
        fetched = true
        await this.process(item, run, signal)
        states.set(item.target.code, item.tracker.state)
      }
    }

    const workers = Math.max(1, Math.min(this.options.concurrency, queue.length))
    await Promise.all(Array.from({ length: workers }, () => worker()))

    const cancelled = queue
      .filter((item) => item.tracker.state === 'pending')
      .map((item) => item.target.code)
    if (cancelled.length > 0) {
      log.warning(`Run aborted: ${cancelled.length} code(s) cancelled`)
      await this.notify('onWarning', (callback) =>
        callback.onWarning(`Run aborted, ${cancelled.length} code(s) not processed`),
      )
    }

    if (this.options.preserveOrder) {
      run.records.sort((a, b) => a.index - b.index)
      run.ledger.sort((a, b) => a.index - b.index)
    }

    const records = run.records.map(({ record }) => record)
    const ledger = run.ledger.map(({ entry }) => entry)
    const summary: CorpusSummary = {
      total: inputs.length,
      accepted: run.counts.accepted,
      flagged: run.counts.flagged,
      rejected: run.counts.rejected,
      failed: run.counts.failed,
      excluded: run.counts.excluded,
      duplicates: run.counts.duplicate,
      cancelled: cancelled.length,
      corpusSize: records.length,
      ledgerSize: ledger.length,
    }

    log.success(
      `Corpus built: ${summary.corpusSize} record(s), ${summary.ledgerSize} failure(s), ` +
        `${summary.cancelled} cancelled`,
    )
    await this.notify('onComplete', (callback) => callback.onComplete(summary))

    return {
      records,
      ledger,
      cancelled,
      summary,
      health: buildFieldHealthReport(run.diagnostics),
      states,
    }
  }

  private async process(
    item: QueuedTarget,
    run: RunState,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const { index, target, tracker } = item
    const { code } = target
    const url = target.url ?? occupationUrl(code, this.baseUrl)

    const fail = async (entry: Omit<FailureEntry, 'code'>, outcome: CodeOutcome) => {
      tracker.transition('failed')
      run.ledger.push({ index, entry: { code, ...entry } })
      await this.report(run, code, outcome)
    }

    tracker.transition('fetching')
    const fetched = await this.fetcher.fetch(url, { signal })
    if (!fetched.ok) {
      const { error } = fetched
      await this.notify('onError', (callback) => callback.onError(`Failed to fetch ${code}`, error))
      await fail(
        { reason: error.message, attempts: error.attempts, stage: 'fetch', errorKind: error.kind },
        'failed',
      )
      return
    }

    tracker.transition('extracting')
    const attempts = fetched.page.attempts
    let verdict: ValidationResult
    try {
      const assembled = this.assembler.assemble(code, fetched.page.document, {
        family: target.family,
        url: fetched.page.url,
      })
      run.diagnostics.push(assembled.diagnostics)
      verdict = validateOccupation(assembled.record, {
        completenessThreshold: this.options.completenessThreshold,
      })
    } catch (e) {
      const reason = describeError(e)
      log.error(`Extraction failed for ${code}: ${reason}`)
      await fail({ reason, attempts, stage: 'extract' }, 'failed')
      return
    }
    if (verdict.status === 'rejected') {
      log.warning(`Rejected ${code}: ${verdict.reasons.join('; ')}`)
      await fail({ reason: verdict.reasons.join('; '), attempts, stage: 'validate' }, 'rejected')
      return
    }

    tracker.transition('validated')
    if (verdict.status === 'flagged') {
      const reasons = verdict.reasons.join('; ')
      await this.notify('onWarning', (callback) => callback.onWarning(`${code} flagged: ${reasons}`))
      if (this.options.excludeFlagged) {
        await fail({ reason: reasons, attempts, stage: 'validate' }, 'excluded')
        return
      }
    }

    tracker.transition('stored')
    run.records.push({ index, record: verdict.record })
    await this.report(run, code, verdict.status)
  }

  private async report(run: RunState, code: string, outcome: CodeOutcome): Promise<void> {
    run.counts[outcome]++
    const corpusSize = run.records.length
    await this.notify('onProgress', (callback) => callback.onProgress(code, outcome, corpusSize))
  }

  /**
   * Callback failures are logged and never end the run.
   */
  private async notify(
    hook: keyof ProgressCallback,
    call: (callback: ProgressCallback) => Promise<void> | void,
  ): Promise<void> {
    try {
      await call(this.callback)
    } catch (e) {
      log.warning(`Progress callback ${hook} failed: ${describeError(e)}`)
    }
  }
}

/**
 * Convenience wrapper for a one-off run.
 */
export async function buildCorpus(
  inputs: ReadonlyArray<string | OccupationTarget>,
  options: CorpusBuilderOptions & BuildOptions = {},
): Promise<CorpusResult> {
  const { signal, ...builderOptions } = options
  return new CorpusBuilder(builderOptions).build(inputs, { signal })
}
