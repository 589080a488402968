import { TRACKED_FIELDS } from '../config/constants'
import type { FieldDiagnostic, FieldHealth, FieldKey, HealthStatus } from './types'

export interface HealthThresholds {
  healthyHitRate: number
  degradedHitRate: number
  /** Above this share of fallback matches a field is degraded even when it always matches. */
  maxFallbackRate: number
}

const DEFAULT_THRESHOLDS: HealthThresholds = {
  healthyHitRate: 0.65,
  degradedHitRate: 0.35,
  maxFallbackRate: 0.5,
}

export interface HealthReport {
  pages: number
  status: HealthStatus
  fields: FieldHealth[]
}

const STATUS_ORDER: readonly HealthStatus[] = ['healthy', 'degraded', 'broken']

interface FieldTally {
  pages: number
  hits: number
  fallbacks: number
  probeUsage: Record<string, number>
}

/**
 * Summarizes how each field resolved across the pages of a run. A field whose
 * first probe stops matching shows up as a rising fallback rate before it
 * shows up as missing data.
 */
export function buildFieldHealthReport(
  pages: ReadonlyArray<readonly FieldDiagnostic[]>,
  thresholds: Partial<HealthThresholds> = {},
): HealthReport {
  const effective = {
    ...DEFAULT_THRESHOLDS,
    ...thresholds,
  }

  const tallies = new Map<FieldKey, FieldTally>(
    TRACKED_FIELDS.map((field) => [field, { pages: 0, hits: 0, fallbacks: 0, probeUsage: {} }]),
  )

  for (const diagnostics of pages) {
    for (const diagnostic of diagnostics) {
      const tally = tallies.get(diagnostic.field)
      if (!tally) continue
      tally.pages++
      if (diagnostic.probe === null) continue
      tally.hits++
      if ((diagnostic.rank ?? 0) > 0) tally.fallbacks++
      tally.probeUsage[diagnostic.probe] = (tally.probeUsage[diagnostic.probe] ?? 0) + 1
    }
  }

  const fields = TRACKED_FIELDS.map((field) =>
    buildFieldHealth(field, tallies.get(field), effective),
  )

  return {
    pages: pages.length,
    status: worstStatus(fields.map((f) => f.status)),
    fields,
  }
}

function buildFieldHealth(
  field: FieldKey,
  tally: FieldTally | undefined,
  thresholds: HealthThresholds,
): FieldHealth {
  const pages = tally?.pages ?? 0
  const hits = tally?.hits ?? 0
  const hitRate = pages > 0 ? hits / pages : 0
  const fallbackRate = hits > 0 ? (tally?.fallbacks ?? 0) / hits : 0
  const status = computeStatus(hitRate, fallbackRate, pages, thresholds)

  return {
    field,
    status,
    hitRate,
    fallbackRate,
    probeUsage: { ...tally?.probeUsage },
    message: buildMessage(field, status, hitRate, fallbackRate),
  }
}

export function computeStatus(
  hitRate: number,
  fallbackRate: number,
  pages: number,
  thresholds: HealthThresholds = DEFAULT_THRESHOLDS,
): HealthStatus {
  if (pages === 0 || hitRate <= 0) return 'broken'
  if (hitRate >= thresholds.healthyHitRate) {
    return fallbackRate > thresholds.maxFallbackRate ? 'degraded' : 'healthy'
  }
  if (hitRate >= thresholds.degradedHitRate) return 'degraded'
  return 'broken'
}

export function worstStatus(statuses: readonly HealthStatus[]): HealthStatus {
  let worst = 0
  for (const status of statuses) {
    worst = Math.max(worst, STATUS_ORDER.indexOf(status))
  }
  return STATUS_ORDER[worst] ?? 'broken'
}

function buildMessage(
  field: FieldKey,
  status: HealthStatus,
  hitRate: number,
  fallbackRate: number,
): string {
  const hits = `${Math.round(hitRate * 100)}% of pages`

  if (status === 'healthy') {
    return `${field} extraction healthy: matched on ${hits}`
  }

  if (status === 'degraded') {
    return `${field} extraction degraded: matched on ${hits}, ${Math.round(fallbackRate * 100)}% via fallback probes`
  }

  return `${field} extraction broken: no probe matched reliably`
}
