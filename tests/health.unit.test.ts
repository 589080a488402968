import { describe, expect, test } from 'vitest'
import { TRACKED_FIELDS } from '../src/config/constants'
import { buildFieldHealthReport, computeStatus, worstStatus } from '../src/extraction/health'
import type { FieldDiagnostic, FieldKey } from '../src/extraction/types'

function page(overrides: Partial<Record<FieldKey, { probe: string | null; rank: number | null }>>): FieldDiagnostic[] {
  return TRACKED_FIELDS.map((field) => {
    const override = overrides[field]
    if (override) return { field, ...override, itemCount: override.probe ? 1 : 0 }
    return { field, probe: `list(#${field})`, rank: 0, itemCount: 1 }
  })
}

describe('extraction health', () => {
  test('status thresholds follow hit rate', () => {
    expect(computeStatus(1, 0, 10)).toBe('healthy')
    expect(computeStatus(0.65, 0, 10)).toBe('healthy')
    expect(computeStatus(0.5, 0, 10)).toBe('degraded')
    expect(computeStatus(0.2, 0, 10)).toBe('broken')
    expect(computeStatus(0, 0, 10)).toBe('broken')
    expect(computeStatus(1, 0, 0)).toBe('broken')
  })

  test('heavy fallback use degrades an otherwise healthy field', () => {
    expect(computeStatus(1, 0.75, 4)).toBe('degraded')
  })

  test('summarizes hits, fallbacks and probe usage per field', () => {
    const report = buildFieldHealthReport([
      page({ tasks: { probe: 'list(#wrapper_Tasks .moreinfo li)', rank: 1 } }),
      page({ tasks: { probe: 'list(#Tasks li)', rank: 0 } }),
      page({ tasks: { probe: null, rank: null } }),
      page({ tasks: { probe: null, rank: null } }),
    ])

    const tasks = report.fields.find((f) => f.field === 'tasks')
    expect(tasks).toEqual({
      field: 'tasks',
      status: 'degraded',
      hitRate: 0.5,
      fallbackRate: 0.5,
      probeUsage: { 'list(#wrapper_Tasks .moreinfo li)': 1, 'list(#Tasks li)': 1 },
      message: 'tasks extraction degraded: matched on 50% of pages, 50% via fallback probes',
    })
    expect(report.pages).toBe(4)
    expect(report.status).toBe('degraded')
  })

  test('a run with no pages is broken', () => {
    const report = buildFieldHealthReport([])
    expect(report.status).toBe('broken')
    expect(report.fields[0]?.message).toBe('title extraction broken: no probe matched reliably')
  })

  test('worstStatus picks the most severe', () => {
    expect(worstStatus(['healthy', 'degraded'])).toBe('degraded')
    expect(worstStatus(['healthy', 'broken', 'degraded'])).toBe('broken')
    expect(worstStatus([])).toBe('healthy')
  })
})
