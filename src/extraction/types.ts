import type { CheerioAPI } from 'cheerio'
import type { TRACKED_FIELDS } from '../config/constants'

export type FieldKey = (typeof TRACKED_FIELDS)[number]

/**
 * Declarative form of a probe, as stored in a probe table.
 */
export type ProbeSpec =
  | {
      kind: 'list'
      selector: string
      /** Read this descendant instead of the whole element when present. */
      label?: string
      /** Descendants removed before reading text. */
      omit?: string
      /** Characters to split one element's text on. */
      split?: string
    }
  | { kind: 'text'; selector: string }
  | { kind: 'attr'; selector: string; attribute: string }
  | {
      kind: 'section'
      /** Heading text, compared case-insensitively. */
      heading: string
      itemSelector: string
      split?: string
    }

export type ProbeTable = Readonly<Record<FieldKey, readonly ProbeSpec[]>>

export type ProbeResult =
  | { found: true; items: string[] }
  | { found: false }

export interface Probe {
  readonly name: string
  run(document: CheerioAPI): ProbeResult
}

export interface RawContent {
  status: 'matched'
  field: FieldKey
  items: string[]
  probe: string
  /** 0 for the first probe in the field's list. */
  rank: number
}

export interface Absent {
  status: 'absent'
  field: FieldKey
  probesTried: number
}

export type Resolution = RawContent | Absent

export interface FieldDiagnostic {
  field: FieldKey
  probe: string | null
  rank: number | null
  itemCount: number
}

export type HealthStatus = 'healthy' | 'degraded' | 'broken'

export interface FieldHealth {
  field: FieldKey
  status: HealthStatus
  /** Share of pages where some probe matched. */
  hitRate: number
  /** Share of matches that needed a probe other than the first. */
  fallbackRate: number
  probeUsage: Record<string, number>
  message: string
}
