import type { CheerioAPI } from 'cheerio'
import { ONET_BASE_URL, TRACKED_FIELDS } from '../config/constants'
import type { FetchError } from '../exceptions'
import { createFieldParsers } from '../extraction/parsers'
import type { FieldParsers, KeywordDictionary } from '../extraction/parsers'
import { SelectorResolver } from '../extraction/resolver'
import type { FieldDiagnostic, FieldKey } from '../extraction/types'
import type { PageFetcher } from '../fetching/fetcher'
import type { OccupationRecord } from '../models/occupation'
import { OccupationDraft, OccupationFamilySchema, familyForCode } from '../models/occupation'
import { createLogger } from '../utils/logger'

const log = createLogger('assembler')

export interface AssemblyHints {
  /** Family label reported by the index page; ignored unless it is a known label. */
  family?: string
  url?: string
}

export interface AssemblyResult {
  record: OccupationRecord
  diagnostics: FieldDiagnostic[]
}

export interface OccupationAssemblerOptions {
  resolver?: SelectorResolver
  dictionary?: KeywordDictionary
  parsers?: FieldParsers
}

export function occupationUrl(code: string, baseUrl: string = ONET_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, '')}/link/summary/${code}`
}

/**
 * Builds one record from one parsed detail page. Every field is resolved and
 * parsed independently; a missing section leaves only that field empty.
 */
export class OccupationAssembler {
  private readonly resolver: SelectorResolver
  private readonly parsers: FieldParsers

  constructor(options: OccupationAssemblerOptions = {}) {
    this.resolver = options.resolver ?? new SelectorResolver()
    this.parsers = options.parsers ?? createFieldParsers(options.dictionary)
  }

  assemble(code: string, document: CheerioAPI, hints: AssemblyHints = {}): AssemblyResult {
    const family = OccupationFamilySchema.safeParse(hints.family)
    const draft = new OccupationDraft(
      code,
      hints.url ?? '',
      family.success ? family.data : familyForCode(code),
    )

    const diagnostics = TRACKED_FIELDS.map((field) => this.extractField(draft, document, field))
    const record = draft.finalize()

    const missing = diagnostics.filter((d) => d.probe === null).map((d) => d.field)
    if (missing.length > 0) {
      log.debug(`${code}: no content for ${missing.join(', ')}`)
    }

    return { record, diagnostics }
  }

  private extractField<K extends FieldKey>(
    draft: OccupationDraft,
    document: CheerioAPI,
    field: K,
  ): FieldDiagnostic {
    const resolution = this.resolver.resolve(document, field)
    const parser: FieldParsers[K] = this.parsers[field]
    const value = parser.parse(resolution)
    draft.set(field, value)

    if (resolution.status === 'absent') {
      return { field, probe: null, rank: null, itemCount: 0 }
    }
    return {
      field,
      probe: resolution.probe,
      rank: resolution.rank,
      itemCount: Array.isArray(value) ? value.length : resolution.items.length,
    }
  }
}

export interface ScrapeOccupationOptions extends AssemblyHints {
  assembler?: OccupationAssembler
  baseUrl?: string
}

export type ScrapeOccupationResult =
  | ({ ok: true } & AssemblyResult)
  | { ok: false; error: FetchError }

/**
 * Fetches and assembles a single occupation outside of a corpus run.
 */
export async function scrapeOccupation(
  fetcher: PageFetcher,
  code: string,
  options: ScrapeOccupationOptions = {},
): Promise<ScrapeOccupationResult> {
  const url = options.url ?? occupationUrl(code, options.baseUrl)
  log.info(`Scraping occupation ${code}: ${url}`)

  const outcome = await fetcher.fetch(url)
  if (!outcome.ok) {
    return { ok: false, error: outcome.error }
  }

  const assembler = options.assembler ?? new OccupationAssembler()
  const result = assembler.assemble(code, outcome.page.document, {
    family: options.family,
    url: outcome.page.url,
  })

  log.success(
    `Scraped ${code} (${result.record.title || 'untitled'}), completeness ${result.record.completenessScore.toFixed(2)}`,
  )
  return { ok: true, ...result }
}
