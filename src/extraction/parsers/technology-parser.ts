import fs from 'node:fs/promises'
import { z } from 'zod'
import defaultKeywords from '../../config/technology-keywords.json'
import { ConfigurationError } from '../../exceptions'
import { cleanText } from '../../utils'
import type { Resolution } from '../types'
import { normalizeList } from './list-parser'
import type { FieldParser } from './types'
import { itemsOf } from './types'

const KeywordTermSchema = z.object({
  label: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).optional().default([]),
})

export const KeywordDictionarySchema = z.object({
  version: z.string().min(1),
  /** Drop items that match no term instead of keeping them verbatim. */
  strict: z.boolean().optional().default(false),
  terms: z.array(KeywordTermSchema).min(1),
})

export type KeywordDictionaryInput = z.input<typeof KeywordDictionarySchema>

interface CompiledTerm {
  label: string
  pattern: RegExp
}

// Two-letter terms ("R", "Go", "ML") are only recognized in their own casing.
const CASE_SENSITIVE_MAX_LENGTH = 2

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function compileTerm(label: string, term: string): CompiledTerm {
  const flags = term.length <= CASE_SENSITIVE_MAX_LENGTH ? 'g' : 'gi'
  return {
    label,
    pattern: new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(term)}(?![A-Za-z0-9+#])`, flags),
  }
}

/**
 * Curated technology vocabulary. Maps labels and aliases to one canonical
 * label, and finds terms mentioned inside longer product names.
 */
export class KeywordDictionary {
  readonly version: string
  readonly strict: boolean
  private readonly exact = new Map<string, string>()
  private readonly terms: CompiledTerm[] = []

  constructor(input: KeywordDictionaryInput) {
    const result = KeywordDictionarySchema.safeParse(input)
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')
      throw new ConfigurationError(`Invalid keyword dictionary: ${details}`)
    }

    this.version = result.data.version
    this.strict = result.data.strict
    for (const { label, aliases } of result.data.terms) {
      for (const term of [label, ...aliases]) {
        this.exact.set(term.toLowerCase(), label)
        this.terms.push(compileTerm(label, term))
      }
    }
  }

  static async loadFromFile(filePath: string): Promise<KeywordDictionary> {
    const content = await fs.readFile(filePath, 'utf8')
    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (e) {
      throw new ConfigurationError(`Keyword dictionary ${filePath} is not valid JSON: ${e}`)
    }
    const parsed = KeywordDictionarySchema.safeParse(raw)
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid keyword dictionary ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`,
      )
    }
    return new KeywordDictionary(parsed.data)
  }

  get size(): number {
    return this.exact.size
  }

  lookup(text: string): string | undefined {
    return this.exact.get(cleanText(text).toLowerCase())
  }

  /**
   * Labels of every term mentioned in `text`, in order of first mention.
   * Where matches overlap, the longest one wins, so "Oracle Java" is Java
   * and not also Oracle.
   */
  mentions(text: string): string[] {
    const found: Array<{ label: string; start: number; end: number }> = []
    for (const { label, pattern } of this.terms) {
      pattern.lastIndex = 0
      for (let match = pattern.exec(text); match; match = pattern.exec(text)) {
        found.push({ label, start: match.index, end: match.index + match[0].length })
      }
    }
    found.sort((a, b) => a.start - b.start || b.end - a.end)

    const labels: string[] = []
    let covered = 0
    for (const { label, start, end } of found) {
      if (start < covered) continue
      labels.push(label)
      covered = end
    }
    return normalizeList(labels)
  }

  /**
   * Canonical labels for one raw item. An exact label or alias match wins;
   * otherwise every mentioned term; otherwise the item itself unless strict.
   */
  canonicalize(item: string): string[] {
    const exact = this.lookup(item)
    if (exact) return [exact]

    const mentioned = this.mentions(item)
    if (mentioned.length > 0) return mentioned

    const cleaned = cleanText(item)
    return this.strict || !cleaned ? [] : [cleaned]
  }
}

export const DEFAULT_KEYWORD_DICTIONARY = new KeywordDictionary(defaultKeywords)

export class TechnologyParser implements FieldParser<'technologySkills'> {
  readonly field = 'technologySkills' as const

  constructor(private readonly dictionary: KeywordDictionary = DEFAULT_KEYWORD_DICTIONARY) {}

  parse(resolution: Resolution): string[] {
    return normalizeList(
      itemsOf(resolution).flatMap((item) => this.dictionary.canonicalize(item)),
    )
  }
}
