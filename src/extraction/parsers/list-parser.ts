import { cleanText } from '../../utils'
import type { ListField } from '../../models/occupation'
import type { Resolution } from '../types'
import type { FieldParser } from './types'
import { itemsOf } from './types'

/**
 * Cleans, drops blanks and removes duplicates, keeping the first occurrence.
 */
export function normalizeList(items: readonly string[]): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const item of items) {
    const cleaned = cleanText(item)
    if (!cleaned || seen.has(cleaned)) continue
    seen.add(cleaned)
    result.push(cleaned)
  }
  return result
}

export class ListParser<K extends ListField> implements FieldParser<K> {
  constructor(readonly field: K) {}

  parse(resolution: Resolution): string[] {
    return normalizeList(itemsOf(resolution))
  }
}
