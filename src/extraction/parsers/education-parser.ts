import { EDUCATION_PATTERNS, UNKNOWN_EDUCATION } from '../../config/constants'
import type { EducationLevel } from '../../models/occupation'
import type { Resolution } from '../types'
import type { FieldParser } from './types'
import { itemsOf } from './types'

export function parseEducationLevel(texts: readonly string[]): EducationLevel {
  for (const text of texts) {
    for (const [pattern, level] of EDUCATION_PATTERNS) {
      if (pattern.test(text)) return level
    }
  }
  return UNKNOWN_EDUCATION
}

export const educationParser: FieldParser<'educationLevel'> = {
  field: 'educationLevel',
  parse: (resolution: Resolution) => parseEducationLevel(itemsOf(resolution)),
}
