import { cleanText } from '../../utils'
import type { Resolution } from '../types'
import type { FieldParser } from './types'
import { itemsOf } from './types'

type TextField = 'title' | 'description' | 'jobOutlook'

const LEADING_CODE = /^\d{2}-\d{4}\.\d{2}\s*[-–—:]\s*/
const OUTLOOK_PREFIX = /^projected growth(\s*\(\d{4}\s*[-–]\s*\d{4}\))?\s*:?\s*/i

export class TextParser<K extends TextField> implements FieldParser<K> {
  constructor(
    readonly field: K,
    private readonly clean: (text: string) => string = cleanText,
  ) {}

  parse(resolution: Resolution): string {
    for (const item of itemsOf(resolution)) {
      const text = this.clean(item)
      if (text) return text
    }
    return ''
  }
}

/** "15-1252.00 - Software Developers" becomes "Software Developers". */
export function cleanTitle(text: string): string {
  return cleanText(cleanText(text).replace(LEADING_CODE, ''))
}

export function cleanOutlook(text: string): string {
  return cleanText(cleanText(text).replace(OUTLOOK_PREFIX, ''))
}

export const titleParser = new TextParser('title', cleanTitle)
export const descriptionParser = new TextParser('description')
export const jobOutlookParser = new TextParser('jobOutlook', cleanOutlook)
