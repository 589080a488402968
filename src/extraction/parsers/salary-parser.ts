import { HOURS_PER_WORK_YEAR } from '../../config/constants'
import type { Resolution } from '../types'
import type { FieldParser } from './types'
import { itemsOf } from './types'

type SalaryUnit = 'hourly' | 'annual' | 'unspecified'

export interface SalaryAmount {
  value: number
  unit: SalaryUnit
}

const AMOUNT_PATTERN =
  /\$\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?\+?(?:\s*(hourly|per hour|\/\s*h(?:ou)?r|annual(?:ly)?|per year|\/\s*y(?:ea)?r))?/gi

function unitOf(token: string | undefined): SalaryUnit {
  if (!token) return 'unspecified'
  return /h/i.test(token) ? 'hourly' : 'annual'
}

/**
 * Finds every dollar amount in `text` together with the pay period that
 * follows it, if any.
 */
export function findSalaryAmounts(text: string): SalaryAmount[] {
  const amounts: SalaryAmount[] = []
  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    const whole = match[1]
    if (!whole) continue
    const value = Number(`${whole.replace(/,/g, '')}.${match[2] ?? '0'}`)
    if (!Number.isFinite(value) || value <= 0) continue
    amounts.push({ value, unit: unitOf(match[3]) })
  }
  return amounts
}

/**
 * Reads a median annual wage. An annual figure wins over an hourly one;
 * hourly figures are annualized over a 2080-hour year.
 */
export function parseSalary(texts: readonly string[]): number | null {
  const amounts = texts.flatMap(findSalaryAmounts)
  if (amounts.length === 0) return null

  const annual = amounts.find((amount) => amount.unit === 'annual')
  if (annual) return annual.value

  const hourly = amounts.find((amount) => amount.unit === 'hourly')
  if (hourly) return Math.round(hourly.value * HOURS_PER_WORK_YEAR)

  return amounts[0]?.value ?? null
}

export const salaryParser: FieldParser<'salaryMedian'> = {
  field: 'salaryMedian',
  parse: (resolution: Resolution) => parseSalary(itemsOf(resolution)),
}
