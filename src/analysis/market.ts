import { TRACKED_FIELDS } from '../config/constants'
import type { FieldKey } from '../extraction/types'
import type { OccupationFamily, OccupationRecord } from '../models/occupation'
import { isFieldPopulated } from '../models/occupation'

export interface FamilyCount {
  family: OccupationFamily
  count: number
}

export interface SalaryStats {
  family: OccupationFamily
  /** Records with a reported salary. */
  count: number
  median: number
  min: number
  max: number
}

export function familyDistribution(records: readonly OccupationRecord[]): FamilyCount[] {
  const counts = new Map<OccupationFamily, number>()
  for (const record of records) {
    counts.set(record.family, (counts.get(record.family) ?? 0) + 1)
  }
  return [...counts.entries()]
    .map(([family, count]) => ({ family, count }))
    .sort((a, b) => b.count - a.count || a.family.localeCompare(b.family))
}

export interface FieldCoverage {
  field: FieldKey
  /** Share of records in which the field is populated. */
  coverage: number
}

export function fieldCoverage(records: readonly OccupationRecord[]): FieldCoverage[] {
  return TRACKED_FIELDS.map((field) => {
    const populated = records.filter((record) => isFieldPopulated(field, record[field])).length
    return { field, coverage: records.length > 0 ? populated / records.length : 0 }
  })
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  const upper = sorted[mid] ?? 0
  if (sorted.length % 2 === 1) return upper
  return ((sorted[mid - 1] ?? upper) + upper) / 2
}

/**
 * Salary spread per family over records that report a salary, highest median first.
 */
export function salaryStatsByFamily(records: readonly OccupationRecord[]): SalaryStats[] {
  const salaries = new Map<OccupationFamily, number[]>()
  for (const record of records) {
    if (record.salaryMedian === null) continue
    const list = salaries.get(record.family) ?? []
    list.push(record.salaryMedian)
    salaries.set(record.family, list)
  }

  const stats: SalaryStats[] = []
  for (const [family, values] of salaries) {
    const mid = median(values)
    if (mid === null) continue
    stats.push({
      family,
      count: values.length,
      median: mid,
      min: Math.min(...values),
      max: Math.max(...values),
    })
  }
  return stats.sort((a, b) => b.median - a.median)
}
