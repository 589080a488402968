import type { SkillCategory } from '../config/constants'
import { SKILL_CATEGORY_KEYWORDS } from '../config/constants'
import type { ListField, OccupationRecord } from '../models/occupation'

export interface SkillCount {
  skill: string
  count: number
  /** Share of the analyzed records that list the skill. */
  share: number
}

export interface SkillFrequencyOptions {
  topN?: number
  field?: ListField
}

const CATEGORY_LOOKUP = new Map<string, SkillCategory>()
for (const [category, keywords] of Object.entries(SKILL_CATEGORY_KEYWORDS)) {
  for (const keyword of keywords) {
    if (isCategory(category)) CATEGORY_LOOKUP.set(keyword, category)
  }
}

function isCategory(value: string): value is keyof typeof SKILL_CATEGORY_KEYWORDS {
  return value in SKILL_CATEGORY_KEYWORDS
}

/**
 * Counts how many records list each skill. Ties are broken alphabetically.
 */
export function skillFrequency(
  records: readonly OccupationRecord[],
  options: SkillFrequencyOptions = {},
): SkillCount[] {
  const field = options.field ?? 'technologySkills'
  const counts = new Map<string, number>()
  for (const record of records) {
    for (const skill of new Set(record[field])) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1)
    }
  }

  const ranked = [...counts.entries()]
    .map(([skill, count]) => ({
      skill,
      count,
      share: records.length > 0 ? count / records.length : 0,
    }))
    .sort((a, b) => b.count - a.count || a.skill.localeCompare(b.skill))

  return options.topN === undefined ? ranked : ranked.slice(0, options.topN)
}

export function categorizeSkill(skill: string): SkillCategory {
  return CATEGORY_LOOKUP.get(skill.trim().toLowerCase()) ?? 'other'
}

export function skillCategoryBreakdown(
  records: readonly OccupationRecord[],
  field: ListField = 'technologySkills',
): Record<SkillCategory, number> {
  const breakdown: Record<SkillCategory, number> = {
    programming: 0,
    data_analysis: 0,
    cloud: 0,
    machine_learning: 0,
    web_development: 0,
    other: 0,
  }
  for (const record of records) {
    for (const skill of record[field]) {
      breakdown[categorizeSkill(skill)]++
    }
  }
  return breakdown
}
