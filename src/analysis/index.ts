import type { SkillCategory } from '../config/constants'
import type { OccupationRecord } from '../models/occupation'
import type { FamilyCount, FieldCoverage, SalaryStats } from './market'
import { familyDistribution, fieldCoverage, salaryStatsByFamily } from './market'
import type { SkillCount } from './skills'
import { skillCategoryBreakdown, skillFrequency } from './skills'

export type { FamilyCount, FieldCoverage, SalaryStats } from './market'
export { familyDistribution, fieldCoverage, median, salaryStatsByFamily } from './market'
export type { SkillCount, SkillFrequencyOptions } from './skills'
export { categorizeSkill, skillCategoryBreakdown, skillFrequency } from './skills'

export interface CorpusAnalysisOptions {
  topN?: number
  /** Leave out records the validator flagged. */
  excludeFlagged?: boolean
}

export interface CorpusAnalysis {
  recordCount: number
  topTechnologies: SkillCount[]
  topSkills: SkillCount[]
  skillCategories: Record<SkillCategory, number>
  families: FamilyCount[]
  coverage: FieldCoverage[]
  salaries: SalaryStats[]
}

export function analyzeCorpus(
  corpus: readonly OccupationRecord[],
  options: CorpusAnalysisOptions = {},
): CorpusAnalysis {
  const records = options.excludeFlagged
    ? corpus.filter((record) => record.flags.length === 0)
    : corpus
  const topN = options.topN ?? 20

  return {
    recordCount: records.length,
    topTechnologies: skillFrequency(records, { topN }),
    topSkills: skillFrequency(records, { topN, field: 'skills' }),
    skillCategories: skillCategoryBreakdown(records),
    families: familyDistribution(records),
    coverage: fieldCoverage(records),
    salaries: salaryStatsByFamily(records),
  }
}
