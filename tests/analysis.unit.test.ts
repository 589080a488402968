import { describe, expect, test } from 'vitest'
import {
  analyzeCorpus,
  categorizeSkill,
  familyDistribution,
  fieldCoverage,
  median,
  salaryStatsByFamily,
  skillCategoryBreakdown,
  skillFrequency,
} from '../src/analysis'
import { createOccupation } from '../src/models/occupation'

const records = [
  createOccupation({
    code: '15-1252.00',
    title: 'Software Developers',
    technologySkills: ['Python', 'SQL', 'AWS'],
    salaryMedian: 130000,
  }),
  createOccupation({
    code: '15-2051.00',
    title: 'Data Scientists',
    technologySkills: ['Python', 'Tableau'],
    salaryMedian: 110000,
  }),
  createOccupation({
    code: '15-2041.00',
    title: 'Statisticians',
    technologySkills: ['SQL', 'Python', 'Eclipse IDE'],
    salaryMedian: 100000,
    flags: ['low_completeness: test'],
  }),
  createOccupation({
    code: '11-1021.00',
    title: 'General and Operations Managers',
    technologySkills: ['Excel'],
    salaryMedian: 100000,
  }),
]

describe('corpus analysis', () => {
  test('skill frequency counts records and breaks ties by name', () => {
    expect(skillFrequency(records, { topN: 3 })).toEqual([
      { skill: 'Python', count: 3, share: 0.75 },
      { skill: 'SQL', count: 2, share: 0.5 },
      { skill: 'AWS', count: 1, share: 0.25 },
    ])
  })

  test('skills fall into categories case-insensitively', () => {
    expect(categorizeSkill('Python')).toBe('programming')
    expect(categorizeSkill('power bi')).toBe('data_analysis')
    expect(categorizeSkill('Kubernetes')).toBe('cloud')
    expect(categorizeSkill('Eclipse IDE')).toBe('other')
  })

  test('category breakdown counts every listing', () => {
    expect(skillCategoryBreakdown(records)).toEqual({
      programming: 3,
      data_analysis: 4,
      cloud: 1,
      machine_learning: 0,
      web_development: 0,
      other: 1,
    })
  })

  test('family distribution is sorted by count', () => {
    expect(familyDistribution(records)).toEqual([
      { family: 'Computer and Mathematical', count: 3 },
      { family: 'Management', count: 1 },
    ])
  })

  test('field coverage is the populated share per field', () => {
    const coverage = fieldCoverage(records)
    expect(coverage.find((c) => c.field === 'title')?.coverage).toBe(1)
    expect(coverage.find((c) => c.field === 'tasks')?.coverage).toBe(0)
    expect(coverage).toHaveLength(15)
  })

  test('median handles odd and even counts', () => {
    expect(median([3, 1, 2])).toBe(2)
    expect(median([4, 1, 3, 2])).toBe(2.5)
    expect(median([])).toBeNull()
  })

  test('salary statistics per family', () => {
    expect(salaryStatsByFamily(records)).toEqual([
      { family: 'Computer and Mathematical', count: 3, median: 110000, min: 100000, max: 130000 },
      { family: 'Management', count: 1, median: 100000, min: 100000, max: 100000 },
    ])
  })

  test('flagged records can be left out', () => {
    const analysis = analyzeCorpus(records, { excludeFlagged: true, topN: 1 })
    expect(analysis.recordCount).toBe(3)
    expect(analysis.topTechnologies).toEqual([{ skill: 'Python', count: 2, share: 2 / 3 }])
    expect(analysis.topSkills).toEqual([])
  })
})
