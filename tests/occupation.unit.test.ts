import { describe, expect, test } from 'vitest'
import { ScrapingError } from '../src/exceptions'
import {
  OccupationDraft,
  computeCompleteness,
  createOccupation,
  emptyFields,
  familyForCode,
  isFieldPopulated,
  updateOccupation,
} from '../src/models/occupation'

describe('occupation model', () => {
  test('family comes from the major group of the code', () => {
    expect(familyForCode('15-1252.00')).toBe('Computer and Mathematical')
    expect(familyForCode('29-1141.00')).toBe('Healthcare Practitioners and Technical')
    expect(familyForCode('99-9999.00')).toBe('Unclassified')
    expect(familyForCode('xx')).toBe('Unclassified')
  })

  test('an empty record scores zero', () => {
    expect(computeCompleteness(emptyFields())).toBe(0)
  })

  test('completeness counts populated tracked fields out of 15', () => {
    const record = createOccupation({
      code: '15-2041.00',
      title: 'Statisticians',
      skills: ['Mathematics'],
      salaryMedian: 104110,
    })
    expect(record.completenessScore).toBeCloseTo(3 / 15)
    expect(record.family).toBe('Computer and Mathematical')
  })

  test('Unknown education and blank strings do not count', () => {
    expect(isFieldPopulated('educationLevel', 'Unknown')).toBe(false)
    expect(isFieldPopulated('educationLevel', "Master's Degree")).toBe(true)
    expect(isFieldPopulated('description', '   ')).toBe(false)
    expect(isFieldPopulated('salaryMedian', null)).toBe(false)
  })

  test('records are frozen', () => {
    const record = createOccupation({ code: '15-2041.00', title: 'Statisticians', tasks: ['Analyze data.'] })
    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.tasks)).toBe(true)
  })

  test('updates recompute the completeness score', () => {
    const record = createOccupation({ code: '15-2041.00', title: 'Statisticians' })
    const updated = updateOccupation(record, { description: 'Develop statistical methods.' })
    expect(record.completenessScore).toBeCloseTo(1 / 15)
    expect(updated.completenessScore).toBeCloseTo(2 / 15)
    expect(updated.title).toBe('Statisticians')
  })

  test('duplicate list entries are refused', () => {
    expect(() =>
      createOccupation({ code: '15-2041.00', title: 'Statisticians', skills: ['Python', 'Python'] }),
    ).toThrow(ScrapingError)
  })
})

describe('OccupationDraft', () => {
  test('each field is written once', () => {
    const draft = new OccupationDraft('15-1252.00')
    draft.set('title', 'Software Developers')
    expect(draft.has('title')).toBe(true)
    expect(() => draft.set('title', 'Other')).toThrow(ScrapingError)
  })

  test('finalizes into a record with a derived score', () => {
    const draft = new OccupationDraft('15-1252.00', 'https://example.test/15-1252.00')
    draft.set('title', 'Software Developers')
    draft.set('technologySkills', ['Python', 'SQL'])
    expect(draft.completenessScore).toBeCloseTo(2 / 15)

    const record = draft.finalize()
    expect(record.code).toBe('15-1252.00')
    expect(record.url).toBe('https://example.test/15-1252.00')
    expect(record.technologySkills).toEqual(['Python', 'SQL'])
    expect(record.educationLevel).toBe('Unknown')
    expect(record.salaryMedian).toBeNull()
    expect(record.flags).toEqual([])
  })
})
