import { describe, expect, test } from 'vitest'
import {
  DEFAULT_KEYWORD_DICTIONARY,
  KeywordDictionary,
  ListParser,
  TechnologyParser,
  cleanOutlook,
  cleanTitle,
  findSalaryAmounts,
  jobOutlookParser,
  normalizeList,
  parseEducationLevel,
  parseSalary,
  salaryParser,
  titleParser,
} from '../src/extraction/parsers'
import { ConfigurationError } from '../src/exceptions'
import type { FieldKey, Resolution } from '../src/extraction/types'

function matched(field: FieldKey, items: string[]): Resolution {
  return { status: 'matched', field, items, probe: 'test', rank: 0 }
}

function absent(field: FieldKey): Resolution {
  return { status: 'absent', field, probesTried: 3 }
}

describe('list parsing', () => {
  test('trims, collapses whitespace and dedupes in first-seen order', () => {
    expect(normalizeList(['Python', '  SQL ', 'Python', '', 'Data\n  Analysis'])).toEqual([
      'Python',
      'SQL',
      'Data Analysis',
    ])
  })

  test('absent and empty resolutions give an empty list', () => {
    const parser = new ListParser('skills')
    expect(parser.parse(absent('skills'))).toEqual([])
    expect(parser.parse(matched('skills', ['   ']))).toEqual([])
  })
})

describe('text parsing', () => {
  test('title drops a leading occupation code', () => {
    expect(cleanTitle('15-1252.00 - Software Developers')).toBe('Software Developers')
    expect(titleParser.parse(matched('title', ['Actuaries']))).toBe('Actuaries')
  })

  test('outlook drops the projection label', () => {
    expect(cleanOutlook('Projected growth (2023-2033): Much faster than average')).toBe(
      'Much faster than average',
    )
    expect(jobOutlookParser.parse(absent('jobOutlook'))).toBe('')
  })

  test('text parser takes the first non-blank item', () => {
    expect(titleParser.parse(matched('title', ['', 'Statisticians', 'Other']))).toBe('Statisticians')
  })
})

describe('salary parsing', () => {
  test('prefers the annual figure', () => {
    expect(parseSalary(['$63.59 hourly, $132,270 annual'])).toBe(132270)
  })

  test('annualizes an hourly figure over 2080 hours', () => {
    expect(parseSalary(['$45.00 hourly'])).toBe(93600)
    expect(parseSalary(['$20.50 per hour'])).toBe(42640)
  })

  test('falls back to the first amount without a period', () => {
    expect(parseSalary(['Median wages: $58,000'])).toBe(58000)
  })

  test('treats a capped value as its amount', () => {
    expect(parseSalary(['$239,200+ annual'])).toBe(239200)
  })

  test('unparseable or absent values are null', () => {
    expect(parseSalary(['Not available'])).toBeNull()
    expect(salaryParser.parse(absent('salaryMedian'))).toBeNull()
  })

  test('finds amounts with their units', () => {
    expect(findSalaryAmounts('$30/hr or $62,400/yr')).toEqual([
      { value: 30, unit: 'hourly' },
      { value: 62400, unit: 'annual' },
    ])
  })
})

describe('education parsing', () => {
  test.each([
    ["Bachelor's degree", "Bachelor's Degree"],
    ['Master’s degree', "Master's Degree"],
    ['Doctoral or professional degree', 'Doctoral Degree'],
    ['High school diploma or equivalent', 'High School Diploma'],
    ['Less than high school diploma', 'Less than a High School Diploma'],
    ['Post-secondary certificate', 'Post-Secondary Certificate'],
    ['Some college, no degree', 'Some College Courses'],
  ])('%s maps to %s', (text, level) => {
    expect(parseEducationLevel([text])).toBe(level)
  })

  test('unrecognized text maps to Unknown', () => {
    expect(parseEducationLevel(['Apprenticeship'])).toBe('Unknown')
    expect(parseEducationLevel([])).toBe('Unknown')
  })
})

describe('technology canonicalization', () => {
  const parser = new TechnologyParser()

  test('exact labels and aliases map to the canonical label', () => {
    expect(DEFAULT_KEYWORD_DICTIONARY.lookup('Microsoft Excel')).toBe('Excel')
    expect(DEFAULT_KEYWORD_DICTIONARY.lookup('postgres')).toBe('PostgreSQL')
  })

  test('terms mentioned in product names are extracted in order', () => {
    expect(DEFAULT_KEYWORD_DICTIONARY.mentions('Java and Python bindings')).toEqual([
      'Java',
      'Python',
    ])
    expect(DEFAULT_KEYWORD_DICTIONARY.mentions('Microsoft SQL Server')).toEqual(['SQL'])
  })

  test('the longest overlapping term wins', () => {
    expect(DEFAULT_KEYWORD_DICTIONARY.lookup('Oracle Java')).toBe('Java')
    expect(DEFAULT_KEYWORD_DICTIONARY.mentions('Oracle Java SE')).toEqual(['Java'])

    const dictionary = new KeywordDictionary({
      version: 'test',
      terms: [{ label: 'SQL' }, { label: 'SQL Server' }, { label: 'Oracle' }],
    })
    expect(dictionary.mentions('Microsoft SQL Server and Oracle')).toEqual(['SQL Server', 'Oracle'])
  })

  test('does not match terms inside longer words', () => {
    expect(DEFAULT_KEYWORD_DICTIONARY.mentions('JavaScript Object Notation')).toEqual(['JavaScript'])
    expect(DEFAULT_KEYWORD_DICTIONARY.mentions('Google Docs')).toEqual([])
  })

  test('keeps unmatched items and dedupes the result', () => {
    expect(
      parser.parse(
        matched('technologySkills', ['Python', 'Eclipse IDE', 'Oracle Java', 'Java', 'python']),
      ),
    ).toEqual(['Python', 'Eclipse IDE', 'Java'])
  })

  test('strict dictionaries drop unmatched items', () => {
    const strict = new KeywordDictionary({
      version: 'test',
      strict: true,
      terms: [{ label: 'Python' }, { label: 'R' }],
    })
    const strictParser = new TechnologyParser(strict)
    expect(
      strictParser.parse(matched('technologySkills', ['Python', 'Eclipse IDE', 'R', 'Research'])),
    ).toEqual(['Python', 'R'])
  })

  test('rejects an invalid dictionary', () => {
    expect(() => new KeywordDictionary({ version: 'empty', terms: [] })).toThrow(ConfigurationError)
  })
})
