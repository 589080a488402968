import type { ListField } from '../../models/occupation'
import { educationParser } from './education-parser'
import { ListParser } from './list-parser'
import { salaryParser } from './salary-parser'
import type { KeywordDictionary } from './technology-parser'
import { TechnologyParser } from './technology-parser'
import { descriptionParser, jobOutlookParser, titleParser } from './text-parser'
import type { FieldParsers } from './types'

export { parseEducationLevel, educationParser } from './education-parser'
export { ListParser, normalizeList } from './list-parser'
export type { SalaryAmount } from './salary-parser'
export { findSalaryAmounts, parseSalary, salaryParser } from './salary-parser'
export type { KeywordDictionaryInput } from './technology-parser'
export {
  DEFAULT_KEYWORD_DICTIONARY,
  KeywordDictionary,
  KeywordDictionarySchema,
  TechnologyParser,
} from './technology-parser'
export {
  cleanOutlook,
  cleanTitle,
  descriptionParser,
  jobOutlookParser,
  TextParser,
  titleParser,
} from './text-parser'
export type { FieldParser, FieldParsers } from './types'
export { itemsOf } from './types'

function listParser<K extends ListField>(field: K): ListParser<K> {
  return new ListParser(field)
}

/**
 * One parser per tracked field. Only the technology parser has a dependency,
 * the keyword dictionary.
 */
export function createFieldParsers(dictionary?: KeywordDictionary): FieldParsers {
  return {
    title: titleParser,
    description: descriptionParser,
    skills: listParser('skills'),
    technologySkills: new TechnologyParser(dictionary),
    educationLevel: educationParser,
    salaryMedian: salaryParser,
    jobOutlook: jobOutlookParser,
    workActivities: listParser('workActivities'),
    workContext: listParser('workContext'),
    knowledgeAreas: listParser('knowledgeAreas'),
    abilities: listParser('abilities'),
    workStyles: listParser('workStyles'),
    tasks: listParser('tasks'),
    toolsUsed: listParser('toolsUsed'),
    workValues: listParser('workValues'),
  }
}
