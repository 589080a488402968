/**
 * O*NET Scraping Constants
 *
 * Closed vocabularies and site-level values shared by the fetcher, extractors and validator.
 * When O*NET OnLine changes its taxonomy or URL layout, update values here.
 */

export const ONET_BASE_URL = 'https://www.onetonline.org'

/**
 * Major SOC groups, keyed by the two-digit prefix of an occupation code.
 */
export const OCCUPATION_FAMILIES = {
  11: 'Management',
  13: 'Business and Financial Operations',
  15: 'Computer and Mathematical',
  17: 'Architecture and Engineering',
  19: 'Life, Physical, and Social Science',
  21: 'Community and Social Service',
  23: 'Legal',
  25: 'Educational Instruction and Library',
  27: 'Arts, Design, Entertainment, Sports, and Media',
  29: 'Healthcare Practitioners and Technical',
  31: 'Healthcare Support',
  33: 'Protective Service',
  35: 'Food Preparation and Serving Related',
  37: 'Building and Grounds Cleaning and Maintenance',
  39: 'Personal Care and Service',
  41: 'Sales and Related',
  43: 'Office and Administrative Support',
  45: 'Farming, Fishing, and Forestry',
  47: 'Construction and Extraction',
  49: 'Installation, Maintenance, and Repair',
  51: 'Production',
  53: 'Transportation and Material Moving',
} as const

export type FamilyId = keyof typeof OCCUPATION_FAMILIES

export const UNCLASSIFIED_FAMILY = 'Unclassified' as const

export const FAMILY_LABELS = [
  UNCLASSIFIED_FAMILY,
  ...Object.values(OCCUPATION_FAMILIES),
] as const

export const OCCUPATION_CODE_PATTERN = /^\d{2}-\d{4}\.\d{2}$/

/**
 * Fields counted by the completeness score. Order is the order extractors run in.
 */
export const TRACKED_FIELDS = [
  'title',
  'description',
  'skills',
  'technologySkills',
  'educationLevel',
  'salaryMedian',
  'jobOutlook',
  'workActivities',
  'workContext',
  'knowledgeAreas',
  'abilities',
  'workStyles',
  'tasks',
  'toolsUsed',
  'workValues',
] as const

export const LIST_FIELDS = [
  'skills',
  'technologySkills',
  'workActivities',
  'workContext',
  'knowledgeAreas',
  'abilities',
  'workStyles',
  'tasks',
  'toolsUsed',
  'workValues',
] as const

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
}

/**
 * O*NET "Required Level of Education" categories, lowest to highest.
 */
export const EDUCATION_LEVELS = [
  'Less than a High School Diploma',
  'High School Diploma',
  'Post-Secondary Certificate',
  'Some College Courses',
  "Associate's Degree",
  "Bachelor's Degree",
  'Post-Baccalaureate Certificate',
  "Master's Degree",
  "Post-Master's Certificate",
  'First Professional Degree',
  'Doctoral Degree',
  'Post-Doctoral Training',
] as const

export const UNKNOWN_EDUCATION = 'Unknown' as const

export const EDUCATION_LABELS = [UNKNOWN_EDUCATION, ...EDUCATION_LEVELS] as const

/**
 * Checked in order; the first pattern that matches a line decides the level.
 * More specific phrasings come before the ones they contain.
 */
export const EDUCATION_PATTERNS: ReadonlyArray<
  readonly [RegExp, (typeof EDUCATION_LEVELS)[number]]
> = [
  [/less than (a )?high school/i, 'Less than a High School Diploma'],
  [/post-?doctoral/i, 'Post-Doctoral Training'],
  [/post-?master/i, "Post-Master's Certificate"],
  [/post-?baccalaureate/i, 'Post-Baccalaureate Certificate'],
  [/post-?secondary certificate/i, 'Post-Secondary Certificate'],
  [/doctor(al|ate)|ph\.?d/i, 'Doctoral Degree'],
  [/professional degree/i, 'First Professional Degree'],
  [/master['’]?s/i, "Master's Degree"],
  [/bachelor['’]?s/i, "Bachelor's Degree"],
  [/associate['’]?s/i, "Associate's Degree"],
  [/some college/i, 'Some College Courses'],
  [/high school/i, 'High School Diploma'],
]

export const HOURS_PER_WORK_YEAR = 2080

export const SKILL_CATEGORY_KEYWORDS = {
  programming: ['python', 'java', 'javascript', 'c++', 'c#', 'typescript', 'go', 'rust', 'r'],
  data_analysis: ['sql', 'pandas', 'numpy', 'tableau', 'power bi', 'excel'],
  cloud: ['aws', 'azure', 'google cloud', 'docker', 'kubernetes', 'terraform'],
  machine_learning: ['machine learning', 'tensorflow', 'pytorch', 'scikit-learn', 'keras'],
  web_development: ['html', 'css', 'react', 'angular', 'vue.js', 'node.js'],
} as const

export type SkillCategory = keyof typeof SKILL_CATEGORY_KEYWORDS | 'other'
