import { z } from 'zod'
import {
  LIST_FIELDS,
  OCCUPATION_CODE_PATTERN,
  UNCLASSIFIED_FAMILY,
} from '../config/constants'
import { normalizeList, parseEducationLevel } from '../extraction/parsers'
import type { OccupationFamily, OccupationInit, OccupationRecord } from '../models/occupation'
import {
  EducationLevelSchema,
  OccupationFamilySchema,
  createOccupation,
} from '../models/occupation'

const LooseList = z.array(z.string()).optional().default([])
const LooseText = z.string().optional().default('')

/**
 * Accepts records from any source, including JSON written by older runs,
 * so that repairable problems can be repaired instead of rejected.
 */
const CandidateSchema = z.object({
  code: LooseText,
  url: LooseText,
  family: z.string().optional(),
  title: LooseText,
  description: LooseText,
  skills: LooseList,
  technologySkills: LooseList,
  educationLevel: z.string().optional(),
  salaryMedian: z.number().nullable().optional().default(null),
  jobOutlook: LooseText,
  workActivities: LooseList,
  workContext: LooseList,
  knowledgeAreas: LooseList,
  abilities: LooseList,
  workStyles: LooseList,
  tasks: LooseList,
  toolsUsed: LooseList,
  workValues: LooseList,
  flags: LooseList,
})

type Candidate = z.infer<typeof CandidateSchema>

export interface ValidationOptions {
  completenessThreshold?: number
}

export type ValidationResult =
  | { status: 'accepted'; record: OccupationRecord; repairs: string[] }
  | { status: 'flagged'; record: OccupationRecord; reasons: string[]; repairs: string[] }
  | { status: 'rejected'; code: string; reasons: string[] }

export const DEFAULT_COMPLETENESS_THRESHOLD = 0.5

const LOW_COMPLETENESS_FLAG = 'low_completeness'
const MALFORMED_CODE_FLAG = 'malformed_code'
const QUALITY_FLAGS = [LOW_COMPLETENESS_FLAG, MALFORMED_CODE_FLAG]

function sameItems(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i])
}

function rejectionReasons(candidate: Candidate): string[] {
  const reasons: string[] = []
  if (!candidate.code.trim()) {
    reasons.push('code is missing')
  }
  if (!candidate.title.trim()) {
    reasons.push('title is missing')
  }
  return reasons
}

function repairFamily(candidate: Candidate, repairs: string[]): OccupationFamily {
  const family = OccupationFamilySchema.safeParse(candidate.family)
  if (family.success) return family.data
  if (candidate.family !== undefined) {
    repairs.push(`family '${candidate.family}' replaced with ${UNCLASSIFIED_FAMILY}`)
  }
  return UNCLASSIFIED_FAMILY
}

/**
 * Checks a finished record, or anything shaped like one, before it may enter
 * a corpus. Blank identity fields reject; list, family, education and salary
 * problems are repaired. A code outside the NN-NNNN.NN form, or a completeness
 * score under the threshold, flags the record without rejecting it.
 */
export function validateOccupation(
  input: unknown,
  options: ValidationOptions = {},
): ValidationResult {
  const threshold = options.completenessThreshold ?? DEFAULT_COMPLETENESS_THRESHOLD
  const parsed = CandidateSchema.safeParse(input)
  if (!parsed.success) {
    return {
      status: 'rejected',
      code: '',
      reasons: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    }
  }

  const candidate = parsed.data
  const code = candidate.code.trim()
  const reasons = rejectionReasons(candidate)
  if (reasons.length > 0) {
    return { status: 'rejected', code, reasons }
  }

  const repairs: string[] = []
  const init: OccupationInit = {
    code,
    url: candidate.url,
    family: repairFamily(candidate, repairs),
    title: candidate.title.trim(),
    description: candidate.description.trim(),
    jobOutlook: candidate.jobOutlook.trim(),
  }

  for (const field of LIST_FIELDS) {
    const normalized = normalizeList(candidate[field])
    if (!sameItems(normalized, candidate[field])) {
      repairs.push(`${field} renormalized`)
    }
    init[field] = normalized
  }

  const education = EducationLevelSchema.safeParse(candidate.educationLevel)
  if (education.success) {
    init.educationLevel = education.data
  } else {
    init.educationLevel = parseEducationLevel([candidate.educationLevel ?? ''])
    if (candidate.educationLevel !== undefined) {
      repairs.push(`educationLevel '${candidate.educationLevel}' mapped to ${init.educationLevel}`)
    }
  }

  const salary = candidate.salaryMedian
  if (salary !== null && !(Number.isFinite(salary) && salary > 0)) {
    repairs.push(`salaryMedian ${salary} dropped`)
    init.salaryMedian = null
  } else {
    init.salaryMedian = salary
  }

  const flags = candidate.flags.filter(
    (flag) => !QUALITY_FLAGS.some((prefix) => flag.startsWith(prefix)),
  )
  const draft = createOccupation({ ...init, flags })

  const flagReasons: string[] = []
  if (!OCCUPATION_CODE_PATTERN.test(code)) {
    flagReasons.push(`${MALFORMED_CODE_FLAG}: code '${code}' is not of the form NN-NNNN.NN`)
  }
  if (draft.completenessScore < threshold) {
    flagReasons.push(
      `${LOW_COMPLETENESS_FLAG}: completeness ${draft.completenessScore.toFixed(2)} ` +
        `below threshold ${threshold.toFixed(2)}`,
    )
  }
  if (flagReasons.length === 0) {
    return { status: 'accepted', record: draft, repairs }
  }

  const record = createOccupation({ ...init, flags: [...flags, ...flagReasons] })
  return { status: 'flagged', record, reasons: flagReasons, repairs }
}
