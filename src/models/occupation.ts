import { z } from 'zod'
import type { FamilyId } from '../config/constants'
import {
  EDUCATION_LABELS,
  FAMILY_LABELS,
  LIST_FIELDS,
  OCCUPATION_FAMILIES,
  TRACKED_FIELDS,
  UNCLASSIFIED_FAMILY,
  UNKNOWN_EDUCATION,
} from '../config/constants'
import { ScrapingError } from '../exceptions'
import type { FieldKey } from '../extraction/types'

export const OccupationFamilySchema = z.enum(FAMILY_LABELS)
export type OccupationFamily = z.infer<typeof OccupationFamilySchema>

export const EducationLevelSchema = z.enum(EDUCATION_LABELS)
export type EducationLevel = z.infer<typeof EducationLevelSchema>

const ItemListSchema = z
  .array(z.string().trim().min(1, 'List entries must not be blank'))
  .refine((items) => new Set(items).size === items.length, {
    message: 'List entries must be unique',
  })

export const OccupationSchema = z.object({
  code: z.string(),
  url: z.string(),
  family: OccupationFamilySchema,
  title: z.string(),
  description: z.string(),
  skills: ItemListSchema,
  technologySkills: ItemListSchema,
  educationLevel: EducationLevelSchema,
  salaryMedian: z.number().positive().finite().nullable(),
  jobOutlook: z.string(),
  workActivities: ItemListSchema,
  workContext: ItemListSchema,
  knowledgeAreas: ItemListSchema,
  abilities: ItemListSchema,
  workStyles: ItemListSchema,
  tasks: ItemListSchema,
  toolsUsed: ItemListSchema,
  workValues: ItemListSchema,
  completenessScore: z.number().min(0).max(1),
  flags: z.array(z.string()),
})

export type OccupationData = z.infer<typeof OccupationSchema>
export type OccupationRecord = Readonly<OccupationData>
export type OccupationFields = Pick<OccupationData, FieldKey>
export type ListField = (typeof LIST_FIELDS)[number]

export interface OccupationInit extends Partial<OccupationFields> {
  code: string
  url?: string
  family?: OccupationFamily
  flags?: string[]
}

export function emptyFields(): OccupationFields {
  return {
    title: '',
    description: '',
    skills: [],
    technologySkills: [],
    educationLevel: UNKNOWN_EDUCATION,
    salaryMedian: null,
    jobOutlook: '',
    workActivities: [],
    workContext: [],
    knowledgeAreas: [],
    abilities: [],
    workStyles: [],
    tasks: [],
    toolsUsed: [],
    workValues: [],
  }
}

const LIST_FIELD_SET: ReadonlySet<FieldKey> = new Set<FieldKey>(LIST_FIELDS)

export function isListField(field: FieldKey): field is ListField {
  return LIST_FIELD_SET.has(field)
}

/**
 * A field counts as populated when it carries data: a non-blank string, a
 * non-empty list, a reported salary, or a known education level.
 */
export function isFieldPopulated<K extends FieldKey>(
  field: K,
  value: OccupationFields[K],
): boolean {
  if (value === null) return false
  if (Array.isArray(value)) return value.length > 0
  if (typeof value === 'number') return Number.isFinite(value)
  if (field === 'educationLevel') return value !== UNKNOWN_EDUCATION
  return typeof value === 'string' && value.trim().length > 0
}

export function computeCompleteness(fields: OccupationFields): number {
  const populated = TRACKED_FIELDS.filter((field) =>
    isFieldPopulated(field, fields[field]),
  ).length
  return populated / TRACKED_FIELDS.length
}

export function populatedFields(fields: OccupationFields): FieldKey[] {
  return TRACKED_FIELDS.filter((field) => isFieldPopulated(field, fields[field]))
}

function isFamilyId(value: number): value is FamilyId {
  return value in OCCUPATION_FAMILIES
}

/**
 * Maps the major group of a code ("15" in "15-1252.00") to its family label.
 */
export function familyForCode(code: string): OccupationFamily {
  const majorGroup = Number.parseInt(code.slice(0, 2), 10)
  if (Number.isNaN(majorGroup) || !isFamilyId(majorGroup)) {
    return UNCLASSIFIED_FAMILY
  }
  return OCCUPATION_FAMILIES[majorGroup]
}

function freezeRecord(data: OccupationData): OccupationRecord {
  for (const field of LIST_FIELDS) {
    Object.freeze(data[field])
  }
  Object.freeze(data.flags)
  return Object.freeze(data)
}

/**
 * Builds a frozen record. The completeness score is always derived here from
 * the field values, never taken from the input.
 */
export function createOccupation(init: OccupationInit): OccupationRecord {
  const fields: OccupationFields = { ...emptyFields() }
  for (const field of TRACKED_FIELDS) {
    assignField(fields, field, init[field])
  }

  const candidate = {
    ...fields,
    code: init.code,
    url: init.url ?? '',
    family: init.family ?? familyForCode(init.code),
    flags: [...(init.flags ?? [])],
    completenessScore: computeCompleteness(fields),
  }

  const result = OccupationSchema.safeParse(candidate)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ScrapingError(`Invalid occupation record ${init.code}: ${details}`)
  }
  return freezeRecord(result.data)
}

function assignField<K extends FieldKey>(
  target: OccupationFields,
  field: K,
  value: OccupationFields[K] | undefined,
): void {
  if (value === undefined) return
  target[field] = value
}

/**
 * Returns a new record with `patch` applied and the completeness score recomputed.
 */
export function updateOccupation(
  record: OccupationRecord,
  patch: Partial<Omit<OccupationData, 'code' | 'completenessScore'>>,
): OccupationRecord {
  const { completenessScore: _stale, ...current } = record
  return createOccupation({ ...current, ...patch })
}

/**
 * Mutable record under assembly. Each field may be written once.
 */
export class OccupationDraft {
  private readonly fields: Partial<OccupationFields> = {}

  constructor(
    readonly code: string,
    readonly url: string = '',
    readonly family: OccupationFamily = familyForCode(code),
  ) {}

  set<K extends FieldKey>(field: K, value: OccupationFields[K]): void {
    if (field in this.fields) {
      throw new ScrapingError(`Field ${field} of ${this.code} was already written`)
    }
    this.fields[field] = value
  }

  has(field: FieldKey): boolean {
    return field in this.fields
  }

  get completenessScore(): number {
    return computeCompleteness({ ...emptyFields(), ...this.fields })
  }

  finalize(): OccupationRecord {
    return createOccupation({
      ...this.fields,
      code: this.code,
      url: this.url,
      family: this.family,
    })
  }
}
