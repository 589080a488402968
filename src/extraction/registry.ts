import fs from 'node:fs/promises'
import * as cheerio from 'cheerio'
import { z } from 'zod'
import { TRACKED_FIELDS } from '../config/constants'
import defaultProbes from '../config/default-probes.json'
import { ConfigurationError } from '../exceptions'
import type { FieldKey, ProbeSpec, ProbeTable } from './types'

const ProbeSpecSchema: z.ZodType<ProbeSpec> = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('list'),
    selector: z.string().min(1),
    label: z.string().min(1).optional(),
    omit: z.string().min(1).optional(),
    split: z.string().min(1).optional(),
  }),
  z.object({ kind: z.literal('text'), selector: z.string().min(1) }),
  z.object({
    kind: z.literal('attr'),
    selector: z.string().min(1),
    attribute: z.string().min(1),
  }),
  z.object({
    kind: z.literal('section'),
    heading: z.string().min(1),
    itemSelector: z.string().min(1),
    split: z.string().min(1).optional(),
  }),
])

const FieldProbesSchema = z.array(ProbeSpecSchema).min(1)

export const ProbeVersionSchema = z.object({
  version: z.string().min(1),
  updatedAt: z.string(),
  fields: z
    .object({
      title: FieldProbesSchema,
      description: FieldProbesSchema,
      skills: FieldProbesSchema,
      technologySkills: FieldProbesSchema,
      educationLevel: FieldProbesSchema,
      salaryMedian: FieldProbesSchema,
      jobOutlook: FieldProbesSchema,
      workActivities: FieldProbesSchema,
      workContext: FieldProbesSchema,
      knowledgeAreas: FieldProbesSchema,
      abilities: FieldProbesSchema,
      workStyles: FieldProbesSchema,
      tasks: FieldProbesSchema,
      toolsUsed: FieldProbesSchema,
      workValues: FieldProbesSchema,
    })
    .strict(),
})

export interface ProbeVersion {
  version: string
  updatedAt: string
  fields: ProbeTable
}

export function parseProbeVersion(input: unknown, source = 'probe table'): ProbeVersion {
  const result = ProbeVersionSchema.safeParse(input)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid ${source}: ${details}`)
  }
  checkSelectors(result.data, source)
  return freezeVersion(result.data)
}

function selectorsOf(spec: ProbeSpec): string[] {
  switch (spec.kind) {
    case 'list':
      return [spec.selector, spec.label, spec.omit].filter(
        (selector): selector is string => selector !== undefined,
      )
    case 'text':
    case 'attr':
      return [spec.selector]
    case 'section':
      return [spec.itemSelector]
  }
}

/**
 * Compiles every selector once against an empty document, so a table with a
 * selector cheerio cannot parse fails at load time instead of mid-run.
 */
function checkSelectors(version: ProbeVersion, source: string): void {
  const $ = cheerio.load('')
  for (const field of TRACKED_FIELDS) {
    version.fields[field].forEach((spec, rank) => {
      for (const selector of selectorsOf(spec)) {
        try {
          $(selector)
        } catch (e) {
          const reason = e instanceof Error ? e.message : String(e)
          throw new ConfigurationError(
            `Invalid ${source}: fields.${field}.${rank} selector '${selector}': ${reason}`,
          )
        }
      }
    })
  }
}

function freezeVersion(version: ProbeVersion): ProbeVersion {
  const fields: Record<FieldKey, readonly ProbeSpec[]> = { ...version.fields }
  for (const field of TRACKED_FIELDS) {
    fields[field] = Object.freeze(
      version.fields[field].map((spec) => Object.freeze({ ...spec })),
    )
  }
  return Object.freeze({ ...version, fields: Object.freeze(fields) })
}

export const DEFAULT_PROBE_VERSION: ProbeVersion = parseProbeVersion(
  defaultProbes,
  'default probe table',
)

/**
 * Holds known probe table versions for a run. Resolvers take a table from
 * `getActiveTable()` at construction, so switching versions never changes a
 * resolver that already exists.
 */
export class ProbeRegistry {
  private readonly versions = new Map<string, ProbeVersion>([
    [DEFAULT_PROBE_VERSION.version, DEFAULT_PROBE_VERSION],
  ])
  private activeVersion = DEFAULT_PROBE_VERSION.version

  getActiveVersion(): ProbeVersion {
    return this.versions.get(this.activeVersion) ?? DEFAULT_PROBE_VERSION
  }

  getActiveTable(): ProbeTable {
    return this.getActiveVersion().fields
  }

  getField(field: FieldKey): readonly ProbeSpec[] {
    return this.getActiveTable()[field]
  }

  listVersions(): string[] {
    return [...this.versions.keys()]
  }

  setActiveVersion(version: string): boolean {
    if (!this.versions.has(version)) return false
    this.activeVersion = version
    return true
  }

  register(version: ProbeVersion): void {
    checkSelectors(version, `probe table ${version.version}`)
    this.versions.set(version.version, freezeVersion(version))
  }

  async loadFromFile(filePath: string): Promise<ProbeVersion> {
    const content = await fs.readFile(filePath, 'utf8')
    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (e) {
      throw new ConfigurationError(`Probe table ${filePath} is not valid JSON: ${e}`)
    }
    const parsed = parseProbeVersion(raw, `probe table ${filePath}`)
    this.register(parsed)
    this.activeVersion = parsed.version
    return parsed
  }

  async saveToFile(filePath: string, version?: string): Promise<void> {
    const selected = version
      ? this.versions.get(version)
      : this.getActiveVersion()

    if (!selected) {
      throw new ConfigurationError(`Unknown probe table version: ${version}`)
    }

    await fs.writeFile(filePath, `${JSON.stringify(selected, null, 2)}\n`, 'utf8')
  }
}
