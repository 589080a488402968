import type { CheerioAPI } from 'cheerio'
import type { FamilyId } from '../config/constants'
import { OCCUPATION_FAMILIES, ONET_BASE_URL } from '../config/constants'
import type { PageFetcher } from '../fetching/fetcher'
import { cleanText, createLimiter, extractOccupationCode, toAbsoluteUrl } from '../utils'
import { createLogger } from '../utils/logger'

const log = createLogger('index')

export interface OccupationTarget {
  code: string
  url?: string
  title?: string
  family?: string
}

export interface FamilyFailure {
  familyId: FamilyId
  family: string
  reason: string
}

export interface DiscoveryResult {
  targets: OccupationTarget[]
  failures: FamilyFailure[]
}

interface FamilyPage {
  familyId: FamilyId
  family: string
  targets: OccupationTarget[]
  reason: string | null
}

export interface DiscoverOptions {
  baseUrl?: string
  /** Defaults to every major group. */
  familyIds?: readonly FamilyId[]
  /** Index pages fetched at once. */
  concurrency?: number
}

/**
 * Tried in order; the first selector that finds any summary link wins.
 */
export const SUMMARY_LINK_SELECTORS = [
  'a[href*="/link/summary/"]',
  'td.report2 > a[href*="/summary/"]',
  'a[href*="/summary/"]',
] as const

export const ALL_FAMILY_IDS: readonly FamilyId[] = [
  11, 13, 15, 17, 19, 21, 23, 25, 27, 29, 31, 33, 35, 37, 39, 41, 43, 45, 47, 49, 51, 53,
]

export function familyIndexUrl(familyId: FamilyId, baseUrl: string = ONET_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, '')}/find/family?f=${familyId}&g=Go`
}

/**
 * Reads the occupation links off one family index page.
 */
export function parseFamilyIndex(
  $: CheerioAPI,
  pageUrl: string,
  family?: string,
): OccupationTarget[] {
  for (const selector of SUMMARY_LINK_SELECTORS) {
    const targets: OccupationTarget[] = []
    $(selector).each((_, el) => {
      const href = $(el).attr('href')
      if (!href) return
      const url = toAbsoluteUrl(href, pageUrl)
      const code = extractOccupationCode(url)
      if (!code) return
      const title = cleanText($(el).text())
      targets.push({ code, url, ...(title ? { title } : {}), ...(family ? { family } : {}) })
    })
    if (targets.length > 0) return targets
  }
  return []
}

/**
 * Collects occupation targets from the per-family index pages. Codes listed
 * under more than one family keep their first listing.
 */
export async function discoverOccupations(
  fetcher: PageFetcher,
  options: DiscoverOptions = {},
): Promise<DiscoveryResult> {
  const baseUrl = options.baseUrl ?? ONET_BASE_URL
  const familyIds = options.familyIds ?? ALL_FAMILY_IDS
  const limiter = createLimiter(options.concurrency ?? 1)

  const pages = await Promise.all(
    familyIds.map((familyId) =>
      limiter.run(async (): Promise<FamilyPage> => {
        const family = OCCUPATION_FAMILIES[familyId]
        const outcome = await fetcher.fetch(familyIndexUrl(familyId, baseUrl))
        if (!outcome.ok) {
          return { familyId, family, targets: [], reason: outcome.error.message }
        }
        const targets = parseFamilyIndex(outcome.page.document, outcome.page.url, family)
        if (targets.length === 0) {
          return { familyId, family, targets, reason: 'no occupation links found' }
        }
        log.debug(`${family}: ${targets.length} occupation(s)`)
        return { familyId, family, targets, reason: null }
      }),
    ),
  )

  const seen = new Set<string>()
  const targets: OccupationTarget[] = []
  const failures: FamilyFailure[] = []

  for (const page of pages) {
    if (page.reason !== null) {
      log.warning(`Index for ${page.family} (${page.familyId}) failed: ${page.reason}`)
      failures.push({ familyId: page.familyId, family: page.family, reason: page.reason })
    }
    for (const target of page.targets) {
      if (seen.has(target.code)) continue
      seen.add(target.code)
      targets.push(target)
    }
  }

  log.info(`Discovered ${targets.length} occupation(s) across ${familyIds.length} families`)
  return { targets, failures }
}
