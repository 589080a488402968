import type { FetchImplementation } from '../src/fetching/fetcher'

export interface PageContent {
  title?: string
  description?: string
  skills?: string[]
  technology?: Record<string, string[]>
  education?: string
  wages?: string[]
  outlook?: string
  workActivities?: string[]
  workContext?: string[]
  knowledge?: string[]
  abilities?: string[]
  workStyles?: string[]
  tasks?: string[]
  tools?: Record<string, string[]>
  workValues?: string[]
}

function labelList(id: string, labels: string[] | undefined): string {
  if (!labels) return ''
  const items = labels.map((label) => `<li><b>${label}</b> — ${label} details</li>`).join('')
  return `<div id="${id}"><ul>${items}</ul></div>`
}

function groupedList(id: string, groups: Record<string, string[]> | undefined): string {
  if (!groups) return ''
  const items = Object.entries(groups)
    .map(([group, entries]) => `<li><b>${group}</b> — ${entries.join('; ')}</li>`)
    .join('')
  return `<div id="${id}"><ul>${items}</ul></div>`
}

/**
 * Renders a detail page in the current site layout, with only the sections given.
 */
export function occupationPage(content: PageContent): string {
  const parts: string[] = []
  if (content.title) parts.push(`<h1><span class="main">${content.title}</span></h1>`)
  if (content.description) parts.push(`<p class="lead">${content.description}</p>`)
  parts.push(labelList('Skills', content.skills))
  parts.push(groupedList('TechnologySkills', content.technology))
  if (content.education) {
    parts.push(`<div id="Education"><ul><li>${content.education}</li></ul></div>`)
  }
  if (content.wages || content.outlook) {
    const wages = (content.wages ?? []).map((w) => `<dt>Wages</dt><dd>${w}</dd>`).join('')
    const outlook = content.outlook ? `<p class="outlook">${content.outlook}</p>` : ''
    parts.push(`<div id="WagesEmployment"><dl>${wages}</dl>${outlook}</div>`)
  }
  parts.push(labelList('WorkActivities', content.workActivities))
  parts.push(labelList('WorkContext', content.workContext))
  parts.push(labelList('Knowledge', content.knowledge))
  parts.push(labelList('Abilities', content.abilities))
  parts.push(labelList('WorkStyles', content.workStyles))
  if (content.tasks) {
    parts.push(`<div id="Tasks"><ul>${content.tasks.map((t) => `<li>${t}</li>`).join('')}</ul></div>`)
  }
  parts.push(groupedList('ToolsUsed', content.tools))
  parts.push(labelList('WorkValues', content.workValues))

  return `<!DOCTYPE html><html><head><title>O*NET</title></head><body><div id="content">${parts.join('')}</div></body></html>`
}

export const FULL_CONTENT: PageContent = {
  title: '15-1252.00 - Software Developers',
  description: 'Research, design, and develop computer and network software.',
  skills: ['Programming', 'Critical Thinking', 'Complex Problem Solving'],
  technology: {
    'Development environment software': ['Eclipse IDE', 'Microsoft Visual Studio'],
    'Object or component oriented development software': ['Python', 'Oracle Java', 'C++'],
  },
  education: "Bachelor's degree",
  wages: ['$63.59 hourly, $132,270 annual'],
  outlook: 'Projected growth (2023-2033): Much faster than average',
  workActivities: ['Working with Computers', 'Analyzing Data or Information'],
  workContext: ['Face-to-Face Discussions', 'Spend Time Sitting'],
  knowledge: ['Computers and Electronics', 'Mathematics'],
  abilities: ['Deductive Reasoning', 'Written Comprehension'],
  workStyles: ['Attention to Detail', 'Analytical Thinking'],
  tasks: ['Analyze user needs and software requirements.', 'Modify existing software to correct errors.'],
  tools: { 'Desktop computers': ['Desktop computers'], 'Notebook computers': ['Laptop computers'] },
  workValues: ['Achievement', 'Independence'],
}

export const FULL_PAGE = occupationPage(FULL_CONTENT)

/** Title, description and skills only: 3 of 15 tracked fields. */
export const SPARSE_PAGE = occupationPage({
  title: 'Placeholder Occupation',
  description: 'A page with very little on it.',
  skills: ['Active Listening'],
})

export type ResponseSpec =
  | { status?: number; body?: string; headers?: Record<string, string> }
  | 'timeout'
  | 'network'

export interface FakeFetch {
  fetchImpl: FetchImplementation
  calls: string[]
  callsTo(url: string): number
}

/**
 * In-process stand-in for `fetch`. `respond` receives the URL and how many
 * times it was requested before this call.
 */
export function createFakeFetch(
  respond: (url: string, previousCalls: number) => ResponseSpec,
): FakeFetch {
  const calls: string[] = []
  const callsTo = (url: string) => calls.filter((c) => c === url).length

  const fetchImpl: FetchImplementation = async (url) => {
    const previous = callsTo(url)
    calls.push(url)
    const spec = respond(url, previous)
    if (spec === 'timeout') {
      throw Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      })
    }
    if (spec === 'network') {
      throw new TypeError('fetch failed')
    }
    return new Response(spec.body ?? '', {
      status: spec.status ?? 200,
      headers: spec.headers,
    })
  }

  return { fetchImpl, calls, callsTo }
}

export const noSleep = async (): Promise<void> => {}

export function summaryUrl(code: string): string {
  return `https://www.onetonline.org/link/summary/${code}`
}

export function codeFromUrl(url: string): string {
  return url.slice(url.lastIndexOf('/') + 1)
}
