import type { CheerioAPI } from 'cheerio'
import { cleanText } from '../utils'
import type { Probe, ProbeResult, ProbeSpec } from './types'

const HEADING_SELECTOR = 'h1, h2, h3, h4'

export function describeProbe(spec: ProbeSpec): string {
  switch (spec.kind) {
    case 'list':
    case 'text':
      return `${spec.kind}(${spec.selector})`
    case 'attr':
      return `attr(${spec.selector}@${spec.attribute})`
    case 'section':
      return `section(${spec.heading} > ${spec.itemSelector})`
  }
}

/**
 * Turns a probe spec into a pure function over a parsed document.
 */
export function compileProbe(spec: ProbeSpec): Probe {
  const name = describeProbe(spec)

  switch (spec.kind) {
    case 'list':
      return {
        name,
        run: ($) => {
          const items: string[] = []
          $(spec.selector).each((_, el) => {
            let $el = $(el)
            if (spec.label) {
              const label = cleanText($el.find(spec.label).first().text())
              if (label) {
                items.push(label)
                return
              }
            }
            if (spec.omit) {
              $el = $el.clone()
              $el.find(spec.omit).remove()
            }
            items.push(...splitItems($el.text(), spec.split))
          })
          return toResult(items)
        },
      }

    case 'text':
      return {
        name,
        run: ($) => toResult([$(spec.selector).first().text()]),
      }

    case 'attr':
      return {
        name,
        run: ($) => toResult([$(spec.selector).first().attr(spec.attribute) ?? '']),
      }

    case 'section':
      return {
        name,
        run: ($) => toResult(readSection($, spec.heading, spec.itemSelector, spec.split)),
      }
  }
}

function readSection(
  $: CheerioAPI,
  heading: string,
  itemSelector: string,
  split?: string,
): string[] {
  const wanted = heading.toLowerCase()
  const $heading = $(HEADING_SELECTOR)
    .filter((_, el) => cleanText($(el).text()).toLowerCase() === wanted)
    .first()
  if ($heading.length === 0) return []

  const items: string[] = []
  $heading.nextUntil(HEADING_SELECTOR).each((_, sibling) => {
    const $sibling = $(sibling)
    if ($sibling.is(itemSelector)) {
      items.push(...splitItems($sibling.text(), split))
      return
    }
    $sibling.find(itemSelector).each((_, el) => {
      items.push(...splitItems($(el).text(), split))
    })
  })
  return items
}

function splitItems(text: string, separators?: string): string[] {
  if (!separators) return [text]
  const pattern = new RegExp(`[${escapeCharacterClass(separators)}]`)
  return text.split(pattern)
}

function escapeCharacterClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, '\\$&')
}

function toResult(rawItems: string[]): ProbeResult {
  const items = rawItems.map(cleanText).filter(Boolean)
  return items.length > 0 ? { found: true, items } : { found: false }
}
