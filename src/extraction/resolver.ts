import type { CheerioAPI } from 'cheerio'
import { TRACKED_FIELDS } from '../config/constants'
import { createLogger } from '../utils/logger'
import { compileProbe } from './probes'
import { DEFAULT_PROBE_VERSION } from './registry'
import type { FieldKey, Probe, ProbeTable, Resolution } from './types'

const log = createLogger('resolver')

/**
 * Resolves a field against a document by trying its probes in rank order.
 * The first probe that yields non-blank content wins.
 */
export class SelectorResolver {
  private readonly probes = new Map<FieldKey, readonly Probe[]>()

  constructor(table: ProbeTable = DEFAULT_PROBE_VERSION.fields) {
    for (const field of TRACKED_FIELDS) {
      this.probes.set(field, Object.freeze(table[field].map(compileProbe)))
    }
  }

  probesFor(field: FieldKey): readonly Probe[] {
    return this.probes.get(field) ?? []
  }

  resolve(document: CheerioAPI, field: FieldKey): Resolution {
    const probes = this.probesFor(field)

    for (const [rank, probe] of probes.entries()) {
      const result = probe.run(document)
      if (!result.found) continue

      if (rank > 0) {
        log.debug(`${field}: matched fallback probe #${rank + 1} ${probe.name}`)
      }
      return {
        status: 'matched',
        field,
        items: result.items,
        probe: probe.name,
        rank,
      }
    }

    log.debug(`${field}: none of ${probes.length} probes matched`)
    return { status: 'absent', field, probesTried: probes.length }
  }
}
