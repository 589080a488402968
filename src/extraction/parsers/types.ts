import type { OccupationFields } from '../../models/occupation'
import type { FieldKey, Resolution } from '../types'

/**
 * Turns the raw items a probe produced into the typed value of one field.
 * Parsers are pure and never throw: absent or unusable content yields the
 * field's empty value.
 */
export interface FieldParser<K extends FieldKey> {
  readonly field: K
  parse(resolution: Resolution): OccupationFields[K]
}

export type FieldParsers = { readonly [K in FieldKey]: FieldParser<K> }

export function itemsOf(resolution: Resolution): string[] {
  return resolution.status === 'matched' ? resolution.items : []
}
