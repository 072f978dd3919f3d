/**
 * Filter Normalization
 *
 * Canonical string form of a filter set, used only as a cache key component.
 */

import type { DimensionFilter, FilterSetInput } from '../types'
import { filtersOf, toFilterSet } from './validate'

const FIELD_ORDER = ['dimension', 'levels', 'codes', 'children', 'children_include_self'] as const

type NormalizedFilter = Partial<Record<(typeof FIELD_ORDER)[number], unknown>>

function normalizeFilter(filter: DimensionFilter): NormalizedFilter {
  const sorted: DimensionFilter = {
    ...filter,
    ...(filter.codes && filter.codes.length > 0
      ? { codes: [...filter.codes].sort(compareCodePoints) }
      : {}),
    ...(filter.levels && filter.levels.length > 0
      ? { levels: [...filter.levels].sort((a, b) => a - b) }
      : {})
  }

  const ordered: NormalizedFilter = {}
  for (const field of FIELD_ORDER) {
    if (field in sorted) {
      ordered[field] = sorted[field]
    }
  }
  return ordered
}

/**
 * Order strings by Unicode code point rather than UTF-16 code unit, so
 * astral characters sort after the rest of the BMP.
 */
export function compareCodePoints(a: string, b: string): number {
  const pa = Array.from(a, (ch) => ch.codePointAt(0) ?? 0)
  const pb = Array.from(b, (ch) => ch.codePointAt(0) ?? 0)
  const length = Math.min(pa.length, pb.length)
  for (let i = 0; i < length; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0)
    if (diff !== 0) return diff
  }
  return pa.length - pb.length
}

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
export function sortKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj
  }

  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  const entries = Object.entries(obj).sort(([a], [b]) => compareCodePoints(a, b))
  for (const [key, value] of entries) {
    sorted[key] = sortKeys(value)
  }
  return sorted
}

/**
 * Escape everything outside printable ASCII as \uXXXX so keys match
 * those written by existing EasyData cache directories.
 */
function asciiOnly(json: string): string {
  return json.replace(
    /[\u007f-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  )
}

/**
 * Normalize dimension filters for consistent caching.
 *
 * Codes and levels are sorted, filters are ordered by dimension and keys
 * are sorted, so equivalent inputs always serialize byte-identically.
 * Does not validate; call validateDimensionFilters first.
 *
 * @example
 * ```ts
 * normalizeDimensionFilters([
 *   { dimension: 'd3', levels: [2, 1] },
 *   { dimension: 'd1', codes: ['B', 'A'] }
 * ])
 * // '[{"codes":["A","B"],"dimension":"d1"},{"dimension":"d3","levels":[1,2]}]'
 * ```
 */
export function normalizeDimensionFilters(input: FilterSetInput): string {
  const normalized = filtersOf(toFilterSet(input)).map(normalizeFilter)

  // Array.prototype.sort is stable, so equal dimensions keep input order
  normalized.sort((a, b) => {
    const da = String(a.dimension)
    const db = String(b.dimension)
    return da < db ? -1 : da > db ? 1 : 0
  })

  return asciiOnly(JSON.stringify(sortKeys(normalized)))
}
