/**
 * Upstream Type Mapping Module
 * Translates the type hints that the scanner's metainfo attaches to each
 * field into JSON type tags and string formats.
 * @module
 */

import type { OpenApiTypeTag } from '../types/market.ts'

/**
 * Hint to tag table. Keys are lower-case.
 *
 * Hints missing from this table (e.g. `interface`) are ambiguous and make
 * the inferencer fall back to the sample value.
 */
export const UPSTREAM_TYPE_MAP: Readonly<Record<string, OpenApiTypeTag>> = {
  number: 'number',
  price: 'number',
  fundamental_price: 'number',
  percent: 'number',
  percentage: 'number',
  float: 'number',
  duration: 'number',
  integer: 'integer',
  int: 'integer',
  bool: 'boolean',
  boolean: 'boolean',
  string: 'string',
  text: 'string',
  time: 'string',
  'time-yyyymmdd': 'string',
  set: 'array',
  num_slice: 'array',
  array: 'array',
  map: 'object',
  object: 'object',
}

const HINT_FORMATS: Readonly<Record<string, string>> = {
  time: 'date-time',
  'time-yyyymmdd': 'date',
}

function normalizeHint(hint: string): string {
  return hint.trim().toLowerCase()
}

/**
 * Map an upstream hint to a type tag
 *
 * @returns The tag, or `undefined` when the hint is absent or not listed
 *
 * @example
 * ```ts
 * mapUpstreamType('price') // 'number'
 * mapUpstreamType(' Bool ') // 'boolean'
 * mapUpstreamType('interface') // undefined
 * ```
 */
export function mapUpstreamType(hint: string | undefined | null): OpenApiTypeTag | undefined {
  if (hint === undefined || hint === null) {
    return undefined
  }
  const key = normalizeHint(hint)
  return Object.hasOwn(UPSTREAM_TYPE_MAP, key) ? UPSTREAM_TYPE_MAP[key] : undefined
}

/**
 * String format implied by a hint (`time` -> `date-time`)
 */
export function formatForHint(hint: string | undefined | null): string | undefined {
  if (hint === undefined || hint === null) {
    return undefined
  }
  const key = normalizeHint(hint)
  return Object.hasOwn(HINT_FORMATS, key) ? HINT_FORMATS[key] : undefined
}

/**
 * Whether a tag denotes a numeric value
 */
export function isNumericTag(tag: OpenApiTypeTag): boolean {
  return tag === 'number' || tag === 'integer'
}
