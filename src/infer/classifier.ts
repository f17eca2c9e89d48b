/**
 * Field Classifier Module
 * Groups a market's fields for reporting: numeric vs string, custom
 * indicators, and which bases are offered on several timeframes.
 * @module
 */

import type { FieldDescriptor, InferenceConfig } from '../types/market.ts'
import { splitTimeframe } from './timeframes.ts'
import { inferFieldType } from './type-inference.ts'
import { isNumericTag } from './type-mapping.ts'

/**
 * Names of custom or third-party indicators
 */
export const CUSTOM_FIELD_PATTERNS: readonly RegExp[] = [
  /^TV_Custom\./i,
  /_impact_score$/i,
  /^BTC_/i,
  /^custom_/i,
]

/**
 * Whether a field name denotes a custom indicator
 *
 * @example
 * ```ts
 * isCustomField('TV_Custom.momentum') // true
 * isCustomField('close') // false
 * ```
 */
export function isCustomField(name: string): boolean {
  return CUSTOM_FIELD_PATTERNS.some((pattern) => pattern.test(name))
}

/**
 * Sorted, de-duplicated base names per category
 */
export type FieldClassification = {
  numeric: string[]
  string: string[]
  custom: string[]
  /** Bases offered with at least one non-daily timeframe */
  supportsTimeframes: string[]
  /** Bases only offered as `|1D` */
  dailyOnly: string[]
  /** Fields only seen in scan data */
  discovered: string[]
}

/**
 * Classify descriptors by base name
 *
 * Timeframe suffixes are stripped before grouping, so `RSI`, `RSI|60` and
 * `RSI|1D` all count as `RSI`. A base is numeric when any of its variants
 * infers to `number` or `integer`.
 */
export function classifyFields({
  fields,
  config,
}: {
  fields: Iterable<FieldDescriptor>
  config?: Partial<InferenceConfig>
}): FieldClassification {
  const numeric = new Set<string>()
  const textual = new Set<string>()
  const custom = new Set<string>()
  const discovered = new Set<string>()
  const timeframesByBase = new Map<string, Set<string>>()

  for (const field of fields) {
    const { base, timeframe } = splitTimeframe(field.name)
    const tag = inferFieldType({ sample: field.sampleValue, hint: field.declaredType, config })

    if (isNumericTag(tag)) {
      numeric.add(base)
    } else if (tag === 'string') {
      textual.add(base)
    }

    if (isCustomField(base)) {
      custom.add(base)
    }
    if (field.source === 'scan') {
      discovered.add(field.name)
    }
    if (timeframe !== undefined) {
      const seen = timeframesByBase.get(base) ?? new Set<string>()
      seen.add(timeframe)
      timeframesByBase.set(base, seen)
    }
  }

  const supportsTimeframes: string[] = []
  const dailyOnly: string[] = []
  for (const [base, timeframes] of timeframesByBase) {
    if ([...timeframes].some((timeframe) => timeframe !== '1D')) {
      supportsTimeframes.push(base)
    } else {
      dailyOnly.push(base)
    }
  }

  const sorted = (values: Iterable<string>) => [...values].sort()

  return {
    numeric: sorted(numeric),
    string: sorted([...textual].filter((base) => !numeric.has(base))),
    custom: sorted(custom),
    supportsTimeframes: sorted(supportsTimeframes),
    dailyOnly: sorted(dailyOnly),
    discovered: sorted(discovered),
  }
}
