/**
 * Type Inferencer
 * Maps one sample value, plus an optional upstream hint, to a JSON type tag.
 * @module
 */

import type { InferenceConfig, OpenApiTypeTag } from '../types/market.ts'
import { classifyNumericLiteral, inferNumberType } from './number-inference.ts'
import { mapUpstreamType } from './type-mapping.ts'

/**
 * Whether a value is a plain key-value mapping
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const prototype = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

function isBooleanText(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return true
  }
  if (typeof value !== 'string') {
    return false
  }
  const text = value.toLowerCase()
  return text === 'true' || text === 'false'
}

/**
 * Infer the type tag of a field
 *
 * Checked in order, first match wins:
 *
 * 1. a hint listed in the upstream type table
 * 2. a sample whose text is `true`/`false` in any case
 * 3. a numeric sample: integer literal, then floating-point literal; JSON
 *    numbers follow `config.numberInference`
 * 4. an array
 * 5. a plain object
 * 6. `string` for everything else, including `null`, `undefined` and `''`
 *
 * Never throws.
 *
 * @example
 * ```ts
 * inferFieldType({ sample: 50000.5 }) // 'number'
 * inferFieldType({ sample: 'TRUE' }) // 'boolean'
 * inferFieldType({ sample: '-7' }) // 'integer'
 * inferFieldType({ sample: 'BINANCE', hint: 'price' }) // 'number'
 * inferFieldType({ sample: null }) // 'string'
 * ```
 */
export function inferFieldType({
  sample,
  hint,
  config,
}: {
  sample: unknown
  hint?: string | null
  config?: Partial<InferenceConfig>
}): OpenApiTypeTag {
  const hinted = mapUpstreamType(hint)
  if (hinted !== undefined) {
    return hinted
  }

  if (isBooleanText(sample)) {
    return 'boolean'
  }

  if (typeof sample === 'number') {
    return Number.isFinite(sample) ? inferNumberType({ value: sample, config }) : 'string'
  }

  if (typeof sample === 'bigint') {
    return 'integer'
  }

  if (typeof sample === 'string') {
    return classifyNumericLiteral(sample) ?? 'string'
  }

  if (Array.isArray(sample)) {
    return 'array'
  }

  if (isPlainObject(sample)) {
    return 'object'
  }

  return 'string'
}
