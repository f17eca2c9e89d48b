/**
 * Number Type Inference Module
 * Decides between `integer` and `number` for numeric samples.
 * @module
 */

import type { InferenceConfig } from '../types/market.ts'

const INTEGER_LITERAL = /^[+-]?\d+$/
const FLOAT_LITERAL = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/

/**
 * Whether a string is an integer literal with no fractional part
 *
 * Surrounding whitespace is ignored. `"42"` and `"-7"` qualify, `"42.0"` and
 * `"4e2"` do not.
 */
export function isIntegerLiteral(text: string): boolean {
  return INTEGER_LITERAL.test(text.trim())
}

/**
 * Whether a string is a decimal floating-point literal, optionally with an
 * exponent (`"3.14"`, `".5"`, `"1e-3"`). Integer literals qualify too.
 */
export function isFloatLiteral(text: string): boolean {
  return FLOAT_LITERAL.test(text.trim())
}

/**
 * Infer whether a JSON number sample should be typed `integer` or `number`
 *
 * A parsed JSON number no longer says whether it was written `50000` or
 * `50000.0`, so the decision is a policy:
 *
 * - `'float'` (default): always `number`
 * - `'strict'`: `integer` for integer values inside the safe integer range,
 *   `number` otherwise
 *
 * @param value - The sample; callers only pass finite numbers
 * @param config - Optional inference configuration
 *
 * @example
 * ```ts
 * inferNumberType({ value: 50000 }) // 'number'
 * inferNumberType({ value: 50000, config: { numberInference: 'strict' } }) // 'integer'
 * ```
 */
export function inferNumberType({
  value,
  config,
}: {
  value: number
  config?: Partial<InferenceConfig>
}): 'integer' | 'number' {
  const numberInference = config?.numberInference ?? 'float'

  if (numberInference === 'float') {
    return 'number'
  }

  return Number.isSafeInteger(value) ? 'integer' : 'number'
}

/**
 * Classify a numeric literal string
 *
 * @returns `integer`, `number`, or `undefined` when the text is not a literal
 */
export function classifyNumericLiteral(text: string): 'integer' | 'number' | undefined {
  if (isIntegerLiteral(text)) {
    return 'integer'
  }
  if (isFloatLiteral(text)) {
    return 'number'
  }
  return undefined
}
