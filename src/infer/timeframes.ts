/**
 * Timeframe Module
 * Indicator fields may carry a `|<code>` suffix selecting the bar interval
 * the value is computed on (`RSI|60`, `EMA20|1D`).
 * @module
 */

/**
 * Bar interval codes. A closed set shared by every market.
 */
export const TIMEFRAME_CODES = ['1', '5', '15', '30', '60', '120', '240', '1D', '1W'] as const

/**
 * One of {@link TIMEFRAME_CODES}
 */
export type TimeframeCode = (typeof TIMEFRAME_CODES)[number]

/**
 * Pattern of a field name with a timeframe suffix
 */
export const TIMEFRAME_FIELD_PATTERN = `^[A-Z0-9_+\\[\\]]+\\|(${TIMEFRAME_CODES.join('|')})$`

const TIMEFRAME_FIELD_REGEX = new RegExp(TIMEFRAME_FIELD_PATTERN)

/**
 * Whether a name carries a `|` suffix, whatever the suffix is
 */
export function hasTimeframeSuffix(name: string): boolean {
  return name.includes('|')
}

/**
 * Narrow a string to a {@link TimeframeCode}
 */
export function isTimeframeCode(value: string): value is TimeframeCode {
  return TIMEFRAME_CODES.some((code) => code === value)
}

/**
 * Whether a name matches {@link TIMEFRAME_FIELD_PATTERN}
 *
 * @example
 * ```ts
 * isTimeframeFieldName('RSI|60') // true
 * isTimeframeFieldName('RSI|2H') // false
 * isTimeframeFieldName('close') // false
 * ```
 */
export function isTimeframeFieldName(name: string): boolean {
  return TIMEFRAME_FIELD_REGEX.test(name)
}

/**
 * Split a name at its last `|`
 *
 * @returns The base name and, when the suffix is a known code, the timeframe
 *
 * @example
 * ```ts
 * splitTimeframe('EMA20|1W') // { base: 'EMA20', timeframe: '1W' }
 * splitTimeframe('close') // { base: 'close' }
 * ```
 */
export function splitTimeframe(name: string): { base: string; timeframe?: TimeframeCode } {
  const index = name.lastIndexOf('|')
  if (index === -1) {
    return { base: name }
  }
  const base = name.slice(0, index)
  const suffix = name.slice(index + 1)
  return isTimeframeCode(suffix) ? { base, timeframe: suffix } : { base }
}
