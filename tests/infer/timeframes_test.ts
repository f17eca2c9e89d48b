import { describe, expect, it } from 'vitest'
import {
  hasTimeframeSuffix,
  isTimeframeCode,
  isTimeframeFieldName,
  splitTimeframe,
  TIMEFRAME_CODES,
  TIMEFRAME_FIELD_PATTERN,
} from '../../src/infer/timeframes.ts'

describe('timeframes', () => {
  it('lists the supported codes in the pattern', () => {
    expect(TIMEFRAME_CODES).toEqual(['1', '5', '15', '30', '60', '120', '240', '1D', '1W'])
    expect(TIMEFRAME_FIELD_PATTERN).toBe('^[A-Z0-9_+\\[\\]]+\\|(1|5|15|30|60|120|240|1D|1W)$')
  })

  it('detects any suffix', () => {
    expect(hasTimeframeSuffix('RSI|60')).toBe(true)
    expect(hasTimeframeSuffix('RSI|2H')).toBe(true)
    expect(hasTimeframeSuffix('close')).toBe(false)
  })

  it('matches names against the timeframe pattern', () => {
    expect(isTimeframeFieldName('RSI|60')).toBe(true)
    expect(isTimeframeFieldName('EMA20|1W')).toBe(true)
    expect(isTimeframeFieldName('Recommend.All|1D')).toBe(false)
    expect(isTimeframeFieldName('RSI|2H')).toBe(false)
    expect(isTimeframeFieldName('rsi|60')).toBe(false)
    expect(isTimeframeFieldName('close')).toBe(false)
  })

  it('narrows timeframe codes', () => {
    expect(isTimeframeCode('240')).toBe(true)
    expect(isTimeframeCode('1M')).toBe(false)
  })

  it('splits at the last bar', () => {
    expect(splitTimeframe('EMA20|1W')).toEqual({ base: 'EMA20', timeframe: '1W' })
    expect(splitTimeframe('RSI|2H')).toEqual({ base: 'RSI' })
    expect(splitTimeframe('close')).toEqual({ base: 'close' })
  })
})
