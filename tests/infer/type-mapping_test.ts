import { describe, expect, it } from 'vitest'
import { formatForHint, isNumericTag, mapUpstreamType, UPSTREAM_TYPE_MAP } from '../../src/infer/type-mapping.ts'

describe('mapUpstreamType', () => {
  it('maps every listed hint', () => {
    for (const [hint, tag] of Object.entries(UPSTREAM_TYPE_MAP)) {
      expect(mapUpstreamType(hint)).toBe(tag)
    }
  })

  it('ignores case and surrounding whitespace', () => {
    expect(mapUpstreamType(' PERCENT ')).toBe('number')
  })

  it('returns undefined for absent or unknown hints', () => {
    expect(mapUpstreamType(undefined)).toBeUndefined()
    expect(mapUpstreamType(null)).toBeUndefined()
    expect(mapUpstreamType('interface')).toBeUndefined()
    expect(mapUpstreamType('toString')).toBeUndefined()
  })
})

describe('formatForHint', () => {
  it('maps time hints to formats', () => {
    expect(formatForHint('time')).toBe('date-time')
    expect(formatForHint('time-yyyymmdd')).toBe('date')
    expect(formatForHint('price')).toBeUndefined()
    expect(formatForHint(undefined)).toBeUndefined()
  })
})

describe('isNumericTag', () => {
  it('accepts number and integer', () => {
    expect(isNumericTag('number')).toBe(true)
    expect(isNumericTag('integer')).toBe(true)
    expect(isNumericTag('string')).toBe(false)
  })
})
