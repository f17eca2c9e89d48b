import { describe, expect, it } from 'vitest'
import { diffFieldTypes, diffMarketFields, fieldTypeMap, formatDiffReport, hasChanges } from '../../src/spec/diff.ts'

const previous = [{ name: 'close', type: 'price' }, { name: 'old' }]
const current = [
  { name: 'close', type: 'number' },
  { name: 'TV_Custom.flow', type: 'number' },
  { name: 'volume' },
]

describe('fieldTypeMap', () => {
  it('defaults missing hints to string', () => {
    expect(fieldTypeMap(previous)).toEqual(new Map([['close', 'price'], ['old', 'string']]))
  })
})

describe('diffFieldTypes', () => {
  it('lists added, removed and changed fields sorted by name', () => {
    expect(diffFieldTypes(fieldTypeMap(previous), fieldTypeMap(current))).toEqual({
      added: [{ name: 'TV_Custom.flow', type: 'number' }, { name: 'volume', type: 'string' }],
      removed: ['old'],
      changed: [{ name: 'close', from: 'price', to: 'number' }],
      customAdded: ['TV_Custom.flow'],
    })
  })

  it('is empty for identical snapshots', () => {
    const diff = diffFieldTypes(fieldTypeMap(current), fieldTypeMap(current))
    expect(hasChanges(diff)).toBe(false)
    expect(formatDiffReport({ market: 'coin', diff })).toBe('')
  })
})

describe('diffMarketFields', () => {
  it('renders the report', () => {
    const { changed, report } = diffMarketFields({ market: 'coin', previous, current })

    expect(changed).toBe(true)
    expect(report.split('\n')).toEqual([
      '[+] Added field: TV_Custom.flow (type: number)',
      '[+] Added field: volume (type: string)',
      '[-] Removed field: old',
      '[*] Changed: close (type: price -> number)',
      '',
      'New custom indicators: TV_Custom.flow',
      '',
      'Recommendation: run `tvgen generate --market coin`',
    ])
  })

  it('treats a missing snapshot as empty', () => {
    const { report } = diffMarketFields({ market: 'coin', previous: [], current: [{ name: 'close', type: 'price' }] })
    expect(report).toBe('[+] Added field: close (type: price)\n\nRecommendation: run `tvgen generate --market coin`')
  })
})
