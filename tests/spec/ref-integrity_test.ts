import { describe, expect, it } from 'vitest'
import { RefIntegrityError } from '../../src/errors/mod.ts'
import {
  assertRefIntegrity,
  collectRefs,
  findUnresolvedRefs,
  resolvePointer,
} from '../../src/spec/ref-integrity.ts'

const document = {
  paths: {
    '/coin/scan': {
      post: { requestBody: { $ref: '#/components/schemas/CoinScanRequest' } },
    },
  },
  components: {
    schemas: {
      CoinScanRequest: { type: 'object', properties: { options: { $ref: '#/components/schemas/Options' } } },
      Options: { type: 'object' },
      'a/b': { type: 'string' },
    },
  },
}

describe('collectRefs', () => {
  it('finds refs depth-first in document order', () => {
    expect(collectRefs(document)).toEqual([
      '#/components/schemas/CoinScanRequest',
      '#/components/schemas/Options',
    ])
  })

  it('walks arrays', () => {
    expect(collectRefs({ allOf: [{ $ref: '#/a' }, { $ref: '#/b' }] })).toEqual(['#/a', '#/b'])
  })
})

describe('resolvePointer', () => {
  it('follows local pointers', () => {
    expect(resolvePointer(document, '#/components/schemas/Options')).toEqual({ type: 'object' })
    expect(resolvePointer(document, '#/components/schemas/a~1b')).toEqual({ type: 'string' })
    expect(resolvePointer(document, '#')).toBe(document)
  })

  it('returns undefined for missing, external or malformed pointers', () => {
    expect(resolvePointer(document, '#/components/schemas/Missing')).toBeUndefined()
    expect(resolvePointer(document, 'https://example.test/schema.json')).toBeUndefined()
    expect(resolvePointer(document, '#/components/%E0%A4%A')).toBeUndefined()
    expect(resolvePointer(document, '#/components/schemas/toString')).toBeUndefined()
  })
})

describe('findUnresolvedRefs', () => {
  it('is empty for a consistent document', () => {
    expect(findUnresolvedRefs(document)).toEqual([])
    expect(() => assertRefIntegrity(document)).not.toThrow()
  })

  it('lists each dangling ref once', () => {
    const broken = {
      a: { $ref: '#/components/schemas/Gone' },
      b: { $ref: '#/components/schemas/Gone' },
      c: { $ref: 'other.yaml#/X' },
    }
    expect(findUnresolvedRefs(broken)).toEqual(['#/components/schemas/Gone', 'other.yaml#/X'])
    expect(() => assertRefIntegrity(broken)).toThrow(RefIntegrityError)
  })
})
