import { describe, expect, it } from 'vitest'
import { SpecValidationError } from '../../src/errors/mod.ts'
import { createFieldDescriptor, createMarketSpec } from '../../src/infer/field-descriptors.ts'
import { assembleMarketSpec } from '../../src/spec/assembler.ts'
import {
  assertValidSpecDocument,
  createComponentValidator,
  isSchemaDocument,
  validateSpecDocument,
} from '../../src/spec/validator.ts'

const document = assembleMarketSpec({
  spec: createMarketSpec({
    marketName: 'coin',
    fields: [
      createFieldDescriptor({ name: 'close', sampleValue: 50000.5 }),
      createFieldDescriptor({ name: 'RSI|60', sampleValue: 49.5 }),
    ],
  }),
})

function operation(operationId: string, responses: Record<string, unknown> = { '200': { description: 'ok' } }) {
  return { post: { operationId, responses } }
}

describe('validateSpecDocument', () => {
  it('accepts generated documents', () => {
    expect(validateSpecDocument(document)).toEqual({ valid: true, errors: [] })
    expect(isSchemaDocument(document)).toBe(true)
  })

  it('rejects non-objects', () => {
    expect(validateSpecDocument('openapi: 3.1.0')).toEqual({ valid: false, errors: ['document must be an object'] })
  })

  it('checks the header', () => {
    const { errors } = validateSpecDocument({ openapi: '3.0.3', info: { title: '', version: '1' }, paths: {} })
    expect(errors).toEqual([
      'openapi: expected a 3.1.x version, got "3.0.3"',
      'info.title: required string is missing',
    ])
  })

  it('requires unique operation ids and described responses', () => {
    const { errors } = validateSpecDocument({
      openapi: '3.1.0',
      info: { title: 'T', version: '1' },
      paths: {
        '/a': operation('Same'),
        '/b': operation('Same', { '200': {} }),
        'c': operation('Other'),
      },
    })
    expect(errors).toEqual([
      'paths./b.post: operationId "Same" already used by paths./a.post',
      'paths./b.post.responses.200: description is required',
      'paths.c: path must start with "/"',
    ])
  })

  it('reports unresolved references', () => {
    const { valid, errors } = validateSpecDocument({
      openapi: '3.1.0',
      info: { title: 'T', version: '1' },
      paths: {},
      components: { schemas: { A: { $ref: '#/components/schemas/Missing' } } },
    })
    expect(valid).toBe(false)
    expect(errors).toContain('$ref: unresolved reference #/components/schemas/Missing')
  })

  it('reports component schemas that do not compile', () => {
    const { errors } = validateSpecDocument({
      openapi: '3.1.0',
      info: { title: 'T', version: '1' },
      paths: {},
      components: { schemas: { Bad: { type: 'nonsense' } } },
    })
    expect(errors.length).toBeGreaterThan(0)
    expect(errors.every((error) => error.startsWith('components.schemas'))).toBe(true)
  })
})

describe('assertValidSpecDocument', () => {
  it('throws SpecValidationError with every problem', () => {
    try {
      assertValidSpecDocument({ openapi: '3.1.0', paths: {} }, 'broken.yaml')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(SpecValidationError)
      if (error instanceof SpecValidationError) {
        expect(error.errors).toEqual(['info: required object is missing'])
        expect(error.context.metadata).toEqual({ source: 'broken.yaml' })
      }
    }
  })
})

describe('createComponentValidator', () => {
  const validate = createComponentValidator(document)

  it('accepts indicator names with a known timeframe', () => {
    for (const name of ['RSI|60', 'EMA20|1W', 'MACD_MACD|240', 'BB+[1]|1D', 'X|1']) {
      expect(validate('NumericFieldWithTimeframe', name).valid).toBe(true)
    }
  })

  it('rejects unknown timeframes and bare names', () => {
    expect(validate('NumericFieldWithTimeframe', 'RSI|2H').valid).toBe(false)
    expect(validate('NumericFieldWithTimeframe', 'close').valid).toBe(false)
    expect(validate('NumericFieldWithTimeframe', 'rsi|60').valid).toBe(false)
  })

  it('checks bare names against the numeric field enum', () => {
    expect(validate('NumericFieldNoTimeframe', 'close')).toEqual({ valid: true, errors: [] })
    expect(validate('NumericFieldNoTimeframe', 'RSI|60').valid).toBe(false)
  })

  it('validates filters and scan requests', () => {
    expect(validate('Filter', { left: 'close', operation: 'greater', right: 100 }).valid).toBe(true)
    expect(validate('Filter', { left: 'close' }).valid).toBe(false)
    expect(validate('CoinScanRequest', {
      symbols: { tickers: ['BINANCE:BTCUSDT'], query: { types: [] } },
      columns: ['close'],
      options: { lang: 'en' },
    }).valid).toBe(true)
    expect(validate('CoinScanRequest', { columns: ['close'] }).errors).toEqual([
      "root: must have required property 'symbols'",
    ])
  })
})
