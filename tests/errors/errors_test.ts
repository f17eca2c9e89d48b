import { describe, expect, it } from 'vitest'
import {
  ConfigurationError,
  createErrorContext,
  DocumentSizeError,
  DuplicateFieldError,
  ErrorBoundary,
  ErrorCode,
  errorMessage,
  GatewayTimeoutError,
  HttpError,
  MalformedResponseError,
  RefIntegrityError,
  SpecValidationError,
  TvGenError,
  ValidationError,
} from '../../src/errors/mod.ts'

const context = createErrorContext({ component: 'test', metadata: { market: 'coin' } })

describe('createErrorContext', () => {
  it('stamps an ISO timestamp', () => {
    expect(context.component).toBe('test')
    expect(context.metadata).toEqual({ market: 'coin' })
    expect(new Date(context.timestamp).toISOString()).toBe(context.timestamp)
  })
})

describe('TvGenError hierarchy', () => {
  it('carries code, severity and retryable flag', () => {
    const error = new ConfigurationError('TV_API_TOKEN is too short', context)
    expect(error).toBeInstanceOf(TvGenError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('ConfigurationError')
    expect(error.code).toBe(ErrorCode.CONFIGURATION_ERROR)
    expect(error.severity).toBe('high')
    expect(error.retryable).toBe(false)
  })

  it('serializes to JSON with its context', () => {
    const json = new ValidationError('market is required', context).toJSON()
    expect(json.name).toBe('ValidationError')
    expect(json.message).toBe('market is required')
    expect(json.code).toBe('VALIDATION_ERROR')
    expect(json.context).toEqual(context)
  })

  it('names the field and market of duplicates', () => {
    const error = new DuplicateFieldError({ fieldName: 'close', market: 'coin', context })
    expect(error.message).toBe('Duplicate field "close" in market "coin"')
    expect(error.code).toBe(ErrorCode.DUPLICATE_FIELD)
    expect(error.toJSON()).toMatchObject({ fieldName: 'close', market: 'coin' })
    expect(new DuplicateFieldError({ fieldName: 'close', context }).message).toBe('Duplicate field "close"')
  })

  it('lists unresolved references', () => {
    const error = new RefIntegrityError({ unresolved: ['#/components/schemas/Missing'], context })
    expect(error.message).toBe('Unresolved $ref: #/components/schemas/Missing')
    expect(error.unresolved).toEqual(['#/components/schemas/Missing'])
  })

  it('summarizes validation problems', () => {
    const error = new SpecValidationError({ errors: ['info.title: required string is missing', 'paths: x'], context })
    expect(error.message).toBe('OpenAPI document is invalid: 2 problem(s); first: info.title: required string is missing')
    expect(error.toJSON().errors).toHaveLength(2)
  })

  it('reports document sizes', () => {
    const error = new DocumentSizeError({ sizeBytes: 2048, maxBytes: 1024, context })
    expect(error.message).toBe('Serialized document is 2048 bytes, limit is 1024')
    expect(error.code).toBe(ErrorCode.DOCUMENT_TOO_LARGE)
  })

  it('keeps malformed response issues', () => {
    const error = new MalformedResponseError({ message: 'bad body', context, issues: ['data: Expected array'] })
    expect(error.issues).toEqual(['data: Expected array'])
    expect(error.retryable).toBe(false)
  })

  it('keeps HTTP metadata', () => {
    const error = new GatewayTimeoutError({ message: 'upstream slow', context, metadata: { statusCode: 504 } })
    expect(error).toBeInstanceOf(HttpError)
    expect(error.retryable).toBe(true)
    expect(error.toJSON().metadata).toEqual({ statusCode: 504 })
  })
})

describe('errorMessage', () => {
  it('renders errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage(42)).toBe('42')
  })
})

describe('ErrorBoundary', () => {
  const boundary = new ErrorBoundary('cli')

  it('returns results unchanged', async () => {
    await expect(boundary.execute(async () => 'done')).resolves.toBe('done')
    expect(boundary.executeSync(() => 7)).toBe(7)
  })

  it('passes known errors through', async () => {
    const original = new ValidationError('bad', context)
    await expect(boundary.execute(async () => {
      throw original
    })).rejects.toBe(original)
  })

  it('wraps foreign errors as UNKNOWN_ERROR', () => {
    try {
      boundary.executeSync(() => {
        throw new RangeError('out of range')
      })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(TvGenError)
      if (error instanceof TvGenError) {
        expect(error.code).toBe(ErrorCode.UNKNOWN_ERROR)
        expect(error.message).toBe('out of range')
        expect(error.context.component).toBe('cli')
      }
    }
  })
})
