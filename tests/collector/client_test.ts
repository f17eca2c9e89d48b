import { describe, expect, it } from 'vitest'
import { ResponseCache } from '../../src/cache/responseCache.ts'
import { mergeScanBatches, SCAN_COLUMN_BATCH_SIZE, ScannerClient } from '../../src/collector/client.ts'
import {
  BadRequestError,
  MalformedResponseError,
  ServiceUnavailableError,
  ValidationError,
} from '../../src/errors/mod.ts'
import { createFakeFetch, createRecordingLogger } from '../helpers/fakeScanner.ts'

const BASE = 'https://scanner.test'
const fastRetry = { maxRetries: 2, baseDelayMs: 1, jitterFactor: 0 }

const metainfoBody = {
  data: { fields: [{ n: 'close', t: 'price' }, { n: 'name', t: 'text' }] },
  symbols: ['BINANCE:BTCUSDT'],
}

describe('mergeScanBatches', () => {
  it('joins rows by symbol and pads missing values', () => {
    expect(mergeScanBatches([
      { columns: ['a', 'b'], rows: [{ s: 'X', d: [1, 2] }, { s: 'Y', d: [3] }] },
      { columns: ['c'], rows: [{ s: 'Y', d: [4] }, { s: 'Z', d: [5, 6] }] },
    ])).toEqual([
      { s: 'X', d: [1, 2, null] },
      { s: 'Y', d: [3, null, 4] },
      { s: 'Z', d: [null, null, 5] },
    ])
  })

  it('matches rows without symbols by position', () => {
    expect(mergeScanBatches([
      { columns: ['a'], rows: [{ d: [1] }] },
      { columns: ['b'], rows: [{ d: [2] }] },
    ])).toEqual([{ d: [1, 2] }])
  })
})

describe('ScannerClient', () => {
  it('posts metainfo requests with headers and a bearer token', async () => {
    const { fetch, requests } = createFakeFetch({ [`${BASE}/coin/metainfo`]: [{ body: metainfoBody }] })
    const client = new ScannerClient({ baseUrl: `${BASE}/`, token: 'test-token', fetch, logger: createRecordingLogger().logger })

    const result = await client.metainfo('COIN')

    expect(result.fields.map((f) => f.name)).toEqual(['close', 'name'])
    expect(result.symbols).toEqual(['BINANCE:BTCUSDT'])
    expect(result.raw).toEqual(metainfoBody)
    expect(requests).toHaveLength(1)
    expect(requests[0]).toMatchObject({
      url: `${BASE}/coin/metainfo`,
      method: 'POST',
      body: {},
      headers: { 'authorization': 'Bearer test-token', 'content-type': 'application/json' },
    })
  })

  it('omits the authorization header without a token', async () => {
    const { fetch, requests } = createFakeFetch({ [`${BASE}/coin/metainfo`]: [{ body: metainfoBody }] })
    await new ScannerClient({ baseUrl: BASE, fetch, logger: createRecordingLogger().logger }).metainfo('coin')
    expect(requests[0]?.headers.authorization).toBeUndefined()
  })

  it('rejects invalid market names before any request', async () => {
    const { fetch, requests } = createFakeFetch({})
    const client = new ScannerClient({ baseUrl: BASE, fetch })
    await expect(client.metainfo('../etc')).rejects.toBeInstanceOf(ValidationError)
    expect(requests).toEqual([])
  })

  it('serves metainfo from the cache', async () => {
    const { fetch, requests } = createFakeFetch({ [`${BASE}/coin/metainfo`]: [{ body: metainfoBody }] })
    const cache = new ResponseCache<unknown>({ enabled: true, parse: (value) => value })
    const client = new ScannerClient({ baseUrl: BASE, fetch, cache, logger: createRecordingLogger().logger })

    await client.metainfo('coin')
    const second = await client.metainfo('coin')

    expect(requests).toHaveLength(1)
    expect(second.fields).toHaveLength(2)
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1 })
    expect(cache.get(ResponseCache.key(BASE, 'coin', 'metainfo'))).toEqual(metainfoBody)
  })

  it('retries transient failures and logs each retry', async () => {
    const { fetch, requests } = createFakeFetch({
      [`${BASE}/coin/metainfo`]: [{ status: 503, body: 'busy' }, { body: metainfoBody }],
    })
    const { logger, lines } = createRecordingLogger()
    const client = new ScannerClient({ baseUrl: BASE, fetch, retry: fastRetry, logger })

    const result = await client.metainfo('coin')

    expect(result.fields).toHaveLength(2)
    expect(requests).toHaveLength(2)
    expect(lines).toContain(
      'warn: metainfo coin attempt 1 failed (metainfo request for coin failed with HTTP 503), retrying in 1ms',
    )
  })

  it('gives up after the configured retries', async () => {
    const { fetch, requests } = createFakeFetch({ [`${BASE}/coin/metainfo`]: [{ status: 503, body: 'busy' }] })
    const client = new ScannerClient({ baseUrl: BASE, fetch, retry: fastRetry, logger: createRecordingLogger().logger })

    const error = await client.metainfo('coin').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ServiceUnavailableError)
    if (error instanceof ServiceUnavailableError) {
      expect(error.metadata).toMatchObject({ statusCode: 503, url: `${BASE}/coin/metainfo`, body: 'busy' })
    }
    expect(requests).toHaveLength(3)
  })

  it('does not retry client errors', async () => {
    const { fetch, requests } = createFakeFetch({ [`${BASE}/coin/metainfo`]: [{ status: 400, body: 'bad' }] })
    const client = new ScannerClient({ baseUrl: BASE, fetch, retry: fastRetry, logger: createRecordingLogger().logger })

    await expect(client.metainfo('coin')).rejects.toBeInstanceOf(BadRequestError)
    expect(requests).toHaveLength(1)
  })

  it('reports bodies that are not JSON', async () => {
    const { fetch } = createFakeFetch({ [`${BASE}/coin/metainfo`]: [{ body: '<html>' }] })
    const client = new ScannerClient({ baseUrl: BASE, fetch, retry: fastRetry, logger: createRecordingLogger().logger })

    await expect(client.metainfo('coin')).rejects.toBeInstanceOf(MalformedResponseError)
  })

  it('splits wide scans into column batches and merges the rows', async () => {
    const columns = Array.from({ length: SCAN_COLUMN_BATCH_SIZE + 5 }, (_, i) => `f${i}`)
    const { fetch, requests } = createFakeFetch({
      [`${BASE}/coin/scan`]: [
        (body) => {
          const requested = typeof body === 'object' && body !== null && 'columns' in body && Array.isArray(body.columns)
            ? body.columns
            : []
          return { body: { totalCount: 7, data: [{ s: 'A:B', d: requested.map((_, i) => i) }] } }
        },
      ],
    })
    const client = new ScannerClient({ baseUrl: BASE, fetch, logger: createRecordingLogger().logger })

    const result = await client.scan('coin', { tickers: ['A:B'], columns, types: ['spot'] })

    expect(requests).toHaveLength(2)
    expect(requests[0]?.body).toEqual({
      symbols: { tickers: ['A:B'], query: { types: ['spot'] } },
      columns: columns.slice(0, SCAN_COLUMN_BATCH_SIZE),
    })
    expect(requests[1]?.body).toEqual({
      symbols: { tickers: ['A:B'], query: { types: ['spot'] } },
      columns: columns.slice(SCAN_COLUMN_BATCH_SIZE),
    })
    expect(result.totalCount).toBe(7)
    expect(result.columns).toEqual(columns)
    expect(result.data).toEqual([{ s: 'A:B', d: [...Array.from({ length: SCAN_COLUMN_BATCH_SIZE }, (_, i) => i), 0, 1, 2, 3, 4] }])
  })
})
