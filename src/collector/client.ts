/**
 * Scanner Client Module
 * HTTP client for the scanner's `metainfo` and `scan` endpoints, with
 * retries, timeouts and an optional metainfo cache.
 * @module
 */

import { ResponseCache } from '../cache/mod.ts'
import { createErrorContext, errorMessage, MalformedResponseError } from '../errors/mod.ts'
import type { RetryConfig } from '../types/retry.ts'
import { type Logger, logger as defaultLogger } from '../utils/logger.ts'
import { createHttpError, parseRetryAfter } from '../utils/retryErrors.ts'
import { withRetry } from '../utils/retryWrapper.ts'
import { validateMarketName } from '../utils/validation.ts'
import {
  type NormalizedMetainfo,
  normalizeMetainfo,
  parseScanResponse,
  type ScanRequest,
  type ScanRow,
} from './schemas.ts'

const COMPONENT = 'scanner-client'

/**
 * Public scanner host
 */
export const DEFAULT_BASE_URL = 'https://scanner.tradingview.com'

/**
 * Per-request timeout in milliseconds
 */
export const DEFAULT_TIMEOUT_MS = 10000

/**
 * Columns sent per scan request; wider requests are split and merged
 */
export const SCAN_COLUMN_BATCH_SIZE = 20

const BODY_EXCERPT_LENGTH = 500

/**
 * The subset of `fetch` the client calls
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

/**
 * Scanner client configuration
 */
export type ScannerClientConfig = {
  /** Scanner host (default: the public scanner) */
  baseUrl?: string
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number
  /** Sent as `Authorization: Bearer <token>` when set */
  token?: string
  /** Retry behaviour of each request */
  retry?: RetryConfig
  /** HTTP implementation (default: global `fetch`) */
  fetch?: FetchLike
  /** Caches raw metainfo bodies per market */
  cache?: ResponseCache<unknown>
  logger?: Logger
}

/**
 * Validated metainfo plus the body it came from
 */
export type MetainfoResult = NormalizedMetainfo & {
  raw: unknown
}

/**
 * Merged result of one or more scan requests
 */
export type ScanResult = {
  totalCount: number
  /** Requested columns; each row's `d` follows this order */
  columns: string[]
  data: ScanRow[]
}

/**
 * Parameters of {@link ScannerClient.scan}
 */
export type ScanParams = {
  tickers: readonly string[]
  columns: readonly string[]
  /** `symbols.query.types` (default: none) */
  types?: readonly string[]
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

function padRow(values: readonly unknown[], length: number): unknown[] {
  const row = values.slice(0, length)
  while (row.length < length) {
    row.push(null)
  }
  return row
}

/**
 * Merge per-batch scan rows into one row per symbol
 *
 * Rows are matched by `s`, or by position when a row has no symbol.
 * Values missing from a batch are filled with `null` so that every `d`
 * lines up with the full column list.
 */
export function mergeScanBatches(batches: ReadonlyArray<{ columns: readonly string[]; rows: readonly ScanRow[] }>): ScanRow[] {
  const merged = new Map<string, { s?: string; d: unknown[] }>()
  let width = 0

  for (const { columns, rows } of batches) {
    rows.forEach((row, index) => {
      const key = row.s ?? `#${index}`
      let target = merged.get(key)
      if (target === undefined) {
        target = { ...(row.s !== undefined ? { s: row.s } : {}), d: padRow([], width) }
        merged.set(key, target)
      }
      target.d.push(...padRow(row.d, columns.length))
    })
    width += columns.length
    for (const target of merged.values()) {
      target.d = padRow(target.d, width)
    }
  }

  return [...merged.values()]
}

/**
 * Client of one scanner host
 *
 * @example
 * ```ts
 * const client = new ScannerClient({ timeoutMs: 5000, retry: { maxRetries: 2 } })
 * const { fields, symbols } = await client.metainfo('coin')
 * const scan = await client.scan('coin', {
 *   tickers: symbols.slice(0, 10),
 *   columns: fields.map((f) => f.name),
 * })
 * ```
 */
export class ScannerClient {
  readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly token?: string
  private readonly retry?: RetryConfig
  private readonly fetchImpl: FetchLike
  private readonly cache?: ResponseCache<unknown>
  private readonly logger: Logger

  constructor(config: ScannerClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.token = config.token
    this.retry = config.retry
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init))
    this.cache = config.cache
    this.logger = config.logger ?? defaultLogger
  }

  /**
   * Fetch and validate the field list of a market
   *
   * Raw bodies are served from the cache when one is configured.
   *
   * @throws {MalformedResponseError} If the body is not a metainfo payload
   * @throws {HttpError} If the scanner answers with a non-2xx status
   */
  async metainfo(market: string): Promise<MetainfoResult> {
    const name = validateMarketName(market, COMPONENT)
    const cacheKey = ResponseCache.key(this.baseUrl, name, 'metainfo')

    const cached = this.cache?.get(cacheKey)
    if (cached !== undefined) {
      this.logger.debug(`metainfo for ${name} served from cache`)
      return { ...normalizeMetainfo(cached, name), raw: cached }
    }

    const raw = await this.postJson(name, 'metainfo', {})
    const normalized = normalizeMetainfo(raw, name)
    await this.cache?.set(cacheKey, raw)
    this.logger.debug(`metainfo for ${name}: ${normalized.fields.length} fields, ${normalized.symbols.length} symbols`)
    return { ...normalized, raw }
  }

  /**
   * Scan `tickers` for `columns`
   *
   * Columns are sent in batches of {@link SCAN_COLUMN_BATCH_SIZE}; the
   * batches run one after another and their rows are merged.
   */
  async scan(market: string, { tickers, columns, types = [] }: ScanParams): Promise<ScanResult> {
    const name = validateMarketName(market, COMPONENT)
    const batches: Array<{ columns: string[]; rows: ScanRow[] }> = []
    let totalCount = 0

    for (const batch of chunk(columns, SCAN_COLUMN_BATCH_SIZE)) {
      const payload: ScanRequest = {
        symbols: { tickers: [...tickers], query: { types: [...types] } },
        columns: batch,
      }
      const response = parseScanResponse(await this.postJson(name, 'scan', payload), name)
      totalCount = Math.max(totalCount, response.totalCount ?? response.data.length)
      batches.push({ columns: batch, rows: response.data })
    }

    this.logger.debug(`scan for ${name}: ${columns.length} columns in ${batches.length} request(s)`)
    return { totalCount, columns: [...columns], data: mergeScanBatches(batches) }
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      ...(this.token ? { 'Authorization': `Bearer ${this.token}` } : {}),
    }
  }

  private async postJson(market: string, endpoint: string, body: unknown): Promise<unknown> {
    const url = `${this.baseUrl}/${market}/${endpoint}`

    return await withRetry(
      async () => {
        const response = await this.fetchImpl(url, {
          method: 'POST',
          headers: this.headers(),
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(this.timeoutMs),
        })
        const text = await response.text()

        if (!response.ok) {
          throw createHttpError({
            statusCode: response.status,
            message: `${endpoint} request for ${market} failed with HTTP ${response.status}`,
            context: createErrorContext({ component: COMPONENT, metadata: { market, endpoint } }),
            metadata: {
              url,
              retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
              body: text.slice(0, BODY_EXCERPT_LENGTH),
            },
          })
        }

        try {
          const parsed: unknown = JSON.parse(text)
          return parsed
        } catch (error) {
          throw new MalformedResponseError({
            message: `${endpoint} response for ${market} is not valid JSON: ${errorMessage(error)}`,
            context: createErrorContext({
              component: COMPONENT,
              metadata: { market, endpoint, body: text.slice(0, BODY_EXCERPT_LENGTH) },
            }),
          })
        }
      },
      {
        config: {
          ...this.retry,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn(`${endpoint} ${market} attempt ${attempt + 1} failed (${errorMessage(error)}), retrying in ${delayMs}ms`)
            this.retry?.onRetry?.(error, attempt, delayMs)
          },
        },
        component: COMPONENT,
        operation: endpoint,
      },
    )
  }
}
