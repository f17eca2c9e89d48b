/**
 * Boundary schemas for scanner payloads
 *
 * Metainfo comes in several historical shapes: fields under `data.fields`,
 * `fields` or `data` itself, with short (`n`, `t`, `d`, `r`) or long
 * (`name`, `type`, `description`, `values`) keys. Everything is validated
 * here and reduced to {@link MetainfoField} before the rest of the
 * generator sees it.
 * @module
 */

import { z } from 'zod'
import { createErrorContext, MalformedResponseError } from '../errors/mod.ts'
import type { MetainfoField } from '../types/market.ts'

const COMPONENT = 'scanner-schemas'

/**
 * Default number of tickers sampled per market
 */
export const DEFAULT_MAX_TICKERS = 10

const enumEntrySchema = z.union([
  z.string(),
  z.number().transform(String),
  z.object({ id: z.union([z.string(), z.number()]) }).passthrough().transform((entry) => String(entry.id)),
])

/**
 * One raw metainfo field, short or long keys
 */
export const rawFieldSchema = z.object({
  n: z.string().nullish(),
  name: z.string().nullish(),
  id: z.union([z.string(), z.number()]).nullish(),
  t: z.string().nullish(),
  type: z.string().nullish(),
  d: z.string().nullish(),
  description: z.string().nullish(),
  title: z.string().nullish(),
  r: z.array(enumEntrySchema).nullish(),
  values: z.array(enumEntrySchema).nullish(),
  flags: z.array(z.string()).nullish(),
}).passthrough()

export type RawField = z.infer<typeof rawFieldSchema>

const indexSchema = z.object({ names: z.array(z.unknown()).nullish() }).passthrough()

/**
 * Top level of a metainfo response
 */
export const rawMetainfoSchema = z.object({
  fields: z.array(z.unknown()).nullish(),
  symbols: z.array(z.unknown()).nullish(),
  index: indexSchema.nullish(),
  data: z.union([
    z.array(z.unknown()),
    z.object({
      fields: z.array(z.unknown()).nullish(),
      symbols: z.array(z.unknown()).nullish(),
      index: indexSchema.nullish(),
    }).passthrough(),
  ]).nullish(),
}).passthrough()

export type RawMetainfo = z.infer<typeof rawMetainfoSchema>

/**
 * One row of a scan response: symbol and column values in request order
 */
export const scanRowSchema = z.object({
  s: z.string().optional(),
  d: z.array(z.unknown()),
}).passthrough()

export type ScanRow = z.infer<typeof scanRowSchema>

/**
 * Scan response body
 */
export const rawScanResponseSchema = z.object({
  totalCount: z.number().optional(),
  data: z.array(scanRowSchema).nullish().transform((rows) => rows ?? []),
}).passthrough()

export type RawScanResponse = z.infer<typeof rawScanResponseSchema>

/**
 * Body of `POST /{market}/scan`
 */
export type ScanRequest = {
  symbols: {
    tickers: string[]
    query: { types: string[] }
  }
  columns: string[]
}

/**
 * Validated metainfo
 */
export type NormalizedMetainfo = {
  fields: MetainfoField[]
  /** Symbols listed by the market, in upstream order */
  symbols: string[]
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
}

function toMetainfoField(raw: RawField): MetainfoField | undefined {
  const name = raw.n ?? raw.name ?? (raw.id !== undefined && raw.id !== null ? String(raw.id) : undefined)
  if (name === undefined || name.trim() === '') {
    return undefined
  }

  const type = raw.t ?? raw.type ?? undefined
  const description = raw.d ?? raw.description ?? raw.title ?? undefined
  const enumValues = raw.r ?? raw.values ?? undefined
  const flags = raw.flags ?? undefined

  return {
    name,
    ...(type !== undefined ? { type } : {}),
    ...(description !== undefined ? { description } : {}),
    ...(enumValues !== undefined ? { enumValues } : {}),
    ...(flags !== undefined ? { flags } : {}),
  }
}

function symbolOf(item: unknown): string | undefined {
  if (typeof item === 'string') {
    return item
  }
  if (Array.isArray(item)) {
    return typeof item[0] === 'string' ? item[0] : undefined
  }
  if (typeof item === 'object' && item !== null) {
    const parsed = z.object({ symbol: z.string().optional(), s: z.string().optional() }).safeParse(item)
    return parsed.success ? parsed.data.symbol ?? parsed.data.s : undefined
  }
  return undefined
}

function rawFieldList(body: RawMetainfo): unknown[] {
  if (Array.isArray(body.data)) {
    return body.data
  }
  return body.data?.fields ?? body.fields ?? []
}

function rawSymbolList(body: RawMetainfo): unknown[] {
  if (Array.isArray(body.data)) {
    return body.symbols ?? body.index?.names ?? []
  }
  return body.symbols ?? body.data?.symbols ?? body.data?.index?.names ?? body.index?.names ?? []
}

/**
 * Validate a metainfo response and reduce it to fields and symbols
 *
 * A body without a field list yields no fields. Field entries without a
 * usable name are skipped, and `null` attributes count as absent.
 *
 * @throws {MalformedResponseError} If the body is not an object or a field
 * entry has the wrong shape
 *
 * @example
 * ```ts
 * const { fields, symbols } = normalizeMetainfo({
 *   data: { fields: [{ n: 'close', t: 'price' }] },
 *   symbols: ['BINANCE:BTCUSDT'],
 * })
 * ```
 */
export function normalizeMetainfo(raw: unknown, market?: string): NormalizedMetainfo {
  const context = () => createErrorContext({ component: COMPONENT, metadata: { market } })

  const body = rawMetainfoSchema.safeParse(raw)
  if (!body.success) {
    throw new MalformedResponseError({
      message: 'Metainfo response has an unexpected shape',
      context: context(),
      issues: formatIssues(body.error),
    })
  }

  const list = rawFieldList(body.data)
  const fields: MetainfoField[] = []
  const issues: string[] = []
  list.forEach((item, index) => {
    const parsed = rawFieldSchema.safeParse(item)
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error).map((issue) => `fields.${index}.${issue}`))
      return
    }
    const field = toMetainfoField(parsed.data)
    if (field) {
      fields.push(field)
    }
  })

  if (issues.length > 0) {
    throw new MalformedResponseError({
      message: `Metainfo response has ${issues.length} malformed field entr${issues.length === 1 ? 'y' : 'ies'}`,
      context: context(),
      issues,
    })
  }

  const symbols: string[] = []
  for (const item of rawSymbolList(body.data)) {
    const symbol = symbolOf(item)
    if (symbol !== undefined && symbol.trim() !== '') {
      symbols.push(symbol)
    }
  }

  return { fields, symbols }
}

/**
 * Validate a scan response body
 *
 * @throws {MalformedResponseError} If rows are missing their `d` array
 */
export function parseScanResponse(raw: unknown, market?: string): RawScanResponse {
  const parsed = rawScanResponseSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedResponseError({
      message: 'Scan response has an unexpected shape',
      context: createErrorContext({ component: COMPONENT, metadata: { market } }),
      issues: formatIssues(parsed.error),
    })
  }
  return parsed.data
}

/**
 * First `limit` distinct symbols
 */
export function chooseTickers(symbols: readonly string[], limit: number = DEFAULT_MAX_TICKERS): string[] {
  return [...new Set(symbols)].slice(0, Math.max(0, limit))
}
