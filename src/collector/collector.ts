/**
 * Market collection: metainfo, a sample scan, field status and the
 * resulting {@link MarketSpec}
 * @module
 */

import { buildFieldDescriptors, createMarketSpec } from '../infer/field-descriptors.ts'
import type { Endpoint, GenerationMode, MarketSpec, MetainfoField } from '../types/market.ts'
import { type Logger, logger as defaultLogger } from '../utils/logger.ts'
import { validateMarketName, validatePositiveInteger } from '../utils/validation.ts'
import type { MetainfoResult, ScannerClient, ScanResult } from './client.ts'
import { chooseTickers, DEFAULT_MAX_TICKERS, type ScanRow } from './schemas.ts'

const COMPONENT = 'collector'

/**
 * Outcome of probing one column across the sample rows
 */
export type FieldStatus = 'ok' | 'null' | 'empty' | 'error'

/**
 * One line of `field_status.tsv`
 */
export type FieldStatusEntry = {
  field: string
  tvType: string
  status: FieldStatus
  /** First usable value, when `status` is `ok` */
  sampleValue?: unknown
}

/**
 * Everything gathered for one market
 */
export type MarketCollection = {
  market: string
  metainfo: MetainfoResult
  scan: ScanResult
  fieldStatus: FieldStatusEntry[]
  spec: MarketSpec
}

/**
 * A value counts as a sample unless it is null, an empty string or an empty array
 */
export function isUsableValue(value: unknown): boolean {
  if (value === null || value === undefined || value === '') {
    return false
  }
  return !(Array.isArray(value) && value.length === 0)
}

/**
 * Map each column to its first usable value across `rows`
 *
 * Columns without any usable value are left out.
 *
 * @example
 * ```ts
 * extractSampleRow({
 *   columns: ['close', 'name'],
 *   rows: [{ d: [null, 'BTCUSDT'] }, { d: [50000.5, 'ETHUSDT'] }],
 * })
 * // Map { 'close' => 50000.5, 'name' => 'BTCUSDT' }
 * ```
 */
export function extractSampleRow({
  columns,
  rows,
}: {
  columns: readonly string[]
  rows: readonly ScanRow[]
}): Map<string, unknown> {
  const sample = new Map<string, unknown>()

  columns.forEach((column, index) => {
    if (sample.has(column)) {
      return
    }
    for (const row of rows) {
      const value = row.d[index]
      if (isUsableValue(value)) {
        sample.set(column, value)
        return
      }
    }
  })

  return sample
}

/**
 * Probe every metainfo field against the scan rows
 *
 * Field `i` is read from `d[i]` of each row. A row too short to hold the
 * value marks the field `error`; otherwise it is `ok` when some value is
 * usable, `null` when all values are null (or there are no rows) and
 * `empty` otherwise.
 */
export function buildFieldStatus({
  fields,
  rows,
}: {
  fields: readonly MetainfoField[]
  rows: readonly ScanRow[]
}): FieldStatusEntry[] {
  return fields.map((field, index): FieldStatusEntry => {
    const tvType = field.type ?? 'string'

    if (rows.some((row) => index >= row.d.length)) {
      return { field: field.name, tvType, status: 'error' }
    }

    const values = rows.map((row) => row.d[index])
    const usable = values.find(isUsableValue)
    if (usable !== undefined) {
      return { field: field.name, tvType, status: 'ok', sampleValue: usable }
    }
    if (values.every((value) => value === null || value === undefined)) {
      return { field: field.name, tvType, status: 'null' }
    }
    return { field: field.name, tvType, status: 'empty' }
  })
}

function tsvCell(value: unknown): string {
  if (value === undefined) {
    return ''
  }
  const text = typeof value === 'string' ? value : JSON.stringify(value)
  return text.replace(/[\t\r\n]+/g, ' ')
}

/**
 * Render field status entries as TSV with a header line
 */
export function formatFieldStatusTsv(entries: readonly FieldStatusEntry[]): string {
  const lines = ['field\ttv_type\tstatus\tsample_value']
  for (const entry of entries) {
    lines.push([entry.field, entry.tvType, entry.status, entry.sampleValue].map(tsvCell).join('\t'))
  }
  return lines.join('\n') + '\n'
}

/**
 * Build a {@link MarketSpec} from validated metainfo and scan rows
 *
 * @throws {DuplicateFieldError} If metainfo lists a field name twice
 */
export function marketSpecFromResults({
  market,
  fields,
  scan,
  mode = 'default',
  endpoints,
}: {
  market: string
  fields: readonly MetainfoField[]
  scan: Pick<ScanResult, 'columns' | 'data'>
  mode?: GenerationMode
  endpoints?: readonly Endpoint[]
}): MarketSpec {
  const sampleRow = extractSampleRow({ columns: scan.columns, rows: scan.data })
  return createMarketSpec({
    marketName: market,
    fields: buildFieldDescriptors({ metainfo: fields, sampleRow, mode }),
    endpoints,
  })
}

/**
 * Metainfo field names followed by the extra columns not already listed
 */
export function scanColumns(fields: readonly MetainfoField[], extraColumns: readonly string[] = []): string[] {
  const columns = fields.map((field) => field.name)
  const known = new Set(columns)
  for (const column of extraColumns) {
    const name = column.trim()
    if (name !== '' && !known.has(name)) {
      known.add(name)
      columns.push(name)
    }
  }
  return columns
}

/**
 * Collect metainfo and a sample scan for one market
 *
 * The scan requests every metainfo field plus `extraColumns`, names the
 * market serves but does not document. Their samples only reach the spec in
 * `include_missing` mode. When metainfo lists no symbols the scan is
 * skipped with a warning and every field gets status `null`.
 *
 * @example
 * ```ts
 * const collection = await collectMarket({ client: new ScannerClient(), market: 'coin' })
 * collection.spec.fields.size
 * ```
 */
export async function collectMarket({
  client,
  market,
  maxTickers = DEFAULT_MAX_TICKERS,
  mode = 'default',
  extraColumns = [],
  logger = defaultLogger,
}: {
  client: ScannerClient
  market: string
  maxTickers?: number
  mode?: GenerationMode
  extraColumns?: readonly string[]
  logger?: Logger
}): Promise<MarketCollection> {
  const name = validateMarketName(market, COMPONENT)
  const limit = validatePositiveInteger({
    value: maxTickers,
    fieldName: 'maxTickers',
    component: COMPONENT,
    defaultValue: DEFAULT_MAX_TICKERS,
  })
  const log = logger.child(name)

  const metainfo = await client.metainfo(name)
  const columns = scanColumns(metainfo.fields, extraColumns)
  const tickers = chooseTickers(metainfo.symbols, limit)

  let scan: ScanResult
  if (tickers.length === 0) {
    log.warn('No symbols found in metainfo, skipping scan')
    scan = { totalCount: 0, columns, data: [] }
  } else if (columns.length === 0) {
    log.warn('No fields or extra columns to scan, skipping scan')
    scan = { totalCount: 0, columns, data: [] }
  } else {
    scan = await client.scan(name, { tickers, columns })
  }

  const extras = columns.slice(metainfo.fields.length).map((column): MetainfoField => ({ name: column }))
  const fieldStatus = buildFieldStatus({ fields: [...metainfo.fields, ...extras], rows: scan.data })
  const spec = marketSpecFromResults({ market: name, fields: metainfo.fields, scan, mode })
  log.info(`Collected ${metainfo.fields.length} fields over ${scan.data.length} rows`)

  return { market: name, metainfo, scan, fieldStatus, spec }
}
