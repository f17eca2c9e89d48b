/**
 * Results store
 *
 * Layout of a results directory:
 *
 * ```
 * <dir>/<market>/metainfo.json     raw metainfo body
 * <dir>/<market>/scan.json         merged scan result with its column list
 * <dir>/<market>/field_status.tsv  per-field scan status
 * ```
 * @module
 */

import { copyFile, mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { createErrorContext, errorMessage, MalformedResponseError, ValidationError } from '../errors/mod.ts'
import { validateMarketName } from '../utils/validation.ts'
import type { ScanResult } from './client.ts'
import { formatFieldStatusTsv, type MarketCollection } from './collector.ts'
import { type NormalizedMetainfo, normalizeMetainfo, scanRowSchema } from './schemas.ts'

const COMPONENT = 'results-store'

/**
 * File names kept per market
 */
export const RESULT_FILES = {
  metainfo: 'metainfo.json',
  scan: 'scan.json',
  fieldStatus: 'field_status.tsv',
} as const

const storedScanSchema = z.object({
  totalCount: z.number().optional(),
  columns: z.array(z.string()).optional(),
  data: z.array(scanRowSchema).nullish().transform((rows) => rows ?? []),
}).passthrough()

/**
 * Results of one market read back from disk
 */
export type StoredMarketResults = {
  market: string
  metainfo: NormalizedMetainfo
  /** Raw metainfo body as saved */
  rawMetainfo: unknown
  scan: ScanResult
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

/**
 * Directory holding the results of `market`
 */
export function marketResultsDir(resultsDir: string, market: string): string {
  return join(resultsDir, validateMarketName(market, COMPONENT))
}

/**
 * Write the three result files of a collection
 *
 * @returns The market directory
 */
export async function saveMarketResults({
  resultsDir,
  collection,
}: {
  resultsDir: string
  collection: Pick<MarketCollection, 'market' | 'metainfo' | 'scan' | 'fieldStatus'>
}): Promise<string> {
  const dir = marketResultsDir(resultsDir, collection.market)
  await mkdir(dir, { recursive: true })

  await writeFile(join(dir, RESULT_FILES.metainfo), JSON.stringify(collection.metainfo.raw, null, 2) + '\n', 'utf8')
  await writeFile(join(dir, RESULT_FILES.scan), JSON.stringify(collection.scan, null, 2) + '\n', 'utf8')
  await writeFile(join(dir, RESULT_FILES.fieldStatus), formatFieldStatusTsv(collection.fieldStatus), 'utf8')

  return dir
}

async function readJson(path: string, market: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ValidationError(
        `No collected results at ${path}; run \`tvgen collect --market ${market}\` first`,
        createErrorContext({ component: COMPONENT, metadata: { market, path } }),
      )
    }
    throw error
  }

  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch (error) {
    throw new MalformedResponseError({
      message: `${path} is not valid JSON: ${errorMessage(error)}`,
      context: createErrorContext({ component: COMPONENT, metadata: { market, path } }),
    })
  }
}

/**
 * Read the saved metainfo of a market, or `undefined` when there is none
 */
export async function loadStoredMetainfo({
  dir,
  market,
}: {
  dir: string
  market: string
}): Promise<NormalizedMetainfo | undefined> {
  const path = join(marketResultsDir(dir, market), RESULT_FILES.metainfo)
  try {
    return normalizeMetainfo(await readJson(path, market), market)
  } catch (error) {
    if (error instanceof ValidationError) {
      return undefined
    }
    throw error
  }
}

/**
 * Read back what {@link saveMarketResults} wrote
 *
 * A scan file without a column list is read with the metainfo field names
 * as columns.
 *
 * @throws {ValidationError} If the market has no results yet
 * @throws {MalformedResponseError} If a file does not parse
 */
export async function loadMarketResults({
  resultsDir,
  market,
}: {
  resultsDir: string
  market: string
}): Promise<StoredMarketResults> {
  const name = validateMarketName(market, COMPONENT)
  const dir = marketResultsDir(resultsDir, name)

  const rawMetainfo = await readJson(join(dir, RESULT_FILES.metainfo), name)
  const metainfo = normalizeMetainfo(rawMetainfo, name)

  const stored = storedScanSchema.safeParse(await readJson(join(dir, RESULT_FILES.scan), name))
  if (!stored.success) {
    throw new MalformedResponseError({
      message: `${join(dir, RESULT_FILES.scan)} has an unexpected shape`,
      context: createErrorContext({ component: COMPONENT, metadata: { market: name } }),
      issues: stored.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    })
  }

  const scan: ScanResult = {
    totalCount: stored.data.totalCount ?? stored.data.data.length,
    columns: stored.data.columns ?? metainfo.fields.map((field) => field.name),
    data: stored.data.data,
  }

  return { market: name, metainfo, rawMetainfo, scan }
}

/**
 * Copy the result files of a market into a snapshot directory
 *
 * Files that do not exist are skipped.
 *
 * @returns Names of the copied files
 */
export async function snapshotMarketResults({
  resultsDir,
  snapshotDir,
  market,
}: {
  resultsDir: string
  snapshotDir: string
  market: string
}): Promise<string[]> {
  const source = marketResultsDir(resultsDir, market)
  const target = marketResultsDir(snapshotDir, market)
  await mkdir(target, { recursive: true })

  const copied: string[] = []
  for (const file of Object.values(RESULT_FILES)) {
    try {
      await copyFile(join(source, file), join(target, file))
      copied.push(file)
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error
      }
    }
  }
  return copied
}
