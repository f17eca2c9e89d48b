/**
 * CLI Commands Module
 * The work behind each `tvgen` command, independent of argument parsing.
 * @module
 */

import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import { ResponseCache } from '../cache/mod.ts'
import { ScannerClient, type ScanResult } from '../collector/client.ts'
import { collectMarket, marketSpecFromResults, type MarketCollection } from '../collector/collector.ts'
import { chooseTickers, DEFAULT_MAX_TICKERS } from '../collector/schemas.ts'
import { loadMarketResults, loadStoredMetainfo, saveMarketResults, snapshotMarketResults } from '../collector/store.ts'
import type { GeneratorConfig } from '../config/mod.ts'
import { createErrorContext, ValidationError } from '../errors/mod.ts'
import { type BatchResult, generateMarkets } from '../generator/batch.ts'
import { classifyFields, type FieldClassification } from '../infer/classifier.ts'
import { assembleMarketSpec } from '../spec/assembler.ts'
import { bundleSpecDirectory } from '../spec/bundler.ts'
import { diffMarketFields } from '../spec/diff.ts'
import { formatFromPath, readDocument, writeDocument } from '../spec/serializer.ts'
import { assertValidSpecDocument, type SpecValidationResult, validateSpecDocument } from '../spec/validator.ts'
import type { Endpoint, GenerationMode, MarketSpec } from '../types/market.ts'
import type { DocumentFormat } from '../types/openapi.ts'
import { type Logger, logger as defaultLogger } from '../utils/logger.ts'
import { validateEndpoints, validateMarketName } from '../utils/validation.ts'

const COMPONENT = 'cli'

/**
 * File under the cache directory holding cached metainfo bodies
 */
export const RESPONSE_CACHE_FILE = '.responses.json'

/**
 * Dependencies every command can receive
 */
export type CommandContext = {
  config: GeneratorConfig
  logger?: Logger
  /** Overrides the client built from `config` */
  client?: ScannerClient
}

/**
 * Build the scanner client described by `config`
 *
 * A persisted metainfo cache is attached when `cacheTtlMs` is positive.
 */
export async function createScannerClient(config: GeneratorConfig, logger: Logger = defaultLogger): Promise<ScannerClient> {
  let cache: ResponseCache<unknown> | undefined
  if (config.cacheTtlMs > 0) {
    cache = new ResponseCache<unknown>({
      enabled: true,
      ttlMs: config.cacheTtlMs,
      persistPath: join(config.cacheDir, RESPONSE_CACHE_FILE),
      parse: (value) => value,
      logger,
    })
    const loaded = await cache.loadFromFile()
    logger.debug(`Loaded ${loaded} cached response(s)`)
  }

  return new ScannerClient({
    baseUrl: config.scanner.baseUrl,
    timeoutMs: config.scanner.timeoutMs,
    token: config.scanner.token,
    retry: config.scanner.retry,
    cache,
    logger,
  })
}

async function clientFor(context: CommandContext, logger: Logger): Promise<ScannerClient> {
  return context.client ?? await createScannerClient(context.config, logger)
}

/**
 * `tvgen collect`: fetch and save the results of one market
 */
export async function runCollect(
  context: CommandContext,
  { market, resultsDir, maxTickers = DEFAULT_MAX_TICKERS, mode = 'default', columns = [] }: {
    market: string
    resultsDir?: string
    maxTickers?: number
    mode?: GenerationMode
    /** Scan columns requested beyond the metainfo fields */
    columns?: readonly string[]
  },
): Promise<{ collection: MarketCollection; dir: string; classification: FieldClassification }> {
  const logger = context.logger ?? defaultLogger
  const client = await clientFor(context, logger)
  const collection = await collectMarket({ client, market, maxTickers, mode, extraColumns: columns, logger })
  const dir = await saveMarketResults({ resultsDir: resultsDir ?? context.config.resultsDir, collection })
  const classification = classifyFields({ fields: collection.spec.fields.values() })

  logger.info(
    `Saved ${collection.market} results to ${dir}: ${classification.numeric.length} numeric, ` +
      `${classification.string.length} string, ${classification.custom.length} custom fields`,
  )
  return { collection, dir, classification }
}

/**
 * Build the spec of a market from its saved results
 */
export async function loadMarketSpec({
  resultsDir,
  market,
  mode = 'default',
  endpoints,
}: {
  resultsDir: string
  market: string
  mode?: GenerationMode
  endpoints?: readonly Endpoint[]
}): Promise<MarketSpec> {
  const results = await loadMarketResults({ resultsDir, market })
  return marketSpecFromResults({
    market: results.market,
    fields: results.metainfo.fields,
    scan: results.scan,
    mode,
    endpoints,
  })
}

/**
 * `tvgen generate`: write the document of one market
 *
 * With `fetchFirst`, the market is collected first. Scan-only columns
 * saved by `collect --columns` are documented when `includeMissing` is set.
 */
export async function runGenerate(
  context: CommandContext,
  {
    market,
    output,
    resultsDir,
    format,
    endpoints,
    includeMissing = false,
    examples,
    fetchFirst = false,
    columns,
  }: {
    market: string
    output: string
    resultsDir?: string
    format?: DocumentFormat
    endpoints?: readonly string[]
    includeMissing?: boolean
    examples?: boolean
    fetchFirst?: boolean
    /** Extra scan columns when collecting first */
    columns?: readonly string[]
  },
): Promise<{ path: string; bytes: number; fieldCount: number }> {
  const { config } = context
  const logger = context.logger ?? defaultLogger
  const dir = resultsDir ?? config.resultsDir
  const mode: GenerationMode = includeMissing ? 'include_missing' : 'default'
  const selected = endpoints !== undefined && endpoints.length > 0 ? validateEndpoints(endpoints, COMPONENT) : undefined

  if (fetchFirst) {
    await runCollect(context, { market, resultsDir: dir, mode, columns })
  }

  const spec = await loadMarketSpec({ resultsDir: dir, market, mode })
  const document = assembleMarketSpec({
    spec,
    endpoints: selected,
    options: { includeExamples: examples ?? config.output.includeExamples },
  })
  assertValidSpecDocument(document, spec.marketName)

  const bytes = await writeDocument({
    document,
    path: output,
    format: format ?? formatFromPath(output),
    maxBytes: config.output.maxBytes,
  })
  logger.info(`Wrote ${output} (${spec.fields.size} fields, ${bytes} bytes)`)
  return { path: output, bytes, fieldCount: spec.fields.size }
}

/**
 * Markets that have saved metainfo under `resultsDir`, sorted
 */
export async function listCollectedMarkets(resultsDir: string): Promise<string[]> {
  const entries = await readdir(resultsDir, { withFileTypes: true })
  const markets: string[] = []
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue
    }
    const entryNames = await readdir(join(resultsDir, entry.name))
    if (entryNames.includes('metainfo.json')) {
      markets.push(entry.name)
    }
  }
  return markets.sort()
}

/**
 * `tvgen generate-all`: one document per market into `outputDir`
 */
export async function runGenerateAll(
  context: CommandContext,
  { markets, resultsDir, outputDir, format }: {
    markets?: readonly string[]
    resultsDir?: string
    outputDir?: string
    format?: DocumentFormat
  },
): Promise<BatchResult> {
  const { config } = context
  const logger = context.logger ?? defaultLogger
  const dir = resultsDir ?? config.resultsDir
  const outDir = outputDir ?? config.outputDir
  const outFormat = format ?? config.output.format
  const selected = markets !== undefined && markets.length > 0
    ? markets.map((market) => validateMarketName(market, COMPONENT))
    : await listCollectedMarkets(dir)

  if (selected.length === 0) {
    throw new ValidationError(
      `No markets to generate: ${dir} holds no collected results`,
      createErrorContext({ component: COMPONENT, metadata: { resultsDir: dir } }),
    )
  }

  const result = await generateMarkets({
    markets: selected,
    loadMarket: (market) => loadMarketSpec({ resultsDir: dir, market }),
    writeDocument: async ({ market, document }) => {
      const path = join(outDir, `${market}.${outFormat}`)
      const bytes = await writeDocument({ document, path, format: outFormat, maxBytes: config.output.maxBytes })
      return { path, bytes }
    },
    options: { assemble: { includeExamples: config.output.includeExamples } },
    logger,
  })

  logger.info(`Generated ${result.totals.generated} of ${selected.length} market(s), ${result.totals.failed} failed`)
  return result
}

/**
 * `tvgen validate`: check one document file
 */
export async function runValidate({ spec }: { spec: string }): Promise<SpecValidationResult> {
  return validateSpecDocument(await readDocument(spec))
}

/**
 * `tvgen bundle`: merge a directory of documents into one file
 */
export async function runBundle(
  context: CommandContext,
  { specDir, outfile, format }: { specDir: string; outfile: string; format?: DocumentFormat },
): Promise<{ markets: string[]; bytes: number }> {
  const logger = context.logger ?? defaultLogger
  const result = await bundleSpecDirectory({ specDir, outfile, format })
  logger.info(`Bundled ${result.markets.length} market(s) into ${outfile}`)
  return result
}

/**
 * `tvgen diff`: compare saved metainfo against the last snapshot
 *
 * A market without a snapshot compares against an empty field list.
 *
 * @throws {ValidationError} If the market has no saved results
 */
export async function runDiff(
  context: CommandContext,
  { market, resultsDir, cacheDir, update = false }: {
    market: string
    resultsDir?: string
    cacheDir?: string
    update?: boolean
  },
): Promise<{ changed: boolean; report: string }> {
  const { config } = context
  const logger = context.logger ?? defaultLogger
  const name = validateMarketName(market, COMPONENT)
  const currentDir = resultsDir ?? config.resultsDir
  const snapshotDir = cacheDir ?? config.cacheDir

  const current = await loadStoredMetainfo({ dir: currentDir, market: name })
  if (current === undefined) {
    throw new ValidationError(
      `No collected results for ${name} in ${currentDir}; run \`tvgen collect --market ${name}\` first`,
      createErrorContext({ component: COMPONENT, metadata: { market: name, resultsDir: currentDir } }),
    )
  }
  const previous = await loadStoredMetainfo({ dir: snapshotDir, market: name })

  const { changed, report } = diffMarketFields({
    market: name,
    previous: previous?.fields ?? [],
    current: current.fields,
  })

  if (update) {
    const copied = await snapshotMarketResults({ resultsDir: currentDir, snapshotDir, market: name })
    logger.info(`Updated snapshot of ${name} (${copied.join(', ')})`)
  }
  return { changed, report }
}

/**
 * `tvgen scan`: one raw scan of a market's first tickers
 */
export async function runScan(
  context: CommandContext,
  { market, maxTickers = DEFAULT_MAX_TICKERS }: { market: string; maxTickers?: number },
): Promise<ScanResult> {
  const logger = context.logger ?? defaultLogger
  const client = await clientFor(context, logger)
  const metainfo = await client.metainfo(market)
  const tickers = chooseTickers(metainfo.symbols, maxTickers)
  if (tickers.length === 0) {
    throw new ValidationError(
      `Metainfo of ${market} lists no symbols to scan`,
      createErrorContext({ component: COMPONENT, metadata: { market } }),
    )
  }
  return await client.scan(market, { tickers, columns: metainfo.fields.map((field) => field.name) })
}
