/**
 * Batch Generation Module
 * Generates the documents of several markets, one after another. A market
 * that fails is recorded and the batch moves on to the next one.
 * @module
 */

import { errorMessage, TvGenError } from '../errors/mod.ts'
import { type AssembleOptions, assembleMarketSpec } from '../spec/assembler.ts'
import { assertValidSpecDocument } from '../spec/validator.ts'
import type { MarketSpec } from '../types/market.ts'
import type { SchemaDocument } from '../types/openapi.ts'
import { type Logger, logger as defaultLogger } from '../utils/logger.ts'

/**
 * Where and how large a written document ended up
 */
export type WrittenDocument = {
  path: string
  bytes: number
}

/**
 * Options shared by every market of a batch
 */
export type BatchOptions = {
  /** Endpoints to emit; defaults to each spec's own */
  endpoints?: readonly string[]
  assemble?: AssembleOptions
  /** Validate each document before writing it (default: true) */
  validate?: boolean
}

/**
 * Outcome of one market
 */
export type MarketGenerationResult =
  | {
    market: string
    status: 'generated'
    outputPath: string
    bytes: number
    fieldCount: number
  }
  | {
    market: string
    status: 'failed'
    error: string
    /** `code` of the error when it is a {@link TvGenError} */
    errorCode?: string
  }

/**
 * Outcome of a batch
 */
export type BatchResult = {
  results: MarketGenerationResult[]
  totals: {
    generated: number
    failed: number
  }
}

/**
 * Generate one document per market
 *
 * @param markets - Market names, processed in the given order
 * @param loadMarket - Produces the spec of one market
 * @param writeDocument - Persists one assembled document
 * @param options - Endpoint selection and assembler options
 *
 * @example
 * ```ts
 * const { totals } = await generateMarkets({
 *   markets: ['coin', 'forex'],
 *   loadMarket: (market) => loadSpecFromResults(market),
 *   writeDocument: async ({ market, document }) => {
 *     const path = `specs/${market}.yaml`
 *     return { path, bytes: await writeDocument({ document, path }) }
 *   },
 * })
 * ```
 */
export async function generateMarkets({
  markets,
  loadMarket,
  writeDocument,
  options = {},
  logger = defaultLogger,
}: {
  markets: readonly string[]
  loadMarket: (market: string) => Promise<MarketSpec>
  writeDocument: (params: { market: string; document: SchemaDocument }) => Promise<WrittenDocument>
  options?: BatchOptions
  logger?: Logger
}): Promise<BatchResult> {
  const results: MarketGenerationResult[] = []

  for (const market of markets) {
    const log = logger.child(market)
    try {
      const spec = await loadMarket(market)
      const document = assembleMarketSpec({ spec, endpoints: options.endpoints, options: options.assemble })
      if (options.validate !== false) {
        assertValidSpecDocument(document, market)
      }
      const written = await writeDocument({ market, document })
      log.info(`Generated ${written.path} (${spec.fields.size} fields, ${written.bytes} bytes)`)
      results.push({
        market,
        status: 'generated',
        outputPath: written.path,
        bytes: written.bytes,
        fieldCount: spec.fields.size,
      })
    } catch (error) {
      log.error(`Generation failed: ${errorMessage(error)}`)
      results.push({
        market,
        status: 'failed',
        error: errorMessage(error),
        ...(error instanceof TvGenError ? { errorCode: error.code } : {}),
      })
    }
  }

  const generated = results.filter((result) => result.status === 'generated').length
  return {
    results,
    totals: { generated, failed: results.length - generated },
  }
}
