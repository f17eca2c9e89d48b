#!/usr/bin/env -S npx tsx
/**
 * `tvgen` command line
 * @module
 */

import { readFileSync } from 'node:fs'
import { Command } from 'commander'
import * as dotenv from 'dotenv'
import { z } from 'zod'
import {
  runBundle,
  runCollect,
  runDiff,
  runGenerate,
  runGenerateAll,
  runScan,
  runValidate,
} from './src/cli/commands.ts'
import { type GeneratorConfig, loadConfig } from './src/config/mod.ts'
import { ErrorBoundary, TvGenError } from './src/errors/mod.ts'
import { serializeDocument } from './src/spec/serializer.ts'
import { logger } from './src/utils/logger.ts'
import { splitList } from './src/utils/validation.ts'

dotenv.config()

const packageJson = z.object({ version: z.string() }).parse(
  JSON.parse(readFileSync(new URL('./package.json', import.meta.url), 'utf8')),
)

const formatOption = z.enum(['yaml', 'json']).optional()
const countOption = z.coerce.number().int().positive().optional()

const boundary = new ErrorBoundary('cli')

function config(): GeneratorConfig {
  const loaded = loadConfig(process.env)
  logger.configure({ minLevel: loaded.logLevel })
  return loaded
}

/**
 * Run a command body; failures are logged and set exit code 1
 */
async function run(body: () => Promise<boolean | void>): Promise<void> {
  try {
    const ok = await boundary.execute(body)
    if (ok === false) {
      process.exitCode = 1
    }
  } catch (error) {
    if (error instanceof TvGenError) {
      logger.error(`${error.code}: ${error.message}`)
      logger.debug('Error details', error.toJSON())
    } else {
      logger.error(String(error))
    }
    process.exitCode = 1
  }
}

const program = new Command()

program
  .name('tvgen')
  .description('Generate OpenAPI 3.1 documents for scanner markets')
  .version(packageJson.version)

program
  .command('collect')
  .description('Fetch metainfo and a sample scan of one market into the results directory')
  .requiredOption('-m, --market <market>', 'Market name, e.g. coin')
  .option('--results-dir <dir>', 'Results directory')
  .option('--max-tickers <n>', 'Tickers sampled by the scan')
  .option('--columns <list>', 'Comma-separated scan columns to request beyond the metainfo fields')
  .option('--include-missing', 'Count scan-only columns in the field summary', false)
  .action((options: unknown) =>
    run(async () => {
      const { columns, includeMissing, ...opts } = z.object({
        market: z.string(),
        resultsDir: z.string().optional(),
        maxTickers: countOption,
        columns: z.string().optional(),
        includeMissing: z.boolean(),
      }).parse(options)
      await runCollect({ config: config() }, {
        ...opts,
        columns: splitList(columns),
        mode: includeMissing ? 'include_missing' : 'default',
      })
    })
  )

program
  .command('generate')
  .description('Write the OpenAPI document of one market')
  .requiredOption('-m, --market <market>', 'Market name')
  .requiredOption('-o, --output <file>', 'Output file; .json selects JSON unless --format is given')
  .option('--results-dir <dir>', 'Results directory')
  .option('--format <format>', 'yaml or json')
  .option('--endpoints <list>', 'Comma-separated endpoints (scan,search,history,summary,metainfo)')
  .option('--include-missing', 'Also document fields only seen in scan data', false)
  .option('--examples', 'Add sample values as property examples')
  .option('--fetch', 'Collect the market before generating', false)
  .option('--columns <list>', 'With --fetch, extra scan columns to request')
  .action((options: unknown) =>
    run(async () => {
      const opts = z.object({
        market: z.string(),
        output: z.string(),
        resultsDir: z.string().optional(),
        format: formatOption,
        endpoints: z.string().optional(),
        includeMissing: z.boolean(),
        examples: z.boolean().optional(),
        fetch: z.boolean(),
        columns: z.string().optional(),
      }).parse(options)
      const { endpoints, fetch: fetchFirst, columns, ...rest } = opts
      await runGenerate({ config: config() }, {
        ...rest,
        endpoints: endpoints === undefined ? undefined : splitList(endpoints),
        fetchFirst,
        columns: splitList(columns),
      })
    })
  )

program
  .command('generate-all')
  .description('Write one document per collected market')
  .option('--markets <list>', 'Comma-separated markets (default: every collected market)')
  .option('--results-dir <dir>', 'Results directory')
  .option('--output-dir <dir>', 'Output directory')
  .option('--format <format>', 'yaml or json')
  .action((options: unknown) =>
    run(async () => {
      const opts = z.object({
        markets: z.string().optional(),
        resultsDir: z.string().optional(),
        outputDir: z.string().optional(),
        format: formatOption,
      }).parse(options)
      const { totals } = await runGenerateAll({ config: config() }, { ...opts, markets: splitList(opts.markets) })
      return totals.failed === 0
    })
  )

program
  .command('validate')
  .description('Validate a generated document')
  .requiredOption('-s, --spec <file>', 'Document to validate')
  .action((options: unknown) =>
    run(async () => {
      const opts = z.object({ spec: z.string() }).parse(options)
      config()
      const { valid, errors } = await runValidate(opts)
      if (valid) {
        logger.info(`${opts.spec} is valid`)
        return true
      }
      for (const error of errors) {
        logger.error(error)
      }
      return false
    })
  )

program
  .command('bundle')
  .description('Merge a directory of documents into one file keyed by market')
  .requiredOption('--spec-dir <dir>', 'Directory of documents')
  .requiredOption('--outfile <file>', 'Bundle to write')
  .option('--format <format>', 'yaml or json')
  .action((options: unknown) =>
    run(async () => {
      const opts = z.object({ specDir: z.string(), outfile: z.string(), format: formatOption }).parse(options)
      await runBundle({ config: config() }, opts)
    })
  )

program
  .command('diff')
  .description('Compare collected metainfo against the last snapshot')
  .requiredOption('-m, --market <market>', 'Market name')
  .option('--results-dir <dir>', 'Results directory')
  .option('--cache-dir <dir>', 'Snapshot directory')
  .option('--update', 'Copy the results into the snapshot afterwards', false)
  .action((options: unknown) =>
    run(async () => {
      const opts = z.object({
        market: z.string(),
        resultsDir: z.string().optional(),
        cacheDir: z.string().optional(),
        update: z.boolean(),
      }).parse(options)
      const { changed, report } = await runDiff({ config: config() }, opts)
      process.stdout.write(changed ? `${report}\n` : `No changes for ${opts.market}\n`)
    })
  )

program
  .command('scan')
  .description('Print one raw scan of a market as JSON')
  .requiredOption('-m, --market <market>', 'Market name')
  .option('--max-tickers <n>', 'Tickers to scan')
  .action((options: unknown) =>
    run(async () => {
      const opts = z.object({ market: z.string(), maxTickers: countOption }).parse(options)
      const result = await runScan({ config: config() }, opts)
      process.stdout.write(serializeDocument({ document: result, format: 'json', maxBytes: 0 }))
    })
  )

await program.parseAsync(process.argv)
