/**
 * Configuration Module
 * Explicit generator configuration read from environment variables.
 * Nothing here is global: callers pass the loaded config where it is needed.
 * @module
 */

import { z } from 'zod'
import { ConfigurationError, createErrorContext } from '../errors/mod.ts'
import type { DocumentFormat } from '../types/openapi.ts'
import type { RetryConfig } from '../types/retry.ts'
import type { LogLevel } from '../utils/logger.ts'
import { DEFAULT_MAX_DOCUMENT_BYTES } from '../spec/serializer.ts'
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '../collector/client.ts'

const COMPONENT = 'config'

/**
 * Minimum length of `TV_API_TOKEN`
 */
export const MIN_TOKEN_LENGTH = 10

/**
 * Generator configuration
 */
export type GeneratorConfig = {
  scanner: {
    baseUrl: string
    timeoutMs: number
    token?: string
    retry: RetryConfig
  }
  output: {
    format: DocumentFormat
    /** 0 disables the size check */
    maxBytes: number
    includeExamples: boolean
  }
  logLevel: LogLevel
  resultsDir: string
  /** Snapshot directory compared against by `diff`; also holds the metainfo cache */
  cacheDir: string
  /** 0 disables the metainfo cache */
  cacheTtlMs: number
  outputDir: string
}

const blankAsUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value)

const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUndefined, schema.optional())

const booleanText = z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform((value) =>
  value === 'true' || value === '1' || value === 'yes'
)

/**
 * Recognised environment variables
 */
export const envSchema = z.object({
  TV_API_BASE_URL: optional(z.string().url()),
  TV_API_TOKEN: optional(z.string().min(MIN_TOKEN_LENGTH, `must be at least ${MIN_TOKEN_LENGTH} characters`)),
  TV_API_TIMEOUT_MS: optional(z.coerce.number().int().positive()),
  TV_API_MAX_RETRIES: optional(z.coerce.number().int().min(0).max(10)),
  TVGEN_LOG_LEVEL: optional(z.enum(['debug', 'info', 'warn', 'error'])),
  TVGEN_RESULTS_DIR: optional(z.string()),
  TVGEN_OUTPUT_DIR: optional(z.string()),
  TVGEN_CACHE_DIR: optional(z.string()),
  TVGEN_CACHE_TTL_MS: optional(z.coerce.number().int().min(0)),
  TVGEN_OUTPUT_FORMAT: optional(z.enum(['yaml', 'json'])),
  TVGEN_MAX_DOCUMENT_BYTES: optional(z.coerce.number().int().min(0)),
  TVGEN_INCLUDE_EXAMPLES: optional(booleanText),
})

/**
 * Defaults applied when a variable is unset
 */
export const DEFAULT_CONFIG: GeneratorConfig = {
  scanner: {
    baseUrl: DEFAULT_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    retry: { maxRetries: 3 },
  },
  output: {
    format: 'yaml',
    maxBytes: DEFAULT_MAX_DOCUMENT_BYTES,
    includeExamples: false,
  },
  logLevel: 'info',
  resultsDir: 'results',
  cacheDir: 'cache',
  cacheTtlMs: 3600000,
  outputDir: 'specs',
}

/**
 * Build a {@link GeneratorConfig} from environment variables
 *
 * Blank variables count as unset.
 *
 * @param env - Variables to read (default: `process.env`)
 * @throws {ConfigurationError} Listing every invalid variable
 *
 * @example
 * ```ts
 * const config = loadConfig({ TV_API_TIMEOUT_MS: '5000', TVGEN_LOG_LEVEL: 'debug' })
 * config.scanner.timeoutMs // 5000
 * ```
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GeneratorConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(
      `Invalid configuration: ${issues.join('; ')}`,
      createErrorContext({ component: COMPONENT, metadata: { issues } }),
    )
  }

  const vars = parsed.data
  return {
    scanner: {
      baseUrl: vars.TV_API_BASE_URL ?? DEFAULT_CONFIG.scanner.baseUrl,
      timeoutMs: vars.TV_API_TIMEOUT_MS ?? DEFAULT_CONFIG.scanner.timeoutMs,
      ...(vars.TV_API_TOKEN !== undefined ? { token: vars.TV_API_TOKEN } : {}),
      retry: { maxRetries: vars.TV_API_MAX_RETRIES ?? DEFAULT_CONFIG.scanner.retry.maxRetries },
    },
    output: {
      format: vars.TVGEN_OUTPUT_FORMAT ?? DEFAULT_CONFIG.output.format,
      maxBytes: vars.TVGEN_MAX_DOCUMENT_BYTES ?? DEFAULT_CONFIG.output.maxBytes,
      includeExamples: vars.TVGEN_INCLUDE_EXAMPLES ?? DEFAULT_CONFIG.output.includeExamples,
    },
    logLevel: vars.TVGEN_LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    resultsDir: vars.TVGEN_RESULTS_DIR ?? DEFAULT_CONFIG.resultsDir,
    cacheDir: vars.TVGEN_CACHE_DIR ?? DEFAULT_CONFIG.cacheDir,
    cacheTtlMs: vars.TVGEN_CACHE_TTL_MS ?? DEFAULT_CONFIG.cacheTtlMs,
    outputDir: vars.TVGEN_OUTPUT_DIR ?? DEFAULT_CONFIG.outputDir,
  }
}
