/**
 * Market OpenAPI generator: infer field types from scanner metainfo and
 * sample scans, and assemble one OpenAPI 3.1 document per market.
 * @module
 */

export * from './src/utils/mod.ts'

export * from './src/types/mod.ts'

export * from './src/errors/mod.ts'

export * from './src/infer/mod.ts'

export * from './src/spec/mod.ts'

export * from './src/cache/mod.ts'

export * from './src/collector/mod.ts'

export * from './src/generator/mod.ts'

export { DEFAULT_CONFIG, envSchema, loadConfig, MIN_TOKEN_LENGTH } from './src/config/mod.ts'
export type { GeneratorConfig } from './src/config/mod.ts'
