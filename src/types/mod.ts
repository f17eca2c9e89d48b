/**
 * Types Module
 * @module
 */

export type {
  Endpoint,
  FieldDescriptor,
  FieldSource,
  GenerationMode,
  InferenceConfig,
  MarketSpec,
  MetainfoField,
  NumberInference,
  OpenApiTypeTag,
} from './market.ts'
export { ENDPOINTS } from './market.ts'

export type {
  ComponentSchemas,
  DocumentExtensions,
  DocumentFormat,
  Operation,
  OperationExtensions,
  Schema,
  SchemaDocument,
  SchemaOrRef,
} from './openapi.ts'

export type { ResolvedRetryConfig, RetryConfig, RetryContext, RetryStrategy } from './retry.ts'
export { DEFAULT_RETRY_CONFIG } from './retry.ts'
