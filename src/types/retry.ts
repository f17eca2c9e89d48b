/**
 * Retry Types Module
 * Configuration and bookkeeping types for retried scanner requests.
 * @module
 */

/**
 * Strategy used to space out retry attempts
 */
export type RetryStrategy = 'exponential' | 'linear' | 'fixed'

/**
 * Retry configuration for scanner requests
 */
export type RetryConfig = {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number
  /** Base delay in milliseconds before first retry (default: 100) */
  baseDelayMs?: number
  /** Maximum delay in milliseconds between retries (default: 30000) */
  maxDelayMs?: number
  /** Retry delay calculation strategy (default: 'exponential') */
  strategy?: RetryStrategy
  /** Random jitter factor to apply to delays (default: 0.1) */
  jitterFactor?: number
  /** Whether to respect Retry-After headers from the server (default: true) */
  respectRetryAfter?: boolean
  /** Whether retry is enabled (default: true) */
  enabled?: boolean
  /** Custom function to determine if error should be retried */
  shouldRetry?: (error: unknown, attempt: number) => boolean
  /** Callback invoked before each retry attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

/**
 * Retry settings with every tunable filled in
 */
export type ResolvedRetryConfig = Required<Omit<RetryConfig, 'shouldRetry' | 'onRetry'>>

/**
 * Default retry configuration values
 */
export const DEFAULT_RETRY_CONFIG: ResolvedRetryConfig = {
  maxRetries: 3,
  baseDelayMs: 100,
  maxDelayMs: 30000,
  strategy: 'exponential',
  jitterFactor: 0.1,
  respectRetryAfter: true,
  enabled: true,
}

/**
 * Bookkeeping of one retried operation
 */
export type RetryContext = {
  /** Current retry attempt number (0-based) */
  attempt: number
  /** Timestamps of each attempt */
  attemptTimestamps: number[]
  /** Delay applied before each retry (in milliseconds) */
  delayMs: number[]
}
