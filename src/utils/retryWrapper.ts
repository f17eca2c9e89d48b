/**
 * Retry wrapper for scanner requests with backoff
 * @module
 */

import type { ResolvedRetryConfig, RetryConfig, RetryContext } from '../types/retry.ts'
import { DEFAULT_RETRY_CONFIG } from '../types/retry.ts'
import { calculateRetryDelay, extractErrorMetadata, isRetryableError, sleep, transformHttpError } from './retryErrors.ts'

/**
 * Options for retry wrapper
 */
export type RetryWrapperOptions = {
  /** Retry configuration */
  config?: RetryConfig
  /** Component name for error context */
  component: string
  /** Operation name, attached to the final error */
  operation?: string
  /** Initial retry context (for nested retries) */
  initialContext?: Partial<RetryContext>
  /** Cancels pending backoff sleeps */
  signal?: AbortSignal
}

/**
 * Run an async operation, retrying transient failures
 *
 * Non-retryable failures are rethrown after {@link transformHttpError}
 * without further attempts. When every attempt fails the last error is
 * rethrown the same way.
 *
 * @param fn - Operation; receives the 0-based attempt number
 * @param options - Retry configuration and context
 *
 * @example
 * ```ts
 * const body = await withRetry(
 *   () => fetchJson(`${baseUrl}/coin/metainfo`),
 *   {
 *     config: { maxRetries: 3, baseDelayMs: 200 },
 *     component: 'scanner-client',
 *     operation: 'metainfo',
 *   },
 * )
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryWrapperOptions,
): Promise<T> {
  const { config = {}, component, operation, initialContext = {}, signal } = options

  if (config.enabled === false) {
    return await fn(0)
  }

  const { shouldRetry: customShouldRetry, onRetry, ...tunables } = config
  const mergedConfig: ResolvedRetryConfig = { ...DEFAULT_RETRY_CONFIG, ...tunables }

  const retryContext: RetryContext = {
    attempt: 0,
    attemptTimestamps: initialContext.attemptTimestamps ?? [],
    delayMs: initialContext.delayMs ?? [],
  }
  const errorComponent = operation ? `${component}:${operation}` : component

  let lastError: unknown

  for (let attempt = 0; attempt <= mergedConfig.maxRetries; attempt++) {
    retryContext.attempt = attempt
    retryContext.attemptTimestamps.push(Date.now())

    try {
      return await fn(attempt)
    } catch (error) {
      lastError = error

      if (attempt === mergedConfig.maxRetries) {
        break
      }

      const shouldRetry = customShouldRetry?.(error, attempt) ?? isRetryableError(error)
      if (!shouldRetry) {
        throw transformHttpError(error, errorComponent, retryContext)
      }

      const delayMs = calculateRetryDelay({
        config: mergedConfig,
        attempt,
        errorRetryAfterMs: extractErrorMetadata(error).retryAfterMs,
      })
      retryContext.delayMs.push(delayMs)

      onRetry?.(error, attempt, delayMs)

      await sleep(delayMs, signal)
    }
  }

  throw transformHttpError(lastError, errorComponent, retryContext)
}
