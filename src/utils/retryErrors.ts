/**
 * Classification of scanner failures for the retry loop
 * @module
 */

import type { ErrorContext, HttpErrorMetadata } from '../errors/mod.ts'
import {
  BadGatewayError,
  BadRequestError,
  ConflictError,
  createErrorContext,
  ForbiddenError,
  GatewayTimeoutError,
  HttpError,
  InternalServerError,
  NotFoundError,
  RateLimitError,
  RequestTimeoutError,
  ServiceUnavailableError,
  TvGenError,
  UnauthorizedError,
} from '../errors/mod.ts'
import type { ResolvedRetryConfig, RetryContext } from '../types/retry.ts'

type HttpErrorClass = new (params: {
  message: string
  context: ErrorContext
  metadata?: HttpErrorMetadata
}) => HttpError

const STATUS_ERRORS: Record<number, { errorClass: HttpErrorClass; fallbackMessage: string }> = {
  400: { errorClass: BadRequestError, fallbackMessage: 'Bad request' },
  401: { errorClass: UnauthorizedError, fallbackMessage: 'Unauthorized' },
  403: { errorClass: ForbiddenError, fallbackMessage: 'Forbidden' },
  404: { errorClass: NotFoundError, fallbackMessage: 'Not found' },
  408: { errorClass: RequestTimeoutError, fallbackMessage: 'Request timeout' },
  409: { errorClass: ConflictError, fallbackMessage: 'Conflict' },
  429: { errorClass: RateLimitError, fallbackMessage: 'Too many requests' },
  500: { errorClass: InternalServerError, fallbackMessage: 'Internal server error' },
  502: { errorClass: BadGatewayError, fallbackMessage: 'Bad gateway' },
  503: { errorClass: ServiceUnavailableError, fallbackMessage: 'Service temporarily unavailable' },
  504: { errorClass: GatewayTimeoutError, fallbackMessage: 'Gateway timeout' },
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Parse a Retry-After header value into milliseconds.
 * Accepts delta-seconds (`"2"`) and HTTP dates.
 *
 * @param value - Raw header value
 * @param now - Reference time for HTTP dates
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined
  }

  const trimmed = value.trim()
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000)
  }

  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) {
    return undefined
  }
  return Math.max(0, date - now)
}

/**
 * Extract HTTP metadata from a thrown value
 *
 * Understands {@link HttpError} instances and plain objects carrying
 * `status`/`statusCode` and `retryAfterMs`.
 */
export function extractErrorMetadata(error: unknown): HttpErrorMetadata {
  if (error instanceof HttpError) {
    return error.metadata
  }

  const metadata: HttpErrorMetadata = {}
  if (!isRecord(error)) {
    return metadata
  }

  if (typeof error.statusCode === 'number') {
    metadata.statusCode = error.statusCode
  } else if (typeof error.status === 'number') {
    metadata.statusCode = error.status
  }

  if (typeof error.retryAfterMs === 'number') {
    metadata.retryAfterMs = error.retryAfterMs
  }

  if (typeof error.url === 'string') {
    metadata.url = error.url
  }

  return metadata
}

/**
 * Determine if an error is worth another attempt
 *
 * Rate limits, timeouts and 5xx responses are; client errors and
 * validation failures are not. Network failures surfaced by `fetch`
 * as `TypeError` are treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TvGenError) {
    return error.retryable
  }

  if (!isRecord(error)) {
    return false
  }

  const { statusCode } = extractErrorMetadata(error)
  if (statusCode === 429 || statusCode === 408) {
    return true
  }
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) {
    return true
  }
  if (statusCode !== undefined) {
    return false
  }

  if (error instanceof TypeError) {
    return true
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return true
  }

  const message = error.message
  if (typeof message === 'string') {
    const lowerMessage = message.toLowerCase()
    return (
      lowerMessage.includes('timeout') ||
      lowerMessage.includes('econnreset') ||
      lowerMessage.includes('socket hang up') ||
      lowerMessage.includes('too many requests')
    )
  }

  return false
}

/**
 * Map an HTTP status to the matching error class
 *
 * @param statusCode - Response status
 * @param message - Error message; a status-specific default is used when empty
 * @param context - Error context
 * @param metadata - HTTP metadata to attach
 */
export function createHttpError({
  statusCode,
  message,
  context,
  metadata = {},
}: {
  statusCode: number
  message?: string
  context: ErrorContext
  metadata?: HttpErrorMetadata
}): HttpError {
  const entry = STATUS_ERRORS[statusCode]
  const fullMetadata: HttpErrorMetadata = { ...metadata, statusCode }

  if (entry) {
    return new entry.errorClass({ message: message || entry.fallbackMessage, context, metadata: fullMetadata })
  }

  if (statusCode >= 500) {
    return new InternalServerError({ message: message || `HTTP ${statusCode}`, context, metadata: fullMetadata })
  }
  return new BadRequestError({ message: message || `HTTP ${statusCode}`, context, metadata: fullMetadata })
}

/**
 * Normalize a failure of a scanner request into a {@link TvGenError}
 *
 * Errors that already belong to the hierarchy pass through unchanged.
 *
 * @param error - Original error
 * @param component - Component name for error context
 * @param retryContext - Optional retry bookkeeping attached as metadata
 */
export function transformHttpError(
  error: unknown,
  component: string,
  retryContext?: Partial<RetryContext>,
): Error {
  if (error instanceof TvGenError) {
    return error
  }

  const metadata = extractErrorMetadata(error)
  const message = error instanceof Error ? error.message : String(error)
  const context = createErrorContext({
    component,
    metadata: {
      ...retryContext,
      originalError: message,
    },
  })

  if (metadata.statusCode !== undefined) {
    return createHttpError({ statusCode: metadata.statusCode, message, context, metadata })
  }

  if (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError' || message.toLowerCase().includes('timeout'))
  ) {
    return new RequestTimeoutError({ message, context, metadata })
  }

  if (error instanceof Error) {
    return error
  }

  return new Error(message)
}

/**
 * Calculate retry delay based on configuration and attempt
 *
 * @param config - Retry configuration
 * @param attempt - Current attempt number (0-based)
 * @param errorRetryAfterMs - Optional retry-after from the failed response
 * @returns Delay in milliseconds
 */
export function calculateRetryDelay({
  config,
  attempt,
  errorRetryAfterMs,
}: {
  config: ResolvedRetryConfig
  attempt: number
  errorRetryAfterMs?: number
}): number {
  if (config.respectRetryAfter && errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs)
  }

  let delay = config.baseDelayMs

  if (config.strategy === 'exponential') {
    delay = config.baseDelayMs * Math.pow(2, attempt)
  } else if (config.strategy === 'linear') {
    delay = config.baseDelayMs * (attempt + 1)
  }

  delay = Math.min(delay, config.maxDelayMs)

  if (config.jitterFactor > 0) {
    const jitter = delay * config.jitterFactor * (Math.random() * 2 - 1)
    delay = Math.max(0, delay + jitter)
  }

  return Math.floor(delay)
}

/**
 * Sleep for specified milliseconds with optional cancellation
 *
 * @param ms - Milliseconds to sleep
 * @param signal - Optional AbortSignal to cancel the sleep
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Sleep aborted'))
      return
    }

    const timeoutId = setTimeout(() => {
      cleanup()
      resolve()
    }, ms)

    const cleanup = () => {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }

    const onAbort = () => {
      cleanup()
      reject(new Error('Sleep aborted'))
    }

    signal?.addEventListener('abort', onAbort)
  })
}
