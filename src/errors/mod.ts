/**
 * Structured error types for the generator pipeline.
 *
 * Every error raised by the collector, the inferencer, the assembler or the
 * CLI extends {@link TvGenError}, which carries a machine-readable code, a
 * severity, a retryable flag and the component that raised it.
 * @module
 */

/**
 * Error severity levels
 *
 * 'low' - Minor issues, non-critical
 * 'medium' - Moderate issues, may affect one market
 * 'high' - Serious issues, the current operation cannot finish
 * 'critical' - The whole run has to stop
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical'

/**
 * Error codes
 */
export enum ErrorCode {
  /** General configuration error */
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  /** Validation error for input data */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  /** Two fields share a name after normalization */
  DUPLICATE_FIELD = 'DUPLICATE_FIELD',
  /** A `$ref` points to a schema that does not exist */
  UNRESOLVED_REF = 'UNRESOLVED_REF',
  /** Generated document failed structural validation */
  SPEC_VALIDATION = 'SPEC_VALIDATION',
  /** Serialized document exceeds the size limit */
  DOCUMENT_TOO_LARGE = 'DOCUMENT_TOO_LARGE',
  /** Upstream returned a payload of an unexpected shape */
  MALFORMED_RESPONSE = 'MALFORMED_RESPONSE',
  /** Bad request (HTTP 400) */
  BAD_REQUEST = 'BAD_REQUEST',
  /** Unauthorized (HTTP 401) */
  UNAUTHORIZED = 'UNAUTHORIZED',
  /** Forbidden (HTTP 403) */
  FORBIDDEN = 'FORBIDDEN',
  /** Not found (HTTP 404) */
  NOT_FOUND = 'NOT_FOUND',
  /** Conflict (HTTP 409) */
  CONFLICT = 'CONFLICT',
  /** Rate limit exceeded (HTTP 429) */
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  /** Internal server error (HTTP 500) */
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  /** Bad gateway (HTTP 502) */
  BAD_GATEWAY = 'BAD_GATEWAY',
  /** Service unavailable (HTTP 503) */
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  /** Gateway timeout (HTTP 504) */
  GATEWAY_TIMEOUT = 'GATEWAY_TIMEOUT',
  /** Request timeout (HTTP 408 or client-side abort) */
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
  /** Unknown error */
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Component where the error occurred */
  component: string
  /** Timestamp when the error occurred (ISO 8601 format) */
  timestamp: string
  /** Additional metadata about the error */
  metadata?: Record<string, unknown>
}

/**
 * Metadata extracted from an HTTP failure
 */
export type HttpErrorMetadata = {
  /** HTTP status code of the response */
  statusCode?: number
  /** Request URL */
  url?: string
  /** Retry-After header value in milliseconds */
  retryAfterMs?: number
  /** First bytes of the response body */
  body?: string
}

/**
 * Base error class for every error raised by the generator
 *
 * @example
 * ```ts
 * throw new TvGenError({
 *   message: 'An error occurred',
 *   context: createErrorContext({ component: 'spec-assembler' }),
 *   code: ErrorCode.UNKNOWN_ERROR,
 *   severity: 'medium',
 * })
 * ```
 */
export class TvGenError extends Error {
  public readonly context: ErrorContext
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity
  public readonly retryable: boolean

  constructor({
    message,
    context,
    code,
    severity,
    retryable = false,
  }: {
    message: string
    context: ErrorContext
    code: ErrorCode
    severity: ErrorSeverity
    retryable?: boolean
  }) {
    super(message)
    this.name = this.constructor.name
    this.context = context
    this.code = code
    this.severity = severity
    this.retryable = retryable

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Serialize error to JSON
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      retryable: this.retryable,
      context: this.context,
      stack: this.stack,
    }
  }
}

/**
 * General configuration error, e.g. an environment variable that fails to parse
 */
export class ConfigurationError extends TvGenError {
  constructor(message: string, context: ErrorContext) {
    super({
      message,
      context,
      code: ErrorCode.CONFIGURATION_ERROR,
      severity: 'high',
      retryable: false,
    })
  }
}

/**
 * Error thrown when input validation fails
 *
 * @example
 * ```ts
 * throw new ValidationError('market is required and cannot be empty', context)
 * ```
 */
export class ValidationError extends TvGenError {
  constructor(message: string, context: ErrorContext) {
    super({
      message,
      context,
      code: ErrorCode.VALIDATION_ERROR,
      severity: 'high',
      retryable: false,
    })
  }
}

/**
 * Error thrown when an upstream payload does not match the expected shape
 */
export class MalformedResponseError extends TvGenError {
  public readonly issues: string[]

  constructor({ message, context, issues = [] }: {
    message: string
    context: ErrorContext
    issues?: string[]
  }) {
    super({
      message,
      context,
      code: ErrorCode.MALFORMED_RESPONSE,
      severity: 'high',
      retryable: false,
    })
    this.issues = issues
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues }
  }
}

/**
 * Two field descriptors of one market resolve to the same property name.
 *
 * Fatal for the market being assembled; a batch run records it and moves on.
 *
 * @example
 * ```ts
 * throw new DuplicateFieldError({ fieldName: 'close', market: 'coin', context })
 * ```
 */
export class DuplicateFieldError extends TvGenError {
  public readonly fieldName: string
  public readonly market?: string

  constructor({ fieldName, market, context }: {
    fieldName: string
    market?: string
    context: ErrorContext
  }) {
    const where = market ? ` in market "${market}"` : ''
    super({
      message: `Duplicate field "${fieldName}"${where}`,
      context,
      code: ErrorCode.DUPLICATE_FIELD,
      severity: 'high',
      retryable: false,
    })
    this.fieldName = fieldName
    this.market = market
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), fieldName: this.fieldName, market: this.market }
  }
}

/**
 * A document contains `$ref` pointers with no matching component schema
 */
export class RefIntegrityError extends TvGenError {
  public readonly unresolved: string[]

  constructor({ unresolved, context }: { unresolved: string[]; context: ErrorContext }) {
    super({
      message: `Unresolved $ref: ${unresolved.join(', ')}`,
      context,
      code: ErrorCode.UNRESOLVED_REF,
      severity: 'high',
      retryable: false,
    })
    this.unresolved = unresolved
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), unresolved: this.unresolved }
  }
}

/**
 * A generated or loaded document failed validation
 */
export class SpecValidationError extends TvGenError {
  public readonly errors: string[]

  constructor({ errors, context }: { errors: string[]; context: ErrorContext }) {
    super({
      message: `OpenAPI document is invalid: ${errors.length} problem(s); first: ${errors[0] ?? 'unknown'}`,
      context,
      code: ErrorCode.SPEC_VALIDATION,
      severity: 'high',
      retryable: false,
    })
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.errors }
  }
}

/**
 * Serialized document exceeds the configured byte limit
 */
export class DocumentSizeError extends TvGenError {
  public readonly sizeBytes: number
  public readonly maxBytes: number

  constructor({ sizeBytes, maxBytes, context }: {
    sizeBytes: number
    maxBytes: number
    context: ErrorContext
  }) {
    super({
      message: `Serialized document is ${sizeBytes} bytes, limit is ${maxBytes}`,
      context,
      code: ErrorCode.DOCUMENT_TOO_LARGE,
      severity: 'medium',
      retryable: false,
    })
    this.sizeBytes = sizeBytes
    this.maxBytes = maxBytes
  }
}

type HttpErrorParams = {
  message: string
  context: ErrorContext
  metadata?: HttpErrorMetadata
}

/**
 * Base class for errors caused by a non-successful HTTP exchange with the
 * scanner API. Subclasses fix the code, the severity and whether a retry
 * can help.
 */
export class HttpError extends TvGenError {
  public readonly metadata: HttpErrorMetadata

  constructor(
    { message, context, metadata = {} }: HttpErrorParams,
    { code, severity, retryable }: { code: ErrorCode; severity: ErrorSeverity; retryable: boolean },
  ) {
    super({ message, context, code, severity, retryable })
    this.metadata = metadata
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), metadata: this.metadata }
  }
}

/** HTTP 400 */
export class BadRequestError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.BAD_REQUEST, severity: 'high', retryable: false })
  }
}

/** HTTP 401 */
export class UnauthorizedError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.UNAUTHORIZED, severity: 'high', retryable: false })
  }
}

/** HTTP 403 */
export class ForbiddenError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.FORBIDDEN, severity: 'high', retryable: false })
  }
}

/** HTTP 404, usually an unknown market */
export class NotFoundError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.NOT_FOUND, severity: 'medium', retryable: false })
  }
}

/** HTTP 409 */
export class ConflictError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.CONFLICT, severity: 'medium', retryable: false })
  }
}

/**
 * HTTP 429. Retryable; honours the Retry-After header.
 *
 * @example
 * ```ts
 * throw new RateLimitError({ message: 'Too many requests', context, metadata: { retryAfterMs: 2000 } })
 * ```
 */
export class RateLimitError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.RATE_LIMIT_EXCEEDED, severity: 'medium', retryable: true })
  }
}

/** HTTP 408 or a client-side timeout */
export class RequestTimeoutError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.REQUEST_TIMEOUT, severity: 'medium', retryable: true })
  }
}

/** HTTP 500 */
export class InternalServerError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.INTERNAL_SERVER_ERROR, severity: 'high', retryable: true })
  }
}

/** HTTP 502 */
export class BadGatewayError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.BAD_GATEWAY, severity: 'high', retryable: true })
  }
}

/** HTTP 503 */
export class ServiceUnavailableError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.SERVICE_UNAVAILABLE, severity: 'high', retryable: true })
  }
}

/** HTTP 504 */
export class GatewayTimeoutError extends HttpError {
  constructor(params: HttpErrorParams) {
    super(params, { code: ErrorCode.GATEWAY_TIMEOUT, severity: 'high', retryable: true })
  }
}

/**
 * Create error context with timestamp
 *
 * @example
 * ```ts
 * const context = createErrorContext({ component: 'scanner-client', metadata: { market: 'coin' } })
 * ```
 */
export function createErrorContext({
  component,
  metadata,
}: {
  component: string
  metadata?: Record<string, unknown>
}): ErrorContext {
  return {
    component,
    timestamp: new Date().toISOString(),
    metadata,
  }
}

/**
 * Render any thrown value as a single-line message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Error boundary that converts foreign errors into {@link TvGenError}
 *
 * @example
 * ```ts
 * const boundary = new ErrorBoundary('cli')
 * await boundary.execute(async () => {
 *   // code that may throw errors
 * })
 * ```
 */
export class ErrorBoundary {
  private readonly component: string

  constructor(component: string) {
    this.component = component
  }

  /**
   * Execute an async function; errors that are not already a
   * {@link TvGenError} are rethrown as one with code UNKNOWN_ERROR
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw this.wrap(error)
    }
  }

  /**
   * Synchronous variant of {@link ErrorBoundary.execute}
   */
  executeSync<T>(fn: () => T): T {
    try {
      return fn()
    } catch (error) {
      throw this.wrap(error)
    }
  }

  private wrap(error: unknown): TvGenError {
    if (error instanceof TvGenError) {
      return error
    }

    return new TvGenError({
      message: errorMessage(error),
      context: createErrorContext({
        component: this.component,
        metadata: { originalError: errorMessage(error) },
      }),
      code: ErrorCode.UNKNOWN_ERROR,
      severity: 'medium',
      retryable: false,
    })
  }
}
