/**
 * Utils Module
 * Logging, retry and validation helpers shared by every layer.
 * @module
 */

// Validation utilities
export * from './validation.ts'

// Retry utilities
export * from './retryErrors.ts'
export * from './retryWrapper.ts'

// Logger utilities
export * from './logger.ts'
