/**
 * Validation utilities for CLI options and public entry points
 * @module
 */

import { createErrorContext, ValidationError } from '../errors/mod.ts'
import { type Endpoint, ENDPOINTS } from '../types/market.ts'

/**
 * Market identifiers: lower-case letters, digits and underscores,
 * starting with a letter (`coin`, `america`, `stocks_eu`)
 */
const MARKET_NAME_PATTERN = /^[a-z][a-z0-9_]*$/

/**
 * Validate that a required string field is not empty or whitespace-only
 *
 * @param value - The value to validate
 * @param fieldName - Name of the field for error messages
 * @param component - Component name for error context
 * @returns The trimmed string value
 * @throws {ValidationError} If value is empty, whitespace-only, null, or undefined
 *
 * @example
 * ```ts
 * const output = validateRequiredString(options.output, 'output', 'cli')
 * ```
 */
export function validateRequiredString(
  value: string | undefined | null,
  fieldName: string,
  component: string,
): string {
  if (value === null || value === undefined || value.trim() === '') {
    throw new ValidationError(
      `${fieldName} is required and cannot be empty`,
      createErrorContext({
        component,
        metadata: {
          fieldName,
          providedValue: value === null ? 'null' : value === undefined ? 'undefined' : 'empty/whitespace',
        },
      }),
    )
  }
  return value.trim()
}

/**
 * Validate and normalize a market identifier
 *
 * Surrounding whitespace is dropped and the name is lower-cased before it
 * is checked.
 *
 * @throws {ValidationError} If the name is empty or contains characters
 * that cannot appear in a URL path segment or a schema name
 *
 * @example
 * ```ts
 * validateMarketName(' Coin ', 'cli') // 'coin'
 * ```
 */
export function validateMarketName(value: string | undefined | null, component: string): string {
  const market = validateRequiredString(value, 'market', component).toLowerCase()

  if (!MARKET_NAME_PATTERN.test(market)) {
    throw new ValidationError(
      `Invalid market name "${market}": use lower-case letters, digits and underscores`,
      createErrorContext({ component, metadata: { market } }),
    )
  }

  return market
}

/**
 * Validate an optional positive integer, falling back to a default
 *
 * @param value - Value to check; `undefined` and `null` yield `defaultValue`
 * @param fieldName - Name of the option for error messages
 * @param component - Component name for error context
 * @param defaultValue - Value used when none is given
 * @param max - Optional inclusive upper bound
 * @throws {ValidationError} If the value is not a finite positive integer or exceeds `max`
 */
export function validatePositiveInteger({
  value,
  fieldName,
  component,
  defaultValue,
  max,
}: {
  value: number | undefined | null
  fieldName: string
  component: string
  defaultValue: number
  max?: number
}): number {
  if (value === null || value === undefined) {
    return defaultValue
  }

  if (!Number.isFinite(value) || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(
      `${fieldName} must be a positive integer`,
      createErrorContext({ component, metadata: { fieldName, providedValue: value } }),
    )
  }

  if (max !== undefined && value > max) {
    throw new ValidationError(
      `${fieldName} cannot exceed ${max}`,
      createErrorContext({ component, metadata: { fieldName, providedValue: value, max } }),
    )
  }

  return value
}

/**
 * Narrow a string to an {@link Endpoint}
 */
export function isEndpoint(value: string): value is Endpoint {
  return ENDPOINTS.some((endpoint) => endpoint === value)
}

/**
 * Validate a list of endpoint names
 *
 * Names are trimmed and lower-cased; duplicates collapse. The result keeps
 * the order in which names were given.
 *
 * @throws {ValidationError} If the list is empty or names an unknown endpoint
 *
 * @example
 * ```ts
 * validateEndpoints(['scan', 'Metainfo'], 'cli') // ['scan', 'metainfo']
 * ```
 */
export function validateEndpoints(values: readonly string[], component: string): Endpoint[] {
  const result: Endpoint[] = []

  for (const raw of values) {
    const name = raw.trim().toLowerCase()
    if (!isEndpoint(name)) {
      throw new ValidationError(
        `Unknown endpoint "${raw}". Expected one of: ${ENDPOINTS.join(', ')}`,
        createErrorContext({ component, metadata: { endpoint: raw } }),
      )
    }
    if (!result.includes(name)) {
      result.push(name)
    }
  }

  if (result.length === 0) {
    throw new ValidationError(
      'At least one endpoint is required',
      createErrorContext({ component }),
    )
  }

  return result
}

/**
 * Split a comma-separated CLI value into trimmed, non-empty items
 *
 * @example
 * ```ts
 * splitList('coin, crypto,,forex') // ['coin', 'crypto', 'forex']
 * ```
 */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) {
    return []
  }
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0)
}
