/**
 * Field Descriptor Module
 * Builds the immutable per-field records consumed by the assembler, from
 * validated metainfo fields and one sample scan row.
 * @module
 */

import { createErrorContext, DuplicateFieldError, ValidationError } from '../errors/mod.ts'
import type {
  Endpoint,
  FieldDescriptor,
  FieldSource,
  GenerationMode,
  MarketSpec,
  MetainfoField,
} from '../types/market.ts'
import { ENDPOINTS } from '../types/market.ts'
import { validateMarketName } from '../utils/validation.ts'
import { hasTimeframeSuffix } from './timeframes.ts'
import { formatForHint } from './type-mapping.ts'

const COMPONENT = 'field-descriptors'

/**
 * Upstream flags that keep a field out of the generated document
 */
export const EXCLUDED_FLAGS: readonly string[] = ['deprecated', 'private']

/**
 * Canonical form of a field name used for collision checks:
 * surrounding whitespace removed, Unicode NFC
 */
export function normalizeFieldName(name: string): string {
  return name.trim().normalize('NFC')
}

/**
 * Create one frozen {@link FieldDescriptor}
 *
 * `hasTimeframeSuffix` and `format` are derived from the name and the hint.
 * Empty descriptions and empty enum lists are dropped.
 *
 * @throws {ValidationError} If the name is empty
 *
 * @example
 * ```ts
 * const field = createFieldDescriptor({ name: 'RSI|60', sampleValue: 51.2, declaredType: 'number' })
 * field.hasTimeframeSuffix // true
 * ```
 */
export function createFieldDescriptor({
  name,
  sampleValue = null,
  declaredType,
  description,
  enumValues,
  flags,
  source = 'metainfo',
}: {
  name: string
  sampleValue?: unknown
  declaredType?: string
  description?: string
  enumValues?: readonly string[]
  flags?: readonly string[]
  source?: FieldSource
}): FieldDescriptor {
  if (name.trim() === '') {
    throw new ValidationError(
      'Field name cannot be empty',
      createErrorContext({ component: COMPONENT, metadata: { declaredType, source } }),
    )
  }

  const trimmedDescription = description?.trim()
  const format = formatForHint(declaredType)

  const descriptor: FieldDescriptor = {
    name,
    sampleValue,
    hasTimeframeSuffix: hasTimeframeSuffix(name),
    source,
    ...(declaredType !== undefined && declaredType.trim() !== '' ? { declaredType } : {}),
    ...(trimmedDescription ? { description: trimmedDescription } : {}),
    ...(enumValues && enumValues.length > 0 ? { enumValues: Object.freeze([...enumValues]) } : {}),
    ...(format ? { format } : {}),
    ...(flags && flags.length > 0 ? { flags: Object.freeze([...flags]) } : {}),
  }

  return Object.freeze(descriptor)
}

/**
 * Whether a metainfo field carries a flag that excludes it
 */
export function isExcludedField(field: MetainfoField): boolean {
  return field.flags?.some((flag) => EXCLUDED_FLAGS.includes(flag.toLowerCase())) ?? false
}

/**
 * Options for {@link buildFieldDescriptors}
 */
export type BuildFieldDescriptorsOptions = {
  /** Fields listed by metainfo, in upstream order */
  metainfo: readonly MetainfoField[]
  /** Field name to first non-empty sample */
  sampleRow?: ReadonlyMap<string, unknown>
  /** What to do with fields only present in the sample row (default: 'default') */
  mode?: GenerationMode
}

/**
 * Turn metainfo fields plus a sample row into descriptors
 *
 * Metainfo order is kept. Fields flagged `deprecated` or `private` are
 * skipped. In `include_missing` mode, names that only occur in the sample
 * row are appended in row order with source `scan`; in `default` mode they
 * are dropped.
 *
 * @example
 * ```ts
 * const descriptors = buildFieldDescriptors({
 *   metainfo: [{ name: 'close', type: 'price' }],
 *   sampleRow: new Map([['close', 50000.5], ['volume', 1200]]),
 *   mode: 'include_missing',
 * })
 * descriptors.map((d) => d.name) // ['close', 'volume']
 * ```
 */
export function buildFieldDescriptors({
  metainfo,
  sampleRow = new Map(),
  mode = 'default',
}: BuildFieldDescriptorsOptions): FieldDescriptor[] {
  const descriptors: FieldDescriptor[] = []
  const known = new Set<string>()

  for (const field of metainfo) {
    known.add(field.name)
    if (isExcludedField(field)) {
      continue
    }

    descriptors.push(createFieldDescriptor({
      name: field.name,
      sampleValue: sampleRow.get(field.name) ?? null,
      declaredType: field.type,
      description: field.description,
      enumValues: field.enumValues,
      flags: field.flags,
      source: 'metainfo',
    }))
  }

  if (mode === 'include_missing') {
    for (const [name, sampleValue] of sampleRow) {
      if (known.has(name) || name.trim() === '') {
        continue
      }
      known.add(name)
      descriptors.push(createFieldDescriptor({ name, sampleValue, source: 'scan' }))
    }
  }

  return descriptors
}

/**
 * Group descriptors into a {@link MarketSpec}
 *
 * @param marketName - Market identifier; trimmed and lower-cased
 * @param fields - Descriptors in the order properties should appear
 * @param endpoints - Endpoints the market exposes (default: all)
 * @throws {DuplicateFieldError} If two descriptors share a name
 * @throws {ValidationError} If the market name is invalid
 */
export function createMarketSpec({
  marketName,
  fields,
  endpoints = ENDPOINTS,
}: {
  marketName: string
  fields: Iterable<FieldDescriptor>
  endpoints?: Iterable<Endpoint>
}): MarketSpec {
  const market = validateMarketName(marketName, COMPONENT)
  const fieldMap = new Map<string, FieldDescriptor>()

  for (const field of fields) {
    if (fieldMap.has(field.name)) {
      throw new DuplicateFieldError({
        fieldName: field.name,
        market,
        context: createErrorContext({ component: COMPONENT, metadata: { market } }),
      })
    }
    fieldMap.set(field.name, field)
  }

  return Object.freeze({
    marketName: market,
    fields: fieldMap,
    endpoints: new Set(endpoints),
  })
}
