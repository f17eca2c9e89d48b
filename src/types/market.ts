/**
 * Market Types Module
 * The data model shared by the inferencer and the assembler: one descriptor
 * per upstream field, grouped into a market.
 * @module
 */

/**
 * JSON type tags that a field can be assigned in the generated document
 */
export type OpenApiTypeTag = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object'

/**
 * Where a field was first seen
 *
 * 'metainfo' - listed by the market's metainfo endpoint
 * 'scan' - only present in a sample scan row
 */
export type FieldSource = 'metainfo' | 'scan'

/**
 * Strategy for fields that appear in scan data but not in metainfo
 *
 * 'default' - drop them
 * 'include_missing' - append them with an inferred type
 */
export type GenerationMode = 'default' | 'include_missing'

/**
 * Number inference configuration
 *
 * 'float' - every JSON number sample becomes `number` (default)
 * 'strict' - integer-valued JSON number samples become `integer`
 */
export type NumberInference = 'float' | 'strict'

/**
 * Tunables of the type inferencer
 */
export type InferenceConfig = {
  /** How JSON number samples are typed (default: 'float') */
  numberInference: NumberInference
}

/**
 * One upstream field, immutable once built
 */
export type FieldDescriptor = {
  /** Field name as the scanner API spells it, e.g. `close` or `RSI|60` */
  readonly name: string
  /** One observed value, possibly `null` */
  readonly sampleValue: unknown
  /** Type hint from metainfo, e.g. `price` or `bool` */
  readonly declaredType?: string
  /** Human-readable description from metainfo */
  readonly description?: string
  /** Allowed values, when metainfo lists any */
  readonly enumValues?: readonly string[]
  /** Whether the name ends in `|<timeframe>` */
  readonly hasTimeframeSuffix: boolean
  /** String format implied by the hint, e.g. `date-time` */
  readonly format?: string
  /** Upstream flags such as `deprecated` */
  readonly flags?: readonly string[]
  /** Where the field was first seen */
  readonly source: FieldSource
}

/**
 * Operations exposed per market by the scanner API
 */
export type Endpoint = 'scan' | 'search' | 'history' | 'summary' | 'metainfo'

/**
 * Every endpoint, in the order paths are emitted
 */
export const ENDPOINTS: readonly Endpoint[] = ['scan', 'search', 'history', 'summary', 'metainfo']

/**
 * All fields of one market
 */
export type MarketSpec = {
  /** Lower-case market identifier, e.g. `coin` */
  readonly marketName: string
  /** Field name to descriptor, in insertion order */
  readonly fields: ReadonlyMap<string, FieldDescriptor>
  /** Endpoints this market exposes */
  readonly endpoints: ReadonlySet<Endpoint>
}

/**
 * One field as listed by a market's metainfo, after boundary validation
 */
export type MetainfoField = {
  /** Field name */
  readonly name: string
  /** Upstream type hint */
  readonly type?: string
  /** Human-readable description */
  readonly description?: string
  /** Allowed values */
  readonly enumValues?: readonly string[]
  /** Upstream flags such as `deprecated` or `private` */
  readonly flags?: readonly string[]
}
