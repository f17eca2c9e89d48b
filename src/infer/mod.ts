/**
 * Infer Module
 * Type inference for upstream fields and construction of the field model.
 * @module
 */

export { inferFieldType, isPlainObject } from './type-inference.ts'

export { formatForHint, isNumericTag, mapUpstreamType, UPSTREAM_TYPE_MAP } from './type-mapping.ts'

export { classifyNumericLiteral, inferNumberType, isFloatLiteral, isIntegerLiteral } from './number-inference.ts'

export {
  hasTimeframeSuffix,
  isTimeframeCode,
  isTimeframeFieldName,
  splitTimeframe,
  TIMEFRAME_CODES,
  TIMEFRAME_FIELD_PATTERN,
} from './timeframes.ts'
export type { TimeframeCode } from './timeframes.ts'

export {
  buildFieldDescriptors,
  createFieldDescriptor,
  createMarketSpec,
  EXCLUDED_FLAGS,
  isExcludedField,
  normalizeFieldName,
} from './field-descriptors.ts'
export type { BuildFieldDescriptorsOptions } from './field-descriptors.ts'

export { classifyFields, CUSTOM_FIELD_PATTERNS, isCustomField } from './classifier.ts'
export type { FieldClassification } from './classifier.ts'
