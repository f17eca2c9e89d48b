/**
 * OpenAPI Types Module
 * Narrow aliases over the `openapi-types` definitions used by the assembler.
 * @module
 */

import type { OpenAPIV3_1 } from 'openapi-types'

/**
 * Vendor extensions carried by every generated operation
 */
export type OperationExtensions = {
  /** Marks the operation as read-only for action-calling clients */
  'x-openai-isConsequential'?: boolean
}

/**
 * Vendor extensions carried at the document root
 */
export type DocumentExtensions = {
  /** Schema version of the custom-action manifest */
  'x-oai-custom-action-schema-version'?: string
}

/**
 * A complete OpenAPI 3.1 document as produced by the assembler
 */
export type SchemaDocument = OpenAPIV3_1.Document<OperationExtensions> & DocumentExtensions

/**
 * One generated operation
 */
export type Operation = OpenAPIV3_1.OperationObject<OperationExtensions>

/**
 * A schema object
 */
export type Schema = OpenAPIV3_1.SchemaObject

/**
 * A schema object or a `$ref`
 */
export type SchemaOrRef = OpenAPIV3_1.SchemaObject | OpenAPIV3_1.ReferenceObject

/**
 * The `components.schemas` map
 */
export type ComponentSchemas = Record<string, OpenAPIV3_1.SchemaObject>

/**
 * Output format of a serialized document
 */
export type DocumentFormat = 'yaml' | 'json'
