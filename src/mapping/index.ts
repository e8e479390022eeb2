/**
 * Entity/document mapping
 *
 * @module mapping
 */

export { EntityConverter } from './converter'
export { FieldMapper, type ResolvedField } from './field-mapper'
