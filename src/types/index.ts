/**
 * docmap Type Definitions
 *
 * | Module   | Description                                                   |
 * |----------|---------------------------------------------------------------|
 * | document | Native representation: Document, DocumentRecord, values       |
 * | query    | Query descriptors and the predicate tree                      |
 * | metadata | ClassMetadata, column/id metadata, converters, resolver        |
 *
 * @module types
 */

export {
  type Scalar,
  type DocumentValue,
  type DocumentField,
  Document,
  DocumentRecord,
  isScalar,
  isDocumentValue,
} from './document'

export type {
  ScalarComparator,
  Comparator,
  QueryValue,
  ScalarCondition,
  InCondition,
  BetweenCondition,
  FieldCondition,
  CompositeCondition,
  NotCondition,
  Condition,
  SortDirection,
  Sort,
  SelectQuery,
  DeleteQuery,
} from './query'

export type {
  EntityClass,
  IdType,
  AttributeConverter,
  ColumnKind,
  ColumnMetadata,
  IdMetadata,
  ClassMetadata,
  MetadataResolver,
} from './metadata'
