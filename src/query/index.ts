/**
 * Query construction and in-memory evaluation
 *
 * @module query
 */

export {
  ConditionalQueryBuilder,
  DeleteQueryBuilder,
  QueryBuilder,
  deleteQuery,
  select,
} from './builder'

export {
  ConditionBuilder,
  combine,
  isQueryValue,
  type Connector,
  type ValueNormalizer,
} from './condition'

export {
  MappedDeleteQueryBuilder,
  MappedQueryBuilder,
  deleteFrom,
  selectFrom,
} from './mapped-builder'

export { createPredicate, likePattern, matchesCondition } from './filter'
export { applyWindow, compareValuesNullsLast, sortDocuments } from './sort'
