/**
 * QueryBuilder module - Fluent, type-checked query construction
 */

export { QueryBuilder, emptyDescriptor } from './QueryBuilder.js';
export type { QueryBuilderContext } from './QueryBuilder.js';
export { createFieldResolver, deriveFieldPath } from './FieldResolver.js';
export type {
  FieldNameMap,
  FieldNameMapper,
  FieldNameOverrides,
  FieldResolver,
} from './FieldResolver.js';
export type {
  ArrayFieldPath,
  CollectionTarget,
  ElementOf,
  FieldFilter,
  FieldPath,
  FieldValue,
  OrderByOptions,
  QueryDescriptor,
  SortDirection,
  SortSpec,
  UnresolvedFieldPolicy,
  UpdateFields,
  WhereOperator,
} from './types.js';
