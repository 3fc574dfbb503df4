/**
 * Core type definitions for the QueryBuilder module
 */

/** Values treated as leaves when deriving nested field paths */
type Leaf =
  | string
  | number
  | boolean
  | bigint
  | symbol
  | null
  | undefined
  | Date
  | readonly unknown[]
  | ((...args: never[]) => unknown);

/**
 * Dot-notation paths to the properties of a record type.
 *
 * @example
 * interface User { name: string; address: { city: string } }
 * // FieldPath<User> = 'name' | 'address' | 'address.city'
 */
export type FieldPath<T> = {
  [K in keyof T & string]: NonNullable<T[K]> extends Leaf
    ? K
    : K | `${K}.${FieldPath<NonNullable<T[K]>>}`;
}[keyof T & string] &
  string;

/** Type of the value stored at a field path */
export type FieldValue<T, P extends string> = P extends `${infer Head}.${infer Rest}`
  ? Head extends keyof T
    ? FieldValue<NonNullable<T[Head]>, Rest>
    : never
  : P extends keyof T
    ? T[P]
    : never;

/** Element type of an array field, `never` for non-array fields */
export type ElementOf<V> = NonNullable<V> extends readonly (infer E)[] ? E : never;

/** Paths whose value is an array */
export type ArrayFieldPath<T> = {
  [P in FieldPath<T>]: NonNullable<FieldValue<T, P>> extends readonly unknown[] ? P : never;
}[FieldPath<T>] &
  string;

/** Typed partial update: field path to a value of that field's type */
export type UpdateFields<T> = {
  [P in FieldPath<T>]?: FieldValue<T, P>;
};

/** Filter operators understood by the store */
export type WhereOperator =
  | '=='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'array-contains'
  | 'array-contains-any'
  | 'in';

/** Sort direction */
export type SortDirection = 'asc' | 'desc';

/** A single resolved filter predicate */
export interface FieldFilter {
  readonly field: string;
  readonly operator: WhereOperator;
  readonly value: unknown;
}

/** Sort specification for a resolved field */
export interface SortSpec {
  readonly field: string;
  readonly direction: SortDirection;
}

/** Collection a query runs against */
export interface CollectionTarget {
  /** Collection name, e.g. 'messages' */
  readonly collection: string;
  /** Parent document path for subcollections, e.g. 'users/u1' */
  readonly parentPath?: string;
}

/**
 * Accumulated query state. Built append-only by the QueryBuilder and never
 * mutated once created.
 */
export interface QueryDescriptor {
  readonly target: CollectionTarget;
  readonly filters: readonly FieldFilter[];
  readonly orders: readonly SortSpec[];
  readonly limit?: number;
}

/** Options for orderBy() */
export interface OrderByOptions {
  /** @default false */
  descending?: boolean;
}

/** What to do when a field reference has no stored name */
export type UnresolvedFieldPolicy = 'skip' | 'throw';
