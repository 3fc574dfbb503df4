/**
 * MemoryStore - In-process DocumentStore with Firestore-like query semantics
 *
 * Intended for tests and local tooling. Documents are kept as deep copies, so
 * records handed in or out can be mutated freely by the caller.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore();
 * const client = new QueryClient({ store });
 * await client.query(Product).set({ name: 'Lamp', price: 12 }, { documentId: 'p1' });
 * ```
 */

import { randomInt } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import type { FieldFilter, QueryDescriptor, SortSpec } from '../builder/types.js';
import type { DocumentData, DocumentStore, StoredDocument, WriteOptions } from './types.js';
import { collectionPath, documentIdOf } from './paths.js';

const ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const ID_LENGTH = 20;

export interface MemoryStoreOptions {
  /** Generates document IDs for writes without one */
  idGenerator?: () => string;
}

function randomId(): string {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_ALPHABET.charAt(randomInt(ID_ALPHABET.length));
  }
  return id;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function parentPathOf(path: string): string {
  return path.split('/').slice(0, -1).join('/');
}

/** Value at a dotted field path, undefined when any segment is missing */
export function readField(data: DocumentData, path: string): unknown {
  let current: unknown = data;
  for (const segment of path.split('.')) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function writeField(data: DocumentData, path: string, value: unknown): void {
  const segments = path.split('.');
  const last = segments.pop();
  if (last === undefined) return;

  let current: Record<string, unknown> = data;
  for (const segment of segments) {
    const next = current[segment];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[last] = value;
}

/** Firestore refuses undefined anywhere in a written payload */
function assertDefined(value: unknown, field: string, documentPath: string): void {
  if (value === undefined) {
    throw new Error(
      `Unsupported field value: undefined (found in field ${field} in document ${documentPath})`
    );
  }
  if (Array.isArray(value)) {
    for (const element of value) assertDefined(element, field, documentPath);
  } else if (isPlainObject(value)) {
    for (const [key, entry] of Object.entries(value)) assertDefined(entry, `${field}.${key}`, documentPath);
  }
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error('Function limit() requires a positive number');
  }
}

function mergeDeep(target: DocumentData, source: DocumentData): DocumentData {
  const result: DocumentData = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? mergeDeep(existing, value) : value;
  }
  return result;
}

/** Cross-type ordering: null < boolean < number < date < string < array < map */
function typeRank(value: unknown): number {
  if (value === null) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number') return 2;
  if (value instanceof Date) return 3;
  if (typeof value === 'string') return 4;
  if (Array.isArray(value)) return 5;
  return 6;
}

function compareSameType(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  return 0;
}

function compareValues(a: unknown, b: unknown): number {
  const rankDiff = typeRank(a) - typeRank(b);
  return rankDiff !== 0 ? rankDiff : compareSameType(a, b);
}

/** Range comparisons only match values of the same type */
function compareRange(actual: unknown, expected: unknown): number | undefined {
  if (typeRank(actual) !== typeRank(expected) || typeRank(actual) >= 5) {
    return undefined;
  }
  return compareSameType(actual, expected);
}

function includesValue(values: unknown, value: unknown): boolean {
  return Array.isArray(values) && values.some((candidate) => isDeepStrictEqual(candidate, value));
}

export function matchesFilter(data: DocumentData, filter: FieldFilter): boolean {
  const actual = readField(data, filter.field);
  if (actual === undefined) {
    return false;
  }

  switch (filter.operator) {
    case '==':
      return isDeepStrictEqual(actual, filter.value);
    case '<': {
      const c = compareRange(actual, filter.value);
      return c !== undefined && c < 0;
    }
    case '<=': {
      const c = compareRange(actual, filter.value);
      return c !== undefined && c <= 0;
    }
    case '>': {
      const c = compareRange(actual, filter.value);
      return c !== undefined && c > 0;
    }
    case '>=': {
      const c = compareRange(actual, filter.value);
      return c !== undefined && c >= 0;
    }
    case 'array-contains':
      return includesValue(actual, filter.value);
    case 'array-contains-any':
      return Array.isArray(filter.value) && filter.value.some((value) => includesValue(actual, value));
    case 'in':
      return includesValue(filter.value, actual);
  }
}

function compareDocuments(
  orders: readonly SortSpec[]
): (a: StoredDocument, b: StoredDocument) => number {
  return (a: StoredDocument, b: StoredDocument): number => {
    for (const order of orders) {
      const diff = compareValues(readField(a.data, order.field), readField(b.data, order.field));
      if (diff !== 0) {
        return order.direction === 'desc' ? -diff : diff;
      }
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  };
}

export class MemoryStore implements DocumentStore {
  /** Every descriptor passed to runQuery(), in execution order */
  readonly executedQueries: QueryDescriptor[] = [];

  private readonly documents = new Map<string, DocumentData>();
  private readonly idGenerator: () => string;

  constructor(options: MemoryStoreOptions = {}) {
    this.idGenerator = options.idGenerator ?? randomId;
  }

  /** Number of stored documents across all collections */
  get size(): number {
    return this.documents.size;
  }

  async runQuery(descriptor: QueryDescriptor): Promise<StoredDocument[]> {
    this.executedQueries.push(descriptor);
    if (descriptor.limit !== undefined) {
      assertLimit(descriptor.limit);
    }
    const path = collectionPath(descriptor.target);

    const matched: StoredDocument[] = [];
    for (const [documentPath, data] of this.documents) {
      if (parentPathOf(documentPath) !== path) continue;
      if (!descriptor.filters.every((filter) => matchesFilter(data, filter))) continue;
      // Documents missing an ordered field are left out, as Firestore does
      if (!descriptor.orders.every((order) => readField(data, order.field) !== undefined)) continue;
      matched.push(this.toStored(documentPath, data));
    }

    matched.sort(compareDocuments(descriptor.orders));
    return descriptor.limit === undefined ? matched : matched.slice(0, descriptor.limit);
  }

  async getDocument(path: string): Promise<StoredDocument | null> {
    const data = this.documents.get(path);
    return data === undefined ? null : this.toStored(path, data);
  }

  newDocumentId(_collectionPath: string): string {
    return this.idGenerator();
  }

  async setDocument(path: string, data: DocumentData, options: WriteOptions): Promise<void> {
    for (const [field, value] of Object.entries(data)) {
      assertDefined(value, field, path);
    }
    const existing = this.documents.get(path);
    const next = options.merge && existing !== undefined ? mergeDeep(existing, data) : data;
    this.documents.set(path, structuredClone(next));
  }

  async updateDocument(path: string, data: DocumentData): Promise<void> {
    const existing = this.documents.get(path);
    if (existing === undefined) {
      throw new Error(`No document to update: ${path}`);
    }

    for (const [field, value] of Object.entries(data)) {
      assertDefined(value, field, path);
    }

    const next = structuredClone(existing);
    for (const [field, value] of Object.entries(data)) {
      writeField(next, field, structuredClone(value));
    }
    this.documents.set(path, next);
  }

  async deleteDocument(path: string): Promise<void> {
    this.documents.delete(path);
  }

  private toStored(path: string, data: DocumentData): StoredDocument {
    return { id: documentIdOf(path), path, data: structuredClone(data) };
  }
}
