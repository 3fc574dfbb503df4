/**
 * QueryBuilder - Fluent, type-checked queries and writes against one collection
 *
 * Builders are immutable: every filter, order or limit call returns a new
 * builder over a new descriptor, so a partially built query can be shared as
 * a base for several variants.
 *
 * @example
 * ```typescript
 * const client = new QueryClient({ store: new FirestoreStore({ firebaseOptions }) });
 *
 * const cheapest = await client
 *   .query(Product)
 *   .whereGreaterThanOrEqualTo('price', 10)
 *   .orderBy('price', { descending: true })
 *   .limit(5)
 *   .all();
 * ```
 */

import type {
  ArrayFieldPath,
  CollectionTarget,
  ElementOf,
  FieldPath,
  FieldValue,
  OrderByOptions,
  QueryDescriptor,
  UnresolvedFieldPolicy,
  UpdateFields,
  WhereOperator,
} from './types.js';
import type { RecordType } from '../record/RecordType.js';
import type { DocumentData, DocumentRef, DocumentStore, SetOptions } from '../client/types.js';
import type { Logger } from '../client/logger.js';
import { FieldResolutionError, NotFoundError, toStoreError } from '../client/errors.js';
import type { QueryError } from '../client/errors.js';
import { assertDocumentId, collectionPath, documentRef } from '../client/paths.js';

/** Everything a builder needs besides its descriptor */
export interface QueryBuilderContext<T> {
  recordType: RecordType<T>;
  store: DocumentStore;
  logger: Logger;
  unresolvedFields: UnresolvedFieldPolicy;
}

/** Create the empty descriptor for a collection */
export function emptyDescriptor(target: CollectionTarget): QueryDescriptor {
  return Object.freeze({
    target: Object.freeze({ ...target }),
    filters: Object.freeze([]),
    orders: Object.freeze([]),
  });
}

export class QueryBuilder<T> {
  private readonly context: QueryBuilderContext<T>;
  private readonly descriptor: QueryDescriptor;

  constructor(context: QueryBuilderContext<T>, descriptor: QueryDescriptor) {
    this.context = context;
    this.descriptor = descriptor;
  }


  whereEqualTo<P extends FieldPath<T>>(field: P, value: FieldValue<T, P>): QueryBuilder<T> {
    return this.where(field, '==', value);
  }

  whereLessThan<P extends FieldPath<T>>(field: P, value: FieldValue<T, P>): QueryBuilder<T> {
    return this.where(field, '<', value);
  }

  whereLessThanOrEqualTo<P extends FieldPath<T>>(field: P, value: FieldValue<T, P>): QueryBuilder<T> {
    return this.where(field, '<=', value);
  }

  whereGreaterThan<P extends FieldPath<T>>(field: P, value: FieldValue<T, P>): QueryBuilder<T> {
    return this.where(field, '>', value);
  }

  whereGreaterThanOrEqualTo<P extends FieldPath<T>>(field: P, value: FieldValue<T, P>): QueryBuilder<T> {
    return this.where(field, '>=', value);
  }

  /**
   * Match documents whose array field contains the element
   *
   * @example
   * .whereArrayContains('tags', 'sale')
   */
  whereArrayContains<P extends ArrayFieldPath<T>>(
    field: P,
    element: ElementOf<FieldValue<T, P>>
  ): QueryBuilder<T> {
    return this.where(field, 'array-contains', element);
  }

  /**
   * Match documents whose array field contains at least one of the elements
   */
  whereArrayContainsAny<P extends ArrayFieldPath<T>>(
    field: P,
    elements: readonly ElementOf<FieldValue<T, P>>[]
  ): QueryBuilder<T> {
    return this.where(field, 'array-contains-any', [...elements]);
  }

  /**
   * Match documents whose field equals one of the values
   */
  whereIn<P extends FieldPath<T>>(field: P, values: readonly FieldValue<T, P>[]): QueryBuilder<T> {
    return this.where(field, 'in', [...values]);
  }


  /**
   * Sort by a field; repeated calls add secondary sort keys
   *
   * @example
   * .orderBy('price', { descending: true })
   */
  orderBy<P extends FieldPath<T>>(field: P, options: OrderByOptions = {}): QueryBuilder<T> {
    const resolved = this.resolveField(field, 'order by');
    if (resolved === undefined) {
      return this;
    }
    const direction = options.descending === true ? 'desc' : 'asc';
    return this.with({
      orders: Object.freeze([...this.descriptor.orders, Object.freeze({ field: resolved, direction })]),
    });
  }

  /**
   * Limit the number of results returned; a later call replaces an earlier one
   */
  limit(count: number): QueryBuilder<T> {
    return this.with({ limit: count });
  }

  /** The accumulated query state */
  toDescriptor(): QueryDescriptor {
    return this.descriptor;
  }


  /**
   * Execute the query and decode every matching document
   */
  async all(): Promise<T[]> {
    const { store, recordType, logger } = this.context;
    logger.debug(`Running query on '${this.path}'`, {
      filters: this.descriptor.filters.length,
      orders: this.descriptor.orders.length,
      limit: this.descriptor.limit,
    });

    try {
      const documents = await store.runQuery(this.descriptor);
      return documents.map((document) => recordType.decode(document));
    } catch (error) {
      throw this.fail(error);
    }
  }

  /**
   * Execute the query with a limit of one
   *
   * @returns The first record, or null when nothing matches
   */
  async first(): Promise<T | null> {
    const [record] = await this.limit(1).all();
    return record ?? null;
  }

  /**
   * Fetch one document of this collection by ID, ignoring any filters
   *
   * @throws NotFoundError when the document does not exist
   * @throws StoreError on any other failure
   */
  async getByDocumentID(documentId: string): Promise<T> {
    const { store, recordType, logger } = this.context;

    try {
      assertDocumentId(this.path, documentId);
      const ref = documentRef(this.descriptor.target, documentId);
      const document = await store.getDocument(ref.path);
      if (document === null) {
        logger.info(`Document '${documentId}' not found in collection '${this.path}'`);
        throw new NotFoundError(this.path, documentId);
      }
      return recordType.decode(document);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      throw this.fail(error, documentId);
    }
  }


  /**
   * Insert or replace a document from a typed record
   *
   * @returns Reference to the written document
   */
  async set(record: T, options: SetOptions = {}): Promise<DocumentRef> {
    try {
      const payload = this.context.recordType.encode(record);
      return await this.write(payload, options);
    } catch (error) {
      throw this.fail(error, options.documentId);
    }
  }

  /**
   * Insert or replace a document from an untyped payload, written as given
   */
  async setData(data: DocumentData, options: SetOptions = {}): Promise<DocumentRef> {
    try {
      return await this.write(data, options);
    } catch (error) {
      throw this.fail(error, options.documentId);
    }
  }

  /**
   * Update some fields of an existing document
   *
   * @example
   * .update({ price: 12, 'dimensions.width': 4 }, 'p1')
   */
  async update(fields: UpdateFields<T>, documentId: string): Promise<void> {
    const { store, recordType } = this.context;

    try {
      assertDocumentId(this.path, documentId);
      const payload = recordType.encodeUpdate(fields);
      await store.updateDocument(documentRef(this.descriptor.target, documentId).path, payload);
    } catch (error) {
      throw this.fail(error, documentId);
    }
  }

  /**
   * Delete a document by ID
   */
  async delete(documentId: string): Promise<void> {
    try {
      assertDocumentId(this.path, documentId);
      await this.context.store.deleteDocument(documentRef(this.descriptor.target, documentId).path);
    } catch (error) {
      throw this.fail(error, documentId);
    }
  }


  private get path(): string {
    return collectionPath(this.descriptor.target);
  }

  private with(changes: Partial<Omit<QueryDescriptor, 'target'>>): QueryBuilder<T> {
    return new QueryBuilder(this.context, Object.freeze({ ...this.descriptor, ...changes }));
  }

  private where(field: string, operator: WhereOperator, value: unknown): QueryBuilder<T> {
    const resolved = this.resolveField(field, 'filter');
    if (resolved === undefined) {
      return this;
    }
    return this.with({
      filters: Object.freeze([...this.descriptor.filters, Object.freeze({ field: resolved, operator, value })]),
    });
  }

  private resolveField(field: string, purpose: string): string | undefined {
    const resolved = this.context.recordType.resolver.resolve(field);
    if (resolved !== undefined) {
      return resolved;
    }

    if (this.context.unresolvedFields === 'throw') {
      throw new FieldResolutionError(this.path, field);
    }
    this.context.logger.warn(`Could not find a stored field name for '${field}'. Skipping ${purpose}.`, {
      collection: this.path,
      field,
    });
    return undefined;
  }

  private async write(data: DocumentData, options: SetOptions): Promise<DocumentRef> {
    const { store } = this.context;
    const documentId = options.documentId ?? store.newDocumentId(this.path);
    assertDocumentId(this.path, documentId);

    const ref = documentRef(this.descriptor.target, documentId);
    await store.setDocument(ref.path, data, { merge: options.merge ?? false });
    return ref;
  }

  private fail(error: unknown, documentId?: string): QueryError {
    const queryError = toStoreError(error, { collection: this.path, documentId });
    this.context.logger.error(`${queryError.name}: ${queryError.message}`, {
      collection: this.path,
      documentId,
    });
    return queryError;
  }
}
