/**
 * QueryClient - Entry point binding record types to a document store
 *
 * @example
 * ```typescript
 * import { QueryClient, FirestoreStore, defineRecord } from 'firestore-typed-query';
 *
 * const client = new QueryClient({ store: new FirestoreStore({ firebaseOptions }) });
 *
 * // Top-level collection
 * const open = await client.query(Ticket).whereEqualTo('status', 'open').all();
 *
 * // Subcollection under a parent document
 * const messages = await client.query(Message, { parent: 'users/u1' }).limit(20).all();
 * ```
 */

import { QueryBuilder, emptyDescriptor } from '../builder/QueryBuilder.js';
import type { UnresolvedFieldPolicy } from '../builder/types.js';
import type { RecordType } from '../record/RecordType.js';
import type { DocumentRef, DocumentStore, QueryClientConfig, QueryScope } from './types.js';
import { createConsoleLogger } from './logger.js';
import type { Logger } from './logger.js';
import { InvalidPathError, NotFoundError, toStoreError } from './errors.js';
import { assertDocumentId, documentIdOf, documentRef, normalizeParentPath } from './paths.js';

/** Default handling of unresolvable field references */
const DEFAULT_UNRESOLVED_FIELDS: UnresolvedFieldPolicy = 'skip';

export class QueryClient {
  private readonly store: DocumentStore;
  private readonly logger: Logger;
  private readonly unresolvedFields: UnresolvedFieldPolicy;

  constructor(config: QueryClientConfig) {
    this.store = config.store;
    this.logger = config.logger ?? createConsoleLogger();
    this.unresolvedFields = config.unresolvedFields ?? DEFAULT_UNRESOLVED_FIELDS;
  }

  /**
   * Start a new query over a record type's collection
   *
   * @param scope - Parent document when querying a subcollection
   * @throws InvalidPathError when the parent is not a document path
   */
  query<T>(recordType: RecordType<T>, scope: QueryScope = {}): QueryBuilder<T> {
    const parentPath =
      scope.parent === undefined ? undefined : normalizeParentPath(scope.parent, recordType.collection);

    return new QueryBuilder<T>(
      {
        recordType,
        store: this.store,
        logger: this.logger,
        unresolvedFields: this.unresolvedFields,
      },
      emptyDescriptor(
        parentPath === undefined
          ? { collection: recordType.collection }
          : { collection: recordType.collection, parentPath }
      )
    );
  }

  /**
   * Reference to a document of a record type's collection
   */
  doc<T>(recordType: RecordType<T>, documentId: string, scope: QueryScope = {}): DocumentRef {
    assertDocumentId(recordType.collection, documentId);
    const parentPath =
      scope.parent === undefined ? undefined : normalizeParentPath(scope.parent, recordType.collection);
    return documentRef({ collection: recordType.collection, parentPath }, documentId);
  }

  /**
   * Build a record from a document reference, through the record type's own
   * loader when it defines one
   *
   * @throws NotFoundError when the document does not exist
   * @throws StoreError on any other failure
   */
  async createFrom<T>(recordType: RecordType<T>, ref: DocumentRef | string): Promise<T> {
    const path = typeof ref === 'string' ? ref.replace(/^\/+|\/+$/g, '') : ref.path;
    const documentId = documentIdOf(path);
    const parent = path.split('/').slice(0, -1).join('/');

    try {
      const segments = path.split('/');
      if (segments.length % 2 !== 0 || segments[segments.length - 2] !== recordType.collection) {
        throw new InvalidPathError(`'${path}' is not a document of collection '${recordType.collection}'`, {
          collection: recordType.collection,
          documentId,
        });
      }

      const target: DocumentRef = { id: documentId, path };
      if (recordType.load !== undefined) {
        return await recordType.load(target, {
          store: this.store,
          decode: (document) => recordType.decode(document),
        });
      }

      const document = await this.store.getDocument(path);
      if (document === null) {
        this.logger.info(`Document '${documentId}' not found in collection '${parent}'`);
        throw new NotFoundError(parent, documentId);
      }
      return recordType.decode(document);
    } catch (error) {
      const queryError = toStoreError(error, { collection: parent, documentId });
      if (!(queryError instanceof NotFoundError)) {
        this.logger.error(`${queryError.name}: ${queryError.message}`, { collection: parent, documentId });
      }
      throw queryError;
    }
  }
}
