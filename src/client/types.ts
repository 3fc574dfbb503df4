/**
 * Type definitions for the client module
 */

import type { QueryDescriptor, UnresolvedFieldPolicy } from '../builder/types.js';
import type { Logger } from './logger.js';

/** Raw document payload as stored */
export type DocumentData = Record<string, unknown>;

/** A document as returned by a store */
export interface StoredDocument {
  /** Document ID (last path segment) */
  id: string;
  /** Full document path, e.g. 'users/u1/messages/m1' */
  path: string;
  data: DocumentData;
}

/** Reference to a single document */
export interface DocumentRef {
  id: string;
  path: string;
}

export interface WriteOptions {
  /** Preserve fields absent from the payload instead of replacing the document */
  merge: boolean;
}

/**
 * The store the query builder executes against.
 *
 * Every method is a single asynchronous call; implementations own transport,
 * retries and consistency.
 */
export interface DocumentStore {
  runQuery(descriptor: QueryDescriptor): Promise<StoredDocument[]>;
  getDocument(path: string): Promise<StoredDocument | null>;
  newDocumentId(collectionPath: string): string;
  setDocument(path: string, data: DocumentData, options: WriteOptions): Promise<void>;
  updateDocument(path: string, data: DocumentData): Promise<void>;
  deleteDocument(path: string): Promise<void>;
}

/** Client configuration options */
export interface QueryClientConfig {
  /** Store every builder created by this client executes against */
  store: DocumentStore;

  /**
   * Logger for skipped predicates, lookups and store failures
   * @default createConsoleLogger('warn')
   */
  logger?: Logger;

  /**
   * Handling of field references with no stored name.
   * 'skip' logs a warning and leaves the query unchanged; 'throw' raises FieldResolutionError.
   * @default 'skip'
   */
  unresolvedFields?: UnresolvedFieldPolicy;
}

/** Where a builder is rooted */
export interface QueryScope {
  /** Parent document for a subcollection query */
  parent?: DocumentRef | string;
}

/** Options for set() and setData() */
export interface SetOptions {
  /** Document ID to write; generated by the store when omitted */
  documentId?: string;
  /** @default false */
  merge?: boolean;
}
