/**
 * Client module - Query client, document stores and errors
 */

export { QueryClient } from './QueryClient.js';
export { FirestoreStore, toQueryConstraints, fromStoredData, DEFAULT_APP_NAME } from './FirestoreStore.js';
export type { FirestoreStoreConfig } from './FirestoreStore.js';
export { MemoryStore, matchesFilter, readField } from './MemoryStore.js';
export type { MemoryStoreOptions } from './MemoryStore.js';
export {
  QueryError,
  NotFoundError,
  StoreError,
  InvalidPathError,
  FieldResolutionError,
  isQueryError,
  toStoreError,
} from './errors.js';
export type { QueryErrorKind, QueryErrorContext } from './errors.js';
export { createConsoleLogger, silentLogger, DEFAULT_LOG_LEVEL } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
export type {
  DocumentData,
  DocumentRef,
  DocumentStore,
  QueryClientConfig,
  QueryScope,
  SetOptions,
  StoredDocument,
  WriteOptions,
} from './types.js';
