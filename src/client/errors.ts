/**
 * Error classes for failed query operations
 */

/** Kind of a failed terminal operation */
export type QueryErrorKind = 'not-found' | 'store';

export interface QueryErrorContext {
  collection: string;
  documentId?: string;
  cause?: unknown;
}

/**
 * Base error class for failed terminal operations
 */
export class QueryError extends Error {
  public readonly kind: QueryErrorKind;
  public readonly collection: string;
  public readonly documentId: string | undefined;
  public override readonly cause: unknown;

  constructor(kind: QueryErrorKind, message: string, context: QueryErrorContext) {
    super(message);
    this.name = 'QueryError';
    this.kind = kind;
    this.collection = context.collection;
    this.documentId = context.documentId;
    this.cause = context.cause;

    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace(this, QueryError);
  }
}

/**
 * The document requested by ID does not exist
 */
export class NotFoundError extends QueryError {
  constructor(collection: string, documentId: string) {
    super('not-found', `Document '${documentId}' not found in collection '${collection}'`, {
      collection,
      documentId,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Any other failure: transport, permissions, malformed query, (de)serialization
 */
export class StoreError extends QueryError {
  constructor(message: string, context: QueryErrorContext) {
    super('store', message, context);
    this.name = 'StoreError';
  }
}

/**
 * A collection path, parent path or document ID is malformed
 */
export class InvalidPathError extends StoreError {
  constructor(message: string, context: QueryErrorContext) {
    super(message, context);
    this.name = 'InvalidPathError';
  }
}

/**
 * A field reference has no stored name (strict field resolution only)
 */
export class FieldResolutionError extends Error {
  public readonly collection: string;
  public readonly field: string;

  constructor(collection: string, field: string) {
    super(`Could not resolve a stored field name for '${field}' in collection '${collection}'`);
    this.name = 'FieldResolutionError';
    this.collection = collection;
    this.field = field;
  }
}

export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Normalise anything thrown during a terminal operation.
 * Errors that are already QueryErrors pass through untouched.
 */
export function toStoreError(error: unknown, context: Omit<QueryErrorContext, 'cause'>): QueryError {
  if (isQueryError(error)) {
    return error;
  }
  return new StoreError(describe(error), { ...context, cause: error });
}
