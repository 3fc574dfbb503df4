import { describe, it, expect } from 'vitest';
import {
  FieldResolutionError,
  InvalidPathError,
  NotFoundError,
  QueryError,
  StoreError,
  isQueryError,
  toStoreError,
} from '../client/errors.js';

describe('errors', () => {
  describe('NotFoundError', () => {
    it('should carry kind, collection and document ID', () => {
      const error = new NotFoundError('items', 'i1');

      expect(error).toBeInstanceOf(QueryError);
      expect(error.name).toBe('NotFoundError');
      expect(error.kind).toBe('not-found');
      expect(error.collection).toBe('items');
      expect(error.documentId).toBe('i1');
      expect(error.message).toBe("Document 'i1' not found in collection 'items'");
    });
  });

  describe('StoreError', () => {
    it('should keep the underlying cause', () => {
      const cause = new Error('permission-denied');
      const error = new StoreError('permission-denied', { collection: 'items', cause });

      expect(error.kind).toBe('store');
      expect(error.cause).toBe(cause);
      expect(error.documentId).toBeUndefined();
    });

    it('should be the base of InvalidPathError', () => {
      const error = new InvalidPathError("Invalid document ID 'a/b'", { collection: 'items' });
      expect(error).toBeInstanceOf(StoreError);
      expect(error.name).toBe('InvalidPathError');
      expect(error.kind).toBe('store');
    });
  });

  describe('FieldResolutionError', () => {
    it('should not be a QueryError', () => {
      const error = new FieldResolutionError('products', 'displayLabel');
      expect(isQueryError(error)).toBe(false);
      expect(error.field).toBe('displayLabel');
      expect(error.collection).toBe('products');
    });
  });

  describe('toStoreError()', () => {
    it('should pass query errors through', () => {
      const notFound = new NotFoundError('items', 'i1');
      expect(toStoreError(notFound, { collection: 'other' })).toBe(notFound);
    });

    it('should wrap errors with their message', () => {
      const cause = new Error('unavailable');
      const error = toStoreError(cause, { collection: 'items', documentId: 'i2' });

      expect(error).toBeInstanceOf(StoreError);
      expect(error.message).toBe('unavailable');
      expect(error.documentId).toBe('i2');
      expect(error.cause).toBe(cause);
    });

    it('should describe non-error values', () => {
      expect(toStoreError('offline', { collection: 'items' }).message).toBe('offline');
      expect(toStoreError({ code: 7 }, { collection: 'items' }).message).toBe('{"code":7}');
      expect(toStoreError(undefined, { collection: 'items' }).message).toBe('undefined');
    });
  });
});
