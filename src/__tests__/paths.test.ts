import { describe, it, expect } from 'vitest';
import {
  assertDocumentId,
  collectionPath,
  documentIdOf,
  documentRef,
  normalizeParentPath,
} from '../client/paths.js';
import { InvalidPathError } from '../client/errors.js';

describe('paths', () => {
  describe('normalizeParentPath()', () => {
    it('should trim slashes from document paths', () => {
      expect(normalizeParentPath('/users/u1/', 'messages')).toBe('users/u1');
      expect(normalizeParentPath({ id: 'r1', path: 'users/u1/rooms/r1' }, 'messages')).toBe('users/u1/rooms/r1');
    });

    it('should reject collection paths and empty segments', () => {
      expect(() => normalizeParentPath('users', 'messages')).toThrow("'users' is not a document path");
      expect(() => normalizeParentPath('users//u1/x', 'messages')).toThrow(InvalidPathError);
      expect(() => normalizeParentPath('', 'messages')).toThrow(InvalidPathError);
    });
  });

  describe('assertDocumentId()', () => {
    it('should reject empty IDs and IDs containing a slash', () => {
      expect(() => assertDocumentId('items', '')).toThrow("Invalid document ID ''");
      expect(() => assertDocumentId('items', 'a/b')).toThrow("Invalid document ID 'a/b'");
      expect(() => assertDocumentId('items', 'i1')).not.toThrow();
    });
  });

  it('should join collection and document paths', () => {
    expect(collectionPath({ collection: 'items' })).toBe('items');
    expect(collectionPath({ collection: 'messages', parentPath: 'users/u1' })).toBe('users/u1/messages');
    expect(documentRef({ collection: 'messages', parentPath: 'users/u1' }, 'm1')).toEqual({
      id: 'm1',
      path: 'users/u1/messages/m1',
    });
  });

  it('should take the last segment as document ID', () => {
    expect(documentIdOf('users/u1/messages/m1/')).toBe('m1');
  });
});
