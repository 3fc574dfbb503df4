/**
 * Collection and document path helpers
 */

import type { CollectionTarget } from '../builder/types.js';
import type { DocumentRef } from './types.js';
import { InvalidPathError } from './errors.js';

function splitPath(path: string): string[] {
  return path.replace(/^\/+|\/+$/g, '').split('/');
}

/**
 * Normalise a parent document given as a reference or a path.
 * A document path has an even, non-zero number of non-empty segments.
 */
export function normalizeParentPath(parent: DocumentRef | string, collection: string): string {
  const raw = typeof parent === 'string' ? parent : parent.path;
  const segments = splitPath(raw);

  if (segments.length % 2 !== 0 || segments.some((segment) => segment === '')) {
    throw new InvalidPathError(`'${raw}' is not a document path`, { collection });
  }
  return segments.join('/');
}

export function assertCollectionName(collection: string): void {
  if (collection === '' || collection.includes('/')) {
    throw new InvalidPathError(`Invalid collection name '${collection}'`, { collection });
  }
}

export function assertDocumentId(collection: string, documentId: string): void {
  if (documentId === '' || documentId.includes('/')) {
    throw new InvalidPathError(`Invalid document ID '${documentId}'`, { collection, documentId });
  }
}

export function collectionPath(target: CollectionTarget): string {
  return target.parentPath === undefined
    ? target.collection
    : `${target.parentPath}/${target.collection}`;
}

export function documentPath(target: CollectionTarget, documentId: string): string {
  return `${collectionPath(target)}/${documentId}`;
}

export function documentRef(target: CollectionTarget, documentId: string): DocumentRef {
  return { id: documentId, path: documentPath(target, documentId) };
}

/** Last segment of a document path */
export function documentIdOf(path: string): string {
  const segments = splitPath(path);
  return segments[segments.length - 1] ?? '';
}
