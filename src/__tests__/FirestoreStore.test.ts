import { describe, it, expect } from 'vitest';
import { Firestore, Timestamp } from 'firebase/firestore';
import { FirestoreStore, fromStoredData, toQueryConstraints } from '../client/FirestoreStore.js';
import { QueryClient } from '../client/QueryClient.js';
import { StoreError } from '../client/errors.js';
import { MemoryStore } from '../client/MemoryStore.js';
import { Event, Item, createTestLogger } from './fixtures.js';

describe('toQueryConstraints()', () => {
  const client = new QueryClient({ store: new MemoryStore(), logger: createTestLogger() });

  it('should translate filters, then orders, then limit', () => {
    const descriptor = client
      .query(Item)
      .limit(5)
      .orderBy('price', { descending: true })
      .whereGreaterThanOrEqualTo('price', 10)
      .whereArrayContains('tags', 'sale')
      .toDescriptor();

    expect(toQueryConstraints(descriptor).map((constraint) => constraint.type)).toEqual([
      'where',
      'where',
      'orderBy',
      'limit',
    ]);
  });

  it('should produce no constraints for an empty query', () => {
    expect(toQueryConstraints(client.query(Item).toDescriptor())).toEqual([]);
  });

  it('should reject a non-positive limit', () => {
    expect(() => toQueryConstraints(client.query(Item).limit(0).toDescriptor())).toThrow(
      'Function limit() requires a positive number'
    );
  });
});

describe('fromStoredData()', () => {
  const at = new Date('2024-03-01T10:00:00.000Z');

  it('should turn nested Timestamps into Dates', () => {
    const data = fromStoredData({
      at: Timestamp.fromDate(at),
      meta: { seen: [Timestamp.fromDate(at)] },
      count: 2,
    });

    expect(data).toEqual({ at, meta: { seen: [at] }, count: 2 });
    expect(data['at']).toBeInstanceOf(Date);
  });

  it('should produce data a date schema decodes', () => {
    const data = fromStoredData({ at: Timestamp.fromDate(at), meta: { seen: [] }, count: 1 });

    expect(Event.decode({ id: 'e1', path: 'events/e1', data })).toEqual({
      id: 'e1',
      at,
      meta: { seen: [] },
      count: 1,
    });
  });

  it('should leave other values untouched', () => {
    expect(fromStoredData({ name: 'x', tags: ['a'], flag: null })).toEqual({ name: 'x', tags: ['a'], flag: null });
  });
});

describe('FirestoreStore', () => {
  it('should not touch Firebase until first use', () => {
    expect(() => new FirestoreStore({ appName: 'never-initialized' })).not.toThrow();
  });

  it('should fail on first use when the app cannot be resolved', () => {
    const store = new FirestoreStore({ appName: 'never-initialized' });
    expect(() => store.firestore).toThrow(
      "Firebase app 'never-initialized' is not initialized and no firebaseOptions were given"
    );
  });

  it('should surface initialization failures as StoreError', async () => {
    const client = new QueryClient({
      store: new FirestoreStore({ appName: 'never-initialized' }),
      logger: createTestLogger(),
    });

    await expect(client.query(Item).all()).rejects.toThrow(StoreError);
  });

  it('should create the Firestore handle lazily and reuse it', () => {
    const store = new FirestoreStore({
      appName: 'lazy-test-app',
      firebaseOptions: { projectId: 'demo-test-project' },
    });

    const first = store.firestore;
    expect(first).toBeInstanceOf(Firestore);
    expect(store.firestore).toBe(first);
  });

  it('should wrap an existing Firestore handle', () => {
    const owner = new FirestoreStore({
      appName: 'shared-test-app',
      firebaseOptions: { projectId: 'demo-test-project' },
    });
    const wrapped = new FirestoreStore(owner.firestore);
    expect(wrapped.firestore).toBe(owner.firestore);
  });

  it('should generate document IDs locally', () => {
    const store = new FirestoreStore({
      appName: 'id-test-app',
      firebaseOptions: { projectId: 'demo-test-project' },
    });
    expect(store.newDocumentId('items')).toMatch(/^[A-Za-z0-9]{20}$/);
  });
});
