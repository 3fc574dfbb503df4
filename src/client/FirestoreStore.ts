/**
 * FirestoreStore - DocumentStore backed by the Firebase Firestore SDK
 *
 * @example
 * ```typescript
 * import { FirestoreStore, QueryClient } from 'firestore-typed-query';
 *
 * // Created lazily on first use from app options
 * const store = new FirestoreStore({
 *   firebaseOptions: { projectId: 'demo-project' },
 *   emulator: { host: '127.0.0.1', port: 8080 },
 * });
 *
 * // Or wrap an existing Firestore handle
 * const shared = new FirestoreStore(getFirestore(app));
 *
 * const client = new QueryClient({ store });
 * ```
 */

import { getApps, initializeApp } from 'firebase/app';
import type { FirebaseApp, FirebaseOptions } from 'firebase/app';
import {
  Firestore,
  collection,
  connectFirestoreEmulator,
  deleteDoc,
  doc,
  getDoc,
  getDocs,
  getFirestore,
  limit,
  orderBy,
  query,
  setDoc,
  Timestamp,
  updateDoc,
  where,
} from 'firebase/firestore';
import type { QueryConstraint } from 'firebase/firestore';
import type { QueryDescriptor } from '../builder/types.js';
import type { DocumentData, DocumentStore, StoredDocument, WriteOptions } from './types.js';
import { collectionPath } from './paths.js';

/** Name Firebase gives an app initialized without one */
export const DEFAULT_APP_NAME = '[DEFAULT]';

/** Store configuration options */
export interface FirestoreStoreConfig {
  /**
   * Options for initializing the Firebase app.
   * Required unless an app named `appName` is already initialized.
   */
  firebaseOptions?: FirebaseOptions;

  /**
   * Firebase app to use or create
   * @default '[DEFAULT]'
   */
  appName?: string;

  /**
   * Named database within the project
   * @default '(default)'
   */
  databaseId?: string;

  /** Connect to a local Firestore emulator instead of production */
  emulator?: {
    host: string;
    port: number;
  };
}

/**
 * Translate a descriptor into SDK constraints: filters, then orders, then limit
 */
export function toQueryConstraints(descriptor: QueryDescriptor): QueryConstraint[] {
  const constraints: QueryConstraint[] = [];

  for (const filter of descriptor.filters) {
    constraints.push(where(filter.field, filter.operator, filter.value));
  }
  for (const order of descriptor.orders) {
    constraints.push(orderBy(order.field, order.direction));
  }
  if (descriptor.limit !== undefined) {
    constraints.push(limit(descriptor.limit));
  }

  return constraints;
}

function fromStoredValue(value: unknown): unknown {
  if (value instanceof Timestamp) {
    return value.toDate();
  }
  if (Array.isArray(value)) {
    return value.map((element) => fromStoredValue(element));
  }
  if (typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    return fromStoredData(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Convert SDK values in a read payload to plain ones: every Timestamp,
 * however deeply nested, becomes a Date
 */
export function fromStoredData(data: DocumentData): DocumentData {
  const result: DocumentData = {};
  for (const [field, value] of Object.entries(data)) {
    result[field] = fromStoredValue(value);
  }
  return result;
}

function resolveApp(config: FirestoreStoreConfig): FirebaseApp {
  const name = config.appName ?? DEFAULT_APP_NAME;
  const existing = getApps().find((app) => app.name === name);
  if (existing !== undefined) {
    return existing;
  }
  if (config.firebaseOptions === undefined) {
    throw new Error(`Firebase app '${name}' is not initialized and no firebaseOptions were given`);
  }
  return initializeApp(config.firebaseOptions, name);
}

export class FirestoreStore implements DocumentStore {
  private readonly config: FirestoreStoreConfig;
  private instance: Firestore | null;

  constructor(source: Firestore | FirestoreStoreConfig = {}) {
    if (source instanceof Firestore) {
      this.config = {};
      this.instance = source;
    } else {
      this.config = source;
      this.instance = null;
    }
  }

  /**
   * Firestore handle, created on first access and reused afterwards
   */
  get firestore(): Firestore {
    if (this.instance === null) {
      const app = resolveApp(this.config);
      const db =
        this.config.databaseId === undefined
          ? getFirestore(app)
          : getFirestore(app, this.config.databaseId);

      if (this.config.emulator !== undefined) {
        connectFirestoreEmulator(db, this.config.emulator.host, this.config.emulator.port);
      }
      this.instance = db;
    }
    return this.instance;
  }

  async runQuery(descriptor: QueryDescriptor): Promise<StoredDocument[]> {
    const ref = collection(this.firestore, collectionPath(descriptor.target));
    const snapshot = await getDocs(query(ref, ...toQueryConstraints(descriptor)));

    return snapshot.docs.map((document) => ({
      id: document.id,
      path: document.ref.path,
      data: fromStoredData(document.data()),
    }));
  }

  async getDocument(path: string): Promise<StoredDocument | null> {
    const snapshot = await getDoc(doc(this.firestore, path));
    if (!snapshot.exists()) {
      return null;
    }
    return { id: snapshot.id, path: snapshot.ref.path, data: fromStoredData(snapshot.data()) };
  }

  newDocumentId(path: string): string {
    return doc(collection(this.firestore, path)).id;
  }

  async setDocument(path: string, data: DocumentData, options: WriteOptions): Promise<void> {
    await setDoc(doc(this.firestore, path), data, { merge: options.merge });
  }

  async updateDocument(path: string, data: DocumentData): Promise<void> {
    await updateDoc(doc(this.firestore, path), data);
  }

  async deleteDocument(path: string): Promise<void> {
    await deleteDoc(doc(this.firestore, path));
  }
}
