/**
 * firestore-typed-query - Fluent, type-checked queries over the Firestore SDK
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { QueryClient, FirestoreStore, defineRecord } from 'firestore-typed-query';
 *
 * const Item = defineRecord({
 *   collection: 'items',
 *   schema: z.object({ id: z.string().optional(), name: z.string(), price: z.number() }),
 *   idField: 'id',
 * });
 *
 * const client = new QueryClient({
 *   store: new FirestoreStore({ firebaseOptions: { projectId: 'demo-project' } }),
 * });
 *
 * const topFive = await client
 *   .query(Item)
 *   .whereGreaterThanOrEqualTo('price', 10)
 *   .orderBy('price', { descending: true })
 *   .limit(5)
 *   .all();
 * ```
 */

export * from './builder/index.js';
export * from './record/index.js';
export * from './client/index.js';
