/**
 * RecordType - Declares how one record type maps onto a document collection
 *
 * @example
 * ```typescript
 * const Product = defineRecord({
 *   collection: 'products',
 *   schema: z.object({ id: z.string(), name: z.string(), price: z.number() }),
 *   idField: 'id',
 *   fieldNames: { price: 'price_cents' },
 * });
 * ```
 */

import { z } from 'zod';
import { createFieldResolver } from '../builder/FieldResolver.js';
import type { FieldNameOverrides, FieldResolver } from '../builder/FieldResolver.js';
import type { UpdateFields } from '../builder/types.js';
import type { DocumentData, DocumentRef, DocumentStore, StoredDocument } from '../client/types.js';
import { assertCollectionName } from '../client/paths.js';

/** Passed to a record type's custom loader */
export interface RecordLoadContext<T> {
  store: DocumentStore;
  decode(document: StoredDocument): T;
}

/** Builds one record from a document reference */
export type RecordLoader<T> = (ref: DocumentRef, context: RecordLoadContext<T>) => Promise<T>;

export interface RecordDefinition<T> {
  /** Collection name; for subcollections only the last segment, e.g. 'messages' */
  collection: string;
  /** Schema every decoded record and typed write must satisfy */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Property that receives the document ID and is never stored as a field */
  idField?: NoInfer<keyof T & string>;
  /** Stored field names that differ from property names */
  fieldNames?: NoInfer<FieldNameOverrides<T>>;
  /** Custom construction from a document reference */
  load?: NoInfer<RecordLoader<T>>;
}

export interface RecordType<T> {
  readonly collection: string;
  readonly idField: (keyof T & string) | undefined;
  readonly resolver: FieldResolver;
  readonly load: RecordLoader<T> | undefined;

  /** Validate a record and convert it to a stored payload */
  encode(record: T): DocumentData;
  /** Convert a stored document to a validated record */
  decode(document: StoredDocument): T;
  /** Validate a partial update and convert its keys to stored field paths */
  encodeUpdate(fields: UpdateFields<T>): DocumentData;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMap(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/** Drop undefined entries from nested maps; the store rejects undefined field values */
function stripUndefined(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((element) => stripUndefined(element));
  }
  if (!isMap(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      result[key] = stripUndefined(entry);
    }
  }
  return result;
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  return schema;
}

/**
 * Find the schema of the value at a property path, if the schema is made of
 * plain objects down to it
 */
export function schemaAt(schema: z.ZodTypeAny, segments: readonly string[]): z.ZodTypeAny | undefined {
  let current: z.ZodTypeAny = schema;
  for (const segment of segments) {
    const container = unwrap(current);
    if (!(container instanceof z.ZodObject)) {
      return undefined;
    }
    const shape: z.ZodRawShape = container.shape;
    const next = shape[segment];
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }
  return current;
}

function knownProperties(schema: z.ZodTypeAny, fieldNames: object | undefined): string[] {
  const properties = new Set<string>();
  const container = unwrap(schema);
  if (container instanceof z.ZodObject) {
    const shape: z.ZodRawShape = container.shape;
    for (const key of Object.keys(shape)) {
      properties.add(key);
    }
  }
  if (fieldNames !== undefined && typeof fieldNames !== 'function') {
    for (const key of Object.keys(fieldNames)) {
      properties.add(key);
    }
  }
  return [...properties];
}

/**
 * Declare a record type
 */
export function defineRecord<T>(definition: RecordDefinition<T>): RecordType<T> {
  const { collection, schema, idField, fieldNames, load } = definition;
  assertCollectionName(collection);

  const resolver = createFieldResolver<T>(fieldNames);

  // stored name -> property, for every property whose stored name is known
  const properties = knownProperties(schema, fieldNames);
  const propertyByStoredName = new Map<string, string>();
  const remapped = new Set<string>();
  for (const property of properties) {
    const stored = resolver.storedName(property);
    if (stored !== property) {
      remapped.add(property);
    }
    if (stored !== null) {
      propertyByStoredName.set(stored, property);
    }
  }

  const toProperty = (storedKey: string): string | null => {
    const property = propertyByStoredName.get(storedKey);
    if (property !== undefined) {
      return property;
    }
    // A stored key shadowing a remapped property is not that property
    return remapped.has(storedKey) ? null : storedKey;
  };

  return {
    collection,
    idField,
    resolver,
    load,

    encode(record: T): DocumentData {
      const parsed = schema.safeParse(record);
      if (!parsed.success) {
        throw new Error(`Invalid ${collection} record: ${formatIssues(parsed.error)}`);
      }
      if (!isPlainObject(parsed.data)) {
        throw new Error(`Invalid ${collection} record: expected an object`);
      }

      const payload: DocumentData = {};
      for (const [property, value] of Object.entries(parsed.data)) {
        if (property === idField || value === undefined) continue;
        const stored = resolver.storedName(property);
        if (stored === null) continue;
        payload[stored] = stripUndefined(value);
      }
      return payload;
    },

    decode(document: StoredDocument): T {
      const input: Record<string, unknown> = {};
      for (const [storedKey, value] of Object.entries(document.data)) {
        const property = toProperty(storedKey);
        if (property !== null) {
          input[property] = value;
        }
      }
      if (idField !== undefined) {
        input[idField] = document.id;
      }

      const parsed = schema.safeParse(input);
      if (!parsed.success) {
        throw new Error(`Could not decode document '${document.path}': ${formatIssues(parsed.error)}`);
      }
      return parsed.data;
    },

    encodeUpdate(fields: UpdateFields<T>): DocumentData {
      const payload: DocumentData = {};
      for (const [path, value] of Object.entries(fields)) {
        if (value === undefined) continue;
        if (path === idField) {
          throw new Error(`'${path}' holds the document ID and cannot be updated`);
        }

        const stored = resolver.resolve(path);
        if (stored === undefined) {
          throw new Error(`No stored field for '${path}' in collection '${collection}'`);
        }

        const fieldSchema = schemaAt(schema, path.split('.'));
        if (fieldSchema === undefined) {
          payload[stored] = stripUndefined(value);
          continue;
        }
        const parsed = fieldSchema.safeParse(value);
        if (!parsed.success) {
          throw new Error(`Invalid value for '${path}': ${formatIssues(parsed.error)}`);
        }
        payload[stored] = stripUndefined(parsed.data);
      }
      return payload;
    },
  };
}
