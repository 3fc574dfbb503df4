import { vi } from 'vitest';
import { z } from 'zod';
import { defineRecord } from '../record/RecordType.js';
import type { Logger } from '../client/logger.js';

export const itemSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  price: z.number().nonnegative(),
  tags: z.array(z.string()).default([]),
  dimensions: z.object({ width: z.number(), height: z.number() }).optional(),
});

export type Item = z.infer<typeof itemSchema>;

export const Item = defineRecord({
  collection: 'items',
  schema: itemSchema,
  idField: 'id',
});

/** Stored as `price_cents`; `displayLabel` is never stored */
export const Product = defineRecord({
  collection: 'products',
  schema: z.object({
    id: z.string().optional(),
    name: z.string(),
    price: z.number(),
    displayLabel: z.string().optional(),
  }),
  idField: 'id',
  fieldNames: { price: 'price_cents', displayLabel: null },
});

export const Message = defineRecord({
  collection: 'messages',
  schema: z.object({
    id: z.string().optional(),
    text: z.string(),
    sentAt: z.number(),
  }),
  idField: 'id',
});

export const Event = defineRecord({
  collection: 'events',
  schema: z.object({
    id: z.string().optional(),
    at: z.date(),
    meta: z.object({ seen: z.array(z.date()), note: z.string().optional() }),
    count: z.number(),
  }),
  idField: 'id',
});

export function createTestLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
  return logger;
}
