/**
 * FieldResolver - Maps typed field paths to the field names used by the store
 *
 * The default derivation is structural: the stored name is the property path
 * itself (`address.city`). Record types whose stored names diverge from their
 * property names register overrides once, either as a lookup table or as a
 * mapping function. Overrides apply to the first segment of a path; the rest
 * of the path is kept as written.
 */

/** Lookup table form of field name overrides. `null` marks a property with no stored field. */
export type FieldNameMap<T> = {
  readonly [K in keyof T & string]?: string | null;
};

/**
 * Function form of field name overrides.
 * Return a string to remap, `null` for "not stored", `undefined` to fall through.
 */
export type FieldNameMapper = (property: string) => string | null | undefined;

export type FieldNameOverrides<T> = FieldNameMap<T> | FieldNameMapper;

export interface FieldResolver {
  /**
   * Resolve a property path to its stored field path
   *
   * @returns The stored path, or undefined when no name can be derived
   */
  resolve(path: string): string | undefined;

  /** Resolve a single top-level property, `null` when it has no stored field */
  storedName(property: string): string | null;
}

/**
 * Derive the stored path from the structure of the reference alone
 */
export function deriveFieldPath(path: unknown): string | undefined {
  if (typeof path !== 'string' || path === '') {
    return undefined;
  }
  const segments = path.split('.');
  if (segments.some((segment) => segment.trim() === '')) {
    return undefined;
  }
  return segments.join('.');
}

function toLookup<T>(overrides: FieldNameOverrides<T> | undefined): FieldNameMapper {
  if (overrides === undefined) {
    return () => undefined;
  }
  if (typeof overrides === 'function') {
    return overrides;
  }

  const table = new Map<string, string | null>();
  for (const [property, stored] of Object.entries(overrides)) {
    if (typeof stored === 'string' || stored === null) {
      table.set(property, stored);
    }
  }
  return (property) => table.get(property);
}

/**
 * Create a resolver for one record type
 *
 * @example
 * const resolver = createFieldResolver<Product>({ price: 'price_cents', cachedLabel: null });
 * resolver.resolve('price');          // 'price_cents'
 * resolver.resolve('name');           // 'name'
 * resolver.resolve('cachedLabel');    // undefined
 */
export function createFieldResolver<T>(overrides?: FieldNameOverrides<T>): FieldResolver {
  const lookup = toLookup(overrides);

  const storedName = (property: string): string | null => {
    const override = lookup(property);
    if (override === undefined) {
      return property;
    }
    if (override === null || override === '') {
      return null;
    }
    return override;
  };

  return {
    resolve(path: string): string | undefined {
      const derived = deriveFieldPath(path);
      if (derived === undefined) {
        return undefined;
      }

      const [head, ...rest] = derived.split('.');
      if (head === undefined) {
        return undefined;
      }

      const mappedHead = storedName(head);
      if (mappedHead === null) {
        return undefined;
      }
      return [mappedHead, ...rest].join('.');
    },

    storedName,
  };
}
