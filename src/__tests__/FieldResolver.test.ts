import { describe, it, expect } from 'vitest';
import { createFieldResolver, deriveFieldPath } from '../builder/FieldResolver.js';

interface Listing {
  name: string;
  price: { amount: number; currency: string };
  cachedLabel: string;
}

describe('deriveFieldPath()', () => {
  it('should return top-level names unchanged', () => {
    expect(deriveFieldPath('name')).toBe('name');
  });

  it('should return nested paths unchanged', () => {
    expect(deriveFieldPath('address.city')).toBe('address.city');
  });

  it('should reject empty paths', () => {
    expect(deriveFieldPath('')).toBeUndefined();
  });

  it('should reject paths with empty segments', () => {
    expect(deriveFieldPath('address..city')).toBeUndefined();
    expect(deriveFieldPath('.city')).toBeUndefined();
  });

  it('should reject non-string references', () => {
    expect(deriveFieldPath(42)).toBeUndefined();
    expect(deriveFieldPath(undefined)).toBeUndefined();
  });
});

describe('createFieldResolver()', () => {
  describe('default derivation', () => {
    const resolver = createFieldResolver<Listing>();

    it('should resolve every derivable path to itself', () => {
      expect(resolver.resolve('name')).toBe('name');
      expect(resolver.resolve('price.amount')).toBe('price.amount');
    });

    it('should return undefined for underivable paths', () => {
      expect(resolver.resolve('')).toBeUndefined();
    });

    it('should use property names as stored names', () => {
      expect(resolver.storedName('cachedLabel')).toBe('cachedLabel');
    });
  });

  describe('lookup table overrides', () => {
    const resolver = createFieldResolver<Listing>({
      price: 'listing_price',
      cachedLabel: null,
    });

    it('should return the overridden name for remapped properties', () => {
      expect(resolver.resolve('price')).toBe('listing_price');
    });

    it('should remap only the first segment of nested paths', () => {
      expect(resolver.resolve('price.currency')).toBe('listing_price.currency');
    });

    it('should fall through to the default for unmapped properties', () => {
      expect(resolver.resolve('name')).toBe('name');
    });

    it('should return undefined for properties mapped to null', () => {
      expect(resolver.resolve('cachedLabel')).toBeUndefined();
      expect(resolver.storedName('cachedLabel')).toBeNull();
    });
  });

  describe('mapping function overrides', () => {
    const resolver = createFieldResolver<Listing>((property) => {
      if (property === 'name') return 'display_name';
      if (property === 'cachedLabel') return null;
      return undefined;
    });

    it('should use the returned name', () => {
      expect(resolver.resolve('name')).toBe('display_name');
    });

    it('should fall through when the function returns undefined', () => {
      expect(resolver.resolve('price.amount')).toBe('price.amount');
    });

    it('should return undefined when the function returns null', () => {
      expect(resolver.resolve('cachedLabel')).toBeUndefined();
    });
  });

  it('should treat an empty override as having no stored name', () => {
    const resolver = createFieldResolver<Listing>({ name: '' });
    expect(resolver.resolve('name')).toBeUndefined();
    expect(resolver.storedName('name')).toBeNull();
  });
});
