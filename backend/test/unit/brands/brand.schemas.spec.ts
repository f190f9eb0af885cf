import { describe, it, expect } from 'vitest';
import {
  createBrandSchema,
  listBrandsQuerySchema,
  updateBrandSchema,
} from '../../../src/modules/brands/brand.schemas';

describe('listBrandsQuerySchema', () => {
  it('defaults limit to 50 and offset to 0', () => {
    expect(listBrandsQuerySchema.parse({})).toEqual({ limit: 50, offset: 0 });
  });

  it('coerces query-string numbers', () => {
    expect(listBrandsQuerySchema.parse({ categoryId: '4', limit: '10', offset: '20' })).toEqual({
      categoryId: 4,
      limit: 10,
      offset: 20,
    });
  });

  it('bounds limit to 1..100', () => {
    expect(listBrandsQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
    expect(listBrandsQuerySchema.safeParse({ limit: '100' }).success).toBe(true);
    expect(listBrandsQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
  });
});

describe('createBrandSchema', () => {
  it('fills optional fields', () => {
    expect(createBrandSchema.parse({ name: ' Pepper ', slug: 'pepper' })).toEqual({
      name: 'Pepper',
      slug: 'pepper',
      description: null,
      categoryId: null,
      configuration: {},
      enrichmentData: {},
    });
  });

  it.each(['Upper', 'double--hyphen', '-leading', 'trailing-', 'under_score', 'a'.repeat(256)])(
    'rejects slug %s',
    (slug) => {
      expect(createBrandSchema.safeParse({ name: 'x', slug }).success).toBe(false);
    },
  );

  it('rejects non-object configuration', () => {
    expect(
      createBrandSchema.safeParse({ name: 'x', slug: 'x', configuration: ['not', 'an', 'object'] })
        .success,
    ).toBe(false);
  });
});

describe('updateBrandSchema', () => {
  it('requires at least one field', () => {
    expect(updateBrandSchema.safeParse({}).success).toBe(false);
  });

  it('does not allow changing the slug', () => {
    expect(updateBrandSchema.safeParse({ slug: 'new-slug' }).success).toBe(false);
  });

  it('allows clearing description and category', () => {
    expect(updateBrandSchema.parse({ description: null, categoryId: null })).toEqual({
      description: null,
      categoryId: null,
    });
  });
});
