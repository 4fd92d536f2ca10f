import { describe, it, expect } from 'vitest';
import { Product, PRODUCT_NAME_MAX_LENGTH } from '../../src/domain/models/Product.js';
import { ValidationError } from '../../src/shared/errors/index.js';

describe('Product', () => {
  describe('create', () => {
    it('should trim the name and start unpersisted', () => {
      const product = Product.create({ name: '  Standing Desk  ' });

      expect(product.name).toBe('Standing Desk');
      expect(product.id).toBe(0);
      expect(product.isPersisted).toBe(false);
      expect(product.updatedAt).toEqual(product.createdAt);
    });

    it('should reject a blank name', () => {
      expect(() => Product.create({ name: '   ' })).toThrow(ValidationError);
      expect(() => Product.create({ name: '   ' })).toThrow('Product name must not be blank');
    });

    it('should accept a name at the maximum length', () => {
      const name = 'x'.repeat(PRODUCT_NAME_MAX_LENGTH);

      expect(Product.create({ name }).name).toBe(name);
    });

    it('should reject a name over the maximum length', () => {
      expect(() => Product.create({ name: 'x'.repeat(PRODUCT_NAME_MAX_LENGTH + 1) })).toThrow(
        `Product name must be at most ${PRODUCT_NAME_MAX_LENGTH} characters`
      );
    });
  });

  describe('withId', () => {
    it('should return a persisted copy', () => {
      const draft = Product.create({ name: 'Lamp' });
      const saved = draft.withId(7);

      expect(saved.id).toBe(7);
      expect(saved.isPersisted).toBe(true);
      expect(saved.name).toBe('Lamp');
      expect(saved.createdAt).toEqual(draft.createdAt);
      expect(draft.id).toBe(0);
    });

    it.each([0, -1, 1.5])('should reject id %s', (id) => {
      expect(() => Product.create({ name: 'Lamp' }).withId(id)).toThrow(ValidationError);
    });
  });

  describe('rename', () => {
    it('should update the name and the modification time', () => {
      const product = new Product({
        id: 1,
        name: 'Lamp',
        createdAt: new Date('2024-01-01T00:00:00.000Z'),
      });

      expect(product.rename('  Desk Lamp ')).toBe(true);
      expect(product.name).toBe('Desk Lamp');
      expect(product.updatedAt.getTime()).toBeGreaterThan(product.createdAt.getTime());
    });

    it('should report no change for the same normalized name', () => {
      const product = new Product({ id: 1, name: 'Lamp' });

      expect(product.rename(' Lamp ')).toBe(false);
    });
  });

  it('should compare names case-insensitively', () => {
    const product = new Product({ id: 1, name: 'Desk Lamp' });

    expect(product.hasSameName(' desk lamp ')).toBe(true);
    expect(product.hasSameName('Floor Lamp')).toBe(false);
  });

  it('should rebuild from a cached row with string timestamps', () => {
    const product = Product.fromPersistence({
      id: 3,
      name: 'Chair',
      created_at: '2024-02-01T10:00:00.000Z',
      updated_at: '2024-02-02T10:00:00.000Z',
    });

    expect(product.toJSON()).toEqual({
      id: 3,
      name: 'Chair',
      createdAt: '2024-02-01T10:00:00.000Z',
      updatedAt: '2024-02-02T10:00:00.000Z',
    });
  });
});
