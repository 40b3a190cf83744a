import { describe, it, expect, beforeEach } from 'vitest';
import { BasicInventory } from '../src/domain/strategies/BasicInventory.js';
import { FailedTransactionError, InvalidStockRequestError } from '../src/domain/errors/index.js';

describe('BasicInventory', () => {
  let inventory: BasicInventory;

  beforeEach(() => {
    inventory = new BasicInventory();
  });

  describe('addProduct', () => {
    it('stores single units', () => {
      inventory.addProduct('EGG', 'REGULAR');
      inventory.addProduct('MILK', 'GOLD');

      expect(inventory.getAllProducts()).toHaveLength(2);
    });

    it('accepts an explicit quantity of 1', () => {
      inventory.addProduct('EGG', 'REGULAR', 1);

      expect(inventory.getAllProducts()).toHaveLength(1);
    });

    it('rejects bulk quantities', () => {
      expect(() => inventory.addProduct('EGG', 'REGULAR', 2)).toThrow(InvalidStockRequestError);
      expect(() => inventory.addProduct('EGG', 'REGULAR', 0)).toThrow(InvalidStockRequestError);
      expect(inventory.getAllProducts()).toHaveLength(0);
    });
  });

  describe('existsProduct', () => {
    it('reports stocked types only', () => {
      inventory.addProduct('JAM', 'SILVER');

      expect(inventory.existsProduct('JAM')).toBe(true);
      expect(inventory.existsProduct('WOOL')).toBe(false);
    });
  });

  describe('removeProduct', () => {
    it('removes the highest quality unit', () => {
      inventory.addProduct('MILK', 'REGULAR');
      inventory.addProduct('MILK', 'IRIDIUM');
      inventory.addProduct('MILK', 'SILVER');

      const removed = inventory.removeProduct('MILK');

      expect(removed).toHaveLength(1);
      expect(removed[0].quality).toBe('IRIDIUM');
      expect(inventory.getAllProducts()).toHaveLength(2);
    });

    it('returns empty list when type is not stocked', () => {
      inventory.addProduct('EGG', 'REGULAR');

      expect(inventory.removeProduct('WOOL')).toEqual([]);
      expect(inventory.getAllProducts()).toHaveLength(1);
    });

    it('always fails for the quantity form', () => {
      inventory.addProduct('EGG', 'REGULAR');

      expect(() => inventory.removeProduct('EGG', 1)).toThrow(FailedTransactionError);
      expect(() => inventory.removeProduct('EGG', 3)).toThrow(FailedTransactionError);
      expect(inventory.existsProduct('EGG')).toBe(true);
    });
  });

  it('returns a copy of its stock', () => {
    inventory.addProduct('EGG', 'REGULAR');
    inventory.getAllProducts().pop();

    expect(inventory.getAllProducts()).toHaveLength(1);
  });
});
