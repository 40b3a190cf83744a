import { describe, it, expect, beforeEach } from 'vitest';
import { TransactionHistory } from '../src/domain/services/TransactionHistory.js';
import { Transaction } from '../src/domain/entities/Transaction.js';
import { Customer } from '../src/domain/entities/Customer.js';
import { createProduct } from '../src/domain/entities/Product.js';
import { Barcode, Product, TransactionVariant } from '../src/domain/models.js';

const units = (barcode: Barcode, count: number): Product[] =>
  Array.from({ length: count }, () => createProduct(barcode));

const completed = (products: Product[], variant?: TransactionVariant): Transaction => {
  const customer = new Customer('Test', 1, 'Test Rd');
  products.forEach(p => customer.getCart().addProduct(p));
  const transaction = new Transaction(customer, variant);
  transaction.finalise();
  return transaction;
};

describe('TransactionHistory', () => {
  let history: TransactionHistory;

  beforeEach(() => {
    history = new TransactionHistory();
  });

  describe('empty history', () => {
    it('falls back to defaults', () => {
      expect(history.getLastTransaction()).toBeUndefined();
      expect(history.getHighestGrossingTransaction()).toBeUndefined();
      expect(history.getMostPopularProduct()).toBe('EGG');
      expect(history.getAverageSpendPerVisit()).toBe(0);
      expect(history.getAverageProductDiscount('MILK')).toBe(0);
      expect(history.getGrossEarnings()).toBe(0);
      expect(history.getTotalProductsSold()).toBe(0);
    });
  });

  it('remembers the last recorded transaction', () => {
    const first = completed(units('EGG', 1));
    const second = completed(units('JAM', 1));
    history.recordTransaction(first);
    history.recordTransaction(second);

    expect(history.getLastTransaction()).toBe(second);
    expect(history.getTotalTransactionsMade()).toBe(2);
  });

  describe('earnings and counts', () => {
    beforeEach(() => {
      history.recordTransaction(completed([...units('EGG', 3), ...units('MILK', 1)]));
      history.recordTransaction(completed(units('MILK', 2), { kind: 'specialSale', discounts: { MILK: 25 } }));
    });

    it('sums transaction totals', () => {
      // 590 + 660
      expect(history.getGrossEarnings()).toBe(1250);
    });

    it('sums base prices per type', () => {
      expect(history.getGrossEarnings('MILK')).toBe(1320);
      expect(history.getGrossEarnings('WOOL')).toBe(0);
    });

    it('counts products sold', () => {
      expect(history.getTotalProductsSold()).toBe(6);
      expect(history.getTotalProductsSold('MILK')).toBe(3);
      expect(history.getTotalProductsSold('JAM')).toBe(0);
    });

    it('averages spend per visit', () => {
      expect(history.getAverageSpendPerVisit()).toBe(625);
    });
  });

  describe('getHighestGrossingTransaction', () => {
    it('returns the first of equal maxima', () => {
      const small = completed(units('EGG', 10));
      const firstMax = completed(units('EGG', 24));
      const secondMax = completed(units('EGG', 24));
      history.recordTransaction(small);
      history.recordTransaction(firstMax);
      history.recordTransaction(secondMax);

      expect(small.getTotal()).toBe(500);
      expect(firstMax.getTotal()).toBe(1200);
      expect(history.getHighestGrossingTransaction()).toBe(firstMax);
    });
  });

  it('still finds the highest grossing sale when every total is negative', () => {
    const overDiscounted = completed(units('EGG', 1), { kind: 'specialSale', discounts: { EGG: 150 } });
    const worse = completed(units('EGG', 2), { kind: 'specialSale', discounts: { EGG: 150 } });
    history.recordTransaction(overDiscounted);
    history.recordTransaction(worse);

    expect(overDiscounted.getTotal()).toBe(-25);
    expect(history.getHighestGrossingTransaction()).toBe(overDiscounted);
  });

  describe('getMostPopularProduct', () => {
    it('picks the type with most units sold', () => {
      history.recordTransaction(completed([...units('EGG', 1), ...units('WOOL', 2)]));
      history.recordTransaction(completed(units('WOOL', 1)));

      expect(history.getMostPopularProduct()).toBe('WOOL');
    });

    it('breaks ties by catalogue order', () => {
      history.recordTransaction(completed(units('JAM', 2)));
      history.recordTransaction(completed(units('MILK', 2)));

      expect(history.getMostPopularProduct()).toBe('MILK');
    });
  });

  describe('getAverageProductDiscount', () => {
    it('divides by every recorded transaction', () => {
      history.recordTransaction(completed(units('MILK', 1), { kind: 'specialSale', discounts: { MILK: 20 } }));
      history.recordTransaction(completed(units('EGG', 1), { kind: 'specialSale', discounts: { MILK: 10 } }));
      history.recordTransaction(completed(units('MILK', 1)));

      expect(history.getAverageProductDiscount('MILK')).toBe(10);
      expect(history.getAverageProductDiscount('EGG')).toBe(0);
    });
  });
});
