import { BARCODES, Barcode, DEFAULT_POPULAR_PRODUCT } from '../models.js';
import { Transaction } from '../entities/Transaction.js';
import { countOfType } from '../purchases.js';

/**
 * Append-only record of completed sales. Every statistic is recomputed from
 * the log on demand, and ties go to whichever came first (record order for
 * transactions, catalogue order for stock types).
 */
export class TransactionHistory {
  private transactions: Transaction[] = [];

  // callers only record finalised transactions
  recordTransaction(transaction: Transaction): void {
    this.transactions.push(transaction);
  }

  getLastTransaction(): Transaction | undefined {
    return this.transactions[this.transactions.length - 1];
  }

  getGrossEarnings(barcode?: Barcode): number {
    if (barcode === undefined) {
      return this.transactions.reduce((sum, t) => sum + t.getTotal(), 0);
    }
    // base prices only, discounts are not attributed per type
    return this.transactions.reduce(
      (sum, t) =>
        sum + t.getPurchases().reduce((acc, p) => (p.barcode === barcode ? acc + p.basePrice : acc), 0),
      0
    );
  }

  getTotalTransactionsMade(): number {
    return this.transactions.length;
  }

  getTotalProductsSold(barcode?: Barcode): number {
    return this.transactions.reduce((sum, t) => {
      const purchases = t.getPurchases();
      return sum + (barcode === undefined ? purchases.length : countOfType(purchases, barcode));
    }, 0);
  }

  getHighestGrossingTransaction(): Transaction | undefined {
    let highest: Transaction | undefined;
    let highestTotal = -Infinity;
    for (const t of this.transactions) {
      const total = t.getTotal();
      if (total > highestTotal) {
        highest = t;
        highestTotal = total;
      }
    }
    return highest;
  }

  getMostPopularProduct(): Barcode {
    let popular = DEFAULT_POPULAR_PRODUCT;
    let popularCount = 0;
    for (const barcode of BARCODES) {
      const sold = this.getTotalProductsSold(barcode);
      if (sold > popularCount) {
        popular = barcode;
        popularCount = sold;
      }
    }
    return popular;
  }

  // cents, may be fractional
  getAverageSpendPerVisit(): number {
    const count = this.getTotalTransactionsMade();
    return count > 0 ? this.getGrossEarnings() / count : 0;
  }

  /**
   * Mean configured discount for a stock type. The denominator is every
   * recorded transaction, including ones without that type or any sale.
   */
  getAverageProductDiscount(barcode: Barcode): number {
    const count = this.getTotalTransactionsMade();
    if (count === 0) return 0;
    const discounts = this.transactions
      .filter(t => t.kind === 'specialSale')
      .reduce((sum, t) => sum + t.getDiscountAmount(barcode), 0);
    return discounts > 0 ? discounts / count : 0;
  }
}
