import { Barcode, DiscountMap, Product, STOCK_CATALOGUE } from '../models.js';
import { countOfType, purchasedTypes, sumBasePrices } from '../purchases.js';

export interface IPricingStrategy {
  discountFor(barcode: Barcode): number;
  subtotal(barcode: Barcode, quantity: number): number;
  total(purchases: readonly Product[]): number;
}

// exact ceiling in integer cents - fractional cents always go to the shop
export function discountedSubtotal(quantity: number, unitPrice: number, percentage: number): number {
  return Math.ceil((quantity * unitPrice * (100 - percentage)) / 100);
}

// every unit at its base price
export class StandardPricingStrategy implements IPricingStrategy {
  discountFor(_barcode: Barcode): number {
    return 0;
  }

  subtotal(barcode: Barcode, quantity: number): number {
    return quantity * STOCK_CATALOGUE[barcode].basePrice;
  }

  total(purchases: readonly Product[]): number {
    return sumBasePrices(purchases);
  }
}

/**
 * Store-wide percentage discounts on nominated stock types.
 * Percentages are taken as given; callers keep them within 0-100.
 */
export class SpecialSalePricingStrategy implements IPricingStrategy {
  private readonly discounts: DiscountMap;

  constructor(discounts: DiscountMap) {
    this.discounts = { ...discounts };
  }

  discountFor(barcode: Barcode): number {
    return this.discounts[barcode] ?? 0;
  }

  subtotal(barcode: Barcode, quantity: number): number {
    const percentage = this.discounts[barcode];
    const unitPrice = STOCK_CATALOGUE[barcode].basePrice;
    if (percentage === undefined) {
      return quantity * unitPrice;
    }
    return discountedSubtotal(quantity, unitPrice, percentage);
  }

  total(purchases: readonly Product[]): number {
    return purchasedTypes(purchases).reduce(
      (sum, barcode) => sum + this.subtotal(barcode, countOfType(purchases, barcode)),
      0
    );
  }
}
