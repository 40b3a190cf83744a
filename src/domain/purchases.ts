import { BARCODES, Barcode, Product } from './models.js';

/**
 * Grouping helpers shared by every transaction kind and the sales history.
 * Types always come back in catalogue order.
 */

export function purchasedTypes(purchases: readonly Product[]): Barcode[] {
  return BARCODES.filter(barcode => purchases.some(p => p.barcode === barcode));
}

export function groupByType(purchases: readonly Product[]): Map<Barcode, Product[]> {
  const groups = new Map<Barcode, Product[]>();
  for (const barcode of purchasedTypes(purchases)) {
    groups.set(barcode, purchases.filter(p => p.barcode === barcode));
  }
  return groups;
}

export function countOfType(purchases: readonly Product[], barcode: Barcode): number {
  return purchases.filter(p => p.barcode === barcode).length;
}

export function sumBasePrices(purchases: readonly Product[]): number {
  return purchases.reduce((sum, p) => sum + p.basePrice, 0);
}

export function formatCents(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}
