import { Barcode, Product, Quality, STOCK_CATALOGUE } from '../models.js';

export function createProduct(barcode: Barcode, quality: Quality = 'REGULAR'): Product {
  const { displayName, basePrice } = STOCK_CATALOGUE[barcode];
  return Object.freeze({ barcode, quality, displayName, basePrice });
}

// identity is (barcode, quality) only - equal products are interchangeable
export function productEquals(a: Product, b: Product): boolean {
  return a.barcode === b.barcode && a.quality === b.quality;
}

export function formatProduct(product: Product): string {
  return `${product.displayName}: ${product.basePrice}c *${product.quality}*`;
}
