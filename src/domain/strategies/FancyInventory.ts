import { BARCODES, Barcode, Product, QUALITIES, Quality } from '../models.js';
import { createProduct } from '../entities/Product.js';
import { InvalidStockRequestError } from '../errors/index.js';
import { IInventoryStrategy } from './IInventoryStrategy.js';

// supports bulk stocking and bulk removal, keeps stock ordered by type on read
export class FancyInventory implements IInventoryStrategy {
  private products: Product[] = [];

  addProduct(barcode: Barcode, quality: Quality, quantity: number = 1): void {
    this.validateQuantity(quantity);
    for (let i = 0; i < quantity; i++) {
      this.products.push(createProduct(barcode, quality));
    }
  }

  existsProduct(barcode: Barcode): boolean {
    return this.products.some(p => p.barcode === barcode);
  }

  /**
   * Takes up to `quantity` units, best tier first. Running out of stock is
   * not an error: the caller gets back however many units were available.
   */
  removeProduct(barcode: Barcode, quantity: number = 1): Product[] {
    this.validateQuantity(quantity);
    const removed: Product[] = [];

    for (let tier = QUALITIES.length - 1; tier >= 0 && removed.length < quantity; tier--) {
      for (const product of this.products) {
        if (removed.length >= quantity) break;
        if (product.barcode === barcode && product.quality === QUALITIES[tier]) {
          removed.push(product);
        }
      }
    }

    // equal products are still separate units, so drop by reference
    const taken = new Set(removed);
    this.products = this.products.filter(p => !taken.has(p));
    return removed;
  }

  getAllProducts(): Product[] {
    return BARCODES.flatMap(barcode => this.products.filter(p => p.barcode === barcode));
  }

  getStockedQuantity(barcode: Barcode): number {
    return this.products.filter(p => p.barcode === barcode).length;
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidStockRequestError('Quantity must be a whole number of at least 1.');
    }
  }
}
