import { Barcode, Product, QUALITIES, Quality } from '../models.js';
import { createProduct } from '../entities/Product.js';
import { FailedTransactionError, InvalidStockRequestError } from '../errors/index.js';
import { IInventoryStrategy } from './IInventoryStrategy.js';

// stores and hands out products one at a time only
export class BasicInventory implements IInventoryStrategy {
  private products: Product[] = [];

  addProduct(barcode: Barcode, quality: Quality, quantity?: number): void {
    if (quantity !== undefined && quantity !== 1) {
      throw new InvalidStockRequestError(
        'Current inventory is not fancy enough. Please supply products one at a time.'
      );
    }
    this.products.push(createProduct(barcode, quality));
  }

  existsProduct(barcode: Barcode): boolean {
    return this.products.some(p => p.barcode === barcode);
  }

  removeProduct(barcode: Barcode, quantity?: number): Product[] {
    if (quantity !== undefined) {
      throw new FailedTransactionError(
        'Current inventory is not fancy enough. Please purchase products one at a time.'
      );
    }

    for (let tier = QUALITIES.length - 1; tier >= 0; tier--) {
      const idx = this.products.findIndex(
        p => p.barcode === barcode && p.quality === QUALITIES[tier]
      );
      if (idx >= 0) {
        return this.products.splice(idx, 1);
      }
    }
    return [];
  }

  getAllProducts(): Product[] {
    return [...this.products];
  }
}
