import { Barcode, Product, Quality } from '../models.js';

/**
 * Storage and selection policy for stock. Implementations differ in what
 * quantities they accept and signal unsupported requests by throwing.
 */
export interface IInventoryStrategy {
  // unit form when quantity is omitted
  addProduct(barcode: Barcode, quality: Quality, quantity?: number): void;
  existsProduct(barcode: Barcode): boolean;
  // highest quality first; [] when nothing of that type is held
  removeProduct(barcode: Barcode, quantity?: number): Product[];
  getAllProducts(): Product[];
}
