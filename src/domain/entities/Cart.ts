import { Product } from '../models.js';

export class Cart {
  private contents: Product[] = [];

  addProduct(product: Product): void {
    this.contents.push(product);
  }

  // copy, so callers can't reach into the cart
  getContents(): Product[] {
    return [...this.contents];
  }

  setEmpty(): void {
    this.contents = [];
  }

  isEmpty(): boolean {
    return this.contents.length === 0;
  }
}
