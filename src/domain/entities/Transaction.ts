import { v4 as uuidv4 } from 'uuid';
import {
  BARCODES,
  Barcode,
  DiscountMap,
  Product,
  ReceiptData,
  STOCK_CATALOGUE,
  TransactionKind,
  TransactionVariant,
} from '../models.js';
import { FailedTransactionError } from '../errors/index.js';
import {
  IPricingStrategy,
  SpecialSalePricingStrategy,
  StandardPricingStrategy,
} from '../strategies/IPricingStrategy.js';
import { countOfType, formatCents, groupByType, purchasedTypes, sumBasePrices } from '../purchases.js';
import { IReceiptRenderer } from '../../infrastructure/receipts/IReceiptRenderer.js';
import { Customer } from './Customer.js';
import { formatProduct } from './Product.js';

// active reads the customer's cart live; finalised owns its own frozen list
type PurchaseState =
  | { status: 'active' }
  | { status: 'finalised'; purchases: readonly Product[] };

const CATEGORISED_HEADERS = ['Item', 'Qty', 'Price (ea.)', 'Subtotal'];

/**
 * Tracks what is to be (or has been) bought and by whom.
 *
 * The variant decides pricing and receipt layout: `standard` lists every
 * unit, `categorised` groups by stock type, `specialSale` groups and applies
 * per-type percentage discounts.
 */
export class Transaction {
  readonly transactionId: string = uuidv4();
  private readonly variant: TransactionVariant;
  private readonly pricing: IPricingStrategy;
  private state: PurchaseState = { status: 'active' };

  constructor(
    private readonly customer: Customer,
    variant: TransactionVariant = { kind: 'standard' }
  ) {
    this.variant = variant;
    this.pricing =
      variant.kind === 'specialSale'
        ? new SpecialSalePricingStrategy(variant.discounts)
        : new StandardPricingStrategy();
  }

  static categorised(customer: Customer): Transaction {
    return new Transaction(customer, { kind: 'categorised' });
  }

  static specialSale(customer: Customer, discounts: DiscountMap = {}): Transaction {
    return new Transaction(customer, { kind: 'specialSale', discounts });
  }

  get kind(): TransactionKind {
    return this.variant.kind;
  }

  getAssociatedCustomer(): Customer {
    return this.customer;
  }

  isFinalised(): boolean {
    return this.state.status === 'finalised';
  }

  getPurchases(): Product[] {
    if (this.state.status === 'finalised') {
      return [...this.state.purchases];
    }
    return this.customer.getCart().getContents();
  }

  getTotal(): number {
    return this.pricing.total(this.getPurchases());
  }

  // snapshot the cart, then empty it; only ever happens once
  finalise(): void {
    if (this.state.status === 'finalised') {
      throw new FailedTransactionError(`Transaction '${this.transactionId}' is already finalised.`);
    }
    const cart = this.customer.getCart();
    this.state = { status: 'finalised', purchases: Object.freeze(cart.getContents()) };
    cart.setEmpty();
  }

  getPurchasedTypes(): Barcode[] {
    return purchasedTypes(this.getPurchases());
  }

  getPurchasesByType(): Map<Barcode, Product[]> {
    return groupByType(this.getPurchases());
  }

  getPurchaseQuantity(barcode: Barcode): number {
    return countOfType(this.getPurchases(), barcode);
  }

  getPurchaseSubtotal(barcode: Barcode): number {
    return this.pricing.subtotal(barcode, this.getPurchaseQuantity(barcode));
  }

  getDiscountAmount(barcode: Barcode): number {
    return this.pricing.discountFor(barcode);
  }

  getTotalSaved(): number {
    return sumBasePrices(this.getPurchases()) - this.getTotal();
  }

  // null while the customer is still shopping
  getReceiptData(): ReceiptData | null {
    if (this.state.status === 'active') {
      return null;
    }

    const data: ReceiptData = {
      headers: this.kind === 'standard' ? ['Item', 'Price'] : [...CATEGORISED_HEADERS],
      rows: this.kind === 'standard' ? this.unitRows() : this.groupedRows(),
      total: formatCents(this.getTotal()),
      customerName: this.customer.getName(),
    };

    const saved = this.getTotalSaved();
    if (this.kind === 'specialSale' && saved > 0) {
      data.savings = formatCents(saved);
    }
    return data;
  }

  getReceipt(renderer: IReceiptRenderer): string {
    const data = this.getReceiptData();
    if (!data) return renderer.renderPending();
    return renderer.render(data.headers, data.rows, data.total, data.customerName, data.savings);
  }

  toString(): string {
    const status = this.isFinalised() ? 'Finalised' : 'Active';
    const products = this.getPurchases().map(formatProduct).join(', ');
    const base = `Transaction {${this.customer.toString()}, Status: ${status}, Associated Products: [${products}]`;
    if (this.variant.kind !== 'specialSale') return `${base}}`;

    const { discounts } = this.variant;
    const listed = BARCODES.flatMap(barcode => {
      const percentage = discounts[barcode];
      return percentage === undefined ? [] : [`${barcode}: ${percentage}`];
    });
    return `${base}, Discounts: {${listed.join(', ')}}}`;
  }

  private unitRows(): string[][] {
    return this.getPurchases().map(p => [p.displayName, formatCents(p.basePrice)]);
  }

  private groupedRows(): string[][] {
    const rows: string[][] = [];
    for (const barcode of BARCODES) {
      const quantity = this.getPurchaseQuantity(barcode);
      if (quantity === 0) continue;

      const { displayName, basePrice } = STOCK_CATALOGUE[barcode];
      const row = [
        displayName,
        String(quantity),
        formatCents(basePrice),
        formatCents(this.getPurchaseSubtotal(barcode)),
      ];
      const discount = this.getDiscountAmount(barcode);
      if (discount > 0) {
        row.push(`Discount applied! ${discount}% off ${displayName}`);
      }
      rows.push(row);
    }
    return rows;
  }
}
