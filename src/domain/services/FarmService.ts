import { Barcode, Product, Quality } from '../models.js';
import { Customer } from '../entities/Customer.js';
import { Transaction } from '../entities/Transaction.js';
import { IInventoryStrategy } from '../strategies/IInventoryStrategy.js';
import { IAddressBook } from '../../infrastructure/clients/IAddressBook.js';
import { IReceiptRenderer } from '../../infrastructure/receipts/IReceiptRenderer.js';
import { ReceiptPrinter } from '../../infrastructure/receipts/ReceiptPrinter.js';
import {
  DuplicateEntityError,
  EntityNotFoundError,
  FailedTransactionError,
  InvalidStockRequestError,
} from '../errors/index.js';
import { TransactionManager } from './TransactionManager.js';
import { TransactionHistory } from './TransactionHistory.js';
import { logger as defaultLogger, type Logger } from '../../logger.js';

// runs the shop: stock, customers, the open sale and its history
export class FarmService {
  private readonly transactionManager: TransactionManager;
  private readonly history = new TransactionHistory();
  private readonly renderer: IReceiptRenderer;
  private readonly logger: Logger;

  constructor(
    private readonly inventory: IInventoryStrategy,
    private readonly addressBook: IAddressBook,
    options?: {
      renderer?: IReceiptRenderer;
      logger?: Logger;
    }
  ) {
    this.renderer = options?.renderer ?? new ReceiptPrinter();
    this.logger = options?.logger ?? defaultLogger;
    this.transactionManager = new TransactionManager(this.logger);
  }

  getAllCustomers(): Customer[] {
    return this.addressBook.getAllRecords();
  }

  getAllStock(): Product[] {
    return this.inventory.getAllProducts();
  }

  getTransactionManager(): TransactionManager {
    return this.transactionManager;
  }

  getTransactionHistory(): TransactionHistory {
    return this.history;
  }

  saveCustomer(customer: Customer): void {
    if (this.addressBook.containsCustomer(customer)) {
      throw new DuplicateEntityError('Customer', customer.toString());
    }
    this.addressBook.addCustomer(customer);
  }

  getCustomer(name: string, phoneNumber: number): Customer {
    return this.addressBook.getCustomer(name, phoneNumber);
  }

  stockProduct(barcode: Barcode, quality: Quality, quantity?: number): void {
    if (quantity !== undefined) {
      this.validateQuantity(quantity);
    }
    this.inventory.addProduct(barcode, quality, quantity);
    this.logger.debug({ barcode, quality, quantity: quantity ?? 1 }, 'stocked product');
  }

  startTransaction(transaction: Transaction): void {
    this.transactionManager.setOngoingTransaction(transaction);
  }

  /**
   * Moves stock into the shopping customer's cart, best quality first.
   * Returns how many units were actually added.
   */
  addToCart(barcode: Barcode, quantity?: number): number {
    if (!this.transactionManager.hasOngoingTransaction()) {
      throw new FailedTransactionError('Cannot add to cart when no customer has started shopping.');
    }

    let removed: Product[];
    if (quantity === undefined) {
      if (!this.inventory.existsProduct(barcode)) return 0;
      removed = this.inventory.removeProduct(barcode);
    } else {
      this.validateQuantity(quantity);
      removed = this.inventory.removeProduct(barcode, quantity);
    }

    for (const product of removed) {
      this.transactionManager.registerPendingPurchase(product);
    }
    return removed.length;
  }

  // true when the closed sale had something in it and was recorded
  checkout(): boolean {
    const completed = this.transactionManager.closeCurrentTransaction();
    const purchases = completed.getPurchases();
    if (purchases.length === 0) {
      this.logger.info({ transactionId: completed.transactionId }, 'checkout with empty cart, not recorded');
      return false;
    }

    this.history.recordTransaction(completed);
    this.logger.info(
      {
        transactionId: completed.transactionId,
        customer: completed.getAssociatedCustomer().getName(),
        items: purchases.length,
        totalCents: completed.getTotal(),
      },
      'checkout recorded'
    );
    return true;
  }

  getLastReceipt(): string {
    const last = this.history.getLastTransaction();
    if (!last) throw new EntityNotFoundError('Transaction', 'last');
    return last.getReceipt(this.renderer);
  }

  private validateQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new InvalidStockRequestError('Quantity must be a whole number of at least 1.');
    }
  }
}
