import { Product } from '../models.js';
import { Transaction } from '../entities/Transaction.js';
import { FailedTransactionError } from '../errors/index.js';
import { logger as defaultLogger, type Logger } from '../../logger.js';

// keeps at most one transaction open and routes purchases into its cart
export class TransactionManager {
  private transactions: Transaction[] = [];
  private current: Transaction | null = null;

  constructor(private readonly logger: Logger = defaultLogger) {}

  hasOngoingTransaction(): boolean {
    return this.transactions.some(t => !t.isFinalised());
  }

  setOngoingTransaction(transaction: Transaction): void {
    if (this.hasOngoingTransaction()) {
      throw new FailedTransactionError('Another transaction is already in progress.');
    }
    this.transactions.push(transaction);
    this.current = transaction;
    this.logger.debug(
      { transactionId: transaction.transactionId, kind: transaction.kind },
      'transaction opened'
    );
  }

  registerPendingPurchase(product: Product): void {
    const transaction = this.requireOngoing();
    transaction.getAssociatedCustomer().getCart().addProduct(product);
  }

  closeCurrentTransaction(): Transaction {
    const transaction = this.requireOngoing();
    transaction.finalise();
    this.logger.debug({ transactionId: transaction.transactionId }, 'transaction closed');
    return transaction;
  }

  getTransactions(): Transaction[] {
    return [...this.transactions];
  }

  private requireOngoing(): Transaction {
    if (!this.current || !this.hasOngoingTransaction()) {
      throw new FailedTransactionError('No transaction is currently in progress.');
    }
    return this.current;
  }
}
