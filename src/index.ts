import { FarmService } from './domain/services/FarmService.js';
import { BasicInventory } from './domain/strategies/BasicInventory.js';
import { FancyInventory } from './domain/strategies/FancyInventory.js';
import { IInventoryStrategy } from './domain/strategies/IInventoryStrategy.js';
import { InMemoryAddressBook } from './infrastructure/clients/InMemoryAddressBook.js';
import { ReceiptPrinter } from './infrastructure/receipts/ReceiptPrinter.js';
import { FarmConfig, InventoryStrategyName, loadConfig } from './config.js';
import { createLogger } from './logger.js';

export function createInventory(strategy: InventoryStrategyName): IInventoryStrategy {
  return strategy === 'basic' ? new BasicInventory() : new FancyInventory();
}

export function buildApp(config: FarmConfig = loadConfig()): FarmService {
  const logger = createLogger(config.logLevel);

  // dependency injection
  const inventory = createInventory(config.inventoryStrategy);
  const addressBook = new InMemoryAddressBook();
  const farm = new FarmService(inventory, addressBook, {
    renderer: new ReceiptPrinter(),
    logger,
  });

  logger.debug({ inventoryStrategy: config.inventoryStrategy, nodeEnv: config.nodeEnv }, 'farm ready');
  return farm;
}

export * from './domain/models.js';
export * from './domain/errors/index.js';
export { createProduct, productEquals, formatProduct } from './domain/entities/Product.js';
export { Cart } from './domain/entities/Cart.js';
export { Customer } from './domain/entities/Customer.js';
export { Transaction } from './domain/entities/Transaction.js';
export type { IInventoryStrategy } from './domain/strategies/IInventoryStrategy.js';
export { BasicInventory, FancyInventory };
export {
  discountedSubtotal,
  StandardPricingStrategy,
  SpecialSalePricingStrategy,
} from './domain/strategies/IPricingStrategy.js';
export type { IPricingStrategy } from './domain/strategies/IPricingStrategy.js';
export { TransactionManager } from './domain/services/TransactionManager.js';
export { TransactionHistory } from './domain/services/TransactionHistory.js';
export { FarmService };
export type { IAddressBook } from './infrastructure/clients/IAddressBook.js';
export { InMemoryAddressBook, ReceiptPrinter };
export type { IReceiptRenderer } from './infrastructure/receipts/IReceiptRenderer.js';
export { loadConfig };
export type { FarmConfig, InventoryStrategyName };
export { createLogger };
