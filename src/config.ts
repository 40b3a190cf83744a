import { ValidationError } from './domain/errors/index.js';

export type InventoryStrategyName = 'basic' | 'fancy';

export interface FarmConfig {
  logLevel: string;
  inventoryStrategy: InventoryStrategyName;
  nodeEnv: string;
}

function parseStrategy(value: string | undefined): InventoryStrategyName {
  const strategy = (value || 'fancy').toLowerCase();
  if (strategy !== 'basic' && strategy !== 'fancy') {
    throw new ValidationError(`Unknown INVENTORY_STRATEGY '${value}'. Expected 'basic' or 'fancy'.`);
  }
  return strategy;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FarmConfig {
  return {
    logLevel: env.LOG_LEVEL || 'info',
    inventoryStrategy: parseStrategy(env.INVENTORY_STRATEGY),
    nodeEnv: env.NODE_ENV || 'development',
  };
}
