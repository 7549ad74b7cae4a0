/**
 * Order Engine
 *
 * Wires the services around one EngineStore. Nothing here holds state beyond
 * the injected store, config and logger.
 */

import { DEFAULT_ENGINE_CONFIG, loadDatabaseEngineConfig, type EngineConfig } from './config';
import { createDatabase } from './db';
import { logger as defaultLogger, type EngineLogger } from './logger';
import { BatchStatusService } from './services/batchStatusService';
import { OrderStateService } from './services/orderStateService';
import { PaymentLedgerService } from './services/paymentLedgerService';
import { StockLedger } from './services/stockLedger';
import { DrizzleEngineStore } from './storage';
import type { EngineStore } from './storage/types';

export interface OrderEngine {
  config: EngineConfig;
  stock: StockLedger;
  orders: OrderStateService;
  payments: PaymentLedgerService;
  batch: BatchStatusService;
}

export function createOrderEngine(options: {
  store: EngineStore;
  config?: Partial<EngineConfig>;
  logger?: EngineLogger;
}): OrderEngine {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
  const log = options.logger ?? defaultLogger;
  const { store } = options;

  const stock = new StockLedger(log);
  const payments = new PaymentLedgerService({ store, config, logger: log });
  const orders = new OrderStateService({ store, stock, payments, config, logger: log });
  const batch = new BatchStatusService({ store, orders, stock, logger: log });

  return { config, stock, orders, payments, batch };
}

/**
 * Engine backed by PostgreSQL, configured from the environment.
 */
export function createDatabaseEngine(env: NodeJS.ProcessEnv = process.env) {
  const config = loadDatabaseEngineConfig(env);
  const { pool, db } = createDatabase(config.databaseUrl);
  const engine = createOrderEngine({ store: new DrizzleEngineStore(db), config });

  defaultLogger.info('Order engine connected', { nodeEnv: config.nodeEnv, strictTransitions: config.strictTransitions });

  return {
    ...engine,
    close: () => pool.end(),
  };
}
