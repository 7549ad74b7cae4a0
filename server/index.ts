export { createOrderEngine, createDatabaseEngine, type OrderEngine } from './engine';
export { loadEngineConfig, loadDatabaseEngineConfig, ConfigError, DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config';
export { logger, createLogger, type EngineLogger, type LogContext, type LogLevel } from './logger';
export * from './errors';
export { StockLedger, type StockLine, type StockReleaseReport } from './services/stockLedger';
export { OrderStateService, type OrderListResult, type TransitionArgs } from './services/orderStateService';
export {
  PaymentLedgerService,
  type BulkPaymentResult,
  type OrderPaymentSummary,
  type RecordedPayment,
} from './services/paymentLedgerService';
export {
  BatchStatusService,
  type BatchFailureDetail,
  type BatchStatusResult,
  type BatchSuccessDetail,
} from './services/batchStatusService';
export { getAllowedNextStatuses, isTerminalStatus, validateOrderTransition } from './services/orderTransition';
export { DrizzleEngineStore } from './storage';
export type {
  CatalogProduct,
  DirectoryEntry,
  EngineStore,
  EngineTx,
  OrderAuditEntry,
  OrderItemRecord,
  OrderRecord,
  PaymentRecord,
} from './storage/types';
export * from '@shared/orderLifecycle';
export type {
  BatchStatusUpdateInput,
  CreateOrderInput,
  OrderListFiltersInput,
  PaymentListFiltersInput,
  RecordPaymentInput,
  UpdatePendingOrderInput,
} from '@shared/schema';
