/**
 * Storage ports used by the engine services.
 *
 * The drizzle repositories in this folder implement them against PostgreSQL;
 * tests implement them in memory. Every method is tenant scoped.
 */

import type {
  OrderAuditAction,
  OrderPaymentStatus,
  OrderStatus,
  PaymentMethod,
  PaymentStatus,
  RecordStatus,
} from '@shared/orderLifecycle';
import type { OrderPaymentRollup } from '@shared/rollups/orderPaymentRollup';
import type { OrderListFilters, PaymentListFilters } from '@shared/schema';

// ============================================================
// RECORDS
// ============================================================

export interface DirectoryEntry {
  id: string;
  name: string;
  status: RecordStatus;
}

export interface CatalogProduct {
  id: string;
  name: string;
  sku: string;
  price: number;
  stockQuantity: number;
  status: RecordStatus;
}

export interface OrderItemRecord {
  id: string;
  productId: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
}

export interface OrderRecord {
  id: string;
  organizationId: string;
  orderNumber: string;
  clientId: string;
  routeId: string | null;
  status: OrderStatus;
  items: OrderItemRecord[];
  discountAmount: number;
  totalAmount: number;
  paidAmount: number;
  balanceDue: number;
  paymentStatus: OrderPaymentStatus;
  notes: string | null;
  createdByUserId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface PaymentRecord {
  id: string;
  organizationId: string;
  paymentNumber: string;
  orderId: string;
  amount: number;
  paymentMethod: PaymentMethod;
  status: PaymentStatus;
  paymentDate: Date;
  notes: string | null;
  createdByUserId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderAuditEntry {
  id: string;
  orderId: string;
  actorUserId: string | null;
  actionType: OrderAuditAction;
  fromStatus: OrderStatus | null;
  toStatus: OrderStatus | null;
  note: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
}


export type StockMovementType = 'reserve' | 'release';

// ============================================================
// WRITE SHAPES
// ============================================================

export interface NewOrderItem {
  productId: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
}

export interface NewOrder {
  orderNumber: string;
  clientId: string;
  routeId: string | null;
  status: OrderStatus;
  items: NewOrderItem[];
  discountAmount: number;
  totalAmount: number;
  rollup: OrderPaymentRollup;
  notes: string | null;
  createdByUserId: string | null;
}

/** Fields an order write may touch. Ledger fields go through writePaymentRollup only. */
export interface OrderFieldsPatch {
  clientId?: string;
  routeId?: string | null;
  status?: OrderStatus;
  discountAmount?: number;
  totalAmount?: number;
  notes?: string | null;
}

export interface NewPayment {
  paymentNumber: string;
  orderId: string;
  amount: number;
  paymentMethod: PaymentMethod;
  notes: string | null;
  createdByUserId: string | null;
}

export interface NewAuditEntry {
  orderId: string;
  actorUserId: string | null;
  actionType: OrderAuditAction;
  fromStatus?: OrderStatus | null;
  toStatus?: OrderStatus | null;
  note?: string | null;
  metadata?: Record<string, unknown>;
}

export interface NewStockMovement {
  productId: string;
  orderId: string | null;
  type: StockMovementType;
  quantity: number;
}

// ============================================================
// PORTS
// ============================================================

export interface ClientDirectory {
  getClient(organizationId: string, clientId: string): Promise<DirectoryEntry | undefined>;
}

export interface RouteDirectory {
  getRoute(organizationId: string, routeId: string): Promise<DirectoryEntry | undefined>;
}

export interface ProductCatalog {
  getProduct(organizationId: string, productId: string): Promise<CatalogProduct | undefined>;
}

export interface PricingService {
  /** Route-specific override when one is active, else the catalog price. */
  priceFor(organizationId: string, productId: string, routeId: string | null): Promise<number | undefined>;
}

export interface InventoryRepositoryPort {
  /** Locks the product rows for the rest of the transaction, in id order. */
  lockProducts(organizationId: string, productIds: string[]): Promise<CatalogProduct[]>;
  /** Decrements only while stock stays non-negative; false when the guard rejected it. */
  decrementStock(organizationId: string, productId: string, quantity: number): Promise<boolean>;
  /** False when the product row no longer exists. */
  incrementStock(organizationId: string, productId: string, quantity: number): Promise<boolean>;
  recordMovement(organizationId: string, movement: NewStockMovement): Promise<void>;
}

export interface OrderListPage {
  items: OrderRecord[];
  total: number;
}

export interface OrderRepositoryPort {
  generateOrderNumber(organizationId: string, prefix: string): Promise<string>;
  insertOrder(organizationId: string, data: NewOrder): Promise<OrderRecord>;
  getOrder(organizationId: string, orderId: string, options?: { forUpdate?: boolean }): Promise<OrderRecord | undefined>;
  getOrderByNumber(organizationId: string, orderNumber: string): Promise<OrderRecord | undefined>;
  listOrders(organizationId: string, filters: OrderListFilters): Promise<OrderListPage>;
  updateOrder(organizationId: string, orderId: string, patch: OrderFieldsPatch): Promise<OrderRecord>;
  replaceItems(organizationId: string, orderId: string, items: NewOrderItem[]): Promise<void>;
  writePaymentRollup(organizationId: string, orderId: string, rollup: OrderPaymentRollup): Promise<OrderRecord>;
  appendAuditEntry(organizationId: string, entry: NewAuditEntry): Promise<void>;
  listAuditEntries(organizationId: string, orderId: string): Promise<OrderAuditEntry[]>;
}

export interface PaymentRepositoryPort {
  generatePaymentNumber(organizationId: string, prefix: string): Promise<string>;
  insertPayment(organizationId: string, data: NewPayment): Promise<PaymentRecord>;
  getPayment(organizationId: string, paymentId: string, options?: { forUpdate?: boolean }): Promise<PaymentRecord | undefined>;
  getPaymentByNumber(organizationId: string, paymentNumber: string): Promise<PaymentRecord | undefined>;
  listPaymentsForOrder(organizationId: string, orderId: string, options: { onlyConfirmed: boolean }): Promise<PaymentRecord[]>;
  listPayments(organizationId: string, filters: PaymentListFilters): Promise<PaymentRecord[]>;
  markCancelled(organizationId: string, paymentId: string): Promise<PaymentRecord>;
}

/** Repositories bound to one transaction. */
export interface EngineTx {
  orders: OrderRepositoryPort;
  payments: PaymentRepositoryPort;
  inventory: InventoryRepositoryPort;
  clients: ClientDirectory;
  routes: RouteDirectory;
  catalog: ProductCatalog;
  pricing: PricingService;
}

export interface EngineStore {
  /**
   * Runs `work` in one transaction. A thrown error rolls everything back;
   * a returned value (including a failed EngineResult) commits.
   */
  transaction<T>(work: (tx: EngineTx) => Promise<T>): Promise<T>;
}
