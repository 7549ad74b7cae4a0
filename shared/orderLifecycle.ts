/**
 * Order lifecycle constants shared by the schema, the engine and its tests.
 *
 * Stock is held by an order exactly while its status is in STOCK_REQUIRED_STATUSES.
 */

export const ORDER_STATUSES = [
  'pending',
  'confirmed',
  'in_progress',
  'shipped',
  'delivered',
  'cancelled',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const STOCK_REQUIRED_STATUSES: readonly OrderStatus[] = ['confirmed', 'in_progress', 'shipped', 'delivered'];
export const STOCK_FREE_STATUSES: readonly OrderStatus[] = ['pending', 'cancelled'];

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = ['delivered', 'cancelled'];

/** Statuses from which `cancelOrder` is accepted. */
export const CANCELLABLE_ORDER_STATUSES: readonly OrderStatus[] = ['pending', 'confirmed'];

export const ORDER_PAYMENT_STATUSES = ['unpaid', 'partial', 'paid'] as const;
export type OrderPaymentStatus = (typeof ORDER_PAYMENT_STATUSES)[number];

export const PAYMENT_STATUSES = ['confirmed', 'cancelled'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_METHODS = ['cash', 'credit_card', 'bank_transfer', 'check', 'other'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const ORDER_AUDIT_ACTIONS = ['order_created', 'order_updated', 'status_changed', 'order_cancelled'] as const;
export type OrderAuditAction = (typeof ORDER_AUDIT_ACTIONS)[number];

export const RECORD_STATUSES = ['active', 'inactive'] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];

export function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

export function isStockRequired(status: OrderStatus): boolean {
  return STOCK_REQUIRED_STATUSES.includes(status);
}

export function isStockFree(status: OrderStatus): boolean {
  return STOCK_FREE_STATUSES.includes(status);
}

/**
 * True when moving from `from` to `to` must reserve stock.
 */
export function requiresStockReservation(from: OrderStatus, to: OrderStatus): boolean {
  return isStockFree(from) && isStockRequired(to);
}

/**
 * True when moving from `from` to `to` must give reserved stock back.
 */
export function requiresStockRelease(from: OrderStatus, to: OrderStatus): boolean {
  return isStockRequired(from) && isStockFree(to);
}

export const ORDER_STATUS_LABELS: Record<OrderStatus, string> = {
  pending: 'Pending',
  confirmed: 'Confirmed',
  in_progress: 'In Progress',
  shipped: 'Shipped',
  delivered: 'Delivered',
  cancelled: 'Cancelled',
};
