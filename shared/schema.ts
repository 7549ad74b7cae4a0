import { sql } from 'drizzle-orm';
import {
  decimal,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import {
  ORDER_AUDIT_ACTIONS,
  ORDER_PAYMENT_STATUSES,
  ORDER_STATUSES,
  PAYMENT_METHODS,
  PAYMENT_STATUSES,
  RECORD_STATUSES,
} from "./orderLifecycle";

// ============================================================
// ENUMS
// ============================================================

export const recordStatusEnum = pgEnum('record_status', RECORD_STATUSES);
export const orderStatusEnum = pgEnum('order_status', ORDER_STATUSES);
export const orderPaymentStatusEnum = pgEnum('order_payment_status', ORDER_PAYMENT_STATUSES);
export const paymentStatusEnum = pgEnum('payment_status', PAYMENT_STATUSES);
export const paymentMethodEnum = pgEnum('payment_method', PAYMENT_METHODS);
export const orderAuditActionEnum = pgEnum('order_audit_action', ORDER_AUDIT_ACTIONS);
export const stockMovementTypeEnum = pgEnum('stock_movement_type', ['reserve', 'release']);

// ============================================================
// TENANTS
// ============================================================

// Provisioning lives outside this service; the table exists so tenant FKs resolve.
export const organizations = pgTable("organizations", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 255 }).notNull(),
  slug: varchar("slug", { length: 100 }).notNull().unique(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// ============================================================
// DIRECTORIES (referenced, not owned, by the order engine)
// ============================================================

export const clients = pgTable("clients", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  email: varchar("email", { length: 255 }),
  status: recordStatusEnum("status").notNull().default('active'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("clients_organization_id_idx").on(table.organizationId),
]);

export const routes = pgTable("routes", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  status: recordStatusEnum("status").notNull().default('active'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("routes_organization_id_idx").on(table.organizationId),
]);

export const products = pgTable("products", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  name: varchar("name", { length: 255 }).notNull(),
  sku: varchar("sku", { length: 100 }).notNull(),
  price: decimal("price", { precision: 12, scale: 2 }).notNull().default("0"),
  stockQuantity: decimal("stock_quantity", { precision: 12, scale: 2 }).notNull().default("0"),
  status: recordStatusEnum("status").notNull().default('active'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("products_organization_id_idx").on(table.organizationId),
  uniqueIndex("products_organization_sku_idx").on(table.organizationId, table.sku),
]);

// Route-specific price overrides; absence means the catalog price applies.
export const productRoutePrices = pgTable("product_route_prices", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  productId: varchar("product_id").notNull().references(() => products.id, { onDelete: 'cascade' }),
  routeId: varchar("route_id").notNull().references(() => routes.id, { onDelete: 'cascade' }),
  price: decimal("price", { precision: 12, scale: 2 }).notNull(),
  status: recordStatusEnum("status").notNull().default('active'),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  uniqueIndex("product_route_prices_product_route_idx").on(table.organizationId, table.productId, table.routeId),
]);

export type Client = typeof clients.$inferSelect;
export type Route = typeof routes.$inferSelect;
export type Product = typeof products.$inferSelect;
export type ProductRoutePrice = typeof productRoutePrices.$inferSelect;

// ============================================================
// ORDERS
// ============================================================

export const orders = pgTable("orders", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  orderNumber: varchar("order_number", { length: 50 }).notNull(),
  clientId: varchar("client_id").notNull().references(() => clients.id, { onDelete: 'restrict' }),
  routeId: varchar("route_id").references(() => routes.id, { onDelete: 'set null' }),
  status: orderStatusEnum("status").notNull().default('pending'),
  discountAmount: decimal("discount_amount", { precision: 12, scale: 2 }).notNull().default("0"),
  totalAmount: decimal("total_amount", { precision: 12, scale: 2 }).notNull().default("0"),
  // Ledger fields below are written only by the payment rollup.
  paidAmount: decimal("paid_amount", { precision: 12, scale: 2 }).notNull().default("0"),
  balanceDue: decimal("balance_due", { precision: 12, scale: 2 }).notNull().default("0"),
  paymentStatus: orderPaymentStatusEnum("payment_status").notNull().default('unpaid'),
  notes: text("notes"),
  createdByUserId: varchar("created_by_user_id"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  index("orders_organization_id_idx").on(table.organizationId),
  uniqueIndex("orders_order_number_idx").on(table.organizationId, table.orderNumber),
  index("orders_client_id_idx").on(table.clientId),
  index("orders_status_idx").on(table.status),
  index("orders_created_at_idx").on(table.createdAt),
]);

export const orderItems = pgTable("order_items", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  orderId: varchar("order_id").notNull().references(() => orders.id, { onDelete: 'cascade' }),
  productId: varchar("product_id").notNull().references(() => products.id, { onDelete: 'restrict' }),
  position: integer("position").notNull().default(0),
  quantity: decimal("quantity", { precision: 12, scale: 2 }).notNull(),
  unitPrice: decimal("unit_price", { precision: 12, scale: 2 }).notNull(), // snapshot at create/edit time
  totalPrice: decimal("total_price", { precision: 12, scale: 2 }).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("order_items_order_id_idx").on(table.orderId),
  index("order_items_product_id_idx").on(table.productId),
]);

export const orderAuditLog = pgTable("order_audit_log", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  orderId: varchar("order_id").notNull().references(() => orders.id, { onDelete: 'cascade' }),
  actorUserId: varchar("actor_user_id"),
  actionType: orderAuditActionEnum("action_type").notNull(),
  fromStatus: orderStatusEnum("from_status"),
  toStatus: orderStatusEnum("to_status"),
  note: text("note"),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("order_audit_log_order_id_idx").on(table.orderId),
  index("order_audit_log_created_at_idx").on(table.createdAt),
]);

export type OrderRow = typeof orders.$inferSelect;
export type OrderItemRow = typeof orderItems.$inferSelect;
export type OrderAuditLogRow = typeof orderAuditLog.$inferSelect;

// ============================================================
// STOCK MOVEMENTS
// ============================================================

export const stockMovements = pgTable("stock_movements", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  productId: varchar("product_id").notNull().references(() => products.id, { onDelete: 'cascade' }),
  orderId: varchar("order_id").references(() => orders.id, { onDelete: 'set null' }),
  type: stockMovementTypeEnum("type").notNull(),
  quantity: decimal("quantity", { precision: 12, scale: 2 }).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("stock_movements_product_id_idx").on(table.productId),
  index("stock_movements_order_id_idx").on(table.orderId),
]);

export type StockMovementRow = typeof stockMovements.$inferSelect;

// ============================================================
// PAYMENTS
// ============================================================

export const payments = pgTable("payments", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  organizationId: varchar("organization_id").notNull().references(() => organizations.id, { onDelete: 'cascade' }),
  paymentNumber: varchar("payment_number", { length: 50 }).notNull(),
  orderId: varchar("order_id").notNull().references(() => orders.id, { onDelete: 'restrict' }),
  amount: decimal("amount", { precision: 12, scale: 2 }).notNull(),
  paymentMethod: paymentMethodEnum("payment_method").notNull(),
  status: paymentStatusEnum("status").notNull().default('confirmed'),
  paymentDate: timestamp("payment_date", { withTimezone: true }).defaultNow().notNull(),
  notes: text("notes"),
  createdByUserId: varchar("created_by_user_id"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => [
  uniqueIndex("payments_payment_number_idx").on(table.organizationId, table.paymentNumber),
  index("payments_order_id_idx").on(table.orderId),
  index("payments_payment_date_idx").on(table.paymentDate),
]);

export type PaymentRow = typeof payments.$inferSelect;

// ============================================================
// ENGINE INPUT SCHEMAS
// ============================================================

const roundTo2 = (value: number) => Math.round(value * 100) / 100;

/** Largest value a decimal(12,2) column holds. */
export const MAX_DECIMAL_12_2 = 9_999_999_999.99;

const decimalNumber = (label: string) =>
  z
    .number()
    .finite(`${label} must be a finite number`)
    .max(MAX_DECIMAL_12_2, `${label} cannot exceed ${MAX_DECIMAL_12_2}`);

export const orderItemInputSchema = z.object({
  productId: z.string().min(1, 'productId is required'),
  quantity: decimalNumber('Quantity')
    .positive('Quantity must be greater than 0')
    .transform(roundTo2)
    .pipe(z.number().positive('Quantity must be at least 0.01')),
});

export const createOrderInputSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  routeId: z.string().min(1).nullable().optional(),
  items: z.array(orderItemInputSchema).min(1, 'At least one item is required'),
  discountAmount: decimalNumber('Discount').min(0, 'Discount cannot be negative').default(0),
  notes: z.string().nullable().optional(),
});

export const updatePendingOrderInputSchema = z.object({
  clientId: z.string().min(1).optional(),
  routeId: z.string().min(1).nullable().optional(),
  items: z.array(orderItemInputSchema).min(1, 'At least one item is required').optional(),
  discountAmount: decimalNumber('Discount').min(0, 'Discount cannot be negative').optional(),
  notes: z.string().nullable().optional(),
}).strict();

export const recordPaymentInputSchema = createInsertSchema(payments).pick({
  orderId: true,
  paymentMethod: true,
  notes: true,
}).extend({
  orderId: z.string().min(1, 'orderId is required'),
  amount: decimalNumber('Amount')
    .positive('Amount must be greater than 0')
    .transform(roundTo2)
    .pipe(z.number().positive('Amount must be at least 0.01')),
});

export const batchStatusUpdateInputSchema = z.object({
  orderIds: z.array(z.string().min(1)).min(1, 'At least one order id is required'),
  status: z.enum(ORDER_STATUSES),
  notes: z.string().optional(),
});

export const orderListFiltersSchema = z.object({
  status: z.enum(ORDER_STATUSES).optional(),
  clientId: z.string().optional(),
  routeId: z.string().optional(),
  paymentStatus: z.enum(ORDER_PAYMENT_STATUSES).optional(),
  dateFrom: z.coerce.date().optional(),
  dateTo: z.coerce.date().optional(),
  search: z.string().trim().min(1).optional(),
  limit: z.number().int().min(1).max(500).default(100),
  offset: z.number().int().min(0).default(0),
});

export const paymentListFiltersSchema = z.object({
  orderId: z.string().optional(),
  paymentMethod: z.enum(PAYMENT_METHODS).optional(),
  status: z.enum(PAYMENT_STATUSES).optional(),
  includeCancelled: z.boolean().default(false),
  dateFrom: z.coerce.date().optional(),
  dateTo: z.coerce.date().optional(),
  limit: z.number().int().min(1).max(500).default(100),
  offset: z.number().int().min(0).default(0),
});

export type OrderItemInput = z.input<typeof orderItemInputSchema>;
export type CreateOrderInput = z.input<typeof createOrderInputSchema>;
export type UpdatePendingOrderInput = z.input<typeof updatePendingOrderInputSchema>;
export type RecordPaymentInput = z.input<typeof recordPaymentInputSchema>;
export type BatchStatusUpdateInput = z.input<typeof batchStatusUpdateInputSchema>;
export type OrderListFiltersInput = z.input<typeof orderListFiltersSchema>;
export type OrderListFilters = z.infer<typeof orderListFiltersSchema>;
export type PaymentListFiltersInput = z.input<typeof paymentListFiltersSchema>;
export type PaymentListFilters = z.infer<typeof paymentListFiltersSchema>;
