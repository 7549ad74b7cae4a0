/**
 * Order State Service
 *
 * Creates orders, replaces them while pending and moves them through the
 * fulfillment lifecycle. Status changes that cross into or out of the
 * stock-holding statuses reserve or release stock in the same transaction.
 */

import {
  MAX_DECIMAL_12_2,
  createOrderInputSchema,
  orderListFiltersSchema,
  updatePendingOrderInputSchema,
  type CreateOrderInput,
  type OrderListFiltersInput,
  type UpdatePendingOrderInput,
} from '@shared/schema';
import {
  requiresStockRelease,
  requiresStockReservation,
  type OrderAuditAction,
  type OrderStatus,
} from '@shared/orderLifecycle';
import { computeOrderPaymentRollup } from '@shared/rollups/orderPaymentRollup';
import { computeOrderTotals, type OrderLineInput, type OrderTotals } from '@shared/rollups/orderTotals';
import type { EngineConfig } from '../config';
import {
  errorMessage,
  fail,
  fromZodValidation,
  invalidState,
  ok,
  orderNotFound,
  validationError,
  type EngineResult,
} from '../errors';
import type { EngineLogger } from '../logger';
import type {
  EngineStore,
  EngineTx,
  NewAuditEntry,
  OrderAuditEntry,
  OrderFieldsPatch,
  OrderRecord,
} from '../storage/types';
import { areLineItemsEditable, isCancellable, validateOrderTransition } from './orderTransition';
import type { PaymentLedgerService } from './paymentLedgerService';
import type { StockLedger, StockLine, StockReleaseReport } from './stockLedger';

export interface OrderStateDeps {
  store: EngineStore;
  stock: StockLedger;
  payments: PaymentLedgerService;
  config: EngineConfig;
  logger: EngineLogger;
}

export interface TransitionArgs {
  organizationId: string;
  orderId: string;
  toStatus: OrderStatus;
  actorUserId?: string | null;
  /** Recorded on the audit entry. */
  note?: string;
  /** Replaces the order's notes along with the status. */
  orderNotes?: string;
}

export interface TransitionOutcome {
  order: OrderRecord;
  previousStatus: OrderStatus;
  reserved: StockLine[];
  release: StockReleaseReport | null;
}

export interface OrderListResult {
  items: OrderRecord[];
  total: number;
  limit: number;
  offset: number;
}

interface ReferenceCheck {
  clientId: string;
  routeId: string | null;
  items?: Array<{ productId: string; quantity: number }>;
}

function stockLinesOf(order: OrderRecord): StockLine[] {
  return order.items.map((item) => ({ productId: item.productId, quantity: item.quantity }));
}

export class OrderStateService {
  constructor(private readonly deps: OrderStateDeps) { }

  /**
   * Client and route must exist and be active; so must every product, whose
   * unit price is resolved through the pricing port. Stock is not checked.
   */
  private async resolveReferences(
    tx: EngineTx,
    organizationId: string,
    check: ReferenceCheck,
  ): Promise<EngineResult<OrderLineInput[]>> {
    const client = await tx.clients.getClient(organizationId, check.clientId);
    if (!client) {
      return fail(validationError('CLIENT_NOT_FOUND', `Client ${check.clientId} not found`, 'clientId'));
    }
    if (client.status !== 'active') {
      return fail(validationError('CLIENT_INACTIVE', `Client ${client.name} is inactive`, 'clientId'));
    }

    if (check.routeId) {
      const route = await tx.routes.getRoute(organizationId, check.routeId);
      if (!route) {
        return fail(validationError('ROUTE_NOT_FOUND', `Route ${check.routeId} not found`, 'routeId'));
      }
      if (route.status !== 'active') {
        return fail(validationError('ROUTE_INACTIVE', `Route ${route.name} is inactive`, 'routeId'));
      }
    }

    const lines: OrderLineInput[] = [];
    for (const [index, item] of (check.items ?? []).entries()) {
      const field = `items.${index}.productId`;
      const product = await tx.catalog.getProduct(organizationId, item.productId);
      if (!product) {
        return fail(validationError('PRODUCT_NOT_FOUND', `Product ${item.productId} not found`, field));
      }
      if (product.status !== 'active') {
        return fail(validationError('PRODUCT_INACTIVE', `Product ${product.name} is inactive`, field));
      }
      const unitPrice = await tx.pricing.priceFor(organizationId, product.id, check.routeId);
      if (unitPrice === undefined) {
        return fail(validationError('PRODUCT_NOT_FOUND', `No price available for product ${product.name}`, field));
      }
      lines.push({ productId: product.id, quantity: item.quantity, unitPrice });
    }
    return ok(lines);
  }

  private checkTotals(totals: OrderTotals): EngineResult<OrderTotals> {
    if (totals.subtotal > MAX_DECIMAL_12_2) {
      return fail(validationError(
        'ORDER_TOTAL_TOO_LARGE',
        `Order subtotal ${totals.subtotal} exceeds ${MAX_DECIMAL_12_2}`,
        'items',
      ));
    }
    return ok(totals);
  }

  private async audit(tx: EngineTx, organizationId: string, entry: NewAuditEntry): Promise<void> {
    try {
      await tx.orders.appendAuditEntry(organizationId, entry);
    } catch (error) {
      this.deps.logger.warn('Failed to write order audit entry', {
        organizationId,
        orderId: entry.orderId,
        actionType: entry.actionType,
        error: errorMessage(error),
      });
    }
  }

  async createOrder(args: {
    organizationId: string;
    input: CreateOrderInput;
    actorUserId?: string | null;
  }): Promise<EngineResult<OrderRecord>> {
    const { organizationId, actorUserId = null } = args;
    const parsed = createOrderInputSchema.safeParse(args.input);
    if (!parsed.success) return fail(fromZodValidation(parsed.error));
    const input = parsed.data;
    const routeId = input.routeId ?? null;

    const result = await this.deps.store.transaction(async (tx): Promise<EngineResult<OrderRecord>> => {
      const resolved = await this.resolveReferences(tx, organizationId, {
        clientId: input.clientId,
        routeId,
        items: input.items,
      });
      if (!resolved.ok) return resolved;

      const checked = this.checkTotals(computeOrderTotals({ items: resolved.value, discountAmount: input.discountAmount }));
      if (!checked.ok) return checked;
      const totals = checked.value;
      const orderNumber = await tx.orders.generateOrderNumber(organizationId, this.deps.config.orderNumberPrefix);

      const order = await tx.orders.insertOrder(organizationId, {
        orderNumber,
        clientId: input.clientId,
        routeId,
        status: 'pending',
        items: totals.items,
        discountAmount: totals.discountAmount,
        totalAmount: totals.totalAmount,
        rollup: computeOrderPaymentRollup({ totalAmount: totals.totalAmount, payments: [] }),
        notes: input.notes ?? null,
        createdByUserId: actorUserId,
      });

      await this.audit(tx, organizationId, {
        orderId: order.id,
        actorUserId,
        actionType: 'order_created',
        toStatus: order.status,
        metadata: { totalAmount: order.totalAmount, itemCount: order.items.length },
      });

      return ok(order);
    });

    if (result.ok) {
      this.deps.logger.info('Order created', {
        organizationId,
        orderId: result.value.id,
        orderNumber: result.value.orderNumber,
        totalAmount: result.value.totalAmount,
      });
    }
    return result;
  }

  async getOrder(organizationId: string, orderId: string): Promise<EngineResult<OrderRecord>> {
    const order = await this.deps.store.transaction((tx) => tx.orders.getOrder(organizationId, orderId));
    return order ? ok(order) : fail(orderNotFound(orderId));
  }

  async getOrderByNumber(organizationId: string, orderNumber: string): Promise<EngineResult<OrderRecord>> {
    const order = await this.deps.store.transaction((tx) => tx.orders.getOrderByNumber(organizationId, orderNumber));
    return order ? ok(order) : fail(orderNotFound(orderNumber));
  }

  async listOrders(organizationId: string, filters: OrderListFiltersInput = {}): Promise<EngineResult<OrderListResult>> {
    const parsed = orderListFiltersSchema.safeParse(filters);
    if (!parsed.success) return fail(fromZodValidation(parsed.error));
    const page = await this.deps.store.transaction((tx) => tx.orders.listOrders(organizationId, parsed.data));
    return ok({ ...page, limit: parsed.data.limit, offset: parsed.data.offset });
  }

  async getOrderHistory(organizationId: string, orderId: string): Promise<EngineResult<OrderAuditEntry[]>> {
    return this.deps.store.transaction(async (tx): Promise<EngineResult<OrderAuditEntry[]>> => {
      const order = await tx.orders.getOrder(organizationId, orderId);
      if (!order) return fail(orderNotFound(orderId));
      return ok(await tx.orders.listAuditEntries(organizationId, orderId));
    });
  }

  /**
   * Replaces client, route, discount, notes and/or the whole item list of a
   * pending order. Replacing the items resets the discount to 0 unless the
   * same patch sets one.
   */
  async updatePendingOrder(args: {
    organizationId: string;
    orderId: string;
    patch: UpdatePendingOrderInput;
    actorUserId?: string | null;
  }): Promise<EngineResult<OrderRecord>> {
    const { organizationId, orderId, actorUserId = null } = args;
    const parsed = updatePendingOrderInputSchema.safeParse(args.patch);
    if (!parsed.success) return fail(fromZodValidation(parsed.error));
    const patch = parsed.data;

    const result = await this.deps.store.transaction(async (tx): Promise<EngineResult<OrderRecord>> => {
      const order = await tx.orders.getOrder(organizationId, orderId, { forUpdate: true });
      if (!order) return fail(orderNotFound(orderId));

      if (!areLineItemsEditable(order.status)) {
        return fail(invalidState(
          'ORDER_NOT_PENDING',
          `Order ${order.orderNumber} is ${order.status}; only pending orders can be edited`,
        ));
      }

      const clientId = patch.clientId ?? order.clientId;
      const routeId = patch.routeId !== undefined ? patch.routeId : order.routeId;

      const resolved = await this.resolveReferences(tx, organizationId, { clientId, routeId, items: patch.items });
      if (!resolved.ok) return resolved;

      const lines: OrderLineInput[] = patch.items ? resolved.value : order.items;
      const discountAmount = patch.items
        ? patch.discountAmount ?? 0
        : patch.discountAmount ?? order.discountAmount;
      const checked = this.checkTotals(computeOrderTotals({ items: lines, discountAmount }));
      if (!checked.ok) return checked;
      const totals = checked.value;

      const fields: OrderFieldsPatch = {
        clientId,
        routeId,
        discountAmount: totals.discountAmount,
        totalAmount: totals.totalAmount,
      };
      if (patch.notes !== undefined) fields.notes = patch.notes;

      await tx.orders.updateOrder(organizationId, orderId, fields);
      if (patch.items) {
        await tx.orders.replaceItems(organizationId, orderId, totals.items);
      }
      const updated = await this.deps.payments.recompute(tx, organizationId, orderId);

      await this.audit(tx, organizationId, {
        orderId,
        actorUserId,
        actionType: 'order_updated',
        metadata: {
          fields: Object.keys(patch),
          previousTotal: order.totalAmount,
          totalAmount: updated.totalAmount,
        },
      });

      return ok(updated);
    });

    if (result.ok) {
      this.deps.logger.info('Order updated', { organizationId, orderId, totalAmount: result.value.totalAmount });
    }
    return result;
  }

  /**
   * Writes a status change together with its stock side effect.
   */
  private async applyStatusChange(
    tx: EngineTx,
    organizationId: string,
    order: OrderRecord,
    toStatus: OrderStatus,
    options: { actionType: OrderAuditAction; actorUserId: string | null; note?: string; orderNotes?: string },
  ): Promise<EngineResult<TransitionOutcome>> {
    const from = order.status;
    let reserved: StockLine[] = [];
    let release: StockReleaseReport | null = null;

    if (requiresStockReservation(from, toStatus)) {
      const reservation = await this.deps.stock.reserveAll(tx, {
        organizationId,
        orderId: order.id,
        lines: stockLinesOf(order),
      });
      if (!reservation.ok) return reservation;
      reserved = reservation.value;
    } else if (requiresStockRelease(from, toStatus)) {
      release = await this.deps.stock.releaseAll(tx, {
        organizationId,
        orderId: order.id,
        lines: stockLinesOf(order),
      });
    }

    const fields: OrderFieldsPatch = { status: toStatus };
    if (options.orderNotes !== undefined) fields.notes = options.orderNotes;
    const updated = await tx.orders.updateOrder(organizationId, order.id, fields);

    await this.audit(tx, organizationId, {
      orderId: order.id,
      actorUserId: options.actorUserId,
      actionType: options.actionType,
      fromStatus: from,
      toStatus,
      note: options.note ?? null,
      metadata: release && release.failures.length > 0 ? { releaseFailures: release.failures } : undefined,
    });

    this.deps.logger.info('Order status changed', {
      organizationId,
      orderId: order.id,
      orderNumber: order.orderNumber,
      fromStatus: from,
      toStatus,
    });

    return ok({ order: updated, previousStatus: from, reserved, release });
  }

  /**
   * Transition inside an open transaction; batch updates call this directly.
   */
  async transitionInTx(tx: EngineTx, args: TransitionArgs): Promise<EngineResult<TransitionOutcome>> {
    const { organizationId, orderId, toStatus, actorUserId = null } = args;

    const order = await tx.orders.getOrder(organizationId, orderId, { forUpdate: true });
    if (!order) return fail(orderNotFound(orderId));

    const check = validateOrderTransition(order.status, toStatus, { strict: this.deps.config.strictTransitions });
    if (!check.ok) {
      return fail(invalidState(check.code ?? 'INVALID_TRANSITION', check.message ?? `Cannot move order to ${toStatus}`));
    }

    return this.applyStatusChange(tx, organizationId, order, toStatus, {
      actionType: 'status_changed',
      actorUserId,
      note: args.note,
      orderNotes: args.orderNotes,
    });
  }

  async transition(args: TransitionArgs): Promise<EngineResult<OrderRecord>> {
    const result = await this.deps.store.transaction((tx) => this.transitionInTx(tx, args));
    return result.ok ? ok(result.value.order) : result;
  }

  /**
   * Cancels a pending or confirmed order, giving back any reserved stock.
   */
  async cancelOrder(args: {
    organizationId: string;
    orderId: string;
    actorUserId?: string | null;
    reason?: string;
  }): Promise<EngineResult<OrderRecord>> {
    const { organizationId, orderId, actorUserId = null } = args;

    const result = await this.deps.store.transaction(async (tx): Promise<EngineResult<TransitionOutcome>> => {
      const order = await tx.orders.getOrder(organizationId, orderId, { forUpdate: true });
      if (!order) return fail(orderNotFound(orderId));

      if (!isCancellable(order.status)) {
        return fail(invalidState(
          'ORDER_NOT_CANCELLABLE',
          `Order ${order.orderNumber} is ${order.status}; only pending or confirmed orders can be cancelled`,
        ));
      }

      return this.applyStatusChange(tx, organizationId, order, 'cancelled', {
        actionType: 'order_cancelled',
        actorUserId,
        note: args.reason,
      });
    });

    return result.ok ? ok(result.value.order) : result;
  }
}
