/**
 * Batch Status Service
 *
 * Applies one target status to many orders. Each order runs in its own
 * transaction; a failure is reported for that order and the batch moves on.
 */

import { batchStatusUpdateInputSchema, type BatchStatusUpdateInput } from '@shared/schema';
import { requiresStockReservation, type OrderStatus } from '@shared/orderLifecycle';
import {
  errorMessage,
  fail,
  fromZodValidation,
  ok,
  type EngineResult,
  type StockShortfall,
} from '../errors';
import { logError, type EngineLogger } from '../logger';
import type { EngineStore, OrderRecord } from '../storage/types';
import type { OrderStateService } from './orderStateService';
import type { StockLedger } from './stockLedger';

export interface BatchStatusDeps {
  store: EngineStore;
  orders: OrderStateService;
  stock: StockLedger;
  logger: EngineLogger;
}

export type BatchFailureReason =
  | 'order_not_found'
  | 'stock_validation_failed'
  | 'transition_rejected'
  | 'unexpected_error';

export interface BatchItemSnapshot {
  productId: string;
  productName: string | null;
  sku: string | null;
  quantity: number;
}

export interface BatchSuccessDetail {
  orderId: string;
  orderNumber: string;
  previousStatus: OrderStatus;
  newStatus: OrderStatus;
  items: BatchItemSnapshot[];
}

export interface BatchFailureDetail {
  orderId: string;
  orderNumber: string | null;
  reason: BatchFailureReason;
  code?: string;
  message: string;
  shortfalls?: StockShortfall[];
}

export interface BatchStatusResult {
  updatedCount: number;
  failedCount: number;
  total: number;
  success: string[];
  failed: string[];
  successDetails: BatchSuccessDetail[];
  failedDetails: BatchFailureDetail[];
}

type OrderOutcome =
  | { ok: true; detail: BatchSuccessDetail }
  | { ok: false; detail: BatchFailureDetail };

function failure(order: OrderRecord | undefined, orderId: string, reason: BatchFailureReason, message: string, extra: Partial<BatchFailureDetail> = {}): OrderOutcome {
  return {
    ok: false,
    detail: { orderId, orderNumber: order?.orderNumber ?? null, reason, message, ...extra },
  };
}

export class BatchStatusService {
  constructor(private readonly deps: BatchStatusDeps) { }

  async batchUpdateStatus(args: {
    organizationId: string;
    input: BatchStatusUpdateInput;
    actorUserId?: string | null;
  }): Promise<EngineResult<BatchStatusResult>> {
    const { organizationId, actorUserId = null } = args;
    const parsed = batchStatusUpdateInputSchema.safeParse(args.input);
    if (!parsed.success) return fail(fromZodValidation(parsed.error));
    const { status, notes } = parsed.data;
    const orderIds = Array.from(new Set(parsed.data.orderIds));

    const result: BatchStatusResult = {
      updatedCount: 0,
      failedCount: 0,
      total: orderIds.length,
      success: [],
      failed: [],
      successDetails: [],
      failedDetails: [],
    };

    for (const orderId of orderIds) {
      let outcome: OrderOutcome;
      try {
        outcome = await this.updateOne(organizationId, orderId, status, notes, actorUserId);
      } catch (error) {
        logError(this.deps.logger, error, { organizationId, orderId, targetStatus: status });
        outcome = failure(undefined, orderId, 'unexpected_error', errorMessage(error));
      }

      if (outcome.ok) {
        result.success.push(orderId);
        result.successDetails.push(outcome.detail);
      } else {
        result.failed.push(orderId);
        result.failedDetails.push(outcome.detail);
      }
    }

    result.updatedCount = result.success.length;
    result.failedCount = result.failed.length;

    this.deps.logger.info('Batch status update finished', {
      organizationId,
      targetStatus: status,
      total: result.total,
      updatedCount: result.updatedCount,
      failedCount: result.failedCount,
    });

    return ok(result);
  }

  private updateOne(
    organizationId: string,
    orderId: string,
    status: OrderStatus,
    notes: string | undefined,
    actorUserId: string | null,
  ): Promise<OrderOutcome> {
    return this.deps.store.transaction(async (tx): Promise<OrderOutcome> => {
      const order = await tx.orders.getOrder(organizationId, orderId);
      if (!order) {
        return failure(undefined, orderId, 'order_not_found', `Order ${orderId} not found`);
      }

      if (requiresStockReservation(order.status, status)) {
        const shortfalls = await this.deps.stock.findShortfalls(tx, organizationId, order.items);
        if (shortfalls.length > 0) {
          return failure(order, orderId, 'stock_validation_failed', 'Insufficient stock for one or more products', { shortfalls });
        }
      }

      const transitioned = await this.deps.orders.transitionInTx(tx, {
        organizationId,
        orderId,
        toStatus: status,
        actorUserId,
        note: notes,
        orderNotes: notes,
      });

      if (!transitioned.ok) {
        const { error } = transitioned;
        switch (error.kind) {
          case 'insufficient_stock':
            return failure(order, orderId, 'stock_validation_failed', error.message, { code: error.code, shortfalls: error.shortfalls });
          case 'not_found':
            return failure(order, orderId, 'order_not_found', error.message, { code: error.code });
          default:
            return failure(order, orderId, 'transition_rejected', error.message, { code: error.code });
        }
      }

      const items: BatchItemSnapshot[] = [];
      for (const item of transitioned.value.order.items) {
        const product = await tx.catalog.getProduct(organizationId, item.productId);
        items.push({
          productId: item.productId,
          productName: product?.name ?? null,
          sku: product?.sku ?? null,
          quantity: item.quantity,
        });
      }

      return {
        ok: true,
        detail: {
          orderId,
          orderNumber: transitioned.value.order.orderNumber,
          previousStatus: transitioned.value.previousStatus,
          newStatus: transitioned.value.order.status,
          items,
        },
      };
    });
  }
}
