/**
 * Payment Ledger Service
 *
 * Records and cancels payments and keeps each order's paid amount, balance
 * and payment status in step with its confirmed payments. `recompute` is the
 * only writer of those three fields.
 */

import {
  paymentListFiltersSchema,
  recordPaymentInputSchema,
  type PaymentListFiltersInput,
  type RecordPaymentInput,
} from '@shared/schema';
import {
  computeOrderPaymentRollup,
  getPaymentStatusLabel,
  type PaymentStatusLabel,
} from '@shared/rollups/orderPaymentRollup';
import { fromCents, toCents } from '@shared/rollups/orderTotals';
import type { OrderPaymentStatus } from '@shared/orderLifecycle';
import type { EngineConfig } from '../config';
import {
  errorMessage,
  fail,
  fromZodValidation,
  invalidState,
  ok,
  orderNotFound,
  paymentNotFound,
  validationError,
  type EngineResult,
} from '../errors';
import { logError, type EngineLogger } from '../logger';
import type { EngineStore, EngineTx, OrderRecord, PaymentRecord } from '../storage/types';

export interface PaymentLedgerDeps {
  store: EngineStore;
  config: EngineConfig;
  logger: EngineLogger;
}

export interface RecordedPayment {
  payment: PaymentRecord;
  order: OrderRecord;
}

export interface BulkPaymentError {
  index: number;
  orderId: string;
  orderNumber: string | null;
  clientName: string | null;
  code: string;
  message: string;
}

export interface BulkPaymentResult {
  created: PaymentRecord[];
  totalAmount: number;
  successCount: number;
  failedCount: number;
  errors: BulkPaymentError[];
}

export interface OrderPaymentSummary {
  orderId: string;
  orderNumber: string;
  totalAmount: number;
  paidAmount: number;
  balanceDue: number;
  paymentStatus: OrderPaymentStatus;
  statusLabel: PaymentStatusLabel;
  paymentCount: number;
  payments: PaymentRecord[];
}

export class PaymentLedgerService {
  constructor(private readonly deps: PaymentLedgerDeps) { }

  /**
   * Re-derives paid / balance / payment status from the order's payments and
   * persists them. Idempotent.
   */
  async recompute(tx: EngineTx, organizationId: string, orderId: string): Promise<OrderRecord> {
    const order = await tx.orders.getOrder(organizationId, orderId);
    if (!order) {
      throw new Error(`Order ${orderId} not found while recomputing its payment ledger`);
    }
    const payments = await tx.payments.listPaymentsForOrder(organizationId, orderId, { onlyConfirmed: false });
    const rollup = computeOrderPaymentRollup({ totalAmount: order.totalAmount, payments });
    return tx.orders.writePaymentRollup(organizationId, orderId, rollup);
  }

  async recordPayment(args: {
    organizationId: string;
    input: RecordPaymentInput;
    actorUserId?: string | null;
  }): Promise<EngineResult<RecordedPayment>> {
    const { organizationId, actorUserId = null } = args;
    const parsed = recordPaymentInputSchema.safeParse(args.input);
    if (!parsed.success) return fail(fromZodValidation(parsed.error));
    const input = parsed.data;

    const result = await this.deps.store.transaction(async (tx): Promise<EngineResult<RecordedPayment>> => {
      const order = await tx.orders.getOrder(organizationId, input.orderId, { forUpdate: true });
      if (!order) return fail(orderNotFound(input.orderId));

      if (order.status === 'cancelled') {
        return fail(invalidState('ORDER_CANCELLED', `Cannot record a payment against cancelled order ${order.orderNumber}`));
      }

      if (!this.deps.config.allowOverpayment && toCents(input.amount) > toCents(order.balanceDue)) {
        return fail(validationError(
          'OVERPAYMENT_NOT_ALLOWED',
          `Payment of ${input.amount} exceeds the balance due of ${fromCents(Math.max(0, toCents(order.balanceDue)))}`,
          'amount',
        ));
      }

      const paymentNumber = await tx.payments.generatePaymentNumber(organizationId, this.deps.config.paymentNumberPrefix);
      const payment = await tx.payments.insertPayment(organizationId, {
        paymentNumber,
        orderId: order.id,
        amount: input.amount,
        paymentMethod: input.paymentMethod,
        notes: input.notes ?? null,
        createdByUserId: actorUserId,
      });
      const updated = await this.recompute(tx, organizationId, order.id);
      return ok({ payment, order: updated });
    });

    if (result.ok) {
      this.deps.logger.info('Payment recorded', {
        organizationId,
        orderId: result.value.order.id,
        paymentNumber: result.value.payment.paymentNumber,
        amount: result.value.payment.amount,
        paymentStatus: result.value.order.paymentStatus,
      });
    }
    return result;
  }

  async cancelPayment(args: {
    organizationId: string;
    paymentId: string;
  }): Promise<EngineResult<RecordedPayment>> {
    const { organizationId, paymentId } = args;

    const result = await this.deps.store.transaction(async (tx): Promise<EngineResult<RecordedPayment>> => {
      const payment = await tx.payments.getPayment(organizationId, paymentId, { forUpdate: true });
      if (!payment) return fail(paymentNotFound(paymentId));

      if (payment.status === 'cancelled') {
        return fail(invalidState('PAYMENT_ALREADY_CANCELLED', `Payment ${payment.paymentNumber} is already cancelled`));
      }

      const order = await tx.orders.getOrder(organizationId, payment.orderId, { forUpdate: true });
      if (!order) return fail(orderNotFound(payment.orderId));

      const cancelled = await tx.payments.markCancelled(organizationId, payment.id);
      const updated = await this.recompute(tx, organizationId, order.id);
      return ok({ payment: cancelled, order: updated });
    });

    if (result.ok) {
      this.deps.logger.info('Payment cancelled', {
        organizationId,
        orderId: result.value.order.id,
        paymentNumber: result.value.payment.paymentNumber,
        paymentStatus: result.value.order.paymentStatus,
      });
    }
    return result;
  }

  /**
   * Records each entry on its own. Failed entries are reported and skipped.
   */
  async bulkCreate(args: {
    organizationId: string;
    entries: RecordPaymentInput[];
    actorUserId?: string | null;
  }): Promise<BulkPaymentResult> {
    const { organizationId, entries, actorUserId = null } = args;
    const created: PaymentRecord[] = [];
    const errors: BulkPaymentError[] = [];
    let totalCents = 0;

    for (const [index, entry] of entries.entries()) {
      let failure: { code: string; message: string };
      try {
        const result = await this.recordPayment({ organizationId, input: entry, actorUserId });
        if (result.ok) {
          created.push(result.value.payment);
          totalCents += toCents(result.value.payment.amount);
          continue;
        }
        failure = { code: result.error.code, message: result.error.message };
      } catch (error) {
        logError(this.deps.logger, error, { organizationId, orderId: entry.orderId, index });
        failure = { code: 'UNEXPECTED_ERROR', message: errorMessage(error) };
      }

      const context = await this.describeOrder(organizationId, entry.orderId);
      errors.push({ index, orderId: entry.orderId, ...context, ...failure });
    }

    this.deps.logger.info('Bulk payment run finished', {
      organizationId,
      successCount: created.length,
      failedCount: errors.length,
    });

    return {
      created,
      totalAmount: fromCents(totalCents),
      successCount: created.length,
      failedCount: errors.length,
      errors,
    };
  }

  private async describeOrder(organizationId: string, orderId: string): Promise<{ orderNumber: string | null; clientName: string | null }> {
    try {
      return await this.deps.store.transaction(async (tx) => {
        const order = await tx.orders.getOrder(organizationId, orderId);
        if (!order) return { orderNumber: null, clientName: null };
        const client = await tx.clients.getClient(organizationId, order.clientId);
        return { orderNumber: order.orderNumber, clientName: client?.name ?? null };
      });
    } catch (error) {
      this.deps.logger.warn('Could not resolve order for bulk payment error', { organizationId, orderId, error: errorMessage(error) });
      return { orderNumber: null, clientName: null };
    }
  }

  async getOrderSummary(args: {
    organizationId: string;
    orderId: string;
    includeCancelled?: boolean;
  }): Promise<EngineResult<OrderPaymentSummary>> {
    const { organizationId, orderId, includeCancelled = false } = args;
    return this.deps.store.transaction(async (tx): Promise<EngineResult<OrderPaymentSummary>> => {
      const order = await tx.orders.getOrder(organizationId, orderId);
      if (!order) return fail(orderNotFound(orderId));

      const payments = await tx.payments.listPaymentsForOrder(organizationId, orderId, { onlyConfirmed: !includeCancelled });
      return ok({
        orderId: order.id,
        orderNumber: order.orderNumber,
        totalAmount: order.totalAmount,
        paidAmount: order.paidAmount,
        balanceDue: order.balanceDue,
        paymentStatus: order.paymentStatus,
        statusLabel: getPaymentStatusLabel(order),
        paymentCount: payments.length,
        payments,
      });
    });
  }

  async getPayment(organizationId: string, paymentId: string): Promise<EngineResult<PaymentRecord>> {
    const payment = await this.deps.store.transaction((tx) => tx.payments.getPayment(organizationId, paymentId));
    return payment ? ok(payment) : fail(paymentNotFound(paymentId));
  }

  async getPaymentByNumber(organizationId: string, paymentNumber: string): Promise<EngineResult<PaymentRecord>> {
    const payment = await this.deps.store.transaction((tx) => tx.payments.getPaymentByNumber(organizationId, paymentNumber));
    return payment ? ok(payment) : fail(paymentNotFound(paymentNumber));
  }

  async listPayments(organizationId: string, filters: PaymentListFiltersInput = {}): Promise<EngineResult<PaymentRecord[]>> {
    const parsed = paymentListFiltersSchema.safeParse(filters);
    if (!parsed.success) return fail(fromZodValidation(parsed.error));
    const payments = await this.deps.store.transaction((tx) => tx.payments.listPayments(organizationId, parsed.data));
    return ok(payments);
  }
}
