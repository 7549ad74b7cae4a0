import type { OrderPaymentStatus, PaymentStatus } from '../orderLifecycle';
import { fromCents, toCents } from './orderTotals';

export type PaymentRollupInput = {
  status: PaymentStatus;
  amount: number;
};

export type OrderPaymentRollup = {
  paidAmount: number;
  balanceDue: number;
  paymentStatus: OrderPaymentStatus;
};

/**
 * Derives paid / balance / payment status from an order total and its payments.
 *
 * Only confirmed payments count. The balance is not clamped: an overpaid
 * order carries a negative balance and is reported as paid.
 */
export function computeOrderPaymentRollup(params: {
  totalAmount: number;
  payments: PaymentRollupInput[];
}): OrderPaymentRollup {
  const totalCents = toCents(params.totalAmount);

  let paidCents = 0;
  for (const p of params.payments) {
    if (p.status !== 'confirmed') continue;
    paidCents += toCents(p.amount);
  }

  const balanceCents = totalCents - paidCents;

  let paymentStatus: OrderPaymentStatus = 'unpaid';
  if (balanceCents <= 0) {
    paymentStatus = 'paid';
  } else if (paidCents > 0) {
    paymentStatus = 'partial';
  }

  return {
    paidAmount: fromCents(paidCents),
    balanceDue: fromCents(balanceCents),
    paymentStatus,
  };
}

export type PaymentStatusLabel = 'Unpaid' | 'Partially Paid' | 'Paid' | 'Overpaid';

export function getPaymentStatusLabel(rollup: OrderPaymentRollup): PaymentStatusLabel {
  if (rollup.balanceDue < 0) return 'Overpaid';
  if (rollup.paymentStatus === 'paid') return 'Paid';
  if (rollup.paymentStatus === 'partial') return 'Partially Paid';
  return 'Unpaid';
}
