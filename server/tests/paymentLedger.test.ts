import { describe, expect, test } from '@jest/globals';
import {
  ACTOR,
  buildEngine,
  createPendingOrder,
  failureOf,
  ORG,
  unwrap,
} from './support/fixtures';

const scenarioItems = [
  { productId: 'prod-a', quantity: 3 },
  { productId: 'prod-b', quantity: 2 },
];

describe('PaymentLedgerService.recordPayment', () => {
  test('payments move an order from unpaid to partial to paid', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    expect(order.totalAmount).toBe(315);

    const first = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      actorUserId: ACTOR,
      input: { orderId: order.id, amount: 100, paymentMethod: 'cash' },
    }));
    expect(first.payment.paymentNumber).toMatch(/^PAY-[0-9A-F]{8}$/);
    expect(first.payment.status).toBe('confirmed');
    expect(first.payment.createdByUserId).toBe(ACTOR);
    expect(first.order).toMatchObject({ paidAmount: 100, balanceDue: 215, paymentStatus: 'partial' });

    const second = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 215, paymentMethod: 'bank_transfer' },
    }));
    expect(second.order).toMatchObject({ paidAmount: 315, balanceDue: 0, paymentStatus: 'paid' });
  });

  test('overpayment is kept as a negative balance', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, [{ productId: 'prod-c', quantity: 1 }]);

    const { order: updated } = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 150, paymentMethod: 'cash' },
    }));

    expect(updated).toMatchObject({ totalAmount: 100, paidAmount: 150, balanceDue: -50, paymentStatus: 'paid' });
  });

  test('overpayment can be rejected by configuration', async () => {
    const { engine, store } = buildEngine({ allowOverpayment: false });
    const order = await createPendingOrder(engine, [{ productId: 'prod-c', quantity: 1 }]);

    const error = failureOf(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 150, paymentMethod: 'cash' },
    }));
    expect(error).toMatchObject({ kind: 'validation', code: 'OVERPAYMENT_NOT_ALLOWED', field: 'amount' });
    expect(error.message).toBe('Payment of 150 exceeds the balance due of 100');
    expect(store.state.payments).toHaveLength(0);

    const exact = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 100, paymentMethod: 'cash' },
    }));
    expect(exact.order.paymentStatus).toBe('paid');
  });

  test('amounts are rounded to cents', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);

    const { payment } = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 12.3456, paymentMethod: 'check' },
    }));

    expect(payment.amount).toBe(12.35);
  });

  test.each([0, -5, 0.001])('rejects non-positive amount %p', async (amount) => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);

    const error = failureOf(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount, paymentMethod: 'cash' },
    }));

    expect(error).toMatchObject({ kind: 'validation', code: 'INVALID_INPUT', field: 'amount' });
  });

  test.each([Infinity, 1e12])('rejects amount %p outside the money column range', async (amount) => {
    const { engine, store } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);

    const error = failureOf(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount, paymentMethod: 'cash' },
    }));

    expect(error).toMatchObject({ kind: 'validation', code: 'INVALID_INPUT', field: 'amount' });
    expect(store.state.payments).toHaveLength(0);
    const current = unwrap(await engine.orders.getOrder(ORG, order.id));
    expect(current).toMatchObject({ paidAmount: 0, balanceDue: 315, paymentStatus: 'unpaid' });
  });

  test('unknown order', async () => {
    const { engine } = buildEngine();
    const error = failureOf(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: 'nope', amount: 10, paymentMethod: 'cash' },
    }));
    expect(error).toMatchObject({ kind: 'not_found', code: 'ORDER_NOT_FOUND' });
  });

  test('cancelled orders take no payments', async () => {
    const { engine, store } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    unwrap(await engine.orders.cancelOrder({ organizationId: ORG, orderId: order.id }));

    const error = failureOf(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 10, paymentMethod: 'cash' },
    }));

    expect(error).toMatchObject({ kind: 'invalid_state', code: 'ORDER_CANCELLED' });
    expect(store.state.payments).toHaveLength(0);
  });
});

describe('PaymentLedgerService.cancelPayment', () => {
  test('cancelling a payment takes it out of the ledger', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    const first = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 100, paymentMethod: 'cash' },
    }));
    unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 215, paymentMethod: 'cash' },
    }));

    const cancelled = unwrap(await engine.payments.cancelPayment({ organizationId: ORG, paymentId: first.payment.id }));

    expect(cancelled.payment.status).toBe('cancelled');
    expect(cancelled.order).toMatchObject({ paidAmount: 215, balanceDue: 100, paymentStatus: 'partial' });
  });

  test('cancelling twice is rejected and leaves the ledger alone', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    const { payment } = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 100, paymentMethod: 'cash' },
    }));
    unwrap(await engine.payments.cancelPayment({ organizationId: ORG, paymentId: payment.id }));

    const error = failureOf(await engine.payments.cancelPayment({ organizationId: ORG, paymentId: payment.id }));

    expect(error).toMatchObject({ kind: 'invalid_state', code: 'PAYMENT_ALREADY_CANCELLED' });
    const after = unwrap(await engine.orders.getOrder(ORG, order.id));
    expect(after).toMatchObject({ paidAmount: 0, balanceDue: 315, paymentStatus: 'unpaid' });
  });

  test('unknown payment', async () => {
    const { engine } = buildEngine();
    const error = failureOf(await engine.payments.cancelPayment({ organizationId: ORG, paymentId: 'nope' }));
    expect(error).toEqual({ kind: 'not_found', code: 'PAYMENT_NOT_FOUND', message: 'Payment nope not found' });
  });
});

describe('PaymentLedgerService.recompute', () => {
  test('is idempotent', async () => {
    const { engine, store } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 40, paymentMethod: 'cash' },
    }));

    const [once, twice] = await store.transaction(async (tx) => [
      await engine.payments.recompute(tx, ORG, order.id),
      await engine.payments.recompute(tx, ORG, order.id),
    ]);

    expect(once).toMatchObject({ paidAmount: 40, balanceDue: 275, paymentStatus: 'partial' });
    expect(twice).toMatchObject({ paidAmount: 40, balanceDue: 275, paymentStatus: 'partial' });
  });
});

describe('PaymentLedgerService.bulkCreate', () => {
  test('records what it can and explains the rest', async () => {
    const { engine } = buildEngine();
    const open = await createPendingOrder(engine, scenarioItems);
    const closed = await createPendingOrder(engine, [{ productId: 'prod-c', quantity: 1 }]);
    unwrap(await engine.orders.cancelOrder({ organizationId: ORG, orderId: closed.id }));

    const result = await engine.payments.bulkCreate({
      organizationId: ORG,
      entries: [
        { orderId: open.id, amount: 50, paymentMethod: 'cash' },
        { orderId: 'missing', amount: 10, paymentMethod: 'cash' },
        { orderId: closed.id, amount: 20, paymentMethod: 'check' },
        { orderId: open.id, amount: -5, paymentMethod: 'cash' },
        { orderId: open.id, amount: 25, paymentMethod: 'credit_card' },
      ],
    });

    expect(result.successCount).toBe(2);
    expect(result.failedCount).toBe(3);
    expect(result.totalAmount).toBe(75);
    expect(result.created.map((p) => p.amount)).toEqual([50, 25]);
    expect(result.errors.map(({ index, orderId, orderNumber, clientName, code }) => ({ index, orderId, orderNumber, clientName, code }))).toEqual([
      { index: 1, orderId: 'missing', orderNumber: null, clientName: null, code: 'ORDER_NOT_FOUND' },
      { index: 2, orderId: closed.id, orderNumber: closed.orderNumber, clientName: 'Client One', code: 'ORDER_CANCELLED' },
      { index: 3, orderId: open.id, orderNumber: open.orderNumber, clientName: 'Client One', code: 'INVALID_INPUT' },
    ]);

    const after = unwrap(await engine.orders.getOrder(ORG, open.id));
    expect(after).toMatchObject({ paidAmount: 75, balanceDue: 240, paymentStatus: 'partial' });
  });

  test('an unexpected failure on one entry does not stop the others', async () => {
    const { engine, store, log } = buildEngine();
    const first = await createPendingOrder(engine, scenarioItems);
    const second = await createPendingOrder(engine, scenarioItems);
    store.failingOrderReads.add(first.id);

    const result = await engine.payments.bulkCreate({
      organizationId: ORG,
      entries: [
        { orderId: first.id, amount: 10, paymentMethod: 'cash' },
        { orderId: second.id, amount: 10, paymentMethod: 'cash' },
      ],
    });

    expect(result.successCount).toBe(1);
    expect(result.errors).toEqual([
      {
        index: 0,
        orderId: first.id,
        orderNumber: null,
        clientName: null,
        code: 'UNEXPECTED_ERROR',
        message: `simulated read failure for ${first.id}`,
      },
    ]);
    expect(log.messages('error')).toEqual([`simulated read failure for ${first.id}`]);
  });
});

describe('payment reads', () => {
  test('getOrderSummary shows confirmed payments unless asked otherwise', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    const { payment } = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 100, paymentMethod: 'cash' },
    }));
    unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 15, paymentMethod: 'cash' },
    }));
    unwrap(await engine.payments.cancelPayment({ organizationId: ORG, paymentId: payment.id }));

    const summary = unwrap(await engine.payments.getOrderSummary({ organizationId: ORG, orderId: order.id }));
    expect(summary).toMatchObject({
      orderId: order.id,
      orderNumber: order.orderNumber,
      totalAmount: 315,
      paidAmount: 15,
      balanceDue: 300,
      paymentStatus: 'partial',
      statusLabel: 'Partially Paid',
      paymentCount: 1,
    });

    const withCancelled = unwrap(await engine.payments.getOrderSummary({ organizationId: ORG, orderId: order.id, includeCancelled: true }));
    expect(withCancelled.paymentCount).toBe(2);

    expect(failureOf(await engine.payments.getOrderSummary({ organizationId: ORG, orderId: 'nope' })).code).toBe('ORDER_NOT_FOUND');
  });

  test('getPayment, getPaymentByNumber and listPayments', async () => {
    const { engine } = buildEngine();
    const order = await createPendingOrder(engine, scenarioItems);
    const cash = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 10, paymentMethod: 'cash', notes: 'Deposit' },
    })).payment;
    const card = unwrap(await engine.payments.recordPayment({
      organizationId: ORG,
      input: { orderId: order.id, amount: 20, paymentMethod: 'credit_card' },
    })).payment;
    unwrap(await engine.payments.cancelPayment({ organizationId: ORG, paymentId: card.id }));

    expect(unwrap(await engine.payments.getPayment(ORG, cash.id)).notes).toBe('Deposit');
    expect(unwrap(await engine.payments.getPaymentByNumber(ORG, card.paymentNumber)).status).toBe('cancelled');
    expect(failureOf(await engine.payments.getPayment(ORG, 'nope')).code).toBe('PAYMENT_NOT_FOUND');

    const confirmedOnly = unwrap(await engine.payments.listPayments(ORG, { orderId: order.id }));
    expect(confirmedOnly.map((p) => p.id)).toEqual([cash.id]);

    const everything = unwrap(await engine.payments.listPayments(ORG, { orderId: order.id, includeCancelled: true }));
    expect(everything.map((p) => p.id)).toEqual([card.id, cash.id]);

    const cancelled = unwrap(await engine.payments.listPayments(ORG, { status: 'cancelled' }));
    expect(cancelled.map((p) => p.id)).toEqual([card.id]);

    const byMethod = unwrap(await engine.payments.listPayments(ORG, { paymentMethod: 'cash' }));
    expect(byMethod.map((p) => p.id)).toEqual([cash.id]);
  });
});
