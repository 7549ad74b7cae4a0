import { describe, expect, test } from '@jest/globals';
import {
  aggregateQuantitiesByProduct,
  computeLineTotal,
  computeOrderTotals,
  roundQuantity,
  toCents,
} from '../rollups/orderTotals';

describe('computeLineTotal', () => {
  test('whole quantities', () => {
    expect(computeLineTotal(3, 5)).toBe(15);
    expect(computeLineTotal(2, 150)).toBe(300);
  });

  test('fractional quantities round to the cent', () => {
    expect(computeLineTotal(1.5, 2.99)).toBe(4.49);
    expect(computeLineTotal(0.3, 3)).toBe(0.9);
  });
});

describe('computeOrderTotals', () => {
  const items = [
    { productId: 'a', quantity: 3, unitPrice: 5 },
    { productId: 'b', quantity: 2, unitPrice: 150 },
  ];

  test('sums line totals', () => {
    const totals = computeOrderTotals({ items });
    expect(totals.subtotal).toBe(315);
    expect(totals.discountAmount).toBe(0);
    expect(totals.totalAmount).toBe(315);
    expect(totals.items.map((i) => i.totalPrice)).toEqual([15, 300]);
  });

  test('applies a flat discount', () => {
    const totals = computeOrderTotals({ items, discountAmount: 2.5 });
    expect(totals.totalAmount).toBe(312.5);
  });

  test('clamps a discount above the subtotal', () => {
    const totals = computeOrderTotals({
      items: [{ productId: 'a', quantity: 1, unitPrice: 10 }],
      discountAmount: 25,
    });
    expect(totals).toEqual({
      items: [{ productId: 'a', quantity: 1, unitPrice: 10, totalPrice: 10 }],
      subtotal: 10,
      discountAmount: 10,
      totalAmount: 0,
    });
  });

  test('ignores a negative discount', () => {
    const totals = computeOrderTotals({ items, discountAmount: -5 });
    expect(totals.discountAmount).toBe(0);
    expect(totals.totalAmount).toBe(315);
  });
});

describe('quantity helpers', () => {
  test('roundQuantity keeps two decimals', () => {
    expect(roundQuantity(2.456)).toBe(2.46);
  });

  test('toCents treats junk as zero', () => {
    expect(toCents('abc')).toBe(0);
    expect(toCents(null)).toBe(0);
  });

  test('aggregateQuantitiesByProduct sums duplicates in first-seen order', () => {
    expect(aggregateQuantitiesByProduct([
      { productId: 'a', quantity: 1 },
      { productId: 'b', quantity: 2 },
      { productId: 'a', quantity: 0.5 },
    ])).toEqual([
      { productId: 'a', quantity: 1.5 },
      { productId: 'b', quantity: 2 },
    ]);
  });
});
