/**
 * Order totals.
 *
 * Money is handled in integer cents and quantities in hundredths so that
 * `quantity × unitPrice` never picks up floating point drift.
 */

export type OrderLineInput = {
  productId: string;
  quantity: number;
  unitPrice: number;
};

export type PricedOrderLine = OrderLineInput & {
  totalPrice: number;
};

export type OrderTotals = {
  items: PricedOrderLine[];
  subtotal: number;
  discountAmount: number; // effective discount, never above subtotal
  totalAmount: number;
};

export const toCents = (value: unknown): number => {
  const n = Number(value ?? 0);
  if (!Number.isFinite(n)) return 0;
  return Math.round(n * 100);
};

export const fromCents = (cents: number): number => cents / 100;

export function roundMoney(value: number): number {
  return fromCents(toCents(value));
}

export function roundQuantity(value: number): number {
  return fromCents(toCents(value));
}

export function computeLineTotal(quantity: number, unitPrice: number): number {
  const hundredths = toCents(quantity);
  const priceCents = toCents(unitPrice);
  return fromCents(Math.round((hundredths * priceCents) / 100));
}

export function computeOrderTotals(params: {
  items: OrderLineInput[];
  discountAmount?: number;
}): OrderTotals {
  let subtotalCents = 0;

  const items = params.items.map((item) => {
    const quantity = roundQuantity(item.quantity);
    const unitPrice = roundMoney(item.unitPrice);
    const totalPrice = computeLineTotal(quantity, unitPrice);
    subtotalCents += toCents(totalPrice);
    return { productId: item.productId, quantity, unitPrice, totalPrice };
  });

  const requestedDiscountCents = Math.max(0, toCents(params.discountAmount));
  const discountCents = Math.min(requestedDiscountCents, subtotalCents);

  return {
    items,
    subtotal: fromCents(subtotalCents),
    discountAmount: fromCents(discountCents),
    totalAmount: fromCents(subtotalCents - discountCents),
  };
}

/**
 * Sums quantities per product, keeping first-seen order.
 */
export function aggregateQuantitiesByProduct(
  lines: Array<{ productId: string; quantity: number }>,
): Array<{ productId: string; quantity: number }> {
  const byProduct = new Map<string, number>();
  for (const line of lines) {
    const current = byProduct.get(line.productId) ?? 0;
    byProduct.set(line.productId, current + toCents(line.quantity));
  }
  return Array.from(byProduct.entries()).map(([productId, hundredths]) => ({
    productId,
    quantity: fromCents(hundredths),
  }));
}
