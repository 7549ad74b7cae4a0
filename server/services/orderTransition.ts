/**
 * Order State Transition Rules
 *
 * Single source of truth for which status moves are allowed.
 */

import {
  CANCELLABLE_ORDER_STATUSES,
  ORDER_STATUS_LABELS,
  TERMINAL_ORDER_STATUSES,
  type OrderStatus,
} from '@shared/orderLifecycle';

export interface TransitionOptions {
  /** When false, any move except a same-status one is accepted. */
  strict: boolean;
}

export interface TransitionResult {
  ok: boolean;
  code?: string;
  message?: string;
}

const ALLOWED_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  pending: ['confirmed', 'cancelled'],
  confirmed: ['in_progress', 'cancelled'],
  in_progress: ['shipped', 'cancelled'],
  shipped: ['delivered'],
  delivered: [],
  cancelled: [],
};

/**
 * Get allowed next statuses for a given current status.
 */
export function getAllowedNextStatuses(currentStatus: OrderStatus): OrderStatus[] {
  return [...ALLOWED_TRANSITIONS[currentStatus]];
}

/**
 * Check if a status is terminal (no further transitions allowed).
 */
export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.includes(status);
}

/**
 * Line items, client, route and discount can only be replaced while pending.
 */
export function areLineItemsEditable(status: OrderStatus): boolean {
  return status === 'pending';
}

export function isCancellable(status: OrderStatus): boolean {
  return CANCELLABLE_ORDER_STATUSES.includes(status);
}

/**
 * Validates if a status transition is allowed.
 */
export function validateOrderTransition(
  from: OrderStatus,
  to: OrderStatus,
  options: TransitionOptions,
): TransitionResult {
  if (from === to) {
    return {
      ok: false,
      code: 'SAME_STATUS',
      message: `Order is already ${ORDER_STATUS_LABELS[to].toLowerCase()}.`,
    };
  }

  if (!options.strict) {
    return { ok: true };
  }

  if (isTerminalStatus(from)) {
    return {
      ok: false,
      code: from === 'delivered' ? 'DELIVERED_TERMINAL' : 'CANCELLED_TERMINAL',
      message: `${ORDER_STATUS_LABELS[from]} orders cannot be changed.`,
    };
  }

  const allowed = ALLOWED_TRANSITIONS[from];
  if (!allowed.includes(to)) {
    return {
      ok: false,
      code: 'INVALID_TRANSITION',
      message: `Cannot transition from ${from} to ${to}. Valid options: ${allowed.join(', ')}.`,
    };
  }

  return { ok: true };
}
