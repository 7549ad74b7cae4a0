/**
 * Engine Error Taxonomy
 *
 * Every public engine operation returns an EngineResult. Business failures
 * travel as values; only unexpected persistence failures are thrown.
 */

import type { ZodError } from 'zod';
import { fromZodError } from 'zod-validation-error';

export type EngineErrorKind = 'validation' | 'insufficient_stock' | 'not_found' | 'invalid_state';

export type ShortfallReason = 'insufficient_stock' | 'product_inactive' | 'product_not_found';

export interface StockShortfall {
  productId: string;
  productName: string | null;
  sku: string | null;
  required: number;
  available: number;
  reason: ShortfallReason;
}

export interface ValidationError {
  kind: 'validation';
  code: string;
  message: string;
  field?: string;
}

export interface InsufficientStockError {
  kind: 'insufficient_stock';
  code: 'INSUFFICIENT_STOCK';
  message: string;
  shortfalls: StockShortfall[];
}

export interface NotFoundError {
  kind: 'not_found';
  code: 'ORDER_NOT_FOUND' | 'PAYMENT_NOT_FOUND';
  message: string;
}

export interface InvalidStateError {
  kind: 'invalid_state';
  code: string;
  message: string;
}

export type EngineError = ValidationError | InsufficientStockError | NotFoundError | InvalidStateError;

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export function ok<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: EngineError): EngineResult<T> {
  return { ok: false, error };
}

export function validationError(code: string, message: string, field?: string): ValidationError {
  return field ? { kind: 'validation', code, message, field } : { kind: 'validation', code, message };
}

export function fromZodValidation(error: ZodError): ValidationError {
  const firstPath = error.issues[0]?.path.join('.');
  return validationError(
    'INVALID_INPUT',
    fromZodError(error, { prefix: 'Invalid input' }).message,
    firstPath || undefined,
  );
}

export function insufficientStock(shortfalls: StockShortfall[]): InsufficientStockError {
  const summary = shortfalls
    .map((s) => `${s.productName ?? s.productId}: required ${s.required}, available ${s.available}`)
    .join('; ');
  return {
    kind: 'insufficient_stock',
    code: 'INSUFFICIENT_STOCK',
    message: `Insufficient stock: ${summary}`,
    shortfalls,
  };
}

export function orderNotFound(orderId: string): NotFoundError {
  return { kind: 'not_found', code: 'ORDER_NOT_FOUND', message: `Order ${orderId} not found` };
}

export function paymentNotFound(paymentId: string): NotFoundError {
  return { kind: 'not_found', code: 'PAYMENT_NOT_FOUND', message: `Payment ${paymentId} not found` };
}

export function invalidState(code: string, message: string): InvalidStateError {
  return { kind: 'invalid_state', code, message };
}

const HTTP_STATUS_BY_KIND: Record<EngineErrorKind, number> = {
  validation: 400,
  insufficient_stock: 409,
  not_found: 404,
  invalid_state: 409,
};

/**
 * Status code the HTTP layer should answer with for a given engine error.
 */
export function httpStatusForError(error: EngineError): number {
  return HTTP_STATUS_BY_KIND[error.kind];
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
