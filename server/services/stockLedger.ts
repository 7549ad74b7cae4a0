/**
 * Stock Ledger
 *
 * Reserves and releases product stock for orders. All calls run inside the
 * caller's transaction so stock moves commit together with the order status.
 */

import { aggregateQuantitiesByProduct } from '@shared/rollups/orderTotals';
import { fail, insufficientStock, ok, errorMessage, type EngineResult, type StockShortfall } from '../errors';
import { logger as defaultLogger, type EngineLogger } from '../logger';
import type { CatalogProduct, EngineTx } from '../storage/types';

export interface StockLine {
  productId: string;
  quantity: number;
}

export interface StockMoveArgs {
  organizationId: string;
  orderId: string | null;
  lines: StockLine[];
}

export interface StockReleaseFailure {
  productId: string;
  quantity: number;
  message: string;
}

export interface StockReleaseReport {
  released: StockLine[];
  failures: StockReleaseFailure[];
}

function shortfallFor(line: StockLine, product: CatalogProduct | undefined): StockShortfall | null {
  if (!product) {
    return {
      productId: line.productId,
      productName: null,
      sku: null,
      required: line.quantity,
      available: 0,
      reason: 'product_not_found',
    };
  }
  if (product.status !== 'active') {
    return {
      productId: product.id,
      productName: product.name,
      sku: product.sku,
      required: line.quantity,
      available: product.stockQuantity,
      reason: 'product_inactive',
    };
  }
  if (product.stockQuantity < line.quantity) {
    return {
      productId: product.id,
      productName: product.name,
      sku: product.sku,
      required: line.quantity,
      available: product.stockQuantity,
      reason: 'insufficient_stock',
    };
  }
  return null;
}

export class StockLedger {
  constructor(private readonly log: EngineLogger = defaultLogger) { }

  /**
   * True when the product exists, is active and has at least `quantity` on hand.
   */
  async checkAvailability(tx: EngineTx, organizationId: string, productId: string, quantity: number): Promise<boolean> {
    const product = await tx.catalog.getProduct(organizationId, productId);
    return shortfallFor({ productId, quantity }, product) === null;
  }

  /**
   * Unlocked pre-check used by batch updates. Duplicate product lines are summed.
   */
  async findShortfalls(tx: EngineTx, organizationId: string, lines: StockLine[]): Promise<StockShortfall[]> {
    const shortfalls: StockShortfall[] = [];
    for (const line of aggregateQuantitiesByProduct(lines)) {
      const product = await tx.catalog.getProduct(organizationId, line.productId);
      const shortfall = shortfallFor(line, product);
      if (shortfall) shortfalls.push(shortfall);
    }
    return shortfalls;
  }

  /**
   * Locks every product, checks all of them, then decrements all of them.
   * Nothing is decremented when any line falls short.
   */
  async reserveAll(tx: EngineTx, args: StockMoveArgs): Promise<EngineResult<StockLine[]>> {
    const { organizationId, orderId } = args;
    const lines = aggregateQuantitiesByProduct(args.lines);
    if (lines.length === 0) return ok([]);

    const ids = lines.map((l) => l.productId).sort();
    const locked = await tx.inventory.lockProducts(organizationId, ids);
    const byId = new Map(locked.map((p) => [p.id, p]));

    const shortfalls: StockShortfall[] = [];
    for (const line of lines) {
      const shortfall = shortfallFor(line, byId.get(line.productId));
      if (shortfall) shortfalls.push(shortfall);
    }
    if (shortfalls.length > 0) {
      this.log.info('Stock reservation rejected', { organizationId, orderId, shortfalls });
      return fail(insufficientStock(shortfalls));
    }

    for (const line of lines) {
      const decremented = await tx.inventory.decrementStock(organizationId, line.productId, line.quantity);
      if (!decremented) {
        // Rows are locked, so this only happens if the lock was not honoured
        throw new Error(`Stock guard rejected decrement of ${line.quantity} for product ${line.productId}`);
      }
      await tx.inventory.recordMovement(organizationId, {
        productId: line.productId,
        orderId,
        type: 'reserve',
        quantity: line.quantity,
      });
    }

    this.log.info('Stock reserved', { organizationId, orderId, lines });
    return ok(lines);
  }

  /**
   * Gives stock back line by line. A failing line is logged and reported,
   * the remaining lines are still released.
   */
  async releaseAll(tx: EngineTx, args: StockMoveArgs): Promise<StockReleaseReport> {
    const { organizationId, orderId } = args;
    const report: StockReleaseReport = { released: [], failures: [] };

    for (const line of aggregateQuantitiesByProduct(args.lines)) {
      try {
        const incremented = await tx.inventory.incrementStock(organizationId, line.productId, line.quantity);
        if (!incremented) {
          throw new Error(`Product ${line.productId} not found`);
        }
        report.released.push(line);
      } catch (error) {
        const message = errorMessage(error);
        this.log.warn('Stock release failed', { organizationId, orderId, productId: line.productId, quantity: line.quantity, error: message });
        report.failures.push({ ...line, message });
        continue;
      }

      try {
        await tx.inventory.recordMovement(organizationId, {
          productId: line.productId,
          orderId,
          type: 'release',
          quantity: line.quantity,
        });
      } catch (error) {
        this.log.warn('Stock movement not recorded', { organizationId, orderId, productId: line.productId, error: errorMessage(error) });
      }
    }

    if (report.released.length > 0) {
      this.log.info('Stock released', { organizationId, orderId, lines: report.released });
    }
    return report;
  }
}
