import type { EngineConfig } from '../../config';
import { createOrderEngine, type OrderEngine } from '../../engine';
import type { EngineError, EngineResult } from '../../errors';
import type { OrderRecord } from '../../storage/types';
import type { CreateOrderInput } from '@shared/schema';
import { MemoryEngineStore } from './memoryStore';
import { CapturingLogger } from './testLogger';

export const ORG = 'org-1';
export const OTHER_ORG = 'org-2';
export const ACTOR = 'user-1';

export interface TestEngine {
  store: MemoryEngineStore;
  log: CapturingLogger;
  engine: OrderEngine;
}

/**
 * Engine over a seeded in-memory store:
 * - prod-a Widget  W-1  price 5    stock 10
 * - prod-b Gadget  G-1  price 150  stock 5
 * - prod-c Crate   C-1  price 100  stock 50
 * - prod-off Retired (inactive)
 */
export function buildEngine(config: Partial<EngineConfig> = {}): TestEngine {
  const store = new MemoryEngineStore();
  const log = new CapturingLogger();
  const engine = createOrderEngine({ store, config, logger: log });

  store.addClient(ORG, { id: 'client-1', name: 'Client One' });
  store.addClient(ORG, { id: 'client-off', name: 'Dormant Client', status: 'inactive' });
  store.addRoute(ORG, { id: 'route-1', name: 'North Route' });
  store.addRoute(ORG, { id: 'route-off', name: 'Closed Route', status: 'inactive' });
  store.addProduct(ORG, { id: 'prod-a', name: 'Widget', sku: 'W-1', price: 5, stock: 10 });
  store.addProduct(ORG, { id: 'prod-b', name: 'Gadget', sku: 'G-1', price: 150, stock: 5 });
  store.addProduct(ORG, { id: 'prod-c', name: 'Crate', sku: 'C-1', price: 100, stock: 50 });
  store.addProduct(ORG, { id: 'prod-off', name: 'Retired', sku: 'R-1', price: 1, stock: 100, status: 'inactive' });

  return { store, log, engine };
}

export function unwrap<T>(result: EngineResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export function failureOf<T>(result: EngineResult<T>): EngineError {
  if (result.ok) {
    throw new Error('Expected a failed result');
  }
  return result.error;
}

export async function createPendingOrder(
  engine: OrderEngine,
  items: CreateOrderInput['items'],
  extra: Partial<Omit<CreateOrderInput, 'items'>> = {},
): Promise<OrderRecord> {
  return unwrap(await engine.orders.createOrder({
    organizationId: ORG,
    actorUserId: ACTOR,
    input: { clientId: 'client-1', items, ...extra },
  }));
}

export async function createConfirmedOrder(
  engine: OrderEngine,
  items: CreateOrderInput['items'],
): Promise<OrderRecord> {
  const order = await createPendingOrder(engine, items);
  return unwrap(await engine.orders.transition({ organizationId: ORG, orderId: order.id, toStatus: 'confirmed' }));
}
