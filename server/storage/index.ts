/**
 * Storage Layer Index
 *
 * Binds the drizzle repositories to a single transaction and exposes them
 * to the engine as an EngineStore.
 */

import type { DbExecutor } from "./executor";
import { CatalogRepository } from "./catalog.repo";
import { InventoryRepository } from "./inventory.repo";
import { OrdersRepository } from "./orders.repo";
import { PaymentsRepository } from "./payments.repo";
import type { EngineStore, EngineTx } from "./types";

export function createTxRepositories(executor: DbExecutor): EngineTx {
    const catalog = new CatalogRepository(executor);
    return {
        orders: new OrdersRepository(executor),
        payments: new PaymentsRepository(executor),
        inventory: new InventoryRepository(executor),
        clients: catalog,
        routes: catalog,
        catalog,
        pricing: catalog,
    };
}

export class DrizzleEngineStore implements EngineStore {
    constructor(private readonly dbInstance: DbExecutor) { }

    transaction<T>(work: (tx: EngineTx) => Promise<T>): Promise<T> {
        return this.dbInstance.transaction((tx) => work(createTxRepositories(tx)));
    }
}

export { CatalogRepository, InventoryRepository, OrdersRepository, PaymentsRepository };
export type * from "./types";
