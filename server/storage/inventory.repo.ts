import {
    products,
    stockMovements,
    type Product,
} from "@shared/schema";
import { eq, gte, asc, inArray, sql } from "drizzle-orm";
import { withTenantScope, formatDecimal, parseDecimal, type DbExecutor } from "./executor";
import type { CatalogProduct, InventoryRepositoryPort, NewStockMovement } from "./types";

export function toCatalogProduct(row: Product): CatalogProduct {
    return {
        id: row.id,
        name: row.name,
        sku: row.sku,
        price: parseDecimal(row.price),
        stockQuantity: parseDecimal(row.stockQuantity),
        status: row.status,
    };
}

/** Row locks on the given products, taken in id order. */
export function lockProductsQuery(db: DbExecutor, organizationId: string, productIds: string[]) {
    return db
        .select()
        .from(products)
        .where(withTenantScope(products.organizationId, organizationId, inArray(products.id, productIds)))
        .orderBy(asc(products.id))
        .for('update');
}

/** Decrement guarded by `stock >= qty`; returns no row when the guard rejects it. */
export function decrementStockQuery(db: DbExecutor, organizationId: string, productId: string, quantity: number) {
    const qty = formatDecimal(quantity);
    return db.update(products)
        .set({
            stockQuantity: sql`${products.stockQuantity} - ${qty}::numeric`,
            updatedAt: new Date(),
        })
        .where(withTenantScope(
            products.organizationId,
            organizationId,
            eq(products.id, productId),
            gte(products.stockQuantity, qty),
        ))
        .returning({ id: products.id });
}

export class InventoryRepository implements InventoryRepositoryPort {
    constructor(private readonly dbInstance: DbExecutor) { }

    async lockProducts(organizationId: string, productIds: string[]): Promise<CatalogProduct[]> {
        if (productIds.length === 0) return [];
        const rows = await lockProductsQuery(this.dbInstance, organizationId, productIds);
        return rows.map(toCatalogProduct);
    }

    async decrementStock(organizationId: string, productId: string, quantity: number): Promise<boolean> {
        const updated = await decrementStockQuery(this.dbInstance, organizationId, productId, quantity);
        return updated.length === 1;
    }

    async incrementStock(organizationId: string, productId: string, quantity: number): Promise<boolean> {
        const qty = formatDecimal(quantity);
        // Savepoint: a failed release is reported, the caller's transaction carries on
        return this.dbInstance.transaction(async (sp) => {
            const updated = await sp.update(products)
                .set({
                    stockQuantity: sql`${products.stockQuantity} + ${qty}::numeric`,
                    updatedAt: new Date(),
                })
                .where(withTenantScope(products.organizationId, organizationId, eq(products.id, productId)))
                .returning({ id: products.id });
            return updated.length === 1;
        });
    }

    async recordMovement(organizationId: string, movement: NewStockMovement): Promise<void> {
        await this.dbInstance.transaction(async (sp) => {
            await sp.insert(stockMovements).values({
                organizationId,
                productId: movement.productId,
                orderId: movement.orderId,
                type: movement.type,
                quantity: formatDecimal(movement.quantity),
            });
        });
    }
}
