import {
    clients,
    routes,
    products,
    productRoutePrices,
} from "@shared/schema";
import { eq } from "drizzle-orm";
import { withTenantScope, parseDecimal, type DbExecutor } from "./executor";
import { toCatalogProduct } from "./inventory.repo";
import type {
    CatalogProduct,
    ClientDirectory,
    DirectoryEntry,
    PricingService,
    ProductCatalog,
    RouteDirectory,
} from "./types";

/**
 * Read-only access to the clients, routes and products the engine references.
 */
export class CatalogRepository implements ClientDirectory, RouteDirectory, ProductCatalog, PricingService {
    constructor(private readonly dbInstance: DbExecutor) { }

    async getClient(organizationId: string, clientId: string): Promise<DirectoryEntry | undefined> {
        const [client] = await this.dbInstance
            .select({ id: clients.id, name: clients.name, status: clients.status })
            .from(clients)
            .where(withTenantScope(clients.organizationId, organizationId, eq(clients.id, clientId)))
            .limit(1);
        return client;
    }

    async getRoute(organizationId: string, routeId: string): Promise<DirectoryEntry | undefined> {
        const [route] = await this.dbInstance
            .select({ id: routes.id, name: routes.name, status: routes.status })
            .from(routes)
            .where(withTenantScope(routes.organizationId, organizationId, eq(routes.id, routeId)))
            .limit(1);
        return route;
    }

    async getProduct(organizationId: string, productId: string): Promise<CatalogProduct | undefined> {
        const [product] = await this.dbInstance
            .select()
            .from(products)
            .where(withTenantScope(products.organizationId, organizationId, eq(products.id, productId)))
            .limit(1);
        return product ? toCatalogProduct(product) : undefined;
    }

    async priceFor(organizationId: string, productId: string, routeId: string | null): Promise<number | undefined> {
        if (routeId) {
            const [override] = await this.dbInstance
                .select({ price: productRoutePrices.price })
                .from(productRoutePrices)
                .where(withTenantScope(
                    productRoutePrices.organizationId,
                    organizationId,
                    eq(productRoutePrices.productId, productId),
                    eq(productRoutePrices.routeId, routeId),
                    eq(productRoutePrices.status, 'active'),
                ))
                .limit(1);
            if (override) return parseDecimal(override.price);
        }

        const product = await this.getProduct(organizationId, productId);
        return product?.price;
    }
}
