import {
    orders,
    orderItems,
    orderAuditLog,
    type OrderRow,
    type OrderItemRow,
    type OrderAuditLogRow,
    type OrderListFilters,
} from "@shared/schema";
import type { OrderPaymentRollup } from "@shared/rollups/orderPaymentRollup";
import { eq, and, or, ilike, gte, lte, asc, desc, inArray, sql, type SQL } from "drizzle-orm";
import { buildDocumentNumber, DOCUMENT_NUMBER_ATTEMPTS } from "../lib/documentNumbers";
import { withTenantScope, escapeLikePattern, formatDecimal, parseDecimal, type DbExecutor } from "./executor";
import type {
    NewAuditEntry,
    NewOrder,
    NewOrderItem,
    OrderAuditEntry,
    OrderFieldsPatch,
    OrderItemRecord,
    OrderListPage,
    OrderRecord,
    OrderRepositoryPort,
} from "./types";

function toItemRecord(row: OrderItemRow): OrderItemRecord {
    return {
        id: row.id,
        productId: row.productId,
        quantity: parseDecimal(row.quantity),
        unitPrice: parseDecimal(row.unitPrice),
        totalPrice: parseDecimal(row.totalPrice),
    };
}

function toOrderRecord(row: OrderRow, items: OrderItemRow[]): OrderRecord {
    return {
        id: row.id,
        organizationId: row.organizationId,
        orderNumber: row.orderNumber,
        clientId: row.clientId,
        routeId: row.routeId,
        status: row.status,
        items: items.map(toItemRecord),
        discountAmount: parseDecimal(row.discountAmount),
        totalAmount: parseDecimal(row.totalAmount),
        paidAmount: parseDecimal(row.paidAmount),
        balanceDue: parseDecimal(row.balanceDue),
        paymentStatus: row.paymentStatus,
        notes: row.notes,
        createdByUserId: row.createdByUserId,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
    };
}

function toAuditEntry(row: OrderAuditLogRow): OrderAuditEntry {
    return {
        id: row.id,
        orderId: row.orderId,
        actorUserId: row.actorUserId,
        actionType: row.actionType,
        fromStatus: row.fromStatus,
        toStatus: row.toStatus,
        note: row.note,
        metadata: row.metadata ?? null,
        createdAt: row.createdAt,
    };
}

/** Case-insensitive substring match on order number or notes. */
export function orderSearchCondition(search: string): SQL | undefined {
    const pattern = `%${escapeLikePattern(search)}%`;
    return or(ilike(orders.orderNumber, pattern), ilike(orders.notes, pattern));
}

export class OrdersRepository implements OrderRepositoryPort {
    constructor(private readonly dbInstance: DbExecutor) { }

    async generateOrderNumber(organizationId: string, prefix: string): Promise<string> {
        for (let attempt = 0; attempt < DOCUMENT_NUMBER_ATTEMPTS; attempt++) {
            const candidate = buildDocumentNumber(prefix);
            const [existing] = await this.dbInstance
                .select({ id: orders.id })
                .from(orders)
                .where(withTenantScope(orders.organizationId, organizationId, eq(orders.orderNumber, candidate)))
                .limit(1);
            if (!existing) return candidate;
        }
        throw new Error(`Could not allocate a unique order number after ${DOCUMENT_NUMBER_ATTEMPTS} attempts`);
    }

    private async loadItems(orderIds: string[]): Promise<Map<string, OrderItemRow[]>> {
        const byOrder = new Map<string, OrderItemRow[]>();
        if (orderIds.length === 0) return byOrder;
        const rows = await this.dbInstance
            .select()
            .from(orderItems)
            .where(inArray(orderItems.orderId, orderIds))
            .orderBy(asc(orderItems.position));
        for (const row of rows) {
            const list = byOrder.get(row.orderId) ?? [];
            list.push(row);
            byOrder.set(row.orderId, list);
        }
        return byOrder;
    }

    private async insertItems(organizationId: string, orderId: string, items: NewOrderItem[]): Promise<void> {
        if (items.length === 0) return;
        await this.dbInstance.insert(orderItems).values(items.map((item, position) => ({
            organizationId,
            orderId,
            productId: item.productId,
            position,
            quantity: formatDecimal(item.quantity),
            unitPrice: formatDecimal(item.unitPrice),
            totalPrice: formatDecimal(item.totalPrice),
        })));
    }

    async insertOrder(organizationId: string, data: NewOrder): Promise<OrderRecord> {
        const [order] = await this.dbInstance.insert(orders).values({
            organizationId,
            orderNumber: data.orderNumber,
            clientId: data.clientId,
            routeId: data.routeId,
            status: data.status,
            discountAmount: formatDecimal(data.discountAmount),
            totalAmount: formatDecimal(data.totalAmount),
            paidAmount: formatDecimal(data.rollup.paidAmount),
            balanceDue: formatDecimal(data.rollup.balanceDue),
            paymentStatus: data.rollup.paymentStatus,
            notes: data.notes,
            createdByUserId: data.createdByUserId,
        }).returning();

        await this.insertItems(organizationId, order.id, data.items);
        const items = await this.loadItems([order.id]);
        return toOrderRecord(order, items.get(order.id) ?? []);
    }

    async getOrder(organizationId: string, orderId: string, options?: { forUpdate?: boolean }): Promise<OrderRecord | undefined> {
        const query = this.dbInstance
            .select()
            .from(orders)
            .where(withTenantScope(orders.organizationId, organizationId, eq(orders.id, orderId)))
            .limit(1);
        const [order] = options?.forUpdate ? await query.for('update') : await query;
        if (!order) return undefined;
        const items = await this.loadItems([order.id]);
        return toOrderRecord(order, items.get(order.id) ?? []);
    }

    async getOrderByNumber(organizationId: string, orderNumber: string): Promise<OrderRecord | undefined> {
        const [order] = await this.dbInstance
            .select()
            .from(orders)
            .where(withTenantScope(orders.organizationId, organizationId, eq(orders.orderNumber, orderNumber)))
            .limit(1);
        if (!order) return undefined;
        const items = await this.loadItems([order.id]);
        return toOrderRecord(order, items.get(order.id) ?? []);
    }

    async listOrders(organizationId: string, filters: OrderListFilters): Promise<OrderListPage> {
        const conditions: (SQL | undefined)[] = [];
        if (filters.search) conditions.push(orderSearchCondition(filters.search));
        if (filters.status) conditions.push(eq(orders.status, filters.status));
        if (filters.clientId) conditions.push(eq(orders.clientId, filters.clientId));
        if (filters.routeId) conditions.push(eq(orders.routeId, filters.routeId));
        if (filters.paymentStatus) conditions.push(eq(orders.paymentStatus, filters.paymentStatus));
        if (filters.dateFrom) conditions.push(gte(orders.createdAt, filters.dateFrom));
        if (filters.dateTo) conditions.push(lte(orders.createdAt, filters.dateTo));

        const where = withTenantScope(orders.organizationId, organizationId, ...conditions);

        const rows = await this.dbInstance
            .select()
            .from(orders)
            .where(where)
            .orderBy(desc(orders.createdAt))
            .limit(filters.limit)
            .offset(filters.offset);

        const [{ count }] = await this.dbInstance
            .select({ count: sql<number>`count(*)::int` })
            .from(orders)
            .where(where);

        const items = await this.loadItems(rows.map((r) => r.id));
        return {
            items: rows.map((row) => toOrderRecord(row, items.get(row.id) ?? [])),
            total: Number(count),
        };
    }

    async updateOrder(organizationId: string, orderId: string, patch: OrderFieldsPatch): Promise<OrderRecord> {
        const set: Partial<typeof orders.$inferInsert> = { updatedAt: new Date() };
        if (patch.clientId !== undefined) set.clientId = patch.clientId;
        if (patch.routeId !== undefined) set.routeId = patch.routeId;
        if (patch.status !== undefined) set.status = patch.status;
        if (patch.discountAmount !== undefined) set.discountAmount = formatDecimal(patch.discountAmount);
        if (patch.totalAmount !== undefined) set.totalAmount = formatDecimal(patch.totalAmount);
        if (patch.notes !== undefined) set.notes = patch.notes;

        const [updated] = await this.dbInstance.update(orders)
            .set(set)
            .where(withTenantScope(orders.organizationId, organizationId, eq(orders.id, orderId)))
            .returning();
        if (!updated) throw new Error(`Order ${orderId} disappeared during update`);

        const items = await this.loadItems([updated.id]);
        return toOrderRecord(updated, items.get(updated.id) ?? []);
    }

    async replaceItems(organizationId: string, orderId: string, items: NewOrderItem[]): Promise<void> {
        await this.dbInstance.delete(orderItems)
            .where(withTenantScope(orderItems.organizationId, organizationId, eq(orderItems.orderId, orderId)));
        await this.insertItems(organizationId, orderId, items);
    }

    async writePaymentRollup(organizationId: string, orderId: string, rollup: OrderPaymentRollup): Promise<OrderRecord> {
        const [updated] = await this.dbInstance.update(orders)
            .set({
                paidAmount: formatDecimal(rollup.paidAmount),
                balanceDue: formatDecimal(rollup.balanceDue),
                paymentStatus: rollup.paymentStatus,
                updatedAt: new Date(),
            })
            .where(withTenantScope(orders.organizationId, organizationId, eq(orders.id, orderId)))
            .returning();
        if (!updated) throw new Error(`Order ${orderId} disappeared during payment rollup`);

        const items = await this.loadItems([updated.id]);
        return toOrderRecord(updated, items.get(updated.id) ?? []);
    }

    async appendAuditEntry(organizationId: string, entry: NewAuditEntry): Promise<void> {
        // Savepoint: a failed audit insert must not abort the caller's transaction
        await this.dbInstance.transaction(async (sp) => {
            await sp.insert(orderAuditLog).values({
                organizationId,
                orderId: entry.orderId,
                actorUserId: entry.actorUserId,
                actionType: entry.actionType,
                fromStatus: entry.fromStatus ?? null,
                toStatus: entry.toStatus ?? null,
                note: entry.note ?? null,
                metadata: entry.metadata ?? null,
            });
        });
    }

    async listAuditEntries(organizationId: string, orderId: string): Promise<OrderAuditEntry[]> {
        const rows = await this.dbInstance
            .select()
            .from(orderAuditLog)
            .where(and(eq(orderAuditLog.organizationId, organizationId), eq(orderAuditLog.orderId, orderId)))
            .orderBy(asc(orderAuditLog.createdAt));
        return rows.map(toAuditEntry);
    }
}
