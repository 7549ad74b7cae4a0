import {
    payments,
    type PaymentRow,
    type PaymentListFilters,
} from "@shared/schema";
import { eq, gte, lte, desc, type SQL } from "drizzle-orm";
import { buildDocumentNumber, DOCUMENT_NUMBER_ATTEMPTS } from "../lib/documentNumbers";
import { withTenantScope, formatDecimal, parseDecimal, type DbExecutor } from "./executor";
import type { NewPayment, PaymentRecord, PaymentRepositoryPort } from "./types";

function toPaymentRecord(row: PaymentRow): PaymentRecord {
    return {
        id: row.id,
        organizationId: row.organizationId,
        paymentNumber: row.paymentNumber,
        orderId: row.orderId,
        amount: parseDecimal(row.amount),
        paymentMethod: row.paymentMethod,
        status: row.status,
        paymentDate: row.paymentDate,
        notes: row.notes,
        createdByUserId: row.createdByUserId,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
    };
}

export class PaymentsRepository implements PaymentRepositoryPort {
    constructor(private readonly dbInstance: DbExecutor) { }

    async generatePaymentNumber(organizationId: string, prefix: string): Promise<string> {
        for (let attempt = 0; attempt < DOCUMENT_NUMBER_ATTEMPTS; attempt++) {
            const candidate = buildDocumentNumber(prefix);
            const [existing] = await this.dbInstance
                .select({ id: payments.id })
                .from(payments)
                .where(withTenantScope(payments.organizationId, organizationId, eq(payments.paymentNumber, candidate)))
                .limit(1);
            if (!existing) return candidate;
        }
        throw new Error(`Could not allocate a unique payment number after ${DOCUMENT_NUMBER_ATTEMPTS} attempts`);
    }

    async insertPayment(organizationId: string, data: NewPayment): Promise<PaymentRecord> {
        const [created] = await this.dbInstance.insert(payments).values({
            organizationId,
            paymentNumber: data.paymentNumber,
            orderId: data.orderId,
            amount: formatDecimal(data.amount),
            paymentMethod: data.paymentMethod,
            status: 'confirmed',
            notes: data.notes,
            createdByUserId: data.createdByUserId,
        }).returning();
        return toPaymentRecord(created);
    }

    async getPayment(organizationId: string, paymentId: string, options?: { forUpdate?: boolean }): Promise<PaymentRecord | undefined> {
        const query = this.dbInstance
            .select()
            .from(payments)
            .where(withTenantScope(payments.organizationId, organizationId, eq(payments.id, paymentId)))
            .limit(1);
        const [payment] = options?.forUpdate ? await query.for('update') : await query;
        return payment ? toPaymentRecord(payment) : undefined;
    }

    async getPaymentByNumber(organizationId: string, paymentNumber: string): Promise<PaymentRecord | undefined> {
        const [payment] = await this.dbInstance
            .select()
            .from(payments)
            .where(withTenantScope(payments.organizationId, organizationId, eq(payments.paymentNumber, paymentNumber)))
            .limit(1);
        return payment ? toPaymentRecord(payment) : undefined;
    }

    async listPaymentsForOrder(organizationId: string, orderId: string, options: { onlyConfirmed: boolean }): Promise<PaymentRecord[]> {
        const rows = await this.dbInstance
            .select()
            .from(payments)
            .where(withTenantScope(
                payments.organizationId,
                organizationId,
                eq(payments.orderId, orderId),
                options.onlyConfirmed ? eq(payments.status, 'confirmed') : undefined,
            ))
            .orderBy(desc(payments.paymentDate));
        return rows.map(toPaymentRecord);
    }

    async listPayments(organizationId: string, filters: PaymentListFilters): Promise<PaymentRecord[]> {
        const conditions: (SQL | undefined)[] = [];
        if (filters.orderId) conditions.push(eq(payments.orderId, filters.orderId));
        if (filters.paymentMethod) conditions.push(eq(payments.paymentMethod, filters.paymentMethod));
        if (filters.status) {
            conditions.push(eq(payments.status, filters.status));
        } else if (!filters.includeCancelled) {
            conditions.push(eq(payments.status, 'confirmed'));
        }
        if (filters.dateFrom) conditions.push(gte(payments.paymentDate, filters.dateFrom));
        if (filters.dateTo) conditions.push(lte(payments.paymentDate, filters.dateTo));

        const rows = await this.dbInstance
            .select()
            .from(payments)
            .where(withTenantScope(payments.organizationId, organizationId, ...conditions))
            .orderBy(desc(payments.paymentDate))
            .limit(filters.limit)
            .offset(filters.offset);
        return rows.map(toPaymentRecord);
    }

    async markCancelled(organizationId: string, paymentId: string): Promise<PaymentRecord> {
        const [updated] = await this.dbInstance.update(payments)
            .set({ status: 'cancelled', updatedAt: new Date() })
            .where(withTenantScope(payments.organizationId, organizationId, eq(payments.id, paymentId)))
            .returning();
        if (!updated) throw new Error(`Payment ${paymentId} disappeared during cancellation`);
        return toPaymentRecord(updated);
    }
}
