import type { SQL } from "drizzle-orm";
import { and, eq } from "drizzle-orm";
import type { NeonQueryResultHKT } from "drizzle-orm/neon-serverless";
import type { PgColumn, PgDatabase } from "drizzle-orm/pg-core";
import type * as schema from "@shared/schema";

/**
 * The root database or an open transaction; repositories accept either.
 */
export type DbExecutor = PgDatabase<NeonQueryResultHKT, typeof schema>;

/**
 * Combines tenant scope with additional conditions using AND
 */
export function withTenantScope(
  organizationIdColumn: PgColumn,
  organizationId: string,
  ...conditions: (SQL | undefined)[]
): SQL {
  const scope = eq(organizationIdColumn, organizationId);
  const validConditions = conditions.filter((c): c is SQL => c !== undefined);
  if (validConditions.length === 0) return scope;
  return and(scope, ...validConditions) ?? scope;
}

/** Escapes LIKE wildcards so user text matches literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function formatDecimal(value: number): string {
  return (Math.round(value * 100) / 100).toFixed(2);
}

export function parseDecimal(value: string | number | null | undefined): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}
