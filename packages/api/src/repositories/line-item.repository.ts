import { and, asc, eq } from 'drizzle-orm'
import {
  toLineItemId,
  toServiceId,
  toTenantId,
  toTicketId,
  type LineItem,
  type PricedLineItem,
} from '@crewbook/domain'
import { lineItems, type LineItemRow } from '../db/schema'
import { notDeleted, tenantScope, type TenantDb } from '../lib/tenant-db'

function mapLineItem(row: LineItemRow): LineItem {
  return {
    id: toLineItemId(row.id),
    tenantId: toTenantId(row.tenantId),
    ticketId: toTicketId(row.ticketId),
    serviceId: toServiceId(row.serviceId),
    description: row.description ?? undefined,
    quantity: row.quantity,
    unitPriceCents: row.unitPriceCents ?? undefined,
    totalPriceCents: row.totalPriceCents,
    durationMinutes: row.durationMinutes ?? undefined,
    isPriceOverridden: row.isPriceOverridden,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt ?? undefined,
  }
}

/** Persists already-priced lines in one statement. */
export async function insertLineItems(
  tdb: TenantDb,
  ticketId: string,
  items: readonly PricedLineItem[],
): Promise<LineItem[]> {
  if (items.length === 0) return []
  const rows = await tdb.db
    .insert(lineItems)
    .values(items.map((item) => ({ tenantId: tdb.tenantId, ticketId, ...item })))
    .returning()
  return rows.map(mapLineItem)
}

/** The ticket's live lines, oldest first. */
export async function listActiveLineItems(tdb: TenantDb, ticketId: string): Promise<LineItem[]> {
  const rows = await tdb.db
    .select()
    .from(lineItems)
    .where(and(eq(lineItems.ticketId, ticketId), tenantScope(lineItems, tdb), notDeleted(lineItems)))
    .orderBy(asc(lineItems.createdAt))
  return rows.map(mapLineItem)
}

/** Tombstones one line of a ticket. Returns false if it was not a live line of that ticket. */
export async function softDeleteLineItem(
  tdb: TenantDb,
  ticketId: string,
  lineItemId: string,
  at: Date,
): Promise<boolean> {
  const rows = await tdb.db
    .update(lineItems)
    .set({ deletedAt: at, updatedAt: at })
    .where(
      and(
        eq(lineItems.id, lineItemId),
        eq(lineItems.ticketId, ticketId),
        tenantScope(lineItems, tdb),
        notDeleted(lineItems),
      ),
    )
    .returning({ id: lineItems.id })
  return rows.length > 0
}

/** One live line of a ticket. */
export async function findLineItem(tdb: TenantDb, ticketId: string, lineItemId: string): Promise<LineItem | null> {
  const [row] = await tdb.db
    .select()
    .from(lineItems)
    .where(
      and(
        eq(lineItems.id, lineItemId),
        eq(lineItems.ticketId, ticketId),
        tenantScope(lineItems, tdb),
        notDeleted(lineItems),
      ),
    )
    .limit(1)
  return row ? mapLineItem(row) : null
}

/** Overwrites a live line with its re-priced values. */
export async function updateLineItem(
  tdb: TenantDb,
  lineItemId: string,
  priced: PricedLineItem,
  at: Date,
): Promise<LineItem | null> {
  const [row] = await tdb.db
    .update(lineItems)
    .set({
      quantity: priced.quantity,
      unitPriceCents: priced.unitPriceCents,
      totalPriceCents: priced.totalPriceCents,
      durationMinutes: priced.durationMinutes,
      description: priced.description ?? null,
      isPriceOverridden: priced.isPriceOverridden,
      updatedAt: at,
    })
    .where(and(eq(lineItems.id, lineItemId), tenantScope(lineItems, tdb), notDeleted(lineItems)))
    .returning()
  return row ? mapLineItem(row) : null
}
