import { and, asc, desc, eq, inArray, like, ne, sql } from 'drizzle-orm'
import {
  ConflictError,
  toCustomerId,
  toInvoiceId,
  toTenantId,
  toTicketId,
  type Invoice,
  type InvoicePatch,
  type InvoiceSnapshot,
  type InvoiceStatus,
  type InvoiceTotals,
} from '@crewbook/domain'
import { invoices, type InvoiceRow } from '../db/schema'
import { notDeleted, tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

// ---------------------------------------------------------------------------
// Mapper: row → domain
// ---------------------------------------------------------------------------

function mapInvoice(row: InvoiceRow): Invoice {
  return {
    id: toInvoiceId(row.id),
    tenantId: toTenantId(row.tenantId),
    ticketId: toTicketId(row.ticketId),
    customerId: toCustomerId(row.customerId),
    invoiceNumber: row.invoiceNumber,
    status: row.status,
    subtotalCents: row.subtotalCents,
    taxRateBps: row.taxRateBps,
    taxAmountCents: row.taxAmountCents,
    totalAmountCents: row.totalAmountCents,
    amountPaidCents: row.amountPaidCents,
    issuedAt: row.issuedAt ?? undefined,
    sentAt: row.sentAt ?? undefined,
    dueAt: row.dueAt ?? undefined,
    paidAt: row.paidAt ?? undefined,
    voidedAt: row.voidedAt ?? undefined,
    notes: row.notes ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt ?? undefined,
  }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export async function insertInvoice(
  tdb: TenantDb,
  snapshot: InvoiceSnapshot,
  invoiceNumber: string,
): Promise<Invoice> {
  const rows = await tdb.db
    .insert(invoices)
    .values({ tenantId: tdb.tenantId, status: 'draft', invoiceNumber, ...snapshot })
    .returning()
  return mapInvoice(requireRow(rows, 'insert invoice'))
}

export async function findInvoiceById(tdb: TenantDb, id: string): Promise<Invoice | null> {
  const [row] = await tdb.db
    .select()
    .from(invoices)
    .where(and(eq(invoices.id, id), tenantScope(invoices, tdb), notDeleted(invoices)))
    .limit(1)
  return row ? mapInvoice(row) : null
}

/** The ticket's authoritative invoice: neither void nor tombstoned. */
export async function findActiveInvoiceForTicket(tdb: TenantDb, ticketId: string): Promise<Invoice | null> {
  const [row] = await tdb.db
    .select()
    .from(invoices)
    .where(
      and(
        eq(invoices.ticketId, ticketId),
        tenantScope(invoices, tdb),
        ne(invoices.status, 'void'),
        notDeleted(invoices),
      ),
    )
    .orderBy(desc(invoices.createdAt))
    .limit(1)
  return row ? mapInvoice(row) : null
}

/** Highest invoice number with `prefix` (one UTC day of the tenant's sequence). */
export async function findLatestInvoiceNumber(tdb: TenantDb, prefix: string): Promise<string | undefined> {
  const [row] = await tdb.db
    .select({ invoiceNumber: invoices.invoiceNumber })
    .from(invoices)
    .where(and(tenantScope(invoices, tdb), like(invoices.invoiceNumber, `${prefix}%`)))
    .orderBy(desc(invoices.invoiceNumber))
    .limit(1)
  return row?.invoiceNumber
}

export async function listInvoices(
  tdb: TenantDb,
  opts: { status?: InvoiceStatus; limit?: number; offset?: number } = {},
): Promise<Invoice[]> {
  const rows = await tdb.db
    .select()
    .from(invoices)
    .where(
      and(
        tenantScope(invoices, tdb),
        notDeleted(invoices),
        opts.status !== undefined ? eq(invoices.status, opts.status) : undefined,
      ),
    )
    .orderBy(desc(invoices.createdAt))
    .limit(opts.limit ?? 50)
    .offset(opts.offset ?? 0)
  return rows.map(mapInvoice)
}

/** Sent and partially paid invoices, oldest due date first. */
export async function listUnpaidInvoices(tdb: TenantDb): Promise<Invoice[]> {
  const rows = await tdb.db
    .select()
    .from(invoices)
    .where(and(tenantScope(invoices, tdb), notDeleted(invoices), inArray(invoices.status, ['sent', 'partial'])))
    .orderBy(asc(sql`coalesce(${invoices.dueAt}, ${invoices.createdAt})`))
  return rows.map(mapInvoice)
}

/** Replaces the totals of a draft that was derived again. */
export async function refreshDraftTotals(tdb: TenantDb, invoice: Invoice, totals: InvoiceTotals): Promise<Invoice> {
  return updateInvoiceGuarded(tdb, invoice, totals)
}

export async function updateInvoice(tdb: TenantDb, invoice: Invoice, patch: InvoicePatch): Promise<Invoice> {
  return updateInvoiceGuarded(tdb, invoice, patch)
}

/**
 * Writes only if status and amount paid are still what the caller read, so
 * two payments or a payment racing a void cannot both apply.
 *
 * @throws {ConflictError} when the invoice changed in between.
 */
async function updateInvoiceGuarded(
  tdb: TenantDb,
  invoice: Invoice,
  patch: InvoicePatch | InvoiceTotals,
): Promise<Invoice> {
  const [row] = await tdb.db
    .update(invoices)
    .set({ ...patch, updatedAt: new Date() })
    .where(
      and(
        eq(invoices.id, invoice.id),
        tenantScope(invoices, tdb),
        eq(invoices.status, invoice.status),
        eq(invoices.amountPaidCents, invoice.amountPaidCents),
        notDeleted(invoices),
      ),
    )
    .returning()
  if (!row) {
    throw new ConflictError(`Invoice ${invoice.invoiceNumber} was modified concurrently; re-read and retry`)
  }
  return mapInvoice(row)
}
