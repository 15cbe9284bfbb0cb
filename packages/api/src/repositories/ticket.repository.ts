import { and, asc, eq, gte, lt, type SQL } from 'drizzle-orm'
import {
  ConflictError,
  toAddressId,
  toCustomerId,
  toTenantId,
  toTicketId,
  type Ticket,
  type TicketPatch,
  type TicketStatus,
} from '@crewbook/domain'
import { tickets, type TicketRow } from '../db/schema'
import { notDeleted, tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

// ---------------------------------------------------------------------------
// Mapper: row → domain
// ---------------------------------------------------------------------------

function mapTicket(row: TicketRow): Ticket {
  return {
    id: toTicketId(row.id),
    tenantId: toTenantId(row.tenantId),
    customerId: toCustomerId(row.customerId),
    addressId: toAddressId(row.addressId),
    templateId: row.templateId ?? undefined,
    status: row.status,
    confirmationStatus: row.confirmationStatus,
    scheduledAt: row.scheduledAt,
    scheduledDurationMinutes: row.scheduledDurationMinutes ?? undefined,
    clockInAt: row.clockInAt ?? undefined,
    clockOutAt: row.clockOutAt ?? undefined,
    actualDurationMinutes: row.actualDurationMinutes ?? undefined,
    closedAt: row.closedAt ?? undefined,
    isPriceEstimated: row.isPriceEstimated,
    notes: row.notes ?? undefined,
    version: row.version,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt ?? undefined,
  }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export type CreateTicketInput = {
  customerId: string
  addressId: string
  scheduledAt: Date
  scheduledDurationMinutes?: number
  templateId?: string
  isPriceEstimated?: boolean
  notes?: string
}

/** Inserts a scheduled ticket with confirmation pending. */
export async function insertTicket(tdb: TenantDb, input: CreateTicketInput): Promise<Ticket> {
  const rows = await tdb.db
    .insert(tickets)
    .values({ tenantId: tdb.tenantId, status: 'scheduled', confirmationStatus: 'pending', ...input })
    .returning()
  return mapTicket(requireRow(rows, 'insert ticket'))
}

/** Returns a live ticket by id, or null. */
export async function findTicketById(tdb: TenantDb, id: string): Promise<Ticket | null> {
  const [row] = await tdb.db
    .select()
    .from(tickets)
    .where(and(eq(tickets.id, id), tenantScope(tickets, tdb), notDeleted(tickets)))
    .limit(1)
  return row ? mapTicket(row) : null
}

export type TicketFilter = {
  from?: Date
  to?: Date
  customerId?: string
  status?: TicketStatus
  limit?: number
  offset?: number
}

/** Live tickets in schedule order; `from` inclusive, `to` exclusive. */
export async function listTickets(tdb: TenantDb, filter: TicketFilter = {}): Promise<Ticket[]> {
  const conditions: (SQL | undefined)[] = [
    tenantScope(tickets, tdb),
    notDeleted(tickets),
    filter.from !== undefined ? gte(tickets.scheduledAt, filter.from) : undefined,
    filter.to !== undefined ? lt(tickets.scheduledAt, filter.to) : undefined,
    filter.customerId !== undefined ? eq(tickets.customerId, filter.customerId) : undefined,
    filter.status !== undefined ? eq(tickets.status, filter.status) : undefined,
  ]
  const rows = await tdb.db
    .select()
    .from(tickets)
    .where(and(...conditions))
    .orderBy(asc(tickets.scheduledAt))
    .limit(filter.limit ?? 100)
    .offset(filter.offset ?? 0)
  return rows.map(mapTicket)
}

/**
 * Applies `patch` only if the row still carries the version `ticket` was read
 * at, and bumps the version.
 *
 * @throws {ConflictError} when another writer changed or deleted the ticket first.
 */
export async function updateTicketVersioned(tdb: TenantDb, ticket: Ticket, patch: TicketPatch): Promise<Ticket> {
  const [row] = await tdb.db
    .update(tickets)
    .set({ ...patch, version: ticket.version + 1, updatedAt: new Date() })
    .where(
      and(
        eq(tickets.id, ticket.id),
        tenantScope(tickets, tdb),
        eq(tickets.version, ticket.version),
        notDeleted(tickets),
      ),
    )
    .returning()
  if (!row) {
    throw new ConflictError(`Ticket ${ticket.id} was modified concurrently; re-read and retry`)
  }
  return mapTicket(row)
}

/** Tombstones a ticket at the version it was read at. */
export async function softDeleteTicket(tdb: TenantDb, ticket: Ticket, at: Date): Promise<void> {
  const rows = await tdb.db
    .update(tickets)
    .set({ deletedAt: at, updatedAt: at, version: ticket.version + 1 })
    .where(and(eq(tickets.id, ticket.id), tenantScope(tickets, tdb), eq(tickets.version, ticket.version)))
    .returning({ id: tickets.id })
  if (rows.length === 0) {
    throw new ConflictError(`Ticket ${ticket.id} was modified concurrently; re-read and retry`)
  }
}
