// ---------------------------------------------------------------------------
// Customer knowledge: attributes, notes and the waitlist
// ---------------------------------------------------------------------------

import { and, asc, desc, eq, isNull } from 'drizzle-orm'
import {
  toAddressId,
  toAttributeId,
  toCustomerId,
  toNoteId,
  toTenantId,
  toTicketId,
  toWaitlistEntryId,
  type Attribute,
  type AttributeSource,
  type JsonValue,
  type Note,
  type TimeOfDay,
  type WaitlistEntry,
} from '@crewbook/domain'
import { attributes, notes, waitlist } from '../db/schema'
import { tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

// ── Attributes ───────────────────────────────────────────────────────────

function mapAttribute(row: typeof attributes.$inferSelect): Attribute {
  return {
    id: toAttributeId(row.id),
    tenantId: toTenantId(row.tenantId),
    customerId: toCustomerId(row.customerId),
    key: row.key,
    value: row.value,
    sourceType: row.sourceType,
    sourceNoteId: row.sourceNoteId != null ? toNoteId(row.sourceNoteId) : undefined,
    confidence: row.confidence ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

export type AttributeInput = {
  key: string
  value: JsonValue
  sourceType: AttributeSource
  sourceNoteId?: string
  confidence?: number
}

/** One value per (customer, key): a second write replaces the first. */
export async function upsertAttribute(tdb: TenantDb, customerId: string, input: AttributeInput): Promise<Attribute> {
  const values = {
    value: input.value,
    sourceType: input.sourceType,
    sourceNoteId: input.sourceNoteId ?? null,
    confidence: input.confidence ?? null,
  }
  const rows = await tdb.db
    .insert(attributes)
    .values({ tenantId: tdb.tenantId, customerId, key: input.key, ...values })
    .onConflictDoUpdate({
      target: [attributes.customerId, attributes.key],
      set: { ...values, updatedAt: new Date() },
    })
    .returning()
  return mapAttribute(requireRow(rows, 'upsert attribute'))
}

export async function listAttributes(tdb: TenantDb, customerId: string): Promise<Attribute[]> {
  const rows = await tdb.db
    .select()
    .from(attributes)
    .where(and(eq(attributes.customerId, customerId), tenantScope(attributes, tdb)))
    .orderBy(asc(attributes.key))
  return rows.map(mapAttribute)
}

// ── Notes ────────────────────────────────────────────────────────────────

function mapNote(row: typeof notes.$inferSelect): Note {
  return {
    id: toNoteId(row.id),
    tenantId: toTenantId(row.tenantId),
    customerId: toCustomerId(row.customerId),
    ticketId: row.ticketId != null ? toTicketId(row.ticketId) : undefined,
    content: row.content,
    processedAt: row.processedAt ?? undefined,
    createdAt: row.createdAt,
  }
}

export async function insertNote(
  tdb: TenantDb,
  customerId: string,
  input: { content: string; ticketId?: string },
): Promise<Note> {
  const rows = await tdb.db
    .insert(notes)
    .values({ tenantId: tdb.tenantId, customerId, ...input })
    .returning()
  return mapNote(requireRow(rows, 'insert note'))
}

export async function listNotes(tdb: TenantDb, customerId: string): Promise<Note[]> {
  const rows = await tdb.db
    .select()
    .from(notes)
    .where(and(eq(notes.customerId, customerId), tenantScope(notes, tdb)))
    .orderBy(desc(notes.createdAt))
  return rows.map(mapNote)
}

/** Records that extraction consumed the note. Idempotent: the first marker wins. */
export async function markNoteProcessed(tdb: TenantDb, noteId: string, at: Date): Promise<Note | null> {
  const [row] = await tdb.db
    .update(notes)
    .set({ processedAt: at })
    .where(and(eq(notes.id, noteId), tenantScope(notes, tdb), isNull(notes.processedAt)))
    .returning()
  if (row) return mapNote(row)
  const [existing] = await tdb.db
    .select()
    .from(notes)
    .where(and(eq(notes.id, noteId), tenantScope(notes, tdb)))
    .limit(1)
  return existing ? mapNote(existing) : null
}

// ── Waitlist ─────────────────────────────────────────────────────────────

function mapWaitlistEntry(row: typeof waitlist.$inferSelect): WaitlistEntry {
  return {
    id: toWaitlistEntryId(row.id),
    tenantId: toTenantId(row.tenantId),
    customerId: toCustomerId(row.customerId),
    nearCustomerId: row.nearCustomerId != null ? toCustomerId(row.nearCustomerId) : undefined,
    nearAddressId: row.nearAddressId != null ? toAddressId(row.nearAddressId) : undefined,
    preferredDates: row.preferredDates ?? undefined,
    preferredTimeOfDay: row.preferredTimeOfDay ?? undefined,
    notes: row.notes ?? undefined,
    isActive: row.isActive,
    notifiedAt: row.notifiedAt ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

export type WaitlistInput = {
  nearCustomerId?: string | null
  nearAddressId?: string | null
  preferredDates?: string | null
  preferredTimeOfDay?: TimeOfDay | null
  notes?: string | null
  isActive?: boolean
}

/** One entry per customer: putting a customer on the list again updates the entry. */
export async function upsertWaitlistEntry(
  tdb: TenantDb,
  customerId: string,
  input: WaitlistInput,
): Promise<WaitlistEntry> {
  const rows = await tdb.db
    .insert(waitlist)
    .values({ tenantId: tdb.tenantId, customerId, ...input })
    .onConflictDoUpdate({
      target: waitlist.customerId,
      set: { ...input, isActive: input.isActive ?? true, updatedAt: new Date() },
    })
    .returning()
  return mapWaitlistEntry(requireRow(rows, 'upsert waitlist entry'))
}

export async function findWaitlistEntry(tdb: TenantDb, customerId: string): Promise<WaitlistEntry | null> {
  const [row] = await tdb.db
    .select()
    .from(waitlist)
    .where(and(eq(waitlist.customerId, customerId), tenantScope(waitlist, tdb)))
    .limit(1)
  return row ? mapWaitlistEntry(row) : null
}

export async function listActiveWaitlist(tdb: TenantDb): Promise<WaitlistEntry[]> {
  const rows = await tdb.db
    .select()
    .from(waitlist)
    .where(and(tenantScope(waitlist, tdb), eq(waitlist.isActive, true)))
    .orderBy(asc(waitlist.createdAt))
  return rows.map(mapWaitlistEntry)
}

export async function deleteWaitlistEntry(tdb: TenantDb, customerId: string): Promise<boolean> {
  const rows = await tdb.db
    .delete(waitlist)
    .where(and(eq(waitlist.customerId, customerId), tenantScope(waitlist, tdb)))
    .returning({ id: waitlist.id })
  return rows.length > 0
}
