import { and, desc, eq } from 'drizzle-orm'
import {
  toCustomerId,
  toLeadId,
  toTenantId,
  type JsonValue,
  type Lead,
  type LeadSource,
  type LeadStatus,
  type LeadUrgency,
} from '@crewbook/domain'
import { leads, type LeadRow } from '../db/schema'
import { notDeleted, tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

function mapLead(row: LeadRow): Lead {
  return {
    id: toLeadId(row.id),
    tenantId: toTenantId(row.tenantId),
    status: row.status,
    rawNotes: row.rawNotes,
    extractedData: row.extractedData ?? undefined,
    extractedAt: row.extractedAt ?? undefined,
    name: row.name ?? undefined,
    phone: row.phone ?? undefined,
    email: row.email ?? undefined,
    address: row.address ?? undefined,
    serviceInterest: row.serviceInterest ?? undefined,
    leadSource: row.leadSource ?? undefined,
    urgency: row.urgency ?? undefined,
    propertyDetails: row.propertyDetails ?? undefined,
    reminderAt: row.reminderAt ?? undefined,
    reminderNote: row.reminderNote ?? undefined,
    convertedAt: row.convertedAt ?? undefined,
    convertedCustomerId: row.convertedCustomerId != null ? toCustomerId(row.convertedCustomerId) : undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt ?? undefined,
  }
}

/** Editable lead fields. Status and conversion have their own writes. */
export type LeadFields = {
  rawNotes?: string
  extractedData?: { [key: string]: JsonValue } | null
  extractedAt?: Date | null
  name?: string | null
  phone?: string | null
  email?: string | null
  address?: string | null
  serviceInterest?: string | null
  leadSource?: LeadSource | null
  urgency?: LeadUrgency | null
  propertyDetails?: string | null
  reminderAt?: Date | null
  reminderNote?: string | null
}

export async function insertLead(tdb: TenantDb, input: LeadFields & { rawNotes: string }): Promise<Lead> {
  const rows = await tdb.db
    .insert(leads)
    .values({ tenantId: tdb.tenantId, status: 'new', ...input })
    .returning()
  return mapLead(requireRow(rows, 'insert lead'))
}

export async function findLeadById(tdb: TenantDb, id: string): Promise<Lead | null> {
  const [row] = await tdb.db
    .select()
    .from(leads)
    .where(and(eq(leads.id, id), tenantScope(leads, tdb), notDeleted(leads)))
    .limit(1)
  return row ? mapLead(row) : null
}

export async function listLeads(tdb: TenantDb, opts: { status?: LeadStatus } = {}): Promise<Lead[]> {
  const rows = await tdb.db
    .select()
    .from(leads)
    .where(
      and(
        tenantScope(leads, tdb),
        notDeleted(leads),
        opts.status !== undefined ? eq(leads.status, opts.status) : undefined,
      ),
    )
    .orderBy(desc(leads.createdAt))
  return rows.map(mapLead)
}

export type LeadPatch = LeadFields & {
  status?: LeadStatus
  convertedAt?: Date
  convertedCustomerId?: string
}

export async function updateLead(tdb: TenantDb, id: string, patch: LeadPatch): Promise<Lead | null> {
  const [row] = await tdb.db
    .update(leads)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(leads.id, id), tenantScope(leads, tdb), notDeleted(leads)))
    .returning()
  return row ? mapLead(row) : null
}
