import { and, asc, desc, eq, inArray, lte } from 'drizzle-orm'
import {
  toAddressId,
  toCustomerId,
  toRecurringTemplateId,
  toServiceId,
  toTenantId,
  type Cadence,
  type RecurringTemplate,
  type RecurringTemplateId,
  type TemplateService,
} from '@crewbook/domain'
import { recurringTemplateServices, recurringTemplates, type RecurringTemplateRow } from '../db/schema'
import { tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

type TemplateServiceRow = typeof recurringTemplateServices.$inferSelect

function mapTemplateService(row: TemplateServiceRow): TemplateService {
  return {
    serviceId: toServiceId(row.serviceId),
    quantity: row.quantity ?? undefined,
    customPriceCents: row.customPriceCents ?? undefined,
  }
}

function mapTemplate(row: RecurringTemplateRow, services: readonly TemplateServiceRow[]): RecurringTemplate {
  return {
    id: toRecurringTemplateId(row.id),
    tenantId: toTenantId(row.tenantId),
    customerId: toCustomerId(row.customerId),
    addressId: toAddressId(row.addressId),
    intervalType: row.intervalType,
    intervalValue: row.intervalValue,
    preferredDayOfWeek: row.preferredDayOfWeek ?? undefined,
    preferredTime: row.preferredTime ?? undefined,
    anchorDay: row.anchorDay ?? undefined,
    estimatedDurationMinutes: row.estimatedDurationMinutes ?? undefined,
    notes: row.notes ?? undefined,
    isActive: row.isActive,
    lastGeneratedAt: row.lastGeneratedAt ?? undefined,
    nextOccurrenceAt: row.nextOccurrenceAt ?? undefined,
    services: services.map(mapTemplateService),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

async function loadServices(tdb: TenantDb, templateIds: readonly string[]): Promise<Map<string, TemplateServiceRow[]>> {
  const byTemplate = new Map<string, TemplateServiceRow[]>()
  if (templateIds.length === 0) return byTemplate
  const rows = await tdb.db
    .select()
    .from(recurringTemplateServices)
    .where(
      and(
        inArray(recurringTemplateServices.templateId, [...templateIds]),
        tenantScope(recurringTemplateServices, tdb),
      ),
    )
    .orderBy(asc(recurringTemplateServices.sortOrder))
  for (const row of rows) {
    const list = byTemplate.get(row.templateId) ?? []
    list.push(row)
    byTemplate.set(row.templateId, list)
  }
  return byTemplate
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export type CreateTemplateInput = Cadence & {
  customerId: string
  addressId: string
  estimatedDurationMinutes?: number
  notes?: string
  nextOccurrenceAt: Date
  services: readonly TemplateService[]
}

/** Inserts a template and its services. Call inside a transaction. */
export async function insertTemplate(tdb: TenantDb, input: CreateTemplateInput): Promise<RecurringTemplate> {
  const { services, ...fields } = input
  const rows = await tdb.db
    .insert(recurringTemplates)
    .values({ tenantId: tdb.tenantId, isActive: true, ...fields })
    .returning()
  const row = requireRow(rows, 'insert recurring template')
  const serviceRows =
    services.length === 0
      ? []
      : await tdb.db
          .insert(recurringTemplateServices)
          .values(
            services.map((s, i) => ({
              tenantId: tdb.tenantId,
              templateId: row.id,
              serviceId: s.serviceId,
              quantity: s.quantity,
              customPriceCents: s.customPriceCents,
              sortOrder: i,
            })),
          )
          .returning()
  return mapTemplate(row, serviceRows)
}

export async function findTemplateById(tdb: TenantDb, id: string): Promise<RecurringTemplate | null> {
  const [row] = await tdb.db
    .select()
    .from(recurringTemplates)
    .where(and(eq(recurringTemplates.id, id), tenantScope(recurringTemplates, tdb)))
    .limit(1)
  if (!row) return null
  const services = await loadServices(tdb, [row.id])
  return mapTemplate(row, services.get(row.id) ?? [])
}

export async function listTemplates(
  tdb: TenantDb,
  opts: { customerId?: string; activeOnly?: boolean } = {},
): Promise<RecurringTemplate[]> {
  const rows = await tdb.db
    .select()
    .from(recurringTemplates)
    .where(
      and(
        tenantScope(recurringTemplates, tdb),
        opts.customerId !== undefined ? eq(recurringTemplates.customerId, opts.customerId) : undefined,
        opts.activeOnly ? eq(recurringTemplates.isActive, true) : undefined,
      ),
    )
    .orderBy(desc(recurringTemplates.createdAt))
  const services = await loadServices(
    tdb,
    rows.map((r) => r.id),
  )
  return rows.map((row) => mapTemplate(row, services.get(row.id) ?? []))
}

/** Ids of this tenant's active templates due at `asOf`, earliest first. */
export async function listDueTemplateIds(tdb: TenantDb, asOf: Date): Promise<RecurringTemplateId[]> {
  const rows = await tdb.db
    .select({ id: recurringTemplates.id })
    .from(recurringTemplates)
    .where(
      and(
        tenantScope(recurringTemplates, tdb),
        eq(recurringTemplates.isActive, true),
        lte(recurringTemplates.nextOccurrenceAt, asOf),
      ),
    )
    .orderBy(asc(recurringTemplates.nextOccurrenceAt))
  return rows.map((r) => toRecurringTemplateId(r.id))
}

/**
 * Compare-and-set advance of the template's next occurrence. Succeeds only if
 * `next_occurrence_at` still equals `expectedNext`, so of two concurrent
 * sweeps exactly one wins the occurrence. Returns false for the loser.
 */
export async function advanceTemplate(
  tdb: TenantDb,
  templateId: string,
  expectedNext: Date,
  nextOccurrenceAt: Date,
  lastGeneratedAt: Date,
): Promise<boolean> {
  const rows = await tdb.db
    .update(recurringTemplates)
    .set({ nextOccurrenceAt, lastGeneratedAt, updatedAt: new Date() })
    .where(
      and(
        eq(recurringTemplates.id, templateId),
        tenantScope(recurringTemplates, tdb),
        eq(recurringTemplates.isActive, true),
        eq(recurringTemplates.nextOccurrenceAt, expectedNext),
      ),
    )
    .returning({ id: recurringTemplates.id })
  return rows.length > 0
}

/** Stops generation. Tickets already generated are not touched. */
export async function deactivateTemplate(tdb: TenantDb, id: string): Promise<RecurringTemplate | null> {
  const [row] = await tdb.db
    .update(recurringTemplates)
    .set({ isActive: false, updatedAt: new Date() })
    .where(and(eq(recurringTemplates.id, id), tenantScope(recurringTemplates, tdb)))
    .returning()
  if (!row) return null
  const services = await loadServices(tdb, [row.id])
  return mapTemplate(row, services.get(row.id) ?? [])
}

/** Deactivates every active template of a customer. Returns the deactivated ids. */
export async function deactivateTemplatesForCustomer(
  tdb: TenantDb,
  customerId: string,
): Promise<RecurringTemplateId[]> {
  const rows = await tdb.db
    .update(recurringTemplates)
    .set({ isActive: false, updatedAt: new Date() })
    .where(
      and(
        eq(recurringTemplates.customerId, customerId),
        tenantScope(recurringTemplates, tdb),
        eq(recurringTemplates.isActive, true),
      ),
    )
    .returning({ id: recurringTemplates.id })
  return rows.map((r) => toRecurringTemplateId(r.id))
}
