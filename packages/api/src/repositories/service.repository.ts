import { and, asc, eq, inArray } from 'drizzle-orm'
import {
  parseServicePricing,
  toPricingColumns,
  toServiceId,
  toTenantId,
  type Service,
  type ServiceId,
  type ServicePricing,
} from '@crewbook/domain'
import { services, type ServiceRow } from '../db/schema'
import { notDeleted, tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

function mapService(row: ServiceRow): Service {
  return {
    id: toServiceId(row.id),
    tenantId: toTenantId(row.tenantId),
    name: row.name,
    description: row.description ?? undefined,
    pricing: parseServicePricing(row),
    isActive: row.isActive,
    displayOrder: row.displayOrder,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt ?? undefined,
  }
}

export type ServiceInput = {
  name: string
  description?: string | null
  pricing: ServicePricing
  displayOrder?: number
}

export async function insertService(tdb: TenantDb, input: ServiceInput): Promise<Service> {
  const rows = await tdb.db
    .insert(services)
    .values({
      tenantId: tdb.tenantId,
      name: input.name,
      description: input.description,
      displayOrder: input.displayOrder,
      ...toPricingColumns(input.pricing),
    })
    .returning()
  return mapService(requireRow(rows, 'insert service'))
}

/**
 * Resolves a service, tombstoned or not, so historical line items keep
 * displaying. Whether it may go on a new line item is the pricing rule's call.
 */
export async function findServiceById(tdb: TenantDb, id: string): Promise<Service | null> {
  const [row] = await tdb.db
    .select()
    .from(services)
    .where(and(eq(services.id, id), tenantScope(services, tdb)))
    .limit(1)
  return row ? mapService(row) : null
}

/** Batch form of findServiceById, keyed by id. Ids of other tenants are simply absent. */
export async function findServicesByIds(tdb: TenantDb, ids: readonly string[]): Promise<Map<ServiceId, Service>> {
  if (ids.length === 0) return new Map()
  const rows = await tdb.db
    .select()
    .from(services)
    .where(and(inArray(services.id, [...new Set(ids)]), tenantScope(services, tdb)))
  return new Map(rows.map((row) => [toServiceId(row.id), mapService(row)]))
}

/** Catalog listing in display order; inactive entries only on request. */
export async function listServices(tdb: TenantDb, opts: { includeInactive?: boolean } = {}): Promise<Service[]> {
  const rows = await tdb.db
    .select()
    .from(services)
    .where(
      and(
        tenantScope(services, tdb),
        notDeleted(services),
        opts.includeInactive ? undefined : eq(services.isActive, true),
      ),
    )
    .orderBy(asc(services.displayOrder), asc(services.name))
  return rows.map(mapService)
}

export type ServicePatch = {
  name?: string
  description?: string | null
  pricing?: ServicePricing
  displayOrder?: number
  isActive?: boolean
}

/**
 * Edits a catalog entry. Line items already priced from it keep their
 * captured prices.
 */
export async function updateService(tdb: TenantDb, id: string, patch: ServicePatch): Promise<Service | null> {
  const { pricing, ...rest } = patch
  const [row] = await tdb.db
    .update(services)
    .set({ ...rest, ...(pricing !== undefined ? toPricingColumns(pricing) : {}), updatedAt: new Date() })
    .where(and(eq(services.id, id), tenantScope(services, tdb), notDeleted(services)))
    .returning()
  return row ? mapService(row) : null
}

export async function softDeleteService(tdb: TenantDb, id: string, at: Date): Promise<boolean> {
  const rows = await tdb.db
    .update(services)
    .set({ deletedAt: at, updatedAt: at, isActive: false })
    .where(and(eq(services.id, id), tenantScope(services, tdb), notDeleted(services)))
    .returning({ id: services.id })
  return rows.length > 0
}
