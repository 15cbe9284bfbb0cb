// ---------------------------------------------------------------------------
// System queries
//
// The only repository functions that run without a TenantDb. They resolve
// identities (which tenant a request or a sweep is for) and never return
// tenant-owned rows.
// ---------------------------------------------------------------------------

import { and, eq, lte } from 'drizzle-orm'
import { toTenantId, type Tenant, type TenantId } from '@crewbook/domain'
import type { Database } from '../db'
import { recurringTemplates, tenants } from '../db/schema'

/** Looks a tenant up by its subdomain slug. Returns null if none matches. */
export async function findTenantBySlug(db: Database, slug: string): Promise<Tenant | null> {
  const [row] = await db.select().from(tenants).where(eq(tenants.slug, slug)).limit(1)
  if (!row) return null
  return {
    id: toTenantId(row.id),
    name: row.name,
    slug: row.slug,
    status: row.status,
    createdAt: row.createdAt,
  }
}

/**
 * ACTIVE tenants owning at least one active template due at `asOf`. Suspended
 * and offboarded tenants are skipped, as the HTTP layer refuses them.
 */
export async function listTenantIdsWithDueTemplates(db: Database, asOf: Date): Promise<TenantId[]> {
  const rows = await db
    .selectDistinct({ tenantId: recurringTemplates.tenantId })
    .from(recurringTemplates)
    .innerJoin(tenants, eq(tenants.id, recurringTemplates.tenantId))
    .where(
      and(
        eq(tenants.status, 'ACTIVE'),
        eq(recurringTemplates.isActive, true),
        lte(recurringTemplates.nextOccurrenceAt, asOf),
      ),
    )
  return rows.map((r) => toTenantId(r.tenantId))
}
