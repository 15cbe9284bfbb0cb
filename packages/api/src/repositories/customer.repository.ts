import { and, desc, eq } from 'drizzle-orm'
import {
  toCustomerId,
  toTenantId,
  type ContactMethod,
  type Customer,
  type CustomerId,
  type TimeOfDay,
} from '@crewbook/domain'
import { customers, type CustomerRow } from '../db/schema'
import { notDeleted, tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

// ---------------------------------------------------------------------------
// Mapper: row → domain
// ---------------------------------------------------------------------------

function mapCustomer(row: CustomerRow): Customer {
  return {
    id: toCustomerId(row.id),
    tenantId: toTenantId(row.tenantId),
    firstName: row.firstName ?? undefined,
    lastName: row.lastName ?? undefined,
    businessName: row.businessName ?? undefined,
    email: row.email ?? undefined,
    phone: row.phone ?? undefined,
    referredById: row.referredById != null ? toCustomerId(row.referredById) : undefined,
    preferredContactMethod: row.preferredContactMethod ?? undefined,
    preferredTimeOfDay: row.preferredTimeOfDay ?? undefined,
    notes: row.notes ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    deletedAt: row.deletedAt ?? undefined,
  }
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export type CustomerInput = {
  firstName?: string | null
  lastName?: string | null
  businessName?: string | null
  email?: string | null
  phone?: string | null
  referredById?: CustomerId | null
  preferredContactMethod?: ContactMethod | null
  preferredTimeOfDay?: TimeOfDay | null
  notes?: string | null
}

export async function insertCustomer(tdb: TenantDb, input: CustomerInput): Promise<Customer> {
  const rows = await tdb.db
    .insert(customers)
    .values({ tenantId: tdb.tenantId, ...input })
    .returning()
  return mapCustomer(requireRow(rows, 'insert customer'))
}

/** Returns a live (not tombstoned) customer by id, or null. */
export async function findCustomerById(tdb: TenantDb, id: string): Promise<Customer | null> {
  const [row] = await tdb.db
    .select()
    .from(customers)
    .where(and(eq(customers.id, id), tenantScope(customers, tdb), notDeleted(customers)))
    .limit(1)
  return row ? mapCustomer(row) : null
}

/** Lists live customers, newest first. */
export async function listCustomers(
  tdb: TenantDb,
  opts: { limit?: number; offset?: number } = {},
): Promise<Customer[]> {
  const rows = await tdb.db
    .select()
    .from(customers)
    .where(and(tenantScope(customers, tdb), notDeleted(customers)))
    .orderBy(desc(customers.createdAt))
    .limit(opts.limit ?? 50)
    .offset(opts.offset ?? 0)
  return rows.map(mapCustomer)
}

export async function updateCustomer(tdb: TenantDb, id: string, patch: CustomerInput): Promise<Customer | null> {
  const [row] = await tdb.db
    .update(customers)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(customers.id, id), tenantScope(customers, tdb), notDeleted(customers)))
    .returning()
  return row ? mapCustomer(row) : null
}

/** Tombstones a customer. Returns false if there was no live customer to delete. */
export async function softDeleteCustomer(tdb: TenantDb, id: string, at: Date): Promise<boolean> {
  const rows = await tdb.db
    .update(customers)
    .set({ deletedAt: at, updatedAt: at })
    .where(and(eq(customers.id, id), tenantScope(customers, tdb), notDeleted(customers)))
    .returning({ id: customers.id })
  return rows.length > 0
}
