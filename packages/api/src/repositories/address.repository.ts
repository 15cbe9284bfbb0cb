import { and, asc, desc, eq, ne } from 'drizzle-orm'
import { toAddressId, toCustomerId, toTenantId, type Address } from '@crewbook/domain'
import { addresses, type AddressRow } from '../db/schema'
import { tenantScope, type TenantDb } from '../lib/tenant-db'
import { requireRow } from './rows'

function mapAddress(row: AddressRow): Address {
  return {
    id: toAddressId(row.id),
    tenantId: toTenantId(row.tenantId),
    customerId: toCustomerId(row.customerId),
    label: row.label ?? undefined,
    street: row.street,
    street2: row.street2 ?? undefined,
    city: row.city,
    state: row.state,
    zip: row.zip,
    notes: row.notes ?? undefined,
    isPrimary: row.isPrimary,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

export type AddressInput = {
  label?: string | null
  street: string
  street2?: string | null
  city: string
  state: string
  zip: string
  notes?: string | null
  isPrimary?: boolean
}

export async function insertAddress(tdb: TenantDb, customerId: string, input: AddressInput): Promise<Address> {
  const rows = await tdb.db
    .insert(addresses)
    .values({ tenantId: tdb.tenantId, customerId, ...input })
    .returning()
  return mapAddress(requireRow(rows, 'insert address'))
}

export async function findAddressById(tdb: TenantDb, id: string): Promise<Address | null> {
  const [row] = await tdb.db
    .select()
    .from(addresses)
    .where(and(eq(addresses.id, id), tenantScope(addresses, tdb)))
    .limit(1)
  return row ? mapAddress(row) : null
}

/** A customer's addresses, primary first, then oldest first. */
export async function listAddresses(tdb: TenantDb, customerId: string): Promise<Address[]> {
  const rows = await tdb.db
    .select()
    .from(addresses)
    .where(and(eq(addresses.customerId, customerId), tenantScope(addresses, tdb)))
    .orderBy(desc(addresses.isPrimary), asc(addresses.createdAt))
  return rows.map(mapAddress)
}

export async function updateAddress(
  tdb: TenantDb,
  id: string,
  patch: Partial<AddressInput>,
): Promise<Address | null> {
  const [row] = await tdb.db
    .update(addresses)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(addresses.id, id), tenantScope(addresses, tdb)))
    .returning()
  return row ? mapAddress(row) : null
}

/**
 * Clears the primary flag on a customer's addresses, except `keepId`.
 * Call it in the same transaction as the write that sets the new primary.
 */
export async function clearPrimaryAddresses(tdb: TenantDb, customerId: string, keepId?: string): Promise<void> {
  await tdb.db
    .update(addresses)
    .set({ isPrimary: false, updatedAt: new Date() })
    .where(
      and(
        eq(addresses.customerId, customerId),
        tenantScope(addresses, tdb),
        eq(addresses.isPrimary, true),
        keepId !== undefined ? ne(addresses.id, keepId) : undefined,
      ),
    )
}

/** Hard delete. Returns false if nothing matched. */
export async function deleteAddress(tdb: TenantDb, id: string): Promise<boolean> {
  const rows = await tdb.db
    .delete(addresses)
    .where(and(eq(addresses.id, id), tenantScope(addresses, tdb)))
    .returning({ id: addresses.id })
  return rows.length > 0
}
