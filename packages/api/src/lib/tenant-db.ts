// ---------------------------------------------------------------------------
// Tenant-scoped database access
//
// A TenantDb pairs a drizzle handle with exactly one tenant identity. Every
// tenant-scoped repository function takes one as its first argument and
// composes `tenantScope()` into its WHERE clause, so no query path can run
// without a tenant. Tombstone filtering is separate: callers add
// `notDeleted()` where the business rule wants it.
// ---------------------------------------------------------------------------

import { eq, isNull, sql, type SQL } from 'drizzle-orm'
import type { AnyPgColumn } from 'drizzle-orm/pg-core'
import { createTenantContext, MissingTenantError, type TenantId } from '@crewbook/domain'
import type { Database } from '../db'
import { translateDbError } from './db-errors'

export interface TenantDb {
  readonly tenantId: TenantId
  readonly db: Database
}

/**
 * Binds `db` to one tenant.
 *
 * @throws {MissingTenantError} for an empty or missing identity.
 */
export function createTenantDb(db: Database, tenantId: string | null | undefined): TenantDb {
  const { tenantId: id } = createTenantContext(tenantId)
  return { tenantId: id, db }
}

/** `tenant_id = <current tenant>` for any table with a tenantId column. */
export function tenantScope(table: { tenantId: AnyPgColumn }, tdb: Pick<TenantDb, 'tenantId'>): SQL {
  return eq(table.tenantId, tdb.tenantId)
}

/** `deleted_at IS NULL` for tombstoned tables. */
export function notDeleted(table: { deletedAt: AnyPgColumn }): SQL {
  return isNull(table.deletedAt)
}

/**
 * A TenantDb whose handle is revoked once the unit of work ends, so a
 * reference that escapes `fn` fails closed instead of running unscoped or on
 * a finished transaction.
 */
function openScope(tenantId: TenantId, db: Database): { scope: TenantDb; close: () => void } {
  let open = true
  const scope: TenantDb = {
    tenantId,
    get db(): Database {
      if (!open) throw new MissingTenantError()
      return db
    },
  }
  return {
    scope,
    close: () => {
      open = false
    },
  }
}

/**
 * Runs `fn` in one transaction bound to the tenant of `tdb`. The tenant id is
 * also set as the transaction-local `app.tenant_id` setting for row-level
 * security policies. Driver errors leave as ConflictError or
 * InfrastructureError; a thrown error rolls everything back.
 */
export async function inTenantTransaction<T>(tdb: TenantDb, fn: (tx: TenantDb) => Promise<T>): Promise<T> {
  const tenantId = tdb.tenantId
  try {
    return await tdb.db.transaction(async (tx) => {
      await tx.execute(sql`select set_config('app.tenant_id', ${tenantId}, true)`)
      const { scope, close } = openScope(tenantId, tx)
      try {
        return await fn(scope)
      } finally {
        close()
      }
    })
  } catch (err) {
    throw translateDbError(err)
  }
}

/**
 * Batch-job form: builds a fresh TenantDb for exactly one unit of work and
 * revokes it afterwards, so nothing carries over to the next tenant.
 */
export async function withTenant<T>(
  db: Database,
  tenantId: string,
  fn: (tdb: TenantDb) => Promise<T>,
): Promise<T> {
  const { scope, close } = openScope(createTenantDb(db, tenantId).tenantId, db)
  try {
    return await fn(scope)
  } finally {
    close()
  }
}
