import type { AuditEntry } from '@crewbook/domain'
import { auditLog } from '../db/schema'
import type { TenantDb } from '../lib/tenant-db'

/** Appends audit rows. The tenant comes from `tdb`, never from the entry. */
export async function insertAuditEntries(tdb: TenantDb, entries: readonly AuditEntry[]): Promise<void> {
  if (entries.length === 0) return
  await tdb.db.insert(auditLog).values(
    entries.map((e) => ({
      tenantId: tdb.tenantId,
      entityType: e.entityType,
      entityId: e.entityId,
      action: e.action,
      changes: e.changes,
      actor: e.actor,
    })),
  )
}
