// ---------------------------------------------------------------------------
// Audit sink
//
// Entries are written after the change they describe has committed. The
// trail is not authoritative state: a failed write is logged and the
// operation that produced it still succeeds.
// ---------------------------------------------------------------------------

import type { AuditEntry } from '@crewbook/domain'
import { insertAuditEntries } from '../repositories'
import type { TenantDb } from './tenant-db'

export interface AuditSink {
  record(tdb: TenantDb, entries: readonly AuditEntry[]): Promise<void>
}

/** Writes `audit_log` rows through the tenant's own handle. */
export class DbAuditSink implements AuditSink {
  async record(tdb: TenantDb, entries: readonly AuditEntry[]): Promise<void> {
    try {
      await insertAuditEntries(tdb, entries)
    } catch (err) {
      console.error('[audit] failed to record entries', {
        tenantId: tdb.tenantId,
        entities: entries.map((e) => `${e.entityType}:${e.entityId}:${e.action}`),
        error: err instanceof Error ? err.message : String(err),
      })
    }
  }
}
