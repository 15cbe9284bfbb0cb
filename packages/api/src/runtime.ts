// ---------------------------------------------------------------------------
// Service runtime
//
// What the orchestration services need besides a TenantDb: a clock, the
// event publisher, the audit sink and the business settings from config.
// Tests pass their own; production code uses the lazily built default.
// ---------------------------------------------------------------------------

import { systemClock, type AuditEntry, type Clock, type DomainEvent } from '@crewbook/domain'
import { getConfig, type AppConfig } from './config'
import { DbAuditSink, type AuditSink } from './lib/audit'
import { EventBus, type EventPublisher } from './lib/events'
import type { TenantDb } from './lib/tenant-db'

export interface Runtime {
  readonly now: Clock
  readonly events: EventPublisher
  readonly audit: AuditSink
  readonly settings: Pick<AppConfig, 'DEFAULT_TAX_RATE_BPS' | 'INVOICE_DUE_DAYS' | 'RECURRENCE_MAX_RETRIES'>
}

/** Process-wide bus; adapters subscribe to it at startup. */
export const eventBus = new EventBus()

let _runtime: Runtime | null = null

export function getRuntime(): Runtime {
  if (_runtime === null) {
    const config = getConfig()
    _runtime = {
      now: systemClock,
      events: eventBus,
      audit: new DbAuditSink(),
      settings: {
        DEFAULT_TAX_RATE_BPS: config.DEFAULT_TAX_RATE_BPS,
        INVOICE_DUE_DAYS: config.INVOICE_DUE_DAYS,
        RECURRENCE_MAX_RETRIES: config.RECURRENCE_MAX_RETRIES,
      },
    }
  }
  return _runtime
}

/** What a committed unit of work reports to its collaborators. */
export interface Effects {
  readonly audit: AuditEntry[]
  readonly events: DomainEvent[]
}

export const noEffects = (): Effects => ({ audit: [], events: [] })

/** Hands committed effects to the audit sink and the event bus. Neither can fail the caller. */
export async function flushEffects(rt: Runtime, tdb: TenantDb, effects: Effects): Promise<void> {
  await rt.audit.record(tdb, effects.audit)
  await rt.events.publish(effects.events)
}
