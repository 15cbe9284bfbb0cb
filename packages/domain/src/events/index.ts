// ---------------------------------------------------------------------------
// Events bounded context
// What the core tells its collaborators: messaging events for the reminder
// scheduler and change records for the audit trail. Neither is authoritative.
// ---------------------------------------------------------------------------

import type { FieldChanges } from '../shared/types'
import type { TenantId } from '../tenant/index'
import type { TicketId } from '../ticket/index'
import type { InvoiceId } from '../billing/index'

// ---------------------------------------------------------------------------
// Messaging events
// ---------------------------------------------------------------------------

export type TicketEventType =
  | 'ticket.created'
  | 'ticket.rescheduled'
  | 'ticket.started'
  | 'ticket.completed'
  | 'ticket.cancelled'

export type InvoiceEventType = 'invoice.sent' | 'invoice.paid'

export type DomainEventType = TicketEventType | InvoiceEventType

/**
 * Payload handed to the messaging collaborator. `occursAt` is when the thing
 * the message is about happens: the appointment time for ticket events, the
 * transition time for invoice events.
 */
export type DomainEvent =
  | {
      readonly eventType: TicketEventType
      readonly tenantId: TenantId
      readonly ticketId: TicketId
      readonly occursAt: Date
    }
  | {
      readonly eventType: InvoiceEventType
      readonly tenantId: TenantId
      readonly invoiceId: InvoiceId
      readonly ticketId: TicketId
      readonly occursAt: Date
    }

export const ticketEvent = (
  eventType: TicketEventType,
  tenantId: TenantId,
  ticketId: TicketId,
  occursAt: Date,
): DomainEvent => ({ eventType, tenantId, ticketId, occursAt })

export const invoiceEvent = (
  eventType: InvoiceEventType,
  tenantId: TenantId,
  invoiceId: InvoiceId,
  ticketId: TicketId,
  occursAt: Date,
): DomainEvent => ({ eventType, tenantId, invoiceId, ticketId, occursAt })

// ---------------------------------------------------------------------------
// Audit entries
// ---------------------------------------------------------------------------

export type AuditAction = 'create' | 'update' | 'delete' | 'reopen'

export type AuditEntityType =
  | 'customer'
  | 'address'
  | 'service'
  | 'ticket'
  | 'line_item'
  | 'invoice'
  | 'recurring_template'
  | 'lead'

/** One append-only audit record. */
export interface AuditEntry {
  readonly tenantId: TenantId
  readonly entityType: AuditEntityType
  readonly entityId: string
  readonly action: AuditAction
  readonly changes: FieldChanges
  /** Subject of the authenticated caller, when there is one. */
  readonly actor?: string
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b)
  }
  return Object.is(a, b)
}

/**
 * Field-by-field diff of two states of one entity. Missing and `undefined`
 * fields compare equal. `updatedAt` is ignored unless `exclude` says
 * otherwise.
 */
export function computeChanges(
  before: object,
  after: object,
  exclude: readonly string[] = ['updatedAt'],
): FieldChanges {
  const a = new Map<string, unknown>(Object.entries(before))
  const b = new Map<string, unknown>(Object.entries(after))
  const changes: FieldChanges = {}
  for (const key of new Set([...a.keys(), ...b.keys()])) {
    if (exclude.includes(key)) continue
    const oldValue = a.get(key)
    const newValue = b.get(key)
    if (!sameValue(oldValue, newValue)) {
      changes[key] = { old: oldValue ?? null, new: newValue ?? null }
    }
  }
  return changes
}

/** Audit changes for a freshly created entity: every field from null. */
export function creationChanges(created: object, exclude: readonly string[] = ['createdAt', 'updatedAt']): FieldChanges {
  return computeChanges({}, created, exclude)
}
