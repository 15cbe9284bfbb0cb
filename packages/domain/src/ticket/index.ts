// ---------------------------------------------------------------------------
// Ticket bounded context
// The scheduled unit of work, from booking to close.
// ---------------------------------------------------------------------------

import type { Brand, FieldChanges, Tombstoned } from '../shared/types'
import { InvalidTransitionError, ValidationError } from '../shared/errors'
import type { TenantId } from '../tenant/index'
import type { AddressId, CustomerId } from '../customer/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies a Ticket aggregate. */
export type TicketId = Brand<string, 'TicketId'>

export const toTicketId = (raw: string): TicketId => raw as TicketId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Lifecycle status of a Ticket.
 *
 * Allowed transitions:
 *   scheduled → in_progress → completed
 *   scheduled | in_progress → cancelled
 *
 * completed and cancelled are terminal; only the separate reopen operation
 * leaves them.
 */
export type TicketStatus = 'scheduled' | 'in_progress' | 'completed' | 'cancelled'

export const TICKET_STATUSES: readonly TicketStatus[] = [
  'scheduled',
  'in_progress',
  'completed',
  'cancelled',
] as const

/** Customer's answer to the booking; independent of `TicketStatus`. */
export type ConfirmationStatus = 'pending' | 'confirmed' | 'declined' | 'reschedule_requested'

export const CONFIRMATION_STATUSES: readonly ConfirmationStatus[] = [
  'pending',
  'confirmed',
  'declined',
  'reschedule_requested',
] as const

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * The Ticket aggregate root.
 *
 * @invariant `closedAt` is set iff `status` is completed or cancelled.
 * @invariant `clockOutAt` requires `clockInAt`, and is not before it.
 * @invariant Once `closedAt` is set, line items and price fields are
 *            write-locked until an explicit reopen.
 * @invariant `version` increases by one on every persisted change; writers
 *            compare it to detect concurrent modification.
 */
export interface Ticket extends Tombstoned {
  readonly id: TicketId
  readonly tenantId: TenantId
  readonly customerId: CustomerId
  readonly addressId: AddressId
  /** Set when the ticket was generated from a recurring template. */
  readonly templateId?: string
  readonly status: TicketStatus
  readonly confirmationStatus: ConfirmationStatus
  readonly scheduledAt: Date
  readonly scheduledDurationMinutes?: number
  readonly clockInAt?: Date
  readonly clockOutAt?: Date
  readonly actualDurationMinutes?: number
  readonly closedAt?: Date
  /** Shows "estimated" to the customer until the price is confirmed at close-out. */
  readonly isPriceEstimated: boolean
  readonly notes?: string
  readonly version: number
  readonly createdAt: Date
  readonly updatedAt: Date
}

/**
 * Field changes produced by a transition. `null` clears a field.
 * The persistence layer applies it with a version check.
 */
export type TicketPatch = {
  readonly status?: TicketStatus
  readonly confirmationStatus?: ConfirmationStatus
  readonly scheduledAt?: Date
  readonly scheduledDurationMinutes?: number | null
  readonly addressId?: AddressId
  readonly clockInAt?: Date | null
  readonly clockOutAt?: Date | null
  readonly actualDurationMinutes?: number | null
  readonly closedAt?: Date | null
  readonly isPriceEstimated?: boolean
  readonly notes?: string | null
}

/** The outcome of a pure transition: what to write and what to record. */
export interface TicketTransition {
  readonly patch: TicketPatch
  readonly changes: FieldChanges
}

// ---------------------------------------------------------------------------
// Domain functions
// ---------------------------------------------------------------------------

const ALLOWED: Record<TicketStatus, readonly TicketStatus[]> = {
  scheduled: ['in_progress', 'cancelled'],
  in_progress: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
}

/** Returns true when a ticket can legally transition from `current` to `next`. */
export function canTransition(current: TicketStatus, next: TicketStatus): boolean {
  return ALLOWED[current].includes(next)
}

export function isTerminal(status: TicketStatus): boolean {
  return status === 'completed' || status === 'cancelled'
}

/** Returns true when the ticket is closed and therefore write-locked. */
export function isClosed(ticket: Pick<Ticket, 'closedAt'>): boolean {
  return ticket.closedAt !== undefined
}

/** Checks the closed_at ⇔ terminal-status biconditional. */
export function hasConsistentClosure(ticket: Pick<Ticket, 'status' | 'closedAt'>): boolean {
  return isClosed(ticket) === isTerminal(ticket.status)
}

function assertTransition(ticket: Ticket, next: TicketStatus): void {
  if (!canTransition(ticket.status, next)) {
    throw new InvalidTransitionError(`Cannot transition ticket from ${ticket.status} to ${next}`)
  }
}

const iso = (d: Date | undefined): string | null => (d ? d.toISOString() : null)

/**
 * scheduled → in_progress. Clock-in is recorded by the same operation.
 *
 * @throws {InvalidTransitionError} unless the ticket is scheduled.
 */
export function startTicket(ticket: Ticket, clockInAt: Date): TicketTransition {
  assertTransition(ticket, 'in_progress')
  return {
    patch: { status: 'in_progress', clockInAt },
    changes: {
      status: { old: ticket.status, new: 'in_progress' },
      clockInAt: { old: iso(ticket.clockInAt), new: clockInAt.toISOString() },
    },
  }
}

/**
 * in_progress → completed. Clock-out defaults to `now`; an earlier recorded
 * clock-out is kept. Sets `closedAt`, which freezes line items.
 *
 * @throws {InvalidTransitionError} unless the ticket is in progress.
 * @throws {ValidationError} if clock-out would precede clock-in.
 */
export function completeTicket(ticket: Ticket, now: Date, clockOutAt?: Date): TicketTransition {
  assertTransition(ticket, 'completed')
  const clockIn = ticket.clockInAt
  if (!clockIn) {
    // Unreachable through startTicket; guards rows written by other paths.
    throw new InvalidTransitionError('Cannot complete a ticket that was never clocked in')
  }
  const clockOut = clockOutAt ?? ticket.clockOutAt ?? now
  if (clockOut.getTime() < clockIn.getTime()) {
    throw new ValidationError('clockOutAt must not be before clockInAt')
  }
  const actualDurationMinutes = Math.floor((clockOut.getTime() - clockIn.getTime()) / 60_000)
  return {
    patch: { status: 'completed', clockOutAt: clockOut, actualDurationMinutes, closedAt: now },
    changes: {
      status: { old: ticket.status, new: 'completed' },
      clockOutAt: { old: iso(ticket.clockOutAt), new: clockOut.toISOString() },
      actualDurationMinutes: { old: ticket.actualDurationMinutes ?? null, new: actualDurationMinutes },
      closedAt: { old: null, new: now.toISOString() },
    },
  }
}

/**
 * scheduled | in_progress → cancelled. No clock data required.
 *
 * @throws {InvalidTransitionError} from a terminal state.
 */
export function cancelTicket(ticket: Ticket, now: Date): TicketTransition {
  assertTransition(ticket, 'cancelled')
  return {
    patch: { status: 'cancelled', closedAt: now },
    changes: {
      status: { old: ticket.status, new: 'cancelled' },
      closedAt: { old: null, new: now.toISOString() },
    },
  }
}

/**
 * completed → in_progress, outside the normal graph. Clears `closedAt` and
 * the clock-out so the work can be corrected and closed again. Callers gate
 * this behind its own permission and audit it.
 *
 * @throws {InvalidTransitionError} unless the ticket is completed.
 */
export function reopenTicket(ticket: Ticket): TicketTransition {
  if (ticket.status !== 'completed' || !isClosed(ticket)) {
    throw new InvalidTransitionError(`Only completed tickets can be reopened (ticket is ${ticket.status})`)
  }
  return {
    patch: { status: 'in_progress', closedAt: null, clockOutAt: null, actualDurationMinutes: null },
    changes: {
      status: { old: ticket.status, new: 'in_progress' },
      closedAt: { old: iso(ticket.closedAt), new: null },
      clockOutAt: { old: iso(ticket.clockOutAt), new: null },
      reopened: { old: false, new: true },
    },
  }
}

/**
 * pending → confirmed | declined | reschedule_requested.
 *
 * @throws {InvalidTransitionError} unless the current answer is pending.
 */
export function setConfirmation(ticket: Ticket, next: ConfirmationStatus): TicketTransition {
  if (next === 'pending' || ticket.confirmationStatus !== 'pending') {
    throw new InvalidTransitionError(
      `Cannot change confirmation from ${ticket.confirmationStatus} to ${next}`,
    )
  }
  return {
    patch: { confirmationStatus: next },
    changes: { confirmationStatus: { old: ticket.confirmationStatus, new: next } },
  }
}

/**
 * Moves an open ticket to a new time and asks the customer to confirm again.
 *
 * @throws {InvalidTransitionError} unless the ticket is still scheduled.
 */
export function rescheduleTicket(ticket: Ticket, scheduledAt: Date): TicketTransition {
  if (ticket.status !== 'scheduled') {
    throw new InvalidTransitionError(`Cannot reschedule a ticket that is ${ticket.status}`)
  }
  return {
    patch: { scheduledAt, confirmationStatus: 'pending' },
    changes: {
      scheduledAt: { old: ticket.scheduledAt.toISOString(), new: scheduledAt.toISOString() },
      confirmationStatus: { old: ticket.confirmationStatus, new: 'pending' },
    },
  }
}

/**
 * Rejects line-item and price edits on a closed ticket.
 *
 * @throws {InvalidTransitionError} when `closedAt` is set.
 */
export function assertTicketEditable(ticket: Pick<Ticket, 'closedAt' | 'status'>): void {
  if (isClosed(ticket)) {
    throw new InvalidTransitionError(`Ticket is ${ticket.status} and locked; reopen it before editing`)
  }
}
