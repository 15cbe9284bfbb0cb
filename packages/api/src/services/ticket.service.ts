// ---------------------------------------------------------------------------
// Ticket lifecycle service
//
// Each operation reads the ticket, asks the domain for the transition, and
// writes the patch with a version check, all in one tenant transaction.
// Audit entries and messaging events are handed over only after commit.
// ---------------------------------------------------------------------------

import {
  NotFoundError,
  ValidationError,
  assembleLineItems,
  assertTicketEditable,
  cancelTicket as cancelTransition,
  completeTicket as completeTransition,
  computeChanges,
  creationChanges,
  priceLineItem,
  reopenTicket as reopenTransition,
  rescheduleTicket as rescheduleTransition,
  setConfirmation as confirmationTransition,
  startTicket as startTransition,
  ticketEvent,
  type AddressId,
  type AuditEntry,
  type BasisPoints,
  type ConfirmationStatus,
  type Invoice,
  type LineItem,
  type LineItemRequest,
  type PricedLineItem,
  type Ticket,
  type TicketEventType,
  type TicketPatch,
  type TicketTransition,
} from '@crewbook/domain'
import { inTenantTransaction, type TenantDb } from '../lib/tenant-db'
import {
  findActiveInvoiceForTicket,
  findAddressById,
  findCustomerById,
  findLineItem,
  findServicesByIds,
  findTicketById,
  insertLineItems,
  insertTicket,
  listActiveLineItems,
  softDeleteLineItem,
  softDeleteTicket,
  updateLineItem as updateLineItemRow,
  updateTicketVersioned,
} from '../repositories'
import { flushEffects, getRuntime, noEffects, type Runtime } from '../runtime'
import { deriveInvoiceInTx, type DerivedInvoice } from './invoice.service'

export interface TicketDetail {
  readonly ticket: Ticket
  readonly lineItems: LineItem[]
  readonly invoice: Invoice | null
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function loadTicket(tdb: TenantDb, ticketId: string): Promise<Ticket> {
  const ticket = await findTicketById(tdb, ticketId)
  if (!ticket) throw new NotFoundError('Ticket', ticketId)
  return ticket
}

/** Prices requests against this tenant's catalog, all or nothing. */
async function priceRequests(tdb: TenantDb, requests: readonly LineItemRequest[]): Promise<PricedLineItem[]> {
  const services = await findServicesByIds(
    tdb,
    requests.map((r) => r.serviceId),
  )
  return assembleLineItems(requests, services)
}

function ticketAudit(ticket: Ticket, action: AuditEntry['action'], changes: AuditEntry['changes'], actor?: string): AuditEntry {
  return { tenantId: ticket.tenantId, entityType: 'ticket', entityId: ticket.id, action, changes, actor }
}

function lineItemAudit(item: LineItem, action: AuditEntry['action'], changes: AuditEntry['changes']): AuditEntry {
  return { tenantId: item.tenantId, entityType: 'line_item', entityId: item.id, action, changes }
}

/**
 * Runs one state-machine step: load, compute, versioned write. `event`, when
 * given, is published after commit with the ticket's new state.
 */
async function applyTransition(
  tdb: TenantDb,
  ticketId: string,
  rt: Runtime,
  compute: (ticket: Ticket, now: Date) => TicketTransition,
  event?: { type: TicketEventType; occursAt: (ticket: Ticket, now: Date) => Date },
  actor?: string,
  action: AuditEntry['action'] = 'update',
): Promise<Ticket> {
  const now = rt.now()
  const updated = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await loadTicket(tx, ticketId)
    const { patch, changes } = compute(ticket, now)
    const next = await updateTicketVersioned(tx, ticket, patch)
    return { next, changes }
  })
  await flushEffects(rt, tdb, {
    audit: [ticketAudit(updated.next, action, updated.changes, actor)],
    events: event ? [ticketEvent(event.type, updated.next.tenantId, updated.next.id, event.occursAt(updated.next, now))] : [],
  })
  return updated.next
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export async function getTicketDetail(tdb: TenantDb, ticketId: string): Promise<TicketDetail> {
  const ticket = await loadTicket(tdb, ticketId)
  const [lineItems, invoice] = await Promise.all([
    listActiveLineItems(tdb, ticket.id),
    findActiveInvoiceForTicket(tdb, ticket.id),
  ])
  return { ticket, lineItems, invoice }
}

// ---------------------------------------------------------------------------
// Create and edit
// ---------------------------------------------------------------------------

export type CreateTicketRequest = {
  customerId: string
  addressId: string
  scheduledAt: Date
  scheduledDurationMinutes?: number
  isPriceEstimated?: boolean
  notes?: string
  lineItems?: readonly LineItemRequest[]
}

/**
 * Books a scheduled ticket, with its initial line items priced and written in
 * the same transaction. The address must belong to the customer.
 *
 * @throws {NotFoundError} for an unknown customer, address or service.
 * @throws {ValidationError} when a line item cannot be priced.
 */
export async function createTicket(
  tdb: TenantDb,
  req: CreateTicketRequest,
  rt: Runtime = getRuntime(),
): Promise<TicketDetail> {
  const detail = await inTenantTransaction(tdb, async (tx) => {
    const customer = await findCustomerById(tx, req.customerId)
    if (!customer) throw new NotFoundError('Customer', req.customerId)
    const address = await findAddressById(tx, req.addressId)
    if (!address || address.customerId !== customer.id) throw new NotFoundError('Address', req.addressId)

    const priced = req.lineItems && req.lineItems.length > 0 ? await priceRequests(tx, req.lineItems) : []

    const ticket = await insertTicket(tx, {
      customerId: customer.id,
      addressId: address.id,
      scheduledAt: req.scheduledAt,
      scheduledDurationMinutes: req.scheduledDurationMinutes,
      isPriceEstimated: req.isPriceEstimated,
      notes: req.notes,
    })
    const lineItems = await insertLineItems(tx, ticket.id, priced)
    return { ticket, lineItems, invoice: null }
  })

  await flushEffects(rt, tdb, {
    audit: [
      ticketAudit(detail.ticket, 'create', creationChanges(detail.ticket)),
      ...detail.lineItems.map((item) => lineItemAudit(item, 'create', creationChanges(item))),
    ],
    events: [ticketEvent('ticket.created', detail.ticket.tenantId, detail.ticket.id, detail.ticket.scheduledAt)],
  })
  return detail
}

export type UpdateTicketRequest = {
  addressId?: string
  scheduledDurationMinutes?: number | null
  isPriceEstimated?: boolean
  notes?: string | null
}

/**
 * Edits an open ticket. Moving the appointment goes through `rescheduleTicket`.
 *
 * @throws {InvalidTransitionError} when the ticket is closed.
 */
export async function updateTicket(
  tdb: TenantDb,
  ticketId: string,
  req: UpdateTicketRequest,
  rt: Runtime = getRuntime(),
): Promise<Ticket> {
  const result = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await loadTicket(tx, ticketId)
    assertTicketEditable(ticket)
    let addressId: AddressId | undefined
    if (req.addressId !== undefined) {
      const address = await findAddressById(tx, req.addressId)
      if (!address || address.customerId !== ticket.customerId) throw new NotFoundError('Address', req.addressId)
      addressId = address.id
    }
    const patch: TicketPatch = {
      ...(addressId !== undefined ? { addressId } : {}),
      ...(req.scheduledDurationMinutes !== undefined ? { scheduledDurationMinutes: req.scheduledDurationMinutes } : {}),
      ...(req.isPriceEstimated !== undefined ? { isPriceEstimated: req.isPriceEstimated } : {}),
      ...(req.notes !== undefined ? { notes: req.notes } : {}),
    }
    const next = await updateTicketVersioned(tx, ticket, patch)
    return { before: ticket, next }
  })
  await flushEffects(rt, tdb, {
    audit: [ticketAudit(result.next, 'update', computeChanges(result.before, result.next, ['updatedAt', 'version']))],
    events: [],
  })
  return result.next
}

/** Moves a scheduled ticket and resets confirmation to pending. */
export function rescheduleTicket(
  tdb: TenantDb,
  ticketId: string,
  scheduledAt: Date,
  rt: Runtime = getRuntime(),
): Promise<Ticket> {
  return applyTransition(tdb, ticketId, rt, (ticket) => rescheduleTransition(ticket, scheduledAt), {
    type: 'ticket.rescheduled',
    occursAt: (ticket) => ticket.scheduledAt,
  })
}

/** Records the customer's answer to the booking. */
export function setConfirmation(
  tdb: TenantDb,
  ticketId: string,
  status: ConfirmationStatus,
  rt: Runtime = getRuntime(),
): Promise<Ticket> {
  return applyTransition(tdb, ticketId, rt, (ticket) => confirmationTransition(ticket, status))
}

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

/** scheduled → in_progress, clocking in at `clockInAt` (default now). */
export function startTicket(
  tdb: TenantDb,
  ticketId: string,
  clockInAt?: Date,
  rt: Runtime = getRuntime(),
): Promise<Ticket> {
  return applyTransition(tdb, ticketId, rt, (ticket, now) => startTransition(ticket, clockInAt ?? now), {
    type: 'ticket.started',
    occursAt: (_ticket, now) => now,
  })
}

export type CompleteTicketOptions = {
  clockOutAt?: Date
  /** Derive the invoice in the same transaction as the close. */
  invoice?: { taxRateBps?: BasisPoints }
}

export interface CompletedTicket {
  readonly ticket: Ticket
  readonly invoice: DerivedInvoice | null
}

/**
 * in_progress → completed. With `invoice`, the close and the invoice commit
 * together or not at all: a numbering collision or a dispatched-invoice
 * conflict leaves the ticket open.
 */
export async function completeTicket(
  tdb: TenantDb,
  ticketId: string,
  opts: CompleteTicketOptions = {},
  rt: Runtime = getRuntime(),
): Promise<CompletedTicket> {
  const now = rt.now()
  const effects = noEffects()
  const result = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await loadTicket(tx, ticketId)
    const { patch, changes } = completeTransition(ticket, now, opts.clockOutAt)
    const closed = await updateTicketVersioned(tx, ticket, patch)
    effects.audit.push(ticketAudit(closed, 'update', changes))

    if (!opts.invoice) return { ticket: closed, invoice: null }
    const derived = await deriveInvoiceInTx(
      tx,
      closed,
      opts.invoice.taxRateBps ?? rt.settings.DEFAULT_TAX_RATE_BPS,
      now,
    )
    effects.audit.push(derived.audit)
    return { ticket: closed, invoice: { invoice: derived.invoice, outcome: derived.outcome } }
  })
  effects.events.push(ticketEvent('ticket.completed', result.ticket.tenantId, result.ticket.id, now))
  await flushEffects(rt, tdb, effects)
  return result
}

/** scheduled | in_progress → cancelled. Cancelled tickets never bill. */
export function cancelTicket(tdb: TenantDb, ticketId: string, rt: Runtime = getRuntime()): Promise<Ticket> {
  return applyTransition(tdb, ticketId, rt, cancelTransition, {
    type: 'ticket.cancelled',
    occursAt: (ticket) => ticket.scheduledAt,
  })
}

/**
 * completed → in_progress outside the normal graph. The caller has already
 * checked the `tickets:reopen` permission; `actor` is recorded on the audit
 * entry.
 */
export function reopenTicket(
  tdb: TenantDb,
  ticketId: string,
  actor: string,
  rt: Runtime = getRuntime(),
): Promise<Ticket> {
  return applyTransition(tdb, ticketId, rt, reopenTransition, undefined, actor, 'reopen')
}

// ---------------------------------------------------------------------------
// Line items
// ---------------------------------------------------------------------------

/**
 * Prices and adds lines to an open ticket. The ticket's version is bumped so
 * a concurrent close either sees the new lines or fails.
 *
 * @throws {InvalidTransitionError} when the ticket is closed.
 */
export async function addLineItems(
  tdb: TenantDb,
  ticketId: string,
  requests: readonly LineItemRequest[],
  rt: Runtime = getRuntime(),
): Promise<LineItem[]> {
  if (requests.length === 0) throw new ValidationError('At least one line item is required')
  const items = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await loadTicket(tx, ticketId)
    assertTicketEditable(ticket)
    const priced = await priceRequests(tx, requests)
    await updateTicketVersioned(tx, ticket, {})
    return insertLineItems(tx, ticket.id, priced)
  })
  await flushEffects(rt, tdb, {
    audit: items.map((item) => lineItemAudit(item, 'create', creationChanges(item))),
    events: [],
  })
  return items
}

/** Fields of a line that can change after it was added; `null` clears one. */
export interface LineItemPatch {
  quantity?: number
  /** `null` drops the override and falls back to the catalog price. */
  priceOverrideCents?: number | null
  durationMinutes?: number | null
  description?: string | null
}

/**
 * Re-prices one line of an open ticket against the current catalog, keeping
 * whatever the patch leaves out. Bumps the ticket's version like `addLineItems`.
 *
 * @throws {InvalidTransitionError} when the ticket is closed.
 * @throws {ValidationError} when the line's service is no longer offered.
 */
export async function updateLineItem(
  tdb: TenantDb,
  ticketId: string,
  lineItemId: string,
  patch: LineItemPatch,
  rt: Runtime = getRuntime(),
): Promise<LineItem> {
  const now = rt.now()
  const { before, after } = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await loadTicket(tx, ticketId)
    assertTicketEditable(ticket)
    const item = await findLineItem(tx, ticket.id, lineItemId)
    if (!item) throw new NotFoundError('Line item', lineItemId)
    const service = (await findServicesByIds(tx, [item.serviceId])).get(item.serviceId)
    if (!service) throw new NotFoundError('Service', item.serviceId)

    // A kept override is the unit price, or the whole total for flexible lines.
    const keptOverride = item.isPriceOverridden ? (item.unitPriceCents ?? item.totalPriceCents) : undefined
    const priced = priceLineItem(service, {
      serviceId: item.serviceId,
      quantity: patch.quantity ?? item.quantity,
      priceOverrideCents: patch.priceOverrideCents === null ? undefined : (patch.priceOverrideCents ?? keptOverride),
      durationMinutes: patch.durationMinutes === null ? undefined : (patch.durationMinutes ?? item.durationMinutes),
      description: patch.description === null ? undefined : (patch.description ?? item.description),
    })

    await updateTicketVersioned(tx, ticket, {})
    const updated = await updateLineItemRow(tx, item.id, priced, now)
    if (!updated) throw new NotFoundError('Line item', lineItemId)
    return { before: item, after: updated }
  })
  await flushEffects(rt, tdb, {
    audit: [lineItemAudit(after, 'update', computeChanges(before, after))],
    events: [],
  })
  return after
}

/** Tombstones one line of an open ticket. */
export async function removeLineItem(
  tdb: TenantDb,
  ticketId: string,
  lineItemId: string,
  rt: Runtime = getRuntime(),
): Promise<void> {
  const now = rt.now()
  const tenantId = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await loadTicket(tx, ticketId)
    assertTicketEditable(ticket)
    const removed = await softDeleteLineItem(tx, ticket.id, lineItemId, now)
    if (!removed) throw new NotFoundError('Line item', lineItemId)
    await updateTicketVersioned(tx, ticket, {})
    return ticket.tenantId
  })
  await flushEffects(rt, tdb, {
    audit: [
      {
        tenantId,
        entityType: 'line_item',
        entityId: lineItemId,
        action: 'delete',
        changes: { deletedAt: { old: null, new: now.toISOString() } },
      },
    ],
    events: [],
  })
}

/** Tombstones an open ticket. Closed tickets are financial records and stay. */
export async function deleteTicket(tdb: TenantDb, ticketId: string, rt: Runtime = getRuntime()): Promise<void> {
  const now = rt.now()
  const ticket = await inTenantTransaction(tdb, async (tx) => {
    const current = await loadTicket(tx, ticketId)
    assertTicketEditable(current)
    await softDeleteTicket(tx, current, now)
    return current
  })
  await flushEffects(rt, tdb, {
    audit: [ticketAudit(ticket, 'delete', { deletedAt: { old: null, new: now.toISOString() } })],
    events: [],
  })
}
