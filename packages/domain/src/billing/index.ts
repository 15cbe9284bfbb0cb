// ---------------------------------------------------------------------------
// Billing bounded context
// Invoices are derived from a completed ticket's line items, never authored.
// ---------------------------------------------------------------------------

import type { BasisPoints, Brand, Cents, Tombstoned } from '../shared/types'
import { assertBasisPoints, roundHalfUpDiv } from '../shared/types'
import { ConflictError, InvalidTransitionError, ValidationError } from '../shared/errors'
import type { TenantId } from '../tenant/index'
import type { CustomerId } from '../customer/index'
import type { Ticket, TicketId } from '../ticket/index'
import type { LineItem } from '../pricing/index'
import { activeSubtotal } from '../pricing/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies an Invoice aggregate. */
export type InvoiceId = Brand<string, 'InvoiceId'>

export const toInvoiceId = (raw: string): InvoiceId => raw as InvoiceId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

/**
 * Lifecycle status of an Invoice.
 *
 *   draft → sent → partial → paid
 *   any state except paid → void (terminal)
 *
 * partial is set while 0 < amountPaid < total; paid once amountPaid ≥ total.
 */
export type InvoiceStatus = 'draft' | 'sent' | 'partial' | 'paid' | 'void'

export const INVOICE_STATUSES: readonly InvoiceStatus[] = ['draft', 'sent', 'partial', 'paid', 'void'] as const

/** The money part of an invoice, computed from line items. */
export interface InvoiceTotals {
  readonly subtotalCents: Cents
  readonly taxRateBps: BasisPoints
  readonly taxAmountCents: Cents
  readonly totalAmountCents: Cents
}

/** Everything needed to write or compare an invoice for one ticket. */
export interface InvoiceSnapshot extends InvoiceTotals {
  readonly ticketId: TicketId
  readonly customerId: CustomerId
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * The Invoice aggregate root.
 *
 * @invariant `totalAmountCents === subtotalCents + taxAmountCents`.
 * @invariant At most one invoice per ticket is neither void nor tombstoned;
 *            that one is authoritative.
 * @invariant Once sent, totals never change in place. Re-issuing means void
 *            and derive again.
 */
export interface Invoice extends InvoiceSnapshot, Tombstoned {
  readonly id: InvoiceId
  readonly tenantId: TenantId
  readonly invoiceNumber: string
  readonly status: InvoiceStatus
  readonly amountPaidCents: Cents
  readonly issuedAt?: Date
  readonly sentAt?: Date
  readonly dueAt?: Date
  readonly paidAt?: Date
  readonly voidedAt?: Date
  readonly notes?: string
  readonly createdAt: Date
  readonly updatedAt: Date
}

/** Field changes produced by an invoice transition. */
export type InvoicePatch = Partial<
  Pick<Invoice, 'status' | 'amountPaidCents' | 'issuedAt' | 'sentAt' | 'dueAt' | 'paidAt' | 'voidedAt'>
>

// ---------------------------------------------------------------------------
// Derivation
// ---------------------------------------------------------------------------

/**
 * tax = round-half-up(subtotal × bps / 10000), total = subtotal + tax.
 * Integer arithmetic only.
 */
export function computeInvoiceTotals(subtotalCents: Cents, taxRateBps: BasisPoints): InvoiceTotals {
  assertBasisPoints(taxRateBps, 'taxRateBps')
  const taxAmountCents = roundHalfUpDiv(subtotalCents * taxRateBps, 10_000)
  return { subtotalCents, taxRateBps, taxAmountCents, totalAmountCents: subtotalCents + taxAmountCents }
}

/**
 * Computes the invoice a ticket should have right now from its current line
 * items. Tombstoned lines are ignored; no earlier total is trusted.
 *
 * @throws {InvalidTransitionError} unless the ticket is completed. Cancelled
 *         tickets do not bill.
 */
export function deriveInvoiceSnapshot(
  ticket: Pick<Ticket, 'id' | 'customerId' | 'status'>,
  lineItems: readonly Pick<LineItem, 'totalPriceCents' | 'deletedAt'>[],
  taxRateBps: BasisPoints,
): InvoiceSnapshot {
  if (ticket.status !== 'completed') {
    throw new InvalidTransitionError(`Cannot invoice a ticket that is ${ticket.status}`)
  }
  return {
    ticketId: ticket.id,
    customerId: ticket.customerId,
    ...computeInvoiceTotals(activeSubtotal(lineItems), taxRateBps),
  }
}

/** Returns true when the invoice already carries exactly these totals. */
export function matchesSnapshot(invoice: InvoiceTotals, snapshot: InvoiceTotals): boolean {
  return (
    invoice.subtotalCents === snapshot.subtotalCents &&
    invoice.taxRateBps === snapshot.taxRateBps &&
    invoice.taxAmountCents === snapshot.taxAmountCents &&
    invoice.totalAmountCents === snapshot.totalAmountCents
  )
}

/** What the deriver has to do with the ticket's authoritative invoice. */
export type DerivationPlan =
  | { readonly kind: 'create' }
  | { readonly kind: 'unchanged'; readonly invoice: Invoice }
  | { readonly kind: 'refresh'; readonly invoice: Invoice }

/**
 * Decides between creating, reusing and refreshing, given the current
 * authoritative invoice (if any) and a fresh snapshot.
 *
 *   none                     → create
 *   any, same totals         → unchanged
 *   draft, different totals  → refresh in place
 *   dispatched, different    → ConflictError
 *
 * @throws {ConflictError} when a sent, partial or paid invoice would change.
 */
export function planInvoiceDerivation(existing: Invoice | undefined, snapshot: InvoiceSnapshot): DerivationPlan {
  if (!existing || existing.status === 'void' || existing.deletedAt !== undefined) {
    return { kind: 'create' }
  }
  if (matchesSnapshot(existing, snapshot)) {
    return { kind: 'unchanged', invoice: existing }
  }
  if (existing.status === 'draft') {
    return { kind: 'refresh', invoice: existing }
  }
  throw new ConflictError(
    `Invoice ${existing.invoiceNumber} is ${existing.status}; void it before deriving a new one`,
  )
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

const DAY_MS = 86_400_000

/**
 * draft | sent → sent. Sending again is a resend: `issuedAt` and `dueAt` keep
 * their first values, `sentAt` moves.
 *
 * @throws {InvalidTransitionError} from partial, paid or void.
 */
export function sendInvoice(invoice: Invoice, now: Date, dueDays: number): InvoicePatch {
  if (invoice.status !== 'draft' && invoice.status !== 'sent') {
    throw new InvalidTransitionError(`Cannot send an invoice that is ${invoice.status}`)
  }
  const issuedAt = invoice.issuedAt ?? now
  return {
    status: 'sent',
    issuedAt,
    sentAt: now,
    dueAt: invoice.dueAt ?? new Date(issuedAt.getTime() + dueDays * DAY_MS),
  }
}

/**
 * Records a payment against a sent or partially paid invoice.
 *
 * @throws {ValidationError} unless `amountCents` is a positive integer.
 * @throws {InvalidTransitionError} unless the invoice is sent or partial.
 */
export function applyPayment(invoice: Invoice, amountCents: Cents, now: Date): InvoicePatch {
  if (!Number.isSafeInteger(amountCents) || amountCents <= 0) {
    throw new ValidationError('amountCents must be a positive integer number of cents')
  }
  if (invoice.status !== 'sent' && invoice.status !== 'partial') {
    throw new InvalidTransitionError(`Cannot record a payment on an invoice that is ${invoice.status}`)
  }
  const amountPaidCents = invoice.amountPaidCents + amountCents
  return amountPaidCents >= invoice.totalAmountCents
    ? { status: 'paid', amountPaidCents, paidAt: now }
    : { status: 'partial', amountPaidCents }
}

/**
 * Any state except paid → void. A new invoice can then be derived for the ticket.
 *
 * @throws {InvalidTransitionError} for paid or already void invoices.
 */
export function voidInvoice(invoice: Invoice, now: Date): InvoicePatch {
  if (invoice.status === 'paid' || invoice.status === 'void') {
    throw new InvalidTransitionError(`Cannot void an invoice that is ${invoice.status}`)
  }
  return { status: 'void', voidedAt: now }
}

/** Remaining amount owed, never negative. */
export function balanceDue(invoice: Pick<Invoice, 'totalAmountCents' | 'amountPaidCents'>): Cents {
  return Math.max(0, invoice.totalAmountCents - invoice.amountPaidCents)
}

// ---------------------------------------------------------------------------
// Numbering
// ---------------------------------------------------------------------------

/** "INV-YYYYMMDD-" for the UTC day of `at`. */
export function invoiceNumberPrefix(at: Date): string {
  const y = at.getUTCFullYear()
  const m = String(at.getUTCMonth() + 1).padStart(2, '0')
  const d = String(at.getUTCDate()).padStart(2, '0')
  return `INV-${y}${m}${d}-`
}

/**
 * Next number in the tenant's daily sequence, given the highest number
 * already issued today (if any). `INV-20250301-0007` → `INV-20250301-0008`.
 */
export function nextInvoiceNumber(at: Date, latestToday: string | undefined): string {
  const prefix = invoiceNumberPrefix(at)
  let sequence = 1
  if (latestToday !== undefined && latestToday.startsWith(prefix)) {
    const parsed = Number.parseInt(latestToday.slice(prefix.length), 10)
    if (Number.isSafeInteger(parsed)) sequence = parsed + 1
  }
  return `${prefix}${String(sequence).padStart(4, '0')}`
}
