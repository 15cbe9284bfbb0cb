// ---------------------------------------------------------------------------
// Invoice deriver and invoice lifecycle
//
// An invoice is computed from the completed ticket's live line items at call
// time. The ticket's version is bumped in the same transaction, so a
// derivation never commits against a ticket that was reopened or edited
// after it was read.
// ---------------------------------------------------------------------------

import {
  NotFoundError,
  applyPayment,
  computeChanges,
  creationChanges,
  deriveInvoiceSnapshot,
  invoiceEvent,
  invoiceNumberPrefix,
  nextInvoiceNumber,
  planInvoiceDerivation,
  sendInvoice as sendInvoicePatch,
  voidInvoice as voidInvoicePatch,
  type AuditEntry,
  type BasisPoints,
  type Cents,
  type Invoice,
  type InvoicePatch,
  type Ticket,
} from '@crewbook/domain'
import { inTenantTransaction, type TenantDb } from '../lib/tenant-db'
import {
  findActiveInvoiceForTicket,
  findInvoiceById,
  findLatestInvoiceNumber,
  findTicketById,
  insertInvoice,
  listActiveLineItems,
  refreshDraftTotals,
  updateInvoice,
  updateTicketVersioned,
} from '../repositories'
import { flushEffects, getRuntime, noEffects, type Runtime } from '../runtime'

export type DerivationOutcome = 'created' | 'refreshed' | 'unchanged'

export interface DerivedInvoice {
  readonly invoice: Invoice
  readonly outcome: DerivationOutcome
}

/**
 * Derivation inside an open transaction. Used on its own and by ticket
 * completion, which must commit the close and the invoice together.
 */
export async function deriveInvoiceInTx(
  tx: TenantDb,
  ticket: Ticket,
  taxRateBps: BasisPoints,
  now: Date,
): Promise<DerivedInvoice & { audit: AuditEntry }> {
  const lines = await listActiveLineItems(tx, ticket.id)
  const snapshot = deriveInvoiceSnapshot(ticket, lines, taxRateBps)
  const existing = await findActiveInvoiceForTicket(tx, ticket.id)
  const plan = planInvoiceDerivation(existing ?? undefined, snapshot)

  switch (plan.kind) {
    case 'create': {
      const latest = await findLatestInvoiceNumber(tx, invoiceNumberPrefix(now))
      const invoice = await insertInvoice(tx, snapshot, nextInvoiceNumber(now, latest))
      return { invoice, outcome: 'created', audit: invoiceAudit(invoice, 'create', creationChanges(invoice)) }
    }
    case 'refresh': {
      const invoice = await refreshDraftTotals(tx, plan.invoice, snapshot)
      return { invoice, outcome: 'refreshed', audit: invoiceAudit(invoice, 'update', computeChanges(plan.invoice, invoice)) }
    }
    case 'unchanged':
      return { invoice: plan.invoice, outcome: 'unchanged', audit: invoiceAudit(plan.invoice, 'update', {}) }
  }
}

function invoiceAudit(invoice: Invoice, action: AuditEntry['action'], changes: AuditEntry['changes']): AuditEntry {
  return { tenantId: invoice.tenantId, entityType: 'invoice', entityId: invoice.id, action, changes }
}

/**
 * Derives (or re-derives) the authoritative invoice for a completed ticket.
 * Idempotent while the line items are unchanged.
 *
 * @throws {NotFoundError} for an unknown ticket.
 * @throws {InvalidTransitionError} unless the ticket is completed.
 * @throws {ConflictError} if a dispatched invoice would change, or the ticket
 *         changed concurrently.
 */
export async function deriveInvoice(
  tdb: TenantDb,
  ticketId: string,
  opts: { taxRateBps?: BasisPoints } = {},
  rt: Runtime = getRuntime(),
): Promise<DerivedInvoice> {
  const effects = noEffects()
  const result = await inTenantTransaction(tdb, async (tx) => {
    const ticket = await findTicketById(tx, ticketId)
    if (!ticket) throw new NotFoundError('Ticket', ticketId)
    const derived = await deriveInvoiceInTx(tx, ticket, opts.taxRateBps ?? rt.settings.DEFAULT_TAX_RATE_BPS, rt.now())
    await updateTicketVersioned(tx, ticket, {})
    effects.audit.push(derived.audit)
    return { invoice: derived.invoice, outcome: derived.outcome }
  })
  await flushEffects(rt, tdb, effects)
  return result
}

async function transitionInvoice(
  tdb: TenantDb,
  invoiceId: string,
  rt: Runtime,
  apply: (invoice: Invoice, now: Date) => InvoicePatch,
): Promise<{ before: Invoice; after: Invoice; now: Date }> {
  const now = rt.now()
  return inTenantTransaction(tdb, async (tx) => {
    const before = await findInvoiceById(tx, invoiceId)
    if (!before) throw new NotFoundError('Invoice', invoiceId)
    const after = await updateInvoice(tx, before, apply(before, now))
    return { before, after, now }
  })
}

/** draft | sent → sent. Emits `invoice.sent` for the messaging collaborator. */
export async function sendInvoice(tdb: TenantDb, invoiceId: string, rt: Runtime = getRuntime()): Promise<Invoice> {
  const { before, after, now } = await transitionInvoice(tdb, invoiceId, rt, (invoice, at) =>
    sendInvoicePatch(invoice, at, rt.settings.INVOICE_DUE_DAYS),
  )
  await flushEffects(rt, tdb, {
    audit: [invoiceAudit(after, 'update', computeChanges(before, after))],
    events: [invoiceEvent('invoice.sent', after.tenantId, after.id, after.ticketId, now)],
  })
  return after
}

/** Records a payment; emits `invoice.paid` when it settles the balance. */
export async function recordPayment(
  tdb: TenantDb,
  invoiceId: string,
  amountCents: Cents,
  rt: Runtime = getRuntime(),
): Promise<Invoice> {
  const { before, after, now } = await transitionInvoice(tdb, invoiceId, rt, (invoice, at) =>
    applyPayment(invoice, amountCents, at),
  )
  await flushEffects(rt, tdb, {
    audit: [invoiceAudit(after, 'update', computeChanges(before, after))],
    events: after.status === 'paid' ? [invoiceEvent('invoice.paid', after.tenantId, after.id, after.ticketId, now)] : [],
  })
  return after
}

/** Any unpaid state → void. The ticket can then be invoiced afresh. */
export async function voidInvoice(tdb: TenantDb, invoiceId: string, rt: Runtime = getRuntime()): Promise<Invoice> {
  const { before, after } = await transitionInvoice(tdb, invoiceId, rt, voidInvoicePatch)
  await flushEffects(rt, tdb, {
    audit: [invoiceAudit(after, 'update', computeChanges(before, after))],
    events: [],
  })
  return after
}
