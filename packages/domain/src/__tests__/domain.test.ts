import { describe, it, expect } from 'vitest'
import {
  // shared
  roundHalfUpDiv,
  ValidationError,
  NotFoundError,
  InvalidTransitionError,
  ConflictError,
  MissingTenantError,
  // tenant
  toTenantId,
  createTenantContext,
  // catalog
  toServiceId,
  parseServicePricing,
  toPricingColumns,
  type Service,
  // customer
  toCustomerId,
  toAddressId,
  validateCustomerName,
  sortAddresses,
  assertAttributeInput,
  customerDisplayName,
  type Address,
  // lead
  toLeadId,
  assertLeadStatusChange,
  convertLeadPatch,
  splitLeadName,
  type Lead,
  // ticket
  toTicketId,
  canTransition,
  startTicket,
  completeTicket,
  cancelTicket,
  reopenTicket,
  setConfirmation,
  rescheduleTicket,
  assertTicketEditable,
  hasConsistentClosure,
  type Ticket,
  type TicketPatch,
  // pricing
  priceLineItem,
  assembleLineItems,
  activeSubtotal,
  // billing
  toInvoiceId,
  computeInvoiceTotals,
  deriveInvoiceSnapshot,
  planInvoiceDerivation,
  sendInvoice,
  applyPayment,
  voidInvoice,
  balanceDue,
  nextInvoiceNumber,
  type Invoice,
  type InvoiceSnapshot,
  // events
  computeChanges,
} from '../index'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TENANT = toTenantId('tenant-1')
const T0 = new Date('2025-03-03T09:00:00.000Z')

function makeService(overrides: Partial<Service> = {}): Service {
  return {
    id: toServiceId('svc-window'),
    tenantId: TENANT,
    name: 'Window Cleaning, Standard',
    pricing: { type: 'fixed', defaultPriceCents: 15000 },
    isActive: true,
    displayOrder: 0,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  }
}

function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: toTicketId('tk-1'),
    tenantId: TENANT,
    customerId: toCustomerId('c-1'),
    addressId: toAddressId('a-1'),
    status: 'scheduled',
    confirmationStatus: 'pending',
    scheduledAt: T0,
    isPriceEstimated: true,
    version: 1,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  }
}

/** Applies the fields of a transition patch the closure invariant depends on. */
function applyPatch(ticket: Ticket, patch: TicketPatch): Ticket {
  const pick = <T>(value: T | null | undefined, current: T | undefined): T | undefined =>
    value === null ? undefined : value ?? current
  return {
    ...ticket,
    status: patch.status ?? ticket.status,
    confirmationStatus: patch.confirmationStatus ?? ticket.confirmationStatus,
    clockInAt: pick(patch.clockInAt, ticket.clockInAt),
    clockOutAt: pick(patch.clockOutAt, ticket.clockOutAt),
    closedAt: pick(patch.closedAt, ticket.closedAt),
    version: ticket.version + 1,
  }
}

function makeInvoice(snapshot: InvoiceSnapshot, overrides: Partial<Invoice> = {}): Invoice {
  return {
    ...snapshot,
    id: toInvoiceId('inv-1'),
    tenantId: TENANT,
    invoiceNumber: 'INV-20250303-0001',
    status: 'draft',
    amountPaidCents: 0,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// 1. Integer money
// ---------------------------------------------------------------------------
describe('roundHalfUpDiv', () => {
  it('rounds an exact half up', () => {
    expect(roundHalfUpDiv(12375, 10)).toBe(1238)
  })

  it('rounds below the half down', () => {
    expect(roundHalfUpDiv(12374, 10)).toBe(1237)
  })

  it('rejects a zero denominator', () => {
    expect(() => roundHalfUpDiv(1, 0)).toThrow(ValidationError)
  })
})

// ---------------------------------------------------------------------------
// 2. Tenant context fails closed
// ---------------------------------------------------------------------------
describe('createTenantContext', () => {
  it.each([undefined, null, '', '   '])('rejects %j', (raw) => {
    expect(() => createTenantContext(raw)).toThrow(MissingTenantError)
  })

  it('carries the identity through', () => {
    expect(createTenantContext('tenant-1')).toEqual({ tenantId: 'tenant-1' })
  })
})

// ---------------------------------------------------------------------------
// 3. Catalog pricing variants
// ---------------------------------------------------------------------------
describe('parseServicePricing', () => {
  it('requires a default price for fixed services', () => {
    expect(() =>
      parseServicePricing({ pricingType: 'fixed', defaultPriceCents: null, unitPriceCents: null, unitLabel: null }),
    ).toThrow('fixed services require defaultPriceCents')
  })

  it('requires a unit price for per_unit services', () => {
    expect(() =>
      parseServicePricing({ pricingType: 'per_unit', defaultPriceCents: 100, unitPriceCents: null, unitLabel: null }),
    ).toThrow(ValidationError)
  })

  it('allows flexible services with no price at all', () => {
    expect(
      parseServicePricing({ pricingType: 'flexible', defaultPriceCents: null, unitPriceCents: null, unitLabel: null }),
    ).toEqual({ type: 'flexible' })
  })

  it('rejects an unknown pricing type', () => {
    expect(() =>
      parseServicePricing({ pricingType: 'hourly', defaultPriceCents: 1, unitPriceCents: null, unitLabel: null }),
    ).toThrow('Unknown pricing type: hourly')
  })

  it('maps a per_unit variant back to its columns', () => {
    expect(toPricingColumns({ type: 'per_unit', unitPriceCents: 500, unitLabel: 'screen' })).toEqual({
      pricingType: 'per_unit',
      defaultPriceCents: null,
      unitPriceCents: 500,
      unitLabel: 'screen',
    })
  })
})

// ---------------------------------------------------------------------------
// 4. Line-item assembly
// ---------------------------------------------------------------------------
describe('priceLineItem', () => {
  const screens = makeService({
    id: toServiceId('svc-screens'),
    name: 'Screen Repair',
    pricing: { type: 'per_unit', unitPriceCents: 500, unitLabel: 'screen' },
  })

  it.each([1, 2, 7, 40])('per_unit total is unit price × %i', (quantity) => {
    const priced = priceLineItem(screens, { serviceId: screens.id, quantity })
    expect(priced.unitPriceCents).toBe(500)
    expect(priced.totalPriceCents).toBe(500 * quantity)
    expect(priced.isPriceOverridden).toBe(false)
  })

  it('uses the fixed default price when nothing overrides it', () => {
    const priced = priceLineItem(makeService(), { serviceId: toServiceId('svc-window') })
    expect(priced).toEqual({
      serviceId: 'svc-window',
      quantity: 1,
      unitPriceCents: 15000,
      totalPriceCents: 15000,
      durationMinutes: null,
      isPriceOverridden: false,
    })
  })

  it('applies an override to the unit price of a fixed service', () => {
    const priced = priceLineItem(makeService(), {
      serviceId: toServiceId('svc-window'),
      quantity: 2,
      priceOverrideCents: 12000,
    })
    expect(priced.unitPriceCents).toBe(12000)
    expect(priced.totalPriceCents).toBe(24000)
    expect(priced.isPriceOverridden).toBe(true)
  })

  it('requires an override for flexible services', () => {
    const custom = makeService({ pricing: { type: 'flexible' } })
    expect(() => priceLineItem(custom, { serviceId: custom.id })).toThrow(ValidationError)
  })

  it('takes a flexible override as the line total', () => {
    const custom = makeService({ pricing: { type: 'flexible', suggestedPriceCents: 8000 } })
    const priced = priceLineItem(custom, { serviceId: custom.id, quantity: 3, priceOverrideCents: 9000 })
    expect(priced.unitPriceCents).toBeNull()
    expect(priced.totalPriceCents).toBe(9000)
    expect(priced.isPriceOverridden).toBe(true)
  })

  it('rejects a tombstoned service for new line items', () => {
    const retired = makeService({ deletedAt: T0 })
    expect(() => priceLineItem(retired, { serviceId: retired.id })).toThrow('is no longer offered')
  })

  it('rejects an inactive service for new line items', () => {
    const paused = makeService({ isActive: false })
    expect(() => priceLineItem(paused, { serviceId: paused.id })).toThrow(ValidationError)
  })

  it('rejects fractional quantities and money', () => {
    expect(() => priceLineItem(screens, { serviceId: screens.id, quantity: 1.5 })).toThrow(ValidationError)
    expect(() => priceLineItem(screens, { serviceId: screens.id, priceOverrideCents: 10.25 })).toThrow(ValidationError)
  })
})

describe('assembleLineItems', () => {
  const windowCleaning = makeService()
  const services = new Map([[windowCleaning.id, windowCleaning]])

  it('prices every request', () => {
    const priced = assembleLineItems(
      [
        { serviceId: windowCleaning.id },
        { serviceId: windowCleaning.id, quantity: 2 },
      ],
      services,
    )
    expect(priced.map((p) => p.totalPriceCents)).toEqual([15000, 30000])
  })

  it('fails the whole call when one service cannot be resolved', () => {
    expect(() =>
      assembleLineItems([{ serviceId: windowCleaning.id }, { serviceId: toServiceId('svc-other-tenant') }], services),
    ).toThrow(NotFoundError)
  })

  it('rejects an empty request list', () => {
    expect(() => assembleLineItems([], services)).toThrow(ValidationError)
  })
})

describe('activeSubtotal', () => {
  it('ignores tombstoned lines', () => {
    expect(
      activeSubtotal([{ totalPriceCents: 15000 }, { totalPriceCents: 2500, deletedAt: T0 }, { totalPriceCents: 500 }]),
    ).toBe(15500)
  })
})

// ---------------------------------------------------------------------------
// 5. Ticket lifecycle
// ---------------------------------------------------------------------------
describe('ticket transitions', () => {
  it('refuses scheduled → completed without passing through in_progress', () => {
    expect(canTransition('scheduled', 'completed')).toBe(false)
    expect(() => completeTicket(makeTicket(), T0)).toThrow(InvalidTransitionError)
  })

  it('records the clock-in when starting', () => {
    const clockIn = new Date('2025-03-03T09:05:00.000Z')
    expect(startTicket(makeTicket(), clockIn).patch).toEqual({ status: 'in_progress', clockInAt: clockIn })
  })

  it('refuses to start a ticket twice', () => {
    const started = makeTicket({ status: 'in_progress', clockInAt: T0 })
    expect(() => startTicket(started, T0)).toThrow('Cannot transition ticket from in_progress to in_progress')
  })

  it('computes whole minutes worked and closes on completion', () => {
    const now = new Date('2025-03-03T10:30:30.000Z')
    const { patch } = completeTicket(makeTicket({ status: 'in_progress', clockInAt: T0 }), now)
    expect(patch).toEqual({
      status: 'completed',
      clockOutAt: now,
      actualDurationMinutes: 90,
      closedAt: now,
    })
  })

  it('rejects a clock-out before the clock-in', () => {
    const ticket = makeTicket({ status: 'in_progress', clockInAt: T0 })
    expect(() => completeTicket(ticket, T0, new Date('2025-03-03T08:59:00.000Z'))).toThrow(ValidationError)
  })

  it('cancels from scheduled without clock data', () => {
    const now = new Date('2025-03-02T12:00:00.000Z')
    expect(cancelTicket(makeTicket(), now).patch).toEqual({ status: 'cancelled', closedAt: now })
  })

  it.each(['completed', 'cancelled'] as const)('refuses every transition out of %s', (status) => {
    const closed = makeTicket({ status, clockInAt: T0, closedAt: T0 })
    expect(() => startTicket(closed, T0)).toThrow(InvalidTransitionError)
    expect(() => completeTicket(closed, T0)).toThrow(InvalidTransitionError)
    expect(() => cancelTicket(closed, T0)).toThrow(InvalidTransitionError)
  })

  it('keeps closedAt set exactly when the status is terminal along every path', () => {
    const scheduled = makeTicket()
    const started = applyPatch(scheduled, startTicket(scheduled, T0).patch)
    const completed = applyPatch(started, completeTicket(started, new Date('2025-03-03T11:00:00.000Z')).patch)
    const cancelledEarly = applyPatch(scheduled, cancelTicket(scheduled, T0).patch)
    const cancelledLate = applyPatch(started, cancelTicket(started, T0).patch)
    const reopened = applyPatch(completed, reopenTicket(completed).patch)

    for (const ticket of [scheduled, started, completed, cancelledEarly, cancelledLate, reopened]) {
      expect(hasConsistentClosure(ticket)).toBe(true)
    }
    expect(reopened.status).toBe('in_progress')
    expect(reopened.closedAt).toBeUndefined()
  })
})

describe('reopenTicket', () => {
  it('only reopens completed tickets', () => {
    const cancelled = makeTicket({ status: 'cancelled', closedAt: T0 })
    expect(() => reopenTicket(cancelled)).toThrow('Only completed tickets can be reopened (ticket is cancelled)')
  })

  it('clears the close-out fields', () => {
    const completed = makeTicket({
      status: 'completed',
      clockInAt: T0,
      clockOutAt: new Date('2025-03-03T10:00:00.000Z'),
      actualDurationMinutes: 60,
      closedAt: new Date('2025-03-03T10:00:00.000Z'),
    })
    expect(reopenTicket(completed).patch).toEqual({
      status: 'in_progress',
      closedAt: null,
      clockOutAt: null,
      actualDurationMinutes: null,
    })
  })
})

describe('confirmation and rescheduling', () => {
  it('answers a pending confirmation regardless of the primary status', () => {
    const started = makeTicket({ status: 'in_progress', clockInAt: T0 })
    expect(setConfirmation(started, 'confirmed').patch).toEqual({ confirmationStatus: 'confirmed' })
  })

  it('refuses to change an answered confirmation', () => {
    expect(() => setConfirmation(makeTicket({ confirmationStatus: 'confirmed' }), 'declined')).toThrow(
      'Cannot change confirmation from confirmed to declined',
    )
  })

  it('resets confirmation when rescheduled', () => {
    const moved = new Date('2025-03-05T13:00:00.000Z')
    const ticket = makeTicket({ confirmationStatus: 'reschedule_requested' })
    expect(rescheduleTicket(ticket, moved).patch).toEqual({ scheduledAt: moved, confirmationStatus: 'pending' })
  })

  it('does not reschedule work already under way', () => {
    expect(() => rescheduleTicket(makeTicket({ status: 'in_progress', clockInAt: T0 }), T0)).toThrow(
      InvalidTransitionError,
    )
  })
})

describe('assertTicketEditable', () => {
  it('locks a closed ticket', () => {
    expect(() => assertTicketEditable({ status: 'completed', closedAt: T0 })).toThrow(
      'Ticket is completed and locked; reopen it before editing',
    )
  })

  it('allows edits while open', () => {
    expect(() => assertTicketEditable({ status: 'in_progress' })).not.toThrow()
  })
})

// ---------------------------------------------------------------------------
// 6. Invoice derivation
// ---------------------------------------------------------------------------
describe('deriveInvoiceSnapshot', () => {
  const completed = makeTicket({ status: 'completed', clockInAt: T0, closedAt: T0 })

  it('bills Window Cleaning at 8.25% with round-half-up tax', () => {
    const priced = priceLineItem(makeService(), { serviceId: toServiceId('svc-window'), quantity: 1 })
    expect(deriveInvoiceSnapshot(completed, [priced], 825)).toEqual({
      ticketId: 'tk-1',
      customerId: 'c-1',
      subtotalCents: 15000,
      taxRateBps: 825,
      taxAmountCents: 1238,
      totalAmountCents: 16238,
    })
  })

  it('refuses a ticket that is still in progress', () => {
    const started = makeTicket({ status: 'in_progress', clockInAt: T0 })
    expect(() => deriveInvoiceSnapshot(started, [{ totalPriceCents: 100 }], 0)).toThrow(InvalidTransitionError)
  })

  it('does not bill cancelled tickets', () => {
    const cancelled = makeTicket({ status: 'cancelled', closedAt: T0 })
    expect(() => deriveInvoiceSnapshot(cancelled, [], 0)).toThrow('Cannot invoice a ticket that is cancelled')
  })

  it('sums only active line items', () => {
    const snapshot = deriveInvoiceSnapshot(
      completed,
      [{ totalPriceCents: 15000 }, { totalPriceCents: 4000, deletedAt: T0 }],
      0,
    )
    expect(snapshot.subtotalCents).toBe(15000)
    expect(snapshot.totalAmountCents).toBe(15000)
  })

  it('rejects a tax rate above 100%', () => {
    expect(() => computeInvoiceTotals(100, 10_001)).toThrow(ValidationError)
  })
})

describe('planInvoiceDerivation', () => {
  const completed = makeTicket({ status: 'completed', clockInAt: T0, closedAt: T0 })
  const snapshot = deriveInvoiceSnapshot(completed, [{ totalPriceCents: 15000 }], 825)

  it('creates when the ticket has no invoice', () => {
    expect(planInvoiceDerivation(undefined, snapshot)).toEqual({ kind: 'create' })
  })

  it('returns the same invoice when nothing changed', () => {
    const existing = makeInvoice(snapshot)
    const again = deriveInvoiceSnapshot(completed, [{ totalPriceCents: 15000 }], 825)
    const plan = planInvoiceDerivation(existing, again)
    expect(plan).toEqual({ kind: 'unchanged', invoice: existing })
    if (plan.kind === 'unchanged') {
      expect(plan.invoice.subtotalCents).toBe(again.subtotalCents)
      expect(plan.invoice.totalAmountCents).toBe(again.totalAmountCents)
    }
  })

  it('refreshes a draft whose line items changed', () => {
    const existing = makeInvoice(snapshot)
    const corrected = deriveInvoiceSnapshot(completed, [{ totalPriceCents: 12000 }], 825)
    expect(planInvoiceDerivation(existing, corrected)).toEqual({ kind: 'refresh', invoice: existing })
  })

  it('returns a sent invoice unchanged when nothing changed', () => {
    const sent = makeInvoice(snapshot, { status: 'sent' })
    expect(planInvoiceDerivation(sent, snapshot).kind).toBe('unchanged')
  })

  it.each(['sent', 'partial', 'paid'] as const)('refuses to overwrite a %s invoice', (status) => {
    const dispatched = makeInvoice(snapshot, { status })
    const corrected = deriveInvoiceSnapshot(completed, [{ totalPriceCents: 12000 }], 825)
    expect(() => planInvoiceDerivation(dispatched, corrected)).toThrow(ConflictError)
  })

  it('creates a new invoice once the previous one was voided', () => {
    const voided = makeInvoice(snapshot, { status: 'void', voidedAt: T0 })
    expect(planInvoiceDerivation(voided, snapshot)).toEqual({ kind: 'create' })
  })
})

// ---------------------------------------------------------------------------
// 7. Invoice lifecycle
// ---------------------------------------------------------------------------
describe('invoice lifecycle', () => {
  const snapshot: InvoiceSnapshot = {
    ticketId: toTicketId('tk-1'),
    customerId: toCustomerId('c-1'),
    subtotalCents: 15000,
    taxRateBps: 825,
    taxAmountCents: 1238,
    totalAmountCents: 16238,
  }
  const now = new Date('2025-03-10T12:00:00.000Z')

  it('sends a draft with a due date', () => {
    expect(sendInvoice(makeInvoice(snapshot), now, 30)).toEqual({
      status: 'sent',
      issuedAt: now,
      sentAt: now,
      dueAt: new Date('2025-04-09T12:00:00.000Z'),
    })
  })

  it('keeps the first issue and due dates on resend', () => {
    const issuedAt = new Date('2025-03-04T08:00:00.000Z')
    const dueAt = new Date('2025-04-03T08:00:00.000Z')
    const sent = makeInvoice(snapshot, { status: 'sent', issuedAt, sentAt: issuedAt, dueAt })
    expect(sendInvoice(sent, now, 30)).toEqual({ status: 'sent', issuedAt, sentAt: now, dueAt })
  })

  it('moves to partial, then paid', () => {
    const sent = makeInvoice(snapshot, { status: 'sent' })
    expect(applyPayment(sent, 10000, now)).toEqual({ status: 'partial', amountPaidCents: 10000 })

    const partial = makeInvoice(snapshot, { status: 'partial', amountPaidCents: 10000 })
    expect(applyPayment(partial, 6238, now)).toEqual({ status: 'paid', amountPaidCents: 16238, paidAt: now })
  })

  it('refuses payments on a draft', () => {
    expect(() => applyPayment(makeInvoice(snapshot), 100, now)).toThrow(InvalidTransitionError)
  })

  it.each([0, -5, 10.5])('refuses a payment of %d cents', (amount) => {
    expect(() => applyPayment(makeInvoice(snapshot, { status: 'sent' }), amount, now)).toThrow(ValidationError)
  })

  it('voids anything but a paid invoice', () => {
    const partial = makeInvoice(snapshot, { status: 'partial', amountPaidCents: 500 })
    expect(voidInvoice(partial, now)).toEqual({ status: 'void', voidedAt: now })
    expect(() => voidInvoice(makeInvoice(snapshot, { status: 'paid' }), now)).toThrow(InvalidTransitionError)
    expect(() => voidInvoice(makeInvoice(snapshot, { status: 'void' }), now)).toThrow(InvalidTransitionError)
  })

  it('never reports a negative balance', () => {
    expect(balanceDue({ totalAmountCents: 16238, amountPaidCents: 10000 })).toBe(6238)
    expect(balanceDue({ totalAmountCents: 16238, amountPaidCents: 17000 })).toBe(0)
  })
})

describe('nextInvoiceNumber', () => {
  const at = new Date('2025-03-10T23:59:00.000Z')

  it('starts the day at 0001', () => {
    expect(nextInvoiceNumber(at, undefined)).toBe('INV-20250310-0001')
  })

  it('continues the day sequence', () => {
    expect(nextInvoiceNumber(at, 'INV-20250310-0007')).toBe('INV-20250310-0008')
  })

  it('ignores numbers from another day', () => {
    expect(nextInvoiceNumber(at, 'INV-20250309-0042')).toBe('INV-20250310-0001')
  })
})

// ---------------------------------------------------------------------------
// 8. Customers and leads
// ---------------------------------------------------------------------------
describe('customers', () => {
  it('requires some name', () => {
    expect(validateCustomerName({ firstName: ' ' })).toEqual(['one of firstName, lastName or businessName is required'])
    expect(validateCustomerName({ lastName: 'Okafor' })).toEqual([])
  })

  it('prefers the business name for display', () => {
    expect(customerDisplayName({ firstName: 'Ada', lastName: 'Okafor', businessName: 'Okafor Bakery' })).toBe(
      'Okafor Bakery',
    )
    expect(customerDisplayName({ firstName: 'Ada', lastName: 'Okafor' })).toBe('Ada Okafor')
  })

  it('lists the primary address first, then oldest first', () => {
    const base: Address = {
      id: toAddressId('a-1'),
      tenantId: TENANT,
      customerId: toCustomerId('c-1'),
      street: '1 Elm St',
      city: 'Salem',
      state: 'OR',
      zip: '97301',
      isPrimary: false,
      createdAt: new Date('2025-01-01T00:00:00.000Z'),
      updatedAt: T0,
    }
    const sorted = sortAddresses([
      base,
      { ...base, id: toAddressId('a-2'), isPrimary: true, createdAt: new Date('2025-02-01T00:00:00.000Z') },
      { ...base, id: toAddressId('a-3'), createdAt: new Date('2024-12-01T00:00:00.000Z') },
    ])
    expect(sorted.map((a) => a.id)).toEqual(['a-2', 'a-3', 'a-1'])
  })

  it('only accepts confidence on extracted attributes', () => {
    expect(() => assertAttributeInput({ key: 'dog_name', sourceType: 'manual', confidence: 0.5 })).toThrow(
      ValidationError,
    )
    expect(() => assertAttributeInput({ key: 'dog_name', sourceType: 'llm_extracted', confidence: 1.2 })).toThrow(
      'confidence must be between 0 and 1',
    )
    expect(() => assertAttributeInput({ key: 'dog_name', sourceType: 'llm_extracted', confidence: 0.9 })).not.toThrow()
  })
})

describe('leads', () => {
  const lead: Lead = {
    id: toLeadId('lead-1'),
    tenantId: TENANT,
    status: 'new',
    rawNotes: 'Called about gutters, has a two-storey house',
    createdAt: T0,
    updatedAt: T0,
  }

  it('converts through the convert operation only', () => {
    expect(() => assertLeadStatusChange(lead, 'converted')).toThrow(InvalidTransitionError)
    expect(convertLeadPatch(lead, toCustomerId('c-9'), T0)).toEqual({
      status: 'converted',
      convertedCustomerId: 'c-9',
      convertedAt: T0,
    })
  })

  it('does not go backwards', () => {
    expect(() => assertLeadStatusChange({ ...lead, status: 'qualified' }, 'contacted')).toThrow(
      'Cannot move lead from qualified to contacted',
    )
  })

  it('treats archived as terminal', () => {
    expect(() => convertLeadPatch({ ...lead, status: 'archived' }, toCustomerId('c-9'), T0)).toThrow(
      'Cannot convert a lead that is archived',
    )
  })

  it('splits the captured name', () => {
    expect(splitLeadName('  Jane  Q Doe ')).toEqual({ firstName: 'Jane', lastName: 'Q Doe' })
    expect(splitLeadName('Jane')).toEqual({ firstName: 'Jane' })
    expect(splitLeadName(undefined)).toEqual({})
  })
})

// ---------------------------------------------------------------------------
// 9. Audit diffs
// ---------------------------------------------------------------------------
describe('computeChanges', () => {
  it('reports changed fields and ignores updatedAt', () => {
    const before = { status: 'draft', total: 100, sentAt: new Date(0), updatedAt: new Date(1) }
    const after = { status: 'sent', total: 100, sentAt: new Date(0), updatedAt: new Date(2), note: 'x' }
    expect(computeChanges(before, after)).toEqual({
      status: { old: 'draft', new: 'sent' },
      note: { old: null, new: 'x' },
    })
  })
})
