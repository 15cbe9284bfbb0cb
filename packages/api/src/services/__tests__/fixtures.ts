// ---------------------------------------------------------------------------
// Shared builders for the service tests
// ---------------------------------------------------------------------------

import { vi } from 'vitest'
import {
  toAddressId,
  toCustomerId,
  toInvoiceId,
  toLineItemId,
  toServiceId,
  toTenantId,
  toTicketId,
  type Address,
  type AuditEntry,
  type Customer,
  type DomainEvent,
  type Invoice,
  type LineItem,
  type Service,
  type Ticket,
} from '@crewbook/domain'
import type { TenantDb } from '../../lib/tenant-db'
import type { Runtime } from '../../runtime'

export const TENANT = toTenantId('tenant-1')
export const CUSTOMER = toCustomerId('customer-1')
export const ADDRESS = toAddressId('address-1')
export const NOW = new Date('2026-03-02T18:00:00.000Z')
const CREATED = new Date('2026-02-20T09:00:00.000Z')

/** Repositories are mocked in every service test, so the handle is never queried. */
export function fakeTenantDb(): TenantDb {
  return { tenantId: TENANT, db: {} as never }
}

export function fakeRuntime(overrides: Partial<Runtime['settings']> = {}) {
  const publish = vi.fn(async (_events: readonly DomainEvent[]): Promise<void> => undefined)
  const record = vi.fn(async (_tdb: TenantDb, _entries: readonly AuditEntry[]): Promise<void> => undefined)
  const rt: Runtime = {
    now: () => NOW,
    events: { publish },
    audit: { record },
    settings: { DEFAULT_TAX_RATE_BPS: 825, INVOICE_DUE_DAYS: 30, RECURRENCE_MAX_RETRIES: 3, ...overrides },
  }
  return { rt, publish, record }
}

export function customer(overrides: Partial<Customer> = {}): Customer {
  return {
    id: CUSTOMER,
    tenantId: TENANT,
    firstName: 'Dana',
    lastName: 'Reyes',
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function address(overrides: Partial<Address> = {}): Address {
  return {
    id: ADDRESS,
    tenantId: TENANT,
    customerId: CUSTOMER,
    street: '12 Alder Lane',
    city: 'Portland',
    state: 'OR',
    zip: '97201',
    isPrimary: true,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function ticket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    id: toTicketId('ticket-1'),
    tenantId: TENANT,
    customerId: CUSTOMER,
    addressId: ADDRESS,
    status: 'scheduled',
    confirmationStatus: 'pending',
    scheduledAt: new Date('2026-03-02T15:00:00.000Z'),
    isPriceEstimated: false,
    version: 3,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function lineItem(id: string, totalPriceCents: number, overrides: Partial<LineItem> = {}): LineItem {
  return {
    id: toLineItemId(id),
    tenantId: TENANT,
    ticketId: toTicketId('ticket-1'),
    serviceId: toServiceId('service-1'),
    quantity: 1,
    unitPriceCents: totalPriceCents,
    totalPriceCents,
    isPriceOverridden: false,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function service(overrides: Partial<Service> = {}): Service {
  return {
    id: toServiceId('service-1'),
    tenantId: TENANT,
    name: 'Standard clean',
    pricing: { type: 'fixed', defaultPriceCents: 12000 },
    isActive: true,
    displayOrder: 0,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function invoice(overrides: Partial<Invoice> = {}): Invoice {
  return {
    id: toInvoiceId('invoice-1'),
    tenantId: TENANT,
    ticketId: toTicketId('ticket-1'),
    customerId: CUSTOMER,
    invoiceNumber: 'INV-20260302-0001',
    status: 'draft',
    subtotalCents: 15000,
    taxRateBps: 825,
    taxAmountCents: 1238,
    totalAmountCents: 16238,
    amountPaidCents: 0,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}
