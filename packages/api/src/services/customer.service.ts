// ---------------------------------------------------------------------------
// Customer service
//
// Customers, their addresses and the knowledge attached to them. Reads go
// straight to the repositories; writes that carry a business rule live here.
// ---------------------------------------------------------------------------

import {
  NotFoundError,
  ValidationError,
  assertAttributeInput,
  computeChanges,
  creationChanges,
  validateAddress,
  validateCustomerName,
  type Address,
  type Attribute,
  type AuditEntry,
  type Customer,
  type Note,
  type WaitlistEntry,
} from '@crewbook/domain'
import { inTenantTransaction, type TenantDb } from '../lib/tenant-db'
import {
  clearPrimaryAddresses,
  deactivateTemplatesForCustomer,
  deleteAddress,
  findAddressById,
  findCustomerById,
  findTicketById,
  insertAddress,
  insertCustomer,
  insertNote,
  softDeleteCustomer,
  updateAddress as updateAddressRow,
  updateCustomer as updateCustomerRow,
  upsertAttribute,
  upsertWaitlistEntry,
  type AddressInput,
  type AttributeInput,
  type CustomerInput,
  type WaitlistInput,
} from '../repositories'
import { flushEffects, getRuntime, type Runtime } from '../runtime'

function audit(
  entity: { tenantId: Customer['tenantId']; id: string },
  entityType: 'customer' | 'address',
  action: AuditEntry['action'],
  changes: AuditEntry['changes'],
): AuditEntry {
  return { tenantId: entity.tenantId, entityType, entityId: entity.id, action, changes }
}

function assertValid(problems: readonly string[]): void {
  if (problems.length > 0) throw new ValidationError(problems.join('; '))
}

async function requireCustomer(tdb: TenantDb, customerId: string): Promise<Customer> {
  const customer = await findCustomerById(tdb, customerId)
  if (!customer) throw new NotFoundError('Customer', customerId)
  return customer
}

// ---------------------------------------------------------------------------
// Customers
// ---------------------------------------------------------------------------

/**
 * @throws {ValidationError} when no name field is set.
 * @throws {NotFoundError} when `referredById` does not resolve within the tenant.
 */
export async function createCustomer(
  tdb: TenantDb,
  input: CustomerInput,
  rt: Runtime = getRuntime(),
): Promise<Customer> {
  assertValid(
    validateCustomerName({
      firstName: input.firstName ?? undefined,
      lastName: input.lastName ?? undefined,
      businessName: input.businessName ?? undefined,
    }),
  )
  const customer = await inTenantTransaction(tdb, async (tx) => {
    if (input.referredById != null) await requireCustomer(tx, input.referredById)
    return insertCustomer(tx, input)
  })
  await flushEffects(rt, tdb, { audit: [audit(customer, 'customer', 'create', creationChanges(customer))], events: [] })
  return customer
}

export async function updateCustomer(
  tdb: TenantDb,
  customerId: string,
  patch: CustomerInput,
  rt: Runtime = getRuntime(),
): Promise<Customer> {
  const { before, after } = await inTenantTransaction(tdb, async (tx) => {
    const current = await requireCustomer(tx, customerId)
    const pick = <K extends 'firstName' | 'lastName' | 'businessName'>(key: K) =>
      patch[key] === undefined ? current[key] : (patch[key] ?? undefined)
    assertValid(
      validateCustomerName({ firstName: pick('firstName'), lastName: pick('lastName'), businessName: pick('businessName') }),
    )
    if (patch.referredById != null) {
      if (patch.referredById === current.id) throw new ValidationError('a customer cannot refer themselves')
      await requireCustomer(tx, patch.referredById)
    }
    const next = await updateCustomerRow(tx, current.id, patch)
    if (!next) throw new NotFoundError('Customer', customerId)
    return { before: current, after: next }
  })
  await flushEffects(rt, tdb, {
    audit: [audit(after, 'customer', 'update', computeChanges(before, after))],
    events: [],
  })
  return after
}

/**
 * Tombstones the customer and stops its recurring templates in the same
 * transaction; tickets and invoices keep resolving it.
 */
export async function deleteCustomer(tdb: TenantDb, customerId: string, rt: Runtime = getRuntime()): Promise<void> {
  const at = rt.now()
  const { customer, stopped } = await inTenantTransaction(tdb, async (tx) => {
    const current = await requireCustomer(tx, customerId)
    if (!(await softDeleteCustomer(tx, current.id, at))) throw new NotFoundError('Customer', customerId)
    return { customer: current, stopped: await deactivateTemplatesForCustomer(tx, current.id) }
  })
  await flushEffects(rt, tdb, {
    audit: [
      audit(customer, 'customer', 'delete', { deletedAt: { old: null, new: at.toISOString() } }),
      ...stopped.map(
        (templateId): AuditEntry => ({
          tenantId: customer.tenantId,
          entityType: 'recurring_template',
          entityId: templateId,
          action: 'update',
          changes: { isActive: { old: true, new: false } },
        }),
      ),
    ],
    events: [],
  })
}

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

/** A new primary address takes the flag from the customer's other addresses. */
export async function addAddress(
  tdb: TenantDb,
  customerId: string,
  input: AddressInput,
  rt: Runtime = getRuntime(),
): Promise<Address> {
  assertValid(validateAddress(input))
  const address = await inTenantTransaction(tdb, async (tx) => {
    const customer = await requireCustomer(tx, customerId)
    if (input.isPrimary === true) await clearPrimaryAddresses(tx, customer.id)
    return insertAddress(tx, customer.id, input)
  })
  await flushEffects(rt, tdb, { audit: [audit(address, 'address', 'create', creationChanges(address))], events: [] })
  return address
}

async function requireAddress(tdb: TenantDb, customerId: string, addressId: string): Promise<Address> {
  const address = await findAddressById(tdb, addressId)
  if (!address || address.customerId !== customerId) throw new NotFoundError('Address', addressId)
  return address
}

export async function updateAddress(
  tdb: TenantDb,
  customerId: string,
  addressId: string,
  patch: Partial<AddressInput>,
  rt: Runtime = getRuntime(),
): Promise<Address> {
  const { before, after } = await inTenantTransaction(tdb, async (tx) => {
    const current = await requireAddress(tx, customerId, addressId)
    assertValid(
      validateAddress({
        street: patch.street ?? current.street,
        city: patch.city ?? current.city,
        state: patch.state ?? current.state,
        zip: patch.zip ?? current.zip,
      }),
    )
    if (patch.isPrimary === true) await clearPrimaryAddresses(tx, current.customerId, current.id)
    const next = await updateAddressRow(tx, current.id, patch)
    if (!next) throw new NotFoundError('Address', addressId)
    return { before: current, after: next }
  })
  await flushEffects(rt, tdb, { audit: [audit(after, 'address', 'update', computeChanges(before, after))], events: [] })
  return after
}

/** Hard delete. Tickets that still point at the address make it a conflict. */
export async function removeAddress(
  tdb: TenantDb,
  customerId: string,
  addressId: string,
  rt: Runtime = getRuntime(),
): Promise<void> {
  const address = await inTenantTransaction(tdb, async (tx) => {
    const current = await requireAddress(tx, customerId, addressId)
    if (!(await deleteAddress(tx, current.id))) throw new NotFoundError('Address', addressId)
    return current
  })
  await flushEffects(rt, tdb, { audit: [audit(address, 'address', 'delete', {})], events: [] })
}

// ---------------------------------------------------------------------------
// Attributes, notes, waitlist
// ---------------------------------------------------------------------------

export async function setAttribute(tdb: TenantDb, customerId: string, input: AttributeInput): Promise<Attribute> {
  assertAttributeInput(input)
  return inTenantTransaction(tdb, async (tx) => {
    const customer = await requireCustomer(tx, customerId)
    return upsertAttribute(tx, customer.id, { ...input, key: input.key.trim() })
  })
}

export async function addNote(
  tdb: TenantDb,
  customerId: string,
  input: { content: string; ticketId?: string },
): Promise<Note> {
  if (input.content.trim() === '') throw new ValidationError('content is required')
  return inTenantTransaction(tdb, async (tx) => {
    const customer = await requireCustomer(tx, customerId)
    if (input.ticketId !== undefined) {
      const ticket = await findTicketById(tx, input.ticketId)
      if (!ticket || ticket.customerId !== customer.id) throw new NotFoundError('Ticket', input.ticketId)
    }
    return insertNote(tx, customer.id, input)
  })
}

/** Adds the customer to the waitlist, or updates the entry they already have. */
export async function putOnWaitlist(tdb: TenantDb, customerId: string, input: WaitlistInput): Promise<WaitlistEntry> {
  return inTenantTransaction(tdb, async (tx) => {
    const customer = await requireCustomer(tx, customerId)
    if (input.nearCustomerId != null) await requireCustomer(tx, input.nearCustomerId)
    if (input.nearAddressId != null) {
      const near = await findAddressById(tx, input.nearAddressId)
      if (!near) throw new NotFoundError('Address', input.nearAddressId)
    }
    return upsertWaitlistEntry(tx, customer.id, input)
  })
}
