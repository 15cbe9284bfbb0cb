import { describe, it, expect, vi, beforeEach } from 'vitest'
import { NotFoundError, ValidationError, toAddressId, toCustomerId, toRecurringTemplateId } from '@crewbook/domain'

vi.mock('../../lib/tenant-db', () => ({
  inTenantTransaction: vi.fn(async (tdb: unknown, fn: (tx: unknown) => Promise<unknown>) => fn(tdb)),
}))

vi.mock('../../repositories', () => ({
  clearPrimaryAddresses: vi.fn(),
  deactivateTemplatesForCustomer: vi.fn(),
  deleteAddress: vi.fn(),
  findAddressById: vi.fn(),
  findCustomerById: vi.fn(),
  findTicketById: vi.fn(),
  insertAddress: vi.fn(),
  insertCustomer: vi.fn(),
  insertNote: vi.fn(),
  softDeleteCustomer: vi.fn(),
  updateAddress: vi.fn(),
  updateCustomer: vi.fn(),
  upsertAttribute: vi.fn(),
  upsertWaitlistEntry: vi.fn(),
}))

import * as repo from '../../repositories'
import {
  addAddress,
  addNote,
  createCustomer,
  deleteCustomer,
  setAttribute,
  updateAddress,
  updateCustomer,
} from '../customer.service'
import { CUSTOMER, NOW, address, customer, fakeRuntime, fakeTenantDb, ticket } from './fixtures'

const NEW_ADDRESS = {
  street: '48 Birch Court',
  city: 'Portland',
  state: 'OR',
  zip: '97202',
}

beforeEach(() => {
  vi.clearAllMocks()
  vi.mocked(repo.findCustomerById).mockResolvedValue(customer())
})

describe('createCustomer', () => {
  it('requires at least one name field', async () => {
    const { rt } = fakeRuntime()

    await expect(createCustomer(fakeTenantDb(), { firstName: ' ', email: 'a@example.com' }, rt)).rejects.toThrow(
      'one of firstName, lastName or businessName is required',
    )
    expect(repo.insertCustomer).not.toHaveBeenCalled()
  })

  it('accepts a business-only customer', async () => {
    const { rt, record } = fakeRuntime()
    vi.mocked(repo.insertCustomer).mockResolvedValue(
      customer({ firstName: undefined, lastName: undefined, businessName: 'Hillside Dental' }),
    )

    const created = await createCustomer(fakeTenantDb(), { businessName: 'Hillside Dental' }, rt)

    expect(created.businessName).toBe('Hillside Dental')
    expect(record.mock.calls[0]?.[1]).toMatchObject([{ entityType: 'customer', action: 'create' }])
  })

  it('rejects a referral to an unknown customer', async () => {
    const { rt } = fakeRuntime()
    vi.mocked(repo.findCustomerById).mockResolvedValue(null)

    await expect(
      createCustomer(fakeTenantDb(), { firstName: 'Sam', referredById: toCustomerId('customer-404') }, rt),
    ).rejects.toBeInstanceOf(NotFoundError)
    expect(repo.insertCustomer).not.toHaveBeenCalled()
  })
})

describe('updateCustomer', () => {
  it('rejects clearing every name field', async () => {
    const { rt } = fakeRuntime()

    await expect(
      updateCustomer(fakeTenantDb(), 'customer-1', { firstName: null, lastName: null }, rt),
    ).rejects.toBeInstanceOf(ValidationError)
    expect(repo.updateCustomer).not.toHaveBeenCalled()
  })

  it('keeps the stored name when the patch leaves it out', async () => {
    const { rt, record } = fakeRuntime()
    vi.mocked(repo.updateCustomer).mockResolvedValue(customer({ lastName: undefined }))

    await updateCustomer(fakeTenantDb(), 'customer-1', { lastName: null }, rt)

    expect(repo.updateCustomer).toHaveBeenCalledWith(fakeTenantDb(), 'customer-1', { lastName: null })
    expect(record.mock.calls[0]?.[1]?.[0]?.changes).toEqual({ lastName: { old: 'Reyes', new: null } })
  })

  it('refuses a self-referral', async () => {
    const { rt } = fakeRuntime()

    await expect(updateCustomer(fakeTenantDb(), 'customer-1', { referredById: CUSTOMER }, rt)).rejects.toThrow(
      'a customer cannot refer themselves',
    )
  })
})

describe('deleteCustomer', () => {
  it('tombstones the customer and audits the deletion time', async () => {
    const { rt, record } = fakeRuntime()
    vi.mocked(repo.softDeleteCustomer).mockResolvedValue(true)
    vi.mocked(repo.deactivateTemplatesForCustomer).mockResolvedValue([])

    await deleteCustomer(fakeTenantDb(), 'customer-1', rt)

    expect(repo.softDeleteCustomer).toHaveBeenCalledWith(fakeTenantDb(), 'customer-1', NOW)
    expect(record.mock.calls[0]?.[1]).toEqual([
      {
        tenantId: 'tenant-1',
        entityType: 'customer',
        entityId: 'customer-1',
        action: 'delete',
        changes: { deletedAt: { old: null, new: '2026-03-02T18:00:00.000Z' } },
      },
    ])
  })

  it('stops the customer\'s recurring templates', async () => {
    const { rt, record } = fakeRuntime()
    vi.mocked(repo.softDeleteCustomer).mockResolvedValue(true)
    vi.mocked(repo.deactivateTemplatesForCustomer).mockResolvedValue([toRecurringTemplateId('template-1')])

    await deleteCustomer(fakeTenantDb(), 'customer-1', rt)

    expect(repo.deactivateTemplatesForCustomer).toHaveBeenCalledWith(fakeTenantDb(), 'customer-1')
    expect(record.mock.calls[0]?.[1]?.[1]).toEqual({
      tenantId: 'tenant-1',
      entityType: 'recurring_template',
      entityId: 'template-1',
      action: 'update',
      changes: { isActive: { old: true, new: false } },
    })
  })

  it('leaves the templates alone when the customer is already gone', async () => {
    const { rt } = fakeRuntime()
    vi.mocked(repo.findCustomerById).mockResolvedValue(null)

    await expect(deleteCustomer(fakeTenantDb(), 'customer-1', rt)).rejects.toBeInstanceOf(NotFoundError)
    expect(repo.deactivateTemplatesForCustomer).not.toHaveBeenCalled()
  })
})

describe('addresses', () => {
  it('clears the other primaries before inserting a new primary address', async () => {
    const { rt } = fakeRuntime()
    vi.mocked(repo.insertAddress).mockResolvedValue(address({ id: toAddressId('address-2'), ...NEW_ADDRESS }))

    await addAddress(fakeTenantDb(), 'customer-1', { ...NEW_ADDRESS, isPrimary: true }, rt)

    expect(repo.clearPrimaryAddresses).toHaveBeenCalledWith(fakeTenantDb(), 'customer-1')
    const [cleared] = vi.mocked(repo.clearPrimaryAddresses).mock.invocationCallOrder
    const [inserted] = vi.mocked(repo.insertAddress).mock.invocationCallOrder
    expect(cleared).toBeLessThan(inserted ?? 0)
  })

  it('leaves existing primaries alone for a secondary address', async () => {
    const { rt } = fakeRuntime()
    vi.mocked(repo.insertAddress).mockResolvedValue(address({ isPrimary: false }))

    await addAddress(fakeTenantDb(), 'customer-1', NEW_ADDRESS, rt)

    expect(repo.clearPrimaryAddresses).not.toHaveBeenCalled()
  })

  it('lists every missing address field', async () => {
    const { rt } = fakeRuntime()

    await expect(
      addAddress(fakeTenantDb(), 'customer-1', { street: '', city: 'Portland', state: '', zip: '97201' }, rt),
    ).rejects.toThrow('street is required; state is required')
  })

  it('keeps the updated address primary while clearing the rest', async () => {
    const { rt } = fakeRuntime()
    vi.mocked(repo.findAddressById).mockResolvedValue(address({ isPrimary: false }))
    vi.mocked(repo.updateAddress).mockResolvedValue(address())

    await updateAddress(fakeTenantDb(), 'customer-1', 'address-1', { isPrimary: true }, rt)

    expect(repo.clearPrimaryAddresses).toHaveBeenCalledWith(fakeTenantDb(), 'customer-1', 'address-1')
  })

  it('treats an address of another customer as missing', async () => {
    const { rt } = fakeRuntime()
    vi.mocked(repo.findAddressById).mockResolvedValue(address({ customerId: toCustomerId('customer-2') }))

    await expect(updateAddress(fakeTenantDb(), 'customer-1', 'address-1', { city: 'Salem' }, rt)).rejects.toThrow(
      'Address not found',
    )
  })
})

describe('knowledge', () => {
  it('trims attribute keys before storing them', async () => {
    await setAttribute(fakeTenantDb(), 'customer-1', { key: '  gate code ', value: '4512', sourceType: 'manual' })

    expect(repo.upsertAttribute).toHaveBeenCalledWith(fakeTenantDb(), 'customer-1', {
      key: 'gate code',
      value: '4512',
      sourceType: 'manual',
    })
  })

  it('only records confidence for extracted attributes', async () => {
    await expect(
      setAttribute(fakeTenantDb(), 'customer-1', { key: 'pets', value: ['dog'], sourceType: 'manual', confidence: 0.9 }),
    ).rejects.toThrow('confidence is only recorded for llm_extracted attributes')
  })

  it('rejects a note linked to another customer\'s ticket', async () => {
    vi.mocked(repo.findTicketById).mockResolvedValue(ticket({ customerId: toCustomerId('customer-2') }))

    await expect(
      addNote(fakeTenantDb(), 'customer-1', { content: 'Left key under mat', ticketId: 'ticket-1' }),
    ).rejects.toThrow('Ticket not found')
    expect(repo.insertNote).not.toHaveBeenCalled()
  })
})
