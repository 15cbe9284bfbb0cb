/**
 * Handler-layer tests for the Hono app.
 *
 * Services and repositories are automocked, so no database is required.
 * These tests verify routing, request validation, response shapes and the
 * mapping of domain and driver errors to HTTP statuses.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Context, Next } from 'hono'
import { SignJWT } from 'jose'
import { DatabaseError } from 'pg'
import {
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  toLeadId,
} from '@crewbook/domain'
import type { AppEnv } from './types'

// Bypass tenant resolution: every request runs as tenant-1.
vi.mock('./middleware/tenant', async () => {
  const { toTenantId } = await import('@crewbook/domain')
  return {
    tenantMiddleware: async (c: Context<AppEnv>, next: Next) => {
      const tenantId = toTenantId('tenant-1')
      c.set('tenantId', tenantId)
      c.set('db', { tenantId, db: {} as never })
      await next()
    },
  }
})

vi.mock('./config', () => ({
  getConfig: () => ({ AUTH_JWT_SECRET: 'test-secret-test-secret' }),
}))

vi.mock('./repositories')
vi.mock('./services/customer.service')
vi.mock('./services/ticket.service')
vi.mock('./services/invoice.service')
vi.mock('./services/lead.service')

import { app } from './app'
import * as repos from './repositories'
import * as tickets from './services/ticket.service'
import * as invoices from './services/invoice.service'
import * as leads from './services/lead.service'
import { TENANT, customer, fakeTenantDb, invoice, lineItem, ticket } from './services/__tests__/fixtures'

type Body = { data?: unknown; meta?: Record<string, unknown>; error?: string; code?: string }

async function bodyOf(res: Response): Promise<Body> {
  return (await res.json()) as Body
}

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  })
}

const CUSTOMER_ID = '0b6f3c1e-8a52-4d1e-9c3a-2f7d5b8e4a10'
const ADDRESS_ID = '5d2a7e90-1c4b-4f86-a3d1-6e8b0c2f9a47'

beforeEach(() => {
  vi.clearAllMocks()
})

// ---------------------------------------------------------------------------
// Public routes
// ---------------------------------------------------------------------------

describe('GET /health', () => {
  it('returns 200 without a tenant', async () => {
    const res = await app.request('/health')
    expect(res.status).toBe(200)
    const body = (await res.json()) as { status?: string }
    expect(body.status).toBe('ok')
  })
})

describe('Unknown routes', () => {
  it('returns 404 for an unrecognised path', async () => {
    const res = await app.request('/not-a-real-route')
    expect(res.status).toBe(404)
    expect((await bodyOf(res)).code).toBe('NOT_FOUND')
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('POST /tickets', () => {
  it('returns 201 with the created ticket', async () => {
    vi.mocked(tickets.createTicket).mockResolvedValue({ ticket: ticket(), lineItems: [], invoice: null })

    const res = await post('/api/v1/tickets', {
      customerId: CUSTOMER_ID,
      addressId: ADDRESS_ID,
      scheduledAt: '2026-03-10T15:00:00Z',
    })

    expect(res.status).toBe(201)
    expect(tickets.createTicket).toHaveBeenCalledWith(fakeTenantDb(), {
      customerId: CUSTOMER_ID,
      addressId: ADDRESS_ID,
      scheduledAt: new Date('2026-03-10T15:00:00.000Z'),
    })
    expect((await bodyOf(res)).data).toMatchObject({ ticket: { id: 'ticket-1', status: 'scheduled' }, invoice: null })
  })

  it('returns 400 when scheduledAt is missing', async () => {
    const res = await post('/api/v1/tickets', { customerId: CUSTOMER_ID, addressId: ADDRESS_ID })

    expect(res.status).toBe(400)
    expect((await bodyOf(res)).code).toBe('VALIDATION_ERROR')
    expect(tickets.createTicket).not.toHaveBeenCalled()
  })

  it('returns 400 for a timestamp without an offset', async () => {
    const res = await post('/api/v1/tickets', {
      customerId: CUSTOMER_ID,
      addressId: ADDRESS_ID,
      scheduledAt: '2026-03-10 15:00',
    })

    expect(res.status).toBe(400)
  })
})

describe('GET /invoices', () => {
  it('rejects an unknown status filter', async () => {
    const res = await app.request('/api/v1/invoices?status=overdue')
    expect(res.status).toBe(400)
    expect(repos.listInvoices).not.toHaveBeenCalled()
  })

  it('totals what is outstanding on unpaid invoices', async () => {
    vi.mocked(repos.listUnpaidInvoices).mockResolvedValue([
      invoice({ status: 'sent' }),
      invoice({ status: 'partial', amountPaidCents: 6238 }),
    ])

    const res = await app.request('/api/v1/invoices/unpaid')

    expect(res.status).toBe(200)
    expect((await bodyOf(res)).meta).toEqual({ count: 2, outstandingCents: 26238 })
  })
})

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

describe('error mapping', () => {
  it('maps NotFoundError to 404', async () => {
    vi.mocked(tickets.getTicketDetail).mockRejectedValue(new NotFoundError('Ticket', 'ticket-9'))

    const res = await app.request('/api/v1/tickets/ticket-9')

    expect(res.status).toBe(404)
    expect(await bodyOf(res)).toEqual({ error: 'Ticket not found', code: 'NOT_FOUND' })
  })

  it('maps an illegal transition to 409', async () => {
    vi.mocked(tickets.startTicket).mockRejectedValue(
      new InvalidTransitionError('Cannot move ticket from completed to in_progress'),
    )

    const res = await post('/api/v1/tickets/ticket-1/start', {})

    expect(res.status).toBe(409)
    expect(await bodyOf(res)).toEqual({
      error: 'Cannot move ticket from completed to in_progress',
      code: 'INVALID_TRANSITION',
    })
  })

  it('maps ConflictError to 409', async () => {
    vi.mocked(invoices.sendInvoice).mockRejectedValue(new ConflictError('Invoice was modified concurrently'))

    const res = await app.request('/api/v1/invoices/invoice-1/send', { method: 'POST' })

    expect(res.status).toBe(409)
    expect((await bodyOf(res)).code).toBe('CONFLICT')
  })

  it('maps ValidationError from a service to 400', async () => {
    vi.mocked(invoices.recordPayment).mockRejectedValue(new ValidationError('Payment exceeds the balance due'))

    const res = await post('/api/v1/invoices/invoice-1/payments', { amountCents: 999999 })

    expect(res.status).toBe(400)
    expect(await bodyOf(res)).toEqual({ error: 'Payment exceeds the balance due', code: 'VALIDATION_ERROR' })
  })

  it('maps a unique violation from the driver to 409', async () => {
    const pgError = new DatabaseError('duplicate key value violates unique constraint', 0, 'error')
    pgError.code = '23505'
    pgError.constraint = 'uq_invoices_active_per_ticket'
    vi.mocked(invoices.voidInvoice).mockRejectedValue(pgError)

    const res = await app.request('/api/v1/invoices/invoice-1/void', { method: 'POST' })

    expect(res.status).toBe(409)
    expect(await bodyOf(res)).toEqual({
      error: 'Concurrent write rejected by uq_invoices_active_per_ticket',
      code: 'CONFLICT',
    })
  })

  it('answers 404 for a path id that is not a UUID', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    const pgError = new DatabaseError('invalid input syntax for type uuid: "abc"', 0, 'error')
    pgError.code = '22P02'
    vi.mocked(repos.findInvoiceById).mockRejectedValue(pgError)

    const res = await app.request('/api/v1/invoices/abc')

    expect(res.status).toBe(404)
    expect(await bodyOf(res)).toEqual({ error: 'Record not found', code: 'NOT_FOUND' })
    expect(errorSpy).not.toHaveBeenCalled()
    errorSpy.mockRestore()
  })

  it('maps an unreachable database to 503', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.mocked(repos.listLeads).mockRejectedValue(
      Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' }),
    )

    const res = await app.request('/api/v1/leads')

    expect(res.status).toBe(503)
    expect(await bodyOf(res)).toEqual({ error: 'Database unavailable: ECONNREFUSED', code: 'INFRASTRUCTURE_FAILURE' })
    errorSpy.mockRestore()
  })

  it('answers anything else with a bare 500', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.mocked(repos.listCustomers).mockRejectedValue(new Error('boom'))

    const res = await app.request('/api/v1/customers')

    expect(res.status).toBe(500)
    expect(await bodyOf(res)).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' })
    expect(errorSpy).toHaveBeenCalledTimes(1)
    errorSpy.mockRestore()
  })
})

// ---------------------------------------------------------------------------
// Routes with their own rules
// ---------------------------------------------------------------------------

describe('GET /customers', () => {
  it('serves the waitlist instead of treating it as an id', async () => {
    vi.mocked(repos.listActiveWaitlist).mockResolvedValue([])

    const res = await app.request('/api/v1/customers/waitlist')

    expect(res.status).toBe(200)
    expect(repos.findCustomerById).not.toHaveBeenCalled()
  })

  it('includes addresses on the customer detail', async () => {
    vi.mocked(repos.findCustomerById).mockResolvedValue(customer())
    vi.mocked(repos.listAddresses).mockResolvedValue([])

    const res = await app.request('/api/v1/customers/customer-1')

    expect(res.status).toBe(200)
    expect((await bodyOf(res)).data).toMatchObject({ id: 'customer-1', firstName: 'Dana', addresses: [] })
  })

  it('clamps the page size', async () => {
    vi.mocked(repos.listCustomers).mockResolvedValue([])

    const res = await app.request('/api/v1/customers?limit=500')

    expect(res.status).toBe(200)
    expect(repos.listCustomers).toHaveBeenCalledWith(fakeTenantDb(), { limit: 100, offset: 0 })
    expect((await bodyOf(res)).meta).toEqual({ count: 0, limit: 100, offset: 0 })
  })
})

describe('POST /tickets/:id/invoice', () => {
  it('returns 201 when a new invoice is created', async () => {
    vi.mocked(invoices.deriveInvoice).mockResolvedValue({ invoice: invoice(), outcome: 'created' })

    const res = await post('/api/v1/tickets/ticket-1/invoice', {})

    expect(res.status).toBe(201)
    expect((await bodyOf(res)).data).toMatchObject({ outcome: 'created' })
  })

  it('returns 200 when the draft was already current', async () => {
    vi.mocked(invoices.deriveInvoice).mockResolvedValue({ invoice: invoice(), outcome: 'unchanged' })

    const res = await post('/api/v1/tickets/ticket-1/invoice', { taxRateBps: 825 })

    expect(res.status).toBe(200)
    expect(invoices.deriveInvoice).toHaveBeenCalledWith(fakeTenantDb(), 'ticket-1', { taxRateBps: 825 })
  })
})

describe('PATCH /tickets/:id/line-items/:lineItemId', () => {
  function patch(path: string, body: unknown) {
    return app.request(path, {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })
  }

  it('returns 200 with the re-priced line', async () => {
    vi.mocked(tickets.updateLineItem).mockResolvedValue(lineItem('line-1', 36000, { quantity: 3, unitPriceCents: 12000 }))

    const res = await patch('/api/v1/tickets/ticket-1/line-items/line-1', { quantity: 3, priceOverrideCents: null })

    expect(res.status).toBe(200)
    expect((await bodyOf(res)).data).toMatchObject({ id: 'line-1', quantity: 3, totalPriceCents: 36000 })
    expect(tickets.updateLineItem).toHaveBeenCalledWith(fakeTenantDb(), 'ticket-1', 'line-1', {
      quantity: 3,
      priceOverrideCents: null,
    })
  })

  it('rejects an empty patch', async () => {
    const res = await patch('/api/v1/tickets/ticket-1/line-items/line-1', {})

    expect(res.status).toBe(400)
    expect((await bodyOf(res)).code).toBe('VALIDATION_ERROR')
    expect(tickets.updateLineItem).not.toHaveBeenCalled()
  })

  it('returns 409 for a line on a closed ticket', async () => {
    vi.mocked(tickets.updateLineItem).mockRejectedValue(new InvalidTransitionError('Ticket is closed'))

    const res = await patch('/api/v1/tickets/ticket-1/line-items/line-1', { quantity: 2 })

    expect(res.status).toBe(409)
    expect(await bodyOf(res)).toEqual({ error: 'Ticket is closed', code: 'INVALID_TRANSITION' })
  })
})

describe('POST /leads/:id/convert', () => {
  it('returns 201 with the lead and the new customer', async () => {
    vi.mocked(leads.convertLead).mockResolvedValue({
      lead: {
        id: toLeadId('lead-1'),
        tenantId: TENANT,
        status: 'converted',
        rawNotes: 'Wants weekly cleaning',
        createdAt: new Date('2026-02-27T16:00:00.000Z'),
        updatedAt: new Date('2026-03-02T18:00:00.000Z'),
      },
      customer: customer(),
    })

    const res = await post('/api/v1/leads/lead-1/convert', { phone: '555-0100' })

    expect(res.status).toBe(201)
    expect(leads.convertLead).toHaveBeenCalledWith(fakeTenantDb(), 'lead-1', { phone: '555-0100' })
  })
})

// ---------------------------------------------------------------------------
// Reopen requires a permission token
// ---------------------------------------------------------------------------

describe('POST /tickets/:id/reopen', () => {
  const secret = new TextEncoder().encode('test-secret-test-secret')

  function tokenFor(claims: Record<string, unknown>) {
    return new SignJWT(claims).setProtectedHeader({ alg: 'HS256' }).setSubject('user-7').setExpirationTime('5m').sign(secret)
  }

  it('returns 401 without a bearer token', async () => {
    const res = await app.request('/api/v1/tickets/ticket-1/reopen', { method: 'POST' })

    expect(res.status).toBe(401)
    expect((await bodyOf(res)).code).toBe('UNAUTHORIZED')
    expect(tickets.reopenTicket).not.toHaveBeenCalled()
  })

  it('returns 403 when the token lacks the permission', async () => {
    const token = await tokenFor({ tid: 'tenant-1', permissions: ['tickets:read'] })

    const res = await app.request('/api/v1/tickets/ticket-1/reopen', {
      method: 'POST',
      headers: { Authorization: `Bearer ${token}` },
    })

    expect(res.status).toBe(403)
    expect(tickets.reopenTicket).not.toHaveBeenCalled()
  })

  it('reopens with the token subject as the actor', async () => {
    vi.mocked(tickets.reopenTicket).mockResolvedValue(ticket({ status: 'in_progress' }))
    const token = await tokenFor({ tid: 'tenant-1', permissions: ['tickets:reopen'] })

    const res = await app.request('/api/v1/tickets/ticket-1/reopen', {
      method: 'POST',
      headers: { Authorization: `Bearer ${token}` },
    })

    expect(res.status).toBe(200)
    expect(tickets.reopenTicket).toHaveBeenCalledWith(fakeTenantDb(), 'ticket-1', 'user-7')
  })
})
