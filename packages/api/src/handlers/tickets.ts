// ---------------------------------------------------------------------------
// Ticket handler: booking, lifecycle transitions, line items, invoicing
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { listTickets } from '../repositories'
import { requirePermission } from '../middleware/auth'
import {
  addLineItems,
  cancelTicket,
  completeTicket,
  createTicket,
  deleteTicket,
  getTicketDetail,
  removeLineItem,
  reopenTicket,
  rescheduleTicket,
  setConfirmation,
  startTicket,
  updateLineItem,
  updateTicket,
} from '../services/ticket.service'
import { deriveInvoice } from '../services/invoice.service'
import { Cents, IsoDate, LineItemBody, pageOf } from './schemas'

const TaxRate = z.number().int().min(0).max(10_000)

const CreateTicketBody = z.object({
  customerId: z.string().uuid(),
  addressId: z.string().uuid(),
  scheduledAt: IsoDate,
  scheduledDurationMinutes: z.number().int().positive().optional(),
  isPriceEstimated: z.boolean().optional(),
  notes: z.string().optional(),
  lineItems: z.array(LineItemBody).optional(),
})

const UpdateTicketBody = z.object({
  addressId: z.string().uuid().optional(),
  scheduledDurationMinutes: z.number().int().positive().nullable().optional(),
  isPriceEstimated: z.boolean().optional(),
  notes: z.string().nullable().optional(),
})

const ListQuery = z.object({
  from: IsoDate.optional(),
  to: IsoDate.optional(),
  customerId: z.string().uuid().optional(),
  status: z.enum(['scheduled', 'in_progress', 'completed', 'cancelled']).optional(),
  limit: z.string().optional(),
  offset: z.string().optional(),
})

const RescheduleBody = z.object({ scheduledAt: IsoDate })
const ConfirmationBody = z.object({ status: z.enum(['pending', 'confirmed', 'declined', 'reschedule_requested']) })
const StartBody = z.object({ clockInAt: IsoDate.optional() })
const CompleteBody = z.object({
  clockOutAt: IsoDate.optional(),
  /** Present → derive the invoice in the same transaction as the close. */
  invoice: z.object({ taxRateBps: TaxRate.optional() }).optional(),
})
const LineItemsBody = z.object({ items: z.array(LineItemBody).min(1) })
const LineItemPatchBody = z
  .object({
    quantity: z.number().int().positive().optional(),
    priceOverrideCents: Cents.nullable().optional(),
    durationMinutes: z.number().int().positive().nullable().optional(),
    description: z.string().min(1).nullable().optional(),
  })
  .refine((patch) => Object.keys(patch).length > 0, { message: 'At least one field is required' })
const DeriveInvoiceBody = z.object({ taxRateBps: TaxRate.optional() })

export const ticketsHandler = new Hono<AppEnv>()

ticketsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateTicketBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await createTicket(c.get('db'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

/** `?from=&to=` for a calendar range, `?customerId=` for a customer's history. */
ticketsHandler.get(
  '/',
  validator('query', (value, c) => {
    const r = ListQuery.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const { limit: rawLimit, offset: rawOffset, ...filter } = c.req.valid('query')
    const { limit, offset } = pageOf({ limit: rawLimit, offset: rawOffset })
    const data = await listTickets(c.get('db'), { ...filter, limit, offset })
    return c.json({ data, meta: { count: data.length, limit, offset } })
  },
)

ticketsHandler.get('/:id', async (c) => {
  const data = await getTicketDetail(c.get('db'), c.req.param('id'))
  return c.json({ data })
})

ticketsHandler.patch(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateTicketBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await updateTicket(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

ticketsHandler.delete('/:id', async (c) => {
  await deleteTicket(c.get('db'), c.req.param('id'))
  return c.body(null, 204)
})

// ── Lifecycle ────────────────────────────────────────────────────────────

ticketsHandler.post(
  '/:id/reschedule',
  validator('json', (value, c) => {
    const r = RescheduleBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await rescheduleTicket(c.get('db'), c.req.param('id'), c.req.valid('json').scheduledAt)
    return c.json({ data })
  },
)

ticketsHandler.post(
  '/:id/confirmation',
  validator('json', (value, c) => {
    const r = ConfirmationBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await setConfirmation(c.get('db'), c.req.param('id'), c.req.valid('json').status)
    return c.json({ data })
  },
)

ticketsHandler.post(
  '/:id/start',
  validator('json', (value, c) => {
    const r = StartBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await startTicket(c.get('db'), c.req.param('id'), c.req.valid('json').clockInAt)
    return c.json({ data })
  },
)

ticketsHandler.post(
  '/:id/complete',
  validator('json', (value, c) => {
    const r = CompleteBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await completeTicket(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

ticketsHandler.post('/:id/cancel', async (c) => {
  const data = await cancelTicket(c.get('db'), c.req.param('id'))
  return c.json({ data })
})

// Reopening a completed ticket is the one transition outside the normal
// graph and needs an elevated token.
ticketsHandler.post('/:id/reopen', requirePermission('tickets:reopen'), async (c) => {
  const data = await reopenTicket(c.get('db'), c.req.param('id'), c.get('actorSub'))
  return c.json({ data })
})

// ── Line items ───────────────────────────────────────────────────────────

ticketsHandler.post(
  '/:id/line-items',
  validator('json', (value, c) => {
    const r = LineItemsBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await addLineItems(c.get('db'), c.req.param('id'), c.req.valid('json').items)
    return c.json({ data }, 201)
  },
)

ticketsHandler.patch(
  '/:id/line-items/:lineItemId',
  validator('json', (value, c) => {
    const r = LineItemPatchBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await updateLineItem(c.get('db'), c.req.param('id'), c.req.param('lineItemId'), c.req.valid('json'))
    return c.json({ data })
  },
)

ticketsHandler.delete('/:id/line-items/:lineItemId', async (c) => {
  await removeLineItem(c.get('db'), c.req.param('id'), c.req.param('lineItemId'))
  return c.body(null, 204)
})

// ── Invoice ──────────────────────────────────────────────────────────────

ticketsHandler.post(
  '/:id/invoice',
  validator('json', (value, c) => {
    const r = DeriveInvoiceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await deriveInvoice(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data }, data.outcome === 'created' ? 201 : 200)
  },
)
