// ---------------------------------------------------------------------------
// Invoice handler
//
// Invoices are derived from tickets (POST /tickets/:id/invoice); this router
// covers reading them and their lifecycle after derivation.
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { findInvoiceById, listInvoices, listUnpaidInvoices } from '../repositories'
import { recordPayment, sendInvoice, voidInvoice } from '../services/invoice.service'
import { pageOf } from './schemas'

const PaymentBody = z.object({
  amountCents: z.number().int().positive(),
})

const StatusQuery = z.enum(['draft', 'sent', 'partial', 'paid', 'void'])

export const invoicesHandler = new Hono<AppEnv>()

invoicesHandler.get('/', async (c) => {
  const status = c.req.query('status')
  const parsed = status === undefined ? undefined : StatusQuery.safeParse(status)
  if (parsed && !parsed.success) {
    return c.json({ error: parsed.error.message, code: 'VALIDATION_ERROR' }, 400)
  }
  const { limit, offset } = pageOf(c.req.query())
  const data = await listInvoices(c.get('db'), { status: parsed?.data, limit, offset })
  return c.json({ data, meta: { count: data.length, limit, offset } })
})

// Registered before '/:id' so the literal segment wins.
invoicesHandler.get('/unpaid', async (c) => {
  const data = await listUnpaidInvoices(c.get('db'))
  const outstandingCents = data.reduce((sum, inv) => sum + inv.totalAmountCents - inv.amountPaidCents, 0)
  return c.json({ data, meta: { count: data.length, outstandingCents } })
})

invoicesHandler.get('/:id', async (c) => {
  const data = await findInvoiceById(c.get('db'), c.req.param('id'))
  if (!data) return c.json({ error: 'Invoice not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data })
})

invoicesHandler.post('/:id/send', async (c) => {
  const data = await sendInvoice(c.get('db'), c.req.param('id'))
  return c.json({ data })
})

invoicesHandler.post(
  '/:id/payments',
  validator('json', (value, c) => {
    const r = PaymentBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await recordPayment(c.get('db'), c.req.param('id'), c.req.valid('json').amountCents)
    return c.json({ data })
  },
)

invoicesHandler.post('/:id/void', async (c) => {
  const data = await voidInvoice(c.get('db'), c.req.param('id'))
  return c.json({ data })
})
