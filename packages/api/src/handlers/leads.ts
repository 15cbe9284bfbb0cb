// ---------------------------------------------------------------------------
// Lead handler: capture, qualification, conversion to a customer
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { findLeadById, listLeads } from '../repositories'
import { archiveLead, convertLead, createLead, editLead } from '../services/lead.service'
import { IsoDate } from './schemas'

const LeadFieldsBody = z.object({
  name: z.string().min(1).nullable().optional(),
  phone: z.string().min(1).nullable().optional(),
  email: z.string().email().nullable().optional(),
  address: z.string().min(1).nullable().optional(),
  serviceInterest: z.string().nullable().optional(),
  leadSource: z.enum(['cold_call', 'referral', 'website', 'other']).nullable().optional(),
  urgency: z.enum(['low', 'medium', 'high']).nullable().optional(),
  propertyDetails: z.string().nullable().optional(),
  reminderAt: IsoDate.nullable().optional(),
  reminderNote: z.string().nullable().optional(),
})

const CreateLeadBody = LeadFieldsBody.extend({ rawNotes: z.string().min(1) })

const UpdateLeadBody = LeadFieldsBody.extend({
  rawNotes: z.string().min(1).optional(),
  status: z.enum(['new', 'contacted', 'qualified', 'archived']).optional(),
})

const ConvertLeadBody = z.object({
  firstName: z.string().min(1).optional(),
  lastName: z.string().min(1).optional(),
  businessName: z.string().min(1).optional(),
  email: z.string().email().optional(),
  phone: z.string().min(1).optional(),
})

const StatusQuery = z.enum(['new', 'contacted', 'qualified', 'converted', 'archived'])

export const leadsHandler = new Hono<AppEnv>()

leadsHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateLeadBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await createLead(c.get('db'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

leadsHandler.get('/', async (c) => {
  const status = c.req.query('status')
  const parsed = status === undefined ? undefined : StatusQuery.safeParse(status)
  if (parsed && !parsed.success) {
    return c.json({ error: parsed.error.message, code: 'VALIDATION_ERROR' }, 400)
  }
  const data = await listLeads(c.get('db'), { status: parsed?.data })
  return c.json({ data, meta: { count: data.length } })
})

leadsHandler.get('/:id', async (c) => {
  const data = await findLeadById(c.get('db'), c.req.param('id'))
  if (!data) return c.json({ error: 'Lead not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data })
})

leadsHandler.patch(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateLeadBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await editLead(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

leadsHandler.post(
  '/:id/convert',
  validator('json', (value, c) => {
    const r = ConvertLeadBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await convertLead(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

leadsHandler.post('/:id/archive', async (c) => {
  const data = await archiveLead(c.get('db'), c.req.param('id'))
  return c.json({ data })
})
