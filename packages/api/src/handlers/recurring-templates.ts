// ---------------------------------------------------------------------------
// Recurring template handler
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { findTemplateById, listTemplates } from '../repositories'
import { createTemplate, deactivateTemplate } from '../services/recurrence.service'
import { Cents, IsoDate, ServiceRef } from './schemas'

const CreateTemplateBody = z.object({
  customerId: z.string().uuid(),
  addressId: z.string().uuid(),
  intervalType: z.enum(['days', 'weeks', 'months']),
  intervalValue: z.number().int().positive(),
  preferredDayOfWeek: z.number().int().min(0).max(6).optional(),
  preferredTime: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'preferredTime must be HH:MM')
    .optional(),
  anchorDay: z.number().int().min(1).max(31).optional(),
  startAt: IsoDate,
  estimatedDurationMinutes: z.number().int().positive().optional(),
  notes: z.string().optional(),
  services: z
    .array(
      z.object({
        serviceId: ServiceRef,
        quantity: z.number().int().positive().optional(),
        customPriceCents: Cents.optional(),
      }),
    )
    .default([]),
})

export const recurringTemplatesHandler = new Hono<AppEnv>()

recurringTemplatesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CreateTemplateBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await createTemplate(c.get('db'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

recurringTemplatesHandler.get('/', async (c) => {
  const data = await listTemplates(c.get('db'), {
    customerId: c.req.query('customerId'),
    activeOnly: c.req.query('active') === 'true',
  })
  return c.json({ data, meta: { count: data.length } })
})

recurringTemplatesHandler.get('/:id', async (c) => {
  const data = await findTemplateById(c.get('db'), c.req.param('id'))
  if (!data) return c.json({ error: 'Recurring template not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data })
})

recurringTemplatesHandler.post('/:id/deactivate', async (c) => {
  const data = await deactivateTemplate(c.get('db'), c.req.param('id'))
  return c.json({ data })
})
