// ---------------------------------------------------------------------------
// Service catalog handler
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import type { AppEnv } from '../types'
import { findServiceById, listServices } from '../repositories'
import { createService, deactivateService, deleteService, updateService } from '../services/catalog.service'
import { Cents } from './schemas'

const ServiceBody = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  displayOrder: z.number().int().optional(),
  pricingType: z.enum(['fixed', 'flexible', 'per_unit']),
  defaultPriceCents: Cents.nullable().optional(),
  unitPriceCents: Cents.nullable().optional(),
  unitLabel: z.string().min(1).nullable().optional(),
})

const UpdateServiceBody = ServiceBody.partial().extend({ isActive: z.boolean().optional() })

export const servicesHandler = new Hono<AppEnv>()

servicesHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = ServiceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await createService(c.get('db'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

servicesHandler.get('/', async (c) => {
  const data = await listServices(c.get('db'), { includeInactive: c.req.query('includeInactive') === 'true' })
  return c.json({ data, meta: { count: data.length } })
})

servicesHandler.get('/:id', async (c) => {
  const data = await findServiceById(c.get('db'), c.req.param('id'))
  if (!data) return c.json({ error: 'Service not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data })
})

servicesHandler.put(
  '/:id',
  validator('json', (value, c) => {
    const r = UpdateServiceBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await updateService(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

servicesHandler.post('/:id/deactivate', async (c) => {
  const data = await deactivateService(c.get('db'), c.req.param('id'))
  return c.json({ data })
})

servicesHandler.delete('/:id', async (c) => {
  await deleteService(c.get('db'), c.req.param('id'))
  return c.body(null, 204)
})
