// ---------------------------------------------------------------------------
// Customer handler: customers, addresses, attributes, notes, waitlist
// ---------------------------------------------------------------------------

import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import { toCustomerId, type JsonValue } from '@crewbook/domain'
import type { AppEnv } from '../types'
import {
  deleteWaitlistEntry,
  findCustomerById,
  findWaitlistEntry,
  listActiveWaitlist,
  listAddresses,
  listAttributes,
  listCustomers,
  listNotes,
  markNoteProcessed,
} from '../repositories'
import {
  addAddress,
  addNote,
  createCustomer,
  deleteCustomer,
  putOnWaitlist,
  removeAddress,
  setAttribute,
  updateAddress,
  updateCustomer,
} from '../services/customer.service'
import { getRuntime } from '../runtime'
import { ContactMethod, TimeOfDay, pageOf } from './schemas'

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
)

const CustomerBody = z.object({
  firstName: z.string().min(1).nullable().optional(),
  lastName: z.string().min(1).nullable().optional(),
  businessName: z.string().min(1).nullable().optional(),
  email: z.string().email().nullable().optional(),
  phone: z.string().min(1).nullable().optional(),
  referredById: z.string().uuid().transform(toCustomerId).nullable().optional(),
  preferredContactMethod: ContactMethod.nullable().optional(),
  preferredTimeOfDay: TimeOfDay.nullable().optional(),
  notes: z.string().nullable().optional(),
})

const AddressBody = z.object({
  label: z.string().min(1).nullable().optional(),
  street: z.string().min(1),
  street2: z.string().min(1).nullable().optional(),
  city: z.string().min(1),
  state: z.string().min(1),
  zip: z.string().min(1),
  notes: z.string().nullable().optional(),
  isPrimary: z.boolean().optional(),
})

const AttributeBody = z.object({
  key: z.string().min(1),
  value: JsonValueSchema,
  sourceType: z.enum(['manual', 'llm_extracted']).default('manual'),
  sourceNoteId: z.string().uuid().optional(),
  confidence: z.number().optional(),
})

const NoteBody = z.object({
  content: z.string().min(1),
  ticketId: z.string().uuid().optional(),
})

const WaitlistBody = z.object({
  nearCustomerId: z.string().uuid().nullable().optional(),
  nearAddressId: z.string().uuid().nullable().optional(),
  preferredDates: z.string().nullable().optional(),
  preferredTimeOfDay: TimeOfDay.nullable().optional(),
  notes: z.string().nullable().optional(),
  isActive: z.boolean().optional(),
})

export const customersHandler = new Hono<AppEnv>()

// ── Customers ────────────────────────────────────────────────────────────

customersHandler.post(
  '/',
  validator('json', (value, c) => {
    const r = CustomerBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await createCustomer(c.get('db'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

customersHandler.get('/', async (c) => {
  const { limit, offset } = pageOf(c.req.query())
  const data = await listCustomers(c.get('db'), { limit, offset })
  return c.json({ data, meta: { count: data.length, limit, offset } })
})

// Registered before '/:id' so the literal segment wins.
customersHandler.get('/waitlist', async (c) => {
  const data = await listActiveWaitlist(c.get('db'))
  return c.json({ data, meta: { count: data.length } })
})

customersHandler.get('/:id', async (c) => {
  const db = c.get('db')
  const customer = await findCustomerById(db, c.req.param('id'))
  if (!customer) return c.json({ error: 'Customer not found', code: 'NOT_FOUND' }, 404)
  const addresses = await listAddresses(db, customer.id)
  return c.json({ data: { ...customer, addresses } })
})

customersHandler.put(
  '/:id',
  validator('json', (value, c) => {
    const r = CustomerBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await updateCustomer(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

customersHandler.delete('/:id', async (c) => {
  await deleteCustomer(c.get('db'), c.req.param('id'))
  return c.body(null, 204)
})

// ── Addresses ────────────────────────────────────────────────────────────

customersHandler.get('/:id/addresses', async (c) => {
  const data = await listAddresses(c.get('db'), c.req.param('id'))
  return c.json({ data, meta: { count: data.length } })
})

customersHandler.post(
  '/:id/addresses',
  validator('json', (value, c) => {
    const r = AddressBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await addAddress(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

customersHandler.patch(
  '/:id/addresses/:addressId',
  validator('json', (value, c) => {
    const r = AddressBody.partial().safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await updateAddress(c.get('db'), c.req.param('id'), c.req.param('addressId'), c.req.valid('json'))
    return c.json({ data })
  },
)

customersHandler.delete('/:id/addresses/:addressId', async (c) => {
  await removeAddress(c.get('db'), c.req.param('id'), c.req.param('addressId'))
  return c.body(null, 204)
})

// ── Attributes ───────────────────────────────────────────────────────────

customersHandler.get('/:id/attributes', async (c) => {
  const data = await listAttributes(c.get('db'), c.req.param('id'))
  return c.json({ data, meta: { count: data.length } })
})

customersHandler.put(
  '/:id/attributes',
  validator('json', (value, c) => {
    const r = AttributeBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await setAttribute(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

// ── Notes ────────────────────────────────────────────────────────────────

customersHandler.get('/:id/notes', async (c) => {
  const data = await listNotes(c.get('db'), c.req.param('id'))
  return c.json({ data, meta: { count: data.length } })
})

customersHandler.post(
  '/:id/notes',
  validator('json', (value, c) => {
    const r = NoteBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await addNote(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data }, 201)
  },
)

customersHandler.post('/:id/notes/:noteId/processed', async (c) => {
  const data = await markNoteProcessed(c.get('db'), c.req.param('noteId'), getRuntime().now())
  if (!data || data.customerId !== c.req.param('id')) {
    return c.json({ error: 'Note not found', code: 'NOT_FOUND' }, 404)
  }
  return c.json({ data })
})

// ── Waitlist ─────────────────────────────────────────────────────────────

customersHandler.get('/:id/waitlist', async (c) => {
  const data = await findWaitlistEntry(c.get('db'), c.req.param('id'))
  if (!data) return c.json({ error: 'Waitlist entry not found', code: 'NOT_FOUND' }, 404)
  return c.json({ data })
})

customersHandler.put(
  '/:id/waitlist',
  validator('json', (value, c) => {
    const r = WaitlistBody.safeParse(value)
    if (!r.success) return c.json({ error: r.error.message, code: 'VALIDATION_ERROR' }, 400)
    return r.data
  }),
  async (c) => {
    const data = await putOnWaitlist(c.get('db'), c.req.param('id'), c.req.valid('json'))
    return c.json({ data })
  },
)

customersHandler.delete('/:id/waitlist', async (c) => {
  const removed = await deleteWaitlistEntry(c.get('db'), c.req.param('id'))
  if (!removed) return c.json({ error: 'Waitlist entry not found', code: 'NOT_FOUND' }, 404)
  return c.body(null, 204)
})
