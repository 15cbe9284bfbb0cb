// ---------------------------------------------------------------------------
// Request-body building blocks shared by the handlers
// ---------------------------------------------------------------------------

import { z } from 'zod'
import { toServiceId } from '@crewbook/domain'

/** ISO-8601 timestamp with an explicit offset, parsed to a Date. */
export const IsoDate = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s))

export const Cents = z.number().int().min(0)

export const ServiceRef = z.string().uuid().transform(toServiceId)

export const LineItemBody = z.object({
  serviceId: ServiceRef,
  quantity: z.number().int().positive().optional(),
  priceOverrideCents: Cents.optional(),
  durationMinutes: z.number().int().positive().optional(),
  description: z.string().min(1).optional(),
})

export const ContactMethod = z.enum(['email', 'phone', 'text'])
export const TimeOfDay = z.enum(['morning', 'afternoon', 'evening', 'any'])

/** `?limit=&offset=` with the listing defaults: 50 per page, at most 100. */
export function pageOf(query: { limit?: string; offset?: string }): { limit: number; offset: number } {
  const limit = Math.min(Math.max(Number(query.limit ?? '50') || 50, 1), 100)
  const offset = Math.max(Number(query.offset ?? '0') || 0, 0)
  return { limit, offset }
}
