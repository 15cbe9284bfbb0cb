// ---------------------------------------------------------------------------
// Pricing bounded context
// Turns (service, quantity, override) requests into priced line items.
// ---------------------------------------------------------------------------

import type { Brand, Cents, Tombstoned } from '../shared/types'
import { assertCents, assertQuantity } from '../shared/types'
import { NotFoundError, ValidationError } from '../shared/errors'
import type { TenantId } from '../tenant/index'
import type { Service, ServiceId } from '../catalog/index'
import { isServiceOffered } from '../catalog/index'
import type { TicketId } from '../ticket/index'

export type LineItemId = Brand<string, 'LineItemId'>

export const toLineItemId = (raw: string): LineItemId => raw as LineItemId

/**
 * One priced service entry on a ticket. The price is captured at the time of
 * use; later catalog edits never touch it.
 *
 * @invariant Unless `isPriceOverridden` is set on a flexible line,
 *            `totalPriceCents === unitPriceCents * quantity`.
 */
export interface LineItem extends Tombstoned {
  readonly id: LineItemId
  readonly tenantId: TenantId
  readonly ticketId: TicketId
  readonly serviceId: ServiceId
  readonly description?: string
  readonly quantity: number
  readonly unitPriceCents?: Cents
  readonly totalPriceCents: Cents
  readonly durationMinutes?: number
  readonly isPriceOverridden: boolean
  readonly createdAt: Date
  readonly updatedAt: Date
}

/** What a caller asks for. Everything but the service is optional. */
export interface LineItemRequest {
  readonly serviceId: ServiceId
  readonly quantity?: number
  /**
   * Replaces the catalog unit price for fixed and per_unit services.
   * Mandatory for flexible services, where it is the line total.
   */
  readonly priceOverrideCents?: Cents
  readonly durationMinutes?: number
  readonly description?: string
}

/** A fully priced line, ready to persist. */
export interface PricedLineItem {
  readonly serviceId: ServiceId
  readonly description?: string
  readonly quantity: number
  readonly unitPriceCents: Cents | null
  readonly totalPriceCents: Cents
  readonly durationMinutes: number | null
  readonly isPriceOverridden: boolean
}

/**
 * Prices a single request against its resolved service.
 *
 * @throws {ValidationError} when the service is no longer offered, the quantity
 *         is not a positive integer, or a flexible service has no override.
 */
export function priceLineItem(service: Service, req: LineItemRequest): PricedLineItem {
  if (!isServiceOffered(service)) {
    throw new ValidationError(`Service "${service.name}" is no longer offered`)
  }
  const quantity = assertQuantity(req.quantity ?? 1)
  const override =
    req.priceOverrideCents !== undefined ? assertCents(req.priceOverrideCents, 'priceOverrideCents') : undefined
  let durationMinutes: number | null = null
  if (req.durationMinutes !== undefined) {
    if (!Number.isInteger(req.durationMinutes) || req.durationMinutes < 0) {
      throw new ValidationError('durationMinutes must be a non-negative integer')
    }
    durationMinutes = req.durationMinutes
  }

  const base = {
    serviceId: service.id,
    quantity,
    durationMinutes,
    ...(req.description !== undefined ? { description: req.description } : {}),
  }

  switch (service.pricing.type) {
    case 'fixed':
    case 'per_unit': {
      const catalogPrice =
        service.pricing.type === 'fixed' ? service.pricing.defaultPriceCents : service.pricing.unitPriceCents
      const unit = override ?? catalogPrice
      return {
        ...base,
        unitPriceCents: unit,
        totalPriceCents: assertCents(unit * quantity, 'totalPriceCents'),
        isPriceOverridden: override !== undefined,
      }
    }
    case 'flexible':
      if (override === undefined) {
        throw new ValidationError(`Service "${service.name}" is flexibly priced; priceOverrideCents is required`)
      }
      return { ...base, unitPriceCents: null, totalPriceCents: override, isPriceOverridden: true }
  }
}

/**
 * Prices every request or none of them.
 *
 * `services` must hold what the tenant-scoped lookup returned for the
 * requested ids; an id missing from it is indistinguishable from an id that
 * belongs to another tenant.
 *
 * @throws {NotFoundError} for an unresolved service id.
 * @throws {ValidationError} as `priceLineItem`, or for an empty request list.
 */
export function assembleLineItems(
  requests: readonly LineItemRequest[],
  services: ReadonlyMap<ServiceId, Service>,
): PricedLineItem[] {
  if (requests.length === 0) {
    throw new ValidationError('At least one line item is required')
  }
  return requests.map((req) => {
    const service = services.get(req.serviceId)
    if (!service) throw new NotFoundError('Service', req.serviceId)
    return priceLineItem(service, req)
  })
}

/** Sum of the totals of lines that are not tombstoned. */
export function activeSubtotal(items: readonly Pick<LineItem, 'totalPriceCents' | 'deletedAt'>[]): Cents {
  return items.reduce((sum, item) => (item.deletedAt === undefined ? sum + item.totalPriceCents : sum), 0)
}
