// ---------------------------------------------------------------------------
// Catalog bounded context
// The services a business sells and how each is priced.
// ---------------------------------------------------------------------------

import type { Brand, Cents, Tombstoned } from '../shared/types'
import { assertCents } from '../shared/types'
import { ValidationError } from '../shared/errors'
import type { TenantId } from '../tenant/index'

/** Uniquely identifies a catalog Service. */
export type ServiceId = Brand<string, 'ServiceId'>

export const toServiceId = (raw: string): ServiceId => raw as ServiceId

export type PricingType = 'fixed' | 'flexible' | 'per_unit'

export const PRICING_TYPES: readonly PricingType[] = ['fixed', 'flexible', 'per_unit'] as const

/**
 * How a service is priced. The variant decides which price field must exist.
 *
 *   fixed     `defaultPriceCents` per unit, may be overridden per use
 *   per_unit  `unitPriceCents` × quantity
 *   flexible  price supplied on every use; `suggestedPriceCents` is a hint only
 */
export type ServicePricing =
  | { readonly type: 'fixed'; readonly defaultPriceCents: Cents }
  | { readonly type: 'per_unit'; readonly unitPriceCents: Cents; readonly unitLabel?: string }
  | { readonly type: 'flexible'; readonly suggestedPriceCents?: Cents }

/**
 * A catalog entry.
 *
 * Services are tombstoned so historical line items keep resolving. A
 * tombstoned or inactive service is still readable but cannot be put on new
 * line items (`isServiceOffered`).
 */
export interface Service extends Tombstoned {
  readonly id: ServiceId
  readonly tenantId: TenantId
  readonly name: string
  readonly description?: string
  readonly pricing: ServicePricing
  readonly isActive: boolean
  readonly displayOrder: number
  readonly createdAt: Date
  readonly updatedAt: Date
}

/** Flat storage shape of the pricing columns. */
export interface PricingColumns {
  readonly pricingType: string
  readonly defaultPriceCents: number | null
  readonly unitPriceCents: number | null
  readonly unitLabel: string | null
}

/**
 * Builds the pricing variant from its flat columns, re-validating the
 * completeness rule rather than trusting the caller.
 *
 * @throws {ValidationError} on an unknown pricing type or a missing required price.
 */
export function parseServicePricing(cols: PricingColumns): ServicePricing {
  switch (cols.pricingType) {
    case 'fixed':
      if (cols.defaultPriceCents === null) {
        throw new ValidationError('fixed services require defaultPriceCents')
      }
      return { type: 'fixed', defaultPriceCents: assertCents(cols.defaultPriceCents, 'defaultPriceCents') }
    case 'per_unit':
      if (cols.unitPriceCents === null) {
        throw new ValidationError('per_unit services require unitPriceCents')
      }
      return {
        type: 'per_unit',
        unitPriceCents: assertCents(cols.unitPriceCents, 'unitPriceCents'),
        ...(cols.unitLabel !== null ? { unitLabel: cols.unitLabel } : {}),
      }
    case 'flexible':
      return cols.defaultPriceCents !== null
        ? { type: 'flexible', suggestedPriceCents: assertCents(cols.defaultPriceCents, 'defaultPriceCents') }
        : { type: 'flexible' }
    default:
      throw new ValidationError(`Unknown pricing type: ${cols.pricingType}`)
  }
}

/** The inverse of `parseServicePricing`. */
export function toPricingColumns(pricing: ServicePricing): PricingColumns {
  switch (pricing.type) {
    case 'fixed':
      return { pricingType: 'fixed', defaultPriceCents: pricing.defaultPriceCents, unitPriceCents: null, unitLabel: null }
    case 'per_unit':
      return {
        pricingType: 'per_unit',
        defaultPriceCents: null,
        unitPriceCents: pricing.unitPriceCents,
        unitLabel: pricing.unitLabel ?? null,
      }
    case 'flexible':
      return {
        pricingType: 'flexible',
        defaultPriceCents: pricing.suggestedPriceCents ?? null,
        unitPriceCents: null,
        unitLabel: null,
      }
  }
}

/** Returns true when the service may be put on a new line item. */
export function isServiceOffered(service: Service): boolean {
  return service.isActive && service.deletedAt === undefined
}
