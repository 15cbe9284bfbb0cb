// ---------------------------------------------------------------------------
// Service catalog
//
// Pricing arrives as flat columns and is re-validated through
// parseServicePricing before anything is written.
// ---------------------------------------------------------------------------

import {
  NotFoundError,
  computeChanges,
  creationChanges,
  parseServicePricing,
  toPricingColumns,
  type AuditEntry,
  type PricingColumns,
  type Service,
} from '@crewbook/domain'
import { inTenantTransaction, type TenantDb } from '../lib/tenant-db'
import { findServiceById, insertService, softDeleteService, updateService as updateServiceRow } from '../repositories'
import { flushEffects, getRuntime, type Runtime } from '../runtime'

export type ServiceRequest = {
  name: string
  description?: string | null
  displayOrder?: number
  pricingType: string
  defaultPriceCents?: number | null
  unitPriceCents?: number | null
  unitLabel?: string | null
}

function pricingColumns(req: Partial<PricingColumns>, fallback?: PricingColumns): PricingColumns {
  return {
    pricingType: req.pricingType ?? fallback?.pricingType ?? '',
    defaultPriceCents: req.defaultPriceCents !== undefined ? req.defaultPriceCents : (fallback?.defaultPriceCents ?? null),
    unitPriceCents: req.unitPriceCents !== undefined ? req.unitPriceCents : (fallback?.unitPriceCents ?? null),
    unitLabel: req.unitLabel !== undefined ? req.unitLabel : (fallback?.unitLabel ?? null),
  }
}

function serviceAudit(service: Service, action: AuditEntry['action'], changes: AuditEntry['changes']): AuditEntry {
  return { tenantId: service.tenantId, entityType: 'service', entityId: service.id, action, changes }
}

/** @throws {ValidationError} when the pricing variant is missing its required price. */
export async function createService(tdb: TenantDb, req: ServiceRequest, rt: Runtime = getRuntime()): Promise<Service> {
  const pricing = parseServicePricing(pricingColumns(req))
  const service = await insertService(tdb, {
    name: req.name,
    description: req.description,
    displayOrder: req.displayOrder,
    pricing,
  })
  await flushEffects(rt, tdb, { audit: [serviceAudit(service, 'create', creationChanges(service))], events: [] })
  return service
}

/**
 * Edits a catalog entry. Changing only part of the pricing re-validates it
 * against the stored columns, so a fixed service cannot lose its price.
 */
export async function updateService(
  tdb: TenantDb,
  serviceId: string,
  patch: Partial<ServiceRequest> & { isActive?: boolean },
  rt: Runtime = getRuntime(),
): Promise<Service> {
  const { before, after } = await inTenantTransaction(tdb, async (tx) => {
    const current = await findServiceById(tx, serviceId)
    if (!current || current.deletedAt !== undefined) throw new NotFoundError('Service', serviceId)
    const touchesPricing =
      patch.pricingType !== undefined ||
      patch.defaultPriceCents !== undefined ||
      patch.unitPriceCents !== undefined ||
      patch.unitLabel !== undefined
    const pricing = touchesPricing ? parseServicePricing(pricingColumns(patch, toPricingColumns(current.pricing))) : undefined
    const next = await updateServiceRow(tx, current.id, {
      name: patch.name,
      description: patch.description,
      displayOrder: patch.displayOrder,
      isActive: patch.isActive,
      pricing,
    })
    if (!next) throw new NotFoundError('Service', serviceId)
    return { before: current, after: next }
  })
  await flushEffects(rt, tdb, { audit: [serviceAudit(after, 'update', computeChanges(before, after))], events: [] })
  return after
}

/** Takes the service off new line items; existing line items are unaffected. */
export function deactivateService(tdb: TenantDb, serviceId: string, rt: Runtime = getRuntime()): Promise<Service> {
  return updateService(tdb, serviceId, { isActive: false }, rt)
}

export async function deleteService(tdb: TenantDb, serviceId: string, rt: Runtime = getRuntime()): Promise<void> {
  const service = await findServiceById(tdb, serviceId)
  if (!service || service.deletedAt !== undefined) throw new NotFoundError('Service', serviceId)
  const at = rt.now()
  if (!(await softDeleteService(tdb, service.id, at))) throw new NotFoundError('Service', serviceId)
  await flushEffects(rt, tdb, {
    audit: [serviceAudit(service, 'delete', { deletedAt: { old: null, new: at.toISOString() } })],
    events: [],
  })
}
