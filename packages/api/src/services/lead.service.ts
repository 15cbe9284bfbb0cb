// ---------------------------------------------------------------------------
// Lead service
//
// Leads move new → contacted → qualified by hand and end either archived or
// converted. Conversion creates the Customer and marks the lead in one
// transaction.
// ---------------------------------------------------------------------------

import {
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  assertLeadStatusChange,
  computeChanges,
  convertLeadPatch,
  creationChanges,
  isLeadTerminal,
  splitLeadName,
  validateCustomerName,
  type AuditEntry,
  type Customer,
  type Lead,
  type LeadStatus,
} from '@crewbook/domain'
import { inTenantTransaction, type TenantDb } from '../lib/tenant-db'
import { findLeadById, insertCustomer, insertLead, updateLead, type LeadFields } from '../repositories'
import { flushEffects, getRuntime, type Runtime } from '../runtime'

function leadAudit(lead: Lead, action: AuditEntry['action'], changes: AuditEntry['changes']): AuditEntry {
  return { tenantId: lead.tenantId, entityType: 'lead', entityId: lead.id, action, changes }
}

export async function createLead(
  tdb: TenantDb,
  input: LeadFields & { rawNotes: string },
  rt: Runtime = getRuntime(),
): Promise<Lead> {
  if (input.rawNotes.trim() === '') throw new ValidationError('rawNotes is required')
  const lead = await insertLead(tdb, input)
  await flushEffects(rt, tdb, { audit: [leadAudit(lead, 'create', creationChanges(lead))], events: [] })
  return lead
}

/**
 * Edits fields and optionally moves the status by hand. Terminal leads are
 * read-only.
 *
 * @throws {InvalidTransitionError} for a terminal lead or an illegal status move.
 */
export async function editLead(
  tdb: TenantDb,
  leadId: string,
  patch: LeadFields & { status?: LeadStatus },
  rt: Runtime = getRuntime(),
): Promise<Lead> {
  const { before, after } = await inTenantTransaction(tdb, async (tx) => {
    const lead = await findLeadById(tx, leadId)
    if (!lead) throw new NotFoundError('Lead', leadId)
    if (isLeadTerminal(lead.status)) {
      throw new InvalidTransitionError(`Lead is ${lead.status} and can no longer be edited`)
    }
    if (patch.status !== undefined) assertLeadStatusChange(lead, patch.status)
    const next = await updateLead(tx, lead.id, patch)
    if (!next) throw new NotFoundError('Lead', leadId)
    return { before: lead, after: next }
  })
  await flushEffects(rt, tdb, { audit: [leadAudit(after, 'update', computeChanges(before, after))], events: [] })
  return after
}

export function archiveLead(tdb: TenantDb, leadId: string, rt: Runtime = getRuntime()): Promise<Lead> {
  return editLead(tdb, leadId, { status: 'archived' }, rt)
}

/** Fields the caller may supply to correct what was captured on the lead. */
export type ConvertLeadOverrides = {
  firstName?: string
  lastName?: string
  businessName?: string
  email?: string
  phone?: string
}

/**
 * Creates a Customer from the lead's fields (overrides win) and marks the
 * lead converted with a back-reference to it.
 *
 * @throws {InvalidTransitionError} if the lead is already converted or archived.
 * @throws {ValidationError} if no customer name can be derived.
 */
export async function convertLead(
  tdb: TenantDb,
  leadId: string,
  overrides: ConvertLeadOverrides = {},
  rt: Runtime = getRuntime(),
): Promise<{ lead: Lead; customer: Customer }> {
  const now = rt.now()
  const result = await inTenantTransaction(tdb, async (tx) => {
    const lead = await findLeadById(tx, leadId)
    if (!lead) throw new NotFoundError('Lead', leadId)
    if (isLeadTerminal(lead.status)) {
      throw new InvalidTransitionError(`Cannot convert a lead that is ${lead.status}`)
    }

    const split = splitLeadName(lead.name)
    const name = {
      firstName: overrides.firstName ?? split.firstName,
      lastName: overrides.lastName ?? split.lastName,
      businessName: overrides.businessName,
    }
    const problems = validateCustomerName(name)
    if (problems.length > 0) throw new ValidationError(problems.join('; '))

    const customer = await insertCustomer(tx, {
      ...name,
      email: overrides.email ?? lead.email,
      phone: overrides.phone ?? lead.phone,
      notes: lead.propertyDetails,
    })
    const after = await updateLead(tx, lead.id, convertLeadPatch(lead, customer.id, now))
    if (!after) throw new NotFoundError('Lead', leadId)
    return { before: lead, lead: after, customer }
  })

  await flushEffects(rt, tdb, {
    audit: [
      {
        tenantId: result.customer.tenantId,
        entityType: 'customer',
        entityId: result.customer.id,
        action: 'create',
        changes: creationChanges(result.customer),
      },
      leadAudit(result.lead, 'update', computeChanges(result.before, result.lead)),
    ],
    events: [],
  })
  return { lead: result.lead, customer: result.customer }
}
