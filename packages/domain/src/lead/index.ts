// ---------------------------------------------------------------------------
// Lead bounded context
// Pre-customer capture: raw call notes plus fields an extraction step may fill.
// ---------------------------------------------------------------------------

import type { Brand, Tombstoned } from '../shared/types'
import { InvalidTransitionError } from '../shared/errors'
import type { TenantId } from '../tenant/index'
import type { CustomerId, JsonValue } from '../customer/index'

export type LeadId = Brand<string, 'LeadId'>

export const toLeadId = (raw: string): LeadId => raw as LeadId

/**
 * Lifecycle status of a Lead.
 *
 *   new → contacted → qualified → converted
 *   any non-terminal state → archived
 */
export type LeadStatus = 'new' | 'contacted' | 'qualified' | 'converted' | 'archived'
export type LeadSource = 'cold_call' | 'referral' | 'website' | 'other'
export type LeadUrgency = 'low' | 'medium' | 'high'

/**
 * The Lead aggregate root.
 *
 * @invariant `status === 'converted'` iff `convertedCustomerId` and `convertedAt` are set.
 */
export interface Lead extends Tombstoned {
  readonly id: LeadId
  readonly tenantId: TenantId
  readonly status: LeadStatus
  /** What was typed during the call. Source of truth. */
  readonly rawNotes: string
  /** Structured output of the extraction collaborator; null until processed. */
  readonly extractedData?: { readonly [key: string]: JsonValue }
  readonly extractedAt?: Date
  readonly name?: string
  readonly phone?: string
  readonly email?: string
  readonly address?: string
  readonly serviceInterest?: string
  readonly leadSource?: LeadSource
  readonly urgency?: LeadUrgency
  readonly propertyDetails?: string
  readonly reminderAt?: Date
  readonly reminderNote?: string
  readonly convertedAt?: Date
  readonly convertedCustomerId?: CustomerId
  readonly createdAt: Date
  readonly updatedAt: Date
}

const LEAD_TRANSITIONS: Record<LeadStatus, readonly LeadStatus[]> = {
  new: ['contacted', 'qualified', 'converted', 'archived'],
  contacted: ['qualified', 'converted', 'archived'],
  qualified: ['converted', 'archived'],
  converted: [],
  archived: [],
}

export function isLeadTerminal(status: LeadStatus): boolean {
  return LEAD_TRANSITIONS[status].length === 0
}

/** Returns true when a lead can move from `current` to `next`. */
export function canTransitionLead(current: LeadStatus, next: LeadStatus): boolean {
  return LEAD_TRANSITIONS[current].includes(next)
}

/**
 * Guards a manual status change. Conversion is not a manual status change:
 * it needs a customer and goes through `convertLead`.
 *
 * @throws {InvalidTransitionError}
 */
export function assertLeadStatusChange(lead: Lead, next: LeadStatus): void {
  if (next === 'converted') {
    throw new InvalidTransitionError('Leads are converted through the convert operation')
  }
  if (lead.status === next) return
  if (!canTransitionLead(lead.status, next)) {
    throw new InvalidTransitionError(`Cannot move lead from ${lead.status} to ${next}`)
  }
}

/**
 * Returns the patch that marks a lead as converted into `customerId`.
 *
 * @throws {InvalidTransitionError} if the lead is already converted or archived.
 */
export function convertLeadPatch(
  lead: Lead,
  customerId: CustomerId,
  at: Date,
): Pick<Lead, 'status' | 'convertedCustomerId' | 'convertedAt'> {
  if (!canTransitionLead(lead.status, 'converted')) {
    throw new InvalidTransitionError(`Cannot convert a lead that is ${lead.status}`)
  }
  return { status: 'converted', convertedCustomerId: customerId, convertedAt: at }
}

/**
 * Splits the free-form lead name into customer name fields.
 * "Jane Q Doe" → first "Jane", last "Q Doe".
 */
export function splitLeadName(name: string | undefined): { firstName?: string; lastName?: string } {
  const parts = (name ?? '').trim().split(/\s+/).filter(Boolean)
  const [first, ...rest] = parts
  if (first === undefined) return {}
  return rest.length > 0 ? { firstName: first, lastName: rest.join(' ') } : { firstName: first }
}
