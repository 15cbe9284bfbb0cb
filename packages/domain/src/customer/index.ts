// ---------------------------------------------------------------------------
// Customer bounded context
// Customers, the addresses work happens at, and what the business has
// learned about them (attributes, notes, waitlist preferences).
// ---------------------------------------------------------------------------

import type { Brand, Tombstoned } from '../shared/types'
import { ValidationError } from '../shared/errors'
import type { TenantId } from '../tenant/index'
import type { TicketId } from '../ticket/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

/** Uniquely identifies a Customer aggregate. */
export type CustomerId = Brand<string, 'CustomerId'>

/** Uniquely identifies an Address owned by a Customer. */
export type AddressId = Brand<string, 'AddressId'>

export type AttributeId = Brand<string, 'AttributeId'>
export type NoteId = Brand<string, 'NoteId'>
export type WaitlistEntryId = Brand<string, 'WaitlistEntryId'>

export const toCustomerId = (raw: string): CustomerId => raw as CustomerId
export const toAddressId = (raw: string): AddressId => raw as AddressId
export const toAttributeId = (raw: string): AttributeId => raw as AttributeId
export const toNoteId = (raw: string): NoteId => raw as NoteId
export const toWaitlistEntryId = (raw: string): WaitlistEntryId => raw as WaitlistEntryId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

export type ContactMethod = 'email' | 'phone' | 'text'
export type TimeOfDay = 'morning' | 'afternoon' | 'evening' | 'any'

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * The Customer aggregate root.
 *
 * Customers are tombstoned, never removed, so tickets and invoices that
 * reference them keep resolving.
 *
 * @invariant At least one of `firstName`, `lastName`, `businessName` is set.
 * @invariant `referredById`, when set, points at a Customer of the same tenant.
 *            It is a weak reference: the referrer owns nothing.
 */
export interface Customer extends Tombstoned {
  readonly id: CustomerId
  readonly tenantId: TenantId
  readonly firstName?: string
  readonly lastName?: string
  readonly businessName?: string
  readonly email?: string
  readonly phone?: string
  readonly referredById?: CustomerId
  readonly preferredContactMethod?: ContactMethod
  readonly preferredTimeOfDay?: TimeOfDay
  readonly notes?: string
  readonly createdAt: Date
  readonly updatedAt: Date
}

/**
 * A service location owned by exactly one Customer.
 *
 * @invariant At most one Address per Customer has `isPrimary: true`. No database
 *            constraint guards this; writers clear the flag on siblings in the
 *            same transaction.
 */
export interface Address {
  readonly id: AddressId
  readonly tenantId: TenantId
  readonly customerId: CustomerId
  readonly label?: string
  readonly street: string
  readonly street2?: string
  readonly city: string
  readonly state: string
  readonly zip: string
  /** Gate codes, access instructions. */
  readonly notes?: string
  readonly isPrimary: boolean
  readonly createdAt: Date
  readonly updatedAt: Date
}

export type AttributeSource = 'manual' | 'llm_extracted'

/** JSON value stored in an attribute slot. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

/**
 * A key/value fact about a customer.
 *
 * @invariant One value per (customer, key); writes upsert.
 * @invariant `confidence` is only present for `llm_extracted` and lies in [0, 1].
 */
export interface Attribute {
  readonly id: AttributeId
  readonly tenantId: TenantId
  readonly customerId: CustomerId
  readonly key: string
  readonly value: JsonValue
  readonly sourceType: AttributeSource
  readonly sourceNoteId?: NoteId
  readonly confidence?: number
  readonly createdAt: Date
  readonly updatedAt: Date
}

export interface Note {
  readonly id: NoteId
  readonly tenantId: TenantId
  readonly customerId: CustomerId
  readonly ticketId?: TicketId
  readonly content: string
  /** Set once the extraction collaborator has consumed the note. */
  readonly processedAt?: Date
  readonly createdAt: Date
}

/** "Call me when you are near". One entry per customer. */
export interface WaitlistEntry {
  readonly id: WaitlistEntryId
  readonly tenantId: TenantId
  readonly customerId: CustomerId
  readonly nearCustomerId?: CustomerId
  readonly nearAddressId?: AddressId
  readonly preferredDates?: string
  readonly preferredTimeOfDay?: TimeOfDay
  readonly notes?: string
  readonly isActive: boolean
  readonly notifiedAt?: Date
  readonly createdAt: Date
  readonly updatedAt: Date
}

// ---------------------------------------------------------------------------
// Domain functions
// ---------------------------------------------------------------------------

/** Display name: business name wins, then "first last". */
export function customerDisplayName(
  customer: Pick<Customer, 'firstName' | 'lastName' | 'businessName'>,
): string {
  if (customer.businessName) return customer.businessName
  return [customer.firstName, customer.lastName].filter(Boolean).join(' ')
}

/**
 * Validates the fields every Customer must carry and returns a list of
 * human-readable error messages. An empty array means the input is valid.
 */
export function validateCustomerName(
  input: Pick<Customer, 'firstName' | 'lastName' | 'businessName'>,
): readonly string[] {
  const hasName = [input.firstName, input.lastName, input.businessName].some(
    (v) => v !== undefined && v.trim() !== '',
  )
  return hasName ? [] : ['one of firstName, lastName or businessName is required']
}

/**
 * Validates an Address and returns a list of human-readable error messages.
 * An empty array means the address is valid.
 */
export function validateAddress(
  addr: Pick<Address, 'street' | 'city' | 'state' | 'zip'>,
): readonly string[] {
  const errors: string[] = []
  if (addr.street.trim() === '') errors.push('street is required')
  if (addr.city.trim() === '') errors.push('city is required')
  if (addr.state.trim() === '') errors.push('state is required')
  if (addr.zip.trim() === '') errors.push('zip is required')
  return errors
}

/** Orders addresses primary first, then oldest first. */
export function sortAddresses(addresses: readonly Address[]): Address[] {
  return [...addresses].sort((a, b) => {
    if (a.isPrimary !== b.isPrimary) return a.isPrimary ? -1 : 1
    return a.createdAt.getTime() - b.createdAt.getTime()
  })
}

/**
 * Checks the attribute-source rules.
 *
 * @throws {ValidationError} when the key is blank, or confidence is out of range
 *         or supplied for a manual attribute.
 */
export function assertAttributeInput(input: {
  key: string
  sourceType: AttributeSource
  confidence?: number
}): void {
  if (input.key.trim() === '') {
    throw new ValidationError('attribute key is required')
  }
  if (input.confidence === undefined) return
  if (input.sourceType !== 'llm_extracted') {
    throw new ValidationError('confidence is only recorded for llm_extracted attributes')
  }
  if (!(input.confidence >= 0 && input.confidence <= 1)) {
    throw new ValidationError('confidence must be between 0 and 1')
  }
}
