// ---------------------------------------------------------------------------
// Shared primitives used across all bounded contexts.
// Nothing in this file may import from a sibling context.
// ---------------------------------------------------------------------------

import { ValidationError } from './errors'

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. TicketId for InvoiceId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Money
// ---------------------------------------------------------------------------

/**
 * An amount in the smallest currency unit (cents). Always an integer.
 * Pricing code never touches floating-point amounts.
 */
export type Cents = number

/** Tax or discount rate in basis points (1/100 of a percent). 825 = 8.25%. */
export type BasisPoints = number

/**
 * Asserts that `value` is a non-negative safe integer amount of cents.
 *
 * @throws {ValidationError} naming `field` when the value is fractional, negative or unsafe.
 */
export function assertCents(value: number, field: string): Cents {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer number of cents`)
  }
  return value
}

/** Asserts a basis-point rate in [0, 10000]. */
export function assertBasisPoints(value: number, field: string): BasisPoints {
  if (!Number.isInteger(value) || value < 0 || value > 10_000) {
    throw new ValidationError(`${field} must be an integer between 0 and 10000 basis points`)
  }
  return value
}

/** Asserts a quantity: a positive integer. */
export function assertQuantity(value: number, field = 'quantity'): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`)
  }
  return value
}

/**
 * Integer division rounding half away from zero for non-negative operands:
 * `roundHalfUpDiv(12375, 10)` is 1238.
 */
export function roundHalfUpDiv(numerator: number, denominator: number): number {
  if (!Number.isSafeInteger(numerator) || !Number.isSafeInteger(denominator) || denominator <= 0) {
    throw new ValidationError('roundHalfUpDiv requires safe integers and a positive denominator')
  }
  const quotient = Math.floor(numerator / denominator)
  const remainder = numerator - quotient * denominator
  return remainder * 2 >= denominator ? quotient + 1 : quotient
}

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

/** A clock is injected wherever "now" matters so tests can pin it. */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()

/**
 * A half-open time interval [start, end).
 *
 * @invariant `end` must be strictly after `start`.
 */
export interface DateRange {
  readonly start: Date
  readonly end: Date
}

/** Returns true when two DateRange windows overlap. */
export function dateRangesOverlap(a: DateRange, b: DateRange): boolean {
  return a.start < b.end && b.start < a.end
}

// ---------------------------------------------------------------------------
// Change records
// ---------------------------------------------------------------------------

/** Old/new pairs keyed by field name, as written to the audit trail. */
export type FieldChanges = Record<string, { readonly old: unknown; readonly new: unknown }>

// ---------------------------------------------------------------------------
// Soft delete
// ---------------------------------------------------------------------------

/** Rows that are tombstoned rather than removed. */
export interface Tombstoned {
  readonly deletedAt?: Date
}

export function isTombstoned(row: Tombstoned): boolean {
  return row.deletedAt !== undefined
}
