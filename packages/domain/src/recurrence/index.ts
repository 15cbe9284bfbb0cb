// ---------------------------------------------------------------------------
// Recurrence bounded context
// Templates that generate tickets on a cadence, and the calendar arithmetic
// that decides when. All times are UTC.
// ---------------------------------------------------------------------------

import type { Brand, Cents } from '../shared/types'
import { ValidationError } from '../shared/errors'
import type { TenantId } from '../tenant/index'
import type { AddressId, CustomerId } from '../customer/index'
import type { ServiceId } from '../catalog/index'

// ---------------------------------------------------------------------------
// Branded ID types
// ---------------------------------------------------------------------------

export type RecurringTemplateId = Brand<string, 'RecurringTemplateId'>

export const toRecurringTemplateId = (raw: string): RecurringTemplateId => raw as RecurringTemplateId

// ---------------------------------------------------------------------------
// Value objects
// ---------------------------------------------------------------------------

export type IntervalType = 'days' | 'weeks' | 'months'

export const INTERVAL_TYPES: readonly IntervalType[] = ['days', 'weeks', 'months'] as const

/**
 * The cadence part of a template.
 *
 * `preferredDayOfWeek` uses 0 = Sunday … 6 = Saturday and only applies to
 * weekly templates. `preferredTime` is "HH:MM" in UTC. `anchorDay` is the day
 * of month monthly templates aim for; clamping into a short month does not
 * move it.
 */
export interface Cadence {
  readonly intervalType: IntervalType
  readonly intervalValue: number
  readonly preferredDayOfWeek?: number
  readonly preferredTime?: string
  readonly anchorDay?: number
}

/** A service the template puts on every generated ticket. */
export interface TemplateService {
  readonly serviceId: ServiceId
  readonly quantity?: number
  readonly customPriceCents?: Cents
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * A rule that periodically generates tickets. Generated tickets are not owned:
 * they outlive deactivation.
 *
 * @invariant `nextOccurrenceAt` only moves forward.
 * @invariant After a sweep at `asOf`, `nextOccurrenceAt > asOf`.
 */
export interface RecurringTemplate extends Cadence {
  readonly id: RecurringTemplateId
  readonly tenantId: TenantId
  readonly customerId: CustomerId
  readonly addressId: AddressId
  readonly estimatedDurationMinutes?: number
  readonly notes?: string
  readonly isActive: boolean
  readonly lastGeneratedAt?: Date
  readonly nextOccurrenceAt?: Date
  readonly services: readonly TemplateService[]
  readonly createdAt: Date
  readonly updatedAt: Date
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/

/**
 * Parses "HH:MM" (24-hour).
 *
 * @throws {ValidationError} for anything else.
 */
export function parsePreferredTime(raw: string): { hours: number; minutes: number } {
  const match = TIME_PATTERN.exec(raw)
  if (!match) {
    throw new ValidationError(`preferredTime must be HH:MM, got "${raw}"`)
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) }
}

/** @throws {ValidationError} naming the first bad field. */
export function assertCadence(cadence: Cadence): void {
  if (!Number.isSafeInteger(cadence.intervalValue) || cadence.intervalValue < 1) {
    throw new ValidationError('intervalValue must be a positive integer')
  }
  const dow = cadence.preferredDayOfWeek
  if (dow !== undefined && !(Number.isInteger(dow) && dow >= 0 && dow <= 6)) {
    throw new ValidationError('preferredDayOfWeek must be between 0 (Sunday) and 6 (Saturday)')
  }
  const anchor = cadence.anchorDay
  if (anchor !== undefined && !(Number.isInteger(anchor) && anchor >= 1 && anchor <= 31)) {
    throw new ValidationError('anchorDay must be between 1 and 31')
  }
  if (cadence.preferredTime !== undefined) parsePreferredTime(cadence.preferredTime)
}

// ---------------------------------------------------------------------------
// Calendar arithmetic
// ---------------------------------------------------------------------------

const DAY_MS = 86_400_000

export function addDaysUtc(at: Date, days: number): Date {
  return new Date(at.getTime() + days * DAY_MS)
}

/** Number of days in a month; `month` is 0-based. */
export function daysInMonthUtc(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate()
}

/**
 * Adds whole months, landing on `anchorDay` or the month's last day when the
 * anchor does not exist there. Jan 31 + 1 → Feb 28 (or 29); with anchor 31,
 * Feb 28 + 1 → Mar 31. Time of day is kept.
 */
export function addMonthsClamped(at: Date, months: number, anchorDay: number = at.getUTCDate()): Date {
  const total = at.getUTCMonth() + months
  const year = at.getUTCFullYear() + Math.floor(total / 12)
  const month = ((total % 12) + 12) % 12
  const day = Math.min(anchorDay, daysInMonthUtc(year, month))
  return new Date(
    Date.UTC(year, month, day, at.getUTCHours(), at.getUTCMinutes(), at.getUTCSeconds(), at.getUTCMilliseconds()),
  )
}

/** Moves forward 0–6 days until the weekday matches. */
export function snapForwardToWeekday(at: Date, dayOfWeek: number): Date {
  const delta = (dayOfWeek - at.getUTCDay() + 7) % 7
  return delta === 0 ? at : addDaysUtc(at, delta)
}

/** Replaces the time of day, keeping the UTC date. */
export function applyPreferredTime(at: Date, preferredTime: string): Date {
  const { hours, minutes } = parsePreferredTime(preferredTime)
  return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate(), hours, minutes))
}

/**
 * Aligns a template's first occurrence with its cadence: weekly templates
 * snap forward to the preferred weekday, and the preferred time replaces the
 * time of day.
 */
export function alignFirstOccurrence(start: Date, cadence: Cadence): Date {
  let at = start
  if (cadence.intervalType === 'weeks' && cadence.preferredDayOfWeek !== undefined) {
    at = snapForwardToWeekday(at, cadence.preferredDayOfWeek)
  }
  return cadence.preferredTime !== undefined ? applyPreferredTime(at, cadence.preferredTime) : at
}

/**
 * One cadence step after `current`. Always strictly later than `current`:
 * every interval moves the date by at least one calendar day and the
 * preferred time only changes the time of day.
 */
export function computeNextOccurrence(current: Date, cadence: Cadence): Date {
  const next = stepCadence(current, cadence)
  return cadence.preferredTime !== undefined ? applyPreferredTime(next, cadence.preferredTime) : next
}

function stepCadence(current: Date, cadence: Cadence): Date {
  switch (cadence.intervalType) {
    case 'days':
      return addDaysUtc(current, cadence.intervalValue)
    case 'weeks': {
      const raw = addDaysUtc(current, cadence.intervalValue * 7)
      return cadence.preferredDayOfWeek !== undefined ? snapForwardToWeekday(raw, cadence.preferredDayOfWeek) : raw
    }
    case 'months':
      return addMonthsClamped(current, cadence.intervalValue, cadence.anchorDay ?? current.getUTCDate())
  }
}

/**
 * Steps along the cadence grid from `current` until strictly after `asOf`.
 * Skipped periods produce nothing; this is the catch-up rule.
 */
export function nextOccurrenceAfter(current: Date, cadence: Cadence, asOf: Date): Date {
  assertCadence(cadence)
  let next = computeNextOccurrence(current, cadence)
  while (next.getTime() <= asOf.getTime()) {
    next = computeNextOccurrence(next, cadence)
  }
  return next
}

/** What one sweep does for one template. */
export interface OccurrencePlan {
  /** When the generated ticket is scheduled: the overdue occurrence itself. */
  readonly occurrenceAt: Date
  /** The value the template's next occurrence is advanced to. */
  readonly nextOccurrenceAt: Date
}

/** Returns true when the sweep at `asOf` should generate from this template. */
export function isDue(
  template: Pick<RecurringTemplate, 'isActive' | 'nextOccurrenceAt'>,
  asOf: Date,
): boolean {
  return (
    template.isActive &&
    template.nextOccurrenceAt !== undefined &&
    template.nextOccurrenceAt.getTime() <= asOf.getTime()
  )
}

/**
 * Plans one generation for a due template: exactly one ticket at the overdue
 * occurrence, however many periods were missed, then the next occurrence
 * strictly after `asOf`. Returns `undefined` when nothing is due.
 */
export function planOccurrence(template: RecurringTemplate, asOf: Date): OccurrencePlan | undefined {
  if (!isDue(template, asOf) || template.nextOccurrenceAt === undefined) return undefined
  const occurrenceAt = template.nextOccurrenceAt
  return { occurrenceAt, nextOccurrenceAt: nextOccurrenceAfter(occurrenceAt, template, asOf) }
}
