import { randomUUID } from 'node:crypto'

import {
  availabilityKey,
  parseAvailabilityStatus,
  parseShiftPeriod,
  resolveAvailability,
} from '@/lib/availability-policy'
import { isIsoDateKey } from '@/lib/calendar-utils'
import { ValidationError } from '@/lib/errors'
import { DEFAULT_PAY_RATE } from '@/lib/scheduling-constants'
import type { AvailabilityStatus, ShiftPeriod } from '@/lib/shift-types'

/**
 * A caregiver on the roster. Records are immutable: availability changes and
 * hour accrual return a new record and leave the original untouched.
 */
export type Caregiver = {
  readonly id: string
  readonly name: string
  readonly phone: string
  readonly email: string
  readonly pay_rate: number
  readonly hours: number
  readonly availability: ReadonlyMap<string, AvailabilityStatus>
}

export type CreateCaregiverInput = {
  id?: string
  name: string
  phone: string
  email: string
  payRate?: number
  hours?: number
}

function requireText(value: string, code: 'invalid_name' | 'invalid_phone', field: string): string {
  const trimmed = value.trim()
  if (!trimmed) {
    throw new ValidationError(code, field, `Caregiver ${field} must not be empty.`)
  }
  return trimmed
}

function requireEmail(value: string): string {
  const trimmed = value.trim()
  if (trimmed.split('@').length !== 2) {
    throw new ValidationError('invalid_email', 'email', `Email must contain exactly one "@", got "${value}".`)
  }
  return trimmed
}

function requireNonNegative(value: number, code: 'invalid_pay_rate' | 'invalid_hours', field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(code, field, `Caregiver ${field} must be a non-negative number, got ${value}.`)
  }
  return value
}

function requireDateKey(value: string): string {
  if (!isIsoDateKey(value)) {
    throw new ValidationError('invalid_date', 'date', `Date must be a calendar date in YYYY-MM-DD form, got "${value}".`)
  }
  return value
}

export function createCaregiver(input: CreateCaregiverInput): Caregiver {
  const id = input.id === undefined ? randomUUID() : input.id.trim()
  if (!id) {
    throw new ValidationError('invalid_id', 'id', 'Caregiver id must not be empty.')
  }

  return {
    id,
    name: requireText(input.name, 'invalid_name', 'name'),
    phone: requireText(input.phone, 'invalid_phone', 'phone'),
    email: requireEmail(input.email),
    pay_rate: requireNonNegative(input.payRate ?? DEFAULT_PAY_RATE, 'invalid_pay_rate', 'pay_rate'),
    hours: requireNonNegative(input.hours ?? 0, 'invalid_hours', 'hours'),
    availability: new Map(),
  }
}

export function getAvailability(caregiver: Caregiver, date: string, shift: ShiftPeriod): AvailabilityStatus {
  return resolveAvailability(caregiver.availability, date, shift)
}

export function setAvailability(
  caregiver: Caregiver,
  date: string,
  shift: string,
  status: string
): Caregiver {
  return setAvailabilityForDates(caregiver, [date], shift, status)
}

/** Applies one status to the same shift on several dates; all inputs are checked before anything changes. */
export function setAvailabilityForDates(
  caregiver: Caregiver,
  dates: readonly string[],
  shift: string,
  status: string
): Caregiver {
  const parsedStatus = parseAvailabilityStatus(status)
  const parsedShift = parseShiftPeriod(shift)
  const dateKeys = dates.map(requireDateKey)

  const availability = new Map(caregiver.availability)
  for (const date of dateKeys) {
    availability.set(availabilityKey(date, parsedShift), parsedStatus)
  }
  return { ...caregiver, availability }
}

export function addHours(caregiver: Caregiver, amount: number): Caregiver {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ValidationError('invalid_hours', 'amount', `Hours to add must be a non-negative number, got ${amount}.`)
  }
  return { ...caregiver, hours: caregiver.hours + amount }
}

export function assertUniqueCaregiverIds(roster: readonly Caregiver[]): void {
  const seen = new Set<string>()
  for (const caregiver of roster) {
    if (seen.has(caregiver.id)) {
      throw new ValidationError(
        'duplicate_caregiver_id',
        'id',
        `Caregiver id "${caregiver.id}" appears more than once in the roster.`
      )
    }
    seen.add(caregiver.id)
  }
}
