import { ValidationError } from '@/lib/errors'
import { DEFAULT_AVAILABILITY_STATUS } from '@/lib/scheduling-constants'
import { SHIFT_PERIODS, type AvailabilityStatus, type ShiftPeriod } from '@/lib/shift-types'

export const AVAILABILITY_STATUSES: readonly AvailabilityStatus[] = ['preferred', 'available', 'unavailable']

export type AvailabilityEntries = ReadonlyMap<string, AvailabilityStatus>

export function isAvailabilityStatus(value: unknown): value is AvailabilityStatus {
  return AVAILABILITY_STATUSES.some((status) => status === value)
}

export function isShiftPeriod(value: unknown): value is ShiftPeriod {
  return SHIFT_PERIODS.some((shift) => shift === value)
}

export function parseAvailabilityStatus(value: string): AvailabilityStatus {
  const normalized = value.trim().toLowerCase()
  if (isAvailabilityStatus(normalized)) return normalized
  throw new ValidationError(
    'invalid_availability_status',
    'status',
    `Availability status must be one of ${AVAILABILITY_STATUSES.join(', ')}, got "${value}".`
  )
}

export function parseShiftPeriod(value: string): ShiftPeriod {
  const normalized = value.trim().toUpperCase()
  if (isShiftPeriod(normalized)) return normalized
  throw new ValidationError('invalid_shift', 'shift', `Shift must be AM or PM, got "${value}".`)
}

export function availabilityKey(date: string, shift: ShiftPeriod): string {
  return `${date}:${shift}`
}

/** Total lookup: any (date, shift) without an entry resolves to the default status. */
export function resolveAvailability(
  entries: AvailabilityEntries,
  date: string,
  shift: ShiftPeriod
): AvailabilityStatus {
  return entries.get(availabilityKey(date, shift)) ?? DEFAULT_AVAILABILITY_STATUS
}

export function isEligibleStatus(status: AvailabilityStatus): boolean {
  return status !== 'unavailable'
}

export function isPreferredStatus(status: AvailabilityStatus): boolean {
  return status === 'preferred'
}
