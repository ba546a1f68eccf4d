import { ValidationError } from '@/lib/errors'
import { MAX_SCHEDULE_YEAR, MIN_SCHEDULE_YEAR } from '@/lib/scheduling-constants'

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export function dateFromKey(value: string): Date {
  const [year, month, day] = value.split('-').map(Number)
  return new Date(year, month - 1, day)
}

export function toIsoDate(date: Date): string {
  const y = date.getFullYear()
  const m = String(date.getMonth() + 1).padStart(2, '0')
  const d = String(date.getDate()).padStart(2, '0')
  return `${y}-${m}-${d}`
}

export function isIsoDateKey(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false
  const parsed = dateFromKey(value)
  if (Number.isNaN(parsed.getTime())) return false
  // rejects rollover such as 2024-02-30
  return toIsoDate(parsed) === value
}

export function dateRange(startDate: string, endDate: string): string[] {
  const start = new Date(`${startDate}T00:00:00`)
  const end = new Date(`${endDate}T00:00:00`)
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || start > end) return []
  const out: string[] = []
  const cursor = new Date(start)
  while (cursor <= end) {
    out.push(toIsoDate(cursor))
    cursor.setDate(cursor.getDate() + 1)
  }
  return out
}

export function validateScheduleMonth(month: number, year: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError('invalid_month', 'month', `Month must be an integer from 1 to 12, got ${month}.`)
  }
  // ISO date keys carry four-digit years
  if (!Number.isInteger(year) || year < MIN_SCHEDULE_YEAR || year > MAX_SCHEDULE_YEAR) {
    throw new ValidationError(
      'invalid_year',
      'year',
      `Year must be an integer from ${MIN_SCHEDULE_YEAR} to ${MAX_SCHEDULE_YEAR}, got ${year}.`
    )
  }
}

export function daysInMonth(year: number, month: number): number {
  // day 0 of the following month is the last day of this one
  return new Date(year, month, 0).getDate()
}

/** Every real day of the month as ISO keys, first to last. */
export function monthDateKeys(year: number, month: number): string[] {
  const start = toIsoDate(new Date(year, month - 1, 1))
  const end = toIsoDate(new Date(year, month - 1, daysInMonth(year, month)))
  return dateRange(start, end)
}

export function formatMonthLabel(year: number, month: number): string {
  const parsed = new Date(year, month - 1, 1)
  if (Number.isNaN(parsed.getTime())) return `${year}-${String(month).padStart(2, '0')}`
  return parsed.toLocaleDateString('en-US', { month: 'long', year: 'numeric' })
}

export function formatWeekdayShort(value: string): string {
  const parsed = new Date(`${value}T00:00:00`)
  if (Number.isNaN(parsed.getTime())) return '-'
  return parsed.toLocaleDateString('en-US', { weekday: 'short' })
}
