import { formatWeekdayShort, monthDateKeys, validateScheduleMonth } from '@/lib/calendar-utils'
import { NO_COVERAGE_LABEL } from '@/lib/scheduling-constants'
import type { Schedule } from '@/lib/shift-types'

export type ScheduleRow = {
  isoDate: string
  dayNumber: number
  weekday: string
  am: string
  pm: string
  hasGap: boolean
}

/**
 * Maps a schedule onto one row per date. Every day of the month is present;
 * days missing from the schedule show "No coverage" for both shifts. Dates
 * outside the month that the schedule carries are kept, in date order.
 */
export function buildScheduleRows(schedule: Schedule, month: number, year: number): ScheduleRow[] {
  validateScheduleMonth(month, year)

  const dates = new Set<string>(monthDateKeys(year, month))
  for (const date of Object.keys(schedule)) dates.add(date)

  return Array.from(dates)
    .sort((a, b) => a.localeCompare(b))
    .map((isoDate) => {
      const day = schedule[isoDate]
      const am = day?.AM || NO_COVERAGE_LABEL
      const pm = day?.PM || NO_COVERAGE_LABEL
      return {
        isoDate,
        dayNumber: Number(isoDate.slice(8, 10)),
        weekday: formatWeekdayShort(isoDate),
        am,
        pm,
        hasGap: am === NO_COVERAGE_LABEL || pm === NO_COVERAGE_LABEL,
      }
    })
}

export function countGapDays(rows: readonly ScheduleRow[]): number {
  return rows.filter((row) => row.hasGap).length
}
