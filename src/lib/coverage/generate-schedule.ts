import { validateScheduleMonth, monthDateKeys } from '@/lib/calendar-utils'
import { addHours, assertUniqueCaregiverIds, type Caregiver } from '@/lib/caregiver'
import { summarizeCoverage } from '@/lib/coverage/coverage-summary'
import { pickCaregiverForShift } from '@/lib/coverage/generator-slot'
import type { ScheduleRun, ShiftAssignment } from '@/lib/coverage/types'
import { logServerEvent } from '@/lib/observability/logger'
import { NO_COVERAGE_LABEL, SHIFT_LENGTH_HOURS } from '@/lib/scheduling-constants'
import { SHIFT_PERIODS, type DayAssignment, type Schedule } from '@/lib/shift-types'

const MAX_LOGGED_GAP_KEYS = 10

/**
 * Builds a month of AM/PM assignments from the roster. Greedy: each slot is
 * filled in date order, AM before PM, and hours accrued by earlier picks count
 * toward later ones. The input roster is left as is; the returned roster
 * carries the accrued hours.
 */
export function createSchedule(roster: readonly Caregiver[], month: number, year: number): ScheduleRun {
  validateScheduleMonth(month, year)
  assertUniqueCaregiverIds(roster)

  const accruedHoursByCaregiver = new Map<string, number>()
  const schedule: Schedule = {}
  const assignments: ShiftAssignment[] = []

  for (const date of monthDateKeys(year, month)) {
    const day: DayAssignment = { AM: NO_COVERAGE_LABEL, PM: NO_COVERAGE_LABEL }

    for (const shift of SHIFT_PERIODS) {
      const pick = pickCaregiverForShift({
        caregivers: roster,
        date,
        shift,
        accruedHoursByCaregiver,
      })

      if (pick.caregiver) {
        const caregiverId = pick.caregiver.id
        accruedHoursByCaregiver.set(
          caregiverId,
          (accruedHoursByCaregiver.get(caregiverId) ?? 0) + SHIFT_LENGTH_HOURS
        )
        day[shift] = pick.caregiver.name
      }

      assignments.push({
        date,
        shift,
        caregiver_id: pick.caregiver?.id ?? null,
        caregiver_name: pick.caregiver?.name ?? null,
        pick_reason: pick.reason,
      })
    }

    schedule[date] = day
  }

  const updatedRoster = roster.map((caregiver) => {
    const accrued = accruedHoursByCaregiver.get(caregiver.id)
    return accrued === undefined ? caregiver : addHours(caregiver, accrued)
  })

  const coverage = summarizeCoverage(assignments)
  logServerEvent('info', {
    event: 'schedule_generated',
    month,
    year,
    caregiver_count: roster.length,
    covered_slots: coverage.coveredSlots,
    uncovered_slots: coverage.uncoveredSlots,
  })
  if (coverage.uncoveredSlots > 0) {
    logServerEvent('warn', {
      event: 'schedule_coverage_gaps',
      month,
      year,
      uncovered_slots: coverage.uncoveredSlots,
      slot_keys: coverage.uncoveredSlotKeys.slice(0, MAX_LOGGED_GAP_KEYS),
    })
  }

  return { month, year, schedule, assignments, roster: updatedRoster }
}
