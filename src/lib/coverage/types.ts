import type { Caregiver } from '@/lib/caregiver'
import type { Schedule, ShiftPeriod } from '@/lib/shift-types'

export type ShiftPickReason = 'preferred' | 'available' | 'no_eligible_caregivers'

export type ShiftAssignment = {
  date: string
  shift: ShiftPeriod
  caregiver_id: string | null
  caregiver_name: string | null
  pick_reason: ShiftPickReason
}

export type ScheduleRun = {
  month: number
  year: number
  schedule: Schedule
  assignments: ShiftAssignment[]
  /** Input roster with the hours accrued by this run; the input itself is not modified. */
  roster: Caregiver[]
}
