import type { ShiftAssignment } from '@/lib/coverage/types'
import type { ShiftPeriod } from '@/lib/shift-types'

export type CoverageSummary = {
  totalSlots: number
  coveredSlots: number
  uncoveredSlots: number
  uncoveredSlotKeys: string[]
  shiftCountByCaregiver: Map<string, number>
}

export function coverageSlotKey(date: string, shift: ShiftPeriod): string {
  return `${date}:${shift}`
}

export function summarizeCoverage(assignments: readonly ShiftAssignment[]): CoverageSummary {
  const uncoveredSlotKeys: string[] = []
  const shiftCountByCaregiver = new Map<string, number>()

  for (const assignment of assignments) {
    if (assignment.caregiver_id === null) {
      uncoveredSlotKeys.push(coverageSlotKey(assignment.date, assignment.shift))
      continue
    }
    shiftCountByCaregiver.set(
      assignment.caregiver_id,
      (shiftCountByCaregiver.get(assignment.caregiver_id) ?? 0) + 1
    )
  }

  return {
    totalSlots: assignments.length,
    coveredSlots: assignments.length - uncoveredSlotKeys.length,
    uncoveredSlots: uncoveredSlotKeys.length,
    uncoveredSlotKeys,
    shiftCountByCaregiver,
  }
}
