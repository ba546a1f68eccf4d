import { isEligibleStatus, isPreferredStatus } from '@/lib/availability-policy'
import { getAvailability, type Caregiver } from '@/lib/caregiver'
import type { ShiftPickReason } from '@/lib/coverage/types'
import type { ShiftPeriod } from '@/lib/shift-types'

export const NO_ELIGIBLE_CAREGIVERS_REASON = 'no_eligible_caregivers' satisfies ShiftPickReason

export type PickCaregiverArgs = {
  caregivers: readonly Caregiver[]
  date: string
  shift: ShiftPeriod
  /** Hours accrued earlier in the current run, added on top of each caregiver's starting hours. */
  accruedHoursByCaregiver: ReadonlyMap<string, number>
}

export type PickCaregiverResult = {
  caregiver: Caregiver | null
  reason: ShiftPickReason
}

export function currentHours(caregiver: Caregiver, accruedHoursByCaregiver: ReadonlyMap<string, number>): number {
  return caregiver.hours + (accruedHoursByCaregiver.get(caregiver.id) ?? 0)
}

function pickLowestHours(
  candidates: readonly Caregiver[],
  accruedHoursByCaregiver: ReadonlyMap<string, number>
): Caregiver | null {
  let best: { caregiver: Caregiver; hours: number } | null = null

  for (const caregiver of candidates) {
    const hours = currentHours(caregiver, accruedHoursByCaregiver)
    // strict comparison keeps the earliest roster entry on ties
    if (!best || hours < best.hours) {
      best = { caregiver, hours }
    }
  }

  return best?.caregiver ?? null
}

/**
 * Picks one caregiver for a date/shift slot. Preferred caregivers win over
 * merely available ones; within a group the lowest current hours win.
 */
export function pickCaregiverForShift(args: PickCaregiverArgs): PickCaregiverResult {
  const eligible: Caregiver[] = []
  const preferred: Caregiver[] = []

  for (const caregiver of args.caregivers) {
    const status = getAvailability(caregiver, args.date, args.shift)
    if (!isEligibleStatus(status)) continue
    eligible.push(caregiver)
    if (isPreferredStatus(status)) preferred.push(caregiver)
  }

  const preferredPick = pickLowestHours(preferred, args.accruedHoursByCaregiver)
  if (preferredPick) {
    return { caregiver: preferredPick, reason: 'preferred' }
  }

  const availablePick = pickLowestHours(eligible, args.accruedHoursByCaregiver)
  if (availablePick) {
    return { caregiver: availablePick, reason: 'available' }
  }

  return { caregiver: null, reason: NO_ELIGIBLE_CAREGIVERS_REASON }
}
