import type { Caregiver } from '@/lib/caregiver'
import { WEEKS_PER_PAY_MONTH } from '@/lib/scheduling-constants'

export type PayRecord = {
  caregiver_id: string
  name: string
  hours: number
  rate: number
  weekly_gross: number
  monthly_gross: number
}

export type PayTotals = {
  total_weekly: number
  total_monthly: number
}

export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100
}

export function formatCurrency(value: number): string {
  return `$${value.toFixed(2)}`
}

/**
 * Gross pay per caregiver, keyed by caregiver id in roster order. "Weekly"
 * treats all accrued hours as one week; "monthly" is four of those. Values are
 * exact; rounding to cents happens in totals and display.
 */
export function calculatePay(roster: readonly Caregiver[]): Map<string, PayRecord> {
  const records = new Map<string, PayRecord>()

  for (const caregiver of roster) {
    const weeklyGross = caregiver.hours * caregiver.pay_rate
    records.set(caregiver.id, {
      caregiver_id: caregiver.id,
      name: caregiver.name,
      hours: caregiver.hours,
      rate: caregiver.pay_rate,
      weekly_gross: weeklyGross,
      monthly_gross: weeklyGross * WEEKS_PER_PAY_MONTH,
    })
  }

  return records
}

export function summarizePayTotals(records: Iterable<PayRecord>): PayTotals {
  let totalWeekly = 0
  let totalMonthly = 0
  for (const record of records) {
    totalWeekly += record.weekly_gross
    totalMonthly += record.monthly_gross
  }
  return {
    total_weekly: roundToCents(totalWeekly),
    total_monthly: roundToCents(totalMonthly),
  }
}
