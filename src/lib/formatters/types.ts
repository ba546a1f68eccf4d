import type { PayRecord } from '@/lib/pay-report'
import type { Schedule } from '@/lib/shift-types'

export interface ScheduleFormatter {
  render(schedule: Schedule, month: number, year: number): string
}

export interface PayReportFormatter {
  render(records: ReadonlyMap<string, PayRecord>): string
}
