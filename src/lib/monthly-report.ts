import path from 'node:path'

import type { Caregiver } from '@/lib/caregiver'
import { createSchedule } from '@/lib/coverage/generate-schedule'
import type { ScheduleRun } from '@/lib/coverage/types'
import { htmlPayReportFormatter, htmlScheduleFormatter } from '@/lib/formatters/html-formatter'
import { textPayReportFormatter, textScheduleFormatter } from '@/lib/formatters/text-formatter'
import type { PayReportFormatter, ScheduleFormatter } from '@/lib/formatters/types'
import { calculatePay, type PayRecord } from '@/lib/pay-report'
import { writeReport } from '@/lib/persistence/report-writer'

export const SCHEDULE_REPORT_FILE = 'schedule.html'
export const PAY_REPORT_FILE = 'pay_report.html'

export type MonthlyReportFormatters = {
  schedule: ScheduleFormatter
  payReport: PayReportFormatter
}

export type MonthlyReportParams = {
  roster: readonly Caregiver[]
  month: number
  year: number
  outputDir: string
  fileFormatters?: MonthlyReportFormatters
  consoleFormatters?: MonthlyReportFormatters
  write?: (filePath: string, contents: string) => Promise<void>
}

export type MonthlyReport = {
  run: ScheduleRun
  payRecords: Map<string, PayRecord>
  scheduleText: string
  payReportText: string
  schedulePath: string
  payReportPath: string
}

/** Schedules the month, prices the accrued hours and writes both reports. */
export async function buildMonthlyReport(params: MonthlyReportParams): Promise<MonthlyReport> {
  const fileFormatters = params.fileFormatters ?? {
    schedule: htmlScheduleFormatter,
    payReport: htmlPayReportFormatter,
  }
  const consoleFormatters = params.consoleFormatters ?? {
    schedule: textScheduleFormatter,
    payReport: textPayReportFormatter,
  }
  const write = params.write ?? writeReport

  const run = createSchedule(params.roster, params.month, params.year)
  const payRecords = calculatePay(run.roster)

  const schedulePath = path.join(params.outputDir, SCHEDULE_REPORT_FILE)
  const payReportPath = path.join(params.outputDir, PAY_REPORT_FILE)
  await write(schedulePath, fileFormatters.schedule.render(run.schedule, run.month, run.year))
  await write(payReportPath, fileFormatters.payReport.render(payRecords))

  return {
    run,
    payRecords,
    scheduleText: consoleFormatters.schedule.render(run.schedule, run.month, run.year),
    payReportText: consoleFormatters.payReport.render(payRecords),
    schedulePath,
    payReportPath,
  }
}
