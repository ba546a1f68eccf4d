import { buildScheduleRows } from '@/lib/coverage/selectors'
import type { PayReportFormatter, ScheduleFormatter } from '@/lib/formatters/types'
import { formatCurrency, summarizePayTotals } from '@/lib/pay-report'

export const textScheduleFormatter: ScheduleFormatter = {
  render(schedule, month, year) {
    const lines = buildScheduleRows(schedule, month, year).map(
      (row) => `${row.isoDate}: AM: ${row.am}, PM: ${row.pm}`
    )
    return ['Care Schedule:', '', ...lines].join('\n')
  },
}

export const textPayReportFormatter: PayReportFormatter = {
  render(records) {
    const rows = Array.from(records.values())
    const totals = summarizePayTotals(rows)
    const lines = rows.map(
      (record) =>
        `${record.name}: Weekly: ${formatCurrency(record.weekly_gross)}, Monthly: ${formatCurrency(record.monthly_gross)}`
    )
    return [
      'Pay Report:',
      '',
      ...lines,
      '',
      `Total Weekly Pay: ${formatCurrency(totals.total_weekly)}`,
      `Total Monthly Pay: ${formatCurrency(totals.total_monthly)}`,
    ].join('\n')
  },
}
