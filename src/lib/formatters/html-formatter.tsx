import type { ReactElement } from 'react'
import { renderToStaticMarkup } from 'react-dom/server'

import { PayReportTable } from '@/components/pay-report-table'
import { PrintSchedule } from '@/components/print-schedule'
import { formatMonthLabel } from '@/lib/calendar-utils'
import { buildScheduleRows } from '@/lib/coverage/selectors'
import type { PayReportFormatter, ScheduleFormatter } from '@/lib/formatters/types'

const REPORT_STYLES = [
  'body { font-family: Arial, Helvetica, sans-serif; margin: 24px; }',
  '.print-table { border-collapse: collapse; }',
  '.print-table th, .print-table td { border: 1px solid #999; padding: 4px 8px; }',
  '.print-week-end td { border-bottom: 2px solid #333; }',
  '.print-gap { color: #b00020; font-weight: bold; }',
  '.print-total-row td { font-weight: bold; }',
].join('\n')

function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
}

/** Wraps rendered body markup in a standalone HTML document. */
export function renderHtmlDocument(title: string, body: ReactElement): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${REPORT_STYLES}</style>`,
    '</head>',
    `<body>${renderToStaticMarkup(body)}</body>`,
    '</html>',
    '',
  ].join('\n')
}

export const htmlScheduleFormatter: ScheduleFormatter = {
  render(schedule, month, year) {
    const monthLabel = formatMonthLabel(year, month)
    const rows = buildScheduleRows(schedule, month, year)
    return renderHtmlDocument(`Care Schedule - ${monthLabel}`, <PrintSchedule monthLabel={monthLabel} rows={rows} />)
  },
}

export const htmlPayReportFormatter: PayReportFormatter = {
  render(records) {
    return renderHtmlDocument('Pay Report', <PayReportTable records={Array.from(records.values())} />)
  },
}
