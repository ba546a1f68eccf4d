import { formatCurrency, summarizePayTotals, type PayRecord } from '@/lib/pay-report'

type PayReportTableProps = {
  records: PayRecord[]
}

export function PayReportTable({ records }: PayReportTableProps) {
  const totals = summarizePayTotals(records)

  return (
    <section className="print-shift-sheet">
      <header className="print-header">
        <h1>Pay Report</h1>
      </header>
      {records.length === 0 ? (
        <p>No caregivers on the roster.</p>
      ) : (
        <table className="print-table">
          <thead>
            <tr>
              <th>Caregiver</th>
              <th>Hours</th>
              <th>Rate</th>
              <th>Weekly Gross</th>
              <th>Monthly Gross</th>
            </tr>
          </thead>
          <tbody>
            {records.map((record) => (
              <tr key={record.caregiver_id}>
                <td>{record.name}</td>
                <td>{String(record.hours)}</td>
                <td>{formatCurrency(record.rate)}</td>
                <td>{formatCurrency(record.weekly_gross)}</td>
                <td>{formatCurrency(record.monthly_gross)}</td>
              </tr>
            ))}
            <tr className="print-total-row">
              <td>Total</td>
              <td />
              <td />
              <td>{formatCurrency(totals.total_weekly)}</td>
              <td>{formatCurrency(totals.total_monthly)}</td>
            </tr>
          </tbody>
        </table>
      )}
    </section>
  )
}
