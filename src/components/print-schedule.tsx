import { countGapDays, type ScheduleRow } from '@/lib/coverage/selectors'
import { NO_COVERAGE_LABEL, SHIFT_LENGTH_HOURS } from '@/lib/scheduling-constants'

type PrintScheduleProps = {
  monthLabel: string
  rows: ScheduleRow[]
}

function getWeekBoundaryClass(row: ScheduleRow): string | undefined {
  return row.weekday === 'Sat' ? 'print-week-end' : undefined
}

function ShiftCell({ value }: { value: string }) {
  return <td className={value === NO_COVERAGE_LABEL ? 'print-gap' : undefined}>{value}</td>
}

export function PrintSchedule({ monthLabel, rows }: PrintScheduleProps) {
  const gapDays = countGapDays(rows)

  return (
    <section className="print-shift-sheet">
      <header className="print-header">
        <h1>Care Schedule</h1>
        <p>{monthLabel}</p>
      </header>
      <table className="print-table">
        <thead>
          <tr>
            <th>Date</th>
            <th>Day</th>
            <th>AM</th>
            <th>PM</th>
          </tr>
        </thead>
        <tbody>
          {rows.map((row) => (
            <tr key={row.isoDate} className={getWeekBoundaryClass(row)}>
              <td>{row.isoDate}</td>
              <td>{row.weekday}</td>
              <ShiftCell value={row.am} />
              <ShiftCell value={row.pm} />
            </tr>
          ))}
        </tbody>
      </table>
      <p className="print-legend">
        {`Days with coverage gaps: ${gapDays} | AM and PM shifts, ${SHIFT_LENGTH_HOURS} hours each`}
      </p>
    </section>
  )
}
