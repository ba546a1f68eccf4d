import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { buildMonthlyReport } from '@/lib/monthly-report'
import { buildSampleRoster } from '@/lib/sample-roster'

describe('buildMonthlyReport', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('rotates the sample roster evenly and prices the accrued hours', async () => {
    const write = vi.fn(async () => undefined)

    const report = await buildMonthlyReport({
      roster: buildSampleRoster(12, 2024),
      month: 12,
      year: 2024,
      outputDir: 'out',
      write,
    })

    expect(report.run.schedule['2024-12-01']).toEqual({ AM: 'Alice Johnson', PM: 'Bob Smith' })
    expect(report.run.schedule['2024-12-02']).toEqual({ AM: 'Carol Lee', PM: 'David Brown' })
    expect(report.run.schedule['2024-12-31']).toEqual({ AM: 'Emma Wilson', PM: 'Frank Green' })
    expect(report.run.roster.map((row) => row.hours)).toEqual([48, 48, 48, 48, 48, 48, 42, 42])

    expect(report.payRecords.get('cg-1')).toMatchObject({ weekly_gross: 960, monthly_gross: 3840 })
    expect(report.payReportText.split('\n').at(-2)).toBe('Total Weekly Pay: $7440.00')
    expect(report.payReportText.split('\n').at(-1)).toBe('Total Monthly Pay: $29760.00')
    expect(report.scheduleText.split('\n')[2]).toBe('2024-12-01: AM: Alice Johnson, PM: Bob Smith')
  })

  it('writes the schedule and pay report under the output directory', async () => {
    const written = new Map<string, string>()

    const report = await buildMonthlyReport({
      roster: [],
      month: 2,
      year: 2025,
      outputDir: 'out',
      write: async (filePath, contents) => {
        written.set(filePath, contents)
      },
    })

    expect(report.schedulePath).toMatch(/out[\\/]schedule\.html$/)
    expect(Array.from(written.keys())).toEqual([report.schedulePath, report.payReportPath])
    expect(written.get(report.schedulePath)).toContain('<title>Care Schedule - February 2025</title>')
    expect(written.get(report.payReportPath)).toContain('<p>No caregivers on the roster.</p>')
  })
})
