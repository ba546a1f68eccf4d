import { describe, expect, it } from 'vitest'

import { createCaregiver } from '@/lib/caregiver'
import { htmlPayReportFormatter, htmlScheduleFormatter, renderHtmlDocument } from '@/lib/formatters/html-formatter'
import { calculatePay } from '@/lib/pay-report'

describe('htmlScheduleFormatter', () => {
  const html = htmlScheduleFormatter.render({ '2024-12-02': { AM: '<Ana & Bo>', PM: 'Ben' } }, 12, 2024)

  it('renders a standalone document titled with the month', () => {
    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">')).toBe(true)
    expect(html).toContain('<title>Care Schedule - December 2024</title>')
  })

  it('escapes caregiver names in cells', () => {
    expect(html).toContain('<tr><td>2024-12-02</td><td>Mon</td><td>&lt;Ana &amp; Bo&gt;</td><td>Ben</td></tr>')
  })

  it('renders every day of the month and marks missing days as no coverage', () => {
    expect(html.match(/<tr/g)).toHaveLength(32)
    expect(html).toContain(
      '<tr><td>2024-12-01</td><td>Sun</td><td class="print-gap">No coverage</td><td class="print-gap">No coverage</td></tr>'
    )
    expect(html).toContain('<tr class="print-week-end"><td>2024-12-07</td>')
    expect(html).toContain('<p class="print-legend">Days with coverage gaps: 30 | AM and PM shifts, 6 hours each</p>')
  })
})

describe('htmlPayReportFormatter', () => {
  it('renders one row per caregiver plus totals', () => {
    const caregiver = createCaregiver({
      id: 'cg-1',
      name: 'Ana',
      phone: '555-0100',
      email: 'ana@example.com',
      payRate: 25,
      hours: 40,
    })

    const html = htmlPayReportFormatter.render(calculatePay([caregiver]))

    expect(html).toContain('<tr><td>Ana</td><td>40</td><td>$25.00</td><td>$1000.00</td><td>$4000.00</td></tr>')
    expect(html).toContain(
      '<tr class="print-total-row"><td>Total</td><td></td><td></td><td>$1000.00</td><td>$4000.00</td></tr>'
    )
  })

  it('explains an empty roster', () => {
    expect(htmlPayReportFormatter.render(new Map())).toContain('<p>No caregivers on the roster.</p>')
  })
})

describe('renderHtmlDocument', () => {
  it('escapes the title', () => {
    expect(renderHtmlDocument('A & B', <p>body</p>)).toContain('<title>A &amp; B</title>\n')
  })
})
