import { describe, expect, it } from 'vitest'

import {
  daysInMonth,
  formatMonthLabel,
  formatWeekdayShort,
  isIsoDateKey,
  monthDateKeys,
  validateScheduleMonth,
} from '@/lib/calendar-utils'
import { ValidationError } from '@/lib/errors'

// ---------------------------------------------------------------------------
// daysInMonth / monthDateKeys
// ---------------------------------------------------------------------------

describe('daysInMonth', () => {
  it('returns 31 for December', () => {
    expect(daysInMonth(2024, 12)).toBe(31)
  })

  it('returns 30 for April', () => {
    expect(daysInMonth(2026, 4)).toBe(30)
  })

  it('returns 28 for February in a non-leap year', () => {
    expect(daysInMonth(2026, 2)).toBe(28)
  })

  it('returns 29 for February in a leap year', () => {
    expect(daysInMonth(2024, 2)).toBe(29)
  })
})

describe('monthDateKeys', () => {
  it('lists every real day of the month in order', () => {
    const keys = monthDateKeys(2024, 2)

    expect(keys).toHaveLength(29)
    expect(keys[0]).toBe('2024-02-01')
    expect(keys[28]).toBe('2024-02-29')
  })

  it('does not spill into the next year for December', () => {
    const keys = monthDateKeys(2024, 12)
    expect(keys.at(-1)).toBe('2024-12-31')
  })
})

// ---------------------------------------------------------------------------
// validation
// ---------------------------------------------------------------------------

describe('validateScheduleMonth', () => {
  it('accepts the boundaries', () => {
    expect(() => validateScheduleMonth(1, 2000)).not.toThrow()
    expect(() => validateScheduleMonth(12, 2099)).not.toThrow()
  })

  it('rejects months outside 1-12 and years before 2000', () => {
    expect(() => validateScheduleMonth(0, 2024)).toThrow(ValidationError)
    expect(() => validateScheduleMonth(13, 2024)).toThrow(ValidationError)
    expect(() => validateScheduleMonth(1.5, 2024)).toThrow(ValidationError)
    expect(() => validateScheduleMonth(6, 1999)).toThrow(ValidationError)
  })

  it('rejects years past 9999, which have no four-digit date key', () => {
    expect(() => validateScheduleMonth(12, 9999)).not.toThrow()
    expect(() => validateScheduleMonth(1, 10000)).toThrow(ValidationError)
  })
})

describe('isIsoDateKey', () => {
  it('accepts real dates only', () => {
    expect(isIsoDateKey('2024-12-25')).toBe(true)
    expect(isIsoDateKey('2024-02-29')).toBe(true)
    expect(isIsoDateKey('2026-02-29')).toBe(false)
    expect(isIsoDateKey('2024-1-5')).toBe(false)
    expect(isIsoDateKey('not-a-date')).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// labels
// ---------------------------------------------------------------------------

describe('labels', () => {
  it('formats month and weekday labels', () => {
    expect(formatMonthLabel(2024, 12)).toBe('December 2024')
    expect(formatWeekdayShort('2024-12-25')).toBe('Wed')
    expect(formatWeekdayShort('garbage')).toBe('-')
  })
})
