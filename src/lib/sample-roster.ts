import { createCaregiver, setAvailabilityForDates, type Caregiver } from '@/lib/caregiver'
import { monthDateKeys } from '@/lib/calendar-utils'

const SAMPLE_CAREGIVERS = [
  { name: 'Alice Johnson', phone: '545-1234', email: 'alice@example.com' },
  { name: 'Bob Smith', phone: '125-5678', email: 'bob@example.com' },
  { name: 'Carol Lee', phone: '355-8765', email: 'carol@example.com' },
  { name: 'David Brown', phone: '555-4321', email: 'david@example.com' },
  { name: 'Emma Wilson', phone: '577-6789', email: 'emma@example.com' },
  { name: 'Frank Green', phone: '598-9876', email: 'frank@example.com' },
  { name: 'Grace White', phone: '666-3456', email: 'grace@example.com' },
  { name: 'Hannah Black', phone: '544-6543', email: 'hannah@example.com' },
] as const

const SEEDED_DAYS = 7

/**
 * Demo roster for a month: for the first week, AM is preferred on even days and
 * available on odd days, PM is available; every other slot uses the default.
 */
export function buildSampleRoster(month: number, year: number): Caregiver[] {
  const firstWeek = monthDateKeys(year, month).slice(0, SEEDED_DAYS)
  const evenDays = firstWeek.filter((date) => Number(date.slice(8, 10)) % 2 === 0)
  const oddDays = firstWeek.filter((date) => Number(date.slice(8, 10)) % 2 === 1)

  return SAMPLE_CAREGIVERS.map((entry, index) => {
    let caregiver = createCaregiver({ id: `cg-${index + 1}`, ...entry })
    caregiver = setAvailabilityForDates(caregiver, evenDays, 'AM', 'preferred')
    caregiver = setAvailabilityForDates(caregiver, oddDays, 'AM', 'available')
    return setAvailabilityForDates(caregiver, firstWeek, 'PM', 'available')
  })
}
