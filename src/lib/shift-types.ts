// Core domain primitives shared by the scheduler, pay report and formatters.

export type ShiftPeriod = 'AM' | 'PM'
export type AvailabilityStatus = 'preferred' | 'available' | 'unavailable'

export const SHIFT_PERIODS: readonly ShiftPeriod[] = ['AM', 'PM']

export type DayAssignment = Record<ShiftPeriod, string>

/** ISO date (YYYY-MM-DD) to the caregiver name or "No coverage" for each shift. */
export type Schedule = Record<string, DayAssignment>
