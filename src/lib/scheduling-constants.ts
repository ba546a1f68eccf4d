import type { AvailabilityStatus } from '@/lib/shift-types'

export const SHIFT_LENGTH_HOURS = 6
export const DEFAULT_PAY_RATE = 20
export const MIN_SCHEDULE_YEAR = 2000
export const MAX_SCHEDULE_YEAR = 9999
export const WEEKS_PER_PAY_MONTH = 4

export const NO_COVERAGE_LABEL = 'No coverage'
export const DEFAULT_AVAILABILITY_STATUS: AvailabilityStatus = 'available'
