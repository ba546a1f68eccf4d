import { validateScheduleMonth } from '@/lib/calendar-utils'
import { ValidationError } from '@/lib/errors'

export type AppConfig = {
  month: number
  year: number
  outputDir: string
  sentryDsn: string | null
  sentryTracesSampleRate: number
}

export type AppEnv = Record<string, string | undefined>

const DEFAULT_OUTPUT_DIR = 'reports'

export function parseSampleRate(value: string | undefined): number {
  if (!value) return 0
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) return 0
  if (parsed < 0) return 0
  if (parsed > 1) return 1
  return parsed
}

export function parseIntegerSetting(value: string | undefined, field: 'month' | 'year', fallback: number): number {
  const trimmed = value?.trim()
  if (!trimmed) return fallback
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(
      field === 'month' ? 'invalid_month' : 'invalid_year',
      field,
      `Schedule ${field} must be a whole number, got "${value}".`
    )
  }
  return Number.parseInt(trimmed, 10)
}

export function loadAppConfig(env: AppEnv = process.env, now: Date = new Date()): AppConfig {
  const month = parseIntegerSetting(env.SCHEDULE_MONTH, 'month', now.getMonth() + 1)
  const year = parseIntegerSetting(env.SCHEDULE_YEAR, 'year', now.getFullYear())
  validateScheduleMonth(month, year)

  return {
    month,
    year,
    outputDir: env.REPORT_OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    sentryDsn: env.SENTRY_DSN?.trim() || null,
    sentryTracesSampleRate: parseSampleRate(env.SENTRY_TRACES_SAMPLE_RATE),
  }
}
