import { parseArgs } from 'node:util'

import { loadAppConfig, type AppEnv } from '@/lib/config'
import { isValidationError } from '@/lib/errors'
import { buildMonthlyReport } from '@/lib/monthly-report'
import { logServerEvent, routeInfoLogsTo } from '@/lib/observability/logger'
import { captureServerException, flushErrorReporting, initErrorReporting } from '@/lib/observability/sentry'
import { buildSampleRoster } from '@/lib/sample-roster'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

const USAGE = 'Usage: caregiver-schedule [--month <1-12>] [--year <yyyy>] [--out <dir>]'

function isArgumentParseError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  )
}

function parseCliEnv(argv: string[], env: AppEnv): AppEnv {
  const { values } = parseArgs({
    args: argv,
    options: {
      month: { type: 'string' },
      year: { type: 'string' },
      out: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  })

  return {
    ...env,
    SCHEDULE_MONTH: values.month ?? env.SCHEDULE_MONTH,
    SCHEDULE_YEAR: values.year ?? env.SCHEDULE_YEAR,
    REPORT_OUTPUT_DIR: values.out ?? env.REPORT_OUTPUT_DIR,
  }
}

export async function runCli(argv: string[], env: AppEnv): Promise<number> {
  routeInfoLogsTo('stderr')

  let cliEnv: AppEnv
  try {
    cliEnv = parseCliEnv(argv, env)
  } catch (error) {
    if (!isArgumentParseError(error)) throw error
    console.error(error instanceof Error ? error.message : String(error))
    console.error(USAGE)
    return EXIT_USAGE
  }

  try {
    const config = loadAppConfig(cliEnv)
    initErrorReporting(config)

    const report = await buildMonthlyReport({
      roster: buildSampleRoster(config.month, config.year),
      month: config.month,
      year: config.year,
      outputDir: config.outputDir,
    })

    process.stdout.write(`${report.scheduleText}\n\n${report.payReportText}\n`)
    return EXIT_OK
  } catch (error) {
    if (isValidationError(error)) {
      logServerEvent('warn', { event: 'cli_invalid_input', error_code: error.code, field: error.field })
      console.error(error.message)
      return EXIT_FAILURE
    }

    logServerEvent('error', {
      event: 'cli_failed',
      message: error instanceof Error ? error.message : String(error),
    })
    captureServerException(error, { tags: { command: 'schedule' } })
    await flushErrorReporting()
    return EXIT_FAILURE
  }
}
