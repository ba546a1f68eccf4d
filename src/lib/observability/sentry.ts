import * as Sentry from '@sentry/node'

import type { AppConfig } from '@/lib/config'

type SentryCaptureContext = {
  tags?: Record<string, string>
  extras?: Record<string, unknown>
}

export function initErrorReporting(config: Pick<AppConfig, 'sentryDsn' | 'sentryTracesSampleRate'>): void {
  Sentry.init({
    dsn: config.sentryDsn ?? undefined,
    enabled: Boolean(config.sentryDsn),
    tracesSampleRate: config.sentryTracesSampleRate,
  })
}

export function captureServerException(error: unknown, context?: SentryCaptureContext): void {
  Sentry.withScope((scope) => {
    if (context?.tags) {
      for (const [key, value] of Object.entries(context.tags)) {
        scope.setTag(key, value)
      }
    }
    if (context?.extras) {
      for (const [key, value] of Object.entries(context.extras)) {
        scope.setExtra(key, value)
      }
    }
    Sentry.captureException(error)
  })
}

export async function flushErrorReporting(timeoutMs = 2000): Promise<boolean> {
  return Sentry.flush(timeoutMs)
}
