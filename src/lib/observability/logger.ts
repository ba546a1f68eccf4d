type StructuredLogLevel = 'info' | 'warn' | 'error'
type LogStream = 'stdout' | 'stderr'

type StructuredLogFields = {
  event: string
  month?: number | null
  year?: number | null
  path?: string | null
  error_code?: string | null
  [key: string]: unknown
}

let infoStream: LogStream = 'stdout'

/** CLI output owns stdout, so the CLI moves info lines next to warnings and errors. */
export function routeInfoLogsTo(stream: LogStream): void {
  infoStream = stream
}

function compactFields(fields: StructuredLogFields): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined))
}

export function logServerEvent(level: StructuredLogLevel, fields: StructuredLogFields): void {
  const payload = {
    ts: new Date().toISOString(),
    level,
    ...compactFields(fields),
  }
  const line = JSON.stringify(payload)

  if (level === 'error') {
    console.error(line)
    return
  }
  if (level === 'warn') {
    console.warn(line)
    return
  }
  if (infoStream === 'stderr') {
    console.error(line)
    return
  }
  console.info(line)
}
