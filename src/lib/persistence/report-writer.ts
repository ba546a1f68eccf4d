import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { logServerEvent } from '@/lib/observability/logger'

function errorCodeOf(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code
  return null
}

export async function writeReport(filePath: string, contents: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true })
    await writeFile(filePath, contents, 'utf-8')
  } catch (error) {
    logServerEvent('error', {
      event: 'report_write_failed',
      path: filePath,
      error_code: errorCodeOf(error),
    })
    throw error
  }

  logServerEvent('info', {
    event: 'report_written',
    path: filePath,
    bytes: Buffer.byteLength(contents, 'utf-8'),
  })
}
