import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { writeReport } from '@/lib/persistence/report-writer'

describe('writeReport', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'caregiver-reports-'))
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it('creates missing directories and writes the contents', async () => {
    const target = path.join(dir, 'nested', 'schedule.html')

    await writeReport(target, '<p>ok</p>')

    expect(await readFile(target, 'utf-8')).toBe('<p>ok</p>')
    const payload = JSON.parse(String(vi.mocked(console.info).mock.calls[0][0])) as Record<string, unknown>
    expect(payload.event).toBe('report_written')
    expect(payload.bytes).toBe(9)
  })

  it('logs and rethrows filesystem failures', async () => {
    const blocker = path.join(dir, 'blocker')
    await writeFile(blocker, 'not a directory', 'utf-8')

    await expect(writeReport(path.join(blocker, 'schedule.html'), 'x')).rejects.toThrow()

    const payload = JSON.parse(String(vi.mocked(console.error).mock.calls[0][0])) as Record<string, unknown>
    expect(payload.event).toBe('report_write_failed')
    expect(payload.path).toBe(path.join(blocker, 'schedule.html'))
  })
})
