import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { FileStorage } from './FileStorage'
import { ChangeLog, ReportHistory } from '../contracts'

describe('FileStorage', () => {
  let dataDir: string
  let storage: FileStorage

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'drop-digest-storage-'))
    storage = new FileStorage(path.join(dataDir, 'state'))
  })

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true })
  })

  it('should return null before anything is stored', async () => {
    expect(await storage.getChangeLog()).toBeNull()
    expect(await storage.getReportHistory()).toBeNull()
  })

  it('should persist the change log and report history', async () => {
    const log: ChangeLog = {
      entries: [{
        id: 'change-1',
        path: 'docs/a.md',
        observedAt: '2026-03-14T12:00:00.000Z',
        metadata: { rev: 'r1', size: 12 },
      }],
      maxEntries: 10,
      lastUpdated: '2026-03-14T12:00:00.000Z',
    }
    const history: ReportHistory = {
      records: [{
        id: 'report-1',
        generatedAt: '2026-03-14T12:00:00.000Z',
        period: 'hour',
        since: '2026-03-14T11:00:00.000Z',
        until: '2026-03-14T12:00:00.000Z',
        totalChanges: 1,
        subject: 'Dropbox Activity Report - Past Hour (1 change)',
        delivered: true,
      }],
      maxRecords: 5,
      lastUpdated: '2026-03-14T12:00:00.000Z',
    }

    await storage.saveChangeLog(log)
    await storage.saveReportHistory(history)

    const reopened = new FileStorage(path.join(dataDir, 'state'))
    expect(await reopened.getChangeLog()).toEqual(log)
    expect(await reopened.getReportHistory()).toEqual(history)
    expect(fs.existsSync(path.join(dataDir, 'state', 'change-log.json.tmp'))).toBe(false)
  })

  it('should treat invalid files as empty', async () => {
    fs.mkdirSync(path.join(dataDir, 'state'), { recursive: true })
    fs.writeFileSync(path.join(dataDir, 'state', 'change-log.json'), 'not json {')
    fs.writeFileSync(path.join(dataDir, 'state', 'report-history.json'), JSON.stringify({ records: 'nope' }))

    expect(await storage.getChangeLog()).toBeNull()
    expect(await storage.getReportHistory()).toBeNull()
  })

  it('should remove everything on clearAll', async () => {
    await storage.saveChangeLog({ entries: [], maxEntries: 1, lastUpdated: '2026-03-14T12:00:00.000Z' })
    await storage.clearAll()

    expect(fs.existsSync(path.join(dataDir, 'state'))).toBe(false)
    expect(await storage.getChangeLog()).toBeNull()
  })
})
