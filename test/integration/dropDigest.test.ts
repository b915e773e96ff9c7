import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { ReportService } from '../../src/reporting/ReportService'
import { DropboxChangeSource } from '../../src/sources/DropboxChangeSource'
import { DropboxContentFetcher } from '../../src/sources/DropboxContentFetcher'
import { KeywordContentClassifier } from '../../src/classification/KeywordContentClassifier'
import { HttpEmailDispatcher, RESEND_EMAILS_URL } from '../../src/dispatch/HttpEmailDispatcher'
import { FileStorage } from '../../src/storage/FileStorage'
import { ConfigLoader } from '../../src/config/ConfigLoader'
import { formatTimestamp } from '../../src/window/ReportWindow'
import { createFakeHttp, RecordedRequest } from '../support/fakeHttp'

const LIST_URL = 'https://api.dropboxapi.com/2/files/list_folder'
const DOWNLOAD_URL = 'https://content.dropboxapi.com/2/files/download'
const NOW = new Date('2026-03-14T12:00:00Z')

const SAMPLES: Record<string, string> = {
  '/Team/Projects/roadmap.md': 'Roadmap: milestone plan for the launch. Milestone review next week.',
  '/Team/Projects/budget.csv': 'item,cost\nservers,120\n',
}

const sampleFor = (request: RecordedRequest): string => {
  const arg = String(request.headers['Dropbox-API-Arg'])
  const match = Object.keys(SAMPLES).find(key => JSON.stringify({ path: key }) === arg)
  return match ? SAMPLES[match] : ''
}

describe('drop-digest integration', () => {
  let dataDir: string

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'drop-digest-integration-'))
  })

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true })
  })

  const createPipeline = () => {
    const fake = createFakeHttp({
      [LIST_URL]: () => ({
        data: {
          entries: [
            { '.tag': 'file', path_display: '/Team/Projects/roadmap.md', server_modified: '2026-03-14T11:40:00Z', rev: 'r1' },
            { '.tag': 'file', path_display: '/Team/Projects/budget.csv', server_modified: '2026-03-14T11:20:00Z', rev: 'r2' },
            { '.tag': 'file', path_display: '/Team/photo.jpg', server_modified: '2026-03-14T11:50:00Z', rev: 'r3' },
            { '.tag': 'folder', path_display: '/Team/Projects' },
          ],
          cursor: 'cursor-1',
          has_more: false,
        },
      }),
      [DOWNLOAD_URL]: request => ({ data: sampleFor(request) }),
      [RESEND_EMAILS_URL]: () => ({ data: { id: 'email-1' } }),
    })

    const storage = new FileStorage(dataDir)
    const service = new ReportService({
      config: new ConfigLoader('/non/existent/drop-digest.config.json').getConfig(),
      source: new DropboxChangeSource(fake.http, { rootPath: '/Team' }),
      storage,
      classifier: new KeywordContentClassifier(new DropboxContentFetcher(fake.http)),
      dispatcher: new HttpEmailDispatcher(fake.http, { from: 'digest@example.com' }),
      recipients: ['team@example.com'],
      clock: () => NOW,
    })

    return { service, storage, requests: fake.requests }
  }

  it('should turn a Dropbox listing into an emailed narrative report', async () => {
    const { service, requests } = createPipeline()

    const result = await service.run({ period: 'hour' })

    const expected = [
      'Dropbox Activity Report - Past Hour',
      '',
      'Summary:',
      'Total changes: 3',
      '',
      'Activity Analysis:',
      'Most Active Directories:',
      '- Team/Projects (2 changes)',
      '- Team (1 change)',
      'Most Changed File Types:',
      '- csv (1 change)',
      '- jpg (1 change)',
      '- md (1 change)',
      'File Content:',
      '- budget.csv (data)',
      '  Summary: item,cost servers,120',
      '  Keywords: item, cost, servers',
      '  Topics: finance',
      '- roadmap.md (document)',
      '  Summary: Roadmap: milestone plan for the launch. Milestone review next week.',
      '  Keywords: milestone, roadmap, plan, launch, review',
      '  Topics: planning',
      '',
      'Insights:',
      "- Most activity was in 'Team/Projects', which suggests active project/documentation work.",
      '- 1 document changed, indicating ongoing writing or documentation.',
      '- 1 data file changed, pointing to data or configuration updates.',
      '- Overall activity was moderate with 3 changes in this period.',
      '',
      `Generated at ${formatTimestamp(NOW)}`,
      '',
    ].join('\n')

    expect(result.report).toBe(expected)
    expect(result.delivery).toEqual({ delivered: true })

    // The image is skipped without a download
    const downloads = requests.filter(r => r.url === DOWNLOAD_URL).map(r => r.headers['Dropbox-API-Arg'])
    expect(downloads.sort()).toEqual([
      '{"path":"/Team/Projects/budget.csv"}',
      '{"path":"/Team/Projects/roadmap.md"}',
    ])

    const emails = requests.filter(r => r.url === RESEND_EMAILS_URL)
    expect(emails.map(r => r.body)).toEqual([{
      from: 'digest@example.com',
      to: ['team@example.com'],
      subject: 'Dropbox Activity Report - Past Hour (3 changes)',
      text: expected,
    }])
  })

  it('should persist changes and history across runs', async () => {
    const first = createPipeline()
    const firstRun = await first.service.run({ period: 'hour' })

    const second = createPipeline()
    const secondRun = await second.service.run({ period: 'hour' })

    expect(firstRun.newChanges).toBe(3)
    expect(secondRun.newChanges).toBe(0)

    const log = await second.storage.getChangeLog()
    expect(log?.entries.map(entry => entry.path)).toEqual([
      '/Team/Projects/budget.csv',
      '/Team/Projects/roadmap.md',
      '/Team/photo.jpg',
    ])

    const history = await second.storage.getReportHistory()
    expect(history?.records.map(record => record.totalChanges)).toEqual([3, 3])
    expect(fs.existsSync(path.join(dataDir, 'report-history.json'))).toBe(true)
  })
})
