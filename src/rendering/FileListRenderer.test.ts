import { describe, it, expect } from 'vitest'
import { FileListRenderer } from './FileListRenderer'
import { formatMegabytes } from './ReportRenderer'
import { ActivityAnalyzer } from '../analysis/ActivityAnalyzer'
import { formatTimestamp, resolveWindow } from '../window/ReportWindow'

describe('FileListRenderer', () => {
  const window = resolveWindow({ period: 'day' }, () => new Date('2026-03-14T12:00:00.000Z'))
  const generatedAt = new Date('2026-03-14T12:00:05.000Z')
  const renderer = new FileListRenderer({ clock: () => generatedAt })

  it('should list every file with sizes and a summary', async () => {
    const pattern = await new ActivityAnalyzer().analyze([
      { path: '/Projects/plan.md', serverModified: '2026-03-14T09:00:00Z', size: 1_572_864 },
      { path: '/Projects/notes.md', serverModified: '2026-03-14T10:00:00Z', size: 524_288 },
      { path: '/Projects/old.md', serverModified: '2026-03-14T12:00:00Z', deleted: true },
      { path: '/LICENSE', serverModified: '2026-03-14T11:00:00Z', size: 1024 },
    ])

    expect(renderer.render(window, pattern)).toBe([
      'Dropbox Activity Report - Past 24 Hours',
      '',
      'Total changes: 4',
      '',
      'File Changes:',
      '- Projects/plan.md (1.50 MB)',
      '- Projects/notes.md (0.50 MB)',
      '- [Deleted] Projects/old.md (0.00 MB)',
      '- LICENSE (0.00 MB)',
      '',
      'Most Changed File Types:',
      '- md: 3 files',
      '- no extension: 1 file',
      '',
      'Most Active Directories:',
      '- Projects: 3 changes',
      '- (top level): 1 change',
      '',
      'Activity Summary:',
      '- Total size: 2.00 MB',
      '- Deleted files: 1',
      '- Modified files: 3',
      '',
      `Generated at ${formatTimestamp(generatedAt)}`,
      '',
    ].join('\n'))
  })

  it('should end after the quiet sentence when nothing changed', async () => {
    const pattern = await new ActivityAnalyzer().analyze([])

    expect(new FileListRenderer({ title: 'Team Files' }).render(window, pattern)).toBe(
      'Team Files - Past 24 Hours\n\n' +
      'Total changes: 0\nNo file changes were detected during this period. It was a quiet period.\n'
    )
  })
})

describe('formatMegabytes', () => {
  it('should use two decimals', () => {
    expect(formatMegabytes(0)).toBe('0.00 MB')
    expect(formatMegabytes(3 * 1024 * 1024)).toBe('3.00 MB')
    expect(formatMegabytes(1024 * 1024 + 10_486)).toBe('1.01 MB')
  })
})
