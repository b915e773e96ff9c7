import { RankedEntry, ReportWindow } from '../contracts'
import { ActivityPattern } from '../analysis/ActivityAnalyzer'
import { Clock, formatTimestamp, systemClock } from '../window/ReportWindow'
import { ReportRenderer, formatMegabytes } from './ReportRenderer'
import { QUIET_PERIOD_SENTENCE, displayDirectory, displayExtension, plural } from './NarrativeRenderer'

export interface FileListRendererOptions {
  title?: string
  clock?: Clock
}

/**
 * Plain listing of every changed file with its size, followed by the
 * ranked file types and directories and a size and deletion summary.
 */
export class FileListRenderer implements ReportRenderer {
  private title: string
  private clock: Clock

  constructor(options: FileListRendererOptions = {}) {
    this.title = options.title ?? 'Dropbox Activity Report'
    this.clock = options.clock ?? systemClock
  }

  render(window: ReportWindow, pattern: ActivityPattern): string {
    const sections = [`${this.title} - ${window.label}`]

    if (pattern.totalChanges === 0) {
      sections.push(`Total changes: 0\n${QUIET_PERIOD_SENTENCE}`)
      return sections.join('\n\n') + '\n'
    }

    sections.push(`Total changes: ${pattern.totalChanges}`)

    const files = ['File Changes:']
    for (const record of pattern.records) {
      const marker = record.deleted ? '[Deleted] ' : ''
      files.push(`- ${marker}${record.path} (${formatMegabytes(record.size)})`)
    }
    sections.push(files.join('\n'))

    sections.push(this.renderRanking('Most Changed File Types:', pattern.topFileTypes, displayExtension, 'file'))
    sections.push(this.renderRanking('Most Active Directories:', pattern.topDirectories, displayDirectory, 'change'))

    const totalSize = pattern.records.reduce((sum, record) => sum + record.size, 0)
    const deleted = pattern.records.filter(record => record.deleted).length
    sections.push([
      'Activity Summary:',
      `- Total size: ${formatMegabytes(totalSize)}`,
      `- Deleted files: ${deleted}`,
      `- Modified files: ${pattern.totalChanges - deleted}`,
    ].join('\n'))

    sections.push(`Generated at ${formatTimestamp(this.clock())}`)
    return sections.join('\n\n') + '\n'
  }

  private renderRanking(
    heading: string,
    entries: RankedEntry[],
    display: (key: string) => string,
    noun: string
  ): string {
    return [heading, ...entries.map(entry => `- ${display(entry.key)}: ${plural(entry.count, noun)}`)].join('\n')
  }
}
