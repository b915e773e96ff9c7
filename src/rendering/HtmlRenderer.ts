import { RankedEntry, ReportWindow } from '../contracts'
import { ActivityPattern } from '../analysis/ActivityAnalyzer'
import { ChangeRecord } from '../records/ChangeRecord'
import { Clock, formatTimestamp, systemClock } from '../window/ReportWindow'
import { ReportRenderer, formatMegabytes } from './ReportRenderer'
import { QUIET_PERIOD_SENTENCE, displayDirectory, displayExtension, plural } from './NarrativeRenderer'

export interface HtmlRendererOptions {
  title?: string
  clock?: Clock
}

const STYLE = [
  'body { font-family: Arial, sans-serif; margin: 20px; line-height: 1.6; color: #333; }',
  '.header { background-color: #0061ff; color: white; padding: 20px; border-radius: 5px; }',
  '.section { margin: 20px 0; padding: 20px; background-color: #f8f9fa; border-radius: 5px; }',
  '.change-item { padding: 10px; margin: 5px 0; border-left: 4px solid #0061ff; background-color: white; }',
  '.deleted { border-left-color: #dc3545; }',
  '.footer { color: #777; font-size: 0.9em; }',
].join('\n')

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/**
 * HTML version of the file-change report, sent as the email's HTML body
 */
export class HtmlRenderer implements ReportRenderer {
  private title: string
  private clock: Clock

  constructor(options: HtmlRendererOptions = {}) {
    this.title = options.title ?? 'Dropbox Activity Report'
    this.clock = options.clock ?? systemClock
  }

  render(window: ReportWindow, pattern: ActivityPattern): string {
    const heading = `${this.title} - ${window.label}`
    const lines = [
      '<!DOCTYPE html>',
      '<html>',
      '<head>',
      '<meta charset="utf-8">',
      `<title>${escapeHtml(heading)}</title>`,
      `<style>\n${STYLE}\n</style>`,
      '</head>',
      '<body>',
      '<div class="header">',
      `<h1>${escapeHtml(this.title)}</h1>`,
      `<p>${escapeHtml(window.label)}</p>`,
      '</div>',
    ]

    if (pattern.totalChanges === 0) {
      lines.push('<div class="section">', '<h2>Summary</h2>', `<p>${QUIET_PERIOD_SENTENCE}</p>`, '</div>')
    } else {
      const deleted = pattern.records.filter(record => record.deleted).length
      const totalSize = pattern.records.reduce((sum, record) => sum + record.size, 0)

      lines.push(
        '<div class="section">',
        '<h2>Summary</h2>',
        '<ul>',
        `<li>Total changes: ${pattern.totalChanges}</li>`,
        `<li>Total size: ${formatMegabytes(totalSize)}</li>`,
        `<li>Deleted files: ${deleted}</li>`,
        `<li>Modified files: ${pattern.totalChanges - deleted}</li>`,
        '</ul>',
        '</div>',
        ...this.renderRanking('Most Changed File Types', pattern.topFileTypes, displayExtension, 'file'),
        ...this.renderRanking('Most Active Directories', pattern.topDirectories, displayDirectory, 'change'),
        '<div class="section">',
        '<h2>File Changes</h2>',
        ...pattern.records.map(record => this.renderChange(record)),
        '</div>',
        `<p class="footer">Generated at ${formatTimestamp(this.clock())}</p>`,
      )
    }

    lines.push('</body>', '</html>')
    return lines.join('\n') + '\n'
  }

  private renderRanking(
    heading: string,
    entries: RankedEntry[],
    display: (key: string) => string,
    noun: string
  ): string[] {
    if (entries.length === 0) return []
    return [
      '<div class="section">',
      `<h2>${heading}</h2>`,
      '<ul>',
      ...entries.map(entry => `<li>${escapeHtml(display(entry.key))}: ${plural(entry.count, noun)}</li>`),
      '</ul>',
      '</div>',
    ]
  }

  private renderChange(record: ChangeRecord): string {
    const details = [`<strong>${escapeHtml(record.path)}</strong>`, `Size: ${formatMegabytes(record.size)}`]
    if (record.deleted) {
      details.push('Status: Deleted')
    } else if (record.serverModified) {
      details.push(`Modified: ${formatTimestamp(new Date(record.serverModified))}`)
    }
    if (record.classification?.summary) {
      details.push(`Summary: ${escapeHtml(record.classification.summary)}`)
    }

    const className = record.deleted ? 'change-item deleted' : 'change-item'
    return `<div class="${className}">${details.join('<br>')}</div>`
  }
}
