import { ReportWindow, RankedEntry } from '../contracts'
import { ActivityPattern } from '../analysis/ActivityAnalyzer'
import { TOP_LEVEL_DIRECTORY } from '../records/ChangeRecord'
import { isDefaultTopicList } from '../classification/KeywordContentClassifier'
import { Clock, formatTimestamp, systemClock } from '../window/ReportWindow'
import { ReportRenderer } from './ReportRenderer'

export type ActivityIntensity = 'high' | 'moderate' | 'light'

export interface NarrativeRendererOptions {
  title?: string
  highActivityThreshold?: number
  lightActivityThreshold?: number
  clock?: Clock
}

export const QUIET_PERIOD_SENTENCE = 'No file changes were detected during this period. It was a quiet period.'

const NO_EXTENSION_LABEL = 'no extension'
const TOP_LEVEL_LABEL = '(top level)'

// Tokens that mark a directory as project or documentation work
const FOCUS_TOKENS = ['project', 'doc']

export const plural = (count: number, singular: string, pluralForm = `${singular}s`): string =>
  `${count} ${count === 1 ? singular : pluralForm}`

export function displayDirectory(directory: string): string {
  return directory === TOP_LEVEL_DIRECTORY ? TOP_LEVEL_LABEL : directory
}

export function displayExtension(extension: string): string {
  return extension === '' ? NO_EXTENSION_LABEL : extension
}

export function classifyIntensity(
  totalChanges: number,
  highActivityThreshold: number,
  lightActivityThreshold: number
): ActivityIntensity {
  if (totalChanges > highActivityThreshold) return 'high'
  if (totalChanges < lightActivityThreshold) return 'light'
  return 'moderate'
}

/**
 * Renders an activity pattern as a plain-text narrative:
 * header, summary, activity analysis, insights and footer, in that order.
 */
export class NarrativeRenderer implements ReportRenderer {
  private static readonly DEFAULT_TITLE = 'Dropbox Activity Report'
  private static readonly DEFAULT_HIGH_THRESHOLD = 100
  private static readonly DEFAULT_LIGHT_THRESHOLD = 10

  private title: string
  private highActivityThreshold: number
  private lightActivityThreshold: number
  private clock: Clock

  constructor(options: NarrativeRendererOptions = {}) {
    this.title = options.title ?? NarrativeRenderer.DEFAULT_TITLE
    this.highActivityThreshold = options.highActivityThreshold ?? NarrativeRenderer.DEFAULT_HIGH_THRESHOLD
    this.lightActivityThreshold = options.lightActivityThreshold ?? NarrativeRenderer.DEFAULT_LIGHT_THRESHOLD
    this.clock = options.clock ?? systemClock
  }

  render(window: ReportWindow, pattern: ActivityPattern): string {
    const sections = [this.renderHeader(window)]

    if (pattern.totalChanges === 0) {
      sections.push(`Summary:\n${QUIET_PERIOD_SENTENCE}`)
      return sections.join('\n\n') + '\n'
    }

    sections.push(`Summary:\nTotal changes: ${pattern.totalChanges}`)
    sections.push(this.renderAnalysis(pattern))
    sections.push(this.renderInsights(pattern))
    sections.push(`Generated at ${formatTimestamp(this.clock())}`)

    return sections.join('\n\n') + '\n'
  }

  private renderHeader(window: ReportWindow): string {
    return `${this.title} - ${window.label}`
  }

  private renderAnalysis(pattern: ActivityPattern): string {
    const blocks = ['Activity Analysis:']

    if (pattern.topDirectories.length > 0) {
      blocks.push(this.renderRanking('Most Active Directories:', pattern.topDirectories, displayDirectory))
    }

    if (pattern.topFileTypes.length > 0) {
      blocks.push(this.renderRanking('Most Changed File Types:', pattern.topFileTypes, displayExtension))
    }

    if (pattern.classifiedRecords.length > 0) {
      const lines = ['File Content:']
      for (const record of pattern.classifiedRecords) {
        const classification = record.classification
        if (!classification) continue

        lines.push(`- ${record.name} (${classification.contentType})`)
        if (classification.summary) {
          lines.push(`  Summary: ${classification.summary}`)
        }
        if (classification.keywords.length > 0) {
          lines.push(`  Keywords: ${classification.keywords.join(', ')}`)
        }
        if (!isDefaultTopicList(classification.topics)) {
          lines.push(`  Topics: ${classification.topics.join(', ')}`)
        }
      }
      blocks.push(lines.join('\n'))
    }

    return blocks.join('\n')
  }

  private renderRanking(
    heading: string,
    entries: RankedEntry[],
    display: (key: string) => string
  ): string {
    const lines = [heading]
    for (const entry of entries) {
      lines.push(`- ${display(entry.key)} (${plural(entry.count, 'change')})`)
    }
    return lines.join('\n')
  }

  private renderInsights(pattern: ActivityPattern): string {
    const lines = ['Insights:']

    const topDirectory = pattern.topDirectories[0]
    if (topDirectory) {
      const name = displayDirectory(topDirectory.key)
      const lowered = topDirectory.key.toLowerCase()
      if (FOCUS_TOKENS.some(token => lowered.includes(token))) {
        lines.push(`- Most activity was in '${name}', which suggests active project/documentation work.`)
      } else {
        lines.push(`- Most activity was in '${name}'. Review these changes to confirm they are expected.`)
      }
    }

    const { document, code, data } = pattern.contentCounts
    if (document > 0) {
      lines.push(`- ${plural(document, 'document')} changed, indicating ongoing writing or documentation.`)
    }
    if (code > 0) {
      lines.push(`- ${plural(code, 'code file')} changed, suggesting active development.`)
    }
    if (data > 0) {
      lines.push(`- ${plural(data, 'data file')} changed, pointing to data or configuration updates.`)
    }

    const deleted = pattern.records.filter(record => record.deleted).length
    if (deleted > 0) {
      lines.push(`- ${plural(deleted, 'file')} ${deleted === 1 ? 'was' : 'were'} deleted.`)
    }

    const intensity = classifyIntensity(
      pattern.totalChanges,
      this.highActivityThreshold,
      this.lightActivityThreshold
    )
    lines.push(`- Overall activity was ${intensity} with ${plural(pattern.totalChanges, 'change')} in this period.`)

    return lines.join('\n')
  }
}
