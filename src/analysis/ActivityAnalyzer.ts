import pLimit from 'p-limit'
import {
  ClassificationFailure,
  ClassificationUnavailableError,
  CONTENT_TYPES,
  ContentType,
  FileChangeEvent,
  RankedEntry,
} from '../contracts'
import { ChangeRecord } from '../records/ChangeRecord'
import { ContentClassifier } from '../classification/ContentClassifier'
import { debugLog, errorMessage } from '../logging/debugLog'

export interface ActivityPattern {
  totalChanges: number
  records: ChangeRecord[]
  topDirectories: RankedEntry[]
  topFileTypes: RankedEntry[]
  contentCounts: Record<ContentType, number>
  classifiedRecords: ChangeRecord[]
  classificationFailures: ClassificationFailure[]
}

// A bare path or a full event from a change source
export type ChangeInput = string | FileChangeEvent

export interface ActivityAnalyzerOptions {
  topK?: number
  concurrency?: number
  classifier?: ContentClassifier | null
}

/**
 * Rank counted keys by count descending. Equal counts are ordered by
 * ascending key so the same input always ranks the same way.
 */
export function rankCounts(counts: ReadonlyMap<string, number>, limit: number): RankedEntry[] {
  return Array.from(counts.entries(), ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .slice(0, Math.max(0, limit))
}

export function emptyContentCounts(): Record<ContentType, number> {
  return { document: 0, code: 0, data: 0, unknown: 0 }
}

export class ActivityAnalyzer {
  private static readonly DEFAULT_TOP_K = 5
  private static readonly DEFAULT_CONCURRENCY = 4

  private topK: number
  private concurrency: number
  private classifier: ContentClassifier | null

  constructor(options: ActivityAnalyzerOptions = {}) {
    this.topK = options.topK ?? ActivityAnalyzer.DEFAULT_TOP_K
    this.concurrency = options.concurrency ?? ActivityAnalyzer.DEFAULT_CONCURRENCY
    this.classifier = options.classifier ?? null
  }

  /**
   * Build a fresh activity pattern for one report. Every path counts once,
   * duplicates included. A malformed path rejects the whole call before any
   * classification runs; classification failures only leave that record
   * unclassified. Deleted files have no content and are not classified.
   */
  async analyze(changes: readonly ChangeInput[]): Promise<ActivityPattern> {
    let records = changes.map(change =>
      typeof change === 'string' ? ChangeRecord.fromPath(change) : ChangeRecord.fromEvent(change)
    )
    const classificationFailures: ClassificationFailure[] = []

    if (this.classifier) {
      const outcomes = await this.classifyAll(this.classifier, records)
      records = outcomes.map(outcome => outcome.record)
      for (const outcome of outcomes) {
        if (outcome.failure) {
          classificationFailures.push(outcome.failure)
        }
      }
    }

    const directoryCounts = new Map<string, number>()
    const extensionCounts = new Map<string, number>()
    const contentCounts = emptyContentCounts()
    const classifiedRecords: ChangeRecord[] = []

    for (const record of records) {
      directoryCounts.set(record.directory, (directoryCounts.get(record.directory) ?? 0) + 1)
      extensionCounts.set(record.extension, (extensionCounts.get(record.extension) ?? 0) + 1)

      if (record.classification) {
        contentCounts[record.classification.contentType]++
        classifiedRecords.push(record)
      }
    }

    debugLog({
      event: 'activity_analyzed',
      totalChanges: records.length,
      classified: classifiedRecords.length,
      failures: classificationFailures.length,
      contentTypes: CONTENT_TYPES.filter(type => contentCounts[type] > 0),
    })

    return {
      totalChanges: records.length,
      records,
      topDirectories: rankCounts(directoryCounts, this.topK),
      topFileTypes: rankCounts(extensionCounts, this.topK),
      contentCounts,
      classifiedRecords,
      classificationFailures,
    }
  }

  // Fan out with a concurrency cap; Promise.all is the join before tallying
  private async classifyAll(
    classifier: ContentClassifier,
    records: ChangeRecord[]
  ): Promise<Array<{ record: ChangeRecord; failure?: ClassificationFailure }>> {
    const limit = pLimit(this.concurrency)

    return Promise.all(records.map(record => limit(async () => {
      if (record.deleted) return { record }
      try {
        const classification = await classifier.classify(record.path)
        return { record: record.withClassification(classification) }
      } catch (error) {
        const reason = error instanceof ClassificationUnavailableError ? error.reason : errorMessage(error)
        debugLog({ event: 'classification_failed', path: record.path, reason })
        return { record, failure: { path: record.path, reason } }
      }
    })))
  }
}
