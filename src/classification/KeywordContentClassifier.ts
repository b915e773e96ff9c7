import { Classification, ClassificationUnavailableError, ContentType } from '../contracts'
import { ChangeRecord } from '../records/ChangeRecord'
import { errorMessage } from '../logging/debugLog'
import { ContentClassifier, ContentFetcher } from './ContentClassifier'
import vocabulary from './vocabulary.json'

export interface KeywordClassifierOptions {
  maxSampleBytes?: number
  maxKeywords?: number
  summaryLength?: number
}

export const DEFAULT_TOPIC = vocabulary.defaultTopic

const CONTENT_TYPE_BY_EXTENSION = new Map<string, ContentType>()
for (const extension of vocabulary.extensions.document) CONTENT_TYPE_BY_EXTENSION.set(extension, 'document')
for (const extension of vocabulary.extensions.code) CONTENT_TYPE_BY_EXTENSION.set(extension, 'code')
for (const extension of vocabulary.extensions.data) CONTENT_TYPE_BY_EXTENSION.set(extension, 'data')

const SKIPPED_EXTENSIONS = new Set(vocabulary.skipExtensions)
const STOP_WORDS = new Set(vocabulary.stopWords)
const TOPICS: Array<[string, string[]]> = Object.entries(vocabulary.topics)

/**
 * Heuristic classifier: the content type comes from the file extension,
 * keywords and topics from a text sample fetched for the file.
 */
export class KeywordContentClassifier implements ContentClassifier {
  private static readonly DEFAULT_MAX_SAMPLE_BYTES = 4096
  private static readonly DEFAULT_MAX_KEYWORDS = 5
  private static readonly DEFAULT_SUMMARY_LENGTH = 200

  private maxSampleBytes: number
  private maxKeywords: number
  private summaryLength: number

  constructor(
    private fetcher: ContentFetcher,
    options: KeywordClassifierOptions = {}
  ) {
    this.maxSampleBytes = options.maxSampleBytes ?? KeywordContentClassifier.DEFAULT_MAX_SAMPLE_BYTES
    this.maxKeywords = options.maxKeywords ?? KeywordContentClassifier.DEFAULT_MAX_KEYWORDS
    this.summaryLength = options.summaryLength ?? KeywordContentClassifier.DEFAULT_SUMMARY_LENGTH
  }

  async classify(path: string): Promise<Classification> {
    let extension: string
    try {
      extension = ChangeRecord.fromPath(path).extension
    } catch (error) {
      throw new ClassificationUnavailableError(path, errorMessage(error), { cause: error })
    }

    if (SKIPPED_EXTENSIONS.has(extension)) {
      throw new ClassificationUnavailableError(path, 'skipped')
    }

    let sample: string
    try {
      sample = await this.fetcher.fetchSample(path, this.maxSampleBytes)
    } catch (error) {
      throw new ClassificationUnavailableError(
        path,
        `content fetch failed: ${errorMessage(error)}`,
        { cause: error }
      )
    }

    // NUL bytes mean the sample is not text
    if (sample.includes('\u0000')) {
      throw new ClassificationUnavailableError(path, 'binary content')
    }

    return {
      contentType: contentTypeForExtension(extension),
      keywords: this.extractKeywords(sample),
      topics: extractTopics(sample),
      summary: this.summarize(sample),
    }
  }

  /**
   * Most frequent non-stop-words, ties kept in order of first occurrence
   */
  extractKeywords(text: string): string[] {
    const counts = new Map<string, number>()
    for (const token of tokenize(text)) {
      if (token.length < 3 || STOP_WORDS.has(token)) continue
      counts.set(token, (counts.get(token) ?? 0) + 1)
    }

    return Array.from(counts.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, this.maxKeywords)
      .map(([word]) => word)
  }

  summarize(text: string): string {
    const collapsed = text.replace(/\s+/g, ' ').trim()
    if (collapsed.length <= this.summaryLength) {
      return collapsed
    }
    return collapsed.slice(0, this.summaryLength) + '...'
  }
}

export function contentTypeForExtension(extension: string): ContentType {
  return CONTENT_TYPE_BY_EXTENSION.get(extension.toLowerCase()) ?? 'unknown'
}

/**
 * Topics whose trigger words appear in the text, in vocabulary order.
 * Falls back to the default topic when nothing matches.
 */
export function extractTopics(text: string): string[] {
  const tokens = new Set(tokenize(text))
  const topics = TOPICS
    .filter(([, triggers]) => triggers.some(trigger => tokens.has(trigger)))
    .map(([topic]) => topic)

  return topics.length > 0 ? topics : [DEFAULT_TOPIC]
}

export function isDefaultTopicList(topics: readonly string[]): boolean {
  return topics.length === 0 || (topics.length === 1 && topics[0] === DEFAULT_TOPIC)
}

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z][a-z0-9]*/g) ?? []
}
