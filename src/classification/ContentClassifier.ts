import { Classification } from '../contracts'

/**
 * Maps a changed file to a coarse content type and a keyword/topic summary.
 *
 * Implementations must be idempotent for unchanged content and must reject
 * with ClassificationUnavailableError instead of throwing anything else,
 * so the analyzer can keep going when a single file cannot be classified.
 */
export interface ContentClassifier {
  classify(path: string): Promise<Classification>
}

/**
 * Fetches a text sample of a file from wherever the changes were observed
 */
export interface ContentFetcher {
  fetchSample(path: string, maxBytes: number): Promise<string>
}
