import { ReportWindow } from '../contracts'
import { ActivityPattern } from '../analysis/ActivityAnalyzer'

/**
 * Turns one report's activity pattern into a document. Renderers are pure
 * apart from the generation timestamp.
 */
export interface ReportRenderer {
  render(window: ReportWindow, pattern: ActivityPattern): string
}

const BYTES_PER_MEGABYTE = 1024 * 1024

export function formatMegabytes(bytes: number): string {
  return `${(bytes / BYTES_PER_MEGABYTE).toFixed(2)} MB`
}
