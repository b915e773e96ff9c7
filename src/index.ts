export * from './contracts'
export { ChangeRecord, TOP_LEVEL_DIRECTORY } from './records/ChangeRecord'
export { ActivityAnalyzer, rankCounts } from './analysis/ActivityAnalyzer'
export type { ActivityAnalyzerOptions, ActivityPattern, ChangeInput } from './analysis/ActivityAnalyzer'
export type { ContentClassifier, ContentFetcher } from './classification/ContentClassifier'
export { KeywordContentClassifier } from './classification/KeywordContentClassifier'
export type { KeywordClassifierOptions } from './classification/KeywordContentClassifier'
export { NarrativeRenderer, QUIET_PERIOD_SENTENCE } from './rendering/NarrativeRenderer'
export type { NarrativeRendererOptions } from './rendering/NarrativeRenderer'
export type { ReportRenderer } from './rendering/ReportRenderer'
export { FileListRenderer } from './rendering/FileListRenderer'
export type { FileListRendererOptions } from './rendering/FileListRenderer'
export { HtmlRenderer, escapeHtml } from './rendering/HtmlRenderer'
export type { HtmlRendererOptions } from './rendering/HtmlRenderer'
export { formatTimestamp, parsePeriod, resolveWindow, systemClock } from './window/ReportWindow'
export type { Clock } from './window/ReportWindow'
export { ReportService, buildSubject } from './reporting/ReportService'
export type { ReportServiceDeps, ReportRunResult } from './reporting/ReportService'
export { createReportService } from './reporting/createReportService'
export type { ChangeSource } from './sources/ChangeSource'
export { DropboxChangeSource } from './sources/DropboxChangeSource'
export { DropboxContentFetcher } from './sources/DropboxContentFetcher'
export type { Dispatcher } from './dispatch/Dispatcher'
export { HttpEmailDispatcher } from './dispatch/HttpEmailDispatcher'
export { ConsoleDispatcher } from './dispatch/ConsoleDispatcher'
export type { Storage } from './storage/Storage'
export { FileStorage } from './storage/FileStorage'
export { MemoryStorage } from './storage/MemoryStorage'
export { ChangeLogManager } from './changes/ChangeLogManager'
export { ReportHistoryManager } from './history/ReportHistoryManager'
export { ConfigLoader } from './config/ConfigLoader'
