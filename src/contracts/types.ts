export type ContentType = 'document' | 'code' | 'data' | 'unknown'

export const CONTENT_TYPES: readonly ContentType[] = ['document', 'code', 'data', 'unknown']

export type ReportPeriod = 'tenMin' | 'hour' | 'day' | 'custom'

export type FixedPeriod = Exclude<ReportPeriod, 'custom'>

export interface Classification {
  contentType: ContentType
  keywords: string[]
  topics: string[]
  summary: string
}

export interface RankedEntry {
  key: string
  count: number
}

export interface ClassificationFailure {
  path: string
  reason: string
}

export interface ReportWindow {
  readonly period: ReportPeriod
  readonly since: Date
  readonly until: Date
  readonly label: string
}

export type WindowRequest =
  | { period: FixedPeriod }
  | { period: 'custom'; since: Date; until?: Date }

/**
 * One change reported by a change source for a report window. Deletions
 * carry no server timestamp; their serverModified is the time they were
 * observed.
 */
export interface FileChangeEvent {
  path: string
  serverModified: string
  size?: number
  rev?: string
  contentHash?: string
  deleted?: boolean
}

export type ReportFormat = 'narrative' | 'fileList'

export interface StoredChange {
  id: string
  path: string
  observedAt: string
  metadata?: {
    serverModified?: string
    size?: number
    rev?: string
    contentHash?: string
    deleted?: boolean
  }
}

export interface ChangeLog {
  entries: StoredChange[]
  maxEntries: number
  lastUpdated: string
}

export interface ReportRecord {
  id: string
  generatedAt: string
  period: ReportPeriod
  since: string
  until: string
  totalChanges: number
  subject: string
  delivered: boolean
  error?: string
}

export interface ReportHistory {
  records: ReportRecord[]
  maxRecords: number
  lastUpdated: string
}

export interface DispatchMessage {
  recipients: string[]
  subject: string
  body: string
  html?: string
}

export type DispatchResult =
  | { delivered: true }
  | { delivered: false; error: string }

export interface ReportProfile {
  topK: number
  highActivityThreshold: number
  lightActivityThreshold: number
}

export interface DigestConfig {
  report: {
    title: string
    subjectPrefix: string
    sendEmptyReports: boolean
    format: ReportFormat
    html: boolean
    profiles: Record<ReportPeriod, ReportProfile>
  }
  analysis: {
    classifyContent: boolean
    concurrency: number
    maxSampleBytes: number
    maxKeywords: number
  }
  dropbox: {
    rootPath: string
    includeDeleted: boolean
  }
  email: {
    from?: string
    recipients: string[]
  }
  storage: {
    dataDir?: string
    maxChangeEntries: number
    maxReportRecords: number
  }
}

export interface Credentials {
  dropboxToken?: string
  emailApiKey?: string
  from?: string
  recipients: string[]
}
