import { z } from 'zod'

export const ContentTypeSchema = z.enum(['document', 'code', 'data', 'unknown'])

export const ReportPeriodSchema = z.enum(['tenMin', 'hour', 'day', 'custom'])

export const ReportFormatSchema = z.enum(['narrative', 'fileList'])

// Persisted state
export const StoredChangeSchema = z.object({
  id: z.string(),
  path: z.string().min(1),
  observedAt: z.string(),
  metadata: z.object({
    serverModified: z.string().optional(),
    size: z.number().optional(),
    rev: z.string().optional(),
    contentHash: z.string().optional(),
    deleted: z.boolean().optional(),
  }).optional(),
})

export const ChangeLogSchema = z.object({
  entries: z.array(StoredChangeSchema),
  maxEntries: z.number().int().positive(),
  lastUpdated: z.string(),
})

export const ReportRecordSchema = z.object({
  id: z.string(),
  generatedAt: z.string(),
  period: ReportPeriodSchema,
  since: z.string(),
  until: z.string(),
  totalChanges: z.number().int().nonnegative(),
  subject: z.string(),
  delivered: z.boolean(),
  error: z.string().optional(),
})

export const ReportHistorySchema = z.object({
  records: z.array(ReportRecordSchema),
  maxRecords: z.number().int().positive(),
  lastUpdated: z.string(),
})

// Config schema
const profile = (topK: number, highActivityThreshold: number, lightActivityThreshold: number) =>
  z.object({
    topK: z.number().int().positive().default(topK),
    highActivityThreshold: z.number().int().nonnegative().default(highActivityThreshold),
    lightActivityThreshold: z.number().int().nonnegative().default(lightActivityThreshold),
  }).default({ topK, highActivityThreshold, lightActivityThreshold })

export const DigestConfigSchema = z.object({
  report: z.object({
    title: z.string().default('Dropbox Activity Report'),
    subjectPrefix: z.string().default('Dropbox Activity Report'),
    sendEmptyReports: z.boolean().default(false),
    format: ReportFormatSchema.default('narrative'),
    html: z.boolean().default(false),
    profiles: z.object({
      tenMin: profile(3, 10, 3),
      hour: profile(5, 10, 3),
      day: profile(5, 100, 10),
      custom: profile(3, 100, 10),
    }).default({}),
  }).default({}),
  analysis: z.object({
    classifyContent: z.boolean().default(true),
    concurrency: z.number().int().positive().default(4),
    maxSampleBytes: z.number().int().positive().default(4096),
    maxKeywords: z.number().int().positive().default(5),
  }).default({}),
  dropbox: z.object({
    rootPath: z.string().default(''),
    includeDeleted: z.boolean().default(false),
  }).default({}),
  email: z.object({
    from: z.string().optional(),
    recipients: z.array(z.string().email()).default([]),
  }).default({}),
  storage: z.object({
    dataDir: z.string().optional(),
    maxChangeEntries: z.number().int().positive().default(5000),
    maxReportRecords: z.number().int().positive().default(50),
  }).default({}),
})

// Dropbox API responses
export const DropboxEntrySchema = z.object({
  '.tag': z.string(),
  path_display: z.string().optional(),
  path_lower: z.string().optional(),
  server_modified: z.string().optional(),
  size: z.number().optional(),
  rev: z.string().optional(),
  content_hash: z.string().optional(),
})

export const DropboxListFolderSchema = z.object({
  entries: z.array(DropboxEntrySchema),
  cursor: z.string(),
  has_more: z.boolean(),
})

export type DropboxEntry = z.infer<typeof DropboxEntrySchema>
