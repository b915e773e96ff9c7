import {
  DigestConfig,
  DispatchResult,
  ReportWindow,
  WindowRequest,
} from '../contracts'
import { ActivityAnalyzer, ChangeInput } from '../analysis/ActivityAnalyzer'
import { ContentClassifier } from '../classification/ContentClassifier'
import { ReportRenderer } from '../rendering/ReportRenderer'
import { NarrativeRenderer } from '../rendering/NarrativeRenderer'
import { FileListRenderer } from '../rendering/FileListRenderer'
import { HtmlRenderer } from '../rendering/HtmlRenderer'
import { ChangeSource } from '../sources/ChangeSource'
import { Dispatcher } from '../dispatch/Dispatcher'
import { Storage } from '../storage/Storage'
import { ChangeLogManager } from '../changes/ChangeLogManager'
import { ReportHistoryManager } from '../history/ReportHistoryManager'
import { Clock, resolveWindow, systemClock } from '../window/ReportWindow'
import { debugLog } from '../logging/debugLog'

export interface ReportServiceDeps {
  config: DigestConfig
  source: ChangeSource
  storage: Storage
  dispatcher: Dispatcher
  classifier?: ContentClassifier | null
  recipients?: string[]
  clock?: Clock
  // dry runs leave the change log and report history untouched
  dryRun?: boolean
}

export interface ReportRunResult {
  window: ReportWindow
  report: string
  html?: string
  subject: string
  totalChanges: number
  newChanges: number
  // null when an empty report was not sent
  delivery: DispatchResult | null
}

export function buildSubject(prefix: string, window: ReportWindow, totalChanges: number): string {
  const noun = totalChanges === 1 ? 'change' : 'changes'
  return `${prefix} - ${window.label} (${totalChanges} ${noun})`
}

interface RenderedReport {
  text: string
  html?: string
}

/**
 * Polls, persists, renders and delivers one report per call
 */
export class ReportService {
  private config: DigestConfig
  private source: ChangeSource
  private dispatcher: Dispatcher
  private classifier: ContentClassifier | null
  private recipients: string[]
  private clock: Clock
  private dryRun: boolean
  private changeLog: ChangeLogManager
  private history: ReportHistoryManager

  constructor(deps: ReportServiceDeps) {
    this.config = deps.config
    this.source = deps.source
    this.dispatcher = deps.dispatcher
    this.classifier = deps.classifier ?? null
    this.recipients = deps.recipients ?? deps.config.email.recipients
    this.clock = deps.clock ?? systemClock
    this.dryRun = deps.dryRun ?? false
    this.changeLog = new ChangeLogManager(deps.storage, deps.config.storage.maxChangeEntries)
    this.history = new ReportHistoryManager(deps.storage, deps.config.storage.maxReportRecords)
  }

  /**
   * Analyze and render the given changes for an already resolved window,
   * using the profile configured for the window's period.
   */
  async generateReport(window: ReportWindow, rawChanges: readonly ChangeInput[]): Promise<string> {
    const { text } = await this.buildReport(window, rawChanges)
    return text
  }

  private async buildReport(window: ReportWindow, rawChanges: readonly ChangeInput[]): Promise<RenderedReport> {
    const profile = this.config.report.profiles[window.period]

    const analyzer = new ActivityAnalyzer({
      topK: profile.topK,
      concurrency: this.config.analysis.concurrency,
      classifier: this.config.analysis.classifyContent ? this.classifier : null,
    })
    const pattern = await analyzer.analyze(rawChanges)

    const { title } = this.config.report
    const renderer: ReportRenderer = this.config.report.format === 'fileList'
      ? new FileListRenderer({ title, clock: this.clock })
      : new NarrativeRenderer({
        title,
        highActivityThreshold: profile.highActivityThreshold,
        lightActivityThreshold: profile.lightActivityThreshold,
        clock: this.clock,
      })

    const text = renderer.render(window, pattern)
    if (!this.config.report.html) {
      return { text }
    }
    return { text, html: new HtmlRenderer({ title, clock: this.clock }).render(window, pattern) }
  }

  buildSubject(window: ReportWindow, totalChanges: number): string {
    return buildSubject(this.config.report.subjectPrefix, window, totalChanges)
  }

  async run(request: WindowRequest): Promise<ReportRunResult> {
    const window = resolveWindow(request, this.clock)
    debugLog({
      event: 'report_started',
      period: window.period,
      since: window.since.toISOString(),
      until: window.until.toISOString(),
    })

    const listed = await this.source.listChanges(window)
    // a deletion has no revision, so it is reported only the first time it is seen
    const unseen = await this.changeLog.unseen(listed)
    const fresh = new Set(unseen)
    const changes = listed.filter(change => !change.deleted || fresh.has(change))

    // rendering validates every path, so nothing is stored for a rejected batch
    const { text: report, html } = await this.buildReport(window, changes)
    const newChanges = this.dryRun ? unseen.length : await this.changeLog.record(changes, this.clock())

    const totalChanges = changes.length
    const subject = this.buildSubject(window, totalChanges)

    let delivery: DispatchResult | null = null
    if (totalChanges > 0 || this.config.report.sendEmptyReports) {
      delivery = await this.dispatcher.send({
        recipients: this.recipients,
        subject,
        body: report,
        ...(html ? { html } : {}),
      })
    }

    if (!this.dryRun) {
      await this.history.addReport({
        period: window.period,
        since: window.since.toISOString(),
        until: window.until.toISOString(),
        totalChanges,
        subject,
        delivered: delivery?.delivered ?? false,
        ...(delivery && !delivery.delivered ? { error: delivery.error } : {}),
      }, this.clock())
    }

    debugLog({
      event: 'report_finished',
      totalChanges,
      newChanges,
      dryRun: this.dryRun,
      delivered: delivery?.delivered ?? null,
    })

    return { window, report, ...(html ? { html } : {}), subject, totalChanges, newChanges, delivery }
  }
}
