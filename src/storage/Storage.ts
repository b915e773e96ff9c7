import { ChangeLog, ReportHistory } from '../contracts'

export interface Storage {
  // Observed changes
  getChangeLog(): Promise<ChangeLog | null>
  saveChangeLog(log: ChangeLog): Promise<void>

  // Generated reports
  getReportHistory(): Promise<ReportHistory | null>
  saveReportHistory(history: ReportHistory): Promise<void>

  // Cleanup
  clearAll(): Promise<void>
}
