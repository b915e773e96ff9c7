import { Storage } from './Storage'
import { ChangeLog, ReportHistory } from '../contracts'

export class MemoryStorage implements Storage {
  private changeLog: ChangeLog | null = null
  private reportHistory: ReportHistory | null = null

  async getChangeLog(): Promise<ChangeLog | null> {
    return this.changeLog ? structuredClone(this.changeLog) : null
  }

  async saveChangeLog(log: ChangeLog): Promise<void> {
    this.changeLog = structuredClone(log)
  }

  async getReportHistory(): Promise<ReportHistory | null> {
    return this.reportHistory ? structuredClone(this.reportHistory) : null
  }

  async saveReportHistory(history: ReportHistory): Promise<void> {
    this.reportHistory = structuredClone(history)
  }

  async clearAll(): Promise<void> {
    this.changeLog = null
    this.reportHistory = null
  }
}
