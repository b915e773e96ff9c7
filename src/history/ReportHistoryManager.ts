import { v4 as uuidv4 } from 'uuid'
import { Storage } from '../storage/Storage'
import { ReportRecord, ReportHistory } from '../contracts'

export class ReportHistoryManager {
  private static readonly DEFAULT_MAX_RECORDS = 50

  constructor(
    private storage: Storage,
    private maxRecords: number = ReportHistoryManager.DEFAULT_MAX_RECORDS
  ) {}

  async addReport(record: Omit<ReportRecord, 'id' | 'generatedAt'>, generatedAt: Date = new Date()): Promise<ReportRecord> {
    const history = await this.storage.getReportHistory() || this.emptyHistory()

    const newRecord: ReportRecord = {
      ...record,
      id: uuidv4(),
      generatedAt: generatedAt.toISOString(),
    }

    // Newest first, trimmed to max size
    history.records.unshift(newRecord)
    history.maxRecords = this.maxRecords
    if (history.records.length > history.maxRecords) {
      history.records = history.records.slice(0, history.maxRecords)
    }

    history.lastUpdated = new Date().toISOString()
    await this.storage.saveReportHistory(history)
    return newRecord
  }

  async getRecentReports(limit?: number): Promise<ReportRecord[]> {
    const history = await this.storage.getReportHistory()
    if (!history) return []

    return limit ? history.records.slice(0, limit) : history.records
  }

  async clearHistory(): Promise<void> {
    await this.storage.saveReportHistory(this.emptyHistory())
  }

  private emptyHistory(): ReportHistory {
    return {
      records: [],
      maxRecords: this.maxRecords,
      lastUpdated: new Date().toISOString(),
    }
  }
}
