import { promises as fs } from 'fs'
import path from 'path'
import os from 'os'
import { z } from 'zod'
import { Storage } from './Storage'
import {
  ChangeLog,
  ReportHistory,
  ChangeLogSchema,
  ReportHistorySchema,
} from '../contracts'
import { debugLog, errorMessage } from '../logging/debugLog'

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.drop-digest')

export class FileStorage implements Storage {
  private dataDir: string
  private changeLogFile: string
  private reportHistoryFile: string

  constructor(dataDir: string = DEFAULT_DATA_DIR) {
    this.dataDir = dataDir
    this.changeLogFile = path.join(this.dataDir, 'change-log.json')
    this.reportHistoryFile = path.join(this.dataDir, 'report-history.json')
  }

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true })
  }

  async getChangeLog(): Promise<ChangeLog | null> {
    return this.readJson(this.changeLogFile, ChangeLogSchema, 'getChangeLog')
  }

  async saveChangeLog(log: ChangeLog): Promise<void> {
    await this.writeJson(this.changeLogFile, log)
  }

  async getReportHistory(): Promise<ReportHistory | null> {
    return this.readJson(this.reportHistoryFile, ReportHistorySchema, 'getReportHistory')
  }

  async saveReportHistory(history: ReportHistory): Promise<void> {
    await this.writeJson(this.reportHistoryFile, history)
  }

  async clearAll(): Promise<void> {
    await fs.rm(this.dataDir, { recursive: true, force: true })
  }

  // Missing, unreadable or invalid files read as "nothing stored yet"
  private async readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, method: string): Promise<T | null> {
    try {
      const data = await fs.readFile(file, 'utf8')
      return schema.parse(JSON.parse(data))
    } catch (error) {
      debugLog({
        event: 'storage_error',
        method,
        file,
        error: errorMessage(error),
      })
      return null
    }
  }

  private async writeJson(file: string, value: unknown): Promise<void> {
    await this.ensureDir()
    const tmpFile = `${file}.tmp`
    await fs.writeFile(tmpFile, JSON.stringify(value, null, 2), 'utf8')
    await fs.rename(tmpFile, file)
  }
}
