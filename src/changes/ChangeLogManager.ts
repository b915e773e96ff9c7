import { v4 as uuidv4 } from 'uuid'
import { Storage } from '../storage/Storage'
import { ChangeLog, FileChangeEvent, StoredChange } from '../contracts'
import { debugLog } from '../logging/debugLog'

/**
 * Identity of an observed change: the same revision of the same file is
 * only stored once no matter how many polls report it. A deletion has no
 * revision, so each path's deletion is stored once.
 */
export function changeKey(change: { path: string; rev?: string; serverModified?: string; deleted?: boolean }): string {
  if (change.deleted) return `${change.path}@deleted`
  return `${change.path}@${change.rev ?? change.serverModified ?? ''}`
}

const storedKey = (change: StoredChange): string =>
  changeKey({
    path: change.path,
    rev: change.metadata?.rev,
    serverModified: change.metadata?.serverModified,
    deleted: change.metadata?.deleted,
  })

export class ChangeLogManager {
  private static readonly DEFAULT_MAX_ENTRIES = 5000

  constructor(
    private storage: Storage,
    private maxEntries: number = ChangeLogManager.DEFAULT_MAX_ENTRIES
  ) {}

  /**
   * Persist newly observed changes and return how many were not seen before
   */
  async record(events: readonly FileChangeEvent[], observedAt: Date = new Date()): Promise<number> {
    const log = await this.storage.getChangeLog() || this.emptyLog()
    const fresh = unseenIn(log, events)

    for (const event of fresh) {
      log.entries.push({
        id: uuidv4(),
        path: event.path,
        observedAt: observedAt.toISOString(),
        metadata: {
          serverModified: event.serverModified,
          ...(event.size !== undefined ? { size: event.size } : {}),
          ...(event.rev !== undefined ? { rev: event.rev } : {}),
          ...(event.contentHash !== undefined ? { contentHash: event.contentHash } : {}),
          ...(event.deleted ? { deleted: true } : {}),
        },
      })
    }
    const added = fresh.length

    // Keep the newest entries
    log.maxEntries = this.maxEntries
    if (log.entries.length > log.maxEntries) {
      log.entries = log.entries.slice(log.entries.length - log.maxEntries)
    }

    log.lastUpdated = new Date().toISOString()
    await this.storage.saveChangeLog(log)

    debugLog({ event: 'changes_recorded', received: events.length, added })
    return added
  }

  /**
   * Events not in the log yet, first occurrence only. Nothing is written.
   */
  async unseen(events: readonly FileChangeEvent[]): Promise<FileChangeEvent[]> {
    const log = await this.storage.getChangeLog() || this.emptyLog()
    return unseenIn(log, events)
  }

  async getEntries(): Promise<StoredChange[]> {
    const log = await this.storage.getChangeLog()
    return log ? log.entries : []
  }

  private emptyLog(): ChangeLog {
    return {
      entries: [],
      maxEntries: this.maxEntries,
      lastUpdated: new Date().toISOString(),
    }
  }
}

function unseenIn(log: ChangeLog, events: readonly FileChangeEvent[]): FileChangeEvent[] {
  const seen = new Set(log.entries.map(storedKey))
  return events.filter(event => {
    const key = changeKey(event)
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}
