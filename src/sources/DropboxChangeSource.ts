import { AxiosInstance } from 'axios'
import { ChangeSource } from './ChangeSource'
import { DROPBOX_API_URL, describeHttpError } from './dropbox'
import {
  DropboxEntry,
  DropboxListFolderSchema,
  FileChangeEvent,
  ReportWindow,
} from '../contracts'
import { containsTimestamp } from '../window/ReportWindow'
import { debugLog } from '../logging/debugLog'

export interface DropboxChangeSourceOptions {
  rootPath?: string
  maxPages?: number
  includeDeleted?: boolean
}

/**
 * Lists files under a Dropbox folder and keeps those whose server-side
 * modification time falls inside the report window. Deleted entries carry
 * no timestamp; when included they are stamped with the window end.
 */
export class DropboxChangeSource implements ChangeSource {
  private static readonly DEFAULT_MAX_PAGES = 1000

  private rootPath: string
  private maxPages: number
  private includeDeleted: boolean

  constructor(
    private http: AxiosInstance,
    options: DropboxChangeSourceOptions = {}
  ) {
    this.rootPath = normalizeRootPath(options.rootPath ?? '')
    this.maxPages = options.maxPages ?? DropboxChangeSource.DEFAULT_MAX_PAGES
    this.includeDeleted = options.includeDeleted ?? false
  }

  async listChanges(window: ReportWindow): Promise<FileChangeEvent[]> {
    const changes: FileChangeEvent[] = []
    let page = await this.request('/files/list_folder', {
      path: this.rootPath,
      recursive: true,
      include_deleted: this.includeDeleted,
    })
    let pages = 1

    for (;;) {
      for (const entry of page.entries) {
        if (entry['.tag'] === 'deleted') {
          const deletion = this.includeDeleted ? toDeletionEvent(entry, window) : null
          if (deletion) changes.push(deletion)
          continue
        }
        const change = toChangeEvent(entry)
        if (change && containsTimestamp(window, new Date(change.serverModified))) {
          changes.push(change)
        }
      }

      if (!page.has_more) break
      if (pages >= this.maxPages) {
        throw new Error(`Dropbox listing exceeded ${this.maxPages} pages`)
      }
      page = await this.request('/files/list_folder/continue', { cursor: page.cursor })
      pages++
    }

    debugLog({ event: 'dropbox_changes_listed', pages, changes: changes.length })

    return changes.sort((a, b) =>
      Date.parse(a.serverModified) - Date.parse(b.serverModified) ||
      (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)
    )
  }

  private async request(endpoint: string, body: Record<string, unknown>) {
    let data: unknown
    try {
      const response = await this.http.post(`${DROPBOX_API_URL}${endpoint}`, body, {
        headers: { 'Content-Type': 'application/json' },
      })
      data = response.data
    } catch (error) {
      throw new Error(`Dropbox request ${endpoint} failed: ${describeHttpError(error)}`, { cause: error })
    }

    const parsed = DropboxListFolderSchema.safeParse(data)
    if (!parsed.success) {
      throw new Error(`Unexpected Dropbox response from ${endpoint}: ${parsed.error.message}`)
    }
    return parsed.data
  }
}

function toChangeEvent(entry: DropboxEntry): FileChangeEvent | null {
  const path = entry.path_display ?? entry.path_lower
  if (entry['.tag'] !== 'file' || !path || !entry.server_modified) {
    return null
  }

  return {
    path,
    serverModified: entry.server_modified,
    ...(entry.size !== undefined ? { size: entry.size } : {}),
    ...(entry.rev !== undefined ? { rev: entry.rev } : {}),
    ...(entry.content_hash !== undefined ? { contentHash: entry.content_hash } : {}),
  }
}

function toDeletionEvent(entry: DropboxEntry, window: ReportWindow): FileChangeEvent | null {
  const path = entry.path_display ?? entry.path_lower
  if (!path) return null
  return { path, serverModified: window.until.toISOString(), deleted: true }
}

// Dropbox wants "" for the account root and "/folder" otherwise
function normalizeRootPath(rootPath: string): string {
  const trimmed = rootPath.trim().replace(/\/+$/, '')
  if (trimmed === '' || trimmed === '/') return ''
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}
