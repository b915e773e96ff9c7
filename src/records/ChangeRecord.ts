import { Classification, FileChangeEvent, InvalidRecordError } from '../contracts'

/** Directory value for files that sit at the account root */
export const TOP_LEVEL_DIRECTORY = '.'

export interface ChangeDetails {
  size?: number
  deleted?: boolean
  serverModified?: string
}

export class ChangeRecord {
  private constructor(
    readonly path: string,
    private details: Readonly<ChangeDetails>,
    readonly classification?: Readonly<Classification>
  ) {}

  /**
   * Build a record from a raw change path. Backslashes become slashes and
   * empty or "." segments are dropped, so "/Docs//a.txt" and "Docs/a.txt"
   * produce the same record.
   */
  static fromPath(rawPath: string, details: ChangeDetails = {}): ChangeRecord {
    const segments = rawPath
      .trim()
      .replace(/\\/g, '/')
      .split('/')
      .filter(segment => segment.length > 0 && segment !== '.')

    if (segments.length === 0) {
      throw new InvalidRecordError(rawPath)
    }

    return new ChangeRecord(segments.join('/'), Object.freeze({ ...details }))
  }

  static fromEvent(event: FileChangeEvent): ChangeRecord {
    return ChangeRecord.fromPath(event.path, {
      ...(event.size !== undefined ? { size: event.size } : {}),
      ...(event.deleted ? { deleted: true } : {}),
      serverModified: event.serverModified,
    })
  }

  get name(): string {
    const index = this.path.lastIndexOf('/')
    return index === -1 ? this.path : this.path.slice(index + 1)
  }

  get directory(): string {
    const index = this.path.lastIndexOf('/')
    return index === -1 ? TOP_LEVEL_DIRECTORY : this.path.slice(0, index)
  }

  get extension(): string {
    const name = this.name
    const index = name.lastIndexOf('.')
    return index === -1 ? '' : name.slice(index + 1).toLowerCase()
  }

  // Bytes; 0 when the source did not report a size
  get size(): number {
    return this.details.size ?? 0
  }

  get deleted(): boolean {
    return this.details.deleted === true
  }

  get serverModified(): string | undefined {
    return this.details.serverModified
  }

  get isClassified(): boolean {
    return this.classification !== undefined
  }

  withClassification(classification: Classification): ChangeRecord {
    return new ChangeRecord(this.path, this.details, Object.freeze({
      ...classification,
      keywords: [...classification.keywords],
      topics: [...classification.topics],
    }))
  }
}
