import { FileChangeEvent, ReportWindow } from '../contracts'

/**
 * Supplies the changes observed inside a report window, in a stable order
 */
export interface ChangeSource {
  listChanges(window: ReportWindow): Promise<FileChangeEvent[]>
}
