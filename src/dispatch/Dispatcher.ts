import { DispatchMessage, DispatchResult } from '../contracts'

/**
 * Delivers a finished report. Implementations report failure through the
 * result instead of throwing.
 */
export interface Dispatcher {
  send(message: DispatchMessage): Promise<DispatchResult>
}
