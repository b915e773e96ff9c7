import { appendFileSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when DROP_DIGEST_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.DROP_DIGEST_DEBUG === 'true' || process.env.DROP_DIGEST_DEBUG === '1'

export const debugLogPath = (): string => join(homedir(), '.drop-digest', 'debug.log')

export const debugLog = (message: Record<string, unknown>): void => {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(dirname(logPath), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
