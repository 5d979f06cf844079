import { appendFileSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'

export type DebugEvent = { event: string } & Record<string, unknown>

// Debug logging - only enabled when SPACEDIFF_DEBUG environment variable is set
export const isDebugEnabled = (): boolean =>
  process.env.SPACEDIFF_DEBUG === 'true' || process.env.SPACEDIFF_DEBUG === '1'

export const debugLogPath = (): string =>
  join(process.env.SPACEDIFF_LOG_DIR ?? join(homedir(), '.spacediff'), 'debug.log')

export const debugLog = (message: DebugEvent): void => {
  if (!isDebugEnabled()) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(dirname(logPath), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
