import { appendFileSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

export interface ConsoleLoggerOptions {
  /** Append debug events to the debug log file */
  debug?: boolean
  /** Defaults to ~/.treesum/debug.log */
  debugLogPath?: string
  write?: (line: string) => void
}

// Debug logging - only enabled when TREESUM_DEBUG environment variable is set
export const isDebugEnabled = (env: NodeJS.ProcessEnv = process.env): boolean =>
  env.TREESUM_DEBUG === 'true' || env.TREESUM_DEBUG === '1'

export const defaultDebugLogPath = (): string => join(homedir(), '.treesum', 'debug.log')

export class ConsoleLogger implements Logger {
  private readonly debugEnabled: boolean
  private readonly debugLogPath: string
  private readonly write: (line: string) => void

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? isDebugEnabled()
    this.debugLogPath = options.debugLogPath ?? defaultDebugLogPath()
    this.write = options.write ?? ((line) => console.error(line))
  }

  debug(message: string, context?: LogContext): void {
    if (!this.debugEnabled) return

    // Ensure directory exists
    mkdirSync(dirname(this.debugLogPath), { recursive: true })

    appendFileSync(
      this.debugLogPath,
      `${new Date().toISOString()} - ${JSON.stringify({ event: message, ...context })}\n`
    )
  }

  info(message: string, context?: LogContext): void {
    this.debug(message, context)
    this.write(message)
  }

  warn(message: string, context?: LogContext): void {
    this.debug(message, context)
    this.write(`Warning: ${message}`)
  }

  error(message: string, context?: LogContext): void {
    this.debug(message, context)
    this.write(`Error: ${message}`)
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
