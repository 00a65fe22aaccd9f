import type { LogFormat, LogLevel } from '../types/config.js'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug: (message: string, fields?: LogFields) => void
  info: (message: string, fields?: LogFields) => void
  warn: (message: string, fields?: LogFields) => void
  error: (message: string, fields?: LogFields) => void
  child: (scope: string) => Logger
}

export interface LoggerOptions {
  scope?: string
  level?: LogLevel
  format?: LogFormat
  /** Line sink, defaults to stderr so stdout stays free for command output */
  write?: (line: string) => void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

// Fields left undefined are omitted
function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ')
}

/**
 * Console logger with `[scope]` prefixed lines, or one JSON object per line.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? 'issue-corpus'
  const threshold = LEVEL_ORDER[options.level ?? 'info']
  const format = options.format ?? 'text'
  const write = options.write ?? ((line: string) => console.error(line))

  const log = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold)
      return
    if (format === 'json') {
      write(JSON.stringify({ time: new Date().toISOString(), level, scope, message, ...fields }))
      return
    }
    const formatted = fields ? formatFields(fields) : ''
    const suffix = formatted ? ` ${formatted}` : ''
    const tag = level === 'info' ? '' : ` ${level.toUpperCase()}`
    write(`[${scope}]${tag} ${message}${suffix}`)
  }

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
    child: childScope => createLogger({ ...options, scope: `${scope}:${childScope}` }),
  }
}

export const silentLogger: Logger = createLogger({ write: () => {} })
