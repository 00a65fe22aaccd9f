import type { AuthConfig } from './auth.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFormat = 'text' | 'json'

export interface JiraConfig {
  baseUrl: string
  projects: string[]
  /** Issues requested per search page */
  pageSize: number
  auth?: AuthConfig
}

export interface FetchConfig {
  /** Minimum interval between request starts */
  requestDelayMs: number
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  timeoutMs: number
}

export interface StorageConfig {
  rawDir: string
  stateDir: string
  corpusPath: string
}

export interface IngestConfig {
  /** Stored issues between checkpoint flushes, on top of the per-page flush */
  flushInterval: number
  /** Abort a project on the first validation error instead of skipping the issue */
  strict: boolean
}

export interface LoggingConfig {
  level: LogLevel
  format: LogFormat
}

export interface PipelineConfig {
  jira: JiraConfig
  fetch: FetchConfig
  storage: StorageConfig
  ingest: IngestConfig
  logging: LoggingConfig
}
