import type { AuthConfig } from '../types/auth.js'
import type { PipelineConfig } from '../types/config.js'
import { existsSync, readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { z } from 'zod/v4'

export type Env = Record<string, string | undefined>

const PROJECT_KEY = /^[A-Z][A-Z0-9_]*$/

const AuthSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('token'),
    tokenEnv: z.string(),
  }),
  z.object({
    type: z.literal('basic'),
    usernameEnv: z.string(),
    passwordEnv: z.string(),
  }),
])

const positiveInt = z.number().int().positive()
const nonNegativeInt = z.number().int().nonnegative()

const PipelineConfigSchema = z.object({
  jira: z.object({
    baseUrl: z.string().url(),
    projects: z.array(z.string().regex(PROJECT_KEY, 'must be an upper-case project key')).min(1),
    pageSize: positiveInt.max(1000),
    auth: AuthSchema.optional(),
  }),
  fetch: z.object({
    requestDelayMs: nonNegativeInt,
    maxAttempts: positiveInt,
    baseDelayMs: nonNegativeInt,
    maxDelayMs: nonNegativeInt,
    timeoutMs: positiveInt,
  }),
  storage: z.object({
    rawDir: z.string().min(1),
    stateDir: z.string().min(1),
    corpusPath: z.string().min(1),
  }),
  ingest: z.object({
    flushInterval: positiveInt,
    strict: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    format: z.enum(['text', 'json']),
  }),
})

// Every section is optional in the file; missing keys fall back to defaults.
const ConfigFileSchema = z.object({
  jira: PipelineConfigSchema.shape.jira.partial().optional(),
  fetch: PipelineConfigSchema.shape.fetch.partial().optional(),
  storage: PipelineConfigSchema.shape.storage.partial().optional(),
  ingest: PipelineConfigSchema.shape.ingest.partial().optional(),
  logging: PipelineConfigSchema.shape.logging.partial().optional(),
})

type ConfigLayer = z.infer<typeof ConfigFileSchema>

export const DEFAULT_CONFIG: PipelineConfig = {
  jira: {
    baseUrl: 'https://issues.apache.org/jira',
    projects: ['HADOOP', 'SPARK', 'KAFKA'],
    pageSize: 50,
  },
  fetch: {
    requestDelayMs: 3600,
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxDelayMs: 300_000,
    timeoutMs: 30_000,
  },
  storage: {
    rawDir: 'data/raw',
    stateDir: 'data/state',
    corpusPath: 'data/corpus/jira_corpus.jsonl',
  },
  ingest: {
    flushInterval: 50,
    strict: false,
  },
  logging: {
    level: 'info',
    format: 'text',
  },
}

const CONFIG_FILENAME = '.issue-corpus.json'

/**
 * Search for `filename` starting from `startDir` and walking up to the root.
 */
function findUpward(startDir: string, filename: string): string | null {
  let dir = resolve(startDir)
  while (true) {
    const candidate = resolve(dir, filename)
    if (existsSync(candidate)) {
      return candidate
    }
    const parent = dirname(dir)
    if (parent === dir)
      break
    dir = parent
  }
  return null
}

function findConfigFile(startDir: string): string | null {
  return findUpward(startDir, CONFIG_FILENAME)
}

/**
 * Parse a .env file body. Existing keys in `env` win over file values.
 */
function applyEnvFile(content: string, env: Env): void {
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#'))
      continue
    const eqIndex = trimmed.indexOf('=')
    if (eqIndex === -1)
      continue
    const key = trimmed.slice(0, eqIndex).trim()
    let value = trimmed.slice(eqIndex + 1).trim()
    // Strip surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith('\'') && value.endsWith('\''))) {
      value = value.slice(1, -1)
    }
    if (!env[key]) {
      env[key] = value
    }
  }
}

/**
 * Load the nearest .env file into `env` (if one exists).
 */
export function loadEnvFile(startDir: string, env: Env): string | null {
  const envPath = findUpward(startDir, '.env')
  if (envPath) {
    applyEnvFile(readFileSync(envPath, 'utf-8'), env)
  }
  return envPath
}

/**
 * Resolve environment variable references in auth config.
 * Reads actual env var values for fields ending with "Env".
 */
function resolveAuthEnv(auth: AuthConfig, env: Env): Record<string, string> {
  const resolved: Record<string, string> = {}

  for (const [key, value] of Object.entries(auth)) {
    if (key === 'type')
      continue
    if (key.endsWith('Env') && typeof value === 'string') {
      const envValue = env[value]
      if (!envValue) {
        throw new Error(`Environment variable "${value}" is not set (required by jira.auth.${key})`)
      }
      // Strip the "Env" suffix for the resolved key
      resolved[key.slice(0, -3)] = envValue
    }
  }

  return resolved
}

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim()
  if (!raw)
    return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new TypeError(`Environment variable ${name} must be a number, got "${raw}"`)
  }
  return value
}

function envBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase()
  if (!raw)
    return undefined
  if (['1', 'true', 'yes', 'on'].includes(raw))
    return true
  if (['0', 'false', 'no', 'off'].includes(raw))
    return false
  throw new TypeError(`Environment variable ${name} must be a boolean, got "${raw}"`)
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim()
  return raw || undefined
}

function envList(env: Env, name: string): string[] | undefined {
  const raw = env[name]
  if (!raw?.trim())
    return undefined
  return raw.split(',').map(p => p.trim()).filter(Boolean)
}

function readEnvLayer(env: Env): Record<string, Record<string, unknown>> {
  return {
    jira: {
      baseUrl: envString(env, 'JIRA_BASE_URL'),
      projects: envList(env, 'JIRA_PROJECTS'),
      pageSize: envNumber(env, 'JIRA_PAGE_SIZE'),
    },
    fetch: {
      requestDelayMs: envNumber(env, 'REQUEST_DELAY_MS'),
      maxAttempts: envNumber(env, 'RETRY_MAX_TIMES'),
      baseDelayMs: envNumber(env, 'RETRY_START_DELAY_MS'),
      maxDelayMs: envNumber(env, 'RETRY_MAX_DELAY_MS'),
      timeoutMs: envNumber(env, 'REQUEST_TIMEOUT_MS'),
    },
    storage: {
      rawDir: envString(env, 'RAW_DIR'),
      stateDir: envString(env, 'STATE_DIR'),
      corpusPath: envString(env, 'CORPUS_PATH'),
    },
    ingest: {
      flushInterval: envNumber(env, 'CHECKPOINT_FLUSH_INTERVAL'),
      strict: envBoolean(env, 'VALIDATION_STRICT_MODE'),
    },
    logging: {
      level: envString(env, 'LOG_LEVEL')?.toLowerCase(),
      format: envString(env, 'LOG_FORMAT')?.toLowerCase(),
    },
  }
}

function definedEntries(values: object): Record<string, unknown> {
  const entries: Array<[string, unknown]> = Object.entries(values)
  return Object.fromEntries(entries.filter(([, v]) => v !== undefined))
}

/**
 * Shallow-merge config sections; later layers win, undefined keys are ignored.
 */
function mergeLayers(...layers: object[]): Record<string, Record<string, unknown>> {
  const merged: Record<string, Record<string, unknown>> = {}
  for (const layer of layers) {
    const sections: Array<[string, unknown]> = Object.entries(layer)
    for (const [section, values] of sections) {
      if (typeof values === 'object' && values !== null) {
        merged[section] = { ...merged[section], ...definedEntries(values) }
      }
    }
  }
  return merged
}

interface ConfigIssue {
  path: ReadonlyArray<PropertyKey>
  message: string
}

function formatIssues(issues: ReadonlyArray<ConfigIssue>): string {
  return issues.map(i => `  - ${i.path.map(String).join('.')}: ${i.message}`).join('\n')
}

export interface LoadConfigOptions {
  /** Directory the config file and .env search starts from, defaults to cwd */
  cwd?: string
  /** Environment to read, defaults to process.env; .env values are added to it */
  env?: Env
}

export interface LoadConfigResult {
  config: PipelineConfig
  /** Auth values resolved from the environment, keyed without the "Env" suffix */
  resolvedAuth: Record<string, string>
  configPath: string | null
}

/**
 * Build the pipeline configuration from defaults, the nearest
 * `.issue-corpus.json`, and the environment, in that order of precedence.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const dir = options.cwd ?? process.cwd()
  const env = options.env ?? process.env
  loadEnvFile(dir, env)

  const configPath = findConfigFile(dir)
  let fileLayer: ConfigLayer = {}

  if (configPath) {
    const raw = readFileSync(configPath, 'utf-8')
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    }
    catch {
      throw new Error(`Invalid JSON in ${configPath}`)
    }

    const result = ConfigFileSchema.safeParse(parsed)
    if (!result.success) {
      throw new Error(`Invalid config in ${configPath}:\n${formatIssues(result.error.issues)}`)
    }
    fileLayer = result.data
  }

  const merged = mergeLayers(DEFAULT_CONFIG, fileLayer, readEnvLayer(env))
  const result = PipelineConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error.issues)}`)
  }

  const config: PipelineConfig = result.data
  const resolvedAuth = config.jira.auth ? resolveAuthEnv(config.jira.auth, env) : {}

  return { config, resolvedAuth, configPath }
}

export { findConfigFile, resolveAuthEnv }
