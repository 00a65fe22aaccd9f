import type { Env } from '../../src/config/loader.js'
import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG, findConfigFile, loadConfig, resolveAuthEnv } from '../../src/config/loader.js'

describe('Config Loader', () => {
  const testDir = join(tmpdir(), `issue-corpus-config-test-${Date.now()}`)
  const subDir = join(testDir, 'sub', 'deep')
  const configPath = join(testDir, '.issue-corpus.json')

  function writeConfig(content: unknown): void {
    writeFileSync(configPath, typeof content === 'string' ? content : JSON.stringify(content))
  }

  beforeEach(() => {
    mkdirSync(subDir, { recursive: true })
  })

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true })
  })

  describe('findConfigFile', () => {
    it('should find config in current directory', () => {
      writeConfig('{}')

      expect(findConfigFile(testDir)).toBe(configPath)
    })

    it('should find config in parent directory', () => {
      writeConfig('{}')

      expect(findConfigFile(subDir)).toBe(configPath)
    })

    it('should return null if not found', () => {
      expect(findConfigFile(subDir)).toBeNull()
    })
  })

  describe('resolveAuthEnv', () => {
    const env: Env = {
      TEST_TOKEN: 'test-token',
      TEST_USER: 'test-user',
      TEST_PASS: 'test-secret',
    }

    it('should resolve token auth env vars', () => {
      expect(resolveAuthEnv({ type: 'token', tokenEnv: 'TEST_TOKEN' }, env)).toEqual({ token: 'test-token' })
    })

    it('should resolve basic auth env vars', () => {
      const result = resolveAuthEnv({ type: 'basic', usernameEnv: 'TEST_USER', passwordEnv: 'TEST_PASS' }, env)

      expect(result).toEqual({ username: 'test-user', password: 'test-secret' })
    })

    it('should throw if env var is missing', () => {
      expect(() => resolveAuthEnv({ type: 'token', tokenEnv: 'MISSING_TOKEN' }, env))
        .toThrow('Environment variable "MISSING_TOKEN" is not set (required by jira.auth.tokenEnv)')
    })
  })

  describe('loadConfig', () => {
    it('should fall back to defaults', () => {
      const result = loadConfig({ cwd: subDir, env: {} })

      expect(result.config).toEqual(DEFAULT_CONFIG)
      expect(result.configPath).toBeNull()
      expect(result.resolvedAuth).toEqual({})
    })

    it('should merge a partial config file over the defaults', () => {
      writeConfig({ jira: { projects: ['DEMO'] }, fetch: { maxAttempts: 3 } })

      const { config, configPath: found } = loadConfig({ cwd: subDir, env: {} })

      expect(found).toBe(configPath)
      expect(config.jira).toEqual({ baseUrl: 'https://issues.apache.org/jira', projects: ['DEMO'], pageSize: 50 })
      expect(config.fetch.maxAttempts).toBe(3)
      expect(config.fetch.requestDelayMs).toBe(3600)
    })

    it('should let environment variables win over the file', () => {
      writeConfig({ jira: { pageSize: 20 }, logging: { level: 'warn' } })

      const { config } = loadConfig({
        cwd: testDir,
        env: {
          JIRA_PAGE_SIZE: '10',
          JIRA_PROJECTS: 'HADOOP, SPARK',
          VALIDATION_STRICT_MODE: 'true',
          LOG_LEVEL: 'DEBUG',
          CORPUS_PATH: 'out/corpus.jsonl',
        },
      })

      expect(config.jira.pageSize).toBe(10)
      expect(config.jira.projects).toEqual(['HADOOP', 'SPARK'])
      expect(config.ingest.strict).toBe(true)
      expect(config.logging.level).toBe('debug')
      expect(config.storage.corpusPath).toBe('out/corpus.jsonl')
    })

    it('should read a .env file without overriding set variables', () => {
      writeFileSync(join(testDir, '.env'), [
        '# local settings',
        'REQUEST_DELAY_MS=500',
        'RETRY_MAX_TIMES=2',
        'LOG_FORMAT="json"',
      ].join('\n'))
      const env: Env = { RETRY_MAX_TIMES: '7' }

      const { config } = loadConfig({ cwd: subDir, env })

      expect(config.fetch.requestDelayMs).toBe(500)
      expect(config.fetch.maxAttempts).toBe(7)
      expect(config.logging.format).toBe('json')
      expect(env.REQUEST_DELAY_MS).toBe('500')
    })

    it('should resolve credentials named in the file', () => {
      writeConfig({ jira: { auth: { type: 'token', tokenEnv: 'JIRA_TOKEN' } } })

      const { config, resolvedAuth } = loadConfig({ cwd: testDir, env: { JIRA_TOKEN: 'test-token' } })

      expect(config.jira.auth).toEqual({ type: 'token', tokenEnv: 'JIRA_TOKEN' })
      expect(resolvedAuth).toEqual({ token: 'test-token' })
    })

    it('should reject malformed JSON', () => {
      writeConfig('{ "jira": ')

      expect(() => loadConfig({ cwd: testDir, env: {} })).toThrow(`Invalid JSON in ${configPath}`)
    })

    it('should reject invalid values in the file', () => {
      writeConfig({ fetch: { maxAttempts: 0 } })

      expect(() => loadConfig({ cwd: testDir, env: {} })).toThrow(`Invalid config in ${configPath}:\n  - fetch.maxAttempts: `)
    })

    it('should reject invalid values from the environment', () => {
      expect(() => loadConfig({ cwd: testDir, env: { JIRA_PROJECTS: 'hadoop' } }))
        .toThrow('Invalid configuration:\n  - jira.projects.0: must be an upper-case project key')
    })

    it('should reject a non-numeric variable', () => {
      expect(() => loadConfig({ cwd: testDir, env: { JIRA_PAGE_SIZE: 'lots' } }))
        .toThrow('Environment variable JIRA_PAGE_SIZE must be a number, got "lots"')
    })

    it('should reject a non-boolean variable', () => {
      expect(() => loadConfig({ cwd: testDir, env: { VALIDATION_STRICT_MODE: 'maybe' } }))
        .toThrow('Environment variable VALIDATION_STRICT_MODE must be a boolean, got "maybe"')
    })
  })
})
