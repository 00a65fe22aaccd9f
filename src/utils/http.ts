import type { AuthConfig } from '../types/auth.js'
import type { FetchConfig } from '../types/config.js'
import type { FetchErrorKind } from './errors.js'
import type { Logger } from './logger.js'
import { FetchError } from './errors.js'
import { silentLogger } from './logger.js'

export type ResponseClass = 'success' | FetchErrorKind

export interface FetchResult<T = unknown> {
  body: T
  status: number
}

/**
 * The request surface adapters depend on.
 */
export interface JsonFetcher {
  fetch: <T = unknown>(url: string, params?: Record<string, string>) => Promise<FetchResult<T>>
}

export interface FetcherOptions extends FetchConfig {
  /** Static headers sent with every request (auth, user agent) */
  headers?: Record<string, string>
  logger?: Logger
  sleep?: (ms: number) => Promise<void>
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Delay before retrying after the given 1-based attempt failed.
 */
export function computeBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1))
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns null when absent or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null)
    return null
  const trimmed = value.trim()
  if (trimmed === '')
    return null
  if (/^\d+(?:\.\d+)?$/.test(trimmed))
    return Math.round(Number(trimmed) * 1000)
  const date = Date.parse(trimmed)
  if (Number.isNaN(date))
    return null
  return Math.max(0, date - now)
}

export function classifyStatus(status: number): ResponseClass {
  if (status >= 200 && status < 300)
    return 'success'
  if (status === 429)
    return 'rate_limited'
  if (status >= 500 && status < 600)
    return 'server_error'
  return 'client_error'
}

export function isRetryable(kind: ResponseClass): boolean {
  return kind === 'rate_limited' || kind === 'server_error' || kind === 'timeout'
}

/**
 * Build auth headers based on the auth config and resolved env values.
 */
export function buildAuthHeaders(
  auth: AuthConfig | undefined,
  resolvedAuth: Record<string, string>,
): Record<string, string> {
  if (!auth)
    return {}
  switch (auth.type) {
    case 'token':
      return { Authorization: `Bearer ${resolvedAuth.token}` }
    case 'basic': {
      const credentials = Buffer.from(
        `${resolvedAuth.username}:${resolvedAuth.password}`,
      ).toString('base64')
      return { Authorization: `Basic ${credentials}` }
    }
  }
}

type Attempt =
  | { kind: 'success', status: number, body: unknown }
  | { kind: FetchErrorKind, status: number | null, retryAfterMs: number | null, detail: string }

/**
 * Issues single GET requests against a JSON API, retrying transient
 * failures with exponential backoff. Keeps no state between calls apart
 * from the time of the last request start used for throttling.
 */
export class RetryingFetcher implements JsonFetcher {
  private readonly options: FetcherOptions
  private readonly logger: Logger
  private readonly sleep: (ms: number) => Promise<void>
  private lastRequestAt = 0

  constructor(options: FetcherOptions) {
    this.options = options
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep ?? sleep
  }

  async fetch<T = unknown>(url: string, params?: Record<string, string>): Promise<FetchResult<T>> {
    const target = new URL(url)
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        target.searchParams.set(key, value)
      }
    }
    const href = target.toString()
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.options

    for (let attempt = 1; ; attempt++) {
      await this.throttle()
      const result = await this.attempt(href)

      if (result.kind === 'success') {
        // The body is the caller's declared shape; adapters validate it.
        return { body: result.body as T, status: result.status }
      }

      if (!isRetryable(result.kind) || attempt >= maxAttempts) {
        throw new FetchError(result.kind, href, result.status, attempt, result.detail)
      }

      const delay = result.kind === 'rate_limited' && result.retryAfterMs !== null
        ? result.retryAfterMs
        : computeBackoff(attempt, baseDelayMs, maxDelayMs)

      this.logger.debug(`Retrying ${target.pathname} after ${delay}ms`, {
        attempt,
        maxAttempts,
        reason: result.kind,
        status: result.status,
      })
      await this.sleep(delay)
    }
  }

  private async throttle(): Promise<void> {
    const minInterval = this.options.requestDelayMs
    if (minInterval > 0) {
      const elapsed = Date.now() - this.lastRequestAt
      if (elapsed < minInterval) {
        await this.sleep(minInterval - elapsed)
      }
    }
    this.lastRequestAt = Date.now()
  }

  private async attempt(url: string): Promise<Attempt> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          ...this.options.headers,
        },
        signal: controller.signal,
      })

      const kind = classifyStatus(response.status)
      const text = await response.text()

      if (kind !== 'success') {
        return {
          kind,
          status: response.status,
          retryAfterMs: kind === 'rate_limited' ? parseRetryAfter(response.headers.get('Retry-After')) : null,
          detail: text.slice(0, 200),
        }
      }

      try {
        return { kind: 'success', status: response.status, body: JSON.parse(text) }
      }
      catch {
        return {
          kind: 'malformed_response',
          status: response.status,
          retryAfterMs: null,
          detail: `body is not JSON: ${text.slice(0, 100)}`,
        }
      }
    }
    catch (err) {
      // Aborted by our timer, or no response at all (DNS, reset, refused).
      const detail = controller.signal.aborted
        ? `no response within ${this.options.timeoutMs}ms`
        : (err instanceof Error ? err.message : String(err))
      return { kind: 'timeout', status: null, retryAfterMs: null, detail }
    }
    finally {
      clearTimeout(timer)
    }
  }
}
