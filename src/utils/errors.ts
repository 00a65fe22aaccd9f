export type FetchErrorKind =
  | 'rate_limited'
  | 'server_error'
  | 'timeout'
  | 'client_error'
  | 'malformed_response'

/**
 * Thrown when a request fails for good: a non-retryable response, or
 * retries exhausted on a transient one.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind
  readonly url: string
  readonly status: number | null
  readonly attempts: number

  constructor(kind: FetchErrorKind, url: string, status: number | null, attempts: number, detail?: string) {
    const statusInfo = status !== null ? ` (HTTP ${status})` : ''
    const detailInfo = detail ? `: ${detail}` : ''
    super(`${kind} from ${url} after ${attempts} attempt(s)${statusInfo}${detailInfo}`)
    this.name = 'FetchError'
    this.kind = kind
    this.url = url
    this.status = status
    this.attempts = attempts
  }
}

export class IssueValidationError extends Error {
  readonly issueKey: string
  readonly problems: string[]

  constructor(issueKey: string, problems: string[]) {
    super(`Invalid issue ${issueKey}: ${problems.join('; ')}`)
    this.name = 'IssueValidationError'
    this.issueKey = issueKey
    this.problems = problems
  }
}

// Codes after which no further write to the same volume can succeed.
const FATAL_STORAGE_CODES = new Set(['ENOSPC', 'EROFS', 'EACCES', 'EPERM', 'EDQUOT'])

export class StorageError extends Error {
  readonly path: string
  readonly code: string | null
  readonly fatal: boolean

  constructor(path: string, cause: unknown) {
    const code = errorCode(cause)
    super(`Storage failure at ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.name = 'StorageError'
    this.path = path
    this.code = code
    this.fatal = code !== null && FATAL_STORAGE_CODES.has(code)
  }
}

export function errorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string')
    return err.code
  return null
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
