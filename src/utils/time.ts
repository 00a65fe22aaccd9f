export const EPOCH_ISO = new Date(0).toISOString()

// Jira writes offsets without a colon: 2024-01-15T10:30:00.000+0000
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/

/**
 * Normalize a timestamp to ISO-8601 UTC, or null when it cannot be parsed.
 */
export function toUtcIso(value: string): string | null {
  const ms = Date.parse(value.trim().replace(COMPACT_OFFSET, '$1:$2'))
  return Number.isNaN(ms) ? null : new Date(ms).toISOString()
}

/**
 * Parse a `YYYY-MM-DD` calendar date as UTC midnight.
 */
export function parseStartDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value)
  if (!match)
    return null
  const [, year, month, day] = match
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  // Reject rollovers such as 2024-02-30
  return date.toISOString().startsWith(value) ? date : null
}

export const DAY_MS = 24 * 60 * 60 * 1000

/**
 * JQL date-only literal for the UTC calendar day of `date`.
 */
export function formatJqlDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getUTCFullYear()}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCDate())}`
}

export function latestOf(...dates: Date[]): Date {
  return new Date(Math.max(0, ...dates.map(d => d.getTime())))
}
