import type { Issue } from '../types/issue.js'
import type { JsonFetcher } from '../utils/http.js'
import type { IssueRef, SearchIssuesParams, SearchPage } from './base.js'
import { z } from 'zod/v4'
import { FetchError, IssueValidationError } from '../utils/errors.js'
import { DAY_MS, formatJqlDate, toUtcIso } from '../utils/time.js'
import { IssueSource } from './base.js'

export const ISSUE_KEY = /^[A-Z][A-Z0-9_]*-\d+$/

const ISSUE_FIELDS = [
  'summary',
  'description',
  'created',
  'updated',
  'status',
  'priority',
  'assignee',
  'reporter',
  'issuetype',
  'resolution',
  'resolutiondate',
  'project',
  'comment',
].join(',')

const TimestampSchema = z.string().transform((value, ctx) => {
  const iso = toUtcIso(value)
  if (iso === null) {
    ctx.addIssue({ code: 'custom', message: `invalid timestamp "${value}"` })
    return z.NEVER
  }
  return iso
})

const NamedSchema = z.object({ name: z.string() })

const PersonSchema = z.object({
  displayName: z.string().optional(),
  name: z.string().optional(),
})

const JiraCommentSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  author: PersonSchema.nullish(),
  body: z.unknown(),
  created: TimestampSchema,
})

const JiraIssueSchema = z.object({
  key: z.string().regex(ISSUE_KEY, 'must look like PROJECT-123'),
  fields: z.object({
    summary: z.string().min(1),
    description: z.unknown(),
    status: NamedSchema,
    priority: NamedSchema.nullish(),
    issuetype: NamedSchema.nullish(),
    reporter: PersonSchema.nullish(),
    assignee: PersonSchema.nullish(),
    created: TimestampSchema,
    updated: TimestampSchema,
    resolution: NamedSchema.nullish(),
    resolutiondate: TimestampSchema.nullish(),
    project: z.object({ key: z.string() }).nullish(),
    comment: z.object({ comments: z.array(JiraCommentSchema) }).nullish(),
  }),
})

const JiraSearchSchema = z.object({
  startAt: z.number().int().nonnegative().optional(),
  total: z.number().int().nonnegative(),
  issues: z.array(z.object({
    key: z.string(),
    fields: z.object({ updated: z.string().nullish() }).nullish(),
  })),
})

type JiraPerson = z.infer<typeof PersonSchema>

/**
 * Convert Atlassian Document Format (ADF) to plain text.
 * Block nodes end with a newline; list items get a "- " marker.
 */
export function adfToText(node: unknown): string {
  if (!node || typeof node !== 'object')
    return ''

  if (Array.isArray(node))
    return node.map(adfToText).join('')

  const type = 'type' in node ? node.type : undefined

  if (type === 'text' && 'text' in node && typeof node.text === 'string')
    return node.text

  if (type === 'hardBreak')
    return '\n'

  const inner = 'content' in node && Array.isArray(node.content)
    ? node.content.map(adfToText).join('')
    : ''

  if (type === 'paragraph' || type === 'heading' || type === 'codeBlock')
    return `${inner}\n`

  // List items
  if (type === 'listItem')
    return `- ${inner}`

  return inner
}

function bodyText(body: unknown): string {
  if (typeof body === 'string')
    return body
  return adfToText(body).trim()
}

function personName(person: JiraPerson | null | undefined): string | null {
  return person?.displayName ?? person?.name ?? null
}

function payloadKey(payload: unknown): string | null {
  if (payload && typeof payload === 'object' && 'key' in payload && typeof payload.key === 'string')
    return payload.key
  return null
}

/**
 * Validate a Jira REST issue payload and map it to an Issue.
 * Defaultable fields (priority, reporter, comment author, project) never fail validation.
 */
export function parseJiraIssue(payload: unknown, expectedKey?: string): Issue {
  const result = JiraIssueSchema.safeParse(payload)
  if (!result.success) {
    const key = payloadKey(payload) ?? expectedKey ?? 'unknown'
    throw new IssueValidationError(
      key,
      result.error.issues.map(i => `${i.path.map(String).join('.')}: ${i.message}`),
    )
  }

  const { key, fields } = result.data
  const description = fields.description == null ? null : bodyText(fields.description)

  return {
    key,
    project: fields.project?.key ?? key.slice(0, key.lastIndexOf('-')),
    title: fields.summary,
    description: description === '' && typeof fields.description !== 'string' ? null : description,
    status: fields.status.name,
    priority: fields.priority?.name ?? 'Unspecified',
    issueType: fields.issuetype?.name ?? null,
    reporter: personName(fields.reporter) ?? 'Unknown',
    assignee: personName(fields.assignee),
    created: fields.created,
    updated: fields.updated,
    resolution: fields.resolution?.name ?? null,
    resolutionDate: fields.resolutiondate ?? null,
    comments: (fields.comment?.comments ?? []).map(c => ({
      id: c.id,
      author: personName(c.author) ?? 'Unknown',
      body: bodyText(c.body),
      created: c.created,
    })),
  }
}

/**
 * Build the search JQL: one project, updated at or after `since`, oldest first.
 *
 * Jira reads date literals in the server's timezone, so the bound is the
 * start of the day before `since`: midnight of that day in any UTC offset
 * still lies at or before `since`. Keys re-seen inside the margin are
 * skipped as already processed.
 */
export function buildJql(project: string, since: Date): string {
  const clauses = [`project = ${project}`]
  if (since.getTime() > 0) {
    clauses.push(`updated >= "${formatJqlDate(new Date(since.getTime() - DAY_MS))}"`)
  }
  return `${clauses.join(' AND ')} ORDER BY updated ASC`
}

export class JiraSource extends IssueSource {
  private readonly fetcher: JsonFetcher
  private readonly apiBase: string

  constructor(fetcher: JsonFetcher, baseUrl: string) {
    super()
    this.fetcher = fetcher
    // The base may carry a context path (https://issues.apache.org/jira)
    this.apiBase = `${baseUrl.replace(/\/+$/, '')}/rest/api/2`
  }

  async searchIssues(params: SearchIssuesParams): Promise<SearchPage> {
    const url = `${this.apiBase}/search`
    const { body } = await this.fetcher.fetch(url, {
      jql: buildJql(params.project, params.updatedSince),
      startAt: String(params.startAt),
      maxResults: String(params.maxResults),
      fields: 'updated',
    })

    const result = JiraSearchSchema.safeParse(body)
    if (!result.success) {
      throw new FetchError('malformed_response', url, 200, 1, 'unexpected search response shape')
    }

    const issues: IssueRef[] = result.data.issues.map(i => ({
      key: i.key,
      updated: i.fields?.updated ? toUtcIso(i.fields.updated) : null,
    }))

    return {
      issues,
      startAt: result.data.startAt ?? params.startAt,
      total: result.data.total,
    }
  }

  async getIssue(key: string): Promise<Issue> {
    const { body } = await this.fetcher.fetch(`${this.apiBase}/issue/${encodeURIComponent(key)}`, {
      fields: ISSUE_FIELDS,
    })
    return parseJiraIssue(body, key)
  }
}
