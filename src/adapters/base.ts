import type { Issue } from '../types/issue.js'

export interface SearchIssuesParams {
  project: string
  /** Inclusive lower bound on `updated`; omitted from the query at epoch zero */
  updatedSince: Date
  startAt: number
  maxResults: number
}

export interface IssueRef {
  key: string
  updated: string | null
}

export interface SearchPage {
  issues: IssueRef[]
  startAt: number
  total: number
}

/**
 * Abstract base class for issue sources.
 * Each source implements platform-specific search and detail retrieval.
 */
export abstract class IssueSource {
  /**
   * Search issues of one project updated at or after a bound, oldest update first.
   */
  abstract searchIssues(params: SearchIssuesParams): Promise<SearchPage>

  /**
   * Fetch and validate the full record of one issue.
   * Throws IssueValidationError when the payload cannot be turned into an Issue.
   */
  abstract getIssue(key: string): Promise<Issue>
}
