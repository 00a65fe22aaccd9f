import type { IssueComment } from '../types/issue.js'

/**
 * Decisions the corpus builder delegates: how an issue's type is inferred
 * from its text, and which comments carry its resolution.
 */
export interface TransformPolicies {
  inferType: (title: string, description: string) => string
  selectResolutionComments: (comments: IssueComment[]) => IssueComment[]
}

// --- Type inference: first matching rule wins ---
const TYPE_RULES: Array<[RegExp, string]> = [
  [/\b(?:bug|error|exception|crash(?:es|ed)?|fail(?:s|ed|ure)?|broken|npe|regression|leak)\b/i, 'Bug'],
  [/\b(?:docs?|documentation|javadoc|readme|typo)\b/i, 'Documentation'],
  [/\b(?:tests?|flaky|unit test|integration test)\b/i, 'Test'],
  [/\b(?:improve(?:ment)?|optimi[sz]e|performance|refactor|speed up|cleanup|clean up|enhance(?:ment)?)\b/i, 'Improvement'],
  [/\b(?:add|support|implement|introduce|new feature|feature)\b/i, 'New Feature'],
]

const DEFAULT_TYPE = 'Task'

/**
 * Keyword rule over the title first, then the description.
 */
export function inferTypeFromKeywords(title: string, description: string): string {
  for (const text of [title, description]) {
    for (const [pattern, type] of TYPE_RULES) {
      if (pattern.test(text))
        return type
    }
  }
  return DEFAULT_TYPE
}

// --- Resolution comments ---
const RESOLUTION_PATTERN = /\b(?:fix(?:e[sd])?|patch(?:es|ed)?|cause[sd]?|root cause|pr|pull request|solution|solved|resolved|committed)\b/i

const MAX_RESOLUTION_COMMENTS = 2

/**
 * Comments mentioning a fix, patch, cause or solution, newest first.
 */
export function selectByResolutionKeywords(comments: IssueComment[]): IssueComment[] {
  return comments
    .filter(c => RESOLUTION_PATTERN.test(c.body))
    .sort((a, b) => Date.parse(b.created) - Date.parse(a.created))
    .slice(0, MAX_RESOLUTION_COMMENTS)
}

export const DEFAULT_POLICIES: TransformPolicies = {
  inferType: inferTypeFromKeywords,
  selectResolutionComments: selectByResolutionKeywords,
}
