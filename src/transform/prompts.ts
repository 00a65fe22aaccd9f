import type {
  ClassificationTask,
  CorpusEntry,
  Issue,
  QaTask,
  SummarizationTask,
} from '../types/issue.js'
import type { TransformPolicies } from './policies.js'
import { DEFAULT_POLICIES } from './policies.js'

const MAX_INPUT_CHARS = 2000
const MAX_ANSWER_CHARS = 1000

export const NO_RESOLUTION_ANSWER = 'No resolution information available.'

/**
 * Collapse whitespace runs and trim.
 */
export function cleanText(text: string | null): string {
  if (!text)
    return ''
  return text.replace(/\s+/g, ' ').trim()
}

function clip(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text
}

export function buildSummarizationTask(issue: Issue): SummarizationTask {
  const parts = [cleanText(issue.description), ...issue.comments.map(c => cleanText(c.body))]
  return {
    task: 'summarization',
    input: clip(parts.filter(Boolean).join('\n\n'), MAX_INPUT_CHARS),
    output: `${cleanText(issue.title)} - ${issue.status}: ${issue.resolution ?? ''}`,
  }
}

export function buildClassificationTask(
  issue: Issue,
  policies: TransformPolicies = DEFAULT_POLICIES,
): ClassificationTask {
  const title = cleanText(issue.title)
  const description = cleanText(issue.description)
  const labels = [
    `Type: ${policies.inferType(title, description)}`,
    `Priority: ${issue.priority}`,
    `Status: ${issue.status}`,
    `Resolution: ${issue.resolution ?? 'Unresolved'}`,
  ]
  return {
    task: 'classification',
    input: clip(`Title: ${title}\n\nDescription: ${description}`, MAX_INPUT_CHARS),
    output: labels.join(' | '),
  }
}

export function buildQaTask(issue: Issue, policies: TransformPolicies = DEFAULT_POLICIES): QaTask {
  const title = cleanText(issue.title)
  const description = cleanText(issue.description)

  let context = `Title: ${title}`
  if (description) {
    context += `\n\nDescription: ${description}`
  }

  const answers = policies.selectResolutionComments(issue.comments)
    .map(c => cleanText(c.body))
    .filter(Boolean)

  let answer: string
  if (answers.length > 0)
    answer = answers.join('\n\n')
  else if (issue.resolution)
    answer = `The issue was resolved as: ${issue.resolution}`
  else
    answer = NO_RESOLUTION_ANSWER

  return {
    task: 'qa',
    question: `What is the issue with '${title}' and how was it resolved?`,
    context: clip(context, MAX_INPUT_CHARS),
    answer: clip(answer, MAX_ANSWER_CHARS),
  }
}

/**
 * Normalize one issue into a corpus entry with its derived tasks.
 */
export function buildCorpusEntry(issue: Issue, policies: TransformPolicies = DEFAULT_POLICIES): CorpusEntry {
  return {
    metadata: {
      issue_key: issue.key,
      project: issue.project,
      title: issue.title,
      status: issue.status,
      priority: issue.priority,
      issue_type: issue.issueType,
      reporter: issue.reporter,
      assignee: issue.assignee,
      created: issue.created,
      updated: issue.updated,
      resolution: issue.resolution,
    },
    description: cleanText(issue.description),
    comments: issue.comments.map(c => ({
      author: c.author,
      body: cleanText(c.body),
      created: c.created,
    })),
    tasks: {
      summarization: buildSummarizationTask(issue),
      classification: buildClassificationTask(issue, policies),
      qa: buildQaTask(issue, policies),
    },
  }
}
