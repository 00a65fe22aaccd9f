export interface IssueComment {
  id: string
  author: string
  body: string
  created: string
}

/**
 * A validated issue as stored in the raw record store.
 * Timestamps are ISO-8601 in UTC.
 */
export interface Issue {
  key: string
  project: string
  title: string
  description: string | null
  status: string
  priority: string
  issueType: string | null
  reporter: string
  assignee: string | null
  created: string
  updated: string
  resolution: string | null
  resolutionDate: string | null
  comments: IssueComment[]
}

/**
 * Per-project resume state.
 */
export interface Checkpoint {
  project: string
  lastUpdateTimestamp: string
  processedKeys: Set<string>
}

export interface CorpusComment {
  author: string
  body: string
  created: string
}

export interface CorpusMetadata {
  issue_key: string
  project: string
  title: string
  status: string
  priority: string
  issue_type: string | null
  reporter: string
  assignee: string | null
  created: string
  updated: string
  resolution: string | null
}

export interface SummarizationTask {
  task: 'summarization'
  input: string
  output: string
}

export interface ClassificationTask {
  task: 'classification'
  input: string
  output: string
}

export interface QaTask {
  task: 'qa'
  question: string
  context: string
  answer: string
}

export interface CorpusEntry {
  metadata: CorpusMetadata
  description: string
  comments: CorpusComment[]
  tasks: {
    summarization: SummarizationTask
    classification: ClassificationTask
    qa: QaTask
  }
}
