import type { Issue } from '../src/types/issue.js'
import { readFileSync } from 'node:fs'

export function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8'))
}

export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    key: 'DEMO-1',
    project: 'DEMO',
    title: 'Example issue',
    description: 'Something happens.',
    status: 'Open',
    priority: 'Major',
    issueType: 'Task',
    reporter: 'Alice Example',
    assignee: null,
    created: '2024-01-01T00:00:00.000Z',
    updated: '2024-01-02T00:00:00.000Z',
    resolution: null,
    resolutionDate: null,
    comments: [],
    ...overrides,
  }
}
