import type { Dirent } from 'node:fs'
import type { Issue } from '../types/issue.js'
import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { z } from 'zod/v4'
import { errorCode, StorageError } from '../utils/errors.js'

const StoredCommentSchema = z.object({
  id: z.string(),
  author: z.string(),
  body: z.string(),
  created: z.string(),
})

const StoredIssueSchema = z.object({
  key: z.string().min(1),
  project: z.string().min(1),
  title: z.string(),
  description: z.string().nullable(),
  status: z.string(),
  priority: z.string(),
  issueType: z.string().nullable().default(null),
  reporter: z.string(),
  assignee: z.string().nullable(),
  created: z.string(),
  updated: z.string(),
  resolution: z.string().nullable(),
  resolutionDate: z.string().nullable().default(null),
  comments: z.array(StoredCommentSchema),
})

export interface RawRecordRef {
  project: string
  key: string
  path: string
}

export type ParseResult =
  | { success: true, issue: Issue }
  | { success: false, error: string }

/**
 * Validate a stored raw record.
 */
export function parseStoredIssue(value: unknown): ParseResult {
  const result = StoredIssueSchema.safeParse(value)
  if (!result.success) {
    return {
      success: false,
      error: result.error.issues.map(i => `${i.path.map(String).join('.')}: ${i.message}`).join('; '),
    }
  }
  const issue: Issue = result.data
  return { success: true, issue }
}

function projectOfKey(key: string): string {
  const dash = key.lastIndexOf('-')
  return dash > 0 ? key.slice(0, dash) : key
}

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    return entries.sort((a, b) => a.name.localeCompare(b.name))
  }
  catch (err) {
    if (errorCode(err) === 'ENOENT')
      return []
    throw err
  }
}

/**
 * One JSON file per issue at `{rootDir}/{project}/{key}.json`.
 * Writes replace the file atomically, so a re-fetched issue overwrites
 * its previous version in place.
 */
export class RawRecordStore {
  readonly rootDir: string

  constructor(rootDir: string) {
    this.rootDir = rootDir
  }

  pathFor(project: string, key: string): string {
    return join(this.rootDir, project, `${key}.json`)
  }

  async write(issue: Issue): Promise<string> {
    const path = this.pathFor(issue.project, issue.key)
    const tmp = `${path}.tmp`
    try {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(tmp, `${JSON.stringify(issue, null, 2)}\n`, 'utf-8')
      await rename(tmp, path)
    }
    catch (err) {
      throw new StorageError(path, err)
    }
    return path
  }

  async read(ref: RawRecordRef): Promise<unknown> {
    return JSON.parse(await readFile(ref.path, 'utf-8'))
  }

  /**
   * Enumerate stored records, optionally limited to some projects.
   * Files directly under the root (an older flat layout) take their
   * project from the key prefix of the file name.
   */
  async* list(projects?: string[]): AsyncGenerator<RawRecordRef> {
    const wanted = projects && projects.length > 0 ? new Set(projects) : null
    const entries = await listDir(this.rootDir)

    for (const entry of entries) {
      if (entry.isFile() && entry.name.endsWith('.json')) {
        const key = basename(entry.name, '.json')
        const project = projectOfKey(key)
        if (!wanted || wanted.has(project))
          yield { project, key, path: join(this.rootDir, entry.name) }
        continue
      }

      if (!entry.isDirectory() || (wanted && !wanted.has(entry.name)))
        continue

      const projectDir = join(this.rootDir, entry.name)
      for (const file of await listDir(projectDir)) {
        if (file.isFile() && file.name.endsWith('.json')) {
          yield { project: entry.name, key: basename(file.name, '.json'), path: join(projectDir, file.name) }
        }
      }
    }
  }
}
