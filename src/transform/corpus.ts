import type { Logger } from '../utils/logger.js'
import type { TransformPolicies } from './policies.js'
import { mkdir, open } from 'node:fs/promises'
import { dirname } from 'node:path'
import { RawRecordStore, parseStoredIssue } from '../storage/raw-store.js'
import { errorMessage } from '../utils/errors.js'
import { silentLogger } from '../utils/logger.js'
import { DEFAULT_POLICIES } from './policies.js'
import { buildCorpusEntry } from './prompts.js'

export interface TransformOptions {
  inputDir: string
  outputPath: string
  /** Only transform these projects */
  projects?: string[]
}

export interface CorpusBuilderOptions {
  policies?: TransformPolicies
  logger?: Logger
}

/**
 * Reads stored raw issues and writes one corpus entry per line.
 */
export class CorpusBuilder {
  private readonly policies: TransformPolicies
  private readonly logger: Logger

  constructor(options: CorpusBuilderOptions = {}) {
    this.policies = options.policies ?? DEFAULT_POLICIES
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Returns the number of lines written. Unparseable or invalid raw files,
   * and files whose stored key differs from the file name, are logged and
   * skipped.
   */
  async transform(options: TransformOptions): Promise<number> {
    const store = new RawRecordStore(options.inputDir)
    this.logger.info(`Building corpus from ${options.inputDir} to ${options.outputPath}`, {
      projects: options.projects ?? 'all',
    })

    await mkdir(dirname(options.outputPath), { recursive: true })
    const output = await open(options.outputPath, 'w')

    let count = 0
    let skipped = 0
    try {
      for await (const ref of store.list(options.projects)) {
        let raw: unknown
        try {
          raw = await store.read(ref)
        }
        catch (err) {
          skipped++
          this.logger.warn(`Error reading ${ref.path}: ${errorMessage(err)}`)
          continue
        }

        const parsed = parseStoredIssue(raw)
        if (!parsed.success) {
          skipped++
          this.logger.warn(`Invalid raw issue ${ref.path}: ${parsed.error}`)
          continue
        }
        if (parsed.issue.key !== ref.key) {
          skipped++
          this.logger.warn(`Key mismatch in ${ref.path}: file holds ${parsed.issue.key}`)
          continue
        }

        const entry = buildCorpusEntry(parsed.issue, this.policies)
        await output.write(`${JSON.stringify(entry)}\n`)
        count++
      }
    }
    finally {
      await output.close()
    }

    this.logger.info(`Corpus built: ${count} issues written to ${options.outputPath}`, { skipped })
    return count
  }
}
