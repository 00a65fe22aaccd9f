import type { IssueRef, IssueSource } from '../adapters/base.js'
import type { CheckpointStore } from '../storage/checkpoint.js'
import type { RawRecordStore } from '../storage/raw-store.js'
import type { Issue } from '../types/issue.js'
import type { Logger } from '../utils/logger.js'
import { errorMessage, FetchError, IssueValidationError, StorageError } from '../utils/errors.js'
import { silentLogger } from '../utils/logger.js'
import { latestOf } from '../utils/time.js'

/**
 * Where an issue sat in the search order. The watermark follows this, not
 * the detail's `updated`, which moves forward when the issue is edited
 * between the search and the detail request.
 */
function searchPosition(ref: IssueRef, issue: Issue): string {
  if (ref.updated === null)
    return issue.updated
  return Date.parse(ref.updated) <= Date.parse(issue.updated) ? ref.updated : issue.updated
}

export interface ScrapeOptions {
  /** Project keys; defaults to the configured project set */
  projects?: string[]
  /** Lower bound on `updated`, used when later than the checkpoint watermark */
  startDate?: Date
  /** Maximum number of search results considered per project */
  maxIssues?: number
}

export interface OrchestratorOptions {
  defaultProjects: string[]
  pageSize: number
  flushInterval: number
  strict: boolean
  logger?: Logger
}

export interface ProjectSummary {
  project: string
  /** Search results considered */
  seen: number
  stored: number
  /** Already in the checkpoint's processed keys */
  skipped: number
  invalid: number
  /** Detail fetch failed for good */
  failed: number
  watermark: string
  aborted: string | null
}

/**
 * Drives per-project pagination over an issue source, storing new issues
 * and checkpointing progress after each page.
 *
 * Progress is recorded only after the raw record is on disk and becomes
 * durable at flush, so a crash re-processes at most the issues stored
 * since the last flush.
 */
export class IngestionOrchestrator {
  private readonly source: IssueSource
  private readonly checkpoints: CheckpointStore
  private readonly rawStore: RawRecordStore
  private readonly options: OrchestratorOptions
  private readonly logger: Logger

  constructor(
    source: IssueSource,
    checkpoints: CheckpointStore,
    rawStore: RawRecordStore,
    options: OrchestratorOptions,
  ) {
    this.source = source
    this.checkpoints = checkpoints
    this.rawStore = rawStore
    this.options = options
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Ingest each project in turn. A project that aborts does not stop the
   * others; only a storage failure that rules out further writes does.
   */
  async scrape(options: ScrapeOptions = {}): Promise<ProjectSummary[]> {
    const projects = options.projects && options.projects.length > 0
      ? options.projects
      : this.options.defaultProjects

    const summaries: ProjectSummary[] = []
    for (const project of projects) {
      summaries.push(await this.scrapeProject(project, options))
    }
    return summaries
  }

  async scrapeProject(project: string, options: Omit<ScrapeOptions, 'projects'> = {}): Promise<ProjectSummary> {
    const log = this.logger.child(project)
    const checkpoint = await this.checkpoints.load(project)
    const since = latestOf(new Date(checkpoint.lastUpdateTimestamp), options.startDate ?? new Date(0))
    const { maxIssues } = options
    const { pageSize, flushInterval } = this.options

    const summary: ProjectSummary = {
      project,
      seen: 0,
      stored: 0,
      skipped: 0,
      invalid: 0,
      failed: 0,
      watermark: checkpoint.lastUpdateTimestamp,
      aborted: null,
    }

    let maxUpdated: string | null = null
    let storedSinceFlush = 0
    const limitReached = () => maxIssues !== undefined && summary.seen >= maxIssues

    const checkpointProgress = async () => {
      if (maxUpdated !== null) {
        this.checkpoints.advanceWatermark(project, maxUpdated)
      }
      await this.checkpoints.flush()
      storedSinceFlush = 0
    }

    log.info(`Starting ${project} from ${since.toISOString()}`, { maxIssues })

    try {
      let startAt = 0
      while (!limitReached()) {
        const page = await this.source.searchIssues({
          project,
          updatedSince: since,
          startAt,
          maxResults: maxIssues === undefined ? pageSize : Math.min(pageSize, maxIssues - summary.seen),
        })

        log.info(`Found ${page.total} issues, processing ${page.issues.length} (startAt=${startAt})`)
        if (page.issues.length === 0)
          break

        for (const ref of page.issues) {
          if (limitReached())
            break
          summary.seen++

          if (this.checkpoints.isProcessed(project, ref.key)) {
            summary.skipped++
            continue
          }

          const issue = await this.fetchIssue(ref.key, summary, log)
          if (!issue)
            continue

          await this.store(issue, log)
          this.checkpoints.recordProcessed(project, ref.key)
          summary.stored++
          const position = searchPosition(ref, issue)
          if (maxUpdated === null || Date.parse(position) > Date.parse(maxUpdated)) {
            maxUpdated = position
          }

          storedSinceFlush++
          if (storedSinceFlush >= flushInterval) {
            await checkpointProgress()
          }
        }

        await checkpointProgress()
        startAt += page.issues.length
        if (startAt >= page.total)
          break
      }
    }
    catch (err) {
      summary.aborted = errorMessage(err)
      log.error(`Aborting ${project}: ${summary.aborted}`)
      if (err instanceof StorageError && err.fatal) {
        throw err
      }
      // Keep the progress made before the failure.
      try {
        await checkpointProgress()
      }
      catch (flushErr) {
        log.error(`Could not save checkpoint for ${project}: ${errorMessage(flushErr)}`)
        if (flushErr instanceof StorageError && flushErr.fatal)
          throw flushErr
      }
    }

    summary.watermark = checkpoint.lastUpdateTimestamp
    log.info(`Finished ${project}`, {
      seen: summary.seen,
      stored: summary.stored,
      skipped: summary.skipped,
      invalid: summary.invalid,
      failed: summary.failed,
      watermark: summary.watermark,
    })
    return summary
  }

  /**
   * Fetch one issue's detail. Returns null when the issue is to be skipped;
   * rethrows validation errors in strict mode.
   */
  private async fetchIssue(key: string, summary: ProjectSummary, log: Logger): Promise<Issue | null> {
    try {
      return await this.source.getIssue(key)
    }
    catch (err) {
      if (err instanceof IssueValidationError) {
        if (this.options.strict)
          throw err
        summary.invalid++
        log.warn(`Skipping invalid issue ${key}`, { problems: err.problems })
        return null
      }
      if (err instanceof FetchError) {
        summary.failed++
        log.warn(`Skipping ${key}: ${err.message}`, { kind: err.kind, status: err.status })
        return null
      }
      throw err
    }
  }

  private async store(issue: Issue, log: Logger): Promise<void> {
    try {
      await this.rawStore.write(issue)
    }
    catch (err) {
      if (!(err instanceof StorageError) || err.fatal)
        throw err
      log.warn(`Retrying write of ${issue.key}`, { error: err.message })
      await this.rawStore.write(issue)
    }
  }
}
