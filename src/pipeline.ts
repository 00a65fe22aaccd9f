import type { CommandHandlers } from './cli.js'
import type { LoadConfigResult } from './config/loader.js'
import type { ProjectSummary } from './ingest/orchestrator.js'
import type { Logger } from './utils/logger.js'
import { JiraSource } from './adapters/jira.js'
import { IngestionOrchestrator } from './ingest/orchestrator.js'
import { CheckpointStore } from './storage/checkpoint.js'
import { RawRecordStore } from './storage/raw-store.js'
import { CorpusBuilder } from './transform/corpus.js'
import { buildAuthHeaders, RetryingFetcher } from './utils/http.js'
import { createLogger } from './utils/logger.js'

export interface TransformRequest {
  output: string
  inputDir: string
  projects?: string[]
}

/**
 * Wire the ingestion components from a loaded configuration.
 */
export function createOrchestrator(loaded: LoadConfigResult, logger: Logger): IngestionOrchestrator {
  const { config, resolvedAuth } = loaded
  const fetcher = new RetryingFetcher({
    ...config.fetch,
    headers: buildAuthHeaders(config.jira.auth, resolvedAuth),
    logger: logger.child('http'),
  })

  return new IngestionOrchestrator(
    new JiraSource(fetcher, config.jira.baseUrl),
    new CheckpointStore(config.storage.stateDir, logger.child('checkpoint')),
    new RawRecordStore(config.storage.rawDir),
    {
      defaultProjects: config.jira.projects,
      pageSize: config.jira.pageSize,
      flushInterval: config.ingest.flushInterval,
      strict: config.ingest.strict,
      logger: logger.child('scrape'),
    },
  )
}

export async function runTransform(request: TransformRequest, logger: Logger): Promise<number> {
  const builder = new CorpusBuilder({ logger: logger.child('transform') })
  return builder.transform({
    inputDir: request.inputDir,
    outputPath: request.output,
    projects: request.projects,
  })
}

export function formatSummary(summary: ProjectSummary): string {
  const status = summary.aborted ? `aborted (${summary.aborted})` : 'done'
  return `${summary.project}: ${status}; seen ${summary.seen}, stored ${summary.stored}, `
    + `skipped ${summary.skipped}, invalid ${summary.invalid}, failed ${summary.failed}; `
    + `watermark ${summary.watermark}`
}

interface Session {
  loaded: LoadConfigResult
  logger: Logger
}

/**
 * Command handlers that load configuration on first use, so commander can
 * answer `--help` and `--version` whatever state the config is in.
 */
export function createHandlers(
  load: () => LoadConfigResult,
  print: (line: string) => void = line => console.log(line),
): CommandHandlers {
  let session: Session | null = null
  const open = (): Session => {
    if (!session) {
      const loaded = load()
      const logger = createLogger(loaded.config.logging)
      if (loaded.configPath) {
        logger.debug(`Using config ${loaded.configPath}`)
      }
      session = { loaded, logger }
    }
    return session
  }

  return {
    async scrape(options) {
      const { loaded, logger } = open()
      const summaries = await createOrchestrator(loaded, logger).scrape(options)
      for (const summary of summaries) {
        print(formatSummary(summary))
      }
      if (summaries.some(s => s.aborted !== null)) {
        process.exitCode = 1
      }
    },
    async transform(options) {
      const { loaded, logger } = open()
      const output = options.output ?? loaded.config.storage.corpusPath
      const count = await runTransform({
        output,
        inputDir: options.inputDir ?? loaded.config.storage.rawDir,
        projects: options.projects,
      }, logger)
      print(`Wrote ${count} corpus entries to ${output}`)
    },
  }
}
