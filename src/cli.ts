import type { ScrapeOptions } from './ingest/orchestrator.js'
import { Command, InvalidArgumentError } from 'commander'
import { parseStartDate } from './utils/time.js'

/**
 * Paths left out fall back to the configured storage locations.
 */
export interface TransformCommandOptions {
  output?: string
  inputDir?: string
  projects?: string[]
}

export interface CommandHandlers {
  scrape: (options: ScrapeOptions) => Promise<void>
  transform: (options: TransformCommandOptions) => Promise<void>
}

const PROJECT_KEY = /^[A-Z][A-Z0-9_]*$/

export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer')
  }
  return parsed
}

export function parseDateOption(value: string): Date {
  const date = parseStartDate(value)
  if (!date) {
    throw new InvalidArgumentError('must be a date in YYYY-MM-DD format')
  }
  return date
}

/**
 * Upper-case and validate project keys; accepts comma-separated values and
 * accumulates across a variadic option.
 */
export function parseProjectKeys(value: string, previous: string[] = []): string[] {
  const keys = value.split(',').map(v => v.trim().toUpperCase()).filter(Boolean)
  for (const key of keys) {
    if (!PROJECT_KEY.test(key)) {
      throw new InvalidArgumentError(`"${key}" is not a project key`)
    }
  }
  return [...previous, ...keys]
}

/**
 * The `issue-corpus` command line: `scrape` and `transform`.
 */
export function createProgram(handlers: CommandHandlers): Command {
  const program = new Command()

  program
    .name('issue-corpus')
    .description('Scrape public Jira issues and build a training corpus')
    .version('0.1.0')

  program
    .command('scrape')
    .description('Fetch issues into the raw store, resuming from saved checkpoints')
    .option('--projects <keys...>', 'project keys, e.g. HADOOP SPARK KAFKA (default: configured set)', parseProjectKeys)
    .option('--start-date <date>', 'only issues updated on or after this date (YYYY-MM-DD)', parseDateOption)
    .option('--max-issues <n>', 'maximum issues per project', parsePositiveInt)
    .action(async (opts: { projects?: string[], startDate?: Date, maxIssues?: number }) => {
      await handlers.scrape({
        projects: opts.projects,
        startDate: opts.startDate,
        maxIssues: opts.maxIssues,
      })
    })

  program
    .command('transform')
    .description('Build the JSONL corpus from stored raw issues')
    .option('--output <path>', 'output JSONL file path (default: storage.corpusPath)')
    .option('--input-dir <dir>', 'raw issue directory (default: storage.rawDir)')
    .option('--projects <keys...>', 'only these project keys', parseProjectKeys)
    .action(async (opts: TransformCommandOptions) => {
      await handlers.transform({
        output: opts.output,
        inputDir: opts.inputDir,
        projects: opts.projects,
      })
    })

  return program
}
