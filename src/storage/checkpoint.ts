import type { Checkpoint } from '../types/issue.js'
import type { Logger } from '../utils/logger.js'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod/v4'
import { errorCode, errorMessage, StorageError } from '../utils/errors.js'
import { silentLogger } from '../utils/logger.js'
import { EPOCH_ISO, toUtcIso } from '../utils/time.js'

const CheckpointFileSchema = z.object({
  project: z.string(),
  last_update_timestamp: z.string(),
  processed_keys: z.array(z.string()),
})

type CheckpointFile = z.infer<typeof CheckpointFileSchema>

function emptyCheckpoint(project: string): Checkpoint {
  return { project, lastUpdateTimestamp: EPOCH_ISO, processedKeys: new Set() }
}

/**
 * Durable per-project resume state: the update watermark and the set of
 * issue keys already stored. Mutations stay in memory until `flush()`.
 *
 * Each project lives in `{stateDir}/{project}.json`, replaced atomically
 * (write `.tmp`, then rename) so a crash leaves the previous version intact.
 */
export class CheckpointStore {
  private readonly stateDir: string
  private readonly logger: Logger
  private readonly checkpoints = new Map<string, Checkpoint>()
  private readonly dirty = new Set<string>()

  constructor(stateDir: string, logger: Logger = silentLogger) {
    this.stateDir = stateDir
    this.logger = logger
  }

  pathFor(project: string): string {
    return join(this.stateDir, `${project}.json`)
  }

  async load(project: string): Promise<Checkpoint> {
    const cached = this.checkpoints.get(project)
    if (cached)
      return cached

    const checkpoint = await this.read(project)
    this.checkpoints.set(project, checkpoint)
    return checkpoint
  }

  isProcessed(project: string, key: string): boolean {
    return this.require(project).processedKeys.has(key)
  }

  recordProcessed(project: string, key: string): void {
    const checkpoint = this.require(project)
    if (!checkpoint.processedKeys.has(key)) {
      checkpoint.processedKeys.add(key)
      this.dirty.add(project)
    }
  }

  /**
   * Move the watermark forward; earlier timestamps are ignored.
   */
  advanceWatermark(project: string, timestamp: string): void {
    const checkpoint = this.require(project)
    const next = toUtcIso(timestamp)
    if (next === null) {
      throw new TypeError(`Invalid watermark timestamp "${timestamp}" for ${project}`)
    }
    if (Date.parse(next) > Date.parse(checkpoint.lastUpdateTimestamp)) {
      checkpoint.lastUpdateTimestamp = next
      this.dirty.add(project)
    }
  }

  /**
   * Persist every project changed since the last flush.
   */
  async flush(): Promise<void> {
    if (this.dirty.size === 0)
      return

    await mkdir(this.stateDir, { recursive: true })
      .catch((err: unknown) => {
        throw new StorageError(this.stateDir, err)
      })

    for (const project of [...this.dirty]) {
      await this.write(this.require(project))
      this.dirty.delete(project)
    }
  }

  private require(project: string): Checkpoint {
    const checkpoint = this.checkpoints.get(project)
    if (!checkpoint) {
      throw new Error(`Checkpoint for ${project} used before load()`)
    }
    return checkpoint
  }

  private async read(project: string): Promise<Checkpoint> {
    const path = this.pathFor(project)
    let raw: string
    try {
      raw = await readFile(path, 'utf-8')
    }
    catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        this.logger.warn(`Unreadable checkpoint for ${project}, starting fresh`, { path, error: errorMessage(err) })
      }
      return emptyCheckpoint(project)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    }
    catch (err) {
      this.logger.warn(`Corrupt checkpoint for ${project}, starting fresh`, { path, error: errorMessage(err) })
      return emptyCheckpoint(project)
    }

    const result = CheckpointFileSchema.safeParse(parsed)
    const watermark = result.success ? toUtcIso(result.data.last_update_timestamp) : null
    if (!result.success || watermark === null || result.data.project !== project) {
      this.logger.warn(`Invalid checkpoint for ${project}, starting fresh`, { path })
      return emptyCheckpoint(project)
    }

    return {
      project,
      lastUpdateTimestamp: watermark,
      processedKeys: new Set(result.data.processed_keys),
    }
  }

  private async write(checkpoint: Checkpoint): Promise<void> {
    const path = this.pathFor(checkpoint.project)
    const tmp = `${path}.tmp`
    const record: CheckpointFile = {
      project: checkpoint.project,
      last_update_timestamp: checkpoint.lastUpdateTimestamp,
      processed_keys: [...checkpoint.processedKeys].sort(),
    }

    try {
      await writeFile(tmp, `${JSON.stringify(record, null, 2)}\n`, 'utf-8')
      await rename(tmp, path)
    }
    catch (err) {
      throw new StorageError(path, err)
    }
  }
}
