import { existsSync } from 'node:fs'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CheckpointStore } from '../../src/storage/checkpoint.js'
import { createLogger } from '../../src/utils/logger.js'

describe('CheckpointStore', () => {
  let stateDir: string

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'checkpoint-test-'))
  })

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true })
  })

  describe('load', () => {
    it('should return a zero checkpoint when none exists', async () => {
      const store = new CheckpointStore(stateDir)

      const checkpoint = await store.load('DEMO')

      expect(checkpoint.lastUpdateTimestamp).toBe('1970-01-01T00:00:00.000Z')
      expect(checkpoint.processedKeys.size).toBe(0)
    })

    it('should read a previously flushed checkpoint', async () => {
      const first = new CheckpointStore(stateDir)
      await first.load('DEMO')
      first.recordProcessed('DEMO', 'DEMO-2')
      first.recordProcessed('DEMO', 'DEMO-1')
      first.advanceWatermark('DEMO', '2024-03-01T12:00:00.000Z')
      await first.flush()

      const second = new CheckpointStore(stateDir)
      const checkpoint = await second.load('DEMO')

      expect(checkpoint.lastUpdateTimestamp).toBe('2024-03-01T12:00:00.000Z')
      expect([...checkpoint.processedKeys].sort()).toEqual(['DEMO-1', 'DEMO-2'])
    })

    it('should treat a corrupt file as absent', async () => {
      const write = vi.fn()
      await writeFile(join(stateDir, 'DEMO.json'), '{"project": "DEMO", "last_upd')
      const store = new CheckpointStore(stateDir, createLogger({ write }))

      const checkpoint = await store.load('DEMO')

      expect(checkpoint.lastUpdateTimestamp).toBe('1970-01-01T00:00:00.000Z')
      expect(checkpoint.processedKeys.size).toBe(0)
      expect(write).toHaveBeenCalledWith(expect.stringContaining('Corrupt checkpoint for DEMO, starting fresh'))
    })

    it('should treat a file with the wrong shape as absent', async () => {
      await writeFile(join(stateDir, 'DEMO.json'), JSON.stringify({
        project: 'DEMO',
        last_update_timestamp: '2024-03-01T12:00:00.000Z',
        processed_keys: 'DEMO-1',
      }))
      const store = new CheckpointStore(stateDir)

      const checkpoint = await store.load('DEMO')

      expect(checkpoint.processedKeys.size).toBe(0)
    })

    it('should treat another project\'s record as absent', async () => {
      await writeFile(join(stateDir, 'DEMO.json'), JSON.stringify({
        project: 'OTHER',
        last_update_timestamp: '2024-03-01T12:00:00.000Z',
        processed_keys: ['OTHER-1'],
      }))
      const store = new CheckpointStore(stateDir)

      const checkpoint = await store.load('DEMO')

      expect(checkpoint.lastUpdateTimestamp).toBe('1970-01-01T00:00:00.000Z')
    })
  })

  describe('advanceWatermark', () => {
    it('should never move the watermark backwards', async () => {
      const store = new CheckpointStore(stateDir)
      const checkpoint = await store.load('DEMO')
      const observed: string[] = []

      for (const ts of [
        '2024-01-05T00:00:00.000Z',
        '2024-01-03T00:00:00.000Z',
        '2024-01-07T00:00:00.000Z',
        '2024-01-06T23:59:59.000Z',
      ]) {
        store.advanceWatermark('DEMO', ts)
        observed.push(checkpoint.lastUpdateTimestamp)
      }

      expect(observed).toEqual([
        '2024-01-05T00:00:00.000Z',
        '2024-01-05T00:00:00.000Z',
        '2024-01-07T00:00:00.000Z',
        '2024-01-07T00:00:00.000Z',
      ])
    })

    it('should normalize offsets before comparing', async () => {
      const store = new CheckpointStore(stateDir)
      const checkpoint = await store.load('DEMO')

      store.advanceWatermark('DEMO', '2024-01-05T10:00:00.000+0200')

      expect(checkpoint.lastUpdateTimestamp).toBe('2024-01-05T08:00:00.000Z')
    })

    it('should reject an invalid timestamp', async () => {
      const store = new CheckpointStore(stateDir)
      await store.load('DEMO')

      expect(() => store.advanceWatermark('DEMO', 'yesterday')).toThrow('Invalid watermark timestamp')
    })
  })

  describe('recordProcessed', () => {
    it('should be idempotent', async () => {
      const store = new CheckpointStore(stateDir)
      const checkpoint = await store.load('DEMO')

      store.recordProcessed('DEMO', 'DEMO-1')
      store.recordProcessed('DEMO', 'DEMO-1')

      expect(checkpoint.processedKeys.size).toBe(1)
      expect(store.isProcessed('DEMO', 'DEMO-1')).toBe(true)
      expect(store.isProcessed('DEMO', 'DEMO-2')).toBe(false)
    })

    it('should require the project to be loaded first', () => {
      const store = new CheckpointStore(stateDir)

      expect(() => store.recordProcessed('DEMO', 'DEMO-1')).toThrow('used before load()')
    })
  })

  describe('flush', () => {
    it('should write a sorted record per project', async () => {
      const store = new CheckpointStore(stateDir)
      await store.load('DEMO')
      store.recordProcessed('DEMO', 'DEMO-10')
      store.recordProcessed('DEMO', 'DEMO-1')
      store.advanceWatermark('DEMO', '2024-03-01T12:00:00.000Z')

      await store.flush()
      await store.flush()

      const saved = JSON.parse(await readFile(join(stateDir, 'DEMO.json'), 'utf-8'))
      expect(saved).toEqual({
        project: 'DEMO',
        last_update_timestamp: '2024-03-01T12:00:00.000Z',
        processed_keys: ['DEMO-1', 'DEMO-10'],
      })
      expect(existsSync(join(stateDir, 'DEMO.json.tmp'))).toBe(false)
    })

    it('should write nothing when nothing changed', async () => {
      const store = new CheckpointStore(stateDir)
      await store.load('DEMO')

      await store.flush()

      expect(existsSync(join(stateDir, 'DEMO.json'))).toBe(false)
    })
  })
})
