import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals'
import { QueueItem, SyncFailure } from '@/types/sync'
import { ValidationError } from '@/lib/errors'
import { decodePayload, getRetryDelay, isLightOperation, payloadSizeBytes } from '@/lib/sync/mutationQueue'
import { at } from './support/clock'
import { Harness, createHarness } from './support/harness'

const offline: SyncFailure = { category: 'network', message: 'offline', timedOut: false }
const rejected: SyncFailure = { category: 'remote_rejected', message: 'conflict', status: 409 }

function required(item: QueueItem | null): QueueItem {
  if (item === null) throw new Error('expected a queue item')
  return item
}

describe('queue helpers', () => {
  it('should size payloads as framing plus UTF-8 bytes', () => {
    expect(payloadSizeBytes(null)).toBe(100)
    expect(payloadSizeBytes('{"title":"é"}')).toBe(114)
  })

  it('should double the retry delay up to the cap', () => {
    expect(getRetryDelay(0, 1000, 30_000)).toBe(0)
    expect(getRetryDelay(1, 1000, 30_000)).toBe(1000)
    expect(getRetryDelay(2, 1000, 30_000)).toBe(2000)
    expect(getRetryDelay(3, 1000, 30_000)).toBe(4000)
    expect(getRetryDelay(10, 1000, 30_000)).toBe(30_000)
  })

  it('should classify light operations', () => {
    expect(isLightOperation('complete')).toBe(true)
    expect(isLightOperation('delete')).toBe(true)
    expect(isLightOperation('update')).toBe(false)
  })
})

describe('MutationQueue', () => {
  let h: Harness

  beforeEach(async () => {
    h = await createHarness('queue')
  })

  afterEach(() => {
    h.db.close()
  })

  describe('enqueue', () => {
    it('should append a pending item with a client operation id', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'é' }))

      expect(item).toMatchObject({
        operation: 'update',
        entity_type: 'task',
        entity_id: 1,
        payload: '{"title":"é"}',
        status: 'pending',
        retry_count: 0,
        size_bytes: 114,
        timestamp: at('2025-01-10T12:00'),
      })
      expect(item.client_op_id).toMatch(/^[0-9a-f-]{36}$/)
      expect(await h.queue.get(item.id)).toEqual(item)
    })

    it('should require a payload for create and update', async () => {
      await expect(h.queue.enqueue('create', 'task', -1, null)).rejects.toBeInstanceOf(ValidationError)
      await expect(h.queue.enqueue('update', 'task', 1, null)).rejects.toBeInstanceOf(ValidationError)
    })

    it('should replace the payload of a never-sent update', async () => {
      await h.queue.enqueue('update', 'task', 1, { title: 'A' })
      await h.queue.enqueue('update', 'task', 1, { title: 'B' })

      const items = await h.queue.list()
      expect(items).toHaveLength(1)
      expect(decodePayload(items[0].payload)).toEqual({ title: 'B' })
    })

    it('should append after an update that was already attempted', async () => {
      const first = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))
      await h.queue.markResult(first.id, { success: false, failure: offline })

      await h.queue.enqueue('update', 'task', 1, { title: 'B' })

      expect(await h.queue.list()).toHaveLength(2)
    })

    it('should replace a never-sent complete with uncomplete', async () => {
      await h.queue.enqueue('complete', 'task', 1, { completed: true })
      await h.queue.enqueue('uncomplete', 'task', 1, { completed: false })

      const items = await h.queue.list()
      expect(items.map(item => item.operation)).toEqual(['uncomplete'])
    })

    it('should drop never-sent edits when the entity is deleted', async () => {
      await h.queue.enqueue('update', 'task', 1, { title: 'A' })
      await h.queue.enqueue('complete', 'task', 1, null)
      await h.queue.enqueue('delete', 'task', 1, null)

      expect((await h.queue.list()).map(item => item.operation)).toEqual(['delete'])
    })

    it('should reject edits after a pending delete', async () => {
      await h.queue.enqueue('delete', 'task', 1, null)

      await expect(h.queue.enqueue('update', 'task', 1, { title: 'A' })).rejects.toBeInstanceOf(ValidationError)
    })

    describe('locally created entities', () => {
      it('should fold updates and completion into the create', async () => {
        await h.queue.enqueue('create', 'task', -1, { id: -1, title: 'A', completed: false })
        await h.queue.enqueue('update', 'task', -1, { id: -1, title: 'B', completed: false })
        await h.queue.enqueue('complete', 'task', -1, { completed: true, updated_at: 5 })

        const items = await h.queue.list()
        expect(items).toHaveLength(1)
        expect(items[0].operation).toBe('create')
        expect(decodePayload(items[0].payload)).toEqual({ id: -1, title: 'B', completed: true, updated_at: 5 })
      })

      it('should cancel a never-sent create on delete', async () => {
        await h.queue.enqueue('create', 'task', -1, { id: -1, title: 'A' })

        expect(await h.queue.enqueue('delete', 'task', -1, null)).toBeNull()
        expect(await h.queue.list()).toEqual([])
      })

      it('should refuse a second create', async () => {
        await h.queue.enqueue('create', 'task', -1, { id: -1, title: 'A' })

        await expect(h.queue.enqueue('create', 'task', -1, { id: -1, title: 'A' })).rejects.toBeInstanceOf(ValidationError)
      })
    })
  })

  describe('drainPending', () => {
    it('should put complete#B ahead of update#A', async () => {
      await h.queue.enqueue('update', 'task', 1, { title: 'A' })
      h.clock.advance(1000)
      await h.queue.enqueue('complete', 'task', 2, { completed: true })

      const drained = await h.queue.drainPending(10)

      expect(drained.map(item => `${item.operation}#${item.entity_id}`)).toEqual(['complete#2', 'update#1'])
    })

    it('should keep enqueue order within an entity', async () => {
      await h.queue.enqueue('update', 'task', 1, { title: 'A' })
      await h.queue.enqueue('complete', 'task', 1, { completed: true })

      const drained = await h.queue.drainPending(10)

      expect(drained.map(item => item.operation)).toEqual(['update', 'complete'])
    })

    it('should hold back failed items and their entity until the backoff elapses', async () => {
      const failed = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))
      await h.queue.markResult(failed.id, { success: false, failure: offline })
      await h.queue.enqueue('complete', 'task', 1, null)
      await h.queue.enqueue('update', 'task', 2, { title: 'B' })

      expect((await h.queue.drainPending(10)).map(item => item.entity_id)).toEqual([2])

      h.clock.advance(1000)
      expect((await h.queue.drainPending(10)).map(item => item.operation)).toEqual(['update', 'complete', 'update'])
    })

    it('should stop draining items the remote keeps rejecting', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))
      for (let attempt = 0; attempt < 3; attempt++) {
        await h.queue.markResult(item.id, { success: false, failure: rejected })
      }
      h.clock.advance(24 * 60 * 60 * 1000)

      expect(await h.queue.drainPending(10)).toEqual([])
      expect((await h.queue.persistentFailures()).map(dead => dead.id)).toEqual([item.id])
    })

    it('should put the largest items first when asked', async () => {
      await h.queue.enqueue('update', 'task', 1, { title: 'short' })
      await h.queue.enqueue('update', 'task', 2, { title: 'a much longer title' })

      const drained = await h.queue.drainPending(10, { prioritizeLargest: true })

      expect(drained.map(item => item.entity_id)).toEqual([2, 1])
    })

    it('should respect the limit', async () => {
      await h.queue.enqueue('update', 'task', 1, { title: 'A' })
      await h.queue.enqueue('update', 'task', 2, { title: 'B' })

      expect(await h.queue.drainPending(1)).toHaveLength(1)
    })
  })

  describe('markResult', () => {
    it('should mark synced and stay synced when repeated', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))

      await h.queue.markResult(item.id, { success: true })
      const again = required(await h.queue.markResult(item.id, { success: true }))

      expect(again.status).toBe('synced')
      expect(again.synced_at).toBe(at('2025-01-10T12:00'))
    })

    it('should record the failure', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))

      const failed = await h.queue.markResult(item.id, { success: false, failure: offline })

      expect(failed).toMatchObject({
        status: 'failed',
        retry_count: 1,
        last_retry: at('2025-01-10T12:00'),
        last_failure: 'network',
        last_error: 'offline',
      })
    })

    it('should ignore a result for an item that no longer exists', async () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})

      expect(await h.queue.markResult(42, { success: true })).toBeNull()
      expect(warnSpy).toHaveBeenCalledWith('[MutationQueue] Result for missing item 42 ignored')
      warnSpy.mockRestore()
    })
  })

  describe('markSending', () => {
    it('should claim an outstanding item', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))

      expect(await h.queue.markSending(item.id)).toMatchObject({ id: item.id, status: 'sending', retry_count: 0 })
      expect((await h.queue.drainPending(10)).map(drained => drained.id)).toEqual([item.id])
    })

    it('should skip synced and missing items', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))
      await h.queue.markResult(item.id, { success: true })

      expect(await h.queue.markSending(item.id)).toBeNull()
      expect(await h.queue.markSending(42)).toBeNull()
    })

    it('should append edits behind an item being sent', async () => {
      const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))
      await h.queue.markSending(item.id)

      await h.queue.enqueue('update', 'task', 1, { title: 'B' })

      const items = await h.queue.list()
      expect(items.map(queued => decodePayload(queued.payload))).toEqual([{ title: 'A' }, { title: 'B' }])
    })

    it('should keep a create being sent when the entity is deleted', async () => {
      const create = required(await h.queue.enqueue('create', 'task', -1, { id: -1, title: 'A' }))
      await h.queue.markSending(create.id)

      expect(await h.queue.enqueue('delete', 'task', -1, null)).toMatchObject({ operation: 'delete', entity_id: -1 })
      expect((await h.queue.list()).map(queued => queued.operation)).toEqual(['create', 'delete'])
    })
  })

  describe('enforceSizeCeiling', () => {
    beforeEach(async () => {
      await h.queue.enqueue('complete', 'task', 1, { note: 'x'.repeat(500) })
      await h.queue.enqueue('update', 'task', 2, { title: 't' })
    })

    it('should drop light payloads until under the ceiling', async () => {
      const report = await h.queue.enforceSizeCeiling(300)

      expect(report).toEqual({ compacted: 1, size_bytes: 213, over_ceiling: false })
      expect((await h.queue.list()).map(item => item.payload)).toEqual([null, '{"title":"t"}'])
    })

    it('should report when full payloads still exceed the ceiling', async () => {
      const report = await h.queue.enforceSizeCeiling(150)

      expect(report).toEqual({ compacted: 1, size_bytes: 213, over_ceiling: true })
      expect(await h.queue.list()).toHaveLength(2)
    })

    it('should leave a queue under the ceiling alone', async () => {
      expect(await h.queue.enforceSizeCeiling(10_000)).toEqual({ compacted: 0, size_bytes: 724, over_ceiling: false })
    })
  })

  it('should remap a pending id in queue items and payloads', async () => {
    const create = required(await h.queue.enqueue('create', 'task', -1, { id: -1, title: 'A' }))
    await h.queue.markResult(create.id, { success: false, failure: offline })
    await h.queue.enqueue('update', 'task', -1, { id: -1, title: 'B' })

    expect(await h.queue.remapEntityId('task', -1, 100)).toBe(2)

    const items = await h.queue.list()
    expect(items.map(item => item.entity_id)).toEqual([100, 100])
    expect(items.map(item => decodePayload(item.payload).id)).toEqual([100, 100])
  })

  it('should list entities with outstanding items', async () => {
    await h.queue.enqueue('update', 'task', 1, { title: 'A' })
    await h.queue.enqueue('delete', 'group', 3, null)

    expect(await h.queue.outstandingEntityKeys()).toEqual(new Set(['task:1', 'group:3']))
    expect(await h.queue.outstandingEntityKeys('delete')).toEqual(new Set(['group:3']))
  })

  it('should collect synced items past the retention window', async () => {
    const item = required(await h.queue.enqueue('update', 'task', 1, { title: 'A' }))
    await h.queue.markResult(item.id, { success: true })

    h.clock.advance(24 * 60 * 60 * 1000)
    expect(await h.queue.gcSynced()).toBe(0)

    h.clock.advance(6 * 24 * 60 * 60 * 1000)
    expect(await h.queue.gcSynced()).toBe(1)
    expect(await h.queue.list()).toEqual([])
  })

  it('should list the largest outstanding items', async () => {
    await h.queue.enqueue('update', 'task', 1, { title: 'short' })
    await h.queue.enqueue('update', 'task', 2, { title: 'a much longer title' })
    await h.queue.enqueue('delete', 'task', 3, null)

    expect((await h.queue.largestPending(2)).map(item => item.entity_id)).toEqual([2, 1])
  })

  it('should report outstanding bytes and clear', async () => {
    await h.queue.enqueue('delete', 'task', 1, null)
    await h.queue.enqueue('delete', 'task', 2, null)

    expect(await h.queue.pendingSizeBytes()).toBe(200)

    await h.queue.clear()
    expect(await h.queue.list()).toEqual([])
  })
})
