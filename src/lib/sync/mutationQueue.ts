import { v4 as uuidv4 } from 'uuid'
import { EntityType } from '../../types'
import {
  LightOperation,
  LightQueueItem,
  MarkOutcome,
  NewQueueItem,
  QueueItem,
  QueueOperation,
} from '../../types/sync'
import { Clock } from '../clock'
import { StorageError, ValidationError } from '../errors'
import { IndexedDBService } from '../storage/indexedDB'
import { WriteLock } from '../storage/writeLock'
import { queueItemSchema } from '../validation'

const QUEUE_STORE = 'sync_queue'
const ITEM_OVERHEAD_BYTES = 100

export interface QueueOptions {
  maxRejectedRetries: number
  baseRetryDelayMs: number
  maxRetryDelayMs: number
  syncedRetentionMs: number
}

export interface DrainOptions {
  prioritizeLargest?: boolean
}

export interface CeilingReport {
  compacted: number
  size_bytes: number
  over_ceiling: boolean
}

type Payload = Record<string, unknown>

const encoder = new TextEncoder()

export function payloadSizeBytes(payload: string | null): number {
  return ITEM_OVERHEAD_BYTES + (payload === null ? 0 : encoder.encode(payload).length)
}

export function entityKey(type: EntityType, id: number | null): string {
  return `${type}:${id}`
}

export function isLightOperation(operation: QueueOperation): operation is LightOperation {
  return operation === 'complete' || operation === 'uncomplete' || operation === 'delete'
}

/**
 * Delay before an item may be retried: doubles per failure, capped
 */
export function getRetryDelay(retryCount: number, baseDelayMs: number, maxDelayMs: number): number {
  if (retryCount <= 0) return 0
  return Math.min(baseDelayMs * Math.pow(2, retryCount - 1), maxDelayMs)
}

function isLightItem(item: QueueItem): item is LightQueueItem {
  return isLightOperation(item.operation)
}

function isOutstanding(item: QueueItem): boolean {
  return item.status !== 'synced'
}

function neverSent(item: QueueItem): boolean {
  return item.status === 'pending' && item.retry_count === 0
}

export function itemKey(item: QueueItem): string {
  return item.entity_id === null ? `${item.entity_type}:new:${item.id}` : entityKey(item.entity_type, item.entity_id)
}

/**
 * Snapshot payload for create and update: the record minus its local access time
 */
export function toSnapshotPayload(record: { last_accessed: number }): Payload {
  return Object.fromEntries(Object.entries(record).filter(([key]) => key !== 'last_accessed'))
}

export function decodePayload(payload: string | null): Payload {
  if (payload === null) return {}
  const parsed: unknown = JSON.parse(payload)
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {}
}

/**
 * Keep every entity's items in enqueue order while the entities themselves
 * follow the given ordering: each entity's items fill the slots the
 * ordering gave that entity, oldest first.
 */
function preserveEntityOrder(sorted: QueueItem[]): QueueItem[] {
  const byEntity = new Map<string, QueueItem[]>()
  for (const item of sorted) {
    const group = byEntity.get(itemKey(item)) ?? []
    group.push(item)
    byEntity.set(itemKey(item), group)
  }
  for (const group of byEntity.values()) {
    group.sort((a, b) => a.id - b.id)
  }

  const taken = new Map<string, number>()
  return sorted.map(item => {
    const key = itemKey(item)
    const index = taken.get(key) ?? 0
    taken.set(key, index + 1)
    const group = byEntity.get(key)
    return group ? group[index] : item
  })
}

/**
 * Durable, ordered queue of local mutations awaiting the remote service.
 *
 * Light operations (complete, uncomplete, delete) drain ahead of full
 * snapshots; per entity, enqueue order always holds.
 */
export class MutationQueue {
  constructor(
    private readonly db: IndexedDBService,
    private readonly lock: WriteLock,
    private readonly clock: Clock,
    private readonly options: QueueOptions
  ) {}

  private decode(raw: unknown): QueueItem {
    const parsed = queueItemSchema.safeParse(raw)
    if (!parsed.success) {
      throw new StorageError('Corrupt queue item', QUEUE_STORE)
    }
    return parsed.data
  }

  /**
   * All items ordered by id
   */
  async list(): Promise<QueueItem[]> {
    const rows = await this.db.getAll(QUEUE_STORE)
    return rows.map(row => this.decode(row)).sort((a, b) => a.id - b.id)
  }

  async get(id: number): Promise<QueueItem | null> {
    const raw = await this.db.get(QUEUE_STORE, id)
    return raw === undefined ? null : this.decode(raw)
  }

  private async outstanding(): Promise<QueueItem[]> {
    return (await this.list()).filter(isOutstanding)
  }

  private async write(item: QueueItem): Promise<QueueItem> {
    await this.db.put(QUEUE_STORE, item)
    return item
  }

  private withPayload(item: QueueItem, payload: Payload): QueueItem {
    const encoded = JSON.stringify(payload)
    return { ...item, payload: encoded, size_bytes: payloadSizeBytes(encoded) }
  }

  /**
   * Record a mutation. Never-sent items for the same entity are coalesced
   * where the newer operation supersedes them; otherwise the operation is
   * appended. Returns the item that now carries the mutation, or null when
   * the mutation cancelled a create that was never sent.
   */
  async enqueue(
    operation: QueueOperation,
    entityType: EntityType,
    entityId: number | null,
    payload: Payload | null
  ): Promise<QueueItem | null> {
    if ((operation === 'create' || operation === 'update') && payload === null) {
      throw new ValidationError(`${operation} requires a payload`, 'payload')
    }

    return this.lock.runExclusive(async () => {
      const related = entityId === null
        ? []
        : (await this.outstanding()).filter(
          item => item.entity_type === entityType && item.entity_id === entityId
        )

      if (related.some(item => item.operation === 'delete')) {
        throw new ValidationError(`${entityType} ${entityId} has a pending delete`, 'entity_id')
      }

      const pendingCreate = related.find(item => item.operation === 'create' && neverSent(item))
      if (pendingCreate && entityId !== null && entityId < 0) {
        return this.foldIntoCreate(pendingCreate, related, operation, payload)
      }

      const last = related[related.length - 1]
      if (last && neverSent(last)) {
        if (operation === 'update' && last.operation === 'update' && payload) {
          return this.write(this.withPayload(last, payload))
        }
        if ((operation === 'complete' || operation === 'uncomplete') &&
            (last.operation === 'complete' || last.operation === 'uncomplete')) {
          const encoded = payload === null ? null : JSON.stringify(payload)
          return this.write({ ...last, operation, payload: encoded, size_bytes: payloadSizeBytes(encoded) })
        }
      }

      if (operation === 'delete') {
        const moot = related.filter(item => neverSent(item) && item.operation !== 'create')
        await this.db.deleteMany(QUEUE_STORE, moot.map(item => item.id))
      }

      return this.append(operation, entityType, entityId, payload)
    })
  }

  private async foldIntoCreate(
    create: QueueItem,
    related: QueueItem[],
    operation: QueueOperation,
    payload: Payload | null
  ): Promise<QueueItem | null> {
    switch (operation) {
      case 'create':
        throw new ValidationError(`${create.entity_type} ${create.entity_id} is already queued for create`, 'entity_id')
      case 'delete':
        await this.db.deleteMany(QUEUE_STORE, related.map(item => item.id))
        return null
      case 'update':
        return this.write(this.withPayload(create, { ...decodePayload(create.payload), ...payload }))
      case 'complete':
      case 'uncomplete':
        return this.write(this.withPayload(create, {
          ...decodePayload(create.payload),
          ...payload,
          completed: operation === 'complete',
        }))
    }
  }

  private async append(
    operation: QueueOperation,
    entityType: EntityType,
    entityId: number | null,
    payload: Payload | null
  ): Promise<QueueItem> {
    const encoded = payload === null ? null : JSON.stringify(payload)
    const base = {
      entity_type: entityType,
      entity_id: entityId,
      client_op_id: uuidv4(),
      timestamp: this.clock.now(),
      retry_count: 0,
      last_retry: null,
      last_failure: null,
      last_error: null,
      status: 'pending' as const,
      size_bytes: payloadSizeBytes(encoded),
      synced_at: null,
    }

    let item: NewQueueItem
    if (operation === 'create' || operation === 'update') {
      if (encoded === null) throw new ValidationError(`${operation} requires a payload`, 'payload')
      item = { ...base, operation, payload: encoded }
    } else {
      item = { ...base, operation, payload: encoded }
    }

    const key = await this.db.put(QUEUE_STORE, item)
    if (typeof key !== 'number') {
      throw new StorageError('Queue store returned a non-numeric key', QUEUE_STORE)
    }
    return { ...item, id: key }
  }

  /**
   * A remote rejection repeated past the retry budget is permanent
   */
  isDead(item: QueueItem): boolean {
    return (
      (item.last_failure === 'remote_rejected' || item.last_failure === 'validation') &&
      item.retry_count >= this.options.maxRejectedRetries
    )
  }

  private backoffElapsed(item: QueueItem, now: number): boolean {
    if (item.retry_count === 0 || item.last_retry === null) return true
    const delay = getRetryDelay(item.retry_count, this.options.baseRetryDelayMs, this.options.maxRetryDelayMs)
    return now - item.last_retry >= delay
  }

  /**
   * Items ready to send, in push order. An item that is dead or still
   * backing off holds back every later item of its entity.
   */
  async drainPending(limit: number, options: DrainOptions = {}): Promise<QueueItem[]> {
    const now = this.clock.now()
    const blocked = new Set<string>()
    const eligible: QueueItem[] = []

    for (const item of await this.outstanding()) {
      const key = itemKey(item)
      if (blocked.has(key)) continue
      if (this.isDead(item) || !this.backoffElapsed(item, now)) {
        blocked.add(key)
        continue
      }
      eligible.push(item)
    }

    const sorted = options.prioritizeLargest
      ? [...eligible].sort((a, b) => b.size_bytes - a.size_bytes || a.id - b.id)
      : [...eligible].sort((a, b) => {
        const priority = Number(!isLightOperation(a.operation)) - Number(!isLightOperation(b.operation))
        return priority || a.timestamp - b.timestamp || a.id - b.id
      })

    return preserveEntityOrder(sorted).slice(0, Math.max(0, limit))
  }

  /**
   * Claim an item for sending. Later edits to the entity are appended behind
   * it instead of being folded in. Returns null when the item is gone or
   * already synced.
   */
  async markSending(id: number): Promise<QueueItem | null> {
    return this.lock.runExclusive(async () => {
      const item = await this.get(id)
      if (!item || item.status === 'synced') return null
      return this.write({ ...item, status: 'sending' })
    })
  }

  /**
   * Record the outcome of sending an item. Repeating a success is a no-op,
   * and a failure reported after a success is ignored. Returns null when the
   * item no longer exists.
   */
  async markResult(id: number, outcome: MarkOutcome): Promise<QueueItem | null> {
    return this.lock.runExclusive(async () => {
      const item = await this.get(id)
      if (!item) {
        console.warn(`[MutationQueue] Result for missing item ${id} ignored`)
        return null
      }
      if (item.status === 'synced') return item

      const now = this.clock.now()
      if (outcome.success) {
        return this.write({ ...item, status: 'synced', synced_at: now })
      }

      return this.write({
        ...item,
        status: 'failed',
        retry_count: item.retry_count + 1,
        last_retry: now,
        last_failure: outcome.failure.category,
        last_error: outcome.failure.message,
      })
    })
  }

  async pendingSizeBytes(): Promise<number> {
    return (await this.outstanding()).reduce((sum, item) => sum + item.size_bytes, 0)
  }

  async largestPending(limit: number): Promise<QueueItem[]> {
    return (await this.outstanding())
      .sort((a, b) => b.size_bytes - a.size_bytes || a.id - b.id)
      .slice(0, limit)
  }

  /**
   * Drop payloads of light operations, largest first, until the outstanding
   * size fits the ceiling. Operations themselves are never dropped.
   */
  async enforceSizeCeiling(ceilingBytes: number): Promise<CeilingReport> {
    return this.lock.runExclusive(async () => {
      const items = await this.outstanding()
      let size = items.reduce((sum, item) => sum + item.size_bytes, 0)
      let compacted = 0

      const candidates = items
        .filter(isLightItem)
        .filter(item => item.payload !== null)
        .sort((a, b) => b.size_bytes - a.size_bytes || a.id - b.id)

      for (const item of candidates) {
        if (size <= ceilingBytes) break
        const slimmed: LightQueueItem = { ...item, payload: null, size_bytes: payloadSizeBytes(null) }
        await this.write(slimmed)
        size -= item.size_bytes - slimmed.size_bytes
        compacted++
      }

      if (size > ceilingBytes) {
        console.warn(`[MutationQueue] Outstanding queue is ${size} bytes, above ceiling ${ceilingBytes}`)
      }

      return { compacted, size_bytes: size, over_ceiling: size > ceilingBytes }
    })
  }

  /**
   * Point outstanding items of a pending-local entity at its remote id
   */
  async remapEntityId(type: EntityType, fromId: number, toId: number): Promise<number> {
    return this.lock.runExclusive(async () => {
      const items = (await this.outstanding()).filter(
        item => item.entity_type === type && item.entity_id === fromId
      )
      const remapped = items.map(item => {
        const moved: QueueItem = { ...item, entity_id: toId }
        if (item.payload === null) return moved
        const payload = decodePayload(item.payload)
        return payload.id === fromId ? this.withPayload(moved, { ...payload, id: toId }) : moved
      })
      await this.db.putAll(QUEUE_STORE, remapped)
      return remapped.length
    })
  }

  /**
   * Keys (`type:id`) of entities that still have unsent mutations,
   * optionally only those of one operation
   */
  async outstandingEntityKeys(operation?: QueueOperation): Promise<Set<string>> {
    const keys = new Set<string>()
    for (const item of await this.outstanding()) {
      if (item.entity_id === null) continue
      if (operation && item.operation !== operation) continue
      keys.add(entityKey(item.entity_type, item.entity_id))
    }
    return keys
  }

  async persistentFailures(): Promise<QueueItem[]> {
    return (await this.outstanding()).filter(item => this.isDead(item))
  }

  /**
   * Remove synced items older than the retention window
   */
  async gcSynced(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const cutoff = this.clock.now() - this.options.syncedRetentionMs
      const expired = (await this.list()).filter(
        item => item.status === 'synced' && item.synced_at !== null && item.synced_at <= cutoff
      )
      await this.db.deleteMany(QUEUE_STORE, expired.map(item => item.id))
      return expired.length
    })
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(() => this.db.clear(QUEUE_STORE))
  }
}
