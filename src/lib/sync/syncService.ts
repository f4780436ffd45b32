import { EntityType, IncomingEntity } from '../../types'
import {
  PullSummary,
  PushSummary,
  QueueItem,
  RemoteAck,
  RemoteOperation,
  RemoteSnapshot,
  Result,
  SyncFailure,
  SyncState,
  SyncStateListener,
  SyncSummary,
} from '../../types/sync'
import { Clock } from '../clock'
import { EngineSettings, SettingsSource } from '../config'
import { toErrorResponse, toSyncFailure } from '../errors'
import { RetentionPolicy } from '../retention'
import { DayBoundaryEngine } from '../scheduling/dayBoundaryEngine'
import { CacheStore } from '../storage/cacheStore'
import { IndexedDBService } from '../storage/indexedDB'
import { snapshotHash } from './hash'
import { MutationQueue, decodePayload, entityKey, itemKey } from './mutationQueue'
import { RemoteService } from './remote'

export const LAST_PULL_HASH_KEY = 'last_pull_hash'

export interface SyncServiceDependencies {
  db: IndexedDBService
  cache: CacheStore
  queue: MutationQueue
  remote: RemoteService
  dayBoundary: DayBoundaryEngine
  retention: RetentionPolicy
  settings: SettingsSource
  clock: Clock
}

export interface SyncServiceOptions {
  batchSize: number
}

function isPendingId(id: number | null): id is number {
  return id !== null && id < 0
}

/**
 * An ack for another operation or entity type counts as a validation
 * failure of the item, so only its entity is held back.
 */
function verifyAck(item: QueueItem, ack: RemoteAck): Result<RemoteAck> {
  if (ack.entity_type === item.entity_type && ack.client_op_id === item.client_op_id) {
    return { ok: true, value: ack }
  }
  return {
    ok: false,
    error: {
      category: 'validation',
      message: `Acknowledgement ${ack.client_op_id} does not match ${item.operation} ${item.entity_type} ${item.client_op_id}`,
    },
  }
}

/**
 * Wire form of a queued mutation. Pending local ids never leave the device.
 */
export function toRemoteOperation(item: QueueItem): RemoteOperation {
  const payload = item.payload === null ? null : decodePayload(item.payload)
  if (payload && isPendingId(item.entity_id)) {
    delete payload.id
  }

  return {
    client_op_id: item.client_op_id,
    operation: item.operation,
    entity_type: item.entity_type,
    entity_id: isPendingId(item.entity_id) ? null : item.entity_id,
    payload,
    timestamp: item.timestamp,
  }
}

/**
 * Runs push-then-pull cycles against the remote service.
 *
 * Every cycle resolves to a Result; nothing is thrown to the caller. Calls
 * made while a cycle is running share that cycle.
 */
export class SyncService {
  private state: SyncState = { status: 'idle', last_synced_at: null }
  private listeners: SyncStateListener[] = []
  private inFlight: Promise<Result<SyncSummary>> | null = null
  private cancelled = false

  constructor(
    private readonly deps: SyncServiceDependencies,
    private readonly options: SyncServiceOptions
  ) {}

  /**
   * Run one push/pull cycle, or join the one already running
   */
  sync(): Promise<Result<SyncSummary>> {
    if (!this.inFlight) {
      this.inFlight = this.runCycle().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  /**
   * Stop the running cycle after the item currently in flight
   */
  cancel(): void {
    if (this.inFlight) this.cancelled = true
  }

  isSyncing(): boolean {
    return this.inFlight !== null
  }

  getState(): SyncState {
    return { ...this.state }
  }

  /**
   * Subscribe to state changes. The listener receives the current state
   * right away.
   */
  subscribe(listener: SyncStateListener): () => void {
    this.listeners.push(listener)
    listener(this.getState())

    return () => {
      this.listeners = this.listeners.filter(l => l !== listener)
    }
  }

  private setState(state: SyncState): void {
    this.state = state
    this.listeners.forEach(listener => listener(this.getState()))
  }

  private fail(failure: SyncFailure): Result<SyncSummary> {
    this.setState({ status: 'error', cause: failure.category, message: failure.message, at: this.deps.clock.now() })
    return { ok: false, error: failure }
  }

  private async runCycle(): Promise<Result<SyncSummary>> {
    const { clock, queue, retention, settings } = this.deps
    this.cancelled = false
    this.setState({ status: 'syncing', started_at: clock.now() })

    try {
      const current = await settings.getSettings()

      const push = await this.push(current)
      let pull: PullSummary | null = null

      if (!this.cancelled) {
        const pulled = await this.pull(current)
        if (!pulled.ok) {
          console.warn('[SyncService] Pull failed:', pulled.error.message)
          return this.fail(pulled.error)
        }
        pull = pulled.value
      }

      const retained = await retention.enforce(current.retentionCeilingBytes)
      const gcRemoved = await queue.gcSynced()

      this.setState({ status: 'idle', last_synced_at: clock.now() })
      return {
        ok: true,
        value: {
          push,
          pull,
          evicted: retained.evicted.length,
          over_budget_bytes: retained.over_budget_bytes,
          gc_removed: gcRemoved,
        },
      }
    } catch (error) {
      console.error('[SyncService] Sync failed:', toErrorResponse(error))
      return this.fail(toSyncFailure(error))
    } finally {
      this.cancelled = false
    }
  }

  /**
   * Send ready queue items in order. A failure holds back the rest of that
   * entity's items until the next cycle.
   */
  async push(settings: EngineSettings): Promise<PushSummary> {
    const { queue, remote } = this.deps

    const ceiling = await queue.enforceSizeCeiling(settings.queueCeilingBytes)
    const batch = await queue.drainPending(this.options.batchSize, { prioritizeLargest: ceiling.over_ceiling })
    const summary: PushSummary = { pushed: 0, failed: 0, blocked: 0, over_ceiling: ceiling.over_ceiling }
    const blocked = new Set<string>()

    for (const drained of batch) {
      if (this.cancelled) break

      const key = itemKey(drained)
      if (blocked.has(key)) {
        summary.blocked++
        continue
      }

      // Earlier items in this batch may have remapped the entity id
      const item = await queue.markSending(drained.id)
      if (!item) continue

      const sent = await remote.applyOperation(toRemoteOperation(item))
      const result = sent.ok ? verifyAck(item, sent.value) : sent
      if (!result.ok) {
        await queue.markResult(item.id, { success: false, failure: result.error })
        blocked.add(key)
        summary.failed++
        console.warn(`[SyncService] ${item.operation} ${item.entity_type} ${item.entity_id} failed:`, result.error.message)
        continue
      }

      await this.applyAck(item, result.value)
      await queue.markResult(item.id, { success: true })
      summary.pushed++
    }

    if (summary.pushed > 0 || summary.failed > 0) {
      console.log(`[SyncService] Pushed ${summary.pushed}, failed ${summary.failed}, blocked ${summary.blocked}`)
    }
    return summary
  }

  private async applyAck(item: QueueItem, ack: RemoteAck): Promise<void> {
    switch (ack.entity_type) {
      case 'task':
        return this.storeAck('task', item, ack.entity_id, ack.entity)
      case 'user':
        return this.storeAck('user', item, ack.entity_id, ack.entity)
      case 'group':
        return this.storeAck('group', item, ack.entity_id, ack.entity)
    }
  }

  private async storeAck<K extends EntityType>(
    type: K,
    item: QueueItem,
    entityId: number,
    entity: IncomingEntity<K> | null
  ): Promise<void> {
    const { cache, queue } = this.deps

    if (item.operation === 'delete') {
      await cache.delete(type, entityId)
      return
    }

    if (isPendingId(item.entity_id)) {
      await cache.replaceId(type, item.entity_id, entityId, entity)
      await queue.remapEntityId(type, item.entity_id, entityId)
      return
    }

    if (entity) {
      await cache.upsert(type, [entity])
    }
  }

  /**
   * Fetch the full remote state and merge it when its hash changed
   */
  async pull(settings: EngineSettings): Promise<Result<PullSummary>> {
    const { cache, db, dayBoundary, queue, remote } = this.deps

    const tasks = await remote.listEntities('task')
    if (!tasks.ok) return tasks
    const users = await remote.listEntities('user')
    if (!users.ok) return users
    const groups = await remote.listEntities('group')
    if (!groups.ok) return groups

    const snapshot: RemoteSnapshot = { task: tasks.value, user: users.value, group: groups.value }
    const pulled = snapshot.task.length + snapshot.user.length + snapshot.group.length
    const hash = snapshotHash(snapshot)

    if ((await db.getSetting(LAST_PULL_HASH_KEY)) === hash) {
      return { ok: true, value: { pulled, merged: false, removed: 0, day_recomputed: false } }
    }

    // Entities deleted locally stay deleted until the remote confirms it
    const deleting = await queue.outstandingEntityKeys('delete')
    const notDeleting = (type: EntityType) => (entity: { id: number }) => !deleting.has(entityKey(type, entity.id))
    await cache.upsert('task', snapshot.task.filter(notDeleting('task')))
    await cache.upsert('user', snapshot.user.filter(notDeleting('user')))
    await cache.upsert('group', snapshot.group.filter(notDeleting('group')))

    const outstanding = await queue.outstandingEntityKeys()
    const isGone = (type: EntityType, id: number, remoteIds: Set<number>) =>
      id > 0 && !remoteIds.has(id) && !outstanding.has(entityKey(type, id))

    const remoteTaskIds = new Set(snapshot.task.map(task => task.id))
    const vanishedTasks = (await cache.listByType('task'))
      .filter(task => task.enabled && isGone('task', task.id, remoteTaskIds))
      .map(task => ({ ...task, enabled: false }))
    await cache.upsert('task', vanishedTasks)

    const remoteUserIds = new Set(snapshot.user.map(user => user.id))
    const vanishedUsers = (await cache.listByType('user')).filter(user => isGone('user', user.id, remoteUserIds))
    await cache.deleteMany('user', vanishedUsers.map(user => user.id))

    const remoteGroupIds = new Set(snapshot.group.map(group => group.id))
    const vanishedGroups = (await cache.listByType('group')).filter(group => isGone('group', group.id, remoteGroupIds))
    await cache.deleteMany('group', vanishedGroups.map(group => group.id))

    await db.storeSetting(LAST_PULL_HASH_KEY, hash)
    const dayRecomputed = await dayBoundary.runIfNewDay(settings.dayStartHour)

    const removed = vanishedTasks.length + vanishedUsers.length + vanishedGroups.length
    console.log(`[SyncService] Merged ${pulled} remote entities, ${removed} gone remotely`)
    return { ok: true, value: { pulled, merged: true, removed, day_recomputed: dayRecomputed } }
  }
}
