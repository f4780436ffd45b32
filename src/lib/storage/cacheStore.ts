import { Entity, EntityMap, EntityType, IncomingEntity } from '../../types'
import { Clock } from '../clock'
import { StorageError } from '../errors'
import { parseLocalDateTime } from '../scheduling/dayBoundary'
import { recordSchemas } from '../validation'
import { IndexedDBService, StoreName } from './indexedDB'
import { WriteLock } from './writeLock'

export const ENTITY_STORES: Record<EntityType, StoreName> = {
  task: 'tasks',
  user: 'users',
  group: 'groups',
}

const RECORD_OVERHEAD_BYTES = 64
const NEXT_LOCAL_ID_KEY = 'next_local_id'

/**
 * Approximate footprint of a cached record: UTF-16 string storage plus a
 * fixed per-record overhead.
 */
export function estimateEntityBytes(entity: Entity): number {
  return RECORD_OVERHEAD_BYTES + 2 * JSON.stringify(entity).length
}

/**
 * Durable cache of tasks, users and groups.
 *
 * Upserts are last-write-wins by `updated_at`: a record strictly older than
 * the stored one is ignored. Writes share the engine's write lock.
 */
export class CacheStore {
  constructor(
    private readonly db: IndexedDBService,
    private readonly lock: WriteLock,
    private readonly clock: Clock
  ) {}

  private decode<K extends EntityType>(type: K, raw: unknown): EntityMap[K] {
    const parsed = recordSchemas[type].safeParse(raw)
    if (!parsed.success) {
      throw new StorageError(`Corrupt ${type} record`, ENTITY_STORES[type], {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      })
    }
    return parsed.data
  }

  private async read<K extends EntityType>(type: K, id: number): Promise<EntityMap[K] | null> {
    const raw = await this.db.get(ENTITY_STORES[type], id)
    return raw === undefined ? null : this.decode(type, raw)
  }

  /**
   * Insert or replace entities. Returns how many were written.
   */
  async upsert<K extends EntityType>(type: K, entities: IncomingEntity<K>[]): Promise<number> {
    if (entities.length === 0) return 0

    return this.lock.runExclusive(async () => {
      const now = this.clock.now()
      const records: EntityMap[K][] = []

      for (const entity of entities) {
        const existing = await this.read(type, entity.id)
        if (existing && existing.updated_at > entity.updated_at) continue

        records.push(this.decode(type, {
          ...entity,
          last_accessed: entity.last_accessed ?? existing?.last_accessed ?? now,
        }))
      }

      await this.db.putAll(ENTITY_STORES[type], records)
      return records.length
    })
  }

  async get<K extends EntityType>(type: K, id: number): Promise<EntityMap[K] | null> {
    return this.read(type, id)
  }

  async delete(type: EntityType, id: number): Promise<void> {
    await this.lock.runExclusive(() => this.db.delete(ENTITY_STORES[type], id))
  }

  async deleteMany(type: EntityType, ids: number[]): Promise<void> {
    await this.lock.runExclusive(() => this.db.deleteMany(ENTITY_STORES[type], ids))
  }

  /**
   * All cached entities of a type, ordered by id
   */
  async listByType<K extends EntityType>(type: K): Promise<EntityMap[K][]> {
    const rows = await this.db.getAll(ENTITY_STORES[type])
    return rows.map(row => this.decode(type, row)).sort((a, b) => a.id - b.id)
  }

  /**
   * Tasks whose reminder falls within [from, to], both local date-times
   */
  async listByDateRange(from: string, to: string): Promise<EntityMap['task'][]> {
    const start = parseLocalDateTime(from)
    const end = parseLocalDateTime(to)
    if (start === null || end === null) {
      throw new StorageError(`Invalid date range ${from}..${to}`, 'tasks')
    }

    const tasks = await this.listByType('task')
    return tasks.filter(task => {
      const reminder = parseLocalDateTime(task.reminder_time)
      return reminder !== null && reminder >= start && reminder <= end
    })
  }

  /**
   * Record a read for LRU eviction. Returns false when the entity is absent.
   */
  async touchLastAccessed(type: EntityType, id: number): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const existing = await this.read(type, id)
      if (!existing) return false
      await this.db.put(ENTITY_STORES[type], { ...existing, last_accessed: this.clock.now() })
      return true
    })
  }

  async sizeEstimateBytes(): Promise<number> {
    let total = 0
    for (const type of ['task', 'user', 'group'] as const) {
      for (const entity of await this.listByType(type)) {
        total += estimateEntityBytes(entity)
      }
    }
    return total
  }

  async count(type?: EntityType): Promise<number> {
    if (type) return this.db.count(ENTITY_STORES[type])

    let total = 0
    for (const store of Object.values(ENTITY_STORES)) {
      total += await this.db.count(store)
    }
    return total
  }

  /**
   * Swap a pending local id for the remote-assigned one in a single
   * transaction, keeping the local access time. The pending record is kept
   * under its new id when there is no remote entity or it is older.
   */
  async replaceId<K extends EntityType>(
    type: K,
    pendingId: number,
    remoteId: number,
    entity: IncomingEntity<K> | null
  ): Promise<void> {
    await this.lock.runExclusive(async () => {
      const pending = await this.read(type, pendingId)
      const source = entity && (!pending || entity.updated_at >= pending.updated_at) ? entity : pending
      if (!source) return

      const record = this.decode(type, {
        ...source,
        id: remoteId,
        last_accessed: pending?.last_accessed ?? source.last_accessed ?? this.clock.now(),
      })
      await this.db.replace(ENTITY_STORES[type], pendingId, [record])
    })
  }

  /**
   * Allocate the next negative id for a locally created entity
   */
  async nextLocalId(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const stored = await this.db.getSetting(NEXT_LOCAL_ID_KEY)
      const id = typeof stored === 'number' && stored < 0 ? stored : -1
      await this.db.storeSetting(NEXT_LOCAL_ID_KEY, id - 1)
      return id
    })
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(async () => {
      for (const store of Object.values(ENTITY_STORES)) {
        await this.db.clear(store)
      }
    })
  }
}
