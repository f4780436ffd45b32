import { CreateGroupDTO, Group, UpdateGroupDTO, UpdateUserDTO, User } from '../types'
import { Clock } from './clock'
import { NotFoundError } from './errors'
import { CacheStore } from './storage/cacheStore'
import { WriteLock } from './storage/writeLock'
import { MutationQueue, toSnapshotPayload } from './sync/mutationQueue'
import { validateGroup, validateRecord, validateUser } from './validation'

export interface ReferenceDataDependencies {
  cache: CacheStore
  queue: MutationQueue
  clock: Clock
  onLocalChange?: () => void
}

/**
 * Local edits to users and groups. Users are only created remotely; groups
 * can be created, renamed and removed offline.
 */
export class ReferenceDataService {
  private readonly edits = new WriteLock()

  constructor(private readonly deps: ReferenceDataDependencies) {}

  private changed(): void {
    this.deps.onLocalChange?.()
  }

  async getUsers(): Promise<User[]> {
    return this.deps.cache.listByType('user')
  }

  async getGroups(): Promise<Group[]> {
    return this.deps.cache.listByType('group')
  }

  async updateUser(id: number, updates: UpdateUserDTO): Promise<User> {
    const user = await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const existing = await cache.get('user', id)
      if (!existing) throw new NotFoundError('User', String(id))

      const updated: User = {
        ...existing,
        name: updates.name === undefined ? existing.name : updates.name.trim(),
        email: updates.email === undefined ? existing.email : updates.email,
        role: updates.role === undefined ? existing.role : updates.role,
        status: updates.status === undefined ? existing.status : updates.status,
        updated_at: clock.now(),
      }
      validateUser(updated)
      validateRecord('user', updated)

      await queue.enqueue('update', 'user', id, toSnapshotPayload(updated))
      await cache.upsert('user', [updated])
      return updated
    })

    this.changed()
    return user
  }

  async createGroup(data: CreateGroupDTO): Promise<Group> {
    validateGroup(data)

    const group = await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const now = clock.now()
      const created: Group = {
        id: await cache.nextLocalId(),
        name: data.name.trim(),
        description: data.description ?? null,
        created_by: data.created_by ?? null,
        user_ids: [...new Set(data.user_ids ?? [])],
        updated_at: now,
        last_accessed: now,
      }
      validateRecord('group', created)

      await queue.enqueue('create', 'group', created.id, toSnapshotPayload(created))
      await cache.upsert('group', [created])
      return created
    })

    this.changed()
    return group
  }

  async updateGroup(id: number, updates: UpdateGroupDTO): Promise<Group> {
    const group = await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const existing = await cache.get('group', id)
      if (!existing) throw new NotFoundError('Group', String(id))

      const updated: Group = {
        ...existing,
        name: updates.name === undefined ? existing.name : updates.name.trim(),
        description: updates.description === undefined ? existing.description : updates.description,
        user_ids: updates.user_ids ? [...new Set(updates.user_ids)] : existing.user_ids,
        updated_at: clock.now(),
      }
      validateGroup(updated)
      validateRecord('group', updated)

      await queue.enqueue('update', 'group', id, toSnapshotPayload(updated))
      await cache.upsert('group', [updated])
      return updated
    })

    this.changed()
    return group
  }

  /**
   * Groups have no disabled state, so the cached record goes right away
   */
  async deleteGroup(id: number): Promise<void> {
    await this.edits.runExclusive(async () => {
      const { cache, queue } = this.deps
      const existing = await cache.get('group', id)
      if (!existing) throw new NotFoundError('Group', String(id))

      await queue.enqueue('delete', 'group', id, null)
      await cache.delete('group', id)
    })

    this.changed()
  }
}
