import { CreateTaskDTO, Task, TaskFilter, UpdateTaskDTO } from '../types'
import { Clock } from './clock'
import { SettingsSource } from './config'
import { TaskNotFoundError } from './errors'
import { filterTodayTasks, parseLocalDateTime } from './scheduling/dayBoundary'
import { CacheStore } from './storage/cacheStore'
import { WriteLock } from './storage/writeLock'
import { MutationQueue, toSnapshotPayload } from './sync/mutationQueue'
import { validateRecord, validateTask } from './validation'

export interface TaskServiceDependencies {
  cache: CacheStore
  queue: MutationQueue
  clock: Clock
  settings: SettingsSource
  /** Called after every accepted edit, e.g. to schedule a push */
  onLocalChange?: () => void
}

function choose<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next
}

function matchesFilter(task: Task, filter: TaskFilter): boolean {
  if (filter.group_id !== undefined && task.group_id !== filter.group_id) return false
  if (filter.assigned_user_id !== undefined && !task.assigned_user_ids.includes(filter.assigned_user_id)) return false
  if (filter.completed !== undefined && task.completed !== filter.completed) return false
  if (filter.enabled !== undefined && task.enabled !== filter.enabled) return false

  const reminder = parseLocalDateTime(task.reminder_time)
  if (filter.reminder_from !== undefined) {
    const from = parseLocalDateTime(filter.reminder_from)
    if (reminder === null || (from !== null && reminder < from)) return false
  }
  if (filter.reminder_to !== undefined) {
    const to = parseLocalDateTime(filter.reminder_to)
    if (reminder === null || (to !== null && reminder > to)) return false
  }
  return true
}

/**
 * Offline-first task edits. Every edit is validated, queued, and only then
 * written to the cache; nothing here waits on the network.
 */
export class TaskService {
  private readonly edits = new WriteLock()

  constructor(private readonly deps: TaskServiceDependencies) {}

  private changed(): void {
    this.deps.onLocalChange?.()
  }

  private async requireTask(id: number): Promise<Task> {
    const task = await this.deps.cache.get('task', id)
    if (!task) throw new TaskNotFoundError(id)
    return task
  }

  /**
   * Create a task under a pending local id
   * @throws {ValidationError} When task data is invalid
   */
  async createTask(taskData: CreateTaskDTO): Promise<Task> {
    validateTask(taskData)

    const task = await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const now = clock.now()
      const created: Task = {
        id: await cache.nextLocalId(),
        title: taskData.title.trim(),
        description: taskData.description ?? null,
        task_type: taskData.task_type,
        recurrence_type: taskData.recurrence_type ?? null,
        recurrence_interval: taskData.recurrence_interval ?? null,
        interval_days: taskData.interval_days ?? null,
        reminder_time: taskData.reminder_time,
        group_id: taskData.group_id ?? null,
        enabled: taskData.enabled ?? true,
        completed: false,
        assigned_user_ids: [...new Set(taskData.assigned_user_ids ?? [])],
        created_at: now,
        updated_at: now,
        last_accessed: now,
        last_shown_at: null,
      }
      validateRecord('task', created)

      await queue.enqueue('create', 'task', created.id, toSnapshotPayload(created))
      await cache.upsert('task', [created])
      return created
    })

    this.changed()
    return task
  }

  /**
   * @throws {TaskNotFoundError} When the task is not cached
   * @throws {ValidationError} When the result is invalid or a delete is pending
   */
  async updateTask(id: number, updates: UpdateTaskDTO): Promise<Task> {
    const task = await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const existing = await this.requireTask(id)

      const updated: Task = {
        ...existing,
        title: choose(updates.title, existing.title),
        description: choose(updates.description, existing.description),
        task_type: choose(updates.task_type, existing.task_type),
        recurrence_type: choose(updates.recurrence_type, existing.recurrence_type),
        recurrence_interval: choose(updates.recurrence_interval, existing.recurrence_interval),
        interval_days: choose(updates.interval_days, existing.interval_days),
        reminder_time: choose(updates.reminder_time, existing.reminder_time),
        group_id: choose(updates.group_id, existing.group_id),
        assigned_user_ids: updates.assigned_user_ids ? [...new Set(updates.assigned_user_ids)] : existing.assigned_user_ids,
        enabled: choose(updates.enabled, existing.enabled),
        updated_at: clock.now(),
      }
      validateTask(updated)
      validateRecord('task', updated)

      await queue.enqueue('update', 'task', id, toSnapshotPayload(updated))
      await cache.upsert('task', [updated])
      return updated
    })

    this.changed()
    return task
  }

  async completeTask(id: number): Promise<Task> {
    return this.setCompleted(id, true)
  }

  async uncompleteTask(id: number): Promise<Task> {
    return this.setCompleted(id, false)
  }

  private async setCompleted(id: number, completed: boolean): Promise<Task> {
    let accepted = false
    const task = await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const existing = await this.requireTask(id)
      if (existing.completed === completed) return existing

      const updated: Task = { ...existing, completed, updated_at: clock.now() }
      await queue.enqueue(completed ? 'complete' : 'uncomplete', 'task', id, {
        completed,
        updated_at: updated.updated_at,
      })
      await cache.upsert('task', [updated])
      accepted = true
      return updated
    })

    if (accepted) this.changed()
    return task
  }

  /**
   * Disable a task until the remote confirms the delete. A task that was
   * never sent is dropped outright.
   */
  async deleteTask(id: number): Promise<void> {
    await this.edits.runExclusive(async () => {
      const { cache, clock, queue } = this.deps
      const existing = await this.requireTask(id)

      const queued = await queue.enqueue('delete', 'task', id, null)
      if (queued === null) {
        await cache.delete('task', id)
        return
      }
      await cache.upsert('task', [{ ...existing, enabled: false, updated_at: clock.now() }])
    })

    this.changed()
  }

  /**
   * Read one task and record the access for eviction ordering
   */
  async getTask(id: number): Promise<Task> {
    const task = await this.requireTask(id)
    await this.deps.cache.touchLastAccessed('task', id)
    return task
  }

  async getTasks(filter: TaskFilter = {}): Promise<Task[]> {
    const tasks = await this.deps.cache.listByType('task')
    return tasks.filter(task => matchesFilter(task, filter))
  }

  /**
   * Tasks for today's view, optionally narrowed to one user
   */
  async getTodayTasks(selectedUserId?: number | null): Promise<Task[]> {
    const { dayStartHour } = await this.deps.settings.getSettings()
    const tasks = await this.deps.cache.listByType('task')
    return filterTodayTasks(tasks, this.deps.clock.now(), dayStartHour, selectedUserId)
  }
}
