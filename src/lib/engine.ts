import {
  CreateGroupDTO,
  CreateTaskDTO,
  Entity,
  Group,
  Task,
  TaskFilter,
  UpdateGroupDTO,
  UpdateTaskDTO,
  UpdateUserDTO,
  User,
} from '../types'
import { QueueItem, Result, SyncStateListener, SyncSummary } from '../types/sync'
import { Clock, systemClock } from './clock'
import { EngineConfig, SettingsSource, StaticSettingsSource, loadConfig } from './config'
import { ValidationError, toErrorResponse } from './errors'
import { ReferenceDataService } from './referenceDataService'
import { RetentionPolicy } from './retention'
import { DayBoundaryEngine } from './scheduling/dayBoundaryEngine'
import {
  AlarmClock,
  DayBoundaryChannel,
  DayBoundaryScheduler,
  DayBoundaryWorker,
  TimerAlarmClock,
} from './scheduling/dayBoundaryScheduler'
import { CacheStore } from './storage/cacheStore'
import { IndexedDBService } from './storage/indexedDB'
import { WriteLock } from './storage/writeLock'
import { MutationQueue } from './sync/mutationQueue'
import { HttpRemoteService, RemoteService } from './sync/remote'
import { SyncService } from './sync/syncService'
import { TaskService } from './taskService'

export interface ReminderSyncEngineOptions {
  /** Defaults to `loadConfig()` over process.env */
  config?: EngineConfig
  factory?: IDBFactory
  dbName?: string
  /** Defaults to the HTTP adapter on `config.apiUrl` */
  remote?: RemoteService
  clock?: Clock
  /** Defaults to the settings in `config` */
  settings?: SettingsSource
  alarm?: AlarmClock
}

/**
 * A foreground edit, applied locally and queued for the remote service
 */
export type UserEdit =
  | { kind: 'create_task'; task: CreateTaskDTO }
  | { kind: 'update_task'; id: number; changes: UpdateTaskDTO }
  | { kind: 'complete_task'; id: number }
  | { kind: 'uncomplete_task'; id: number }
  | { kind: 'delete_task'; id: number }
  | { kind: 'update_user'; id: number; changes: UpdateUserDTO }
  | { kind: 'create_group'; group: CreateGroupDTO }
  | { kind: 'update_group'; id: number; changes: UpdateGroupDTO }
  | { kind: 'delete_group'; id: number }

export type CacheQuery =
  | { type: 'task'; filter?: TaskFilter }
  | { type: 'user' }
  | { type: 'group' }

type Timer = ReturnType<typeof setTimeout>

/**
 * Offline-first reminder engine. Wires the cache, queue, sync and
 * day-boundary components together and drives background sync.
 *
 * Usage:
 * ```ts
 * const engine = await ReminderSyncEngine.create({ config: loadConfig() })
 * await engine.start()
 * await engine.enqueueUserEdit({ kind: 'complete_task', id: 12 })
 * // ... when shutting down:
 * await engine.close()
 * ```
 */
export class ReminderSyncEngine {
  private running = false
  private pollTimeout: Timer | null = null
  private pushTimeout: Timer | null = null
  private cycle: Promise<Result<SyncSummary>> | null = null

  private constructor(
    private readonly config: EngineConfig,
    private readonly db: IndexedDBService,
    private readonly settings: SettingsSource,
    readonly queue: MutationQueue,
    readonly tasks: TaskService,
    readonly referenceData: ReferenceDataService,
    private readonly syncService: SyncService,
    private readonly dayBoundary: DayBoundaryEngine,
    private readonly scheduler: DayBoundaryScheduler,
    private readonly worker: DayBoundaryWorker
  ) {}

  /**
   * Open storage and construct every component
   * @throws {ValidationError} When no remote service or API URL is given
   * @throws {StorageError} When the database cannot be opened
   */
  static async create(options: ReminderSyncEngineOptions = {}): Promise<ReminderSyncEngine> {
    const config = options.config ?? loadConfig()
    const clock = options.clock ?? systemClock
    const settings = options.settings ?? new StaticSettingsSource(config.settings)
    const remote = options.remote ?? ReminderSyncEngine.createRemote(config)

    const db = new IndexedDBService({ factory: options.factory, name: options.dbName })
    await db.initialize()

    const lock = new WriteLock()
    const cache = new CacheStore(db, lock, clock)
    const queue = new MutationQueue(db, lock, clock, {
      maxRejectedRetries: config.maxRejectedRetries,
      baseRetryDelayMs: config.baseRetryDelayMs,
      maxRetryDelayMs: config.maxRetryDelayMs,
      syncedRetentionMs: config.syncedRetentionMs,
    })
    const dayBoundary = new DayBoundaryEngine(cache, db, clock)
    const retention = new RetentionPolicy(cache, queue)
    const syncService = new SyncService(
      { db, cache, queue, remote, dayBoundary, retention, settings, clock },
      { batchSize: config.batchSize }
    )

    const channel = new DayBoundaryChannel()
    const scheduler = new DayBoundaryScheduler(
      options.alarm ?? new TimerAlarmClock(clock),
      clock,
      channel,
      config.settings.dayStartHour
    )
    const worker = new DayBoundaryWorker(channel, dayBoundary)

    // Services are built before the engine exists, so edits reach it late-bound
    let onLocalChange = () => {}
    const notify = () => onLocalChange()
    const tasks = new TaskService({ cache, queue, clock, settings, onLocalChange: notify })
    const referenceData = new ReferenceDataService({ cache, queue, clock, onLocalChange: notify })

    const engine = new ReminderSyncEngine(
      config, db, settings, queue, tasks, referenceData, syncService, dayBoundary, scheduler, worker
    )
    onLocalChange = () => engine.requestPush()
    return engine
  }

  private static createRemote(config: EngineConfig): RemoteService {
    if (!config.apiUrl) {
      throw new ValidationError('A remote service or REMINDER_SYNC_API_URL is required', 'apiUrl')
    }
    return new HttpRemoteService({
      baseUrl: config.apiUrl,
      apiVersion: config.apiVersion,
      timeoutMs: config.requestTimeoutMs,
    })
  }

  /**
   * Start background sync and the day-boundary alarm
   */
  async start(): Promise<void> {
    if (this.running) {
      console.warn('[ReminderSyncEngine] Already running')
      return
    }
    this.running = true

    const { dayStartHour } = await this.settings.getSettings()
    this.scheduler.updateDayStartHour(dayStartHour)
    this.worker.start()
    this.scheduler.start()

    try {
      await this.dayBoundary.runIfNewDay(dayStartHour)
    } catch (error) {
      console.error('[ReminderSyncEngine] Day-boundary check at start failed:', toErrorResponse(error))
    }

    console.log(`[ReminderSyncEngine] Started, syncing every ${this.config.syncIntervalMs}ms`)
    this.schedulePoll(0)
  }

  /**
   * Stop background work. The cycle in flight is cancelled after its
   * current item and awaited.
   */
  async stop(): Promise<void> {
    this.running = false

    if (this.pollTimeout) {
      clearTimeout(this.pollTimeout)
      this.pollTimeout = null
    }
    if (this.pushTimeout) {
      clearTimeout(this.pushTimeout)
      this.pushTimeout = null
    }

    this.scheduler.stop()
    this.worker.stop()
    this.syncService.cancel()

    if (this.cycle) await this.cycle
    await this.worker.idle()
  }

  /**
   * Stop and release the database
   */
  async close(): Promise<void> {
    await this.stop()
    this.db.close()
  }

  isRunning(): boolean {
    return this.running
  }

  private schedulePoll(delayMs: number): void {
    this.pollTimeout = setTimeout(() => {
      this.pollTimeout = null
      void this.poll()
    }, delayMs)
  }

  private async poll(): Promise<void> {
    if (!this.running) return

    try {
      const { dayStartHour } = await this.settings.getSettings()
      this.scheduler.updateDayStartHour(dayStartHour)
      if (!this.running) return
      await this.runCycle()
    } catch (error) {
      console.error('[ReminderSyncEngine] Poll failed:', toErrorResponse(error))
    }

    if (this.running) {
      this.schedulePoll(this.config.syncIntervalMs)
    }
  }

  /**
   * Push soon after a local edit, coalescing bursts of edits
   */
  private requestPush(): void {
    if (!this.running) return

    if (this.pushTimeout) clearTimeout(this.pushTimeout)
    this.pushTimeout = setTimeout(() => {
      this.pushTimeout = null
      this.runCycle().catch(error => {
        console.error('[ReminderSyncEngine] Push after edit failed:', toErrorResponse(error))
      })
    }, this.config.pushDebounceMs)
  }

  private runCycle(): Promise<Result<SyncSummary>> {
    const cycle = this.syncService.sync()
    this.cycle = cycle
    return cycle.finally(() => {
      if (this.cycle === cycle) this.cycle = null
    })
  }

  /**
   * Run a push/pull cycle now, or join the one already running
   */
  triggerSyncNow(): Promise<Result<SyncSummary>> {
    return this.runCycle()
  }

  /**
   * The listener receives the current state immediately, then every change.
   * Returns an unsubscribe function.
   */
  observeSyncState(listener: SyncStateListener): () => void {
    return this.syncService.subscribe(listener)
  }

  getCachedEntities(query: { type: 'task'; filter?: TaskFilter }): Promise<Task[]>
  getCachedEntities(query: { type: 'user' }): Promise<User[]>
  getCachedEntities(query: { type: 'group' }): Promise<Group[]>
  async getCachedEntities(query: CacheQuery): Promise<Entity[]> {
    switch (query.type) {
      case 'task':
        return this.tasks.getTasks(query.filter)
      case 'user':
        return this.referenceData.getUsers()
      case 'group':
        return this.referenceData.getGroups()
    }
  }

  getTodayTasks(selectedUserId?: number | null): Promise<Task[]> {
    return this.tasks.getTodayTasks(selectedUserId)
  }

  /**
   * Apply an edit locally and queue it. Resolves with the edited entity,
   * or null for deletes.
   * @throws {ValidationError} When the edit is invalid
   * @throws {NotFoundError} When the entity is not cached
   */
  async enqueueUserEdit(edit: UserEdit): Promise<Entity | null> {
    switch (edit.kind) {
      case 'create_task':
        return this.tasks.createTask(edit.task)
      case 'update_task':
        return this.tasks.updateTask(edit.id, edit.changes)
      case 'complete_task':
        return this.tasks.completeTask(edit.id)
      case 'uncomplete_task':
        return this.tasks.uncompleteTask(edit.id)
      case 'delete_task':
        await this.tasks.deleteTask(edit.id)
        return null
      case 'update_user':
        return this.referenceData.updateUser(edit.id, edit.changes)
      case 'create_group':
        return this.referenceData.createGroup(edit.group)
      case 'update_group':
        return this.referenceData.updateGroup(edit.id, edit.changes)
      case 'delete_group':
        await this.referenceData.deleteGroup(edit.id)
        return null
    }
  }

  /**
   * Queue items the remote keeps rejecting. They no longer drain.
   */
  persistentFailures(): Promise<QueueItem[]> {
    return this.queue.persistentFailures()
  }

  nextDayBoundaryAt(): number | null {
    return this.scheduler.nextFireAt()
  }
}
