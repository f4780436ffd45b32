export * from './types'
export * from './types/sync'

export { ReminderSyncEngine } from './lib/engine'
export type { CacheQuery, ReminderSyncEngineOptions, UserEdit } from './lib/engine'
export { loadConfig, parseSettings, StaticSettingsSource } from './lib/config'
export type { EngineConfig, EngineSettings, SettingsSource } from './lib/config'
export { systemClock } from './lib/clock'
export type { Clock } from './lib/clock'
export {
  AppError,
  NetworkError,
  NotFoundError,
  RemoteRejectedError,
  StorageError,
  SyncError,
  TaskNotFoundError,
  TimeoutError,
  ValidationError,
  isAppError,
  toSyncFailure,
} from './lib/errors'

export { TaskService } from './lib/taskService'
export { ReferenceDataService } from './lib/referenceDataService'
export { CacheStore, estimateEntityBytes } from './lib/storage/cacheStore'
export { IndexedDBService, DB_NAME } from './lib/storage/indexedDB'
export { WriteLock } from './lib/storage/writeLock'
export { MutationQueue, getRetryDelay, payloadSizeBytes } from './lib/sync/mutationQueue'
export { SyncService } from './lib/sync/syncService'
export { HttpRemoteService } from './lib/sync/remote'
export type { RemoteService, HttpRemoteOptions } from './lib/sync/remote'
export { snapshotHash } from './lib/sync/hash'
export { RetentionPolicy, selectEvictionCandidates } from './lib/retention'
export type { RetentionReport } from './lib/retention'

export {
  calculateNextReminderTime,
  filterTodayTasks,
  formatLocalDateTime,
  getDayStart,
  getLogicalDate,
  getNextDayStart,
  hasValidRecurrence,
  isInTodayView,
  isNewDay,
  parseLocalDateTime,
} from './lib/scheduling/dayBoundary'
export { DayBoundaryEngine } from './lib/scheduling/dayBoundaryEngine'
export {
  DayBoundaryChannel,
  DayBoundaryScheduler,
  DayBoundaryWorker,
  TimerAlarmClock,
} from './lib/scheduling/dayBoundaryScheduler'
export type { AlarmClock, AlarmHandle, DayBoundaryEvent } from './lib/scheduling/dayBoundaryScheduler'
