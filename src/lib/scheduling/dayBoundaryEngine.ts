import { Task } from '../../types'
import { Clock } from '../clock'
import { CacheStore } from '../storage/cacheStore'
import { IndexedDBService } from '../storage/indexedDB'
import { WriteLock } from '../storage/writeLock'
import { calculateNextReminderTime, formatLocalDateTime, hasValidRecurrence, isNewDay } from './dayBoundary'

export const LAST_DAY_BOUNDARY_KEY = 'last_day_boundary_at'
export const LAST_DAY_START_HOUR_KEY = 'last_day_start_hour'

export interface RecomputeReport {
  advanced: number
  disabled: number
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/**
 * Rolls cached tasks over to a new logical day.
 *
 * Completed recurring and interval tasks move to their next reminder and
 * become open again; completed one-time tasks are disabled. Repeating tasks
 * missing their recurrence fields are left as they are. `updated_at` is
 * left alone so the next pull can still replace the local result.
 */
export class DayBoundaryEngine {
  private readonly runs = new WriteLock()

  constructor(
    private readonly cache: CacheStore,
    private readonly db: IndexedDBService,
    private readonly clock: Clock
  ) {}

  /**
   * Recompute when the logical day changed since the last recorded run.
   * Returns whether a recompute happened.
   */
  async runIfNewDay(dayStartHour: number): Promise<boolean> {
    return this.runs.runExclusive(async () => {
      const now = this.clock.now()
      const lastRun = asNumber(await this.db.getSetting(LAST_DAY_BOUNDARY_KEY))
      const lastHour = asNumber(await this.db.getSetting(LAST_DAY_START_HOUR_KEY))

      if (!isNewDay(lastRun, now, lastHour, dayStartHour)) return false

      const report = await this.recompute(dayStartHour, now)
      await this.db.storeSetting(LAST_DAY_BOUNDARY_KEY, now)
      await this.db.storeSetting(LAST_DAY_START_HOUR_KEY, dayStartHour)

      console.log(
        `[DayBoundaryEngine] New day at ${formatLocalDateTime(now)}: ` +
        `${report.advanced} advanced, ${report.disabled} disabled`
      )
      return true
    })
  }

  private async recompute(dayStartHour: number, now: number): Promise<RecomputeReport> {
    const tasks = await this.cache.listByType('task')
    const changed: Task[] = []
    let advanced = 0
    let disabled = 0

    for (const task of tasks) {
      if (!task.completed) continue

      if (task.task_type === 'one_time') {
        if (task.enabled) {
          changed.push({ ...task, enabled: false })
          disabled++
        }
        continue
      }

      if (!hasValidRecurrence(task)) {
        console.warn(`[DayBoundaryEngine] Task ${task.id} has no usable recurrence, leaving it completed`)
        continue
      }

      changed.push({
        ...task,
        completed: false,
        reminder_time: calculateNextReminderTime(task, now, dayStartHour),
      })
      advanced++
    }

    await this.cache.upsert('task', changed)
    return { advanced, disabled }
  }
}
