import { Clock } from '../clock'
import { toErrorResponse } from '../errors'
import { formatLocalDateTime, getLogicalDate, getNextDayStart } from './dayBoundary'
import { DayBoundaryEngine } from './dayBoundaryEngine'

const FIRE_OFFSET_MS = 60_000

export interface AlarmHandle {
  cancel(): void
}

/**
 * Wakes the process at a wall-clock time
 */
export interface AlarmClock {
  schedule(at: number, fire: () => void): AlarmHandle
}

/**
 * AlarmClock on top of setTimeout, measured against the engine clock
 */
export class TimerAlarmClock implements AlarmClock {
  constructor(private readonly clock: Clock) {}

  schedule(at: number, fire: () => void): AlarmHandle {
    const timer = setTimeout(fire, Math.max(0, at - this.clock.now()))
    return { cancel: () => clearTimeout(timer) }
  }
}

export interface DayBoundaryEvent {
  logical_date: string
  day_start_hour: number
  fired_at: number
}

type DayBoundaryListener = (event: DayBoundaryEvent) => void

export class DayBoundaryChannel {
  private listeners: Set<DayBoundaryListener> = new Set()

  subscribe(listener: DayBoundaryListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  post(event: DayBoundaryEvent): void {
    this.listeners.forEach(listener => listener(event))
  }
}

/**
 * Arms an alarm one minute past the next logical-day start. Each firing
 * re-arms first and then posts at most one event per logical day.
 */
export class DayBoundaryScheduler {
  private handle: AlarmHandle | null = null
  private lastPostedDate: number | null = null
  private running = false

  constructor(
    private readonly alarm: AlarmClock,
    private readonly clock: Clock,
    private readonly channel: DayBoundaryChannel,
    private dayStartHour: number
  ) {}

  start(): void {
    if (this.running) return
    this.running = true
    this.arm()
  }

  stop(): void {
    this.running = false
    this.handle?.cancel()
    this.handle = null
  }

  isRunning(): boolean {
    return this.running
  }

  /**
   * Move the alarm when the user changes the day start hour
   */
  updateDayStartHour(dayStartHour: number): void {
    if (dayStartHour === this.dayStartHour) return
    this.dayStartHour = dayStartHour
    if (this.running) {
      this.handle?.cancel()
      this.arm()
    }
  }

  /**
   * When the alarm is next due, or null while stopped
   */
  nextFireAt(): number | null {
    return this.running ? getNextDayStart(this.clock.now(), this.dayStartHour) + FIRE_OFFSET_MS : null
  }

  private arm(): void {
    const at = getNextDayStart(this.clock.now(), this.dayStartHour) + FIRE_OFFSET_MS
    this.handle = this.alarm.schedule(at, () => this.fire())
  }

  private fire(): void {
    if (!this.running) return
    this.arm()

    const now = this.clock.now()
    const logicalDate = getLogicalDate(now, this.dayStartHour)
    if (logicalDate === this.lastPostedDate) return
    this.lastPostedDate = logicalDate

    this.channel.post({
      logical_date: formatLocalDateTime(logicalDate).slice(0, 10),
      day_start_hour: this.dayStartHour,
      fired_at: now,
    })
  }
}

/**
 * Consumes day-boundary events one at a time. A failed recompute is logged
 * and the next event is still handled.
 */
export class DayBoundaryWorker {
  private unsubscribe: (() => void) | null = null
  private tail: Promise<void> = Promise.resolve()

  constructor(
    private readonly channel: DayBoundaryChannel,
    private readonly engine: DayBoundaryEngine
  ) {}

  start(): void {
    if (this.unsubscribe) return
    this.unsubscribe = this.channel.subscribe(event => {
      this.tail = this.tail.then(() => this.handle(event))
    })
  }

  stop(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
  }

  /**
   * Resolves once every event received so far has been handled
   */
  idle(): Promise<void> {
    return this.tail
  }

  private async handle(event: DayBoundaryEvent): Promise<void> {
    try {
      await this.engine.runIfNewDay(event.day_start_hour)
    } catch (error) {
      console.error(`[DayBoundaryWorker] Recompute for ${event.logical_date} failed:`, toErrorResponse(error))
    }
  }
}
