import { RecurrenceType, Task } from '../../types'

/**
 * Calendar arithmetic for reminders. All values are local wall-clock epoch
 * milliseconds (see Clock), so the UTC accessors read local fields.
 */

export const HOUR_MS = 60 * 60 * 1000
export const DAY_MS = 24 * HOUR_MS

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?$/

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate()
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0')
}

/**
 * Parse `YYYY-MM-DDTHH:mm[:ss]`. Returns null for anything else, including
 * dates that do not exist.
 */
export function parseLocalDateTime(value: string): number | null {
  const match = LOCAL_DATE_TIME.exec(value)
  if (!match) return null

  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number)
  const second = match[6] === undefined ? 0 : Number(match[6])

  if (month < 1 || month > 12) return null
  if (day < 1 || day > daysInMonth(year, month - 1)) return null
  if (hour > 23 || minute > 59 || second > 59) return null

  return Date.UTC(year, month - 1, day, hour, minute, second)
}

export function formatLocalDateTime(time: number): string {
  const date = new Date(time)
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  )
}

/**
 * Start of the logical day containing `time`: the most recent `dayStartHour`
 * at or before it.
 */
export function getDayStart(time: number, dayStartHour: number): number {
  const date = new Date(time)
  const start = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), dayStartHour)
  return time < start ? start - DAY_MS : start
}

/**
 * Midnight of the calendar date a logical day is named after. Two times share
 * a logical day iff this value is equal.
 */
export function getLogicalDate(time: number, dayStartHour: number): number {
  return getDayStart(time, dayStartHour) - dayStartHour * HOUR_MS
}

/**
 * True when `now` falls in a different logical day than `lastUpdate`, each
 * bucketed with the start hour in effect at the time. A missing previous
 * run counts as a new day.
 */
export function isNewDay(
  lastUpdate: number | null,
  now: number,
  lastDayStartHour: number | null,
  currentDayStartHour: number
): boolean {
  if (lastUpdate === null || lastDayStartHour === null) return true
  return getLogicalDate(lastUpdate, lastDayStartHour) !== getLogicalDate(now, currentDayStartHour)
}

/**
 * Next scheduled start of a logical day strictly after `now`.
 */
export function getNextDayStart(now: number, dayStartHour: number): number {
  return getDayStart(now, dayStartHour) + DAY_MS
}

function addMonths(anchor: number, months: number): number {
  const date = new Date(anchor)
  const total = date.getUTCMonth() + months
  const year = date.getUTCFullYear() + Math.floor(total / 12)
  const month = ((total % 12) + 12) % 12
  const day = Math.min(date.getUTCDate(), daysInMonth(year, month))
  return Date.UTC(year, month, day, date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds())
}

type RecurrenceFields = Pick<Task, 'task_type' | 'recurrence_type' | 'recurrence_interval' | 'interval_days'>

function positiveInteger(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isInteger(value) && value > 0 ? value : null
}

/**
 * Resolve how a repeating task advances. Interval tasks step by
 * `interval_days`, falling back to `recurrence_interval`; recurring tasks
 * need both a type and a positive interval. Null when the fields are
 * missing or not usable.
 */
function recurrenceOf(task: RecurrenceFields): { type: RecurrenceType; interval: number } | null {
  if (task.task_type === 'one_time') return null
  if (task.task_type === 'interval') {
    const days = positiveInteger(task.interval_days ?? task.recurrence_interval)
    return days === null ? null : { type: 'interval', interval: days }
  }

  const interval = positiveInteger(task.recurrence_interval)
  if (!task.recurrence_type || interval === null) return null
  return { type: task.recurrence_type, interval }
}

/**
 * Whether a task carries the fields its type needs to repeat. One-time
 * tasks always pass.
 */
export function hasValidRecurrence(task: RecurrenceFields): boolean {
  return task.task_type === 'one_time' || recurrenceOf(task) !== null
}

function isWeekendDay(time: number, dayStartHour: number): boolean {
  const weekday = new Date(getLogicalDate(time, dayStartHour)).getUTCDay()
  return weekday === 0 || weekday === 6
}

/**
 * Advance by whole days until strictly after `now`, in one jump.
 */
function advanceByDays(reminder: number, now: number, stepDays: number): number {
  const step = stepDays * DAY_MS
  const steps = Math.floor((now - reminder) / step) + 1
  return reminder + steps * step
}

function advanceByMonths(reminder: number, now: number, stepMonths: number): number {
  let occurrence = 1
  let next = addMonths(reminder, stepMonths)
  while (next <= now) {
    occurrence++
    next = addMonths(reminder, stepMonths * occurrence)
  }
  return next
}

function advanceByMatchingDays(
  reminder: number,
  now: number,
  interval: number,
  dayStartHour: number,
  weekend: boolean
): number {
  let next = reminder
  while (next <= now) {
    let matched = 0
    while (matched < interval) {
      next += DAY_MS
      if (isWeekendDay(next, dayStartHour) === weekend) matched++
    }
  }
  return next
}

/**
 * Next reminder for a recurring or interval task whose reminder is at or
 * before `now`, keeping the time of day. One-time tasks, future reminders,
 * unparseable values and tasks without a usable recurrence come back
 * unchanged.
 */
export function calculateNextReminderTime(task: Task, now: number, dayStartHour: number): string {
  const recurrence = recurrenceOf(task)
  if (recurrence === null) return task.reminder_time

  const reminder = parseLocalDateTime(task.reminder_time)
  if (reminder === null || reminder > now) return task.reminder_time

  const { interval } = recurrence
  let next: number

  switch (recurrence.type) {
    case 'daily':
      next = advanceByDays(reminder, now, interval)
      break
    case 'weekly':
      next = advanceByDays(reminder, now, 7 * interval)
      break
    case 'interval':
      next = advanceByDays(reminder, now, interval)
      break
    case 'monthly':
      next = advanceByMonths(reminder, now, interval)
      break
    case 'yearly':
      next = advanceByMonths(reminder, now, 12 * interval)
      break
    case 'weekdays':
      next = advanceByMatchingDays(reminder, now, interval, dayStartHour, false)
      break
    case 'weekends':
      next = advanceByMatchingDays(reminder, now, interval, dayStartHour, true)
      break
  }

  return formatLocalDateTime(next)
}

/**
 * Whether a task belongs in today's view: its reminder falls on today's
 * logical day or earlier, whatever its completed or enabled flags. With a
 * selected user, tasks assigned only to other users are hidden.
 */
export function isInTodayView(
  task: Task,
  now: number,
  dayStartHour: number,
  selectedUserId?: number | null
): boolean {
  const reminder = parseLocalDateTime(task.reminder_time)
  if (reminder === null) return false

  if (getLogicalDate(reminder, dayStartHour) > getLogicalDate(now, dayStartHour)) return false

  if (selectedUserId === undefined || selectedUserId === null) return true
  return task.assigned_user_ids.length === 0 || task.assigned_user_ids.includes(selectedUserId)
}

export function filterTodayTasks(
  tasks: Task[],
  now: number,
  dayStartHour: number,
  selectedUserId?: number | null
): Task[] {
  return tasks
    .filter(task => isInTodayView(task, now, dayStartHour, selectedUserId))
    .sort((a, b) => a.reminder_time.localeCompare(b.reminder_time) || a.id - b.id)
}
