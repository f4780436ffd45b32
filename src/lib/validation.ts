import { z } from 'zod'
import { EntityMap, EntityType, Group, RemoteEntityMap, Task, User } from '../types'
import { QueueItem } from '../types/sync'
import { ValidationError } from './errors'
import { formatLocalDateTime, hasValidRecurrence, parseLocalDateTime } from './scheduling/dayBoundary'

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

const TITLE_MAX = 200
const DESCRIPTION_MAX = 1000

const taskTypeSchema = z.enum(['one_time', 'recurring', 'interval'])
const recurrenceTypeSchema = z.enum(['daily', 'weekdays', 'weekends', 'weekly', 'monthly', 'yearly', 'interval'])
const idListSchema = z.array(z.number().int())

const taskFields = {
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable().optional(),
  task_type: taskTypeSchema,
  recurrence_type: recurrenceTypeSchema.nullable().optional(),
  recurrence_interval: z.number().int().nullable().optional(),
  interval_days: z.number().int().nullable().optional(),
  reminder_time: z.string(),
  group_id: z.number().int().nullable().optional(),
  enabled: z.boolean(),
  completed: z.boolean(),
  assigned_user_ids: idListSchema,
  last_shown_at: z.number().nullable().optional(),
}

const userFields = {
  id: z.number().int(),
  name: z.string(),
  email: z.string().nullable().optional(),
  role: z.string().nullable().optional(),
  status: z.string().nullable().optional(),
}

const groupFields = {
  id: z.number().int(),
  name: z.string(),
  description: z.string().nullable().optional(),
  created_by: z.number().int().nullable().optional(),
  user_ids: idListSchema,
}

const timestamp = z.number()

/**
 * Records as stored in IndexedDB.
 */
export const recordSchemas: { [K in EntityType]: Schema<EntityMap[K]> } = {
  task: z.object({ ...taskFields, created_at: timestamp, updated_at: timestamp, last_accessed: timestamp }),
  user: z.object({ ...userFields, updated_at: timestamp, last_accessed: timestamp }),
  group: z.object({ ...groupFields, updated_at: timestamp, last_accessed: timestamp }),
}

const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?$/

/**
 * Remote timestamps arrive as epoch milliseconds or ISO strings. Strings
 * without a zone are local wall-clock times. Returns NaN when unparseable.
 */
export function parseWireTimestamp(value: string): number {
  const match = ZONELESS_DATE_TIME.exec(value)
  if (!match) return Date.parse(value)

  const base = parseLocalDateTime(match[1])
  if (base === null) return Number.NaN
  const fraction = match[2] === undefined ? 0 : Math.floor(Number(`0.${match[2]}`) * 1000)
  return base + fraction
}

const wireTimestamp = z.union([
  z.number(),
  z.string().transform((value, ctx) => {
    const parsed = parseWireTimestamp(value)
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' })
      return z.NEVER
    }
    return parsed
  }),
])

/**
 * Entities as returned by the remote service. Unknown fields are dropped.
 */
export const wireSchemas: { [K in EntityType]: Schema<RemoteEntityMap[K]> } = {
  task: z
    .object({
      ...taskFields,
      reminder_time: z.string().transform(value => {
        const parsed = parseWireTimestamp(value)
        return Number.isNaN(parsed) ? value : formatLocalDateTime(parsed)
      }),
      assigned_user_ids: idListSchema.default([]),
      enabled: z.boolean().default(true),
      completed: z.boolean().default(false),
      created_at: wireTimestamp.optional(),
      updated_at: wireTimestamp,
    })
    .superRefine((task, ctx) => {
      if (!hasValidRecurrence(task)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['recurrence_type'], message: `${task.task_type} task without a usable recurrence` })
      }
    })
    .transform(task => ({ ...task, created_at: task.created_at ?? task.updated_at })),
  user: z.object({ ...userFields, updated_at: wireTimestamp }),
  group: z.object({ ...groupFields, user_ids: idListSchema.default([]), updated_at: wireTimestamp }),
}

const queueItemBase = z.object({
  id: z.number().int(),
  entity_type: z.enum(['task', 'user', 'group']),
  entity_id: z.number().int().nullable(),
  client_op_id: z.string(),
  timestamp: z.number(),
  retry_count: z.number().int(),
  last_retry: z.number().nullable(),
  last_failure: z.enum(['network', 'remote_rejected', 'validation', 'storage']).nullable(),
  last_error: z.string().nullable(),
  status: z.enum(['pending', 'sending', 'failed', 'synced']),
  size_bytes: z.number(),
  synced_at: z.number().nullable(),
})

export const queueItemSchema: Schema<QueueItem> = z.union([
  queueItemBase.extend({ operation: z.enum(['create', 'update']), payload: z.string() }),
  queueItemBase.extend({ operation: z.enum(['complete', 'uncomplete', 'delete']), payload: z.string().nullable() }),
])

export type FieldIssue = { field: string; message: string }

type TaskShape = Pick<
  Task,
  'title' | 'description' | 'task_type' | 'recurrence_type' | 'recurrence_interval' | 'reminder_time'
> & Partial<Pick<Task, 'interval_days' | 'group_id' | 'assigned_user_ids'>>

function isWholeOrAbsent(value: number | null | undefined): boolean {
  return value === null || value === undefined || Number.isInteger(value)
}

/**
 * Field and business-rule checks applied to a task before it is enqueued
 */
export function collectTaskIssues(task: TaskShape): FieldIssue[] {
  const issues: FieldIssue[] = []

  if (task.title.trim().length === 0) {
    issues.push({ field: 'title', message: 'Title cannot be empty' })
  }
  if (task.title.length > TITLE_MAX) {
    issues.push({ field: 'title', message: `Title cannot exceed ${TITLE_MAX} characters` })
  }
  if (task.description && task.description.length > DESCRIPTION_MAX) {
    issues.push({ field: 'description', message: `Description cannot exceed ${DESCRIPTION_MAX} characters` })
  }
  if (task.reminder_time.trim().length === 0) {
    issues.push({ field: 'reminder_time', message: 'Reminder time cannot be empty' })
  } else if (parseLocalDateTime(task.reminder_time) === null) {
    issues.push({ field: 'reminder_time', message: 'Invalid reminder time format' })
  }

  if (task.task_type === 'recurring' || task.task_type === 'interval') {
    if (!task.recurrence_type) {
      issues.push({ field: 'recurrence_type', message: 'Recurring tasks must have recurrence type' })
    }
    if (task.recurrence_interval === null || task.recurrence_interval === undefined || task.recurrence_interval <= 0) {
      issues.push({ field: 'recurrence_interval', message: 'Recurring tasks must have positive recurrence interval' })
    }
  }

  if (!isWholeOrAbsent(task.recurrence_interval)) {
    issues.push({ field: 'recurrence_interval', message: 'Recurrence interval must be a whole number' })
  }
  if (task.interval_days !== null && task.interval_days !== undefined &&
      (!Number.isInteger(task.interval_days) || task.interval_days <= 0)) {
    issues.push({ field: 'interval_days', message: 'Interval days must be a positive whole number' })
  }
  if (!isWholeOrAbsent(task.group_id)) {
    issues.push({ field: 'group_id', message: 'Group id must be an integer' })
  }
  if (task.assigned_user_ids && !task.assigned_user_ids.every(id => Number.isInteger(id))) {
    issues.push({ field: 'assigned_user_ids', message: 'Assigned user ids must be integers' })
  }

  return issues
}

function throwIfIssues(entity: string, issues: FieldIssue[]): void {
  if (issues.length > 0) {
    throw new ValidationError(`Invalid ${entity}: ${issues.map(i => i.message).join('; ')}`, issues[0].field, issues)
  }
}

export function validateTask(task: TaskShape): void {
  throwIfIssues('task', collectTaskIssues(task))
}

export function validateUser(user: Pick<User, 'name'>): void {
  throwIfIssues('user', user.name.trim().length === 0 ? [{ field: 'name', message: 'Name cannot be empty' }] : [])
}

export function validateGroup(group: Pick<Group, 'name'>): void {
  throwIfIssues('group', group.name.trim().length === 0 ? [{ field: 'name', message: 'Name cannot be empty' }] : [])
}

/**
 * Parse with a schema, reporting the first failing path
 */
export function parseWith<T>(schema: Schema<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
    throw new ValidationError(`Invalid ${what}`, details[0]?.field, details)
  }
  return parsed.data
}

/**
 * Check a fully built record against its stored shape before it is cached
 * or enqueued.
 */
export function validateRecord<K extends EntityType>(type: K, record: EntityMap[K]): void {
  parseWith(recordSchemas[type], record, type)
}
