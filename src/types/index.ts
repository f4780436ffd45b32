export type EntityType = 'task' | 'user' | 'group'

export type TaskType = 'one_time' | 'recurring' | 'interval'

export type RecurrenceType =
  | 'daily'
  | 'weekdays'
  | 'weekends'
  | 'weekly'
  | 'monthly'
  | 'yearly'
  | 'interval'

/**
 * A reminder. Positive ids are assigned by the remote service; negative ids
 * mark a task created locally whose create has not been confirmed yet.
 *
 * `reminder_time` is a local wall-clock string (`YYYY-MM-DDTHH:mm:ss`) with no
 * zone. Timestamps are epoch milliseconds.
 */
export interface Task {
  id: number
  title: string
  description?: string | null
  task_type: TaskType
  recurrence_type?: RecurrenceType | null
  recurrence_interval?: number | null
  interval_days?: number | null
  reminder_time: string
  group_id?: number | null
  enabled: boolean
  completed: boolean
  assigned_user_ids: number[]
  created_at: number
  updated_at: number
  last_accessed: number
  last_shown_at?: number | null
}

export interface User {
  id: number
  name: string
  email?: string | null
  role?: string | null
  status?: string | null
  updated_at: number
  last_accessed: number
}

export interface Group {
  id: number
  name: string
  description?: string | null
  created_by?: number | null
  user_ids: number[]
  updated_at: number
  last_accessed: number
}

export interface EntityMap {
  task: Task
  user: User
  group: Group
}

export type Entity = EntityMap[EntityType]

/**
 * Entity as received from the remote service or built by an edit, before the
 * cache has stamped its access time.
 */
export type IncomingEntity<K extends EntityType> = Omit<EntityMap[K], 'last_accessed'> & {
  id: number
  updated_at: number
  last_accessed?: number
}

export type RemoteEntityMap = {
  [K in EntityType]: Omit<EntityMap[K], 'last_accessed'>
}

export interface CreateTaskDTO {
  title: string
  description?: string | null
  task_type: TaskType
  recurrence_type?: RecurrenceType | null
  recurrence_interval?: number | null
  interval_days?: number | null
  reminder_time: string
  group_id?: number | null
  assigned_user_ids?: number[]
  enabled?: boolean
}

export interface UpdateTaskDTO {
  title?: string
  description?: string | null
  task_type?: TaskType
  recurrence_type?: RecurrenceType | null
  recurrence_interval?: number | null
  interval_days?: number | null
  reminder_time?: string
  group_id?: number | null
  assigned_user_ids?: number[]
  enabled?: boolean
}

export interface UpdateUserDTO {
  name?: string
  email?: string | null
  role?: string | null
  status?: string | null
}

export interface CreateGroupDTO {
  name: string
  description?: string | null
  created_by?: number | null
  user_ids?: number[]
}

export interface UpdateGroupDTO {
  name?: string
  description?: string | null
  user_ids?: number[]
}

/**
 * Query over the cached tasks. Every field narrows the result.
 */
export interface TaskFilter {
  group_id?: number
  assigned_user_id?: number
  completed?: boolean
  enabled?: boolean
  reminder_from?: string
  reminder_to?: string
}
