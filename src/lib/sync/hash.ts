import { createHash } from 'crypto'
import { RemoteEntityMap } from '../../types'
import { RemoteSnapshot } from '../../types/sync'

type HashedTask = Omit<RemoteEntityMap['task'], 'created_at' | 'last_shown_at'>
type HashedUser = Pick<RemoteEntityMap['user'], 'id' | 'name'>
type HashedGroup = Pick<RemoteEntityMap['group'], 'id' | 'name' | 'user_ids'>

function field(value: string | number | boolean | null | undefined): string {
  return value === null || value === undefined ? '' : String(value)
}

function sortedIds(ids: number[]): string {
  return [...ids].sort((a, b) => a - b).join(',')
}

export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex')
}

export function taskHashInput(task: HashedTask): string {
  return [
    task.id,
    task.title,
    task.description,
    task.task_type,
    task.recurrence_type,
    task.recurrence_interval,
    task.interval_days,
    task.reminder_time,
    task.group_id,
    task.enabled,
    task.completed,
    sortedIds(task.assigned_user_ids),
    task.updated_at,
  ].map(field).join('|')
}

export function userHashInput(user: HashedUser): string {
  return [user.id, user.name].map(field).join('|')
}

export function groupHashInput(group: HashedGroup): string {
  return [group.id, group.name, sortedIds(group.user_ids)].map(field).join('|')
}

/**
 * Hash of a list of entities, independent of the order they arrived in
 */
export function combinedHash<T extends { id: number }>(entities: T[], encode: (entity: T) => string): string {
  return sha256(
    [...entities]
      .sort((a, b) => a.id - b.id)
      .map(encode)
      .join('\n')
  )
}

/**
 * Fingerprint of everything a pull returned. Equal fingerprints mean the
 * remote state has not changed and the merge can be skipped.
 */
export function snapshotHash(snapshot: RemoteSnapshot): string {
  return sha256([
    `task:${combinedHash(snapshot.task, taskHashInput)}`,
    `user:${combinedHash(snapshot.user, userHashInput)}`,
    `group:${combinedHash(snapshot.group, groupHashInput)}`,
  ].join('\n'))
}
