/**
 * Sync Module Type Definitions
 *
 * Queue items, remote operations, failures and the observable sync state.
 */
import { EntityType, RemoteEntityMap } from './index'

export type QueueOperation = 'create' | 'update' | 'complete' | 'uncomplete' | 'delete'

/**
 * Operations that carry no full snapshot and are pushed ahead of the others.
 */
export type LightOperation = Extract<QueueOperation, 'complete' | 'uncomplete' | 'delete'>

/**
 * `sending` marks an item handed to the remote service and not yet
 * acknowledged. It is never coalesced and is sent again after a restart.
 */
export type QueueStatus = 'pending' | 'sending' | 'failed' | 'synced'

export type SyncFailureCategory = 'network' | 'remote_rejected' | 'validation' | 'storage'

interface QueueItemBase {
  id: number
  entity_type: EntityType
  /** Negative while the entity only exists locally */
  entity_id: number | null
  client_op_id: string
  timestamp: number
  retry_count: number
  last_retry: number | null
  last_failure: SyncFailureCategory | null
  last_error: string | null
  status: QueueStatus
  size_bytes: number
  synced_at: number | null
}

export interface FullQueueItem extends QueueItemBase {
  operation: Exclude<QueueOperation, LightOperation>
  payload: string
}

export interface LightQueueItem extends QueueItemBase {
  operation: LightOperation
  payload: string | null
}

export type QueueItem = FullQueueItem | LightQueueItem

export type NewQueueItem = Omit<FullQueueItem, 'id'> | Omit<LightQueueItem, 'id'>

/**
 * Typed failure carried by every sync result. Never thrown past the sync
 * boundary.
 */
export type SyncFailure =
  | { category: 'network'; message: string; timedOut: boolean }
  | { category: 'remote_rejected'; message: string; status: number }
  | { category: 'validation'; message: string; details?: Array<{ field: string; message: string }> }
  | { category: 'storage'; message: string }

export type Result<T> = { ok: true; value: T } | { ok: false; error: SyncFailure }

export type MarkOutcome = { success: true } | { success: false; failure: SyncFailure }

/**
 * A queued mutation as sent to the remote service. Pending-local ids are
 * omitted.
 */
export interface RemoteOperation {
  client_op_id: string
  operation: QueueOperation
  entity_type: EntityType
  entity_id: number | null
  payload: Record<string, unknown> | null
  timestamp: number
}

export type RemoteAck = {
  [K in EntityType]: {
    client_op_id: string
    entity_type: K
    entity_id: number
    entity: RemoteEntityMap[K] | null
  }
}[EntityType]

export interface RemoteSnapshot {
  task: RemoteEntityMap['task'][]
  user: RemoteEntityMap['user'][]
  group: RemoteEntityMap['group'][]
}

export interface PushSummary {
  pushed: number
  failed: number
  blocked: number
  over_ceiling: boolean
}

export interface PullSummary {
  pulled: number
  merged: boolean
  removed: number
  day_recomputed: boolean
}

export interface SyncSummary {
  push: PushSummary
  pull: PullSummary | null
  evicted: number
  over_budget_bytes: number
  gc_removed: number
}

export type SyncState =
  | { status: 'idle'; last_synced_at: number | null }
  | { status: 'syncing'; started_at: number }
  | { status: 'error'; cause: SyncFailureCategory; message: string; at: number }

export type SyncStateListener = (state: SyncState) => void
