import { Task } from '../types'
import { CacheStore, estimateEntityBytes } from './storage/cacheStore'
import { MutationQueue, entityKey } from './sync/mutationQueue'

export interface RetentionReport {
  size_before: number
  size_after: number
  evicted: number[]
  over_budget_bytes: number
}

/**
 * Tasks that may be evicted, least recently accessed first. Only disabled
 * tasks without unsent mutations qualify.
 */
export function selectEvictionCandidates(tasks: Task[], outstanding: Set<string>): Task[] {
  return tasks
    .filter(task => !task.enabled && !outstanding.has(entityKey('task', task.id)))
    .sort((a, b) => a.last_accessed - b.last_accessed || a.id - b.id)
}

/**
 * Keeps the cache under its byte ceiling by evicting inactive tasks.
 * Active tasks, users and groups are never evicted; when nothing else is
 * left the overage is reported instead.
 */
export class RetentionPolicy {
  constructor(
    private readonly cache: CacheStore,
    private readonly queue: MutationQueue
  ) {}

  async enforce(ceilingBytes: number): Promise<RetentionReport> {
    const sizeBefore = await this.cache.sizeEstimateBytes()
    if (sizeBefore <= ceilingBytes) {
      return { size_before: sizeBefore, size_after: sizeBefore, evicted: [], over_budget_bytes: 0 }
    }

    const candidates = selectEvictionCandidates(
      await this.cache.listByType('task'),
      await this.queue.outstandingEntityKeys()
    )

    let size = sizeBefore
    const evicted: number[] = []
    for (const task of candidates) {
      if (size <= ceilingBytes) break
      evicted.push(task.id)
      size -= estimateEntityBytes(task)
    }

    await this.cache.deleteMany('task', evicted)
    const sizeAfter = await this.cache.sizeEstimateBytes()
    const overBudget = Math.max(0, sizeAfter - ceilingBytes)

    if (overBudget > 0) {
      console.warn(`[RetentionPolicy] Cache is ${overBudget} bytes over its ${ceilingBytes} byte ceiling with nothing left to evict`)
    } else if (evicted.length > 0) {
      console.log(`[RetentionPolicy] Evicted ${evicted.length} inactive tasks`)
    }

    return { size_before: sizeBefore, size_after: sizeAfter, evicted, over_budget_bytes: overBudget }
  }
}
