import { z } from 'zod'
import { EntityType, RemoteEntityMap } from '../../types'
import { RemoteAck, RemoteOperation, Result } from '../../types/sync'
import { NetworkError, ValidationError, fromHttpStatus, toSyncFailure } from '../errors'
import { Schema, wireSchemas } from '../validation'
import { withTimeout } from './timeout'

/**
 * The remote source of truth. Implementations never throw: every failure
 * comes back as a typed Result.
 */
export interface RemoteService {
  listEntities<K extends EntityType>(type: K): Promise<Result<RemoteEntityMap[K][]>>
  applyOperation(operation: RemoteOperation): Promise<Result<RemoteAck>>
}

export interface HttpRemoteOptions {
  baseUrl: string
  apiVersion: string
  timeoutMs: number
  fetch?: typeof fetch
}

const PATH_SEGMENTS: Record<EntityType, string> = {
  task: 'tasks',
  user: 'users',
  group: 'groups',
}

const fullStateSchema = z.object({
  entities: z.array(z.unknown()).default([]),
})

function ackSchema<T>(entity: Schema<T>) {
  return z.object({
    client_op_id: z.string(),
    entity_id: z.number().int(),
    entity: entity.nullable().default(null),
  })
}

/**
 * RemoteService over HTTP + JSON using fetch
 */
export class HttpRemoteService implements RemoteService {
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: HttpRemoteOptions) {
    this.baseUrl = `${options.baseUrl.replace(/\/+$/, '')}/api/v${options.apiVersion}/sync`
    this.fetchImpl = options.fetch ?? fetch
  }

  /**
   * The timeout covers the whole exchange, body included
   */
  private async requestJson(url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController()
    const method = init.method ?? 'GET'
    return withTimeout(
      this.send(url, { ...init, signal: controller.signal }),
      this.options.timeoutMs,
      `${method} ${url}`,
      controller
    )
  }

  private async send(url: string, init: RequestInit): Promise<unknown> {
    const method = init.method ?? 'GET'

    let response: Response
    try {
      response = await this.fetchImpl(url, init)
    } catch (error) {
      throw new NetworkError(error instanceof Error ? error.message : 'Network request failed', url, method)
    }

    if (!response.ok) {
      throw fromHttpStatus(response.status, url, method)
    }

    try {
      return await response.json()
    } catch (error) {
      throw new ValidationError('Remote response was not valid JSON', undefined, undefined, {
        url,
        cause: error instanceof Error ? error.message : String(error),
      })
    }
  }

  private parse<T>(schema: Schema<T>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      const details = parsed.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
      throw new ValidationError(`Unexpected ${what} response`, details[0]?.field, details)
    }
    return parsed.data
  }

  async listEntities<K extends EntityType>(type: K): Promise<Result<RemoteEntityMap[K][]>> {
    try {
      const body = await this.requestJson(`${this.baseUrl}/full-state/${PATH_SEGMENTS[type]}`, { method: 'GET' })
      const state = this.parse(fullStateSchema, body, `${type} full-state`)
      return { ok: true, value: this.keepValid(type, state.entities) }
    } catch (error) {
      return { ok: false, error: toSyncFailure(error) }
    }
  }

  /**
   * One malformed entity is skipped rather than failing the whole pull
   */
  private keepValid<K extends EntityType>(type: K, entities: unknown[]): RemoteEntityMap[K][] {
    const valid: RemoteEntityMap[K][] = []
    entities.forEach((raw, index) => {
      const parsed = wireSchemas[type].safeParse(raw)
      if (parsed.success) {
        valid.push(parsed.data)
      } else {
        const issue = parsed.error.issues[0]
        console.warn(`[HttpRemoteService] Skipping ${type} at index ${index}: ${issue?.path.join('.')} ${issue?.message}`)
      }
    })
    return valid
  }

  async applyOperation(operation: RemoteOperation): Promise<Result<RemoteAck>> {
    try {
      const body = await this.requestJson(`${this.baseUrl}/operations`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ ...operation, entity_type: PATH_SEGMENTS[operation.entity_type] }),
      })
      return { ok: true, value: this.parseAck(operation.entity_type, body) }
    } catch (error) {
      return { ok: false, error: toSyncFailure(error) }
    }
  }

  private parseAck(type: EntityType, body: unknown): RemoteAck {
    switch (type) {
      case 'task':
        return { entity_type: 'task', ...this.parse(ackSchema(wireSchemas.task), body, 'task operation') }
      case 'user':
        return { entity_type: 'user', ...this.parse(ackSchema(wireSchemas.user), body, 'user operation') }
      case 'group':
        return { entity_type: 'group', ...this.parse(ackSchema(wireSchemas.group), body, 'group operation') }
    }
  }
}
