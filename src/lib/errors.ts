/**
 * Error classes for the sync engine.
 *
 * Foreground edits throw these to the caller. Background sync converts them
 * into a typed SyncFailure with toSyncFailure and never throws.
 */
import { SyncFailure } from '../types/sync'

/**
 * Base error class for all engine errors
 */
export class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode
    this.isOperational = isOperational
    this.context = context

    Error.captureStackTrace(this, this.constructor)
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      ...(process.env.NODE_ENV !== 'production' && { context: this.context }),
    }
  }
}

/**
 * Rejected input. Raised before anything is enqueued.
 */
export class ValidationError extends AppError {
  public readonly field?: string
  public readonly details?: Array<{ field: string; message: string }>

  constructor(
    message: string,
    field?: string,
    details?: Array<{ field: string; message: string }>,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', 400, true, context)
    this.field = field
    this.details = details
  }

  toJSON() {
    return {
      ...super.toJSON(),
      field: this.field,
      details: this.details,
    }
  }
}

export class NotFoundError extends AppError {
  public readonly resourceType: string
  public readonly resourceId?: string

  constructor(
    resourceType: string,
    resourceId?: string,
    context?: Record<string, unknown>
  ) {
    const message = resourceId
      ? `${resourceType} with id '${resourceId}' not found`
      : `${resourceType} not found`
    super(message, 'NOT_FOUND', 404, true, context)
    this.resourceType = resourceType
    this.resourceId = resourceId
  }
}

export class TaskNotFoundError extends NotFoundError {
  constructor(taskId?: number, context?: Record<string, unknown>) {
    super('Task', taskId === undefined ? undefined : String(taskId), context)
  }
}

/**
 * Cycle-level failure. Carries the phase it happened in.
 */
export class SyncError extends AppError {
  public readonly operation?: 'push' | 'pull' | 'full'
  public readonly failedEntities?: string[]

  constructor(
    message: string,
    operation?: 'push' | 'pull' | 'full',
    failedEntities?: string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'SYNC_ERROR', 500, true, context)
    this.operation = operation
    this.failedEntities = failedEntities
  }

  toJSON() {
    return {
      ...super.toJSON(),
      operation: this.operation,
      failedEntities: this.failedEntities,
    }
  }
}

/**
 * Transient transport failure. Retried with backoff.
 */
export class NetworkError extends AppError {
  public readonly url?: string
  public readonly method?: string

  constructor(
    message: string = 'Network request failed',
    url?: string,
    method?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'NETWORK_ERROR', 503, true, context)
    this.url = url
    this.method = method
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number

  constructor(
    message: string = 'Operation timed out',
    timeoutMs: number = 0,
    context?: Record<string, unknown>
  ) {
    super(message, 'TIMEOUT', 504, true, context)
    this.timeoutMs = timeoutMs
  }
}

/**
 * The remote service refused an operation (conflict, validation, permission).
 * Retried a bounded number of times.
 */
export class RemoteRejectedError extends AppError {
  public readonly status: number

  constructor(status: number, message?: string, context?: Record<string, unknown>) {
    super(message ?? `Remote rejected the request with status ${status}`, 'REMOTE_REJECTED', status, true, context)
    this.status = status
  }
}

/**
 * Local persistence failure. Fatal for the operation that hit it.
 */
export class StorageError extends AppError {
  public readonly store?: string

  constructor(
    message: string,
    store?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STORAGE_ERROR', 500, true, context)
    this.store = store
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Maps a non-2xx HTTP status to the error the sync loop expects.
 * 408, 429 and 5xx are transient; every other status is a rejection.
 */
export function fromHttpStatus(status: number, url?: string, method?: string): AppError {
  if (status === 408 || status === 429 || status >= 500) {
    return new NetworkError(`Request failed with status ${status}`, url, method, { status })
  }
  return new RemoteRejectedError(status, undefined, { url, method })
}

/**
 * Converts any thrown value into the failure category the queue records.
 * Unknown errors count as network failures so they are retried.
 */
export function toSyncFailure(error: unknown): SyncFailure {
  if (error instanceof TimeoutError) {
    return { category: 'network', message: error.message, timedOut: true }
  }
  if (error instanceof NetworkError) {
    return { category: 'network', message: error.message, timedOut: false }
  }
  if (error instanceof RemoteRejectedError) {
    return { category: 'remote_rejected', message: error.message, status: error.status }
  }
  if (error instanceof ValidationError) {
    return { category: 'validation', message: error.message, details: error.details }
  }
  if (error instanceof StorageError) {
    return { category: 'storage', message: error.message }
  }
  if (error instanceof Error) {
    return { category: 'network', message: error.message, timedOut: false }
  }
  return { category: 'network', message: String(error), timedOut: false }
}

/**
 * Creates a plain error report suitable for logs or host callbacks
 */
export function toErrorResponse(error: unknown): {
  error: string
  code?: string
  details?: unknown
  statusCode: number
} {
  if (isAppError(error)) {
    return {
      error: error.message,
      code: error.code,
      details: process.env.NODE_ENV !== 'production' ? error.context : undefined,
      statusCode: error.statusCode,
    }
  }

  if (error instanceof Error) {
    return {
      error: process.env.NODE_ENV === 'production'
        ? 'Internal error'
        : error.message,
      statusCode: 500,
    }
  }

  return {
    error: 'An unexpected error occurred',
    statusCode: 500,
  }
}
