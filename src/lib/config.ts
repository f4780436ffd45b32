import { z } from 'zod'
import { ValidationError } from './errors'

const MiB = 1024 * 1024
const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Settings the host may change at any time. Read at the start of every sync
 * cycle and whenever the day-boundary alarm is armed.
 */
export interface EngineSettings {
  dayStartHour: number
  retentionCeilingBytes: number
  queueCeilingBytes: number
}

export interface EngineConfig {
  apiUrl?: string
  apiVersion: string
  syncIntervalMs: number
  pushDebounceMs: number
  requestTimeoutMs: number
  batchSize: number
  maxRejectedRetries: number
  baseRetryDelayMs: number
  maxRetryDelayMs: number
  syncedRetentionMs: number
  settings: EngineSettings
}

export interface SettingsSource {
  getSettings(): Promise<EngineSettings>
}

const SettingsSchema = z.object({
  dayStartHour: z.number().int().min(0).max(23),
  retentionCeilingBytes: z.number().int().positive(),
  queueCeilingBytes: z.number().int().positive(),
})

const EnvSchema = z.object({
  REMINDER_SYNC_API_URL: z.string().url().optional(),
  REMINDER_SYNC_API_VERSION: z.string().regex(/^\d+\.\d+$/, 'Expected MAJOR.MINOR').default('0.3'),
  REMINDER_SYNC_DAY_START_HOUR: z.coerce.number().int().min(0).max(23).default(4),
  REMINDER_SYNC_RETENTION_CEILING_BYTES: z.coerce.number().int().positive().default(25 * MiB),
  REMINDER_SYNC_QUEUE_CEILING_BYTES: z.coerce.number().int().positive().default(5 * MiB),
  REMINDER_SYNC_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  REMINDER_SYNC_PUSH_DEBOUNCE_MS: z.coerce.number().int().nonnegative().default(2_000),
  REMINDER_SYNC_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REMINDER_SYNC_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  REMINDER_SYNC_MAX_REJECTED_RETRIES: z.coerce.number().int().positive().default(3),
  REMINDER_SYNC_BASE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  REMINDER_SYNC_MAX_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(30_000),
  REMINDER_SYNC_SYNCED_RETENTION_MS: z.coerce.number().int().nonnegative().default(7 * DAY_MS),
})

function toValidationError(message: string, error: z.ZodError): ValidationError {
  const details = error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }))
  return new ValidationError(message, details[0]?.field, details)
}

/**
 * Load engine configuration from environment variables, applying defaults
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw toValidationError('Invalid engine configuration', parsed.error)
  }
  const values = parsed.data

  return {
    apiUrl: values.REMINDER_SYNC_API_URL,
    apiVersion: values.REMINDER_SYNC_API_VERSION,
    syncIntervalMs: values.REMINDER_SYNC_INTERVAL_MS,
    pushDebounceMs: values.REMINDER_SYNC_PUSH_DEBOUNCE_MS,
    requestTimeoutMs: values.REMINDER_SYNC_REQUEST_TIMEOUT_MS,
    batchSize: values.REMINDER_SYNC_BATCH_SIZE,
    maxRejectedRetries: values.REMINDER_SYNC_MAX_REJECTED_RETRIES,
    baseRetryDelayMs: values.REMINDER_SYNC_BASE_RETRY_DELAY_MS,
    maxRetryDelayMs: values.REMINDER_SYNC_MAX_RETRY_DELAY_MS,
    syncedRetentionMs: values.REMINDER_SYNC_SYNCED_RETENTION_MS,
    settings: {
      dayStartHour: values.REMINDER_SYNC_DAY_START_HOUR,
      retentionCeilingBytes: values.REMINDER_SYNC_RETENTION_CEILING_BYTES,
      queueCeilingBytes: values.REMINDER_SYNC_QUEUE_CEILING_BYTES,
    },
  }
}

export function parseSettings(input: unknown): EngineSettings {
  const parsed = SettingsSchema.safeParse(input)
  if (!parsed.success) {
    throw toValidationError('Invalid engine settings', parsed.error)
  }
  return parsed.data
}

/**
 * In-memory settings holder for hosts that push changes instead of being
 * polled.
 */
export class StaticSettingsSource implements SettingsSource {
  private settings: EngineSettings

  constructor(settings: EngineSettings) {
    this.settings = parseSettings(settings)
  }

  async getSettings(): Promise<EngineSettings> {
    return { ...this.settings }
  }

  update(changes: Partial<EngineSettings>): void {
    this.settings = parseSettings({ ...this.settings, ...changes })
  }
}
