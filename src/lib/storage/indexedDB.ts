import { StorageError } from '../errors'

export const DB_NAME = 'ReminderSyncEngine'
const DB_VERSION = 1

export type StoreName = 'tasks' | 'users' | 'groups' | 'sync_queue' | 'metadata'

interface MetadataRecord {
  key: string
  value: unknown
}

function isMetadataRecord(value: unknown): value is MetadataRecord {
  return typeof value === 'object' && value !== null && 'key' in value && 'value' in value
}

/**
 * Thin promise layer over IndexedDB. Reads return `unknown` so that callers
 * validate what comes back; every failure surfaces as a StorageError.
 */
export class IndexedDBService {
  private db: IDBDatabase | null = null
  private readonly factory?: IDBFactory
  private readonly name: string

  constructor(options: { factory?: IDBFactory; name?: string } = {}) {
    this.factory = options.factory
    this.name = options.name ?? DB_NAME
  }

  /**
   * Open the database, creating stores on first use
   */
  async initialize(): Promise<void> {
    if (this.db) return

    const factory = this.factory ?? (typeof indexedDB === 'undefined' ? undefined : indexedDB)
    if (!factory) {
      throw new StorageError('IndexedDB is not available in this environment')
    }

    this.db = await new Promise<IDBDatabase>((resolve, reject) => {
      const request = factory.open(this.name, DB_VERSION)

      request.onerror = () => reject(new StorageError(`Failed to open database: ${request.error?.message}`))
      request.onsuccess = () => resolve(request.result)

      request.onupgradeneeded = () => {
        const db = request.result

        for (const store of ['tasks', 'users', 'groups'] as const) {
          if (!db.objectStoreNames.contains(store)) {
            const entityStore = db.createObjectStore(store, { keyPath: 'id' })
            entityStore.createIndex('last_accessed', 'last_accessed', { unique: false })
            if (store === 'tasks') {
              entityStore.createIndex('enabled', 'enabled', { unique: false })
              entityStore.createIndex('reminder_time', 'reminder_time', { unique: false })
            }
          }
        }

        if (!db.objectStoreNames.contains('sync_queue')) {
          const queueStore = db.createObjectStore('sync_queue', { keyPath: 'id', autoIncrement: true })
          queueStore.createIndex('status', 'status', { unique: false })
          queueStore.createIndex('timestamp', 'timestamp', { unique: false })
        }

        if (!db.objectStoreNames.contains('metadata')) {
          db.createObjectStore('metadata', { keyPath: 'key' })
        }
      }
    })
  }

  private requireDb(): IDBDatabase {
    if (!this.db) throw new StorageError('Database not initialized')
    return this.db
  }

  private request<T>(
    storeName: StoreName,
    mode: IDBTransactionMode,
    run: (store: IDBObjectStore) => IDBRequest<T>
  ): Promise<T> {
    const db = this.requireDb()

    return new Promise((resolve, reject) => {
      const transaction = db.transaction([storeName], mode)
      const request = run(transaction.objectStore(storeName))

      transaction.oncomplete = () => resolve(request.result)
      transaction.onerror = () =>
        reject(new StorageError(`${mode} on ${storeName} failed: ${transaction.error?.message}`, storeName))
      transaction.onabort = () =>
        reject(new StorageError(`${mode} on ${storeName} aborted: ${transaction.error?.message}`, storeName))
    })
  }

  /**
   * Apply several writes to one store in a single transaction
   */
  private batch(storeName: StoreName, run: (store: IDBObjectStore) => void): Promise<void> {
    const db = this.requireDb()

    return new Promise((resolve, reject) => {
      const transaction = db.transaction([storeName], 'readwrite')
      run(transaction.objectStore(storeName))

      transaction.oncomplete = () => resolve()
      transaction.onerror = () =>
        reject(new StorageError(`batch on ${storeName} failed: ${transaction.error?.message}`, storeName))
      transaction.onabort = () =>
        reject(new StorageError(`batch on ${storeName} aborted: ${transaction.error?.message}`, storeName))
    })
  }

  async get(storeName: StoreName, key: IDBValidKey): Promise<unknown> {
    return this.request<unknown>(storeName, 'readonly', store => store.get(key))
  }

  async getAll(storeName: StoreName): Promise<unknown[]> {
    return this.request<unknown[]>(storeName, 'readonly', store => store.getAll())
  }

  async getAllFromIndex(storeName: StoreName, index: string, value: IDBValidKey): Promise<unknown[]> {
    return this.request<unknown[]>(storeName, 'readonly', store => store.index(index).getAll(value))
  }

  async count(storeName: StoreName): Promise<number> {
    return this.request(storeName, 'readonly', store => store.count())
  }

  /**
   * Insert or replace a record, returning its key
   */
  async put(storeName: StoreName, value: unknown): Promise<IDBValidKey> {
    return this.request(storeName, 'readwrite', store => store.put(value))
  }

  async putAll(storeName: StoreName, values: unknown[]): Promise<void> {
    if (values.length === 0) return
    await this.batch(storeName, store => {
      for (const value of values) store.put(value)
    })
  }

  async delete(storeName: StoreName, key: IDBValidKey): Promise<void> {
    await this.request(storeName, 'readwrite', store => store.delete(key))
  }

  async deleteMany(storeName: StoreName, keys: IDBValidKey[]): Promise<void> {
    if (keys.length === 0) return
    await this.batch(storeName, store => {
      for (const key of keys) store.delete(key)
    })
  }

  /**
   * Delete one record and write others in the same transaction
   */
  async replace(storeName: StoreName, removeKey: IDBValidKey, values: unknown[]): Promise<void> {
    await this.batch(storeName, store => {
      store.delete(removeKey)
      for (const value of values) store.put(value)
    })
  }

  async clear(storeName: StoreName): Promise<void> {
    await this.request(storeName, 'readwrite', store => store.clear())
  }

  /**
   * Store a metadata value
   */
  async storeSetting(key: string, value: unknown): Promise<void> {
    const record: MetadataRecord = { key, value }
    await this.put('metadata', record)
  }

  /**
   * Get a metadata value, or undefined when unset
   */
  async getSetting(key: string): Promise<unknown> {
    const record = await this.get('metadata', key)
    return isMetadataRecord(record) ? record.value : undefined
  }

  close(): void {
    this.db?.close()
    this.db = null
  }
}
