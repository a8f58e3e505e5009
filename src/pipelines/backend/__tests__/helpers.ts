import {parseConfig} from '../../../core/index.js'
import type {BackendSettings} from '../../../core/index.js'
import type {LockTableStore, StateBucketStore} from '../stores.js'
import {createBackendRun} from '../index.js'
import type {BackendRun} from '../types.js'
import {createTmpDir} from '../../../__tests__/helpers.js'

/** In-memory bucket store recording every mutating call. */
export class MemoryBucketStore implements StateBucketStore {
  readonly buckets = new Map<string, {region: string; versioning: boolean}>()
  readonly calls: string[] = []

  async exists(bucket: string): Promise<boolean> {
    return this.buckets.has(bucket)
  }

  async create(bucket: string, region: string): Promise<void> {
    this.calls.push(`create ${bucket} ${region}`)
    this.buckets.set(bucket, {region, versioning: false})
  }

  async versioningEnabled(bucket: string): Promise<boolean> {
    return this.buckets.get(bucket)?.versioning ?? false
  }

  async enableVersioning(bucket: string): Promise<void> {
    this.calls.push(`enable-versioning ${bucket}`)
    const entry = this.buckets.get(bucket)
    if (!entry) {
      throw new Error(`NoSuchBucket: ${bucket}`)
    }

    entry.versioning = true
  }
}

/**
 * In-memory lock table store. A created table reports each entry of
 * `statuses` in turn on successive status calls, then keeps the last one.
 */
export class MemoryLockTableStore implements LockTableStore {
  readonly tables = new Map<string, string[]>()
  readonly calls: string[] = []

  constructor(private readonly statuses: string[] = ['ACTIVE']) {}

  async status(table: string): Promise<string | undefined> {
    const queue = this.tables.get(table)
    if (!queue) {
      return undefined
    }

    return queue.length > 1 ? queue.shift() : queue[0]
  }

  async create(table: string): Promise<void> {
    this.calls.push(`create ${table}`)
    this.tables.set(table, [...this.statuses])
  }
}

export async function backendSettings(raw: Record<string, unknown> = {}): Promise<BackendSettings> {
  const home = await createTmpDir()
  return parseConfig({home, backend: raw}, {}).backend
}

export function fixedRun(settings: BackendSettings): BackendRun {
  return createBackendRun(settings, new Date('2024-05-01T12:00:00Z'))
}
