import { systemClock, type Clock } from '../utils/clock'
import { debug } from '../utils/log'

export interface CacheEntry<T> {
  value: T
  createdAt: number
  lastAccessedAt: number
}

/** Flat persisted form of one entry. */
export interface CacheRecord<T> {
  key: string
  value: T
  timestamp: number
}

export interface ResultCacheOptions {
  ttlMs: number
  capacity: number
  /**
   * Share of entries dropped when full, least recently accessed first.
   * 0 evicts just the single oldest entry.
   */
  evictionFraction?: number
  clock?: Clock
  name?: string
}

export interface CacheStats {
  size: number
  capacity: number
  hits: number
  misses: number
  evictions: number
}

/**
 * TTL + LRU key-value cache. The cache owns its entries: values are cloned on
 * the way in and out, so callers never share state with it. All operations
 * are synchronous, so each one completes before another can start.
 */
export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly ttlMs: number
  private readonly capacity: number
  private readonly evictionFraction: number
  private readonly clock: Clock
  private readonly name: string
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options: ResultCacheOptions) {
    if (options.capacity < 1) throw new Error('ResultCache capacity must be at least 1')
    this.ttlMs = options.ttlMs
    this.capacity = options.capacity
    this.evictionFraction = options.evictionFraction ?? 0
    this.clock = options.clock ?? systemClock
    this.name = options.name ?? 'results'
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): T | undefined {
    return this.getFirst([key])?.value
  }

  /**
   * The first of `keys` holding a live entry. Counts as one lookup in the
   * stats: a single hit, or a single miss when none of the keys is live.
   */
  getFirst(keys: string[]): { key: string; value: T } | undefined {
    const now = this.clock.now()
    for (const key of keys) {
      const entry = this.entries.get(key)
      if (!entry) continue
      if (this.isExpired(entry, now)) {
        this.entries.delete(key)
        continue
      }
      entry.lastAccessedAt = now
      this.hits++
      return { key, value: structuredClone(entry.value) }
    }
    this.misses++
    return undefined
  }

  put(key: string, value: T): void {
    const now = this.clock.now()
    this.admit(key, { value: structuredClone(value), createdAt: now, lastAccessedAt: now })
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }

  /** Drop every expired entry now rather than on next read. */
  purgeExpired(): number {
    const now = this.clock.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    }
  }

  /** Live entries as persistable records. */
  snapshot(): CacheRecord<T>[] {
    const now = this.clock.now()
    const records: CacheRecord<T>[] = []
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) continue
      records.push({ key, value: structuredClone(entry.value), timestamp: entry.createdAt })
    }
    return records
  }

  /**
   * Load persisted records. Records already past their TTL are dropped, and a
   * record never replaces a newer entry for the same key. Returns how many
   * were admitted.
   */
  restore(records: CacheRecord<T>[]): number {
    const now = this.clock.now()
    let restored = 0
    for (const record of records) {
      if (now - record.timestamp >= this.ttlMs) continue
      const existing = this.entries.get(record.key)
      if (existing && existing.createdAt >= record.timestamp) continue
      this.admit(record.key, {
        value: structuredClone(record.value),
        createdAt: record.timestamp,
        lastAccessedAt: record.timestamp,
      })
      restored++
    }
    return restored
  }

  private admit(key: string, entry: CacheEntry<T>): void {
    if (!this.entries.has(key) && this.entries.size >= this.capacity) {
      this.purgeExpired()
      if (this.entries.size >= this.capacity) this.evictLeastRecentlyUsed()
    }
    this.entries.set(key, entry)
  }

  private evictLeastRecentlyUsed(): void {
    const count =
      this.evictionFraction > 0 ? Math.max(1, Math.floor(this.entries.size * this.evictionFraction)) : 1
    const oldest = [...this.entries.entries()]
      .sort(([, a], [, b]) => a.lastAccessedAt - b.lastAccessedAt)
      .slice(0, count)
    for (const [key] of oldest) this.entries.delete(key)
    this.evictions += oldest.length
    debug('cache', '%s evicted %d entries', this.name, oldest.length)
  }

  private isExpired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.createdAt >= this.ttlMs
  }
}
