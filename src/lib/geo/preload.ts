import type { Restaurant, ScoredResult } from '../../types'
import { systemClock, type Clock } from '../utils/clock'
import { debug } from '../utils/log'
import { RateLimiter } from '../utils/rateLimiter'

export const PRELOAD_INTERVAL_MS = 500
export const PRELOAD_LIMIT = 5

export interface NutritionResolver {
  resolve(name: string): Promise<ScoredResult>
}

export interface NutritionPreloaderOptions {
  resolver: NutritionResolver
  clock?: Clock
  intervalMs?: number
  /** Restaurants resolved per call. */
  limit?: number
}

/**
 * Warms the result cache for chains that just showed up in a refreshed area.
 * Each name is resolved at most once per process.
 */
export class NutritionPreloader {
  private readonly seen = new Set<string>()
  private readonly limiter: RateLimiter
  private readonly resolver: NutritionResolver
  private readonly limit: number

  constructor(options: NutritionPreloaderOptions) {
    this.resolver = options.resolver
    this.limit = options.limit ?? PRELOAD_LIMIT
    this.limiter = new RateLimiter(options.intervalMs ?? PRELOAD_INTERVAL_MS, options.clock ?? systemClock, 'preload')
  }

  /** Returns the number of names resolved. */
  async preload(restaurants: Restaurant[]): Promise<number> {
    const names: string[] = []
    for (const r of restaurants) {
      if (names.length >= this.limit) break
      const key = r.name.trim().toLowerCase()
      if (!r.hasNutritionData || this.seen.has(key)) continue
      this.seen.add(key)
      names.push(r.name)
    }

    for (const name of names) {
      await this.limiter.wait()
      const result = await this.resolver.resolve(name)
      debug('preload', '%s -> %s', name, result.isAvailable ? result.matchedKey : 'unavailable')
    }
    return names.length
  }
}
