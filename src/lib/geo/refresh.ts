import type { GeoPoint, Restaurant } from '../../types'
import type { FetchNearbyRestaurants } from '../api/overpass'
import { regionKey, type GeoCache } from '../cache/geoCache'
import { systemClock, type Clock } from '../utils/clock'
import { debug } from '../utils/log'
import { withRetry } from '../utils/retry'
import type { NutritionPreloader } from './preload'

export const DEFAULT_MAX_BACKGROUND_TASKS = 3

export interface RefreshCoordinatorOptions {
  geoCache: GeoCache
  fetchRestaurants: FetchNearbyRestaurants
  radiusMiles: number
  /** Age after which a cached region is served and refreshed in the background. */
  staleMs: number
  maxTasks?: number
  /** Wait before a background refresh fetches. */
  refreshDelayMs?: number
  preloader?: NutritionPreloader
  clock?: Clock
  retry?: { maxAttempts?: number; initialMs?: number }
}

export interface RefreshStats {
  active: number
  peak: number
  started: number
  skipped: number
  failed: number
}

/**
 * Stale-while-revalidate over the geo cache. Cached areas are answered
 * immediately; stale ones get one background refresh per area key, with at
 * most `maxTasks` refreshes running. Triggers over the cap are dropped.
 */
export class BackgroundRefreshCoordinator {
  private readonly active = new Map<string, Promise<void>>()
  private readonly foreground = new Map<string, Promise<Restaurant[]>>()
  private readonly preloads = new Set<Promise<void>>()
  private readonly geoCache: GeoCache
  private readonly fetchRestaurants: FetchNearbyRestaurants
  private readonly clock: Clock
  private readonly maxTasks: number
  private counters = { peak: 0, started: 0, skipped: 0, failed: 0 }
  private refreshedAt: number | null = null
  private error: string | null = null

  constructor(private readonly options: RefreshCoordinatorOptions) {
    this.geoCache = options.geoCache
    this.fetchRestaurants = options.fetchRestaurants
    this.clock = options.clock ?? systemClock
    this.maxTasks = options.maxTasks ?? DEFAULT_MAX_BACKGROUND_TASKS
  }

  /** When restaurant data was last fetched successfully. Never moves backwards. */
  get lastRefreshedAt(): number | null {
    return this.refreshedAt
  }

  get lastError(): string | null {
    return this.error
  }

  get stats(): RefreshStats {
    return { active: this.active.size, ...this.counters }
  }

  status(): string {
    return `Cache: ${this.geoCache.size} areas, ${this.active.size} background tasks`
  }

  async getRestaurants(location: GeoPoint, radiusMiles = this.options.radiusMiles): Promise<Restaurant[]> {
    const region = this.geoCache.lookup(location)
    if (region) {
      if (this.clock.now() - region.createdAt > this.options.staleMs) {
        this.triggerRefresh(region.center, region.radiusMiles)
      }
      return region.restaurants
    }
    return this.fetchForeground(location, radiusMiles)
  }

  /** False when a refresh for the same area is running or the task cap is reached. */
  triggerRefresh(center: GeoPoint, radiusMiles = this.options.radiusMiles): boolean {
    const key = `refresh_${regionKey(center)}`
    if (this.active.has(key)) {
      debug('refresh', '%s already running', key)
      return false
    }
    if (this.active.size >= this.maxTasks) {
      this.counters.skipped++
      debug('refresh', 'skipping %s, %d tasks running', key, this.active.size)
      return false
    }

    const task = Promise.resolve()
      .then(() => this.refresh(center, radiusMiles, key))
      .catch((e: unknown) => {
        this.counters.failed++
        this.error = e instanceof Error ? e.message : String(e)
        console.error('[refresh] %s failed:', key, e)
      })
      .finally(() => {
        this.active.delete(key)
      })
    this.active.set(key, task)
    this.counters.started++
    this.counters.peak = Math.max(this.counters.peak, this.active.size)
    return true
  }

  /** Resolves once every running task (refreshes, foreground fetches, preloads) has settled. */
  async drain(): Promise<void> {
    while (this.active.size > 0 || this.foreground.size > 0 || this.preloads.size > 0) {
      await Promise.allSettled([...this.active.values(), ...this.foreground.values(), ...this.preloads])
    }
  }

  private async refresh(center: GeoPoint, radiusMiles: number, key: string): Promise<void> {
    const delay = this.options.refreshDelayMs ?? 0
    if (delay > 0) await this.clock.sleep(delay)
    const fetchedAt = this.clock.now()
    const restaurants = await withRetry(() => this.fetchRestaurants(center, radiusMiles), {
      maxAttempts: this.options.retry?.maxAttempts,
      initialMs: this.options.retry?.initialMs,
      sleep: (ms) => this.clock.sleep(ms),
      label: key,
    })
    this.geoCache.store(restaurants, center, radiusMiles, fetchedAt)
    this.markRefreshed(fetchedAt)
    console.log('[refresh] %s stored %d restaurants', key, restaurants.length)
    this.startPreload(restaurants, key)
  }

  /** Runs outside the refresh task so it does not hold a refresh slot. */
  private startPreload(restaurants: Restaurant[], key: string): void {
    const { preloader } = this.options
    if (!preloader) return
    const task: Promise<void> = preloader
      .preload(restaurants)
      .then((count) => {
        debug('refresh', '%s preloaded %d names', key, count)
      })
      .catch((e: unknown) => {
        console.error('[refresh] preload for %s failed:', key, e)
      })
      .finally(() => {
        this.preloads.delete(task)
      })
    this.preloads.add(task)
  }

  /** Concurrent misses for the same point share one fetch. */
  private fetchForeground(location: GeoPoint, radiusMiles: number): Promise<Restaurant[]> {
    const key = `${regionKey(location)}@${radiusMiles}`
    const pending = this.foreground.get(key)
    if (pending) return pending

    const fetchedAt = this.clock.now()
    const request = this.fetchRestaurants(location, radiusMiles)
      .then((restaurants) => {
        this.geoCache.store(restaurants, location, radiusMiles, fetchedAt)
        this.markRefreshed(fetchedAt)
        return restaurants
      })
      .catch((e: unknown) => {
        this.error = e instanceof Error ? e.message : String(e)
        console.error('[refresh] fetch for %s failed:', key, e)
        return []
      })
      .finally(() => {
        this.foreground.delete(key)
      })
    this.foreground.set(key, request)
    return request
  }

  private markRefreshed(at: number): void {
    this.refreshedAt = this.refreshedAt === null ? at : Math.max(this.refreshedAt, at)
  }
}
