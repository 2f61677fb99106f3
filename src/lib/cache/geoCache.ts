import type { GeoPoint, Restaurant } from '../../types'
import { systemClock, type Clock } from '../utils/clock'
import { debug } from '../utils/log'

/** Fixed miles-per-degree approximation; longitude spans are not latitude-corrected. */
export const MILES_PER_DEGREE = 69.0

export interface GeographicBounds {
  minLat: number
  maxLat: number
  minLon: number
  maxLon: number
}

export interface CachedRegion {
  key: string
  center: GeoPoint
  radiusMiles: number
  bounds: GeographicBounds
  restaurants: Restaurant[]
  createdAt: number
  lastAccessedAt: number
}

export interface GeoCacheOptions {
  ttlMs: number
  capacity: number
  /** Share of regions dropped, least recently accessed first, when full. */
  evictionFraction?: number
  clock?: Clock
}

export function boundsAround(center: GeoPoint, radiusMiles: number): GeographicBounds {
  const delta = radiusMiles / MILES_PER_DEGREE
  return {
    minLat: center.latitude - delta,
    maxLat: center.latitude + delta,
    minLon: center.longitude - delta,
    maxLon: center.longitude + delta,
  }
}

/** Inclusive on every edge. */
export function containsPoint(bounds: GeographicBounds, point: GeoPoint): boolean {
  return (
    point.latitude >= bounds.minLat &&
    point.latitude <= bounds.maxLat &&
    point.longitude >= bounds.minLon &&
    point.longitude <= bounds.maxLon
  )
}

export function regionKey(center: GeoPoint): string {
  return `${center.latitude}_${center.longitude}`
}

/**
 * Restaurant lists keyed by the area they were fetched for. Lookups reuse any
 * unexpired region whose box contains the point.
 */
export class GeoCache {
  private readonly regions = new Map<string, CachedRegion>()
  private readonly ttlMs: number
  private readonly capacity: number
  private readonly evictionFraction: number
  private readonly clock: Clock

  constructor(options: GeoCacheOptions) {
    if (options.capacity < 1) throw new Error('GeoCache capacity must be at least 1')
    this.ttlMs = options.ttlMs
    this.capacity = options.capacity
    this.evictionFraction = options.evictionFraction ?? 0.2
    this.clock = options.clock ?? systemClock
  }

  get size(): number {
    return this.regions.size
  }

  lookup(point: GeoPoint): CachedRegion | null {
    const now = this.clock.now()
    for (const [key, region] of this.regions) {
      if (this.isExpired(region, now)) {
        this.regions.delete(key)
        continue
      }
      if (containsPoint(region.bounds, point)) {
        region.lastAccessedAt = now
        return structuredClone(region)
      }
    }
    return null
  }

  /**
   * Cache a fetched list for the area around `center`. A write older than the
   * region already stored under the same key is ignored.
   */
  store(restaurants: Restaurant[], center: GeoPoint, radiusMiles: number, fetchedAt = this.clock.now()): CachedRegion {
    const key = regionKey(center)
    const existing = this.regions.get(key)
    if (existing && existing.createdAt > fetchedAt) {
      debug('geo-cache', 'ignoring older write for %s', key)
      return structuredClone(existing)
    }
    if (!existing && this.regions.size >= this.capacity) {
      this.purgeExpired()
      if (this.regions.size >= this.capacity) this.evictOldest()
    }
    const region: CachedRegion = {
      key,
      center: { ...center },
      radiusMiles,
      bounds: boundsAround(center, radiusMiles),
      restaurants: structuredClone(restaurants),
      createdAt: fetchedAt,
      lastAccessedAt: fetchedAt,
    }
    this.regions.set(key, region)
    return structuredClone(region)
  }

  purgeExpired(): number {
    const now = this.clock.now()
    let removed = 0
    for (const [key, region] of this.regions) {
      if (this.isExpired(region, now)) {
        this.regions.delete(key)
        removed++
      }
    }
    return removed
  }

  clear(): void {
    this.regions.clear()
  }

  private evictOldest(): void {
    const count = Math.max(1, Math.floor(this.regions.size * this.evictionFraction))
    const oldest = [...this.regions.values()].sort((a, b) => a.lastAccessedAt - b.lastAccessedAt).slice(0, count)
    for (const region of oldest) this.regions.delete(region.key)
    debug('geo-cache', 'evicted %d regions', oldest.length)
  }

  private isExpired(region: CachedRegion, now: number): boolean {
    return now - region.createdAt >= this.ttlMs
  }
}
