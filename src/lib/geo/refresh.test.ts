import { beforeEach, describe, it, expect, vi } from 'vitest'
import { BackgroundRefreshCoordinator, type RefreshCoordinatorOptions } from './refresh'
import { NutritionPreloader } from './preload'
import { GeoCache } from '../cache/geoCache'
import type { FetchNearbyRestaurants } from '../api/overpass'
import { unavailableResult } from '../lookup/chain'
import { ManualClock } from '../../test/manualClock'
import type { GeoPoint, Restaurant, ScoredResult } from '../../types'

const MINUTE = 60_000
const here: GeoPoint = { latitude: 40, longitude: -74 }

function restaurant(id: string, name: string, hasNutritionData = false): Restaurant {
  return { id, name, latitude: 40, longitude: -74, amenity: 'fast_food', hasNutritionData }
}

function setup(overrides: Partial<RefreshCoordinatorOptions> = {}) {
  const clock = new ManualClock()
  const geoCache = new GeoCache({ ttlMs: 30 * MINUTE, capacity: 50, clock })
  const fetchRestaurants = vi.fn<FetchNearbyRestaurants>()
  const coordinator = new BackgroundRefreshCoordinator({
    geoCache,
    fetchRestaurants,
    radiusMiles: 10,
    staleMs: 15 * MINUTE,
    clock,
    ...overrides,
  })
  return { clock, geoCache, fetchRestaurants, coordinator }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('BackgroundRefreshCoordinator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('fetches in the foreground on a miss and serves the area from cache afterwards', async () => {
    const { fetchRestaurants, coordinator } = setup()
    fetchRestaurants.mockResolvedValue([restaurant('1', 'Subway')])

    expect(await coordinator.getRestaurants(here)).toEqual([restaurant('1', 'Subway')])
    expect(await coordinator.getRestaurants({ latitude: 40.1, longitude: -74.1 })).toEqual([restaurant('1', 'Subway')])

    expect(fetchRestaurants).toHaveBeenCalledTimes(1)
    expect(fetchRestaurants).toHaveBeenCalledWith(here, 10)
    expect(coordinator.lastRefreshedAt).toBe(0)
    expect(coordinator.status()).toBe('Cache: 1 areas, 0 background tasks')
  })

  it('shares one fetch between concurrent misses for the same point', async () => {
    const { fetchRestaurants, coordinator } = setup()
    fetchRestaurants.mockResolvedValue([])

    await Promise.all([coordinator.getRestaurants(here), coordinator.getRestaurants(here)])

    expect(fetchRestaurants).toHaveBeenCalledTimes(1)
  })

  it('serves a stale area immediately and refreshes it in the background', async () => {
    const { clock, fetchRestaurants, coordinator, geoCache } = setup()
    fetchRestaurants.mockResolvedValueOnce([restaurant('1', 'Subway')]).mockResolvedValueOnce([restaurant('2', 'KFC')])
    await coordinator.getRestaurants(here)

    clock.advance(16 * MINUTE)
    expect(await coordinator.getRestaurants(here)).toEqual([restaurant('1', 'Subway')])
    expect(coordinator.stats.active).toBe(1)

    await coordinator.drain()

    expect(fetchRestaurants).toHaveBeenCalledTimes(2)
    expect(geoCache.lookup(here)?.restaurants).toEqual([restaurant('2', 'KFC')])
    expect(coordinator.lastRefreshedAt).toBe(16 * MINUTE)
    expect(coordinator.stats).toEqual({ active: 0, peak: 1, started: 1, skipped: 0, failed: 0 })
  })

  it('does not refresh a fresh area', async () => {
    const { clock, fetchRestaurants, coordinator } = setup()
    fetchRestaurants.mockResolvedValue([])
    await coordinator.getRestaurants(here)
    clock.advance(15 * MINUTE)
    await coordinator.getRestaurants(here)
    expect(coordinator.stats.started).toBe(0)
  })

  it('runs one refresh per area key', async () => {
    const { fetchRestaurants, coordinator } = setup()
    fetchRestaurants.mockResolvedValue([])

    expect(coordinator.triggerRefresh(here)).toBe(true)
    expect(coordinator.triggerRefresh({ ...here })).toBe(false)
    expect(coordinator.stats.active).toBe(1)

    await coordinator.drain()
    expect(fetchRestaurants).toHaveBeenCalledTimes(1)
  })

  it('caps concurrent refreshes and skips the rest', async () => {
    const { fetchRestaurants, coordinator } = setup()
    fetchRestaurants.mockResolvedValue([])

    const started = [1, 2, 3, 4, 5].map((i) => coordinator.triggerRefresh({ latitude: i, longitude: i }))

    expect(started).toEqual([true, true, true, false, false])
    expect(coordinator.stats).toEqual({ active: 3, peak: 3, started: 3, skipped: 2, failed: 0 })
    expect(coordinator.status()).toBe('Cache: 0 areas, 3 background tasks')

    await coordinator.drain()
    expect(coordinator.status()).toBe('Cache: 3 areas, 0 background tasks')
    expect(coordinator.stats.peak).toBe(3)
  })

  it('retries a failing refresh and records the failure', async () => {
    const { clock, fetchRestaurants, coordinator } = setup({ retry: { maxAttempts: 2, initialMs: 10 } })
    fetchRestaurants.mockRejectedValue(new Error('overpass down'))

    coordinator.triggerRefresh(here)
    await coordinator.drain()

    expect(fetchRestaurants).toHaveBeenCalledTimes(2)
    expect(clock.sleeps).toEqual([10])
    expect(coordinator.stats.failed).toBe(1)
    expect(coordinator.lastError).toBe('overpass down')
    expect(coordinator.lastRefreshedAt).toBeNull()
  })

  it('waits the configured delay before a background fetch', async () => {
    const { clock, fetchRestaurants, coordinator } = setup({ refreshDelayMs: 1000 })
    fetchRestaurants.mockResolvedValue([])
    coordinator.triggerRefresh(here)
    await coordinator.drain()
    expect(clock.sleeps).toEqual([1000])
    expect(coordinator.lastRefreshedAt).toBe(1000)
  })

  it('returns an empty list when the foreground fetch fails', async () => {
    const { fetchRestaurants, coordinator } = setup()
    fetchRestaurants.mockRejectedValue(new Error('timeout'))

    expect(await coordinator.getRestaurants(here)).toEqual([])
    expect(coordinator.lastError).toBe('timeout')
    expect(coordinator.status()).toBe('Cache: 0 areas, 0 background tasks')
  })

  it('never moves lastRefreshedAt backwards', async () => {
    const { clock, fetchRestaurants, coordinator } = setup()
    const slow = deferred<Restaurant[]>()
    fetchRestaurants.mockReturnValueOnce(slow.promise).mockResolvedValueOnce([])

    coordinator.triggerRefresh(here)
    // let the task reach its fetch
    await Promise.resolve()
    await Promise.resolve()
    clock.advance(5000)
    await coordinator.getRestaurants({ latitude: 10, longitude: 10 })
    expect(coordinator.lastRefreshedAt).toBe(5000)

    slow.resolve([])
    await coordinator.drain()
    expect(coordinator.lastRefreshedAt).toBe(5000)
  })

  it('preloads nutrition for chains found by a refresh', async () => {
    const clock = new ManualClock()
    const resolve = vi.fn(async (name: string) => unavailableResult(name, 0))
    const preloader = new NutritionPreloader({ resolver: { resolve }, clock })
    const { fetchRestaurants, coordinator } = setup({ preloader })
    fetchRestaurants.mockResolvedValue([restaurant('1', 'Subway', true), restaurant('2', "Joe's Diner")])

    coordinator.triggerRefresh(here)
    await coordinator.drain()

    expect(resolve).toHaveBeenCalledTimes(1)
    expect(resolve).toHaveBeenCalledWith('Subway')
  })

  it('frees the refresh slot while preloading is still running', async () => {
    const clock = new ManualClock()
    const pending = deferred<ScoredResult>()
    const resolve = vi.fn((_name: string) => pending.promise)
    const preloader = new NutritionPreloader({ resolver: { resolve }, clock })
    const { fetchRestaurants, coordinator, geoCache } = setup({ preloader })
    fetchRestaurants.mockImplementation(async (center) => [
      restaurant(String(center.latitude), `Chain ${center.latitude}`, true),
    ])

    for (const i of [1, 2, 3]) coordinator.triggerRefresh({ latitude: i, longitude: i })
    await vi.waitFor(() => {
      expect(coordinator.stats.active).toBe(0)
      expect(resolve).toHaveBeenCalledTimes(3)
    })

    expect(geoCache.size).toBe(3)
    expect(coordinator.triggerRefresh({ latitude: 4, longitude: 4 })).toBe(true)

    pending.resolve(unavailableResult('Chain 1', 0))
    await coordinator.drain()
    expect(resolve).toHaveBeenCalledTimes(4)
    expect(coordinator.stats.failed).toBe(0)
  })

  it('does not count a failed preload as a failed refresh', async () => {
    const clock = new ManualClock()
    const resolve = vi.fn(async (_name: string): Promise<ScoredResult> => {
      throw new Error('chain exploded')
    })
    const preloader = new NutritionPreloader({ resolver: { resolve }, clock })
    const { fetchRestaurants, coordinator, geoCache } = setup({ preloader })
    fetchRestaurants.mockResolvedValue([restaurant('1', 'Subway', true)])

    coordinator.triggerRefresh(here)
    await coordinator.drain()

    expect(resolve).toHaveBeenCalledTimes(1)
    expect(geoCache.size).toBe(1)
    expect(coordinator.stats.failed).toBe(0)
    expect(coordinator.lastError).toBeNull()
    expect(console.error).toHaveBeenCalledWith('[refresh] preload for %s failed:', expect.any(String), expect.any(Error))
  })
})
