import { describe, it, expect } from 'vitest'
import { ResultCache } from './resultCache'
import { ManualClock } from '../../test/manualClock'

function makeCache(options: { capacity?: number; ttlMs?: number; evictionFraction?: number } = {}) {
  const clock = new ManualClock(0)
  const cache = new ResultCache<{ calories: number }>({
    ttlMs: options.ttlMs ?? 1000,
    capacity: options.capacity ?? 10,
    evictionFraction: options.evictionFraction,
    clock,
  })
  return { clock, cache }
}

describe('ResultCache', () => {
  it('hides an entry once its TTL has elapsed', () => {
    const { clock, cache } = makeCache({ ttlMs: 1000 })
    cache.put('rice', { calories: 130 })
    clock.advance(999)
    expect(cache.get('rice')).toEqual({ calories: 130 })
    clock.advance(1)
    expect(cache.get('rice')).toBeUndefined()
    expect(cache.size).toBe(0)
  })

  it('evicts the least recently accessed fifth when full', () => {
    const { clock, cache } = makeCache({ capacity: 50, ttlMs: 60_000, evictionFraction: 0.2 })
    for (let i = 0; i < 50; i++) {
      cache.put(`k${i}`, { calories: i })
      clock.advance(1)
    }
    clock.advance(100)
    cache.get('k0')
    cache.get('k1')

    cache.put('k50', { calories: 50 })

    expect(cache.size).toBe(41)
    expect(cache.stats().evictions).toBe(10)
    expect(cache.get('k0')).toEqual({ calories: 0 })
    expect(cache.get('k1')).toEqual({ calories: 1 })
    for (let i = 2; i <= 11; i++) expect(cache.get(`k${i}`)).toBeUndefined()
    expect(cache.get('k12')).toEqual({ calories: 12 })
    expect(cache.get('k50')).toEqual({ calories: 50 })
  })

  it('evicts only the single oldest entry by default', () => {
    const { clock, cache } = makeCache({ capacity: 2 })
    cache.put('a', { calories: 1 })
    clock.advance(10)
    cache.put('b', { calories: 2 })
    clock.advance(10)
    cache.get('a')
    cache.put('c', { calories: 3 })
    expect(cache.size).toBe(2)
    expect(cache.get('b')).toBeUndefined()
    expect(cache.get('a')).toEqual({ calories: 1 })
  })

  it('replaces an existing key without evicting', () => {
    const { cache } = makeCache({ capacity: 2 })
    cache.put('a', { calories: 1 })
    cache.put('b', { calories: 2 })
    cache.put('a', { calories: 10 })
    expect(cache.size).toBe(2)
    expect(cache.get('a')).toEqual({ calories: 10 })
    expect(cache.get('b')).toEqual({ calories: 2 })
  })

  it('hands out copies, never its own entries', () => {
    const { cache } = makeCache()
    const value = { calories: 100 }
    cache.put('soup', value)
    value.calories = 1
    const read = cache.get('soup')
    expect(read).toEqual({ calories: 100 })
    read!.calories = 2
    expect(cache.get('soup')).toEqual({ calories: 100 })
  })

  it('counts hits and misses', () => {
    const { cache } = makeCache()
    cache.put('a', { calories: 1 })
    cache.get('a')
    cache.get('missing')
    expect(cache.stats()).toEqual({ size: 1, capacity: 10, hits: 1, misses: 1, evictions: 0 })
  })

  it('counts a multi-key lookup once', () => {
    const { clock, cache } = makeCache({ ttlMs: 100 })
    cache.put('stale', { calories: 1 })
    clock.advance(100)
    cache.put('b', { calories: 2 })

    expect(cache.getFirst(['a', 'stale', 'b'])).toEqual({ key: 'b', value: { calories: 2 } })
    expect(cache.getFirst(['a', 'c'])).toBeUndefined()
    expect(cache.stats()).toEqual({ size: 1, capacity: 10, hits: 1, misses: 1, evictions: 0 })
  })

  it('purges expired entries on demand', () => {
    const { clock, cache } = makeCache({ ttlMs: 100 })
    cache.put('old', { calories: 1 })
    clock.advance(60)
    cache.put('new', { calories: 2 })
    clock.advance(50)
    expect(cache.purgeExpired()).toBe(1)
    expect(cache.size).toBe(1)
  })
})

describe('ResultCache snapshot/restore', () => {
  it('round-trips live entries with their timestamps', () => {
    const { clock, cache } = makeCache({ ttlMs: 1000 })
    clock.advance(5000)
    cache.put('x', { calories: 1 })
    const records = cache.snapshot()
    expect(records).toEqual([{ key: 'x', value: { calories: 1 }, timestamp: 5000 }])

    const target = makeCache({ ttlMs: 1000 })
    target.clock.advance(5500)
    expect(target.cache.restore(records)).toBe(1)
    expect(target.cache.get('x')).toEqual({ calories: 1 })
    target.clock.advance(500)
    expect(target.cache.get('x')).toBeUndefined()
  })

  it('drops records that are already past their TTL', () => {
    const { clock, cache } = makeCache({ ttlMs: 1000 })
    clock.advance(5000)
    const restored = cache.restore([
      { key: 'stale', value: { calories: 1 }, timestamp: 4000 },
      { key: 'fresh', value: { calories: 2 }, timestamp: 4500 },
    ])
    expect(restored).toBe(1)
    expect(cache.get('stale')).toBeUndefined()
    expect(cache.get('fresh')).toEqual({ calories: 2 })
  })

  it('does not overwrite a newer live entry', () => {
    const { clock, cache } = makeCache({ ttlMs: 1000 })
    clock.advance(5500)
    cache.put('x', { calories: 99 })
    expect(cache.restore([{ key: 'x', value: { calories: 1 }, timestamp: 5000 }])).toBe(0)
    expect(cache.get('x')).toEqual({ calories: 99 })
  })
})
