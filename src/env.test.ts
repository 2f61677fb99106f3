import { describe, it, expect } from 'vitest'
import { loadEnv } from './env'

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({})
    expect(env.PORT).toBe(3000)
    expect(env.DEBUG).toBe(false)
    expect(env.FDC_API_KEY).toBe('DEMO_KEY')
    expect(env.RESULT_CACHE_TTL_MS).toBe(86_400_000)
    expect(env.GEO_STALE_MS).toBe(900_000)
    expect(env.MAX_BACKGROUND_TASKS).toBe(3)
    expect(env.OVERPASS_URLS).toEqual([])
    expect(env.ADMIN_SECRET).toBeUndefined()
  })

  it('coerces numbers, flags and lists', () => {
    const env = loadEnv({
      PORT: '8080',
      DEBUG: 'true',
      GEO_RADIUS_MILES: '2.5',
      OVERPASS_URLS: 'https://a.test/api, https://b.test/api,',
      ADMIN_SECRET: 'test-secret',
    })
    expect(env.PORT).toBe(8080)
    expect(env.DEBUG).toBe(true)
    expect(env.GEO_RADIUS_MILES).toBe(2.5)
    expect(env.OVERPASS_URLS).toEqual(['https://a.test/api', 'https://b.test/api'])
    expect(env.ADMIN_SECRET).toBe('test-secret')
  })

  it('treats empty strings as unset', () => {
    const env = loadEnv({ PORT: '', NUTRITIONIX_APP_ID: ' ' })
    expect(env.PORT).toBe(3000)
    expect(env.NUTRITIONIX_APP_ID).toBeUndefined()
  })

  it('lists every invalid variable', () => {
    expect(() => loadEnv({ PORT: 'abc', GEO_CACHE_CAPACITY: '-1' })).toThrow(
      /^Invalid environment: PORT: .+; GEO_CACHE_CAPACITY: .+$/
    )
  })
})
