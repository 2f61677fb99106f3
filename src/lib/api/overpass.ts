import { z } from 'zod'
import type { GeoPoint, Restaurant } from '../../types'
import type { RestaurantCodes } from '../data/restaurantCodes'
import { SourceError } from '../lookup/errors'
import { systemClock, type Clock } from '../utils/clock'
import { RateLimiter } from '../utils/rateLimiter'
import { fetchJson } from './http'

export const OVERPASS_SOURCE_ID = 'overpass'
export const DEFAULT_OVERPASS_URLS = [
  'https://overpass-api.de/api/interpreter',
  'https://maps.mail.ru/osm/tools/overpass/api/interpreter',
  'https://overpass.kumi.systems/api/interpreter',
]
export const OVERPASS_INTERVAL_MS = 1500
export const METERS_PER_MILE = 1609.34

const elementSchema = z.object({
  type: z.string(),
  id: z.number(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  tags: z.record(z.string()).optional(),
})

const responseSchema = z.object({
  elements: z.array(elementSchema).default([]),
})

type OverpassElement = z.infer<typeof elementSchema>

export function buildOverpassQuery(center: GeoPoint, radiusMiles: number): string {
  const around = `(around:${Math.round(radiusMiles * METERS_PER_MILE)},${center.latitude},${center.longitude})`
  return [
    '[out:json][timeout:20];',
    '(',
    `  node["amenity"="fast_food"]["name"]${around};`,
    `  node["amenity"="restaurant"]["name"]${around};`,
    ');',
    'out body;',
  ].join('\n')
}

export interface OverpassOptions {
  codes: RestaurantCodes
  urls?: string[]
  clock?: Clock
}

export type FetchNearbyRestaurants = (center: GeoPoint, radiusMiles: number) => Promise<Restaurant[]>

/**
 * Restaurant discovery against the Overpass API. Mirrors are tried in order;
 * the last mirror's error is thrown when all of them fail.
 */
export function createOverpassClient(options: OverpassOptions): FetchNearbyRestaurants {
  const urls = options.urls && options.urls.length > 0 ? options.urls : DEFAULT_OVERPASS_URLS
  const limiter = new RateLimiter(OVERPASS_INTERVAL_MS, options.clock ?? systemClock, OVERPASS_SOURCE_ID)

  return async (center, radiusMiles) => {
    const query = buildOverpassQuery(center, radiusMiles)
    let lastError: unknown = new SourceError('transient', OVERPASS_SOURCE_ID, 'no mirrors configured')
    for (const url of urls) {
      await limiter.wait()
      try {
        const data = await fetchJson(OVERPASS_SOURCE_ID, url, responseSchema, {
          method: 'POST',
          headers: { 'Content-Type': 'text/plain' },
          body: query,
        })
        return toRestaurants(data.elements, options.codes)
      } catch (e) {
        console.warn('[overpass] %s failed: %s', url, e instanceof Error ? e.message : String(e))
        lastError = e
      }
    }
    throw lastError
  }
}

function toRestaurants(elements: OverpassElement[], codes: RestaurantCodes): Restaurant[] {
  const seen = new Set<string>()
  const out: Restaurant[] = []
  for (const el of elements) {
    const name = el.tags?.name?.trim()
    if (el.type !== 'node' || el.lat === undefined || el.lon === undefined || !name) continue
    const id = String(el.id)
    if (seen.has(id)) continue
    seen.add(id)
    const restaurantCode = codes.codeFor(name)
    out.push({
      id,
      name,
      latitude: el.lat,
      longitude: el.lon,
      amenity: el.tags?.amenity ?? 'restaurant',
      cuisine: el.tags?.cuisine,
      restaurantCode,
      hasNutritionData: restaurantCode !== undefined,
    })
  }
  return out
}
