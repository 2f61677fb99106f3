import type { Env } from './env'
import type { NutritionSource, ScoredResult } from './types'
import { createCatalogSource, loadGenericFoods, loadMenuItems } from './lib/data/catalog'
import { RestaurantCodes } from './lib/data/restaurantCodes'
import { createUsdaSource } from './lib/api/usda'
import { createNutritionixSource } from './lib/api/nutritionix'
import { createFatSecretSource } from './lib/api/fatsecret'
import { createOpenFoodFactsSource } from './lib/api/openFoodFacts'
import { createOverpassClient, type FetchNearbyRestaurants } from './lib/api/overpass'
import { ResultCache } from './lib/cache/resultCache'
import { GeoCache } from './lib/cache/geoCache'
import { loadSnapshot, saveSnapshot, scoredResultSchema } from './lib/cache/store'
import { loadVocabulary, type Vocabulary } from './lib/food'
import { SourceFallbackChain } from './lib/lookup/chain'
import { BackgroundRefreshCoordinator } from './lib/geo/refresh'
import { NutritionPreloader } from './lib/geo/preload'
import { systemClock, type Clock } from './lib/utils/clock'

/** Bulk cleanup share for the result cache when it is full. */
const RESULT_CACHE_EVICTION_FRACTION = 0.2

/** One instance of each per process, built at startup and handed to the routes. */
export interface Services {
  env: Env
  vocab: Vocabulary
  codes: RestaurantCodes
  resultCache: ResultCache<ScoredResult>
  chain: SourceFallbackChain
  geoCache: GeoCache
  refresh: BackgroundRefreshCoordinator
}

export type AppEnv = { Variables: { services: Services } }

export interface ServiceOverrides {
  clock?: Clock
  sources?: NutritionSource[]
  fetchRestaurants?: FetchNearbyRestaurants
}

/** Local catalog first, then remote sources from most to least trusted. Optional ones need credentials. */
export function createSources(env: Env, codes: RestaurantCodes, clock: Clock = systemClock): NutritionSource[] {
  const sources: NutritionSource[] = [
    createCatalogSource({ codes, menu: loadMenuItems(), genericFoods: loadGenericFoods() }),
    createUsdaSource({ apiKey: env.FDC_API_KEY }),
  ]
  if (env.NUTRITIONIX_APP_ID && env.NUTRITIONIX_API_KEY) {
    sources.push(createNutritionixSource({ appId: env.NUTRITIONIX_APP_ID, apiKey: env.NUTRITIONIX_API_KEY }))
  }
  if (env.FATSECRET_CLIENT_ID && env.FATSECRET_CLIENT_SECRET) {
    sources.push(
      createFatSecretSource({ clientId: env.FATSECRET_CLIENT_ID, clientSecret: env.FATSECRET_CLIENT_SECRET, clock })
    )
  }
  sources.push(createOpenFoodFactsSource({ userAgent: env.OFF_USER_AGENT }))
  return sources
}

export function createServices(env: Env, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock
  const vocab = loadVocabulary()
  const codes = RestaurantCodes.load()
  const resultCache = new ResultCache<ScoredResult>({
    ttlMs: env.RESULT_CACHE_TTL_MS,
    capacity: env.RESULT_CACHE_CAPACITY,
    evictionFraction: RESULT_CACHE_EVICTION_FRACTION,
    clock,
  })
  const chain = new SourceFallbackChain({
    sources: overrides.sources ?? createSources(env, codes, clock),
    cache: resultCache,
    clock,
    vocab,
  })
  const geoCache = new GeoCache({ ttlMs: env.GEO_CACHE_TTL_MS, capacity: env.GEO_CACHE_CAPACITY, clock })
  const refresh = new BackgroundRefreshCoordinator({
    geoCache,
    fetchRestaurants: overrides.fetchRestaurants ?? createOverpassClient({ codes, urls: env.OVERPASS_URLS, clock }),
    radiusMiles: env.GEO_RADIUS_MILES,
    staleMs: env.GEO_STALE_MS,
    maxTasks: env.MAX_BACKGROUND_TASKS,
    refreshDelayMs: env.REFRESH_DELAY_MS,
    preloader: new NutritionPreloader({ resolver: chain, clock }),
    clock,
  })
  return { env, vocab, codes, resultCache, chain, geoCache, refresh }
}

/** Restore the result cache from RESULT_CACHE_FILE. Returns the number of entries admitted. */
export async function restoreResultCache(services: Services): Promise<number> {
  const path = services.env.RESULT_CACHE_FILE
  if (!path) return 0
  const records = await loadSnapshot(path, scoredResultSchema)
  return services.resultCache.restore(records)
}

/** Write the result cache to RESULT_CACHE_FILE. Null when no file is configured. */
export async function saveResultCache(services: Services): Promise<number | null> {
  const path = services.env.RESULT_CACHE_FILE
  if (!path) return null
  const records = services.resultCache.snapshot()
  await saveSnapshot(path, records)
  return records.length
}
