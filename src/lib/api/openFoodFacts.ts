import { z } from 'zod'
import type { NutrientFields, NutritionSource, SourceCandidate } from '../../types'
import { compactNutrients } from '../food'
import { fetchJson, nutrientValue } from './http'

const SEARCH_URL = 'https://world.openfoodfacts.org/api/v2/search'
const FIELDS = 'product_name,nutriments,code,id'
const PAGE_SIZE = 20

export const OPEN_FOOD_FACTS_SOURCE_ID = 'openfoodfacts'
/** Crowd-sourced products: the last fallback, capped lowest. */
export const OPEN_FOOD_FACTS_CONFIDENCE_CAP = 0.75
/** Open Food Facts asks search clients to stay around 10 requests a minute. */
export const OPEN_FOOD_FACTS_INTERVAL_MS = 6000

const num = z.number().nullish().catch(undefined)

const productSchema = z.object({
  code: z.string().optional(),
  id: z.string().optional(),
  product_name: z.string().optional(),
  nutriments: z
    .object({
      'energy-kcal_100g': num,
      carbohydrates_100g: num,
      sugars_100g: num,
      proteins_100g: num,
      fat_100g: num,
      fiber_100g: num,
      sodium_100g: num,
    })
    .optional(),
})

const searchSchema = z.object({
  products: z.array(productSchema).default([]),
})

type Product = z.infer<typeof productSchema>

export interface OpenFoodFactsOptions {
  userAgent: string
  baseUrl?: string
}

export function createOpenFoodFactsSource(options: OpenFoodFactsOptions): NutritionSource {
  const baseUrl = options.baseUrl ?? SEARCH_URL
  return {
    id: OPEN_FOOD_FACTS_SOURCE_ID,
    confidenceCap: OPEN_FOOD_FACTS_CONFIDENCE_CAP,
    rateLimitMs: OPEN_FOOD_FACTS_INTERVAL_MS,
    async search(query, searchOptions) {
      const param = searchOptions?.kind === 'category' ? 'categories_tags_en' : 'search_terms'
      const url = `${baseUrl}?${param}=${encodeURIComponent(query)}&fields=${FIELDS}&page_size=${PAGE_SIZE}`
      const data = await fetchJson(OPEN_FOOD_FACTS_SOURCE_ID, url, searchSchema, {
        headers: { 'User-Agent': options.userAgent, Accept: 'application/json' },
      })
      return data.products.flatMap(toCandidate)
    },
  }
}

function toCandidate(product: Product): SourceCandidate[] {
  const name = product.product_name?.trim()
  const id = product.code ?? product.id
  if (!name || !id) return []
  return [{ id, name, nutrients: product.nutriments ? toNutrients(product.nutriments) : undefined }]
}

/** Per-100 g values; sodium arrives in grams. */
export function toNutrients(n: NonNullable<Product['nutriments']>): NutrientFields {
  const fields: NutrientFields = {
    calories: nutrientValue(n['energy-kcal_100g']),
    carbs: nutrientValue(n.carbohydrates_100g),
    sugar: nutrientValue(n.sugars_100g),
    protein: nutrientValue(n.proteins_100g),
    fat: nutrientValue(n.fat_100g),
    fiber: nutrientValue(n.fiber_100g),
    sodium: nutrientValue(n.sodium_100g, 1000),
  }
  return compactNutrients(fields)
}
