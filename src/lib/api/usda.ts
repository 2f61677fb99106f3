import { z } from 'zod'
import type { NutrientFields, NutrientKey, NutritionSource } from '../../types'
import { compactNutrients } from '../food'
import { fetchJson, nutrientValue } from './http'

const BASE_URL = 'https://api.nal.usda.gov/fdc/v1'
const DATA_TYPES = 'Foundation,SR Legacy'
const PAGE_SIZE = 10

export const USDA_SOURCE_ID = 'usda'
export const USDA_CONFIDENCE_CAP = 0.85
export const USDA_INTERVAL_MS = 1000
/** Ranges are built from the top three matches. */
export const USDA_RANGE_SIZE = 3

/** FoodData Central nutrient numbers. */
const NUTRIENT_NUMBERS: Record<string, NutrientKey> = {
  '208': 'calories',
  '205': 'carbs',
  '203': 'protein',
  '204': 'fat',
  '291': 'fiber',
  '269': 'sugar',
  '307': 'sodium',
}

const searchSchema = z.object({
  foods: z
    .array(
      z.object({
        fdcId: z.number(),
        description: z.string(),
        foodNutrients: z
          .array(z.object({ nutrientNumber: z.string().optional(), value: z.number().optional() }))
          .default([]),
      })
    )
    .default([]),
})

const detailsSchema = z.object({
  foodNutrients: z
    .array(
      z.object({
        nutrient: z.object({ number: z.string().optional() }).optional(),
        amount: z.number().optional(),
      })
    )
    .default([]),
})

export interface UsdaOptions {
  apiKey: string
  baseUrl?: string
}

export function createUsdaSource(options: UsdaOptions): NutritionSource {
  const baseUrl = options.baseUrl ?? BASE_URL
  const key = encodeURIComponent(options.apiKey)
  return {
    id: USDA_SOURCE_ID,
    confidenceCap: USDA_CONFIDENCE_CAP,
    rateLimitMs: USDA_INTERVAL_MS,
    rangeSize: USDA_RANGE_SIZE,
    async search(query, searchOptions) {
      // FDC has no category endpoint
      if (searchOptions?.kind === 'category') return []
      const url =
        `${baseUrl}/foods/search?query=${encodeURIComponent(query)}` +
        `&dataType=${encodeURIComponent(DATA_TYPES)}&pageSize=${PAGE_SIZE}&api_key=${key}`
      const data = await fetchJson(USDA_SOURCE_ID, url, searchSchema)
      return data.foods.map((food) => ({
        id: String(food.fdcId),
        name: food.description,
        nutrients: collect(food.foodNutrients.map((n) => [n.nutrientNumber, n.value])),
      }))
    },
    async fetchDetails(id) {
      const url = `${baseUrl}/food/${encodeURIComponent(id)}?api_key=${key}`
      const data = await fetchJson(USDA_SOURCE_ID, url, detailsSchema)
      const fields = collect(data.foodNutrients.map((n) => [n.nutrient?.number, n.amount]))
      return Object.keys(fields).length > 0 ? fields : null
    },
  }
}

function collect(pairs: Array<[string | undefined, number | undefined]>): NutrientFields {
  const fields: NutrientFields = {}
  for (const [number, value] of pairs) {
    const key = number ? NUTRIENT_NUMBERS[number] : undefined
    if (!key || fields[key] !== undefined) continue
    fields[key] = nutrientValue(value)
  }
  return compactNutrients(fields)
}
