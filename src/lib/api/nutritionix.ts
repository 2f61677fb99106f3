import { z } from 'zod'
import type { NutrientFields, NutritionSource, SourceCandidate } from '../../types'
import { compactNutrients } from '../food'
import { fetchJson, nutrientValue } from './http'

const NUTRITIONIX_URL = 'https://trackapi.nutritionix.com/v2/search/instant'

export const NUTRITIONIX_SOURCE_ID = 'nutritionix'
export const NUTRITIONIX_CONFIDENCE_CAP = 0.85
export const NUTRITIONIX_INTERVAL_MS = 1000

/** attr_id values in `full_nutrients`. */
const ATTR_IDS: Record<number, keyof NutrientFields> = {
  208: 'calories',
  203: 'protein',
  204: 'fat',
  205: 'carbs',
  269: 'sugar',
  291: 'fiber',
  307: 'sodium',
}

const itemSchema = z.object({
  food_name: z.string(),
  tag_id: z.union([z.string(), z.number()]).optional(),
  nix_item_id: z.string().optional(),
  brand_name: z.string().optional(),
  serving_weight_grams: z.number().nullish(),
  nf_calories: z.number().nullish(),
  nf_protein: z.number().nullish(),
  nf_total_fat: z.number().nullish(),
  nf_total_carbohydrate: z.number().nullish(),
  nf_sugars: z.number().nullish(),
  nf_dietary_fiber: z.number().nullish(),
  nf_sodium: z.number().nullish(),
  full_nutrients: z.array(z.object({ attr_id: z.number(), value: z.number() })).optional(),
})

const instantSchema = z.object({
  common: z.array(itemSchema).default([]),
  branded: z.array(itemSchema).default([]),
})

type InstantItem = z.infer<typeof itemSchema>

export interface NutritionixOptions {
  appId: string
  apiKey: string
}

export function createNutritionixSource(options: NutritionixOptions): NutritionSource {
  return {
    id: NUTRITIONIX_SOURCE_ID,
    confidenceCap: NUTRITIONIX_CONFIDENCE_CAP,
    rateLimitMs: NUTRITIONIX_INTERVAL_MS,
    async search(query, searchOptions) {
      if (searchOptions?.kind === 'category') return []
      const url = `${NUTRITIONIX_URL}?query=${encodeURIComponent(query)}&detailed=true`
      const data = await fetchJson(NUTRITIONIX_SOURCE_ID, url, instantSchema, {
        headers: {
          'x-app-id': options.appId,
          'x-app-key': options.apiKey,
          'Content-Type': 'application/json',
        },
      })
      return [...data.common, ...data.branded].map(toCandidate)
    },
  }
}

function toCandidate(item: InstantItem, index: number): SourceCandidate {
  const name = item.brand_name ? `${item.brand_name} ${item.food_name}` : item.food_name
  const id = item.nix_item_id ?? (item.tag_id !== undefined ? `tag_${item.tag_id}` : `item_${index}`)
  return { id, name, nutrients: itemNutrients(item) }
}

/** Scaled to 100 g when the serving weight is known, otherwise per serving. */
export function itemNutrients(item: InstantItem): NutrientFields {
  const weight = item.serving_weight_grams ?? 0
  const scale = weight > 0 ? 100 / weight : 1
  const fields: NutrientFields = {
    calories: nutrientValue(item.nf_calories, scale),
    protein: nutrientValue(item.nf_protein, scale),
    fat: nutrientValue(item.nf_total_fat, scale),
    carbs: nutrientValue(item.nf_total_carbohydrate, scale),
    sugar: nutrientValue(item.nf_sugars, scale),
    fiber: nutrientValue(item.nf_dietary_fiber, scale),
    sodium: nutrientValue(item.nf_sodium, scale),
  }
  for (const { attr_id, value } of item.full_nutrients ?? []) {
    const key = ATTR_IDS[attr_id]
    if (key && fields[key] === undefined) fields[key] = nutrientValue(value, scale)
  }
  return compactNutrients(fields)
}
