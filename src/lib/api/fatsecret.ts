import { z } from 'zod'
import type { NutrientFields, NutritionSource, SourceCandidate } from '../../types'
import { systemClock, type Clock } from '../utils/clock'
import { compactNutrients } from '../food'
import { fetchJson, nutrientValue } from './http'

const TOKEN_URL = 'https://oauth.fatsecret.com/connect/token'
const SEARCH_URL = 'https://platform.fatsecret.com/rest/foods/search/v1'
const MAX_RESULTS = 10
// refresh a minute before the token actually expires
const TOKEN_MARGIN_MS = 60_000

export const FATSECRET_SOURCE_ID = 'fatsecret'
export const FATSECRET_CONFIDENCE_CAP = 0.8
export const FATSECRET_INTERVAL_MS = 1000

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().default(3600),
})

const foodSchema = z.object({
  food_id: z.union([z.string(), z.number()]).optional(),
  food_name: z.string().optional(),
  brand_name: z.string().optional(),
  food_description: z.string().optional(),
})

const searchSchema = z.object({
  foods: z
    .object({ food: z.union([foodSchema, z.array(foodSchema)]).optional() })
    .optional(),
})

type FatSecretFood = z.infer<typeof foodSchema>

export interface ParsedDescription {
  quantity: number
  unit: string
  nutrients: NutrientFields
}

// Parse "Per 100g - Calories: 22kcal | Fat: 0.34g | Carbs: 3.28g | Protein: 3.09g" or "Per 1 serving - ..."
export function parseFoodDescription(desc: string): ParsedDescription | null {
  const perMatch = desc.match(/Per\s+([\d./]+)\s*([a-z]+)\s*-/i)
  const calMatch = desc.match(/Calories:\s*([\d.]+)\s*kcal/i)
  if (!calMatch) return null
  const quantity = perMatch ? parseFloat(perMatch[1].replace('/', '.')) || 1 : 1
  const unit = (perMatch?.[2] ?? 'serving').toLowerCase().replace(/s$/, '') // "grams" -> "gram"
  return {
    quantity,
    unit: unit === 'gram' ? 'g' : unit,
    nutrients: compactNutrients({
      calories: parseFloat(calMatch[1]) || 0,
      fat: grams(desc, 'Fat'),
      carbs: grams(desc, 'Carbs'),
      protein: grams(desc, 'Protein'),
    }),
  }
}

function grams(desc: string, label: string): number | undefined {
  const m = desc.match(new RegExp(`${label}:\\s*([\\d.]+)\\s*g`, 'i'))
  return m ? parseFloat(m[1]) : undefined
}

/** Per-100 g when the description is by weight, otherwise per serving as given. */
function toNutrients(parsed: ParsedDescription): NutrientFields {
  if (parsed.unit !== 'g' || parsed.quantity <= 0) return parsed.nutrients
  const scale = 100 / parsed.quantity
  const out: NutrientFields = {}
  for (const [key, value] of Object.entries(parsed.nutrients)) {
    if (key === 'calories' || key === 'fat' || key === 'carbs' || key === 'protein') {
      out[key] = nutrientValue(value, scale)
    }
  }
  return compactNutrients(out)
}

export interface FatSecretOptions {
  clientId: string
  clientSecret: string
  clock?: Clock
}

export function createFatSecretSource(options: FatSecretOptions): NutritionSource {
  const clock = options.clock ?? systemClock
  let token: { value: string; expiresAt: number } | null = null

  async function getAccessToken(): Promise<string> {
    if (token && clock.now() < token.expiresAt) return token.value
    const data = await fetchJson(FATSECRET_SOURCE_ID, TOKEN_URL, tokenSchema, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        scope: 'basic',
        client_id: options.clientId,
        client_secret: options.clientSecret,
      }),
    })
    token = { value: data.access_token, expiresAt: clock.now() + data.expires_in * 1000 - TOKEN_MARGIN_MS }
    return token.value
  }

  return {
    id: FATSECRET_SOURCE_ID,
    confidenceCap: FATSECRET_CONFIDENCE_CAP,
    rateLimitMs: FATSECRET_INTERVAL_MS,
    async search(query, searchOptions) {
      if (searchOptions?.kind === 'category') return []
      const accessToken = await getAccessToken()
      const url = `${SEARCH_URL}?search_expression=${encodeURIComponent(query)}&format=json&max_results=${MAX_RESULTS}`
      const data = await fetchJson(FATSECRET_SOURCE_ID, url, searchSchema, {
        headers: { Authorization: `Bearer ${accessToken}` },
      })
      const foodObj = data.foods?.food
      const foods: FatSecretFood[] = Array.isArray(foodObj) ? foodObj : foodObj ? [foodObj] : []
      return foods.flatMap(toCandidate)
    },
  }
}

function toCandidate(food: FatSecretFood): SourceCandidate[] {
  if (!food.food_name || food.food_id === undefined) return []
  const parsed = food.food_description ? parseFoodDescription(food.food_description) : null
  const name = food.brand_name ? `${food.brand_name} ${food.food_name}` : food.food_name
  return [{ id: String(food.food_id), name, nutrients: parsed ? toNutrients(parsed) : undefined }]
}
