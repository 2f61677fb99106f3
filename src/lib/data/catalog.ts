import { z } from 'zod'
import type { NutritionSource, SourceCandidate } from '../../types'
import { tokenize } from '../food'
import { readDataFile } from './files'
import type { RestaurantCodes } from './restaurantCodes'

export const RESTAURANT_CATALOG_SOURCE_ID = 'restaurant-catalog'

const nutrientFieldsSchema = z.object({
  calories: z.number().optional(),
  protein: z.number().optional(),
  carbs: z.number().optional(),
  fat: z.number().optional(),
  sugar: z.number().optional(),
  fiber: z.number().optional(),
  sodium: z.number().optional(),
})

const menuItemSchema = z.object({
  code: z.string().regex(/^R\d{4}$/),
  item: z.string().min(1),
  nutrients: nutrientFieldsSchema,
})

const genericFoodSchema = z.object({
  key: z.string().min(1),
  name: z.string().optional(),
  nutrients: nutrientFieldsSchema,
})

/** One dish from a chain's structured nutrition dataset, per serving. */
export type MenuItem = z.infer<typeof menuItemSchema>
/** Reference food with per-100 g values. */
export type GenericFood = z.infer<typeof genericFoodSchema>

export function loadMenuItems(): MenuItem[] {
  return readDataFile('restaurant-menu.json', z.array(menuItemSchema))
}

export function loadGenericFoods(): GenericFood[] {
  return readDataFile('generic-foods.json', z.array(genericFoodSchema))
}

export interface CatalogSourceOptions {
  codes: RestaurantCodes
  menu: MenuItem[]
  genericFoods: GenericFood[]
}

/**
 * Local catalog: chain menu items (Priority) and reference foods (Generic).
 * Search returns entries sharing a word with the query; the matcher ranks them.
 */
export function createCatalogSource({ codes, menu, genericFoods }: CatalogSourceOptions): NutritionSource {
  const candidates: Array<{ candidate: SourceCandidate; tokens: Set<string> }> = []
  for (const item of menu) {
    const restaurant = codes.nameFor(item.code)
    if (!restaurant) continue
    const name = `${restaurant} ${item.item}`
    candidates.push({
      candidate: { id: `${item.code}_${slug(item.item)}`, name, nutrients: item.nutrients, tier: 'priority' },
      tokens: tokenize(name),
    })
  }
  for (const food of genericFoods) {
    const name = food.name ?? food.key
    candidates.push({
      candidate: { id: food.key, name, nutrients: food.nutrients, tier: 'generic' },
      tokens: tokenize(name),
    })
  }

  return {
    id: RESTAURANT_CATALOG_SOURCE_ID,
    confidenceCap: 1,
    rateLimitMs: 0,
    async search(query, options) {
      if (options?.kind === 'category') return []
      const wanted = tokenize(query)
      return candidates.filter(({ tokens }) => sharesWord(wanted, tokens)).map(({ candidate }) => candidate)
    },
  }
}

function sharesWord(wanted: ReadonlySet<string>, tokens: ReadonlySet<string>): boolean {
  for (const w of wanted) {
    for (const t of tokens) {
      if (w === t) return true
      if (w.length >= 4 && t.length >= 4 && (w.includes(t) || t.includes(w))) return true
    }
  }
  return false
}

function slug(s: string): string {
  return s.toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_|_$/g, '')
}
