import type { NutrientFields, NutrientKey, NutrientRange, NutritionEstimate } from '../../types'

export const NUTRIENT_UNITS: Record<NutrientKey, NutrientRange['unit']> = {
  calories: 'kcal',
  protein: 'g',
  carbs: 'g',
  fat: 'g',
  sugar: 'g',
  fiber: 'g',
  sodium: 'mg',
}

const NUTRIENT_KEYS: NutrientKey[] = ['calories', 'protein', 'carbs', 'fat', 'sugar', 'fiber', 'sodium']

/** No nutrients, completeness 0. A new object on every call. */
export function emptyNutrition(): NutritionEstimate {
  return { nutrients: {}, completenessScore: 0, matchCount: 0 }
}

export function hasCalories(fields: NutrientFields | null | undefined): boolean {
  return (fields?.calories ?? 0) > 0
}

/** Copy without undefined values. */
export function compactNutrients(fields: NutrientFields): NutrientFields {
  const out: NutrientFields = {}
  for (const key of NUTRIENT_KEYS) {
    const value = fields[key]
    if (value !== undefined) out[key] = value
  }
  return out
}

/** Present fields out of seven. Calories only count when positive. */
export function completeness(fields: NutrientFields): number {
  let present = 0
  for (const key of NUTRIENT_KEYS) {
    const value = fields[key]
    if (value === undefined || !Number.isFinite(value)) continue
    if (key === 'calories' && value <= 0) continue
    present++
  }
  return present / NUTRIENT_KEYS.length
}

/**
 * Min/max per nutrient across the given records. A single record gives point
 * values (min === max). Negative values are clamped to 0.
 */
export function buildNutritionEstimate(records: NutrientFields[]): NutritionEstimate {
  if (records.length === 0) return emptyNutrition()
  const nutrients: NutritionEstimate['nutrients'] = {}
  for (const key of NUTRIENT_KEYS) {
    const values = records
      .map((r) => r[key])
      .filter((v): v is number => v !== undefined && Number.isFinite(v))
      .map((v) => Math.max(0, v))
    if (values.length === 0) continue
    nutrients[key] = { min: Math.min(...values), max: Math.max(...values), unit: NUTRIENT_UNITS[key] }
  }
  const completenessScore = records.reduce((sum, r) => sum + completeness(r), 0) / records.length
  return { nutrients, completenessScore, matchCount: records.length }
}
