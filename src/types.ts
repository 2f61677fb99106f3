/** Catalog partition. Priority entries carry structured nutrition data and outrank Generic ones. */
export type CatalogTier = 'priority' | 'generic'

/** Normalizer output for one raw menu-item name. */
export interface CoreFoodTerms {
  primaryFood: string
  /** Cooking methods, in vocabulary order. */
  modifiers: string[]
  accompaniments: string[]
  /** Prices, numbers and noise words stripped from the input, for diagnostics. */
  removedText: string[]
  /** Lower-cased text after price and noise removal, modifiers still in place. */
  cleanedText: string
  confidence: number
}

export interface CatalogEntry {
  rawKey: string
  cleanedName: string
  tokens: ReadonlySet<string>
  tier: CatalogTier
  sourceId: string
}

export interface MatchCandidate {
  entry: CatalogEntry
  score: number
  strategyName: string
}

export type NutrientKey = 'calories' | 'protein' | 'carbs' | 'fat' | 'sugar' | 'fiber' | 'sodium'

/** Raw values from a source: kcal for calories, mg for sodium, grams otherwise. */
export type NutrientFields = Partial<Record<NutrientKey, number>>

export interface NutrientRange {
  min: number
  max: number
  unit: 'kcal' | 'g' | 'mg'
}

export interface NutritionEstimate {
  nutrients: Partial<Record<NutrientKey, NutrientRange>>
  /** Fraction of the seven expected nutrient fields present, averaged over contributing records. */
  completenessScore: number
  /** Number of catalog records the ranges were built from. */
  matchCount: number
}

export interface ScoredResult {
  originalInput: string
  cleanedQuery: string
  matchedKey: string
  matchedName: string
  sourceId: string
  nutrition: NutritionEstimate
  matchScore: number
  confidence: number
  isAvailable: boolean
  /** Epoch milliseconds. */
  timestamp: number
}

export type QueryKind = 'text' | 'category'

/** One search hit from a nutrition source. */
export interface SourceCandidate {
  id: string
  name: string
  nutrients?: NutrientFields
  /** Overrides the default tiering (Priority when the candidate already has calories). */
  tier?: CatalogTier
}

export interface NutritionSource {
  id: string
  /** Upper bound on the confidence of results from this source. 1 means uncapped. */
  confidenceCap: number
  /** Minimum spacing between calls to this source. */
  rateLimitMs: number
  /** How many top candidates contribute to the nutrient ranges. Defaults to 1. */
  rangeSize?: number
  search(query: string, options?: { kind: QueryKind }): Promise<SourceCandidate[]>
  fetchDetails?(id: string): Promise<NutrientFields | null>
}

export interface GeoPoint {
  latitude: number
  longitude: number
}

export interface Restaurant {
  id: string
  name: string
  latitude: number
  longitude: number
  amenity: string
  cuisine?: string
  /** R-code of the chain when the name maps to one. */
  restaurantCode?: string
  hasNutritionData: boolean
}
