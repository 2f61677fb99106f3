import type { CatalogEntry, CatalogTier, SourceCandidate } from '../types'
import { cleanFoodName, hasCalories, tokenize } from './food'

/** Tier order is the precedence order: every Priority entry is tried before any Generic one. */
export const TIER_ORDER: readonly CatalogTier[] = ['priority', 'generic']

export interface CatalogTierGroup {
  tier: CatalogTier
  entries: CatalogEntry[]
}

/** Immutable snapshot of one source's entries, partitioned by tier. */
export interface Catalog {
  tiers: CatalogTierGroup[]
  size: number
}

export function createCatalogEntry(rawKey: string, name: string, tier: CatalogTier, sourceId: string): CatalogEntry {
  const cleanedName = cleanFoodName(name)
  return { rawKey, cleanedName, tokens: tokenize(cleanedName), tier, sourceId }
}

export function createCatalog(entries: CatalogEntry[]): Catalog {
  const tiers = TIER_ORDER.map((tier) => ({ tier, entries: entries.filter((e) => e.tier === tier) })).filter(
    (group) => group.entries.length > 0
  )
  return { tiers, size: entries.length }
}

/** Candidates with calories already attached count as structured data. */
export function candidateTier(candidate: SourceCandidate): CatalogTier {
  return candidate.tier ?? (hasCalories(candidate.nutrients) ? 'priority' : 'generic')
}
