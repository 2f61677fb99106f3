import type { CatalogEntry, CatalogTier, MatchCandidate } from '../types'
import { TIER_ORDER, type Catalog } from './catalog'
import { defaultStrategies, type MatchStrategy } from './strategies'
import { debug } from './utils/log'

/** Below this a strategy's hit is ignored. */
export const MIN_MATCH_SCORE = 0.3
/** Once the running best in a tier passes this, later strategies are skipped. */
export const EARLY_EXIT_SCORE = 0.8

const TIER_LABELS: Record<CatalogTier, string> = { priority: 'Priority', generic: 'Generic' }

export interface MatcherOptions {
  strategies?: MatchStrategy[]
  minScore?: number
  earlyExitScore?: number
}

/**
 * Multi-strategy matcher over a tiered catalog. Stateless; safe to share
 * between concurrent lookups.
 */
export class Matcher {
  private readonly strategies: MatchStrategy[]
  private readonly minScore: number
  private readonly earlyExitScore: number

  constructor(options: MatcherOptions = {}) {
    this.strategies = options.strategies ?? defaultStrategies()
    this.minScore = options.minScore ?? MIN_MATCH_SCORE
    this.earlyExitScore = options.earlyExitScore ?? EARLY_EXIT_SCORE
  }

  /**
   * Best candidate from the first tier that has one. A Priority hit at any
   * accepted score wins over every Generic entry.
   */
  findBestMatch(input: ReadonlySet<string>, catalog: Catalog): MatchCandidate | null {
    if (input.size === 0) return null
    for (const group of catalog.tiers) {
      const best = this.bestInTier(input, group.entries, group.tier)
      if (best) {
        debug('match', '%s -> %s (%s, %s)', [...input].join(' '), best.entry.rawKey, best.score.toFixed(2), best.strategyName)
        return best
      }
    }
    return null
  }

  /** Best score any strategy gives this entry, regardless of the acceptance floor. */
  scoreEntry(input: ReadonlySet<string>, entry: CatalogEntry): MatchCandidate {
    let best: MatchCandidate = { entry, score: 0, strategyName: strategyLabel(entry.tier, 'No Match') }
    for (const strategy of this.strategies) {
      const score = strategy.score(input, entry)
      if (score > best.score) best = { entry, score, strategyName: strategyLabel(entry.tier, strategy.name) }
    }
    return best
  }

  /** Accepted candidates, Priority before Generic, then by score. */
  findTopMatches(input: ReadonlySet<string>, catalog: Catalog, limit: number): MatchCandidate[] {
    if (input.size === 0 || limit <= 0) return []
    return catalog.tiers
      .flatMap((group) => group.entries.map((entry) => this.scoreEntry(input, entry)))
      .filter((c) => c.score >= this.minScore)
      .sort((a, b) => TIER_ORDER.indexOf(a.entry.tier) - TIER_ORDER.indexOf(b.entry.tier) || b.score - a.score)
      .slice(0, limit)
  }

  private bestInTier(input: ReadonlySet<string>, entries: CatalogEntry[], tier: CatalogTier): MatchCandidate | null {
    let best: MatchCandidate | null = null
    for (const strategy of this.strategies) {
      const hit = bestForStrategy(strategy, input, entries)
      if (hit && hit.score > (best?.score ?? 0) && hit.score >= this.minScore) {
        best = { entry: hit.entry, score: hit.score, strategyName: strategyLabel(tier, strategy.name) }
      }
      if (best && best.score > this.earlyExitScore) break
    }
    return best
  }
}

function bestForStrategy(
  strategy: MatchStrategy,
  input: ReadonlySet<string>,
  entries: CatalogEntry[]
): { entry: CatalogEntry; score: number } | null {
  let best: { entry: CatalogEntry; score: number } | null = null
  for (const entry of entries) {
    const score = strategy.score(input, entry)
    if (score > (best?.score ?? 0)) best = { entry, score }
  }
  return best
}

function strategyLabel(tier: CatalogTier, strategyName: string): string {
  return `${TIER_LABELS[tier]} - ${strategyName}`
}
