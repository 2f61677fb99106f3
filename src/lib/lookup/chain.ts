import type { CatalogEntry, CoreFoodTerms, MatchCandidate, NutrientFields, NutritionSource, ScoredResult, SourceCandidate } from '../../types'
import { TIER_ORDER, candidateTier, createCatalog, createCatalogEntry, type Catalog } from '../catalog'
import { isAcceptable, isHighConfidence, scoreConfidence } from '../confidence'
import { Matcher } from '../match'
import type { ResultCache } from '../cache/resultCache'
import {
  buildNutritionEstimate,
  createIngredientCacheKey,
  emptyNutrition,
  extractCoreFoodTerms,
  hasCalories,
  isPlausibleFood,
  loadVocabulary,
  sortedJoin,
  tokenize,
  type Vocabulary,
} from '../food'
import { systemClock, type Clock } from '../utils/clock'
import { debug } from '../utils/log'
import { RateLimiter } from '../utils/rateLimiter'
import { logFailure, toLookupFailure } from './errors'
import { buildSearchQueries, DEFAULT_MAX_QUERIES } from './queries'

/** A query whose first candidates score above this on average ends query generation. */
export const QUERY_QUALITY_THRESHOLD = 0.7
const QUALITY_SAMPLE_SIZE = 5

export interface SourceFallbackChainOptions {
  /** Tried strictly in this order. */
  sources: NutritionSource[]
  cache: ResultCache<ScoredResult>
  matcher?: Matcher
  clock?: Clock
  vocab?: Vocabulary
  maxQueries?: number
}

interface SourceSlot {
  source: NutritionSource
  limiter: RateLimiter
}

interface SourceMatch {
  match: MatchCandidate
  catalog: Catalog
  candidates: Map<string, SourceCandidate>
}

interface PreparedInput {
  rawName: string
  terms: CoreFoodTerms
  tokens: Set<string>
  cleanedQuery: string
  cacheKey: string
}

/** The uniform miss: no nutrients, zero confidence. */
export function unavailableResult(originalInput: string, timestamp: number, cleanedQuery = ''): ScoredResult {
  return {
    originalInput,
    cleanedQuery,
    matchedKey: '',
    matchedName: '',
    sourceId: '',
    nutrition: emptyNutrition(),
    matchScore: 0,
    confidence: 0,
    isAvailable: false,
    timestamp,
  }
}

/**
 * Resolves a menu-item name against an ordered list of nutrition sources.
 * The first source to produce an acceptable result wins; failures at one
 * source move on to the next. Callers always get a ScoredResult back.
 */
export class SourceFallbackChain {
  private readonly slots: SourceSlot[]
  private readonly cache: ResultCache<ScoredResult>
  private readonly matcher: Matcher
  private readonly clock: Clock
  private readonly vocab: Vocabulary
  private readonly maxQueries: number

  constructor(options: SourceFallbackChainOptions) {
    this.clock = options.clock ?? systemClock
    this.slots = options.sources.map((source) => ({
      source,
      limiter: new RateLimiter(source.rateLimitMs, this.clock, source.id),
    }))
    this.cache = options.cache
    this.matcher = options.matcher ?? new Matcher()
    this.vocab = options.vocab ?? loadVocabulary()
    this.maxQueries = options.maxQueries ?? DEFAULT_MAX_QUERIES
  }

  get sourceIds(): string[] {
    return this.slots.map((s) => s.source.id)
  }

  async resolve(rawName: string): Promise<ScoredResult> {
    const input = this.prepare(rawName)
    if (!input) {
      logFailure({ kind: 'invalid_input', input: rawName })
      return unavailableResult(rawName, this.clock.now())
    }

    // cached answers from any source before any network call
    const cached = this.cache.getFirst(this.slots.map((slot) => cacheKeyFor(slot.source, input)))
    if (cached && cached.value.isAvailable && isAcceptable(cached.value.confidence)) {
      debug('chain', 'cache hit %s', cached.key)
      return { ...cached.value, originalInput: rawName }
    }

    for (const slot of this.slots) {
      const result = await this.trySource(slot, input)
      if (result) {
        if (isHighConfidence(result.confidence)) this.cache.put(cacheKeyFor(slot.source, input), result)
        console.log(
          '[chain] accepted source=%s input=%j key=%s confidence=%s',
          slot.source.id,
          rawName,
          result.matchedKey,
          result.confidence.toFixed(2)
        )
        return result
      }
    }

    console.log('[chain] unavailable input=%j after %d sources', rawName, this.slots.length)
    return unavailableResult(rawName, this.clock.now(), input.cleanedQuery)
  }

  private prepare(rawName: string): PreparedInput | null {
    if (!isPlausibleFood(rawName)) return null
    const terms = extractCoreFoodTerms(rawName, this.vocab)
    const tokens = tokenize(terms.cleanedText, this.vocab.stopWords)
    if (tokens.size === 0) return null
    const cleanedQuery = sortedJoin(tokens)
    return { rawName, terms, tokens, cleanedQuery, cacheKey: createIngredientCacheKey(cleanedQuery) }
  }

  /** Null when the source declines or fails; the failure has been logged. */
  private async trySource(slot: SourceSlot, input: PreparedInput): Promise<ScoredResult | null> {
    const { source } = slot
    try {
      const found = await this.search(slot, input)
      if (!found) {
        logFailure({ kind: 'declined', sourceId: source.id, input: input.rawName, detail: 'no match' })
        return null
      }

      const records = await this.collectNutrients(slot, found, input.tokens)
      if (!records.some(hasCalories)) {
        logFailure({ kind: 'declined', sourceId: source.id, input: input.rawName, detail: 'no calorie data' })
        return null
      }

      const nutrition = buildNutritionEstimate(records)
      const { match } = found
      const confidence = scoreConfidence(match.score, nutrition.completenessScore, input.terms.confidence, source.confidenceCap)
      if (!isAcceptable(confidence)) {
        logFailure({
          kind: 'declined',
          sourceId: source.id,
          input: input.rawName,
          detail: `confidence ${confidence.toFixed(2)} for ${match.entry.rawKey}`,
        })
        return null
      }

      return {
        originalInput: input.rawName,
        cleanedQuery: input.cleanedQuery,
        matchedKey: match.entry.rawKey,
        matchedName: found.candidates.get(match.entry.rawKey)?.name ?? match.entry.cleanedName,
        sourceId: source.id,
        nutrition,
        matchScore: match.score,
        confidence,
        isAvailable: true,
        timestamp: this.clock.now(),
      }
    } catch (e) {
      logFailure(toLookupFailure(e, source.id, input.rawName))
      return null
    }
  }

  /** Runs the generated queries in order, keeping the best match across them. */
  private async search(slot: SourceSlot, input: PreparedInput): Promise<SourceMatch | null> {
    let best: SourceMatch | null = null
    for (const query of buildSearchQueries(input.terms, this.maxQueries, this.vocab)) {
      await slot.limiter.wait()
      const candidates = await slot.source.search(query.text, { kind: query.kind })
      debug('chain', '%s %s %j -> %d candidates', slot.source.id, query.kind, query.text, candidates.length)
      if (candidates.length === 0) continue

      const entries = candidates.map((c) => createCatalogEntry(c.id, c.name, candidateTier(c), slot.source.id))
      const catalog = createCatalog(entries)
      const match = this.matcher.findBestMatch(input.tokens, catalog)
      if (match && (!best || outranks(match, best.match))) {
        const byId = new Map<string, SourceCandidate>()
        for (const c of candidates) if (!byId.has(c.id)) byId.set(c.id, c)
        best = { match, catalog, candidates: byId }
      }

      if (this.queryQuality(input.tokens, entries) > QUERY_QUALITY_THRESHOLD) break
    }
    return best
  }

  private queryQuality(tokens: ReadonlySet<string>, entries: CatalogEntry[]): number {
    const sample = entries.slice(0, QUALITY_SAMPLE_SIZE)
    if (sample.length === 0) return 0
    return sample.reduce((sum, e) => sum + this.matcher.scoreEntry(tokens, e).score, 0) / sample.length
  }

  /**
   * Nutrient records for the best match plus, when the source builds ranges,
   * its runners-up in the same tier. Candidates without calories are
   * completed through `fetchDetails` where the source has it.
   */
  private async collectNutrients(
    slot: SourceSlot,
    found: SourceMatch,
    tokens: ReadonlySet<string>
  ): Promise<NutrientFields[]> {
    const rangeSize = Math.max(1, slot.source.rangeSize ?? 1)
    const bestKey = found.match.entry.rawKey
    const contributors = [
      found.match,
      ...this.matcher
        .findTopMatches(tokens, found.catalog, rangeSize + 1)
        .filter((c) => c.entry.rawKey !== bestKey && c.entry.tier === found.match.entry.tier),
    ].slice(0, rangeSize)

    const records: NutrientFields[] = []
    for (const { entry } of contributors) {
      let fields = found.candidates.get(entry.rawKey)?.nutrients ?? null
      if (!hasCalories(fields) && slot.source.fetchDetails) {
        await slot.limiter.wait()
        fields = await slot.source.fetchDetails(entry.rawKey)
      }
      if (fields && Object.keys(fields).length > 0) records.push(fields)
    }
    return records
  }
}

function cacheKeyFor(source: NutritionSource, input: PreparedInput): string {
  return `${source.id}:${input.cacheKey}`
}

/** Tier first, then score. */
function outranks(a: MatchCandidate, b: MatchCandidate): boolean {
  const tierDiff = TIER_ORDER.indexOf(a.entry.tier) - TIER_ORDER.indexOf(b.entry.tier)
  if (tierDiff !== 0) return tierDiff < 0
  return a.score > b.score
}
