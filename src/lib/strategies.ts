import type { CatalogEntry } from '../types'
import { loadVocabulary, sortedJoin, type Vocabulary } from './food'
import { similarity } from './utils/levenshtein'

export interface MatchStrategy {
  name: string
  /** Score in [0, 1] for one entry. */
  score(input: ReadonlySet<string>, entry: CatalogEntry): number
}

const MIN_PARTIAL_TOKEN_LENGTH = 4

export const exactStrategy: MatchStrategy = {
  name: 'Exact Match',
  score(input, entry) {
    if (input.size === 0) return 0
    for (const token of input) if (!entry.tokens.has(token)) return 0
    return input.size === entry.tokens.size ? 1.0 : 0.9
  },
}

export const substringStrategy: MatchStrategy = {
  name: 'Substring Match',
  score(input, entry) {
    if (input.size === 0 || entry.tokens.size === 0) return 0
    if (sortedJoin(entry.tokens).includes(sortedJoin(input))) return 0.8
    for (const token of input) {
      if (token.length < MIN_PARTIAL_TOKEN_LENGTH) continue
      for (const other of entry.tokens) {
        if (other.includes(token) || token.includes(other)) return 0.6
      }
    }
    return 0
  },
}

/** Jaccard overlap plus boosts for shared brand/category, protein and preparation terms. */
export function tokenOverlapStrategy(vocab: Vocabulary = loadVocabulary()): MatchStrategy {
  const { brand, protein, preparation } = vocab.boosts
  return {
    name: 'Token Overlap',
    score(input, entry) {
      const shared = [...input].filter((t) => entry.tokens.has(t))
      const union = new Set([...input, ...entry.tokens]).size
      if (union === 0) return 0
      let score = shared.length / union
      if (shared.some((t) => brand.has(t))) score += 0.3
      if (shared.some((t) => protein.has(t))) score += 0.2
      if (shared.some((t) => preparation.has(t))) score += 0.1
      return Math.min(1, score)
    },
  }
}

export const fuzzyStrategy: MatchStrategy = {
  name: 'Fuzzy Match',
  score(input, entry) {
    return similarity(sortedJoin(input), sortedJoin(entry.tokens))
  },
}

/** Exact, Substring, TokenOverlap, Fuzzy. The order is part of the matching contract. */
export function defaultStrategies(vocab: Vocabulary = loadVocabulary()): MatchStrategy[] {
  return [exactStrategy, substringStrategy, tokenOverlapStrategy(vocab), fuzzyStrategy]
}
