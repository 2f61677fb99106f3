import type { CoreFoodTerms, QueryKind } from '../../types'
import { loadVocabulary, type Vocabulary } from '../food'

export const DEFAULT_MAX_QUERIES = 3

export interface SearchQuery {
  text: string
  kind: QueryKind
}

/** First category (file order) with a keyword appearing as a whole word in `text`. */
export function inferCategory(text: string, vocab: Vocabulary = loadVocabulary()): string | null {
  const words = new Set(text.toLowerCase().split(/\s+/).filter(Boolean))
  for (const { name, keywords } of vocab.categories) {
    if (keywords.some((k) => words.has(k))) return name
  }
  return null
}

/**
 * Narrowest first: the primary food, then modifier + primary food, then the
 * inferred category as a category search.
 */
export function buildSearchQueries(
  terms: CoreFoodTerms,
  maxQueries = DEFAULT_MAX_QUERIES,
  vocab: Vocabulary = loadVocabulary()
): SearchQuery[] {
  const queries: SearchQuery[] = []
  const add = (text: string, kind: QueryKind) => {
    const trimmed = text.trim()
    if (!trimmed || queries.some((q) => q.kind === kind && q.text === trimmed)) return
    queries.push({ text: trimmed, kind })
  }

  add(terms.primaryFood, 'text')
  if (terms.modifiers.length > 0) add(`${terms.modifiers[0]} ${terms.primaryFood}`, 'text')
  const category = inferCategory(terms.primaryFood, vocab) ?? inferCategory(terms.cleanedText, vocab)
  if (category) add(category, 'category')

  return queries.slice(0, Math.max(0, maxQueries))
}
