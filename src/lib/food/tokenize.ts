import { loadVocabulary } from './vocabulary'

const MIN_TOKEN_LENGTH = 2

/**
 * Catalog-name cleaning: "Chicken,_breast,_raw_2646170" -> "chicken breast raw".
 * Drops a trailing _<digits> id, turns separators into spaces and keeps letters only.
 */
export function cleanFoodName(name: string): string {
  return name
    .toLowerCase()
    .replace(/_\d+$/, '')
    .replace(/[_,]/g, ' ')
    .replace(/[^a-z\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}

/** Cleaned, stop-word-filtered token set used by every match strategy. */
export function tokenize(text: string, stopWords: ReadonlySet<string> = loadVocabulary().stopWords): Set<string> {
  const tokens = new Set<string>()
  for (const word of cleanFoodName(text).split(' ')) {
    if (word.length < MIN_TOKEN_LENGTH || stopWords.has(word)) continue
    tokens.add(word)
  }
  return tokens
}

/** Tokens sorted and space-joined, the canonical string form for substring and edit-distance checks. */
export function sortedJoin(tokens: Iterable<string>): string {
  return [...tokens].sort().join(' ')
}
