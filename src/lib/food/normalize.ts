import type { CoreFoodTerms } from '../../types'
import { loadVocabulary, type Vocabulary } from './vocabulary'

const PUNCTUATION = /[,;:()[\]|!?"*]/g

// order matters: "12 oz" must go as one span before the bare-number pattern sees it.
// Letters glued to a number ("2pc", "12.99ea") go with it.
const PRICE_PATTERNS = [
  /\b\d+(?:\.\d+)?\s*(?:oz|lbs?|kg|ml|g)\b/gi,
  /\$\s?\d+(?:\.\d+)?[a-z]*/gi,
  /\b\d+(?:\.\d+)?[a-z]*/gi,
]

type PrimarySource = 'protein' | 'core' | 'compound' | 'word' | 'fallback'

/**
 * Reduce a menu line such as "$8.99 grilled chicken with rice" to its primary
 * food, cooking modifiers and accompaniments. Never throws.
 */
export function extractCoreFoodTerms(text: string, vocab: Vocabulary = loadVocabulary()): CoreFoodTerms {
  const removedText: string[] = []
  const original = text.trim()

  let working = stripPrices(original.toLowerCase().replace(PUNCTUATION, ' '), removedText)
  working = stripNoise(working, vocab, removedText)
  const cleanedText = working

  const modifiers: string[] = []
  for (const method of vocab.cookingMethods) {
    const pattern = wordPattern(method)
    if (pattern.test(working)) {
      modifiers.push(method)
      working = collapse(working.replace(wordPattern(method), ' '))
    }
  }

  const { food: primaryFood, source } = identifyPrimaryFood(working, original, vocab)
  const accompaniments = vocab.accompaniments.filter(
    (term) => term !== primaryFood && wordPattern(term).test(working)
  )

  return {
    primaryFood,
    modifiers,
    accompaniments,
    removedText,
    cleanedText,
    confidence: parsingConfidence(primaryFood, source, modifiers, vocab),
  }
}

/** "Grilled Chicken" -> "grilled_chicken" */
export function createIngredientCacheKey(text: string): string {
  return text.replace(/ /g, '_').replace(/[^a-zA-Z0-9_]/g, '').toLowerCase()
}

function stripPrices(text: string, removed: string[]): string {
  let out = text
  for (const pattern of PRICE_PATTERNS) {
    out = out.replace(pattern, (match) => {
      removed.push(match.trim())
      return ' '
    })
  }
  return collapse(out)
}

function stripNoise(text: string, vocab: Vocabulary, removed: string[]): string {
  // multi-word phrases before their single words ("served with" before "with")
  const words = [...vocab.noiseWords].sort((a, b) => b.length - a.length)
  let out = text
  for (const word of words) {
    if (wordPattern(word).test(out)) {
      removed.push(word)
      out = collapse(out.replace(wordPattern(word), ' '))
    }
  }
  return out
}

function identifyPrimaryFood(
  text: string,
  original: string,
  vocab: Vocabulary
): { food: string; source: PrimarySource } {
  const protein = vocab.proteins.find((p) => wordPattern(p).test(text))
  if (protein) return { food: protein, source: 'protein' }

  const core = vocab.coreFoods.find((f) => wordPattern(f).test(text))
  if (core) return { food: core, source: 'core' }

  const compound = vocab.compoundPhrases.find((p) => wordPattern(p).test(text))
  if (compound) return { food: compound, source: 'compound' }

  const tokens = text.split(' ').filter(Boolean)
  const skip = new Set([...vocab.noiseWords, ...vocab.cookingMethods])
  const word = tokens.find((t) => t.length > 2 && !skip.has(t))
  if (word) return { food: word, source: 'word' }

  const longest = tokens
    .filter((t) => !vocab.stopWords.has(t))
    .reduce<string | null>((best, t) => (best === null || t.length > best.length ? t : best), null)
  return { food: longest ?? original, source: 'fallback' }
}

function parsingConfidence(
  primaryFood: string,
  source: PrimarySource,
  modifiers: string[],
  vocab: Vocabulary
): number {
  let confidence = 0
  if (vocab.proteins.includes(primaryFood) || vocab.coreFoods.includes(primaryFood)) confidence += 0.6
  else if (primaryFood.length > 2) confidence += 0.3
  if (modifiers.length > 0) confidence += 0.2
  if (source === 'compound') confidence += 0.2
  if (primaryFood.length <= 2) confidence -= 0.3
  return Math.max(0, Math.min(1, confidence))
}

/** Whole-word, case-insensitive. Terms ending in punctuation ("w/") only anchor at the start. */
function wordPattern(term: string): RegExp {
  const escaped = term.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
  const start = /^\w/.test(term) ? '\\b' : '(?<!\\S)'
  const end = /\w$/.test(term) ? '\\b' : ''
  return new RegExp(`${start}${escaped}${end}`, 'gi')
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}
