import { z } from 'zod'
import { readDataFile } from '../data/files'

const wordList = z.array(z.string().min(1))

const vocabularySchema = z.object({
  noiseWords: wordList,
  cookingMethods: wordList,
  proteins: wordList,
  coreFoods: z.record(wordList),
  compoundPhrases: wordList,
  accompaniments: wordList,
  stopWords: wordList,
  boosts: z.object({
    brand: wordList,
    protein: wordList,
    preparation: wordList,
  }),
  categories: z.record(wordList),
})

export type VocabularyFile = z.infer<typeof vocabularySchema>

/** Word tables used by the normalizer, tokenizer and matcher. */
export interface Vocabulary {
  noiseWords: string[]
  cookingMethods: string[]
  proteins: string[]
  /** Core foods flattened in file order (dairy, vegetables, grains, prepared). */
  coreFoods: string[]
  compoundPhrases: string[]
  accompaniments: string[]
  stopWords: ReadonlySet<string>
  boosts: {
    brand: ReadonlySet<string>
    protein: ReadonlySet<string>
    preparation: ReadonlySet<string>
  }
  categories: Array<{ name: string; keywords: string[] }>
}

export function buildVocabulary(file: VocabularyFile): Vocabulary {
  return {
    noiseWords: file.noiseWords.map(lower),
    cookingMethods: file.cookingMethods.map(lower),
    proteins: file.proteins.map(lower),
    coreFoods: Object.values(file.coreFoods).flat().map(lower),
    compoundPhrases: file.compoundPhrases.map(lower),
    accompaniments: file.accompaniments.map(lower),
    stopWords: new Set(file.stopWords.map(lower)),
    boosts: {
      brand: new Set(file.boosts.brand.map(lower)),
      protein: new Set(file.boosts.protein.map(lower)),
      preparation: new Set(file.boosts.preparation.map(lower)),
    },
    categories: Object.entries(file.categories).map(([name, keywords]) => ({ name, keywords: keywords.map(lower) })),
  }
}

let defaultVocabulary: Vocabulary | null = null

/** The bundled vocabulary, read from src/data/vocabulary.json on first use. */
export function loadVocabulary(): Vocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = buildVocabulary(readDataFile('vocabulary.json', vocabularySchema))
  }
  return defaultVocabulary
}

function lower(s: string): string {
  return s.toLowerCase()
}
