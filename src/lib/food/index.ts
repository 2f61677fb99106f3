export { extractCoreFoodTerms, createIngredientCacheKey } from './normalize'
export { cleanFoodName, sortedJoin, tokenize } from './tokenize'
export { isPlausibleFood } from './validate'
export { buildNutritionEstimate, compactNutrients, completeness, emptyNutrition, hasCalories, NUTRIENT_UNITS } from './nutrition'
export { buildVocabulary, loadVocabulary } from './vocabulary'
export type { Vocabulary, VocabularyFile } from './vocabulary'
