/** Results below this are not served. */
export const MIN_ACCEPTANCE_CONFIDENCE = 0.6
/** Results at or above this are cached; accepted results below it are served but not stored. */
export const HIGH_CONFIDENCE_THRESHOLD = 0.75

const MATCH_WEIGHT = 0.7
const COMPLETENESS_WEIGHT = 0.2
const PARSING_WEIGHT = 0.1

/**
 * Weighted blend of match quality, nutrient completeness and how sure the
 * normalizer was, clamped to [0, sourceCap].
 */
export function scoreConfidence(
  matchScore: number,
  nutritionCompleteness: number,
  parsingConfidence: number,
  sourceCap = 1
): number {
  const raw =
    MATCH_WEIGHT * clamp01(matchScore) +
    COMPLETENESS_WEIGHT * clamp01(nutritionCompleteness) +
    PARSING_WEIGHT * clamp01(parsingConfidence)
  return Math.min(clamp01(raw), clamp01(sourceCap))
}

export function isAcceptable(confidence: number): boolean {
  return confidence >= MIN_ACCEPTANCE_CONFIDENCE
}

export function isHighConfidence(confidence: number): boolean {
  return confidence >= HIGH_CONFIDENCE_THRESHOLD
}

function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0
  return Math.max(0, Math.min(1, n))
}
