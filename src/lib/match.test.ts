import { describe, it, expect, vi } from 'vitest'
import { Matcher } from './match'
import { createCatalog, createCatalogEntry } from './catalog'
import { exactStrategy, fuzzyStrategy, substringStrategy, tokenOverlapStrategy, type MatchStrategy } from './strategies'
import { tokenize } from './food'
import type { CatalogTier } from '../types'

const entry = (key: string, name: string, tier: CatalogTier = 'generic') =>
  createCatalogEntry(key, name, tier, 'test')

describe('Matcher.findBestMatch', () => {
  it('matches a restaurant name exactly against a priority entry', () => {
    const catalog = createCatalog([entry('R0056', 'mcdonalds', 'priority'), entry('chicken_breast', 'chicken_breast')])
    const match = new Matcher().findBestMatch(tokenize('mcdonalds'), catalog)
    expect(match).not.toBeNull()
    expect(match!.entry.rawKey).toBe('R0056')
    expect(match!.score).toBe(1.0)
    expect(match!.strategyName).toBe('Priority - Exact Match')
  })

  it('skips later strategies after an exact hit', () => {
    const later: MatchStrategy = { name: 'Later', score: vi.fn(() => 0.95) }
    const matcher = new Matcher({ strategies: [exactStrategy, later] })
    const match = matcher.findBestMatch(tokenize('caesar salad'), createCatalog([entry('caesar_salad', 'caesar salad')]))
    expect(match!.score).toBe(1.0)
    expect(later.score).not.toHaveBeenCalled()
  })

  it('returns a priority entry over a higher-scoring generic entry', () => {
    const scores: Record<string, number> = { p: 0.5, g: 0.9 }
    const fixed: MatchStrategy = { name: 'Fixed', score: (_input, e) => scores[e.rawKey] ?? 0 }
    const catalog = createCatalog([entry('g', 'anything'), entry('p', 'anything', 'priority')])
    const match = new Matcher({ strategies: [fixed] }).findBestMatch(tokenize('anything'), catalog)
    expect(match!.entry.rawKey).toBe('p')
    expect(match!.score).toBe(0.5)
    expect(match!.strategyName).toBe('Priority - Fixed')
  })

  it('keeps a near priority hit even when a generic entry is exact', () => {
    const catalog = createCatalog([
      entry('chicken_sandwich', 'chicken sandwich'),
      entry('R0017_wrap', 'chicken wrap', 'priority'),
    ])
    const match = new Matcher().findBestMatch(tokenize('chicken sandwich'), catalog)
    expect(match!.entry.rawKey).toBe('R0017_wrap')
    expect(match!.score).toBeCloseTo(1 / 3 + 0.5, 10)
    expect(match!.strategyName).toBe('Priority - Token Overlap')
  })

  it('falls through to the generic tier when no priority entry reaches the floor', () => {
    const catalog = createCatalog([
      entry('R0085_taco', 'taco bell crunchy taco supreme', 'priority'),
      entry('salmon_baked', 'salmon, atlantic, baked'),
    ])
    const match = new Matcher().findBestMatch(tokenize('salmon'), catalog)
    expect(match!.entry.rawKey).toBe('salmon_baked')
    expect(match!.score).toBe(0.9)
    expect(match!.strategyName).toBe('Generic - Exact Match')
  })

  it('lets a later strategy replace the best only with a strictly higher score', () => {
    const catalog = createCatalog([entry('chicken_breast', 'chicken breast')])
    const match = new Matcher().findBestMatch(new Set(['chick', 'breast']), catalog)
    expect(match!.strategyName).toBe('Generic - Fuzzy Match')
    expect(match!.score).toBeCloseTo(1 - 2 / 14, 10)
  })

  it('returns null for empty input or no acceptable entry', () => {
    const catalog = createCatalog([entry('rice', 'rice')])
    const matcher = new Matcher()
    expect(matcher.findBestMatch(new Set(), catalog)).toBeNull()
    expect(matcher.findBestMatch(new Set(['xylophonequartet']), catalog)).toBeNull()
  })
})

describe('Matcher.findTopMatches', () => {
  it('orders priority first, then by best strategy score', () => {
    const catalog = createCatalog([
      entry('breast', 'chicken breast'),
      entry('thigh', 'chicken thigh roasted'),
      entry('R0022', 'churchs chicken', 'priority'),
    ])
    const top = new Matcher().findTopMatches(tokenize('chicken'), catalog, 2)
    expect(top.map((c) => c.entry.rawKey)).toEqual(['R0022', 'breast'])
    expect(top[0].score).toBeCloseTo(1, 10)
    expect(top[1].score).toBeCloseTo(1, 10)
    expect(top[1].strategyName).toBe('Generic - Token Overlap')
  })
})

describe('strategies', () => {
  const e = (name: string) => entry('k', name)

  it('exact: 1.0 for equal sets, 0.9 for a strict subset', () => {
    expect(exactStrategy.score(new Set(['rice', 'white']), e('white rice'))).toBe(1.0)
    expect(exactStrategy.score(new Set(['chicken']), e('chicken breast'))).toBe(0.9)
    expect(exactStrategy.score(new Set(['chicken', 'rice']), e('chicken'))).toBe(0)
  })

  it('substring: joined containment, then partial tokens of four or more letters', () => {
    expect(substringStrategy.score(new Set(['chick', 'breast']), e('chicken breast'))).toBe(0.8)
    expect(substringStrategy.score(new Set(['burgers']), e('burger king'))).toBe(0.6)
    expect(substringStrategy.score(new Set(['pie']), e('pies'))).toBe(0)
  })

  it('token overlap: jaccard plus domain boosts, capped at 1', () => {
    const overlap = tokenOverlapStrategy()
    expect(overlap.score(new Set(['grilled', 'chicken', 'rice']), e('chicken grilled breast'))).toBe(1)
    expect(overlap.score(new Set(['rice', 'beans']), e('rice white'))).toBeCloseTo(1 / 3, 10)
    expect(overlap.score(new Set(['carrots', 'raw']), e('carrots baby raw'))).toBeCloseTo(2 / 3 + 0.1, 10)
  })

  it('fuzzy: normalized edit distance on the joined strings', () => {
    expect(fuzzyStrategy.score(new Set(['chiken']), e('chicken'))).toBeCloseTo(1 - 1 / 7, 10)
  })
})
