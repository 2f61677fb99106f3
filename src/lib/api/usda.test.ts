import { beforeEach, describe, it, expect, vi } from 'vitest'
import { createUsdaSource } from './usda'
import { jsonResponse } from '../../test/http'

describe('USDA FoodData Central source', () => {
  const fetchMock = vi.fn()
  const source = createUsdaSource({ apiKey: 'test-key' })

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  it('maps search hits by nutrient number', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        foods: [
          {
            fdcId: 171077,
            description: 'Chicken, broiler, breast, roasted',
            foodNutrients: [
              { nutrientNumber: '208', value: 165 },
              { nutrientNumber: '203', value: 31 },
              { nutrientNumber: '204', value: 3.6 },
              { nutrientNumber: '307', value: 74 },
              { nutrientNumber: '301', value: 15 },
            ],
          },
        ],
      })
    )

    const candidates = await source.search('chicken breast')

    expect(candidates).toEqual([
      {
        id: '171077',
        name: 'Chicken, broiler, breast, roasted',
        nutrients: { calories: 165, protein: 31, fat: 3.6, sodium: 74 },
      },
    ])
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://api.nal.usda.gov/fdc/v1/foods/search?query=chicken%20breast&dataType=Foundation%2CSR%20Legacy&pageSize=10&api_key=test-key'
    )
  })

  it('skips category queries without a request', async () => {
    expect(await source.search('snacks', { kind: 'category' })).toEqual([])
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('fetches details for one food', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        foodNutrients: [
          { nutrient: { number: '208' }, amount: 130 },
          { nutrient: { number: '205' }, amount: 28.2 },
          { nutrient: { number: '999' }, amount: 1 },
        ],
      })
    )
    expect(await source.fetchDetails?.('2512381')).toEqual({ calories: 130, carbs: 28.2 })
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.nal.usda.gov/fdc/v1/food/2512381?api_key=test-key')
  })

  it('returns null details when no known nutrient is present', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ foodNutrients: [] }))
    expect(await source.fetchDetails?.('1')).toBeNull()
  })
})
