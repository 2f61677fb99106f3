import { z } from 'zod'
import { readDataFile } from './files'

const restaurantCodesSchema = z.object({
  codes: z.array(z.object({ code: z.string().regex(/^R\d{4}$/), name: z.string().min(1) })),
  aliases: z.record(z.string().regex(/^R\d{4}$/)),
})

export type RestaurantCodesFile = z.infer<typeof restaurantCodesSchema>

export interface RestaurantCode {
  code: string
  name: string
}

/** "McDonald's" -> "mcdonalds", "BJ's Restaurant & Brewhouse" -> "bjsrestaurantbrewhouse" */
export function normalizeRestaurantName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '')
}

/** R-code table: chains that have a structured nutrition dataset. */
export class RestaurantCodes {
  private readonly byCode = new Map<string, RestaurantCode>()
  private readonly byName = new Map<string, string>()

  constructor(file: RestaurantCodesFile) {
    for (const entry of file.codes) {
      this.byCode.set(entry.code, entry)
      this.byName.set(normalizeRestaurantName(entry.name), entry.code)
    }
    for (const [alias, code] of Object.entries(file.aliases)) {
      if (this.byCode.has(code)) this.byName.set(normalizeRestaurantName(alias), code)
    }
  }

  static load(): RestaurantCodes {
    return new RestaurantCodes(readDataFile('restaurant-codes.json', restaurantCodesSchema))
  }

  get entries(): RestaurantCode[] {
    return [...this.byCode.values()]
  }

  nameFor(code: string): string | undefined {
    return this.byCode.get(code)?.name
  }

  codeFor(restaurantName: string): string | undefined {
    return this.byName.get(normalizeRestaurantName(restaurantName))
  }

  hasNutritionData(restaurantName: string): boolean {
    return this.codeFor(restaurantName) !== undefined
  }
}
