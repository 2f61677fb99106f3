import { z } from 'zod'

/** Process configuration, read from the environment (and a local .env via dotenv). */
export interface Env {
  /** HTTP port. */
  PORT: number
  /** Print debug-level lines (strategy scores, rate-limit waits, cache hits). */
  DEBUG: boolean
  /** If set, /admin routes require Authorization: Bearer <ADMIN_SECRET>. */
  ADMIN_SECRET?: string

  /** USDA FoodData Central key. DEMO_KEY works at a low request quota. */
  FDC_API_KEY: string
  /** Nutritionix (optional source; enabled when both are set) */
  NUTRITIONIX_APP_ID?: string
  NUTRITIONIX_API_KEY?: string
  /** FatSecret Platform API (optional source; enabled when both are set) */
  FATSECRET_CLIENT_ID?: string
  FATSECRET_CLIENT_SECRET?: string
  /** Open Food Facts asks clients to identify themselves: "app/version (contact)". */
  OFF_USER_AGENT: string

  RESULT_CACHE_TTL_MS: number
  RESULT_CACHE_CAPACITY: number
  /** JSON snapshot of the result cache, restored on start and written on shutdown. */
  RESULT_CACHE_FILE?: string

  GEO_CACHE_TTL_MS: number
  /** Cached areas older than this are served and refreshed in the background. */
  GEO_STALE_MS: number
  GEO_CACHE_CAPACITY: number
  GEO_RADIUS_MILES: number
  MAX_BACKGROUND_TASKS: number
  REFRESH_DELAY_MS: number
  /** Overpass mirrors, tried in order. Empty means the built-in list. */
  OVERPASS_URLS: string[]
}

const HOUR = 60 * 60 * 1000
const MINUTE = 60 * 1000

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  PORT: positiveInt(3000),
  DEBUG: z
    .string()
    .optional()
    .transform((v) => v === 'true' || v === '1'),
  ADMIN_SECRET: z.string().optional(),
  FDC_API_KEY: z.string().default('DEMO_KEY'),
  NUTRITIONIX_APP_ID: z.string().optional(),
  NUTRITIONIX_API_KEY: z.string().optional(),
  FATSECRET_CLIENT_ID: z.string().optional(),
  FATSECRET_CLIENT_SECRET: z.string().optional(),
  OFF_USER_AGENT: z.string().default('menu-nutrition-resolver/0.1'),
  RESULT_CACHE_TTL_MS: positiveInt(24 * HOUR),
  RESULT_CACHE_CAPACITY: positiveInt(500),
  RESULT_CACHE_FILE: z.string().optional(),
  GEO_CACHE_TTL_MS: positiveInt(30 * MINUTE),
  GEO_STALE_MS: positiveInt(15 * MINUTE),
  GEO_CACHE_CAPACITY: positiveInt(50),
  GEO_RADIUS_MILES: z.coerce.number().positive().default(10),
  MAX_BACKGROUND_TASKS: positiveInt(3),
  REFRESH_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  OVERPASS_URLS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((u) => u.trim())
        .filter(Boolean)
    ),
})

/** Parse and default the environment. Empty strings count as unset. */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const present = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== ''))
  const parsed = envSchema.safeParse(present)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid environment: ${problems.join('; ')}`)
  }
  return parsed.data
}
