import type { Context } from 'hono'
import type { AppEnv } from '../../services'
import { issueMessages } from '../validation'
import { codeQuerySchema, nearbyQuerySchema } from './schema'

/** GET /api/restaurants?lat=&lon=&radius= */
export async function nearbyHandler(c: Context<AppEnv>): Promise<Response> {
  const query = nearbyQuerySchema.safeParse(c.req.query())
  if (!query.success) return c.json({ error: issueMessages(query.error) }, 400)
  const { lat, lon, radius } = query.data
  try {
    const { refresh } = c.get('services')
    const restaurants = await refresh.getRestaurants({ latitude: lat, longitude: lon }, radius)
    return c.json({ restaurants, lastRefreshedAt: refresh.lastRefreshedAt, status: refresh.status() })
  } catch (e) {
    console.error('[restaurants] nearby error', e)
    return c.json({ error: String(e) }, 500)
  }
}

/** GET /api/restaurants/status */
export function statusHandler(c: Context<AppEnv>): Response {
  const { refresh, geoCache } = c.get('services')
  return c.json({
    status: refresh.status(),
    stats: refresh.stats,
    geoCacheSize: geoCache.size,
    lastRefreshedAt: refresh.lastRefreshedAt,
    lastError: refresh.lastError,
  })
}

/** GET /api/restaurants/code?name= gives the R-code of a chain, or 404 when it has no nutrition dataset. */
export function codeHandler(c: Context<AppEnv>): Response {
  const query = codeQuerySchema.safeParse(c.req.query())
  if (!query.success) return c.json({ error: issueMessages(query.error) }, 400)
  const { codes } = c.get('services')
  const code = codes.codeFor(query.data.name)
  const name = code ? codes.nameFor(code) : undefined
  if (!code || !name) return c.json({ error: 'Unknown restaurant' }, 404)
  return c.json({ code, name })
}
