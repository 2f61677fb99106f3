import { Hono, type MiddlewareHandler } from 'hono'
import type { AppEnv, Services } from './services'
import { saveResultCache } from './services'
import { api } from './api'

export const SERVICE_NAME = 'menu-nutrition-resolver'

/** Authorization: Bearer <ADMIN_SECRET>, only enforced when the secret is configured. */
const requireAdmin: MiddlewareHandler<AppEnv> = async (c, next) => {
  const secret = c.get('services').env.ADMIN_SECRET
  if (secret) {
    const auth = c.req.header('Authorization')
    if (auth !== `Bearer ${secret}`) return c.json({ error: 'Unauthorized' }, 401)
  }
  await next()
}

export function createApp(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  app.use('*', async (c, next) => {
    c.set('services', services)
    await next()
  })

  app.get('/', (c) => c.text(SERVICE_NAME))

  app.route('/', api)

  app.use('/admin/*', requireAdmin)

  /** Drop every cached nutrition result and geo area. */
  app.post('/admin/cache/clear', (c) => {
    const { resultCache, geoCache } = c.get('services')
    const results = resultCache.size
    const areas = geoCache.size
    resultCache.clear()
    geoCache.clear()
    console.log('[admin] cleared %d results, %d areas', results, areas)
    return c.json({ ok: true, results, areas })
  })

  /** Write the result cache to RESULT_CACHE_FILE now rather than at shutdown. */
  app.post('/admin/cache/save', async (c) => {
    try {
      const saved = await saveResultCache(c.get('services'))
      if (saved === null) return c.json({ error: 'RESULT_CACHE_FILE is not set' }, 400)
      return c.json({ ok: true, saved })
    } catch (e) {
      console.error('[admin] cache save error', e)
      return c.json({ error: String(e) }, 500)
    }
  })

  app.get('/admin/cache/stats', (c) => {
    const { resultCache, geoCache, refresh } = c.get('services')
    return c.json({ results: resultCache.stats(), areas: geoCache.size, refresh: refresh.stats })
  })

  return app
}
