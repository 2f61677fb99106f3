import type { Context } from 'hono'
import type { AppEnv } from '../../services'
import type { ScoredResult } from '../../types'
import { extractCoreFoodTerms } from '../../lib/food'
import { issueMessages } from '../validation'
import { batchLookupSchema, lookupQuerySchema, termsQuerySchema } from './schema'

/** GET /api/nutrition/lookup?name= */
export async function lookupHandler(c: Context<AppEnv>): Promise<Response> {
  const query = lookupQuerySchema.safeParse(c.req.query())
  if (!query.success) return c.json({ error: issueMessages(query.error) }, 400)
  try {
    const result = await c.get('services').chain.resolve(query.data.name)
    return c.json(result)
  } catch (e) {
    console.error('[nutrition] lookup error', e)
    return c.json({ error: String(e) }, 500)
  }
}

/** POST /api/nutrition/lookup with body { names: string[] }. Names are resolved one at a time. */
export async function batchLookupHandler(c: Context<AppEnv>): Promise<Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: ['body must be JSON'] }, 400)
  }
  const parsed = batchLookupSchema.safeParse(body)
  if (!parsed.success) return c.json({ error: issueMessages(parsed.error) }, 400)
  try {
    const { chain } = c.get('services')
    const results: ScoredResult[] = []
    for (const name of parsed.data.names) results.push(await chain.resolve(name))
    console.log('[nutrition] batch of %d, %d available', results.length, results.filter((r) => r.isAvailable).length)
    return c.json({ results })
  } catch (e) {
    console.error('[nutrition] batch lookup error', e)
    return c.json({ error: String(e) }, 500)
  }
}

/** GET /api/nutrition/terms?text= shows what the normalizer makes of a menu line. */
export function termsHandler(c: Context<AppEnv>): Response {
  const query = termsQuerySchema.safeParse(c.req.query())
  if (!query.success) return c.json({ error: issueMessages(query.error) }, 400)
  return c.json(extractCoreFoodTerms(query.data.text, c.get('services').vocab))
}
