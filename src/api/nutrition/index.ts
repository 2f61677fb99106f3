import { Hono } from 'hono'
import type { AppEnv } from '../../services'
import { batchLookupHandler, lookupHandler, termsHandler } from './routes'

export const nutritionRouter = new Hono<AppEnv>()
  .get('/lookup', lookupHandler)
  .post('/lookup', batchLookupHandler)
  .get('/terms', termsHandler)
