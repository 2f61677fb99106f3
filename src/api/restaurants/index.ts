import { Hono } from 'hono'
import type { AppEnv } from '../../services'
import { codeHandler, nearbyHandler, statusHandler } from './routes'

export const restaurantsRouter = new Hono<AppEnv>()
  .get('/', nearbyHandler)
  .get('/status', statusHandler)
  .get('/code', codeHandler)
