import { Hono } from 'hono'
import type { AppEnv } from '../services'
import { nutritionRouter } from './nutrition'
import { restaurantsRouter } from './restaurants'

export const api = new Hono<AppEnv>()
  .basePath('/api')
  .route('/nutrition', nutritionRouter)
  .route('/restaurants', restaurantsRouter)
