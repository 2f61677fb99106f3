import 'dotenv/config'
import { serve } from '@hono/node-server'
import { loadEnv } from './env'
import { createServices, restoreResultCache, saveResultCache } from './services'
import { createApp } from './index'
import { setDebug } from './lib/utils/log'

const env = loadEnv()
setDebug(env.DEBUG)

const services = createServices(env)
const restored = await restoreResultCache(services)
if (restored > 0) console.log('[server] restored %d cached results', restored)

const server = serve({ fetch: createApp(services).fetch, port: env.PORT }, (info) => {
  console.log('[server] listening on http://localhost:%d (sources: %s)', info.port, services.chain.sourceIds.join(', '))
})

let stopping = false

async function shutdown(signal: string): Promise<void> {
  if (stopping) return
  stopping = true
  console.log('[server] %s, shutting down', signal)
  server.close()
  await services.refresh.drain()
  const saved = await saveResultCache(services)
  if (saved !== null) console.log('[server] saved %d cached results', saved)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        console.error('[server] shutdown error', e)
        process.exit(1)
      })
  })
}
