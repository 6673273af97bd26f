import { Hono } from 'hono'
import type { Logger } from '@scenesync/config'
import type { Relay } from './relay'
import { requestLogger } from './lib/request-logger'

/** Health and status endpoints for operators and load balancers. */
export function createStatusApp(relay: Relay, log: Logger): Hono {
  const app = new Hono()

  app.onError((err, c) => {
    log.error('Unhandled status request error', { method: c.req.method, path: c.req.path, error: err })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  app.use('*', requestLogger(log))

  app.get('/health', (c) => c.json({ status: 'healthy' }))

  app.get('/status', (c) => c.json(relay.status()))

  return app
}
