/**
 * Structured request logging middleware.
 *
 * One log line per request: HTTP method, path, response status and
 * duration in ms.
 */

import type { Context, Next } from 'hono'
import type { Logger } from '@scenesync/config'

export function requestLogger(log: Logger) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    log.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number((performance.now() - start).toFixed(1)),
    })
  }
}
