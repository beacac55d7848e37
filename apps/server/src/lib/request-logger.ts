/**
 * Structured request logging middleware.
 *
 * Emits one JSON line per request with the method, path, response status
 * and duration in ms.
 */

import type { Context, Next } from 'hono'
import { log } from './log'

export function requestLogger() {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = (performance.now() - start).toFixed(1)

    log('info', {
      event: 'request',
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number(ms),
    })
  }
}
