import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { cors } from 'hono/cors'
import type { SurveyConfig } from '@deed-plot/config'
import { PipelineCache, type CacheStore } from '@deed-plot/cache'
import { log } from './lib/log'
import { requestLogger } from './lib/request-logger'
import { plottingRoutes, type AnalysisResult } from './routes/plotting'

export type HealthCheck = () => Promise<boolean>

export interface AppDeps {
  config: SurveyConfig
  store: CacheStore
  cacheTtlSeconds?: number
  corsOrigins?: string[]
  /** Include stack traces in error logs */
  exposeStacks?: boolean
  /** Named dependency probes reported by GET /health */
  healthChecks?: Record<string, HealthCheck>
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono()

  const cache = new PipelineCache<AnalysisResult>(deps.store, {
    ttlSeconds: deps.cacheTtlSeconds,
  })

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status)
    }
    log('error', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: deps.exposeStacks ? err.stack : undefined,
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger())

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: deps.corsOrigins ?? [],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      exposeHeaders: ['Content-Disposition'],
      maxAge: 86400,
    }),
  )

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------

  app.get('/health', async (c) => {
    const checks: Record<string, string> = {}
    for (const [name, probe] of Object.entries(deps.healthChecks ?? {})) {
      try {
        checks[name] = (await probe()) ? 'ok' : 'error'
      } catch {
        checks[name] = 'error'
      }
    }

    const healthy = Object.values(checks).every((v) => v === 'ok')
    return c.json({ status: healthy ? 'healthy' : 'degraded', checks }, healthy ? 200 : 503)
  })

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/plotting', plottingRoutes({ config: deps.config, cache }))

  app.get('/', (c) => c.json({ name: 'Deed Plot API', version: '0.1.0' }))

  return app
}
