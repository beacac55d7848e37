import { serve } from '@hono/node-server'
import { resolveSurveyConfig } from '@deed-plot/config'
import {
  createRedisClient,
  MemoryStore,
  RedisStore,
  redisHealthCheck,
  type CacheStore,
} from '@deed-plot/cache'
import { createApp, type HealthCheck } from './app'
import { env } from './lib/env'
import { log } from './lib/log'

const config = resolveSurveyConfig()
const redis = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : undefined

const store: CacheStore = redis ? new RedisStore(redis) : new MemoryStore()
const healthChecks: Record<string, HealthCheck> = redis
  ? { redis: () => redisHealthCheck(redis) }
  : {}

const app = createApp({
  config,
  store,
  cacheTtlSeconds: env.CACHE_TTL_SECONDS,
  corsOrigins: env.CORS_ORIGINS,
  exposeStacks: env.NODE_ENV !== 'production',
  healthChecks,
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log('info', {
    event: 'server_started',
    port: info.port,
    env: env.NODE_ENV,
    cache: redis ? 'redis' : 'memory',
  })
})

function shutdown(signal: string) {
  log('info', { event: 'shutdown', signal })

  server.close(() => {
    if (!redis) process.exit(0)
    redis.quit().then(
      () => process.exit(0),
      () => process.exit(1),
    )
  })
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
