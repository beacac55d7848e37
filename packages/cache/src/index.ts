export { createRedisClient, redisHealthCheck } from './client'
export { type CacheStore, RedisStore, MemoryStore } from './cache'
export {
  CACHE_KEY_VERSION,
  hashCallSequence,
  PipelineCache,
  type PipelineCacheOptions,
} from './memo'
