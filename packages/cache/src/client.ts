import Redis from 'ioredis'

/** Create a lazily connecting Redis client; nothing is dialed until the first command. */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  })
}

/** Check if Redis is connected and responding. */
export async function redisHealthCheck(client: Redis): Promise<boolean> {
  try {
    const pong = await client.ping()
    return pong === 'PONG'
  } catch {
    return false
  }
}
