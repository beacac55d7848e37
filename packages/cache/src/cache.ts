import type Redis from 'ioredis'

/** Minimal key/value store holding JSON-serializable values. */
export interface CacheStore {
  /** Get a value by key. Returns null if not found or expired. */
  get<T>(key: string): Promise<T | null>
  /** Set a value with optional TTL in seconds. */
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>
  /** Delete a key. */
  del(key: string): Promise<void>
}

/** JSON values in Redis under a key prefix. */
export class RedisStore implements CacheStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'deed-plot:',
  ) {}

  async get<T>(key: string): Promise<T | null> {
    const raw = await this.redis.get(this.prefix + key)
    if (raw === null) return null
    return JSON.parse(raw) as T
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const json = JSON.stringify(value)
    if (ttlSeconds !== undefined) {
      await this.redis.set(this.prefix + key, json, 'EX', ttlSeconds)
    } else {
      await this.redis.set(this.prefix + key, json)
    }
  }

  async del(key: string): Promise<void> {
    await this.redis.del(this.prefix + key)
  }
}

interface MemoryEntry {
  json: string
  expiresAt: number | undefined
}

/**
 * In-process store with the same JSON round-trip as Redis, so cached
 * values behave identically whichever store is configured.
 */
export class MemoryStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>()
  private nextSweepAt = 0

  constructor(
    private readonly now: () => number = Date.now,
    private readonly sweepIntervalMs = 60_000,
  ) {}

  async get<T>(key: string): Promise<T | null> {
    const entry = this.entries.get(key)
    if (!entry) return null
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      return null
    }
    return JSON.parse(entry.json) as T
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const now = this.now()
    if (now >= this.nextSweepAt) this.sweep(now)
    this.entries.set(key, {
      json: JSON.stringify(value),
      expiresAt: ttlSeconds !== undefined ? now + ttlSeconds * 1000 : undefined,
    })
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key)
  }

  get size(): number {
    return this.entries.size
  }

  /** Drop every expired entry. Runs from `set` at most once per sweep interval. */
  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && entry.expiresAt <= now) this.entries.delete(key)
    }
    this.nextSweepAt = now + this.sweepIntervalMs
  }
}
