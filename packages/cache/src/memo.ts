/**
 * Content-addressed memoization for pipeline results.
 *
 * Keys are SHA-256 digests of the normalized call sequence, so two requests
 * describing the same boundary share one entry however the deed text was
 * formatted. At most one computation per key runs at a time: concurrent
 * callers await the same in-flight promise.
 */

import { createHash } from 'node:crypto'
import type { NormalizedCall } from '@deed-plot/types'
import type { CacheStore } from './cache'

export const CACHE_KEY_VERSION = 'v1'

/**
 * Canonical digest of a normalized sequence. Only fields that influence the
 * computed geometry and report are hashed, in a fixed order.
 */
export function hashCallSequence(calls: readonly NormalizedCall[]): string {
  const canonical = calls.map((c) => [
    c.azimuthDegrees,
    c.distanceFeet,
    c.bearingText,
    c.monument ?? null,
    c.description ?? null,
  ])
  return createHash('sha256')
    .update(CACHE_KEY_VERSION)
    .update(JSON.stringify(canonical))
    .digest('hex')
}

export interface PipelineCacheOptions {
  /** Entry lifetime in seconds; entries never expire when omitted */
  ttlSeconds?: number
  /** Namespace prepended to every key */
  namespace?: string
}

export class PipelineCache<T> {
  private readonly inflight = new Map<string, Promise<T>>()
  private readonly ttlSeconds: number | undefined
  private readonly namespace: string

  constructor(
    private readonly store: CacheStore,
    options: PipelineCacheOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds
    this.namespace = options.namespace ?? 'analysis'
  }

  /** Number of computations currently running. */
  get pending(): number {
    return this.inflight.size
  }

  /**
   * Return the stored value for `key`, or compute and store it. A failed
   * computation is not stored; the next caller computes again.
   */
  async getOrCompute(key: string, compute: () => T | Promise<T>): Promise<T> {
    const fullKey = `${this.namespace}:${key}`

    const running = this.inflight.get(fullKey)
    if (running) return running

    const task = this.load(fullKey, compute)
    this.inflight.set(fullKey, task)
    try {
      return await task
    } finally {
      this.inflight.delete(fullKey)
    }
  }

  async invalidate(key: string): Promise<void> {
    await this.store.del(`${this.namespace}:${key}`)
  }

  private async load(fullKey: string, compute: () => T | Promise<T>): Promise<T> {
    const cached = await this.store.get<T>(fullKey)
    if (cached !== null) return cached

    const value = await compute()
    await this.store.set(fullKey, value, this.ttlSeconds)
    return value
  }
}
