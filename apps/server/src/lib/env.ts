/**
 * Server environment, read once at startup.
 *
 * Malformed values throw immediately so a misconfigured deployment fails on
 * boot rather than on the first request. Survey conventions are resolved
 * separately by `resolveSurveyConfig` in @deed-plot/config.
 */

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function numeric(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(
      `Invalid environment variable ${key}: expected a non-negative integer, got "${raw}".`,
    )
  }
  return value
}

export const env = {
  /** Redis is optional; without it results are cached in process memory */
  REDIS_URL: process.env['REDIS_URL'] || undefined,
  PORT: numeric('PORT', 4000),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(','),
  CACHE_TTL_SECONDS: numeric('CACHE_TTL_SECONDS', 3600),
} as const
