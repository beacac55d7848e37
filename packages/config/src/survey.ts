/** Survey conventions used throughout the pipeline. */
export interface SurveyConfig {
  /** Largest misclosure, in feet, still reported as closed */
  closureToleranceFt: number
  /** Feet per vara. Texas convention (33 1/3 in) by default; jurisdictions differ */
  varaFeet: number
  /** Closure error above which a plot is flagged as low precision (5000 ppm = 1:200) */
  precisionWarningPpm: number
  /** Decimal places written for coordinates in exported files */
  coordinateDecimals: number
}

export type SurveyConfigKey = keyof SurveyConfig

/** All setting keys for iteration. */
export const SURVEY_CONFIG_KEYS: SurveyConfigKey[] = [
  'closureToleranceFt',
  'varaFeet',
  'precisionWarningPpm',
  'coordinateDecimals',
]

export const SQ_FEET_PER_ACRE = 43_560

export const DEFAULT_SURVEY_CONFIG: Readonly<SurveyConfig> = Object.freeze({
  closureToleranceFt: 0.1,
  varaFeet: 33 / 36,
  precisionWarningPpm: 5000,
  coordinateDecimals: 4,
})

/** Environment variable that overrides each setting. */
export const SURVEY_ENV_KEYS: Record<SurveyConfigKey, string> = {
  closureToleranceFt: 'SURVEY_CLOSURE_TOLERANCE_FT',
  varaFeet: 'SURVEY_VARA_FEET',
  precisionWarningPpm: 'SURVEY_PRECISION_WARNING_PPM',
  coordinateDecimals: 'SURVEY_COORDINATE_DECIMALS',
}

type EnvSource = Record<string, string | undefined>

function readEnvNumber(env: EnvSource, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid value for ${key}: expected a non-negative number, got "${raw}"`)
  }
  return value
}

/**
 * Resolve the survey configuration: explicit overrides > environment > defaults.
 * Throws on malformed environment values and on out-of-range results.
 */
export function resolveSurveyConfig(
  env: EnvSource = process.env,
  overrides: Partial<SurveyConfig> = {},
): SurveyConfig {
  const config: SurveyConfig = { ...DEFAULT_SURVEY_CONFIG }
  for (const key of SURVEY_CONFIG_KEYS) {
    const fromEnv = readEnvNumber(env, SURVEY_ENV_KEYS[key])
    if (fromEnv !== undefined) config[key] = fromEnv
  }
  Object.assign(config, overrides)

  for (const key of SURVEY_CONFIG_KEYS) {
    const value = config[key]
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`${key} must be a non-negative number, got ${value}`)
    }
  }
  const decimals = config.coordinateDecimals
  if (!Number.isInteger(decimals) || decimals > 12) {
    throw new Error(`coordinateDecimals must be an integer between 0 and 12, got ${decimals}`)
  }
  return config
}
