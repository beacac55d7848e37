// Shared configuration: survey conventions and their environment overrides.
// Server-only settings (port, CORS, cache) live in apps/server/src/lib/env.ts.

export {
  resolveSurveyConfig,
  DEFAULT_SURVEY_CONFIG,
  SURVEY_CONFIG_KEYS,
  SURVEY_ENV_KEYS,
  SQ_FEET_PER_ACRE,
  type SurveyConfig,
  type SurveyConfigKey,
} from './survey'
