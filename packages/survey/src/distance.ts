/**
 * Distance Normalizer
 *
 * Converts a distance, optionally carrying a unit (`66.0 ch`, `2 rods`,
 * `125.75'`), into feet.
 */

import { DEFAULT_SURVEY_CONFIG } from '@deed-plot/config'
import { err, ok, type Result, type SurveyError } from '@deed-plot/types'

export type LinearUnit = 'feet' | 'chains' | 'rods' | 'varas' | 'links'

export interface DistanceOptions {
  /** Feet per vara; defaults to the configured convention */
  varaFeet?: number
}

const UNIT_ALIASES: Record<string, LinearUnit> = {
  "'": 'feet',
  FT: 'feet',
  FOOT: 'feet',
  FEET: 'feet',
  CH: 'chains',
  CHS: 'chains',
  CHAIN: 'chains',
  CHAINS: 'chains',
  RD: 'rods',
  RDS: 'rods',
  ROD: 'rods',
  RODS: 'rods',
  POLE: 'rods',
  POLES: 'rods',
  PERCH: 'rods',
  PERCHES: 'rods',
  VR: 'varas',
  VRS: 'varas',
  VARA: 'varas',
  VARAS: 'varas',
  LI: 'links',
  LK: 'links',
  LKS: 'links',
  LINK: 'links',
  LINKS: 'links',
}

/** Feet per unit. Varas are resolved from options at call time. */
const FIXED_FACTORS: Record<Exclude<LinearUnit, 'varas'>, number> = {
  feet: 1,
  chains: 66,
  rods: 16.5,
  links: 0.66,
}

export interface ResolvedUnit {
  unit: LinearUnit
  feetPerUnit: number
}

/** Look up a unit token such as `ch`, `Rods` or `'`. Trailing periods are ignored. */
export function resolveUnit(token: string, options: DistanceOptions = {}): ResolvedUnit | undefined {
  const key = token.trim().toUpperCase().replace(/\.$/, '')
  const unit = UNIT_ALIASES[key]
  if (unit === undefined) return undefined
  const feetPerUnit = unit === 'varas'
    ? options.varaFeet ?? DEFAULT_SURVEY_CONFIG.varaFeet
    : FIXED_FACTORS[unit]
  return { unit, feetPerUnit }
}

const DISTANCE_PATTERN = /^([+-]?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d*)?|[+-]?\.\d+)\s*(.*)$/

function invalid(originalText: string, reason: string): { ok: false; error: SurveyError } {
  return err({ kind: 'InvalidDistance', originalText, reason })
}

/**
 * Parse a distance into feet. A unit written in the text wins over the
 * `unit` argument; with neither, the value is taken as feet.
 *
 * @example parseDistance('1 chain') // { ok: true, value: 66 }
 */
export function parseDistance(
  input: string | number,
  unit?: string,
  options: DistanceOptions = {},
): Result<number, SurveyError> {
  const originalText = String(input)

  let value: number
  let unitToken = ''
  if (typeof input === 'number') {
    value = input
  } else {
    const match = DISTANCE_PATTERN.exec(input.trim())
    if (!match || match[1] === undefined) return invalid(originalText, 'no numeric distance found')
    value = Number(match[1].replace(/,/g, ''))
    unitToken = (match[2] ?? '').trim()
  }

  if (!Number.isFinite(value)) return invalid(originalText, 'distance is not a finite number')
  if (value < 0) return invalid(originalText, 'distance must not be negative')

  const token = unitToken || unit?.trim() || ''
  if (token === '') return ok(value)

  const resolved = resolveUnit(token, options)
  if (!resolved) return invalid(originalText, `unknown unit "${token}"`)
  return ok(value * resolved.feetPerUnit)
}
