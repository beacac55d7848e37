/**
 * Bearing Normalizer
 *
 * Turns a bearing as written in a deed into an azimuth (degrees clockwise
 * from north, in [0, 360)). Accepted forms, case-insensitive:
 *
 * - Quadrant DMS:      N45°30'15"E, N45-30-15E, N 45 30 15 E,
 *                      North 45 degrees 30 minutes East
 * - Quadrant decimal:  N45.504E
 * - Azimuth:           245.5, 245°30'15"
 * - Cardinal:          N, S, E, W (or the full words)
 *
 * Anything that does not match one of these completely is rejected; no
 * intent is guessed from a partial match.
 */

import { err, ok, type Result, type SurveyError } from '@deed-plot/types'
import { normalizeAzimuth } from './angles'

const CARDINAL_AZIMUTHS: Record<string, number> = { N: 0, E: 90, S: 180, W: 270 }

const WORD_REPLACEMENTS: Array<[RegExp, string]> = [
  [/\bNORTH\b/g, 'N'],
  [/\bSOUTH\b/g, 'S'],
  [/\bEAST\b/g, 'E'],
  [/\bWEST\b/g, 'W'],
  [/''/g, '"'],
  [/[º˚]/g, '°'],
  [/[′’]/g, "'"],
  [/[″”]/g, '"'],
]

/** One numeric component of an angle and the unit mark that followed it, if any. */
interface AngleToken {
  value: number
  text: string
  slot: AngleSlot | undefined
}

/** 0 = degrees, 1 = minutes, 2 = seconds */
type AngleSlot = 0 | 1 | 2

const TOKEN_SOURCE = /(\d+(?:\.\d+)?|\.\d+)\s*(°|DEGREES?|DEGS?|'|MINUTES?|MINS?|"|SECONDS?|SECS?)?/.source

function markToSlot(mark: string | undefined): AngleSlot | undefined {
  if (mark === undefined) return undefined
  if (mark === '°' || mark.startsWith('DEG')) return 0
  if (mark === "'" || mark.startsWith('MIN')) return 1
  return 2
}

function invalid(originalText: string, reason: string): { ok: false; error: SurveyError } {
  return err({ kind: 'InvalidBearing', originalText, reason })
}

/** Split an angle body into components. Separators are only allowed between components. */
function tokenizeAngle(body: string): Result<AngleToken[], string> {
  const separator = /[\s-]*/y
  const token = new RegExp(TOKEN_SOURCE, 'y')
  const tokens: AngleToken[] = []
  let pos = 0
  if (/^[\s-]/.test(body)) return err('separator before the first angle component')
  while (pos < body.length) {
    if (tokens.length > 0) {
      separator.lastIndex = pos
      separator.exec(body)
      pos = separator.lastIndex
      if (pos >= body.length) return err('separator after the last angle component')
    }

    token.lastIndex = pos
    const match = token.exec(body)
    if (!match || match[1] === undefined) return err('no angle found')
    tokens.push({ value: Number(match[1]), text: match[1], slot: markToSlot(match[2]) })
    pos = token.lastIndex
  }
  return ok(tokens)
}

/**
 * Combine degree/minute/second tokens into decimal degrees.
 * Unmarked tokens fill the slot after the previous one.
 */
function parseAngle(body: string): Result<number, string> {
  const tokenized = tokenizeAngle(body)
  if (!tokenized.ok) return tokenized
  const tokens = tokenized.value
  if (tokens.length === 0) return err('no angle found')
  if (tokens.length > 3) return err('too many angle components')

  const parts: [number, number, number] = [0, 0, 0]
  let nextSlot = 0
  for (const [i, token] of tokens.entries()) {
    const slot = token.slot ?? nextSlot
    if (slot < nextSlot || slot > 2) return err('angle components out of order')
    if (i < tokens.length - 1 && token.text.includes('.')) {
      return err('only the last angle component may have a fraction')
    }
    if (slot > 0 && token.value >= 60) {
      return err(`${slot === 1 ? 'minutes' : 'seconds'} must be less than 60`)
    }
    parts[slot] = token.value
    nextSlot = slot + 1
  }
  return ok(parts[0] + parts[1] / 60 + parts[2] / 3600)
}

function quadrantToAzimuth(ns: string, ew: string, angle: number): number {
  if (ns === 'N') return ew === 'E' ? angle : normalizeAzimuth(360 - angle)
  return ew === 'E' ? 180 - angle : 180 + angle
}

/**
 * Parse a bearing into an azimuth in [0, 360).
 *
 * @example parseBearing(`S45°30'E`) // { ok: true, value: 134.5 }
 */
export function parseBearing(text: string): Result<number, SurveyError> {
  let s = text.trim().toUpperCase()
  for (const [pattern, replacement] of WORD_REPLACEMENTS) s = s.replace(pattern, replacement)
  s = s.replace(/\s+/g, ' ').trim()

  if (s === '') return invalid(text, 'bearing is empty')

  const cardinal = CARDINAL_AZIMUTHS[s]
  if (cardinal !== undefined) return ok(cardinal)

  const quadrant = /^([NS])\s*(.*?)\s*([EW])$/.exec(s)
  if (quadrant) {
    const [, ns = '', body = '', ew = ''] = quadrant
    const angle = parseAngle(body)
    if (!angle.ok) return invalid(text, angle.error)
    if (angle.value > 90) return invalid(text, `quadrant angle ${angle.value}° exceeds 90°`)
    return ok(quadrantToAzimuth(ns, ew, angle.value))
  }

  if (/^[EW].*[NS]$/.test(s)) {
    return invalid(text, 'quadrant letters reversed: expected N or S first, E or W last')
  }

  if (/^[\d.]/.test(s)) {
    const angle = parseAngle(s)
    if (!angle.ok) return invalid(text, angle.error)
    if (angle.value >= 360) return invalid(text, `azimuth ${angle.value}° must be less than 360°`)
    return ok(angle.value)
  }

  return invalid(text, 'unrecognized bearing format')
}
