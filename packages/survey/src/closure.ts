/**
 * Closure Analyzer
 *
 * Measures how far the traverse ends from its Point of Beginning and derives
 * the area, precision and closure statistics reported to the surveyor.
 */

import { DEFAULT_SURVEY_CONFIG, SQ_FEET_PER_ACRE } from '@deed-plot/config'
import {
  err,
  ok,
  type ClosureResult,
  type Coordinate,
  type PolygonOrientation,
  type Result,
  type SurveyError,
} from '@deed-plot/types'
import { azimuthOf, formatBearing } from './angles'

/** Misclosures below this are floating-point noise and count as exact. */
export const EXACT_CLOSURE_EPSILON_FT = 1e-9

export const CLOSED_BEARING = 'N/A'
export const EXACT_PRECISION_RATIO = '1:∞'

export interface ClosureOptions {
  /** Largest misclosure in feet still reported as closed */
  closureToleranceFt?: number
}

type Point = Pick<Coordinate, 'x' | 'y'>

/**
 * Signed shoelace area over the implicitly closed polygon (last → first).
 * Positive when the vertices run counterclockwise in x/y.
 */
export function signedArea(points: readonly Point[]): number {
  const n = points.length
  if (n < 3) return 0
  let twice = 0
  for (let i = 0; i < n; i++) {
    const a = points[i]
    const b = points[(i + 1) % n]
    if (!a || !b) continue
    twice += a.x * b.y - b.x * a.y
  }
  return twice / 2
}

/** Unsigned area in square feet; winding direction does not change it. */
export function polygonArea(points: readonly Point[]): number {
  return Math.abs(signedArea(points))
}

export function orientationOf(points: readonly Point[]): PolygonOrientation {
  const area = signedArea(points)
  if (Math.abs(area) < EXACT_CLOSURE_EPSILON_FT) return 'degenerate'
  return area > 0 ? 'counterclockwise' : 'clockwise'
}

export function formatPrecisionRatio(perimeterFeet: number, closureDistance: number): string {
  if (closureDistance < EXACT_CLOSURE_EPSILON_FT) return EXACT_PRECISION_RATIO
  return `1:${Math.round(perimeterFeet / closureDistance)}`
}

function degenerate(reason: string): { ok: false; error: SurveyError } {
  return err({ kind: 'DegenerateGeometry', reason })
}

/**
 * Analyze the closure of a coordinate sequence.
 *
 * `perimeterFeet` is the sum of the call lengths that produced the
 * coordinates; it is taken as given rather than re-measured.
 */
export function analyzeClosure(
  coordinates: readonly Coordinate[],
  perimeterFeet: number,
  options: ClosureOptions = {},
): Result<ClosureResult, SurveyError> {
  const first = coordinates[0]
  const last = coordinates[coordinates.length - 1]
  if (!first || !last) return degenerate('no coordinates to analyze')
  if (!Number.isFinite(perimeterFeet) || perimeterFeet <= 0) {
    return degenerate(`perimeter must be positive, got ${perimeterFeet}`)
  }

  const tolerance = options.closureToleranceFt ?? DEFAULT_SURVEY_CONFIG.closureToleranceFt

  const closureDx = first.x - last.x
  const closureDy = first.y - last.y
  const closureDistance = Math.hypot(closureDx, closureDy)
  const isClosed = closureDistance <= tolerance

  const areaSqFeet = polygonArea(coordinates)

  return ok({
    closureDistance,
    closureBearing: isClosed ? CLOSED_BEARING : formatBearing(azimuthOf(closureDx, closureDy)),
    precisionRatio: formatPrecisionRatio(perimeterFeet, closureDistance),
    areaAcres: areaSqFeet / SQ_FEET_PER_ACRE,
    areaSqFeet,
    perimeterFeet,
    isClosed,
    closureErrorPpm: (closureDistance / perimeterFeet) * 1_000_000,
    closureDx,
    closureDy,
    orientation: orientationOf(coordinates),
  })
}
