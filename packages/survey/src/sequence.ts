/**
 * Call Sequence Model
 *
 * Normalizes every call independently and reports all defects at once:
 * the caller gets either the complete normalized sequence or the complete
 * list of per-call errors, never a partial sequence.
 */

import {
  err,
  ok,
  type Call,
  type NormalizedCall,
  type Result,
  type SurveyError,
} from '@deed-plot/types'
import { parseBearing } from './bearing'
import { parseDistance, type DistanceOptions } from './distance'

/** A polygon needs at least three sides. */
export const MIN_POLYGON_CALLS = 3

export type SequenceOptions = DistanceOptions

/** Normalize one call, returning the error(s) for each field that failed. */
export function normalizeCall(
  call: Call,
  index: number,
  options: SequenceOptions = {},
): Result<NormalizedCall, SurveyError[]> {
  const errors: SurveyError[] = []

  const azimuth = parseBearing(call.bearingText)
  if (!azimuth.ok) errors.push({ ...azimuth.error, index, field: 'bearing' })

  const distance = parseDistance(call.distanceText, call.unit, options)
  if (!distance.ok) errors.push({ ...distance.error, index, field: 'distance' })

  if (!azimuth.ok || !distance.ok) return err(errors)

  return ok({
    azimuthDegrees: azimuth.value,
    distanceFeet: distance.value,
    bearingText: call.bearingText,
    distanceText: call.distanceText,
    monument: call.monument,
    description: call.description,
  })
}

/**
 * Build the normalized call sequence, preserving input order.
 *
 * Fails with every per-call error when any call is malformed, and with a
 * `DegeneratePolygon` error when fewer than three calls are valid or when
 * no call has a positive length.
 */
export function buildSequence(
  calls: readonly Call[],
  options: SequenceOptions = {},
): Result<NormalizedCall[], SurveyError[]> {
  const normalized: NormalizedCall[] = []
  const errors: SurveyError[] = []

  calls.forEach((call, index) => {
    const result = normalizeCall(call, index, options)
    if (result.ok) normalized.push(result.value)
    else errors.push(...result.error)
  })

  if (normalized.length < MIN_POLYGON_CALLS) {
    errors.push({
      kind: 'DegeneratePolygon',
      reason: `a boundary needs at least ${MIN_POLYGON_CALLS} valid calls, got ${normalized.length}`,
    })
  } else if (errors.length === 0 && normalized.every((c) => c.distanceFeet === 0)) {
    errors.push({ kind: 'DegeneratePolygon', reason: 'every call has zero length' })
  }

  return errors.length > 0 ? err(errors) : ok(normalized)
}
