/**
 * Traverse text for GIS traverse import.
 *
 *   TRAVERSE
 *   UNITS FEET
 *   DIRECTION AZIMUTH
 *   BEGIN <x> <y>
 *   COURSE <azimuth> <distance>     one per leg
 *   END
 *
 * Courses are measured from consecutive coordinates, so the file describes
 * the plotted geometry even when the coordinates were edited after the
 * traverse was computed.
 */

import { azimuthOf, formatAzimuth } from '@deed-plot/survey'
import { ok, type Coordinate, type Result, type SurveyError } from '@deed-plot/types'
import { formatNumber } from './format'
import type { ResolvedExportOptions } from './types'

export const AZIMUTH_DECIMALS = 6

export function toEsriTraverse(
  coordinates: readonly Coordinate[],
  options: ResolvedExportOptions,
): Result<string, SurveyError> {
  const { decimals } = options
  const lines = ['TRAVERSE', 'UNITS FEET', 'DIRECTION AZIMUTH']

  const start = coordinates[0]
  if (start) lines.push(`BEGIN ${formatNumber(start.x, decimals)} ${formatNumber(start.y, decimals)}`)

  for (let i = 1; i < coordinates.length; i++) {
    const from = coordinates[i - 1]
    const to = coordinates[i]
    if (!from || !to) continue
    const dx = to.x - from.x
    const dy = to.y - from.y
    const azimuth = formatAzimuth(azimuthOf(dx, dy), AZIMUTH_DECIMALS)
    lines.push(`COURSE ${azimuth} ${formatNumber(Math.hypot(dx, dy), decimals)}`)
  }

  lines.push('END')
  return ok(lines.join('\n') + '\n')
}
