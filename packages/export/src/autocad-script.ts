/**
 * AutoCAD script (.scr). Each line answers one command prompt: a LINE
 * through every point ended by an empty answer, then a TEXT command per
 * point (insertion point, height, rotation, text).
 */

import { ok, type Coordinate, type Result, type SurveyError } from '@deed-plot/types'
import { formatNumber, singleLine } from './format'
import type { ResolvedExportOptions } from './types'

function point(c: Coordinate, decimals: number): string {
  return `${formatNumber(c.x, decimals)},${formatNumber(c.y, decimals)}`
}

export function toAutocadScript(
  coordinates: readonly Coordinate[],
  options: ResolvedExportOptions,
): Result<string, SurveyError> {
  const { decimals } = options
  const lines: string[] = []

  if (coordinates.length >= 2) {
    lines.push('LINE', ...coordinates.map((c) => point(c, decimals)), '')
  }

  for (const c of coordinates) {
    lines.push(
      'TEXT',
      point(c, decimals),
      formatNumber(options.textHeight, decimals),
      '0',
      singleLine(c.label),
    )
  }

  return ok(lines.join('\n') + '\n')
}
