import { ok, type Coordinate, type Result, type SurveyError } from '@deed-plot/types'
import { formatNumber } from './format'
import type { ResolvedExportOptions } from './types'

export const CSV_HEADER = 'point_number,x,y,label,description'

/** RFC 4180 field: quoted only when it holds a comma, quote or line break. */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

/** Coordinate table, one row per point in traverse order. */
export function toCsv(
  coordinates: readonly Coordinate[],
  options: ResolvedExportOptions,
): Result<string, SurveyError> {
  const rows = coordinates.map((c) => [
    String(c.pointNumber),
    formatNumber(c.x, options.decimals),
    formatNumber(c.y, options.decimals),
    csvField(c.label),
    csvField(c.description),
  ].join(','))

  return ok([CSV_HEADER, ...rows].join('\n') + '\n')
}
