/**
 * DXF (R12 ASCII) writer.
 *
 * Output is a flat list of group-code / value line pairs:
 *
 *   HEADER    $ACADVER = AC1009
 *   ENTITIES  POLYLINE on layer BOUNDARY with one VERTEX per point, SEQEND,
 *             then one TEXT entity per point on layer LABELS
 */

import { ok, type Coordinate, type Result, type SurveyError } from '@deed-plot/types'
import { formatNumber, singleLine } from './format'
import type { ResolvedExportOptions } from './types'

export const BOUNDARY_LAYER = 'BOUNDARY'
export const LABEL_LAYER = 'LABELS'

type Group = [code: number, value: string]

function vertexGroups(c: Coordinate, decimals: number): Group[] {
  return [
    [0, 'VERTEX'],
    [8, BOUNDARY_LAYER],
    [10, formatNumber(c.x, decimals)],
    [20, formatNumber(c.y, decimals)],
    [30, formatNumber(0, decimals)],
  ]
}

function textGroups(c: Coordinate, options: ResolvedExportOptions): Group[] {
  return [
    [0, 'TEXT'],
    [8, LABEL_LAYER],
    [10, formatNumber(c.x, options.decimals)],
    [20, formatNumber(c.y, options.decimals)],
    [30, formatNumber(0, options.decimals)],
    [40, formatNumber(options.textHeight, options.decimals)],
    [1, singleLine(c.label)],
  ]
}

export function toDxf(
  coordinates: readonly Coordinate[],
  options: ResolvedExportOptions,
): Result<string, SurveyError> {
  const zero = formatNumber(0, options.decimals)
  const groups: Group[] = [
    [0, 'SECTION'],
    [2, 'HEADER'],
    [9, '$ACADVER'],
    [1, 'AC1009'],
    [0, 'ENDSEC'],
    [0, 'SECTION'],
    [2, 'ENTITIES'],
    [0, 'POLYLINE'],
    [8, BOUNDARY_LAYER],
    [66, '1'],
    [70, '0'],
    [10, zero],
    [20, zero],
    [30, zero],
    ...coordinates.flatMap((c) => vertexGroups(c, options.decimals)),
    [0, 'SEQEND'],
    [8, BOUNDARY_LAYER],
    ...coordinates.flatMap((c) => textGroups(c, options)),
    [0, 'ENDSEC'],
    [0, 'EOF'],
  ]

  return ok(groups.map(([code, value]) => `${code}\n${value}\n`).join(''))
}
