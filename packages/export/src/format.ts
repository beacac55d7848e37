import { DEFAULT_SURVEY_CONFIG } from '@deed-plot/config'
import { err, ok, type Coordinate, type Result, type SurveyError } from '@deed-plot/types'
import type { ExportOptions, ResolvedExportOptions } from './types'

export const DEFAULT_TEXT_HEIGHT = 2.5
export const DEFAULT_DOCUMENT_NAME = 'Deed Plot'

export function resolveExportOptions(options: ExportOptions = {}): ResolvedExportOptions {
  return {
    decimals: options.decimals ?? DEFAULT_SURVEY_CONFIG.coordinateDecimals,
    textHeight: options.textHeight ?? DEFAULT_TEXT_HEIGHT,
    anchor: options.anchor,
    documentName: options.documentName ?? DEFAULT_DOCUMENT_NAME,
  }
}

/** Fixed-decimal rendering that never writes a negative zero. */
export function formatNumber(value: number, decimals: number): string {
  const text = value.toFixed(decimals)
  return /^-0(\.0*)?$/.test(text) ? text.slice(1) : text
}

/** Collapse line breaks so a label fits on one line of a line-oriented format. */
export function singleLine(text: string): string {
  return text.replace(/[\r\n]+/g, ' ').trim()
}

/** Shared precondition: at least one point and only finite coordinates. */
export function checkCoordinates(coordinates: readonly Coordinate[]): Result<void, SurveyError> {
  if (coordinates.length === 0) {
    return err({ kind: 'DegenerateGeometry', reason: 'no coordinates to export' })
  }
  const bad = coordinates.find((c) => !Number.isFinite(c.x) || !Number.isFinite(c.y))
  if (bad) {
    return err({
      kind: 'DegenerateGeometry',
      reason: `point ${bad.label} has a non-finite coordinate`,
    })
  }
  return ok(undefined)
}
