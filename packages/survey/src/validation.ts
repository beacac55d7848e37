import { DEFAULT_SURVEY_CONFIG } from '@deed-plot/config'
import type { ClosureResult, Coordinate } from '@deed-plot/types'

export type PlotIssueType = 'closure' | 'precision' | 'insufficient_data'

export interface PlotIssue {
  type: PlotIssueType
  message: string
}

export interface PlotValidation {
  isValid: boolean
  warnings: PlotIssue[]
  errors: PlotIssue[]
}

export interface PlotValidationOptions {
  /** Closure error (ppm) above which precision is flagged */
  precisionWarningPpm?: number
}

/**
 * Review a computed plot for problems worth surfacing to the user.
 * Misclosure and low precision are warnings; too few points is an error.
 */
export function validatePlot(
  coordinates: readonly Coordinate[],
  closure: ClosureResult,
  options: PlotValidationOptions = {},
): PlotValidation {
  const threshold = options.precisionWarningPpm ?? DEFAULT_SURVEY_CONFIG.precisionWarningPpm
  const warnings: PlotIssue[] = []
  const errors: PlotIssue[] = []

  if (!closure.isClosed) {
    warnings.push({
      type: 'closure',
      message: `Plot does not close. Closure distance: ${closure.closureDistance.toFixed(3)} feet`,
    })
  }

  if (closure.closureErrorPpm > threshold) {
    warnings.push({
      type: 'precision',
      message: `Low precision: ${closure.precisionRatio}`,
    })
  }

  if (coordinates.length < 3) {
    errors.push({
      type: 'insufficient_data',
      message: 'Insufficient coordinate points for a valid plot',
    })
  }

  return { isValid: errors.length === 0, warnings, errors }
}
