/**
 * @deed-plot/survey
 *
 * Pure survey computations for metes-and-bounds descriptions:
 * - Bearing and distance normalization
 * - Call sequence validation with complete error collection
 * - Traverse coordinates from the Point of Beginning
 * - Closure, precision, area and perimeter analysis
 * - Plot validation and drawing hints
 */

// Angles
export {
  toRadians,
  normalizeAzimuth,
  azimuthOf,
  toDms,
  formatBearing,
  formatAzimuth,
  type Dms,
  type BearingFormatOptions,
} from './angles'

// Normalizers
export { parseBearing } from './bearing'
export {
  parseDistance,
  resolveUnit,
  type LinearUnit,
  type ResolvedUnit,
  type DistanceOptions,
} from './distance'

// Call sequence
export { buildSequence, normalizeCall, MIN_POLYGON_CALLS, type SequenceOptions } from './sequence'

// Traverse
export { computeTraverse, perimeterOf, pointLabel, POB_DESCRIPTION } from './traverse'

// Closure
export {
  analyzeClosure,
  signedArea,
  polygonArea,
  orientationOf,
  formatPrecisionRatio,
  EXACT_CLOSURE_EPSILON_FT,
  CLOSED_BEARING,
  EXACT_PRECISION_RATIO,
  type ClosureOptions,
} from './closure'

// Review
export {
  validatePlot,
  type PlotValidation,
  type PlotValidationOptions,
  type PlotIssue,
  type PlotIssueType,
} from './validation'
export {
  buildPlotInstructions,
  BOUNDARY_COLOR,
  OPEN_CLOSURE_COLOR,
  CLOSED_CLOSURE_COLOR,
  type PlotInstructions,
  type PlotLine,
} from './instructions'

// Pipeline
export {
  analyzeCalls,
  analyzeNormalized,
  type AnalysisOptions,
  type TraverseAnalysis,
} from './pipeline'
