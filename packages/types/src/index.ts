// Domain types shared by the survey core, the exporters and the server.

export {
  POB_LABEL,
  EXPORT_FORMATS,
  isExportFormat,
  type Call,
  type NormalizedCall,
  type Coordinate,
  type ClosureResult,
  type PolygonOrientation,
  type ExportFormat,
} from './survey'

export {
  ok,
  err,
  unwrap,
  describeError,
  assertNever,
  SurveyFailure,
  type Result,
  type SurveyError,
  type SurveyErrorKind,
  type CallField,
} from './result'
