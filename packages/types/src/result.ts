// ─── Result Type ─────────────────────────────────────────────────────────────

/** Outcome of a computation that can fail without throwing. */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export type SurveyErrorKind =
  | 'InvalidBearing'
  | 'InvalidDistance'
  | 'DegeneratePolygon'
  | 'UnsupportedFormat'
  | 'DegenerateGeometry'

/** Which field of a call an error refers to. */
export type CallField = 'bearing' | 'distance'

/**
 * A typed, serializable error value. Parse errors carry the index of the
 * offending call and the text that failed to parse.
 */
export interface SurveyError {
  readonly kind: SurveyErrorKind
  readonly reason: string
  readonly originalText?: string
  readonly index?: number
  readonly field?: CallField
}

/** Error thrown by callers that prefer exceptions over `Result` values. */
export class SurveyFailure extends Error {
  constructor(public readonly errors: readonly SurveyError[]) {
    super(errors.map(describeError).join('; ') || 'Survey computation failed')
    this.name = 'SurveyFailure'
  }
}

/** One-line human readable rendering, e.g. `call 2 bearing "E45N": quadrant letters reversed`. */
export function describeError(error: SurveyError): string {
  const where = error.index !== undefined
    ? `call ${error.index + 1}${error.field ? ` ${error.field}` : ''}`
    : error.kind
  const text = error.originalText !== undefined ? ` "${error.originalText}"` : ''
  return `${where}${text}: ${error.reason}`
}

function isErrorList(error: SurveyError | readonly SurveyError[]): error is readonly SurveyError[] {
  return Array.isArray(error)
}

/** Return the value or throw a `SurveyFailure` carrying the error(s). */
export function unwrap<T>(result: Result<T, SurveyError | readonly SurveyError[]>): T {
  if (result.ok) return result.value
  throw new SurveyFailure(isErrorList(result.error) ? result.error : [result.error])
}

// ─── Exhaustive Check ────────────────────────────────────────────────────────

/** Compile-time exhaustive switch helper. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`)
}
