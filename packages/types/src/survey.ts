// ─── Calls ───────────────────────────────────────────────────────────────────

/**
 * A single metes-and-bounds call as received from the upstream extractor.
 * Never mutated after creation.
 */
export interface Call {
  /** Bearing as written in the deed, e.g. `N45°30'15"E` */
  readonly bearingText: string
  /** Distance as written, optionally with a unit, e.g. `66.0 ch` */
  readonly distanceText: string
  /** Unit applied when `distanceText` carries none */
  readonly unit?: string
  readonly monument?: string
  readonly description?: string
}

/** A call whose bearing and distance have been reduced to numbers. */
export interface NormalizedCall {
  /** Degrees clockwise from north, in [0, 360) */
  readonly azimuthDegrees: number
  /** Non-negative length in US survey feet */
  readonly distanceFeet: number
  readonly bearingText: string
  readonly distanceText: string
  readonly monument?: string
  readonly description?: string
}

// ─── Coordinates ─────────────────────────────────────────────────────────────

/** Label carried by the first point of every traverse. */
export const POB_LABEL = 'POB'

/**
 * One vertex of the traverse. Point *i* records the call that led to it
 * from point *i - 1*; the POB records no incoming call.
 */
export interface Coordinate {
  readonly pointNumber: number
  /** Easting in feet from the POB */
  readonly x: number
  /** Northing in feet from the POB */
  readonly y: number
  readonly label: string
  readonly description: string
  readonly monument?: string
  readonly bearing?: string
  readonly distance?: number
  readonly units?: string
}

// ─── Closure ─────────────────────────────────────────────────────────────────

export type PolygonOrientation = 'clockwise' | 'counterclockwise' | 'degenerate'

export interface ClosureResult {
  /** Gap between the last computed point and the POB, in feet */
  readonly closureDistance: number
  /** Quadrant bearing from the last point back to the POB, or `N/A` when closed */
  readonly closureBearing: string
  /** `1:N`, or `1:∞` for an exact closure */
  readonly precisionRatio: string
  readonly areaAcres: number
  readonly areaSqFeet: number
  readonly perimeterFeet: number
  readonly isClosed: boolean
  readonly closureErrorPpm: number
  /** Easting component of the vector from the last point to the POB */
  readonly closureDx: number
  /** Northing component of the vector from the last point to the POB */
  readonly closureDy: number
  readonly orientation: PolygonOrientation
}

// ─── Export ──────────────────────────────────────────────────────────────────

export const EXPORT_FORMATS = ['dxf', 'csv', 'esri_traverse', 'autocad_script', 'kml'] as const

/** Closed set of supported export formats. */
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value)
}
