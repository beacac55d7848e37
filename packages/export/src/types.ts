import type { Coordinate, ExportFormat, Result, SurveyError } from '@deed-plot/types'

/** Geodetic position of the Point of Beginning, used to place a plot on the globe. */
export interface GeodeticAnchor {
  latitude: number
  longitude: number
}

export interface ExportOptions {
  /** Decimal places for coordinates and distances (default from config) */
  decimals?: number
  /** Label height in drawing units for DXF and script output */
  textHeight?: number
  /** When set, KML output is reprojected to WGS84 around this point */
  anchor?: GeodeticAnchor
  /** Document title written into formats that carry one */
  documentName?: string
}

/** Options after defaults have been applied. */
export interface ResolvedExportOptions {
  decimals: number
  textHeight: number
  anchor: GeodeticAnchor | undefined
  documentName: string
}

/** A serializer turns the coordinate list into the text of one file format. */
export type Serializer = (
  coordinates: readonly Coordinate[],
  options: ResolvedExportOptions,
) => Result<string, SurveyError>

/** One exported file. */
export interface ExportArtifact {
  format: ExportFormat
  filename: string
  mimeType: string
  text: string
  bytes: Uint8Array
}

export interface FormatInfo {
  extension: string
  mimeType: string
  label: string
}
