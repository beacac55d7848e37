import {
  err,
  isExportFormat,
  ok,
  EXPORT_FORMATS,
  type Coordinate,
  type ExportFormat,
  type Result,
  type SurveyError,
} from '@deed-plot/types'
import { toAutocadScript } from './autocad-script'
import { toCsv } from './csv'
import { toDxf } from './dxf'
import { toEsriTraverse } from './esri-traverse'
import { checkCoordinates, resolveExportOptions } from './format'
import { toKml } from './kml'
import type { ExportArtifact, ExportOptions, FormatInfo, Serializer } from './types'

/** Base name shared by every exported file. */
export const EXPORT_BASENAME = 'deed_plot'

export const FORMAT_INFO: Record<ExportFormat, FormatInfo> = {
  dxf: { extension: 'dxf', mimeType: 'application/dxf', label: 'AutoCAD DXF' },
  csv: { extension: 'csv', mimeType: 'text/csv', label: 'Coordinate CSV' },
  esri_traverse: { extension: 'txt', mimeType: 'text/plain', label: 'ESRI Traverse' },
  autocad_script: { extension: 'scr', mimeType: 'text/plain', label: 'AutoCAD Script' },
  kml: { extension: 'kml', mimeType: 'application/vnd.google-earth.kml+xml', label: 'Google Earth KML' },
}

/** One serializer per format; a new format does not compile until it has one. */
const SERIALIZERS: Record<ExportFormat, Serializer> = {
  dxf: toDxf,
  csv: toCsv,
  esri_traverse: toEsriTraverse,
  autocad_script: toAutocadScript,
  kml: toKml,
}

export function exportFilename(format: ExportFormat): string {
  return `${EXPORT_BASENAME}.${FORMAT_INFO[format].extension}`
}

/**
 * Serialize the coordinates into one format. Unknown format names yield an
 * `UnsupportedFormat` error rather than a throw.
 */
export function exportCoordinates(
  coordinates: readonly Coordinate[],
  format: string,
  options: ExportOptions = {},
): Result<ExportArtifact, SurveyError> {
  if (!isExportFormat(format)) {
    return err({
      kind: 'UnsupportedFormat',
      originalText: format,
      reason: `export format must be one of ${EXPORT_FORMATS.join(', ')}`,
    })
  }

  const checked = checkCoordinates(coordinates)
  if (!checked.ok) return checked

  const text = SERIALIZERS[format](coordinates, resolveExportOptions(options))
  if (!text.ok) return text

  return ok({
    format,
    filename: exportFilename(format),
    mimeType: FORMAT_INFO[format].mimeType,
    text: text.value,
    bytes: new TextEncoder().encode(text.value),
  })
}
