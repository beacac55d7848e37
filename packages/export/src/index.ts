/**
 * @deed-plot/export
 *
 * Serializers from a traverse's coordinate list to CAD and GIS exchange
 * formats: DXF, CSV, ESRI traverse text, AutoCAD script and KML.
 */

// Types
export type {
  ExportArtifact,
  ExportOptions,
  ResolvedExportOptions,
  GeodeticAnchor,
  Serializer,
  FormatInfo,
} from './types'

// Registry
export { exportCoordinates, exportFilename, FORMAT_INFO, EXPORT_BASENAME } from './registry'

// Bundles
export {
  exportAll,
  packageArchive,
  ARCHIVE_FILENAME,
  ARCHIVE_MIME_TYPE,
  type ExportBundle,
  type ExportFailure,
} from './bundle'

// Individual writers
export { toDxf, BOUNDARY_LAYER, LABEL_LAYER } from './dxf'
export { toCsv, csvField, CSV_HEADER } from './csv'
export { toEsriTraverse, AZIMUTH_DECIMALS } from './esri-traverse'
export { toAutocadScript } from './autocad-script'
export { toKml, KML_NAMESPACE, BOUNDARY_PLACEMARK_NAME, GEODETIC_DECIMALS, type KmlCoordinateSystem } from './kml'

// Helpers
export { formatNumber, resolveExportOptions, DEFAULT_TEXT_HEIGHT, DEFAULT_DOCUMENT_NAME } from './format'
export {
  localToGeodetic,
  metersPerDegreeLatitude,
  metersPerDegreeLongitude,
  METERS_PER_FOOT,
} from './projection'
