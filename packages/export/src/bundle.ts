import JSZip from 'jszip'
import { EXPORT_FORMATS, type Coordinate, type ExportFormat, type SurveyError } from '@deed-plot/types'
import { exportCoordinates } from './registry'
import type { ExportArtifact, ExportOptions } from './types'

export const ARCHIVE_FILENAME = 'deed_plot_exports.zip'
export const ARCHIVE_MIME_TYPE = 'application/zip'

/** Entry timestamp written for every file so identical bundles zip identically. */
const ARCHIVE_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1))

export interface ExportFailure {
  format: ExportFormat
  error: SurveyError
}

export interface ExportBundle {
  artifacts: ExportArtifact[]
  failures: ExportFailure[]
}

/**
 * Run every serializer independently. A format that fails is reported in
 * `failures` and the remaining formats are still produced.
 */
export function exportAll(
  coordinates: readonly Coordinate[],
  options: ExportOptions = {},
  formats: readonly ExportFormat[] = EXPORT_FORMATS,
): ExportBundle {
  const bundle: ExportBundle = { artifacts: [], failures: [] }

  for (const format of formats) {
    let result: ReturnType<typeof exportCoordinates>
    try {
      result = exportCoordinates(coordinates, format, options)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      bundle.failures.push({ format, error: { kind: 'DegenerateGeometry', reason } })
      continue
    }
    if (result.ok) bundle.artifacts.push(result.value)
    else bundle.failures.push({ format, error: result.error })
  }

  return bundle
}

/** Pack the bundle's artifacts into a single ZIP archive. */
export async function packageArchive(bundle: ExportBundle): Promise<ArrayBuffer> {
  const zip = new JSZip()

  for (const artifact of bundle.artifacts) {
    zip.file(artifact.filename, artifact.bytes, { date: ARCHIVE_ENTRY_DATE, binary: true })
  }

  return zip.generateAsync({
    type: 'arraybuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  })
}
