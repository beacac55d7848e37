import { Hono, type Context } from 'hono'
import type { SurveyConfig } from '@deed-plot/config'
import { hashCallSequence, type PipelineCache } from '@deed-plot/cache'
import {
  ARCHIVE_FILENAME,
  ARCHIVE_MIME_TYPE,
  exportAll,
  exportCoordinates,
  packageArchive,
} from '@deed-plot/export'
import {
  callSequenceSchema,
  closureRequestSchema,
  exportRequestSchema,
} from '@deed-plot/shared'
import {
  analyzeClosure,
  analyzeNormalized,
  buildPlotInstructions,
  buildSequence,
  validatePlot,
  type TraverseAnalysis,
} from '@deed-plot/survey'
import {
  assertNever,
  describeError,
  type Call,
  type Result,
  type SurveyError,
  type SurveyErrorKind,
} from '@deed-plot/types'
import { log } from '../lib/log'
import { parseBody, isResponse } from '../lib/validate'

export type AnalysisResult = Result<TraverseAnalysis, SurveyError[]>

export interface PlottingDeps {
  config: SurveyConfig
  cache: PipelineCache<AnalysisResult>
}

export function statusFor(kind: SurveyErrorKind): 400 | 422 {
  switch (kind) {
    case 'UnsupportedFormat':
      return 400
    case 'InvalidBearing':
    case 'InvalidDistance':
    case 'DegeneratePolygon':
    case 'DegenerateGeometry':
      return 422
    default:
      return assertNever(kind)
  }
}

function failure(c: Context, error: string, errors: readonly SurveyError[]): Response {
  const first = errors[0]
  const status = first ? statusFor(first.kind) : 422
  return c.json(
    { error, errors: errors.map((e) => ({ ...e, message: describeError(e) })) },
    status,
  )
}

function attachment(filename: string): string {
  return `attachment; filename="${filename}"`
}

export function plottingRoutes(deps: PlottingDeps): Hono {
  const { config, cache } = deps
  const routes = new Hono()

  /** Normalize, then traverse and close through the cache. */
  async function analyze(calls: readonly Call[]): Promise<AnalysisResult> {
    const sequence = buildSequence(calls, config)
    if (!sequence.ok) return sequence

    const normalized = sequence.value
    return cache.getOrCompute(hashCallSequence(normalized), () =>
      analyzeNormalized(normalized, config),
    )
  }

  /** POST /plotting/plot: coordinates, closure, validation and drawing hints */
  routes.post('/plot', async (c) => {
    const data = await parseBody(c, callSequenceSchema)
    if (isResponse(data)) return data

    const analysis = await analyze(data.calls)
    if (!analysis.ok) return failure(c, 'Could not plot the calls.', analysis.error)

    const { coordinates, closure } = analysis.value
    return c.json({
      success: true,
      coordinates,
      closure,
      validation: validatePlot(coordinates, closure, config),
      instructions: buildPlotInstructions(coordinates, closure),
    })
  })

  /** POST /plotting/coordinates: traverse coordinates only */
  routes.post('/coordinates', async (c) => {
    const data = await parseBody(c, callSequenceSchema)
    if (isResponse(data)) return data

    const analysis = await analyze(data.calls)
    if (!analysis.ok) return failure(c, 'Could not compute coordinates.', analysis.error)

    const { coordinates } = analysis.value
    return c.json({ success: true, coordinates, totalPoints: coordinates.length })
  })

  /** POST /plotting/closure: closure report for an existing coordinate list */
  routes.post('/closure', async (c) => {
    const data = await parseBody(c, closureRequestSchema)
    if (isResponse(data)) return data

    const perimeter =
      data.perimeterFeet ?? data.coordinates.reduce((sum, p) => sum + (p.distance ?? 0), 0)
    const closure = analyzeClosure(data.coordinates, perimeter, config)
    if (!closure.ok) return failure(c, 'Could not analyze closure.', [closure.error])

    return c.json({ success: true, closure: closure.value })
  })

  /** POST /plotting/validate: plot review without drawing hints */
  routes.post('/validate', async (c) => {
    const data = await parseBody(c, callSequenceSchema)
    if (isResponse(data)) return data

    const analysis = await analyze(data.calls)
    if (!analysis.ok) return failure(c, 'Could not validate the calls.', analysis.error)

    const { coordinates, closure } = analysis.value
    return c.json({
      success: true,
      validation: validatePlot(coordinates, closure, config),
      coordinates,
      closure,
    })
  })

  /** POST /plotting/export/all: every format in one ZIP archive */
  routes.post('/export/all', async (c) => {
    const data = await parseBody(c, exportRequestSchema)
    if (isResponse(data)) return data

    const bundle = exportAll(data.coordinates, {
      decimals: config.coordinateDecimals,
      anchor: data.anchor,
    })
    for (const { format, error } of bundle.failures) {
      log('warn', { event: 'export_failed', format, error: describeError(error) })
    }
    if (bundle.artifacts.length === 0) {
      return failure(c, 'No format could be exported.', bundle.failures.map((f) => f.error))
    }

    const archive = await packageArchive(bundle)
    return c.body(archive, 200, {
      'Content-Type': ARCHIVE_MIME_TYPE,
      'Content-Disposition': attachment(ARCHIVE_FILENAME),
    })
  })

  /** POST /plotting/export/:format: a single export file */
  routes.post('/export/:format', async (c) => {
    const data = await parseBody(c, exportRequestSchema)
    if (isResponse(data)) return data

    const artifact = exportCoordinates(data.coordinates, c.req.param('format'), {
      decimals: config.coordinateDecimals,
      anchor: data.anchor,
    })
    if (!artifact.ok) return failure(c, 'Export failed.', [artifact.error])

    const { text, mimeType, filename } = artifact.value
    return c.body(text, 200, {
      'Content-Type': mimeType,
      'Content-Disposition': attachment(filename),
    })
  })

  return routes
}
