import {
  err,
  ok,
  type Call,
  type ClosureResult,
  type Coordinate,
  type NormalizedCall,
  type Result,
  type SurveyError,
} from '@deed-plot/types'
import { analyzeClosure, type ClosureOptions } from './closure'
import { buildSequence, type SequenceOptions } from './sequence'
import { computeTraverse, perimeterOf } from './traverse'

export type AnalysisOptions = SequenceOptions & ClosureOptions

export interface TraverseAnalysis {
  normalizedCalls: NormalizedCall[]
  coordinates: Coordinate[]
  closure: ClosureResult
}

/**
 * Run the whole pipeline: normalize the calls, walk the traverse and
 * analyze its closure. Every parse error is returned together.
 */
export function analyzeCalls(
  calls: readonly Call[],
  options: AnalysisOptions = {},
): Result<TraverseAnalysis, SurveyError[]> {
  const sequence = buildSequence(calls, options)
  if (!sequence.ok) return sequence

  return analyzeNormalized(sequence.value, options)
}

/** Traverse and closure for an already normalized sequence. */
export function analyzeNormalized(
  normalizedCalls: NormalizedCall[],
  options: ClosureOptions = {},
): Result<TraverseAnalysis, SurveyError[]> {
  const coordinates = computeTraverse(normalizedCalls)
  const closure = analyzeClosure(coordinates, perimeterOf(normalizedCalls), options)
  if (!closure.ok) return err([closure.error])

  return ok({ normalizedCalls, coordinates, closure: closure.value })
}
