import type { ClosureResult, Coordinate } from '@deed-plot/types'

export const BOUNDARY_COLOR = '#2563eb'
export const OPEN_CLOSURE_COLOR = '#ef4444'
export const CLOSED_CLOSURE_COLOR = '#10b981'

export interface PlotLine {
  from: Coordinate
  to: Coordinate
  style: 'solid'
  color: string
  width: number
}

/** Drawing hints consumed by the plot viewer. */
export interface PlotInstructions {
  plotType: 'traverse'
  coordinateSystem: 'local'
  points: readonly Coordinate[]
  /** Each point joined to the next, and the last back to the first */
  lines: PlotLine[]
  showClosureLine: boolean
  closureColor: string
}

export function buildPlotInstructions(
  coordinates: readonly Coordinate[],
  closure: ClosureResult,
): PlotInstructions {
  const lines: PlotLine[] = []
  coordinates.forEach((from, i) => {
    const to = coordinates[(i + 1) % coordinates.length]
    if (!to || coordinates.length < 2) return
    lines.push({ from, to, style: 'solid', color: BOUNDARY_COLOR, width: 2 })
  })

  return {
    plotType: 'traverse',
    coordinateSystem: 'local',
    points: coordinates,
    lines,
    showClosureLine: !closure.isClosed,
    closureColor: closure.isClosed ? CLOSED_CLOSURE_COLOR : OPEN_CLOSURE_COLOR,
  }
}
