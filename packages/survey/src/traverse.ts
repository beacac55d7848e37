/**
 * Traverse Computer
 *
 * Walks normalized calls from the Point of Beginning at the local origin.
 * North is +y, east is +x, azimuths are clockwise from north:
 *
 *   x_i = x_(i-1) + d·sin(θ)
 *   y_i = y_(i-1) + d·cos(θ)
 */

import { POB_LABEL, type Coordinate, type NormalizedCall } from '@deed-plot/types'
import { toRadians } from './angles'

export const POB_DESCRIPTION = 'Point of Beginning'

/** Label for the point reached by the n-th call (1-based). */
export function pointLabel(pointNumber: number): string {
  return pointNumber === 0 ? POB_LABEL : `P${pointNumber}`
}

/**
 * Fold the calls into an ordered coordinate list. The result always has
 * `calls.length + 1` points; point *i* records the call that reached it.
 */
export function computeTraverse(calls: readonly NormalizedCall[]): Coordinate[] {
  const coordinates: Coordinate[] = [{
    pointNumber: 0,
    x: 0,
    y: 0,
    label: POB_LABEL,
    description: POB_DESCRIPTION,
  }]

  let x = 0
  let y = 0
  calls.forEach((call, i) => {
    const theta = toRadians(call.azimuthDegrees)
    x += call.distanceFeet * Math.sin(theta)
    y += call.distanceFeet * Math.cos(theta)

    const pointNumber = i + 1
    coordinates.push({
      pointNumber,
      x,
      y,
      label: pointLabel(pointNumber),
      description: call.description ?? '',
      monument: call.monument,
      bearing: call.bearingText,
      distance: call.distanceFeet,
      units: 'feet',
    })
  })

  return coordinates
}

/** Sum of call lengths in feet, the perimeter used for closure statistics. */
export function perimeterOf(calls: readonly NormalizedCall[]): number {
  return calls.reduce((sum, call) => sum + call.distanceFeet, 0)
}
