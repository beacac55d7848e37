import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import type { Coordinate } from '@deed-plot/types'
import {
  analyzeClosure,
  formatPrecisionRatio,
  orientationOf,
  polygonArea,
  signedArea,
} from '../closure'

function point(pointNumber: number, x: number, y: number): Coordinate {
  return { pointNumber, x, y, label: pointNumber === 0 ? 'POB' : `P${pointNumber}`, description: '' }
}

const square = [point(0, 0, 0), point(1, 100, 0), point(2, 100, -100), point(3, 0, -100), point(4, 0, 0)]

describe('signedArea', () => {
  it('is negative for a clockwise boundary', () => {
    expect(signedArea(square)).toBe(-10000)
    expect(orientationOf(square)).toBe('clockwise')
  })

  it('is positive for a counterclockwise boundary', () => {
    const reversed = [...square].reverse()
    expect(signedArea(reversed)).toBe(10000)
    expect(orientationOf(reversed)).toBe('counterclockwise')
  })

  it('is zero below three points', () => {
    expect(signedArea(square.slice(0, 2))).toBe(0)
    expect(orientationOf(square.slice(0, 2))).toBe('degenerate')
  })

  it('does not change when the starting point rotates', () => {
    const vertex = fc.record({
      x: fc.double({ min: -1e4, max: 1e4, noNaN: true }),
      y: fc.double({ min: -1e4, max: 1e4, noNaN: true }),
    })
    fc.assert(
      fc.property(fc.array(vertex, { minLength: 3, maxLength: 12 }), fc.nat(), (points, shift) => {
        const k = shift % points.length
        const rotated = [...points.slice(k), ...points.slice(0, k)]
        expect(polygonArea(rotated)).toBeCloseTo(polygonArea(points), 3)
      }),
    )
  })
})

describe('formatPrecisionRatio', () => {
  it('rounds perimeter over closure', () => {
    expect(formatPrecisionRatio(1000, 0.3)).toBe('1:3333')
  })

  it('reports an exact closure as infinite', () => {
    expect(formatPrecisionRatio(400, 0)).toBe('1:∞')
    expect(formatPrecisionRatio(400, 1e-12)).toBe('1:∞')
  })
})

describe('analyzeClosure', () => {
  it('reports a closed square', () => {
    const result = analyzeClosure(square, 400)
    expect(result).toEqual({
      ok: true,
      value: {
        closureDistance: 0,
        closureBearing: 'N/A',
        precisionRatio: '1:∞',
        areaAcres: 10000 / 43560,
        areaSqFeet: 10000,
        perimeterFeet: 400,
        isClosed: true,
        closureErrorPpm: 0,
        closureDx: 0,
        closureDy: 0,
        orientation: 'clockwise',
      },
    })
    if (result.ok) expect(result.value.areaAcres).toBeCloseTo(0.2296, 4)
  })

  it('points the closure bearing back to the POB', () => {
    const result = analyzeClosure(square.slice(0, 3), 200)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const closure = result.value
    expect(closure.closureDistance).toBeCloseTo(141.42, 2)
    expect(closure.closureDx).toBe(-100)
    expect(closure.closureDy).toBe(100)
    expect(closure.closureBearing).toBe(`N45°00'00"W`)
    expect(closure.isClosed).toBe(false)
    expect(closure.areaSqFeet).toBe(5000)
  })

  it('treats a misclosure at the tolerance as closed', () => {
    const nearly = [...square.slice(0, 4), point(4, 0, 0.1)]
    const result = analyzeClosure(nearly, 400, { closureToleranceFt: 0.1 })
    expect(result.ok && result.value.isClosed).toBe(true)
    if (result.ok) {
      expect(result.value.precisionRatio).toBe('1:4000')
      expect(result.value.closureErrorPpm).toBeCloseTo(250, 9)
      expect(result.value.closureBearing).toBe('N/A')
    }
  })

  it('honours a tighter tolerance', () => {
    const nearly = [...square.slice(0, 4), point(4, 0, 0.1)]
    const result = analyzeClosure(nearly, 400, { closureToleranceFt: 0.05 })
    expect(result.ok && result.value.isClosed).toBe(false)
    if (result.ok) expect(result.value.closureBearing).toBe(`S00°00'00"E`)
  })

  it('rejects an empty coordinate list', () => {
    expect(analyzeClosure([], 10)).toEqual({
      ok: false,
      error: { kind: 'DegenerateGeometry', reason: 'no coordinates to analyze' },
    })
  })

  it('rejects a zero perimeter', () => {
    expect(analyzeClosure(square, 0)).toEqual({
      ok: false,
      error: { kind: 'DegenerateGeometry', reason: 'perimeter must be positive, got 0' },
    })
  })
})
