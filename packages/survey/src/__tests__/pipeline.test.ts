import { describe, it, expect } from 'vitest'
import type { Call } from '@deed-plot/types'
import { analyzeCalls } from '../pipeline'
import { validatePlot } from '../validation'
import { buildPlotInstructions } from '../instructions'

const square: Call[] = [
  { bearingText: `N90°00'00"E`, distanceText: '100 ft' },
  { bearingText: `S00°00'00"E`, distanceText: '100 ft' },
  { bearingText: `S90°00'00"W`, distanceText: '100 ft' },
  { bearingText: `N00°00'00"W`, distanceText: '100 ft' },
]

describe('analyzeCalls', () => {
  it('closes a known square', () => {
    const result = analyzeCalls(square)
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const { coordinates, closure } = result.value
    const expected = [[0, 0], [100, 0], [100, -100], [0, -100], [0, 0]]
    expect(coordinates).toHaveLength(expected.length)
    coordinates.forEach((p, i) => {
      expect(p.x).toBeCloseTo(expected[i]![0]!, 9)
      expect(p.y).toBeCloseTo(expected[i]![1]!, 9)
    })

    expect(closure.closureDistance).toBeCloseTo(0, 9)
    expect(closure.isClosed).toBe(true)
    expect(closure.perimeterFeet).toBe(400)
    expect(closure.areaSqFeet).toBeCloseTo(10000, 6)
    expect(closure.areaAcres).toBeCloseTo(0.2296, 4)
  })

  it('reports the misclosure of an open traverse', () => {
    const result = analyzeCalls(square.slice(0, 3))
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const { closure } = result.value
    expect(closure.closureDistance).toBeCloseTo(100, 9)
    expect(closure.closureBearing).toBe(`N00°00'00"E`)
    expect(closure.isClosed).toBe(false)
    expect(closure.perimeterFeet).toBe(300)
    expect(closure.precisionRatio).toBe('1:3')
  })

  it('returns only errors when some calls are malformed', () => {
    const calls: Call[] = [
      square[0]!,
      { bearingText: 'N45E45', distanceText: '100' },
      square[1]!,
      { bearingText: 'S10W', distanceText: 'about a hundred' },
      square[2]!,
    ]
    const result = analyzeCalls(calls)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toHaveLength(2)
    expect(result.error.map((e) => e.index)).toEqual([1, 3])
    expect(result.error.map((e) => e.originalText)).toEqual(['N45E45', 'about a hundred'])
  })

  it('applies the closure tolerance from options', () => {
    const short = [...square.slice(0, 3), { bearingText: 'N', distanceText: '99.95' }]
    const loose = analyzeCalls(short)
    expect(loose.ok && loose.value.closure.isClosed).toBe(true)
    const strict = analyzeCalls(short, { closureToleranceFt: 0.01 })
    expect(strict.ok && strict.value.closure.isClosed).toBe(false)
  })
})

describe('validatePlot', () => {
  it('passes a closed square without findings', () => {
    const result = analyzeCalls(square)
    if (!result.ok) throw new Error('square should analyze')
    const { coordinates, closure } = result.value
    expect(validatePlot(coordinates, closure)).toEqual({ isValid: true, warnings: [], errors: [] })
  })

  it('flags misclosure and low precision on an open traverse', () => {
    const result = analyzeCalls(square.slice(0, 3))
    if (!result.ok) throw new Error('open traverse should analyze')
    const { coordinates, closure } = result.value
    expect(validatePlot(coordinates, closure).warnings).toEqual([
      { type: 'closure', message: 'Plot does not close. Closure distance: 100.000 feet' },
      { type: 'precision', message: 'Low precision: 1:3' },
    ])
  })

  it('uses the precision threshold from options', () => {
    const result = analyzeCalls([...square.slice(0, 3), { bearingText: 'N', distanceText: '99.95' }])
    if (!result.ok) throw new Error('near-closed square should analyze')
    const { coordinates, closure } = result.value
    // 0.05 ft over 399.95 ft is about 125 ppm
    expect(validatePlot(coordinates, closure).warnings).toEqual([])
    expect(validatePlot(coordinates, closure, { precisionWarningPpm: 100 }).warnings).toEqual([
      { type: 'precision', message: 'Low precision: 1:7999' },
    ])
  })

  it('reports too few points as an error', () => {
    const result = analyzeCalls(square)
    if (!result.ok) throw new Error('square should analyze')
    const { coordinates, closure } = result.value
    const validation = validatePlot(coordinates.slice(0, 2), closure)
    expect(validation.isValid).toBe(false)
    expect(validation.errors).toEqual([
      { type: 'insufficient_data', message: 'Insufficient coordinate points for a valid plot' },
    ])
  })
})

describe('buildPlotInstructions', () => {
  it('joins every point to the next and wraps around', () => {
    const result = analyzeCalls(square.slice(0, 3))
    if (!result.ok) throw new Error('open traverse should analyze')
    const { coordinates, closure } = result.value
    const instructions = buildPlotInstructions(coordinates, closure)

    expect(instructions.lines.map((l) => [l.from.label, l.to.label])).toEqual([
      ['POB', 'P1'],
      ['P1', 'P2'],
      ['P2', 'P3'],
      ['P3', 'POB'],
    ])
    expect(instructions.showClosureLine).toBe(true)
    expect(instructions.closureColor).toBe('#ef4444')
    expect(instructions.plotType).toBe('traverse')
  })
})
