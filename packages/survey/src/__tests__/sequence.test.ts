import { describe, it, expect } from 'vitest'
import type { Call } from '@deed-plot/types'
import { buildSequence, normalizeCall } from '../sequence'

const triangle: Call[] = [
  { bearingText: 'N90E', distanceText: '300', monument: 'iron rod' },
  { bearingText: 'N0W', distanceText: '400' },
  { bearingText: `S36°52'12"W`, distanceText: '500', description: 'along the fence' },
]

describe('normalizeCall', () => {
  it('keeps the raw texts next to the normalized values', () => {
    const result = normalizeCall({ bearingText: 'S45E', distanceText: '1 chain' }, 0)
    expect(result).toEqual({
      ok: true,
      value: {
        azimuthDegrees: 135,
        distanceFeet: 66,
        bearingText: 'S45E',
        distanceText: '1 chain',
        monument: undefined,
        description: undefined,
      },
    })
  })

  it('reports both fields when both fail', () => {
    const bad = normalizeCall({ bearingText: 'Q', distanceText: 'x' }, 4)
    expect(bad.ok).toBe(false)
    if (bad.ok) return
    expect(bad.error.map((e) => [e.kind, e.index, e.field])).toEqual([
      ['InvalidBearing', 4, 'bearing'],
      ['InvalidDistance', 4, 'distance'],
    ])
  })
})

describe('buildSequence', () => {
  it('normalizes every call in order', () => {
    const result = buildSequence(triangle)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((c) => c.distanceFeet)).toEqual([300, 400, 500])
    expect(result.value[0]?.monument).toBe('iron rod')
    expect(result.value[2]?.description).toBe('along the fence')
  })

  it('collects every error instead of stopping at the first', () => {
    const result = buildSequence([
      { bearingText: 'N95E', distanceText: '100' },
      ...triangle,
      { bearingText: 'N10E', distanceText: 'ten' },
    ])
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.map((e) => e.index)).toEqual([0, 4])
    expect(result.error.map((e) => e.kind)).toEqual(['InvalidBearing', 'InvalidDistance'])
  })

  it('rejects fewer than three calls', () => {
    const result = buildSequence(triangle.slice(0, 2))
    expect(result).toEqual({
      ok: false,
      error: [{ kind: 'DegeneratePolygon', reason: 'a boundary needs at least 3 valid calls, got 2' }],
    })
  })

  it('rejects an empty list', () => {
    const result = buildSequence([])
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error[0]?.reason).toBe('a boundary needs at least 3 valid calls, got 0')
  })

  it('rejects a boundary where every call has zero length', () => {
    const result = buildSequence(triangle.map((c) => ({ ...c, distanceText: '0' })))
    expect(result).toEqual({
      ok: false,
      error: [{ kind: 'DegeneratePolygon', reason: 'every call has zero length' }],
    })
  })

  it('applies the vara factor from options', () => {
    const result = buildSequence(
      triangle.map((c) => ({ ...c, distanceText: '1', unit: 'varas' })),
      { varaFeet: 2.5 },
    )
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.map((c) => c.distanceFeet)).toEqual([2.5, 2.5, 2.5])
  })
})
