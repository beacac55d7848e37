import { describe, it, expect } from 'vitest'
import { XMLParser } from 'fast-xml-parser'
import type { Coordinate } from '@deed-plot/types'
import { toAutocadScript } from '../autocad-script'
import { toCsv, csvField } from '../csv'
import { toDxf } from '../dxf'
import { toEsriTraverse } from '../esri-traverse'
import { formatNumber, resolveExportOptions } from '../format'
import { toKml } from '../kml'

const triangle: Coordinate[] = [
  { pointNumber: 0, x: 0, y: 0, label: 'POB', description: 'Point of Beginning' },
  { pointNumber: 1, x: 30, y: 40, label: 'P1', description: '' },
  { pointNumber: 2, x: 30, y: 0, label: 'P2', description: 'corner' },
]

const options = resolveExportOptions({ decimals: 2 })

function text(result: { ok: true; value: string } | { ok: false }): string {
  if (!result.ok) throw new Error('serializer failed')
  return result.value
}

describe('formatNumber', () => {
  it('never writes a negative zero', () => {
    expect(formatNumber(-0.0001, 2)).toBe('0.00')
    expect(formatNumber(-0, 0)).toBe('0')
    expect(formatNumber(-1.5, 1)).toBe('-1.5')
  })
})

describe('toDxf', () => {
  it('writes a boundary polyline and one label per point', () => {
    const lines = text(toDxf(triangle, options)).split('\n')
    expect(lines).toEqual([
      '0', 'SECTION', '2', 'HEADER', '9', '$ACADVER', '1', 'AC1009', '0', 'ENDSEC',
      '0', 'SECTION', '2', 'ENTITIES',
      '0', 'POLYLINE', '8', 'BOUNDARY', '66', '1', '70', '0', '10', '0.00', '20', '0.00', '30', '0.00',
      '0', 'VERTEX', '8', 'BOUNDARY', '10', '0.00', '20', '0.00', '30', '0.00',
      '0', 'VERTEX', '8', 'BOUNDARY', '10', '30.00', '20', '40.00', '30', '0.00',
      '0', 'VERTEX', '8', 'BOUNDARY', '10', '30.00', '20', '0.00', '30', '0.00',
      '0', 'SEQEND', '8', 'BOUNDARY',
      '0', 'TEXT', '8', 'LABELS', '10', '0.00', '20', '0.00', '30', '0.00', '40', '2.50', '1', 'POB',
      '0', 'TEXT', '8', 'LABELS', '10', '30.00', '20', '40.00', '30', '0.00', '40', '2.50', '1', 'P1',
      '0', 'TEXT', '8', 'LABELS', '10', '30.00', '20', '0.00', '30', '0.00', '40', '2.50', '1', 'P2',
      '0', 'ENDSEC', '0', 'EOF', '',
    ])
  })
})

describe('toCsv', () => {
  it('writes a header and one row per point', () => {
    expect(text(toCsv(triangle, options))).toBe(
      'point_number,x,y,label,description\n' +
      '0,0.00,0.00,POB,Point of Beginning\n' +
      '1,30.00,40.00,P1,\n' +
      '2,30.00,0.00,P2,corner\n',
    )
  })

  it('quotes fields that need it', () => {
    expect(csvField('plain')).toBe('plain')
    expect(csvField('a, b')).toBe('"a, b"')
    expect(csvField('the "big" oak')).toBe('"the ""big"" oak"')
    expect(csvField('two\nlines')).toBe('"two\nlines"')
  })
})

describe('toEsriTraverse', () => {
  it('writes one course per leg, measured from the coordinates', () => {
    expect(text(toEsriTraverse(triangle, options))).toBe(
      'TRAVERSE\n' +
      'UNITS FEET\n' +
      'DIRECTION AZIMUTH\n' +
      'BEGIN 0.00 0.00\n' +
      'COURSE 36.869898 50.00\n' +
      'COURSE 180.000000 40.00\n' +
      'END\n',
    )
  })
})

describe('toAutocadScript', () => {
  it('draws the boundary then places the labels', () => {
    expect(text(toAutocadScript(triangle, options)).split('\n')).toEqual([
      'LINE', '0.00,0.00', '30.00,40.00', '30.00,0.00', '',
      'TEXT', '0.00,0.00', '2.50', '0', 'POB',
      'TEXT', '30.00,40.00', '2.50', '0', 'P1',
      'TEXT', '30.00,0.00', '2.50', '0', 'P2',
      '',
    ])
  })

  it('skips the LINE command for a single point', () => {
    expect(text(toAutocadScript(triangle.slice(0, 1), options))).toBe('TEXT\n0.00,0.00\n2.50\n0\nPOB\n')
  })

  it('keeps labels on one line', () => {
    const labelled = [{ ...triangle[0]!, label: 'POB\nnorth corner' }]
    expect(text(toAutocadScript(labelled, options)).split('\n')[4]).toBe('POB north corner')
  })
})

describe('toKml', () => {
  const parser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: '@_' })

  it('writes local grid coordinates and says so', () => {
    const kml = text(toKml(triangle, options))
    expect(kml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<kml')).toBe(true)

    const doc = parser.parse(kml)
    expect(doc.kml['@_xmlns']).toBe('http://www.opengis.net/kml/2.2')
    expect(doc.kml.Document.name).toBe('Deed Plot')
    expect(doc.kml.Document.ExtendedData.Data).toEqual({
      '@_name': 'coordinate_system',
      value: 'local_grid',
    })

    const placemarks = doc.kml.Document.Placemark
    expect(placemarks).toHaveLength(4)
    expect(placemarks[0].name).toBe('Property Boundary')
    expect(placemarks[0].LineString.coordinates).toBe('0.00,0.00,0 30.00,40.00,0 30.00,0.00,0')
    expect(placemarks[1]).toEqual({
      name: 'POB',
      description: 'Point of Beginning',
      Point: { coordinates: '0.00,0.00,0' },
    })
    expect(placemarks[2]).toEqual({ name: 'P1', Point: { coordinates: '30.00,40.00,0' } })
  })

  it('projects to longitude/latitude around an anchor', () => {
    const anchored = resolveExportOptions({ decimals: 2, anchor: { latitude: 0, longitude: 0 } })
    const doc = parser.parse(text(toKml(triangle, anchored)))

    expect(doc.kml.Document.ExtendedData.Data.value).toBe('wgs84')
    expect(doc.kml.Document.Placemark[2].Point.coordinates).toBe('0.00008214,0.00011026,0')
  })

  it('rejects an anchor at a pole', () => {
    const polar = resolveExportOptions({ anchor: { latitude: 90, longitude: 10 } })
    expect(toKml(triangle, polar)).toEqual({
      ok: false,
      error: {
        kind: 'DegenerateGeometry',
        reason: 'anchor 90,10 is not a valid latitude/longitude',
      },
    })
  })
})
