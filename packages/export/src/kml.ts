/**
 * KML writer: a boundary LineString placemark followed by one Point
 * placemark per coordinate.
 *
 * Without an anchor the values are local grid feet, which no globe viewer
 * can place; the document says so in its ExtendedData so consumers do not
 * mistake them for degrees.
 */

import { XMLBuilder } from 'fast-xml-parser'
import { err, ok, type Coordinate, type Result, type SurveyError } from '@deed-plot/types'
import { formatNumber } from './format'
import { isValidAnchor, localToGeodetic } from './projection'
import type { ResolvedExportOptions } from './types'

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2'
export const BOUNDARY_PLACEMARK_NAME = 'Property Boundary'
export const GEODETIC_DECIMALS = 8

export type KmlCoordinateSystem = 'local_grid' | 'wgs84'

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n'

function kmlTuple(c: Coordinate, options: ResolvedExportOptions): string {
  if (options.anchor) {
    const [lon, lat] = localToGeodetic(c.x, c.y, options.anchor)
    return `${formatNumber(lon, GEODETIC_DECIMALS)},${formatNumber(lat, GEODETIC_DECIMALS)},0`
  }
  return `${formatNumber(c.x, options.decimals)},${formatNumber(c.y, options.decimals)},0`
}

function pointPlacemark(c: Coordinate, options: ResolvedExportOptions): Record<string, unknown> {
  return {
    name: c.label,
    ...(c.description !== '' ? { description: c.description } : {}),
    Point: { coordinates: kmlTuple(c, options) },
  }
}

export function toKml(
  coordinates: readonly Coordinate[],
  options: ResolvedExportOptions,
): Result<string, SurveyError> {
  if (options.anchor && !isValidAnchor(options.anchor)) {
    return err({
      kind: 'DegenerateGeometry',
      reason: `anchor ${options.anchor.latitude},${options.anchor.longitude} is not a valid latitude/longitude`,
    })
  }

  const coordinateSystem: KmlCoordinateSystem = options.anchor ? 'wgs84' : 'local_grid'
  const description = options.anchor
    ? 'Boundary placed relative to the supplied anchor point.'
    : 'Coordinates are local grid feet from the Point of Beginning, not longitude/latitude.'

  const document = {
    kml: {
      '@_xmlns': KML_NAMESPACE,
      Document: {
        name: options.documentName,
        description,
        ExtendedData: {
          Data: { '@_name': 'coordinate_system', value: coordinateSystem },
        },
        Placemark: [
          {
            name: BOUNDARY_PLACEMARK_NAME,
            LineString: {
              tessellate: 1,
              coordinates: coordinates.map((c) => kmlTuple(c, options)).join(' '),
            },
          },
          ...coordinates.map((c) => pointPlacemark(c, options)),
        ],
      },
    },
  }

  const builder = new XMLBuilder({
    attributeNamePrefix: '@_',
    ignoreAttributes: false,
    format: true,
    indentBy: '  ',
  })

  return ok(XML_DECLARATION + builder.build(document))
}
