/**
 * Local tangent-plane placement of a traverse on the WGS84 ellipsoid.
 *
 * Adequate for parcel-sized extents (a few kilometres); offsets are applied
 * with the meridian and parallel lengths at the anchor latitude.
 */

import type { GeodeticAnchor } from './types'

/** International foot */
export const METERS_PER_FOOT = 0.3048

const DEG_TO_RAD = Math.PI / 180

/** Length of one degree of latitude, in metres, at latitude `lat` (degrees). */
export function metersPerDegreeLatitude(lat: number): number {
  const phi = lat * DEG_TO_RAD
  return 111132.92 - 559.82 * Math.cos(2 * phi) + 1.175 * Math.cos(4 * phi) - 0.0023 * Math.cos(6 * phi)
}

/** Length of one degree of longitude, in metres, at latitude `lat` (degrees). */
export function metersPerDegreeLongitude(lat: number): number {
  const phi = lat * DEG_TO_RAD
  return 111412.84 * Math.cos(phi) - 93.5 * Math.cos(3 * phi) + 0.118 * Math.cos(5 * phi)
}

export function isValidAnchor(anchor: GeodeticAnchor): boolean {
  return Number.isFinite(anchor.latitude) && Number.isFinite(anchor.longitude)
    && Math.abs(anchor.latitude) < 90 && Math.abs(anchor.longitude) <= 180
}

/** Convert a local (east, north) offset in feet to `[longitude, latitude]`. */
export function localToGeodetic(
  xFeet: number,
  yFeet: number,
  anchor: GeodeticAnchor,
): [longitude: number, latitude: number] {
  const east = xFeet * METERS_PER_FOOT
  const north = yFeet * METERS_PER_FOOT
  return [
    anchor.longitude + east / metersPerDegreeLongitude(anchor.latitude),
    anchor.latitude + north / metersPerDegreeLatitude(anchor.latitude),
  ]
}
