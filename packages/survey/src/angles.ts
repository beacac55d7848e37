/**
 * Angle helpers shared by the bearing parser, the closure analyzer and the
 * exporters. Azimuths are degrees clockwise from north in [0, 360).
 */

const DEG_TO_RAD = Math.PI / 180

export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD
}

/** Reduce any finite angle into [0, 360). */
export function normalizeAzimuth(degrees: number): number {
  let a = degrees % 360
  if (a < 0) a += 360
  // -1e-16 + 360 rounds to exactly 360
  if (a >= 360) a -= 360
  return a
}

/** Azimuth of the vector (dx east, dy north). A zero vector points north. */
export function azimuthOf(dx: number, dy: number): number {
  return normalizeAzimuth(Math.atan2(dx, dy) / DEG_TO_RAD)
}

// ─── Degrees / Minutes / Seconds ─────────────────────────────────────────────

export interface Dms {
  degrees: number
  minutes: number
  seconds: number
}

/**
 * Split a non-negative angle into whole degrees, whole minutes and seconds
 * rounded to `secondsPrecision` places, carrying 60" into the next minute.
 */
export function toDms(angle: number, secondsPrecision = 0): Dms {
  const scale = 10 ** secondsPrecision
  const totalScaled = Math.round(Math.abs(angle) * 3600 * scale)
  const secondsScaled = totalScaled % (60 * scale)
  const totalMinutes = (totalScaled - secondsScaled) / (60 * scale)
  return {
    degrees: Math.floor(totalMinutes / 60),
    minutes: totalMinutes % 60,
    seconds: secondsScaled / scale,
  }
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

function formatSeconds(seconds: number, precision: number): string {
  const text = seconds.toFixed(precision)
  return precision > 0 ? text.padStart(precision + 3, '0') : text.padStart(2, '0')
}

// ─── Formatting ──────────────────────────────────────────────────────────────

export interface BearingFormatOptions {
  /** Decimal places kept on the seconds field (default 0) */
  secondsPrecision?: number
}

/**
 * Render an azimuth as a quadrant bearing, e.g. 12.5822 → `N12°34'56"E`.
 * Due north is `N00°00'00"E`, due east `N90°00'00"E`, due south `S00°00'00"E`
 * and due west `S90°00'00"W`.
 */
export function formatBearing(azimuth: number, options: BearingFormatOptions = {}): string {
  const precision = options.secondsPrecision ?? 0
  const az = normalizeAzimuth(azimuth)

  let ns: 'N' | 'S'
  let ew: 'E' | 'W'
  let angle: number
  if (az <= 90) {
    ns = 'N'; ew = 'E'; angle = az
  } else if (az <= 180) {
    ns = 'S'; ew = 'E'; angle = 180 - az
  } else if (az <= 270) {
    ns = 'S'; ew = 'W'; angle = az - 180
  } else {
    ns = 'N'; ew = 'W'; angle = 360 - az
  }

  const { degrees, minutes, seconds } = toDms(angle, precision)
  return `${ns}${pad2(degrees)}°${pad2(minutes)}'${formatSeconds(seconds, precision)}"${ew}`
}

/** Render an azimuth with a fixed number of decimals, folding a rounded 360 back to 0. */
export function formatAzimuth(azimuth: number, decimals = 6): string {
  const rounded = Number(normalizeAzimuth(azimuth).toFixed(decimals))
  return (rounded >= 360 ? rounded - 360 : rounded).toFixed(decimals)
}
