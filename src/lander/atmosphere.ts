/**
 * Exponential atmosphere model.
 *
 *   ρ(h) = ρ₀ · e^(−h / H)     for 0 ≤ h ≤ EXOSPHERE
 *   ρ(h) = 0                   otherwise
 */

import type { Vector3 } from 'three'
import type { LanderConstants } from './constants.ts'
import { DEFAULT_CONSTANTS } from './constants.ts'

/** Height above the mean surface [m] */
export function altitudeOf(
  position: Vector3,
  c: LanderConstants = DEFAULT_CONSTANTS,
): number {
  return position.length() - c.PLANET_RADIUS
}

/**
 * Local air density [kg/m³] at a planet-centred position.
 * Zero below the surface and above the exosphere.
 */
export function atmosphericDensity(
  position: Vector3,
  c: LanderConstants = DEFAULT_CONSTANTS,
): number {
  const h = altitudeOf(position, c)
  if (h > c.EXOSPHERE || h < 0) return 0
  return c.SURFACE_DENSITY * Math.exp(-h / c.DENSITY_SCALE_HEIGHT)
}
