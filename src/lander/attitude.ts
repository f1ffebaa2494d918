/**
 * Attitude — body/world frame transforms for the lander.
 *
 * Conventions:
 *   Orientation:  xyz Euler angles in degrees (THREE.Euler order 'XYZ')
 *   Body +z:      thrust axis, pointing out of the lander's base toward the top
 *   World frame:  planet-centred Cartesian
 *
 * Three.js supplies the rotation algebra; everything here stays in the
 * planet frame, there is no render-space remapping.
 */

import * as THREE from 'three'
import type { LanderState } from './lander-state.ts'

const DEG2RAD = THREE.MathUtils.DEG2RAD
const RAD2DEG = THREE.MathUtils.RAD2DEG

// ─── Body → World ────────────────────────────────────────────────────────────

/** Euler rotation for an orientation given in degrees. */
export function orientationToEuler(orientationDeg: THREE.Vector3): THREE.Euler {
  return new THREE.Euler(
    orientationDeg.x * DEG2RAD,
    orientationDeg.y * DEG2RAD,
    orientationDeg.z * DEG2RAD,
    'XYZ',
  )
}

/**
 * Rotate a body-frame vector into the world frame.
 * Returns a new vector; `v` is not modified.
 */
export function bodyToWorld(
  orientationDeg: THREE.Vector3,
  v: THREE.Vector3,
): THREE.Vector3 {
  return v.clone().applyEuler(orientationToEuler(orientationDeg))
}

// ─── Stabilization ───────────────────────────────────────────────────────────

/**
 * Orientation [deg] that points the body +z axis radially outward,
 * i.e. the lander's base faces the planet.
 *
 * The body x/y axes are completed with an arbitrary perpendicular:
 *   left ⟂ up (chosen from the larger of |up.x|, |up.z| to avoid a
 *   degenerate cross product), out = left × up.
 *
 * At the planet centre there is no radial direction; the identity
 * orientation is returned.
 */
export function stabilizedOrientation(position: THREE.Vector3): THREE.Vector3 {
  const up = position.clone().normalize()
  if (up.lengthSq() === 0) return new THREE.Vector3(0, 0, 0)

  const left = Math.abs(up.x) > Math.abs(up.z)
    ? new THREE.Vector3(-up.y, up.x, 0)
    : new THREE.Vector3(0, -up.z, up.y)
  left.normalize()
  const out = new THREE.Vector3().crossVectors(left, up)

  const m = new THREE.Matrix4().makeBasis(out, left, up)
  const e = new THREE.Euler().setFromRotationMatrix(m, 'XYZ')
  return new THREE.Vector3(e.x * RAD2DEG, e.y * RAD2DEG, e.z * RAD2DEG)
}

/** Snap the lander to the base-down attitude for its current position. */
export function attitudeStabilization(state: LanderState): void {
  state.orientation.copy(stabilizedOrientation(state.position))
}
