/**
 * Descent autopilot — proportional throttle control plus parachute deploy.
 *
 * The controller drives the signed radial velocity toward a target that
 * shrinks linearly with altitude:
 *
 *   e    = −(v_touch + Kh·h + ṙ)
 *   Pout = Kp · e
 *
 * and maps Pout onto the throttle with a unity-slope band centred on
 * `offset`.  No integral or derivative memory is kept between ticks.
 *
 * Sign convention: ṙ = v · r̂ is positive when climbing, so a descending
 * lander has ṙ < 0 and e goes positive when it falls faster than the
 * target.
 */

import type * as THREE from 'three'
import type { LanderState } from './lander-state.ts'
import type { LanderEnvironment } from './environment.ts'
import type { LanderConstants } from './constants.ts'
import { DEFAULT_CONSTANTS } from './constants.ts'
import { altitudeOf } from './atmosphere.ts'

// ─── Gains ───────────────────────────────────────────────────────────────────

export interface AutopilotGains {
  /** Target descent rate per metre of altitude [1/s] */
  kh: number
  /** Proportional gain [throttle per m/s] */
  kp: number
  /** Throttle at zero controller output */
  offset: number
  /** Target descent rate at touchdown [m/s] */
  touchdownRate: number
  /** Parachute is deployed at or below this altitude [m] */
  parachuteAltitude: number
}

export const DEFAULT_AUTOPILOT_GAINS: AutopilotGains = {
  kh: 0.02,
  kp: 0.5,
  offset: 0.5,
  touchdownRate: 0.5,
  parachuteAltitude: 150000,
}

// ─── Measurements ────────────────────────────────────────────────────────────

/**
 * Signed radial velocity [m/s], positive away from the planet centre.
 * Zero at the centre, where there is no radial direction.
 */
export function descentRateOf(position: THREE.Vector3, velocity: THREE.Vector3): number {
  return velocity.dot(position.clone().normalize())
}

// ─── Control Law ─────────────────────────────────────────────────────────────

/** Proportional controller output Pout for the given altitude and ṙ. */
export function controllerOutput(
  altitude: number,
  descentRate: number,
  gains: AutopilotGains = DEFAULT_AUTOPILOT_GAINS,
): number {
  return gains.kp * -(gains.touchdownRate + gains.kh * altitude + descentRate)
}

/**
 * Piecewise-linear throttle map.
 *
 *   Pout ≤ −offset          → 0
 *   −offset < Pout < 1−offset → offset + Pout
 *   Pout ≥ 1−offset         → 1
 *
 * The lower breakpoint is closed: Pout = −offset gives exactly 0.
 * A NaN output falls through both comparisons and saturates at 1.
 */
export function throttleFromControlOutput(pout: number, offset: number): number {
  if (pout <= -offset) return 0
  if (pout < 1 - offset) return offset + pout
  return 1
}

// ─── Autopilot Step ──────────────────────────────────────────────────────────

/**
 * Run the autopilot on the current state.
 *
 * Mutates `throttle`, `stabilizedAttitude` (always set) and
 * `parachuteStatus` (not_deployed → deployed only).
 */
export function autopilot(
  state: LanderState,
  env: LanderEnvironment,
  c: LanderConstants = DEFAULT_CONSTANTS,
  gains: AutopilotGains = DEFAULT_AUTOPILOT_GAINS,
): void {
  const altitude = altitudeOf(state.position, c)
  const descentRate = descentRateOf(state.position, state.velocity)
  const pout = controllerOutput(altitude, descentRate, gains)

  state.stabilizedAttitude = true
  state.throttle = throttleFromControlOutput(pout, gains.offset)

  if (
    state.parachuteStatus === 'not_deployed' &&
    altitude <= gains.parachuteAltitude &&
    env.safeToDeployParachute(state)
  ) {
    state.parachuteStatus = 'deployed'
  }
}
