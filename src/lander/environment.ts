/**
 * Lander environment — the physics-model collaborators the integrator
 * and autopilot consume.
 *
 * The integrator never reaches for density, thrust or parachute safety
 * on its own; it asks a `LanderEnvironment`.  Tests inject deterministic
 * stubs, the flight runner uses `createMarsEnvironment()`.
 */

import * as THREE from 'three'
import type { LanderState } from './lander-state.ts'
import type { LanderConstants } from './constants.ts'
import { DEFAULT_CONSTANTS, maxThrust } from './constants.ts'
import { atmosphericDensity } from './atmosphere.ts'
import { attitudeStabilization, bodyToWorld } from './attitude.ts'

// ─── Interface ───────────────────────────────────────────────────────────────

export interface LanderEnvironment {
  /** Air density [kg/m³] at a planet-centred position, ≥ 0 */
  atmosphericDensity(position: THREE.Vector3): number
  /** Engine force [N] in the world frame for the current throttle and attitude */
  thrustWrtWorld(state: LanderState): THREE.Vector3
  /** Whether the chute would survive deployment at the current speed and density */
  safeToDeployParachute(state: LanderState): boolean
  /** Force the lander into its stable attitude */
  attitudeStabilization(state: LanderState): void
}

// ─── Parachute Loading ───────────────────────────────────────────────────────

/**
 * Drag force magnitude [N] the chute would carry at the current state.
 *
 *   D = ½ · Cd_chute · ρ · (CHUTE_AREA_FACTOR · size²) · |v|²
 */
export function parachuteDrag(
  state: LanderState,
  density: number,
  c: LanderConstants = DEFAULT_CONSTANTS,
): number {
  const speed = state.velocity.length()
  const area = c.CHUTE_AREA_FACTOR * c.LANDER_SIZE * c.LANDER_SIZE
  return 0.5 * c.DRAG_COEF_CHUTE * density * area * speed * speed
}

// ─── Default Planet ──────────────────────────────────────────────────────────

/**
 * Environment backed by the exponential atmosphere and a single
 * gimbal-free engine along body +z.
 *
 * Thrust is zero once the tank is empty, whatever the throttle says.
 */
export function createMarsEnvironment(
  c: LanderConstants = DEFAULT_CONSTANTS,
): LanderEnvironment {
  const fullThrust = maxThrust(c)

  return {
    atmosphericDensity: (position) => atmosphericDensity(position, c),

    thrustWrtWorld: (state) => {
      if (state.fuel <= 0) return new THREE.Vector3(0, 0, 0)
      const body = new THREE.Vector3(0, 0, fullThrust * state.throttle)
      return bodyToWorld(state.orientation, body)
    },

    safeToDeployParachute: (state) => {
      const drag = parachuteDrag(state, atmosphericDensity(state.position, c), c)
      return drag <= c.MAX_PARACHUTE_DRAG
    },

    attitudeStabilization,
  }
}
