/**
 * Translational dynamics — force model and fixed-step integration.
 *
 * One call to `numericalDynamics` advances the state by exactly one
 * `deltaT`:
 *
 *   1. Mass from fuel fraction
 *   2. Accelerations from the pre-update state:
 *        gravity   = −GM · r̂ / |r|²
 *        dragBody  = ½ρ · Cd · π·size² · |v|² · v̂ / m
 *        thrust    = F_world / m
 *        dragChute = ½ρ · Cd_chute · (20·size²) · |v|² · v̂ / m
 *   3. a = gravity − dragBody + thrust  (− dragChute when deployed)
 *   4. Explicit Euler:
 *        r' = r + dt · v      (old velocity)
 *        v' = v + dt · a
 *   5. Post-step hooks: autopilot, then attitude stabilization
 *
 * Degenerate directions: at |v| = 0 both drag terms vanish, at |r| = 0
 * gravity is zero.  No NaN is produced by the force model itself.
 */

import * as THREE from 'three'
import type { LanderState } from './lander-state.ts'
import type { LanderEnvironment } from './environment.ts'
import type { LanderConstants } from './constants.ts'
import type { AutopilotGains } from './autopilot.ts'
import { DEFAULT_CONSTANTS, landerMass } from './constants.ts'
import { autopilot, DEFAULT_AUTOPILOT_GAINS } from './autopilot.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Per-term accelerations [m/s²] for one state. */
export interface AccelerationBreakdown {
  /** Current total mass [kg] */
  mass: number
  gravity: THREE.Vector3
  /** Body drag, directed along +v̂ (subtracted in `total`) */
  dragLander: THREE.Vector3
  thrust: THREE.Vector3
  /** Chute drag along +v̂, evaluated whether or not the chute is out */
  dragChute: THREE.Vector3
  /** Net acceleration applied by the integrator */
  total: THREE.Vector3
}

// ─── Force Model ─────────────────────────────────────────────────────────────

/**
 * Inverse-square gravity toward the planet centre.
 * Zero at the centre itself.
 */
export function gravityAcceleration(
  position: THREE.Vector3,
  c: LanderConstants = DEFAULT_CONSTANTS,
): THREE.Vector3 {
  const r2 = position.lengthSq()
  if (r2 === 0) return new THREE.Vector3(0, 0, 0)
  return position.clone().normalize().multiplyScalar(-c.GRAVITY * c.PLANET_MASS / r2)
}

/**
 * Quadratic drag along v̂ for a reference area [m²] and drag coefficient.
 * `normalize()` maps the zero vector to itself, so zero speed gives zero drag.
 */
function quadraticDrag(
  velocity: THREE.Vector3,
  density: number,
  cd: number,
  area: number,
  mass: number,
): THREE.Vector3 {
  const speed2 = velocity.lengthSq()
  return velocity.clone().normalize().multiplyScalar(0.5 * density * cd * area * speed2 / mass)
}

/**
 * Evaluate every force term for the current state.
 * Does not modify `state`.
 */
export function computeAccelerations(
  state: LanderState,
  env: LanderEnvironment,
  c: LanderConstants = DEFAULT_CONSTANTS,
): AccelerationBreakdown {
  const mass = landerMass(state.fuel, c)
  const rho = env.atmosphericDensity(state.position)
  const size2 = c.LANDER_SIZE * c.LANDER_SIZE

  const gravity = gravityAcceleration(state.position, c)
  const dragLander = quadraticDrag(state.velocity, rho, c.DRAG_COEF_LANDER, Math.PI * size2, mass)
  const thrust = env.thrustWrtWorld(state).clone().divideScalar(mass)
  const dragChute = quadraticDrag(state.velocity, rho, c.DRAG_COEF_CHUTE, c.CHUTE_AREA_FACTOR * size2, mass)

  const total = gravity.clone().sub(dragLander).add(thrust)
  if (state.parachuteStatus === 'deployed') total.sub(dragChute)

  return { mass, gravity, dragLander, thrust, dragChute, total }
}

// ─── Integrator ──────────────────────────────────────────────────────────────

/**
 * Advance `state` by one `deltaT` in place.
 *
 * Position is stepped with the old velocity before the velocity is
 * updated; swapping the two turns this into semi-implicit Euler and
 * changes the trajectory.
 *
 * The autopilot and stabilization hooks act on the updated state, so
 * their throttle/orientation changes take effect from the next tick's
 * force evaluation.
 */
export function numericalDynamics(
  state: LanderState,
  env: LanderEnvironment,
  c: LanderConstants = DEFAULT_CONSTANTS,
  gains: AutopilotGains = DEFAULT_AUTOPILOT_GAINS,
): void {
  const { total } = computeAccelerations(state, env, c)

  state.position.addScaledVector(state.velocity, state.deltaT)
  state.velocity.addScaledVector(total, state.deltaT)

  if (state.autopilotEnabled) autopilot(state, env, c, gains)
  if (state.stabilizedAttitude) env.attitudeStabilization(state)
}

// ─── Multi-Step Runner ───────────────────────────────────────────────────────

/**
 * Run `steps` ticks of `numericalDynamics` on `state`.
 *
 * Pure kinematics plus hooks: no fuel burn, no touchdown detection.
 * Use SimRunner for a full flight.
 */
export function simulate(
  state: LanderState,
  env: LanderEnvironment,
  steps: number,
  c: LanderConstants = DEFAULT_CONSTANTS,
  gains: AutopilotGains = DEFAULT_AUTOPILOT_GAINS,
): LanderState {
  for (let i = 0; i < steps; i++) {
    numericalDynamics(state, env, c, gains)
  }
  return state
}
