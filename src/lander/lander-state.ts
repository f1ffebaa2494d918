/**
 * Lander state types — the mutable record advanced once per tick.
 *
 * Pure types with no logic.
 */

import type { Vector3 } from 'three'

// ─── Parachute ───────────────────────────────────────────────────────────────

/**
 * Deployment state of the drag chute.
 *
 *   not_deployed → deployed → lost
 *
 * Transitions only move rightwards.  The integrator never resets a chute;
 * `lost` is set by the flight runner when the chute is overloaded.
 */
export type ParachuteStatus = 'not_deployed' | 'deployed' | 'lost'

// ─── State ───────────────────────────────────────────────────────────────────

/**
 * Full lander state.
 *
 * Planet-centred Cartesian frame for position and velocity.
 * Orientation is xyz Euler angles in degrees (body frame, body +z = engine
 * thrust axis).
 *
 * Owned by whoever created it (usually `initializeSimulation`) and mutated
 * in place by `numericalDynamics` and `autopilot`.
 */
export interface LanderState {
  /** Position [m] */
  position: Vector3
  /** Velocity [m/s] */
  velocity: Vector3
  /** Euler angles [deg] */
  orientation: Vector3
  /** Fraction of a full tank remaining, 0–1 */
  fuel: number
  /** Commanded fraction of maximum thrust, 0–1 */
  throttle: number
  parachuteStatus: ParachuteStatus
  /** When set, attitude is snapped to base-down after every tick */
  stabilizedAttitude: boolean
  /** When set, the autopilot runs after every tick */
  autopilotEnabled: boolean
  /** Integration time step [s] */
  deltaT: number
  /** Preset that produced the initial conditions */
  scenarioId: number
}
