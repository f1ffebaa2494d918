/**
 * Scenario presets — canned initial conditions for the lander.
 *
 * Ten slots.  Slots 0–6 carry a preset; 7–9 are reserved and have no
 * entry in SCENARIOS, so asking for them yields `null` rather than a
 * half-initialized state.
 *
 * Every preset starts with a full tank, engine off, chute packed and a
 * 0.1 s time step.
 */

import * as THREE from 'three'
import type { LanderState } from './lander-state.ts'
import type { LanderConstants } from './constants.ts'
import { DEFAULT_CONSTANTS } from './constants.ts'

/** Number of scenario slots, populated or not. */
export const SCENARIO_SLOTS = 10

/** Integration step shared by every preset [s] */
export const SCENARIO_DELTA_T = 0.1

// ─── Types ───────────────────────────────────────────────────────────────────

type Triple = [number, number, number]

export interface ScenarioPreset {
  /** Help-screen description */
  description: string
  /** Initial position [m], may depend on planet/lander constants */
  position: (c: LanderConstants) => Triple
  /** Initial velocity [m/s] */
  velocity: Triple
  /** Initial orientation [deg] */
  orientation: Triple
  stabilizedAttitude: boolean
  autopilotEnabled: boolean
}

// ─── Presets ─────────────────────────────────────────────────────────────────

export const SCENARIOS: ReadonlyMap<number, ScenarioPreset> = new Map<number, ScenarioPreset>([
  [0, {
    description: 'circular orbit',
    position: (c) => [1.2 * c.PLANET_RADIUS, 0, 0],
    velocity: [0, -3247.087385863725, 0],
    orientation: [0, 90, 0],
    stabilizedAttitude: false,
    autopilotEnabled: false,
  }],
  [1, {
    description: 'descent from 10km',
    position: (c) => [0, -(c.PLANET_RADIUS + 10000), 0],
    velocity: [0, 0, 0],
    orientation: [0, 0, 90],
    stabilizedAttitude: true,
    autopilotEnabled: false,
  }],
  [2, {
    description: 'elliptical orbit, thrust changes orbital plane',
    position: (c) => [0, 0, 1.2 * c.PLANET_RADIUS],
    velocity: [3500, 0, 0],
    orientation: [0, 0, 90],
    stabilizedAttitude: false,
    autopilotEnabled: false,
  }],
  [3, {
    description: 'polar launch at escape velocity (but drag prevents escape)',
    position: (c) => [0, 0, c.PLANET_RADIUS + c.LANDER_SIZE / 2],
    velocity: [0, 0, 5027],
    orientation: [0, 0, 0],
    stabilizedAttitude: false,
    autopilotEnabled: false,
  }],
  [4, {
    description: 'elliptical orbit that clips the atmosphere and decays',
    position: (c) => [0, 0, c.PLANET_RADIUS + 100000],
    velocity: [4000, 0, 0],
    orientation: [0, 90, 0],
    stabilizedAttitude: false,
    autopilotEnabled: false,
  }],
  [5, {
    description: 'descent from 200km',
    position: (c) => [0, -(c.PLANET_RADIUS + c.EXOSPHERE), 0],
    velocity: [0, 0, 0],
    orientation: [0, 0, 90],
    stabilizedAttitude: true,
    autopilotEnabled: false,
  }],
  [6, {
    description: 'geostationary orbit',
    // Areostationary radius and speed for PLANET_DAY, kept as literals.
    position: () => [20429635.87, 0, 0],
    velocity: [0, 1448.025, 0],
    orientation: [0, 90, 0],
    stabilizedAttitude: false,
    autopilotEnabled: false,
  }],
])

// ─── Lookup ──────────────────────────────────────────────────────────────────

/** Preset for a slot, or undefined for reserved and unknown ids. */
export function getScenario(scenarioId: number): ScenarioPreset | undefined {
  return SCENARIOS.get(scenarioId)
}

/** Description for every slot in order; reserved slots are ''. */
export function scenarioDescriptions(): string[] {
  return Array.from(
    { length: SCENARIO_SLOTS },
    (_, id) => SCENARIOS.get(id)?.description ?? '',
  )
}

// ─── Initializer ─────────────────────────────────────────────────────────────

/**
 * Build a fresh LanderState from a preset.
 *
 * Returns null when the slot is reserved (7–9) or outside 0–9.
 * The returned vectors are new instances; nothing is shared between calls.
 */
export function initializeSimulation(
  scenarioId: number,
  c: LanderConstants = DEFAULT_CONSTANTS,
): LanderState | null {
  const preset = SCENARIOS.get(scenarioId)
  if (!preset) return null

  return {
    position: new THREE.Vector3(...preset.position(c)),
    velocity: new THREE.Vector3(...preset.velocity),
    orientation: new THREE.Vector3(...preset.orientation),
    fuel: 1,
    throttle: 0,
    parachuteStatus: 'not_deployed',
    stabilizedAttitude: preset.stabilizedAttitude,
    autopilotEnabled: preset.autopilotEnabled,
    deltaT: SCENARIO_DELTA_T,
    scenarioId,
  }
}
