/**
 * Lander module — public API.
 *
 * Barrel export for the dynamics core.  Everything in this directory is
 * pure math on a caller-owned LanderState; the flight loop lives in
 * src/sim/.
 */

export type { LanderState, ParachuteStatus } from './lander-state.ts'
export type { LanderConstants } from './constants.ts'
export { DEFAULT_CONSTANTS, surfaceGravity, maxThrust, landerMass } from './constants.ts'
export { altitudeOf, atmosphericDensity } from './atmosphere.ts'
export { orientationToEuler, bodyToWorld, stabilizedOrientation, attitudeStabilization } from './attitude.ts'
export type { LanderEnvironment } from './environment.ts'
export { createMarsEnvironment, parachuteDrag } from './environment.ts'
export type { AutopilotGains } from './autopilot.ts'
export { DEFAULT_AUTOPILOT_GAINS, descentRateOf, controllerOutput, throttleFromControlOutput, autopilot } from './autopilot.ts'
export type { AccelerationBreakdown } from './dynamics.ts'
export { gravityAcceleration, computeAccelerations, numericalDynamics, simulate } from './dynamics.ts'
export type { ScenarioPreset } from './scenarios.ts'
export { SCENARIO_SLOTS, SCENARIO_DELTA_T, SCENARIOS, getScenario, scenarioDescriptions, initializeSimulation } from './scenarios.ts'
