/**
 * Flight runner.
 *
 * Drives the dynamics core (src/lander/) one fixed tick at a time and
 * does the bookkeeping the core leaves to its caller:
 *
 *   - fuel burn proportional to throttle
 *   - parachute loss when the chute is overloaded
 *   - touchdown detection and landed/crashed classification
 *   - optional telemetry recording
 *
 * Synchronous: `step()` and `run()` return when the requested ticks are
 * done.  No timers, no rendering.
 */

import type { LanderState } from '../lander/lander-state.ts'
import type { LanderEnvironment } from '../lander/environment.ts'
import type { LanderConstants } from '../lander/constants.ts'
import type { AutopilotGains } from '../lander/autopilot.ts'
import { DEFAULT_CONSTANTS } from '../lander/constants.ts'
import { DEFAULT_AUTOPILOT_GAINS, descentRateOf } from '../lander/autopilot.ts'
import { altitudeOf } from '../lander/atmosphere.ts'
import { createMarsEnvironment, parachuteDrag } from '../lander/environment.ts'
import { numericalDynamics } from '../lander/dynamics.ts'
import { initializeSimulation } from '../lander/scenarios.ts'

// ─── Types ──────────────────────────────────────────────────────────────────

export type FlightOutcome = 'flying' | 'landed' | 'crashed'

/** Sink for runner events.  `console` satisfies it. */
export type SimLogger = Pick<Console, 'log' | 'warn'>

/** Snapshot recorded after each tick when recording is on. */
export interface TelemetryPoint {
  /** Simulation time [s] */
  t: number
  /** Altitude [m] */
  altitude: number
  /** Signed radial velocity [m/s] */
  descentRate: number
  /** Horizontal speed [m/s] */
  groundSpeed: number
  throttle: number
  fuel: number
  parachuteStatus: LanderState['parachuteStatus']
}

export interface SimRunnerOptions {
  environment?: LanderEnvironment
  constants?: LanderConstants
  gains?: AutopilotGains
  /** Overrides the state's autopilotEnabled flag when set */
  autopilot?: boolean
  /** Record a TelemetryPoint after every tick */
  record?: boolean
  logger?: SimLogger
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Horizontal speed: velocity with its radial component removed. */
export function groundSpeedOf(state: LanderState): number {
  const up = state.position.clone().normalize()
  const climb = state.velocity.dot(up)
  return state.velocity.clone().addScaledVector(up, -climb).length()
}

// ─── Sim Runner ─────────────────────────────────────────────────────────────

export class SimRunner {
  private lander: LanderState
  private env: LanderEnvironment
  private constants: LanderConstants
  private gains: AutopilotGains
  private logger: SimLogger
  private recording: boolean
  private points: TelemetryPoint[] = []
  private steps = 0
  private result: FlightOutcome = 'flying'
  private fuelWarned = false

  constructor(state: LanderState, options: SimRunnerOptions = {}) {
    this.lander = state
    this.constants = options.constants ?? DEFAULT_CONSTANTS
    this.env = options.environment ?? createMarsEnvironment(this.constants)
    this.gains = options.gains ?? DEFAULT_AUTOPILOT_GAINS
    this.logger = options.logger ?? console
    this.recording = options.record ?? false
    if (options.autopilot !== undefined) this.lander.autopilotEnabled = options.autopilot
  }

  /**
   * Runner for a preset scenario.
   * Throws for reserved or unknown slots.
   */
  static fromScenario(scenarioId: number, options: SimRunnerOptions = {}): SimRunner {
    const state = initializeSimulation(scenarioId, options.constants ?? DEFAULT_CONSTANTS)
    if (!state) {
      throw new Error(`Scenario ${scenarioId} has no initial conditions`)
    }
    return new SimRunner(state, options)
  }

  /** Current simulation time [s] */
  get time(): number { return this.steps * this.lander.deltaT }

  /** Current altitude [m] */
  get altitude(): number { return altitudeOf(this.lander.position, this.constants) }

  get outcome(): FlightOutcome { return this.result }

  /** Current LanderState (mutated by every tick) */
  get state(): Readonly<LanderState> { return this.lander }

  /** Recorded telemetry, empty unless `record` was set */
  get trajectory(): readonly TelemetryPoint[] { return this.points }

  /**
   * Advance one tick.  A finished flight is left untouched.
   */
  step(): FlightOutcome {
    if (this.result !== 'flying') return this.result

    const s = this.lander
    const c = this.constants
    const chuteBefore = s.parachuteStatus

    numericalDynamics(s, this.env, c, this.gains)
    this.steps++

    this.burnFuel()

    if (chuteBefore === 'not_deployed' && s.parachuteStatus === 'deployed') {
      this.logger.log(`[SimRunner] Parachute deployed at ${this.altitude.toFixed(0)} m`)
    }
    if (s.parachuteStatus === 'deployed') {
      const drag = parachuteDrag(s, this.env.atmosphericDensity(s.position), c)
      if (drag > c.MAX_PARACHUTE_DRAG) {
        s.parachuteStatus = 'lost'
        this.logger.warn(`[SimRunner] Parachute lost: drag ${drag.toFixed(0)} N`)
      }
    }

    if (this.recording) this.points.push(this.snapshot())

    this.checkTouchdown()
    return this.result
  }

  /**
   * Advance up to `maxSteps` ticks, stopping early on touchdown.
   */
  run(maxSteps: number): FlightOutcome {
    for (let i = 0; i < maxSteps && this.result === 'flying'; i++) {
      this.step()
    }
    return this.result
  }

  private burnFuel(): void {
    const s = this.lander
    const c = this.constants
    const burned = s.deltaT * c.FUEL_RATE_AT_MAX_THRUST * s.throttle / c.FUEL_CAPACITY
    s.fuel = Math.max(0, s.fuel - burned)
    if (s.fuel === 0 && !this.fuelWarned) {
      this.fuelWarned = true
      this.logger.warn(`[SimRunner] Fuel exhausted at t=${this.time.toFixed(1)} s`)
    }
  }

  private checkTouchdown(): void {
    const s = this.lander
    const c = this.constants
    if (this.altitude >= c.LANDER_SIZE / 2) return

    const descentRate = descentRateOf(s.position, s.velocity)
    const groundSpeed = groundSpeedOf(s)
    const soft =
      Math.abs(descentRate) <= c.MAX_IMPACT_DESCENT_RATE &&
      groundSpeed <= c.MAX_IMPACT_GROUND_SPEED

    this.result = soft ? 'landed' : 'crashed'
    this.logger.log(
      `[SimRunner] Touchdown (${this.result}) at t=${this.time.toFixed(1)} s: ` +
      `descent ${Math.abs(descentRate).toFixed(2)} m/s, ground ${groundSpeed.toFixed(2)} m/s`,
    )
  }

  private snapshot(): TelemetryPoint {
    const s = this.lander
    return {
      t: this.time,
      altitude: this.altitude,
      descentRate: descentRateOf(s.position, s.velocity),
      groundSpeed: groundSpeedOf(s),
      throttle: s.throttle,
      fuel: s.fuel,
      parachuteStatus: s.parachuteStatus,
    }
  }
}
