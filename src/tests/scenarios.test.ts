/**
 * Scenario preset tests.
 *
 * Checks every populated slot's initial conditions and the reserved-slot
 * behaviour of initializeSimulation.
 */

import { describe, it, expect } from 'vitest'
import {
  SCENARIO_SLOTS,
  SCENARIOS,
  getScenario,
  initializeSimulation,
  scenarioDescriptions,
} from '../lander/scenarios.ts'
import { DEFAULT_CONSTANTS } from '../lander/constants.ts'
import type { LanderState } from '../lander/lander-state.ts'

const R = DEFAULT_CONSTANTS.PLANET_RADIUS

function load(id: number): LanderState {
  const state = initializeSimulation(id)
  if (!state) throw new Error(`scenario ${id} missing`)
  return state
}

// ─── Populated Slots ─────────────────────────────────────────────────────────

describe('initializeSimulation', () => {
  it('0: circular orbit at 1.2 R', () => {
    const s = load(0)
    expect(s.position.x).toBeCloseTo(1.2 * R, 6)
    expect(s.position.y).toBe(0)
    expect(s.position.z).toBe(0)
    expect(s.velocity.toArray()).toEqual([0, -3247.087385863725, 0])
    expect(s.orientation.toArray()).toEqual([0, 90, 0])
    expect(s.deltaT).toBe(0.1)
    expect(s.parachuteStatus).toBe('not_deployed')
    expect(s.autopilotEnabled).toBe(false)
    expect(s.stabilizedAttitude).toBe(false)
  })

  it('0: orbital speed matches √(GM/r)', () => {
    const s = load(0)
    const GM = DEFAULT_CONSTANTS.GRAVITY * DEFAULT_CONSTANTS.PLANET_MASS
    expect(s.velocity.length()).toBeCloseTo(Math.sqrt(GM / s.position.length()), 6)
  })

  it('1: at rest 10 km above the surface, stabilized', () => {
    const s = load(1)
    expect(s.position.toArray()).toEqual([0, -(R + 10000), 0])
    expect(s.velocity.toArray()).toEqual([0, 0, 0])
    expect(s.orientation.toArray()).toEqual([0, 0, 90])
    expect(s.stabilizedAttitude).toBe(true)
    expect(s.autopilotEnabled).toBe(false)
  })

  it('2: elliptical polar orbit', () => {
    const s = load(2)
    expect(s.position.z).toBeCloseTo(1.2 * R, 6)
    expect(s.velocity.toArray()).toEqual([3500, 0, 0])
    expect(s.stabilizedAttitude).toBe(false)
  })

  it('3: polar launch from the surface at 5027 m/s', () => {
    const s = load(3)
    expect(s.position.toArray()).toEqual([0, 0, R + 0.5])
    expect(s.velocity.toArray()).toEqual([0, 0, 5027])
    expect(s.orientation.toArray()).toEqual([0, 0, 0])
  })

  it('4: orbit grazing the atmosphere at 100 km', () => {
    const s = load(4)
    expect(s.position.toArray()).toEqual([0, 0, R + 100000])
    expect(s.velocity.toArray()).toEqual([4000, 0, 0])
  })

  it('5: at rest at the edge of the exosphere, stabilized', () => {
    const s = load(5)
    expect(s.position.toArray()).toEqual([0, -(R + 200000), 0])
    expect(s.velocity.length()).toBe(0)
    expect(s.stabilizedAttitude).toBe(true)
  })

  it('6: areostationary orbit literals', () => {
    const s = load(6)
    expect(s.position.toArray()).toEqual([20429635.87, 0, 0])
    expect(s.velocity.toArray()).toEqual([0, 1448.025, 0])
  })

  it('every preset starts full, engine off, dt = 0.1', () => {
    for (const id of SCENARIOS.keys()) {
      const s = load(id)
      expect(s.scenarioId).toBe(id)
      expect(s.fuel).toBe(1)
      expect(s.throttle).toBe(0)
      expect(s.deltaT).toBe(0.1)
      expect(s.parachuteStatus).toBe('not_deployed')
    }
  })

  it('returns independent vectors on each call', () => {
    const a = load(1)
    const b = load(1)
    a.position.set(1, 2, 3)
    a.velocity.x = 99
    expect(b.position.toArray()).toEqual([0, -(R + 10000), 0])
    expect(b.velocity.x).toBe(0)
  })

  it('positions follow overridden constants', () => {
    const small = { ...DEFAULT_CONSTANTS, PLANET_RADIUS: 1000000, EXOSPHERE: 50000 }
    const s = initializeSimulation(5, small)
    expect(s?.position.toArray()).toEqual([0, -1050000, 0])
  })
})

// ─── Reserved / Unknown Slots ────────────────────────────────────────────────

describe('reserved slots', () => {
  it('7, 8 and 9 have no initial conditions', () => {
    for (const id of [7, 8, 9]) {
      expect(initializeSimulation(id)).toBeNull()
      expect(getScenario(id)).toBeUndefined()
    }
  })

  it('ids outside 0–9 have no initial conditions', () => {
    for (const id of [-1, 10, 2.5, Number.NaN]) {
      expect(initializeSimulation(id)).toBeNull()
    }
  })
})

// ─── Descriptions ────────────────────────────────────────────────────────────

describe('scenarioDescriptions', () => {
  it('one entry per slot, reserved slots empty', () => {
    const d = scenarioDescriptions()
    expect(d).toHaveLength(SCENARIO_SLOTS)
    expect(d[0]).toBe('circular orbit')
    expect(d[1]).toBe('descent from 10km')
    expect(d[5]).toBe('descent from 200km')
    expect(d[6]).toBe('geostationary orbit')
    expect(d.slice(7)).toEqual(['', '', ''])
  })

  it('seven populated slots', () => {
    expect(SCENARIOS.size).toBe(7)
    expect(scenarioDescriptions().filter((d) => d !== '')).toHaveLength(7)
  })
})
