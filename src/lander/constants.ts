/**
 * Physical constants for the planet and the lander.
 *
 * Pure data.  Every routine that needs one of these takes a
 * `LanderConstants` argument defaulting to DEFAULT_CONSTANTS, so a
 * test or an alternative planet can override any value by spreading:
 *
 *   const heavy = { ...DEFAULT_CONSTANTS, UNLOADED_LANDER_MASS: 400 }
 */

// ─── Constant Set ────────────────────────────────────────────────────────────

export interface LanderConstants {
  /** Universal gravitational constant [m³ kg⁻¹ s⁻²] */
  GRAVITY: number
  /** Planet mass [kg] */
  PLANET_MASS: number
  /** Planet mean radius [m] */
  PLANET_RADIUS: number
  /** Sidereal day [s] */
  PLANET_DAY: number
  /** Altitude above which the atmosphere is treated as vacuum [m] */
  EXOSPHERE: number
  /** Air density at the surface [kg/m³] */
  SURFACE_DENSITY: number
  /** Exponential scale height of the atmosphere [m] */
  DENSITY_SCALE_HEIGHT: number

  /** Dry mass of the lander [kg] */
  UNLOADED_LANDER_MASS: number
  /** Tank volume [l] */
  FUEL_CAPACITY: number
  /** Fuel burn at full throttle [l/s] */
  FUEL_RATE_AT_MAX_THRUST: number
  /** Fuel density [kg/l] */
  FUEL_DENSITY: number
  /** Characteristic lander radius [m] */
  LANDER_SIZE: number
  /** Drag coefficient of the lander body */
  DRAG_COEF_LANDER: number
  /** Drag coefficient of the parachute */
  DRAG_COEF_CHUTE: number
  /** Parachute area as a multiple of LANDER_SIZE² */
  CHUTE_AREA_FACTOR: number
  /** Drag force above which the parachute tears away [N] */
  MAX_PARACHUTE_DRAG: number

  /** Touchdown limits [m/s] */
  MAX_IMPACT_GROUND_SPEED: number
  MAX_IMPACT_DESCENT_RATE: number
}

/** Mars with the training lander. */
export const DEFAULT_CONSTANTS: LanderConstants = {
  GRAVITY: 6.673e-11,
  PLANET_MASS: 6.42e23,
  PLANET_RADIUS: 3386000.0,
  PLANET_DAY: 88642.65,
  EXOSPHERE: 200000.0,
  SURFACE_DENSITY: 0.017,
  DENSITY_SCALE_HEIGHT: 11000.0,

  UNLOADED_LANDER_MASS: 100.0,
  FUEL_CAPACITY: 100.0,
  FUEL_RATE_AT_MAX_THRUST: 0.5,
  FUEL_DENSITY: 1.0,
  LANDER_SIZE: 1.0,
  DRAG_COEF_LANDER: 1.0,
  DRAG_COEF_CHUTE: 2.0,
  CHUTE_AREA_FACTOR: 20,
  MAX_PARACHUTE_DRAG: 20000.0,

  MAX_IMPACT_GROUND_SPEED: 1.0,
  MAX_IMPACT_DESCENT_RATE: 1.0,
}

// ─── Derived Quantities ──────────────────────────────────────────────────────

/** Gravitational acceleration at the surface [m/s²] */
export function surfaceGravity(c: LanderConstants = DEFAULT_CONSTANTS): number {
  return c.GRAVITY * c.PLANET_MASS / (c.PLANET_RADIUS * c.PLANET_RADIUS)
}

/**
 * Engine thrust at full throttle [N].
 *
 * Sized to 1.5× the surface weight of a fully fuelled lander.
 */
export function maxThrust(c: LanderConstants = DEFAULT_CONSTANTS): number {
  return 1.5 * (c.FUEL_DENSITY * c.FUEL_CAPACITY + c.UNLOADED_LANDER_MASS) * surfaceGravity(c)
}

/** Total lander mass [kg] for a fuel fraction in [0, 1]. */
export function landerMass(fuel: number, c: LanderConstants = DEFAULT_CONSTANTS): number {
  return c.UNLOADED_LANDER_MASS + c.FUEL_CAPACITY * c.FUEL_DENSITY * fuel
}
