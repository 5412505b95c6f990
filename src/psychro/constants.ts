// SI constants for moist air, ASHRAE Handbook Fundamentals (2017) ch. 1.

export const ZERO_CELSIUS_K = 273.15;
export const TRIPLE_POINT_WATER_C = 0.01;

/** Ratio of molecular masses, water vapour / dry air. */
export const MOLAR_MASS_RATIO = 0.621945;

export const R_DRY_AIR_KJ_KG_K = 0.287042;
export const VOLUME_VAPOR_FACTOR = 1.607858;

export const CP_DRY_AIR_KJ_KG_K = 1.006;
export const CP_WATER_VAPOR_KJ_KG_K = 1.86;
export const HFG_0C_KJ_KG = 2501;

export const STANDARD_PRESSURE_PA = 101325;

/** Validity range of the saturation pressure correlation. */
export const MIN_DRY_BULB_C = -100;
export const MAX_DRY_BULB_C = 200;

/** Absolute tolerance on temperatures found by bisection (°C). */
export const TEMPERATURE_TOLERANCE_C = 1e-7;
/**
 * Wet bulb is solved tighter: W is nearly flat in the wet bulb, so the
 * dew point of very dry air re-derived from it magnifies any slack.
 */
export const WET_BULB_TOLERANCE_C = 1e-12;
export const MAX_SOLVER_ITERATIONS = 200;

/** Tolerance applied to RH and saturation boundary checks. */
export const SATURATION_TOLERANCE = 1e-9;
