import { InvalidInputError, requireFinite } from "./errors.js";
import { STANDARD_PRESSURE_PA } from "./constants.js";

export type AtmosphericContext = { pressure_pa: number } | { altitude_m: number };

// Standard-atmosphere barometric formula stays positive below this height.
const BAROMETRIC_LIMIT_M = 1 / 2.25577e-5;

export function altitudeToPressure(altitudeM: number): number {
  requireFinite("altitude_m", altitudeM);
  if (altitudeM < -500 || altitudeM >= 11_000) {
    throw new InvalidInputError("altitude_m outside the standard atmosphere range [-500, 11000)", {
      altitude_m: altitudeM
    });
  }
  return STANDARD_PRESSURE_PA * Math.pow(1 - altitudeM / BAROMETRIC_LIMIT_M, 5.25588);
}

export function resolvePressure(atmosphere: AtmosphericContext): number {
  if ("pressure_pa" in atmosphere) {
    const p = requireFinite("pressure_pa", atmosphere.pressure_pa);
    if (p <= 0) {
      throw new InvalidInputError("pressure_pa must be positive", { pressure_pa: p });
    }
    return p;
  }
  return altitudeToPressure(atmosphere.altitude_m);
}
