// Moist air property relations in SI units (°C, Pa, kg/kg dry air, kJ/kg dry air).
// Saturation pressure is the Hyland–Wexler correlation used by ASHRAE
// Fundamentals 2017, over ice up to the triple point and over water above it.

import {
  CP_DRY_AIR_KJ_KG_K,
  CP_WATER_VAPOR_KJ_KG_K,
  HFG_0C_KJ_KG,
  MAX_DRY_BULB_C,
  MIN_DRY_BULB_C,
  MOLAR_MASS_RATIO,
  R_DRY_AIR_KJ_KG_K,
  SATURATION_TOLERANCE,
  TRIPLE_POINT_WATER_C,
  VOLUME_VAPOR_FACTOR,
  WET_BULB_TOLERANCE_C,
  ZERO_CELSIUS_K
} from "./constants.js";
import { InvalidInputError, requireFinite } from "./errors.js";
import { bisect } from "./solver.js";

export type StateInput =
  | { kind: "rh"; dry_bulb_c: number; rh_0_1: number }
  | { kind: "wet-bulb"; dry_bulb_c: number; wet_bulb_c: number }
  | { kind: "dew-point"; dry_bulb_c: number; dew_point_c: number }
  | { kind: "humidity-ratio"; dry_bulb_c: number; humidity_ratio_kg_kg: number }
  | { kind: "enthalpy"; dry_bulb_c: number; enthalpy_kj_kg: number };

export type StateInputKind = StateInput["kind"];

export interface PropertySet {
  dry_bulb_c: number;
  wet_bulb_c: number;
  dew_point_c: number;
  rh_0_1: number;
  humidity_ratio_kg_kg: number;
  enthalpy_kj_kg: number;
  specific_volume_m3_kg: number;
  density_kg_m3: number;
  pressure_pa: number;
  vapor_pressure_pa: number;
  saturation_vapor_pressure_pa: number;
}

function checkTemperature(name: string, tC: number): number {
  requireFinite(name, tC);
  if (tC < MIN_DRY_BULB_C || tC > MAX_DRY_BULB_C) {
    throw new InvalidInputError(`${name} outside [${MIN_DRY_BULB_C}, ${MAX_DRY_BULB_C}] °C`, { [name]: tC });
  }
  return tC;
}

export function saturationPressure(tC: number): number {
  checkTemperature("temperature_c", tC);
  const T = tC + ZERO_CELSIUS_K;
  const lnPws =
    tC <= TRIPLE_POINT_WATER_C
      ? -5.6745359e3 / T +
        6.3925247 -
        9.677843e-3 * T +
        6.2215701e-7 * T * T +
        2.0747825e-9 * T ** 3 -
        9.484024e-13 * T ** 4 +
        4.1635019 * Math.log(T)
      : -5.8002206e3 / T +
        1.3914993 -
        4.8640239e-2 * T +
        4.1764768e-5 * T * T -
        1.4452093e-8 * T ** 3 +
        6.5459673 * Math.log(T);
  return Math.exp(lnPws);
}

export function humidityRatioFromVaporPressure(pvPa: number, pressurePa: number): number {
  if (pvPa >= pressurePa) {
    throw new InvalidInputError("vapor pressure must be below total pressure", {
      vapor_pressure_pa: pvPa,
      pressure_pa: pressurePa
    });
  }
  return (MOLAR_MASS_RATIO * pvPa) / (pressurePa - pvPa);
}

export function vaporPressureFromHumidityRatio(w: number, pressurePa: number): number {
  return (pressurePa * w) / (MOLAR_MASS_RATIO + w);
}

export function saturationHumidityRatio(tC: number, pressurePa: number): number {
  return humidityRatioFromVaporPressure(saturationPressure(tC), pressurePa);
}

/** Driest humidity ratio with a representable dew point. */
export function minimumHumidityRatio(pressurePa: number): number {
  return saturationHumidityRatio(MIN_DRY_BULB_C, pressurePa);
}

export function moistAirEnthalpy(tC: number, w: number): number {
  return CP_DRY_AIR_KJ_KG_K * tC + w * (HFG_0C_KJ_KG + CP_WATER_VAPOR_KJ_KG_K * tC);
}

/** dh/dt at constant humidity ratio. */
export function moistAirSpecificHeat(w: number): number {
  return CP_DRY_AIR_KJ_KG_K + CP_WATER_VAPOR_KJ_KG_K * w;
}

export function humidityRatioFromEnthalpy(tC: number, hKjKg: number): number {
  return (hKjKg - CP_DRY_AIR_KJ_KG_K * tC) / (HFG_0C_KJ_KG + CP_WATER_VAPOR_KJ_KG_K * tC);
}

export function dryBulbFromEnthalpy(hKjKg: number, w: number): number {
  return (hKjKg - HFG_0C_KJ_KG * w) / moistAirSpecificHeat(w);
}

export function specificVolume(tC: number, w: number, pressurePa: number): number {
  return (R_DRY_AIR_KJ_KG_K * (tC + ZERO_CELSIUS_K) * (1 + VOLUME_VAPOR_FACTOR * w)) / (pressurePa / 1000);
}

/** Psychrometer energy balance; may return a negative value for unreachable pairs. */
export function humidityRatioFromWetBulb(tdbC: number, twbC: number, pressurePa: number): number {
  const wsStar = saturationHumidityRatio(twbC, pressurePa);
  if (twbC >= 0) {
    return ((2501 - 2.326 * twbC) * wsStar - 1.006 * (tdbC - twbC)) / (2501 + 1.86 * tdbC - 4.186 * twbC);
  }
  return ((2830 - 0.24 * twbC) * wsStar - 1.006 * (tdbC - twbC)) / (2830 + 1.86 * tdbC - 2.1 * twbC);
}

/**
 * Dew point for a vapour pressure. Air drier than saturation at the
 * correlation's lower bound (bone-dry air included) has no dew point the
 * correlation can represent and is rejected.
 */
export function dewPointFromVaporPressure(pvPa: number, upperC: number = MAX_DRY_BULB_C): number {
  const floor = saturationPressure(MIN_DRY_BULB_C);
  if (pvPa < floor * (1 - SATURATION_TOLERANCE)) {
    throw new InvalidInputError(`air too dry: dew point below ${MIN_DRY_BULB_C} °C`, {
      vapor_pressure_pa: pvPa,
      min_vapor_pressure_pa: floor
    });
  }
  if (pvPa <= floor) return MIN_DRY_BULB_C;
  return bisect((t) => saturationPressure(t) - pvPa, MIN_DRY_BULB_C, upperC, { label: "dew point" });
}

export function wetBulbFromHumidityRatio(
  tdbC: number,
  w: number,
  pressurePa: number,
  dewPointC: number
): number {
  if (dewPointC >= tdbC) return tdbC;
  // The upper bracket end keeps W(wet bulb) >= w, so the wet bulb fed back
  // never implies a negative humidity ratio.
  return bisect((t) => humidityRatioFromWetBulb(tdbC, t, pressurePa) - w, dewPointC, tdbC, {
    label: "wet bulb",
    tolerance: WET_BULB_TOLERANCE_C,
    side: "non-negative"
  });
}

function humidityRatioForInput(input: StateInput, pressurePa: number): number {
  const tdb = input.dry_bulb_c;
  switch (input.kind) {
    case "rh": {
      const rh = requireFinite("rh_0_1", input.rh_0_1);
      if (rh < 0 || rh > 1) {
        throw new InvalidInputError("rh_0_1 must be within [0, 1]", { rh_0_1: rh });
      }
      return humidityRatioFromVaporPressure(rh * saturationPressure(tdb), pressurePa);
    }
    case "wet-bulb": {
      const twb = checkTemperature("wet_bulb_c", input.wet_bulb_c);
      if (twb > tdb) {
        throw new InvalidInputError("wet_bulb_c cannot exceed dry_bulb_c", { dry_bulb_c: tdb, wet_bulb_c: twb });
      }
      const w = humidityRatioFromWetBulb(tdb, twb, pressurePa);
      if (w < 0) {
        throw new InvalidInputError("wet_bulb_c too low for dry_bulb_c (negative humidity ratio)", {
          dry_bulb_c: tdb,
          wet_bulb_c: twb
        });
      }
      return w;
    }
    case "dew-point": {
      const tdp = checkTemperature("dew_point_c", input.dew_point_c);
      if (tdp > tdb) {
        throw new InvalidInputError("dew_point_c cannot exceed dry_bulb_c", { dry_bulb_c: tdb, dew_point_c: tdp });
      }
      return saturationHumidityRatio(tdp, pressurePa);
    }
    case "humidity-ratio":
      return requireFinite("humidity_ratio_kg_kg", input.humidity_ratio_kg_kg);
    case "enthalpy":
      return humidityRatioFromEnthalpy(tdb, requireFinite("enthalpy_kj_kg", input.enthalpy_kj_kg));
  }
}

/** Full property set for one independent pair at the given pressure. */
export function convert(input: StateInput, pressurePa: number): PropertySet {
  const tdb = checkTemperature("dry_bulb_c", input.dry_bulb_c);
  const psat = saturationPressure(tdb);
  if (psat >= pressurePa) {
    throw new InvalidInputError("dry_bulb_c at or above the boiling point for this pressure", {
      dry_bulb_c: tdb,
      pressure_pa: pressurePa
    });
  }

  const w = humidityRatioForInput(input, pressurePa);
  if (w < 0) {
    throw new InvalidInputError("humidity ratio cannot be negative", { humidity_ratio_kg_kg: w, input: input.kind });
  }

  const pv = vaporPressureFromHumidityRatio(w, pressurePa);
  if (pv > psat * (1 + SATURATION_TOLERANCE)) {
    throw new InvalidInputError("inputs imply supersaturated air", {
      dry_bulb_c: tdb,
      vapor_pressure_pa: pv,
      saturation_vapor_pressure_pa: psat,
      input: input.kind
    });
  }

  const rh = input.kind === "rh" ? input.rh_0_1 : Math.min(pv / psat, 1);
  const saturated = rh >= 1 - SATURATION_TOLERANCE;

  let dewPoint: number;
  if (input.kind === "dew-point") dewPoint = input.dew_point_c;
  else if (saturated) dewPoint = tdb;
  else dewPoint = dewPointFromVaporPressure(pv, tdb);

  let wetBulb: number;
  if (input.kind === "wet-bulb") wetBulb = input.wet_bulb_c;
  else if (saturated) wetBulb = tdb;
  else wetBulb = wetBulbFromHumidityRatio(tdb, w, pressurePa, dewPoint);

  const v = specificVolume(tdb, w, pressurePa);

  return {
    dry_bulb_c: tdb,
    wet_bulb_c: wetBulb,
    dew_point_c: dewPoint,
    rh_0_1: rh,
    humidity_ratio_kg_kg: w,
    enthalpy_kj_kg: input.kind === "enthalpy" ? input.enthalpy_kj_kg : moistAirEnthalpy(tdb, w),
    specific_volume_m3_kg: v,
    density_kg_m3: (1 + w) / v,
    pressure_pa: pressurePa,
    vapor_pressure_pa: pv,
    saturation_vapor_pressure_pa: psat
  };
}
