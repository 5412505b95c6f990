import { AirState } from "./airState.js";
import { dryBulbFromEnthalpy, moistAirSpecificHeat } from "./converter.js";
import { InvalidInputError, requireFinite } from "./errors.js";

export interface ProcessResult {
  /** kW, positive = heat added to the airstream. */
  sensible_kw: number;
  latent_kw: number;
  total_kw: number;
  mass_flow_kg_s: number;
  /** g/s, positive = moisture removed from the airstream. */
  moisture_g_s: number;
  /** Sensible / total; null when the total is too small to divide by. */
  shr: number | null;
  entering: AirState;
  leaving: AirState;
}

const SHR_MIN_TOTAL_KW = 0.001;

function checkMassFlow(massFlowKgS: number): number {
  requireFinite("mass_flow_kg_s", massFlowKgS);
  if (massFlowKgS < 0) {
    throw new InvalidInputError("mass_flow_kg_s cannot be negative", { mass_flow_kg_s: massFlowKgS });
  }
  return massFlowKgS;
}

function checkSamePressure(a: AirState, b: AirState): void {
  if (Math.abs(a.pressure_pa - b.pressure_pa) > 1e-6 * a.pressure_pa) {
    throw new InvalidInputError("states were resolved at different pressures", {
      entering_pressure_pa: a.pressure_pa,
      leaving_pressure_pa: b.pressure_pa
    });
  }
}

/**
 * Heat exchanged by a dry-air mass flow going from entering to leaving.
 * Sensible heat uses the enthalpy slope at the entering humidity ratio, so a
 * constant-W process is all sensible; latent is the remainder of the total.
 */
export function evaluateProcess(entering: AirState, leaving: AirState, massFlowKgS: number): ProcessResult {
  const m = checkMassFlow(massFlowKgS);
  checkSamePressure(entering, leaving);

  const total = m * (leaving.enthalpy_kj_kg - entering.enthalpy_kj_kg);
  const sensible =
    m * moistAirSpecificHeat(entering.humidity_ratio_kg_kg) * (leaving.dry_bulb_c - entering.dry_bulb_c);
  const latent = total - sensible;

  return Object.freeze({
    sensible_kw: sensible,
    latent_kw: latent,
    total_kw: total,
    mass_flow_kg_s: m,
    moisture_g_s: m * (entering.humidity_ratio_kg_kg - leaving.humidity_ratio_kg_kg) * 1000,
    shr: Math.abs(total) < SHR_MIN_TOTAL_KW ? null : sensible / total,
    entering,
    leaving
  });
}

/** Reheat or sensible cooling at constant humidity ratio. */
export function sensibleProcess(entering: AirState, leavingDryBulbC: number, massFlowKgS: number): ProcessResult {
  requireFinite("leaving_dry_bulb_c", leavingDryBulbC);
  if (leavingDryBulbC < entering.dew_point_c) {
    throw new InvalidInputError("sensible cooling cannot go below the dew point", {
      leaving_dry_bulb_c: leavingDryBulbC,
      dew_point_c: entering.dew_point_c
    });
  }
  const leaving = AirState.resolve(
    { kind: "humidity-ratio", dry_bulb_c: leavingDryBulbC, humidity_ratio_kg_kg: entering.humidity_ratio_kg_kg },
    { pressure_pa: entering.pressure_pa }
  );
  return evaluateProcess(entering, leaving, massFlowKgS);
}

export interface MixResult {
  state: AirState;
  mass_flow_kg_s: number;
}

/** Adiabatic mixing of two dry-air mass flows. */
export function mixStreams(a: AirState, massFlowA: number, b: AirState, massFlowB: number): MixResult {
  const ma = checkMassFlow(massFlowA);
  const mb = checkMassFlow(massFlowB);
  checkSamePressure(a, b);
  const m = ma + mb;
  if (m === 0) {
    throw new InvalidInputError("cannot mix two zero mass flows", { mass_flow_a_kg_s: ma, mass_flow_b_kg_s: mb });
  }

  const w = (ma * a.humidity_ratio_kg_kg + mb * b.humidity_ratio_kg_kg) / m;
  const h = (ma * a.enthalpy_kj_kg + mb * b.enthalpy_kj_kg) / m;
  // Mixing two near-saturated streams can land past the saturation curve;
  // the converter rejects that as supersaturated.
  const state = AirState.resolve(
    { kind: "humidity-ratio", dry_bulb_c: dryBulbFromEnthalpy(h, w), humidity_ratio_kg_kg: w },
    { pressure_pa: a.pressure_pa }
  );
  return { state, mass_flow_kg_s: m };
}

export interface CoilParams {
  apparatus_dew_point_c: number;
  /** Fraction of air passing the coil untreated, 0 <= bf < 1. */
  bypass_factor: number;
}

/** Cooling coil leaving state as a blend of entering air and saturated air at the ADP. */
export function coilProcess(entering: AirState, coil: CoilParams, massFlowKgS: number): ProcessResult {
  const bf = requireFinite("bypass_factor", coil.bypass_factor);
  if (bf < 0 || bf >= 1) {
    throw new InvalidInputError("bypass_factor must be within [0, 1)", { bypass_factor: bf });
  }
  if (coil.apparatus_dew_point_c > entering.dry_bulb_c) {
    throw new InvalidInputError("apparatus dew point cannot exceed the entering dry bulb", {
      apparatus_dew_point_c: coil.apparatus_dew_point_c,
      dry_bulb_c: entering.dry_bulb_c
    });
  }
  const adp = AirState.resolve(
    { kind: "rh", dry_bulb_c: coil.apparatus_dew_point_c, rh_0_1: 1 },
    { pressure_pa: entering.pressure_pa }
  );
  const leaving = bf === 0 ? adp : mixStreams(adp, 1 - bf, entering, bf).state;
  return evaluateProcess(entering, leaving, massFlowKgS);
}

/** Dry-air mass flow for a volume flow measured at the given state. */
export function massFlowFromVolume(volumeM3S: number, state: AirState): number {
  requireFinite("volume_m3_s", volumeM3S);
  if (volumeM3S < 0) {
    throw new InvalidInputError("volume_m3_s cannot be negative", { volume_m3_s: volumeM3S });
  }
  return volumeM3S / state.specific_volume_m3_kg;
}
