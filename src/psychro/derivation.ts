import { AirState } from "./airState.js";
import { AtmosphericContext, resolvePressure } from "./atmosphere.js";
import {
  dewPointFromVaporPressure,
  minimumHumidityRatio,
  moistAirEnthalpy,
  saturationHumidityRatio,
  vaporPressureFromHumidityRatio
} from "./converter.js";
import { ConvergenceError, InvalidInputError, requireFinite } from "./errors.js";
import { ProcessResult, evaluateProcess } from "./process.js";
import { bisect } from "./solver.js";
import type { DesignPoint } from "../types.js";
import { round } from "../utils/units.js";

const APPROACH_AGREEMENT_C = 0.01;

export interface OffCoilParams {
  dew_point_c: number;
  rh_0_1?: number;
  approach_c?: number;
}

export interface OffCoilResult {
  state: AirState;
  basis: "rh" | "approach" | "rh+approach";
  /** Saturation humidity ratio at the coil dew point, carried to the off-coil state. */
  coil_humidity_ratio_kg_kg: number;
}

/**
 * Off-coil state leaving a coil at a given dew point.
 *
 * Independent: dew_point_c plus a target rh_0_1 or approach_c (dry bulb minus
 * dew point). Derived: humidity ratio (saturation at the dew point) and dry bulb.
 * Both targets may be given only when they describe the same state.
 */
export function offCoilFromDewPoint(params: OffCoilParams, atmosphere: AtmosphericContext): OffCoilResult {
  const pressure = resolvePressure(atmosphere);
  const tdp = requireFinite("dew_point_c", params.dew_point_c);
  const { rh_0_1: rh, approach_c: approach } = params;
  if (rh === undefined && approach === undefined) {
    throw new InvalidInputError("offCoilFromDewPoint needs rh_0_1 or approach_c", { dew_point_c: tdp });
  }

  const w = saturationHumidityRatio(tdp, pressure);

  let fromRh: number | undefined;
  if (rh !== undefined) {
    requireFinite("rh_0_1", rh);
    if (rh <= 0 || rh > 1) {
      throw new InvalidInputError("rh_0_1 must be within (0, 1]", { rh_0_1: rh });
    }
    // Dry bulb whose saturation pressure is pv / rh.
    fromRh = rh === 1 ? tdp : dewPointFromVaporPressure(vaporPressureFromHumidityRatio(w, pressure) / rh);
  }

  let fromApproach: number | undefined;
  if (approach !== undefined) {
    requireFinite("approach_c", approach);
    if (approach < 0) {
      throw new InvalidInputError("approach_c cannot be negative", { approach_c: approach });
    }
    fromApproach = tdp + approach;
  }

  if (fromRh !== undefined && fromApproach !== undefined && Math.abs(fromRh - fromApproach) > APPROACH_AGREEMENT_C) {
    throw new InvalidInputError("rh_0_1 and approach_c describe different off-coil states", {
      dry_bulb_from_rh_c: fromRh,
      dry_bulb_from_approach_c: fromApproach
    });
  }

  const dry_bulb_c = fromRh ?? fromApproach;
  if (dry_bulb_c === undefined) {
    throw new InvalidInputError("offCoilFromDewPoint could not derive a dry bulb", { dew_point_c: tdp });
  }
  const basis = fromRh !== undefined && fromApproach !== undefined ? "rh+approach" : fromRh !== undefined ? "rh" : "approach";

  const state = AirState.resolve(
    { kind: "humidity-ratio", dry_bulb_c, humidity_ratio_kg_kg: w },
    { pressure_pa: pressure }
  );
  return { state, basis, coil_humidity_ratio_kg_kg: w };
}

export interface ShrBackSolveParams {
  known: AirState;
  /** "entering" = the known state is the return air; "leaving" = it is the supply. */
  known_role: "entering" | "leaving";
  shr: number;
  unknown_dry_bulb_c: number;
  /** Over-determines the problem; only present so it can be rejected. */
  unknown_humidity_ratio_kg_kg?: number;
  mass_flow_kg_s?: number;
}

export interface ShrBackSolveResult {
  state: AirState;
  process: ProcessResult;
}

const SHR_SCAN_SEGMENTS = 64;
const SHR_TOLERANCE = 1e-5;
const HUMIDITY_RATIO_TOLERANCE = 1e-12;

/**
 * Back-solves the unknown end of a supply/return pair from a target sensible
 * heat ratio.
 *
 * Independent: the known state, its role, the target SHR and the unknown dry
 * bulb. Derived: the unknown humidity ratio, searched from the driest
 * representable W up to W_sat by a coarse scan for a bracket followed by
 * bisection on the SHR residual.
 */
export function backSolveFromSensibleHeatRatio(params: ShrBackSolveParams): ShrBackSolveResult {
  const target = requireFinite("shr", params.shr);
  const tdb = requireFinite("unknown_dry_bulb_c", params.unknown_dry_bulb_c);
  const massFlow = params.mass_flow_kg_s ?? 1;
  if (params.unknown_humidity_ratio_kg_kg !== undefined) {
    throw new InvalidInputError("unknown state is over-determined: humidity ratio given alongside shr", {
      unknown_humidity_ratio_kg_kg: params.unknown_humidity_ratio_kg_kg,
      shr: target
    });
  }

  const { known } = params;
  const atmosphere = { pressure_pa: known.pressure_pa };
  const candidate = (w: number) =>
    AirState.resolve({ kind: "humidity-ratio", dry_bulb_c: tdb, humidity_ratio_kg_kg: w }, atmosphere);
  const processFor = (w: number) =>
    params.known_role === "entering"
      ? evaluateProcess(known, candidate(w), 1)
      : evaluateProcess(candidate(w), known, 1);

  const wMin = minimumHumidityRatio(known.pressure_pa);
  const wMax = saturationHumidityRatio(tdb, known.pressure_pa);
  const grid = Array.from(
    { length: SHR_SCAN_SEGMENTS + 1 },
    (_, i) => wMin + ((wMax - wMin) * i) / SHR_SCAN_SEGMENTS
  );
  const scanned = grid.map((w) => processFor(w));

  let bracket: [number, number] | null = null;
  for (let i = 0; i < SHR_SCAN_SEGMENTS && !bracket; i++) {
    const a = scanned[i];
    const b = scanned[i + 1];
    if (a.shr === null || b.shr === null) continue;
    if (Math.sign(a.total_kw) !== Math.sign(b.total_kw)) continue;
    const ra = a.shr - target;
    const rb = b.shr - target;
    if (ra === 0 || rb === 0 || Math.sign(ra) !== Math.sign(rb)) bracket = [grid[i], grid[i + 1]];
  }
  if (!bracket) {
    throw new InvalidInputError("target shr is not reachable at this dry bulb", {
      shr: target,
      unknown_dry_bulb_c: tdb,
      known_dry_bulb_c: known.dry_bulb_c
    });
  }

  const w = bisect(
    (x) => {
      const shr = processFor(x).shr;
      if (shr === null) throw new ConvergenceError("shr undefined inside bracket", { humidity_ratio_kg_kg: x });
      return shr - target;
    },
    bracket[0],
    bracket[1],
    { tolerance: HUMIDITY_RATIO_TOLERANCE, label: "shr back-solve" }
  );

  const state = candidate(w);
  const process =
    params.known_role === "entering" ? evaluateProcess(known, state, massFlow) : evaluateProcess(state, known, massFlow);
  const achieved = processFor(w).shr;
  if (achieved === null || Math.abs(achieved - target) > SHR_TOLERANCE) {
    throw new ConvergenceError("shr back-solve missed the target", { shr: target, achieved });
  }
  return { state, process };
}

/** Dry bulb of saturated air with the given enthalpy, searched over [lo, hi] °C. */
export function saturatedDryBulbForEnthalpy(
  enthalpyKjKg: number,
  pressurePa: number,
  lo = 0,
  hi = 30
): number {
  requireFinite("enthalpy_kj_kg", enthalpyKjKg);
  return bisect(
    (t) => moistAirEnthalpy(t, saturationHumidityRatio(t, pressurePa)) - enthalpyKjKg,
    lo,
    hi,
    { label: "saturated dry bulb for enthalpy" }
  );
}

export interface OffCoilSetpointParams {
  crah_off: DesignPoint;
  crah_on_tdb_c: number;
  /** Winter outdoor state whose moisture the heating off-coil keeps. */
  winter_outdoor: DesignPoint;
  cool_margin_c: number;
  dehum_margin_c: number;
  enthalpy_target_kj_kg: number;
}

export interface OffCoilSetpoints {
  oc_cool: DesignPoint;
  oc_dehum: DesignPoint;
  oc_enth: DesignPoint;
  oc_heat: DesignPoint;
  crah_off_dew_point_c: number;
}

/**
 * AHU off-coil setpoints from the CRAH setpoints. Cooling, dehumidification
 * and enthalpy off-coil states are saturated; the heating off-coil state is
 * the CRAH on-coil dry bulb at the winter outdoor humidity ratio.
 */
export function deriveOffCoilSetpoints(params: OffCoilSetpointParams, atmosphere: AtmosphericContext): OffCoilSetpoints {
  const pressure = resolvePressure(atmosphere);
  const atm = { pressure_pa: pressure };
  const crahOff = AirState.resolve(
    { kind: "wet-bulb", dry_bulb_c: params.crah_off.tdb_c, wet_bulb_c: params.crah_off.twb_c },
    atm
  );

  const coolTdb = round(crahOff.dew_point_c + params.cool_margin_c, 1);
  const dehumTdb = round(crahOff.dew_point_c + params.dehum_margin_c, 1);
  const enthTdb = round(saturatedDryBulbForEnthalpy(params.enthalpy_target_kj_kg, pressure), 2);

  const winter = AirState.resolve(
    { kind: "wet-bulb", dry_bulb_c: params.winter_outdoor.tdb_c, wet_bulb_c: params.winter_outdoor.twb_c },
    atm
  );
  const heat = AirState.resolve(
    { kind: "humidity-ratio", dry_bulb_c: params.crah_on_tdb_c, humidity_ratio_kg_kg: winter.humidity_ratio_kg_kg },
    atm
  );

  return {
    oc_cool: { tdb_c: coolTdb, twb_c: coolTdb },
    oc_dehum: { tdb_c: dehumTdb, twb_c: dehumTdb },
    oc_enth: { tdb_c: enthTdb, twb_c: enthTdb },
    oc_heat: { tdb_c: params.crah_on_tdb_c, twb_c: round(heat.wet_bulb_c, 2) },
    crah_off_dew_point_c: round(crahOff.dew_point_c, 2)
  };
}
