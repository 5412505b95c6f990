import { AirState } from "../psychro/airState.js";
import { AtmosphericContext, resolvePressure } from "../psychro/atmosphere.js";
import { moistAirSpecificHeat } from "../psychro/converter.js";
import { InvalidInputError, attempt } from "../psychro/errors.js";
import { deriveOffCoilSetpoints } from "../psychro/derivation.js";
import { evaluateProcess, massFlowFromVolume } from "../psychro/process.js";
import type { DesignConditions } from "../adapters/weather/designConditions.js";
import type { DesignPoint, DesignResult, LabelledState, NamedProcess, StateKey, SystemFlows } from "../types.js";
import { DesignInputs, STATE_KEYS, STATE_LABELS } from "./inputs.js";

/** Specific heat used to size CRAH airflow from the sensible load, kJ/(kg·K). */
const CRAH_SIZING_CP = 1.008;
/** AHU outdoor-air flow as a share of CRAH room flow when no override is given. */
const AHU_AUTO_FLOW_SHARE = 0.011;

export function designAtmosphere(inputs: Pick<DesignInputs, "altitude_m" | "pressure_pa">): AtmosphericContext {
  if (inputs.pressure_pa !== undefined) return { pressure_pa: inputs.pressure_pa };
  return { altitude_m: inputs.altitude_m ?? 0 };
}

function stateFromPoint(point: DesignPoint, pressurePa: number): AirState {
  return AirState.resolve({ kind: "wet-bulb", dry_bulb_c: point.tdb_c, wet_bulb_c: point.twb_c }, { pressure_pa: pressurePa });
}

/**
 * Resolves every labelled design state. All failures are collected so the
 * caller sees each bad state at once.
 */
export function resolveDesignStates(states: Record<StateKey, DesignPoint>, pressurePa: number): LabelledState[] {
  const resolved: LabelledState[] = [];
  const failures: string[] = [];
  for (const key of STATE_KEYS) {
    const outcome = attempt(() => stateFromPoint(states[key], pressurePa));
    const { label, group } = STATE_LABELS[key];
    if (outcome.ok) resolved.push({ key, label, group, state: outcome.value });
    else failures.push(`${label}: ${outcome.error.message}`);
  }
  if (failures.length > 0) {
    throw new InvalidInputError(`Invalid design states: ${failures.join("; ")}`, { failed: failures.length });
  }
  return resolved;
}

export function stateByKey(states: LabelledState[], key: StateKey): AirState {
  const found = states.find((s) => s.key === key);
  if (!found) throw new InvalidInputError(`Design state ${key} missing`, { key });
  return found.state;
}

export interface SystemFlowParams {
  it_load_kw: number;
  aux_load_factor: number;
  ahu_volume_flow_m3_s: number | null;
  ahu_pressure_drop_pa: number;
  crah_off: AirState;
  crah_on: AirState;
  oc_dehum: AirState;
}

/**
 * CRAH and AHU airflows from the IT load.
 *   Q_sens   = IT load × aux factor
 *   CRAH ṁ   = Q_sens / (cp × ΔT_CRAH)
 *   CRAH V   = CRAH ṁ / mean(ρ on-coil, ρ off-coil)
 *   fan kW   = V_ahu(override) × Δp / 1000
 *   fan ΔT   = fan kW / (V_ahu × cp at the dehum off-coil)
 */
export function computeSystemFlows(params: SystemFlowParams): SystemFlows {
  const sensible = params.it_load_kw * params.aux_load_factor;
  const crahDeltaT = params.crah_on.dry_bulb_c - params.crah_off.dry_bulb_c;
  if (crahDeltaT <= 0) {
    throw new InvalidInputError("CRAH on-coil dry bulb must be above off-coil dry bulb", { crah_delta_t_c: crahDeltaT });
  }

  const crahMassFlow = sensible / (CRAH_SIZING_CP * crahDeltaT);
  const meanDensity = (params.crah_on.density_kg_m3 + params.crah_off.density_kg_m3) / 2;
  const crahVolume = crahMassFlow / meanDensity;

  const override = params.ahu_volume_flow_m3_s;
  const ahuVolume = override ?? crahVolume * AHU_AUTO_FLOW_SHARE;
  const fanLoad = ((override ?? 0) * params.ahu_pressure_drop_pa) / 1000;
  const cpOffCoil = moistAirSpecificHeat(params.oc_dehum.humidity_ratio_kg_kg);

  return {
    ahu_volume_flow_m3_s: ahuVolume,
    ahu_mass_flow_kg_s: massFlowFromVolume(ahuVolume, params.oc_dehum),
    crah_volume_flow_m3_s: crahVolume,
    crah_mass_flow_kg_s: crahMassFlow,
    fan_load_kw: fanLoad,
    fan_delta_t_c: ahuVolume > 0 ? fanLoad / (ahuVolume * cpOffCoil) : 0,
    sensible_load_kw: sensible
  };
}

const PROCESS_PLAN: { name: string; from: StateKey; to: StateKey; flow: "ahu" | "crah" }[] = [
  { name: "Summer Max Cooling", from: "oat_n20", to: "oc_cool", flow: "ahu" },
  { name: "Summer Enthalpy Cooling", from: "oat_04e", to: "oc_enth", flow: "ahu" },
  { name: "Summer Dehumidification", from: "oat_04h", to: "oc_dehum", flow: "ahu" },
  { name: "CRAH Cooling Loop", from: "crah_on", to: "crah_off", flow: "crah" },
  { name: "Winter Heating", from: "oat_min_n20", to: "oc_heat", flow: "ahu" },
  { name: "Winter Min OAH Heating", from: "oat_min_04h", to: "oc_heat", flow: "ahu" }
];

/** The named AHU/CRAH processes, each at the dry-air flow of its leaving state. */
export function computeDesignProcesses(states: LabelledState[], flows: SystemFlows): NamedProcess[] {
  return PROCESS_PLAN.map(({ name, from, to, flow }) => {
    const entering = stateByKey(states, from);
    const leaving = stateByKey(states, to);
    const volume = flow === "ahu" ? flows.ahu_volume_flow_m3_s : flows.crah_volume_flow_m3_s;
    return {
      name,
      state_in: STATE_LABELS[from].label,
      state_out: STATE_LABELS[to].label,
      result: evaluateProcess(entering, leaving, massFlowFromVolume(volume, leaving))
    };
  });
}

/** Outdoor design states filled from a design-day record. */
export function applyDesignConditions(inputs: DesignInputs, conditions: DesignConditions): DesignInputs {
  return {
    ...inputs,
    location: conditions.location,
    altitude_m: conditions.altitude_m,
    pressure_pa: undefined,
    states: {
      ...inputs.states,
      oat_n20: { tdb_c: conditions.cooling_db_n20_c, twb_c: conditions.cooling_wb_n20_c },
      oat_04e: { tdb_c: conditions.cooling_db_04_c, twb_c: conditions.cooling_wb_04_c },
      oat_04h: { tdb_c: conditions.dehumid_db_c, twb_c: conditions.dehumid_wb_c },
      oat_min_n20: { tdb_c: conditions.heating_db_n20_c, twb_c: conditions.heating_wb_n20_c },
      oat_min_04h: { tdb_c: conditions.heating_db_04_c, twb_c: conditions.heating_wb_04_c }
    }
  };
}

export function runDesign(inputs: DesignInputs): DesignResult {
  const pressure = resolvePressure(designAtmosphere(inputs));
  const atm = { pressure_pa: pressure };

  let points = inputs.states;
  if (inputs.derive_off_coil) {
    const setpoints = deriveOffCoilSetpoints(
      {
        crah_off: inputs.states.crah_off,
        crah_on_tdb_c: inputs.states.crah_on.tdb_c,
        winter_outdoor: inputs.states.oat_min_04h,
        ...inputs.off_coil_margins
      },
      atm
    );
    points = {
      ...inputs.states,
      oc_cool: setpoints.oc_cool,
      oc_dehum: setpoints.oc_dehum,
      oc_enth: setpoints.oc_enth,
      oc_heat: setpoints.oc_heat
    };
  }

  const states = resolveDesignStates(points, pressure);
  const flows = computeSystemFlows({
    it_load_kw: inputs.it_load_kw,
    aux_load_factor: inputs.aux_load_factor,
    ahu_volume_flow_m3_s: inputs.ahu_volume_flow_m3_s,
    ahu_pressure_drop_pa: inputs.ahu_pressure_drop_pa,
    crah_off: stateByKey(states, "crah_off"),
    crah_on: stateByKey(states, "crah_on"),
    oc_dehum: stateByKey(states, "oc_dehum")
  });

  return {
    location: inputs.location,
    pressure_pa: pressure,
    states,
    flows,
    processes: computeDesignProcesses(states, flows),
    off_coil_derived: inputs.derive_off_coil,
    crah_off_dew_point_c: stateByKey(states, "crah_off").dew_point_c
  };
}
