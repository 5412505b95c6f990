import type { AirState } from "./psychro/airState.js";
import type { ProcessResult } from "./psychro/process.js";
import type { PropertySet } from "./psychro/converter.js";
import type { CurveKind } from "./psychro/curves.js";

/** A design state as entered on the calculation sheet: dry bulb and wet bulb. */
export interface DesignPoint {
  tdb_c: number;
  twb_c: number;
}

export type StateKey =
  | "ash_18_low"
  | "ash_18_high"
  | "ash_27_low"
  | "ash_27_high"
  | "crah_off"
  | "crah_on"
  | "oat_n20"
  | "oat_04e"
  | "oat_04h"
  | "oat_min_n20"
  | "oat_min_04h"
  | "oc_cool"
  | "oc_enth"
  | "oc_dehum"
  | "oc_heat"
  | "return_air";

export type StateGroup = "ASHRAE A1 Zone" | "CRAH" | "Outdoor" | "AHU Off-Coil" | "Return Air";

export interface LabelledState {
  key: StateKey;
  label: string;
  group: StateGroup;
  state: AirState;
}

export interface SystemFlows {
  /** AHU (DOAS) volume flow, m³/s. */
  ahu_volume_flow_m3_s: number;
  ahu_mass_flow_kg_s: number;
  crah_volume_flow_m3_s: number;
  crah_mass_flow_kg_s: number;
  fan_load_kw: number;
  fan_delta_t_c: number;
  sensible_load_kw: number;
}

export interface NamedProcess {
  name: string;
  state_in: string;
  state_out: string;
  result: ProcessResult;
}

export interface DesignResult {
  location: string;
  pressure_pa: number;
  states: LabelledState[];
  flows: SystemFlows;
  processes: NamedProcess[];
  off_coil_derived: boolean;
  crah_off_dew_point_c: number;
}

export interface LiveDesignConditions {
  location_name: string;
  country: string;
  latitude: number;
  longitude: number;
  altitude_m: number;
  cooling_db_996_c: number;
  cooling_wb_996_c: number;
  cooling_db_990_c: number;
  cooling_wb_990_c: number;
  dehumid_wb_996_c: number;
  dehumid_db_996_c: number;
  heating_db_004_c: number;
  heating_db_010_c: number;
  heating_wb_mean_c: number;
  /** Mean humidity ratio of the coldest hours. */
  heating_humidity_ratio_kg_kg: number;
  data_years: number;
  samples_used: number;
  samples_rejected: number;
  source: string;
}

export interface StateTableRow extends PropertySet {
  label: string;
}

export interface ChartCurve {
  kind: CurveKind;
  value: number;
  label: string;
  points: { dry_bulb_c: number; humidity_ratio_g_kg: number }[];
}

export interface ChartStatePoint {
  key: StateKey;
  label: string;
  group: StateGroup;
  dry_bulb_c: number;
  humidity_ratio_g_kg: number;
}

export interface ChartProcessLine {
  label: string;
  from: string;
  to: string;
  points: [ChartStatePoint, ChartStatePoint];
}

export interface ChartData {
  pressure_pa: number;
  domain: { min_c: number; max_c: number; max_humidity_ratio_g_kg: number };
  curves: ChartCurve[];
  states: ChartStatePoint[];
  process_lines: ChartProcessLine[];
  zone: { dry_bulb_c: number; humidity_ratio_g_kg: number }[];
}
