import type { LabelledState, NamedProcess, StateTableRow } from "../types.js";
import { kgPerKgToGPerKg, round } from "../utils/units.js";

export type Cell = string | number | null;

export interface Column<T> {
  header: string;
  value: (row: T) => number | string | null;
  /** Decimal places for numbers; strings pass through. */
  digits?: number;
}

export const STATE_COLUMNS: Column<StateTableRow>[] = [
  { header: "State", value: (r) => r.label },
  { header: "Tdb (°C)", value: (r) => r.dry_bulb_c, digits: 1 },
  { header: "Twb (°C)", value: (r) => r.wet_bulb_c, digits: 1 },
  { header: "Tdp (°C)", value: (r) => r.dew_point_c, digits: 1 },
  { header: "RH (%)", value: (r) => r.rh_0_1 * 100, digits: 1 },
  { header: "W (g/kg)", value: (r) => kgPerKgToGPerKg(r.humidity_ratio_kg_kg), digits: 2 },
  { header: "h (kJ/kg)", value: (r) => r.enthalpy_kj_kg, digits: 2 },
  { header: "v (m³/kg)", value: (r) => r.specific_volume_m3_kg, digits: 4 },
  { header: "ρ (kg/m³)", value: (r) => r.density_kg_m3, digits: 3 }
];

export interface ProcessTableRow {
  name: string;
  state_in: string;
  state_out: string;
  mass_flow_kg_s: number;
  sensible_kw: number;
  latent_kw: number;
  total_kw: number;
  moisture_g_s: number;
  shr: number | null;
}

export const PROCESS_COLUMNS: Column<ProcessTableRow>[] = [
  { header: "Process", value: (r) => r.name },
  { header: "From", value: (r) => r.state_in },
  { header: "To", value: (r) => r.state_out },
  { header: "ṁ (kg/s)", value: (r) => r.mass_flow_kg_s, digits: 3 },
  { header: "Sensible (kW)", value: (r) => r.sensible_kw, digits: 2 },
  { header: "Latent (kW)", value: (r) => r.latent_kw, digits: 2 },
  { header: "Total (kW)", value: (r) => r.total_kw, digits: 2 },
  { header: "Moisture (g/s)", value: (r) => r.moisture_g_s, digits: 3 },
  { header: "SHR", value: (r) => r.shr, digits: 3 }
];

export function stateTableRows(states: LabelledState[]): StateTableRow[] {
  return states.map((s) => ({ label: s.label, ...s.state.properties() }));
}

export function processTableRows(processes: NamedProcess[]): ProcessTableRow[] {
  return processes.map((p) => ({
    name: p.name,
    state_in: p.state_in,
    state_out: p.state_out,
    mass_flow_kg_s: p.result.mass_flow_kg_s,
    sensible_kw: p.result.sensible_kw,
    latent_kw: p.result.latent_kw,
    total_kw: p.result.total_kw,
    moisture_g_s: p.result.moisture_g_s,
    shr: p.result.shr
  }));
}

/** Header row followed by one formatted row per record. */
export function tabulate<T>(rows: T[], columns: Column<T>[]): Cell[][] {
  const body = rows.map((row) =>
    columns.map((c) => {
      const v = c.value(row);
      if (typeof v === "number" && c.digits !== undefined) return round(v, c.digits);
      return v;
    })
  );
  return [columns.map((c) => c.header), ...body];
}

function csvField(cell: Cell): string {
  if (cell === null) return "";
  const text = String(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(table: Cell[][]): string {
  return table.map((row) => row.map(csvField).join(",")).join("\r\n") + "\r\n";
}

export function stateTableCsv(states: LabelledState[]): string {
  return toCsv(tabulate(stateTableRows(states), STATE_COLUMNS));
}

export function processTableCsv(processes: NamedProcess[]): string {
  return toCsv(tabulate(processTableRows(processes), PROCESS_COLUMNS));
}
