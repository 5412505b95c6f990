import { AtmosphericContext, resolvePressure } from "../psychro/atmosphere.js";
import { IsoLine, curveFamily } from "../psychro/curves.js";
import type { ChartCurve, ChartData, ChartProcessLine, ChartStatePoint, LabelledState, StateKey } from "../types.js";
import { kgPerKgToGPerKg } from "../utils/units.js";

export interface ChartOptions {
  min_c: number;
  max_c: number;
  max_humidity_ratio_g_kg: number;
  steps?: number;
}

// Lines drawn between labelled states, entering first.
const PROCESS_LINES: { label: string; from: StateKey; to: StateKey }[] = [
  { label: "Summer Max Cooling", from: "oat_n20", to: "oc_cool" },
  { label: "Summer Enthalpy", from: "oat_04e", to: "oc_enth" },
  { label: "Summer Dehum", from: "oat_04h", to: "oc_dehum" },
  { label: "Winter Heating", from: "oat_min_n20", to: "oc_heat" },
  { label: "DOAS to CRAH", from: "oc_cool", to: "crah_off" },
  { label: "CRAH Process", from: "crah_on", to: "crah_off" },
  { label: "Return to CRAH", from: "return_air", to: "crah_on" }
];

const ZONE_CORNERS: StateKey[] = ["ash_18_low", "ash_18_high", "ash_27_high", "ash_27_low"];

function curveLabel(line: IsoLine): string {
  switch (line.kind) {
    case "saturation":
      return "Saturation (100% RH)";
    case "relative-humidity":
      return `${Math.round(line.value * 100)}% RH`;
    case "enthalpy":
      return `${line.value} kJ/kg`;
    case "wet-bulb":
      return `WB ${line.value} °C`;
  }
}

function toChartCurve(line: IsoLine, maxGKg: number): ChartCurve {
  const points: ChartCurve["points"] = [];
  for (const p of line) {
    const humidity_ratio_g_kg = kgPerKgToGPerKg(p.humidity_ratio_kg_kg);
    // The saturation line is clipped by the plot frame rather than filtered.
    if (line.kind !== "saturation" && humidity_ratio_g_kg > maxGKg) continue;
    points.push({ dry_bulb_c: p.dry_bulb_c, humidity_ratio_g_kg });
  }
  return { kind: line.kind, value: line.value, label: curveLabel(line), points };
}

function toChartPoint(s: LabelledState): ChartStatePoint {
  return {
    key: s.key,
    label: s.label,
    group: s.group,
    dry_bulb_c: s.state.dry_bulb_c,
    humidity_ratio_g_kg: s.state.humidity_ratio_g_kg
  };
}

/**
 * Everything a renderer needs to draw the chart: iso-lines in g/kg, the
 * labelled states, process arrows and the ASHRAE A1 zone polygon (closed).
 * Curves left empty by the W cap are dropped.
 */
export function buildChartData(states: LabelledState[], atmosphere: AtmosphericContext, opts: ChartOptions): ChartData {
  const domain = { min_c: opts.min_c, max_c: opts.max_c };
  const lines = curveFamily({ domain, atmosphere, steps: opts.steps });
  const curves = lines
    .map((line) => toChartCurve(line, opts.max_humidity_ratio_g_kg))
    .filter((c) => c.points.length > 0);

  const points = states.map(toChartPoint);
  const byKey = new Map(points.map((p) => [p.key, p]));

  const process_lines: ChartProcessLine[] = [];
  for (const { label, from, to } of PROCESS_LINES) {
    const a = byKey.get(from);
    const b = byKey.get(to);
    if (!a || !b) continue;
    process_lines.push({ label, from: a.label, to: b.label, points: [a, b] });
  }

  const corners = ZONE_CORNERS.flatMap((k) => {
    const p = byKey.get(k);
    return p ? [{ dry_bulb_c: p.dry_bulb_c, humidity_ratio_g_kg: p.humidity_ratio_g_kg }] : [];
  });
  const zone = corners.length === ZONE_CORNERS.length ? [...corners, corners[0]] : [];

  return {
    pressure_pa: resolvePressure(atmosphere),
    domain: { ...domain, max_humidity_ratio_g_kg: opts.max_humidity_ratio_g_kg },
    curves,
    states: points,
    process_lines,
    zone
  };
}
