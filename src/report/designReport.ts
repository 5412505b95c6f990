import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import Handlebars from "handlebars";
import type { DesignResult } from "../types.js";
import { errorMessage } from "../utils/errors.js";
import { paToKPa } from "../utils/units.js";
import { Column, PROCESS_COLUMNS, STATE_COLUMNS, processTableRows, stateTableRows } from "./stateTable.js";

export interface ReportTemplate {
  path: string;
  version: string;
  render: (context: ReportContext) => string;
}

export interface ReportContext {
  location: string;
  pressure_kpa: string;
  off_coil_derived: boolean;
  crah_off_dew_point_c: string;
  flows: { label: string; value: string }[];
  state_table: string[];
  process_table: string[];
}

export function loadReportTemplate(templatePath: string): ReportTemplate {
  const resolvedPath = path.resolve(templatePath);

  let templateSource: string;
  try {
    templateSource = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Failed to read report template at ${resolvedPath}: ${errorMessage(e)}`);
  }

  const compiled = Handlebars.compile<ReportContext>(templateSource, { noEscape: true });
  const hash = crypto.createHash("sha256").update(templateSource).digest("hex").slice(0, 8);

  return {
    path: resolvedPath,
    version: `${path.basename(resolvedPath)}#${hash}`,
    render: (context) => compiled(context)
  };
}

function formatCell(value: number | string | null, digits: number | undefined): string {
  if (value === null) return "-";
  if (typeof value === "string") return value;
  return digits === undefined ? String(value) : value.toFixed(digits);
}

function markdownRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/** Markdown table lines: header, separator, one line per row. */
export function markdownTable<T>(rows: T[], columns: Column<T>[]): string[] {
  return [
    markdownRow(columns.map((c) => c.header)),
    markdownRow(columns.map(() => "---")),
    ...rows.map((row) => markdownRow(columns.map((c) => formatCell(c.value(row), c.digits))))
  ];
}

export function buildReportContext(result: DesignResult): ReportContext {
  const f = result.flows;
  return {
    location: result.location,
    pressure_kpa: paToKPa(result.pressure_pa).toFixed(3),
    off_coil_derived: result.off_coil_derived,
    crah_off_dew_point_c: result.crah_off_dew_point_c.toFixed(2),
    flows: [
      { label: "Sensible load (kW)", value: f.sensible_load_kw.toFixed(1) },
      { label: "CRAH mass flow (kg/s)", value: f.crah_mass_flow_kg_s.toFixed(2) },
      { label: "CRAH volume flow (m³/s)", value: f.crah_volume_flow_m3_s.toFixed(2) },
      { label: "AHU volume flow (m³/s)", value: f.ahu_volume_flow_m3_s.toFixed(3) },
      { label: "AHU mass flow (kg/s)", value: f.ahu_mass_flow_kg_s.toFixed(3) },
      { label: "AHU fan load (kW)", value: f.fan_load_kw.toFixed(2) },
      { label: "AHU fan temperature rise (K)", value: f.fan_delta_t_c.toFixed(2) }
    ],
    state_table: markdownTable(stateTableRows(result.states), STATE_COLUMNS),
    process_table: markdownTable(processTableRows(result.processes), PROCESS_COLUMNS)
  };
}

export function renderDesignReport(template: ReportTemplate, result: DesignResult): string {
  return template.render(buildReportContext(result));
}
