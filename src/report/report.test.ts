import assert from "node:assert/strict";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { test } from "node:test";
import { runDesign } from "../design/ahuDesign.js";
import { loadDesignInputs } from "../design/inputs.js";
import { buildReportContext, loadReportTemplate, renderDesignReport } from "./designReport.js";
import {
  PROCESS_COLUMNS,
  processTableCsv,
  processTableRows,
  stateTableCsv,
  stateTableRows,
  tabulate,
  toCsv
} from "./stateTable.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const configDir = path.join(__dirname, "..", "..", "config");
const design = runDesign(loadDesignInputs(path.join(configDir, "design.inputs.json")));

test("CSV quotes fields with commas, quotes or line breaks", () => {
  assert.equal(toCsv([["a", "b,c"], [1, null], ['say "hi"', 2.5]]), 'a,"b,c"\r\n1,\r\n"say ""hi""",2.5\r\n');
});

test("state table rows carry the label and every property", () => {
  const rows = stateTableRows(design.states);
  assert.equal(rows.length, 16);
  assert.equal(rows[4].label, "CRAH Off-Coil");
  assert.equal(rows[4].dry_bulb_c, 25);
  assert.equal(rows[4].wet_bulb_c, 16.5);
  assert.equal(rows[4].pressure_pa, design.pressure_pa);
});

test("state CSV rounds each column", () => {
  const lines = stateTableCsv(design.states).split("\r\n");
  assert.equal(lines[0], "State,Tdb (°C),Twb (°C),Tdp (°C),RH (%),W (g/kg),h (kJ/kg),v (m³/kg),ρ (kg/m³)");
  assert.equal(lines[1], "ASHRAE 18 Low,18,6.4,-12.6,10,1.27,21.32,0.8286,1.208");
  assert.equal(lines.length, 18);
  assert.equal(lines[17], "");
});

test("process table lists every design process", () => {
  const table = tabulate(processTableRows(design.processes), PROCESS_COLUMNS);
  assert.equal(table.length, 7);
  assert.deepEqual(table[1].slice(0, 3), ["Summer Max Cooling", "OAT Max N=20", "OC Max Cool"]);
  assert.equal(table[1][6], -129.86);

  const csv = processTableCsv(design.processes).split("\r\n");
  assert.equal(csv[0], "Process,From,To,ṁ (kg/s),Sensible (kW),Latent (kW),Total (kW),Moisture (g/s),SHR");
  assert.ok(csv[1].startsWith("Summer Max Cooling,OAT Max N=20,OC Max Cool,"));
});

test("report context formats the headline figures", () => {
  const ctx = buildReportContext(design);
  assert.equal(ctx.location, "ABU DHABI");
  assert.equal(ctx.pressure_kpa, "101.061");
  assert.equal(ctx.crah_off_dew_point_c, "11.11");
  assert.deepEqual(ctx.flows[0], { label: "Sensible load (kW)", value: "1582.5" });
  assert.equal(ctx.state_table[2], "| ASHRAE 18 Low | 18.0 | 6.4 | -12.6 | 10.0 | 1.27 | 21.32 | 0.8286 | 1.208 |");
  assert.equal(ctx.process_table.length, 8);
});

test("markdown report renders through the template", () => {
  const template = loadReportTemplate(path.join(configDir, "report", "design-report.md.hbs"));
  assert.match(template.version, /^design-report\.md\.hbs#[0-9a-f]{8}$/);

  const lines = renderDesignReport(template, design).split("\n");
  assert.equal(lines[0], "# AHU Psychrometric Design: ABU DHABI");
  assert.ok(lines.includes("- Atmospheric pressure: 101.061 kPa"));
  assert.ok(lines.includes("- Off-coil states: as entered"));
  assert.ok(lines.includes("- CRAH off-coil dew point: 11.11 °C"));
  assert.ok(lines.includes("| Sensible load (kW) | 1582.5 |"));
  assert.ok(lines.includes("| ASHRAE 18 Low | 18.0 | 6.4 | -12.6 | 10.0 | 1.27 | 21.32 | 0.8286 | 1.208 |"));
  assert.ok(lines.includes("| Process | From | To | ṁ (kg/s) | Sensible (kW) | Latent (kW) | Total (kW) | Moisture (g/s) | SHR |"));
});
