// Usage: tsx scripts/run-design.ts [--location "ABU DHABI"] [--csv]
import { loadConfig } from "../src/config.js";
import { loadDesignInputs } from "../src/design/inputs.js";
import { applyDesignConditions, runDesign } from "../src/design/ahuDesign.js";
import { getDesignConditions, loadDesignConditionsTable } from "../src/adapters/weather/designConditions.js";
import { loadReportTemplate, renderDesignReport } from "../src/report/designReport.js";
import { processTableCsv, stateTableCsv } from "../src/report/stateTable.js";

const cfg = loadConfig();
const args = process.argv.slice(2);
const locationIdx = args.indexOf("--location");
const location = locationIdx >= 0 ? args[locationIdx + 1] : undefined;

let inputs = loadDesignInputs(cfg.DESIGN_INPUTS_PATH);
if (location) {
  const table = loadDesignConditionsTable(cfg.DESIGN_CONDITIONS_PATH);
  const record = getDesignConditions(table, location);
  if (!record) throw new Error(`Unknown location ${location}`);
  inputs = applyDesignConditions(inputs, record);
}

const result = runDesign(inputs);

if (args.includes("--csv")) {
  // eslint-disable-next-line no-console
  console.log(stateTableCsv(result.states));
  // eslint-disable-next-line no-console
  console.log(processTableCsv(result.processes));
} else {
  const template = loadReportTemplate(cfg.REPORT_TEMPLATE_PATH);
  // eslint-disable-next-line no-console
  console.log(renderDesignReport(template, result));
}
