import assert from "node:assert/strict";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { test } from "node:test";
import { InvalidInputError } from "../psychro/errors.js";
import { getDesignConditions, loadDesignConditionsTable } from "../adapters/weather/designConditions.js";
import { applyDesignConditions, resolveDesignStates, runDesign, stateByKey } from "./ahuDesign.js";
import { DesignInputs, loadDesignInputs, parseDesignInputs } from "./inputs.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const configDir = path.join(__dirname, "..", "..", "config");
const defaults = loadDesignInputs(path.join(configDir, "design.inputs.json"));

function assertClose(actual: number, expected: number, tolerance: number, what = "value") {
  assert.ok(Math.abs(actual - expected) <= tolerance, `${what}: expected ${expected} ± ${tolerance}, got ${actual}`);
}

test("default inputs resolve all sixteen labelled states", () => {
  const result = runDesign(defaults);
  assert.equal(result.location, "ABU DHABI");
  assert.equal(result.states.length, 16);
  assert.equal(result.states[0].label, "ASHRAE 18 Low");
  assert.equal(result.states[15].label, "Return Air");
  assertClose(result.pressure_pa, 101060.9897, 1e-3, "pressure");
  assertClose(result.crah_off_dew_point_c, 11.1118600, 1e-5, "CRAH dew point");
  assert.equal(result.off_coil_derived, false);
});

test("system flows follow the IT load and CRAH temperature difference", () => {
  const { flows } = runDesign(defaults);
  assertClose(flows.sensible_load_kw, 1582.5, 1e-9, "sensible load");
  assertClose(flows.crah_mass_flow_kg_s, 142.7218615, 1e-6, "CRAH mass flow");
  assertClose(flows.crah_volume_flow_m3_s, 123.6466037, 1e-5, "CRAH volume");
  assertClose(flows.ahu_volume_flow_m3_s, 1.3601126, 1e-6, "AHU volume");
  assertClose(flows.ahu_mass_flow_kg_s, 1.6338151, 1e-6, "AHU mass flow");
  assert.equal(flows.fan_load_kw, 0);
  assert.equal(flows.fan_delta_t_c, 0);
});

test("an AHU flow override sets the fan load and temperature rise", () => {
  const { flows } = runDesign({ ...defaults, ahu_volume_flow_m3_s: 2 });
  assert.equal(flows.ahu_volume_flow_m3_s, 2);
  assertClose(flows.fan_load_kw, 1.2, 1e-12, "fan load");
  assertClose(flows.fan_delta_t_c, 0.5848769, 1e-6, "fan ΔT");
});

test("design processes are listed in order with the expected signs", () => {
  const { processes } = runDesign(defaults);
  assert.deepEqual(
    processes.map((p) => p.name),
    [
      "Summer Max Cooling",
      "Summer Enthalpy Cooling",
      "Summer Dehumidification",
      "CRAH Cooling Loop",
      "Winter Heating",
      "Winter Min OAH Heating"
    ]
  );

  const [maxCool, , dehum, crah, heating] = processes;
  assert.equal(maxCool.state_in, "OAT Max N=20");
  assert.equal(maxCool.state_out, "OC Max Cool");
  assertClose(maxCool.result.total_kw, -129.8550466, 1e-4, "max cooling total");
  assertClose(maxCool.result.sensible_kw, -63.054182, 1e-4, "max cooling sensible");
  assertClose(maxCool.result.moisture_g_s, 26.4558508, 1e-4, "max cooling moisture");

  assert.ok(dehum.result.moisture_g_s > 0);
  assertClose(crah.result.total_kw, -1458.746386, 1e-2, "CRAH total");
  assertClose(crah.result.mass_flow_kg_s, 144.1002001, 1e-5, "CRAH mass flow");
  assert.ok(heating.result.sensible_kw > 0);
});

test("derived off-coil setpoints replace the entered ones", () => {
  const result = runDesign({ ...defaults, derive_off_coil: true });
  assert.equal(result.off_coil_derived, true);
  assert.equal(stateByKey(result.states, "oc_cool").dry_bulb_c, 13.1);
  assert.equal(stateByKey(result.states, "oc_dehum").dry_bulb_c, 15.1);
  assert.equal(stateByKey(result.states, "oc_enth").dry_bulb_c, 15.68);
  assert.equal(stateByKey(result.states, "oc_heat").wet_bulb_c, 16.48);
});

test("outdoor states are filled from a design-conditions record", () => {
  const table = loadDesignConditionsTable(path.join(configDir, "design-conditions.json"));
  const record = getDesignConditions(table, "abu dhabi");
  assert.ok(record);
  const filled: DesignInputs = applyDesignConditions(defaults, record);

  assert.equal(filled.location, "Abu Dhabi");
  assert.equal(filled.altitude_m, 27);
  assert.equal(filled.pressure_pa, undefined);
  assert.deepEqual(filled.states.oat_n20, { tdb_c: 47, twb_c: 29.5 });
  assert.deepEqual(filled.states.oat_min_04h, { tdb_c: 12.4, twb_c: 8.9 });
  assert.deepEqual(filled.states.crah_off, defaults.states.crah_off);
  assert.equal(runDesign(filled).processes.length, 6);
});

test("every bad design state is reported at once", () => {
  const states = {
    ...defaults.states,
    crah_off: { tdb_c: 25, twb_c: 26 },
    return_air: { tdb_c: 35, twb_c: 40 }
  };
  assert.throws(
    () => resolveDesignStates(states, 101325),
    (e: unknown) =>
      e instanceof InvalidInputError &&
      e.details.failed === 2 &&
      e.message.includes("CRAH Off-Coil") &&
      e.message.includes("Return Air")
  );
});

test("design inputs reject altitude and pressure together", () => {
  assert.throws(() => parseDesignInputs({ ...defaults, altitude_m: 0, pressure_pa: 101325 }));
  const parsed = parseDesignInputs({ it_load_kw: 100, states: defaults.states });
  assert.equal(parsed.location, "CUSTOM");
  assert.equal(parsed.aux_load_factor, 1.055);
  assert.equal(parsed.ahu_volume_flow_m3_s, null);
  assert.deepEqual(parsed.off_coil_margins, { cool_margin_c: 2, dehum_margin_c: 4, enthalpy_target_kj_kg: 44 });
});
