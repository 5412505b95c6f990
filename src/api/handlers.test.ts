import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { test } from "node:test";
import { ConvergenceError } from "../psychro/errors.js";
import { loadDesignConditionsTable } from "../adapters/weather/designConditions.js";
import { ApiContext, errorResponse, getLocation, postCurves, postDesign, postProcess, postState } from "./handlers.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const configDir = path.join(__dirname, "..", "..", "config");
const rawInputs: unknown = JSON.parse(fs.readFileSync(path.join(configDir, "design.inputs.json"), "utf-8"));

const ctx: ApiContext = {
  conditions: loadDesignConditionsTable(path.join(configDir, "design-conditions.json")),
  chart: { min_c: -10, max_c: 55, max_humidity_ratio_g_kg: 32, steps: 20 }
};

function assertClose(actual: number, expected: number, tolerance: number, what = "value") {
  assert.ok(Math.abs(actual - expected) <= tolerance, `${what}: expected ${expected} ± ${tolerance}, got ${actual}`);
}

test("POST /api/state resolves a state at sea level by default", () => {
  const r = postState({ input: { kind: "rh", dry_bulb: 24, rh_0_1: 0.5 } });
  assert.equal(r.status, 200);
  assert.ok(r.body.ok);
  if (!r.body.ok) return;
  assert.equal(r.body.state.pressure_pa, 101325);
  assertClose(r.body.state.humidity_ratio_kg_kg, 0.009298505, 1e-8, "W");
});

test("POST /api/state converts Fahrenheit inputs", () => {
  const r = postState({
    temperature_unit: "F",
    atmosphere: { pressure_pa: 101325 },
    input: { kind: "wet-bulb", dry_bulb: 75.2, wet_bulb: 62.6 }
  });
  assert.ok(r.body.ok);
  if (!r.body.ok) return;
  assertClose(r.body.state.dry_bulb_c, 24, 1e-9, "dry bulb");
  assertClose(r.body.state.wet_bulb_c, 17, 1e-9, "wet bulb");
});

test("POST /api/state accepts pressure in kPa and humidity ratio in g/kg", () => {
  const r = postState({
    atmosphere: { pressure_kpa: 101.325 },
    input: { kind: "humidity-ratio", dry_bulb: 24, humidity_ratio_g_kg: 9.298505 }
  });
  assert.equal(r.status, 200);
  if (!r.body.ok) return assert.fail("expected a state");
  assertClose(r.body.state.pressure_pa, 101325, 1e-6, "pressure");
  assertClose(r.body.state.humidity_ratio_kg_kg, 0.009298505, 1e-12, "W");
  assertClose(r.body.state.rh_0_1, 0.5, 1e-6, "RH");
});

test("engine rejections become 400 responses", () => {
  const r = postState({ input: { kind: "rh", dry_bulb: 24, rh_0_1: 1.2 } });
  assert.equal(r.status, 400);
  assert.equal(r.body.ok, false);
  if (r.body.ok) return;
  assert.equal(r.body.error, "InvalidInput");
  assert.deepEqual(r.body.details, { rh_0_1: 1.2 });
});

test("malformed requests become validation errors", () => {
  const r = postState({ input: { kind: "rh", dry_bulb: "warm" } });
  assert.equal(r.status, 400);
  if (r.body.ok) return assert.fail("expected an error body");
  assert.equal(r.body.error, "ValidationError");
  assert.ok((r.body.issues ?? []).length > 0);
});

test("convergence failures map to 422 and other errors propagate", () => {
  assert.equal(errorResponse(new ConvergenceError("did not converge")).status, 422);
  assert.throws(() => errorResponse(new Error("bug")), /bug/);
});

test("POST /api/process evaluates the load between two states", () => {
  const r = postProcess({
    entering: { kind: "rh", dry_bulb: 24, rh_0_1: 0.5 },
    leaving: { kind: "rh", dry_bulb: 14, rh_0_1: 0.95 },
    mass_flow_kg_s: 1
  });
  assert.ok(r.body.ok);
  if (!r.body.ok) return;
  assertClose(r.body.process.total_kw, -9.8146491, 1e-6, "total");
  assertClose(r.body.process.sensible_kw, -10.2329522, 1e-6, "sensible");

  const both = postProcess({
    entering: { kind: "rh", dry_bulb: 24, rh_0_1: 0.5 },
    leaving: { kind: "rh", dry_bulb: 14, rh_0_1: 0.95 },
    mass_flow_kg_s: 1,
    volume_flow_m3_s: 1
  });
  assert.equal(both.status, 400);

  const negative = postProcess({
    entering: { kind: "rh", dry_bulb: 24, rh_0_1: 0.5 },
    leaving: { kind: "rh", dry_bulb: 14, rh_0_1: 0.95 },
    mass_flow_kg_s: -5
  });
  assert.equal(negative.status, 400);
});

test("POST /api/process sizes a volume flow at the leaving state", () => {
  const leaving = postState({ input: { kind: "rh", dry_bulb: 14, rh_0_1: 0.95 } });
  if (!leaving.body.ok) return assert.fail("expected a state");
  const r = postProcess({
    entering: { kind: "rh", dry_bulb: 24, rh_0_1: 0.5 },
    leaving: { kind: "rh", dry_bulb: 14, rh_0_1: 0.95 },
    volume_flow_m3_s: 2
  });
  if (!r.body.ok) return assert.fail("expected a process");
  assertClose(r.body.process.mass_flow_kg_s, 2 / leaving.body.state.specific_volume_m3_kg, 1e-12, "mass flow");
});

test("POST /api/curves returns the chart families", () => {
  const r = postCurves({ steps: 20 });
  assert.ok(r.body.ok);
  if (!r.body.ok) return;
  assert.equal(r.body.pressure_pa, 101325);
  assert.equal(r.body.curves[0].kind, "saturation");
  assert.equal(r.body.curves[0].points.length, 21);
});

test("POST /api/design runs the design, optionally for a tabulated location", () => {
  const r = postDesign({ inputs: rawInputs, location: "dubai" }, ctx);
  assert.equal(r.status, 200);
  if (!r.body.ok) return assert.fail("expected a design");
  assert.equal(r.body.design.location, "Dubai");
  assert.equal(r.body.design.processes.length, 6);
  assert.ok(r.body.chart);

  const noChart = postDesign({ inputs: rawInputs, include_chart: false }, ctx);
  if (!noChart.body.ok) return assert.fail("expected a design");
  assert.equal(noChart.body.chart, null);

  assert.equal(postDesign({ inputs: rawInputs, location: "Atlantis" }, ctx).status, 404);
});

test("GET /api/design-conditions/:location", () => {
  const found = getLocation("London", ctx);
  assert.equal(found.status, 200);
  if (!found.body.ok) return assert.fail("expected conditions");
  assert.equal(found.body.conditions.country, "UK");

  assert.equal(getLocation("Atlantis", ctx).status, 404);
});
