import assert from "node:assert/strict";
import { test } from "node:test";
import { resolveAirState } from "./airState.js";
import { InvalidInputError } from "./errors.js";
import { coilProcess, evaluateProcess, massFlowFromVolume, mixStreams, sensibleProcess } from "./process.js";

const SEA_LEVEL = { pressure_pa: 101325 };
const ROOM = resolveAirState({ kind: "rh", dry_bulb_c: 24, rh_0_1: 0.5 }, SEA_LEVEL);
const COOL_MOIST = resolveAirState({ kind: "rh", dry_bulb_c: 14, rh_0_1: 0.95 }, SEA_LEVEL);

function assertClose(actual: number, expected: number, tolerance: number, what = "value") {
  assert.ok(Math.abs(actual - expected) <= tolerance, `${what}: expected ${expected} ± ${tolerance}, got ${actual}`);
}

const isInvalid = (e: unknown) => e instanceof InvalidInputError;

test("cooling 24 °C/50 % to 14 °C/95 % at 1 kg/s", () => {
  const r = evaluateProcess(ROOM, COOL_MOIST, 1);

  assertClose(r.total_kw, -9.8146491, 1e-6, "total");
  assertClose(r.sensible_kw, -10.2329522, 1e-6, "sensible");
  assertClose(r.latent_kw, 0.4183031, 1e-6, "latent");
  assertClose(r.moisture_g_s, -0.1655309, 1e-6, "moisture");
  assert.ok(r.shr !== null);
  assertClose(r.shr ?? 0, 1.0426203, 1e-6, "shr");
  assert.equal(r.mass_flow_kg_s, 1);
  assert.equal(r.entering, ROOM);
  assert.equal(r.leaving, COOL_MOIST);
});

test("sensible plus latent equals total for any pair of states", () => {
  const states = [
    ROOM,
    COOL_MOIST,
    resolveAirState({ kind: "wet-bulb", dry_bulb_c: 45, wet_bulb_c: 28 }, SEA_LEVEL),
    resolveAirState({ kind: "rh", dry_bulb_c: -5, rh_0_1: 0.8 }, SEA_LEVEL)
  ];
  for (const a of states) {
    for (const b of states) {
      const r = evaluateProcess(a, b, 2.5);
      assertClose(r.sensible_kw + r.latent_kw, r.total_kw, 1e-9, "sum");
    }
  }
});

test("the same state in and out carries no load and no SHR", () => {
  const r = evaluateProcess(ROOM, ROOM, 3);
  assert.equal(r.total_kw, 0);
  assert.equal(r.sensible_kw, 0);
  assert.equal(r.moisture_g_s, 0);
  assert.equal(r.shr, null);
});

test("negative mass flow is rejected", () => {
  assert.throws(() => evaluateProcess(ROOM, COOL_MOIST, -5), isInvalid);
});

test("states resolved at different pressures cannot be compared", () => {
  const high = resolveAirState({ kind: "rh", dry_bulb_c: 24, rh_0_1: 0.5 }, { altitude_m: 1500 });
  assert.throws(() => evaluateProcess(ROOM, high, 1), isInvalid);
});

test("reheat at constant W is all sensible", () => {
  const r = sensibleProcess(COOL_MOIST, 22, 2);
  assertClose(r.total_kw, 16.3776497, 1e-5, "total");
  assertClose(r.sensible_kw, r.total_kw, 1e-9, "sensible");
  assertClose(r.latent_kw, 0, 1e-9, "latent");
  assertClose(r.shr ?? 0, 1, 1e-9, "shr");
  assert.equal(r.leaving.humidity_ratio_kg_kg, COOL_MOIST.humidity_ratio_kg_kg);
  assert.throws(() => sensibleProcess(ROOM, 5, 1), isInvalid);
});

test("mixing conserves mass, moisture and energy", () => {
  const mix = mixStreams(ROOM, 1, COOL_MOIST, 3);
  assert.equal(mix.mass_flow_kg_s, 4);
  assertClose(mix.state.humidity_ratio_kg_kg, 0.0094226533, 1e-9, "W");
  assertClose(mix.state.enthalpy_kj_kg, 40.4536599, 1e-6, "h");
  assertClose(mix.state.dry_bulb_c, 16.4994360, 1e-6, "tdb");
  assert.throws(() => mixStreams(ROOM, 0, COOL_MOIST, 0), isInvalid);
});

test("coil leaving state blends ADP and entering air by the bypass factor", () => {
  const r = coilProcess(ROOM, { apparatus_dew_point_c: 10, bypass_factor: 0.2 }, 1.5);
  assertClose(r.leaving.humidity_ratio_kg_kg, 0.007963744, 1e-9, "W");
  assertClose(r.leaving.dry_bulb_c, 12.8068097, 1e-6, "tdb");
  assertClose(r.total_kw, -22.2359561, 1e-5, "total");
  assert.ok(r.moisture_g_s > 0);

  const noBypass = coilProcess(ROOM, { apparatus_dew_point_c: 10, bypass_factor: 0 }, 1);
  assert.equal(noBypass.leaving.dry_bulb_c, 10);
  assert.equal(noBypass.leaving.rh_0_1, 1);

  assert.throws(() => coilProcess(ROOM, { apparatus_dew_point_c: 10, bypass_factor: 1 }, 1), isInvalid);
  assert.throws(() => coilProcess(ROOM, { apparatus_dew_point_c: 30, bypass_factor: 0.1 }, 1), isInvalid);
});

test("dry-air mass flow from a volume flow uses the specific volume", () => {
  assertClose(massFlowFromVolume(2, ROOM), 2.3408872, 1e-6);
  assert.throws(() => massFlowFromVolume(-1, ROOM), isInvalid);
});
