import assert from "node:assert/strict";
import { test } from "node:test";
import { fToC, gPerKgToKgPerKg, kPaToPa, kgPerKgToGPerKg, paToKPa, round, toCelsius } from "./units.js";

test("temperatures convert from Fahrenheit only when asked", () => {
  assert.equal(fToC(212), 100);
  assert.equal(toCelsius(32, "F"), 0);
  assert.equal(toCelsius(24, "C"), 24);
});

test("pressure and humidity ratio scale by a thousand", () => {
  assert.equal(kPaToPa(100), 100_000);
  assert.equal(paToKPa(101_325), 101.325);
  assert.ok(Math.abs(gPerKgToKgPerKg(9.5) - 0.0095) < 1e-15);
  assert.equal(kgPerKgToGPerKg(0.5), 500);
});

test("round keeps the requested decimals", () => {
  assert.equal(round(16.48759, 2), 16.49);
  assert.equal(round(-2.6535, 1), -2.7);
  assert.equal(round(13.1, 1), 13.1);
});
