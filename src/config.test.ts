import assert from "node:assert/strict";
import { test } from "node:test";
import { loadConfig, sheetsSettings } from "./config.js";

test("defaults apply when the environment is empty", () => {
  const cfg = loadConfig({});
  assert.equal(cfg.DESIGN_INPUTS_PATH, "./config/design.inputs.json");
  assert.equal(cfg.DESIGN_CONDITIONS_PATH, "./config/design-conditions.json");
  assert.equal(cfg.CHART_TDB_MIN_C, -10);
  assert.equal(cfg.CHART_TDB_MAX_C, 55);
  assert.equal(cfg.CHART_W_MAX_G_KG, 32);
  assert.equal(cfg.PORT, 3000);
  assert.equal(cfg.WEATHER_HISTORY_YEARS, 10);
});

test("numeric settings are coerced from strings", () => {
  const cfg = loadConfig({ PORT: "8080", CHART_TDB_MIN_C: "-20", HTTP_TIMEOUT_MS: "2500" });
  assert.equal(cfg.PORT, 8080);
  assert.equal(cfg.CHART_TDB_MIN_C, -20);
  assert.equal(cfg.HTTP_TIMEOUT_MS, 2500);
});

test("blank assignments fall back to unset", () => {
  const cfg = loadConfig({
    GOOGLE_SHEETS_SPREADSHEET_ID: "",
    GOOGLE_SERVICE_ACCOUNT_JSON: "./secrets/service-account.json",
    PORT: " ",
    GOOGLE_SHEETS_STATES_SHEET: ""
  });
  assert.equal(cfg.GOOGLE_SHEETS_SPREADSHEET_ID, undefined);
  assert.equal(cfg.GOOGLE_SERVICE_ACCOUNT_JSON, "./secrets/service-account.json");
  assert.equal(cfg.PORT, 3000);
  assert.equal(cfg.GOOGLE_SHEETS_STATES_SHEET, "States");
  assert.throws(() => sheetsSettings(cfg), /GOOGLE_SHEETS_SPREADSHEET_ID/);
});

test("invalid settings are rejected", () => {
  assert.throws(() => loadConfig({ PORT: "not-a-port" }), /Invalid environment configuration/);
  assert.throws(() => loadConfig({ CHART_TDB_MIN_C: "60" }), /Invalid environment configuration/);
});

test("sheet export needs a spreadsheet and credentials", () => {
  assert.throws(() => sheetsSettings(loadConfig({})), /GOOGLE_SHEETS_SPREADSHEET_ID/);

  const settings = sheetsSettings(
    loadConfig({ GOOGLE_SHEETS_SPREADSHEET_ID: "test-sheet", GOOGLE_SERVICE_ACCOUNT_JSON: "./test-credentials.json" })
  );
  assert.deepEqual(settings, {
    spreadsheetId: "test-sheet",
    serviceAccountJsonPath: "./test-credentials.json",
    statesSheet: "States",
    processesSheet: "Processes"
  });
});
