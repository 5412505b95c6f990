// Usage: tsx scripts/fetch-design-conditions.ts "<city>"
import { loadConfig } from "../src/config.js";
import { getDesignConditionsForCity, liveToDesignConditions } from "../src/adapters/weather/openMeteo.js";
import { logger } from "../src/utils/logger.js";

const cfg = loadConfig();
const city = process.argv.slice(2).join(" ").trim();
if (!city) {
  throw new Error("Pass a city name, e.g. tsx scripts/fetch-design-conditions.ts Dubai");
}

const live = await getDesignConditionsForCity(city, {
  timeoutMs: cfg.HTTP_TIMEOUT_MS,
  years: cfg.WEATHER_HISTORY_YEARS
});
logger.info({ samples: live.samples_used, rejected: live.samples_rejected }, "Derived design conditions");

// Printed in the shape of a config/design-conditions.json entry.
// eslint-disable-next-line no-console
console.log(JSON.stringify(liveToDesignConditions(live), null, 2));
