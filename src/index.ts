import { loadConfig } from "./config.js";
import { logger } from "./utils/logger.js";
import { startServer } from "./server.js";
import { loadDesignConditionsTable } from "./adapters/weather/designConditions.js";

const cfg = loadConfig();
const conditions = loadDesignConditionsTable(cfg.DESIGN_CONDITIONS_PATH);

logger.info(
  { locations: conditions.locations.size, source: conditions.source },
  "Loaded design conditions"
);

startServer({
  port: cfg.PORT,
  context: {
    conditions,
    chart: {
      min_c: cfg.CHART_TDB_MIN_C,
      max_c: cfg.CHART_TDB_MAX_C,
      max_humidity_ratio_g_kg: cfg.CHART_W_MAX_G_KG
    }
  }
});
