import { loadConfig, sheetsSettings } from "../src/config.js";
import { loadDesignInputs } from "../src/design/inputs.js";
import { runDesign } from "../src/design/ahuDesign.js";
import { exportDesignToSheets } from "../src/adapters/store/googleSheetsStore.js";

const cfg = loadConfig();
const result = runDesign(loadDesignInputs(cfg.DESIGN_INPUTS_PATH));
await exportDesignToSheets(sheetsSettings(cfg), result);
