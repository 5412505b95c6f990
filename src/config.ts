import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const EnvSchema = z
  .object({
    DESIGN_INPUTS_PATH: z.string().default("./config/design.inputs.json"),
    DESIGN_CONDITIONS_PATH: z.string().default("./config/design-conditions.json"),
    REPORT_TEMPLATE_PATH: z.string().default("./config/report/design-report.md.hbs"),

    CHART_TDB_MIN_C: z.coerce.number().default(-10),
    CHART_TDB_MAX_C: z.coerce.number().default(55),
    CHART_W_MAX_G_KG: z.coerce.number().positive().default(32),

    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    WEATHER_HISTORY_YEARS: z.coerce.number().int().min(1).max(30).default(10),

    GOOGLE_SHEETS_SPREADSHEET_ID: z.string().min(1).optional(),
    GOOGLE_SHEETS_STATES_SHEET: z.string().default("States"),
    GOOGLE_SHEETS_PROCESSES_SHEET: z.string().default("Processes"),
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1).optional(),

    PORT: z.coerce.number().int().positive().default(3000)
  })
  .refine((v) => v.CHART_TDB_MIN_C < v.CHART_TDB_MAX_C, {
    message: "CHART_TDB_MIN_C must be below CHART_TDB_MAX_C",
    path: ["CHART_TDB_MIN_C"]
  });

export type AppConfig = z.infer<typeof EnvSchema>;

// A blank assignment such as `GOOGLE_SHEETS_SPREADSHEET_ID=` means unset.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const set: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") set[key] = value;
  }
  return set;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}

export interface SheetsSettings {
  spreadsheetId: string;
  serviceAccountJsonPath: string;
  statesSheet: string;
  processesSheet: string;
}

/** Sheets export is optional; both the spreadsheet and credentials must be set to use it. */
export function sheetsSettings(cfg: AppConfig): SheetsSettings {
  if (!cfg.GOOGLE_SHEETS_SPREADSHEET_ID || !cfg.GOOGLE_SERVICE_ACCOUNT_JSON) {
    throw new Error("GOOGLE_SHEETS_SPREADSHEET_ID and GOOGLE_SERVICE_ACCOUNT_JSON are required for sheet export");
  }
  return {
    spreadsheetId: cfg.GOOGLE_SHEETS_SPREADSHEET_ID,
    serviceAccountJsonPath: cfg.GOOGLE_SERVICE_ACCOUNT_JSON,
    statesSheet: cfg.GOOGLE_SHEETS_STATES_SHEET,
    processesSheet: cfg.GOOGLE_SHEETS_PROCESSES_SHEET
  };
}
