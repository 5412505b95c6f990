import { google } from "googleapis";
import fs from "node:fs/promises";
import { z } from "zod";
import type { DesignResult } from "../../types.js";
import { Cell, PROCESS_COLUMNS, STATE_COLUMNS, processTableRows, stateTableRows, tabulate } from "../../report/stateTable.js";
import type { SheetsSettings } from "../../config.js";
import { logger } from "../../utils/logger.js";
import { paToKPa } from "../../utils/units.js";

const ServiceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

async function getSheetsClient(serviceAccountJsonPath: string) {
  const raw = await fs.readFile(serviceAccountJsonPath, "utf-8");
  const creds = ServiceAccountSchema.parse(JSON.parse(raw));

  const auth = new google.auth.JWT({
    email: creds.client_email,
    key: creds.private_key,
    scopes: ["https://www.googleapis.com/auth/spreadsheets"]
  });

  return google.sheets({ version: "v4", auth });
}

type SheetsClient = Awaited<ReturnType<typeof getSheetsClient>>;

async function ensureSheetExists(client: SheetsClient, spreadsheetId: string, sheetName: string): Promise<void> {
  const spreadsheet = await client.spreadsheets.get({
    spreadsheetId,
    fields: "sheets.properties.title"
  });
  const hasSheet = (spreadsheet.data.sheets ?? []).some((s) => s.properties?.title === sheetName);
  if (hasSheet) return;
  await client.spreadsheets.batchUpdate({
    spreadsheetId,
    requestBody: {
      requests: [{ addSheet: { properties: { title: sheetName } } }]
    }
  });
}

function normalizeRowValues(row: Cell[]): (string | number)[] {
  return row.map((v) => v ?? "");
}

/** Title line, blank line, then the table. */
function withTitle(title: string, table: Cell[][]): Cell[][] {
  return [[title], [], ...table];
}

export function stateSheetRows(result: DesignResult): Cell[][] {
  const title = `${result.location} design states at ${paToKPa(result.pressure_pa).toFixed(3)} kPa`;
  return withTitle(title, tabulate(stateTableRows(result.states), STATE_COLUMNS));
}

export function processSheetRows(result: DesignResult): Cell[][] {
  return withTitle(`${result.location} design processes`, tabulate(processTableRows(result.processes), PROCESS_COLUMNS));
}

async function overwriteSheet(client: SheetsClient, spreadsheetId: string, sheetName: string, rows: Cell[][]): Promise<void> {
  await ensureSheetExists(client, spreadsheetId, sheetName);
  await client.spreadsheets.values.clear({
    spreadsheetId,
    range: `${sheetName}!A:ZZ`
  });
  if (rows.length === 0) return;
  await client.spreadsheets.values.update({
    spreadsheetId,
    range: `${sheetName}!A1`,
    valueInputOption: "USER_ENTERED",
    requestBody: { values: rows.map(normalizeRowValues) }
  });
}

export async function exportDesignToSheets(cfg: SheetsSettings, result: DesignResult): Promise<void> {
  const client = await getSheetsClient(cfg.serviceAccountJsonPath);
  await overwriteSheet(client, cfg.spreadsheetId, cfg.statesSheet, stateSheetRows(result));
  await overwriteSheet(client, cfg.spreadsheetId, cfg.processesSheet, processSheetRows(result));
  logger.info(
    { spreadsheetId: cfg.spreadsheetId, states: result.states.length, processes: result.processes.length },
    "Exported design to Google Sheets"
  );
}
