import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "../../utils/errors.js";

// Design-day records keyed by upper-case location. New locations are new
// entries in the JSON table.

const DesignConditionsSchema = z
  .object({
    location: z.string().min(1),
    country: z.string(),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    altitude_m: z.number(),
    timezone_offset_h: z.number(),

    cooling_db_n20_c: z.number(),
    cooling_wb_n20_c: z.number(),
    cooling_db_04_c: z.number(),
    cooling_wb_04_c: z.number(),
    dehumid_db_c: z.number(),
    dehumid_wb_c: z.number(),

    heating_db_n20_c: z.number(),
    heating_wb_n20_c: z.number(),
    heating_db_04_c: z.number(),
    heating_wb_04_c: z.number()
  })
  .strict();

const DesignConditionsTableSchema = z.object({
  source: z.string().min(1),
  locations: z.record(z.string().min(1), DesignConditionsSchema)
});

export type DesignConditions = z.infer<typeof DesignConditionsSchema>;

export interface DesignConditionsTable {
  source: string;
  locations: Map<string, DesignConditions>;
  sourcePath: string;
}

export const CUSTOM_LOCATION = "CUSTOM";

export function loadDesignConditionsTable(tablePath: string): DesignConditionsTable {
  const resolvedPath = path.resolve(tablePath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Failed to read design conditions at ${resolvedPath}: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Design conditions JSON parse error (${resolvedPath}): ${errorMessage(e)}`);
  }

  let validated: z.infer<typeof DesignConditionsTableSchema>;
  try {
    validated = DesignConditionsTableSchema.parse(parsed);
  } catch (e: unknown) {
    throw new Error(`Design conditions validation error (${resolvedPath}): ${errorMessage(e)}`);
  }

  const locations = new Map<string, DesignConditions>();
  for (const [key, record] of Object.entries(validated.locations)) {
    const normalized = key.trim().toUpperCase();
    if (locations.has(normalized)) {
      throw new Error(`Design conditions table lists ${normalized} twice (${resolvedPath})`);
    }
    locations.set(normalized, record);
  }
  return { source: validated.source, locations, sourcePath: resolvedPath };
}

/** Sorted location keys with CUSTOM last. */
export function listLocations(table: DesignConditionsTable): string[] {
  const keys = [...table.locations.keys()].filter((k) => k !== CUSTOM_LOCATION).sort();
  return table.locations.has(CUSTOM_LOCATION) ? [...keys, CUSTOM_LOCATION] : keys;
}

export function getDesignConditions(table: DesignConditionsTable, location: string): DesignConditions | undefined {
  return table.locations.get(location.trim().toUpperCase());
}
