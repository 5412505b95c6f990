import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { StateGroup, StateKey } from "../types.js";
import { errorMessage } from "../utils/errors.js";

const DesignPointSchema = z
  .object({
    tdb_c: z.number(),
    twb_c: z.number()
  })
  .strict();

export const STATE_KEYS = [
  "ash_18_low",
  "ash_18_high",
  "ash_27_low",
  "ash_27_high",
  "crah_off",
  "crah_on",
  "oat_n20",
  "oat_04e",
  "oat_04h",
  "oat_min_n20",
  "oat_min_04h",
  "oc_cool",
  "oc_enth",
  "oc_dehum",
  "oc_heat",
  "return_air"
] as const satisfies readonly StateKey[];

export const STATE_LABELS: Record<StateKey, { label: string; group: StateGroup }> = {
  ash_18_low: { label: "ASHRAE 18 Low", group: "ASHRAE A1 Zone" },
  ash_18_high: { label: "ASHRAE 18 High", group: "ASHRAE A1 Zone" },
  ash_27_low: { label: "ASHRAE 27 Low", group: "ASHRAE A1 Zone" },
  ash_27_high: { label: "ASHRAE 27 High", group: "ASHRAE A1 Zone" },
  crah_off: { label: "CRAH Off-Coil", group: "CRAH" },
  crah_on: { label: "CRAH On-Coil", group: "CRAH" },
  oat_n20: { label: "OAT Max N=20", group: "Outdoor" },
  oat_04e: { label: "OAT Max 0.4%E", group: "Outdoor" },
  oat_04h: { label: "OAT Max 0.4%H", group: "Outdoor" },
  oat_min_n20: { label: "OAT Min N=20", group: "Outdoor" },
  oat_min_04h: { label: "OAT Min 0.4%H", group: "Outdoor" },
  oc_cool: { label: "OC Max Cool", group: "AHU Off-Coil" },
  oc_enth: { label: "OC Enthalpy", group: "AHU Off-Coil" },
  oc_dehum: { label: "OC Dehum", group: "AHU Off-Coil" },
  oc_heat: { label: "OC Heat", group: "AHU Off-Coil" },
  return_air: { label: "Return Air", group: "Return Air" }
};

const StatesSchema = z.object({
  ash_18_low: DesignPointSchema,
  ash_18_high: DesignPointSchema,
  ash_27_low: DesignPointSchema,
  ash_27_high: DesignPointSchema,
  crah_off: DesignPointSchema,
  crah_on: DesignPointSchema,
  oat_n20: DesignPointSchema,
  oat_04e: DesignPointSchema,
  oat_04h: DesignPointSchema,
  oat_min_n20: DesignPointSchema,
  oat_min_04h: DesignPointSchema,
  oc_cool: DesignPointSchema,
  oc_enth: DesignPointSchema,
  oc_dehum: DesignPointSchema,
  oc_heat: DesignPointSchema,
  return_air: DesignPointSchema
} satisfies Record<StateKey, typeof DesignPointSchema>);

export const DesignInputsSchema = z
  .object({
    location: z.string().min(1).default("CUSTOM"),
    altitude_m: z.number().min(-500).max(10_000).optional(),
    pressure_pa: z.number().positive().optional(),
    it_load_kw: z.number().nonnegative(),
    ahu_volume_flow_m3_s: z.number().positive().nullable().default(null),
    ahu_pressure_drop_pa: z.number().nonnegative().default(600),
    aux_load_factor: z.number().positive().default(1.055),
    derive_off_coil: z.boolean().default(false),
    off_coil_margins: z
      .object({
        cool_margin_c: z.number().default(2),
        dehum_margin_c: z.number().default(4),
        enthalpy_target_kj_kg: z.number().default(44)
      })
      .default({}),
    states: StatesSchema
  })
  .refine((v) => !(v.altitude_m !== undefined && v.pressure_pa !== undefined), {
    message: "give altitude_m or pressure_pa, not both",
    path: ["pressure_pa"]
  });

export type DesignInputs = z.infer<typeof DesignInputsSchema>;

export function parseDesignInputs(raw: unknown): DesignInputs {
  return DesignInputsSchema.parse(raw);
}

export function loadDesignInputs(designInputsPath: string): DesignInputs {
  const resolvedPath = path.resolve(designInputsPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e: unknown) {
    throw new Error(`Failed to read design inputs at ${resolvedPath}: ${errorMessage(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Design inputs JSON parse error (${resolvedPath}): ${errorMessage(e)}`);
  }

  try {
    return parseDesignInputs(parsed);
  } catch (e: unknown) {
    throw new Error(`Design inputs validation error (${resolvedPath}): ${errorMessage(e)}`);
  }
}
