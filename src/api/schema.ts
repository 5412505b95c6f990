import { z } from "zod";
import type { AtmosphericContext } from "../psychro/atmosphere.js";
import type { StateInput } from "../psychro/converter.js";
import { DesignInputsSchema } from "../design/inputs.js";
import { TemperatureUnit, gPerKgToKgPerKg, kPaToPa, toCelsius } from "../utils/units.js";

const AtmosphereSchema = z.union([
  z.object({ pressure_pa: z.number() }).strict(),
  z.object({ pressure_kpa: z.number() }).strict(),
  z.object({ altitude_m: z.number() }).strict()
]);

const TemperatureUnitSchema = z.enum(["C", "F"]).default("C");

// Temperatures arrive in `temperature_unit`; humidity ratio in kg/kg or g/kg,
// pressure in Pa or kPa. Everything is SI once converted.
const StateInputSchema = z.union([
  z.object({ kind: z.literal("rh"), dry_bulb: z.number(), rh_0_1: z.number() }).strict(),
  z.object({ kind: z.literal("wet-bulb"), dry_bulb: z.number(), wet_bulb: z.number() }).strict(),
  z.object({ kind: z.literal("dew-point"), dry_bulb: z.number(), dew_point: z.number() }).strict(),
  z.object({ kind: z.literal("humidity-ratio"), dry_bulb: z.number(), humidity_ratio_kg_kg: z.number() }).strict(),
  z.object({ kind: z.literal("humidity-ratio"), dry_bulb: z.number(), humidity_ratio_g_kg: z.number() }).strict(),
  z.object({ kind: z.literal("enthalpy"), dry_bulb: z.number(), enthalpy_kj_kg: z.number() }).strict()
]);

export type StateInputBody = z.infer<typeof StateInputSchema>;

export const StateRequestSchema = z.object({
  atmosphere: AtmosphereSchema.default({ altitude_m: 0 }),
  temperature_unit: TemperatureUnitSchema,
  input: StateInputSchema
});

export const CurvesRequestSchema = z.object({
  atmosphere: AtmosphereSchema.default({ altitude_m: 0 }),
  min_c: z.number().default(-10),
  max_c: z.number().default(55),
  steps: z.number().int().positive().max(2000).optional(),
  max_humidity_ratio_g_kg: z.number().positive().default(32)
});

export const ProcessRequestSchema = z
  .object({
    atmosphere: AtmosphereSchema.default({ altitude_m: 0 }),
    temperature_unit: TemperatureUnitSchema,
    entering: StateInputSchema,
    leaving: StateInputSchema,
    mass_flow_kg_s: z.number().optional(),
    volume_flow_m3_s: z.number().optional()
  })
  .refine((v) => (v.mass_flow_kg_s === undefined) !== (v.volume_flow_m3_s === undefined), {
    message: "give exactly one of mass_flow_kg_s or volume_flow_m3_s",
    path: ["mass_flow_kg_s"]
  });

export const DesignRequestSchema = z.object({
  inputs: DesignInputsSchema,
  /** Fill the outdoor states from this design-conditions location. */
  location: z.string().min(1).optional(),
  include_chart: z.boolean().default(true)
});

export type StateRequest = z.infer<typeof StateRequestSchema>;
export type CurvesRequest = z.infer<typeof CurvesRequestSchema>;
export type ProcessRequest = z.infer<typeof ProcessRequestSchema>;
export type DesignRequest = z.infer<typeof DesignRequestSchema>;

export function toAtmosphere(body: z.infer<typeof AtmosphereSchema>): AtmosphericContext {
  if ("pressure_pa" in body) return { pressure_pa: body.pressure_pa };
  if ("pressure_kpa" in body) return { pressure_pa: kPaToPa(body.pressure_kpa) };
  return { altitude_m: body.altitude_m };
}

export function toStateInput(body: StateInputBody, unit: TemperatureUnit): StateInput {
  const dry_bulb_c = toCelsius(body.dry_bulb, unit);
  switch (body.kind) {
    case "rh":
      return { kind: "rh", dry_bulb_c, rh_0_1: body.rh_0_1 };
    case "wet-bulb":
      return { kind: "wet-bulb", dry_bulb_c, wet_bulb_c: toCelsius(body.wet_bulb, unit) };
    case "dew-point":
      return { kind: "dew-point", dry_bulb_c, dew_point_c: toCelsius(body.dew_point, unit) };
    case "humidity-ratio":
      return {
        kind: "humidity-ratio",
        dry_bulb_c,
        humidity_ratio_kg_kg:
          "humidity_ratio_g_kg" in body ? gPerKgToKgPerKg(body.humidity_ratio_g_kg) : body.humidity_ratio_kg_kg
      };
    case "enthalpy":
      return { kind: "enthalpy", dry_bulb_c, enthalpy_kj_kg: body.enthalpy_kj_kg };
  }
}
