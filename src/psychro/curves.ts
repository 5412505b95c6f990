import { AtmosphericContext, resolvePressure } from "./atmosphere.js";
import { StateInput, convert } from "./converter.js";
import { InvalidInputError, isPsychroError, requireFinite } from "./errors.js";

export type CurveKind = "saturation" | "relative-humidity" | "enthalpy" | "wet-bulb";

export interface CurvePoint {
  dry_bulb_c: number;
  humidity_ratio_kg_kg: number;
}

export interface DryBulbDomain {
  min_c: number;
  max_c: number;
}

export type CurveRequest = {
  domain: DryBulbDomain;
  atmosphere: AtmosphericContext;
  /** Number of intervals; samples = steps + 1. Ignored when step_c is given. */
  steps?: number;
  step_c?: number;
} & (
  | { kind: "saturation" }
  | { kind: "relative-humidity"; rh_0_1: number }
  | { kind: "enthalpy"; enthalpy_kj_kg: number }
  | { kind: "wet-bulb"; wet_bulb_c: number }
);

export interface IsoLine extends Iterable<CurvePoint> {
  readonly kind: CurveKind;
  /** Fixed secondary property (RH 0-1, kJ/kg, or °C); 1 for saturation. */
  readonly value: number;
  readonly pressure_pa: number;
  readonly domain: Readonly<DryBulbDomain>;
  readonly samples: number;
  toArray(): CurvePoint[];
}

const DEFAULT_STEPS = 100;

function fixedValue(req: CurveRequest): number {
  switch (req.kind) {
    case "saturation":
      return 1;
    case "relative-humidity":
      return req.rh_0_1;
    case "enthalpy":
      return req.enthalpy_kj_kg;
    case "wet-bulb":
      return req.wet_bulb_c;
  }
}

function pairAt(kind: CurveKind, value: number, dry_bulb_c: number): StateInput {
  switch (kind) {
    case "saturation":
      return { kind: "rh", dry_bulb_c, rh_0_1: 1 };
    case "relative-humidity":
      return { kind: "rh", dry_bulb_c, rh_0_1: value };
    case "enthalpy":
      return { kind: "enthalpy", dry_bulb_c, enthalpy_kj_kg: value };
    case "wet-bulb":
      return { kind: "wet-bulb", dry_bulb_c, wet_bulb_c: value };
  }
}

function sampleCount(req: CurveRequest): number {
  const span = req.domain.max_c - req.domain.min_c;
  if (req.step_c !== undefined) {
    const step = requireFinite("step_c", req.step_c);
    if (step <= 0) throw new InvalidInputError("step_c must be positive", { step_c: step });
    return Math.floor(span / step + 1e-9) + 1;
  }
  const steps = req.steps ?? DEFAULT_STEPS;
  if (!Number.isInteger(steps) || steps < 1) {
    throw new InvalidInputError("steps must be a positive integer", { steps });
  }
  return steps + 1;
}

/**
 * Builds an iso-line over the dry-bulb domain. Nothing is computed until the
 * line is iterated, and every iteration recomputes the same points.
 *
 * Samples that are infeasible before the first valid point are skipped; the
 * first infeasible sample after it ends the line.
 */
export function isoLine(req: CurveRequest): IsoLine {
  const min = requireFinite("domain.min_c", req.domain.min_c);
  const max = requireFinite("domain.max_c", req.domain.max_c);
  if (min >= max) {
    throw new InvalidInputError("domain.min_c must be below domain.max_c", { min_c: min, max_c: max });
  }
  const value = requireFinite("value", fixedValue(req));
  if (req.kind === "relative-humidity" && (value < 0 || value > 1)) {
    throw new InvalidInputError("rh_0_1 must be within [0, 1]", { rh_0_1: value });
  }

  const pressure = resolvePressure(req.atmosphere);
  const samples = sampleCount(req);
  const kind = req.kind;
  const step = req.step_c ?? (max - min) / (samples - 1);

  function* generate(): Generator<CurvePoint> {
    let started = false;
    for (let i = 0; i < samples; i++) {
      const dry_bulb_c = i === samples - 1 && req.step_c === undefined ? max : min + i * step;
      let w: number;
      try {
        w = convert(pairAt(kind, value, dry_bulb_c), pressure).humidity_ratio_kg_kg;
      } catch (e: unknown) {
        if (!isPsychroError(e) || e.kind !== "InvalidInput") throw e;
        if (started) return;
        continue;
      }
      started = true;
      yield { dry_bulb_c, humidity_ratio_kg_kg: w };
    }
  }

  return {
    kind,
    value,
    pressure_pa: pressure,
    domain: Object.freeze({ min_c: min, max_c: max }),
    samples,
    [Symbol.iterator]: generate,
    toArray: () => Array.from(generate())
  };
}

export interface CurveFamilyOptions {
  domain: DryBulbDomain;
  atmosphere: AtmosphericContext;
  steps?: number;
  rh_values?: number[];
  enthalpy_values_kj_kg?: number[];
  wet_bulb_values_c?: number[];
}

export const DEFAULT_RH_VALUES = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9];
export const DEFAULT_ENTHALPY_VALUES = [0, 10, 20, 30, 40, 50, 60, 70, 80, 90, 100, 110];
export const DEFAULT_WET_BULB_VALUES = [5, 10, 15, 20, 25, 30];

/** Saturation plus the standard chart families, in drawing order. */
export function curveFamily(opts: CurveFamilyOptions): IsoLine[] {
  const base = { domain: opts.domain, atmosphere: opts.atmosphere, steps: opts.steps };
  return [
    isoLine({ ...base, kind: "saturation" }),
    ...(opts.rh_values ?? DEFAULT_RH_VALUES).map((rh_0_1) =>
      isoLine({ ...base, kind: "relative-humidity", rh_0_1 })
    ),
    ...(opts.enthalpy_values_kj_kg ?? DEFAULT_ENTHALPY_VALUES).map((enthalpy_kj_kg) =>
      isoLine({ ...base, kind: "enthalpy", enthalpy_kj_kg })
    ),
    ...(opts.wet_bulb_values_c ?? DEFAULT_WET_BULB_VALUES).map((wet_bulb_c) =>
      isoLine({ ...base, kind: "wet-bulb", wet_bulb_c })
    )
  ];
}
