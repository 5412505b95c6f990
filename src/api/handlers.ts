import { z, ZodError } from "zod";
import { AirState, resolveAirState } from "../psychro/airState.js";
import { ErrorDetails, isPsychroError } from "../psychro/errors.js";
import { ProcessResult, evaluateProcess, massFlowFromVolume } from "../psychro/process.js";
import { buildChartData, ChartOptions } from "../chart/chartData.js";
import { applyDesignConditions, runDesign } from "../design/ahuDesign.js";
import {
  DesignConditions,
  DesignConditionsTable,
  getDesignConditions,
  listLocations
} from "../adapters/weather/designConditions.js";
import type { ChartCurve, ChartData, DesignResult } from "../types.js";
import {
  CurvesRequestSchema,
  DesignRequestSchema,
  ProcessRequestSchema,
  StateRequestSchema,
  toAtmosphere,
  toStateInput
} from "./schema.js";

export interface HandlerResult<B> {
  status: number;
  body: B;
}

export interface ErrorBody {
  ok: false;
  error: string;
  message?: string;
  details?: ErrorDetails;
  issues?: { path: string; message: string }[];
}

export interface ApiContext {
  conditions: DesignConditionsTable;
  chart: ChartOptions;
}

/**
 * Maps request and engine failures to responses: validation and invalid input
 * are the caller's fault (400), a solver that did not converge is 422.
 * Anything else propagates.
 */
export function errorResponse(e: unknown): HandlerResult<ErrorBody> {
  if (e instanceof ZodError) {
    return {
      status: 400,
      body: {
        ok: false,
        error: "ValidationError",
        issues: e.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
      }
    };
  }
  if (isPsychroError(e)) {
    return {
      status: e.kind === "InvalidInput" ? 400 : 422,
      body: { ok: false, error: e.kind, message: e.message, details: e.details }
    };
  }
  throw e;
}

function handle<S extends z.ZodTypeAny, B>(
  schema: S,
  raw: unknown,
  fn: (req: z.output<S>) => HandlerResult<B>
): HandlerResult<B | ErrorBody> {
  try {
    return fn(schema.parse(raw));
  } catch (e: unknown) {
    return errorResponse(e);
  }
}

function notFound(location: string): HandlerResult<ErrorBody> {
  return { status: 404, body: { ok: false, error: "NotFound", message: `unknown location ${location}` } };
}

export function postState(raw: unknown) {
  return handle(StateRequestSchema, raw, (req): HandlerResult<{ ok: true; state: AirState }> => {
    const state = resolveAirState(toStateInput(req.input, req.temperature_unit), toAtmosphere(req.atmosphere));
    return { status: 200, body: { ok: true, state } };
  });
}

export function postCurves(raw: unknown) {
  return handle(CurvesRequestSchema, raw, (req): HandlerResult<{ ok: true; pressure_pa: number; curves: ChartCurve[] }> => {
    const chart = buildChartData([], toAtmosphere(req.atmosphere), {
      min_c: req.min_c,
      max_c: req.max_c,
      max_humidity_ratio_g_kg: req.max_humidity_ratio_g_kg,
      steps: req.steps
    });
    return { status: 200, body: { ok: true, pressure_pa: chart.pressure_pa, curves: chart.curves } };
  });
}

export function postProcess(raw: unknown) {
  return handle(ProcessRequestSchema, raw, (req): HandlerResult<{ ok: true; process: ProcessResult }> => {
    const atm = toAtmosphere(req.atmosphere);
    const entering = resolveAirState(toStateInput(req.entering, req.temperature_unit), atm);
    const leaving = resolveAirState(toStateInput(req.leaving, req.temperature_unit), atm);
    const massFlow = req.mass_flow_kg_s ?? massFlowFromVolume(req.volume_flow_m3_s ?? 0, leaving);
    return { status: 200, body: { ok: true, process: evaluateProcess(entering, leaving, massFlow) } };
  });
}

export function postDesign(raw: unknown, ctx: ApiContext) {
  return handle(
    DesignRequestSchema,
    raw,
    (req): HandlerResult<{ ok: true; design: DesignResult; chart: ChartData | null } | ErrorBody> => {
      let inputs = req.inputs;
      if (req.location !== undefined) {
        const record = getDesignConditions(ctx.conditions, req.location);
        if (!record) return notFound(req.location);
        inputs = applyDesignConditions(inputs, record);
      }
      const design = runDesign(inputs);
      const chart = req.include_chart ? buildChartData(design.states, { pressure_pa: design.pressure_pa }, ctx.chart) : null;
      return { status: 200, body: { ok: true, design, chart } };
    }
  );
}

export function getLocations(ctx: ApiContext): HandlerResult<{ ok: true; source: string; locations: string[] }> {
  return { status: 200, body: { ok: true, source: ctx.conditions.source, locations: listLocations(ctx.conditions) } };
}

export function getLocation(
  location: string,
  ctx: ApiContext
): HandlerResult<{ ok: true; source: string; conditions: DesignConditions } | ErrorBody> {
  const record = getDesignConditions(ctx.conditions, location);
  if (!record) return notFound(location);
  return { status: 200, body: { ok: true, source: ctx.conditions.source, conditions: record } };
}
