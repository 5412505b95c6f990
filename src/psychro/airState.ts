import { AtmosphericContext, resolvePressure } from "./atmosphere.js";
import { PropertySet, StateInput, convert } from "./converter.js";
import { Outcome, attempt } from "./errors.js";
import { kgPerKgToGPerKg } from "../utils/units.js";

/**
 * One fully resolved moist air state. Instances only come out of
 * resolveAirState, so every field is populated and consistent.
 */
export class AirState implements Readonly<PropertySet> {
  readonly dry_bulb_c: number;
  readonly wet_bulb_c: number;
  readonly dew_point_c: number;
  readonly rh_0_1: number;
  readonly humidity_ratio_kg_kg: number;
  readonly enthalpy_kj_kg: number;
  readonly specific_volume_m3_kg: number;
  readonly density_kg_m3: number;
  readonly pressure_pa: number;
  readonly vapor_pressure_pa: number;
  readonly saturation_vapor_pressure_pa: number;

  private constructor(props: PropertySet) {
    this.dry_bulb_c = props.dry_bulb_c;
    this.wet_bulb_c = props.wet_bulb_c;
    this.dew_point_c = props.dew_point_c;
    this.rh_0_1 = props.rh_0_1;
    this.humidity_ratio_kg_kg = props.humidity_ratio_kg_kg;
    this.enthalpy_kj_kg = props.enthalpy_kj_kg;
    this.specific_volume_m3_kg = props.specific_volume_m3_kg;
    this.density_kg_m3 = props.density_kg_m3;
    this.pressure_pa = props.pressure_pa;
    this.vapor_pressure_pa = props.vapor_pressure_pa;
    this.saturation_vapor_pressure_pa = props.saturation_vapor_pressure_pa;
    Object.freeze(this);
  }

  static resolve(input: StateInput, atmosphere: AtmosphericContext): AirState {
    const pressure = resolvePressure(atmosphere);
    return new AirState(convert(input, pressure));
  }

  /** Humidity ratio in g/kg, the unit charts are drawn in. */
  get humidity_ratio_g_kg(): number {
    return kgPerKgToGPerKg(this.humidity_ratio_kg_kg);
  }

  properties(): PropertySet {
    return {
      dry_bulb_c: this.dry_bulb_c,
      wet_bulb_c: this.wet_bulb_c,
      dew_point_c: this.dew_point_c,
      rh_0_1: this.rh_0_1,
      humidity_ratio_kg_kg: this.humidity_ratio_kg_kg,
      enthalpy_kj_kg: this.enthalpy_kj_kg,
      specific_volume_m3_kg: this.specific_volume_m3_kg,
      density_kg_m3: this.density_kg_m3,
      pressure_pa: this.pressure_pa,
      vapor_pressure_pa: this.vapor_pressure_pa,
      saturation_vapor_pressure_pa: this.saturation_vapor_pressure_pa
    };
  }

  toJSON(): PropertySet {
    return this.properties();
  }
}

export function resolveAirState(input: StateInput, atmosphere: AtmosphericContext): AirState {
  return AirState.resolve(input, atmosphere);
}

export function tryResolveAirState(input: StateInput, atmosphere: AtmosphericContext): Outcome<AirState> {
  return attempt(() => AirState.resolve(input, atmosphere));
}

/** The same point, re-derived from another of its own independent pairs. */
export function rederive(state: AirState, kind: StateInput["kind"]): AirState {
  const atmosphere = { pressure_pa: state.pressure_pa };
  const dry_bulb_c = state.dry_bulb_c;
  switch (kind) {
    case "rh":
      return AirState.resolve({ kind, dry_bulb_c, rh_0_1: state.rh_0_1 }, atmosphere);
    case "wet-bulb":
      return AirState.resolve({ kind, dry_bulb_c, wet_bulb_c: state.wet_bulb_c }, atmosphere);
    case "dew-point":
      return AirState.resolve({ kind, dry_bulb_c, dew_point_c: state.dew_point_c }, atmosphere);
    case "humidity-ratio":
      return AirState.resolve({ kind, dry_bulb_c, humidity_ratio_kg_kg: state.humidity_ratio_kg_kg }, atmosphere);
    case "enthalpy":
      return AirState.resolve({ kind, dry_bulb_c, enthalpy_kj_kg: state.enthalpy_kj_kg }, atmosphere);
  }
}
