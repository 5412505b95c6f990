// Unit conversions for the HTTP and report boundary. The engine itself is SI.

export type TemperatureUnit = "C" | "F";

export function fToC(f: number): number {
  return ((f - 32) * 5) / 9;
}

export function toCelsius(value: number, unit: TemperatureUnit): number {
  return unit === "F" ? fToC(value) : value;
}

export function kPaToPa(kpa: number): number {
  return kpa * 1000;
}

export function paToKPa(pa: number): number {
  return pa / 1000;
}

export function gPerKgToKgPerKg(g: number): number {
  return g / 1000;
}

export function kgPerKgToGPerKg(w: number): number {
  return w * 1000;
}

export function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}
