import { z } from "zod";
import { resolveAirState, tryResolveAirState } from "../../psychro/airState.js";
import { altitudeToPressure } from "../../psychro/atmosphere.js";
import { fetchJson } from "../../utils/fetchJson.js";
import { logger } from "../../utils/logger.js";
import { round } from "../../utils/units.js";
import type { LiveDesignConditions } from "../../types.js";
import type { DesignConditions } from "./designConditions.js";

const GEOCODING_URL = "https://geocoding-api.open-meteo.com/v1/search";
const ARCHIVE_URL = "https://archive-api.open-meteo.com/v1/archive";
const SOURCE = "Open-Meteo ERA5 Reanalysis";

const GeocodingSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        country: z.string().optional(),
        latitude: z.number(),
        longitude: z.number(),
        elevation: z.number().nullable().optional()
      })
    )
    .optional()
});

const ArchiveSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()).optional(),
    temperature_2m: z.array(z.number().nullable()),
    dew_point_2m: z.array(z.number().nullable())
  })
});

export interface GeocodedPlace {
  name: string;
  country: string;
  latitude: number;
  longitude: number;
  elevation_m: number;
}

export async function geocodeCity(city: string, opts: { timeoutMs: number }): Promise<GeocodedPlace | null> {
  const url = new URL(GEOCODING_URL);
  url.searchParams.set("name", city);
  url.searchParams.set("count", "5");
  url.searchParams.set("language", "en");
  url.searchParams.set("format", "json");

  const json = await fetchJson(url, GeocodingSchema, { timeoutMs: opts.timeoutMs, service: "Open-Meteo geocoding" });
  const best = json.results?.[0];
  if (!best) return null;
  return {
    name: best.name,
    country: best.country ?? "",
    latitude: best.latitude,
    longitude: best.longitude,
    elevation_m: best.elevation ?? 0
  };
}

export interface HourlySample {
  tdb_c: number;
  tdp_c: number;
}

export interface HourlyHistory {
  samples: HourlySample[];
  years: number;
  start: string;
  end: string;
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Hourly dry bulb and dew point for the last `years` years, ending two days ago. */
export async function fetchEra5Hourly(params: {
  lat: number;
  lon: number;
  years: number;
  timeoutMs: number;
  now?: Date;
}): Promise<HourlyHistory> {
  const end = new Date(params.now ?? new Date());
  end.setUTCDate(end.getUTCDate() - 2);
  const start = new Date(end);
  start.setUTCFullYear(end.getUTCFullYear() - params.years);

  const url = new URL(ARCHIVE_URL);
  url.searchParams.set("latitude", params.lat.toFixed(4));
  url.searchParams.set("longitude", params.lon.toFixed(4));
  url.searchParams.set("start_date", isoDate(start));
  url.searchParams.set("end_date", isoDate(end));
  url.searchParams.set("hourly", "temperature_2m,dew_point_2m");
  url.searchParams.set("timezone", "UTC");

  const json = await fetchJson(url, ArchiveSchema, { timeoutMs: params.timeoutMs, service: "Open-Meteo archive" });
  return {
    samples: pairHourly(json.hourly.temperature_2m, json.hourly.dew_point_2m),
    years: (end.getTime() - start.getTime()) / (365.25 * 86_400_000),
    start: isoDate(start),
    end: isoDate(end)
  };
}

/** Drops hours where either series is missing. */
export function pairHourly(tdb: (number | null)[], tdp: (number | null)[]): HourlySample[] {
  const samples: HourlySample[] = [];
  const n = Math.min(tdb.length, tdp.length);
  for (let i = 0; i < n; i++) {
    const t = tdb[i];
    const d = tdp[i];
    if (t === null || d === null) continue;
    samples.push({ tdb_c: t, tdp_c: d });
  }
  return samples;
}

/** Percentile with linear interpolation between closest ranks; `sorted` ascending. */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) throw new Error("percentile of an empty series");
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((acc, v) => acc + v, 0) / values.length;
}

export interface DerivationMeta {
  location_name: string;
  country: string;
  latitude: number;
  longitude: number;
  altitude_m: number;
  data_years: number;
  minSamples?: number;
}

/**
 * ASHRAE-style design conditions from hourly history:
 *   cooling: 99.6 % and 99.0 % dry bulb, mean wet bulb of hours within 1 °C below
 *   dehumidification: 99.6 % wet bulb, mean dry bulb of hours within 0.5 °C below
 *   heating: 0.4 % and 1.0 % dry bulb, mean wet bulb and W of hours within 1 °C above 0.4 %
 */
export function deriveDesignConditions(samples: HourlySample[], meta: DerivationMeta): LiveDesignConditions {
  const pressure = altitudeToPressure(meta.altitude_m);
  const atm = { pressure_pa: pressure };

  const tdb: number[] = [];
  const twb: number[] = [];
  const w: number[] = [];
  let rejected = 0;
  for (const s of samples) {
    const outcome = tryResolveAirState({ kind: "dew-point", dry_bulb_c: s.tdb_c, dew_point_c: s.tdp_c }, atm);
    if (!outcome.ok) {
      rejected++;
      continue;
    }
    tdb.push(outcome.value.dry_bulb_c);
    twb.push(outcome.value.wet_bulb_c);
    w.push(outcome.value.humidity_ratio_kg_kg);
  }
  if (rejected > 0) {
    logger.warn({ rejected, total: samples.length }, "Skipped hourly samples the engine rejected");
  }

  const minSamples = meta.minSamples ?? 1000;
  if (tdb.length < minSamples) {
    throw new Error(`Insufficient hourly data: ${tdb.length} usable samples, need ${minSamples}`);
  }

  const sortedTdb = [...tdb].sort((a, b) => a - b);
  const sortedTwb = [...twb].sort((a, b) => a - b);

  const cool996 = percentile(sortedTdb, 99.6);
  const cool990 = percentile(sortedTdb, 99.0);
  const coincidentWb = (threshold: number) =>
    mean(twb.filter((_, i) => tdb[i] >= threshold - 1.0)) ?? threshold - 5;

  const dehum996 = percentile(sortedTwb, 99.6);
  const dehumDb = mean(tdb.filter((_, i) => twb[i] >= dehum996 - 0.5)) ?? dehum996 + 3;

  const heat004 = percentile(sortedTdb, 0.4);
  const heat010 = percentile(sortedTdb, 1.0);
  const cold = tdb.map((_, i) => i).filter((i) => tdb[i] <= heat004 + 1.0);
  const coldWb = mean(cold.map((i) => twb[i])) ?? heat004 - 2;
  const coldW = mean(cold.map((i) => w[i])) ?? 0;

  return {
    location_name: meta.location_name,
    country: meta.country,
    latitude: meta.latitude,
    longitude: meta.longitude,
    altitude_m: meta.altitude_m,
    cooling_db_996_c: round(cool996, 1),
    cooling_wb_996_c: round(coincidentWb(cool996), 1),
    cooling_db_990_c: round(cool990, 1),
    cooling_wb_990_c: round(coincidentWb(cool990), 1),
    dehumid_wb_996_c: round(dehum996, 1),
    dehumid_db_996_c: round(dehumDb, 1),
    heating_db_004_c: round(heat004, 1),
    heating_db_010_c: round(heat010, 1),
    heating_wb_mean_c: round(coldWb, 1),
    heating_humidity_ratio_kg_kg: coldW,
    data_years: Math.round(meta.data_years),
    samples_used: tdb.length,
    samples_rejected: rejected,
    source: SOURCE
  };
}

/**
 * Maps live conditions onto the design-day record the design run consumes.
 * Winter wet bulbs are recomputed at each heating dry bulb from the mean cold
 * humidity ratio, so they stay below their dry bulbs.
 */
export function liveToDesignConditions(live: LiveDesignConditions): DesignConditions {
  const atm = { altitude_m: live.altitude_m };
  const winterWb = (tdb: number) =>
    round(
      resolveAirState({ kind: "humidity-ratio", dry_bulb_c: tdb, humidity_ratio_kg_kg: live.heating_humidity_ratio_kg_kg }, atm)
        .wet_bulb_c,
      1
    );
  return {
    location: live.location_name,
    country: live.country,
    latitude: live.latitude,
    longitude: live.longitude,
    altitude_m: live.altitude_m,
    timezone_offset_h: 0,
    cooling_db_n20_c: live.cooling_db_996_c,
    cooling_wb_n20_c: live.cooling_wb_996_c,
    cooling_db_04_c: live.cooling_db_990_c,
    cooling_wb_04_c: live.cooling_wb_990_c,
    dehumid_db_c: live.dehumid_db_996_c,
    dehumid_wb_c: live.dehumid_wb_996_c,
    heating_db_n20_c: live.heating_db_004_c,
    heating_wb_n20_c: winterWb(live.heating_db_004_c),
    heating_db_04_c: live.heating_db_010_c,
    heating_wb_04_c: winterWb(live.heating_db_010_c)
  };
}

export async function getDesignConditionsForCity(
  city: string,
  opts: { timeoutMs: number; years: number }
): Promise<LiveDesignConditions> {
  const place = await geocodeCity(city, opts);
  if (!place) throw new Error(`City '${city}' not found`);

  logger.info({ city, place }, "Fetching ERA5 hourly history");
  const history = await fetchEra5Hourly({
    lat: place.latitude,
    lon: place.longitude,
    years: opts.years,
    timeoutMs: opts.timeoutMs
  });

  return deriveDesignConditions(history.samples, {
    location_name: place.name,
    country: place.country,
    latitude: place.latitude,
    longitude: place.longitude,
    altitude_m: place.elevation_m,
    data_years: history.years
  });
}
