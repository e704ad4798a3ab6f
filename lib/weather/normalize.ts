import { z } from "zod";

import { fail, ok, type WeatherResult } from "./errors";

export type CurrentConditions = {
  temp?: number;
  feelsLike?: number;
  humidity?: number;
  pressure?: number;
  windSpeed?: number;
  /** meters */
  visibility?: number;
  condition?: string;
  description?: string;
};

export type ForecastEntry = {
  /** unix seconds */
  timestamp: number;
  tempMin: number;
  tempMax: number;
  condition: string;
  description: string;
};

export type DailyRecord = {
  date: string;
  tempMin: number;
  tempMax: number;
  condition: string;
  description: string;
};

export const FORECAST_DAYS = 3;

// A field of the wrong type is read as absent rather than failing the payload.
const optionalNumber = z.number().finite().optional().catch(undefined);
const optionalString = z.string().optional().catch(undefined);

const ConditionSchema = z.object({ main: optionalString, description: optionalString });
const ConditionListSchema = z.array(ConditionSchema.catch({})).optional().catch(undefined);

const StandardCurrentSchema = z.object({
  main: z
    .object({
      temp: optionalNumber,
      feels_like: optionalNumber,
      humidity: optionalNumber,
      pressure: optionalNumber
    })
    .optional()
    .catch(undefined),
  wind: z.object({ speed: optionalNumber }).optional().catch(undefined),
  visibility: optionalNumber,
  weather: ConditionListSchema
});

const OneCallCurrentSchema = z.object({
  temp: optionalNumber,
  feels_like: optionalNumber,
  humidity: optionalNumber,
  pressure: optionalNumber,
  wind_speed: optionalNumber,
  visibility: optionalNumber,
  weather: ConditionListSchema
});

const StandardForecastItemSchema = z.object({
  dt: z.number().finite(),
  main: z.object({ temp_min: z.number().finite(), temp_max: z.number().finite() }),
  weather: ConditionListSchema
});

const OneCallDailyItemSchema = z.object({
  dt: z.number().finite(),
  temp: z.object({ min: z.number().finite(), max: z.number().finite() }),
  weather: ConditionListSchema
});

const StandardForecastSchema = z.object({ list: z.array(z.unknown()) });
const OneCallSchema = z.object({
  current: z.unknown().refine((value) => typeof value === "object" && value !== null),
  daily: z.array(z.unknown())
});

/**
 * Read the fields the report needs from either current-weather shape: the
 * standalone endpoint nests them under `main`/`wind`, One Call keeps them flat.
 */
export function normalizeCurrent(raw: unknown): CurrentConditions {
  const standard = StandardCurrentSchema.safeParse(raw);
  const main = standard.success ? standard.data.main : undefined;
  if (standard.success && main) {
    const { wind, visibility, weather } = standard.data;
    const first = weather?.[0];
    return {
      temp: main.temp,
      feelsLike: main.feels_like,
      humidity: main.humidity,
      pressure: main.pressure,
      windSpeed: wind?.speed,
      visibility,
      condition: first?.main,
      description: first?.description
    };
  }

  const flat = OneCallCurrentSchema.safeParse(raw);
  if (!flat.success) return {};
  const first = flat.data.weather?.[0];
  return {
    temp: flat.data.temp,
    feelsLike: flat.data.feels_like,
    humidity: flat.data.humidity,
    pressure: flat.data.pressure,
    windSpeed: flat.data.wind_speed,
    visibility: flat.data.visibility,
    condition: first?.main,
    description: first?.description
  };
}

/**
 * Entries from the 3-hourly `/forecast` feed. Items without a timestamp or
 * temperatures are skipped.
 */
export function entriesFromForecast(raw: unknown): WeatherResult<ForecastEntry[]> {
  const parsed = StandardForecastSchema.safeParse(raw);
  if (!parsed.success) return fail("weather_api", "Forecast response is missing the 'list' array");

  const entries: ForecastEntry[] = [];
  for (const item of parsed.data.list) {
    const entry = StandardForecastItemSchema.safeParse(item);
    if (!entry.success) continue;
    const first = entry.data.weather?.[0];
    entries.push({
      timestamp: entry.data.dt,
      tempMin: entry.data.main.temp_min,
      tempMax: entry.data.main.temp_max,
      condition: first?.main ?? "",
      description: first?.description ?? ""
    });
  }
  return ok(entries);
}

export function entriesFromOneCall(raw: unknown): WeatherResult<{ current: unknown; entries: ForecastEntry[] }> {
  const parsed = OneCallSchema.safeParse(raw);
  if (!parsed.success) return fail("weather_api", "One Call response is missing 'current' or 'daily'");

  const entries: ForecastEntry[] = [];
  for (const item of parsed.data.daily) {
    const entry = OneCallDailyItemSchema.safeParse(item);
    if (!entry.success) continue;
    const first = entry.data.weather?.[0];
    entries.push({
      timestamp: entry.data.dt,
      tempMin: entry.data.temp.min,
      tempMax: entry.data.temp.max,
      condition: first?.main ?? "",
      description: first?.description ?? ""
    });
  }
  return ok({ current: parsed.data.current, entries });
}

/** `YYYY-MM-DD` in the process's local time zone. */
export function localDateKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Collapse forecast entries into one record per local calendar day. The first
 * entry of a day supplies its condition; later entries only widen the
 * min/max range. Today's record, judged against `now`, is dropped.
 */
export function normalizeDaily(entries: readonly ForecastEntry[], now: Date = new Date()): DailyRecord[] {
  const byDate = new Map<string, DailyRecord>();

  for (const entry of entries) {
    const date = localDateKey(new Date(entry.timestamp * 1000));
    const existing = byDate.get(date);
    if (!existing) {
      byDate.set(date, {
        date,
        tempMin: entry.tempMin,
        tempMax: entry.tempMax,
        condition: entry.condition,
        description: entry.description
      });
      continue;
    }
    existing.tempMin = Math.min(existing.tempMin, entry.tempMin);
    existing.tempMax = Math.max(existing.tempMax, entry.tempMax);
  }

  const today = localDateKey(now);
  return [...byDate.values()].filter((record) => record.date !== today);
}
