import type { Logger } from "pino";

import { parseSettings, type WeatherSettings } from "../config/settings";
import { childLogger, getLogger, startTimer } from "../logging";
import { ok, type WeatherResult } from "./errors";
import { geocodeCity, type Coordinates } from "./geocoding";
import type { WeatherBundle } from "./format";
import type { HttpOptions } from "./http";
import {
  FORECAST_DAYS,
  entriesFromForecast,
  entriesFromOneCall,
  normalizeCurrent,
  normalizeDaily,
  type ForecastEntry
} from "./normalize";
import { fetchCurrentWeather, fetchForecast, fetchOneCall } from "./provider";

export type WeatherServiceDeps = {
  fetchImpl?: typeof fetch;
  log?: Logger;
  /** clock used to decide which forecast day is "today" */
  now?: () => Date;
};

export type WeatherService = {
  readonly settings: WeatherSettings;
  getCoordinates(city: string, country: string, signal?: AbortSignal): Promise<WeatherResult<Coordinates>>;
  getCurrentWeather(coords: Coordinates, signal?: AbortSignal): Promise<WeatherResult<unknown>>;
  getWeatherForecast(coords: Coordinates, signal?: AbortSignal): Promise<WeatherResult<unknown>>;
  getWeatherData(city: string, country: string, signal?: AbortSignal): Promise<WeatherResult<WeatherBundle>>;
};

/**
 * Validate settings and build the service. A missing API key fails here,
 * before any request goes out.
 */
export function createWeatherService(
  input: Record<string, unknown>,
  deps: WeatherServiceDeps = {}
): WeatherResult<WeatherService> {
  const parsed = parseSettings(input);
  if (!parsed.ok) return parsed;

  const settings = parsed.data;
  const log = childLogger({ component: "weather-service", endpoint: settings.endpoint }, deps.log ?? getLogger());
  const now = deps.now ?? (() => new Date());

  const http = (signal?: AbortSignal): HttpOptions => ({
    timeoutMs: settings.timeoutMs,
    log,
    ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}),
    ...(signal ? { signal } : {})
  });

  const getCoordinates = (city: string, country: string, signal?: AbortSignal) =>
    geocodeCity({ city, country }, { apiUrl: settings.geocodingUrl, apiKey: settings.apiKey }, http(signal));

  const getCurrentWeather = (coords: Coordinates, signal?: AbortSignal) =>
    fetchCurrentWeather(coords, settings, http(signal));

  const getWeatherForecast = (coords: Coordinates, signal?: AbortSignal) =>
    settings.endpoint === "onecall" ? fetchOneCall(coords, settings, http(signal)) : fetchForecast(coords, settings, http(signal));

  async function getWeatherData(city: string, country: string, signal?: AbortSignal): Promise<WeatherResult<WeatherBundle>> {
    const timer = startTimer();
    const coords = await getCoordinates(city, country, signal);
    if (!coords.ok) return coords;

    let currentRaw: unknown;
    let entries: ForecastEntry[];
    if (settings.endpoint === "onecall") {
      const combined = await getWeatherForecast(coords.data, signal);
      if (!combined.ok) return combined;
      const split = entriesFromOneCall(combined.data);
      if (!split.ok) return split;
      currentRaw = split.data.current;
      entries = split.data.entries;
    } else {
      const current = await getCurrentWeather(coords.data, signal);
      if (!current.ok) return current;
      const forecast = await getWeatherForecast(coords.data, signal);
      if (!forecast.ok) return forecast;
      const parsed = entriesFromForecast(forecast.data);
      if (!parsed.ok) return parsed;
      currentRaw = current.data;
      entries = parsed.data;
    }

    const daily = normalizeDaily(entries, now()).slice(0, FORECAST_DAYS);
    log.info({ event: "weather.bundle", city, country, days: daily.length, durationMs: timer() });

    return ok({
      city,
      country,
      coordinates: coords.data,
      current: normalizeCurrent(currentRaw),
      daily
    });
  }

  return ok({ settings, getCoordinates, getCurrentWeather, getWeatherForecast, getWeatherData });
}
