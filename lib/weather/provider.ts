import { childLogger } from "../logging";
import { fail, ok, providerStatusError, type WeatherResult } from "./errors";
import type { Coordinates } from "./geocoding";
import { getJson, type HttpFailure, type HttpOptions, type QueryParams } from "./http";

export type ProviderConfig = {
  apiKey: string;
  currentUrl: string;
  forecastUrl: string;
  oneCallUrl: string;
};

export type WeatherEndpoint = "current" | "forecast" | "onecall";

export const ONECALL_EXCLUDE = ["minutely", "hourly", "alerts"];

export function buildWeatherParams(coords: Coordinates, apiKey: string, endpoint: WeatherEndpoint): QueryParams {
  return {
    lat: coords.lat,
    lon: coords.lon,
    units: "metric",
    ...(endpoint === "onecall" ? { exclude: ONECALL_EXCLUDE.join(",") } : {}),
    appid: apiKey
  };
}

export function weatherFailure(failure: HttpFailure): WeatherResult<never> {
  switch (failure.type) {
    case "network":
      return fail("network", failure.message);
    case "status": {
      const known = providerStatusError(failure.status);
      if (known) return { ok: false, error: known };
      return fail("weather_api", `Weather API call failed: ${failure.status} ${failure.statusText}`.trim());
    }
    case "parse":
      return fail("weather_api", `Weather API call failed: ${failure.message}`);
  }
}

function endpointUrl(endpoint: WeatherEndpoint, config: ProviderConfig): string {
  if (endpoint === "current") return config.currentUrl;
  if (endpoint === "forecast") return config.forecastUrl;
  return config.oneCallUrl;
}

/**
 * Fetch one weather endpoint for the given coordinates. The body is returned
 * exactly as the provider sent it.
 */
export async function fetchWeather(
  endpoint: WeatherEndpoint,
  coords: Coordinates,
  config: ProviderConfig,
  deps: HttpOptions
): Promise<WeatherResult<unknown>> {
  const log = childLogger({ component: "weather", endpoint }, deps.log);
  const res = await getJson(endpointUrl(endpoint, config), buildWeatherParams(coords, config.apiKey, endpoint), {
    ...deps,
    log
  });
  if (!res.ok) return weatherFailure(res.failure);
  return ok(res.data);
}

export const fetchCurrentWeather = (coords: Coordinates, config: ProviderConfig, deps: HttpOptions) =>
  fetchWeather("current", coords, config, deps);

export const fetchForecast = (coords: Coordinates, config: ProviderConfig, deps: HttpOptions) =>
  fetchWeather("forecast", coords, config, deps);

export const fetchOneCall = (coords: Coordinates, config: ProviderConfig, deps: HttpOptions) =>
  fetchWeather("onecall", coords, config, deps);
