import { z } from "zod";

import { childLogger } from "../logging";
import { fail, ok, providerStatusError, type WeatherResult } from "./errors";
import { getJson, type HttpFailure, type HttpOptions } from "./http";

export type Coordinates = Readonly<{ lat: number; lon: number }>;

export type GeocodeConfig = {
  apiUrl: string;
  apiKey: string;
};

export type GeocodeQuery = {
  city: string;
  country: string;
};

const GeocodePlaceSchema = z
  .object({
    name: z.string().optional(),
    lat: z.number(),
    lon: z.number(),
    country: z.string().optional(),
    state: z.string().optional()
  })
  .passthrough();

export type GeocodePlace = z.infer<typeof GeocodePlaceSchema>;

export function buildGeocodeParams(query: GeocodeQuery, config: GeocodeConfig) {
  return {
    q: `${query.city},${query.country}`,
    limit: 1,
    appid: config.apiKey
  };
}

function mapFailure(failure: HttpFailure): WeatherResult<never> {
  switch (failure.type) {
    case "network":
      return fail("network", failure.message);
    case "status": {
      const known = providerStatusError(failure.status);
      if (known) return { ok: false, error: known };
      return fail("geocoding", `Geocoding failed: ${failure.status} ${failure.statusText}`.trim());
    }
    case "parse":
      return fail("geocoding", `Geocoding failed: ${failure.message}`);
  }
}

export function firstPlace(data: unknown, query: GeocodeQuery): WeatherResult<GeocodePlace> {
  if (!Array.isArray(data)) {
    return fail("geocoding", "Geocoding failed: expected a list of places");
  }
  if (data.length === 0) {
    return fail("geocoding", `City '${query.city}' in country '${query.country}' not found`);
  }
  const parsed = GeocodePlaceSchema.safeParse(data[0]);
  if (!parsed.success) {
    return fail("geocoding", "Geocoding failed: result is missing numeric lat/lon");
  }
  return ok(parsed.data);
}

export type GeocodeDeps = HttpOptions;

/**
 * Resolve a city/country pair to the coordinates of the first match.
 */
export async function geocodeCity(
  query: GeocodeQuery,
  config: GeocodeConfig,
  deps: GeocodeDeps
): Promise<WeatherResult<Coordinates>> {
  const log = childLogger({ component: "geocoder", city: query.city, country: query.country }, deps.log);
  const res = await getJson(config.apiUrl, buildGeocodeParams(query, config), { ...deps, log });
  if (!res.ok) return mapFailure(res.failure);

  const place = firstPlace(res.data, query);
  if (!place.ok) {
    log.info({ event: "geocode.miss", reason: place.error.message });
    return place;
  }

  const coordinates: Coordinates = Object.freeze({ lat: place.data.lat, lon: place.data.lon });
  log.debug({ event: "geocode.hit", ...coordinates, name: place.data.name });
  return ok(coordinates);
}
