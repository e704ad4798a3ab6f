import type { WeatherSettings } from "../config/settings";
import type { Coordinates } from "./geocoding";
import { buildGeocodeParams } from "./geocoding";
import { getJson, type HttpOptions } from "./http";
import { buildWeatherParams } from "./provider";

export type ProbeReport = {
  name: "geocoding" | "current";
  ok: boolean;
  status?: number;
  detail: string;
};

export const PROBE_LOCATION = { city: "London", country: "GB" } as const;
export const PROBE_COORDINATES: Coordinates = { lat: 51.5074, lon: -0.1278 };

export function maskKey(apiKey: string): string {
  if (apiKey.length <= 4) return "****";
  return `${apiKey.slice(0, 4)}****`;
}

async function probe(
  name: ProbeReport["name"],
  url: string,
  params: Record<string, string | number>,
  http: HttpOptions
): Promise<ProbeReport> {
  const res = await getJson(url, params, http);
  if (res.ok) return { name, ok: true, status: res.status, detail: "reachable" };

  const { failure } = res;
  switch (failure.type) {
    case "network":
      return { name, ok: false, detail: failure.message };
    case "status":
      return { name, ok: false, status: failure.status, detail: failure.body.slice(0, 200) || failure.statusText };
    case "parse":
      return { name, ok: false, status: failure.status, detail: failure.message };
  }
}

/**
 * Hit the geocoding and current-weather endpoints once each with a known
 * location. Failures are reported, never thrown.
 */
export async function probeEndpoints(settings: WeatherSettings, http: Omit<HttpOptions, "timeoutMs"> = {}): Promise<ProbeReport[]> {
  const options: HttpOptions = { ...http, timeoutMs: settings.timeoutMs };
  const geocoding = await probe(
    "geocoding",
    settings.geocodingUrl,
    buildGeocodeParams(PROBE_LOCATION, { apiUrl: settings.geocodingUrl, apiKey: settings.apiKey }),
    options
  );
  const current = await probe(
    "current",
    settings.currentUrl,
    buildWeatherParams(PROBE_COORDINATES, settings.apiKey, "current"),
    options
  );
  return [geocoding, current];
}

export function formatProbeReport(settings: WeatherSettings, reports: ProbeReport[]): string {
  const lines = [`API key: ${maskKey(settings.apiKey)}`];
  reports.forEach((report, idx) => {
    const status = report.status === undefined ? "no response" : `status ${report.status}`;
    lines.push(`${idx + 1}. ${report.name}: ${report.ok ? "ok" : "failed"} (${status}) ${report.detail}`);
  });
  return lines.join("\n");
}
