export type WeatherErrorKind = "configuration" | "geocoding" | "weather_api" | "network";

export type WeatherAppError = {
  kind: WeatherErrorKind;
  message: string;
};

export type WeatherResult<T> = { ok: true; data: T } | { ok: false; error: WeatherAppError };

export const INVALID_KEY_MESSAGE = "Invalid API key. Please check your OPENWEATHER_API_KEY";
export const RATE_LIMIT_MESSAGE = "API rate limit exceeded. Please try again later";

export function ok<T>(data: T): WeatherResult<T> {
  return { ok: true, data };
}

export function fail<T = never>(kind: WeatherErrorKind, message: string): WeatherResult<T> {
  return { ok: false, error: { kind, message } };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Statuses every OpenWeatherMap endpoint reports the same way.
 */
export function providerStatusError(status: number): WeatherAppError | null {
  if (status === 401) return { kind: "weather_api", message: INVALID_KEY_MESSAGE };
  if (status === 429) return { kind: "weather_api", message: RATE_LIMIT_MESSAGE };
  return null;
}
