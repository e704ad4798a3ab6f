// Weather pipeline: geocode -> fetch -> normalize -> format
export { createWeatherService } from "./service";
export type { WeatherService, WeatherServiceDeps } from "./service";

export { INVALID_KEY_MESSAGE, RATE_LIMIT_MESSAGE, describeError, fail, ok } from "./errors";
export type { WeatherAppError, WeatherErrorKind, WeatherResult } from "./errors";

export { buildGeocodeParams, firstPlace, geocodeCity } from "./geocoding";
export type { Coordinates, GeocodeConfig, GeocodePlace, GeocodeQuery } from "./geocoding";

export { buildWeatherParams, fetchCurrentWeather, fetchForecast, fetchOneCall, fetchWeather } from "./provider";
export type { ProviderConfig, WeatherEndpoint } from "./provider";

export {
  FORECAST_DAYS,
  entriesFromForecast,
  entriesFromOneCall,
  localDateKey,
  normalizeCurrent,
  normalizeDaily
} from "./normalize";
export type { CurrentConditions, DailyRecord, ForecastEntry } from "./normalize";

export { CONDITION_EMOJI, PLACEHOLDER, formatWeather, titleCase } from "./format";
export type { FormatOptions, OutputStyle, WeatherBundle } from "./format";

export { formatProbeReport, maskKey, probeEndpoints } from "./diagnostics";
export type { ProbeReport } from "./diagnostics";
