import pino from "pino";

export const TEST_TIMEOUT = 2000;

type FetchInput = Parameters<typeof fetch>[0];

export type FetchCall = { input: FetchInput; init?: RequestInit };

export const silentLogger = pino({ level: "silent" });

export const jsonResponse = (body: unknown, init?: ResponseInit) =>
  new Response(JSON.stringify(body), {
    status: init?.status ?? 200,
    ...(init?.statusText !== undefined ? { statusText: init.statusText } : {}),
    headers: { "Content-Type": "application/json" }
  });

export const textResponse = (body: string, init?: ResponseInit) =>
  new Response(body, {
    status: init?.status ?? 200,
    ...(init?.statusText !== undefined ? { statusText: init.statusText } : {})
  });

/**
 * Replace the global fetch with one that replays `responses` in order.
 */
export const mockFetchSequence = (responses: Array<Response | Error>) => {
  const calls: FetchCall[] = [];
  globalThis.fetch = async (input: FetchInput, init?: RequestInit) => {
    calls.push({ input, init });
    const next = responses.shift();
    if (!next) throw new Error("Unexpected fetch call");
    if (next instanceof Error) throw next;
    return next;
  };
  return calls;
};

export const callUrl = (call: FetchCall | undefined): URL => {
  if (!call) throw new Error("Expected a fetch call");
  const { input } = call;
  if (input instanceof URL) return input;
  return new URL(typeof input === "string" ? input : input.url);
};

/** Sends headers and half a JSON body, then stalls until the request is aborted. */
export const stalledBodyFetch: typeof fetch = async (_input, init) => {
  const body = new ReadableStream<Uint8Array>({
    start(stream) {
      stream.enqueue(new TextEncoder().encode('{"main":'));
      init?.signal?.addEventListener("abort", () =>
        stream.error(new DOMException("This operation was aborted", "AbortError"))
      );
    }
  });
  return new Response(body, { status: 200, headers: { "Content-Type": "application/json" } });
};

/** A connection-refused failure shaped like undici's. */
export const connectionRefused = () =>
  new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:80") });

/** Unix seconds for a local wall-clock time. */
export const localSeconds = (year: number, month: number, day: number, hour: number) =>
  Math.floor(new Date(year, month - 1, day, hour).getTime() / 1000);

// Local 2026-01-05 10:00 is "today" for every forecast fixture below.
export const NOW = new Date(2026, 0, 5, 10, 0, 0);

export const puchongGeocode = [{ name: "Puchong", lat: 3.0, lon: 101.0, country: "MY", state: "Selangor" }];

export const puchongCurrent = {
  coord: { lon: 101.0, lat: 3.0 },
  weather: [{ id: 801, main: "Clouds", description: "few clouds", icon: "02d" }],
  main: { temp: 28.5, feels_like: 32.1, temp_min: 27.0, temp_max: 30.0, pressure: 1009, humidity: 74 },
  visibility: 10000,
  wind: { speed: 2.57, deg: 200 },
  dt: localSeconds(2026, 1, 5, 10),
  name: "Puchong"
};

export const forecastItem = (
  dt: number,
  tempMin: number,
  tempMax: number,
  main: string,
  description: string
) => ({
  dt,
  main: { temp: (tempMin + tempMax) / 2, temp_min: tempMin, temp_max: tempMax, humidity: 80 },
  weather: [{ main, description }]
});

export const puchongForecast = {
  cod: "200",
  cnt: 6,
  list: [
    forecastItem(localSeconds(2026, 1, 5, 15), 27.0, 31.0, "Clear", "clear sky"),
    forecastItem(localSeconds(2026, 1, 6, 0), 25.5, 26.5, "Rain", "light rain"),
    forecastItem(localSeconds(2026, 1, 6, 9), 24.0, 28.0, "Clouds", "broken clouds"),
    forecastItem(localSeconds(2026, 1, 6, 21), 25.0, 29.5, "Rain", "moderate rain"),
    forecastItem(localSeconds(2026, 1, 7, 3), 23.5, 25.0, "Clear", "clear sky"),
    forecastItem(localSeconds(2026, 1, 7, 12), 24.5, 30.5, "Clouds", "scattered clouds")
  ]
};

export const puchongOneCall = {
  lat: 3.0,
  lon: 101.0,
  timezone: "Asia/Kuala_Lumpur",
  current: {
    dt: localSeconds(2026, 1, 5, 10),
    temp: 29.0,
    feels_like: 33.4,
    pressure: 1008,
    humidity: 70,
    visibility: 8000,
    wind_speed: 3.1,
    weather: [{ main: "Thunderstorm", description: "thunderstorm with rain" }]
  },
  daily: [
    { dt: localSeconds(2026, 1, 5, 12), temp: { min: 24.0, max: 31.0 }, weather: [{ main: "Rain", description: "rain" }] },
    { dt: localSeconds(2026, 1, 6, 12), temp: { min: 23.8, max: 30.2 }, weather: [{ main: "Rain", description: "light rain" }] },
    { dt: localSeconds(2026, 1, 7, 12), temp: { min: 24.1, max: 31.6 }, weather: [{ main: "Clouds", description: "overcast clouds" }] },
    { dt: localSeconds(2026, 1, 8, 12), temp: { min: 24.4, max: 32.0 }, weather: [{ main: "Clear", description: "clear sky" }] },
    { dt: localSeconds(2026, 1, 9, 12), temp: { min: 24.9, max: 32.3 }, weather: [{ main: "Clear", description: "clear sky" }] }
  ]
};

export const baseSettings = () => ({
  apiKey: "test-key",
  geocodingUrl: "https://geo.example.com/direct",
  currentUrl: "https://weather.example.com/weather",
  forecastUrl: "https://weather.example.com/forecast",
  oneCallUrl: "https://weather.example.com/onecall"
});

export const baseEnv = (): Record<string, string | undefined> => ({
  OPENWEATHER_API_KEY: "test-key",
  OPENWEATHER_GEOCODING_URL: "https://geo.example.com/direct",
  OPENWEATHER_CURRENT_URL: "https://weather.example.com/weather",
  OPENWEATHER_FORECAST_URL: "https://weather.example.com/forecast",
  OPENWEATHER_ONECALL_URL: "https://weather.example.com/onecall"
});
