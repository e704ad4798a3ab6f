import * as fs from "node:fs";
import * as path from "node:path";

import { z } from "zod";

import { fail, ok, type WeatherResult } from "../weather/errors";

export const DEFAULT_GEOCODING_URL = "http://api.openweathermap.org/geo/1.0/direct";
export const DEFAULT_CURRENT_URL = "https://api.openweathermap.org/data/2.5/weather";
export const DEFAULT_FORECAST_URL = "https://api.openweathermap.org/data/2.5/forecast";
export const DEFAULT_ONECALL_URL = "https://api.openweathermap.org/data/3.0/onecall";
export const DEFAULT_TIMEOUT_MS = 10_000;

const MISSING_KEY_REASON = "OPENWEATHER_API_KEY environment variable is not set";

export const WeatherSettingsSchema = z.object({
  apiKey: z.string({ required_error: MISSING_KEY_REASON }).trim().min(1, MISSING_KEY_REASON),
  geocodingUrl: z.string().url().default(DEFAULT_GEOCODING_URL),
  currentUrl: z.string().url().default(DEFAULT_CURRENT_URL),
  forecastUrl: z.string().url().default(DEFAULT_FORECAST_URL),
  oneCallUrl: z.string().url().default(DEFAULT_ONECALL_URL),
  endpoint: z.enum(["forecast", "onecall"]).default("forecast"),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  outputStyle: z.enum(["emoji", "plain"]).default("emoji")
});

export type WeatherSettings = z.infer<typeof WeatherSettingsSchema>;

export type Env = Record<string, string | undefined>;

const ENV_KEYS = {
  apiKey: "OPENWEATHER_API_KEY",
  geocodingUrl: "OPENWEATHER_GEOCODING_URL",
  currentUrl: "OPENWEATHER_CURRENT_URL",
  forecastUrl: "OPENWEATHER_FORECAST_URL",
  oneCallUrl: "OPENWEATHER_ONECALL_URL",
  endpoint: "OPENWEATHER_ENDPOINT",
  timeoutMs: "OPENWEATHER_TIMEOUT_MS",
  outputStyle: "WEATHER_OUTPUT_STYLE"
} as const satisfies Record<keyof WeatherSettings, string>;

/**
 * Validate settings at the boundary. An absent or blank key is a
 * configuration failure, reported before any request is made.
 */
export function parseSettings(input: Record<string, unknown>): WeatherResult<WeatherSettings> {
  const parsed = WeatherSettingsSchema.safeParse(input);
  if (parsed.success) return ok(parsed.data);
  const issue = parsed.error.issues[0];
  const field = issue?.path.join(".") ?? "settings";
  const message = field === "apiKey" ? MISSING_KEY_REASON : `Invalid ${field}: ${issue?.message ?? "unknown problem"}`;
  return fail("configuration", message);
}

export function settingsFromEnv(env: Env): Record<string, string> {
  const input: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    // blank overrides fall back to defaults; a blank key stays and fails validation
    if (value !== undefined && (value.trim() !== "" || field === "apiKey")) input[field] = value;
  }
  return input;
}

export function loadSettings(env: Env = process.env): WeatherResult<WeatherSettings> {
  return parseSettings(settingsFromEnv(env));
}

/**
 * Read KEY=value lines from an env file. Values already present in `target`
 * are left alone.
 */
export function loadEnvFile(envPath: string = path.join(process.cwd(), ".env"), target: Env = process.env): Env {
  const loaded: Env = {};
  if (!fs.existsSync(envPath)) return loaded;

  const content = fs.readFileSync(envPath, "utf-8");
  content.split("\n").forEach((line) => {
    const match = line.match(/^\s*([\w.-]+)\s*=\s*(.*?)\s*$/);
    if (!match || !match[1] || line.trim().startsWith("#")) return;
    const key = match[1];
    let value = match[2] ?? "";
    if (value.length > 1 && value.startsWith('"') && value.endsWith('"')) {
      value = value.substring(1, value.length - 1);
    }
    loaded[key] = value;
    if (target[key] === undefined) target[key] = value;
  });
  return loaded;
}
