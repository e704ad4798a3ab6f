import { parseArgs } from "node:util";

import type { Logger } from "pino";
import { z } from "zod";

import { settingsFromEnv, type Env } from "../config/settings";
import { childLogger, getLogger, toErrorObject } from "../logging";
import { createWeatherService, describeError, formatWeather, type OutputStyle, type WeatherAppError } from "../weather";

export const USAGE = `Usage: city-weather --city <name> --country <code>

Get the current weather and a 3-day forecast for a city.

Options:
  --city <name>      City name (e.g. "Puchong")
  --country <code>   Two-letter country code (e.g. "MY")
  -h, --help         Show this help

Examples:
  city-weather --city "Puchong" --country "MY"
  city-weather --city "London" --country "GB"`;

const CliArgsSchema = z.object({
  city: z.string({ required_error: "--city is required" }).trim().min(1, "--city must not be empty"),
  country: z
    .string({ required_error: "--country is required" })
    .trim()
    .regex(/^[A-Za-z]{2}$/, "--country must be a two-letter country code")
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export type ParsedArgs = { type: "help" } | { type: "run"; args: CliArgs } | { type: "invalid"; message: string };

export function parseCliArgs(argv: string[]): ParsedArgs {
  let values: { city?: string; country?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        city: { type: "string" },
        country: { type: "string" },
        help: { type: "boolean", short: "h" }
      },
      strict: true,
      allowPositionals: false
    }));
  } catch (err) {
    return { type: "invalid", message: describeError(err) };
  }

  if (values.help) return { type: "help" };
  const parsed = CliArgsSchema.safeParse(values);
  if (!parsed.success) {
    return { type: "invalid", message: parsed.error.issues[0]?.message ?? "Invalid arguments" };
  }
  return { type: "run", args: parsed.data };
}

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export type RunCliOptions = {
  env?: Env;
  io?: CliIO;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
  log?: Logger;
  now?: () => Date;
};

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`)
};

export function outputStyleFromEnv(env: Env): OutputStyle {
  return env["WEATHER_OUTPUT_STYLE"] === "plain" ? "plain" : "emoji";
}

export function errorLine(error: WeatherAppError, style: OutputStyle): string {
  return style === "emoji" ? `❌ Error: ${error.message}` : `Error: ${error.message}`;
}

export function cancelledLine(style: OutputStyle): string {
  return style === "emoji" ? "\n⏹️  Operation cancelled by user" : "\nOperation cancelled by user";
}

export function unexpectedLine(err: unknown, style: OutputStyle): string {
  const message = describeError(err);
  return style === "emoji" ? `❌ Unexpected error: ${message}` : `Unexpected error: ${message}`;
}

/**
 * Run one invocation and resolve to the process exit code. Every failure is
 * reported on stderr here; nothing below this point writes to the terminal.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? processIO;
  const env = options.env ?? process.env;
  const { signal } = options;
  const style = outputStyleFromEnv(env);
  const log = childLogger({ component: "cli" }, options.log ?? getLogger());

  const parsed = parseCliArgs(argv);
  if (parsed.type === "help") {
    io.stdout(USAGE);
    return 0;
  }
  if (parsed.type === "invalid") {
    io.stderr(`${parsed.message}\n\n${USAGE}`);
    return 1;
  }

  const { city, country } = parsed.args;
  try {
    const service = createWeatherService(settingsFromEnv(env), {
      ...(options.fetchImpl ? { fetchImpl: options.fetchImpl } : {}),
      ...(options.now ? { now: options.now } : {}),
      log
    });
    if (!service.ok) {
      io.stderr(errorLine(service.error, style));
      return 1;
    }

    const result = await service.data.getWeatherData(city, country, signal);
    if (signal?.aborted) {
      io.stderr(cancelledLine(style));
      return 1;
    }
    if (!result.ok) {
      log.info({ event: "cli.failure", kind: result.error.kind, city, country });
      io.stderr(errorLine(result.error, style));
      return 1;
    }

    io.stdout(formatWeather(result.data, { style: service.data.settings.outputStyle }));
    return 0;
  } catch (err) {
    if (signal?.aborted) {
      io.stderr(cancelledLine(style));
      return 1;
    }
    log.error({ event: "cli.unexpected", err: toErrorObject(err) });
    io.stderr(unexpectedLine(err, style));
    return 1;
  }
}
