import pino, { stdTimeFunctions, type DestinationStream, type Logger, type LoggerOptions, type TransportSingleOptions } from "pino";

export type LogContext = {
  component?: string;
  stage?: string;
  city?: string;
  country?: string;
  endpoint?: string;
};

export const redactionPaths = [
  "apiKey",
  "apikey",
  "appid",
  "authorization",
  "secret",
  "token",
  "*.apiKey",
  "*.appid",
  "*.token"
];

type Env = Record<string, string | undefined>;

function buildTransport(env: Env): TransportSingleOptions | undefined {
  if (env["LOG_PRETTY"] !== "true") return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      singleLine: true,
      ignore: "pid,hostname",
      // stdout carries the report
      destination: 2
    }
  };
}

export function buildLoggerOptions(env: Env = process.env): LoggerOptions {
  const service = env["SERVICE_NAME"] ?? "city-weather";
  const version = env["npm_package_version"];
  return {
    level: env["LOG_LEVEL"] ?? "error",
    base: { service, ...(version ? { version } : {}) },
    redact: { paths: redactionPaths, censor: "[redacted]" },
    formatters: {
      level(label) {
        return { level: label };
      }
    },
    timestamp: stdTimeFunctions.isoTime
  };
}

export function createLogger(destination?: DestinationStream, env: Env = process.env): Logger {
  const options = buildLoggerOptions(env);
  if (destination) return pino(options, destination);
  const transport = buildTransport(env);
  if (transport) return pino({ ...options, transport });
  return pino(options, pino.destination({ dest: 2, sync: true }));
}

let rootLogger: Logger | undefined;

/**
 * The process-wide logger, built on first use so that variables loaded from
 * `.env` after import still apply.
 */
export function getLogger(): Logger {
  if (!rootLogger) rootLogger = createLogger();
  return rootLogger;
}

function pruneUndefined(context: LogContext): Record<string, string> {
  const entries = Object.entries(context).filter(([, value]) => value !== undefined && value !== null);
  return Object.fromEntries(entries.map(([key, value]) => [key, String(value)]));
}

export function childLogger(context: LogContext = {}, base: Logger = getLogger()): Logger {
  const bindings = pruneUndefined(context);
  if (!Object.keys(bindings).length) return base;
  return base.child(bindings);
}

export function startTimer() {
  const start = Date.now();
  return () => Date.now() - start;
}

export function toErrorObject(err: unknown): { message: string; stack?: string; name?: string } {
  if (err instanceof Error) {
    return { message: err.message, stack: err.stack, name: err.name };
  }
  if (typeof err === "string") return { message: err };
  return { message: JSON.stringify(err) };
}

/**
 * Query-string credentials never reach the log stream.
 */
export function redactUrl(url: URL): string {
  const copy = new URL(url.toString());
  if (copy.searchParams.has("appid")) copy.searchParams.set("appid", "[redacted]");
  return copy.toString();
}
