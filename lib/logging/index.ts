export type { LogContext } from "./logger";
export { buildLoggerOptions, childLogger, createLogger, getLogger, redactionPaths, redactUrl, startTimer, toErrorObject } from "./logger";
