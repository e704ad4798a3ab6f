#!/usr/bin/env tsx
/**
 * city-weather: current conditions and a 3-day forecast for a city.
 *
 *   city-weather --city "Puchong" --country "MY"
 */

import { outputStyleFromEnv, runCli, unexpectedLine } from "./lib/cli/run";
import { loadEnvFile } from "./lib/config/settings";

loadEnvFile();

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(unexpectedLine(error, outputStyleFromEnv(process.env)));
    process.exitCode = 1;
  });
