#!/usr/bin/env tsx
/**
 * Probe the OpenWeatherMap endpoints with the configured key.
 * Exits non-zero when any endpoint fails.
 */

import { loadEnvFile, loadSettings } from "../lib/config/settings";
import { formatProbeReport, probeEndpoints } from "../lib/weather";

loadEnvFile();

const settings = loadSettings();
if (!settings.ok) {
  console.error(`[check-api] ${settings.error.message}`);
  process.exit(1);
}

probeEndpoints(settings.data)
  .then((reports) => {
    console.log(formatProbeReport(settings.data, reports));
    process.exitCode = reports.every((report) => report.ok) ? 0 : 1;
  })
  .catch((error: Error) => {
    console.error("[check-api] Probe crashed:", error);
    process.exit(1);
  });
