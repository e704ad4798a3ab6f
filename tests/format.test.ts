import assert from "node:assert/strict";

import { describe, it } from "vitest";

import {
  PLACEHOLDER,
  conditionEmoji,
  formatTemperature,
  formatVisibility,
  formatWeather,
  titleCase,
  type WeatherBundle
} from "../lib/weather/format";
import { normalizeCurrent } from "../lib/weather/normalize";
import { puchongCurrent } from "./fixtures";

const bundle = (): WeatherBundle => ({
  city: "Puchong",
  country: "MY",
  coordinates: { lat: 3.0, lon: 101.0 },
  current: normalizeCurrent(puchongCurrent),
  daily: [
    { date: "2026-01-06", tempMin: 24.0, tempMax: 29.5, condition: "Rain", description: "light rain" },
    { date: "2026-01-07", tempMin: 23.5, tempMax: 30.5, condition: "Clear", description: "clear sky" }
  ]
});

describe("value helpers", () => {
  it("renders temperatures to one decimal", () => {
    assert.equal(formatTemperature(28.5), "28.5°C");
    assert.equal(formatTemperature(30), "30.0°C");
    assert.equal(formatTemperature(-3, "C"), "-3.0C");
    assert.equal(formatTemperature(undefined), PLACEHOLDER);
  });

  it("converts visibility from meters to kilometers", () => {
    assert.equal(formatVisibility(10000), "10.0 km");
    assert.equal(formatVisibility(2500), "2.5 km");
    assert.equal(formatVisibility(undefined), "N/A");
  });

  it("title-cases descriptions", () => {
    assert.equal(titleCase("clear sky"), "Clear Sky");
    assert.equal(titleCase("thunderstorm with LIGHT rain"), "Thunderstorm With Light Rain");
    assert.equal(titleCase("light intensity shower-rain"), "Light Intensity Shower-Rain");
    assert.equal(titleCase("élan vital"), "Élan Vital");
    assert.equal(titleCase("ciel dégagé"), "Ciel Dégagé");
  });

  it("falls back to a rainbow for unknown conditions", () => {
    assert.equal(conditionEmoji("Clear"), "☀️");
    assert.equal(conditionEmoji("Tornado"), "🌈");
    assert.equal(conditionEmoji(undefined), "🌈");
  });
});

describe("formatWeather", () => {
  it("renders the emoji report", () => {
    const rule = "─".repeat(50);
    assert.equal(
      formatWeather(bundle()),
      [
        "🌍 Weather for Puchong, MY",
        rule,
        "📍 Coordinates: 3.0000, 101.0000",
        "🌡️  Temperature: 28.5°C (Feels like 32.1°C)",
        "🌈 Conditions: ☁️ Few Clouds",
        "",
        "📊 Additional Details:",
        "   💧 Humidity:   74%",
        "   📊 Pressure:   1009 hPa",
        "   💨 Wind Speed: 2.57 m/s",
        "   👁️  Visibility: 10.0 km",
        "",
        "📅 2-Day Forecast:",
        rule,
        "   2026-01-06  🌧️ Light Rain",
        "      Max: 29.5°C, Min: 24.0°C",
        "   2026-01-07  ☀️ Clear Sky",
        "      Max: 30.5°C, Min: 23.5°C"
      ].join("\n")
    );
  });

  it("renders the plain report", () => {
    assert.equal(
      formatWeather(bundle(), { style: "plain" }),
      [
        "Weather for Puchong, MY",
        "=".repeat(40),
        "Coordinates: 3.0000, 101.0000",
        "Current: Few Clouds 28.5C (Feels like 32.1C)",
        "",
        "Additional Details:",
        "  Humidity:   74%",
        "  Pressure:   1009 hPa",
        "  Wind Speed: 2.57 m/s",
        "  Visibility: 10.0 km",
        "",
        "2-Day Forecast:",
        "-".repeat(40),
        "2026-01-06: Light Rain",
        "  Max: 29.5C, Min: 24.0C",
        "2026-01-07: Clear Sky",
        "  Max: 30.5C, Min: 23.5C"
      ].join("\n")
    );
  });

  it("renders placeholders for missing fields and skips an empty forecast", () => {
    const lines = formatWeather({ ...bundle(), current: {}, daily: [] }).split("\n");
    assert.equal(lines[3], "🌡️  Temperature: N/A (Feels like N/A)");
    assert.equal(lines[4], "🌈 Conditions: 🌈 N/A");
    assert.equal(lines[7], "   💧 Humidity:   N/A");
    assert.equal(lines[8], "   📊 Pressure:   N/A");
    assert.equal(lines[9], "   💨 Wind Speed: N/A");
    assert.equal(lines[10], "   👁️  Visibility: N/A");
    assert.equal(lines.length, 11);
  });

  it("does not modify the bundle", () => {
    const input = bundle();
    const before = structuredClone(input);
    formatWeather(input);
    assert.deepEqual(input, before);
  });
});
