import type { Coordinates } from "./geocoding";
import type { CurrentConditions, DailyRecord } from "./normalize";

export type WeatherBundle = {
  city: string;
  country: string;
  coordinates: Coordinates;
  current: CurrentConditions;
  daily: DailyRecord[];
};

export type OutputStyle = "emoji" | "plain";

export type FormatOptions = {
  style?: OutputStyle;
};

export const PLACEHOLDER = "N/A";

export const CONDITION_EMOJI: Readonly<Record<string, string>> = {
  Clear: "☀️",
  Clouds: "☁️",
  Rain: "🌧️",
  Drizzle: "🌦️",
  Thunderstorm: "⛈️",
  Snow: "❄️",
  Mist: "🌫️",
  Fog: "🌫️",
  Smoke: "💨",
  Haze: "🌫️"
};

const FALLBACK_EMOJI = "🌈";
const LABEL_WIDTH = 12;

type Decoration = {
  title: string;
  rule: string;
  indent: string;
  degree: string;
  icons: { coordinates: string; details: string; forecast: string; humidity: string; pressure: string; wind: string; visibility: string };
};

const DECORATIONS: Record<OutputStyle, Decoration> = {
  emoji: {
    title: "🌍 ",
    rule: "─".repeat(50),
    indent: "   ",
    degree: "°C",
    icons: {
      coordinates: "📍 ",
      details: "📊 ",
      forecast: "📅 ",
      humidity: "💧 ",
      pressure: "📊 ",
      wind: "💨 ",
      visibility: "👁️  "
    }
  },
  plain: {
    title: "",
    rule: "=".repeat(40),
    indent: "  ",
    degree: "C",
    icons: { coordinates: "", details: "", forecast: "", humidity: "", pressure: "", wind: "", visibility: "" }
  }
};

export function conditionEmoji(condition?: string): string {
  return (condition && CONDITION_EMOJI[condition]) || FALLBACK_EMOJI;
}

export function formatNumber(value: number | undefined, digits?: number): string {
  if (value === undefined) return PLACEHOLDER;
  return digits === undefined ? String(value) : value.toFixed(digits);
}

function withUnit(value: number | undefined, unit: string, digits?: number): string {
  return value === undefined ? PLACEHOLDER : `${formatNumber(value, digits)}${unit}`;
}

export function formatTemperature(value: number | undefined, degree = "°C"): string {
  return withUnit(value, degree, 1);
}

export function formatVisibility(meters: number | undefined): string {
  return meters === undefined ? PLACEHOLDER : `${(meters / 1000).toFixed(1)} km`;
}

export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|\P{L})(\p{L})/gu, (_, lead: string, letter: string) => lead + letter.toUpperCase());
}

function describe(text?: string): string {
  return text ? titleCase(text) : PLACEHOLDER;
}

function currentLines(current: CurrentConditions, deco: Decoration, style: OutputStyle): string[] {
  const temp = formatTemperature(current.temp, deco.degree);
  const feels = formatTemperature(current.feelsLike, deco.degree);
  const header =
    style === "emoji"
      ? [
          `🌡️  Temperature: ${temp} (Feels like ${feels})`,
          `🌈 Conditions: ${conditionEmoji(current.condition)} ${describe(current.description)}`
        ]
      : [`Current: ${describe(current.description)} ${temp} (Feels like ${feels})`];

  const details: Array<[icon: string, label: string, value: string]> = [
    [deco.icons.humidity, "Humidity", withUnit(current.humidity, "%")],
    [deco.icons.pressure, "Pressure", withUnit(current.pressure, " hPa")],
    [deco.icons.wind, "Wind Speed", withUnit(current.windSpeed, " m/s")],
    [deco.icons.visibility, "Visibility", formatVisibility(current.visibility)]
  ];

  return [
    ...header,
    "",
    `${deco.icons.details}Additional Details:`,
    ...details.map(([icon, label, value]) => `${deco.indent}${icon}${`${label}:`.padEnd(LABEL_WIDTH)}${value}`)
  ];
}

function dailyLines(daily: DailyRecord[], deco: Decoration, style: OutputStyle): string[] {
  if (!daily.length) return [];
  const rule = style === "emoji" ? deco.rule : "-".repeat(40);
  const lines = ["", `${deco.icons.forecast}${daily.length}-Day Forecast:`, rule];
  for (const day of daily) {
    const range = `Max: ${formatTemperature(day.tempMax, deco.degree)}, Min: ${formatTemperature(day.tempMin, deco.degree)}`;
    if (style === "emoji") {
      lines.push(`${deco.indent}${day.date}  ${conditionEmoji(day.condition)} ${describe(day.description)}`);
      lines.push(`${deco.indent}${deco.indent}${range}`);
    } else {
      lines.push(`${day.date}: ${describe(day.description)}`);
      lines.push(`${deco.indent}${range}`);
    }
  }
  return lines;
}

/**
 * Render a bundle as the multi-line report printed by the CLI.
 */
export function formatWeather(bundle: WeatherBundle, options: FormatOptions = {}): string {
  const style = options.style ?? "emoji";
  const deco = DECORATIONS[style];
  const { lat, lon } = bundle.coordinates;

  return [
    `${deco.title}Weather for ${bundle.city}, ${bundle.country}`,
    deco.rule,
    `${deco.icons.coordinates}Coordinates: ${lat.toFixed(4)}, ${lon.toFixed(4)}`,
    ...currentLines(bundle.current, deco, style),
    ...dailyLines(bundle.daily, deco, style)
  ].join("\n");
}
