// pattern: Functional Core
import type { DaySummary, MetricRange, WindowSummary } from "../sources";
import type { DigestContent } from "./content";
import { describeWeatherCode } from "./conditions";
import { recommendClothing } from "./wardrobe";

export type DigestRenderInput = Readonly<{
  recipientName: string;
  content: DigestContent;
  runDate: Date;
  timeZone: string;
}>;

export const WEATHER_UNAVAILABLE_MESSAGE =
  "Weather information is currently unavailable.";

const STYLES = {
  body: "margin: 0; padding: 20px; background-color: #f4f4f4; font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; line-height: 1.6; color: #333333;",
  container:
    "max-width: 600px; margin: 0 auto; padding: 30px; background-color: #ffffff; border-radius: 10px;",
  h1: "margin: 0 0 4px 0; padding-bottom: 10px; border-bottom: 3px solid #3498db; color: #2c3e50; font-size: 26px;",
  date: "margin: 0 0 20px 0; color: #555555; font-size: 17px;",
  h2: "margin: 0 0 10px 0; color: #2980b9; font-size: 19px;",
  quote:
    "margin: 20px 0; padding: 15px; background-color: #e8f4f8; border-left: 4px solid #3498db; border-radius: 5px;",
  quoteText: "margin: 0; font-style: italic;",
  quoteAuthor:
    "margin: 10px 0 0 0; text-align: right; font-weight: bold; color: #2980b9;",
  fact: "margin: 20px 0; padding: 15px; background-color: #fff3cd; border-left: 4px solid #ffc107; border-radius: 5px;",
  weather:
    "margin: 20px 0; padding: 15px; background-color: #e8f8f5; border-radius: 5px;",
  forecast: "margin: 0 0 10px 0; font-size: 16px;",
  table: "width: 100%; border-collapse: collapse; font-size: 14px;",
  th: "padding: 6px 8px; text-align: left; border-bottom: 2px solid #a3d9cc; color: #1e6f5c;",
  td: "padding: 6px 8px; border-bottom: 1px solid #d0ece5;",
  wardrobe:
    "margin: 15px 0 0 0; padding: 10px; background-color: #fef5e7; border-radius: 5px;",
  unavailable: "margin: 0; color: #7f8c8d;",
  footer:
    "margin-top: 30px; padding-top: 20px; border-top: 1px solid #dddddd; text-align: center; color: #7f8c8d; font-size: 14px;",
} as const;

/**
 * Escapes special HTML characters to prevent injection.
 */
function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Formats the run date as e.g. "Monday, October 19, 2026" in the
 * location's timezone.
 */
export function formatRunDate(runDate: Date, timeZone: string): string {
  return new Intl.DateTimeFormat("en-US", {
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone,
  }).format(runDate);
}

function formatTemperature(value: number): string {
  return `${value.toFixed(1)}°C`;
}

function formatPercent(value: number): string {
  return `${Math.round(value)}%`;
}

function formatRange(
  range: MetricRange,
  format: (value: number) => string,
): string {
  return `${format(range.min)} – ${format(range.max)}`;
}

const WEATHER_ROWS: ReadonlyArray<{
  readonly label: string;
  readonly metric: (window: WindowSummary) => MetricRange;
  readonly format: (value: number) => string;
}> = [
  {
    label: "Temperature",
    metric: (w) => w.temperature,
    format: formatTemperature,
  },
  {
    label: "Feels like",
    metric: (w) => w.apparentTemperature,
    format: formatTemperature,
  },
  {
    label: "Humidity",
    metric: (w) => w.relativeHumidity,
    format: formatPercent,
  },
  {
    label: "Chance of rain",
    metric: (w) => w.precipitationProbability,
    format: formatPercent,
  },
];

function renderWeatherTable(
  weather: DaySummary,
  day: WindowSummary,
  night: WindowSummary,
): string {
  const rows = WEATHER_ROWS.map(
    (row) =>
      `<tr><td style="${STYLES.td}">${row.label}</td><td style="${STYLES.td}">${formatRange(row.metric(day), row.format)}</td><td style="${STYLES.td}">${formatRange(row.metric(night), row.format)}</td></tr>`,
  ).join("\n");

  return [
    `<div data-section="weather" style="${STYLES.weather}">`,
    `<h2 style="${STYLES.h2}">🌤️ Weather in ${escapeHtml(weather.location)}</h2>`,
    ...(weather.weatherCode === undefined
      ? []
      : [
          `<p style="${STYLES.forecast}"><strong>Forecast:</strong> ${escapeHtml(describeWeatherCode(weather.weatherCode))}</p>`,
        ]),
    `<table style="${STYLES.table}">`,
    `<thead><tr><th style="${STYLES.th}"></th><th style="${STYLES.th}">Day (8am–8pm)</th><th style="${STYLES.th}">Night (8pm–10pm)</th></tr></thead>`,
    `<tbody>`,
    rows,
    `</tbody>`,
    `</table>`,
    `<p style="${STYLES.wardrobe}"><strong>👔 What to wear today:</strong> ${escapeHtml(recommendClothing(day))}</p>`,
    `</div>`,
  ].join("\n");
}

function renderWeatherUnavailable(): string {
  return [
    `<div data-section="weather" style="${STYLES.weather}">`,
    `<h2 style="${STYLES.h2}">🌤️ Weather Update</h2>`,
    `<p style="${STYLES.unavailable}">${WEATHER_UNAVAILABLE_MESSAGE}</p>`,
    `</div>`,
  ].join("\n");
}

/**
 * Renders the weather block: a day/night comparison table when both windows
 * are present, otherwise a generic unavailable notice.
 */
function renderWeather(weather: DaySummary | null): string {
  if (weather?.day && weather.night) {
    return renderWeatherTable(weather, weather.day, weather.night);
  }
  return renderWeatherUnavailable();
}

/**
 * Renders one recipient's digest as a self-contained HTML document with
 * inline styles. Output depends only on the input, so the same content
 * renders byte-identically for every call in a run.
 */
export function renderDigestHtml(input: DigestRenderInput): string {
  const { recipientName, content, runDate, timeZone } = input;

  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<title>Good Morning, ${escapeHtml(recipientName)}!</title>`,
    "</head>",
    `<body style="${STYLES.body}">`,
    `<div style="${STYLES.container}">`,
    `<h1 style="${STYLES.h1}">Good Morning, ${escapeHtml(recipientName)}! ☀️</h1>`,
    `<p style="${STYLES.date}">${formatRunDate(runDate, timeZone)}</p>`,
    `<div data-section="quote" style="${STYLES.quote}">`,
    `<h2 style="${STYLES.h2}">📚 Quote of the Day</h2>`,
    `<p style="${STYLES.quoteText}">&ldquo;${escapeHtml(content.quote.text)}&rdquo;</p>`,
    `<p style="${STYLES.quoteAuthor}">&mdash; ${escapeHtml(content.quote.author)}</p>`,
    "</div>",
    `<div data-section="fact" style="${STYLES.fact}">`,
    `<h2 style="${STYLES.h2}">💡 Fun Fact of the Day</h2>`,
    `<p style="margin: 0;">${escapeHtml(content.fact)}</p>`,
    "</div>",
    renderWeather(content.weather),
    `<div style="${STYLES.footer}">`,
    "<p>Have a wonderful day! 🌟</p>",
    "</div>",
    "</div>",
    "</body>",
    "</html>",
  ].join("\n");
}

/**
 * Subject line, e.g. "Good Morning Ada! ☀️ Oct 19".
 */
export function renderDigestSubject(
  recipientName: string,
  runDate: Date,
  timeZone: string,
): string {
  const shortDate = new Intl.DateTimeFormat("en-US", {
    month: "short",
    day: "2-digit",
    timeZone,
  }).format(runDate);
  return `Good Morning ${recipientName}! ☀️ ${shortDate}`;
}
