import { vi } from "vitest";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { DigestContent } from "../digest/content";
import type { HourlyForecast } from "../sources/weather";
import type { DaySummary, WindowSummary } from "../sources";

/**
 * Creates a default AppConfig suitable for testing.
 * Retry delays are zero so weather retries do not slow the suite.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    smtp: {
      host: "smtp.example.com",
      port: 587,
      user: "digest@example.com",
      password: "test-secret",
      fromName: "Morning Digest",
    },
    recipients: [
      { name: "Ada", email: "ada@example.com" },
      { name: "Grace", email: "grace@example.com" },
    ],
    location: {
      name: "Goettingen",
      latitude: 51.5412,
      longitude: 9.9158,
      timezone: "Europe/Berlin",
    },
    schedule: {},
    sources: {
      timeoutMs: 10000,
      weather: {
        url: "https://weather.example.com/v1/forecast",
        attempts: 3,
        baseDelayMs: 0,
        maxDelayMs: 0,
      },
      quote: { url: "https://quote.example.com/api/random" },
      fact: { url: "https://fact.example.com/random.json" },
    },
    ...overrides,
  };
}

/**
 * Creates a mock Logger instance for testing.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    setLevel: vi.fn(),
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}

export type HourlyRow = readonly [
  time: string,
  temperature: number | null,
  apparentTemperature: number | null,
  relativeHumidity: number | null,
  precipitationProbability: number | null,
];

/**
 * Builds an Open-Meteo style hourly block from one row per hour.
 */
export function hourlyFrom(rows: ReadonlyArray<HourlyRow>): HourlyForecast {
  return {
    time: rows.map((r) => r[0]),
    temperature_2m: rows.map((r) => r[1]),
    apparent_temperature: rows.map((r) => r[2]),
    relative_humidity_2m: rows.map((r) => r[3]),
    precipitation_probability: rows.map((r) => r[4]),
  };
}

/**
 * A full day of hourly rows for 2026-10-19 where every metric equals the
 * hour, so window bounds can be read straight off the result.
 */
export function fullDayRows(): Array<HourlyRow> {
  return Array.from({ length: 24 }, (_, hour) => {
    const hh = String(hour).padStart(2, "0");
    return [`2026-10-19T${hh}:00`, hour, hour, hour, hour] as const;
  });
}

export const dayWindow: WindowSummary = {
  sampleCount: 12,
  temperature: { min: 10, max: 18 },
  apparentTemperature: { min: 8.5, max: 17.2 },
  relativeHumidity: { min: 55, max: 80 },
  precipitationProbability: { min: 5, max: 40 },
};

export const nightWindow: WindowSummary = {
  sampleCount: 2,
  temperature: { min: 5, max: 9 },
  apparentTemperature: { min: 3.1, max: 7.4 },
  relativeHumidity: { min: 82, max: 90 },
  precipitationProbability: { min: 10, max: 20 },
};

export const fullWeather: DaySummary = {
  location: "Goettingen",
  date: "2026-10-19",
  day: dayWindow,
  night: nightWindow,
};

export function createTestContent(
  overrides?: Partial<DigestContent>,
): DigestContent {
  return {
    quote: { text: "Stay curious.", author: "Test Author" },
    fact: "Octopuses have three hearts.",
    weather: fullWeather,
    ...overrides,
  };
}

/**
 * Minimal stand-in for a fetch Response carrying a JSON body.
 */
export function jsonResponse(body: unknown, status = 200, statusText = "OK") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: vi.fn().mockResolvedValue(body),
  };
}
