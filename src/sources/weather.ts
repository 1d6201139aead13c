import { z } from "zod";
import type { Logger } from "pino";
import type { Location } from "../config";
import { getJson } from "./http";
import type {
  DaySummary,
  FetchOutcome,
  MetricRange,
  WindowSummary,
} from "./types";

const HOURLY_VARIABLES = [
  "temperature_2m",
  "apparent_temperature",
  "relative_humidity_2m",
  "precipitation_probability",
] as const;

const DAILY_VARIABLES = ["weather_code"] as const;

const DAY_HOURS = { from: 8, to: 19 } as const;
const NIGHT_HOURS = { from: 20, to: 21 } as const;

const series = z.array(z.number().nullable());

export const hourlyForecastSchema = z
  .object({
    time: z.array(z.string()),
    temperature_2m: series,
    apparent_temperature: series,
    relative_humidity_2m: series,
    precipitation_probability: series,
  })
  .refine(
    (hourly) =>
      HOURLY_VARIABLES.every(
        (variable) => hourly[variable].length === hourly.time.length,
      ),
    { message: "hourly series lengths do not match hourly.time" },
  );

const forecastResponseSchema = z.object({
  hourly: hourlyForecastSchema,
  daily: z
    .object({
      weather_code: z.array(z.number().int().nullable()),
    })
    .optional(),
});

export type HourlyForecast = z.infer<typeof hourlyForecastSchema>;

export type WeatherOptions = Readonly<{
  url: string;
  timeoutMs: number;
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}>;

type Sample = {
  readonly hour: number;
  readonly temperature: number;
  readonly apparentTemperature: number;
  readonly relativeHumidity: number;
  readonly precipitationProbability: number;
};

// Open-Meteo returns local wall-clock times ("2026-10-19T08:00") when a
// timezone is requested, so the hour is read from the string, not a Date.
const LOCAL_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2}):\d{2}/;

function collectSamples(hourly: HourlyForecast): Array<Sample> {
  const samples: Array<Sample> = [];

  hourly.time.forEach((time, index) => {
    const match = LOCAL_TIME_PATTERN.exec(time);
    const temperature = hourly.temperature_2m[index];
    const apparentTemperature = hourly.apparent_temperature[index];
    const relativeHumidity = hourly.relative_humidity_2m[index];
    const precipitationProbability = hourly.precipitation_probability[index];

    if (
      !match?.[2] ||
      temperature == null ||
      apparentTemperature == null ||
      relativeHumidity == null ||
      precipitationProbability == null
    ) {
      return;
    }

    samples.push({
      hour: Number(match[2]),
      temperature,
      apparentTemperature,
      relativeHumidity,
      precipitationProbability,
    });
  });

  return samples;
}

function rangeOf(values: ReadonlyArray<number>): MetricRange {
  return { min: Math.min(...values), max: Math.max(...values) };
}

function summarizeWindow(
  samples: ReadonlyArray<Sample>,
  window: Readonly<{ from: number; to: number }>,
): WindowSummary | null {
  const inWindow = samples.filter(
    (sample) => sample.hour >= window.from && sample.hour <= window.to,
  );

  if (inWindow.length === 0) {
    return null;
  }

  return {
    sampleCount: inWindow.length,
    temperature: rangeOf(inWindow.map((s) => s.temperature)),
    apparentTemperature: rangeOf(inWindow.map((s) => s.apparentTemperature)),
    relativeHumidity: rangeOf(inWindow.map((s) => s.relativeHumidity)),
    precipitationProbability: rangeOf(
      inWindow.map((s) => s.precipitationProbability),
    ),
  };
}

/**
 * Reduces an hourly forecast to day and night min/max aggregates.
 * Hours with any missing metric are skipped; a window left with no samples
 * is null rather than zero-filled.
 *
 * @returns null when the series contains no parseable timestamp at all
 */
export function summarizeHourly(
  locationName: string,
  hourly: HourlyForecast,
): DaySummary | null {
  const firstTime = hourly.time
    .map((time) => LOCAL_TIME_PATTERN.exec(time)?.[1])
    .find((date): date is string => date !== undefined);

  if (firstTime === undefined) {
    return null;
  }

  const samples = collectSamples(hourly);

  return {
    location: locationName,
    date: firstTime,
    day: summarizeWindow(samples, DAY_HOURS),
    night: summarizeWindow(samples, NIGHT_HOURS),
  };
}

export function buildForecastUrl(baseUrl: string, location: Location): URL {
  const url = new URL(baseUrl);
  url.searchParams.set("latitude", String(location.latitude));
  url.searchParams.set("longitude", String(location.longitude));
  url.searchParams.set("hourly", HOURLY_VARIABLES.join(","));
  url.searchParams.set("daily", DAILY_VARIABLES.join(","));
  url.searchParams.set("timezone", location.timezone);
  url.searchParams.set("forecast_days", "1");
  return url;
}

/**
 * Delay before retry number `attempt` (1-based): exponential from
 * baseDelayMs, capped at maxDelayMs.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<WeatherOptions, "baseDelayMs" | "maxDelayMs">,
): number {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetches the one-day hourly forecast for a location and summarizes it.
 * Transient failures (network, timeout, 429, 5xx) are retried up to
 * `attempts` times; every failure ends as `{ success: false }`, never a throw.
 */
export async function fetchDaySummary(
  location: Location,
  options: WeatherOptions,
  logger: Logger,
): Promise<FetchOutcome<DaySummary>> {
  const url = buildForecastUrl(options.url, location);

  let lastError = "no attempts made";
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    const response = await getJson(url, options.timeoutMs);

    if (response.success) {
      const parsed = forecastResponseSchema.safeParse(response.body);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ");
        return failure(logger, location, `malformed forecast: ${issues}`);
      }

      const summary = summarizeHourly(location.name, parsed.data.hourly);
      if (!summary) {
        return failure(logger, location, "forecast contained no hourly data");
      }

      const weatherCode = parsed.data.daily?.weather_code[0];
      logger.debug(
        { location: location.name, attempt, weatherCode },
        "weather forecast fetched",
      );
      return {
        success: true,
        value: weatherCode == null ? summary : { ...summary, weatherCode },
      };
    }

    lastError = response.error;
    if (!response.retryable || attempt === options.attempts) {
      break;
    }

    const delayMs = backoffDelay(attempt, options);
    logger.debug(
      { location: location.name, attempt, delayMs, error: response.error },
      "weather fetch failed, retrying",
    );
    await sleep(delayMs);
  }

  return failure(logger, location, lastError);
}

function failure(
  logger: Logger,
  location: Location,
  error: string,
): FetchOutcome<DaySummary> {
  logger.warn({ location: location.name, error }, "weather fetch failed");
  return { success: false, error };
}
