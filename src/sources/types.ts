/**
 * Outcome of a single upstream fetch. Each caller decides what a failure
 * means: quote and fact substitute a fallback, weather forwards an absence.
 */
export type FetchOutcome<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: string };

export type MetricRange = Readonly<{
  min: number;
  max: number;
}>;

/**
 * Min/max aggregates of the hourly samples that fell inside one window.
 */
export type WindowSummary = Readonly<{
  sampleCount: number;
  temperature: MetricRange;
  apparentTemperature: MetricRange;
  relativeHumidity: MetricRange;
  precipitationProbability: MetricRange;
}>;

/**
 * Day (08:00–19:59) and night (20:00–21:59) forecast aggregates for one
 * location. A window without usable samples is null. `weatherCode` is the
 * day's WMO code when the forecast carried one.
 */
export type DaySummary = Readonly<{
  location: string;
  date: string;
  day: WindowSummary | null;
  night: WindowSummary | null;
  weatherCode?: number;
}>;

export type Quote = Readonly<{
  text: string;
  author: string;
}>;

export type Fact = string;
