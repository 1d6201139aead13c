export {
  fetchDaySummary,
  summarizeHourly,
  buildForecastUrl,
  backoffDelay,
} from "./weather";
export type { HourlyForecast, WeatherOptions } from "./weather";
export { fetchQuote, buildQuoteUrl, FALLBACK_QUOTE, UNKNOWN_AUTHOR } from "./quote";
export type { QuoteOptions } from "./quote";
export { fetchFact, FALLBACK_FACT } from "./fact";
export type { FactOptions } from "./fact";
export { getJson } from "./http";
export type { JsonResponse } from "./http";
export type {
  FetchOutcome,
  MetricRange,
  WindowSummary,
  DaySummary,
  Quote,
  Fact,
} from "./types";
