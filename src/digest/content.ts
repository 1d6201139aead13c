// pattern: Imperative Shell
import type { Logger } from "pino";
import type { Location, SourcesConfig } from "../config";
import { fetchDaySummary, fetchFact, fetchQuote } from "../sources";
import type { DaySummary, Fact, Quote } from "../sources";

/**
 * Content shared by every recipient of one run. Built once before the
 * recipient loop and frozen.
 */
export type DigestContent = Readonly<{
  quote: Quote;
  fact: Fact;
  weather: DaySummary | null;
}>;

/**
 * Fetches quote, fact and weather concurrently. Each fetch carries its own
 * timeout and none of them rejects: quote and fact fall back to fixed
 * values, and a failed weather fetch becomes `weather: null`.
 */
export async function gatherDigestContent(
  location: Location,
  sources: SourcesConfig,
  logger: Logger,
): Promise<DigestContent> {
  const [quote, fact, weather] = await Promise.all([
    fetchQuote({ ...sources.quote, timeoutMs: sources.timeoutMs }, logger),
    fetchFact({ ...sources.fact, timeoutMs: sources.timeoutMs }, logger),
    fetchDaySummary(
      location,
      { ...sources.weather, timeoutMs: sources.timeoutMs },
      logger,
    ),
  ]);

  return Object.freeze({
    quote: Object.freeze({ ...quote }),
    fact,
    weather: weather.success ? weather.value : null,
  });
}
