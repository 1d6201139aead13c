// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import { getJson } from "./http";
import type { Quote } from "./types";

export const FALLBACK_QUOTE: Quote = {
  text: "Science is not only a disciple of reason but also one of romance and passion.",
  author: "Stephen Hawking",
};

export const UNKNOWN_AUTHOR = "Unknown";

// ZenQuotes shape: [{ "q": text, "a": author, "h": preformatted html }]
const quoteResponseSchema = z
  .array(
    z.object({
      q: z.string().trim().min(1),
      a: z.string().trim().nullish(),
    }),
  )
  .min(1);

export type QuoteOptions = Readonly<{
  url: string;
  timeoutMs: number;
  tags?: ReadonlyArray<string>;
  maxLength?: number;
}>;

export function buildQuoteUrl(options: QuoteOptions): URL {
  const url = new URL(options.url);
  if (options.tags && options.tags.length > 0) {
    url.searchParams.set("tags", options.tags.join("|"));
  }
  if (options.maxLength !== undefined) {
    url.searchParams.set("maxLength", String(options.maxLength));
  }
  return url;
}

/**
 * Fetches one quotation. Never rejects: any failure is logged and
 * FALLBACK_QUOTE is returned in its place.
 */
export async function fetchQuote(
  options: QuoteOptions,
  logger: Logger,
): Promise<Quote> {
  const response = await getJson(buildQuoteUrl(options), options.timeoutMs);

  if (!response.success) {
    logger.warn({ error: response.error }, "quote fetch failed, using fallback");
    return FALLBACK_QUOTE;
  }

  const parsed = quoteResponseSchema.safeParse(response.body);
  if (!parsed.success) {
    logger.warn(
      { error: parsed.error.issues.map((i) => i.message).join("; ") },
      "quote response malformed, using fallback",
    );
    return FALLBACK_QUOTE;
  }

  const [first] = parsed.data;
  if (!first) {
    return FALLBACK_QUOTE;
  }

  return {
    text: first.q,
    author: first.a || UNKNOWN_AUTHOR,
  };
}
