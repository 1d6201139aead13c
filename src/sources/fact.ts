// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import { getJson } from "./http";
import type { Fact } from "./types";

export const FALLBACK_FACT: Fact =
  "The heart of a shrimp is located in its head.";

const factResponseSchema = z.object({
  text: z.string().trim().min(1),
});

export type FactOptions = Readonly<{
  url: string;
  timeoutMs: number;
}>;

/**
 * Fetches one trivia statement, falling back to FALLBACK_FACT on any error.
 */
export async function fetchFact(
  options: FactOptions,
  logger: Logger,
): Promise<Fact> {
  const response = await getJson(new URL(options.url), options.timeoutMs);

  if (!response.success) {
    logger.warn({ error: response.error }, "fact fetch failed, using fallback");
    return FALLBACK_FACT;
  }

  const parsed = factResponseSchema.safeParse(response.body);
  if (!parsed.success) {
    logger.warn(
      { error: parsed.error.issues.map((i) => i.message).join("; ") },
      "fact response malformed, using fallback",
    );
    return FALLBACK_FACT;
  }

  return parsed.data.text;
}
