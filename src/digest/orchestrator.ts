// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { gatherDigestContent } from "./content";
import { dispatchDigests } from "./dispatcher";
import type { RunSummary } from "./dispatcher";
import type { SendDigestFn } from "./sender";

/**
 * Runs one complete digest cycle: fetches quote, fact and weather once,
 * then renders and sends a personalized digest to every recipient.
 *
 * Behavior:
 * - Upstream failures never stop the run; quote and fact fall back to fixed
 *   text and missing weather renders as an unavailable notice.
 * - A failed send for one recipient does not affect the others.
 * - Logs the fetched content and the final summary (`warn` when any
 *   recipient failed).
 *
 * @param config - Application configuration (recipients, location, sources)
 * @param sendDigest - Delivers one digest (dependency injection for testability)
 * @param logger - Logger instance for recording events
 * @param now - Run date shown in the digest; defaults to the current time
 */
export async function runDigestCycle(
  config: AppConfig,
  sendDigest: SendDigestFn,
  logger: Logger,
  now: Date = new Date(),
): Promise<RunSummary> {
  logger.info(
    { recipientCount: config.recipients.length },
    "digest cycle starting",
  );

  const content = await gatherDigestContent(
    config.location,
    config.sources,
    logger,
  );

  logger.info(
    {
      quoteAuthor: content.quote.author,
      factLength: content.fact.length,
      weatherAvailable: content.weather !== null,
    },
    "digest content gathered",
  );

  const summary = await dispatchDigests(
    config.recipients,
    content,
    { runDate: now, timeZone: config.location.timezone },
    sendDigest,
    logger,
  );

  if (summary.failed === 0) {
    logger.info({ sent: summary.sent }, "digest cycle complete");
  } else {
    logger.warn(
      {
        sent: summary.sent,
        failed: summary.failed,
        failedRecipients: summary.failedRecipients,
      },
      "digest cycle completed with failures",
    );
  }

  return summary;
}
