// pattern: Imperative Shell
import type { Logger } from "pino";
import type { Recipient } from "../config";
import type { DigestContent } from "./content";
import { renderDigestHtml, renderDigestSubject } from "./renderer";
import type { SendDigestFn } from "./sender";

/**
 * Aggregate outcome of one pass over the recipient registry.
 */
export type RunSummary = Readonly<{
  sent: number;
  failed: number;
  failedRecipients: ReadonlyArray<string>;
}>;

export type DispatchOptions = Readonly<{
  runDate: Date;
  timeZone: string;
}>;

/**
 * Renders and sends one digest per recipient, in registry order.
 * A failed or throwing send is recorded against that recipient and the
 * loop moves on to the next one.
 */
export async function dispatchDigests(
  recipients: ReadonlyArray<Recipient>,
  content: DigestContent,
  options: DispatchOptions,
  sendDigest: SendDigestFn,
  logger: Logger,
): Promise<RunSummary> {
  let sent = 0;
  const failedRecipients: Array<string> = [];

  for (const recipient of recipients) {
    const html = renderDigestHtml({
      recipientName: recipient.name,
      content,
      runDate: options.runDate,
      timeZone: options.timeZone,
    });
    const subject = renderDigestSubject(
      recipient.name,
      options.runDate,
      options.timeZone,
    );

    let error: string | null;
    try {
      const result = await sendDigest(recipient, subject, html, logger);
      error = result.success ? null : result.error;
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }

    if (error === null) {
      sent++;
    } else {
      failedRecipients.push(recipient.name);
      logger.warn(
        { recipient: recipient.name, error },
        "digest delivery failed, continuing with next recipient",
      );
    }
  }

  return {
    sent,
    failed: failedRecipients.length,
    failedRecipients,
  };
}

export const EXIT_SUCCESS = 0;
export const EXIT_PARTIAL_FAILURE = 2;

/**
 * Process exit status for a finished run: 0 when every recipient got their
 * digest, 2 when at least one delivery failed.
 */
export function summaryExitCode(summary: RunSummary): number {
  return summary.failed === 0 ? EXIT_SUCCESS : EXIT_PARTIAL_FAILURE;
}
