// pattern: Imperative Shell
import type { Logger } from "pino";
import { loadConfig } from "./config";
import type { SmtpConfig } from "./config";
import { createSmtpSender, runDigestCycle, summaryExitCode } from "./digest";
import type { SmtpSender } from "./digest";
import { createDigestScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

export const EXIT_STARTUP_FAILURE = 1;

export type AppDeps = {
  readonly logger: Logger;
  readonly createSender?: (smtp: SmtpConfig) => SmtpSender;
};

/**
 * Loads the configuration and starts the job. Without a digest schedule one
 * cycle runs and its exit status is returned; with one, the cron task and
 * the signal handlers are installed and null is returned so the process
 * stays up.
 */
export async function startApp(
  configPath: string,
  deps: AppDeps,
): Promise<number | null> {
  const { logger, createSender = createSmtpSender } = deps;

  let config;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    return EXIT_STARTUP_FAILURE;
  }

  logger.info(
    {
      recipients: config.recipients.length,
      location: config.location.name,
      smtpHost: config.smtp.host,
    },
    "config loaded",
  );

  const sender = createSender(config.smtp);
  const cronExpression = config.schedule.digest;

  if (!cronExpression) {
    try {
      const summary = await runDigestCycle(config, sender.send, logger);
      return summaryExitCode(summary);
    } finally {
      sender.close();
    }
  }

  const scheduler = createDigestScheduler(
    cronExpression,
    config,
    sender.send,
    logger,
  );
  logger.info(
    { schedule: cronExpression, timezone: config.location.timezone },
    "digest scheduler started",
  );

  registerShutdownHandlers({ scheduler, sender, logger });
  return null;
}
