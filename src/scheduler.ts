import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { runDigestCycle } from "./digest/orchestrator";
import type { SendDigestFn } from "./digest/sender";

export type DigestScheduler = {
  /** Stops future runs; resolves once a cycle already in progress has finished. */
  readonly stop: () => Promise<void>;
};

/**
 * Creates and starts a scheduler that runs the digest cycle on the
 * configured cron expression, evaluated in the location's timezone.
 * A tick that arrives while the previous cycle is still sending is skipped.
 *
 * @param cronExpression - When to run, e.g. "0 7 * * *"
 * @param sendDigest - Delivery function, injected so tests can stub the transport
 */
export function createDigestScheduler(
  cronExpression: string,
  config: AppConfig,
  sendDigest: SendDigestFn,
  logger: Logger,
): DigestScheduler {
  let inFlight: Promise<void> | null = null;

  const runCycle = async (): Promise<void> => {
    try {
      await runDigestCycle(config, sendDigest, logger);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "digest cycle failed unexpectedly");
    }
  };

  const task: ScheduledTask = cron.schedule(
    cronExpression,
    () => {
      if (inFlight) {
        logger.warn("previous digest cycle still running, skipping this tick");
        return inFlight;
      }
      inFlight = runCycle().finally(() => {
        inFlight = null;
      });
      return inFlight;
    },
    { timezone: config.location.timezone },
  );

  return {
    stop: async () => {
      task.stop();
      if (inFlight) {
        logger.info("waiting for the running digest cycle to finish");
        await inFlight;
      }
    },
  };
}
