// pattern: Imperative Shell
import type { Logger } from "pino";
import type { SmtpSender } from "./digest/sender";
import type { DigestScheduler } from "./scheduler";

export type ShutdownDeps = {
  readonly scheduler: DigestScheduler;
  readonly sender: Pick<SmtpSender, "close">;
  readonly logger: Logger;
};

/**
 * Builds the shutdown sequence for the scheduled mode. The scheduler is
 * drained first so a cycle that is mid-send keeps its SMTP connection; the
 * transport is closed only after that cycle settles. Later calls resolve
 * without doing anything.
 *
 * @returns a function taking the signal name and resolving with the exit status
 */
export function createShutdown(
  deps: ShutdownDeps,
): (signal: string) => Promise<number | null> {
  let started = false;

  return async (signal) => {
    if (started) {
      deps.logger.info({ signal }, "shutdown already in progress");
      return null;
    }
    started = true;
    deps.logger.info({ signal }, "shutdown signal received");

    try {
      await deps.scheduler.stop();
      deps.logger.info("digest scheduler stopped");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error stopping digest scheduler");
    }

    try {
      deps.sender.close();
      deps.logger.info("mail transport closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing mail transport");
    }

    deps.logger.info("shutdown complete");
    return 0;
  };
}

/**
 * Wires SIGTERM and SIGINT to the shutdown sequence and exits once it has
 * finished. A repeated signal does not start a second shutdown.
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  const shutdown = createShutdown(deps);

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal)
      .then((code) => {
        if (code !== null) {
          exit(code);
        }
      })
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.fatal({ error: message }, "shutdown failed");
        exit(1);
      });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}
