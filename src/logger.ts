import pino from "pino";

/**
 * Creates the structured JSON logger shared by every run.
 *
 * Level labels are strings rather than pino's numeric levels, timestamps are
 * ISO 8601, and every line carries `service: "morning-digest"` so the job's
 * output can be picked out of a shared syslog or container log stream.
 *
 * @param level - Overrides `LOG_LEVEL` (which itself defaults to `info`)
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { service: "morning-digest" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
