import { resolve } from "node:path";
import { createLogger } from "./logger";
import { EXIT_STARTUP_FAILURE, startApp } from "./app";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

const logger = createLogger();
logger.info("morning-digest starting");

startApp(resolve(CONFIG_PATH), { logger })
  .then((exitCode) => {
    if (exitCode !== null) {
      process.exitCode = exitCode;
    }
  })
  .catch((err: unknown) => {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "digest run failed unexpectedly",
    );
    process.exit(EXIT_STARTUP_FAILURE);
  });
