import { ConfigError, loadConfig, type TracerConfig } from "./config";
import { logger } from "./logger";
import { createServer } from "./server";

function main(): void {
  let config: TracerConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      logger.error(e.message);
      process.exit(1);
    }
    throw e;
  }
  logger.configure({ level: config.logLevel });

  const server = createServer({ limits: config });
  server.on("error", (err) => {
    logger.error(`server error: ${err.message}`);
    process.exit(1);
  });
  server.listen(config.port, config.host, () => {
    logger.info(`listening on http://${config.host}:${config.port}`);
  });

  const shutdown = () => {
    logger.info("shutting down");
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main();
